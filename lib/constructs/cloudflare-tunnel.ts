import { Duration } from 'aws-cdk-lib';
import * as ecs from 'aws-cdk-lib/aws-ecs';
import * as logs from 'aws-cdk-lib/aws-logs';
import * as secretsmanager from 'aws-cdk-lib/aws-secretsmanager';
import { Construct } from 'constructs';
import { EnvironmentSettings } from '../config/environment.js';

export const CLOUDFLARED_IMAGE = 'cloudflare/cloudflared:latest';

export interface CloudflareTunnelProps {
  config: EnvironmentSettings;
  taskDefinition: ecs.FargateTaskDefinition;
  /** The container the tunnel forwards to; it waits for the sidecar. */
  appContainer: ecs.ContainerDefinition;
  logGroup: logs.ILogGroup;
}

/**
 * Outbound-only ingress: a cloudflared sidecar in the n8n task that holds
 * the tunnel open. No inbound rule is needed.
 */
export class CloudflareTunnel extends Construct {
  public readonly tokenSecret: secretsmanager.ISecret;
  public readonly container: ecs.ContainerDefinition;
  public readonly tunnelName: string;
  public readonly tunnelDomain: string;

  constructor(scope: Construct, id: string, props: CloudflareTunnelProps) {
    super(scope, id);

    const { config } = props;
    const cloudflare = config.settings.access?.cloudflare;

    this.tunnelName = cloudflare?.tunnelName ?? `n8n-${config.name}`;
    this.tunnelDomain = cloudflare?.tunnelDomain ?? `n8n-${config.name}.example.com`;

    // The token is issued by Cloudflare; a placeholder secret is created
    // for it to be filled in after deployment.
    this.tokenSecret = cloudflare?.tunnelTokenSecretName
      ? secretsmanager.Secret.fromSecretNameV2(this, 'TunnelToken', cloudflare.tunnelTokenSecretName)
      : new secretsmanager.Secret(this, 'TunnelToken', {
          secretName: `n8n/${config.name}/cloudflare-tunnel-token`,
          description: `Cloudflare tunnel token for n8n ${config.name}`,
        });

    this.container = props.taskDefinition.addContainer('cloudflare-tunnel', {
      image: ecs.ContainerImage.fromRegistry(CLOUDFLARED_IMAGE),
      command: ['tunnel', '--no-autoupdate', 'run'],
      essential: true,
      secrets: {
        TUNNEL_TOKEN: ecs.Secret.fromSecretsManager(this.tokenSecret),
      },
      environment: {
        TUNNEL_METRICS: '0.0.0.0:2000',
        TUNNEL_LOGLEVEL: 'info',
      },
      logging: ecs.LogDrivers.awsLogs({
        streamPrefix: 'cloudflare-tunnel',
        logGroup: props.logGroup,
      }),
      healthCheck: {
        command: ['CMD', 'cloudflared', 'tunnel', 'info'],
        interval: Duration.seconds(30),
        timeout: Duration.seconds(10),
        retries: 3,
        startPeriod: Duration.seconds(30),
      },
    });

    props.appContainer.addContainerDependencies({
      container: this.container,
      condition: ecs.ContainerDependencyCondition.START,
    });
  }
}
