import { Duration } from 'aws-cdk-lib';
import * as ecs from 'aws-cdk-lib/aws-ecs';
import * as logs from 'aws-cdk-lib/aws-logs';
import * as servicediscovery from 'aws-cdk-lib/aws-servicediscovery';
import { Construct } from 'constructs';
import { EnvironmentSettings, isDevelopment } from '../config/environment.js';
import { DatabaseStackOutputs } from '../stacks/database-stack.js';
import { N8N_PORT, NetworkStackOutputs } from '../stacks/network-stack.js';
import { StorageStackOutputs } from '../stacks/storage-stack.js';

export interface N8nServiceProps {
  config: EnvironmentSettings;
  cluster: ecs.ICluster;
  network: NetworkStackOutputs;
  storage: StorageStackOutputs;
  /** Absent when n8n runs on SQLite. */
  database?: DatabaseStackOutputs;
  logGroup: logs.ILogGroup;
}

const DATA_VOLUME = 'n8n-data';

/**
 * Capacity provider mix for a given share of Spot capacity. The first
 * provider carries the base task so at least one task is always placed.
 */
export function capacityProviderStrategies(spotPercentage: number): ecs.CapacityProviderStrategy[] {
  const strategies: ecs.CapacityProviderStrategy[] = [];
  if (spotPercentage < 100) {
    strategies.push({ capacityProvider: 'FARGATE', weight: 100 - spotPercentage, base: 1 });
  }
  if (spotPercentage > 0) {
    strategies.push({
      capacityProvider: 'FARGATE_SPOT',
      weight: spotPercentage,
      ...(strategies.length === 0 ? { base: 1 } : {}),
    });
  }
  return strategies;
}

/**
 * N8nService encapsulates the n8n ECS service: Fargate task definition,
 * EFS mount, database wiring and Cloud Map entry.
 */
export class N8nService extends Construct {
  public readonly service: ecs.FargateService;
  public readonly taskDefinition: ecs.FargateTaskDefinition;
  public readonly container: ecs.ContainerDefinition;

  constructor(scope: Construct, id: string, props: N8nServiceProps) {
    super(scope, id);

    const { config, network, storage, database } = props;
    const { fargate, scaling } = config.settings;

    // -----------------------------------------------------------------
    // Fargate Task Definition
    // -----------------------------------------------------------------
    this.taskDefinition = new ecs.FargateTaskDefinition(this, 'TaskDefinition', {
      family: `${config.project}-${config.name}-n8n`,
      cpu: fargate.cpu,
      memoryLimitMiB: fargate.memory,
    });

    this.taskDefinition.addVolume({
      name: DATA_VOLUME,
      efsVolumeConfiguration: {
        fileSystemId: storage.fileSystem.fileSystemId,
        transitEncryption: 'ENABLED',
        authorizationConfig: {
          accessPointId: storage.accessPoint.accessPointId,
          iam: 'ENABLED',
        },
      },
    });

    storage.fileSystem.grant(
      this.taskDefinition.taskRole,
      'elasticfilesystem:ClientMount',
      'elasticfilesystem:ClientWrite',
    );

    // -----------------------------------------------------------------
    // Container
    // -----------------------------------------------------------------
    const environment: Record<string, string> = {
      N8N_PORT: String(N8N_PORT),
      N8N_PROTOCOL: 'http',
      N8N_LOG_LEVEL: isDevelopment(config) ? 'debug' : 'info',
      N8N_LOG_OUTPUT: 'console',
      N8N_DIAGNOSTICS_ENABLED: 'false',
      N8N_METRICS: 'true',
      GENERIC_TIMEZONE: 'UTC',
      EXECUTIONS_DATA_PRUNE: 'true',
      NODE_ENV: 'production',
    };
    const secrets: Record<string, ecs.Secret> = {};

    if (database) {
      environment.DB_TYPE = 'postgresdb';
      environment.DB_POSTGRESDB_DATABASE = 'n8n';
      secrets.DB_POSTGRESDB_USER = ecs.Secret.fromSecretsManager(database.secret, 'username');
      secrets.DB_POSTGRESDB_PASSWORD = ecs.Secret.fromSecretsManager(database.secret, 'password');

      if (database.endpoint) {
        environment.DB_POSTGRESDB_HOST = database.endpoint.hostname;
        environment.DB_POSTGRESDB_PORT = database.endpoint.port;
      } else {
        // Address unknown at synth time: resolved from the secret at task start
        secrets.DB_POSTGRESDB_HOST = ecs.Secret.fromSecretsManager(database.secret, 'host');
        secrets.DB_POSTGRESDB_PORT = ecs.Secret.fromSecretsManager(database.secret, 'port');
      }
    } else {
      environment.DB_TYPE = 'sqlite';
    }

    this.container = this.taskDefinition.addContainer('n8n', {
      image: ecs.ContainerImage.fromRegistry(`n8nio/n8n:${fargate.n8nVersion}`),
      portMappings: [{ containerPort: N8N_PORT, protocol: ecs.Protocol.TCP }],
      environment,
      secrets,
      essential: true,
      logging: ecs.LogDrivers.awsLogs({ streamPrefix: 'n8n', logGroup: props.logGroup }),
      healthCheck: {
        command: [
          'CMD-SHELL',
          `wget --no-verbose --tries=1 --spider http://localhost:${N8N_PORT}/healthz || exit 1`,
        ],
        interval: Duration.seconds(30),
        timeout: Duration.seconds(5),
        retries: 3,
        startPeriod: Duration.seconds(60),
      },
    });

    this.container.addMountPoints({
      containerPath: '/home/node/.n8n',
      sourceVolume: DATA_VOLUME,
      readOnly: false,
    });

    // -----------------------------------------------------------------
    // Fargate Service
    // -----------------------------------------------------------------
    this.service = new ecs.FargateService(this, 'Service', {
      cluster: props.cluster,
      serviceName: `${config.project}-${config.name}-n8n`,
      taskDefinition: this.taskDefinition,
      desiredCount: scaling.minTasks,
      securityGroups: [network.securityGroups.app],
      vpcSubnets: { subnets: network.subnets },
      assignPublicIp: network.publicPlacement,
      capacityProviderStrategies: capacityProviderStrategies(fargate.spotPercentage),
      cloudMapOptions: {
        cloudMapNamespace: network.namespace,
        name: 'n8n',
        dnsRecordType: servicediscovery.DnsRecordType.SRV,
        container: this.container,
        containerPort: N8N_PORT,
      },
      circuitBreaker: { enable: true, rollback: true },
      enableExecuteCommand: isDevelopment(config),
    });
  }
}
