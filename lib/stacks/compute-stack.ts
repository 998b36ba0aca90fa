import * as cdk from 'aws-cdk-lib';
import * as appscaling from 'aws-cdk-lib/aws-applicationautoscaling';
import * as ecs from 'aws-cdk-lib/aws-ecs';
import * as logs from 'aws-cdk-lib/aws-logs';
import * as servicediscovery from 'aws-cdk-lib/aws-servicediscovery';
import { Construct } from 'constructs';
import { accessTypeOf, EnvironmentSettings } from '../config/environment.js';
import { CloudflareTunnel } from '../constructs/cloudflare-tunnel.js';
import { N8nService } from '../constructs/n8n-service.js';
import { Resilience } from '../constructs/resilience.js';
import { DeploymentStack, DeploymentStackProps } from './base-stack.js';
import { DatabaseStackOutputs } from './database-stack.js';
import { NetworkStackOutputs } from './network-stack.js';
import { StorageStackOutputs } from './storage-stack.js';

export interface ComputeStackProps extends DeploymentStackProps {
  network: NetworkStackOutputs;
  storage: StorageStackOutputs;
  database?: DatabaseStackOutputs;
}

export interface ComputeStackOutputs {
  cluster: ecs.ICluster;
  service: ecs.FargateService;
  taskDefinition: ecs.FargateTaskDefinition;
  container: ecs.ContainerDefinition;
  logGroup: logs.ILogGroup;
  /** Cloud Map registration; absent when the service is not registered. */
  serviceDiscovery?: servicediscovery.IService;
  tunnel?: CloudflareTunnel;
  scaling?: ecs.ScalableTaskCount;
  resilience?: Resilience;
}

/** Nearest supported retention at or above the requested number of days. */
export function logRetentionFor(days: number): logs.RetentionDays {
  const supported = Object.values(logs.RetentionDays)
    .filter((value): value is logs.RetentionDays => typeof value === 'number' && value > 0)
    .sort((a, b) => a - b);
  return supported.find((value) => value >= days) ?? logs.RetentionDays.ONE_MONTH;
}

// ---------------------------------------------------------------------
// Conditional features
// ---------------------------------------------------------------------

export type ComputeFeatureName = 'tunnel' | 'autoscaling' | 'resilience';

interface FeatureContext {
  scope: DeploymentStack;
  config: EnvironmentSettings;
  n8n: N8nService;
  logGroup: logs.ILogGroup;
}

interface AttachedFeatures {
  tunnel?: CloudflareTunnel;
  scaling?: ecs.ScalableTaskCount;
  resilience?: Resilience;
}

interface ComputeFeature {
  readonly name: ComputeFeatureName;
  enabled(config: EnvironmentSettings): boolean;
  attach(context: FeatureContext, attached: AttachedFeatures): void;
}

const COMPUTE_FEATURES: readonly ComputeFeature[] = [
  {
    name: 'tunnel',
    enabled: (config) => accessTypeOf(config) === 'cloudflare',
    attach: ({ scope, config, n8n, logGroup }, attached) => {
      attached.tunnel = new CloudflareTunnel(scope, 'CloudflareTunnel', {
        config,
        taskDefinition: n8n.taskDefinition,
        appContainer: n8n.container,
        logGroup,
      });
    },
  },
  {
    name: 'autoscaling',
    enabled: (config) => config.settings.scaling.maxTasks > config.settings.scaling.minTasks,
    attach: ({ scope, config, n8n }, attached) => {
      const settings = config.settings.scaling;
      const scaling = n8n.service.autoScaleTaskCount({
        minCapacity: settings.minTasks,
        maxCapacity: settings.maxTasks,
      });

      scaling.scaleOnCpuUtilization('CpuScaling', {
        targetUtilizationPercent: settings.targetCpuUtilization,
        scaleInCooldown: cdk.Duration.seconds(settings.scaleInCooldown),
        scaleOutCooldown: cdk.Duration.seconds(settings.scaleOutCooldown),
      });

      if (scope.isProduction) {
        scaling.scaleOnMetric('MemoryScaling', {
          metric: n8n.service.metricMemoryUtilization(),
          scalingSteps: [
            { lower: 80, change: 1 },
            { lower: 90, change: 2 },
          ],
          adjustmentType: appscaling.AdjustmentType.CHANGE_IN_CAPACITY,
          cooldown: cdk.Duration.seconds(300),
        });
      }

      attached.scaling = scaling;
    },
  },
  {
    name: 'resilience',
    enabled: (config) => config.settings.features.resilienceEnabled,
    attach: ({ scope, config, n8n }, attached) => {
      const resilience = new Resilience(scope, 'Resilience', {
        namePrefix: scope.stackPrefix,
        logRetention: logRetentionFor(config.settings.monitoring.logRetentionDays),
        removalPolicy: scope.removalPolicy,
      });

      n8n.container.addEnvironment('WEBHOOK_DLQ_URL', resilience.deadLetterQueues.webhook.queueUrl);
      n8n.container.addEnvironment('WORKFLOW_DLQ_URL', resilience.deadLetterQueues.workflow.queueUrl);
      n8n.container.addEnvironment('CIRCUIT_BREAKER_FUNCTION', resilience.circuitBreaker.functionName);
      resilience.grantUse(n8n.taskDefinition.taskRole);

      attached.resilience = resilience;
    },
  },
];

/** Names of the features that apply to an environment, in attachment order. */
export function enabledComputeFeatures(config: EnvironmentSettings): ComputeFeatureName[] {
  return COMPUTE_FEATURES.filter((feature) => feature.enabled(config)).map((feature) => feature.name);
}

export class ComputeStack extends DeploymentStack {
  public readonly outputs: Readonly<ComputeStackOutputs>;

  constructor(scope: Construct, id: string, props: ComputeStackProps) {
    super(scope, id, props);

    const { network, storage, database } = props;
    const monitoring = this.config.settings.monitoring;

    // ---------------------------------------------------------------
    // ECS Cluster
    // ---------------------------------------------------------------
    const cluster = new ecs.Cluster(this, 'Cluster', {
      clusterName: this.resourceName('cluster'),
      vpc: network.vpc,
      // The running-task alarm reads ECS/ContainerInsights in every environment
      containerInsights: true,
      enableFargateCapacityProviders: true,
    });

    // ---------------------------------------------------------------
    // Log Group (shared by every container in the task)
    // ---------------------------------------------------------------
    const logGroup = new logs.LogGroup(this, 'LogGroup', {
      logGroupName: `/ecs/${this.stackPrefix}/n8n`,
      retention: logRetentionFor(monitoring.logRetentionDays),
      removalPolicy: this.removalPolicy,
    });

    // ---------------------------------------------------------------
    // n8n Service
    // ---------------------------------------------------------------
    const n8n = new N8nService(this, 'N8n', {
      config: this.config,
      cluster,
      network,
      storage,
      database,
      logGroup,
    });

    const attached: AttachedFeatures = {};
    for (const feature of COMPUTE_FEATURES) {
      if (feature.enabled(this.config)) {
        feature.attach({ scope: this, config: this.config, n8n, logGroup }, attached);
      }
    }

    // ---------------------------------------------------------------
    // Stack outputs
    // ---------------------------------------------------------------
    const serviceDiscovery = n8n.service.cloudMapService;
    this.outputs = Object.freeze({
      cluster,
      service: n8n.service,
      taskDefinition: n8n.taskDefinition,
      container: n8n.container,
      logGroup,
      serviceDiscovery,
      ...attached,
    });

    this.addOutput('ClusterName', cluster.clusterName, 'ECS cluster name');
    this.addOutput('ClusterArn', cluster.clusterArn, 'ECS cluster ARN');
    this.addOutput('ServiceName', n8n.service.serviceName, 'n8n service name');
    this.addOutput('ServiceArn', n8n.service.serviceArn, 'n8n service ARN');
    this.addOutput('TaskDefinitionArn', n8n.taskDefinition.taskDefinitionArn, 'n8n task definition ARN');
    this.addOutput('LogGroupName', logGroup.logGroupName, 'n8n log group name');
    if (serviceDiscovery) {
      this.addOutput('ServiceDiscoveryName', `n8n.${network.namespace.namespaceName}`, 'Cloud Map service name');
    }

    if (attached.tunnel) {
      this.addOutput('AccessType', 'cloudflare', 'Ingress mode');
      this.addOutput('AccessUrl', `https://${attached.tunnel.tunnelDomain}`, 'n8n access URL');
      this.addOutput('CloudflareTunnelName', attached.tunnel.tunnelName, 'Cloudflare tunnel name');
      this.addOutput('CloudflareTunnelDomain', attached.tunnel.tunnelDomain, 'Cloudflare tunnel domain');
      this.addOutput(
        'CloudflareTunnelSecretArn',
        attached.tunnel.tokenSecret.secretArn,
        'Secret holding the Cloudflare tunnel token',
      );
    }
  }
}
