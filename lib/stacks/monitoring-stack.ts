import * as cdk from 'aws-cdk-lib';
import * as cloudwatch from 'aws-cdk-lib/aws-cloudwatch';
import * as cloudwatchActions from 'aws-cdk-lib/aws-cloudwatch-actions';
import * as logs from 'aws-cdk-lib/aws-logs';
import * as sns from 'aws-cdk-lib/aws-sns';
import * as snsSubscriptions from 'aws-cdk-lib/aws-sns-subscriptions';
import { Construct } from 'constructs';
import { DeploymentStack, DeploymentStackProps } from './base-stack.js';
import { AccessStackOutputs } from './access-stack.js';
import { ComputeStackOutputs } from './compute-stack.js';
import { DatabaseStackOutputs } from './database-stack.js';
import { StorageStackOutputs } from './storage-stack.js';

export const TUNNEL_METRICS_NAMESPACE = 'Cloudflare/Tunnel';

export interface MonitoringStackProps extends DeploymentStackProps {
  compute: ComputeStackOutputs;
  storage?: StorageStackOutputs;
  database?: DatabaseStackOutputs;
  access?: AccessStackOutputs;
}

export interface MonitoringStackOutputs {
  alarmTopic: sns.ITopic;
  dashboard: cloudwatch.Dashboard;
  alarms: readonly cloudwatch.Alarm[];
}

interface LogMetricDefinition {
  id: string;
  metricName: string;
  filterPattern: string;
  metricValue: string;
  unit?: cloudwatch.Unit;
}

// Counters match plain text; measurements read a field from JSON log lines.
export const BUSINESS_METRICS: readonly LogMetricDefinition[] = [
  {
    id: 'WorkflowSuccessMetric',
    metricName: 'WorkflowExecutionSuccess',
    filterPattern: '"Workflow execution finished successfully"',
    metricValue: '1',
  },
  {
    id: 'WorkflowFailureMetric',
    metricName: 'WorkflowExecutionFailure',
    filterPattern: '"Workflow execution failed"',
    metricValue: '1',
  },
  {
    id: 'WorkflowDurationMetric',
    metricName: 'WorkflowExecutionDuration',
    filterPattern: '{ $.message = "Workflow execution finished*" && $.durationMs >= 0 }',
    metricValue: '$.durationMs',
    unit: cloudwatch.Unit.MILLISECONDS,
  },
  {
    id: 'WebhookRequestMetric',
    metricName: 'WebhookRequests',
    filterPattern: '"Received webhook"',
    metricValue: '1',
  },
  {
    id: 'WebhookResponseTimeMetric',
    metricName: 'WebhookResponseTime',
    filterPattern: '{ $.message = "Webhook processed*" && $.responseTimeMs >= 0 }',
    metricValue: '$.responseTimeMs',
    unit: cloudwatch.Unit.MILLISECONDS,
  },
  {
    id: 'AuthErrorMetric',
    metricName: 'AuthenticationErrors',
    filterPattern: '?"Authentication failed" ?"Unauthorized access"',
    metricValue: '1',
  },
  {
    id: 'DatabaseErrorMetric',
    metricName: 'DatabaseConnectionErrors',
    filterPattern: '?"Database connection failed" ?"ECONNREFUSED"',
    metricValue: '1',
  },
  {
    id: 'NodeExecutionTimeMetric',
    metricName: 'NodeExecutionTime',
    filterPattern: '{ $.message = "Node executed*" && $.executionTimeMs >= 0 }',
    metricValue: '$.executionTimeMs',
    unit: cloudwatch.Unit.MILLISECONDS,
  },
  {
    id: 'QueueDepthMetric',
    metricName: 'WorkflowQueueDepth',
    filterPattern: '{ $.message = "Queue status*" && $.queueSize >= 0 }',
    metricValue: '$.queueSize',
  },
];

export const TUNNEL_METRICS: readonly LogMetricDefinition[] = [
  {
    id: 'TunnelHealthMetric',
    metricName: 'TunnelHealthy',
    filterPattern: '"Registered tunnel connection"',
    metricValue: '1',
  },
  {
    id: 'TunnelErrorMetric',
    metricName: 'TunnelConnectionErrors',
    filterPattern: '?"ERR" ?"failed to connect"',
    metricValue: '1',
  },
];

/**
 * Alarms, log-derived metrics and a dashboard over everything the
 * environment provisioned. Optional upstreams only add their own alarms.
 */
export class MonitoringStack extends DeploymentStack {
  public readonly outputs: Readonly<MonitoringStackOutputs>;

  private readonly alarmAction: cloudwatchActions.SnsAction;
  private readonly alarms: cloudwatch.Alarm[] = [];

  constructor(scope: Construct, id: string, props: MonitoringStackProps) {
    super(scope, id, props);

    const { compute, storage, database, access } = props;
    const settings = this.config.settings.monitoring;
    const namespace = settings.customMetricsNamespace;
    const tunnelEnabled = compute.tunnel !== undefined;

    // ---------------------------------------------------------------
    // SNS Alarm Topic
    // ---------------------------------------------------------------
    const alarmTopic = new sns.Topic(this, 'AlarmTopic', {
      topicName: this.resourceName('alarms'),
      displayName: `n8n ${this.config.name} Alarms`,
    });
    if (settings.alarmEmail) {
      alarmTopic.addSubscription(new snsSubscriptions.EmailSubscription(settings.alarmEmail));
    }
    this.alarmAction = new cloudwatchActions.SnsAction(alarmTopic);

    // ---------------------------------------------------------------
    // Service alarms
    // ---------------------------------------------------------------
    const serviceDimensions = {
      ClusterName: compute.cluster.clusterName,
      ServiceName: compute.service.serviceName,
    };
    const runningTasks = new cloudwatch.Metric({
      namespace: 'ECS/ContainerInsights',
      metricName: 'RunningTaskCount',
      dimensionsMap: serviceDimensions,
      statistic: cloudwatch.Stats.AVERAGE,
      period: cdk.Duration.minutes(5),
    });
    const desiredTasks = new cloudwatch.Metric({
      namespace: 'ECS/ContainerInsights',
      metricName: 'DesiredTaskCount',
      dimensionsMap: serviceDimensions,
      statistic: cloudwatch.Stats.AVERAGE,
      period: cdk.Duration.minutes(5),
    });

    this.alarm('CpuAlarm', {
      alarmName: `${this.stackPrefix}-cpu-high`,
      alarmDescription: 'n8n service CPU utilization is high',
      metric: compute.service.metricCpuUtilization({ period: cdk.Duration.minutes(5) }),
      threshold: 80,
      evaluationPeriods: 3,
      datapointsToAlarm: 2,
      comparisonOperator: cloudwatch.ComparisonOperator.GREATER_THAN_THRESHOLD,
      treatMissingData: cloudwatch.TreatMissingData.NOT_BREACHING,
    });
    this.alarm('MemoryAlarm', {
      alarmName: `${this.stackPrefix}-memory-high`,
      alarmDescription: 'n8n service memory utilization is high',
      metric: compute.service.metricMemoryUtilization({ period: cdk.Duration.minutes(5) }),
      threshold: 85,
      evaluationPeriods: 3,
      datapointsToAlarm: 2,
      comparisonOperator: cloudwatch.ComparisonOperator.GREATER_THAN_THRESHOLD,
      treatMissingData: cloudwatch.TreatMissingData.NOT_BREACHING,
    });
    this.alarm('TaskCountAlarm', {
      alarmName: `${this.stackPrefix}-no-running-tasks`,
      alarmDescription: 'No n8n tasks are running',
      metric: runningTasks,
      threshold: 1,
      evaluationPeriods: 2,
      comparisonOperator: cloudwatch.ComparisonOperator.LESS_THAN_THRESHOLD,
      treatMissingData: cloudwatch.TreatMissingData.BREACHING,
    });

    // ---------------------------------------------------------------
    // Storage alarms
    // ---------------------------------------------------------------
    let efsMetrics: { burstCredits: cloudwatch.Metric; connections: cloudwatch.Metric } | undefined;
    if (storage) {
      const efsMetric = (metricName: string, statistic: string) =>
        new cloudwatch.Metric({
          namespace: 'AWS/EFS',
          metricName,
          dimensionsMap: { FileSystemId: storage.fileSystem.fileSystemId },
          statistic,
          period: cdk.Duration.minutes(5),
        });
      efsMetrics = {
        burstCredits: efsMetric('BurstCreditBalance', cloudwatch.Stats.MINIMUM),
        connections: efsMetric('ClientConnections', cloudwatch.Stats.SUM),
      };

      this.alarm('EfsBurstCreditAlarm', {
        alarmName: `${this.stackPrefix}-efs-burst-credits-low`,
        alarmDescription: 'EFS burst credit balance is low',
        metric: efsMetrics.burstCredits,
        threshold: 1_000_000_000_000,
        evaluationPeriods: 1,
        comparisonOperator: cloudwatch.ComparisonOperator.LESS_THAN_THRESHOLD,
        treatMissingData: cloudwatch.TreatMissingData.NOT_BREACHING,
      });
    }

    // ---------------------------------------------------------------
    // Database alarms
    // ---------------------------------------------------------------
    const databaseMetricSource = database?.instance ?? database?.cluster;
    if (databaseMetricSource) {
      this.alarm('DatabaseCpuAlarm', {
        alarmName: `${this.stackPrefix}-database-cpu-high`,
        alarmDescription: 'Database CPU utilization is high',
        metric: databaseMetricSource.metricCPUUtilization({ period: cdk.Duration.minutes(5) }),
        threshold: 80,
        evaluationPeriods: 3,
        datapointsToAlarm: 2,
        comparisonOperator: cloudwatch.ComparisonOperator.GREATER_THAN_THRESHOLD,
        treatMissingData: cloudwatch.TreatMissingData.NOT_BREACHING,
      });
      this.alarm('DatabaseConnectionsAlarm', {
        alarmName: `${this.stackPrefix}-database-connections-high`,
        alarmDescription: 'Database connection count is high',
        metric: databaseMetricSource.metricDatabaseConnections({ period: cdk.Duration.minutes(5) }),
        threshold: 50,
        evaluationPeriods: 2,
        comparisonOperator: cloudwatch.ComparisonOperator.GREATER_THAN_THRESHOLD,
        treatMissingData: cloudwatch.TreatMissingData.NOT_BREACHING,
      });
    }

    // ---------------------------------------------------------------
    // Tunnel alarms
    // ---------------------------------------------------------------
    if (tunnelEnabled) {
      this.createMetricFilters(compute.logGroup, TUNNEL_METRICS_NAMESPACE, TUNNEL_METRICS);

      this.alarm('TunnelHealthAlarm', {
        alarmName: `${this.stackPrefix}-cloudflare-tunnel-unhealthy`,
        alarmDescription: 'Cloudflare tunnel is unhealthy',
        metric: this.logMetric(TUNNEL_METRICS_NAMESPACE, 'TunnelHealthy', cloudwatch.Stats.SUM),
        threshold: 1,
        evaluationPeriods: 3,
        datapointsToAlarm: 2,
        comparisonOperator: cloudwatch.ComparisonOperator.LESS_THAN_THRESHOLD,
        treatMissingData: cloudwatch.TreatMissingData.BREACHING,
      });
      this.alarm('TunnelErrorAlarm', {
        alarmName: `${this.stackPrefix}-cloudflare-tunnel-errors-high`,
        alarmDescription: 'High Cloudflare tunnel error rate',
        metric: this.logMetric(TUNNEL_METRICS_NAMESPACE, 'TunnelConnectionErrors', cloudwatch.Stats.SUM),
        threshold: 10,
        evaluationPeriods: 2,
        comparisonOperator: cloudwatch.ComparisonOperator.GREATER_THAN_THRESHOLD,
        treatMissingData: cloudwatch.TreatMissingData.NOT_BREACHING,
      });
    }

    // ---------------------------------------------------------------
    // Business metrics
    // ---------------------------------------------------------------
    this.createMetricFilters(compute.logGroup, namespace, BUSINESS_METRICS);

    const successes = this.logMetric(namespace, 'WorkflowExecutionSuccess', cloudwatch.Stats.SUM);
    const failures = this.logMetric(namespace, 'WorkflowExecutionFailure', cloudwatch.Stats.SUM);
    const failureRate = new cloudwatch.MathExpression({
      expression: '(failures / (successes + failures)) * 100',
      usingMetrics: { failures, successes },
      label: 'Workflow Failure Rate %',
      period: cdk.Duration.minutes(5),
    });

    this.alarm('WorkflowFailureRateAlarm', {
      alarmName: `${this.stackPrefix}-workflow-failure-rate-high`,
      alarmDescription: 'High workflow failure rate detected',
      metric: failureRate,
      threshold: 10,
      evaluationPeriods: 3,
      datapointsToAlarm: 2,
      comparisonOperator: cloudwatch.ComparisonOperator.GREATER_THAN_THRESHOLD,
      treatMissingData: cloudwatch.TreatMissingData.NOT_BREACHING,
    });
    this.alarm('WebhookResponseTimeAlarm', {
      alarmName: `${this.stackPrefix}-webhook-response-time-high`,
      alarmDescription: 'Webhook response time is too high',
      metric: this.logMetric(namespace, 'WebhookResponseTime', cloudwatch.Stats.AVERAGE),
      threshold: 1000,
      evaluationPeriods: 3,
      datapointsToAlarm: 2,
      comparisonOperator: cloudwatch.ComparisonOperator.GREATER_THAN_THRESHOLD,
      treatMissingData: cloudwatch.TreatMissingData.NOT_BREACHING,
    });
    if (database) {
      this.alarm('DatabaseErrorRateAlarm', {
        alarmName: `${this.stackPrefix}-database-error-rate-high`,
        alarmDescription: 'High database error rate detected',
        metric: this.logMetric(namespace, 'DatabaseConnectionErrors', cloudwatch.Stats.SUM),
        threshold: 5,
        evaluationPeriods: 2,
        comparisonOperator: cloudwatch.ComparisonOperator.GREATER_THAN_THRESHOLD,
        treatMissingData: cloudwatch.TreatMissingData.NOT_BREACHING,
      });
    }

    // ---------------------------------------------------------------
    // Dashboard
    // ---------------------------------------------------------------
    const dashboardName = this.resourceName('dashboard');
    const dashboard = new cloudwatch.Dashboard(this, 'Dashboard', {
      dashboardName,
      defaultInterval: cdk.Duration.hours(3),
    });

    dashboard.addWidgets(
      new cloudwatch.GraphWidget({
        title: 'n8n Service Metrics',
        left: [compute.service.metricCpuUtilization(), compute.service.metricMemoryUtilization()],
        width: 12,
      }),
      new cloudwatch.GraphWidget({
        title: 'Task Count',
        left: [runningTasks, desiredTasks],
        width: 12,
      }),
    );
    dashboard.addWidgets(
      new cloudwatch.LogQueryWidget({
        title: 'Recent Errors',
        logGroupNames: [compute.logGroup.logGroupName],
        queryLines: [
          'fields @timestamp, @logStream, @message',
          'filter @message like /(?i)error/',
          'sort @timestamp desc',
          'limit 20',
        ],
        width: 24,
      }),
    );
    if (efsMetrics) {
      dashboard.addWidgets(
        new cloudwatch.GraphWidget({
          title: 'EFS Metrics',
          left: [efsMetrics.connections],
          right: [efsMetrics.burstCredits],
          width: 24,
        }),
      );
    }
    if (access) {
      dashboard.addWidgets(
        new cloudwatch.GraphWidget({
          title: 'API Gateway',
          left: [access.api.metricCount()],
          right: [access.api.metricServerError(), access.api.metricClientError()],
          width: 24,
        }),
      );
    }
    if (tunnelEnabled) {
      dashboard.addWidgets(
        new cloudwatch.GraphWidget({
          title: 'Cloudflare Tunnel Health',
          left: [this.logMetric(TUNNEL_METRICS_NAMESPACE, 'TunnelHealthy', cloudwatch.Stats.SUM)],
          right: [this.logMetric(TUNNEL_METRICS_NAMESPACE, 'TunnelConnectionErrors', cloudwatch.Stats.SUM)],
          width: 24,
        }),
      );
    }
    dashboard.addWidgets(
      new cloudwatch.GraphWidget({
        title: 'Workflow Execution Metrics',
        left: [successes, failures],
        right: [failureRate],
        width: 12,
      }),
      new cloudwatch.GraphWidget({
        title: 'Webhook Metrics',
        left: [this.logMetric(namespace, 'WebhookRequests', cloudwatch.Stats.SUM)],
        right: [this.logMetric(namespace, 'WebhookResponseTime', cloudwatch.Stats.AVERAGE)],
        width: 12,
      }),
    );
    dashboard.addWidgets(
      new cloudwatch.GraphWidget({
        title: 'Performance Metrics',
        left: [
          this.logMetric(namespace, 'NodeExecutionTime', cloudwatch.Stats.AVERAGE),
          this.logMetric(namespace, 'WorkflowExecutionDuration', cloudwatch.Stats.AVERAGE),
        ],
        right: [this.logMetric(namespace, 'WorkflowQueueDepth', cloudwatch.Stats.MAXIMUM)],
        width: 12,
      }),
      new cloudwatch.SingleValueWidget({
        title: 'Last 24 Hours',
        metrics: [
          this.logMetric(namespace, 'WorkflowExecutionSuccess', cloudwatch.Stats.SUM, cdk.Duration.days(1)),
          this.logMetric(namespace, 'WorkflowExecutionFailure', cloudwatch.Stats.SUM, cdk.Duration.days(1)),
          this.logMetric(namespace, 'AuthenticationErrors', cloudwatch.Stats.SUM, cdk.Duration.days(1)),
        ],
        width: 12,
      }),
    );

    // ---------------------------------------------------------------
    // Stack outputs
    // ---------------------------------------------------------------
    this.outputs = Object.freeze({
      alarmTopic,
      dashboard,
      alarms: Object.freeze([...this.alarms]),
    });

    this.addOutput('AlarmTopicArn', alarmTopic.topicArn, 'SNS topic for n8n alarms');
    this.addOutput(
      'DashboardUrl',
      `https://${this.region}.console.aws.amazon.com/cloudwatch/home?region=${this.region}#dashboards:name=${dashboardName}`,
      'CloudWatch dashboard URL',
    );
  }

  private alarm(id: string, props: cloudwatch.AlarmProps): cloudwatch.Alarm {
    const alarm = new cloudwatch.Alarm(this, id, props);
    alarm.addAlarmAction(this.alarmAction);
    this.alarms.push(alarm);
    return alarm;
  }

  private createMetricFilters(
    logGroup: logs.ILogGroup,
    metricNamespace: string,
    definitions: readonly LogMetricDefinition[],
  ): void {
    for (const definition of definitions) {
      new logs.MetricFilter(this, definition.id, {
        logGroup,
        metricNamespace,
        metricName: definition.metricName,
        filterPattern: logs.FilterPattern.literal(definition.filterPattern),
        metricValue: definition.metricValue,
        defaultValue: 0,
        unit: definition.unit,
      });
    }
  }

  private logMetric(
    namespace: string,
    metricName: string,
    statistic: string,
    period: cdk.Duration = cdk.Duration.minutes(5),
  ): cloudwatch.Metric {
    return new cloudwatch.Metric({ namespace, metricName, statistic, period });
  }
}
