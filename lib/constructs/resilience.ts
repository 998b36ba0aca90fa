import { Duration, RemovalPolicy } from 'aws-cdk-lib';
import * as cloudwatch from 'aws-cdk-lib/aws-cloudwatch';
import * as cloudwatchActions from 'aws-cdk-lib/aws-cloudwatch-actions';
import * as iam from 'aws-cdk-lib/aws-iam';
import * as lambda from 'aws-cdk-lib/aws-lambda';
import * as logs from 'aws-cdk-lib/aws-logs';
import * as sns from 'aws-cdk-lib/aws-sns';
import * as sqs from 'aws-cdk-lib/aws-sqs';
import { Construct } from 'constructs';

export type DeadLetterQueueName = 'webhook' | 'workflow';

export interface ResilienceProps {
  /** `{project}-{env}`, used to name the queues, topic and function. */
  namePrefix: string;
  logRetention: logs.RetentionDays;
  removalPolicy: RemovalPolicy;
}

// Reports breaker state for a named dependency from the failure count the
// caller passes in.
const CIRCUIT_BREAKER_HANDLER = `
exports.handler = async (event) => {
  const failures = Number(event.failures || 0);
  const threshold = Number(process.env.FAILURE_THRESHOLD || 5);
  const state = failures >= threshold ? 'OPEN' : 'CLOSED';
  console.log(JSON.stringify({ service: event.service, failures, state }));
  return { service: event.service, state, retryAfterSeconds: state === 'OPEN' ? Number(process.env.RESET_TIMEOUT_SECONDS || 60) : 0 };
};
`;

/**
 * Failure-handling resources for the n8n service: an alert topic, dead-letter
 * queues for webhook and workflow payloads, and a circuit-breaker function.
 */
export class Resilience extends Construct {
  public readonly alertTopic: sns.Topic;
  public readonly deadLetterQueues: Readonly<Record<DeadLetterQueueName, sqs.Queue>>;
  public readonly circuitBreaker: lambda.Function;

  constructor(scope: Construct, id: string, props: ResilienceProps) {
    super(scope, id);

    this.alertTopic = new sns.Topic(this, 'AlertTopic', {
      topicName: `${props.namePrefix}-resilience-alerts`,
      displayName: `n8n resilience alerts (${props.namePrefix})`,
    });

    // -----------------------------------------------------------------
    // Dead-letter queues
    // -----------------------------------------------------------------
    const webhook = this.createDeadLetterQueue('webhook', props.namePrefix);
    const workflow = this.createDeadLetterQueue('workflow', props.namePrefix);
    this.deadLetterQueues = Object.freeze({ webhook, workflow });

    // -----------------------------------------------------------------
    // Circuit breaker
    // -----------------------------------------------------------------
    this.circuitBreaker = new lambda.Function(this, 'CircuitBreaker', {
      functionName: `${props.namePrefix}-circuit-breaker`,
      runtime: lambda.Runtime.NODEJS_20_X,
      handler: 'index.handler',
      code: lambda.Code.fromInline(CIRCUIT_BREAKER_HANDLER),
      timeout: Duration.seconds(10),
      memorySize: 128,
      environment: {
        FAILURE_THRESHOLD: '5',
        RESET_TIMEOUT_SECONDS: '60',
      },
      logGroup: new logs.LogGroup(this, 'CircuitBreakerLogs', {
        logGroupName: `/aws/lambda/${props.namePrefix}-circuit-breaker`,
        retention: props.logRetention,
        removalPolicy: props.removalPolicy,
      }),
    });
  }

  /** Allow a task role to use every resource in this construct. */
  public grantUse(grantee: iam.IGrantable): void {
    this.deadLetterQueues.webhook.grantSendMessages(grantee);
    this.deadLetterQueues.workflow.grantSendMessages(grantee);
    this.circuitBreaker.grantInvoke(grantee);
  }

  private createDeadLetterQueue(name: DeadLetterQueueName, namePrefix: string): sqs.Queue {
    const capitalized = name.charAt(0).toUpperCase() + name.slice(1);
    const queue = new sqs.Queue(this, `${capitalized}DeadLetterQueue`, {
      queueName: `${namePrefix}-${name}-dlq`,
      retentionPeriod: Duration.days(14),
      encryption: sqs.QueueEncryption.SQS_MANAGED,
    });

    const alarm = new cloudwatch.Alarm(this, `${capitalized}DeadLetterAlarm`, {
      alarmName: `${namePrefix}-${name}-dlq-messages`,
      alarmDescription: `Messages waiting in the ${name} dead-letter queue`,
      metric: queue.metricApproximateNumberOfMessagesVisible({ period: Duration.minutes(5) }),
      threshold: 0,
      comparisonOperator: cloudwatch.ComparisonOperator.GREATER_THAN_THRESHOLD,
      evaluationPeriods: 1,
      treatMissingData: cloudwatch.TreatMissingData.NOT_BREACHING,
    });
    alarm.addAlarmAction(new cloudwatchActions.SnsAction(this.alertTopic));

    return queue;
  }
}
