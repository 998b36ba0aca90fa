import * as cdk from 'aws-cdk-lib';
import { Construct } from 'constructs';
import {
  EnvironmentSettings,
  isDevelopment,
  isProduction,
} from '../config/environment.js';
import { SharedResourceCategory } from '../config/schema.js';
import { exportNameFor, resolveTags, resourceName } from './conventions.js';

export interface DeploymentStackProps extends cdk.StackProps {
  config: EnvironmentSettings;
}

/**
 * Common behaviour for every stack in the topology: tagging, naming,
 * output publication and soft-degrade reporting.
 */
export abstract class DeploymentStack extends cdk.Stack {
  public readonly config: EnvironmentSettings;
  public readonly removalPolicy: cdk.RemovalPolicy;

  protected constructor(scope: Construct, id: string, props: DeploymentStackProps) {
    const { config } = props;
    super(scope, id, {
      description: `n8n Serverless - ${id} - ${config.name}`,
      terminationProtection: isProduction(config),
      env: { account: config.account, region: config.region },
      ...props,
    });

    this.config = config;
    this.removalPolicy = isDevelopment(config)
      ? cdk.RemovalPolicy.DESTROY
      : cdk.RemovalPolicy.RETAIN;

    // Apply tags to all resources in this stack
    const tags = resolveTags({
      globalTags: config.globalTags,
      environmentTags: config.environmentTags,
      environmentName: config.name,
      stackName: this.stackName,
      projectName: config.project,
      organization: config.organization,
    });
    for (const [key, value] of Object.entries(tags)) {
      cdk.Tags.of(this).add(key, value);
    }
  }

  /** `{project}-{env}-{type}[-{name}]` */
  public resourceName(resourceType: string, name?: string): string {
    return resourceName(this.config.project, this.config.name, resourceType, name);
  }

  /** `{project}-{env}` */
  public get stackPrefix(): string {
    return `${this.config.project}-${this.config.name}`;
  }

  public get isProduction(): boolean {
    return isProduction(this.config);
  }

  public get isDevelopment(): boolean {
    return isDevelopment(this.config);
  }

  public sharedResource(category: SharedResourceCategory, name: string): string | undefined {
    return this.config.sharedResources.lookup(category, name);
  }

  /**
   * Publish a stack output. Well-known identity/endpoint names are exported
   * as `{stackName}-{name}`; everything else stays stack-local.
   */
  protected addOutput(name: string, value: string, description?: string): cdk.CfnOutput {
    return new cdk.CfnOutput(this, name, {
      value,
      description: description ?? `${name} for ${this.stackName}`,
      exportName: exportNameFor(this.stackName, name),
    });
  }

  /**
   * Record that an optional integration was left out because something it
   * needs is not available. Reported as info so it never fails a synth.
   */
  protected reportSoftDegrade(feature: string, missing: string): void {
    cdk.Annotations.of(this).addInfo(
      `[soft-degrade] ${feature} skipped: no ${missing} available`,
    );
  }
}
