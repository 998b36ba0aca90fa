import * as cdk from 'aws-cdk-lib';
import * as ec2 from 'aws-cdk-lib/aws-ec2';
import * as logs from 'aws-cdk-lib/aws-logs';
import * as rds from 'aws-cdk-lib/aws-rds';
import * as secretsmanager from 'aws-cdk-lib/aws-secretsmanager';
import { Construct } from 'constructs';
import { DatabaseSettings } from '../config/schema.js';
import { DeepReadonly } from '../config/environment.js';
import { ConfigurationError } from '../errors.js';
import { DeploymentStack, DeploymentStackProps } from './base-stack.js';
import { NetworkStackOutputs } from './network-stack.js';

export const POSTGRES_PORT = 5432;

export type DatabaseMode = 'import' | 'serverless' | 'instance';

export interface DatabaseEndpoint {
  hostname: string;
  port: string;
  /** `host:port` */
  socketAddress: string;
}

export interface DatabaseStackProps extends DeploymentStackProps {
  network: NetworkStackOutputs;
}

export interface DatabaseStackOutputs {
  mode: DatabaseMode;
  secret: secretsmanager.ISecret;
  securityGroup: ec2.ISecurityGroup;
  /**
   * Undefined for an imported database whose address is not configured;
   * the service then reads `host`/`port` from the secret at runtime.
   */
  endpoint?: DatabaseEndpoint;
  instance?: rds.IDatabaseInstance;
  cluster?: rds.IDatabaseCluster;
}

const DEFAULT_INSTANCE_TYPE = ec2.InstanceType.of(ec2.InstanceClass.T4G, ec2.InstanceSize.MICRO);

/**
 * Parse a `db.<class>.<size>` specifier such as `db.t4g.micro`. Anything that
 * does not name a known class and size yields the smallest Graviton class.
 */
export function parseInstanceType(specifier?: string): ec2.InstanceType {
  if (!specifier) {
    return DEFAULT_INSTANCE_TYPE;
  }
  const parts = specifier.toLowerCase().split('.');
  if (parts.length !== 3 || parts[0] !== 'db') {
    return DEFAULT_INSTANCE_TYPE;
  }
  const instanceClass = Object.values(ec2.InstanceClass).find((value) => value === parts[1]);
  const instanceSize = Object.values(ec2.InstanceSize).find((value) => value === parts[2]);
  if (!instanceClass || !instanceSize) {
    return DEFAULT_INSTANCE_TYPE;
  }
  return ec2.InstanceType.of(instanceClass, instanceSize);
}

export function databaseModeOf(settings: DeepReadonly<DatabaseSettings>): DatabaseMode {
  if (settings.useExisting) {
    return 'import';
  }
  return settings.auroraServerless ? 'serverless' : 'instance';
}

export class DatabaseStack extends DeploymentStack {
  public readonly outputs: Readonly<DatabaseStackOutputs>;

  constructor(scope: Construct, id: string, props: DatabaseStackProps) {
    super(scope, id, props);

    const { network } = props;
    const settings = this.config.settings.database;
    if (!settings) {
      throw new ConfigurationError('database', 'a database stack is requested');
    }
    const mode = databaseModeOf(settings);

    // Fail before any database resource is defined
    if (mode === 'import' && !settings.connectionSecretArn) {
      throw new ConfigurationError('database.connectionSecretArn', 'database.useExisting=true');
    }

    // ---------------------------------------------------------------
    // Security Group
    // ---------------------------------------------------------------
    const sgDatabase = new ec2.SecurityGroup(this, 'DatabaseSecurityGroup', {
      vpc: network.vpc,
      securityGroupName: this.resourceName('sg', 'database'),
      description: 'Security group for n8n database',
      allowAllOutbound: false,
    });
    sgDatabase.addIngressRule(
      network.securityGroups.app,
      ec2.Port.tcp(POSTGRES_PORT),
      'Allow PostgreSQL access from n8n containers',
    );

    let outputs: DatabaseStackOutputs;
    switch (mode) {
      case 'import':
        outputs = this.importDatabase(settings, sgDatabase);
        break;
      case 'serverless':
        outputs = this.createServerlessCluster(settings, network, sgDatabase);
        break;
      case 'instance':
        outputs = this.createInstance(settings, network, sgDatabase);
        break;
    }

    // ---------------------------------------------------------------
    // Stack outputs
    // ---------------------------------------------------------------
    this.outputs = Object.freeze(outputs);

    if (outputs.endpoint) {
      this.addOutput('DatabaseEndpoint', outputs.endpoint.socketAddress, 'Database endpoint');
    }
    this.addOutput('DatabaseSecretArn', outputs.secret.secretArn, 'Database credentials secret ARN');
    this.addOutput('DatabaseSecurityGroupId', sgDatabase.securityGroupId, 'Database security group ID');
  }

  private importDatabase(
    settings: DeepReadonly<DatabaseSettings>,
    securityGroup: ec2.ISecurityGroup,
  ): DatabaseStackOutputs {
    const secret = secretsmanager.Secret.fromSecretCompleteArn(
      this,
      'ImportedDatabaseSecret',
      settings.connectionSecretArn ?? '',
    );

    let endpoint: DatabaseEndpoint | undefined;
    if (settings.endpoint) {
      const separator = settings.endpoint.lastIndexOf(':');
      endpoint = {
        hostname: settings.endpoint.slice(0, separator),
        port: settings.endpoint.slice(separator + 1),
        socketAddress: settings.endpoint,
      };
    }

    return { mode: 'import', secret, securityGroup, endpoint };
  }

  private createSecret(): secretsmanager.Secret {
    return new secretsmanager.Secret(this, 'DatabaseSecret', {
      secretName: `n8n/${this.config.name}/db-credentials`,
      description: `n8n database credentials for ${this.config.name}`,
      generateSecretString: {
        secretStringTemplate: JSON.stringify({ username: 'n8nadmin' }),
        generateStringKey: 'password',
        excludeCharacters: ' %+~`#$&*()|[]{}:;<>?!\'/@"\\',
        passwordLength: 30,
      },
    });
  }

  private createSubnetGroup(network: NetworkStackOutputs): rds.SubnetGroup {
    return new rds.SubnetGroup(this, 'SubnetGroup', {
      description: `Subnet group for n8n ${this.config.name}`,
      vpc: network.vpc,
      vpcSubnets: { subnets: network.subnets },
      removalPolicy: this.removalPolicy,
    });
  }

  private createServerlessCluster(
    settings: DeepReadonly<DatabaseSettings>,
    network: NetworkStackOutputs,
    securityGroup: ec2.ISecurityGroup,
  ): DatabaseStackOutputs {
    const secret = this.createSecret();
    const capacity = settings.auroraServerless ?? { minCapacity: 0.5, maxCapacity: 1 };

    const cluster = new rds.DatabaseCluster(this, 'AuroraCluster', {
      engine: rds.DatabaseClusterEngine.auroraPostgres({
        version: rds.AuroraPostgresEngineVersion.VER_15_4,
      }),
      credentials: rds.Credentials.fromSecret(secret),
      defaultDatabaseName: 'n8n',
      clusterIdentifier: this.resourceName('aurora'),
      serverlessV2MinCapacity: capacity.minCapacity,
      serverlessV2MaxCapacity: capacity.maxCapacity,
      writer: rds.ClusterInstance.serverlessV2('WriterInstance', {
        enablePerformanceInsights: this.isProduction,
      }),
      vpc: network.vpc,
      subnetGroup: this.createSubnetGroup(network),
      securityGroups: [securityGroup],
      backup: {
        retention: cdk.Duration.days(settings.backupRetentionDays),
        preferredWindow: '03:00-04:00',
      },
      storageEncrypted: true,
      cloudwatchLogsExports: ['postgresql'],
      cloudwatchLogsRetention: logs.RetentionDays.ONE_MONTH,
      deletionProtection: this.isProduction,
      removalPolicy: this.removalPolicy,
    });

    return {
      mode: 'serverless',
      secret,
      securityGroup,
      cluster,
      endpoint: {
        hostname: cluster.clusterEndpoint.hostname,
        port: cdk.Token.asString(cluster.clusterEndpoint.port),
        socketAddress: cluster.clusterEndpoint.socketAddress,
      },
    };
  }

  private createInstance(
    settings: DeepReadonly<DatabaseSettings>,
    network: NetworkStackOutputs,
    securityGroup: ec2.ISecurityGroup,
  ): DatabaseStackOutputs {
    const secret = this.createSecret();

    const instance = new rds.DatabaseInstance(this, 'Database', {
      engine: rds.DatabaseInstanceEngine.postgres({
        version: rds.PostgresEngineVersion.VER_16,
      }),
      instanceType: parseInstanceType(settings.instanceClass),
      credentials: rds.Credentials.fromSecret(secret),
      databaseName: 'n8n',
      instanceIdentifier: this.resourceName('rds'),
      vpc: network.vpc,
      subnetGroup: this.createSubnetGroup(network),
      securityGroups: [securityGroup],
      allocatedStorage: 20,
      storageType: rds.StorageType.GP3,
      multiAz: settings.multiAz,
      backupRetention: cdk.Duration.days(settings.backupRetentionDays),
      preferredBackupWindow: '03:00-04:00',
      preferredMaintenanceWindow: 'sun:04:00-sun:05:00',
      enablePerformanceInsights: this.isProduction,
      cloudwatchLogsExports: ['postgresql'],
      cloudwatchLogsRetention: logs.RetentionDays.ONE_MONTH,
      deletionProtection: this.isProduction,
      removalPolicy: this.removalPolicy,
      publiclyAccessible: false,
      storageEncrypted: true,
      autoMinorVersionUpgrade: false,
    });

    return {
      mode: 'instance',
      secret,
      securityGroup,
      instance,
      endpoint: {
        hostname: instance.dbInstanceEndpointAddress,
        port: instance.dbInstanceEndpointPort,
        socketAddress: `${instance.dbInstanceEndpointAddress}:${instance.dbInstanceEndpointPort}`,
      },
    };
  }
}
