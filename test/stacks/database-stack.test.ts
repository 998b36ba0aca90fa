import * as cdk from 'aws-cdk-lib';
import { Template } from 'aws-cdk-lib/assertions';
import { NetworkStack } from '../../lib/stacks/network-stack.js';
import {
  DatabaseStack,
  databaseModeOf,
  parseInstanceType,
} from '../../lib/stacks/database-stack.js';
import { ConfigurationError } from '../../lib/errors.js';
import { testApp, testConfig } from '../helpers.js';

const SECRET_ARN = 'arn:aws:secretsmanager:us-west-2:123456789012:secret:n8n/external-db-AbCdEf';

function synthDatabase(name: string, database: Record<string, unknown>) {
  const app = testApp();
  const config = testConfig(name, {
    networking: { availabilityZones: ['us-west-2a', 'us-west-2b'] },
    database,
  });
  const network = new NetworkStack(app, `n8n-${name}-network`, { config });
  const stack = new DatabaseStack(app, `n8n-${name}-database`, {
    config,
    network: network.outputs,
  });
  return { app, stack, template: Template.fromStack(stack) };
}

describe('parseInstanceType', () => {
  test.each([
    ['db.t4g.medium', 't4g.medium'],
    ['db.r6g.large', 'r6g.large'],
    ['DB.T3.SMALL', 't3.small'],
  ])('%s parses to %s', (specifier, expected) => {
    expect(parseInstanceType(specifier).toString()).toBe(expected);
  });

  test.each([undefined, '', 'r6g.large', 'db.t4g', 'db.nope.large', 'db.t4g.enormous'])(
    '%s falls back to t4g.micro',
    (specifier) => {
      expect(parseInstanceType(specifier).toString()).toBe('t4g.micro');
    },
  );
});

describe('databaseModeOf', () => {
  test('import wins over every other setting', () => {
    expect(
      databaseModeOf({
        type: 'postgres',
        useExisting: true,
        multiAz: false,
        backupRetentionDays: 7,
        auroraServerless: { minCapacity: 0.5, maxCapacity: 1 },
      }),
    ).toBe('import');
  });

  test('serverless when capacity bounds are configured', () => {
    expect(
      databaseModeOf({
        type: 'postgres',
        useExisting: false,
        multiAz: false,
        backupRetentionDays: 7,
        auroraServerless: { minCapacity: 0.5, maxCapacity: 1 },
      }),
    ).toBe('serverless');
  });

  test('fixed instance otherwise', () => {
    expect(
      databaseModeOf({ type: 'postgres', useExisting: false, multiAz: false, backupRetentionDays: 7 }),
    ).toBe('instance');
  });
});

describe('DatabaseStack', () => {
  describe('import mode', () => {
    test('fails before creating any resource when the secret is missing', () => {
      const app = testApp();
      const config = testConfig('dev', { database: { useExisting: true } });
      const network = new NetworkStack(app, 'n8n-dev-network', { config });

      expect(
        () => new DatabaseStack(app, 'n8n-dev-database', { config, network: network.outputs }),
      ).toThrow(
        new ConfigurationError('database.connectionSecretArn', 'database.useExisting=true'),
      );

      const partial = app.node.tryFindChild('n8n-dev-database');
      const resources = partial
        ? partial.node.findAll().filter((construct) => construct instanceof cdk.CfnResource)
        : [];
      expect(resources).toEqual([]);
    });

    test('defers the endpoint to runtime when none is configured', () => {
      const { stack, template } = synthDatabase('dev', {
        useExisting: true,
        connectionSecretArn: SECRET_ARN,
      });

      expect(stack.outputs.mode).toBe('import');
      expect(stack.outputs.endpoint).toBeUndefined();
      template.resourceCountIs('AWS::RDS::DBInstance', 0);
      template.resourceCountIs('AWS::RDS::DBCluster', 0);
      template.resourceCountIs('AWS::SecretsManager::Secret', 0);
      expect(template.findOutputs('DatabaseEndpoint')).toEqual({});
      template.hasOutput('DatabaseSecretArn', { Value: SECRET_ARN });
    });

    test('publishes a configured endpoint', () => {
      const { stack, template } = synthDatabase('dev', {
        useExisting: true,
        connectionSecretArn: SECRET_ARN,
        endpoint: 'db.internal.example.com:5432',
      });

      expect(stack.outputs.endpoint).toEqual({
        hostname: 'db.internal.example.com',
        port: '5432',
        socketAddress: 'db.internal.example.com:5432',
      });
      template.hasOutput('DatabaseEndpoint', {
        Value: 'db.internal.example.com:5432',
        Export: { Name: 'n8n-dev-database-DatabaseEndpoint' },
      });
    });
  });

  describe('serverless mode', () => {
    let template: Template;

    beforeAll(() => {
      template = synthDatabase('dev', {
        auroraServerless: { minCapacity: 0.5, maxCapacity: 2 },
      }).template;
    });

    test('creates an Aurora PostgreSQL cluster with capacity bounds', () => {
      template.hasResourceProperties('AWS::RDS::DBCluster', {
        Engine: 'aurora-postgresql',
        StorageEncrypted: true,
        EnableCloudwatchLogsExports: ['postgresql'],
        BackupRetentionPeriod: 7,
        ServerlessV2ScalingConfiguration: { MinCapacity: 0.5, MaxCapacity: 2 },
        DeletionProtection: false,
      });
    });

    test('creates a serverless writer', () => {
      template.hasResourceProperties('AWS::RDS::DBInstance', {
        DBInstanceClass: 'db.serverless',
      });
    });

    test('generates credentials', () => {
      template.hasResourceProperties('AWS::SecretsManager::Secret', {
        Name: 'n8n/dev/db-credentials',
        GenerateSecretString: {
          SecretStringTemplate: '{"username":"n8nadmin"}',
          GenerateStringKey: 'password',
          PasswordLength: 30,
        },
      });
    });

    test('publishes the cluster endpoint', () => {
      template.hasOutput('DatabaseEndpoint', {
        Export: { Name: 'n8n-dev-database-DatabaseEndpoint' },
      });
    });
  });

  describe('instance mode', () => {
    let template: Template;

    beforeAll(() => {
      template = synthDatabase('production', {
        instanceClass: 'db.t4g.medium',
        multiAz: true,
        backupRetentionDays: 14,
      }).template;
    });

    test('creates a PostgreSQL instance sized from the specifier', () => {
      template.hasResourceProperties('AWS::RDS::DBInstance', {
        Engine: 'postgres',
        DBInstanceClass: 'db.t4g.medium',
        MultiAZ: true,
        StorageType: 'gp3',
        StorageEncrypted: true,
        BackupRetentionPeriod: 14,
        PubliclyAccessible: false,
      });
    });

    test('production enables protections', () => {
      template.hasResourceProperties('AWS::RDS::DBInstance', {
        DeletionProtection: true,
        EnablePerformanceInsights: true,
      });
      template.hasResource('AWS::RDS::DBInstance', { DeletionPolicy: 'Retain' });
    });

    test('only the application security group may connect', () => {
      template.hasResourceProperties('AWS::EC2::SecurityGroupIngress', {
        IpProtocol: 'tcp',
        FromPort: 5432,
        ToPort: 5432,
      });
      template.resourceCountIs('AWS::EC2::SecurityGroupIngress', 1);
    });

    test('exports the database security group', () => {
      template.hasOutput('DatabaseSecurityGroupId', {
        Export: { Name: 'n8n-production-database-DatabaseSecurityGroupId' },
      });
    });
  });
});
