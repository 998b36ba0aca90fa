import * as cdk from 'aws-cdk-lib';
import { EnvironmentSettings } from '../lib/config/environment.js';
import { resolveEnvironment } from '../lib/config/resolver.js';
import { ConfigDocumentInput } from '../lib/config/schema.js';

export const TEST_ACCOUNT = '123456789012';
export const TEST_REGION = 'us-west-2';
export const TEST_ENV = { account: TEST_ACCOUNT, region: TEST_REGION };

/** App with availability zones pre-seeded so no lookup is attempted. */
export function testApp(): cdk.App {
  return new cdk.App({
    context: {
      [`availability-zones:account=${TEST_ACCOUNT}:region=${TEST_REGION}`]: [
        'us-west-2a',
        'us-west-2b',
        'us-west-2c',
      ],
      [`availability-zones:account=${TEST_ACCOUNT}:region=us-east-1`]: [
        'us-east-1a',
        'us-east-1b',
        'us-east-1c',
      ],
    },
  });
}

export function testDocument(
  name: string,
  settings: Record<string, unknown> = {},
  sharedResources?: ConfigDocumentInput['sharedResources'],
  region = TEST_REGION,
): ConfigDocumentInput {
  return {
    global: {
      projectName: 'n8n',
      organization: 'test-org',
      tags: { Project: 'n8n', Team: 'ops-{{ environment }}' },
    },
    defaults: {
      fargate: { cpu: 256, memory: 512 },
    },
    environments: {
      [name]: {
        account: TEST_ACCOUNT,
        region,
        settings,
        tags: { Owner: 'tests' },
      },
    },
    sharedResources,
  };
}

/** Resolved settings for a single-environment document. */
export function testConfig(
  name: string,
  settings: Record<string, unknown> = {},
  sharedResources?: ConfigDocumentInput['sharedResources'],
  region?: string,
): EnvironmentSettings {
  return resolveEnvironment(testDocument(name, settings, sharedResources, region), name);
}
