import {
  exportNameFor,
  resolveTags,
  resourceName,
  shouldExportOutput,
  stackNameFor,
} from '../../lib/stacks/conventions.js';

describe('resolveTags', () => {
  const base = {
    globalTags: { Project: 'n8n', Team: 'ops-{{ environment }}', Owner: 'global' },
    environmentTags: { Owner: 'env-owner', Environment: 'overridden' },
    environmentName: 'staging',
    stackName: 'n8n-staging-network',
    projectName: 'n8n',
    organization: 'test-org',
  };

  test('expands the environment placeholder in global tags', () => {
    expect(resolveTags(base).Team).toBe('ops-staging');
  });

  test('environment tags override global tags', () => {
    expect(resolveTags(base).Owner).toBe('env-owner');
  });

  test('standard tags override everything', () => {
    expect(resolveTags(base)).toEqual({
      Project: 'n8n',
      Team: 'ops-staging',
      Owner: 'env-owner',
      Environment: 'staging',
      Stack: 'n8n-staging-network',
      ProjectName: 'n8n',
      Organization: 'test-org',
    });
  });

  test('placeholder tolerates missing whitespace', () => {
    const tags = resolveTags({ ...base, globalTags: { Name: '{{environment}}-app' } });
    expect(tags.Name).toBe('staging-app');
  });
});

describe('output exports', () => {
  test.each([
    'VpcId',
    'SubnetIds',
    'N8nSecurityGroupId',
    'DatabaseSecurityGroupId',
    'ClusterArn',
    'ServiceArn',
    'ApiUrl',
    'DatabaseEndpoint',
    'FileSystemId',
  ])('%s is exported', (name) => {
    expect(shouldExportOutput(name)).toBe(true);
    expect(exportNameFor('n8n-dev-network', name)).toBe(`n8n-dev-network-${name}`);
  });

  test.each(['ClusterName', 'LogGroupName', 'AccessPointId', 'DashboardUrl', 'DistributionUrl'])(
    '%s stays stack-local',
    (name) => {
      expect(shouldExportOutput(name)).toBe(false);
      expect(exportNameFor('n8n-dev-compute', name)).toBeUndefined();
    },
  );
});

describe('naming', () => {
  test('resource names', () => {
    expect(resourceName('n8n', 'dev', 'efs')).toBe('n8n-dev-efs');
    expect(resourceName('n8n', 'dev', 'sg', 'database')).toBe('n8n-dev-sg-database');
  });

  test('stack names', () => {
    expect(stackNameFor('n8n', 'production', 'network')).toBe('n8n-production-network');
  });
});
