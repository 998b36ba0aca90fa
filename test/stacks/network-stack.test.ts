import { Match, Template } from 'aws-cdk-lib/assertions';
import { NetworkStack } from '../../lib/stacks/network-stack.js';
import { ConfigurationError } from '../../lib/errors.js';
import { testApp, testConfig } from '../helpers.js';

const TWO_ZONES = ['us-west-2a', 'us-west-2b'];

describe('NetworkStack', () => {
  describe('without NAT gateways', () => {
    let stack: NetworkStack;
    let template: Template;

    beforeAll(() => {
      const config = testConfig('dev', {
        networking: { natGateways: 0, availabilityZones: TWO_ZONES },
      });
      stack = new NetworkStack(testApp(), 'n8n-dev-network', { config });
      template = Template.fromStack(stack);
    });

    test('creates VPC with correct CIDR', () => {
      template.hasResourceProperties('AWS::EC2::VPC', {
        CidrBlock: '10.0.0.0/16',
        EnableDnsSupport: true,
        EnableDnsHostnames: true,
      });
    });

    test('creates only public subnets', () => {
      template.resourceCountIs('AWS::EC2::Subnet', 2);
      template.resourceCountIs('AWS::EC2::NatGateway', 0);
    });

    test('places workloads in public subnets', () => {
      expect(stack.outputs.publicPlacement).toBe(true);
      expect(stack.outputs.subnets).toHaveLength(2);
    });

    test('app security group allows traffic between tasks', () => {
      template.hasResourceProperties('AWS::EC2::SecurityGroupIngress', {
        IpProtocol: 'tcp',
        FromPort: 0,
        ToPort: 65535,
        Description: 'Allow communication between n8n containers',
      });
    });

    test('EFS security group only admits NFS', () => {
      template.hasResourceProperties('AWS::EC2::SecurityGroupIngress', {
        IpProtocol: 'tcp',
        FromPort: 2049,
        ToPort: 2049,
        Description: 'Allow NFS traffic from n8n containers',
      });
    });

    test('creates Cloud Map namespace', () => {
      template.hasResourceProperties('AWS::ServiceDiscovery::PrivateDnsNamespace', {
        Name: 'n8n-dev.local',
      });
    });

    test('does not enable flow logs outside production', () => {
      template.resourceCountIs('AWS::EC2::FlowLog', 0);
    });

    test('exports identity outputs', () => {
      template.hasOutput('VpcId', { Export: { Name: 'n8n-dev-network-VpcId' } });
      template.hasOutput('N8nSecurityGroupId', {
        Export: { Name: 'n8n-dev-network-N8nSecurityGroupId' },
      });
      template.hasOutput('AvailabilityZones', { Value: 'us-west-2a,us-west-2b' });
    });

    test('applies resolved tags', () => {
      template.hasResourceProperties('AWS::EC2::VPC', {
        Tags: Match.arrayWith([{ Key: 'Team', Value: 'ops-dev' }]),
      });
      template.hasResourceProperties('AWS::EC2::VPC', {
        Tags: Match.arrayWith([{ Key: 'Stack', Value: 'n8n-dev-network' }]),
      });
    });
  });

  describe('with NAT gateways', () => {
    let stack: NetworkStack;
    let template: Template;

    beforeAll(() => {
      const config = testConfig('staging', {
        networking: { natGateways: 1, availabilityZones: TWO_ZONES },
      });
      stack = new NetworkStack(testApp(), 'n8n-staging-network', { config });
      template = Template.fromStack(stack);
    });

    test('creates public and private tiers', () => {
      template.resourceCountIs('AWS::EC2::Subnet', 4);
      template.resourceCountIs('AWS::EC2::NatGateway', 1);
    });

    test('places workloads in private subnets', () => {
      expect(stack.outputs.publicPlacement).toBe(false);
      expect(stack.outputs.subnets).toHaveLength(2);
    });
  });

  describe('availability zone defaults', () => {
    test.each([
      ['dev', 1],
      ['staging', 2],
      ['production', 3],
    ])('%s uses %i zones', (name, zones) => {
      const stack = new NetworkStack(testApp(), `n8n-${name}-network`, {
        config: testConfig(name),
      });
      Template.fromStack(stack).resourceCountIs('AWS::EC2::Subnet', zones);
    });

    test('production enables REJECT flow logs', () => {
      const stack = new NetworkStack(testApp(), 'n8n-production-network', {
        config: testConfig('production'),
      });
      Template.fromStack(stack).hasResourceProperties('AWS::EC2::FlowLog', {
        TrafficType: 'REJECT',
      });
    });
  });

  describe('import mode', () => {
    test('fails without a VPC id', () => {
      const config = testConfig('dev', { networking: { useExistingVpc: true } });

      expect(() => new NetworkStack(testApp(), 'n8n-dev-network', { config })).toThrow(
        ConfigurationError,
      );
      expect(() => new NetworkStack(testApp(), 'n8n-dev-network', { config })).toThrow(
        'Invalid configuration: networking.vpcId is required when networking.useExistingVpc=true',
      );
    });

    test('uses the configured subnets', () => {
      const config = testConfig('dev', {
        networking: {
          useExistingVpc: true,
          vpcId: 'vpc-0123456789abcdef0',
          subnetIds: ['subnet-aaaa1111', 'subnet-bbbb2222'],
        },
      });
      const stack = new NetworkStack(testApp(), 'n8n-dev-network', { config });
      const template = Template.fromStack(stack);

      expect(stack.outputs.publicPlacement).toBe(false);
      template.resourceCountIs('AWS::EC2::VPC', 0);
      template.hasOutput('SubnetIds', {
        Value: 'subnet-aaaa1111,subnet-bbbb2222',
        Export: { Name: 'n8n-dev-network-SubnetIds' },
      });
      expect(template.findOutputs('AvailabilityZones')).toEqual({});
    });

    test('falls back to public subnets of the imported VPC', () => {
      const config = testConfig('dev', {
        networking: { useExistingVpc: true, vpcId: 'vpc-0123456789abcdef0' },
      });
      const stack = new NetworkStack(testApp(), 'n8n-dev-network', { config });

      expect(stack.outputs.publicPlacement).toBe(true);
      expect(stack.outputs.subnets.length).toBeGreaterThan(0);
    });
  });
});
