import * as cdk from 'aws-cdk-lib';
import * as ec2 from 'aws-cdk-lib/aws-ec2';
import * as servicediscovery from 'aws-cdk-lib/aws-servicediscovery';
import { Construct } from 'constructs';
import { ConfigurationError } from '../errors.js';
import { DeploymentStack, DeploymentStackProps } from './base-stack.js';

export type NetworkStackProps = DeploymentStackProps;

export interface NetworkStackOutputs {
  vpc: ec2.IVpc;
  /** Subnets workloads are placed in, in selection order. */
  subnets: ec2.ISubnet[];
  /** True when `subnets` are public and tasks need a public IP for egress. */
  publicPlacement: boolean;
  securityGroups: {
    app: ec2.ISecurityGroup;
    efs: ec2.ISecurityGroup;
  };
  namespace: servicediscovery.IPrivateDnsNamespace;
}

export const N8N_PORT = 5678;
export const NFS_PORT = 2049;

export class NetworkStack extends DeploymentStack {
  public readonly outputs: Readonly<NetworkStackOutputs>;

  constructor(scope: Construct, id: string, props: NetworkStackProps) {
    super(scope, id, props);

    const networking = this.config.settings.networking;

    // ---------------------------------------------------------------
    // VPC (created or imported)
    // ---------------------------------------------------------------
    let vpc: ec2.IVpc;
    let subnets: ec2.ISubnet[];
    let publicPlacement: boolean;

    if (networking.useExistingVpc) {
      if (!networking.vpcId) {
        throw new ConfigurationError('networking.vpcId', 'networking.useExistingVpc=true');
      }
      vpc = ec2.Vpc.fromLookup(this, 'ImportedVpc', { vpcId: networking.vpcId });

      if (networking.subnetIds && networking.subnetIds.length > 0) {
        subnets = networking.subnetIds.map((subnetId, idx) =>
          ec2.Subnet.fromSubnetId(this, `ImportedSubnet${idx}`, subnetId),
        );
        publicPlacement = false;
      } else if (vpc.publicSubnets.length > 0) {
        subnets = vpc.publicSubnets;
        publicPlacement = true;
      } else {
        subnets = vpc.privateSubnets;
        publicPlacement = false;
      }
    } else {
      const withNat = networking.natGateways > 0;

      // NAT gateways buy a private tier; without them everything is public.
      const subnetConfiguration: ec2.SubnetConfiguration[] = [
        { cidrMask: 24, name: 'Public', subnetType: ec2.SubnetType.PUBLIC },
      ];
      if (withNat) {
        subnetConfiguration.push({
          cidrMask: 24,
          name: 'Private',
          subnetType: ec2.SubnetType.PRIVATE_WITH_EGRESS,
        });
      }

      const created = new ec2.Vpc(this, 'Vpc', {
        vpcName: this.resourceName('vpc'),
        ipAddresses: ec2.IpAddresses.cidr(networking.vpcCidr),
        ...(networking.availabilityZones && networking.availabilityZones.length > 0
          ? { availabilityZones: [...networking.availabilityZones] }
          : { maxAzs: this.defaultAzCount() }),
        natGateways: networking.natGateways,
        subnetConfiguration,
        enableDnsSupport: true,
        enableDnsHostnames: true,
      });

      if (this.isProduction) {
        created.addFlowLog('FlowLog', {
          destination: ec2.FlowLogDestination.toCloudWatchLogs(),
          trafficType: ec2.FlowLogTrafficType.REJECT,
        });
      }

      vpc = created;
      publicPlacement = created.privateSubnets.length === 0;
      subnets = publicPlacement ? created.publicSubnets : created.privateSubnets;
    }

    // ---------------------------------------------------------------
    // Security Groups
    // ---------------------------------------------------------------
    const sgApp = new ec2.SecurityGroup(this, 'N8nSecurityGroup', {
      vpc,
      securityGroupName: this.resourceName('sg', 'n8n'),
      description: 'Security group for n8n Fargate tasks',
      allowAllOutbound: true,
    });
    // Ingress from the gateway tier is added by the access stack
    sgApp.addIngressRule(sgApp, ec2.Port.allTcp(), 'Allow communication between n8n containers');

    const sgEfs = new ec2.SecurityGroup(this, 'EfsSecurityGroup', {
      vpc,
      securityGroupName: this.resourceName('sg', 'efs'),
      description: 'Security group for EFS mount targets',
      allowAllOutbound: false,
    });
    sgEfs.addIngressRule(sgApp, ec2.Port.tcp(NFS_PORT), 'Allow NFS traffic from n8n containers');

    // ---------------------------------------------------------------
    // Cloud Map (Service Discovery)
    // ---------------------------------------------------------------
    const namespace = new servicediscovery.PrivateDnsNamespace(this, 'Namespace', {
      name: `${this.stackPrefix}.local`,
      vpc,
    });

    // ---------------------------------------------------------------
    // Stack outputs
    // ---------------------------------------------------------------
    this.outputs = Object.freeze({
      vpc,
      subnets,
      publicPlacement,
      securityGroups: Object.freeze({ app: sgApp, efs: sgEfs }),
      namespace,
    });

    this.addOutput('VpcId', vpc.vpcId, 'VPC ID for n8n deployment');
    this.addOutput(
      'SubnetIds',
      cdk.Fn.join(',', subnets.map((subnet) => subnet.subnetId)),
      'Subnet IDs for n8n deployment',
    );
    this.addOutput('N8nSecurityGroupId', sgApp.securityGroupId, 'Security group ID for n8n tasks');
    this.addOutput('EfsSecurityGroupId', sgEfs.securityGroupId, 'Security group ID for EFS');

    if (!networking.useExistingVpc) {
      const azs = Array.from(new Set(subnets.map((subnet) => subnet.availabilityZone)));
      this.addOutput('AvailabilityZones', cdk.Fn.join(',', azs), 'Availability zones used');
    }
  }

  private defaultAzCount(): number {
    switch (this.config.environmentClass) {
      case 'production':
        return 3;
      case 'staging':
        return 2;
      default:
        return 1;
    }
  }
}
