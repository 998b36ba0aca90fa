import * as efs from 'aws-cdk-lib/aws-efs';
import { Construct } from 'constructs';
import { DeploymentStack, DeploymentStackProps } from './base-stack.js';
import { NetworkStackOutputs } from './network-stack.js';

export interface StorageStackProps extends DeploymentStackProps {
  network: NetworkStackOutputs;
}

export interface StorageStackOutputs {
  fileSystem: efs.IFileSystem;
  accessPoint: efs.IAccessPoint;
}

const LIFECYCLE_POLICIES: Record<number, efs.LifecyclePolicy> = {
  7: efs.LifecyclePolicy.AFTER_7_DAYS,
  14: efs.LifecyclePolicy.AFTER_14_DAYS,
  30: efs.LifecyclePolicy.AFTER_30_DAYS,
  60: efs.LifecyclePolicy.AFTER_60_DAYS,
  90: efs.LifecyclePolicy.AFTER_90_DAYS,
};

export class StorageStack extends DeploymentStack {
  public readonly outputs: Readonly<StorageStackOutputs>;

  constructor(scope: Construct, id: string, props: StorageStackProps) {
    super(scope, id, props);

    const { network } = props;
    const settings = this.config.settings.efs;

    // ---------------------------------------------------------------
    // EFS
    // ---------------------------------------------------------------
    const fileSystem: efs.IFileSystem = settings.existingFileSystemId
      ? efs.FileSystem.fromFileSystemAttributes(this, 'ImportedFileSystem', {
          fileSystemId: settings.existingFileSystemId,
          securityGroup: network.securityGroups.efs,
        })
      : new efs.FileSystem(this, 'FileSystem', {
          fileSystemName: this.resourceName('efs'),
          vpc: network.vpc,
          vpcSubnets: { subnets: network.subnets },
          securityGroup: network.securityGroups.efs,
          performanceMode: efs.PerformanceMode.GENERAL_PURPOSE,
          throughputMode: efs.ThroughputMode.BURSTING,
          encrypted: true,
          lifecyclePolicy: LIFECYCLE_POLICIES[settings.lifecycleDays],
          enableAutomaticBackups: settings.backupEnabled || this.isProduction,
          removalPolicy: this.removalPolicy,
        });

    const accessPoint = new efs.AccessPoint(this, 'N8nAccessPoint', {
      fileSystem,
      path: '/n8n-data',
      posixUser: { uid: '1000', gid: '1000' },
      createAcl: { ownerUid: '1000', ownerGid: '1000', permissions: '0755' },
    });

    // ---------------------------------------------------------------
    // Stack outputs
    // ---------------------------------------------------------------
    this.outputs = Object.freeze({ fileSystem, accessPoint });

    this.addOutput('FileSystemId', fileSystem.fileSystemId, 'EFS file system ID for n8n data');
    this.addOutput('AccessPointId', accessPoint.accessPointId, 'EFS access point ID for n8n');
  }
}
