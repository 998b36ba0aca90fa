import { z } from 'zod';

// EFS lifecycle transitions the provider supports.
export const EFS_LIFECYCLE_DAYS = [7, 14, 30, 60, 90] as const;

export const FargateSettingsSchema = z.object({
  cpu: z.number().int().positive().default(256),
  memory: z.number().int().positive().default(512),
  spotPercentage: z.number().int().min(0).max(100).default(0),
  n8nVersion: z.string().min(1).default('1.94.1'),
});

export const ScalingSettingsSchema = z.object({
  minTasks: z.number().int().min(0).default(1),
  maxTasks: z.number().int().min(0).default(1),
  targetCpuUtilization: z.number().min(1).max(100).default(70),
  scaleInCooldown: z.number().int().min(0).default(300),
  scaleOutCooldown: z.number().int().min(0).default(60),
});

export const NetworkingSettingsSchema = z.object({
  useExistingVpc: z.boolean().default(false),
  vpcId: z.string().optional(),
  subnetIds: z.array(z.string()).optional(),
  vpcCidr: z.string().default('10.0.0.0/16'),
  natGateways: z.number().int().min(0).default(0),
  availabilityZones: z.array(z.string()).optional(),
});

export const EfsSettingsSchema = z.object({
  existingFileSystemId: z.string().optional(),
  lifecycleDays: z
    .number()
    .int()
    .refine((days) => EFS_LIFECYCLE_DAYS.some((supported) => supported === days), {
      message: `lifecycleDays must be one of ${EFS_LIFECYCLE_DAYS.join(', ')}`,
    })
    .default(30),
  backupEnabled: z.boolean().default(false),
});

export const DatabaseSettingsSchema = z.object({
  type: z.enum(['sqlite', 'postgres']).default('postgres'),
  useExisting: z.boolean().default(false),
  connectionSecretArn: z.string().optional(),
  /** `host:port` of an imported database, when known ahead of time. */
  endpoint: z
    .string()
    .regex(/^[^:\s]+:\d+$/, 'endpoint must look like host:port')
    .optional(),
  instanceClass: z.string().optional(),
  multiAz: z.boolean().default(false),
  backupRetentionDays: z.number().int().min(1).max(35).default(7),
  auroraServerless: z
    .object({
      minCapacity: z.number().min(0.5).default(0.5),
      maxCapacity: z.number().max(128).default(1),
    })
    .optional(),
});

export const CloudflareSettingsSchema = z.object({
  tunnelTokenSecretName: z.string().optional(),
  tunnelName: z.string().optional(),
  tunnelDomain: z.string().optional(),
});

export const AccessSettingsSchema = z.object({
  type: z.enum(['api_gateway', 'cloudflare']).default('api_gateway'),
  cloudfrontEnabled: z.boolean().default(false),
  wafEnabled: z.boolean().default(false),
  ipWhitelist: z.array(z.string()).default([]),
  domainName: z.string().optional(),
  corsOrigins: z.array(z.string()).default(['*']),
  cloudflare: CloudflareSettingsSchema.optional(),
});

export const MonitoringSettingsSchema = z.object({
  alarmEmail: z.string().email().optional(),
  logRetentionDays: z.number().int().positive().default(30),
  customMetricsNamespace: z.string().min(1).default('N8n/Serverless'),
});

export const FeatureSettingsSchema = z.object({
  resilienceEnabled: z.boolean().default(false),
});

export const SettingsSchema = z.object({
  fargate: FargateSettingsSchema.default({}),
  scaling: ScalingSettingsSchema.default({}),
  networking: NetworkingSettingsSchema.default({}),
  efs: EfsSettingsSchema.default({}),
  database: DatabaseSettingsSchema.optional(),
  access: AccessSettingsSchema.optional(),
  monitoring: MonitoringSettingsSchema.default({}),
  features: FeatureSettingsSchema.default({}),
});

const ResourceMapSchema = z.record(z.string(), z.string()).default({});

// Settings blocks stay loosely typed here; they are validated after
// defaults have been merged in.
export const ConfigDocumentSchema = z.object({
  global: z.object({
    projectName: z.string().min(1),
    organization: z.string().min(1),
    tags: z.record(z.string(), z.string()).default({}),
  }),
  defaults: z.record(z.string(), z.unknown()).default({}),
  environments: z.record(
    z.string(),
    z.object({
      account: z.string().regex(/^\d{12}$/, 'account must be a 12-digit AWS account id'),
      region: z.string().min(1),
      settings: z.record(z.string(), z.unknown()).default({}),
      tags: z.record(z.string(), z.string()).default({}),
    }),
  ),
  sharedResources: z
    .object({
      security: ResourceMapSchema,
      networking: ResourceMapSchema,
      storage: ResourceMapSchema,
    })
    .default({}),
});

export type Settings = z.infer<typeof SettingsSchema>;
export type FargateSettings = z.infer<typeof FargateSettingsSchema>;
export type ScalingSettings = z.infer<typeof ScalingSettingsSchema>;
export type NetworkingSettings = z.infer<typeof NetworkingSettingsSchema>;
export type EfsSettings = z.infer<typeof EfsSettingsSchema>;
export type DatabaseSettings = z.infer<typeof DatabaseSettingsSchema>;
export type AccessSettings = z.infer<typeof AccessSettingsSchema>;
export type CloudflareSettings = z.infer<typeof CloudflareSettingsSchema>;
export type MonitoringSettings = z.infer<typeof MonitoringSettingsSchema>;
export type FeatureSettings = z.infer<typeof FeatureSettingsSchema>;
export type AccessType = AccessSettings['type'];

/** The document as authored (defaults not yet applied). */
export type ConfigDocumentInput = z.input<typeof ConfigDocumentSchema>;
export type ConfigDocument = z.infer<typeof ConfigDocumentSchema>;
export type SharedResourceCategory = keyof ConfigDocument['sharedResources'];
