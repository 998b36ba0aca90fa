// Naming, tagging and output-export rules shared by every stack.

export type StackRole = 'network' | 'storage' | 'database' | 'compute' | 'access' | 'monitoring';

/** Fixed provisioning order of the stack roles. */
export const STACK_ROLES: readonly StackRole[] = [
  'network',
  'storage',
  'database',
  'compute',
  'access',
  'monitoring',
];

/** Output names containing any of these are published as global exports. */
export const EXPORTABLE_OUTPUTS: readonly string[] = [
  'VpcId',
  'SubnetIds',
  'SecurityGroupId',
  'ClusterArn',
  'ServiceArn',
  'LoadBalancerUrl',
  'ApiUrl',
  'DatabaseEndpoint',
  'FileSystemId',
];

export function shouldExportOutput(outputName: string): boolean {
  return EXPORTABLE_OUTPUTS.some((exportable) => outputName.includes(exportable));
}

/** Globally addressable export key, or undefined for stack-local outputs. */
export function exportNameFor(stackName: string, outputName: string): string | undefined {
  return shouldExportOutput(outputName) ? `${stackName}-${outputName}` : undefined;
}

export function resourceName(
  project: string,
  environment: string,
  resourceType: string,
  name?: string,
): string {
  const parts = [project, environment, resourceType];
  if (name) {
    parts.push(name);
  }
  return parts.join('-');
}

export function stackNameFor(project: string, environment: string, role: StackRole): string {
  return `${project}-${environment}-${role}`;
}

export interface TagSources {
  globalTags: Readonly<Record<string, string>>;
  environmentTags: Readonly<Record<string, string>>;
  environmentName: string;
  stackName: string;
  projectName: string;
  organization: string;
}

const ENVIRONMENT_PLACEHOLDER = /\{\{\s*environment\s*\}\}/g;

/**
 * Tags for one stack. Later sources win: global tags (with the
 * `{{ environment }}` placeholder expanded), then environment tags, then the
 * standard tags.
 */
export function resolveTags(sources: TagSources): Record<string, string> {
  const tags: Record<string, string> = {};

  for (const [key, value] of Object.entries(sources.globalTags)) {
    tags[key] = value.replace(ENVIRONMENT_PLACEHOLDER, sources.environmentName);
  }
  for (const [key, value] of Object.entries(sources.environmentTags)) {
    tags[key] = value;
  }

  tags.Environment = sources.environmentName;
  tags.Stack = sources.stackName;
  tags.ProjectName = sources.projectName;
  tags.Organization = sources.organization;

  return tags;
}
