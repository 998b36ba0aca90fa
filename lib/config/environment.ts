import { AccessType, Settings, SharedResourceCategory } from './schema.js';

export type EnvironmentClass = 'development' | 'staging' | 'production';

export type DeepReadonly<T> = T extends (infer U)[]
  ? ReadonlyArray<DeepReadonly<U>>
  : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T;

/**
 * Read-only view of resources provisioned outside this topology
 * (a shared certificate, a hosted zone, ...), keyed by category and name.
 */
export class SharedResourceRegistry {
  private readonly entries: Readonly<
    Partial<Record<SharedResourceCategory, Readonly<Record<string, string>>>>
  >;

  constructor(
    entries: Partial<Record<SharedResourceCategory, Record<string, string>>> = {},
  ) {
    const frozen: Partial<Record<SharedResourceCategory, Readonly<Record<string, string>>>> = {};
    for (const [category, resources] of Object.entries(entries)) {
      if (isCategory(category) && resources) {
        frozen[category] = Object.freeze({ ...resources });
      }
    }
    this.entries = Object.freeze(frozen);
  }

  lookup(category: SharedResourceCategory, name: string): string | undefined {
    const resources = this.entries[category];
    if (!resources || !Object.prototype.hasOwnProperty.call(resources, name)) {
      return undefined;
    }
    return resources[name];
  }
}

function isCategory(value: string): value is SharedResourceCategory {
  return value === 'security' || value === 'networking' || value === 'storage';
}

/**
 * Resolved, defaults-merged configuration for one named environment.
 * Created once per synthesis and never written to by any stack.
 */
export interface EnvironmentSettings {
  readonly name: string;
  readonly environmentClass: EnvironmentClass;

  // AWS account & region
  readonly account: string;
  readonly region: string;

  // Naming
  readonly project: string;
  readonly organization: string;

  readonly settings: DeepReadonly<Settings>;

  // Tags
  readonly globalTags: Readonly<Record<string, string>>;
  readonly environmentTags: Readonly<Record<string, string>>;

  readonly sharedResources: SharedResourceRegistry;
}

export function environmentClassOf(name: string): EnvironmentClass {
  switch (name.toLowerCase()) {
    case 'production':
    case 'prod':
      return 'production';
    case 'staging':
      return 'staging';
    default:
      return 'development';
  }
}

export function isProduction(environment: EnvironmentSettings): boolean {
  return environment.environmentClass === 'production';
}

export function isDevelopment(environment: EnvironmentSettings): boolean {
  return environment.environmentClass === 'development';
}

/** Ingress mode; the managed gateway unless an access block says otherwise. */
export function accessTypeOf(environment: EnvironmentSettings): AccessType {
  return environment.settings.access?.type ?? 'api_gateway';
}

/** A database stack exists only for a PostgreSQL database block. */
export function isDatabaseRequested(environment: EnvironmentSettings): boolean {
  return environment.settings.database?.type === 'postgres';
}
