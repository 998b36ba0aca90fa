import * as fs from 'fs';
import { z } from 'zod';
import { ConfigurationError } from '../errors.js';
import {
  EnvironmentSettings,
  SharedResourceRegistry,
  environmentClassOf,
} from './environment.js';
import { ConfigDocument, ConfigDocumentInput, ConfigDocumentSchema, SettingsSchema } from './schema.js';

/**
 * Read and validate a JSON configuration document.
 */
export function loadConfigDocument(path: string): ConfigDocument {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(path, 'utf8'));
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(path, 'loading the configuration document', detail);
  }
  return parseDocument(raw);
}

/**
 * Merge an environment's settings over the document defaults, validate the
 * result and freeze it.
 */
export function resolveEnvironment(
  input: ConfigDocumentInput,
  name: string,
): EnvironmentSettings {
  const document = parseDocument(input);
  const environment = document.environments[name];
  if (!environment) {
    const known = Object.keys(document.environments).join(', ') || 'none';
    throw new ConfigurationError(
      `environments.${name}`,
      `deploying environment '${name}'`,
      `environment not found in configuration (defined: ${known})`,
    );
  }

  const merged = deepMerge(document.defaults, environment.settings);
  const parsed = SettingsSchema.safeParse(merged);
  if (!parsed.success) {
    throw fromZodError(parsed.error, `environments.${name}.settings`, `resolving environment '${name}'`);
  }

  return deepFreeze({
    name,
    environmentClass: environmentClassOf(name),
    account: environment.account,
    region: environment.region,
    project: document.global.projectName,
    organization: document.global.organization,
    settings: parsed.data,
    globalTags: document.global.tags,
    environmentTags: environment.tags,
    sharedResources: new SharedResourceRegistry(document.sharedResources),
  });
}

function parseDocument(raw: unknown): ConfigDocument {
  const parsed = ConfigDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    throw fromZodError(parsed.error, '', 'validating the configuration document');
  }
  return parsed.data;
}

function fromZodError(error: z.ZodError, prefix: string, mode: string): ConfigurationError {
  const [issue] = error.issues;
  const path = [prefix, ...issue.path.map(String)].filter((part) => part !== '').join('.');
  return new ConfigurationError(path || '<root>', mode, issue.message);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Recursive merge of plain objects; arrays and scalars in `override` replace
 * those in `base`.
 */
export function deepMerge(
  base: Record<string, unknown>,
  override: Record<string, unknown>,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const current = result[key];
    result[key] = isPlainObject(current) && isPlainObject(value) ? deepMerge(current, value) : value;
  }
  return result;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
