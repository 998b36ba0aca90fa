#!/usr/bin/env node
import * as path from 'path';
import * as cdk from 'aws-cdk-lib';
import { accessTypeOf } from '../lib/config/environment.js';
import { loadConfigDocument, resolveEnvironment } from '../lib/config/resolver.js';
import { buildDeployment, planDeployment, provisioningOrder } from '../lib/deployment.js';
import { databaseModeOf } from '../lib/stacks/database-stack.js';

const app = new cdk.App();

function contextString(key: string): string | undefined {
  const value: unknown = app.node.tryGetContext(key);
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

// Environment: -c environment=<name>, then DEPLOY_ENVIRONMENT, then dev
const environmentName = contextString('environment') ?? process.env.DEPLOY_ENVIRONMENT ?? 'dev';
const configFile = contextString('configFile') ?? path.join(__dirname, '..', 'config', 'system.json');

const config = resolveEnvironment(loadConfigDocument(configFile), environmentName);
const plan = planDeployment(config);
const database = config.settings.database;

console.log(`Deploying n8n environment '${config.name}' (${config.environmentClass})`);
console.log(`  Account/region: ${config.account}/${config.region}`);
console.log(`  Ingress: ${accessTypeOf(config)}`);
console.log(
  `  Database: ${database && database.type === 'postgres' ? databaseModeOf(database) : 'sqlite'}`,
);
console.log(`  Stacks: ${provisioningOrder(plan).join(' -> ')}`);

buildDeployment(app, config);

app.synth();
