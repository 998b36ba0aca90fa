import * as cdk from 'aws-cdk-lib';
import {
  accessTypeOf,
  EnvironmentSettings,
  isDatabaseRequested,
} from './config/environment.js';
import { AccessStack } from './stacks/access-stack.js';
import { DeploymentStack } from './stacks/base-stack.js';
import { ComputeStack } from './stacks/compute-stack.js';
import { StackRole, STACK_ROLES, stackNameFor } from './stacks/conventions.js';
import { DatabaseStack } from './stacks/database-stack.js';
import { MonitoringStack } from './stacks/monitoring-stack.js';
import { NetworkStack } from './stacks/network-stack.js';
import { StorageStack } from './stacks/storage-stack.js';

/** `to` consumes `from`'s handle and is provisioned after it. */
export interface DependencyEdge {
  readonly from: StackRole;
  readonly to: StackRole;
  readonly reason: string;
}

export interface DeploymentPlan {
  readonly environment: string;
  readonly roles: readonly StackRole[];
  readonly edges: readonly DependencyEdge[];
}

const DEPENDENCY_EDGES: readonly DependencyEdge[] = [
  { from: 'network', to: 'storage', reason: 'file system mounts into the network' },
  { from: 'network', to: 'database', reason: 'database is placed in the network' },
  { from: 'network', to: 'compute', reason: 'service runs in the network' },
  { from: 'storage', to: 'compute', reason: 'service mounts the shared file system' },
  { from: 'database', to: 'compute', reason: 'service connects to the database' },
  { from: 'compute', to: 'access', reason: 'gateway routes to the service' },
  { from: 'compute', to: 'monitoring', reason: 'alarms observe the service' },
  { from: 'storage', to: 'monitoring', reason: 'alarms observe the file system' },
  { from: 'database', to: 'monitoring', reason: 'alarms observe the database' },
  { from: 'access', to: 'monitoring', reason: 'dashboard shows gateway traffic' },
];

/**
 * Decide which stacks an environment gets and how they depend on each
 * other. Pure: no constructs are created.
 */
export function planDeployment(config: EnvironmentSettings): DeploymentPlan {
  const roles = STACK_ROLES.filter((role) => {
    switch (role) {
      case 'database':
        return isDatabaseRequested(config);
      case 'access':
        return accessTypeOf(config) === 'api_gateway';
      default:
        return true;
    }
  });
  const edges = DEPENDENCY_EDGES.filter(
    (edge) => roles.includes(edge.from) && roles.includes(edge.to),
  );
  return { environment: config.name, roles, edges };
}

/**
 * Topological order of a plan's roles. Ties are broken by the fixed role
 * order so the result is stable.
 */
export function provisioningOrder(plan: DeploymentPlan): StackRole[] {
  const inDegree = new Map<StackRole, number>();
  for (const role of plan.roles) {
    inDegree.set(role, 0);
  }
  for (const edge of plan.edges) {
    if (!inDegree.has(edge.from) || !inDegree.has(edge.to)) {
      throw new Error(`Dependency ${edge.from} -> ${edge.to} references a stack outside the plan`);
    }
    inDegree.set(edge.to, (inDegree.get(edge.to) ?? 0) + 1);
  }

  const rank = (role: StackRole) => STACK_ROLES.indexOf(role);
  const ready = plan.roles.filter((role) => inDegree.get(role) === 0);
  const order: StackRole[] = [];

  while (ready.length > 0) {
    ready.sort((a, b) => rank(a) - rank(b));
    const next = ready.shift();
    if (next === undefined) {
      break;
    }
    order.push(next);
    for (const edge of plan.edges) {
      if (edge.from !== next) {
        continue;
      }
      const remaining = (inDegree.get(edge.to) ?? 0) - 1;
      inDegree.set(edge.to, remaining);
      if (remaining === 0) {
        ready.push(edge.to);
      }
    }
  }

  if (order.length !== plan.roles.length) {
    const stuck = plan.roles.filter((role) => !order.includes(role));
    throw new Error(`Dependency cycle between stacks: ${stuck.join(', ')}`);
  }
  return order;
}

export interface Deployment {
  readonly plan: DeploymentPlan;
  readonly network: NetworkStack;
  readonly storage: StorageStack;
  readonly database?: DatabaseStack;
  readonly compute: ComputeStack;
  readonly access?: AccessStack;
  readonly monitoring: MonitoringStack;
}

/**
 * Instantiate every planned stack for one environment, pass each handle to
 * its consumers and declare the planned dependencies explicitly.
 */
export function buildDeployment(app: cdk.App, config: EnvironmentSettings): Deployment {
  const plan = planDeployment(config);
  const order = provisioningOrder(plan);
  const id = (role: StackRole) => stackNameFor(config.project, config.name, role);

  // Stacks are constructed in dependency order; handles are only read
  // after their producer exists.
  const stacks = new Map<StackRole, DeploymentStack>();
  let network: NetworkStack | undefined;
  let storage: StorageStack | undefined;
  let database: DatabaseStack | undefined;
  let compute: ComputeStack | undefined;
  let access: AccessStack | undefined;
  let monitoring: MonitoringStack | undefined;

  const upstream = <T>(stack: T | undefined, role: StackRole): T => {
    if (stack === undefined) {
      throw new Error(`Stack ${role} is required but has not been created`);
    }
    return stack;
  };

  for (const role of order) {
    switch (role) {
      case 'network':
        network = new NetworkStack(app, id(role), { config });
        stacks.set(role, network);
        break;
      case 'storage':
        storage = new StorageStack(app, id(role), {
          config,
          network: upstream(network, 'network').outputs,
        });
        stacks.set(role, storage);
        break;
      case 'database':
        database = new DatabaseStack(app, id(role), {
          config,
          network: upstream(network, 'network').outputs,
        });
        stacks.set(role, database);
        break;
      case 'compute':
        compute = new ComputeStack(app, id(role), {
          config,
          network: upstream(network, 'network').outputs,
          storage: upstream(storage, 'storage').outputs,
          database: database?.outputs,
        });
        stacks.set(role, compute);
        break;
      case 'access':
        access = new AccessStack(app, id(role), {
          config,
          network: upstream(network, 'network').outputs,
          compute: upstream(compute, 'compute').outputs,
        });
        stacks.set(role, access);
        break;
      case 'monitoring':
        monitoring = new MonitoringStack(app, id(role), {
          config,
          compute: upstream(compute, 'compute').outputs,
          storage: storage?.outputs,
          database: database?.outputs,
          access: access?.outputs,
        });
        stacks.set(role, monitoring);
        break;
    }
  }

  // One declared dependency per planned edge
  for (const edge of plan.edges) {
    const dependent = upstream(stacks.get(edge.to), edge.to);
    dependent.addDependency(upstream(stacks.get(edge.from), edge.from), edge.reason);
  }

  return {
    plan,
    network: upstream(network, 'network'),
    storage: upstream(storage, 'storage'),
    database,
    compute: upstream(compute, 'compute'),
    access,
    monitoring: upstream(monitoring, 'monitoring'),
  };
}
