import {
  OrchestratorConfig,
  ReadinessMethod,
  ServiceConfig,
  ServiceRole,
  StackConfig,
  StackName,
  StackTarget,
  stacksFor
} from '../types/index.js';
import { ConfigurationError } from '../errors/index.js';
import { PhaseGate, StartupPhase, StartupPlan } from './types.js';

export interface PlanOptions {
  /** Overrides `automation.enabled` */
  withAutomation?: boolean;
}

const ROLE_LABELS: Record<ServiceRole, string> = {
  datastore: 'datastores',
  cache: 'caches',
  web: 'web services',
  worker: 'workers',
  scheduler: 'schedulers'
};

const ROLE_ORDER: ServiceRole[] = ['datastore', 'cache', 'web', 'worker', 'scheduler'];

function phaseName(roles: Set<ServiceRole>): string {
  return ROLE_ORDER.filter(role => roles.has(role))
    .map(role => ROLE_LABELS[role])
    .join(' & ');
}

function gateTimeout(config: OrchestratorConfig, role: ServiceRole): number {
  switch (role) {
    case 'datastore':
    case 'cache':
      return config.timing.datastore_timeout_ms;
    case 'web':
      return config.timing.web_timeout_ms;
    case 'worker':
    case 'scheduler':
      return config.timing.worker_timeout_ms;
  }
}

function resolveMethod(method: ReadinessMethod, stack: StackConfig): ReadinessMethod {
  return method.kind === 'http' ? { kind: 'http', path: method.path ?? stack.health_path } : method;
}

function gatesFor(config: OrchestratorConfig, stackName: StackName, service: ServiceConfig): PhaseGate[] {
  const stack = config.stacks[stackName];
  return service.readiness.map(method => ({
    service: service.name,
    role: service.role,
    stack: stackName,
    method: resolveMethod(method, stack),
    target: {
      service: service.name,
      url: stack.url,
      database: service.role === 'datastore' ? stack.database : undefined
    },
    timeoutMs: gateTimeout(config, service.role)
  }));
}

/**
 * Group the enabled services of the target stacks into ordered phases. Phase
 * numbers from the configuration keep their order; gaps are closed.
 */
export function buildStartupPlan(config: OrchestratorConfig, target: StackTarget, options: PlanOptions = {}): StartupPlan {
  const stacks = stacksFor(target).filter(name => config.stacks[name].enabled);
  if (stacks.length === 0) {
    throw new ConfigurationError(`No enabled stack matches target "${target}"`);
  }

  const byPhase = new Map<number, Array<{ stack: StackName; service: ServiceConfig }>>();
  for (const stack of stacks) {
    for (const service of config.stacks[stack].services) {
      const entries = byPhase.get(service.phase) ?? [];
      entries.push({ stack, service });
      byPhase.set(service.phase, entries);
    }
  }

  const phases: StartupPhase[] = [...byPhase.keys()]
    .sort((a, b) => a - b)
    .map((phaseNumber, position) => {
      const entries = byPhase.get(phaseNumber) ?? [];
      const skipMigrationsFor = new Set<StackName>();
      for (const entry of entries) {
        if (entry.service.skip_migrations) {
          skipMigrationsFor.add(entry.stack);
        }
      }

      return {
        index: position + 1,
        name: phaseName(new Set(entries.map(entry => entry.service.role))),
        services: entries.map(entry => entry.service.name),
        skipMigrationsFor: [...skipMigrationsFor],
        gates: entries.flatMap(entry => gatesFor(config, entry.stack, entry.service))
      };
    });

  if (options.withAutomation ?? config.automation.enabled) {
    const automation = config.automation;
    phases.push({
      index: phases.length + 1,
      name: 'automation',
      services: [automation.service],
      skipMigrationsFor: [],
      gates: [
        {
          service: automation.service,
          role: 'worker',
          method: { kind: 'http', path: automation.health_path },
          target: { service: automation.service, url: automation.url },
          timeoutMs: config.timing.worker_timeout_ms
        }
      ]
    });
  }

  return { target, intervalMs: config.timing.poll_interval_ms, phases };
}
