import { rm, stat } from 'fs/promises';
import { isAbsolute, relative, resolve } from 'path';
import { OrchestratorConfig, StackName, StackTarget, stacksFor } from '../types/index.js';
import { ComposeNamingService } from '../config/naming.js';
import { ComposeRuntime, ContainerEngine, RemovalOutcome } from '../runtime/types.js';
import { Reporter } from '../output/reporter.js';
import { Confirmer } from '../output/prompt.js';

export type CleanupScope = 'containers' | 'networks' | 'named-volumes' | 'bind-directories' | 'images';

export type CleanupOperation =
  | 'compose-down'
  | 'remove-services'
  | 'remove-container'
  | 'remove-containers-by-prefix'
  | 'remove-volume'
  | 'remove-network'
  | 'remove-directory'
  | 'prune-images';

export interface CleanupAction {
  scope: CleanupScope;
  operation: CleanupOperation;
  target: StackTarget;
  /** Container name, prefix, volume, network, absolute directory, or the services to remove */
  resource: string;
  services?: string[];
  description: string;
  /** Discards persisted data */
  destructive: boolean;
  requiresConfirmation: boolean;
}

export interface CleanupOptions {
  target: StackTarget;
  /** Also wipe database persistence */
  db: boolean;
  /** Also remove extra named volumes and networks */
  hard: boolean;
  images: boolean;
  /** Skip confirmation prompts */
  assumeYes: boolean;
  dryRun?: boolean;
}

export type CleanupStatus = 'removed' | 'absent' | 'declined' | 'failed' | 'planned';

export interface CleanupOutcome {
  action: CleanupAction;
  status: CleanupStatus;
  message?: string;
}

export interface CleanupReport {
  success: boolean;
  outcomes: CleanupOutcome[];
}

function stackActions(config: OrchestratorConfig, stack: StackName, options: CleanupOptions, naming: ComposeNamingService): CleanupAction[] {
  const stackConfig = config.stacks[stack];
  const names = naming.resourceNames(config, stack);
  const projectDir = config.project.directory;
  const actions: CleanupAction[] = [];

  const base = { target: stack, destructive: false, requiresConfirmation: false };

  for (const name of names.legacyContainers) {
    actions.push({ ...base, scope: 'containers', operation: 'remove-container', resource: name, description: `leftover container ${name}` });
  }
  for (const prefix of names.containerPrefixes) {
    actions.push({
      ...base,
      scope: 'containers',
      operation: 'remove-containers-by-prefix',
      resource: prefix,
      description: `containers matching ${prefix}*`
    });
  }

  if (stackConfig.persistence.kind === 'bind') {
    for (const dir of stackConfig.persistence.cache) {
      const path = resolve(projectDir, dir);
      actions.push({ ...base, scope: 'bind-directories', operation: 'remove-directory', resource: path, description: `cache directory ${path}` });
    }
  } else {
    for (const volume of names.cacheVolumes) {
      actions.push({ ...base, scope: 'named-volumes', operation: 'remove-volume', resource: volume, description: `cache volume ${volume}` });
    }
  }

  if (options.hard) {
    for (const volume of names.extraVolumes) {
      actions.push({
        ...base,
        scope: 'named-volumes',
        operation: 'remove-volume',
        resource: volume,
        description: `volume ${volume}`,
        destructive: true
      });
    }
  }

  if (options.db) {
    const database = stackConfig.persistence.kind === 'bind'
      ? {
          scope: 'bind-directories' as const,
          operation: 'remove-directory' as const,
          resource: resolve(projectDir, stackConfig.persistence.database),
          description: `${stackConfig.display_name} database directory ${resolve(projectDir, stackConfig.persistence.database)}`
        }
      : {
          scope: 'named-volumes' as const,
          operation: 'remove-volume' as const,
          resource: names.databaseVolume ?? naming.volumeName(stackConfig.persistence.database),
          description: `${stackConfig.display_name} database volume ${names.databaseVolume ?? stackConfig.persistence.database}`
        };
    actions.push({ ...base, ...database, destructive: true, requiresConfirmation: true });
  }

  if (options.hard) {
    actions.push({ ...base, scope: 'networks', operation: 'remove-network', resource: names.network, description: `network ${names.network}` });
  }

  return actions;
}

/**
 * Ordered list of what a cleanup run does; nothing is touched
 */
export function planCleanup(config: OrchestratorConfig, options: CleanupOptions): CleanupAction[] {
  const naming = ComposeNamingService.fromConfig(config);
  const stacks = stacksFor(options.target);
  const actions: CleanupAction[] = [];

  if (options.target === 'both') {
    actions.push({
      scope: 'containers',
      operation: 'compose-down',
      target: 'both',
      resource: config.project.name,
      description: `compose project ${config.project.name} (remove orphans)`,
      destructive: false,
      requiresConfirmation: false
    });
  } else {
    const services = config.stacks[options.target].services.map(service => service.name);
    actions.push({
      scope: 'containers',
      operation: 'remove-services',
      target: options.target,
      resource: services.join(' '),
      services,
      description: `${config.stacks[options.target].display_name} services`,
      destructive: false,
      requiresConfirmation: false
    });
  }

  for (const stack of stacks) {
    actions.push(...stackActions(config, stack, options, naming));
  }

  if (options.images) {
    actions.push({
      scope: 'images',
      operation: 'prune-images',
      target: 'both',
      resource: 'dangling images',
      description: 'dangling images',
      destructive: false,
      requiresConfirmation: false
    });
  }

  return actions;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function hasErrorCode(error: unknown, codes: string[]): boolean {
  return error instanceof Error && 'code' in error && typeof error.code === 'string' && codes.includes(error.code);
}

/**
 * Executes a cleanup plan. Every removal accepts "already gone" as success, so
 * running it twice in a row is safe. Failures are recorded and the run goes on.
 */
export class CleanupExecutor {
  constructor(
    private readonly config: OrchestratorConfig,
    private readonly compose: ComposeRuntime,
    private readonly engine: ContainerEngine,
    private readonly confirmer: Confirmer,
    private readonly reporter: Reporter
  ) {}

  async execute(options: CleanupOptions): Promise<CleanupReport> {
    const actions = planCleanup(this.config, options);
    this.reporter.info(
      `🧹 Cleanup scope: ${options.target} (DB wipe: ${options.db ? 'yes' : 'no'}, hard: ${options.hard ? 'yes' : 'no'}, prune images: ${options.images ? 'yes' : 'no'})`
    );
    this.reporter.info(`📁 Project: ${this.config.project.directory}`);

    const outcomes: CleanupOutcome[] = [];
    for (const action of actions) {
      const outcome = options.dryRun ? { action, status: 'planned' as const } : await this.perform(action, options);
      this.report(outcome);
      outcomes.push(outcome);
    }

    const success = outcomes.every(outcome => outcome.status !== 'failed');
    if (success) {
      this.reporter.success(options.dryRun ? 'Dry run complete, nothing was removed' : 'Cleanup complete');
    } else {
      this.reporter.warn('Cleanup finished with failures');
    }
    return { success, outcomes };
  }

  private async perform(action: CleanupAction, options: CleanupOptions): Promise<CleanupOutcome> {
    if (action.requiresConfirmation && !options.assumeYes) {
      const confirmed = await this.confirmer.confirm(`❗ Wipe ${action.description}? This forces full migrations next start.`);
      if (!confirmed) {
        return { action, status: 'declined' };
      }
    }

    try {
      return { action, status: await this.apply(action) };
    } catch (error) {
      return { action, status: 'failed', message: errorMessage(error) };
    }
  }

  private async apply(action: CleanupAction): Promise<RemovalOutcome> {
    switch (action.operation) {
      case 'compose-down':
        await this.compose.down({ removeOrphans: true });
        return 'removed';
      case 'remove-services':
        await this.compose.removeServices(action.services ?? []);
        return 'removed';
      case 'remove-container': {
        const containers = await this.engine.listContainers();
        if (!containers.some(container => container.name === action.resource)) {
          return 'absent';
        }
        return this.engine.removeContainer(action.resource);
      }
      case 'remove-containers-by-prefix': {
        const matches = (await this.engine.listContainers()).filter(container => container.name.startsWith(action.resource));
        let removed = false;
        for (const container of matches) {
          if ((await this.engine.removeContainer(container.id)) === 'removed') {
            removed = true;
          }
        }
        return removed ? 'removed' : 'absent';
      }
      case 'remove-volume': {
        const volumes = await this.engine.listVolumes();
        return volumes.includes(action.resource) ? this.engine.removeVolume(action.resource) : 'absent';
      }
      case 'remove-network': {
        const networks = await this.engine.listNetworks();
        return networks.includes(action.resource) ? this.engine.removeNetwork(action.resource) : 'absent';
      }
      case 'remove-directory':
        return this.removeDirectory(action.resource);
      case 'prune-images':
        await this.engine.pruneDanglingImages();
        return 'removed';
    }
  }

  private async removeDirectory(path: string): Promise<RemovalOutcome> {
    const fromProject = relative(this.config.project.directory, path);
    if (fromProject === '' || fromProject.startsWith('..') || isAbsolute(fromProject)) {
      throw new Error(`Refusing to remove ${path}: it is not inside the project directory`);
    }

    try {
      await stat(path);
    } catch (error) {
      if (hasErrorCode(error, ['ENOENT'])) {
        return 'absent';
      }
      throw error;
    }

    try {
      await rm(path, { recursive: true, force: true });
    } catch (error) {
      if (hasErrorCode(error, ['EACCES', 'EPERM'])) {
        throw new Error(`Permission denied removing ${path}. Try: sudo rm -rf "${path}"`);
      }
      throw error;
    }
    return 'removed';
  }

  private report(outcome: CleanupOutcome): void {
    const { action } = outcome;
    switch (outcome.status) {
      case 'removed':
        this.reporter.info(`🗑️  Removed ${action.description}`);
        break;
      case 'absent':
        this.reporter.debug(`Already absent: ${action.description}`);
        break;
      case 'declined':
        this.reporter.info(`➡️  Skipping ${action.description}`);
        break;
      case 'planned':
        this.reporter.info(`${action.destructive ? '❗' : '•'} Would remove ${action.description}${action.requiresConfirmation ? ' (asks first)' : ''}`);
        break;
      case 'failed':
        this.reporter.warn(`Could not remove ${action.description}: ${outcome.message ?? 'unknown error'}`);
        break;
    }
  }
}
