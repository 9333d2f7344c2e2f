import { StackTarget } from '../types/index.js';
import { UsageError } from '../errors/index.js';
import { CleanupOptions } from '../maintenance/cleanup-executor.js';

// Flag shapes as commander hands them to the action handlers

export interface GlobalFlags {
  config?: string;
  verbose?: boolean;
}

export interface TargetFlags {
  netboxOnly?: boolean;
  nautobotOnly?: boolean;
  all?: boolean;
}

export interface StartFlags extends TargetFlags {
  clean?: boolean;
  db?: boolean;
  build?: boolean;
  withAutomation?: boolean;
  yes?: boolean;
}

export interface CleanupFlags extends TargetFlags {
  db?: boolean;
  hard?: boolean;
  images?: boolean;
  yes?: boolean;
  dryRun?: boolean;
}

export interface FixMigrationFlags {
  /** commander sets this to false for --no-restart */
  restart?: boolean;
}

export interface CreateUserFlags extends TargetFlags {
  username?: string;
  email?: string;
}

export interface StartCommandOptions {
  target: StackTarget;
  clean: boolean;
  wipeDatabase: boolean;
  build: boolean;
  withAutomation: boolean;
  assumeYes: boolean;
}

/**
 * `--netbox-only`, `--nautobot-only` and `--all` are mutually exclusive; none means both
 */
export function resolveTarget(flags: TargetFlags): StackTarget {
  const chosen = [
    flags.netboxOnly ? '--netbox-only' : undefined,
    flags.nautobotOnly ? '--nautobot-only' : undefined,
    flags.all ? '--all' : undefined
  ].filter((flag): flag is string => flag !== undefined);

  if (chosen.length > 1) {
    throw new UsageError(`${chosen.join(' and ')} cannot be combined`);
  }
  if (flags.netboxOnly) {
    return 'netbox';
  }
  if (flags.nautobotOnly) {
    return 'nautobot';
  }
  return 'both';
}

export function parseStartOptions(flags: StartFlags): StartCommandOptions {
  const target = resolveTarget(flags);
  if (flags.db && !flags.clean) {
    throw new UsageError('--db only applies together with --clean');
  }
  return {
    target,
    clean: Boolean(flags.clean),
    wipeDatabase: Boolean(flags.db),
    build: Boolean(flags.build),
    withAutomation: Boolean(flags.withAutomation),
    assumeYes: Boolean(flags.yes)
  };
}

export function parseCleanupOptions(flags: CleanupFlags): CleanupOptions {
  return {
    target: resolveTarget(flags),
    db: Boolean(flags.db),
    hard: Boolean(flags.hard),
    images: Boolean(flags.images),
    assumeYes: Boolean(flags.yes),
    dryRun: Boolean(flags.dryRun)
  };
}
