#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { readFileSync } from 'fs';
import { OrchestratorError } from './errors/index.js';
import { isPlainObject } from './config/types.js';
import { ConsoleReporter } from './output/reporter.js';
import { CommandContext, createContext } from './commands/context.js';
import {
  CleanupFlags,
  CreateUserFlags,
  FixMigrationFlags,
  GlobalFlags,
  StartFlags,
  TargetFlags,
  parseCleanupOptions,
  parseStartOptions,
  resolveTarget
} from './commands/options.js';
import {
  runCheckDb,
  runCheckEnv,
  runCleanup,
  runCreateUser,
  runFixMigration,
  runInit,
  runStart,
  runVerify
} from './commands/handlers.js';

function readVersion(): string {
  const packageJson: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf8'));
  return isPlainObject(packageJson) && typeof packageJson.version === 'string' ? packageJson.version : '0.0.0';
}

const program = new Command();

program
  .name('nsot-stack')
  .description('Start, verify and maintain the NetBox and Nautobot compose stacks')
  .version(readVersion())
  .option('-c, --config <path>', 'Path to configuration file (default: nsot-stack.yml in the current directory)')
  .option('-v, --verbose', 'Echo every docker command and print stack traces on failure');

/**
 * Validate flags, build the context, run the handler. Flag errors surface
 * before preflight touches docker.
 */
async function execute<T>(parse: () => T, handler: (context: CommandContext, options: T) => Promise<boolean>): Promise<void> {
  const globals = program.opts<GlobalFlags>();
  const reporter = new ConsoleReporter(Boolean(globals.verbose));

  try {
    const options = parse();
    const context = await createContext(globals, { reporter });
    const succeeded = await handler(context, options);
    if (!succeeded) {
      process.exit(1);
    }
  } catch (error) {
    if (error instanceof OrchestratorError) {
      reporter.error(error.message);
      if (error.remediation) {
        reporter.hint(error.remediation);
      }
    } else {
      console.error(chalk.red('❌ Error:'), error instanceof Error ? error.message : error);
    }
    if (globals.verbose) {
      console.error(error);
    }
    process.exit(1);
  }
}

function withTargetFlags(command: Command): Command {
  return command
    .option('--netbox-only', 'Only the NetBox stack')
    .option('--nautobot-only', 'Only the Nautobot stack')
    .option('--all', 'Both stacks (default)');
}

withTargetFlags(program.command('start'))
  .description('Start the stacks phase by phase, waiting for each phase to be ready')
  .option('--clean', 'Clean up containers and caches first')
  .option('--db', 'With --clean, also wipe database persistence')
  .option('-y, --yes', 'Do not ask before wiping databases')
  .option('--build', 'Build images before starting')
  .option('--with-automation', 'Also start the automation service')
  .action((flags: StartFlags) => execute(() => parseStartOptions(flags), runStart));

withTargetFlags(program.command('verify'))
  .description('Check health, database, web and environment of the running stacks')
  .action((flags: TargetFlags) => execute(() => resolveTarget(flags), runVerify));

withTargetFlags(program.command('cleanup'))
  .description('Remove containers, caches and optionally databases, volumes, networks and images')
  .option('--db', 'Also wipe database persistence (asks first)')
  .option('--hard', 'Also remove extra named volumes and networks')
  .option('--images', 'Also prune dangling images')
  .option('-y, --yes', 'Do not ask before wiping databases')
  .option('--dry-run', 'Show what would be removed without removing anything')
  .action((flags: CleanupFlags) => execute(() => parseCleanupOptions(flags), runCleanup));

program
  .command('fix-migration')
  .description('Fake-apply the migration that fails on fresh Nautobot databases, then apply the rest')
  .option('--no-restart', 'Do not restart the services afterwards')
  .action((flags: FixMigrationFlags) => execute(() => flags, runFixMigration));

withTargetFlags(program.command('create-user'))
  .description('Create a superuser unless it already exists')
  .option('--username <name>', 'Superuser name (prompted when not set in the environment)')
  .option('--email <email>', 'Superuser email (prompted when not set in the environment)')
  .action((flags: CreateUserFlags) =>
    execute(() => ({ target: resolveTarget(flags), flags }), (context, options) => runCreateUser(context, options.target, options.flags))
  );

withTargetFlags(program.command('check-db'))
  .description('Check that each application can reach its database')
  .action((flags: TargetFlags) => execute(() => resolveTarget(flags), runCheckDb));

withTargetFlags(program.command('check-env'))
  .description('Show the environment the web services see')
  .action((flags: TargetFlags) => execute(() => resolveTarget(flags), runCheckEnv));

program
  .command('init')
  .description('Initialise a fresh Nautobot database: migrate, collect static files, create the superuser')
  .action(() => execute(() => undefined, context => runInit(context)));

await program.parseAsync();
