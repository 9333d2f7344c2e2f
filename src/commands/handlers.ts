import chalk from 'chalk';
import { StackName, StackTarget, SuperuserCredentials, stacksFor } from '../types/index.js';
import { OrchestratorError, UsageError } from '../errors/index.js';
import { superuserVariables } from '../config/settings.js';
import { startStack } from '../orchestration/phase-sequencer.js';
import { StartupResult } from '../orchestration/types.js';
import { CleanupExecutor, CleanupOptions } from '../maintenance/cleanup-executor.js';
import { MigrationRepair, findRepairableStack } from '../maintenance/migration-repair.js';
import { SuperuserProvisioner } from '../maintenance/superuser.js';
import { VerificationPass, VerificationReport } from '../maintenance/verification.js';
import { checkDatabases, checkEnvironment } from '../maintenance/diagnostics.js';
import { NautobotInitializer } from '../maintenance/nautobot-init.js';
import { CommandContext } from './context.js';
import { CreateUserFlags, FixMigrationFlags, StartCommandOptions } from './options.js';

// Each handler resolves to false when the command should exit non-zero

function enabledStacks(context: CommandContext, target: StackTarget): StackName[] {
  return stacksFor(target).filter(stack => context.config.stacks[stack].enabled);
}

function printStartupErrors(context: CommandContext, result: StartupResult): void {
  for (const error of result.errors ?? []) {
    context.reporter.error(`${error.code}: ${error.message}`);
    if (error.remediation) {
      context.reporter.hint(error.remediation);
    }
  }
}

function printSummary(context: CommandContext, report: VerificationReport): void {
  const summary = `${report.healthyCount} of ${report.totalCount} services healthy`;
  if (report.status === 'healthy') {
    context.reporter.success(summary);
  } else {
    context.reporter.warn(summary);
  }
}

export async function runStart(context: CommandContext, options: StartCommandOptions): Promise<boolean> {
  const { config, reporter } = context;

  if (options.clean) {
    reporter.step('🧹 Cleaning up before start');
    const cleanup = await new CleanupExecutor(config, context.compose, context.engine, context.prompter, reporter).execute({
      target: options.target,
      db: options.wipeDatabase,
      hard: false,
      images: false,
      assumeYes: options.assumeYes
    });
    if (!cleanup.success) {
      reporter.warn('Continuing with startup although some resources could not be removed');
    }
  }

  reporter.step(`🚀 Starting ${options.target === 'both' ? 'NetBox and Nautobot' : config.stacks[options.target].display_name}`);
  const result = await startStack(config, context.compose, context.prober, reporter, options.target, {
    build: options.build,
    withAutomation: options.withAutomation
  });

  if (!result.success) {
    reporter.error('Startup failed');
    printStartupErrors(context, result);
    return false;
  }

  const provisioner = new SuperuserProvisioner(config, context.compose, reporter);
  for (const stack of enabledStacks(context, options.target)) {
    const credentials = context.settings.superusers[stack];
    if (!credentials) {
      continue;
    }
    try {
      await provisioner.ensure(stack, credentials);
    } catch (error) {
      if (!(error instanceof OrchestratorError)) {
        throw error;
      }
      reporter.warn(`${config.stacks[stack].display_name} superuser was not created: ${error.message}`);
      reporter.hint(`Retry with: nsot-stack create-user --${stack}-only`);
    }
  }

  reporter.info(chalk.green('\n✅ Startup Results:'));
  for (const phase of result.phases) {
    reporter.info(`📦 Phase ${phase.index} (${phase.name}): ${phase.services.join(', ')}`);
  }

  const report = await new VerificationPass(config, context.compose, context.prober).run(options.target);
  printSummary(context, report);

  reporter.info(chalk.blue('\n🌐 Endpoints:'));
  for (const stack of enabledStacks(context, options.target)) {
    reporter.info(`  ${config.stacks[stack].display_name}: ${chalk.underline(config.stacks[stack].url)}`);
  }
  if (options.withAutomation || config.automation.enabled) {
    reporter.info(`  Automation: ${chalk.underline(config.automation.url)}`);
  }

  reporter.info(chalk.gray(`\n⏱️  Startup took ${result.metadata.durationMs ?? 0}ms`));
  reporter.info(chalk.gray(`🆔 Run ID: ${result.metadata.runId}`));
  return true;
}

export async function runVerify(context: CommandContext, target: StackTarget): Promise<boolean> {
  const { reporter } = context;
  reporter.step('🔍 Verifying services');

  const report = await new VerificationPass(context.config, context.compose, context.prober).run(target);
  for (const status of report.statuses) {
    reporter.info(`  ${status.service.padEnd(24)} ${status.state.padEnd(10)} ${status.health === 'none' ? '' : status.health}`);
  }

  for (const check of report.checks) {
    if (check.passed) {
      reporter.success(check.detail);
    } else {
      reporter.error(check.detail);
      if (check.suggestion) {
        reporter.hint(check.suggestion);
      }
    }
  }

  printSummary(context, report);
  if (report.status === 'degraded') {
    reporter.step('💡 Suggestions');
    for (const suggestion of report.suggestions) {
      reporter.hint(suggestion);
    }
    return false;
  }
  return true;
}

export async function runCleanup(context: CommandContext, options: CleanupOptions): Promise<boolean> {
  const report = await new CleanupExecutor(context.config, context.compose, context.engine, context.prompter, context.reporter).execute(
    options
  );
  return report.success;
}

export async function runFixMigration(context: CommandContext, flags: FixMigrationFlags): Promise<boolean> {
  const stack = findRepairableStack(context.config);
  if (!stack) {
    throw new OrchestratorError('NO_REPAIR_DEFINED', 'No stack has a migration repair configured');
  }

  const report = await new MigrationRepair(context.config, stack, context.compose, context.prober, context.reporter).run({
    restart: flags.restart !== false
  });
  return report.healthy !== false;
}

async function promptCredentials(context: CommandContext, stack: StackName, flags: CreateUserFlags): Promise<SuperuserCredentials> {
  const name = context.config.stacks[stack].display_name;
  if (!context.prompter.interactive) {
    const vars = superuserVariables(stack);
    throw new UsageError(
      `Cannot prompt for the ${name} superuser without a terminal; set ${vars.name}, ${vars.email} and ${vars.password}`
    );
  }
  const username = (flags.username ?? (await context.prompter.ask(`${name} username: `))).trim();
  const email = (flags.email ?? (await context.prompter.ask(`${name} email: `))).trim();
  const password = await context.prompter.ask(`${name} password: `, { hidden: true });
  const repeated = await context.prompter.ask(`${name} password (again): `, { hidden: true });

  if (!username || !email || !password) {
    throw new UsageError(`Username, email and password are required for the ${name} superuser`);
  }
  if (password !== repeated) {
    throw new UsageError('Passwords do not match');
  }
  return { username, email, password };
}

export async function runCreateUser(context: CommandContext, target: StackTarget, flags: CreateUserFlags): Promise<boolean> {
  const provisioner = new SuperuserProvisioner(context.config, context.compose, context.reporter);
  for (const stack of enabledStacks(context, target)) {
    context.reporter.step(`👤 ${context.config.stacks[stack].display_name} superuser`);
    const credentials = context.settings.superusers[stack] ?? (await promptCredentials(context, stack, flags));
    await provisioner.ensure(stack, credentials);
  }
  return true;
}

export async function runCheckDb(context: CommandContext, target: StackTarget): Promise<boolean> {
  const diagnoses = await checkDatabases(context.config, context.compose, context.prober, context.reporter, target);
  return diagnoses.every(diagnosis => diagnosis.accepting && diagnosis.applicationConnected === true);
}

export async function runCheckEnv(context: CommandContext, target: StackTarget): Promise<boolean> {
  const diagnoses = await checkEnvironment(context.config, context.compose, context.prober, context.reporter, target);
  return diagnoses.every(diagnosis => !diagnosis.error && diagnosis.missing.length === 0);
}

export async function runInit(context: CommandContext): Promise<boolean> {
  if (!context.config.stacks.nautobot.enabled) {
    throw new UsageError('Nautobot is disabled in the configuration');
  }
  await new NautobotInitializer(context.config, context.compose, context.prober, context.reporter).run(
    context.settings.superusers.nautobot
  );
  context.reporter.success('Nautobot initialised');
  context.reporter.hint('Start the full stack with: nsot-stack start --nautobot-only');
  return true;
}
