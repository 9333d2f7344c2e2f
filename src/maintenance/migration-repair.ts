import { MigrationRepairConfig, OrchestratorConfig, StackConfig, StackName } from '../types/index.js';
import { CommandFailedError, OrchestratorError, PreconditionError, SafetyCheckError } from '../errors/index.js';
import { ComposeRuntime } from '../runtime/types.js';
import { ReadinessProber } from '../readiness/prober.js';
import { Reporter } from '../output/reporter.js';
import { ManagementCommands, MigrationEntry } from './management-commands.js';

export type RepairStatus = 'repaired' | 'already-applied';

export interface RepairReport {
  status: RepairStatus;
  stack: StackName;
  appLabel: string;
  migration: string;
  before: MigrationEntry[];
  /** State right after the fake-apply, before the remaining migrations ran */
  afterFake?: MigrationEntry[];
  after: MigrationEntry[];
  restarted: boolean;
  healthy?: boolean;
}

export interface RepairOptions {
  /** Restart web/worker/scheduler services and wait for the web health check */
  restart?: boolean;
}

export function findRepairableStack(config: OrchestratorConfig): StackName | undefined {
  if (config.stacks.nautobot.migration_repair) {
    return 'nautobot';
  }
  return config.stacks.netbox.migration_repair ? 'netbox' : undefined;
}

/**
 * Manual repair for a migration that only drops legacy columns and therefore
 * fails on a database that never had them: fake-apply it, then apply the rest.
 *
 * Fake-applying is only correct when the columns are really absent, so that is
 * checked against the live schema first.
 */
export class MigrationRepair {
  private readonly stack: StackConfig;
  private readonly repair: MigrationRepairConfig;
  private readonly commands: ManagementCommands;

  constructor(
    private readonly config: OrchestratorConfig,
    private readonly stackName: StackName,
    private readonly compose: ComposeRuntime,
    private readonly prober: ReadinessProber,
    private readonly reporter: Reporter
  ) {
    this.stack = config.stacks[stackName];
    const repair = this.stack.migration_repair;
    if (!repair) {
      throw new OrchestratorError('NO_REPAIR_DEFINED', `No migration repair is configured for ${this.stack.display_name}`);
    }
    this.repair = repair;
    this.commands = new ManagementCommands(compose, this.stack);
  }

  async run(options: RepairOptions = {}): Promise<RepairReport> {
    const { app_label: appLabel, migration } = this.repair;
    const qualified = `${appLabel}.${migration}`;

    await this.ensureRunning();

    this.reporter.step('🔍 Current migration status');
    const before = await this.commands.showMigrations(appLabel);
    this.printState(before);

    const targetIndex = before.findIndex(entry => entry.name === migration);
    if (targetIndex === -1) {
      throw new OrchestratorError('MIGRATION_NOT_FOUND', `Migration ${qualified} is not known to ${this.stack.display_name}`, {
        remediation: 'Check the application version; the repair only applies to releases that ship this migration'
      });
    }

    if (before[targetIndex].applied) {
      this.reporter.info(`ℹ️  ${qualified} is already applied, nothing to repair`);
      return { status: 'already-applied', stack: this.stackName, appLabel, migration, before, after: before, restarted: false };
    }

    const earlierPending = before.slice(0, targetIndex).filter(entry => !entry.applied);
    if (earlierPending.length > 0) {
      throw new SafetyCheckError(
        'EARLIER_MIGRATIONS_PENDING',
        `Migrations before ${migration} are not applied (${earlierPending.map(entry => entry.name).join(', ')}); faking ${migration} would mark them applied too`,
        { remediation: `Apply them first: ${this.commands.describe(['migrate', appLabel, earlierPending[earlierPending.length - 1].name])}` }
      );
    }

    await this.ensureLegacyColumnsAbsent();

    this.reporter.step(`1️⃣ Faking migration ${qualified}`);
    await this.commands.fakeApply(appLabel, migration);
    const afterFake = await this.commands.showMigrations(appLabel);
    if (!afterFake.find(entry => entry.name === migration)?.applied) {
      throw new OrchestratorError('FAKE_NOT_RECORDED', `${qualified} is still pending after the fake-apply`);
    }
    this.reporter.success(`Faked migration ${qualified}`);

    this.reporter.step('2️⃣ Running remaining migrations');
    const applied = await this.commands.applyAll();
    if (applied.exitCode !== 0) {
      throw new CommandFailedError(this.commands.describe(['migrate']), applied.exitCode, applied.stderr || applied.stdout, {
        remediation: `Inspect the output above, then the logs: ${this.compose.describe(['logs', this.stack.web_service])}`
      });
    }

    const after = await this.commands.showMigrations(appLabel);
    const pending = after.filter(entry => !entry.applied);
    if (pending.length > 0) {
      throw new OrchestratorError('MIGRATIONS_PENDING', `${appLabel} still has pending migrations: ${pending.map(entry => entry.name).join(', ')}`);
    }
    this.reporter.step('🔍 Final migration status');
    this.printState(after);
    this.reporter.success('Migration fix complete');

    const report: RepairReport = {
      status: 'repaired',
      stack: this.stackName,
      appLabel,
      migration,
      before,
      afterFake,
      after,
      restarted: false
    };

    if (options.restart) {
      report.restarted = true;
      report.healthy = await this.restartAndWait();
    }

    return report;
  }

  private async ensureRunning(): Promise<void> {
    const statuses = await this.compose.ps([this.stack.web_service]);
    const up = statuses.some(status => status.state === 'running' || status.state === 'restarting');
    if (!up) {
      throw new PreconditionError('SERVICE_NOT_RUNNING', `${this.stack.display_name} container (${this.stack.web_service}) is not running`, {
        remediation: `Start the services first: nsot-stack start --${this.stackName}-only`,
        service: this.stack.web_service
      });
    }
  }

  private async ensureLegacyColumnsAbsent(): Promise<void> {
    const columns = this.repair.legacy_columns.map(column => `'${column}'`).join(', ');
    const query =
      `SELECT column_name FROM information_schema.columns ` +
      `WHERE table_name = '${this.repair.table}' AND column_name IN (${columns})`;

    const result = await this.compose.exec(this.stack.database_service, [
      'psql',
      '-U',
      this.stack.database.user,
      '-d',
      this.stack.database.name,
      '-tAc',
      query
    ]);
    if (result.exitCode !== 0) {
      throw new CommandFailedError(`psql ${this.stack.database.name}`, result.exitCode, result.stderr, {
        remediation: 'The schema could not be inspected, so the migration was not faked'
      });
    }

    const present = result.stdout
      .split('\n')
      .map(line => line.trim())
      .filter(line => line.length > 0);
    if (present.length > 0) {
      throw new SafetyCheckError(
        'LEGACY_COLUMNS_PRESENT',
        `${this.repair.table} still has ${present.join(', ')}; ${this.repair.migration} must run for real on this database`,
        {
          remediation: `Run it normally instead: ${this.commands.describe(['migrate', this.repair.app_label])}`,
          details: { columns: present }
        }
      );
    }
    this.reporter.success(`Legacy columns are absent from ${this.repair.table}`);
  }

  private async restartAndWait(): Promise<boolean> {
    const services = this.stack.services
      .filter(service => service.role === 'web' || service.role === 'worker' || service.role === 'scheduler')
      .map(service => service.name);

    this.reporter.step(`🔄 Restarting ${services.join(', ')}`);
    await this.compose.restart(services);

    const spinner = this.reporter.spinner(`⏳ Waiting for ${this.stack.web_service} to become healthy`);
    const result = await this.prober.probe({
      target: { service: this.stack.web_service, url: this.stack.url },
      method: { kind: 'health-flag' },
      timeoutMs: this.config.timing.web_timeout_ms,
      intervalMs: this.config.timing.poll_interval_ms
    });

    if (result.outcome === 'ready') {
      spinner.succeed(`${this.stack.display_name} is healthy`);
      return true;
    }
    spinner.warn(`${this.stack.display_name} is still not healthy`);
    this.reporter.hint(`Check logs: ${this.compose.describe(['logs', this.stack.web_service])}`);
    this.reporter.hint('Run verification: nsot-stack verify');
    return false;
  }

  private printState(entries: MigrationEntry[]): void {
    for (const entry of entries) {
      this.reporter.info(`  [${entry.applied ? 'X' : ' '}] ${entry.name}`);
    }
  }
}
