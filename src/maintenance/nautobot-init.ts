import { OrchestratorConfig, SuperuserCredentials } from '../types/index.js';
import { CommandFailedError, OrchestratorError } from '../errors/index.js';
import { ComposeRuntime } from '../runtime/types.js';
import { ReadinessProber } from '../readiness/prober.js';
import { Reporter } from '../output/reporter.js';
import { buildStartupPlan } from '../orchestration/startup-plan.js';
import { PhaseSequencer } from '../orchestration/phase-sequencer.js';
import { detectMigrationDefect } from '../orchestration/known-defects.js';
import { StartupResult } from '../orchestration/types.js';
import { ManagementCommands } from './management-commands.js';
import { SuperuserOutcome, SuperuserProvisioner } from './superuser.js';

const NAUTOBOT_ROOT = '/opt/nautobot';
const PREPARE_DIRECTORIES =
  `mkdir -p ${NAUTOBOT_ROOT}/media/devicetype-images ${NAUTOBOT_ROOT}/static && ` +
  `chown -R nautobot:nautobot ${NAUTOBOT_ROOT}`;

export interface InitReport {
  datastores: StartupResult;
  superuser?: SuperuserOutcome;
}

/**
 * One-off initialisation of a fresh Nautobot database: datastores up, data
 * directories owned by the application user, schema migrated, static files collected.
 */
export class NautobotInitializer {
  constructor(
    private readonly config: OrchestratorConfig,
    private readonly compose: ComposeRuntime,
    private readonly prober: ReadinessProber,
    private readonly reporter: Reporter
  ) {}

  async run(credentials?: SuperuserCredentials): Promise<InitReport> {
    const stack = this.config.stacks.nautobot;
    const commands = new ManagementCommands(this.compose, stack);

    const plan = buildStartupPlan(this.config, 'nautobot', { withAutomation: false });
    const datastores = await new PhaseSequencer(this.config, this.compose, this.prober, this.reporter).run({
      ...plan,
      phases: plan.phases.slice(0, 1)
    });
    if (!datastores.success) {
      const [error] = datastores.errors ?? [];
      throw new OrchestratorError(error?.code ?? 'INIT_FAILED', error?.message ?? 'Nautobot datastores did not start', {
        remediation: error?.remediation
      });
    }

    this.reporter.step('📁 Preparing media and static directories');
    const prepared = await this.compose.run(stack.web_service, ['bash', '-lc', PREPARE_DIRECTORIES], { user: '0' });
    if (prepared.exitCode !== 0) {
      throw new CommandFailedError(this.compose.describe(['run', '--rm', '-u', '0', stack.web_service, 'bash', '-lc', PREPARE_DIRECTORIES]), prepared.exitCode, prepared.stderr);
    }

    this.reporter.step('🗄️  Running database migrations');
    const migrated = await commands.applyAll();
    if (migrated.exitCode !== 0) {
      const output = `${migrated.stdout}\n${migrated.stderr}`;
      const diagnosis = stack.migration_repair ? detectMigrationDefect(output, stack.migration_repair) : undefined;
      if (diagnosis) {
        this.reporter.warn(diagnosis.summary);
      }
      throw new CommandFailedError(commands.describe(['migrate', '--noinput']), migrated.exitCode, migrated.stderr || migrated.stdout, {
        remediation: diagnosis?.remediation ?? `Inspect the logs: ${this.compose.describe(['logs', stack.web_service])}`,
        service: stack.web_service
      });
    }
    this.reporter.success('Migrations applied');

    this.reporter.step('🎨 Collecting static files');
    await commands.collectStatic();
    this.reporter.success('Static files collected');

    if (!credentials) {
      this.reporter.hint('No NAUTOBOT_SUPERUSER_* settings found; create one later with: nsot-stack create-user --nautobot-only');
      return { datastores };
    }
    const superuser = await new SuperuserProvisioner(this.config, this.compose, this.reporter).ensure('nautobot', credentials);
    return { datastores, superuser };
  }
}
