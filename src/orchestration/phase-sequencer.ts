import { v4 as uuidv4 } from 'uuid';
import { OrchestratorConfig, StackTarget } from '../types/index.js';
import { GateTimeoutError, OrchestratorError, toErrorInfo } from '../errors/index.js';
import { skipMigrationsVariable } from '../config/settings.js';
import { ComposeRuntime } from '../runtime/types.js';
import { ReadinessProber, describeMethod } from '../readiness/prober.js';
import { Reporter } from '../output/reporter.js';
import { detectMigrationDefect } from './known-defects.js';
import { buildStartupPlan, PlanOptions } from './startup-plan.js';
import {
  GateReport,
  PhaseGate,
  PhaseReport,
  StartupMetadata,
  StartupOptions,
  StartupPhase,
  StartupPlan,
  StartupResult
} from './types.js';

/**
 * Starts the plan phase by phase. Each phase is a barrier: the next `up` is only
 * issued once every gate of the current phase is ready. A gate that times out
 * aborts the run where it stands; nothing is rolled back.
 */
export class PhaseSequencer {
  constructor(
    private readonly config: OrchestratorConfig,
    private readonly compose: ComposeRuntime,
    private readonly prober: ReadinessProber,
    private readonly reporter: Reporter
  ) {}

  async run(plan: StartupPlan, options: StartupOptions = {}): Promise<StartupResult> {
    const startTime = Date.now();
    const metadata: StartupMetadata = {
      runId: uuidv4(),
      timestamp: new Date(),
      project: this.config.project.name,
      target: plan.target
    };
    const phases: PhaseReport[] = [];

    try {
      for (const phase of plan.phases) {
        phases.push(await this.runPhase(phase, plan.intervalMs, options));
      }

      metadata.durationMs = Date.now() - startTime;
      return { success: true, phases, metadata };
    } catch (error) {
      metadata.durationMs = Date.now() - startTime;
      return { success: false, phases, errors: [toErrorInfo(error)], metadata };
    }
  }

  private async runPhase(phase: StartupPhase, intervalMs: number, options: StartupOptions): Promise<PhaseReport> {
    const startedAt = new Date();
    this.reporter.step(`📦 Phase ${phase.index}: starting ${phase.name} (${phase.services.join(', ')})`);

    const env: Record<string, string> = {};
    for (const stack of phase.skipMigrationsFor) {
      env[skipMigrationsVariable(stack)] = 'true';
    }

    try {
      await this.compose.up(phase.services, { build: options.build, env });
    } catch (error) {
      if (error instanceof OrchestratorError) {
        throw new OrchestratorError(error.code, `Phase ${phase.index} (${phase.name}): ${error.message}`, {
          phase: phase.index,
          remediation: `Check the output above, then inspect logs: ${this.compose.describe(['logs', ...phase.services])}`,
          details: error.details
        });
      }
      throw error;
    }

    const gates: GateReport[] = [];
    for (const gate of phase.gates) {
      gates.push(await this.awaitGate(phase, gate, intervalMs));
    }

    return {
      index: phase.index,
      name: phase.name,
      services: phase.services,
      startedAt,
      durationMs: Date.now() - startedAt.getTime(),
      gates
    };
  }

  private async awaitGate(phase: StartupPhase, gate: PhaseGate, intervalMs: number): Promise<GateReport> {
    const label = `${gate.service}: ${describeMethod(gate.method)}`;
    const spinner = this.reporter.spinner(`⏳ Waiting for ${label}`);

    const result = await this.prober.probe({
      target: gate.target,
      method: gate.method,
      timeoutMs: gate.timeoutMs,
      intervalMs
    });

    const report: GateReport = {
      service: gate.service,
      method: gate.method.kind,
      outcome: result.outcome,
      attempts: result.attempts,
      elapsedMs: result.elapsedMs
    };

    if (result.outcome === 'ready') {
      spinner.succeed(`${label} (${Math.round(result.elapsedMs / 1000)}s)`);
      return report;
    }

    spinner.fail(`${label}: timed out after ${result.attempts} attempts`);
    throw await this.timeoutError(phase, gate, result.lastError);
  }

  private async timeoutError(phase: StartupPhase, gate: PhaseGate, lastError?: string): Promise<GateTimeoutError> {
    let remediation = `Inspect the logs: ${this.compose.describe(['logs', gate.service])}`;
    let details: unknown = lastError ? { lastError } : undefined;

    const repair = gate.stack ? this.config.stacks[gate.stack].migration_repair : undefined;
    if (gate.role === 'web' && repair) {
      const logs = await this.compose.logs(gate.service);
      const diagnosis = detectMigrationDefect(logs, repair);
      if (diagnosis) {
        this.reporter.warn(diagnosis.summary);
        remediation = `${diagnosis.remediation}. ${remediation}`;
        details = { lastError, diagnosis: diagnosis.summary };
      }
    }

    return new GateTimeoutError(phase.index, gate.service, describeMethod(gate.method), gate.timeoutMs, {
      remediation,
      details
    });
  }
}

/**
 * Build the plan for `target` and run it
 */
export async function startStack(
  config: OrchestratorConfig,
  compose: ComposeRuntime,
  prober: ReadinessProber,
  reporter: Reporter,
  target: StackTarget,
  options: StartupOptions & PlanOptions = {}
): Promise<StartupResult> {
  const plan = buildStartupPlan(config, target, { withAutomation: options.withAutomation });
  return new PhaseSequencer(config, compose, prober, reporter).run(plan, { build: options.build });
}
