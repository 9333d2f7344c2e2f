import { describe, it, expect, beforeEach, vi } from 'vitest';
import { PhaseSequencer, startStack } from '../phase-sequencer.js';
import { buildStartupPlan } from '../startup-plan.js';
import { ReadinessProber } from '../../readiness/prober.js';
import { MemoryReporter } from '../../output/reporter.js';
import { CommandFailedError } from '../../errors/index.js';
import { OrchestratorConfig } from '../../types/index.js';
import { UpOptions } from '../../runtime/types.js';
import { FakeComposeRuntime, ManualClock, stubHttp, testConfig } from '../../__tests__/support/fakes.js';

describe('PhaseSequencer', () => {
  let config: OrchestratorConfig;
  let compose: FakeComposeRuntime;
  let clock: ManualClock;
  let reporter: MemoryReporter;
  let sequencer: PhaseSequencer;

  beforeEach(() => {
    config = testConfig();
    compose = new FakeComposeRuntime();
    clock = new ManualClock();
    reporter = new MemoryReporter();
    const prober = new ReadinessProber(compose, { clock, httpGet: stubHttp(200) });
    sequencer = new PhaseSequencer(config, compose, prober, reporter);
  });

  it('should not start a phase before every gate of the previous one is ready', async () => {
    compose.healthOnUp.netbox = 'starting';
    clock.onSleep = now => {
      if (now >= 2000) {
        compose.setContainer('netbox', 'running', 'healthy');
      }
    };

    const snapshots: string[] = [];
    const up = compose.up.bind(compose);
    compose.up = async (services: string[], options?: UpOptions) => {
      snapshots.push(`${services.join(',')} @ t=${clock.now()} netbox=${compose.containers.get('netbox')?.health ?? 'absent'}`);
      return up(services, options);
    };

    const result = await sequencer.run(buildStartupPlan(config, 'netbox'));

    expect(result.success).toBe(true);
    expect(snapshots).toEqual([
      'netbox-postgres,netbox-redis,netbox-redis-cache @ t=0 netbox=absent',
      'netbox @ t=0 netbox=absent',
      'netbox-worker @ t=2000 netbox=healthy'
    ]);
    expect(compose.events).toEqual([
      'up netbox-postgres',
      'up netbox-redis',
      'up netbox-redis-cache',
      'exec netbox-postgres pg_isready',
      'exec netbox-redis redis-cli',
      'exec netbox-redis-cache redis-cli',
      'up netbox',
      'up netbox-worker'
    ]);
  });

  it('should report gate outcomes per phase', async () => {
    compose.healthOnUp.netbox = 'starting';
    clock.onSleep = now => {
      if (now >= 2000) {
        compose.setContainer('netbox', 'running', 'healthy');
      }
    };

    const result = await sequencer.run(buildStartupPlan(config, 'netbox'));

    expect(result.phases.map(phase => phase.name)).toEqual(['datastores & caches', 'web services', 'workers']);
    expect(result.phases[1].gates).toEqual([
      { service: 'netbox', method: 'health-flag', outcome: 'ready', attempts: 3, elapsedMs: 2000 },
      { service: 'netbox', method: 'http', outcome: 'ready', attempts: 1, elapsedMs: 0 }
    ]);
    expect(result.metadata.runId).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    expect(result.metadata.target).toBe('netbox');
  });

  it('should start workers with migrations disabled', async () => {
    await sequencer.run(buildStartupPlan(config, 'nautobot'));

    expect(compose.upCalls.map(call => call.options.env)).toEqual([{}, {}, { NAUTOBOT_SKIP_MIGRATIONS: 'true' }]);
  });

  it('should pass --build through to every phase', async () => {
    await sequencer.run(buildStartupPlan(config, 'netbox'), { build: true });

    expect(compose.upCalls.every(call => call.options.build === true)).toBe(true);
  });

  it('should abort on a gate timeout without starting later phases', async () => {
    compose.healthOnUp.netbox = 'unhealthy';

    const result = await sequencer.run(buildStartupPlan(config, 'netbox'));

    expect(result.success).toBe(false);
    expect(result.errors).toEqual([
      {
        code: 'GATE_TIMEOUT',
        message: 'Phase 2: netbox did not become ready (health check reports healthy) within 5s',
        details: undefined,
        remediation: 'Inspect the logs: docker compose logs netbox'
      }
    ]);
    expect(compose.upCalls.map(call => call.services)).toEqual([['netbox-postgres', 'netbox-redis', 'netbox-redis-cache'], ['netbox']]);
    expect(reporter.messages('error')).toEqual(['netbox: health check reports healthy: timed out after 5 attempts']);
  });

  it('should diagnose the fresh-install migration failure but not repair it', async () => {
    compose.healthOnUp.nautobot = 'unhealthy';
    compose.logsByService.nautobot = [
      'Applying tenancy.0003_mptt_to_tree_queries...',
      'django.db.utils.ProgrammingError: column "level" of relation "tenancy_tenantgroup" does not exist'
    ].join('\n');

    const result = await sequencer.run(buildStartupPlan(config, 'nautobot'));

    expect(result.success).toBe(false);
    expect(result.errors?.[0].remediation).toBe(
      'Run `nsot-stack fix-migration` to fake-apply that migration and apply the rest. Inspect the logs: docker compose logs nautobot'
    );
    expect(reporter.messages('warn')[0]).toContain('Migration tenancy.0003_mptt_to_tree_queries failed because column "level" does not exist');
    expect(compose.runCalls).toEqual([]);
  });

  it('should name the phase when compose fails to start it', async () => {
    vi.spyOn(compose, 'up').mockRejectedValueOnce(new CommandFailedError('docker compose up', 1, 'pull access denied'));

    const result = await sequencer.run(buildStartupPlan(config, 'netbox'));

    expect(result.errors?.[0]).toMatchObject({
      code: 'COMMAND_FAILED',
      message: 'Phase 1 (datastores & caches): `docker compose up` exited with code 1: pull access denied'
    });
  });

  it('should gate the automation service on HTTP when it is enabled', async () => {
    const httpGet = stubHttp(200);
    const prober = new ReadinessProber(compose, { clock, httpGet });

    const result = await startStack(config, compose, prober, reporter, 'nautobot', { withAutomation: true });

    expect(result.success).toBe(true);
    expect(compose.upCalls.map(call => call.services).pop()).toEqual(['nornir-automation']);
    expect(httpGet).toHaveBeenLastCalledWith('http://localhost:8082/api/docs/', 5000);
  });
});
