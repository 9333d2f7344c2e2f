import { describe, it, expect, beforeEach } from 'vitest';
import { MigrationRepair, findRepairableStack } from '../migration-repair.js';
import { MigrationEntry, parseShowMigrations } from '../management-commands.js';
import { ReadinessProber } from '../../readiness/prober.js';
import { MemoryReporter } from '../../output/reporter.js';
import { OrchestratorError, SafetyCheckError } from '../../errors/index.js';
import { OrchestratorConfig } from '../../types/index.js';
import { FakeComposeRuntime, ManualClock, failed, ok, testConfig } from '../../__tests__/support/fakes.js';

function render(entries: MigrationEntry[]): string {
  return ['tenancy', ...entries.map(entry => ` [${entry.applied ? 'X' : ' '}] ${entry.name}`)].join('\n');
}

describe('parseShowMigrations', () => {
  it('should group migrations under their app label', () => {
    const output = ['dcim', ' [X] 0001_initial', 'tenancy', ' [X] 0001_initial', ' [ ] 0002_tenant_group'].join('\n');

    expect(parseShowMigrations(output)).toEqual({
      dcim: [{ name: '0001_initial', applied: true }],
      tenancy: [
        { name: '0001_initial', applied: true },
        { name: '0002_tenant_group', applied: false }
      ]
    });
  });
});

describe('MigrationRepair', () => {
  let config: OrchestratorConfig;
  let compose: FakeComposeRuntime;
  let reporter: MemoryReporter;
  let prober: ReadinessProber;
  let state: MigrationEntry[];
  let legacyColumns: string;

  beforeEach(() => {
    config = testConfig();
    compose = new FakeComposeRuntime();
    reporter = new MemoryReporter();
    prober = new ReadinessProber(compose, { clock: new ManualClock() });
    legacyColumns = '';
    state = [
      { name: '0001_initial', applied: true },
      { name: '0002_tenant_fields', applied: true },
      { name: '0003_mptt_to_tree_queries', applied: false },
      { name: '0004_tenant_group_tree', applied: false }
    ];

    compose.setContainer('nautobot', 'running', 'healthy');
    compose.onRun = (_service, command) => {
      if (command.includes('showmigrations')) {
        return ok(render(state));
      }
      if (command.includes('--fake')) {
        state = state.map(entry => (entry.name === command[3] ? { ...entry, applied: true } : entry));
        return ok();
      }
      if (command.includes('migrate')) {
        state = state.map(entry => ({ ...entry, applied: true }));
        return ok();
      }
      return undefined;
    };
    compose.onExec = (service, command) => (service === 'nautobot-postgres' && command[0] === 'psql' ? ok(legacyColumns) : undefined);
  });

  function repair(): MigrationRepair {
    return new MigrationRepair(config, 'nautobot', compose, prober, reporter);
  }

  it('should fake the broken migration and then apply the rest', async () => {
    const report = await repair().run();

    expect(report.status).toBe('repaired');
    expect(report.afterFake?.map(entry => entry.applied)).toEqual([true, true, true, false]);
    expect(report.after.every(entry => entry.applied)).toBe(true);
    expect(compose.runCalls.map(call => call.command.slice(1).join(' '))).toEqual([
      'showmigrations tenancy',
      'migrate tenancy 0003_mptt_to_tree_queries --fake',
      'showmigrations tenancy',
      'migrate --noinput',
      'showmigrations tenancy'
    ]);
  });

  it('should be a no-op the second time', async () => {
    await repair().run();
    const callsAfterFirst = compose.runCalls.length;

    const report = await repair().run();

    expect(report.status).toBe('already-applied');
    expect(compose.runCalls.slice(callsAfterFirst).map(call => call.command.slice(1).join(' '))).toEqual(['showmigrations tenancy']);
  });

  it('should query the live schema for the legacy columns', async () => {
    const queries: string[][] = [];
    compose.onExec = (service, command) => {
      queries.push([service, ...command]);
      return ok();
    };

    await repair().run();

    expect(queries).toEqual([
      [
        'nautobot-postgres',
        'psql',
        '-U',
        'nautobot',
        '-d',
        'nautobot',
        '-tAc',
        "SELECT column_name FROM information_schema.columns WHERE table_name = 'tenancy_tenantgroup' AND column_name IN ('level', 'lft', 'rght', 'tree_id')"
      ]
    ]);
  });

  it('should refuse to fake the migration while the legacy columns exist', async () => {
    legacyColumns = 'level\nlft\n';

    const attempt = repair().run();

    await expect(attempt).rejects.toBeInstanceOf(SafetyCheckError);
    await expect(attempt).rejects.toMatchObject({ code: 'LEGACY_COLUMNS_PRESENT', details: { columns: ['level', 'lft'] } });
    expect(compose.runCalls.some(call => call.command.includes('--fake'))).toBe(false);
  });

  it('should refuse when earlier migrations are still pending', async () => {
    state[1] = { name: '0002_tenant_fields', applied: false };

    await expect(repair().run()).rejects.toMatchObject({ code: 'EARLIER_MIGRATIONS_PENDING' });
    expect(compose.runCalls).toHaveLength(1);
  });

  it('should stop when the schema cannot be inspected', async () => {
    compose.onExec = () => failed('psql: error: connection refused');

    await expect(repair().run()).rejects.toMatchObject({ code: 'COMMAND_FAILED' });
  });

  it('should require the web service to be running', async () => {
    compose.containers.clear();

    await expect(repair().run()).rejects.toMatchObject({ code: 'SERVICE_NOT_RUNNING' });
    expect(compose.runCalls).toEqual([]);
  });

  it('should accept a container that keeps restarting', async () => {
    compose.setContainer('nautobot', 'restarting', 'starting');

    const report = await repair().run();

    expect(report.status).toBe('repaired');
  });

  it('should restart the application services and wait for health', async () => {
    const report = await repair().run({ restart: true });

    expect(report.restarted).toBe(true);
    expect(report.healthy).toBe(true);
    expect(compose.events.filter(event => event.startsWith('restart'))).toEqual([
      'restart nautobot',
      'restart nautobot-worker',
      'restart nautobot-beat'
    ]);
  });

  it('should reject a stack without a repair descriptor', () => {
    expect(() => new MigrationRepair(config, 'netbox', compose, prober, reporter)).toThrow(OrchestratorError);
  });

  it('should find the stack that carries a repair descriptor', () => {
    expect(findRepairableStack(config)).toBe('nautobot');
  });
});
