import { describe, it, expect, beforeEach } from 'vitest';
import { NautobotInitializer } from '../nautobot-init.js';
import { ReadinessProber } from '../../readiness/prober.js';
import { MemoryReporter } from '../../output/reporter.js';
import { FakeComposeRuntime, ManualClock, failed, ok, testConfig } from '../../__tests__/support/fakes.js';

describe('NautobotInitializer', () => {
  let compose: FakeComposeRuntime;
  let reporter: MemoryReporter;
  let initializer: NautobotInitializer;

  beforeEach(() => {
    const config = testConfig();
    compose = new FakeComposeRuntime();
    reporter = new MemoryReporter();
    initializer = new NautobotInitializer(config, compose, new ReadinessProber(compose, { clock: new ManualClock() }), reporter);
  });

  it('should start only the datastores, then prepare, migrate and collect static files', async () => {
    const report = await initializer.run();

    expect(report.datastores.success).toBe(true);
    expect(compose.upCalls.map(call => call.services)).toEqual([['nautobot-postgres', 'nautobot-redis']]);
    expect(compose.runCalls.map(call => [call.service, call.command.join(' '), call.options.user ?? ''])).toEqual([
      [
        'nautobot',
        'bash -lc mkdir -p /opt/nautobot/media/devicetype-images /opt/nautobot/static && chown -R nautobot:nautobot /opt/nautobot',
        '0'
      ],
      ['nautobot', 'nautobot-server migrate --noinput', ''],
      ['nautobot', 'nautobot-server collectstatic --noinput', '']
    ]);
    expect(report.superuser).toBeUndefined();
    expect(reporter.messages('hint')).toEqual([
      'No NAUTOBOT_SUPERUSER_* settings found; create one later with: nsot-stack create-user --nautobot-only'
    ]);
  });

  it('should create the superuser when credentials are configured', async () => {
    compose.onRun = (_service, command) => (command[0] === 'python3' ? ok('0') : undefined);

    const report = await initializer.run({ username: 'admin', email: 'admin@example.com', password: 'test-secret' });

    expect(report.superuser).toBe('created');
  });

  it('should stop before migrating when the datastores never become ready', async () => {
    compose.onExec = (service, command) => (service === 'nautobot-postgres' && command[0] === 'pg_isready' ? failed('no response', 2) : undefined);

    await expect(initializer.run()).rejects.toMatchObject({ code: 'GATE_TIMEOUT' });
    expect(compose.runCalls).toEqual([]);
  });

  it('should point at the repair when migrations hit the legacy column failure', async () => {
    compose.onRun = (_service, command) =>
      command.includes('migrate')
        ? failed(
            [
              'Applying tenancy.0003_mptt_to_tree_queries...',
              'django.db.utils.ProgrammingError: column "lft" of relation "tenancy_tenantgroup" does not exist'
            ].join('\n')
          )
        : undefined;

    await expect(initializer.run()).rejects.toMatchObject({
      code: 'COMMAND_FAILED',
      remediation: 'Run `nsot-stack fix-migration` to fake-apply that migration and apply the rest'
    });
    expect(reporter.messages('warn')[0]).toContain('Migration tenancy.0003_mptt_to_tree_queries failed because column "lft" does not exist');
    expect(compose.runCalls.some(call => call.command.includes('collectstatic'))).toBe(false);
  });

  it('should fail when the data directories cannot be prepared', async () => {
    compose.onRun = (_service, command) => (command[0] === 'bash' ? failed('chown: invalid user: nautobot:nautobot') : undefined);

    await expect(initializer.run()).rejects.toMatchObject({ code: 'COMMAND_FAILED' });
    expect(compose.runCalls).toHaveLength(1);
  });
});
