import { describe, it, expect, beforeEach } from 'vitest';
import { VerificationPass, pickEnvironment } from '../verification.js';
import { ReadinessProber } from '../../readiness/prober.js';
import { OrchestratorConfig } from '../../types/index.js';
import { FakeComposeRuntime, ManualClock, failed, ok, stubHttp, testConfig } from '../../__tests__/support/fakes.js';

const NETBOX_ENV = ['DB_HOST=netbox-postgres', 'DB_NAME=netbox', 'DB_USER=netbox', 'REDIS_HOST=netbox-redis', 'ALLOWED_HOSTS=*'].join('\n');

describe('pickEnvironment', () => {
  it('should keep values that contain "="', () => {
    expect(pickEnvironment('A=1\nB=x=y\nnoise', ['B', 'C'])).toEqual([
      { key: 'B', value: 'x=y' },
      { key: 'C', value: undefined }
    ]);
  });
});

describe('VerificationPass', () => {
  let config: OrchestratorConfig;
  let compose: FakeComposeRuntime;
  let httpGet: ReturnType<typeof stubHttp>;
  let environment: string;

  beforeEach(() => {
    config = testConfig();
    compose = new FakeComposeRuntime();
    httpGet = stubHttp(200);
    environment = NETBOX_ENV;

    for (const service of config.stacks.netbox.services) {
      compose.setContainer(service.name, 'running', service.role === 'web' ? 'healthy' : 'none');
    }
    compose.setContainer('nautobot', 'exited', 'unhealthy');
    compose.onExec = (_service, command) => (command[0] === 'env' ? ok(environment) : undefined);
  });

  function verification(): VerificationPass {
    return new VerificationPass(config, compose, new ReadinessProber(compose, { clock: new ManualClock(), httpGet }));
  }

  it('should report a healthy stack with every check passing', async () => {
    const report = await verification().run('netbox');

    expect(report.status).toBe('healthy');
    expect(report.healthyCount).toBe(5);
    expect(report.totalCount).toBe(5);
    expect(report.suggestions).toEqual([]);
    expect(report.checks.map(check => check.detail)).toEqual([
      'NetBox is healthy',
      'NetBox PostgreSQL: connected',
      'NetBox web interface accessible at http://localhost:8080',
      'NetBox environment variables configured correctly'
    ]);
    expect(httpGet).toHaveBeenCalledWith('http://localhost:8080/login/', 5000);
  });

  it('should only count services of the targeted stacks', async () => {
    const report = await verification().run('netbox');

    expect(report.statuses.map(status => status.service)).not.toContain('nautobot');
  });

  it('should suggest a clean restart and the logs of unhealthy services', async () => {
    compose.setContainer('netbox', 'running', 'unhealthy');

    const report = await verification().run('netbox');

    expect(report.status).toBe('degraded');
    expect(report.healthyCount).toBe(4);
    expect(report.checks[0]).toMatchObject({
      passed: false,
      detail: 'NetBox is not healthy (unhealthy)',
      suggestion: 'Try: docker compose logs netbox'
    });
    expect(report.suggestions).toEqual(['nsot-stack cleanup --db && nsot-stack start --clean', 'docker compose logs netbox']);
  });

  it('should fall back to a generic logs suggestion when only a check failed', async () => {
    environment = 'DB_HOST=netbox-postgres';

    const report = await verification().run('netbox');

    expect(report.status).toBe('degraded');
    expect(report.checks[3]).toMatchObject({
      passed: false,
      detail: 'NetBox environment is missing DB_NAME, DB_USER, REDIS_HOST, ALLOWED_HOSTS',
      suggestion: 'Run: nsot-stack check-env --netbox-only'
    });
    expect(report.suggestions).toEqual(['nsot-stack cleanup --db && nsot-stack start --clean', 'docker compose logs [service-name]']);
  });

  it('should report an unreachable web interface with the probed URL', async () => {
    httpGet.mockRejectedValue(new Error('connect ECONNREFUSED 127.0.0.1:8080'));

    const report = await verification().run('netbox');

    expect(report.checks[2].detail).toBe('NetBox web interface not accessible at http://localhost:8080/login/ (connect ECONNREFUSED 127.0.0.1:8080)');
  });

  it('should be degraded when nothing is running', async () => {
    compose.containers.clear();

    const report = await verification().run('nautobot');

    expect(report.status).toBe('degraded');
    expect(report.healthyCount).toBe(0);
    expect(report.totalCount).toBe(5);
    expect(report.checks.map(check => check.passed)).toEqual([false, false, true, false, false, false, false, false, false]);
  });

  it('should count a service without a container as unhealthy', async () => {
    compose.containers.delete('netbox-worker');

    const report = await verification().run('netbox');

    expect(report.status).toBe('degraded');
    expect(report.healthyCount).toBe(4);
    expect(report.totalCount).toBe(5);
    expect(report.checks[4]).toEqual({
      category: 'health',
      name: 'netbox-worker container',
      passed: false,
      detail: 'netbox-worker is not created',
      suggestion: 'Try: docker compose logs netbox-worker'
    });
    expect(report.suggestions).toEqual(['nsot-stack cleanup --db && nsot-stack start --clean', 'docker compose logs netbox-worker']);
  });

  it('should surface a failing environment read', async () => {
    compose.onExec = (_service, command) => (command[0] === 'env' ? failed('service "netbox" is not running') : undefined);

    await expect(verification().readEnvironment('netbox')).rejects.toThrow(
      'Could not read the environment of netbox: service "netbox" is not running'
    );
  });
});
