import { describe, it, expect, beforeEach } from 'vitest';
import { ComposeClient, ComposeProject } from '../compose-client.js';
import { ComposeInvocation } from '../types.js';
import { CommandFailedError } from '../../errors/index.js';
import { ScriptedRunner, failed, ok } from '../../__tests__/support/fakes.js';

const PLUGIN: ComposeInvocation = { kind: 'plugin', command: 'docker', baseArgs: ['compose'] };
const LEGACY: ComposeInvocation = { kind: 'legacy', command: 'docker-compose', baseArgs: [] };

describe('ComposeClient', () => {
  let runner: ScriptedRunner;
  const project: ComposeProject = {
    name: 'unified-docker',
    directory: '/srv/unified-docker',
    composeFiles: [],
    environment: { NETBOX_DB_HOST: 'db.internal' }
  };

  beforeEach(() => {
    runner = new ScriptedRunner();
  });

  describe('up', () => {
    it('should start only the named services, without their dependencies', async () => {
      const client = new ComposeClient(PLUGIN, project, runner);

      await client.up(['netbox-worker'], { env: { NETBOX_SKIP_MIGRATIONS: 'true' } });

      expect(runner.calls).toEqual([
        {
          command: 'docker',
          args: ['compose', '-p', 'unified-docker', 'up', '-d', '--no-deps', 'netbox-worker'],
          options: {
            cwd: '/srv/unified-docker',
            env: { NETBOX_DB_HOST: 'db.internal', NETBOX_SKIP_MIGRATIONS: 'true' },
            inherit: true
          }
        }
      ]);
    });

    it('should pass --build and the compose files', async () => {
      const client = new ComposeClient(LEGACY, { ...project, composeFiles: ['docker-compose.yml', 'override.yml'] }, runner);

      await client.up(['netbox'], { build: true });

      expect(runner.lines()).toEqual([
        'docker-compose -p unified-docker -f docker-compose.yml -f override.yml up -d --no-deps --build netbox'
      ]);
    });

    it('should throw when compose fails', async () => {
      runner.on(/ up /, failed('no such service: netbox-typo'));
      const client = new ComposeClient(PLUGIN, project, runner);

      await expect(client.up(['netbox-typo'])).rejects.toBeInstanceOf(CommandFailedError);
      await expect(client.up(['netbox-typo'])).rejects.toThrow(
        '`docker compose -p unified-docker up -d --no-deps netbox-typo` exited with code 1: no such service: netbox-typo'
      );
    });
  });

  describe('exec and run', () => {
    it('should pass secrets by variable name only', async () => {
      const client = new ComposeClient(PLUGIN, project, runner);

      await client.run('nautobot', ['nautobot-server', 'createsuperuser', '--noinput'], {
        env: { DJANGO_SUPERUSER_PASSWORD: 'test-secret' },
        passEnv: ['DJANGO_SUPERUSER_PASSWORD']
      });

      expect(runner.calls[0].args).toEqual([
        'compose',
        '-p',
        'unified-docker',
        'run',
        '--rm',
        '-T',
        '-e',
        'DJANGO_SUPERUSER_PASSWORD',
        'nautobot',
        'nautobot-server',
        'createsuperuser',
        '--noinput'
      ]);
      expect(runner.calls[0].options?.env).toEqual({ NETBOX_DB_HOST: 'db.internal', DJANGO_SUPERUSER_PASSWORD: 'test-secret' });
    });

    it('should exec as another user without a TTY', async () => {
      const client = new ComposeClient(PLUGIN, project, runner);

      const result = await client.exec('netbox-redis', ['redis-cli', 'ping'], { user: 'redis' });

      expect(result.exitCode).toBe(0);
      expect(runner.lines()).toEqual(['docker compose -p unified-docker exec -T -u redis netbox-redis redis-cli ping']);
    });

    it('should return a failing exit code instead of throwing', async () => {
      runner.on(/ exec /, failed('service "netbox" is not running'));
      const client = new ComposeClient(PLUGIN, project, runner);

      await expect(client.exec('netbox', ['env'])).resolves.toEqual(failed('service "netbox" is not running'));
    });
  });

  describe('ps', () => {
    it('should read compose JSON status', async () => {
      runner.on(
        'docker compose -p unified-docker ps --all --format json netbox',
        ok(JSON.stringify({ Name: 'unified-docker-netbox-1', Service: 'netbox', State: 'running', Health: 'starting', Status: '' }))
      );
      const client = new ComposeClient(PLUGIN, project, runner);

      const statuses = await client.ps(['netbox']);

      expect(statuses).toHaveLength(1);
      expect(statuses[0].health).toBe('starting');
    });

    it('should list containers through docker ps for the legacy binary', async () => {
      runner.on(
        /^docker ps/,
        ok(
          [
            JSON.stringify({ Names: 'unified-docker_netbox_1', Labels: 'com.docker.compose.service=netbox', State: 'running', Status: 'Up 1 minute (healthy)' }),
            JSON.stringify({ Names: 'unified-docker_netbox-worker_1', Labels: 'com.docker.compose.service=netbox-worker', State: 'running', Status: 'Up 1 minute' })
          ].join('\n')
        )
      );
      const client = new ComposeClient(LEGACY, project, runner);

      const statuses = await client.ps(['netbox']);

      expect(runner.lines()).toEqual([
        "docker ps --all --filter label=com.docker.compose.project=unified-docker --format {{json .}}"
      ]);
      expect(statuses.map(status => status.service)).toEqual(['netbox']);
    });
  });

  describe('cleanup commands', () => {
    it('should remove the services of one stack with rm --stop --force', async () => {
      const client = new ComposeClient(PLUGIN, project, runner);

      await client.removeServices(['nautobot', 'nautobot-worker']);
      await client.removeServices([]);

      expect(runner.lines()).toEqual(['docker compose -p unified-docker rm --stop --force nautobot nautobot-worker']);
    });

    it('should bring the project down with orphans', async () => {
      const client = new ComposeClient(PLUGIN, project, runner);

      await client.down({ removeOrphans: true });

      expect(runner.lines()).toEqual(['docker compose -p unified-docker down --remove-orphans']);
    });
  });

  it('should combine stdout and stderr of logs', async () => {
    runner.on(/ logs /, { exitCode: 0, stdout: 'Applying tenancy.0003_mptt_to_tree_queries...', stderr: 'column "level" does not exist' });
    const client = new ComposeClient(PLUGIN, project, runner);

    const logs = await client.logs('nautobot', 50);

    expect(logs).toBe('Applying tenancy.0003_mptt_to_tree_queries...\ncolumn "level" does not exist');
    expect(runner.lines()).toEqual(['docker compose -p unified-docker logs --no-color --tail 50 nautobot']);
  });

  it('should describe commands with the resolved invocation', () => {
    expect(new ComposeClient(LEGACY, project, runner).describe(['logs', 'netbox'])).toBe('docker-compose logs netbox');
  });
});
