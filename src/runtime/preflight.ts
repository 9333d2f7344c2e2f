import { PreconditionError } from '../errors/index.js';
import { CommandRunner, ComposeInvocation } from './types.js';

const PLUGIN: ComposeInvocation = { kind: 'plugin', command: 'docker', baseArgs: ['compose'] };
const LEGACY: ComposeInvocation = { kind: 'legacy', command: 'docker-compose', baseArgs: [] };

/**
 * Pick the compose invocation form for the rest of the run: the `docker compose`
 * plugin when it answers, the standalone `docker-compose` binary otherwise.
 */
export async function resolveComposeInvocation(runner: CommandRunner): Promise<ComposeInvocation> {
  const plugin = await runner.run(PLUGIN.command, [...PLUGIN.baseArgs, 'version']);
  if (plugin.exitCode === 0) {
    return PLUGIN;
  }

  const legacy = await runner.run(LEGACY.command, ['version']);
  if (legacy.exitCode === 0) {
    return LEGACY;
  }

  throw new PreconditionError('RUNTIME_UNAVAILABLE', "Neither 'docker compose' nor 'docker-compose' is available", {
    remediation: 'Install Docker Engine with the Compose plugin (or docker-compose) and make sure it is on PATH'
  });
}

export async function ensureDaemonReachable(runner: CommandRunner): Promise<string> {
  const info = await runner.run('docker', ['info', '--format', '{{.ServerVersion}}']);
  if (info.exitCode !== 0) {
    throw new PreconditionError('DAEMON_UNREACHABLE', 'The Docker daemon is not reachable', {
      remediation: 'Start Docker and check that your user may access the daemon: docker info',
      details: info.stderr.trim()
    });
  }
  return info.stdout.trim();
}

export function describeInvocation(invocation: ComposeInvocation): string {
  return [invocation.command, ...invocation.baseArgs].join(' ');
}

export interface PreflightResult {
  invocation: ComposeInvocation;
  serverVersion: string;
}

export async function runPreflight(runner: CommandRunner): Promise<PreflightResult> {
  const invocation = await resolveComposeInvocation(runner);
  const serverVersion = await ensureDaemonReachable(runner);
  return { invocation, serverVersion };
}
