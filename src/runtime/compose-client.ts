import { CommandFailedError } from '../errors/index.js';
import { formatCommandLine } from './command-runner.js';
import { parseComposePs, parseDockerPs } from './status-parser.js';
import {
  CommandResult,
  CommandRunner,
  ComposeInvocation,
  ComposeRuntime,
  ServiceCommandOptions,
  ServiceStatus,
  UpOptions
} from './types.js';

export interface ComposeProject {
  name: string;
  directory: string;
  composeFiles: string[];
  /** Forwarded to every compose process */
  environment: Record<string, string>;
}

/**
 * Issues compose commands with the invocation form preflight resolved
 */
export class ComposeClient implements ComposeRuntime {
  constructor(
    readonly invocation: ComposeInvocation,
    private readonly project: ComposeProject,
    private readonly runner: CommandRunner
  ) {}

  async up(services: string[], options: UpOptions = {}): Promise<void> {
    const args = ['up', '-d', '--no-deps'];
    if (options.build) {
      args.push('--build');
    }
    await this.required([...args, ...services], { env: options.env, inherit: true });
  }

  async down(options: { removeOrphans?: boolean } = {}): Promise<void> {
    const args = ['down'];
    if (options.removeOrphans) {
      args.push('--remove-orphans');
    }
    await this.required(args);
  }

  async removeServices(services: string[]): Promise<void> {
    if (services.length === 0) {
      return;
    }
    await this.required(['rm', '--stop', '--force', ...services]);
  }

  async restart(services: string[]): Promise<void> {
    await this.required(['restart', ...services]);
  }

  async ps(services: string[] = []): Promise<ServiceStatus[]> {
    if (this.invocation.kind === 'legacy') {
      const result = await this.runner.run('docker', [
        'ps',
        '--all',
        '--filter',
        `label=com.docker.compose.project=${this.project.name}`,
        '--format',
        '{{json .}}'
      ]);
      this.assertSucceeded('docker', ['ps'], result);
      const statuses = parseDockerPs(result.stdout);
      return services.length === 0 ? statuses : statuses.filter(status => services.includes(status.service));
    }

    const result = await this.compose(['ps', '--all', '--format', 'json', ...services]);
    this.assertSucceeded(this.invocation.command, this.composeArgs(['ps', ...services]), result);
    return parseComposePs(result.stdout);
  }

  exec(service: string, command: string[], options: ServiceCommandOptions = {}): Promise<CommandResult> {
    return this.compose(['exec', '-T', ...this.serviceFlags(options), service, ...command], {
      env: options.env,
      inherit: options.inherit,
      timeoutMs: options.timeoutMs
    });
  }

  run(service: string, command: string[], options: ServiceCommandOptions = {}): Promise<CommandResult> {
    return this.compose(['run', '--rm', '-T', ...this.serviceFlags(options), service, ...command], {
      env: options.env,
      inherit: options.inherit
    });
  }

  async logs(service: string, tail: number = 200): Promise<string> {
    const result = await this.compose(['logs', '--no-color', '--tail', String(tail), service]);
    return `${result.stdout}\n${result.stderr}`;
  }

  describe(args: string[]): string {
    return formatCommandLine(this.invocation.command, [...this.invocation.baseArgs, ...args]);
  }

  private serviceFlags(options: ServiceCommandOptions): string[] {
    const flags: string[] = [];
    if (options.user) {
      flags.push('-u', options.user);
    }
    for (const name of options.passEnv ?? []) {
      flags.push('-e', name);
    }
    return flags;
  }

  private composeArgs(args: string[]): string[] {
    const fileArgs = this.project.composeFiles.flatMap(file => ['-f', file]);
    return [...this.invocation.baseArgs, '-p', this.project.name, ...fileArgs, ...args];
  }

  private compose(
    args: string[],
    options: { env?: Record<string, string>; inherit?: boolean; timeoutMs?: number } = {}
  ): Promise<CommandResult> {
    return this.runner.run(this.invocation.command, this.composeArgs(args), {
      cwd: this.project.directory,
      env: { ...this.project.environment, ...options.env },
      inherit: options.inherit,
      timeoutMs: options.timeoutMs
    });
  }

  private async required(args: string[], options: { env?: Record<string, string>; inherit?: boolean } = {}): Promise<void> {
    const result = await this.compose(args, options);
    this.assertSucceeded(this.invocation.command, this.composeArgs(args), result);
  }

  private assertSucceeded(command: string, args: string[], result: CommandResult): void {
    if (result.exitCode !== 0) {
      throw new CommandFailedError(formatCommandLine(command, args), result.exitCode, result.stderr, {
        remediation: `Inspect the compose project: ${this.describe(['ps', '--all'])}`
      });
    }
  }
}
