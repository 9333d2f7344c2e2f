import { CommandFailedError } from '../errors/index.js';
import { formatCommandLine } from './command-runner.js';
import { CommandResult, CommandRunner, ContainerEngine, ContainerRef, RemovalOutcome } from './types.js';

const ABSENT = /no such (container|volume|network)|not found/i;

/**
 * Engine-level listing and removal. Removing something that is already gone
 * is reported as `absent`, never as an error.
 */
export class DockerEngine implements ContainerEngine {
  constructor(private readonly runner: CommandRunner) {}

  async listContainers(): Promise<ContainerRef[]> {
    const output = await this.list(['ps', '--all', '--format', '{{.ID}} {{.Names}}']);
    return output.map(line => {
      const [id, name = ''] = line.split(/\s+/, 2);
      return { id, name };
    });
  }

  removeContainer(idOrName: string): Promise<RemovalOutcome> {
    return this.remove(['rm', '--force', idOrName]);
  }

  listVolumes(): Promise<string[]> {
    return this.list(['volume', 'ls', '--format', '{{.Name}}']);
  }

  removeVolume(name: string): Promise<RemovalOutcome> {
    return this.remove(['volume', 'rm', name]);
  }

  listNetworks(): Promise<string[]> {
    return this.list(['network', 'ls', '--format', '{{.Name}}']);
  }

  removeNetwork(name: string): Promise<RemovalOutcome> {
    return this.remove(['network', 'rm', name]);
  }

  async pruneDanglingImages(): Promise<void> {
    const result = await this.runner.run('docker', ['image', 'prune', '--force']);
    this.assertSucceeded(['image', 'prune', '--force'], result);
  }

  private async list(args: string[]): Promise<string[]> {
    const result = await this.runner.run('docker', args);
    this.assertSucceeded(args, result);
    return result.stdout
      .split('\n')
      .map(line => line.trim())
      .filter(line => line.length > 0);
  }

  private async remove(args: string[]): Promise<RemovalOutcome> {
    const result = await this.runner.run('docker', args);
    if (result.exitCode === 0) {
      return 'removed';
    }
    if (ABSENT.test(result.stderr)) {
      return 'absent';
    }
    throw new CommandFailedError(formatCommandLine('docker', args), result.exitCode, result.stderr);
  }

  private assertSucceeded(args: string[], result: CommandResult): void {
    if (result.exitCode !== 0) {
      throw new CommandFailedError(formatCommandLine('docker', args), result.exitCode, result.stderr);
    }
  }
}
