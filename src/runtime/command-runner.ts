import { execa } from 'execa';
import { CommandResult, CommandRunner, RunOptions } from './types.js';
import { Reporter } from '../output/reporter.js';

/** Exit code shells use for "command not found" */
export const COMMAND_NOT_FOUND = 127;

/**
 * Runs docker / compose processes through execa. Never rejects on a non-zero
 * exit: callers decide what a failure means.
 */
export class ExecaCommandRunner implements CommandRunner {
  constructor(private readonly reporter?: Reporter) {}

  async run(command: string, args: string[], options: RunOptions = {}): Promise<CommandResult> {
    this.reporter?.debug(`$ ${formatCommandLine(command, args)}`);

    const result = await execa(command, args, {
      cwd: options.cwd,
      env: options.env,
      extendEnv: true,
      timeout: options.timeoutMs,
      reject: false,
      stdin: options.inherit ? 'inherit' : 'ignore',
      stdout: options.inherit ? 'inherit' : 'pipe',
      stderr: options.inherit ? 'inherit' : 'pipe'
    });

    // Spawn failures (ENOENT) carry no exit code
    const exitCode = typeof result.exitCode === 'number' ? result.exitCode : COMMAND_NOT_FOUND;

    return {
      exitCode,
      stdout: typeof result.stdout === 'string' ? result.stdout : '',
      stderr: typeof result.stderr === 'string' ? result.stderr : ''
    };
  }
}

export function formatCommandLine(command: string, args: string[]): string {
  return [command, ...args]
    .map(part => (/^[\w@%+=:,./{}-]+$/.test(part) ? part : `'${part.replace(/'/g, `'\\''`)}'`))
    .join(' ');
}
