import { StackConfig, SuperuserCredentials } from '../types/index.js';
import { CommandFailedError } from '../errors/index.js';
import { CommandResult, ComposeRuntime } from '../runtime/types.js';

export interface MigrationEntry {
  name: string;
  applied: boolean;
}

export type MigrationState = Record<string, MigrationEntry[]>;

/**
 * Parse `showmigrations` output:
 *
 *     tenancy
 *      [X] 0001_initial
 *      [ ] 0003_mptt_to_tree_queries
 */
export function parseShowMigrations(output: string): MigrationState {
  const state: MigrationState = {};
  let current: MigrationEntry[] | undefined;

  for (const line of output.split('\n')) {
    const entry = /^\s+\[( |X|-)\]\s+(\S+)/.exec(line);
    if (entry) {
      current?.push({ name: entry[2], applied: entry[1] === 'X' });
      continue;
    }
    const header = /^([A-Za-z_][\w.]*)\s*$/.exec(line);
    if (header) {
      current = [];
      state[header[1]] = current;
    }
  }

  return state;
}

const USERNAME_VARIABLE = 'NSOT_STACK_USERNAME';

function userExistsScript(settingsModule: string): string {
  return [
    'import os, sys, django',
    `os.environ.setdefault("DJANGO_SETTINGS_MODULE", "${settingsModule}")`,
    'django.setup()',
    'from django.contrib.auth import get_user_model',
    `name = os.environ.get("${USERNAME_VARIABLE}", "")`,
    'sys.stdout.write("1" if get_user_model().objects.filter(username=name).exists() else "0")'
  ].join('\n');
}

/**
 * Django management commands of one application, run in a throwaway container
 * of its web service (`compose run --rm`), or in the running one for read-only checks.
 */
export class ManagementCommands {
  constructor(
    private readonly compose: ComposeRuntime,
    private readonly stack: StackConfig
  ) {}

  async showMigrations(appLabel: string): Promise<MigrationEntry[]> {
    const result = await this.run(['showmigrations', appLabel]);
    this.assertSucceeded(['showmigrations', appLabel], result);
    return parseShowMigrations(result.stdout)[appLabel] ?? [];
  }

  async fakeApply(appLabel: string, migration: string): Promise<void> {
    const args = ['migrate', appLabel, migration, '--fake'];
    this.assertSucceeded(args, await this.run(args));
  }

  /** Captured output is returned so callers can diagnose failures */
  applyAll(): Promise<CommandResult> {
    return this.run(['migrate', '--noinput']);
  }

  async collectStatic(): Promise<void> {
    const args = ['collectstatic', '--noinput'];
    this.assertSucceeded(args, await this.run(args));
  }

  checkDatabase(): Promise<CommandResult> {
    return this.compose.exec(this.stack.web_service, [...this.stack.management_command, 'check', '--database', 'default']);
  }

  async userExists(username: string): Promise<boolean> {
    const result = await this.compose.run(this.stack.web_service, ['python3', '-c', userExistsScript(this.stack.settings_module)], {
      env: { [USERNAME_VARIABLE]: username },
      passEnv: [USERNAME_VARIABLE]
    });
    this.assertSucceeded(['user-exists', username], result);
    const lines = result.stdout.trim().split('\n');
    return lines[lines.length - 1]?.trim() === '1';
  }

  createSuperuser(credentials: SuperuserCredentials): Promise<CommandResult> {
    const env = {
      DJANGO_SUPERUSER_USERNAME: credentials.username,
      DJANGO_SUPERUSER_EMAIL: credentials.email,
      DJANGO_SUPERUSER_PASSWORD: credentials.password
    };
    return this.compose.run(this.stack.web_service, [...this.stack.management_command, 'createsuperuser', '--noinput'], {
      env,
      passEnv: Object.keys(env)
    });
  }

  describe(args: string[]): string {
    return this.compose.describe(['run', '--rm', this.stack.web_service, ...this.stack.management_command, ...args]);
  }

  private run(args: string[]): Promise<CommandResult> {
    return this.compose.run(this.stack.web_service, [...this.stack.management_command, ...args]);
  }

  private assertSucceeded(args: string[], result: CommandResult): void {
    if (result.exitCode !== 0) {
      throw new CommandFailedError(this.describe(args), result.exitCode, result.stderr || result.stdout, {
        remediation: `Inspect the logs: ${this.compose.describe(['logs', this.stack.web_service])}`
      });
    }
  }
}
