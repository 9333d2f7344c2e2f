import { OrchestratorConfig, StackName, SuperuserCredentials } from '../types/index.js';
import { CommandFailedError } from '../errors/index.js';
import { ComposeRuntime } from '../runtime/types.js';
import { Reporter } from '../output/reporter.js';
import { ManagementCommands } from './management-commands.js';

export type SuperuserOutcome = 'created' | 'exists';

const ALREADY_TAKEN = /already taken|already exists/i;

/**
 * Creates a superuser unless one with the same username is already there
 */
export class SuperuserProvisioner {
  constructor(
    private readonly config: OrchestratorConfig,
    private readonly compose: ComposeRuntime,
    private readonly reporter: Reporter
  ) {}

  async ensure(stackName: StackName, credentials: SuperuserCredentials): Promise<SuperuserOutcome> {
    const stack = this.config.stacks[stackName];
    const commands = new ManagementCommands(this.compose, stack);

    this.reporter.info(`🔎 Checking ${stack.display_name} for existing user '${credentials.username}'...`);
    if (await commands.userExists(credentials.username)) {
      this.reporter.info(`ℹ️  ${stack.display_name} user '${credentials.username}' already exists, skipping creation`);
      return 'exists';
    }

    this.reporter.info(`👤 Creating ${stack.display_name} superuser '${credentials.username}'...`);
    const result = await commands.createSuperuser(credentials);
    if (result.exitCode === 0) {
      this.reporter.success(`${stack.display_name} superuser created`);
      return 'created';
    }
    if (ALREADY_TAKEN.test(`${result.stdout}\n${result.stderr}`)) {
      this.reporter.info(`ℹ️  ${stack.display_name} user '${credentials.username}' already exists, skipping creation`);
      return 'exists';
    }
    throw new CommandFailedError(commands.describe(['createsuperuser', '--noinput']), result.exitCode, result.stderr, {
      remediation: `Inspect the logs: ${this.compose.describe(['logs', stack.web_service])}`,
      service: stack.web_service
    });
  }
}
