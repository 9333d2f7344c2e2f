import { OrchestratorConfig, StackName, StackTarget, stacksFor } from '../types/index.js';
import { ComposeRuntime } from '../runtime/types.js';
import { ReadinessProber } from '../readiness/prober.js';
import { Reporter } from '../output/reporter.js';
import { ManagementCommands } from './management-commands.js';
import { EnvironmentEcho, VerificationPass } from './verification.js';

export interface DatabaseDiagnosis {
  stack: StackName;
  accepting: boolean;
  /** Undefined when the server check already failed */
  applicationConnected?: boolean;
  error?: string;
}

export interface EnvironmentDiagnosis {
  stack: StackName;
  variables: EnvironmentEcho[];
  missing: string[];
  error?: string;
}

function lastLine(text: string): string | undefined {
  const lines = text.trim().split('\n').filter(line => line.trim().length > 0);
  return lines[lines.length - 1];
}

/**
 * Connectivity checks between each application and its database. Stops at the
 * first failing stack.
 */
export async function checkDatabases(
  config: OrchestratorConfig,
  compose: ComposeRuntime,
  prober: ReadinessProber,
  reporter: Reporter,
  target: StackTarget
): Promise<DatabaseDiagnosis[]> {
  const diagnoses: DatabaseDiagnosis[] = [];

  for (const stack of stacksFor(target)) {
    const stackConfig = config.stacks[stack];
    if (!stackConfig.enabled) {
      continue;
    }
    reporter.step(`🔍 Checking ${stackConfig.display_name} database connectivity...`);

    const server = await prober.check(
      { service: stackConfig.database_service, database: stackConfig.database },
      { kind: 'database' }
    );
    if (!server.ready) {
      reporter.error(`${stackConfig.display_name} PostgreSQL is not accepting connections`);
      reporter.hint(`Inspect the logs: ${compose.describe(['logs', stackConfig.database_service])}`);
      diagnoses.push({ stack, accepting: false, error: server.error });
      return diagnoses;
    }
    reporter.success(`${stackConfig.display_name} PostgreSQL is accepting connections`);

    const check = await new ManagementCommands(compose, stackConfig).checkDatabase();
    if (check.exitCode === 0) {
      reporter.success(`${stackConfig.display_name} can connect to its database`);
      diagnoses.push({ stack, accepting: true, applicationConnected: true });
    } else {
      const error = lastLine(check.stderr) ?? lastLine(check.stdout) ?? `exit code ${check.exitCode}`;
      reporter.error(`${stackConfig.display_name} cannot connect to its database: ${error}`);
      reporter.hint(`Run: nsot-stack check-env --${stack}-only`);
      diagnoses.push({ stack, accepting: true, applicationConnected: false, error });
      return diagnoses;
    }
  }

  return diagnoses;
}

/**
 * Echo the environment each running web service sees, flagging empty keys
 */
export async function checkEnvironment(
  config: OrchestratorConfig,
  compose: ComposeRuntime,
  prober: ReadinessProber,
  reporter: Reporter,
  target: StackTarget
): Promise<EnvironmentDiagnosis[]> {
  const verification = new VerificationPass(config, compose, prober);
  const diagnoses: EnvironmentDiagnosis[] = [];

  for (const stack of stacksFor(target)) {
    const stackConfig = config.stacks[stack];
    if (!stackConfig.enabled) {
      continue;
    }
    reporter.step(`🔍 ${stackConfig.display_name} environment (${stackConfig.web_service})`);

    try {
      const variables = await verification.readEnvironment(stack);
      const missing = variables.filter(variable => !variable.value).map(variable => variable.key);
      for (const variable of variables) {
        if (variable.value) {
          reporter.info(`  ${variable.key}=${/PASSWORD|SECRET/.test(variable.key) ? '********' : variable.value}`);
        } else {
          reporter.warn(`${variable.key} is not set`);
        }
      }
      diagnoses.push({ stack, variables, missing });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      reporter.error(message);
      diagnoses.push({ stack, variables: [], missing: [...stackConfig.environment_keys], error: message });
    }
  }

  return diagnoses;
}
