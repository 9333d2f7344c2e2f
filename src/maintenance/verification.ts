import { OrchestratorConfig, StackName, StackTarget, stacksFor } from '../types/index.js';
import { ComposeRuntime, ServiceStatus } from '../runtime/types.js';
import { isServiceHealthy } from '../runtime/status-parser.js';
import { ReadinessProber, joinUrl } from '../readiness/prober.js';

export type CheckCategory = 'health' | 'database' | 'http' | 'environment';

export interface VerificationCheck {
  category: CheckCategory;
  stack?: StackName;
  name: string;
  passed: boolean;
  detail: string;
  suggestion?: string;
}

export interface VerificationReport {
  status: 'healthy' | 'degraded';
  statuses: ServiceStatus[];
  checks: VerificationCheck[];
  healthyCount: number;
  totalCount: number;
  suggestions: string[];
}

export interface EnvironmentEcho {
  key: string;
  value?: string;
}

/**
 * Parse `env` output into the values of the requested keys
 */
export function pickEnvironment(output: string, keys: string[]): EnvironmentEcho[] {
  const values = new Map<string, string>();
  for (const line of output.split('\n')) {
    const separator = line.indexOf('=');
    if (separator > 0) {
      values.set(line.slice(0, separator), line.slice(separator + 1));
    }
  }
  return keys.map(key => ({ key, value: values.get(key) }));
}

/**
 * Read-only checks of a running project. Reports, never repairs.
 */
export class VerificationPass {
  constructor(
    private readonly config: OrchestratorConfig,
    private readonly compose: ComposeRuntime,
    private readonly prober: ReadinessProber
  ) {}

  async run(target: StackTarget = 'both'): Promise<VerificationReport> {
    const stacks = stacksFor(target).filter(stack => this.config.stacks[stack].enabled);
    const managed = new Set(stacks.flatMap(stack => this.config.stacks[stack].services.map(service => service.name)));
    if (this.config.automation.enabled) {
      managed.add(this.config.automation.service);
    }

    const statuses = (await this.compose.ps()).filter(status => managed.has(status.service));
    const checks: VerificationCheck[] = [];

    for (const stack of stacks) {
      checks.push(this.healthCheck(stack, statuses));
      checks.push(await this.databaseCheck(stack));
      checks.push(await this.httpCheck(stack));
      checks.push(await this.environmentCheck(stack));
    }

    // Every managed service counts, including those compose has no container for
    const missing = [...managed].filter(service => !statuses.some(status => status.service === service));
    for (const service of missing) {
      checks.push({
        category: 'health',
        name: `${service} container`,
        passed: false,
        detail: `${service} is not created`,
        suggestion: `Try: ${this.compose.describe(['logs', service])}`
      });
    }

    const healthyCount = [...managed].filter(service => {
      const own = statuses.filter(status => status.service === service);
      return own.length > 0 && own.every(isServiceHealthy);
    }).length;
    const totalCount = managed.size;
    const degraded = totalCount === 0 || healthyCount < totalCount || checks.some(check => !check.passed);

    const suggestions: string[] = [];
    if (degraded) {
      suggestions.push('nsot-stack cleanup --db && nsot-stack start --clean');
      const unhealthy = [...statuses.filter(status => !isServiceHealthy(status)).map(status => status.service), ...missing];
      for (const service of new Set(unhealthy)) {
        suggestions.push(this.compose.describe(['logs', service]));
      }
      if (unhealthy.length === 0) {
        suggestions.push(this.compose.describe(['logs', '[service-name]']));
      }
    }

    return {
      status: degraded ? 'degraded' : 'healthy',
      statuses,
      checks,
      healthyCount,
      totalCount,
      suggestions
    };
  }

  /**
   * Echo the configured environment keys as the running web service sees them
   */
  async readEnvironment(stack: StackName): Promise<EnvironmentEcho[]> {
    const stackConfig = this.config.stacks[stack];
    const result = await this.compose.exec(stackConfig.web_service, ['env']);
    if (result.exitCode !== 0) {
      throw new Error(`Could not read the environment of ${stackConfig.web_service}: ${result.stderr.trim() || `exit code ${result.exitCode}`}`);
    }
    return pickEnvironment(result.stdout, stackConfig.environment_keys);
  }

  private healthCheck(stack: StackName, statuses: ServiceStatus[]): VerificationCheck {
    const stackConfig = this.config.stacks[stack];
    const web = statuses.filter(status => status.service === stackConfig.web_service);
    const passed = web.length > 0 && web.every(status => status.health === 'healthy');
    return {
      category: 'health',
      stack,
      name: `${stackConfig.display_name} health`,
      passed,
      detail: passed
        ? `${stackConfig.display_name} is healthy`
        : `${stackConfig.display_name} is not healthy (${web.map(status => status.health).join(', ') || 'not created'})`,
      suggestion: passed ? undefined : `Try: ${this.compose.describe(['logs', stackConfig.web_service])}`
    };
  }

  private async databaseCheck(stack: StackName): Promise<VerificationCheck> {
    const stackConfig = this.config.stacks[stack];
    const { ready } = await this.prober.check(
      { service: stackConfig.database_service, database: stackConfig.database },
      { kind: 'database' }
    );
    return {
      category: 'database',
      stack,
      name: `${stackConfig.display_name} PostgreSQL`,
      passed: ready,
      detail: ready ? `${stackConfig.display_name} PostgreSQL: connected` : `${stackConfig.display_name} PostgreSQL: connection failed`,
      suggestion: ready ? undefined : 'Run: nsot-stack check-db for details'
    };
  }

  private async httpCheck(stack: StackName): Promise<VerificationCheck> {
    const stackConfig = this.config.stacks[stack];
    const url = joinUrl(stackConfig.url, stackConfig.health_path);
    const { ready, error } = await this.prober.check(
      { service: stackConfig.web_service, url: stackConfig.url },
      { kind: 'http', path: stackConfig.health_path }
    );
    return {
      category: 'http',
      stack,
      name: `${stackConfig.display_name} web interface`,
      passed: ready,
      detail: ready
        ? `${stackConfig.display_name} web interface accessible at ${stackConfig.url}`
        : `${stackConfig.display_name} web interface not accessible at ${url}${error ? ` (${error})` : ''}`,
      suggestion: ready ? undefined : `Check that the ${stackConfig.web_service} container is running and healthy`
    };
  }

  private async environmentCheck(stack: StackName): Promise<VerificationCheck> {
    const stackConfig = this.config.stacks[stack];
    const name = `${stackConfig.display_name} environment`;
    try {
      const echoes = await this.readEnvironment(stack);
      const missing = echoes.filter(echo => !echo.value).map(echo => echo.key);
      return {
        category: 'environment',
        stack,
        name,
        passed: missing.length === 0,
        detail: missing.length === 0
          ? `${stackConfig.display_name} environment variables configured correctly`
          : `${stackConfig.display_name} environment is missing ${missing.join(', ')}`,
        suggestion: missing.length === 0 ? undefined : `Run: nsot-stack check-env --${stack}-only`
      };
    } catch (error) {
      return {
        category: 'environment',
        stack,
        name,
        passed: false,
        detail: error instanceof Error ? error.message : String(error),
        suggestion: `Run: nsot-stack check-env --${stack}-only`
      };
    }
  }
}
