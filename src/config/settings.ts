import { RuntimeSettings, STACK_NAMES, StackName, SuperuserCredentials } from '../types/index.js';

const ENDPOINT_OVERRIDE = /^(NETBOX|NAUTOBOT)_(DB|REDIS)_[A-Z0-9_]+$/;

export function superuserVariables(stack: StackName): { name: string; email: string; password: string } {
  const prefix = stack.toUpperCase();
  return {
    name: `${prefix}_SUPERUSER_NAME`,
    email: `${prefix}_SUPERUSER_EMAIL`,
    password: `${prefix}_SUPERUSER_PASSWORD`
  };
}

/**
 * Read the settings that come from environment variables into a typed value.
 * Components receive this object; none of them reads the environment itself.
 */
export function loadRuntimeSettings(env: NodeJS.ProcessEnv = process.env): RuntimeSettings {
  const superusers: Partial<Record<StackName, SuperuserCredentials>> = {};
  const warnings: string[] = [];

  for (const stack of STACK_NAMES) {
    const vars = superuserVariables(stack);
    const username = env[vars.name]?.trim() ?? '';
    const email = env[vars.email]?.trim() ?? '';
    const password = env[vars.password] ?? '';

    const provided = [username, email, password].filter(value => value.length > 0).length;
    if (provided === 3) {
      superusers[stack] = { username, email, password };
    } else if (provided > 0) {
      warnings.push(
        `Ignoring partial ${stack} superuser settings: ${vars.name}, ${vars.email} and ${vars.password} must all be set`
      );
    }
  }

  const composeEnvironment: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && ENDPOINT_OVERRIDE.test(key)) {
      composeEnvironment[key] = value;
    }
  }

  return { superusers, composeEnvironment, warnings };
}

export function skipMigrationsVariable(stack: StackName): string {
  return `${stack.toUpperCase()}_SKIP_MIGRATIONS`;
}
