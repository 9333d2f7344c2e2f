// Configuration loading logic
import { readFile } from 'fs/promises';
import { existsSync } from 'fs';
import { dirname, extname, isAbsolute, resolve } from 'path';
import { parse as parseYaml } from 'yaml';
import { OrchestratorConfig } from '../types/index.js';
import { ConfigurationError } from '../errors/index.js';
import { ConfigLoader, ConfigValidationResult, PlainObject, isPlainObject } from './types.js';
import { validateAndNormalizeConfig, validateConfig } from './validator.js';
import { createDefaultConfig } from './defaults.js';

export const DEFAULT_CONFIG_FILES = ['nsot-stack.yml', 'nsot-stack.yaml', 'nsot-stack.json'];

const PARSERS: Record<string, (content: string) => unknown> = {
  '.yml': parseYaml,
  '.yaml': parseYaml,
  '.json': (content: string): unknown => JSON.parse(content)
};

/**
 * Orchestrator configuration from nsot-stack.yml (or .yaml/.json), merged over the defaults
 */
export class OrchestratorConfigLoader implements ConfigLoader {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  /**
   * Read a YAML or JSON file, substitute `${VAR}` references and lay it over the
   * built-in defaults. Relative project directories resolve against the file.
   */
  async load(path: string): Promise<OrchestratorConfig> {
    try {
      if (!existsSync(path)) {
        throw new Error('file does not exist');
      }

      const parse = PARSERS[extname(path).toLowerCase()];
      if (!parse) {
        throw new Error(`unsupported extension "${extname(path)}" (expected ${Object.keys(PARSERS).join(', ')})`);
      }

      const parsed = parse(await readFile(path, 'utf-8')) ?? {};
      if (!isPlainObject(parsed)) {
        throw new Error('the top level must be a mapping');
      }

      const overrides = this.expand(parsed);
      const merged = deepMerge(toPlainObject(createDefaultConfig()), overrides);
      return this.resolveProjectDirectory(validateAndNormalizeConfig(merged), dirname(resolve(path)));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigurationError(`Failed to load configuration from ${path}: ${reason}`);
    }
  }

  /** Check a configuration object without touching the filesystem */
  validate(config: unknown): ConfigValidationResult {
    return validateConfig(config);
  }

  /**
   * Built-in defaults, with the project directory resolved against `baseDir`
   */
  defaults(baseDir: string = process.cwd()): OrchestratorConfig {
    return this.resolveProjectDirectory(validateAndNormalizeConfig(createDefaultConfig()), baseDir);
  }

  /**
   * Load the first configuration file found in `searchDir`, falling back to the
   * built-in defaults when there is none.
   */
  async loadFromDirectory(searchDir: string): Promise<OrchestratorConfig> {
    for (const file of DEFAULT_CONFIG_FILES) {
      const candidate = resolve(searchDir, file);
      if (existsSync(candidate)) {
        return this.load(candidate);
      }
    }
    return this.defaults(searchDir);
  }

  /**
   * Substitute `${NAME}` and `${NAME:-fallback}` in every string value
   */
  private expand(value: PlainObject): PlainObject;
  private expand(value: unknown): unknown;
  private expand(value: unknown): unknown {
    if (typeof value === 'string') {
      return value.replace(/\$\{([^}]+)\}/g, (placeholder: string, expression: string) => {
        const [name, fallback] = expression.split(':-');
        // Unset without a fallback keeps the placeholder
        return this.env[name] ?? fallback ?? placeholder;
      });
    }
    if (Array.isArray(value)) {
      return value.map(item => this.expand(item));
    }
    if (isPlainObject(value)) {
      return Object.fromEntries(Object.entries(value).map(([key, entry]) => [key, this.expand(entry)]));
    }
    return value;
  }

  private resolveProjectDirectory(config: OrchestratorConfig, baseDir: string): OrchestratorConfig {
    const directory = isAbsolute(config.project.directory)
      ? config.project.directory
      : resolve(baseDir, config.project.directory);

    return {
      ...config,
      project: { ...config.project, directory }
    };
  }
}

function toPlainObject(config: OrchestratorConfig): PlainObject {
  const result: PlainObject = {};
  for (const [key, value] of Object.entries(config)) {
    result[key] = value;
  }
  return result;
}

/**
 * Deep merge two objects, with the second object taking precedence.
 * Arrays are replaced, never concatenated.
 */
export function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const result: PlainObject = { ...target };

  for (const [key, value] of Object.entries(source)) {
    const existing = result[key];
    if (isPlainObject(value) && isPlainObject(existing)) {
      result[key] = deepMerge(existing, value);
    } else {
      result[key] = value;
    }
  }

  return result;
}

export function createConfigLoader(env?: NodeJS.ProcessEnv): OrchestratorConfigLoader {
  return new OrchestratorConfigLoader(env);
}

/**
 * Load configuration from an explicit path, or from the standard file names in the current directory
 */
export async function loadConfig(path?: string, env?: NodeJS.ProcessEnv): Promise<OrchestratorConfig> {
  const loader = createConfigLoader(env);
  if (path) {
    return loader.load(resolve(process.cwd(), path));
  }
  return loader.loadFromDirectory(process.cwd());
}
