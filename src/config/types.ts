// Configuration-specific types
import { OrchestratorConfig } from '../types/index.js';

export interface ConfigValidationResult {
  valid: boolean;
  errors: string[];
}

export interface ConfigLoader {
  load(path: string): Promise<OrchestratorConfig>;
  validate(config: unknown): ConfigValidationResult;
}

export type PlainObject = Record<string, unknown>;

export function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
