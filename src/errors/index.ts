import { OrchestrationErrorInfo } from '../types/index.js';

export interface OrchestratorErrorOptions {
  remediation?: string;
  phase?: number;
  service?: string;
  details?: unknown;
}

/**
 * Base class for every failure the orchestrator reports to the user.
 * The CLI prints `message` and `remediation`; the stack trace only with --verbose.
 */
export class OrchestratorError extends Error {
  readonly code: string;
  readonly remediation?: string;
  readonly phase?: number;
  readonly service?: string;
  readonly details?: unknown;

  constructor(code: string, message: string, options: OrchestratorErrorOptions = {}) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.remediation = options.remediation;
    this.phase = options.phase;
    this.service = options.service;
    this.details = options.details;
  }

  toInfo(): OrchestrationErrorInfo {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
      remediation: this.remediation
    };
  }
}

/** Tooling missing or a required service not running. Nothing has been changed. */
export class PreconditionError extends OrchestratorError {}

export class GateTimeoutError extends OrchestratorError {
  constructor(phase: number, service: string, method: string, timeoutMs: number, options: OrchestratorErrorOptions = {}) {
    super(
      'GATE_TIMEOUT',
      `Phase ${phase}: ${service} did not become ready (${method}) within ${Math.round(timeoutMs / 1000)}s`,
      { ...options, phase, service }
    );
  }
}

export class CommandFailedError extends OrchestratorError {
  readonly exitCode: number;
  readonly stderr: string;

  constructor(commandLine: string, exitCode: number, stderr: string, options: OrchestratorErrorOptions = {}) {
    const reason = stderr.trim().split('\n').pop() ?? '';
    super('COMMAND_FAILED', `\`${commandLine}\` exited with code ${exitCode}${reason ? `: ${reason}` : ''}`, options);
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

export class SafetyCheckError extends OrchestratorError {}

export class UsageError extends OrchestratorError {
  constructor(message: string) {
    super('USAGE', message, { remediation: 'Run with --help to see the available options' });
  }
}

export class ConfigurationError extends OrchestratorError {
  constructor(message: string, details?: unknown) {
    super('INVALID_CONFIGURATION', message, { details });
  }
}

export function toErrorInfo(error: unknown): OrchestrationErrorInfo {
  if (error instanceof OrchestratorError) {
    return error.toInfo();
  }
  return {
    code: 'UNEXPECTED',
    message: error instanceof Error ? error.message : String(error),
    details: error
  };
}
