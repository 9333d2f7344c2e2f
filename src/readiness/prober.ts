import { ReadinessMethod } from '../types/index.js';
import { ComposeRuntime } from '../runtime/types.js';
import { Clock, pollUntil, systemClock } from './poller.js';

/** Returns the HTTP status code; rejects on network errors and timeouts */
export type HttpGet = (url: string, timeoutMs: number) => Promise<number>;

export const fetchStatus: HttpGet = async (url, timeoutMs) => {
  const response = await fetch(url, {
    method: 'GET',
    redirect: 'manual',
    signal: AbortSignal.timeout(timeoutMs)
  });
  await response.body?.cancel();
  return response.status;
};

export interface ReadinessTarget {
  service: string;
  /** Base URL for http checks */
  url?: string;
  database?: { name: string; user: string };
}

export interface ReadinessCheck {
  target: ReadinessTarget;
  method: ReadinessMethod;
  timeoutMs: number;
  intervalMs: number;
}

export type ProbeOutcome = 'ready' | 'timed-out';

export interface ProbeResult {
  outcome: ProbeOutcome;
  attempts: number;
  elapsedMs: number;
  lastError?: string;
}

export interface ReadinessProberOptions {
  httpGet?: HttpGet;
  httpTimeoutMs?: number;
  clock?: Clock;
}

export function describeMethod(method: ReadinessMethod): string {
  switch (method.kind) {
    case 'database':
      return 'database accepts connections';
    case 'command':
      return `\`${method.command.join(' ')}\` succeeds`;
    case 'health-flag':
      return 'health check reports healthy';
    case 'running':
      return 'container is running';
    case 'http':
      return `HTTP ${method.path ?? '/'} responds`;
  }
}

/**
 * Bounded readiness polling over the compose runtime. Probes are read-only.
 */
export class ReadinessProber {
  private readonly httpGet: HttpGet;
  private readonly httpTimeoutMs: number;
  private readonly clock: Clock;

  constructor(private readonly compose: ComposeRuntime, options: ReadinessProberOptions = {}) {
    this.httpGet = options.httpGet ?? fetchStatus;
    this.httpTimeoutMs = options.httpTimeoutMs ?? 5000;
    this.clock = options.clock ?? systemClock;
  }

  async probe(check: ReadinessCheck): Promise<ProbeResult> {
    const result = await pollUntil(limitMs => this.attempt(check.target, check.method, limitMs), {
      intervalMs: check.intervalMs,
      timeoutMs: check.timeoutMs,
      clock: this.clock
    });

    if (result.status === 'ready') {
      return { outcome: 'ready', attempts: result.attempts, elapsedMs: result.elapsedMs };
    }
    return { outcome: 'timed-out', attempts: result.attempts, elapsedMs: result.elapsedMs, lastError: result.lastError };
  }

  /**
   * One attempt, no polling
   */
  async check(target: ReadinessTarget, method: ReadinessMethod): Promise<{ ready: boolean; error?: string }> {
    try {
      return { ready: await this.attempt(target, method) };
    } catch (error) {
      return { ready: false, error: error instanceof Error ? error.message : String(error) };
    }
  }

  private async attempt(target: ReadinessTarget, method: ReadinessMethod, limitMs?: number): Promise<boolean> {
    switch (method.kind) {
      case 'database': {
        if (!target.database) {
          throw new Error(`No database identity configured for ${target.service}`);
        }
        const result = await this.compose.exec(target.service, [
          'pg_isready',
          '-q',
          '-t',
          '2',
          '-d',
          target.database.name,
          '-U',
          target.database.user
        ], { timeoutMs: limitMs });
        return result.exitCode === 0;
      }
      case 'command': {
        const result = await this.compose.exec(target.service, method.command, { timeoutMs: limitMs });
        return result.exitCode === 0;
      }
      case 'health-flag': {
        const statuses = await this.compose.ps([target.service]);
        return statuses.length > 0 && statuses.every(status => status.health === 'healthy');
      }
      case 'running': {
        const statuses = await this.compose.ps([target.service]);
        return statuses.length > 0 && statuses.every(status => status.state === 'running');
      }
      case 'http': {
        if (!target.url) {
          throw new Error(`No URL configured for ${target.service}`);
        }
        const status = await this.httpGet(joinUrl(target.url, method.path ?? '/'), this.httpTimeoutMs);
        return status < 400;
      }
    }
  }
}

export function joinUrl(base: string, path: string): string {
  return `${base.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`;
}
