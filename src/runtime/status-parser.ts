import { ContainerState, HealthFlag, ServiceStatus } from './types.js';
import { isPlainObject, PlainObject } from '../config/types.js';

const CONTAINER_STATES: readonly ContainerState[] = [
  'created',
  'running',
  'paused',
  'restarting',
  'removing',
  'exited',
  'dead'
];

function toState(value: unknown): ContainerState {
  const state = typeof value === 'string' ? value.toLowerCase() : '';
  return CONTAINER_STATES.find(candidate => candidate === state) ?? 'unknown';
}

function healthFromFlag(value: unknown): HealthFlag | undefined {
  switch (typeof value === 'string' ? value.toLowerCase() : '') {
    case 'healthy':
      return 'healthy';
    case 'unhealthy':
      return 'unhealthy';
    case 'starting':
      return 'starting';
    default:
      return undefined;
  }
}

/**
 * `Up 2 minutes (healthy)`, `Up 5 seconds (health: starting)`, `Up 1 hour (unhealthy)`
 */
export function healthFromStatus(status: string): HealthFlag {
  const match = /\((healthy|unhealthy|health: starting)\)/.exec(status);
  if (!match) {
    return 'none';
  }
  return match[1] === 'health: starting' ? 'starting' : match[1] === 'healthy' ? 'healthy' : 'unhealthy';
}

function text(record: PlainObject, key: string): string {
  const value = record[key];
  return typeof value === 'string' ? value : '';
}

function publishersToPorts(value: unknown): string {
  if (!Array.isArray(value)) {
    return '';
  }
  return value
    .filter(isPlainObject)
    .filter(publisher => typeof publisher.PublishedPort === 'number' && publisher.PublishedPort > 0)
    .map(publisher => `${text(publisher, 'URL') || '0.0.0.0'}:${String(publisher.PublishedPort)}->${String(publisher.TargetPort)}/${text(publisher, 'Protocol') || 'tcp'}`)
    .join(', ');
}

function parseJsonRecords(output: string): PlainObject[] {
  const trimmed = output.trim();
  if (trimmed.length === 0) {
    return [];
  }

  // Compose < 2.21 prints one JSON array, later releases one object per line
  if (trimmed.startsWith('[')) {
    const parsed: unknown = JSON.parse(trimmed);
    return Array.isArray(parsed) ? parsed.filter(isPlainObject) : [];
  }

  return trimmed
    .split('\n')
    .map(line => line.trim())
    .filter(line => line.length > 0)
    .map((line): unknown => JSON.parse(line))
    .filter(isPlainObject);
}

/**
 * Parse `docker compose ps --all --format json`
 */
export function parseComposePs(output: string): ServiceStatus[] {
  return parseJsonRecords(output).map(record => {
    const status = text(record, 'Status');
    return {
      name: text(record, 'Name'),
      service: text(record, 'Service'),
      state: toState(record.State),
      health: healthFromFlag(record.Health) ?? healthFromStatus(status),
      status,
      ports: text(record, 'Ports') || publishersToPorts(record.Publishers)
    };
  });
}

export function composeLabel(labels: string, key: string): string | undefined {
  const escaped = key.replace(/\./g, '\\.');
  const match = new RegExp(`(?:^|,)${escaped}=([^,]*)`).exec(labels);
  return match ? match[1] : undefined;
}

/**
 * Parse `docker ps -a --filter label=com.docker.compose.project=<p> --format '{{json .}}'`,
 * which is what the legacy compose binary falls back to
 */
export function parseDockerPs(output: string): ServiceStatus[] {
  return parseJsonRecords(output).map(record => {
    const status = text(record, 'Status');
    const labels = text(record, 'Labels');
    const name = text(record, 'Names');
    return {
      name,
      service: composeLabel(labels, 'com.docker.compose.service') ?? name,
      state: toState(record.State),
      health: healthFromStatus(status),
      status,
      ports: text(record, 'Ports')
    };
  });
}

export function isServiceHealthy(status: ServiceStatus): boolean {
  return status.health === 'healthy' || (status.health === 'none' && status.state === 'running');
}
