// Core type definitions for the NetBox / Nautobot stack orchestrator

export type StackName = 'netbox' | 'nautobot';
export type StackTarget = StackName | 'both';

export const STACK_NAMES: readonly StackName[] = ['netbox', 'nautobot'];

export type ServiceRole = 'datastore' | 'cache' | 'web' | 'worker' | 'scheduler';

export type ReadinessMethod =
  | { kind: 'database' }
  | { kind: 'command'; command: string[] }
  | { kind: 'health-flag' }
  | { kind: 'running' }
  | { kind: 'http'; path?: string };

export type ReadinessKind = ReadinessMethod['kind'];

export interface ServiceConfig {
  name: string;
  role: ServiceRole;
  /** 1-based phase the service is started in; it may only start once every gate of the previous phase is ready */
  phase: number;
  readiness: ReadinessMethod[];
  skip_migrations?: boolean;
}

export interface DatabaseIdentity {
  name: string;
  user: string;
}

export interface PersistenceConfig {
  /** bind: paths relative to the project directory; volume: compose volume names without the project prefix */
  kind: 'bind' | 'volume';
  database: string;
  cache: string[];
}

export interface MigrationRepairConfig {
  app_label: string;
  migration: string;
  table: string;
  legacy_columns: string[];
}

export interface StackConfig {
  enabled: boolean;
  display_name: string;
  url: string;
  health_path: string;
  web_service: string;
  database_service: string;
  database: DatabaseIdentity;
  management_command: string[];
  settings_module: string;
  services: ServiceConfig[];
  persistence: PersistenceConfig;
  volumes: string[];
  network: string;
  legacy_containers: string[];
  environment_keys: string[];
  migration_repair?: MigrationRepairConfig;
}

export interface AutomationConfig {
  enabled: boolean;
  service: string;
  url: string;
  health_path: string;
}

export interface TimingConfig {
  poll_interval_ms: number;
  datastore_timeout_ms: number;
  web_timeout_ms: number;
  worker_timeout_ms: number;
  http_request_timeout_ms: number;
}

export interface ProjectConfig {
  name: string;
  directory: string;
  compose_files: string[];
}

export interface OrchestratorConfig {
  project: ProjectConfig;
  timing: TimingConfig;
  stacks: Record<StackName, StackConfig>;
  automation: AutomationConfig;
}

export interface SuperuserCredentials {
  username: string;
  email: string;
  password: string;
}

export interface RuntimeSettings {
  superusers: Partial<Record<StackName, SuperuserCredentials>>;
  /** Endpoint overrides forwarded to every compose invocation */
  composeEnvironment: Record<string, string>;
  warnings: string[];
}

export interface OrchestrationErrorInfo {
  code: string;
  message: string;
  details?: unknown;
  remediation?: string;
}

export function stacksFor(target: StackTarget): StackName[] {
  return target === 'both' ? [...STACK_NAMES] : [target];
}
