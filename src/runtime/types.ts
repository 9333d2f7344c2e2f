// Runtime-specific types: how the orchestrator talks to docker and compose

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface RunOptions {
  cwd?: string;
  env?: Record<string, string>;
  timeoutMs?: number;
  /** Stream output to the terminal instead of capturing it */
  inherit?: boolean;
}

export interface CommandRunner {
  run(command: string, args: string[], options?: RunOptions): Promise<CommandResult>;
}

export type ComposeInvocation =
  | { kind: 'plugin'; command: 'docker'; baseArgs: ['compose'] }
  | { kind: 'legacy'; command: 'docker-compose'; baseArgs: [] };

export type ContainerState = 'created' | 'running' | 'paused' | 'restarting' | 'removing' | 'exited' | 'dead' | 'unknown';
export type HealthFlag = 'starting' | 'healthy' | 'unhealthy' | 'none';

export interface ServiceStatus {
  /** Container name */
  name: string;
  service: string;
  state: ContainerState;
  health: HealthFlag;
  status: string;
  ports: string;
}

export interface UpOptions {
  build?: boolean;
  env?: Record<string, string>;
}

export interface ServiceCommandOptions {
  env?: Record<string, string>;
  /** Names of variables to pass through with `-e NAME`; values come from `env` */
  passEnv?: string[];
  user?: string;
  inherit?: boolean;
  /** Kill the process after this long */
  timeoutMs?: number;
}

/**
 * Stack lifecycle commands, scoped to one compose project
 */
export interface ComposeRuntime {
  readonly invocation: ComposeInvocation;
  up(services: string[], options?: UpOptions): Promise<void>;
  down(options?: { removeOrphans?: boolean }): Promise<void>;
  /** Stop and remove the containers of the given services */
  removeServices(services: string[]): Promise<void>;
  restart(services: string[]): Promise<void>;
  ps(services?: string[]): Promise<ServiceStatus[]>;
  exec(service: string, command: string[], options?: ServiceCommandOptions): Promise<CommandResult>;
  run(service: string, command: string[], options?: ServiceCommandOptions): Promise<CommandResult>;
  logs(service: string, tail?: number): Promise<string>;
  /** Printable command line, used in suggestions */
  describe(args: string[]): string;
}

export interface ContainerRef {
  id: string;
  name: string;
}

export type RemovalOutcome = 'removed' | 'absent';

/**
 * Engine-level resources that outlive a compose project
 */
export interface ContainerEngine {
  listContainers(): Promise<ContainerRef[]>;
  removeContainer(idOrName: string): Promise<RemovalOutcome>;
  listVolumes(): Promise<string[]>;
  removeVolume(name: string): Promise<RemovalOutcome>;
  listNetworks(): Promise<string[]>;
  removeNetwork(name: string): Promise<RemovalOutcome>;
  pruneDanglingImages(): Promise<void>;
}
