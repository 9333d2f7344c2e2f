import { OrchestratorConfig, StackName } from '../types/index.js';

/**
 * Project-scoped names of the resources compose creates for one stack
 */
export interface StackResourceNames {
  /** Volumes as the engine lists them, `<project>_<volume>` */
  databaseVolume?: string;
  cacheVolumes: string[];
  extraVolumes: string[];
  network: string;
  /** Prefixes of generated container names, v2 (`-`) and v1 (`_`) separators */
  containerPrefixes: string[];
  legacyContainers: string[];
}

/**
 * Resource naming utility for the compose project
 */
export class ComposeNamingService {
  private readonly maxProjectNameLength = 63;

  constructor(private readonly projectName: string) {}

  static fromConfig(config: OrchestratorConfig): ComposeNamingService {
    return new ComposeNamingService(config.project.name);
  }

  volumeName(volume: string): string {
    return this.scoped(volume);
  }

  networkName(network: string): string {
    return this.scoped(network);
  }

  containerPrefixes(stack: StackName): string[] {
    return [`${this.projectName}-${stack}`, `${this.projectName}_${stack}`];
  }

  resourceNames(config: OrchestratorConfig, stack: StackName): StackResourceNames {
    const stackConfig = config.stacks[stack];
    const volumeBacked = stackConfig.persistence.kind === 'volume';

    return {
      databaseVolume: volumeBacked ? this.volumeName(stackConfig.persistence.database) : undefined,
      cacheVolumes: volumeBacked ? stackConfig.persistence.cache.map(volume => this.volumeName(volume)) : [],
      extraVolumes: stackConfig.volumes.map(volume => this.volumeName(volume)),
      network: this.networkName(stackConfig.network),
      containerPrefixes: this.containerPrefixes(stack),
      legacyContainers: [...stackConfig.legacy_containers]
    };
  }

  /**
   * Check a project name against the rules compose applies
   * @returns Validation problems, empty when the name is usable
   */
  validateProjectName(name: string = this.projectName): string[] {
    const errors: string[] = [];

    if (name.length === 0) {
      errors.push('Project name cannot be empty');
    }
    if (name.length > this.maxProjectNameLength) {
      errors.push(`Project name exceeds maximum length of ${this.maxProjectNameLength} characters`);
    }
    if (name.length > 0 && !/^[a-z0-9]/.test(name)) {
      errors.push('Project name must start with a lowercase letter or digit');
    }
    if (/[^a-z0-9_-]/.test(name)) {
      errors.push('Project name can only contain lowercase letters, digits, hyphens, and underscores');
    }

    return errors;
  }

  private scoped(name: string): string {
    return name.startsWith(`${this.projectName}_`) ? name : `${this.projectName}_${name}`;
  }
}
