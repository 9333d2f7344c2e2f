import { OrchestratorConfig, RuntimeSettings } from '../types/index.js';
import { ConfigurationError } from '../errors/index.js';
import { loadConfig } from '../config/loader.js';
import { loadRuntimeSettings } from '../config/settings.js';
import { ComposeNamingService } from '../config/naming.js';
import { ComposeClient } from '../runtime/compose-client.js';
import { ExecaCommandRunner } from '../runtime/command-runner.js';
import { DockerEngine } from '../runtime/docker-engine.js';
import { describeInvocation, runPreflight } from '../runtime/preflight.js';
import { CommandRunner, ComposeRuntime, ContainerEngine } from '../runtime/types.js';
import { ReadinessProber } from '../readiness/prober.js';
import { ConsoleReporter, Reporter } from '../output/reporter.js';
import { Prompter, TerminalPrompter } from '../output/prompt.js';
import { GlobalFlags } from './options.js';

export interface CommandContext {
  config: OrchestratorConfig;
  settings: RuntimeSettings;
  reporter: Reporter;
  prompter: Prompter;
  runner: CommandRunner;
  compose: ComposeRuntime;
  engine: ContainerEngine;
  prober: ReadinessProber;
}

export interface ContextDependencies {
  env?: NodeJS.ProcessEnv;
  reporter?: Reporter;
  prompter?: Prompter;
  runner?: CommandRunner;
}

/**
 * Load configuration, run preflight and wire the components every command uses
 */
export async function createContext(flags: GlobalFlags, deps: ContextDependencies = {}): Promise<CommandContext> {
  const reporter = deps.reporter ?? new ConsoleReporter(Boolean(flags.verbose));
  const env = deps.env ?? process.env;

  const config = await loadConfig(flags.config, env);
  const nameProblems = ComposeNamingService.fromConfig(config).validateProjectName();
  if (nameProblems.length > 0) {
    throw new ConfigurationError(`Invalid compose project name "${config.project.name}": ${nameProblems.join('; ')}`);
  }

  const settings = loadRuntimeSettings(env);
  for (const warning of settings.warnings) {
    reporter.warn(warning);
  }

  const runner = deps.runner ?? new ExecaCommandRunner(reporter);
  const preflight = await runPreflight(runner);
  reporter.debug(`Using ${describeInvocation(preflight.invocation)} (Docker ${preflight.serverVersion})`);

  const compose = new ComposeClient(
    preflight.invocation,
    {
      name: config.project.name,
      directory: config.project.directory,
      composeFiles: config.project.compose_files,
      environment: settings.composeEnvironment
    },
    runner
  );

  return {
    config,
    settings,
    reporter,
    prompter: deps.prompter ?? new TerminalPrompter(),
    runner,
    compose,
    engine: new DockerEngine(runner),
    prober: new ReadinessProber(compose, { httpTimeoutMs: config.timing.http_request_timeout_ms })
  };
}
