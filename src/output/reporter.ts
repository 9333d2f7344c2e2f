import chalk from 'chalk';
import ora, { type Ora } from 'ora';

export interface Spinner {
  succeed(text?: string): void;
  fail(text?: string): void;
  warn(text?: string): void;
}

/**
 * Sink for everything the orchestrator tells the user. Components never write
 * to the console directly.
 */
export interface Reporter {
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** A follow-up command or diagnostic suggestion */
  hint(message: string): void;
  /** A numbered or titled section header */
  step(message: string): void;
  /** Only shown with --verbose */
  debug(message: string): void;
  spinner(text: string): Spinner;
}

export class ConsoleReporter implements Reporter {
  constructor(private readonly verbose: boolean = false) {}

  info(message: string): void {
    console.log(message);
  }

  success(message: string): void {
    console.log(chalk.green(`✅ ${message}`));
  }

  warn(message: string): void {
    console.log(chalk.yellow(`⚠️  ${message}`));
  }

  error(message: string): void {
    console.error(chalk.red(`❌ ${message}`));
  }

  hint(message: string): void {
    console.log(chalk.yellow(`💡 ${message}`));
  }

  step(message: string): void {
    console.log(chalk.blue(`\n${message}`));
  }

  debug(message: string): void {
    if (this.verbose) {
      console.log(chalk.gray(message));
    }
  }

  spinner(text: string): Spinner {
    const instance: Ora = ora(text).start();
    return {
      succeed: (final?: string) => {
        instance.succeed(final);
      },
      fail: (final?: string) => {
        instance.fail(final);
      },
      warn: (final?: string) => {
        instance.warn(final);
      }
    };
  }
}

export type ReportLevel = 'info' | 'success' | 'warn' | 'error' | 'hint' | 'step' | 'debug';

export interface ReportLine {
  level: ReportLevel;
  message: string;
}

/**
 * Records every line; spinner outcomes are recorded as regular lines.
 */
export class MemoryReporter implements Reporter {
  readonly lines: ReportLine[] = [];

  info(message: string): void {
    this.lines.push({ level: 'info', message });
  }

  success(message: string): void {
    this.lines.push({ level: 'success', message });
  }

  warn(message: string): void {
    this.lines.push({ level: 'warn', message });
  }

  error(message: string): void {
    this.lines.push({ level: 'error', message });
  }

  hint(message: string): void {
    this.lines.push({ level: 'hint', message });
  }

  step(message: string): void {
    this.lines.push({ level: 'step', message });
  }

  debug(message: string): void {
    this.lines.push({ level: 'debug', message });
  }

  spinner(text: string): Spinner {
    return {
      succeed: (final?: string) => this.success(final ?? text),
      fail: (final?: string) => this.error(final ?? text),
      warn: (final?: string) => this.warn(final ?? text)
    };
  }

  messages(level?: ReportLevel): string[] {
    return this.lines.filter(line => !level || line.level === level).map(line => line.message);
  }
}
