import { createInterface } from 'node:readline/promises';
import { Writable } from 'node:stream';

export interface Confirmer {
  confirm(question: string): Promise<boolean>;
}

export interface Prompter extends Confirmer {
  /** False when there is no terminal to answer on */
  readonly interactive: boolean;
  ask(question: string, options?: { hidden?: boolean }): Promise<string>;
}

/** Answers every confirmation with the same value */
export class FixedConfirmer implements Confirmer {
  constructor(private readonly answer: boolean) {}

  async confirm(): Promise<boolean> {
    return this.answer;
  }
}

class MutableOutput extends Writable {
  muted = false;

  _write(chunk: Buffer | string, encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    if (!this.muted) {
      process.stdout.write(chunk, encoding);
    }
    callback();
  }
}

/**
 * Interactive prompts on the controlling terminal. Without a TTY every
 * confirmation is declined, so unattended runs never wipe data unless -y is given.
 */
export class TerminalPrompter implements Prompter {
  get interactive(): boolean {
    return Boolean(process.stdin.isTTY);
  }

  async confirm(question: string): Promise<boolean> {
    if (!this.interactive) {
      return false;
    }
    const answer = (await this.ask(`${question} [y/N] `)).trim().toLowerCase();
    return answer === 'y' || answer === 'yes';
  }

  async ask(question: string, options: { hidden?: boolean } = {}): Promise<string> {
    const output = new MutableOutput();
    const rl = createInterface({ input: process.stdin, output, terminal: Boolean(process.stdin.isTTY) });
    try {
      if (options.hidden) {
        process.stdout.write(question);
        output.muted = true;
        const answer = await rl.question('');
        process.stdout.write('\n');
        return answer;
      }
      return await rl.question(question);
    } finally {
      rl.close();
    }
  }
}
