/**
 * Line prompts for the interactive menu
 *
 * @module cli/lib/prompt
 */

import { createInterface, type Interface } from 'node:readline/promises';
import { UserInterruptError } from '../../core/types/errors.js';

/**
 * Source of user input, one line per question.
 * Rejects with UserInterruptError on Ctrl+C or end of input.
 */
export interface Prompter {
  ask(question: string): Promise<string>;
  close(): void;
}

export interface ReadlinePrompterOptions {
  readonly input?: NodeJS.ReadableStream;
  readonly output?: NodeJS.WritableStream;
}

/**
 * Prompter over node:readline; a SIGINT or closed input aborts any pending
 * question.
 */
export class ReadlinePrompter implements Prompter {
  private readonly rl: Interface;
  private readonly interrupted = new AbortController();
  private closed = false;

  constructor(options: ReadlinePrompterOptions = {}) {
    this.rl = createInterface({
      input: options.input ?? process.stdin,
      output: options.output ?? process.stdout,
    });
    this.rl.on('SIGINT', () => this.interrupted.abort());
    this.rl.on('close', () => {
      this.closed = true;
      this.interrupted.abort();
    });
  }

  async ask(question: string): Promise<string> {
    if (this.closed || this.interrupted.signal.aborted) {
      throw new UserInterruptError();
    }
    try {
      return await this.rl.question(question, { signal: this.interrupted.signal });
    } catch (error) {
      if (this.interrupted.signal.aborted) {
        throw new UserInterruptError();
      }
      throw error;
    }
  }

  close(): void {
    if (!this.closed) {
      this.rl.close();
    }
  }
}
