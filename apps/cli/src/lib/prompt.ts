/**
 * Line Prompts
 *
 * One readline interface for the whole session. Ctrl+C at a prompt ends the
 * session; while a handler is installed (a running batch) it goes there instead.
 */

import { createInterface, type Interface } from 'node:readline';
import { InputClosedError, UserInterruptError } from '@mediaconv/core';

export interface Prompter {
  /** Ask a question and resolve with the raw line typed */
  ask(question: string): Promise<string>;
  /** Run `task` with Ctrl+C routed to `onInterrupt` */
  withInterruptHandler<T>(onInterrupt: () => void, task: () => Promise<T>): Promise<T>;
  close(): void;
}

export class ReadlinePrompter implements Prompter {
  private readonly rl: Interface;
  private readonly output: NodeJS.WritableStream;
  /** Lines typed or piped in before a question asked for them */
  private readonly lines: string[] = [];
  private waiting?: { resolve: (line: string) => void; reject: (error: Error) => void };
  private interruptHandler?: () => void;
  private interrupted = false;
  private closed = false;

  constructor(
    input: NodeJS.ReadableStream = process.stdin,
    output: NodeJS.WritableStream = process.stdout
  ) {
    this.output = output;
    this.rl = createInterface({ input, output });
    this.rl.on('line', (line) => {
      const waiting = this.waiting;
      if (waiting) {
        this.waiting = undefined;
        waiting.resolve(line);
      } else {
        this.lines.push(line);
      }
    });
    this.rl.on('SIGINT', () => this.interrupt());
    this.rl.on('close', () => {
      this.closed = true;
      this.rejectPending(new InputClosedError());
    });
  }

  ask(question: string): Promise<string> {
    if (this.interrupted) {
      this.interrupted = false;
      return Promise.reject(new UserInterruptError());
    }
    if (this.closed && this.lines.length === 0) {
      return Promise.reject(new InputClosedError());
    }

    if (this.closed) {
      this.output.write(question);
    } else {
      this.rl.setPrompt(question);
      this.rl.prompt();
    }

    const line = this.lines.shift();
    if (line !== undefined) {
      return Promise.resolve(line);
    }
    return new Promise<string>((resolve, reject) => {
      this.waiting = { resolve, reject };
    });
  }

  async withInterruptHandler<T>(onInterrupt: () => void, task: () => Promise<T>): Promise<T> {
    this.interruptHandler = onInterrupt;
    try {
      return await task();
    } finally {
      this.interruptHandler = undefined;
    }
  }

  /**
   * Ctrl+C, from the terminal or a SIGINT sent to the process
   */
  interrupt(): void {
    if (this.interruptHandler) {
      this.interruptHandler();
      return;
    }
    if (!this.rejectPending(new UserInterruptError())) {
      // Picked up by the next prompt
      this.interrupted = true;
    }
  }

  close(): void {
    if (!this.closed) {
      this.rl.close();
    }
  }

  private rejectPending(error: Error): boolean {
    const waiting = this.waiting;
    if (!waiting) {
      return false;
    }
    this.waiting = undefined;
    waiting.reject(error);
    return true;
  }
}

/**
 * Wait for Enter
 */
export async function pause(prompter: Prompter, message: string = 'Press Enter to continue...'): Promise<void> {
  await prompter.ask(message);
}
