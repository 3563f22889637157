/**
 * Prompter - abstraction over interactive terminal I/O.
 *
 * Commands that ask before doing something destructive take a Prompter and
 * don't care how the answer is collected. DirectPrompter is the readline
 * implementation; tests script the answers.
 */

import { createInterface, type Interface } from "node:readline";

export interface Prompter {
  /** Display a message and wait for user input. */
  ask(message: string): Promise<string>;
  /** Write output text to the user (no input expected). */
  write(text: string): void;
  /** Clean up resources. */
  close(): void;
}

export class DirectPrompter implements Prompter {
  private rl: Interface | undefined;

  ask(message: string): Promise<string> {
    this.rl ??= createInterface({ input: process.stdin, output: process.stdout });
    const rl = this.rl;
    return new Promise((resolve) => {
      rl.question(message, (answer) => resolve(answer.trim()));
    });
  }

  write(text: string): void {
    process.stdout.write(text);
  }

  close(): void {
    this.rl?.close();
    this.rl = undefined;
  }
}

/** Ask a yes/no question; anything but y/yes is a no */
export async function confirm(prompter: Prompter, question: string): Promise<boolean> {
  const answer = await prompter.ask(`${question} [y/N] `);
  return /^y(es)?$/i.test(answer);
}
