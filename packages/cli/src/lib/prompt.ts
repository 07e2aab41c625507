/**
 * Interactive prompts on stderr, answers from stdin
 */

import { Writable } from "node:stream";
import { createInterface, type Interface } from "node:readline/promises";
import { CliError } from "./errors.js";

export interface Prompter {
  /** Ask for a line of text; an empty answer yields `defaultValue` when given */
  ask(question: string, defaultValue?: string): Promise<string>;
  /** Ask for a value without echoing it */
  secret(question: string): Promise<string>;
  /** Ask a yes/no question */
  confirm(question: string, defaultValue?: boolean): Promise<boolean>;
  close(): void;
}

/**
 * stderr that can be silenced while a secret is typed
 */
class MutableStderr extends Writable {
  muted = false;

  override _write(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    if (!this.muted) {
      process.stderr.write(chunk);
    }
    callback();
  }
}

function withDefault(question: string, defaultValue: string | undefined): string {
  return defaultValue ? `${question} [${defaultValue}]: ` : `${question}: `;
}

/**
 * Prompter reading stdin line by line. Piped input works too: each prompt
 * consumes the next line.
 */
export class TerminalPrompter implements Prompter {
  #output = new MutableStderr();
  #rl: Interface | null = null;
  #lines: AsyncIterator<string> | null = null;

  #next(): Promise<IteratorResult<string>> {
    if (!this.#rl || !this.#lines) {
      this.#rl = createInterface({
        input: process.stdin,
        output: this.#output,
        terminal: process.stdin.isTTY ?? false,
      });
      this.#lines = this.#rl[Symbol.asyncIterator]();
    }
    return this.#lines.next();
  }

  async #read(question: string): Promise<string> {
    process.stderr.write(question);
    const line = await this.#next();
    if (line.done) {
      throw new CliError(`No answer for prompt "${question.replace(/[:\s]+$/, "")}" (stdin closed)`);
    }
    return line.value;
  }

  async ask(question: string, defaultValue?: string): Promise<string> {
    const answer = (await this.#read(withDefault(question, defaultValue))).trim();
    return answer || (defaultValue ?? "");
  }

  async secret(question: string): Promise<string> {
    this.#output.muted = true;
    try {
      return await this.#read(`${question}: `);
    } finally {
      this.#output.muted = false;
      if (process.stdin.isTTY) {
        process.stderr.write("\n");
      }
    }
  }

  async confirm(question: string, defaultValue = false): Promise<boolean> {
    const answer = (await this.#read(`${question} ${defaultValue ? "(Y/n)" : "(y/N)"} `)).trim().toLowerCase();
    if (!answer) {
      return defaultValue;
    }
    return answer === "y" || answer === "yes";
  }

  close(): void {
    this.#rl?.close();
    this.#rl = null;
    this.#lines = null;
  }
}
