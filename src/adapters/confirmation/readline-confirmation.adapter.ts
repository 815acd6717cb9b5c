// =============================================================================
// ReadlineConfirmationAdapter — y/n prompt on the terminal
// =============================================================================

import { createInterface } from "node:readline/promises";
import type { Readable, Writable } from "node:stream";

import type { ConfirmationPort } from "../../ports/confirmation.port.js";

export interface ReadlineConfirmationOptions {
  input?: Readable;
  output?: Writable;
}

/** Parses a y/n answer; anything else falls back to the default. */
export function parseAnswer(answer: string, defaultValue: boolean): boolean {
  const normalized = answer.trim().toLowerCase();
  if (normalized === "y" || normalized === "yes") return true;
  if (normalized === "n" || normalized === "no") return false;
  return defaultValue;
}

export class ReadlineConfirmationAdapter implements ConfirmationPort {
  private readonly input: Readable;
  private readonly output: Writable;
  private queue: Promise<void> = Promise.resolve();

  constructor(options: ReadlineConfirmationOptions = {}) {
    this.input = options.input ?? process.stdin;
    this.output = options.output ?? process.stdout;
  }

  /** Questions are asked one at a time, in call order. */
  async confirm(message: string, defaultValue: boolean): Promise<boolean> {
    const previous = this.queue;
    let release: () => void = () => {};
    this.queue = new Promise<void>((resolve) => {
      release = resolve;
    });
    await previous;

    const rl = createInterface({ input: this.input, output: this.output, terminal: false });
    try {
      const hint = defaultValue ? "[Y/n]" : "[y/N]";
      const answer = await rl.question(`${message} ${hint} `);
      return parseAnswer(answer, defaultValue);
    } finally {
      rl.close();
      release();
    }
  }
}
