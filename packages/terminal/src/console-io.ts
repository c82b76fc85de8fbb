/**
 * Line-oriented console I/O for the terminal session.
 */

import { createInterface } from "node:readline";
import type { Readable, Writable } from "node:stream";

/**
 * What the terminal needs from its surroundings: a way to ask for a
 * line and a way to print one. `ask` resolves to undefined once input
 * has ended.
 */
export interface TerminalIO {
  ask(prompt: string): Promise<string | undefined>;
  print(line: string): void;
}

export interface ConsoleIO extends TerminalIO {
  close(): void;
}

/**
 * Lines that arrive before anyone asks for them are queued, so piped or
 * pasted input is answered in order. Queued lines are still handed out
 * after input has ended.
 */
export function createConsoleIO(
  input: Readable = process.stdin,
  output: Writable = process.stdout,
): ConsoleIO {
  const rl = createInterface({ input, terminal: false });
  const queued: string[] = [];
  let waiting: ((line: string | undefined) => void) | undefined;
  let closed = false;

  rl.on("line", (line: string) => {
    const resolve = waiting;
    if (resolve === undefined) {
      queued.push(line);
      return;
    }
    waiting = undefined;
    resolve(line);
  });

  rl.once("close", () => {
    closed = true;
    const resolve = waiting;
    waiting = undefined;
    resolve?.(undefined);
  });

  return {
    ask(prompt: string): Promise<string | undefined> {
      const next = queued.shift();
      if (next === undefined && closed) {
        return Promise.resolve(undefined);
      }
      output.write(prompt);
      if (next !== undefined) {
        return Promise.resolve(next);
      }
      return new Promise((resolve) => {
        waiting = resolve;
      });
    },
    print(line: string): void {
      output.write(`${line}\n`);
    },
    close(): void {
      rl.close();
    },
  };
}
