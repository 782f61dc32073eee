import * as readline from "node:readline";
import { ReadStream, WriteStream } from "node:tty";
import type { DemoOutput } from "../core/interfaces/IPatternDemo.js";

/**
 * Everything the menu needs from a console: prompts, line input, a single
 * keypress, and text output. Demos write through the same object.
 */
export interface MenuTerminal extends DemoOutput {
  write(text: string): void;
  writeLine(line?: string): void;
  clear(): void;
  /** Resolves with the raw line, or null once input has ended */
  readLine(prompt?: string): Promise<string | null>;
  /** Resolves on the next keypress, or immediately once input has ended */
  waitForKey(): Promise<void>;
  close(): void;
}

export interface ReadlineTerminalOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  /** Clear the screen between views (default: true) */
  clearScreen?: boolean;
}

/**
 * MenuTerminal backed by a readline interface
 */
export class ReadlineTerminal implements MenuTerminal {
  private readonly rl: readline.Interface;
  private readonly input: NodeJS.ReadableStream;
  private readonly output: NodeJS.WritableStream;
  private readonly clearScreen: boolean;
  private closed = false;
  /** Lines that arrived before anyone asked for them (pasted or piped input) */
  private readonly pending: string[] = [];
  private readonly waiters: Array<(line: string | null) => void> = [];

  constructor(options: ReadlineTerminalOptions = {}) {
    this.input = options.input ?? process.stdin;
    this.output = options.output ?? process.stdout;
    this.clearScreen = options.clearScreen ?? true;
    this.rl = readline.createInterface({
      input: this.input,
      output: this.output,
      prompt: "",
    });

    this.rl.on("line", (line) => {
      const waiter = this.waiters.shift();
      if (waiter) {
        waiter(line);
      } else {
        this.pending.push(line);
      }
    });
    this.rl.on("close", () => {
      this.closed = true;
      for (const waiter of this.waiters.splice(0)) {
        waiter(null);
      }
    });
    // Ctrl+C arrives as a key in raw mode; treat it as end of input
    this.rl.on("SIGINT", () => {
      this.output.write("\n");
      this.rl.close();
    });
  }

  write(text: string): void {
    this.output.write(text);
  }

  writeLine(line = ""): void {
    this.output.write(`${line}\n`);
  }

  clear(): void {
    if (!this.clearScreen || !(this.output instanceof WriteStream)) return;
    readline.cursorTo(this.output, 0, 0);
    readline.clearScreenDown(this.output);
  }

  readLine(prompt = ""): Promise<string | null> {
    const buffered = this.pending.shift();
    if (buffered !== undefined) {
      this.output.write(prompt);
      return Promise.resolve(buffered);
    }
    if (this.closed) return Promise.resolve(null);

    this.rl.setPrompt(prompt);
    this.rl.prompt();
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  async waitForKey(): Promise<void> {
    if (this.closed && this.pending.length === 0) return;

    if (this.pending.length > 0 || !(this.input instanceof ReadStream) || !this.input.isTTY) {
      await this.readLine();
      return;
    }

    const input = this.input;
    await new Promise<void>((resolve) => {
      const finish = (): void => {
        input.off("keypress", finish);
        this.rl.off("close", finish);
        resolve();
      };
      input.on("keypress", finish);
      this.rl.once("close", finish);
    });

    // The key belongs to the pause: drop a line it completed, and clear a partial one
    this.pending.length = 0;
    if (!this.closed) {
      this.rl.write(null, { ctrl: true, name: "u" });
    }
  }

  close(): void {
    if (!this.closed) {
      this.rl.close();
    }
  }
}

/**
 * Create a terminal bound to stdin/stdout
 */
export function createReadlineTerminal(options: ReadlineTerminalOptions = {}): ReadlineTerminal {
  return new ReadlineTerminal(options);
}
