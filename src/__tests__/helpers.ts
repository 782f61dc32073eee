/**
 * Test doubles shared across suites
 */

import { stripVTControlCharacters } from "node:util";
import type { DemoOutput, PatternCategory, PatternDemo, PatternRegistration } from "../core/interfaces/index.js";
import type { MenuTerminal } from "../cli/interactive.js";

/**
 * DemoOutput that keeps every line, with terminal colours removed
 */
export class RecordingOutput implements DemoOutput {
  readonly lines: string[] = [];

  writeLine(line = ""): void {
    this.lines.push(stripVTControlCharacters(line));
  }
}

/**
 * MenuTerminal fed from a fixed list of input lines; once they run out
 * every read reports end of input.
 */
export class FakeTerminal extends RecordingOutput implements MenuTerminal {
  readonly prompts: string[] = [];
  clears = 0;
  keyWaits = 0;
  closed = false;
  private readonly inputs: string[];

  constructor(inputs: readonly string[] = []) {
    super();
    this.inputs = [...inputs];
  }

  write(text: string): void {
    this.lines.push(stripVTControlCharacters(text));
  }

  clear(): void {
    this.clears++;
  }

  async readLine(prompt = ""): Promise<string | null> {
    this.prompts.push(prompt);
    return this.inputs.shift() ?? null;
  }

  async waitForKey(): Promise<void> {
    this.keyWaits++;
  }

  close(): void {
    this.closed = true;
  }
}

export class StubDemo implements PatternDemo {
  runs = 0;

  constructor(
    readonly name: string,
    readonly description = `${name} description`,
    private readonly action: (out: DemoOutput) => void = () => {},
    private readonly out: DemoOutput = { writeLine: () => {} }
  ) {}

  demonstrate(): void {
    this.runs++;
    this.action(this.out);
  }
}

/**
 * Registration for a stub demo that writes `ran {name}` when demonstrated
 */
export function stubRegistration(
  id: string,
  name: string,
  category?: PatternCategory
): PatternRegistration {
  return {
    id,
    category,
    create: (out) => new StubDemo(name, `${name} description`, (o) => o.writeLine(`ran ${name}`), out),
  };
}
