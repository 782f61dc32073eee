/**
 * Tests for ReadlineTerminal over in-memory streams
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { PassThrough, Writable } from "node:stream";
import { ReadlineTerminal } from "../interactive.js";

/** Collects everything written to it */
class Sink extends Writable {
  text = "";

  _write(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    this.text += chunk.toString();
    callback();
  }
}

describe("ReadlineTerminal", () => {
  let input: PassThrough;
  let output: Sink;
  let terminal: ReadlineTerminal;

  beforeEach(() => {
    input = new PassThrough();
    output = new Sink();
    terminal = new ReadlineTerminal({ input, output });
  });

  afterEach(() => {
    terminal.close();
  });

  it("should show the prompt and resolve with the typed line", async () => {
    terminal.writeLine("Menu");
    const answer = terminal.readLine("Select: ");
    input.write("2\n");

    expect(await answer).toBe("2");
    expect(output.text).toBe("Menu\nSelect: ");
  });

  it("should resolve with null once input ends", async () => {
    const answer = terminal.readLine("Select: ");
    input.end();

    expect(await answer).toBeNull();
    expect(await terminal.readLine("Select: ")).toBeNull();
  });

  it("should keep every line of input that arrives in one chunk", async () => {
    input.write("1\n2\nq\n");
    input.end();

    const answers = [await terminal.readLine("Select: "), await terminal.readLine("Select: "), await terminal.readLine()];

    expect(answers).toEqual(["1", "2", "q"]);
    expect(await terminal.readLine()).toBeNull();
  });

  it("should let a pause consume one buffered line", async () => {
    input.write("1\n\n2\n");

    expect(await terminal.readLine()).toBe("1");
    await terminal.waitForKey();
    expect(await terminal.readLine()).toBe("2");
  });

  it("should wait for a line when input is not a terminal", async () => {
    const waiting = terminal.waitForKey();
    input.write("\n");
    await waiting;

    const answer = terminal.readLine();
    input.write("next\n");
    expect(await answer).toBe("next");
  });

  it("should return at once from waitForKey after close", async () => {
    terminal.close();
    await terminal.waitForKey();
    expect(await terminal.readLine()).toBeNull();
  });

  it("should not clear a stream that is not a terminal", () => {
    terminal.write("kept");
    terminal.clear();
    expect(output.text).toBe("kept");
  });
});
