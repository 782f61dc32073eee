/**
 * Tests for the interactive menu state machine
 */

import { describe, it, expect } from "vitest";
import { FakeTerminal, StubDemo, stubRegistration } from "../../__tests__/helpers.js";
import { createPatternCatalog } from "../../core/catalog/index.js";
import type { PatternRegistration } from "../../core/interfaces/index.js";
import {
  BANNER,
  CATEGORY_PROMPT,
  MAIN_MENU_PROMPT,
  createMenuController,
  parseSelection,
  type MenuController,
} from "../menu-controller.js";

const REGISTRATIONS: PatternRegistration[] = [
  stubRegistration("zeta", "Zeta", "Creational"),
  stubRegistration("alpha", "Alpha", "Structural"),
  stubRegistration("beta", "Beta", "Creational"),
];

const MAIN_MENU_LINES = [
  "",
  "Main Menu:",
  "1. Creational Patterns",
  "2. Structural Patterns",
  "3. Behavioral Patterns",
  "4. Show All Patterns",
  "Q. Quit",
];

const HEADER = [BANNER, "=".repeat(BANNER.length)];

/** Records the controller's state each time it asks for input */
class ObservingTerminal extends FakeTerminal {
  readonly seenStates: string[] = [];
  controller: MenuController | undefined;

  async readLine(prompt = ""): Promise<string | null> {
    this.seenStates.push(this.controller?.state.kind ?? "none");
    return super.readLine(prompt);
  }
}

function setup(
  inputs: readonly string[],
  registrations: readonly PatternRegistration[] = REGISTRATIONS
): { terminal: ObservingTerminal; controller: MenuController } {
  const terminal = new ObservingTerminal(inputs);
  const catalog = createPatternCatalog(registrations, { output: terminal });
  const controller = createMenuController({ catalog, terminal });
  terminal.controller = controller;
  return { terminal, controller };
}

// =============================================================================
// Main menu
// =============================================================================

describe("MenuController main menu", () => {
  it("should print the banner and menu, then quit on Q", async () => {
    const { terminal, controller } = setup(["q"]);
    expect(controller.state.kind).toBe("main-menu");

    await controller.run();

    expect(terminal.lines).toEqual([...HEADER, ...MAIN_MENU_LINES, "Exiting..."]);
    expect(terminal.prompts).toEqual([MAIN_MENU_PROMPT]);
    expect(terminal.clears).toBe(1);
    expect(controller.state.kind).toBe("terminated");
  });

  it("should accept an upper-case Q surrounded by spaces", async () => {
    const { terminal, controller } = setup(["  Q "]);
    await controller.run();

    expect(terminal.lines.at(-1)).toBe("Exiting...");
    expect(controller.state.kind).toBe("terminated");
  });

  it("should terminate when input ends", async () => {
    const { terminal, controller } = setup([]);
    await controller.run();

    expect(controller.state.kind).toBe("terminated");
    expect(terminal.lines).toEqual([...HEADER, ...MAIN_MENU_LINES]);
  });

  it("should redisplay the menu silently on empty input", async () => {
    const { terminal, controller } = setup(["", "   ", "q"]);
    await controller.run();

    expect(terminal.lines).toEqual([
      ...HEADER,
      ...MAIN_MENU_LINES,
      ...MAIN_MENU_LINES,
      ...MAIN_MENU_LINES,
      "Exiting...",
    ]);
  });

  it("should reject unknown options and stay on the menu", async () => {
    const { terminal, controller } = setup(["5", "x", "0", "q"]);
    await controller.run();

    expect(terminal.lines.filter((line) => line === "Invalid option. Try again.")).toHaveLength(3);
    expect(terminal.seenStates).toEqual(["main-menu", "main-menu", "main-menu", "main-menu"]);
    expect(terminal.keyWaits).toBe(0);
  });

  it("should match options by their exact number only", async () => {
    const { terminal, controller } = setup(["01", "+1", "004", "q"]);
    await controller.run();

    expect(terminal.lines.filter((line) => line === "Invalid option. Try again.")).toHaveLength(3);
    expect(terminal.seenStates).toEqual(["main-menu", "main-menu", "main-menu", "main-menu"]);
    expect(terminal.lines).not.toContain("Creational Patterns:");
    expect(terminal.lines).not.toContain("All Available Patterns:");
  });
});

// =============================================================================
// Category list and pattern detail
// =============================================================================

describe("MenuController category list", () => {
  it("should list the category and run the chosen demo", async () => {
    const { terminal, controller } = setup(["1", "2", "q"]);
    await controller.run();

    expect(terminal.lines).toEqual([
      ...HEADER,
      ...MAIN_MENU_LINES,
      "Creational Patterns:",
      "1. Beta",
      "2. Zeta",
      "0. Back to Main Menu",
      "Zeta Pattern",
      "------------",
      "Description: Zeta description",
      "",
      "ran Zeta",
      "",
      "Press any key to continue...",
      ...MAIN_MENU_LINES,
      "Exiting...",
    ]);
    expect(terminal.prompts).toEqual([MAIN_MENU_PROMPT, CATEGORY_PROMPT, MAIN_MENU_PROMPT]);
    expect(terminal.seenStates).toEqual(["main-menu", "category-list", "main-menu"]);
    expect(terminal.keyWaits).toBe(1);
  });

  it("should go back on 0 without running anything or waiting", async () => {
    const { terminal, controller } = setup(["2", "0", "q"]);
    await controller.run();

    expect(terminal.lines).toEqual([
      ...HEADER,
      ...MAIN_MENU_LINES,
      "Structural Patterns:",
      "1. Alpha",
      "0. Back to Main Menu",
      ...MAIN_MENU_LINES,
      "Exiting...",
    ]);
    expect(terminal.keyWaits).toBe(0);
  });

  it.each(["3", "-1", "abc", "1.5", "", "00", "-0", "+0"])("should treat %j as an invalid selection", async (input) => {
    const { terminal, controller } = setup(["1", input, "q"]);
    await controller.run();

    const invalidAt = terminal.lines.indexOf("Invalid selection.");
    expect(invalidAt).toBeGreaterThan(0);
    expect(terminal.lines.slice(invalidAt + 1, invalidAt + 3)).toEqual(["", "Press any key to continue..."]);
    expect(terminal.keyWaits).toBe(1);
    expect(terminal.lines.some((line) => line.startsWith("ran "))).toBe(false);
    expect(controller.state.kind).toBe("terminated");
  });

  it("should read a padded number as that pattern", async () => {
    const { terminal, controller } = setup(["1", "01", "q"]);
    await controller.run();

    expect(terminal.lines).toContain("ran Beta");
    expect(terminal.lines).not.toContain("Invalid selection.");
  });

  it("should accept a selection with surrounding spaces", async () => {
    const { terminal, controller } = setup(["1", " 1 ", "q"]);
    await controller.run();

    expect(terminal.lines).toContain("ran Beta");
  });

  it("should report an empty category and return without prompting", async () => {
    const { terminal, controller } = setup(["3", "q"]);
    await controller.run();

    expect(terminal.lines).toEqual([
      ...HEADER,
      ...MAIN_MENU_LINES,
      "No patterns found for category: Behavioral",
      ...MAIN_MENU_LINES,
      "Exiting...",
    ]);
    expect(terminal.prompts).toEqual([MAIN_MENU_PROMPT, MAIN_MENU_PROMPT]);
    expect(terminal.keyWaits).toBe(0);
  });

  it("should terminate when input ends at the pattern prompt", async () => {
    const { terminal, controller } = setup(["1"]);
    await controller.run();

    expect(controller.state.kind).toBe("terminated");
    expect(terminal.lines.at(-1)).toBe("0. Back to Main Menu");
  });

  it("should report a failing demo and keep the menu running", async () => {
    const faulty: PatternRegistration = {
      id: "faulty",
      category: "Behavioral",
      create: () =>
        new StubDemo("Faulty", "Always fails", () => {
          throw new Error("kaput");
        }),
    };
    const { terminal, controller } = setup(["3", "1", "q"], [...REGISTRATIONS, faulty]);
    await controller.run();

    const errorAt = terminal.lines.indexOf("Error during demonstration: kaput");
    expect(terminal.lines.slice(errorAt - 4, errorAt)).toEqual([
      "Faulty Pattern",
      "--------------",
      "Description: Always fails",
      "",
    ]);
    expect(terminal.lines.at(-1)).toBe("Exiting...");
    expect(terminal.keyWaits).toBe(1);
  });
});

// =============================================================================
// All patterns
// =============================================================================

describe("MenuController show all", () => {
  it("should group every pattern by category and wait for a key", async () => {
    const { terminal, controller } = setup(["4", "q"]);
    await controller.run();

    expect(terminal.lines).toEqual([
      ...HEADER,
      ...MAIN_MENU_LINES,
      "All Available Patterns:",
      "",
      "Creational:",
      "  - Beta",
      "  - Zeta",
      "",
      "Structural:",
      "  - Alpha",
      "",
      "Press any key to continue...",
      ...MAIN_MENU_LINES,
      "Exiting...",
    ]);
    expect(terminal.keyWaits).toBe(1);
    expect(terminal.clears).toBe(2);
  });
});

describe("parseSelection", () => {
  it("should parse whole numbers only", () => {
    expect(parseSelection("3")).toBe(3);
    expect(parseSelection("+2")).toBe(2);
    expect(parseSelection("007")).toBe(7);
    expect(parseSelection("-1")).toBe(-1);
    expect(parseSelection("2x")).toBeNull();
    expect(parseSelection("")).toBeNull();
    expect(parseSelection("1e2")).toBeNull();
  });
});
