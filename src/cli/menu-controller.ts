/**
 * Menu Controller
 *
 * Drives the interactive console: a main menu of categories, a numbered
 * list per category, a detail view that runs one demo, and a view of every
 * pattern grouped by category. Each loop iteration handles one state and
 * returns the next one; input ending at any prompt terminates the loop.
 *
 * @module
 */

import chalk from "chalk";
import type { PatternCatalog } from "../core/catalog/index.js";
import { MENU_CATEGORIES, type PatternCategory, type PatternDemo } from "../core/interfaces/index.js";
import { createLogger } from "../utils/logger.js";
import type { MenuTerminal } from "./interactive.js";
import { presentDemo, renderAllPatterns, underline } from "./present.js";

const logger = createLogger("menu");

// =============================================================================
// States
// =============================================================================

export type MenuState =
  | { kind: "main-menu" }
  | { kind: "category-list"; category: PatternCategory }
  | { kind: "pattern-detail"; demo: PatternDemo }
  | { kind: "all-patterns" }
  | { kind: "terminated" };

const MAIN_MENU: MenuState = { kind: "main-menu" };
const ALL_PATTERNS: MenuState = { kind: "all-patterns" };
const TERMINATED: MenuState = { kind: "terminated" };

export const BANNER = "Design Patterns Demo - 23 GoF Patterns";
export const MAIN_MENU_PROMPT = "Select: ";
export const CATEGORY_PROMPT = "Select a pattern: ";
export const CONTINUE_MESSAGE = "Press any key to continue...";

/**
 * Parse a whole-number selection; anything else is null
 */
export function parseSelection(input: string): number | null {
  return /^[+-]?\d+$/.test(input) ? Number.parseInt(input, 10) : null;
}

// =============================================================================
// Controller
// =============================================================================

export interface MenuControllerOptions {
  catalog: PatternCatalog;
  terminal: MenuTerminal;
}

export class MenuController {
  private readonly catalog: PatternCatalog;
  private readonly terminal: MenuTerminal;
  private current: MenuState = MAIN_MENU;

  constructor(options: MenuControllerOptions) {
    this.catalog = options.catalog;
    this.terminal = options.terminal;
  }

  /** State the controller is in, or will handle next */
  get state(): MenuState {
    return this.current;
  }

  /**
   * Print the banner and loop until the user quits or input ends
   */
  async run(): Promise<void> {
    this.terminal.clear();
    const [title, rule] = underline(BANNER, "=");
    this.terminal.writeLine(chalk.bold(title));
    this.terminal.writeLine(rule);

    while (this.current.kind !== "terminated") {
      const next = await this.step(this.current);
      logger.debug({ from: this.current.kind, to: next.kind }, "Menu transition");
      this.current = next;
    }
  }

  private async step(state: MenuState): Promise<MenuState> {
    switch (state.kind) {
      case "main-menu":
        return this.mainMenu();
      case "category-list":
        return this.categoryList(state.category);
      case "pattern-detail":
        this.terminal.clear();
        presentDemo(state.demo, this.terminal);
        return this.pause();
      case "all-patterns":
        this.terminal.clear();
        for (const line of renderAllPatterns(this.catalog)) {
          this.terminal.writeLine(line);
        }
        return this.pause();
      case "terminated":
        return state;
    }
  }

  // ===========================================================================
  // Views
  // ===========================================================================

  private async mainMenu(): Promise<MenuState> {
    this.terminal.writeLine();
    this.terminal.writeLine(chalk.bold("Main Menu:"));
    MENU_CATEGORIES.forEach((category, index) => {
      this.terminal.writeLine(`${index + 1}. ${category} Patterns`);
    });
    this.terminal.writeLine(`${MENU_CATEGORIES.length + 1}. Show All Patterns`);
    this.terminal.writeLine("Q. Quit");

    const input = await this.terminal.readLine(MAIN_MENU_PROMPT);
    if (input === null) return TERMINATED;

    const choice = input.trim();
    if (choice === "") return MAIN_MENU;

    if (choice.toUpperCase() === "Q") {
      this.terminal.writeLine("Exiting...");
      return TERMINATED;
    }

    // Options match their exact number only; "01" or "+1" is not option 1
    const category = MENU_CATEGORIES.find((_, index) => choice === String(index + 1));
    if (category) return { kind: "category-list", category };
    if (choice === String(MENU_CATEGORIES.length + 1)) return ALL_PATTERNS;

    this.terminal.writeLine(chalk.red("Invalid option. Try again."));
    return MAIN_MENU;
  }

  private async categoryList(category: PatternCategory): Promise<MenuState> {
    const demos = this.catalog.filterByCategory(category);
    if (demos.length === 0) {
      this.terminal.writeLine(chalk.yellow(`No patterns found for category: ${category}`));
      return MAIN_MENU;
    }

    this.terminal.clear();
    this.terminal.writeLine(chalk.bold(`${category} Patterns:`));
    demos.forEach((demo, index) => {
      this.terminal.writeLine(`${index + 1}. ${demo.name}`);
    });
    this.terminal.writeLine("0. Back to Main Menu");

    const input = await this.terminal.readLine(CATEGORY_PROMPT);
    if (input === null) return TERMINATED;

    const choice = input.trim();
    if (choice === "0") return MAIN_MENU;

    const selection = parseSelection(choice);
    const demo = selection === null || selection < 1 ? undefined : demos[selection - 1];
    if (demo) return { kind: "pattern-detail", demo };

    this.terminal.writeLine(chalk.red("Invalid selection."));
    return this.pause();
  }

  private async pause(): Promise<MenuState> {
    this.terminal.writeLine();
    this.terminal.writeLine(chalk.dim(CONTINUE_MESSAGE));
    await this.terminal.waitForKey();
    return MAIN_MENU;
  }
}

/**
 * Create a menu controller over a catalog and terminal
 */
export function createMenuController(options: MenuControllerOptions): MenuController {
  return new MenuController(options);
}
