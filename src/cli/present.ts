/**
 * Rendering shared by the interactive menu and the one-shot commands
 *
 * @module
 */

import chalk from "chalk";
import type { PatternCatalog } from "../core/catalog/index.js";
import type { DemoOutput, PatternDemo } from "../core/interfaces/index.js";
import { createLogger } from "../utils/logger.js";
import { toError } from "../utils/errors.js";

const logger = createLogger("present");

/**
 * DemoOutput that writes to stdout
 */
export const consoleOutput: DemoOutput = {
  writeLine(line = "") {
    console.log(line);
  },
};

/**
 * Title line followed by an underline of the same width
 */
export function underline(title: string, rule: string): string[] {
  return [title, rule.repeat(title.length)];
}

/**
 * Header, description, then the demo's own output. A throwing demo is
 * reported on `out` and logged; the return value says whether it finished.
 */
export function presentDemo(demo: PatternDemo, out: DemoOutput): boolean {
  const [title, rule] = underline(`${demo.name} Pattern`, "-");
  out.writeLine(chalk.cyan.bold(title));
  out.writeLine(rule);
  out.writeLine(`Description: ${demo.description}`);
  out.writeLine();

  try {
    demo.demonstrate();
    return true;
  } catch (error) {
    const failure = toError(error);
    logger.warn({ err: failure, pattern: demo.name }, "Demonstration failed");
    out.writeLine(chalk.red(`Error during demonstration: ${failure.message}`));
    return false;
  }
}

/**
 * Every category with its demos, as shown by "Show All Patterns"
 */
export function renderAllPatterns(catalog: PatternCatalog): string[] {
  const lines = [chalk.bold("All Available Patterns:")];
  for (const [category, demos] of catalog.groupByCategory()) {
    lines.push("", chalk.yellow(`${category}:`));
    for (const demo of demos) {
      lines.push(`  - ${demo.name}`);
    }
  }
  return lines;
}
