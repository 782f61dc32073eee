/**
 * run command - Run a single demo without the menu
 */

import chalk from "chalk";
import { createPatternCatalog, PATTERN_REGISTRY } from "../../core/catalog/index.js";
import { createChildLogger, createLogger } from "../../utils/index.js";
import { consoleOutput, presentDemo } from "../present.js";
import type { CommandDependencies } from "./list.js";

const logger = createLogger("run");

/**
 * Look the pattern up by registration id, then by display name.
 *
 * @returns the process exit code: 0 when the demo finished, 1 otherwise
 */
export async function runCommand(pattern: string, deps: CommandDependencies = {}): Promise<number> {
  const log = createChildLogger(logger, { pattern });
  const output = deps.output ?? consoleOutput;
  const catalog = createPatternCatalog(deps.registrations ?? PATTERN_REGISTRY, { output });

  const entry = catalog.findById(pattern.trim().toLowerCase()) ?? catalog.findByName(pattern);
  if (!entry) {
    log.debug("No such pattern");
    output.writeLine(chalk.red(`Unknown pattern: ${pattern}`));
    output.writeLine();
    output.writeLine("Available patterns:");
    for (const { id } of catalog.listEntries()) {
      output.writeLine(`  ${id}`);
    }
    return 1;
  }

  log.debug({ id: entry.id }, "Running demonstration");
  return presentDemo(entry.demo, output) ? 0 : 1;
}
