/**
 * Default command - interactive pattern menu
 */

import { createPatternCatalog, PATTERN_REGISTRY } from "../../core/catalog/index.js";
import type { PatternRegistration } from "../../core/interfaces/index.js";
import { createLogger } from "../../utils/index.js";
import { createReadlineTerminal, type MenuTerminal } from "../interactive.js";
import { createMenuController } from "../menu-controller.js";

const logger = createLogger("menu-command");

export interface MenuOptions {
  /** Commander sets this to false for --no-clear */
  clear?: boolean;
}

export interface MenuDependencies {
  terminal?: MenuTerminal;
  registrations?: readonly PatternRegistration[];
}

/**
 * Run the menu until the user quits or input ends. The terminal is closed
 * on the way out whether or not the loop failed.
 */
export async function menuCommand(
  options: MenuOptions = {},
  deps: MenuDependencies = {}
): Promise<void> {
  const terminal = deps.terminal ?? createReadlineTerminal({ clearScreen: options.clear ?? true });
  const catalog = createPatternCatalog(deps.registrations ?? PATTERN_REGISTRY, { output: terminal });
  logger.debug({ patterns: catalog.size, failures: catalog.failures.length }, "Starting menu");

  try {
    await createMenuController({ catalog, terminal }).run();
  } finally {
    terminal.close();
  }
}
