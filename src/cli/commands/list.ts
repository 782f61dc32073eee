/**
 * list command - Print every pattern grouped by category
 */

import { createPatternCatalog, PATTERN_REGISTRY } from "../../core/catalog/index.js";
import type { DemoOutput, PatternRegistration } from "../../core/interfaces/index.js";
import { consoleOutput, renderAllPatterns } from "../present.js";

export interface CommandDependencies {
  output?: DemoOutput;
  registrations?: readonly PatternRegistration[];
}

export async function listCommand(deps: CommandDependencies = {}): Promise<void> {
  const output = deps.output ?? consoleOutput;
  const catalog = createPatternCatalog(deps.registrations ?? PATTERN_REGISTRY, { output });

  for (const line of renderAllPatterns(catalog)) {
    output.writeLine(line);
  }
}
