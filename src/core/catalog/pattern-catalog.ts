/**
 * Pattern Catalog
 *
 * Builds one demo per registration, keeps the ones that construct cleanly,
 * and answers the menu's queries: the full sorted list, one category, or
 * every category grouped.
 *
 * @module
 */

import type {
  DemoOutput,
  PatternCategory,
  PatternDemo,
  PatternRegistration,
} from "../interfaces/IPatternDemo.js";
import { err, ok, partition, tryCatch, type Result } from "../../types/result.js";
import { createLogger } from "../../utils/logger.js";
import { DemoConstructionError, InvalidDemoMetadataError } from "../../utils/errors.js";
import { PatternMetadataSchema, formatValidationError } from "../../utils/validation.js";

const logger = createLogger("catalog");

// =============================================================================
// Types
// =============================================================================

/**
 * A constructed demo together with its registration data
 */
export interface CatalogEntry {
  id: string;
  category: PatternCategory;
  demo: PatternDemo;
}

/**
 * A registration that could not be turned into a usable demo
 */
export interface DiscoveryFailure {
  id: string;
  error: DemoConstructionError;
}

export interface PatternCatalogOptions {
  /** Sink handed to every demo; construction warnings are written here too */
  output: DemoOutput;
}

// =============================================================================
// Ordering
// =============================================================================

/**
 * Ordinal (UTF-16 code unit) comparison, independent of locale
 */
export function compareOrdinal(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function byName(a: PatternDemo, b: PatternDemo): number {
  return compareOrdinal(a.name, b.name);
}

// =============================================================================
// Catalog
// =============================================================================

export class PatternCatalog {
  private readonly entries: readonly CatalogEntry[];
  private readonly demos: readonly PatternDemo[];
  private readonly categories: ReadonlyMap<PatternDemo, PatternCategory>;
  readonly failures: readonly DiscoveryFailure[];

  constructor(registrations: readonly PatternRegistration[], options: PatternCatalogOptions) {
    const results = registrations.map((registration) =>
      PatternCatalog.construct(registration, options.output)
    );
    const { oks, errs } = partition(results);

    for (const failure of errs) {
      options.output.writeLine(
        `Warning: Could not create instance of ${failure.id}: ${failure.error.message}`
      );
      logger.warn({ id: failure.id, err: failure.error.cause }, "Skipping pattern demo");
    }

    // Array.prototype.sort is stable, so equal names keep registration order
    this.entries = [...oks].sort((a, b) => byName(a.demo, b.demo));
    this.demos = this.entries.map((entry) => entry.demo);
    this.categories = new Map(this.entries.map((entry) => [entry.demo, entry.category]));
    this.failures = errs;

    logger.debug(
      { demos: this.entries.length, failures: errs.length },
      "Pattern catalog built"
    );
  }

  private static construct(
    registration: PatternRegistration,
    output: DemoOutput
  ): Result<CatalogEntry, DiscoveryFailure> {
    const created = tryCatch(
      () => registration.create(output),
      (error) => new DemoConstructionError(registration.id, error)
    );
    if (!created.ok) {
      return err({ id: registration.id, error: created.error });
    }

    const demo = created.value;
    const metadata = PatternMetadataSchema.safeParse({
      name: demo.name,
      description: demo.description,
    });
    if (!metadata.success) {
      const invalid = new InvalidDemoMetadataError(formatValidationError(metadata.error));
      return err({ id: registration.id, error: new DemoConstructionError(registration.id, invalid) });
    }

    return ok({
      id: registration.id,
      category: registration.category ?? "Unknown",
      demo,
    });
  }

  /** Number of demos in the catalog */
  get size(): number {
    return this.demos.length;
  }

  /**
   * Every demo, sorted by name ascending
   */
  discover(): readonly PatternDemo[] {
    return this.demos;
  }

  /**
   * Demos whose category equals `label` exactly (case-sensitive), sorted by name
   */
  filterByCategory(label: string): PatternDemo[] {
    return this.entries
      .filter((entry) => entry.category === label)
      .map((entry) => entry.demo);
  }

  /**
   * Category → demos, keys and values both in ascending order.
   * Recomputed on every call.
   */
  groupByCategory(): Map<string, PatternDemo[]> {
    const groups = new Map<string, PatternDemo[]>();
    for (const entry of this.entries) {
      const group = groups.get(entry.category);
      if (group) {
        group.push(entry.demo);
      } else {
        groups.set(entry.category, [entry.demo]);
      }
    }

    const sorted = new Map<string, PatternDemo[]>();
    for (const key of [...groups.keys()].sort(compareOrdinal)) {
      sorted.set(key, groups.get(key) ?? []);
    }
    return sorted;
  }

  /**
   * Category recorded for a demo, `Unknown` for demos this catalog does not hold
   */
  categoryOf(demo: PatternDemo): PatternCategory {
    return this.categories.get(demo) ?? "Unknown";
  }

  /** Entries in the same order as `discover()` */
  listEntries(): readonly CatalogEntry[] {
    return this.entries;
  }

  findById(id: string): CatalogEntry | undefined {
    return this.entries.find((entry) => entry.id === id);
  }

  /**
   * Case-insensitive lookup by display name
   */
  findByName(name: string): CatalogEntry | undefined {
    const wanted = name.trim().toLowerCase();
    return this.entries.find((entry) => entry.demo.name.toLowerCase() === wanted);
  }
}

/**
 * Create a pattern catalog from a list of registrations
 */
export function createPatternCatalog(
  registrations: readonly PatternRegistration[],
  options: PatternCatalogOptions
): PatternCatalog {
  return new PatternCatalog(registrations, options);
}
