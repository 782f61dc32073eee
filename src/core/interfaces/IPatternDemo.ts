/**
 * IPatternDemo - Contract between the catalog and the pattern demonstrations
 *
 * A demo is a self-contained illustration of one design pattern. The catalog
 * and menu only ever look at its name, its description and its action.
 *
 * @module
 */

/**
 * Category a demo is filed under. `Unknown` is the catch-all for
 * registrations that do not declare one.
 */
export type PatternCategory = "Creational" | "Structural" | "Behavioral" | "Unknown";

/**
 * The three categories offered by the main menu, in menu order
 */
export const MENU_CATEGORIES = ["Creational", "Structural", "Behavioral"] as const satisfies readonly PatternCategory[];

/**
 * Line-oriented sink demos narrate into.
 */
export interface DemoOutput {
  writeLine(line?: string): void;
}

/**
 * A runnable pattern demonstration.
 *
 * @example
 * ```typescript
 * class FacadePatternDemo implements PatternDemo {
 *   readonly name = "Facade";
 *   readonly description = "Provides a simplified interface to a complex subsystem.";
 *   constructor(private readonly out: DemoOutput) {}
 *   demonstrate(): void {
 *     new HomeTheaterFacade(this.out).watchMovie("The Matrix");
 *   }
 * }
 * ```
 */
export interface PatternDemo {
  /** Display name, used for sorting and menu labels */
  readonly name: string;
  /** What the pattern does and when to reach for it */
  readonly description: string;
  /** Runs the demonstration. May throw. */
  demonstrate(): void;
}

/**
 * Build-time registration of a demo.
 */
export interface PatternRegistration {
  /** Kebab-case handle, e.g. `factory-method` */
  id: string;
  /** Defaults to `Unknown` */
  category?: PatternCategory;
  create: (output: DemoOutput) => PatternDemo;
}
