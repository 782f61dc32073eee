/**
 * Error types shared by the catalog, the menu and the CLI
 *
 * @module
 */

/**
 * Normalises anything thrown into an Error
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) return value;
  return new Error(typeof value === "string" ? value : String(value));
}

/**
 * A registered demo could not be constructed.
 * Carries the message of the underlying failure so it can be shown verbatim.
 */
export class DemoConstructionError extends Error {
  readonly patternId: string;

  constructor(patternId: string, cause: unknown) {
    const error = toError(cause);
    super(error.message, { cause: error });
    this.name = "DemoConstructionError";
    this.patternId = patternId;
  }
}

/**
 * A demo was constructed but its name or description is unusable
 */
export class InvalidDemoMetadataError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidDemoMetadataError";
  }
}
