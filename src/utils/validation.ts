/**
 * Runtime Validation Schemas
 *
 * Zod schemas for values that cross a trust boundary: demo metadata produced
 * by registered factories, registration ids and environment settings.
 *
 * @module
 */

import { z } from "zod";

// =============================================================================
// Logging
// =============================================================================

export const LogLevelSchema = z.enum([
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
  "silent",
]);

export type LogLevel = z.infer<typeof LogLevelSchema>;

// =============================================================================
// Pattern Registry
// =============================================================================

/**
 * Registration ids are kebab-case handles such as `chain-of-responsibility`
 */
export const PatternIdSchema = z
  .string()
  .regex(/^[a-z]+(-[a-z]+)*$/, "Pattern id must be kebab-case");

/**
 * What the catalog requires of every constructed demo
 */
export const PatternMetadataSchema = z.object({
  name: z.string().trim().min(1, "Pattern name must not be empty"),
  description: z.string(),
});

export type PatternMetadata = z.infer<typeof PatternMetadataSchema>;

/**
 * Formats the first zod issue as a single line
 */
export function formatValidationError(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return "Validation failed";
  const where = issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
  return `${where}${issue.message}`;
}
