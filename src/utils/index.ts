/**
 * Shared utilities
 */

export * from "./logger.js";
export * from "./errors.js";
export * from "./validation.js";
