/**
 * Catalog Module
 *
 * @module
 */

export * from "./pattern-catalog.js";
export * from "./registry.js";

