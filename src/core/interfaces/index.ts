/**
 * Core interfaces
 *
 * @module
 */

export { MENU_CATEGORIES } from "./IPatternDemo.js";
export type {
  PatternCategory,
  DemoOutput,
  PatternDemo,
  PatternRegistration,
} from "./IPatternDemo.js";
