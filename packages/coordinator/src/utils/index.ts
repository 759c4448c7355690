/**
 * Utility module barrel exports.
 */

export * from "./colors.js";
export * from "./errors.js";
export * from "./invariant.js";
export * from "./logger.js";
export * from "./timeout.js";
