/**
 * Core module - Shared functionality between the CLI and library consumers
 */

// Re-export error classes
export * from "./errors.js";

// Re-export all core modules
export * from "./visibility/index.js";
export * from "./oracles/index.js";
export * from "./snapshot/index.js";
export * from "./config.js";
export * from "./analyze.js";
