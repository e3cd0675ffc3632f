/**
 * Snapshot Module
 *
 * Loads the codebase snapshot written by a front end and exposes it through
 * the declaration graph and usage index contracts.
 */

export * from "./models/snapshot.js";
export { InMemoryDeclarationGraph } from "./impl/InMemoryDeclarationGraph.js";
export { InMemoryUsageIndex } from "./impl/InMemoryUsageIndex.js";
export { loadSnapshot, parseSnapshot, type CodebaseSnapshot } from "./loader.js";
