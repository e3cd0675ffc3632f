/**
 * access-lens
 *
 * Suggests the tightest access level each declaration can take without
 * breaking its usages.
 */

export * from "./core/index.js";
export * from "./types/result.js";
export { CancellationToken, CancellationTokenSource } from "./utils/async.js";
export type { AccessLensConfig } from "./utils/validation.js";
