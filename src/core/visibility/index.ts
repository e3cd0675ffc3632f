/**
 * Visibility Module
 *
 * Computes the tightest access level every declaration can take without
 * breaking its usages, and withdraws suggestions that would leave a type
 * less visible than its members.
 */

// Interfaces
export * from "./interfaces/IVisibility.js";

// Models
export * from "./models/access-level.js";

// Implementation
export { UsageClassifier, isTopLevelType, packageLocalLevel } from "./impl/UsageClassifier.js";
export { VisibilityResolver, isConstantField, type VisibilityResolverConfig } from "./impl/VisibilityResolver.js";
export { ContainmentAggregator, type AggregationResult } from "./impl/ContainmentAggregator.js";
export { LevelAccumulator, ContainerLevelMap } from "./impl/level-maps.js";
export { buildSuggestion } from "./impl/suggestions.js";
export {
  VisibilityAnalysis,
  DEFAULT_CONCURRENCY,
  type VisibilityAnalysisConfig,
  type AnalysisReport,
  type AnalysisStats,
} from "./impl/VisibilityAnalysis.js";
