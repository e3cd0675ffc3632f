/**
 * Oracles Module
 *
 * Entry point oracles and extensibility providers injected into the
 * visibility resolver.
 */

export {
  AnnotationEntryPointOracle,
  MainMethodEntryPointOracle,
  CompositeEntryPointOracle,
  type EntryPointAnnotation,
} from "./impl/entry-points.js";
export { AnnotationSubclassProvider, type SubclassingRule } from "./impl/extensibility.js";
export { annotationMatches, simpleName } from "./impl/annotations.js";
