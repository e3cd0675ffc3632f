/**
 * Entry Point Oracles
 *
 * Declarations reached by reflection, serialization or test harnesses
 * rather than through ordinary references.
 *
 * @module
 */

import type {
  Declaration,
  IDeclarationGraph,
  IEntryPointOracle,
} from "../../visibility/interfaces/IVisibility.js";
import { maxLevel, type AccessLevel } from "../../visibility/models/access-level.js";
import { annotationMatches } from "./annotations.js";

/**
 * Annotation that marks an entry point, with an optional floor.
 */
export interface EntryPointAnnotation {
  name: string;
  /** Absent: the declaration keeps its current level */
  minLevel?: AccessLevel;
}

/**
 * Declarations carrying one of the configured annotations.
 */
export class AnnotationEntryPointOracle implements IEntryPointOracle {
  readonly id = "annotations";

  constructor(private readonly annotations: readonly EntryPointAnnotation[]) {}

  isEntryPoint(declaration: Declaration): boolean {
    return this.matching(declaration).length > 0;
  }

  minVisibilityFloor(declaration: Declaration): AccessLevel | null {
    let floor: AccessLevel | null = null;
    for (const annotation of this.matching(declaration)) {
      if (annotation.minLevel === undefined) return null;
      floor = floor === null ? annotation.minLevel : maxLevel(floor, annotation.minLevel);
    }
    return floor;
  }

  private matching(declaration: Declaration): EntryPointAnnotation[] {
    return this.annotations.filter((annotation) =>
      declaration.annotations.some((name) => annotationMatches(name, annotation.name))
    );
  }
}

/**
 * `static main` methods of top-level types.
 */
export class MainMethodEntryPointOracle implements IEntryPointOracle {
  readonly id = "main-methods";

  constructor(private readonly graph: IDeclarationGraph) {}

  isEntryPoint(declaration: Declaration): boolean {
    if (declaration.kind !== "method" || declaration.name !== "main") return false;
    if (declaration.modifiers?.isStatic !== true || declaration.containerId === null) return false;
    return this.graph.getDeclaration(declaration.containerId)?.containerId === null;
  }

  minVisibilityFloor(): AccessLevel | null {
    return null;
  }
}

/**
 * Combines oracles: an entry point for any delegate. The floor is null as
 * soon as one matching delegate has none, otherwise the broadest floor.
 */
export class CompositeEntryPointOracle implements IEntryPointOracle {
  readonly id = "composite";

  constructor(private readonly delegates: readonly IEntryPointOracle[]) {}

  isEntryPoint(declaration: Declaration): boolean {
    return this.delegates.some((oracle) => oracle.isEntryPoint(declaration));
  }

  minVisibilityFloor(declaration: Declaration): AccessLevel | null {
    let floor: AccessLevel | null = null;
    for (const oracle of this.delegates) {
      if (!oracle.isEntryPoint(declaration)) continue;
      const level = oracle.minVisibilityFloor(declaration);
      if (level === null) return null;
      floor = floor === null ? level : maxLevel(floor, level);
    }
    return floor;
  }
}
