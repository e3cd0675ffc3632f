/**
 * Containment Aggregator
 *
 * Bottom-up pass over types: a type cannot be less visible than the most
 * visible member it contains, directly or through nested types. A type whose
 * own suggestion is below that level loses its suggestion.
 *
 * @module
 */

import type { Declaration, IDeclarationGraph } from "../interfaces/IVisibility.js";
import { isStricter, maxLevel, type AccessLevel } from "../models/access-level.js";
import type { ContainerLevelMap } from "./level-maps.js";

export interface AggregationResult {
  /** Types whose suggestion must not be emitted */
  withdrawn: Set<string>;
}

export class ContainmentAggregator {
  constructor(private readonly graph: IDeclarationGraph) {}

  /**
   * @param levels - Direct member contributions recorded during resolution;
   *   extended here with the levels of nested types' members
   * @param suggested - Suggested level of every declaration that has one
   */
  aggregate(levels: ContainerLevelMap, suggested: ReadonlyMap<string, AccessLevel>): AggregationResult {
    const withdrawn = new Set<string>();

    for (const type of this.typesInnermostFirst()) {
      const childMax = levels.get(type.id);
      if (childMax === undefined) continue;

      const own = suggested.get(type.id);
      if (own !== undefined && isStricter(own, childMax)) {
        withdrawn.add(type.id);
      }

      if (type.containerId !== null) {
        const effective = own === undefined ? childMax : maxLevel(own, childMax);
        levels.accumulate(type.containerId, effective);
      }
    }

    return { withdrawn };
  }

  private typesInnermostFirst(): Declaration[] {
    const types = this.graph.declarations().filter((declaration) => declaration.kind === "type");
    const depth = new Map(types.map((type) => [type.id, this.graph.depthOf(type.id)]));
    return types.sort((a, b) => (depth.get(b.id) ?? 0) - (depth.get(a.id) ?? 0));
  }
}
