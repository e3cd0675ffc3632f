/**
 * In-memory declaration graph built from a snapshot.
 *
 * @module
 */

import type { Declaration, IDeclarationGraph } from "../../visibility/interfaces/IVisibility.js";

export class InMemoryDeclarationGraph implements IDeclarationGraph {
  private readonly byId = new Map<string, Declaration>();
  private readonly members = new Map<string, Declaration[]>();
  private readonly depths = new Map<string, number>();
  private readonly ordered: readonly Declaration[];

  /**
   * Containment must be acyclic; the snapshot loader checks this before
   * building a graph.
   */
  constructor(declarations: readonly Declaration[]) {
    this.ordered = declarations;
    for (const declaration of declarations) {
      this.byId.set(declaration.id, declaration);
    }
    for (const declaration of declarations) {
      if (declaration.containerId === null) continue;
      const siblings = this.members.get(declaration.containerId);
      if (siblings) {
        siblings.push(declaration);
      } else {
        this.members.set(declaration.containerId, [declaration]);
      }
    }
  }

  getDeclaration(id: string): Declaration | undefined {
    return this.byId.get(id);
  }

  declarations(): readonly Declaration[] {
    return this.ordered;
  }

  membersOf(containerId: string): readonly Declaration[] {
    return this.members.get(containerId) ?? [];
  }

  lexicallyEncloses(outerId: string, innerId: string): boolean {
    let current: string | null = innerId;
    while (current !== null) {
      if (current === outerId) return true;
      current = this.byId.get(current)?.containerId ?? null;
    }
    return false;
  }

  isInheritor(typeId: string, baseId: string): boolean {
    if (typeId === baseId) return false;
    const visited = new Set<string>([typeId]);
    const queue = [...(this.byId.get(typeId)?.superTypeIds ?? [])];
    while (queue.length > 0) {
      const next = queue.shift();
      if (next === undefined || visited.has(next)) continue;
      if (next === baseId) return true;
      visited.add(next);
      queue.push(...(this.byId.get(next)?.superTypeIds ?? []));
    }
    return false;
  }

  depthOf(id: string): number {
    const cached = this.depths.get(id);
    if (cached !== undefined) return cached;

    const containerId = this.byId.get(id)?.containerId ?? null;
    const depth = containerId === null ? 0 : this.depthOf(containerId) + 1;
    this.depths.set(id, depth);
    return depth;
  }
}
