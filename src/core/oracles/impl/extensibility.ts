/**
 * Extensibility Providers
 *
 * Frameworks that generate subclasses at run time (proxies, mocks,
 * persistence enhancers) rely on the visibility of the methods they
 * override, so those methods keep their current level.
 *
 * @module
 */

import type {
  Declaration,
  ForcedMembers,
  IDeclarationGraph,
  IExtensibilityProvider,
} from "../../visibility/interfaces/IVisibility.js";
import { annotationMatches } from "./annotations.js";

export interface SubclassingRule {
  /** Type annotation that makes the framework subclass the type */
  annotation: string;
  /**
   * Method annotations the framework intercepts. When absent, every method
   * of the type is forced.
   */
  forcedMethodAnnotations?: readonly string[];
}

/**
 * Applies to types carrying the rule's annotation.
 */
export class AnnotationSubclassProvider implements IExtensibilityProvider {
  readonly id: string;

  constructor(
    private readonly rule: SubclassingRule,
    private readonly graph: IDeclarationGraph
  ) {
    this.id = `subclassed-by:${rule.annotation}`;
  }

  appliesTo(type: Declaration): boolean {
    return (
      type.kind === "type" &&
      type.annotations.some((name) => annotationMatches(name, this.rule.annotation))
    );
  }

  forcedMembers(type: Declaration): ForcedMembers | null {
    const methodAnnotations = this.rule.forcedMethodAnnotations;
    if (methodAnnotations === undefined) return { kind: "all" };

    const memberIds = new Set<string>();
    for (const member of this.graph.membersOf(type.id)) {
      if (member.kind !== "method") continue;
      const forced = member.annotations.some((name) =>
        methodAnnotations.some((wanted) => annotationMatches(name, wanted))
      );
      if (forced) memberIds.add(member.id);
    }
    return memberIds.size > 0 ? { kind: "some", memberIds } : null;
  }
}
