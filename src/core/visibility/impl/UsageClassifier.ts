/**
 * Usage Classifier
 *
 * Computes the narrowest access level a single usage site requires.
 * Rules are evaluated in order and the first match wins:
 *
 * 1. Local access (the reference and the declaring type share a lexical
 *    nesting) can use private, except in reference lists and annotation
 *    arguments, for abstract members and for calls made on a subtype instance.
 * 2. Same-package access, unqualified or through a qualifier of the same
 *    package, needs package-private.
 * 3. Any other explicit qualifier needs public, since protected members
 *    cannot be reached through an arbitrary expression.
 * 4. Access from a strict subtype needs protected, except for constructor
 *    invocations.
 * 5. Everything else needs public.
 *
 * @module
 */

import type {
  Declaration,
  IDeclarationGraph,
  UsageSite,
  VisibilityOptions,
} from "../interfaces/IVisibility.js";
import { AccessLevel } from "../models/access-level.js";

/**
 * Whether the declaration is a type with no enclosing type.
 */
export function isTopLevelType(declaration: Declaration): boolean {
  return (
    declaration.kind === "type" &&
    declaration.containerId === null &&
    !declaration.isLocal &&
    !declaration.isAnonymous
  );
}

/**
 * Level used wherever package-private would be suggested. Depending on
 * configuration, package-private is replaced by public.
 */
export function packageLocalLevel(
  declaration: Declaration,
  options: VisibilityOptions
): AccessLevel {
  const allowed = isTopLevelType(declaration)
    ? options.suggestPackageLocalForTopLevelTypes
    : options.suggestPackageLocalForMembers;
  return allowed ? AccessLevel.Package : AccessLevel.Public;
}

function isInnerType(type: Declaration): boolean {
  return type.containerId !== null || type.isAnonymous;
}

export class UsageClassifier {
  constructor(
    private readonly graph: IDeclarationGraph,
    private readonly options: VisibilityOptions
  ) {}

  /**
   * Classify one usage site of `member`.
   *
   * @param container - The type declaring `member`, undefined for top-level types
   */
  classify(site: UsageSite, member: Declaration, container: Declaration | undefined): AccessLevel {
    // Nothing can be proven about a reference that does not resolve
    if (!site.resolved) return AccessLevel.Public;

    const enclosing =
      site.enclosingTypeId !== null ? this.graph.getDeclaration(site.enclosingTypeId) : undefined;

    if (container && enclosing && this.isLocalAccess(enclosing, container)) {
      if (site.context !== "normal") {
        return packageLocalLevel(member, this.options);
      }
      const isAbstract = member.modifiers?.isAbstract ?? false;
      if (isAbstract || this.isCalledOnInheritor(site, container)) {
        return packageLocalLevel(member, this.options);
      }
      if (!this.options.suggestPrivateForInners && isInnerType(container)) {
        return packageLocalLevel(member, this.options);
      }
      return AccessLevel.Private;
    }

    const qualifierPackage = this.qualifierPackage(site);
    const hasQualifier = site.qualifier.form === "expression";

    if (
      site.packageName === member.packageName &&
      (!hasQualifier || qualifierPackage === site.packageName)
    ) {
      return packageLocalLevel(member, this.options);
    }

    if (hasQualifier) return AccessLevel.Public;

    if (
      enclosing &&
      container &&
      this.graph.isInheritor(enclosing.id, container.id) &&
      !site.isConstructorCall
    ) {
      return AccessLevel.Protected;
    }

    return AccessLevel.Public;
  }

  /**
   * The referencing type encloses the declaring type, or sits inside it
   * without being static.
   */
  private isLocalAccess(enclosing: Declaration, container: Declaration): boolean {
    if (this.graph.lexicallyEncloses(enclosing.id, container.id)) return true;
    const isStatic = enclosing.modifiers?.isStatic ?? false;
    return !isStatic && this.graph.lexicallyEncloses(container.id, enclosing.id);
  }

  private isCalledOnInheritor(site: UsageSite, container: Declaration): boolean {
    if (site.qualifier.form !== "expression" || site.qualifier.typeId === null) return false;
    return this.graph.isInheritor(site.qualifier.typeId, container.id);
  }

  /**
   * Package of the qualifier's static type; null without an expression
   * qualifier or when the type is unknown to the graph.
   */
  private qualifierPackage(site: UsageSite): string | null {
    if (site.qualifier.form !== "expression" || site.qualifier.typeId === null) return null;
    return this.graph.getDeclaration(site.qualifier.typeId)?.packageName ?? null;
  }
}
