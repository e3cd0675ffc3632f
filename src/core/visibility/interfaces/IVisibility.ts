/**
 * Visibility Analysis Interfaces
 *
 * Data model and collaborator contracts for the access-tightening core.
 * The declaration graph and the usage index are owned by the caller and are
 * read-only for the duration of a run; the core only holds references into
 * them.
 *
 * @module
 */

import type { CancellationToken } from "../../../utils/async.js";
import type { AccessKeyword, AccessLevel } from "../models/access-level.js";

// =============================================================================
// Declarations
// =============================================================================

export type DeclarationKind = "type" | "method" | "field" | "enum-constant";

export type TypeKind = "class" | "interface" | "enum" | "annotation";

/**
 * Modifier list of a declaration. Access is derived from the modifier list,
 * so a declaration without one has no known current level.
 */
export interface ModifierList {
  access: AccessLevel;
  isPrivate: boolean;
  isNative: boolean;
  isStatic: boolean;
  isFinal: boolean;
  isAbstract: boolean;
  hasInitializer: boolean;
}

export interface Declaration {
  /** Stable identity within one snapshot */
  id: string;
  name: string;
  kind: DeclarationKind;
  /** Only set for `kind === "type"` */
  typeKind: TypeKind | null;
  /** Qualified package name, `""` for the default package */
  packageName: string;
  /** Directly enclosing type; null for top-level types */
  containerId: string | null;
  /** Null when the front end could not build a modifier list */
  modifiers: ModifierList | null;
  annotations: readonly string[];
  isSynthetic: boolean;
  isPhysical: boolean;
  isConstructor: boolean;
  isAnonymous: boolean;
  isLocal: boolean;
  isTypeParameter: boolean;
  /** Single abstract method type that lambdas may implement implicitly */
  isFunctional: boolean;
  /** Direct supertypes (types only) */
  superTypeIds: readonly string[];
  /** Method overrides or implements a supertype signature */
  hasSuperSignature: boolean;
  /** Method is overridden somewhere in the codebase */
  isOverridden: boolean;
}

// =============================================================================
// Usage Sites
// =============================================================================

/**
 * How the reference is qualified. `expression` carries the resolved static
 * type of the qualifier, or null when that type could not be resolved.
 */
export type Qualifier =
  | { form: "none" }
  | { form: "this" }
  | { form: "super" }
  | { form: "expression"; typeId: string | null };

/**
 * Syntactic position of the reference relative to its enclosing type.
 */
export type StructuralContext = "normal" | "reference-list" | "annotation-argument";

/**
 * Where the reference lives. Descriptor references come from non-source
 * files (XML configuration, manifests) that can only reach public members.
 */
export type UsageOrigin =
  | { kind: "source" }
  | { kind: "descriptor"; file: string };

export interface UsageSite {
  origin: UsageOrigin;
  file: string;
  line: number;
  /** Package of the referencing file */
  packageName: string;
  /** Innermost type lexically containing the reference */
  enclosingTypeId: string | null;
  qualifier: Qualifier;
  context: StructuralContext;
  /** `new T()` of the declaring type or a `this()`/`super()` constructor call */
  isConstructorCall: boolean;
  /** False when the front end could not resolve the reference itself */
  resolved: boolean;
}

// =============================================================================
// External Providers
// =============================================================================

/**
 * Declaration and containment provider.
 */
export interface IDeclarationGraph {
  getDeclaration(id: string): Declaration | undefined;
  /** Every declaration, in snapshot order */
  declarations(): readonly Declaration[];
  /** Directly contained members of a type */
  membersOf(containerId: string): readonly Declaration[];
  /** Non-strict lexical containment: a type encloses itself */
  lexicallyEncloses(outerId: string, innerId: string): boolean;
  /** Strict subtype relation over supertypes, transitively */
  isInheritor(typeId: string, baseId: string): boolean;
  /** Number of enclosing types (0 for top-level declarations) */
  depthOf(id: string): number;
}

/**
 * Usage index provider. Scans may be long; implementations poll the token
 * and stop yielding once it is cancelled.
 */
export interface IUsageIndex {
  usagesOf(declaration: Declaration, token: CancellationToken): AsyncIterable<UsageSite>;
  /** Lambdas and method references adopting a functional type */
  functionalUsagesOf(type: Declaration, token: CancellationToken): AsyncIterable<UsageSite>;
}

// =============================================================================
// Oracles
// =============================================================================

/**
 * Decides whether a declaration must stay reachable beyond ordinary usages.
 */
export interface IEntryPointOracle {
  readonly id: string;
  isEntryPoint(declaration: Declaration): boolean;
  /** Minimum level an entry point must keep; null when it must keep its current level */
  minVisibilityFloor(declaration: Declaration): AccessLevel | null;
}

/**
 * Members a framework relies on when it subclasses a type at run time.
 */
export type ForcedMembers =
  | { kind: "all" }
  | { kind: "some"; memberIds: ReadonlySet<string> };

/**
 * Flags framework-imposed subclassing constraints on a container type.
 */
export interface IExtensibilityProvider {
  readonly id: string;
  appliesTo(type: Declaration): boolean;
  forcedMembers(type: Declaration): ForcedMembers | null;
}

// =============================================================================
// Options & Results
// =============================================================================

export interface VisibilityOptions {
  /** Suggest package-private (otherwise public) for top-level types */
  suggestPackageLocalForTopLevelTypes: boolean;
  /** Suggest package-private (otherwise public) for members */
  suggestPackageLocalForMembers: boolean;
  /** Allow private for members of nested types */
  suggestPrivateForInners: boolean;
  /** Analyze static final initialized fields */
  suggestForConstants: boolean;
}

export const DEFAULT_VISIBILITY_OPTIONS: VisibilityOptions = {
  suggestPackageLocalForTopLevelTypes: true,
  suggestPackageLocalForMembers: true,
  suggestPrivateForInners: false,
  suggestForConstants: true,
};

/**
 * Why a declaration keeps its current level without a usage scan.
 */
export type SkipReason =
  | "private-or-native"
  | "synthetic"
  | "overrides"
  | "overridden"
  | "enum-constant"
  | "special-type"
  | "fixed-container"
  | "framework-subclassed"
  | "entry-point"
  | "unused";

/**
 * Why a declaration yields no suggestion and no contribution to its container.
 */
export type UnresolvableReason = "missing-modifiers" | "dangling-container" | "provider-failure";

/**
 * Outcome of resolving one declaration.
 */
export type Resolution =
  | { status: "resolved"; level: AccessLevel; sitesVisited: number }
  | { status: "kept"; level: AccessLevel; reason: SkipReason }
  | { status: "excluded"; reason: "constant" }
  | { status: "unresolvable"; reason: UnresolvableReason }
  | { status: "cancelled" };

/**
 * Edit the reporting layer applies to the modifier list.
 */
export interface ModifierRewrite {
  remove: AccessKeyword | null;
  add: AccessKeyword | null;
}

export interface VisibilitySuggestion {
  declarationId: string;
  name: string;
  current: AccessLevel;
  suggested: AccessLevel;
  message: string;
  rewrite: ModifierRewrite;
}
