/**
 * Visibility Resolver
 *
 * Resolves the tightest access level for one declaration: applies the skip
 * rules, consults the entry point and extensibility oracles, then joins the
 * classifier's verdict over every usage site.
 *
 * @module
 */

import type { CancellationToken } from "../../../utils/async.js";
import { createLogger, type Logger } from "../../../utils/logger.js";
import { CompositeEntryPointOracle } from "../../oracles/impl/entry-points.js";
import type {
  Declaration,
  IDeclarationGraph,
  IEntryPointOracle,
  IExtensibilityProvider,
  IUsageIndex,
  ModifierList,
  Resolution,
  SkipReason,
  UsageSite,
  VisibilityOptions,
} from "../interfaces/IVisibility.js";
import { DEFAULT_VISIBILITY_OPTIONS } from "../interfaces/IVisibility.js";
import { AccessLevel, presentableLevel } from "../models/access-level.js";
import { LevelAccumulator } from "./level-maps.js";
import { UsageClassifier, packageLocalLevel } from "./UsageClassifier.js";

export interface VisibilityResolverConfig {
  graph: IDeclarationGraph;
  usages: IUsageIndex;
  entryPoints?: readonly IEntryPointOracle[];
  extensibility?: readonly IExtensibilityProvider[];
  options?: Partial<VisibilityOptions>;
  logger?: Logger;
}

/**
 * Static final field with an initializer.
 */
export function isConstantField(declaration: Declaration, modifiers: ModifierList): boolean {
  return (
    declaration.kind === "field" &&
    modifiers.isStatic &&
    modifiers.isFinal &&
    modifiers.hasInitializer
  );
}

const FIXED_CONTAINER_KINDS = new Set(["interface", "enum", "annotation"]);

export class VisibilityResolver {
  private readonly graph: IDeclarationGraph;
  private readonly usages: IUsageIndex;
  private readonly entryPoints: IEntryPointOracle;
  private readonly extensibility: readonly IExtensibilityProvider[];
  private readonly classifier: UsageClassifier;
  private readonly logger: Logger;
  readonly options: VisibilityOptions;

  constructor(config: VisibilityResolverConfig) {
    this.graph = config.graph;
    this.usages = config.usages;
    this.entryPoints = new CompositeEntryPointOracle(config.entryPoints ?? []);
    this.extensibility = config.extensibility ?? [];
    this.options = { ...DEFAULT_VISIBILITY_OPTIONS, ...config.options };
    this.classifier = new UsageClassifier(this.graph, this.options);
    this.logger = config.logger ?? createLogger("resolver");
  }

  /**
   * Suggested level for `member`, or null when no suggestion can be made
   * (malformed data, cancellation, excluded constants).
   */
  async suggestLevel(member: Declaration, token: CancellationToken): Promise<AccessLevel | null> {
    const resolution = await this.resolve(member, token);
    switch (resolution.status) {
      case "resolved":
      case "kept":
        return resolution.level;
      default:
        return null;
    }
  }

  async resolve(member: Declaration, token: CancellationToken): Promise<Resolution> {
    const modifiers = member.modifiers;
    if (modifiers === null) {
      return { status: "unresolvable", reason: "missing-modifiers" };
    }
    if (!this.options.suggestForConstants && isConstantField(member, modifiers)) {
      return { status: "excluded", reason: "constant" };
    }

    let container: Declaration | undefined;
    if (member.containerId !== null) {
      container = this.graph.getDeclaration(member.containerId);
      if (!container) {
        return { status: "unresolvable", reason: "dangling-container" };
      }
    }

    const currentLevel = modifiers.access;
    const skip = this.skipReason(member, modifiers, container);
    if (skip !== null) {
      return this.keep(member, currentLevel, skip);
    }

    let minLevel = AccessLevel.Private;
    const entryPoint = this.entryPoints.isEntryPoint(member);
    if (entryPoint) {
      const floor = this.entryPoints.minVisibilityFloor(member);
      if (floor === null) {
        return this.keep(member, currentLevel, "entry-point");
      }
      minLevel = floor;
    }

    const accumulator = new LevelAccumulator(minLevel);
    try {
      const scans = [this.scan(this.usages.usagesOf(member, token), member, container, accumulator, token)];
      if (member.kind === "type" && member.isFunctional) {
        scans.push(
          this.scan(this.usages.functionalUsagesOf(member, token), member, container, accumulator, token)
        );
      }
      await Promise.all(scans);
    } catch (error) {
      this.logger.warn({ err: error, declaration: member.id }, "usage scan failed");
      return { status: "unresolvable", reason: "provider-failure" };
    }

    if (token.cancelled) {
      return { status: "cancelled" };
    }

    if (!accumulator.foundUsage && !entryPoint) {
      // Unused declarations are left to dead code detection
      return this.keep(member, currentLevel, "unused");
    }

    let level = accumulator.level;
    if (level === AccessLevel.Private && container === undefined) {
      level = packageLocalLevel(member, this.options);
    }

    this.logger.trace(
      { declaration: member.id, sites: accumulator.sitesVisited },
      `${member.name}: effective level is '${presentableLevel(level)}'`
    );
    return { status: "resolved", level, sitesVisited: accumulator.sitesVisited };
  }

  private skipReason(
    member: Declaration,
    modifiers: ModifierList,
    container: Declaration | undefined
  ): SkipReason | null {
    if (modifiers.isPrivate || modifiers.isNative) return "private-or-native";
    if (member.isSynthetic || !member.isPhysical) return "synthetic";

    if (member.kind === "method") {
      if (member.hasSuperSignature) return "overrides";
      if (member.isOverridden) return "overridden";
    }
    if (member.kind === "enum-constant") return "enum-constant";
    if (member.kind === "type" && (member.isAnonymous || member.isLocal || member.isTypeParameter)) {
      return "special-type";
    }

    if (container) {
      if (container.typeKind !== null && FIXED_CONTAINER_KINDS.has(container.typeKind)) {
        return "fixed-container";
      }
      if (container.isLocal) return "fixed-container";

      if (member.kind === "method" && this.isForcedByFramework(member, container)) {
        return "framework-subclassed";
      }
    }
    return null;
  }

  private isForcedByFramework(member: Declaration, container: Declaration): boolean {
    for (const provider of this.extensibility) {
      if (!provider.appliesTo(container)) continue;
      const forced = provider.forcedMembers(container);
      if (forced === null) continue;
      if (forced.kind === "all" || forced.memberIds.has(member.id)) {
        this.logger.trace({ declaration: member.id, provider: provider.id }, "subclassed by framework");
        return true;
      }
    }
    return false;
  }

  private keep(member: Declaration, level: AccessLevel, reason: SkipReason): Resolution {
    this.logger.trace({ declaration: member.id, reason }, `${member.name}: keeps current level`);
    return { status: "kept", level, reason };
  }

  /**
   * Folds one stream of usage sites into the shared accumulator. Stops at
   * the first descriptor reference, at the first public site, when the
   * other scan saturated the accumulator, or on cancellation.
   */
  private async scan(
    sites: AsyncIterable<UsageSite>,
    member: Declaration,
    container: Declaration | undefined,
    accumulator: LevelAccumulator,
    token: CancellationToken
  ): Promise<void> {
    for await (const site of sites) {
      if (token.cancelled || accumulator.saturated) break;
      accumulator.visit();

      if (site.origin.kind === "descriptor") {
        this.logger.trace({ declaration: member.id, file: site.origin.file }, "referenced from descriptor");
        accumulator.accumulate(AccessLevel.Public);
        break;
      }

      const level = this.classifier.classify(site, member, container);
      this.logger.trace(
        { declaration: member.id, file: site.file, line: site.line },
        `ref level = ${presentableLevel(level)}`
      );
      accumulator.accumulate(level);
      if (accumulator.saturated) break;
    }
  }
}
