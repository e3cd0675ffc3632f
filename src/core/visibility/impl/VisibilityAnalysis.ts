/**
 * Visibility Analysis Run
 *
 * Resolves every declaration of a graph on a bounded pool of concurrent
 * tasks, records each result into the run's container level map, then
 * aggregates bottom-up and builds the suggestions.
 *
 * @module
 */

import { CancellationToken, mapConcurrent } from "../../../utils/async.js";
import { createLogger, type Logger } from "../../../utils/logger.js";
import { AnalysisError, ErrorCode } from "../../errors.js";
import type {
  IDeclarationGraph,
  Resolution,
  VisibilitySuggestion,
} from "../interfaces/IVisibility.js";
import { isStricter, type AccessLevel } from "../models/access-level.js";
import { ContainmentAggregator } from "./ContainmentAggregator.js";
import { ContainerLevelMap } from "./level-maps.js";
import { buildSuggestion } from "./suggestions.js";
import type { VisibilityResolver } from "./VisibilityResolver.js";

export const DEFAULT_CONCURRENCY = 4;

export interface VisibilityAnalysisConfig {
  graph: IDeclarationGraph;
  resolver: VisibilityResolver;
  /** Declarations resolved at the same time */
  concurrency?: number;
  logger?: Logger;
}

export interface AnalysisStats {
  declarations: number;
  resolved: number;
  kept: number;
  excluded: number;
  unresolvable: number;
  cancelled: number;
  suggestions: number;
  withdrawn: number;
  durationMs: number;
}

export interface AnalysisReport {
  /** Ordered as the declarations of the graph */
  suggestions: VisibilitySuggestion[];
  resolutions: Map<string, Resolution>;
  /** Types that could be tightened on their own but contain more visible members */
  withdrawn: string[];
  cancelled: boolean;
  stats: AnalysisStats;
}

export class VisibilityAnalysis {
  private readonly graph: IDeclarationGraph;
  private readonly resolver: VisibilityResolver;
  private readonly concurrency: number;
  private readonly logger: Logger;

  constructor(config: VisibilityAnalysisConfig) {
    const concurrency = config.concurrency ?? DEFAULT_CONCURRENCY;
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new AnalysisError(
        `Concurrency must be a positive integer, got ${concurrency}`,
        ErrorCode.INVALID_ARGUMENT,
        { concurrency }
      );
    }
    this.graph = config.graph;
    this.resolver = config.resolver;
    this.concurrency = concurrency;
    this.logger = config.logger ?? createLogger("analysis");
  }

  async run(token: CancellationToken = CancellationToken.none): Promise<AnalysisReport> {
    const started = Date.now();
    const declarations = this.graph.declarations();
    const levels = new ContainerLevelMap();
    const suggested = new Map<string, AccessLevel>();
    const resolutions = new Map<string, Resolution>();

    this.logger.debug(
      { declarations: declarations.length, concurrency: this.concurrency },
      "Resolving declarations"
    );

    await mapConcurrent(
      declarations,
      async (declaration) => {
        const resolution: Resolution = token.cancelled
          ? { status: "cancelled" }
          : await this.resolver.resolve(declaration, token);
        resolutions.set(declaration.id, resolution);

        const level = levelOf(resolution);
        if (level !== undefined) suggested.set(declaration.id, level);

        // A cancelled member still holds its container at its current level
        const contribution =
          level ?? (resolution.status === "cancelled" ? declaration.modifiers?.access : undefined);
        if (declaration.containerId !== null && contribution !== undefined) {
          levels.accumulate(declaration.containerId, contribution);
        }
      },
      this.concurrency
    );

    const aggregation = new ContainmentAggregator(this.graph).aggregate(levels, suggested);

    const suggestions: VisibilitySuggestion[] = [];
    const withdrawn: string[] = [];
    for (const declaration of declarations) {
      const current = declaration.modifiers?.access;
      const level = suggested.get(declaration.id);
      if (current === undefined || level === undefined || !isStricter(level, current)) continue;

      if (aggregation.withdrawn.has(declaration.id)) {
        this.logger.debug({ declaration: declaration.id }, "suggestion withdrawn by member levels");
        withdrawn.push(declaration.id);
        continue;
      }
      suggestions.push(buildSuggestion(declaration, current, level));
    }

    const stats = summarize(resolutions, suggestions.length, withdrawn.length, started);
    const report: AnalysisReport = {
      suggestions,
      resolutions,
      withdrawn,
      cancelled: token.cancelled,
      stats,
    };

    if (report.cancelled) {
      this.logger.warn({ ...stats, reason: token.reason }, "Visibility analysis cancelled");
    } else {
      this.logger.info(stats, "Visibility analysis complete");
    }
    return report;
  }
}

function levelOf(resolution: Resolution): AccessLevel | undefined {
  return resolution.status === "resolved" || resolution.status === "kept" ? resolution.level : undefined;
}

function summarize(
  resolutions: ReadonlyMap<string, Resolution>,
  suggestions: number,
  withdrawn: number,
  started: number
): AnalysisStats {
  const stats: AnalysisStats = {
    declarations: resolutions.size,
    resolved: 0,
    kept: 0,
    excluded: 0,
    unresolvable: 0,
    cancelled: 0,
    suggestions,
    withdrawn,
    durationMs: Date.now() - started,
  };
  for (const resolution of resolutions.values()) {
    stats[resolution.status]++;
  }
  return stats;
}
