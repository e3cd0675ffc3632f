/**
 * Wires configuration, oracles and providers into an analysis run.
 */

import { CancellationToken } from "../utils/async.js";
import { createChildLogger, createLogger, type Logger } from "../utils/logger.js";
import type { AccessLensConfig } from "../utils/validation.js";
import {
  AnnotationEntryPointOracle,
  AnnotationSubclassProvider,
  MainMethodEntryPointOracle,
  type EntryPointAnnotation,
} from "./oracles/index.js";
import type { CodebaseSnapshot } from "./snapshot/loader.js";
import {
  VisibilityAnalysis,
  VisibilityResolver,
  levelFromName,
  type AnalysisReport,
  type IDeclarationGraph,
  type IEntryPointOracle,
  type IExtensibilityProvider,
  type VisibilityOptions,
} from "./visibility/index.js";

export function toVisibilityOptions(config: AccessLensConfig): VisibilityOptions {
  const {
    suggestPackageLocalForTopLevelTypes,
    suggestPackageLocalForMembers,
    suggestPrivateForInners,
    suggestForConstants,
  } = config.analysis;
  return {
    suggestPackageLocalForTopLevelTypes,
    suggestPackageLocalForMembers,
    suggestPrivateForInners,
    suggestForConstants,
  };
}

export function createEntryPointOracles(
  config: AccessLensConfig,
  graph: IDeclarationGraph
): IEntryPointOracle[] {
  const annotations: EntryPointAnnotation[] = config.entryPoints.annotations.map((annotation) => ({
    name: annotation.name,
    minLevel: annotation.minLevel === undefined ? undefined : levelFromName(annotation.minLevel),
  }));

  const oracles: IEntryPointOracle[] = [new AnnotationEntryPointOracle(annotations)];
  if (config.entryPoints.mainMethods) {
    oracles.push(new MainMethodEntryPointOracle(graph));
  }
  return oracles;
}

export function createExtensibilityProviders(
  config: AccessLensConfig,
  graph: IDeclarationGraph
): IExtensibilityProvider[] {
  return config.extensibility.providers.map((rule) => new AnnotationSubclassProvider(rule, graph));
}

export interface AnalyzeOptions {
  token?: CancellationToken;
  logger?: Logger;
}

/**
 * Run the visibility analysis over a loaded snapshot.
 */
export async function analyzeSnapshot(
  snapshot: CodebaseSnapshot,
  config: AccessLensConfig,
  options: AnalyzeOptions = {}
): Promise<AnalysisReport> {
  const logger = options.logger ?? createLogger("analysis");

  const resolver = new VisibilityResolver({
    graph: snapshot.graph,
    usages: snapshot.usages,
    entryPoints: createEntryPointOracles(config, snapshot.graph),
    extensibility: createExtensibilityProviders(config, snapshot.graph),
    options: toVisibilityOptions(config),
    logger: createChildLogger(logger, { stage: "resolver" }),
  });

  const analysis = new VisibilityAnalysis({
    graph: snapshot.graph,
    resolver,
    concurrency: config.analysis.concurrency,
    logger,
  });

  return analysis.run(options.token ?? CancellationToken.none);
}
