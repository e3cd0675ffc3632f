/**
 * Snapshot Loader
 *
 * Reads and validates a codebase snapshot and builds the in-memory providers
 * from it. Every failure is returned as a SnapshotError, never thrown.
 *
 * @module
 */

import * as fs from "node:fs";
import { andThen, err, map, ok, type Result } from "../../types/result.js";
import { createLogger } from "../../utils/logger.js";
import { formatZodError, safeValidate } from "../../utils/validation.js";
import { ErrorCode, SnapshotError } from "../errors.js";
import type {
  Declaration,
  IDeclarationGraph,
  IUsageIndex,
  UsageSite,
} from "../visibility/interfaces/IVisibility.js";
import { levelFromName } from "../visibility/models/access-level.js";
import { InMemoryDeclarationGraph } from "./impl/InMemoryDeclarationGraph.js";
import { InMemoryUsageIndex } from "./impl/InMemoryUsageIndex.js";
import {
  SnapshotSchema,
  type DeclarationRecord,
  type SnapshotRecord,
  type UsageSiteRecord,
} from "./models/snapshot.js";

const logger = createLogger("snapshot");

export interface CodebaseSnapshot {
  graph: IDeclarationGraph;
  usages: IUsageIndex;
}

/**
 * Read a snapshot file.
 */
export function loadSnapshot(filePath: string): Result<CodebaseSnapshot, SnapshotError> {
  if (!fs.existsSync(filePath)) {
    return err(
      new SnapshotError("Snapshot file not found", ErrorCode.SNAPSHOT_NOT_FOUND, { filePath })
    );
  }

  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return err(
      new SnapshotError(`Snapshot is not readable JSON: ${reason}`, ErrorCode.SNAPSHOT_UNREADABLE, {
        filePath,
      })
    );
  }

  const result = parseSnapshot(data, filePath);
  if (result.ok) {
    logger.debug(
      { filePath, declarations: result.value.graph.declarations().length },
      "Snapshot loaded"
    );
  }
  return result;
}

/**
 * Validate already parsed snapshot data.
 */
export function parseSnapshot(
  data: unknown,
  filePath?: string
): Result<CodebaseSnapshot, SnapshotError> {
  const validation = safeValidate(SnapshotSchema, data);
  if (!validation.success) {
    return err(
      new SnapshotError("Snapshot does not match the expected format", ErrorCode.SNAPSHOT_SCHEMA_INVALID, {
        filePath,
        issues: formatZodError(validation.error),
      })
    );
  }

  return map(
    andThen(checkReferences(validation.data, filePath), checkContainment),
    (record) => buildProviders(record)
  );
}

// =============================================================================
// Cross Reference Checks
// =============================================================================

interface CheckedRecord {
  record: SnapshotRecord;
  byId: Map<string, DeclarationRecord>;
  filePath?: string;
}

function checkReferences(
  record: SnapshotRecord,
  filePath?: string
): Result<CheckedRecord, SnapshotError> {
  const issues: string[] = [];
  const byId = new Map<string, DeclarationRecord>();

  for (const declaration of record.declarations) {
    if (byId.has(declaration.id)) {
      issues.push(`declarations: duplicate id '${declaration.id}'`);
    }
    byId.set(declaration.id, declaration);
  }

  for (const declaration of record.declarations) {
    if (declaration.containerId === null) continue;
    const container = byId.get(declaration.containerId);
    if (!container) {
      issues.push(`${declaration.id}: unknown container '${declaration.containerId}'`);
    } else if (container.kind !== "type") {
      issues.push(`${declaration.id}: container '${declaration.containerId}' is not a type`);
    }
  }

  const usageMaps = { usages: record.usages, functionalUsages: record.functionalUsages };
  for (const [section, usages] of Object.entries(usageMaps)) {
    for (const [id, sites] of Object.entries(usages)) {
      if (!byId.has(id)) {
        issues.push(`${section}: unknown declaration '${id}'`);
      }
      sites.forEach((site, index) => {
        if (site.enclosingTypeId !== null && byId.get(site.enclosingTypeId)?.kind !== "type") {
          issues.push(`${section}.${id}[${index}]: unknown enclosing type '${site.enclosingTypeId}'`);
        }
      });
    }
  }

  if (issues.length > 0) {
    return err(
      new SnapshotError("Snapshot has dangling references", ErrorCode.SNAPSHOT_DANGLING_REFERENCE, {
        filePath,
        issues,
      })
    );
  }
  return ok({ record, byId, filePath });
}

function checkContainment(checked: CheckedRecord): Result<SnapshotRecord, SnapshotError> {
  const issues: string[] = [];

  for (const declaration of checked.record.declarations) {
    const seen = new Set<string>([declaration.id]);
    let containerId = declaration.containerId;
    while (containerId !== null) {
      if (seen.has(containerId)) {
        issues.push(`${declaration.id}: containment cycle through '${containerId}'`);
        break;
      }
      seen.add(containerId);
      containerId = checked.byId.get(containerId)?.containerId ?? null;
    }
  }

  if (issues.length > 0) {
    return err(
      new SnapshotError("Snapshot containment is cyclic", ErrorCode.SNAPSHOT_CONTAINMENT_CYCLE, {
        filePath: checked.filePath,
        issues,
      })
    );
  }
  return ok(checked.record);
}

// =============================================================================
// Conversion
// =============================================================================

function buildProviders(record: SnapshotRecord): CodebaseSnapshot {
  const declarations = record.declarations.map(toDeclaration);
  return {
    graph: new InMemoryDeclarationGraph(declarations),
    usages: new InMemoryUsageIndex(toSiteMap(record.usages), toSiteMap(record.functionalUsages)),
  };
}

function toDeclaration(record: DeclarationRecord): Declaration {
  const modifiers = record.modifiers;
  return {
    id: record.id,
    name: record.name,
    kind: record.kind,
    typeKind: record.kind === "type" ? record.typeKind : null,
    packageName: record.package,
    containerId: record.containerId,
    modifiers:
      modifiers === null
        ? null
        : {
            access: levelFromName(modifiers.access),
            isPrivate: modifiers.isPrivate ?? modifiers.access === "private",
            isNative: modifiers.isNative,
            isStatic: modifiers.isStatic,
            isFinal: modifiers.isFinal,
            isAbstract: modifiers.isAbstract,
            hasInitializer: modifiers.hasInitializer,
          },
    annotations: record.annotations,
    isSynthetic: record.isSynthetic,
    isPhysical: record.isPhysical,
    isConstructor: record.isConstructor,
    isAnonymous: record.isAnonymous,
    isLocal: record.isLocal,
    isTypeParameter: record.isTypeParameter,
    isFunctional: record.isFunctional,
    superTypeIds: record.superTypeIds,
    hasSuperSignature: record.hasSuperSignature,
    isOverridden: record.isOverridden,
  };
}

function toUsageSite(record: UsageSiteRecord): UsageSite {
  return {
    origin: record.origin === "descriptor" ? { kind: "descriptor", file: record.file } : { kind: "source" },
    file: record.file,
    line: record.line,
    packageName: record.package,
    enclosingTypeId: record.enclosingTypeId,
    qualifier: record.qualifier,
    context: record.context,
    isConstructorCall: record.isConstructorCall,
    resolved: record.resolved,
  };
}

function toSiteMap(usages: Record<string, UsageSiteRecord[]>): Map<string, UsageSite[]> {
  return new Map(Object.entries(usages).map(([id, sites]) => [id, sites.map(toUsageSite)]));
}
