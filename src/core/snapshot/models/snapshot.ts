/**
 * Snapshot Models
 *
 * Zod schemas for the codebase snapshot a front end writes: declarations,
 * containment, supertypes and usage sites.
 *
 * @module
 */

import { z } from "zod";
import { ACCESS_LEVEL_NAMES } from "../../visibility/models/access-level.js";

export const SNAPSHOT_VERSION = 1;

export const AccessLevelNameSchema = z.enum(ACCESS_LEVEL_NAMES);

export const ModifierListSchema = z.object({
  access: AccessLevelNameSchema,
  isPrivate: z.boolean().optional(),
  isNative: z.boolean().default(false),
  isStatic: z.boolean().default(false),
  isFinal: z.boolean().default(false),
  isAbstract: z.boolean().default(false),
  hasInitializer: z.boolean().default(false),
});

export type ModifierListRecord = z.infer<typeof ModifierListSchema>;

export const DeclarationRecordSchema = z
  .object({
    id: z.string().min(1),
    name: z.string().min(1),
    kind: z.enum(["type", "method", "field", "enum-constant"]),
    typeKind: z.enum(["class", "interface", "enum", "annotation"]).nullable().default(null),
    package: z.string().default(""),
    containerId: z.string().min(1).nullable().default(null),
    modifiers: ModifierListSchema.nullable().default(null),
    annotations: z.array(z.string()).default([]),
    isSynthetic: z.boolean().default(false),
    isPhysical: z.boolean().default(true),
    isConstructor: z.boolean().default(false),
    isAnonymous: z.boolean().default(false),
    isLocal: z.boolean().default(false),
    isTypeParameter: z.boolean().default(false),
    isFunctional: z.boolean().default(false),
    superTypeIds: z.array(z.string()).default([]),
    hasSuperSignature: z.boolean().default(false),
    isOverridden: z.boolean().default(false),
  })
  .refine((record) => record.kind !== "type" || record.typeKind !== null, {
    message: "types must declare a typeKind",
    path: ["typeKind"],
  });

export type DeclarationRecord = z.infer<typeof DeclarationRecordSchema>;

export const QualifierSchema = z.discriminatedUnion("form", [
  z.object({ form: z.literal("none") }),
  z.object({ form: z.literal("this") }),
  z.object({ form: z.literal("super") }),
  z.object({ form: z.literal("expression"), typeId: z.string().nullable().default(null) }),
]);

export const UsageSiteRecordSchema = z.object({
  origin: z.enum(["source", "descriptor"]).default("source"),
  file: z.string().min(1),
  line: z.number().int().nonnegative().default(0),
  package: z.string().default(""),
  enclosingTypeId: z.string().nullable().default(null),
  qualifier: QualifierSchema.default({ form: "none" }),
  context: z.enum(["normal", "reference-list", "annotation-argument"]).default("normal"),
  isConstructorCall: z.boolean().default(false),
  resolved: z.boolean().default(true),
});

export type UsageSiteRecord = z.infer<typeof UsageSiteRecordSchema>;

export const SnapshotSchema = z.object({
  version: z.literal(SNAPSHOT_VERSION),
  declarations: z.array(DeclarationRecordSchema),
  usages: z.record(z.string(), z.array(UsageSiteRecordSchema)).default({}),
  functionalUsages: z.record(z.string(), z.array(UsageSiteRecordSchema)).default({}),
});

/** Snapshot as written by a front end, before defaults are applied */
export type SnapshotInput = z.input<typeof SnapshotSchema>;

export type SnapshotRecord = z.infer<typeof SnapshotSchema>;
