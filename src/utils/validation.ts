/**
 * Runtime Validation Schemas
 *
 * Zod schemas for validating configuration at runtime, plus helpers shared
 * by every schema-validated input.
 *
 * @module
 */

import { z } from "zod";
import { ACCESS_LEVEL_NAMES } from "../core/visibility/models/access-level.js";

// =============================================================================
// Analysis Configuration Schema
// =============================================================================

/**
 * Options of the resolver and the analysis run
 */
export const AnalysisConfigSchema = z.object({
  /** Suggest package-private for top-level types (public otherwise) */
  suggestPackageLocalForTopLevelTypes: z.boolean().default(true),

  /** Suggest package-private for members (public otherwise) */
  suggestPackageLocalForMembers: z.boolean().default(true),

  /** Allow private suggestions for members of nested types */
  suggestPrivateForInners: z.boolean().default(false),

  /** Analyze static final fields with initializers */
  suggestForConstants: z.boolean().default(true),

  /** Declarations resolved in parallel */
  concurrency: z.number().int().positive().default(4),
});

export type AnalysisConfig = z.infer<typeof AnalysisConfigSchema>;

// =============================================================================
// Oracle Configuration Schemas
// =============================================================================

export const EntryPointAnnotationSchema = z.object({
  name: z.string().min(1),
  /** Lowest level the annotated declaration may be tightened to */
  minLevel: z.enum(ACCESS_LEVEL_NAMES).optional(),
});

export const DEFAULT_ENTRY_POINT_ANNOTATIONS: z.input<typeof EntryPointAnnotationSchema>[] = [
  { name: "org.junit.Test" },
  { name: "org.junit.jupiter.api.Test" },
  { name: "org.junit.jupiter.api.BeforeEach" },
  { name: "org.junit.jupiter.api.AfterEach" },
  { name: "org.testng.annotations.Test" },
  { name: "com.fasterxml.jackson.annotation.JsonCreator", minLevel: "package" },
  { name: "javax.inject.Inject", minLevel: "package" },
];

export const EntryPointConfigSchema = z.object({
  annotations: z.array(EntryPointAnnotationSchema).default(DEFAULT_ENTRY_POINT_ANNOTATIONS),
  /** Treat `static main` of top-level types as entry points */
  mainMethods: z.boolean().default(true),
});

export const SubclassingRuleSchema = z.object({
  annotation: z.string().min(1),
  forcedMethodAnnotations: z.array(z.string().min(1)).optional(),
});

export const ExtensibilityConfigSchema = z.object({
  providers: z.array(SubclassingRuleSchema).default([]),
});

// =============================================================================
// Root Configuration Schema
// =============================================================================

export const AccessLensConfigSchema = z.object({
  analysis: AnalysisConfigSchema.default({}),
  entryPoints: EntryPointConfigSchema.default({}),
  extensibility: ExtensibilityConfigSchema.default({}),
});

export type AccessLensConfig = z.infer<typeof AccessLensConfigSchema>;

// =============================================================================
// Validation Utilities
// =============================================================================

/**
 * Validation result type
 */
export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; error: z.ZodError };

/**
 * Safely validate data against a schema (returns result object)
 */
export function safeValidate<S extends z.ZodTypeAny>(
  schema: S,
  data: unknown
): ValidationResult<z.output<S>> {
  const result = schema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, error: result.error };
}

/**
 * Format Zod errors into readable messages
 */
export function formatZodError(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
