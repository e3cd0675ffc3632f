/**
 * Access Level Model
 *
 * Totally ordered access levels with a join (max) operation.
 *
 * @module
 */

/**
 * Access levels ordered by visibility breadth.
 */
export enum AccessLevel {
  Private = 1,
  Package = 2,
  Protected = 3,
  Public = 4,
}

/**
 * Modifier keyword for each level. Package access has no keyword.
 */
export type AccessKeyword = "private" | "protected" | "public";

export function maxLevel(a: AccessLevel, b: AccessLevel): AccessLevel {
  return a >= b ? a : b;
}

/**
 * Joins any number of levels, starting from `seed`.
 */
export function joinLevels(levels: Iterable<AccessLevel>, seed: AccessLevel = AccessLevel.Private): AccessLevel {
  let joined = seed;
  for (const level of levels) {
    joined = maxLevel(joined, level);
  }
  return joined;
}

export function isStricter(candidate: AccessLevel, than: AccessLevel): boolean {
  return candidate < than;
}

export function levelKeyword(level: AccessLevel): AccessKeyword | null {
  switch (level) {
    case AccessLevel.Private:
      return "private";
    case AccessLevel.Package:
      return null;
    case AccessLevel.Protected:
      return "protected";
    case AccessLevel.Public:
      return "public";
  }
}

/**
 * Human readable name used in suggestion messages.
 */
export function presentableLevel(level: AccessLevel): string {
  switch (level) {
    case AccessLevel.Private:
      return "private";
    case AccessLevel.Package:
      return "package-private";
    case AccessLevel.Protected:
      return "protected";
    case AccessLevel.Public:
      return "public";
  }
}

const LEVELS_BY_NAME: ReadonlyMap<string, AccessLevel> = new Map([
  ["private", AccessLevel.Private],
  ["package", AccessLevel.Package],
  ["package-private", AccessLevel.Package],
  ["protected", AccessLevel.Protected],
  ["public", AccessLevel.Public],
]);

export function parseAccessLevel(text: string): AccessLevel | null {
  return LEVELS_BY_NAME.get(text.trim().toLowerCase()) ?? null;
}

/**
 * Level names accepted in configuration and snapshot files.
 */
export const ACCESS_LEVEL_NAMES = ["private", "package", "protected", "public"] as const;

export type AccessLevelName = (typeof ACCESS_LEVEL_NAMES)[number];

export function levelFromName(name: AccessLevelName): AccessLevel {
  switch (name) {
    case "private":
      return AccessLevel.Private;
    case "package":
      return AccessLevel.Package;
    case "protected":
      return AccessLevel.Protected;
    case "public":
      return AccessLevel.Public;
  }
}
