/**
 * Annotation name matching shared by the oracles.
 */

/**
 * `@org.junit.Test` -> `Test`
 */
export function simpleName(name: string): string {
  const withoutAt = name.startsWith("@") ? name.slice(1) : name;
  const dot = withoutAt.lastIndexOf(".");
  return dot >= 0 ? withoutAt.slice(dot + 1) : withoutAt;
}

function stripAt(name: string): string {
  return name.startsWith("@") ? name.slice(1) : name;
}

/**
 * Fully qualified names must match exactly; a simple name on either side
 * matches by simple name.
 */
export function annotationMatches(actual: string, wanted: string): boolean {
  const a = stripAt(actual);
  const w = stripAt(wanted);
  if (a === w) return true;
  if (a.includes(".") && w.includes(".")) return false;
  return simpleName(a) === simpleName(w);
}
