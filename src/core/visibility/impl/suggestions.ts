/**
 * Suggestion descriptors handed to the reporting layer.
 */

import type { Declaration, VisibilitySuggestion } from "../interfaces/IVisibility.js";
import { levelKeyword, presentableLevel, type AccessLevel } from "../models/access-level.js";

export function buildSuggestion(
  declaration: Declaration,
  current: AccessLevel,
  suggested: AccessLevel
): VisibilitySuggestion {
  return {
    declarationId: declaration.id,
    name: declaration.name,
    current,
    suggested,
    message: `Access can be ${presentableLevel(suggested)}`,
    rewrite: {
      remove: levelKeyword(current),
      add: levelKeyword(suggested),
    },
  };
}
