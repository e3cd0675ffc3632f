/**
 * In-memory usage index built from a snapshot.
 *
 * @module
 */

import type { CancellationToken } from "../../../utils/async.js";
import type {
  Declaration,
  IUsageIndex,
  UsageSite,
} from "../../visibility/interfaces/IVisibility.js";

export class InMemoryUsageIndex implements IUsageIndex {
  constructor(
    private readonly usages: ReadonlyMap<string, readonly UsageSite[]>,
    private readonly functionalUsages: ReadonlyMap<string, readonly UsageSite[]> = new Map()
  ) {}

  usagesOf(declaration: Declaration, token: CancellationToken): AsyncIterable<UsageSite> {
    return iterate(this.usages.get(declaration.id) ?? [], token);
  }

  functionalUsagesOf(type: Declaration, token: CancellationToken): AsyncIterable<UsageSite> {
    return iterate(this.functionalUsages.get(type.id) ?? [], token);
  }
}

async function* iterate(
  sites: readonly UsageSite[],
  token: CancellationToken
): AsyncGenerator<UsageSite> {
  for (const site of sites) {
    if (token.cancelled) return;
    yield site;
  }
}
