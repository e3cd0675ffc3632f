/**
 * Test fixtures for the visibility module
 */

import type { CancellationToken, CancellationTokenSource } from "../../../utils/async.js";
import { InMemoryDeclarationGraph } from "../../snapshot/impl/InMemoryDeclarationGraph.js";
import { InMemoryUsageIndex } from "../../snapshot/impl/InMemoryUsageIndex.js";
import type {
  Declaration,
  IUsageIndex,
  ModifierList,
  UsageSite,
} from "../interfaces/IVisibility.js";
import { AccessLevel } from "../models/access-level.js";

export function modifiers(overrides: Partial<ModifierList> = {}): ModifierList {
  return {
    access: AccessLevel.Public,
    isPrivate: false,
    isNative: false,
    isStatic: false,
    isFinal: false,
    isAbstract: false,
    hasInitializer: false,
    ...overrides,
  };
}

export function declaration(overrides: Partial<Declaration> & { id: string }): Declaration {
  return {
    name: overrides.id.split(".").pop() ?? overrides.id,
    kind: "field",
    typeKind: null,
    packageName: "com.acme",
    containerId: null,
    modifiers: modifiers(),
    annotations: [],
    isSynthetic: false,
    isPhysical: true,
    isConstructor: false,
    isAnonymous: false,
    isLocal: false,
    isTypeParameter: false,
    isFunctional: false,
    superTypeIds: [],
    hasSuperSignature: false,
    isOverridden: false,
    ...overrides,
  };
}

export function typeDeclaration(overrides: Partial<Declaration> & { id: string }): Declaration {
  return declaration({ kind: "type", typeKind: "class", ...overrides });
}

export function site(overrides: Partial<UsageSite> = {}): UsageSite {
  return {
    origin: { kind: "source" },
    file: "Ref.java",
    line: 1,
    packageName: "com.acme",
    enclosingTypeId: null,
    qualifier: { form: "none" },
    context: "normal",
    isConstructorCall: false,
    resolved: true,
    ...overrides,
  };
}

/**
 * Usage index that counts the sites it hands out.
 */
export class CountingUsageIndex implements IUsageIndex {
  yielded = 0;

  constructor(private readonly inner: IUsageIndex) {}

  async *usagesOf(declaration: Declaration, token: CancellationToken): AsyncGenerator<UsageSite> {
    for await (const usage of this.inner.usagesOf(declaration, token)) {
      this.yielded++;
      yield usage;
    }
  }

  async *functionalUsagesOf(type: Declaration, token: CancellationToken): AsyncGenerator<UsageSite> {
    for await (const usage of this.inner.functionalUsagesOf(type, token)) {
      this.yielded++;
      yield usage;
    }
  }
}

/**
 * Usage index that cancels `source` once `limit` sites have been handed out,
 * counted across every scan.
 */
export class CancellingUsageIndex implements IUsageIndex {
  handedOut = 0;

  constructor(
    private readonly inner: IUsageIndex,
    private readonly source: CancellationTokenSource,
    private readonly limit: number
  ) {}

  usagesOf(declaration: Declaration, token: CancellationToken): AsyncGenerator<UsageSite> {
    return this.relay(this.inner.usagesOf(declaration, token));
  }

  functionalUsagesOf(type: Declaration, token: CancellationToken): AsyncGenerator<UsageSite> {
    return this.relay(this.inner.functionalUsagesOf(type, token));
  }

  private async *relay(sites: AsyncIterable<UsageSite>): AsyncGenerator<UsageSite> {
    for await (const usage of sites) {
      yield usage;
      this.handedOut++;
      if (this.handedOut >= this.limit) this.source.cancel("site limit reached");
    }
  }
}

export interface Fixture {
  graph: InMemoryDeclarationGraph;
  usages: CountingUsageIndex;
}

export function fixture(
  declarations: Declaration[],
  usages: Record<string, UsageSite[]> = {},
  functionalUsages: Record<string, UsageSite[]> = {}
): Fixture {
  return {
    graph: new InMemoryDeclarationGraph(declarations),
    usages: new CountingUsageIndex(
      new InMemoryUsageIndex(
        new Map(Object.entries(usages)),
        new Map(Object.entries(functionalUsages))
      )
    ),
  };
}

/**
 * Small codebase shared by the classifier and resolver tests.
 *
 * com.acme:  Account { balance, audit(), Inner { value }, Nested (static) }, Ledger
 * com.other: SavingsAccount extends Account, PremiumAccount extends SavingsAccount, Report
 */
export function bankTypes(): Declaration[] {
  return [
    typeDeclaration({ id: "Account" }),
    declaration({ id: "Account.balance", containerId: "Account" }),
    declaration({ id: "Account.audit", kind: "method", containerId: "Account" }),
    typeDeclaration({ id: "Account.Inner", containerId: "Account" }),
    declaration({ id: "Account.Inner.value", containerId: "Account.Inner" }),
    typeDeclaration({
      id: "Account.Nested",
      containerId: "Account",
      modifiers: modifiers({ isStatic: true }),
    }),
    typeDeclaration({ id: "Ledger" }),
    typeDeclaration({ id: "SavingsAccount", packageName: "com.other", superTypeIds: ["Account"] }),
    typeDeclaration({
      id: "PremiumAccount",
      packageName: "com.other",
      superTypeIds: ["SavingsAccount"],
    }),
    typeDeclaration({ id: "Report", packageName: "com.other" }),
  ];
}
