/**
 * Snapshot Loader Tests
 *
 * Schema validation, cross reference checks and conversion into the
 * in-memory providers.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import type { Result } from "../../../types/result.js";
import { CancellationToken } from "../../../utils/async.js";
import { ErrorCode, type SnapshotError } from "../../errors.js";
import type { UsageSite } from "../../visibility/interfaces/IVisibility.js";
import { VisibilityResolver } from "../../visibility/impl/VisibilityResolver.js";
import { AccessLevel } from "../../visibility/models/access-level.js";
import { loadSnapshot, parseSnapshot, type CodebaseSnapshot } from "../loader.js";
import type { SnapshotInput } from "../models/snapshot.js";

function snapshotInput(): SnapshotInput {
  return {
    version: 1,
    declarations: [
      {
        id: "Account",
        name: "Account",
        kind: "type",
        typeKind: "class",
        package: "com.acme",
        modifiers: { access: "public" },
      },
      {
        id: "Account.balance",
        name: "balance",
        kind: "field",
        package: "com.acme",
        containerId: "Account",
        modifiers: { access: "protected", isFinal: true },
      },
      {
        id: "Account.secret",
        name: "secret",
        kind: "field",
        package: "com.acme",
        containerId: "Account",
        modifiers: { access: "private" },
      },
    ],
    usages: {
      "Account.balance": [
        { file: "Account.java", line: 3, package: "com.acme", enclosingTypeId: "Account" },
        { origin: "descriptor", file: "beans.xml" },
      ],
    },
  };
}

function expectOk(result: Result<CodebaseSnapshot, SnapshotError>): CodebaseSnapshot {
  if (!result.ok) throw new Error(`expected a snapshot, got ${result.error.toString()}`);
  return result.value;
}

function expectError(result: Result<CodebaseSnapshot, SnapshotError>): SnapshotError {
  if (result.ok) throw new Error("expected the snapshot to be rejected");
  return result.error;
}

async function collect(sites: AsyncIterable<UsageSite>): Promise<UsageSite[]> {
  const collected: UsageSite[] = [];
  for await (const site of sites) collected.push(site);
  return collected;
}

// =============================================================================
// Conversion
// =============================================================================

describe("parseSnapshot", () => {
  it("should build the declaration graph with defaults applied", () => {
    const { graph } = expectOk(parseSnapshot(snapshotInput()));

    expect(graph.declarations().map((d) => d.id)).toEqual(["Account", "Account.balance", "Account.secret"]);
    expect(graph.membersOf("Account").map((d) => d.id)).toEqual(["Account.balance", "Account.secret"]);
    expect(graph.getDeclaration("Account.balance")).toMatchObject({
      packageName: "com.acme",
      typeKind: null,
      annotations: [],
      isPhysical: true,
      modifiers: {
        access: AccessLevel.Protected,
        isPrivate: false,
        isFinal: true,
        isStatic: false,
      },
    });
  });

  it("should derive the private flag from the access level", () => {
    const { graph } = expectOk(parseSnapshot(snapshotInput()));
    expect(graph.getDeclaration("Account.secret")?.modifiers?.isPrivate).toBe(true);
  });

  it("should convert usage sites", async () => {
    const { graph, usages } = expectOk(parseSnapshot(snapshotInput()));
    const balance = graph.getDeclaration("Account.balance");
    if (!balance) throw new Error("missing Account.balance");

    const sites = await collect(usages.usagesOf(balance, CancellationToken.none));
    expect(sites).toEqual([
      {
        origin: { kind: "source" },
        file: "Account.java",
        line: 3,
        packageName: "com.acme",
        enclosingTypeId: "Account",
        qualifier: { form: "none" },
        context: "normal",
        isConstructorCall: false,
        resolved: true,
      },
      {
        origin: { kind: "descriptor", file: "beans.xml" },
        file: "beans.xml",
        line: 0,
        packageName: "",
        enclosingTypeId: null,
        qualifier: { form: "none" },
        context: "normal",
        isConstructorCall: false,
        resolved: true,
      },
    ]);
  });

  it("should answer containment and inheritance queries", () => {
    const input = snapshotInput();
    input.declarations.push(
      {
        id: "Account.Entry",
        name: "Entry",
        kind: "type",
        typeKind: "class",
        containerId: "Account",
        modifiers: { access: "public" },
      },
      {
        id: "Savings",
        name: "Savings",
        kind: "type",
        typeKind: "class",
        superTypeIds: ["Account"],
        modifiers: { access: "public" },
      }
    );
    const { graph } = expectOk(parseSnapshot(input));

    expect(graph.lexicallyEncloses("Account", "Account.Entry")).toBe(true);
    expect(graph.lexicallyEncloses("Account", "Account")).toBe(true);
    expect(graph.lexicallyEncloses("Account.Entry", "Account")).toBe(false);
    expect(graph.isInheritor("Savings", "Account")).toBe(true);
    expect(graph.isInheritor("Account", "Account")).toBe(false);
    expect(graph.depthOf("Account.Entry")).toBe(1);
    expect(graph.depthOf("Savings")).toBe(0);
  });

  it("should load a declaration without modifiers and leave it unresolvable", async () => {
    const input = snapshotInput();
    input.declarations.push({
      id: "Account.legacy",
      name: "legacy",
      kind: "field",
      package: "com.acme",
      containerId: "Account",
    });
    const { graph, usages } = expectOk(parseSnapshot(input));
    const legacy = graph.getDeclaration("Account.legacy");

    expect(legacy?.modifiers).toBeNull();
    if (!legacy) throw new Error("expected Account.legacy in the graph");
    const resolver = new VisibilityResolver({ graph, usages });
    expect(await resolver.resolve(legacy, CancellationToken.none)).toEqual({
      status: "unresolvable",
      reason: "missing-modifiers",
    });
  });
});

// =============================================================================
// Rejections
// =============================================================================

describe("parseSnapshot rejections", () => {
  it("should reject an unsupported version", () => {
    const error = expectError(parseSnapshot({ ...snapshotInput(), version: 2 }));
    expect(error.code).toBe(ErrorCode.SNAPSHOT_SCHEMA_INVALID);
    expect(error.issues).toHaveLength(1);
    expect(error.issues[0]).toMatch(/^version: /);
  });

  it("should reject types without a type kind", () => {
    const input = snapshotInput();
    input.declarations.push({ id: "Broken", name: "Broken", kind: "type", modifiers: { access: "public" } });

    const error = expectError(parseSnapshot(input));
    expect(error.code).toBe(ErrorCode.SNAPSHOT_SCHEMA_INVALID);
    expect(error.issues).toEqual(["declarations.3.typeKind: types must declare a typeKind"]);
  });

  it("should report every dangling reference", () => {
    const input = snapshotInput();
    input.declarations.push(
      { id: "Orphan.field", name: "field", kind: "field", containerId: "Orphan", modifiers: { access: "public" } },
      {
        id: "Account.balance.x",
        name: "x",
        kind: "field",
        containerId: "Account.balance",
        modifiers: { access: "public" },
      },
      { id: "Account", name: "Account", kind: "type", typeKind: "class", modifiers: { access: "public" } }
    );
    input.usages = {
      Nope: [],
      "Account.secret": [{ file: "Other.java", enclosingTypeId: "Nowhere" }],
    };

    const error = expectError(parseSnapshot(input, "snapshot.json"));
    expect(error.code).toBe(ErrorCode.SNAPSHOT_DANGLING_REFERENCE);
    expect(error.filePath).toBe("snapshot.json");
    expect(error.issues).toEqual([
      "declarations: duplicate id 'Account'",
      "Orphan.field: unknown container 'Orphan'",
      "Account.balance.x: container 'Account.balance' is not a type",
      "usages: unknown declaration 'Nope'",
      "usages.Account.secret[0]: unknown enclosing type 'Nowhere'",
    ]);
  });

  it("should reject cyclic containment", () => {
    const error = expectError(
      parseSnapshot({
        version: 1,
        declarations: [
          { id: "A", name: "A", kind: "type", typeKind: "class", containerId: "B", modifiers: { access: "public" } },
          { id: "B", name: "B", kind: "type", typeKind: "class", containerId: "A", modifiers: { access: "public" } },
        ],
      })
    );
    expect(error.code).toBe(ErrorCode.SNAPSHOT_CONTAINMENT_CYCLE);
    expect(error.issues).toEqual([
      "A: containment cycle through 'A'",
      "B: containment cycle through 'B'",
    ]);
  });
});

// =============================================================================
// Files
// =============================================================================

describe("loadSnapshot", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "access-lens-snapshot-"));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it("should load a snapshot file", () => {
    const filePath = path.join(tempDir, "snapshot.json");
    fs.writeFileSync(filePath, JSON.stringify(snapshotInput()));

    const { graph } = expectOk(loadSnapshot(filePath));
    expect(graph.declarations()).toHaveLength(3);
  });

  it("should report a missing file", () => {
    const filePath = path.join(tempDir, "missing.json");
    const error = expectError(loadSnapshot(filePath));

    expect(error.code).toBe(ErrorCode.SNAPSHOT_NOT_FOUND);
    expect(error.filePath).toBe(filePath);
  });

  it("should report a file that is not JSON", () => {
    const filePath = path.join(tempDir, "snapshot.json");
    fs.writeFileSync(filePath, "{ not json");

    const error = expectError(loadSnapshot(filePath));
    expect(error.code).toBe(ErrorCode.SNAPSHOT_UNREADABLE);
  });
});
