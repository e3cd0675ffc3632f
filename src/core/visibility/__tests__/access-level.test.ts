/**
 * Access Level Model Tests
 */

import { describe, it, expect } from "vitest";
import {
  AccessLevel,
  isStricter,
  joinLevels,
  levelFromName,
  levelKeyword,
  maxLevel,
  parseAccessLevel,
  presentableLevel,
} from "../models/access-level.js";

describe("AccessLevel", () => {
  it("should order levels from private to public", () => {
    expect(AccessLevel.Private).toBeLessThan(AccessLevel.Package);
    expect(AccessLevel.Package).toBeLessThan(AccessLevel.Protected);
    expect(AccessLevel.Protected).toBeLessThan(AccessLevel.Public);
    expect(isStricter(AccessLevel.Package, AccessLevel.Protected)).toBe(true);
    expect(isStricter(AccessLevel.Public, AccessLevel.Public)).toBe(false);
  });

  it("should take the more visible level in maxLevel", () => {
    expect(maxLevel(AccessLevel.Private, AccessLevel.Protected)).toBe(AccessLevel.Protected);
    expect(maxLevel(AccessLevel.Public, AccessLevel.Package)).toBe(AccessLevel.Public);
    expect(maxLevel(AccessLevel.Package, AccessLevel.Package)).toBe(AccessLevel.Package);
  });

  it("should join levels independently of order", () => {
    const levels = [AccessLevel.Package, AccessLevel.Protected, AccessLevel.Private];
    expect(joinLevels(levels)).toBe(AccessLevel.Protected);
    expect(joinLevels([...levels].reverse())).toBe(AccessLevel.Protected);
  });

  it("should return the seed when joining nothing", () => {
    expect(joinLevels([])).toBe(AccessLevel.Private);
    expect(joinLevels([], AccessLevel.Package)).toBe(AccessLevel.Package);
  });

  it("should have no keyword for package access", () => {
    expect(levelKeyword(AccessLevel.Package)).toBeNull();
    expect(levelKeyword(AccessLevel.Private)).toBe("private");
    expect(levelKeyword(AccessLevel.Protected)).toBe("protected");
    expect(levelKeyword(AccessLevel.Public)).toBe("public");
  });

  it("should present package access as package-private", () => {
    expect(presentableLevel(AccessLevel.Package)).toBe("package-private");
    expect(presentableLevel(AccessLevel.Public)).toBe("public");
  });

  it("should parse level names case-insensitively", () => {
    expect(parseAccessLevel(" Protected ")).toBe(AccessLevel.Protected);
    expect(parseAccessLevel("package-private")).toBe(AccessLevel.Package);
    expect(parseAccessLevel("internal")).toBeNull();
  });

  it("should map configuration names to levels", () => {
    expect(levelFromName("private")).toBe(AccessLevel.Private);
    expect(levelFromName("package")).toBe(AccessLevel.Package);
    expect(levelFromName("public")).toBe(AccessLevel.Public);
  });
});
