/**
 * Tests for policy.ts: statement rules outside the catalog.
 */
import { describe, it, expect } from "vitest";
import { checkMoveMode, requiredOperandsFor } from "./policy";

function present(...names: string[]): (name: string) => boolean {
  const set = new Set(names);
  return (name) => set.has(name);
}

describe("requiredOperandsFor", () => {
  it("lists the operands a statement needs", () => {
    expect(requiredOperandsFor("++ASSIGN")).toEqual(["SOURCEID", "TO"]);
    expect(requiredOperandsFor("++VER")).toEqual([]);
  });
});

describe("checkMoveMode", () => {
  it("needs DISTLIB or SYSLIB", () => {
    expect(checkMoveMode(present())).toEqual(["Either DISTLIB or SYSLIB must be specified"]);
  });

  it("checks the target library mode", () => {
    expect(checkMoveMode(present("SYSLIB"))).toEqual([
      "TOSYSLIB is required when SYSLIB is specified",
      "One of MAC, SRC, LMOD, or FMID is required when SYSLIB is specified",
    ]);
    expect(checkMoveMode(present("SYSLIB", "TOSYSLIB", "LMOD"))).toEqual([]);
  });

  it("checks both modes together", () => {
    expect(checkMoveMode(present("DISTLIB", "TODISTLIB", "MOD", "SYSLIB", "TOSYSLIB"))).toEqual([
      "One of MAC, SRC, LMOD, or FMID is required when SYSLIB is specified",
    ]);
  });
});
