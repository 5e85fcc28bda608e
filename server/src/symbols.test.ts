/**
 * Tests for symbols.ts: Document symbols / outline provider.
 */
import { describe, it, expect } from "vitest";
import { SymbolKind } from "vscode-languageserver/node";
import { parseDocument } from "./parser";
import { loadSchema } from "./schema";
import { buildDocumentSymbols } from "./symbols";

// ---- Helpers ----

const schema = loadSchema();

function symbolsOf(lines: string[]) {
  return buildDocumentSymbols(parseDocument(lines.join("\n"), schema));
}

// ---- buildDocumentSymbols ----

describe("buildDocumentSymbols", () => {
  it("returns one root symbol per statement", () => {
    const symbols = symbolsOf([
      "++USERMOD(LJS2012) DESC('Test fix') .",
      "++MAC(MYMAC) FROMDS(DSN(MY.LIB) VOL(V1)) .",
      "++MAC(OTHER) DISTLIB(AMACLIB) .",
      " MACRO",
      " MEND",
    ]);
    expect(symbols.map((s) => s.name)).toEqual(["++USERMOD(LJS2012)", "++MAC(MYMAC)", "++MAC(OTHER)"]);
    expect(symbols.map((s) => s.kind)).toEqual([SymbolKind.Class, SymbolKind.Struct, SymbolKind.Struct]);
  });

  it("covers the statement lines and selects its name", () => {
    const [usermod] = symbolsOf(["++USERMOD(LJS2012) DESC('Test fix') ."]);
    expect(usermod.range).toEqual({ start: { line: 0, character: 0 }, end: { line: 0, character: 37 } });
    expect(usermod.selectionRange).toEqual({ start: { line: 0, character: 0 }, end: { line: 0, character: 9 } });
    expect(usermod.detail).toBe("Identifies a user modification");
  });

  it("lists operands with their values as children", () => {
    const [usermod] = symbolsOf(["++USERMOD(LJS2012) DESC('Test fix') ."]);
    const desc = usermod.children?.[0];
    expect(desc?.name).toBe("DESC('Test fix')");
    expect(desc?.kind).toBe(SymbolKind.Property);
    expect(desc?.selectionRange).toEqual({ start: { line: 0, character: 19 }, end: { line: 0, character: 23 } });
    expect(desc?.range).toEqual({ start: { line: 0, character: 19 }, end: { line: 0, character: 34 } });
  });

  it("nests sub-operands", () => {
    const [mac] = symbolsOf(["++MAC(MYMAC) FROMDS(DSN(MY.LIB) VOL(V1)) ."]);
    const fromds = mac.children?.[0];
    expect(fromds?.name).toBe("FROMDS");
    expect(fromds?.children?.map((c) => c.name)).toEqual(["DSN(MY.LIB)", "VOL(V1)"]);
  });

  it("extends the range over inline data", () => {
    const symbols = symbolsOf(["++MAC(OTHER) DISTLIB(AMACLIB) .", " MACRO", " MEND"]);
    expect(symbols[0].range.end).toEqual({ line: 2, character: 5 });
  });

  it("leaves out operands without a value", () => {
    const [hold] = symbolsOf(["++HOLD(UA12345) FMID(HBB7790) REASON(AA12345) ERROR ."]);
    expect(hold.children?.map((c) => c.name)).toEqual(["FMID(HBB7790)", "REASON(AA12345)"]);
  });

  it("falls back to Function for unknown statements", () => {
    const [foo] = symbolsOf(["++FOO ."]);
    expect(foo.name).toBe("++FOO");
    expect(foo.kind).toBe(SymbolKind.Function);
    expect(foo.detail).toBeUndefined();
  });

  it("returns nothing for an empty document", () => {
    expect(symbolsOf([""])).toEqual([]);
  });
});
