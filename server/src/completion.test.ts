/**
 * Tests for completion.ts: Completion/IntelliSense functionality.
 */
import { describe, it, expect } from "vitest";
import { CompletionItem, CompletionItemKind, Position } from "vscode-languageserver/node";
import { buildCompletionItems, parenContext } from "./completion";
import { parseDocument } from "./parser";
import { loadSchema } from "./schema";

// ---- Helpers ----

const schema = loadSchema();

function complete(lines: string[], line: number, character: number): CompletionItem[] {
  return buildCompletionItems(parseDocument(lines.join("\n"), schema), schema, Position.create(line, character));
}

function labels(items: CompletionItem[]): string[] {
  return items.map((i) => i.label);
}

// ---- Statement names ----

describe("statement completion", () => {
  it("offers statements matching the typed prefix", () => {
    const items = complete(["++US"], 0, 4);
    expect(labels(items)).toEqual(["++USERMOD"]);
    expect(items[0].kind).toBe(CompletionItemKind.Keyword);
    expect(items[0].detail).toBe("++USERMOD(sysmod_id)");
    expect(items[0].textEdit).toEqual({
      range: { start: { line: 0, character: 0 }, end: { line: 0, character: 4 } },
      newText: "++USERMOD",
    });
  });

  it("offers every statement after a bare ++", () => {
    expect(complete(["  ++"], 0, 4)).toHaveLength(schema.size);
  });
});

// ---- Operands ----

describe("operand completion", () => {
  it("offers operands not yet present", () => {
    const items = complete(["++USERMOD(LJS2012) DESC(X) "], 0, 27);
    expect(labels(items)).toEqual(["FILES", "RFDSNPFX", "REWORK"]);
    expect(items[0].insertText).toBe("FILES(");
    expect(items[0].kind).toBe(CompletionItemKind.Property);
  });

  it("filters by the word being typed", () => {
    expect(labels(complete(["++USERMOD(LJS2012) RE"], 0, 21))).toEqual(["REWORK"]);
  });

  it("sorts required and group operands first", () => {
    const items = complete(["++HOLD(UA12345) "], 0, 16);
    const sortOf = (label: string) => items.find((i) => i.label === label)?.sortText;
    expect(sortOf("FMID")).toBe("A_FMID");
    expect(sortOf("ERROR")).toBe("A_ERROR");
    expect(sortOf("CLASS")).toBe("B_CLASS");
    expect(items.find((i) => i.label === "ERROR")?.insertText).toBe("ERROR");
  });

  it("offers nothing on the statement name itself", () => {
    expect(complete(["++USERMOD(LJS2012) ."], 0, 5)).toEqual([]);
  });
});

// ---- Sub-operands ----

describe("nested completion", () => {
  it("offers sub-operands inside the operand parentheses", () => {
    const items = complete(["++MAC(MYMAC) FROMDS("], 0, 20);
    expect(labels(items)).toEqual(["DSN", "NUMBER", "UNIT", "VOL"]);
    expect(items[0].kind).toBe(CompletionItemKind.Field);
    expect(items[0].insertText).toBe("DSN(");
  });

  it("offers nothing inside the statement parameter", () => {
    expect(complete(["++VER("], 0, 6)).toEqual([]);
  });
});

// ---- Suppressed contexts ----

describe("suppressed contexts", () => {
  it("offers nothing inside a comment", () => {
    expect(complete(["++VER(Z038) /* FM */ ."], 0, 17)).toEqual([]);
  });

  it("offers nothing inside inline data", () => {
    expect(complete(["++MAC(MYMAC) DISTLIB(AMACLIB) .", " MAC"], 1, 4)).toEqual([]);
  });
});

// ---- parenContext ----

describe("parenContext", () => {
  it("tracks the enclosing operand names", () => {
    const doc = parseDocument("++MAC(MYMAC) FROMDS(DSN(MY.", schema);
    expect(parenContext(doc.lines, doc.statements[0], Position.create(0, 27))).toEqual(["FROMDS", "DSN"]);
    expect(parenContext(doc.lines, doc.statements[0], Position.create(0, 8))).toEqual([""]);
  });
});
