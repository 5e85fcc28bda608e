/**
 * Document symbol / outline provider for MCS sources.
 */
import { DocumentSymbol, Range, SymbolKind } from "vscode-languageserver/node";

import { operandParameter, operandsOf, statementParameter } from "./ast";
import { McsDocument, OperandNode, StatementNode } from "./types";
import { excerpt, toRange } from "./utils";

const MAX_VALUE_LABEL = 40;

const STATEMENT_KINDS: Readonly<Record<string, SymbolKind>> = {
  "++FUNCTION": SymbolKind.Class,
  "++USERMOD": SymbolKind.Class,
  "++PTF": SymbolKind.Class,
  "++APAR": SymbolKind.Class,
  "++VER": SymbolKind.Method,
  "++IF": SymbolKind.Operator,
  "++MAC": SymbolKind.Struct,
  "++SRC": SymbolKind.Struct,
  "++MOD": SymbolKind.Struct,
  "++MACUPD": SymbolKind.Event,
  "++SRCUPD": SymbolKind.Event,
  "++JCLIN": SymbolKind.File,
};

export function statementSymbolKind(stmt: StatementNode): SymbolKind {
  const name = stmt.definition?.name ?? stmt.name;
  return STATEMENT_KINDS[name] ?? SymbolKind.Function;
}

export function buildDocumentSymbols(doc: McsDocument): DocumentSymbol[] {
  const root: DocumentSymbol[] = [];

  for (const stmt of doc.statements) {
    const param = statementParameter(stmt);
    const label = param && param.value.trim() ? `${stmt.name}(${excerpt(param.value.trim(), MAX_VALUE_LABEL)})` : stmt.name;

    const region = doc.inlineRegions.find((r) => r.statement === stmt);
    const endLine = region ? Math.max(stmt.endLine, region.endLine) : stmt.endLine;

    const sym = makeSymbol(label, statementSymbolKind(stmt), stmt, endLine, doc.lines);
    if (stmt.definition?.description) sym.detail = stmt.definition.description;

    for (const op of operandsOf(stmt)) {
      const child = operandSymbol(op);
      if (child) attachSymbol(sym, child);
    }
    root.push(sym);
  }

  return root;
}

function operandSymbol(op: OperandNode): DocumentSymbol | undefined {
  const param = operandParameter(op);
  const subs = operandsOf(op);
  if (!param && subs.length === 0) return undefined;

  const label = param ? `${op.name}(${excerpt(param.value.trim(), MAX_VALUE_LABEL)})` : op.name;
  const selection = toRange(op.position);
  const end = param ? toRange(param.position).end : selection.end;
  const sym: DocumentSymbol = {
    name: label,
    kind: SymbolKind.Property,
    range: Range.create(selection.start, end),
    selectionRange: selection,
    children: [],
  };
  if (op.definition?.description) sym.detail = op.definition.description;

  for (const sub of subs) {
    const child = operandSymbol(sub);
    if (child) attachSymbol(sym, child);
  }
  return sym;
}

function attachSymbol(parent: DocumentSymbol, child: DocumentSymbol) {
  parent.children = [...(parent.children ?? []), child];
}

/**
 * `range` covers the statement's lines including its inline data;
 * `selectionRange` is the statement name only.
 */
function makeSymbol(
  name: string,
  kind: SymbolKind,
  stmt: StatementNode,
  endLine: number,
  lines: readonly string[],
): DocumentSymbol {
  const selection = toRange(stmt.position);
  const range = Range.create(stmt.position.line, 0, endLine, (lines[endLine] ?? "").length);
  return { name, kind, range, selectionRange: selection, children: [] };
}
