/**
 * Completion provider for MCS sources.
 *
 * Context-aware completions:
 *  - "++" at line start:          statement names from the catalog
 *  - Statement operand area:      operands not yet specified
 *  - Inside OPERAND( ... ):       sub-operands or allowed values
 *
 * Nothing is offered inside comments or inline data.
 */
import {
  CompletionItem,
  CompletionItemKind,
  InsertTextFormat,
  MarkupKind,
  Position,
  Range,
  TextEdit,
} from "vscode-languageserver/node";

import { commentAt, inlineRegionAtLine, operandsOf, statementAtLine } from "./ast";
import { findOperand } from "./schema";
import { McsDocument, SchemaLookup, StatementDefinition, StatementNode } from "./types";
import { blankComments, isIdentPart, isIdentStart, readIdentifier } from "./utils";

const STATEMENT_PREFIX_RE = /^(\s*)(\+\+[A-Za-z0-9@#$]*)$/;

/**
 * Get the partial word being typed at the cursor position.
 */
function getPartialWord(lineText: string, character: number): { partial: string; start: number } {
  let start = character;
  while (start > 0 && isIdentPart(lineText[start - 1])) {
    start--;
  }
  return { partial: lineText.slice(start, character).toUpperCase(), start };
}

/**
 * Names of the operands whose parentheses enclose the cursor, outermost
 * first. An empty name stands for the statement parameter or unnamed
 * parentheses.
 */
export function parenContext(lines: readonly string[], stmt: StatementNode, position: Position): string[] {
  const stack: string[] = [];
  let inComment = false;
  let lastIdent: string | undefined;

  for (let lineNo = stmt.position.line; lineNo <= position.line && lineNo < lines.length; lineNo++) {
    const blanked = blankComments(lines[lineNo], inComment);
    inComment = blanked.inComment;
    const text = blanked.text;

    const from = lineNo === stmt.position.line ? stmt.position.character + stmt.name.length : 0;
    const to = lineNo === position.line ? Math.min(position.character, text.length) : text.length;

    let i = from;
    while (i < to) {
      const ch = text[i];
      if (isIdentStart(ch)) {
        lastIdent = readIdentifier(text, i, to);
        i += lastIdent.length;
        continue;
      }
      if (ch === "(") {
        stack.push(lastIdent ?? "");
        lastIdent = undefined;
      } else if (ch === ")") {
        stack.pop();
        lastIdent = undefined;
      } else if (!/\s/.test(ch)) {
        lastIdent = undefined;
      }
      i++;
    }
  }

  return stack;
}

/**
 * Build completion items for the given document position.
 */
export function buildCompletionItems(doc: McsDocument, schema: SchemaLookup, position: Position): CompletionItem[] {
  const lineText = doc.lines[position.line] ?? "";
  const character = Math.min(position.character, lineText.length);

  if (inlineRegionAtLine(doc, position.line)) return [];
  if (commentAt(doc, position.line, character)) return [];

  // 1) Statement names
  const before = lineText.slice(0, character);
  const stmtPrefix = STATEMENT_PREFIX_RE.exec(before);
  if (stmtPrefix) {
    const typed = stmtPrefix[2].toUpperCase();
    const replace = Range.create(position.line, stmtPrefix[1].length, position.line, character);
    return statementItems(schema, typed, replace);
  }

  // 2) Operands / sub-operands / values of the enclosing statement
  const stmt = statementAtLine(doc, position.line);
  const def = stmt?.definition;
  if (!stmt || !def) return [];
  if (position.line === stmt.position.line && character <= stmt.position.character + stmt.name.length) return [];

  const { partial } = getPartialWord(lineText, character);
  const context = parenContext(doc.lines, stmt, { line: position.line, character });

  if (context.length === 0) return operandItems(stmt, def, partial);
  if (context.length === 1 && context[0] !== "") return nestedItems(def, context[0], partial);
  return [];
}

function statementItems(schema: SchemaLookup, typed: string, replace: Range): CompletionItem[] {
  const items: CompletionItem[] = [];
  for (const s of schema.list()) {
    if (!s.name.startsWith(typed)) continue;
    items.push({
      label: s.name,
      kind: CompletionItemKind.Keyword,
      detail: s.parameter ? `${s.name}(${s.parameter})` : s.name,
      documentation: s.description ? { kind: MarkupKind.Markdown, value: s.description } : undefined,
      textEdit: TextEdit.replace(replace, s.name),
      sortText: sortKey("A", s.name),
      insertTextFormat: InsertTextFormat.PlainText,
    });
  }
  return items;
}

function operandItems(stmt: StatementNode, def: StatementDefinition, partial: string): CompletionItem[] {
  const present = new Set<string>();
  for (const op of operandsOf(stmt)) {
    // the word being typed is parsed as an operand too
    if (op.name.toUpperCase() === partial) continue;
    if (op.definition) for (const a of op.definition.aliases) present.add(a);
  }

  const items: CompletionItem[] = [];
  for (const o of def.operands) {
    if (o.aliases.some((a) => present.has(a))) continue;
    if (partial && !o.aliases.some((a) => a.startsWith(partial))) continue;
    items.push({
      label: o.name,
      kind: CompletionItemKind.Property,
      detail: o.parameter ? `${o.name}(${o.parameter})` : o.name,
      documentation: o.description ? { kind: MarkupKind.Markdown, value: o.description } : undefined,
      insertText: o.parameter ? `${o.name}(` : o.name,
      sortText: sortKey(o.required || o.requiredGroupId ? "A" : "B", o.name),
      insertTextFormat: InsertTextFormat.PlainText,
    });
  }
  return items;
}

function nestedItems(def: StatementDefinition, operandName: string, partial: string): CompletionItem[] {
  const opDef = findOperand(def, operandName);
  if (!opDef) return [];
  const items: CompletionItem[] = [];

  for (const s of opDef.subOperands) {
    if (partial && !s.aliases.some((a) => a.startsWith(partial))) continue;
    items.push({
      label: s.name,
      kind: CompletionItemKind.Field,
      detail: s.parameter ? `${s.name}(${s.parameter})` : `${s.name} (${s.type})`,
      documentation: s.description || undefined,
      insertText: `${s.name}(`,
      sortText: sortKey("A", s.name),
      insertTextFormat: InsertTextFormat.PlainText,
    });
  }

  for (const v of opDef.allowedValues) {
    if (partial && !v.name.toUpperCase().startsWith(partial)) continue;
    items.push({
      label: v.name,
      kind: CompletionItemKind.EnumMember,
      detail: v.description || undefined,
      sortText: sortKey("B", v.name),
      insertTextFormat: InsertTextFormat.PlainText,
    });
  }

  return items;
}

function sortKey(bucket: string, label: string): string {
  return `${bucket}_${label}`;
}
