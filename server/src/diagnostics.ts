/**
 * Diagnostics engine: validates a parsed MCS document against the statement
 * catalog and the hard-coded policy tables.
 *
 * Rules run per statement in a fixed order (classification, parentheses,
 * terminator, parameter, operands, statement-specific rules), followed by
 * the document-wide passes (inline data, column 72, comment placement).
 */
import { Diagnostic, DiagnosticSeverity, Range } from "vscode-languageserver/node";

import { operandParameter, operandsOf, statementParameter } from "./ast";
import { classifyStatementName } from "./langid";
import { INLINE_DATA_ALTERNATIVES, checkMoveMode, requiredOperandsFor } from "./policy";
import { findOperand } from "./schema";
import {
  DEFAULT_DIAGNOSTICS_CONFIG,
  DIAGNOSTIC_CODES,
  DiagnosticsConfig,
  DiagnosticsConfigKey,
  McsDocument,
  OperandDefinition,
  OperandNode,
  SchemaLookup,
  StatementDefinition,
  StatementNode,
} from "./types";
import { MAX_CONTENT_COLUMN, closestMatch, stripQuotes, toRange } from "./utils";

export const DIAGNOSTIC_SOURCE = "smpe";

const SUGGESTION_DISTANCE = 2;

// ======================= Sink =======================

class DiagnosticSink {
  readonly out: Diagnostic[] = [];

  constructor(private readonly config: DiagnosticsConfig) {}

  enabled(key: DiagnosticsConfigKey): boolean {
    return this.config[key];
  }

  add(key: DiagnosticsConfigKey, severity: DiagnosticSeverity, range: Range, message: string): void {
    if (!this.config[key]) return;
    this.out.push({
      severity,
      range,
      message,
      source: DIAGNOSTIC_SOURCE,
      code: DIAGNOSTIC_CODES[key],
    });
  }
}

// ======================= Entry point =======================

export function analyzeDocument(
  doc: McsDocument,
  schema: SchemaLookup,
  config: DiagnosticsConfig = DEFAULT_DIAGNOSTICS_CONFIG,
): Diagnostic[] {
  const sink = new DiagnosticSink(config);

  for (const stmt of doc.statements) checkStatement(stmt, schema, sink);

  checkMissingInlineData(doc, sink);
  checkColumn72(doc.lines, sink);
  checkStandaloneComments(doc, sink);

  return sink.out;
}

// ======================= Statement rules =======================

function checkStatement(stmt: StatementNode, schema: SchemaLookup, sink: DiagnosticSink): void {
  const at = toRange(stmt.position);

  checkClassification(stmt, schema, sink);

  if (stmt.unbalancedParens > 0) {
    sink.add("unbalancedParentheses", DiagnosticSeverity.Error, at, "Missing closing parenthesis ')'");
  } else if (stmt.unbalancedParens < 0) {
    sink.add(
      "unbalancedParentheses",
      DiagnosticSeverity.Error,
      at,
      "Missing opening parenthesis '(' or extra closing parenthesis ')'",
    );
  } else if (!stmt.hasTerminator) {
    // only meaningful once the parentheses balance
    sink.add("missingTerminator", DiagnosticSeverity.Error, at, "Statement must be terminated with '.'");
  }

  const def = stmt.definition;
  if (stmt.status !== "known" || !def) return;

  checkStatementParameter(stmt, def, sink);
  checkOperands(stmt, def, sink);

  if (def.name === "++MOVE") {
    const has = presence(stmt);
    for (const problem of checkMoveMode(has)) {
      sink.add("missingRequiredOperand", DiagnosticSeverity.Error, at, problem);
    }
  }
}

function checkClassification(stmt: StatementNode, schema: SchemaLookup, sink: DiagnosticSink): void {
  if (stmt.status === "known") return;
  const at = toRange(stmt.position);
  const cls = classifyStatementName(stmt.name, schema);

  if (stmt.status === "invalid-language-id") {
    sink.add(
      "invalidLanguageId",
      DiagnosticSeverity.Error,
      at,
      `Invalid language identifier '${stmt.languageId}' for statement ${cls.base ?? stmt.name}`,
    );
    return;
  }

  let message = cls.base && cls.languageId
    ? `Unknown statement type: ${cls.base} (with language ID ${cls.languageId})`
    : `Unknown statement type: ${stmt.name}`;
  const suggestion = closestMatch(stmt.name, schema.list().map((s) => s.name), SUGGESTION_DISTANCE);
  if (suggestion) message += `. Did you mean ${suggestion}?`;
  sink.add("unknownStatement", DiagnosticSeverity.Error, at, message);
}

function checkStatementParameter(stmt: StatementNode, def: StatementDefinition, sink: DiagnosticSink): void {
  if (!def.parameter) return;
  const param = statementParameter(stmt);

  if (!param || (!param.unterminated && param.value.trim() === "")) {
    sink.add("missingParameter", DiagnosticSeverity.Error, toRange(stmt.position), `Missing required parameter: ${def.parameter}`);
    return;
  }

  if (param.unterminated) {
    // the statement-level imbalance already covers it
    if (stmt.unbalancedParens !== 0 && sink.enabled("unbalancedParentheses")) return;
    sink.add(
      "missingParameter",
      DiagnosticSeverity.Error,
      toRange(param.position),
      `Parameter of ${stmt.name} is missing its closing parenthesis ')'`,
    );
    return;
  }

  const value = param.value.trim();
  if (def.maxParameterLength > 0 && value.length > def.maxParameterLength) {
    sink.add(
      "missingParameter",
      DiagnosticSeverity.Warning,
      toRange(param.position),
      `Parameter '${value}' exceeds maximum length (${value.length} > ${def.maxParameterLength})`,
    );
  }
}

// ======================= Operand rules =======================

/** Membership test over operand names and the aliases of the operands present. */
function presence(stmt: StatementNode): (name: string) => boolean {
  const names = new Set<string>();
  for (const op of operandsOf(stmt)) {
    names.add(op.name);
    if (op.definition) for (const a of op.definition.aliases) names.add(a);
  }
  return (name) => names.has(name);
}

function aliasesOf(def: StatementDefinition, name: string): string[] {
  return findOperand(def, name)?.aliases ?? [name];
}

function checkOperands(stmt: StatementNode, def: StatementDefinition, sink: DiagnosticSink): void {
  const operands = operandsOf(stmt);
  const has = presence(stmt);

  for (const [name, op] of stmt.operandsByName) {
    if (op.definition) continue;
    let message = `Unknown operand '${name}' for statement ${stmt.name}`;
    const suggestion = closestMatch(name, def.operands.flatMap((o) => o.aliases), SUGGESTION_DISTANCE);
    if (suggestion) message += `. Did you mean ${suggestion}?`;
    sink.add("unknownOperand", DiagnosticSeverity.Warning, toRange(op.position), message);
  }

  for (const op of operands) {
    const first = stmt.operandsByName.get(op.name);
    if (!first || first === op) continue;
    const where = first.position.line !== op.position.line ? ` (first occurrence at line ${first.position.line + 1})` : "";
    sink.add("duplicateOperand", DiagnosticSeverity.Hint, toRange(op.position), `Duplicate operand '${op.name}'${where}`);
  }

  for (const op of operands) {
    if (op.definition && op.definition.kind === "operand") checkOperandOccurrence(op, op.definition, sink);
  }

  checkRequiredOperands(stmt, def, has, sink);

  for (const [name, op] of stmt.operandsByName) {
    const opDef = op.definition;
    if (!opDef || opDef.kind !== "operand" || !opDef.allowedIf) continue;
    if (aliasesOf(def, opDef.allowedIf).some(has)) continue;
    sink.add(
      "dependencyViolation",
      DiagnosticSeverity.Information,
      toRange(op.position),
      `${name} requires ${opDef.allowedIf} to be specified`,
    );
  }

  checkMutualExclusion(stmt, def, sink);
  checkRequiredGroups(stmt, def, has, sink);
}

function checkOperandOccurrence(op: OperandNode, def: OperandDefinition, sink: DiagnosticSink): void {
  if (def.parameter) {
    const param = operandParameter(op);
    const subs = operandsOf(op);
    const hasParam = (param !== undefined && param.value.trim() !== "") || subs.length > 0;

    if (!hasParam) {
      sink.add(
        "emptyOperandParameter",
        DiagnosticSeverity.Error,
        toRange(op.position),
        `Operand '${op.name}' requires a parameter: ${def.parameter}`,
      );
    } else if (param && !param.unterminated && def.maxLength > 0) {
      const value = stripQuotes(param.value);
      if (value.length > def.maxLength) {
        sink.add(
          "operandLength",
          DiagnosticSeverity.Warning,
          toRange(param.position),
          `Operand '${op.name}' parameter exceeds maximum length (${value.length} > ${def.maxLength})`,
        );
      }
    }
  }

  if (def.subOperands.length > 0) checkSubOperands(op, sink);
}

function checkSubOperands(op: OperandNode, sink: DiagnosticSink): void {
  for (const sub of operandsOf(op)) {
    const sd = sub.definition;
    if (!sd || sd.kind !== "subOperand") {
      sink.add("unknownSubOperand", DiagnosticSeverity.Warning, toRange(sub.position), `Unknown sub-operand '${sub.name}' for ${op.name}`);
      continue;
    }
    if (sd.maxLength <= 0 || (sd.type !== "string" && sd.type !== "integer")) continue;

    const param = operandParameter(sub);
    if (!param || param.value.trim() === "") {
      sink.add(
        "subOperandValidation",
        DiagnosticSeverity.Warning,
        toRange(sub.position),
        `Sub-operand '${sub.name}' of ${op.name} has empty parameter (expected ${sd.type})`,
      );
      continue;
    }

    const value = stripQuotes(param.value);
    if (value.length > sd.maxLength) {
      sink.add(
        "subOperandValidation",
        DiagnosticSeverity.Warning,
        toRange(param.position),
        `Sub-operand '${sub.name}' of ${op.name} exceeds maximum length (${value.length} > ${sd.maxLength})`,
      );
    }
  }
}

/**
 * Union of the policy table and the catalog's `required` flags. Group members
 * are left to the group rule, and an operand excluded by one that is present
 * is not required.
 */
function checkRequiredOperands(
  stmt: StatementNode,
  def: StatementDefinition,
  has: (name: string) => boolean,
  sink: DiagnosticSink,
): void {
  const names: string[] = [];
  const seen = new Set<string>();
  const candidates = [
    ...requiredOperandsFor(def.name),
    ...def.operands.filter((o) => o.required && !o.requiredGroupId).map((o) => o.name),
  ];

  for (const name of candidates) {
    const key = findOperand(def, name)?.name ?? name;
    if (seen.has(key)) continue;
    seen.add(key);
    names.push(name);
  }

  for (const name of names) {
    const opDef = findOperand(def, name);
    if (opDef?.requiredGroupId) continue;
    const aliases = opDef?.aliases ?? [name];
    if (aliases.some(has)) continue;
    if (isExcludedByPresent(stmt, def, aliases, has)) continue;
    sink.add("missingRequiredOperand", DiagnosticSeverity.Warning, toRange(stmt.position), `Missing required operand: ${name}`);
  }
}

function isExcludedByPresent(
  stmt: StatementNode,
  def: StatementDefinition,
  aliases: string[],
  has: (name: string) => boolean,
): boolean {
  const own = findOperand(def, aliases[0]);
  if (own && own.mutuallyExclusiveWith.some((ex) => aliasesOf(def, ex).some(has))) return true;

  for (const op of stmt.operandsByName.values()) {
    const opDef = op.definition;
    if (!opDef || opDef.kind !== "operand") continue;
    if (opDef.mutuallyExclusiveWith.some((ex) => aliases.includes(ex))) return true;
  }
  return false;
}

function checkMutualExclusion(stmt: StatementNode, def: StatementDefinition, sink: DiagnosticSink): void {
  const reported = new Set<string>();
  const present = [...stmt.operandsByName.values()];

  for (const [name, op] of stmt.operandsByName) {
    const opDef = op.definition;
    if (!opDef || opDef.kind !== "operand") continue;

    for (const ex of opDef.mutuallyExclusiveWith) {
      const exAliases = aliasesOf(def, ex);
      if (exAliases.includes(name)) continue;
      const other = present.find((p) => exAliases.includes(p.name));
      if (!other) continue;

      const pair = [opDef.name, findOperand(def, ex)?.name ?? ex].sort().join("\u0000");
      if (reported.has(pair)) continue;
      reported.add(pair);

      sink.add("mutuallyExclusive", DiagnosticSeverity.Error, toRange(op.position), `${name} is mutually exclusive with ${other.name}`);
    }
  }
}

function checkRequiredGroups(
  stmt: StatementNode,
  def: StatementDefinition,
  has: (name: string) => boolean,
  sink: DiagnosticSink,
): void {
  const groups = new Map<string, OperandDefinition[]>();
  for (const o of def.operands) {
    if (!o.requiredGroupId) continue;
    const members = groups.get(o.requiredGroupId);
    if (members) members.push(o);
    else groups.set(o.requiredGroupId, [o]);
  }

  for (const members of groups.values()) {
    if (members.some((m) => m.aliases.some(has))) continue;
    sink.add(
      "requiredGroup",
      DiagnosticSeverity.Error,
      toRange(stmt.position),
      `One of the following operands must be specified: ${members.map((m) => m.name).join(", ")}`,
    );
  }
}

// ======================= Document rules =======================

function checkMissingInlineData(doc: McsDocument, sink: DiagnosticSink): void {
  const last = doc.statements[doc.statements.length - 1];

  for (const stmt of doc.expectingInlineData) {
    if (stmt.hasInlineData) continue;
    const operandNames = new Set(stmt.definition?.operands.flatMap((o) => o.aliases) ?? []);
    const alternatives = INLINE_DATA_ALTERNATIVES.filter((a) => operandNames.has(a));

    let message = `${stmt.name} expects inline data but none found`;
    if (stmt !== last) message += " before next statement";
    if (alternatives.length > 0) message += ` (or specify one of ${alternatives.join(", ")})`;

    sink.add("missingInlineData", DiagnosticSeverity.Warning, toRange(stmt.position), message);
  }
}

function checkColumn72(lines: readonly string[], sink: DiagnosticSink): void {
  if (!sink.enabled("contentBeyondColumn72")) return;
  for (let lineNo = 0; lineNo < lines.length; lineNo++) {
    const full = lines[lineNo];
    // columns count code points; the range is in UTF-16 units
    const chars = [...full];
    if (chars.length <= MAX_CONTENT_COLUMN) continue;
    if (chars.slice(MAX_CONTENT_COLUMN).join("").trim() === "") continue;
    const start = chars.slice(0, MAX_CONTENT_COLUMN).join("").length;
    sink.add(
      "contentBeyondColumn72",
      DiagnosticSeverity.Error,
      Range.create(lineNo, start, lineNo, full.length),
      "Content beyond column 72 will be ignored by SMP/E",
    );
  }
}

function checkStandaloneComments(doc: McsDocument, sink: DiagnosticSink): void {
  if (!sink.enabled("standaloneComment")) return;
  const first = doc.statements[0];
  const last = doc.statements[doc.statements.length - 1];

  for (const c of doc.comments) {
    if (!c.standalone) continue;
    const line = c.position.line;

    let where: string;
    if (!first || line < first.position.line) where = "before first MCS statement";
    else if (line > last.position.line) where = "after last MCS statement";
    else where = "between MCS statements";

    sink.add(
      "standaloneComment",
      DiagnosticSeverity.Error,
      Range.create(line, c.position.character, line, (doc.lines[line] ?? "").length),
      `Comment not allowed ${where} - SMP/E syntax error`,
    );
  }
}
