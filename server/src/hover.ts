/**
 * Hover provider for MCS sources.
 *
 * Provides hover information for:
 *  - Statements            → description, parameter syntax, language id, inline data
 *  - Operands              → parameter syntax, type, maximum length, allowed values
 *  - Sub-operands          → parameter syntax, type, maximum length
 */
import { Hover, MarkupContent, MarkupKind, Position } from "vscode-languageserver/node";

import { nodeAt } from "./ast";
import { McsDocument, OperandDefinition, OperandNode, StatementNode, SubOperandDefinition } from "./types";
import { toRange } from "./utils";

export function buildHover(doc: McsDocument, position: Position): Hover | undefined {
  const node = nodeAt(doc, position.line, position.character);
  if (!node) return undefined;

  if (node.kind === "statement") return statementHover(node);
  if (node.kind === "operand") return operandHover(node);

  // parameter text: describe the operand (or statement) it belongs to
  const owner = node.parent;
  const hover = owner.kind === "statement" ? statementHover(owner) : operandHover(owner);
  return hover ? { contents: hover.contents, range: toRange(node.position) } : undefined;
}

function statementHover(stmt: StatementNode): Hover | undefined {
  const def = stmt.definition;
  if (!def) return undefined;

  const parts = [`**Statement:** \`${stmt.name}\``];
  if (def.description) parts.push(def.description);
  if (def.parameter) parts.push(`**Syntax:** \`${stmt.name}(${def.parameter})\``);
  if (stmt.languageId) parts.push(`**Language:** \`${stmt.languageId}\` (variant of \`${def.name}\`)`);
  if (def.maxParameterLength > 0) parts.push(`**Max length:** ${def.maxParameterLength}`);
  if (def.expectsInlineData) parts.push("_Element data follows inline unless FROMDS, RELFILE or TXLIB is given_");

  const content: MarkupContent = { kind: MarkupKind.Markdown, value: parts.join("\n\n") };
  return { contents: content, range: toRange(stmt.position) };
}

function operandHover(op: OperandNode): Hover | undefined {
  const def = op.definition;
  if (!def) return undefined;

  const parts = def.kind === "operand" ? describeOperand(op, def) : describeSubOperand(op, def);
  const content: MarkupContent = { kind: MarkupKind.Markdown, value: parts.join("\n\n") };
  return { contents: content, range: toRange(op.position) };
}

function describeOperand(op: OperandNode, def: OperandDefinition): string[] {
  const parts = [`**Operand:** \`${def.aliases.join(" | ")}\``];
  if (def.description) parts.push(def.description);
  if (def.parameter) parts.push(`**Syntax:** \`${op.name}(${def.parameter})\``);
  parts.push(typeLine(def.type, def.maxLength));
  if (def.required) parts.push("_Required_");
  if (def.allowedIf) parts.push(`_Only valid together with ${def.allowedIf}_`);
  if (def.mutuallyExclusiveWith.length > 0) {
    parts.push(`_Mutually exclusive with ${def.mutuallyExclusiveWith.join(", ")}_`);
  }
  if (def.subOperands.length > 0) {
    parts.push(def.subOperands.map((s) => `- \`${s.aliases.join(" | ")}\`: ${s.description}`).join("\n"));
  }
  if (def.allowedValues.length > 0) {
    parts.push(def.allowedValues.map((v) => `- \`${v.name}\`${v.description ? `: ${v.description}` : ""}`).join("\n"));
  }
  return parts;
}

function describeSubOperand(op: OperandNode, def: SubOperandDefinition): string[] {
  const parent = op.parent.kind === "operand" ? op.parent.name : "";
  const parts = [`**Sub-operand:** \`${def.aliases.join(" | ")}\`${parent ? ` of \`${parent}\`` : ""}`];
  if (def.description) parts.push(def.description);
  if (def.parameter) parts.push(`**Syntax:** \`${op.name}(${def.parameter})\``);
  parts.push(typeLine(def.type, def.maxLength));
  return parts;
}

function typeLine(type: string, maxLength: number): string {
  return maxLength > 0 ? `**Type:** ${type}, **Max length:** ${maxLength}` : `**Type:** ${type}`;
}
