/**
 * Tree Builder: turns statement spans into Statement / Operand / Parameter
 * nodes and assembles the Document.
 *
 * Never throws: malformed input produces nodes flagged for the diagnostics
 * pass (unterminated parameter, unbalanced parentheses, missing terminator).
 */
import { classifyStatementName } from "./langid";
import { findOperand, findSubOperand } from "./schema";
import { Segmenter, toCommentNode } from "./segmenter";
import {
  CommentNode,
  InlineDataRegion,
  McsDocument,
  NodePosition,
  OperandDefinition,
  OperandNode,
  ParameterNode,
  SchemaLookup,
  StatementDefinition,
  StatementNode,
  StatementSpan,
  StatementStatus,
  SubOperandDefinition,
} from "./types";
import {
  STATEMENT_MARKER,
  isIdentStart,
  lineStartOffsets,
  looksLikeOperand,
  offsetToLineChar,
  readBalanced,
  readIdentifier,
  skipWhitespace,
} from "./utils";

/**
 * Operands that supply the element data from outside the MCS stream, so no
 * inline data follows the statement. DELETE removes the element instead.
 */
export const EXTERNAL_DATA_OPERANDS: ReadonlySet<string> = new Set(["FROMDS", "RELFILE", "TXLIB", "DELETE"]);

// ---- Drafts ----

type ParameterDraft = { offset: number; value: string; closed: boolean };

type OperandDraft = {
  name: string;
  offset: number;
  definition?: OperandDefinition | SubOperandDefinition;
  parameter?: ParameterDraft;
  subOperands: OperandDraft[];
};

type StatementDraft = {
  name: string;
  offset: number;
  status: StatementStatus;
  languageId: string;
  definition?: StatementDefinition;
  parameter?: ParameterDraft;
  operands: OperandDraft[];
};

type OperandResolver = {
  accept(token: string): boolean;
  resolve(token: string): OperandDefinition | SubOperandDefinition | undefined;
  nested(def: OperandDefinition | SubOperandDefinition | undefined): OperandResolver | undefined;
};

// ======================= Operand scan =======================

function statementResolver(def: StatementDefinition | undefined): OperandResolver {
  return {
    accept: (token) => def !== undefined || looksLikeOperand(token),
    resolve: (token) => (def ? findOperand(def, token) : undefined),
    nested: (opDef) => (opDef && opDef.kind === "operand" && opDef.subOperands.length > 0 ? subOperandResolver(opDef) : undefined),
  };
}

function subOperandResolver(def: OperandDefinition): OperandResolver {
  return {
    accept: () => true,
    resolve: (token) => findSubOperand(def, token),
    nested: () => undefined,
  };
}

/**
 * Scans `text[start, limit)` for `NAME` and `NAME(...)` tokens. Parenthesised
 * text that does not follow a name is skipped as a unit.
 */
function scanOperands(text: string, start: number, limit: number, resolver: OperandResolver): OperandDraft[] {
  const out: OperandDraft[] = [];
  let i = start;

  while (i < limit) {
    const ch = text[i];

    if (isIdentStart(ch)) {
      const name = readIdentifier(text, i, limit);
      const nameEnd = i + name.length;
      if (!resolver.accept(name)) {
        i = nameEnd;
        continue;
      }

      const definition = resolver.resolve(name);
      const draft: OperandDraft = { name, offset: i, definition, subOperands: [] };

      const k = skipWhitespace(text, nameEnd, limit);
      if (k < limit && text[k] === "(") {
        const read = readBalanced(text, k, limit);
        const nested = resolver.nested(definition);
        if (nested) {
          const innerEnd = read.closed ? read.end - 1 : read.end;
          draft.subOperands = scanOperands(text, k + 1, innerEnd, nested);
        } else {
          draft.parameter = { offset: k + 1, value: read.value, closed: read.closed };
        }
        i = read.end;
      } else {
        i = nameEnd;
      }

      out.push(draft);
      continue;
    }

    if (ch === "(") {
      i = readBalanced(text, i, limit).end;
      continue;
    }

    i++;
  }

  return out;
}

// ======================= Statement draft =======================

function draftStatement(span: StatementSpan, schema: SchemaLookup): StatementDraft {
  const text = span.text;
  const markerAt = text.indexOf(STATEMENT_MARKER);
  const offset = markerAt < 0 ? 0 : markerAt;
  const name = STATEMENT_MARKER + readIdentifier(text, offset + STATEMENT_MARKER.length);

  const cls = classifyStatementName(name, schema);
  const draft: StatementDraft = {
    name,
    offset,
    status: cls.status,
    languageId: cls.languageId,
    definition: cls.definition,
    operands: [],
  };

  let cursor = offset + name.length;

  if (cls.definition && cls.definition.parameter) {
    const k = skipWhitespace(text, cursor);
    if (k < text.length && text[k] === "(") {
      const read = readBalanced(text, k);
      draft.parameter = { offset: k + 1, value: read.value, closed: read.closed };
      cursor = read.end;
    }
  }

  draft.operands = scanOperands(text, cursor, text.length, statementResolver(cls.definition));
  return draft;
}

// ======================= Materialize =======================

class NodeFactory {
  private readonly lineStarts: number[];

  constructor(private readonly span: StatementSpan) {
    this.lineStarts = lineStartOffsets(span.text);
  }

  position(offset: number, length: number): NodePosition {
    const lc = offsetToLineChar(this.lineStarts, offset);
    return { line: this.span.startLine + lc.line, character: lc.character, length };
  }

  parameter(d: ParameterDraft, parent: StatementNode | OperandNode): ParameterNode {
    const nl = d.value.indexOf("\n");
    const firstLineLength = nl < 0 ? d.value.length : nl;
    return {
      kind: "parameter",
      position: this.position(d.offset, firstLineLength),
      value: d.value.replace(/\n/g, " "),
      unterminated: !d.closed,
      parent,
    };
  }

  operand(d: OperandDraft, parent: StatementNode | OperandNode): OperandNode {
    const children: (ParameterNode | OperandNode)[] = [];
    const node: OperandNode = {
      kind: "operand",
      position: this.position(d.offset, d.name.length),
      name: d.name,
      definition: d.definition,
      children,
      parent,
    };
    if (d.parameter) children.push(this.parameter(d.parameter, node));
    for (const sub of d.subOperands) children.push(this.operand(sub, node));
    return node;
  }

  statement(d: StatementDraft, hasInlineData: boolean): StatementNode {
    const span = this.span;
    const children: (ParameterNode | OperandNode)[] = [];
    const operandsByName = new Map<string, OperandNode>();
    const node: StatementNode = {
      kind: "statement",
      position: this.position(d.offset, d.name.length),
      name: d.name,
      languageId: d.languageId,
      status: d.status,
      definition: d.definition,
      hasTerminator: span.hasTerminator,
      terminator: span.terminator ? { ...span.terminator, length: 1 } : undefined,
      unbalancedParens: span.unbalancedParens,
      hasInlineData,
      endLine: span.endLine,
      children,
      operandsByName,
    };

    if (d.parameter) children.push(this.parameter(d.parameter, node));
    for (const od of d.operands) {
      const op = this.operand(od, node);
      children.push(op);
      if (!operandsByName.has(op.name)) operandsByName.set(op.name, op);
    }
    return node;
  }
}

// ======================= parseDocument =======================

export function expectsInlineData(definition: StatementDefinition | undefined, hasTerminator: boolean, operandNames: string[]): boolean {
  if (!definition || !definition.expectsInlineData || !hasTerminator) return false;
  return !operandNames.some((n) => EXTERNAL_DATA_OPERANDS.has(n));
}

export function parseDocument(text: string, schema: SchemaLookup): McsDocument {
  const seg = new Segmenter(text);
  const statements: StatementNode[] = [];
  const comments: CommentNode[] = [];
  const expecting: StatementNode[] = [];
  const inlineRegions: InlineDataRegion[] = [];

  let lineNo = seg.scanGap(0, comments);
  while (lineNo < seg.lineCount) {
    const span = seg.readStatement(lineNo);
    for (const c of span.comments) comments.push(toCommentNode(c, seg.lines, false));

    const draft = draftStatement(span, schema);
    const factory = new NodeFactory(span);
    let next = span.endLine + 1;

    const expects = expectsInlineData(draft.definition, span.hasTerminator, draft.operands.map((o) => o.name));
    if (expects) {
      const scan = seg.readInlineData(next);
      const stmt = factory.statement(draft, scan.hasContent);
      statements.push(stmt);
      expecting.push(stmt);
      if (scan.endLine >= scan.startLine) {
        inlineRegions.push({ statement: stmt, startLine: scan.startLine, endLine: scan.endLine });
      }
      next = scan.endLine + 1;
    } else {
      statements.push(factory.statement(draft, false));
    }

    lineNo = seg.scanGap(next, comments);
  }

  return {
    statements,
    comments,
    expectingInlineData: expecting,
    inlineRegions,
    lines: seg.lines,
  };
}
