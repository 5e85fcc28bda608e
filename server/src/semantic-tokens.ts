/**
 * Semantic Tokens provider for MCS sources.
 *
 * Classification comes straight from the document tree:
 *  - Statements   → keyword (declaration modifier on recognised statements)
 *  - Operands     → function (sub-operands: property)
 *  - Parameters   → parameter
 *  - Comments     → comment, one token per physical line
 *  - Inline data  → string
 */
import { McsDocument, NodePosition, OperandNode, ParameterNode, StatementNode } from "./types";

// ---- Token types & modifiers (indices into legend) ----

export const TOKEN_TYPES = [
  "keyword",      // 0: statement names
  "function",     // 1: operands
  "property",     // 2: sub-operands
  "parameter",    // 3: parameter values
  "comment",      // 4: comments
  "string",       // 5: inline data lines
] as const;

export const TOKEN_MODIFIERS = [
  "declaration",  // 0: recognised statement
  "deprecated",   // 1: unknown statement or operand
] as const;

type TokenType = (typeof TOKEN_TYPES)[number];

const TYPE_INDEX = (name: TokenType): number => TOKEN_TYPES.indexOf(name);
const MOD_DECLARATION = 1 << 0;
const MOD_DEPRECATED = 1 << 1;

export type SemanticToken = {
  line: number;
  startChar: number;
  length: number;
  tokenType: number;
  tokenModifiers: number;
};

/**
 * Build semantic tokens for the entire document.
 */
export function buildSemanticTokens(doc: McsDocument): SemanticToken[] {
  const tokens: SemanticToken[] = [];

  const push = (pos: NodePosition, type: TokenType, modifiers: number = 0) => {
    if (pos.length <= 0) return;
    tokens.push({
      line: pos.line,
      startChar: pos.character,
      length: pos.length,
      tokenType: TYPE_INDEX(type),
      tokenModifiers: modifiers,
    });
  };

  const commentPieces: NodePosition[] = [];
  for (const c of doc.comments) {
    for (let line = c.position.line; line <= c.endLine; line++) {
      const full = doc.lines[line] ?? "";
      const start = line === c.position.line ? c.position.character : 0;
      const end = line === c.endLine ? c.endCharacter : full.length;
      commentPieces.push({ line, character: start, length: end - start });
    }
  }
  for (const piece of commentPieces) push(piece, "comment");

  // Operand values give way to comments embedded in them.
  const pushOutsideComments = (pos: NodePosition, type: TokenType, modifiers: number = 0) => {
    for (const part of splitAround(pos, commentPieces)) push(part, type, modifiers);
  };

  for (const stmt of doc.statements) {
    push(stmt.position, "keyword", stmt.status === "known" ? MOD_DECLARATION : MOD_DEPRECATED);
    for (const child of stmt.children) pushNode(child, stmt, pushOutsideComments);
  }

  for (const region of doc.inlineRegions) {
    for (let line = region.startLine; line <= region.endLine; line++) {
      const full = doc.lines[line] ?? "";
      const start = full.length - full.trimStart().length;
      push({ line, character: start, length: full.trimEnd().length - start }, "string");
    }
  }

  // Sort tokens by line, then by startChar (LSP requires ascending order)
  tokens.sort((a, b) => a.line - b.line || a.startChar - b.startChar);

  return tokens;
}

/** Cuts the parts of `pos` covered by `holes` out of it. */
function splitAround(pos: NodePosition, holes: readonly NodePosition[]): NodePosition[] {
  const parts: NodePosition[] = [];
  const end = pos.character + pos.length;
  let start = pos.character;
  const onLine = holes.filter((h) => h.line === pos.line).sort((a, b) => a.character - b.character);
  for (const hole of onLine) {
    const holeEnd = hole.character + hole.length;
    if (holeEnd <= start || hole.character >= end) continue;
    if (hole.character > start) parts.push({ line: pos.line, character: start, length: hole.character - start });
    start = holeEnd;
  }
  if (end > start) parts.push({ line: pos.line, character: start, length: end - start });
  return parts;
}

function pushNode(
  node: OperandNode | ParameterNode,
  stmt: StatementNode,
  push: (pos: NodePosition, type: TokenType, modifiers?: number) => void,
): void {
  if (node.kind === "parameter") {
    push(node.position, "parameter");
    return;
  }

  const isSub = node.parent.kind === "operand";
  const unknown = stmt.status === "known" && !node.definition;
  push(node.position, isSub ? "property" : "function", unknown ? MOD_DEPRECATED : 0);
  for (const child of node.children) pushNode(child, stmt, push);
}

/**
 * Encode semantic tokens into the LSP delta format.
 * Returns the `data` array: [deltaLine, deltaStartChar, length, tokenType, tokenModifiers, ...]
 */
export function encodeSemanticTokens(tokens: SemanticToken[]): number[] {
  const data: number[] = [];
  let prevLine = 0;
  let prevChar = 0;

  for (const t of tokens) {
    const deltaLine = t.line - prevLine;
    const deltaChar = deltaLine === 0 ? t.startChar - prevChar : t.startChar;

    data.push(deltaLine, deltaChar, t.length, t.tokenType, t.tokenModifiers);

    prevLine = t.line;
    prevChar = t.startChar;
  }

  return data;
}
