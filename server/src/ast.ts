/**
 * Traversal and lookup helpers over the MCS node union.
 */
import {
  CommentNode,
  InlineDataRegion,
  McsDocument,
  OperandNode,
  ParameterNode,
  StatementNode,
} from "./types";
import { containsPosition } from "./utils";

export function statementParameter(stmt: StatementNode): ParameterNode | undefined {
  const first = stmt.children[0];
  return first && first.kind === "parameter" ? first : undefined;
}

export function operandsOf(node: StatementNode | OperandNode): OperandNode[] {
  return node.children.filter((c): c is OperandNode => c.kind === "operand");
}

export function operandParameter(op: OperandNode): ParameterNode | undefined {
  return op.children.find((c): c is ParameterNode => c.kind === "parameter");
}

/** Depth-first, source order. */
export function* walkStatement(stmt: StatementNode): Generator<StatementNode | OperandNode | ParameterNode> {
  yield stmt;
  const stack: (OperandNode | ParameterNode)[] = [...stmt.children].reverse();
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;
    yield node;
    if (node.kind === "operand") {
      for (let i = node.children.length - 1; i >= 0; i--) stack.push(node.children[i]);
    }
  }
}

/** Statement whose span (including its inline data) covers `line`. */
export function statementAtLine(doc: McsDocument, line: number): StatementNode | undefined {
  let found: StatementNode | undefined;
  for (const stmt of doc.statements) {
    if (stmt.position.line > line) break;
    const region = doc.inlineRegions.find((r) => r.statement === stmt);
    const end = region ? Math.max(stmt.endLine, region.endLine) : stmt.endLine;
    found = line <= end ? stmt : undefined;
  }
  return found;
}

export function inlineRegionAtLine(doc: McsDocument, line: number): InlineDataRegion | undefined {
  return doc.inlineRegions.find((r) => line >= r.startLine && line <= r.endLine);
}

export function commentAt(doc: McsDocument, line: number, character: number): CommentNode | undefined {
  return doc.comments.find((c) => {
    if (line < c.position.line || line > c.endLine) return false;
    if (line === c.position.line && character < c.position.character) return false;
    if (line === c.endLine && character >= c.endCharacter) return false;
    return true;
  });
}

/** Innermost statement, operand or parameter whose token covers the position. */
export function nodeAt(
  doc: McsDocument,
  line: number,
  character: number,
): StatementNode | OperandNode | ParameterNode | undefined {
  const stmt = statementAtLine(doc, line);
  if (!stmt) return undefined;

  let hit: StatementNode | OperandNode | ParameterNode | undefined;
  for (const node of walkStatement(stmt)) {
    if (containsPosition(node.position, line, character)) hit = node;
  }
  return hit;
}
