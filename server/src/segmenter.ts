/**
 * Segmenter: splits MCS source lines into statement spans, inline-data
 * regions and the gaps between them.
 *
 * A span starts at a line whose trimmed text begins with "++" and ends at the
 * first "." found at parenthesis depth zero outside comments, at the next
 * statement line, or at end of input. A statement line always starts a new
 * span, even inside an unclosed comment. Comments are blanked to spaces in the
 * span text so that character offsets keep matching the source columns.
 */
import { CommentNode, SpanComment, StatementSpan } from "./types";
import { blankComments, isMarkerLine, splitLines } from "./utils";

export type InlineDataScan = {
  startLine: number;
  /** Last consumed line; `startLine - 1` when nothing was consumed. */
  endLine: number;
  hasContent: boolean;
};

export class Segmenter {
  readonly lines: string[];

  constructor(text: string) {
    this.lines = splitLines(text);
  }

  get lineCount(): number {
    return this.lines.length;
  }

  /**
   * Walks gap lines from `from`, recording comments as standalone. Returns the
   * index of the next statement line, or the line count.
   */
  scanGap(from: number, comments: CommentNode[]): number {
    let inComment = false;
    let open: SpanComment | undefined;

    for (let lineNo = from; lineNo < this.lines.length; lineNo++) {
      const line = this.lines[lineNo];
      if (isMarkerLine(line)) {
        if (open) comments.push(toCommentNode(open, this.lines, true));
        return lineNo;
      }

      const blanked = blankComments(line, inComment);
      for (const piece of blanked.pieces) {
        if (piece.opensHere) {
          if (open) comments.push(toCommentNode(open, this.lines, true));
          open = { line: lineNo, character: piece.start, endLine: lineNo, endCharacter: piece.end };
        } else if (open) {
          open.endLine = lineNo;
          open.endCharacter = piece.end;
        }
      }
      inComment = blanked.inComment;
      if (open && !inComment) {
        comments.push(toCommentNode(open, this.lines, true));
        open = undefined;
      }
    }

    if (open) comments.push(toCommentNode(open, this.lines, true));
    return this.lines.length;
  }

  readStatement(startLine: number): StatementSpan {
    const textLines: string[] = [];
    const comments: SpanComment[] = [];
    let open: SpanComment | undefined;

    let inComment = false;
    let depth = 0;
    let minDepth = 0;
    let terminator: { line: number; character: number } | undefined;
    let endLine = startLine;

    let lineNo = startLine;
    for (; lineNo < this.lines.length; lineNo++) {
      const raw = this.lines[lineNo];
      if (lineNo > startLine && isMarkerLine(raw)) break;

      const blanked = blankComments(raw, inComment);
      for (const piece of blanked.pieces) {
        if (piece.opensHere) {
          open = { line: lineNo, character: piece.start, endLine: lineNo, endCharacter: piece.end };
          comments.push(open);
        } else if (open) {
          open.endLine = lineNo;
          open.endCharacter = piece.end;
        }
      }
      inComment = blanked.inComment;
      endLine = lineNo;

      const text = blanked.text;
      let kept = text;
      for (let i = 0; i < text.length; i++) {
        const ch = text[i];
        if (ch === "(") {
          depth++;
        } else if (ch === ")") {
          depth--;
          if (depth < minDepth) minDepth = depth;
        } else if (ch === "." && depth <= 0) {
          terminator = { line: lineNo, character: i };
          kept = text.slice(0, i + 1);
          break;
        }
      }
      textLines.push(kept);
      if (terminator) break;
    }

    // A comment opened on the terminator line belongs to the statement even
    // when it runs over the following lines, up to the next statement line.
    if (terminator && inComment) {
      for (lineNo = endLine + 1; lineNo < this.lines.length && inComment; lineNo++) {
        if (isMarkerLine(this.lines[lineNo])) break;
        const blanked = blankComments(this.lines[lineNo], true);
        inComment = blanked.inComment;
        endLine = lineNo;
        if (open) {
          open.endLine = lineNo;
          open.endCharacter = blanked.pieces[0]?.end ?? 0;
        }
      }
    }

    return {
      startLine,
      endLine,
      text: textLines.join("\n"),
      hasTerminator: terminator !== undefined,
      terminator,
      unbalancedParens: minDepth < 0 ? minDepth : depth,
      comments,
    };
  }

  /**
   * Consumes the lines after a statement that expects inline data, up to the
   * next statement line. A statement line ends the region even inside an
   * unclosed comment.
   */
  readInlineData(from: number): InlineDataScan {
    let inComment = false;
    let hasContent = false;
    let lineNo = from;

    for (; lineNo < this.lines.length; lineNo++) {
      const line = this.lines[lineNo];
      if (isMarkerLine(line)) break;
      const blanked = blankComments(line, inComment);
      inComment = blanked.inComment;
      if (blanked.text.trim() !== "") hasContent = true;
    }

    return { startLine: from, endLine: lineNo - 1, hasContent };
  }
}

export function toCommentNode(c: SpanComment, lines: readonly string[], standalone: boolean): CommentNode {
  const firstLineEnd = c.endLine === c.line ? c.endCharacter : (lines[c.line] ?? "").length;
  return {
    kind: "comment",
    position: { line: c.line, character: c.character, length: Math.max(0, firstLineEnd - c.character) },
    endLine: c.endLine,
    endCharacter: c.endCharacter,
    standalone,
  };
}
