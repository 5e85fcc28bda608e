/**
 * Tests for segmenter.ts: statement spans, gaps and inline data.
 */
import { describe, it, expect } from "vitest";
import { Segmenter } from "./segmenter";
import { CommentNode } from "./types";

function seg(lines: string[]): Segmenter {
  return new Segmenter(lines.join("\n"));
}

// ---- readStatement ----

describe("Segmenter.readStatement", () => {
  it("ends at the terminator and drops trailing text", () => {
    const span = seg(["++MOD(IFBMOD01) DISTLIB(AOSFB).  trailing", "next"]).readStatement(0);
    expect(span.text).toBe("++MOD(IFBMOD01) DISTLIB(AOSFB).");
    expect(span.hasTerminator).toBe(true);
    expect(span.terminator).toEqual({ line: 0, character: 30 });
    expect(span.endLine).toBe(0);
    expect(span.unbalancedParens).toBe(0);
  });

  it("stops at the next statement line when no terminator is found", () => {
    const span = seg(["++USERMOD(A1)", "  DESC(X)", "++VER(Z038)."]).readStatement(0);
    expect(span.text).toBe("++USERMOD(A1)\n  DESC(X)");
    expect(span.hasTerminator).toBe(false);
    expect(span.endLine).toBe(1);
  });

  it("ignores periods inside parentheses", () => {
    const span = seg(["++USERMOD(LJS2012 ."]).readStatement(0);
    expect(span.hasTerminator).toBe(false);
    expect(span.unbalancedParens).toBe(1);
  });

  it("reports an extra closing parenthesis as negative imbalance", () => {
    const span = seg(["++MOD(A)) ."]).readStatement(0);
    expect(span.hasTerminator).toBe(true);
    expect(span.unbalancedParens).toBe(-1);
  });

  it("ignores parentheses and periods in comments", () => {
    const span = seg(["++MOD(A) /* (. */ DISTLIB(B)."]).readStatement(0);
    expect(span.hasTerminator).toBe(true);
    expect(span.terminator).toEqual({ line: 0, character: 28 });
    expect(span.unbalancedParens).toBe(0);
    expect(span.comments).toEqual([{ line: 0, character: 9, endLine: 0, endCharacter: 17 }]);
  });

  it("keeps a comment opened on the terminator line with the statement", () => {
    const s = seg(["++VER(Z038) FMID(HBB7790). /* note", "   continues */", "++MOD(X)."]);
    const span = s.readStatement(0);
    expect(span.endLine).toBe(1);
    expect(span.comments).toEqual([{ line: 0, character: 27, endLine: 1, endCharacter: 15 }]);
    expect(s.scanGap(2, [])).toBe(2);
  });

  it("stops at a statement line inside an unclosed comment", () => {
    const span = seg(["++VER(Z038) /* oops", "++MOD(X)."]).readStatement(0);
    expect(span.text).toBe("++VER(Z038)        ");
    expect(span.hasTerminator).toBe(false);
    expect(span.endLine).toBe(0);
    expect(span.comments).toEqual([{ line: 0, character: 12, endLine: 0, endCharacter: 19 }]);
  });

  it("does not carry a terminator-line comment past the next statement", () => {
    const s = seg(["++VER(Z038). /* open", "++MOD(X)."]);
    const span = s.readStatement(0);
    expect(span.endLine).toBe(0);
    expect(span.comments).toEqual([{ line: 0, character: 13, endLine: 0, endCharacter: 20 }]);
    expect(s.scanGap(1, [])).toBe(1);
  });
});

// ---- scanGap ----

describe("Segmenter.scanGap", () => {
  it("records gap comments as standalone", () => {
    const comments: CommentNode[] = [];
    const next = seg(["/* hdr */", "", "++MOD(X)."]).scanGap(0, comments);
    expect(next).toBe(2);
    expect(comments).toEqual([
      {
        kind: "comment",
        position: { line: 0, character: 0, length: 9 },
        endLine: 0,
        endCharacter: 9,
        standalone: true,
      },
    ]);
  });

  it("ends an open comment at the next statement line", () => {
    const comments: CommentNode[] = [];
    const next = seg(["/* start", "++MOD(X).", "end */", "++MAC(Y)."]).scanGap(0, comments);
    expect(next).toBe(1);
    expect(comments).toEqual([
      {
        kind: "comment",
        position: { line: 0, character: 0, length: 8 },
        endLine: 0,
        endCharacter: 8,
        standalone: true,
      },
    ]);
  });

  it("returns the line count when no statement follows", () => {
    expect(seg(["", "  "]).scanGap(0, [])).toBe(2);
  });
});

// ---- readInlineData ----

describe("Segmenter.readInlineData", () => {
  it("consumes lines up to the next statement", () => {
    const scan = seg(["++MAC(X).", "data1", "", "++MOD(Y)."]).readInlineData(1);
    expect(scan).toEqual({ startLine: 1, endLine: 2, hasContent: true });
  });

  it("sees no content in blank or comment-only lines", () => {
    const scan = seg(["++MAC(X).", "   ", "/* c */"]).readInlineData(1);
    expect(scan).toEqual({ startLine: 1, endLine: 2, hasContent: false });
  });

  it("consumes nothing when a statement follows immediately", () => {
    const scan = seg(["++MAC(X).", "++MOD(Y)."]).readInlineData(1);
    expect(scan).toEqual({ startLine: 1, endLine: 0, hasContent: false });
  });

  it("lets a statement line end the region inside an open comment", () => {
    const scan = seg(["++MAC(X).", "/* open", "++MOD(Y)."]).readInlineData(1);
    expect(scan.endLine).toBe(1);
  });
});
