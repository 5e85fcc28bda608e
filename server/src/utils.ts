/**
 * Utility functions: MCS line helpers, comment blanking, parenthesis scanning,
 * URI handling, text utilities, and small pure algorithms.
 */
import { Range } from "vscode-languageserver/node";

import { fileURLToPath } from "url";

import { NodePosition } from "./types";

// ---- MCS constants ----

export const STATEMENT_MARKER = "++";
export const COMMENT_OPEN = "/*";
export const COMMENT_CLOSE = "*/";

/** SMP/E ignores columns 73-80. */
export const MAX_CONTENT_COLUMN = 72;

const IDENT_START_RE = /[A-Za-z@#$]/;
const IDENT_PART_RE = /[A-Za-z0-9@#$_-]/;
const UPPER_OPERAND_RE = /^[A-Z@#$][A-Z0-9@#$_-]*$/;

// ---- Line helpers ----

export function splitLines(text: string): string[] {
  return text.split(/\r?\n/);
}

export function isMarkerLine(line: string): boolean {
  return line.trimStart().startsWith(STATEMENT_MARKER);
}

export function isIdentStart(ch: string): boolean {
  return IDENT_START_RE.test(ch);
}

export function isIdentPart(ch: string): boolean {
  return IDENT_PART_RE.test(ch);
}

export function looksLikeOperand(token: string): boolean {
  return UPPER_OPERAND_RE.test(token);
}

export function readIdentifier(text: string, start: number, limit: number = text.length): string {
  let end = start;
  while (end < limit && isIdentPart(text[end])) end++;
  return text.slice(start, end);
}

// ---- Comments ----

export type CommentPiece = {
  start: number;
  /** Exclusive; line length when the comment stays open. */
  end: number;
  /** The piece starts a new comment rather than continuing one from a previous line. */
  opensHere: boolean;
  closed: boolean;
};

export type BlankedLine = {
  text: string;
  inComment: boolean;
  pieces: CommentPiece[];
};

/**
 * Replaces every `/* ... *\/` region of a line with spaces, carrying the open
 * comment state across lines. Column positions are preserved.
 */
export function blankComments(line: string, inComment: boolean): BlankedLine {
  let out = "";
  let open = inComment;
  const pieces: CommentPiece[] = [];
  let current: CommentPiece | undefined = open
    ? { start: 0, end: line.length, opensHere: false, closed: false }
    : undefined;
  if (current) pieces.push(current);

  let i = 0;
  while (i < line.length) {
    if (open) {
      if (line.startsWith(COMMENT_CLOSE, i)) {
        out += "  ";
        i += 2;
        open = false;
        if (current) {
          current.end = i;
          current.closed = true;
        }
        current = undefined;
        continue;
      }
      out += " ";
      i++;
      continue;
    }

    if (line.startsWith(COMMENT_OPEN, i)) {
      current = { start: i, end: line.length, opensHere: true, closed: false };
      pieces.push(current);
      out += "  ";
      i += 2;
      open = true;
      continue;
    }

    out += line[i];
    i++;
  }

  return { text: out, inComment: open, pieces };
}

// ---- Parentheses ----

export type BalancedRead = {
  /** Text strictly between the opening parenthesis and its match. */
  value: string;
  /** Offset just past the closing parenthesis (or `limit` when unclosed). */
  end: number;
  closed: boolean;
};

/** `open` must index a "(" in `text`. */
export function readBalanced(text: string, open: number, limit: number = text.length): BalancedRead {
  let depth = 0;
  for (let i = open; i < limit; i++) {
    const ch = text[i];
    if (ch === "(") depth++;
    else if (ch === ")") {
      depth--;
      if (depth === 0) return { value: text.slice(open + 1, i), end: i + 1, closed: true };
    }
  }
  return { value: text.slice(open + 1, limit), end: limit, closed: false };
}

export function skipWhitespace(text: string, start: number, limit: number = text.length): number {
  let i = start;
  while (i < limit && /\s/.test(text[i])) i++;
  return i;
}

// ---- Values ----

export function stripQuotes(value: string): string {
  const v = value.trim();
  if (v.length >= 2) {
    const q = v[0];
    if ((q === "'" || q === "\"") && v[v.length - 1] === q) return v.slice(1, -1);
  }
  return v;
}

export function splitAliases(names: string): string[] {
  return names
    .split("|")
    .map((n) => n.trim())
    .filter((n) => n.length > 0);
}

// ---- Positions ----

export function lineStartOffsets(text: string): number[] {
  const starts = [0];
  for (let i = 0; i < text.length; i++) {
    if (text[i] === "\n") starts.push(i + 1);
  }
  return starts;
}

/** Binary search over `lineStarts` for the line containing `offset`. */
export function offsetToLineChar(lineStarts: number[], offset: number): { line: number; character: number } {
  let lo = 0;
  let hi = lineStarts.length - 1;
  while (lo < hi) {
    const mid = (lo + hi + 1) >> 1;
    if (lineStarts[mid] <= offset) lo = mid;
    else hi = mid - 1;
  }
  return { line: lo, character: offset - lineStarts[lo] };
}

export function toRange(pos: NodePosition): Range {
  return Range.create(pos.line, pos.character, pos.line, pos.character + pos.length);
}

export function containsPosition(pos: NodePosition, line: number, character: number): boolean {
  return pos.line === line && character >= pos.character && character <= pos.character + pos.length;
}

// ---- URI / path helpers ----

export function fsPathFromUri(uri: string): string | undefined {
  try {
    const u = new URL(uri);
    if (u.protocol !== "file:") return undefined;
    return fileURLToPath(u);
  } catch {
    return undefined;
  }
}

// ---- Text utilities ----

export function excerpt(s: string, max: number): string {
  return (s || "").replace(/\s+/g, " ").slice(0, max);
}

// ---- Algorithm ----

export function levenshteinDistanceWithinLimit(a: string, b: string, limit: number): number {
  if (a === b) return 0;

  const al = a.length;
  const bl = b.length;
  if (Math.abs(al - bl) > limit) return limit + 1;

  let prev = new Array<number>(bl + 1);
  let curr = new Array<number>(bl + 1);

  for (let j = 0; j <= bl; j++) prev[j] = j;

  for (let i = 1; i <= al; i++) {
    curr[0] = i;
    let minRow = curr[0];

    const ca = a.charCodeAt(i - 1);
    for (let j = 1; j <= bl; j++) {
      const cost = ca === b.charCodeAt(j - 1) ? 0 : 1;
      curr[j] = Math.min(
        prev[j] + 1,
        curr[j - 1] + 1,
        prev[j - 1] + cost
      );
      if (curr[j] < minRow) minRow = curr[j];
    }

    if (minRow > limit) return limit + 1;
    [prev, curr] = [curr, prev];
  }

  return prev[bl];
}

/** Closest candidate within `limit` edits, or undefined. */
export function closestMatch(word: string, candidates: Iterable<string>, limit: number): string | undefined {
  let best: string | undefined;
  let bestDist = limit + 1;
  for (const cand of candidates) {
    const d = levenshteinDistanceWithinLimit(word, cand, limit);
    if (d < bestDist) {
      best = cand;
      bestDist = d;
    }
  }
  return best;
}
