/**
 * Statement rules the catalog format cannot express.
 */

/** Operands SMP/E rejects the statement without. */
export const REQUIRED_OPERANDS: Readonly<Record<string, readonly string[]>> = {
  "++ASSIGN": ["SOURCEID", "TO"],
  "++IF": ["FMID", "REQ"],
  "++DELETE": ["SYSLIB"],
  "++MOD": ["DISTLIB"],
  "++SRC": ["DISTLIB"],
  "++RENAME": ["TONAME"],
  "++PRODUCT": ["DESCRIPTION", "SREL"],
  "++PROGRAM": ["DISTLIB"],
  "++RELEASE": ["FMID", "REASON"],
};

export function requiredOperandsFor(statement: string): readonly string[] {
  return REQUIRED_OPERANDS[statement] ?? [];
}

/** Alternatives to inline data named in the missing-inline-data message. */
export const INLINE_DATA_ALTERNATIVES: readonly string[] = ["FROMDS", "RELFILE", "TXLIB"];

// ---- ++MOVE ----

/**
 * ++MOVE works on either distribution libraries (DISTLIB/TODISTLIB) or target
 * libraries (SYSLIB/TOSYSLIB); each mode needs its own companions.
 */
export function checkMoveMode(has: (operand: string) => boolean): string[] {
  const problems: string[] = [];
  const distlib = has("DISTLIB");
  const syslib = has("SYSLIB");

  if (distlib) {
    if (!has("TODISTLIB")) problems.push("TODISTLIB is required when DISTLIB is specified");
    if (!["MAC", "MOD", "SRC"].some(has)) problems.push("One of MAC, MOD, or SRC is required when DISTLIB is specified");
  }
  if (syslib) {
    if (!has("TOSYSLIB")) problems.push("TOSYSLIB is required when SYSLIB is specified");
    if (!["MAC", "SRC", "LMOD", "FMID"].some(has)) {
      problems.push("One of MAC, SRC, LMOD, or FMID is required when SYSLIB is specified");
    }
  }
  if (!distlib && !syslib) problems.push("Either DISTLIB or SYSLIB must be specified");

  return problems;
}
