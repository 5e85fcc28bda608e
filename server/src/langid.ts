/**
 * National-language identifiers for language-variant MCS statements
 * (e.g. ++SAMPENU, ++MSGDEU) and statement-name classification.
 */
import { SchemaLookup, StatementDefinition, StatementStatus } from "./types";

export const LANGUAGE_IDS: ReadonlySet<string> = new Set([
  "ARA", "CHS", "CHT", "DAN", "DES", "DEU", "ELL", "ENG",
  "ENP", "ENU", "ESP", "FIN", "FRA", "FRB", "FRC", "FRS",
  "HEB", "ISL", "ITA", "ITS", "JPN", "KOR", "NLB", "NLD",
  "NOR", "PTB", "PTG", "RMS", "RUS", "SVE", "THA", "TRK",
]);

/** Statements that may carry a three-letter language suffix. */
export const LANGUAGE_VARIANT_BASES: ReadonlySet<string> = new Set([
  "++BOOK", "++BSIND", "++CGM", "++DATA6", "++FONT", "++GDF", "++HELP",
  "++IMG", "++MSG", "++PNL", "++PROBJ", "++PRSRC", "++PSEG", "++PUBLB",
  "++SAMP", "++SKL", "++TBL", "++TEXT", "++UTIN", "++UTOUT",
]);

const SUFFIX_LEN = 3;

export function isValidLanguageId(id: string): boolean {
  return LANGUAGE_IDS.has(id);
}

export function isLanguageVariantBase(name: string): boolean {
  return LANGUAGE_VARIANT_BASES.has(name);
}

/**
 * Splits `++SAMPENU` into `{ base: "++SAMP", languageId: "ENU" }`.
 * Names too short to hold a base plus suffix yield undefined.
 */
export function splitLanguageSuffix(name: string): { base: string; languageId: string } | undefined {
  // "++" + at least three base characters + suffix
  if (name.length < 2 + SUFFIX_LEN + SUFFIX_LEN) return undefined;
  return {
    base: name.slice(0, -SUFFIX_LEN),
    languageId: name.slice(-SUFFIX_LEN),
  };
}

export type StatementClassification = {
  status: StatementStatus;
  definition?: StatementDefinition;
  languageId: string;
  /** Base statement name when a language suffix was recognised. */
  base?: string;
};

export function classifyStatementName(name: string, schema: SchemaLookup): StatementClassification {
  const exact = schema.lookup(name);
  if (exact) return { status: "known", definition: exact, languageId: "" };

  const split = splitLanguageSuffix(name);
  if (!split || !isLanguageVariantBase(split.base)) return { status: "unknown", languageId: "" };

  if (!isValidLanguageId(split.languageId)) {
    return { status: "invalid-language-id", languageId: split.languageId, base: split.base };
  }

  const baseDef = schema.lookup(split.base);
  if (baseDef && baseDef.acceptsLanguageVariant) {
    return { status: "known", definition: baseDef, languageId: split.languageId, base: split.base };
  }
  return { status: "unknown", languageId: split.languageId, base: split.base };
}
