/**
 * Tests for langid.ts: language-variant statement names.
 */
import { describe, it, expect } from "vitest";
import { classifyStatementName, isValidLanguageId, splitLanguageSuffix } from "./langid";
import { SchemaStore } from "./schema";

const schema = SchemaStore.fromDefinitions([
  { name: "++SAMP", language_variants: true, inline_data: true },
  { name: "++PNL" },
  { name: "++MOD" },
]);

describe("splitLanguageSuffix", () => {
  it("splits the last three characters", () => {
    expect(splitLanguageSuffix("++MSGDEU")).toEqual({ base: "++MSG", languageId: "DEU" });
  });

  it("rejects names too short for a suffix", () => {
    expect(splitLanguageSuffix("++MSG")).toBeUndefined();
    expect(splitLanguageSuffix("++ABENU")).toBeUndefined();
  });
});

describe("isValidLanguageId", () => {
  it("knows the national language identifiers", () => {
    expect(isValidLanguageId("ENU")).toBe(true);
    expect(isValidLanguageId("JPN")).toBe(true);
    expect(isValidLanguageId("XYZ")).toBe(false);
  });
});

describe("classifyStatementName", () => {
  it("resolves exact names", () => {
    const cls = classifyStatementName("++SAMP", schema);
    expect(cls.status).toBe("known");
    expect(cls.definition?.name).toBe("++SAMP");
    expect(cls.languageId).toBe("");
  });

  it("resolves a language variant to its base definition", () => {
    const cls = classifyStatementName("++SAMPENU", schema);
    expect(cls.status).toBe("known");
    expect(cls.definition?.name).toBe("++SAMP");
    expect(cls.languageId).toBe("ENU");
    expect(cls.base).toBe("++SAMP");
  });

  it("flags an invalid suffix on a variant-capable statement", () => {
    const cls = classifyStatementName("++SAMPXYZ", schema);
    expect(cls.status).toBe("invalid-language-id");
    expect(cls.languageId).toBe("XYZ");
    expect(cls.base).toBe("++SAMP");
    expect(cls.definition).toBeUndefined();
  });

  it("does not accept variants the catalog does not allow", () => {
    const cls = classifyStatementName("++PNLENU", schema);
    expect(cls.status).toBe("unknown");
    expect(cls.languageId).toBe("ENU");
  });

  it("ignores a language suffix on statements that never take one", () => {
    expect(classifyStatementName("++MODENU", schema)).toEqual({ status: "unknown", languageId: "" });
    expect(classifyStatementName("++APARENU", schema)).toEqual({ status: "unknown", languageId: "" });
  });

  it("reports unrelated names as unknown", () => {
    expect(classifyStatementName("++FOO", schema)).toEqual({ status: "unknown", languageId: "" });
  });
});
