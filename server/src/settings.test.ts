/**
 * Tests for settings.ts: workspace configuration coercion.
 */
import { describe, it, expect } from "vitest";
import { coerceSettings } from "./settings";
import { DEFAULT_SETTINGS } from "./types";

describe("coerceSettings", () => {
  it("falls back to defaults for non-objects", () => {
    expect(coerceSettings(undefined)).toBe(DEFAULT_SETTINGS);
    expect(coerceSettings(null)).toBe(DEFAULT_SETTINGS);
    expect(coerceSettings([])).toBe(DEFAULT_SETTINGS);
  });

  it("reads nested diagnostics switches", () => {
    const settings = coerceSettings({ diagnostics: { unknownOperand: false } });
    expect(settings.diagnostics.unknownOperand).toBe(false);
    expect(settings.diagnostics.unknownStatement).toBe(true);
  });

  it("reads flat keys when the nested one is absent", () => {
    const settings = coerceSettings({
      "diagnostics.standaloneComment": false,
      "diagnostics.duplicateOperand": false,
      diagnostics: { duplicateOperand: true },
    });
    expect(settings.diagnostics.standaloneComment).toBe(false);
    expect(settings.diagnostics.duplicateOperand).toBe(true);
  });

  it("ignores values of the wrong type", () => {
    const settings = coerceSettings({ diagnostics: { operandLength: "no" }, schemaPath: 42 });
    expect(settings.diagnostics.operandLength).toBe(true);
    expect(settings.schemaPath).toBe("");
  });

  it("trims the schema path", () => {
    expect(coerceSettings({ schemaPath: "  /opt/smpe/catalog.json " }).schemaPath).toBe("/opt/smpe/catalog.json");
  });

  it("does not share the default switches", () => {
    coerceSettings({ diagnostics: { missingInlineData: false } });
    expect(DEFAULT_SETTINGS.diagnostics.missingInlineData).toBe(true);
  });
});
