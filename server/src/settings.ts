/**
 * Coercion of the `smpe` workspace configuration section.
 *
 * Both the nested form (`{ diagnostics: { unknownOperand: false } }`) and the
 * flat form (`{ "diagnostics.unknownOperand": false }`) are accepted; values
 * of the wrong type fall back to the defaults.
 */
import { DEFAULT_SETTINGS, DIAGNOSTICS_CONFIG_KEYS, DiagnosticsConfig, SmpeSettings } from "./types";

export const SETTINGS_SECTION = "smpe";

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

export function coerceSettings(raw: unknown): SmpeSettings {
  if (!isRecord(raw)) return DEFAULT_SETTINGS;

  const nested = isRecord(raw.diagnostics) ? raw.diagnostics : {};
  const diagnostics: DiagnosticsConfig = { ...DEFAULT_SETTINGS.diagnostics };
  for (const key of DIAGNOSTICS_CONFIG_KEYS) {
    const fromNested = nested[key];
    const fromFlat = raw[`diagnostics.${key}`];
    if (typeof fromNested === "boolean") diagnostics[key] = fromNested;
    else if (typeof fromFlat === "boolean") diagnostics[key] = fromFlat;
  }

  const schemaPath = typeof raw.schemaPath === "string" ? raw.schemaPath.trim() : DEFAULT_SETTINGS.schemaPath;

  return { diagnostics, schemaPath };
}
