/**
 * smpe-lint configuration: `.smpe_lint.yaml`, `.smpe_lint.yml` or
 * `.smpe_lint.json`, looked up in the working directory and then in the
 * home directory.
 *
 *   warnings_as_errors: false
 *   diagnostics:
 *     unknown_operand: false
 *
 * Every diagnostic code not listed stays enabled.
 */
import * as fs from "fs";
import * as path from "path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";

import {
  DEFAULT_DIAGNOSTICS_CONFIG,
  DIAGNOSTICS_CONFIG_KEYS,
  DIAGNOSTIC_CODES,
  DIAGNOSTIC_GROUPS,
  DiagnosticsConfig,
} from "./types";

export const CONFIG_FILE_NAMES = [".smpe_lint.yaml", ".smpe_lint.yml", ".smpe_lint.json"] as const;

const lintConfigSchema = z.object({
  warnings_as_errors: z.boolean().default(false),
  diagnostics: z.record(z.string(), z.boolean()).default({}),
});

export type LintConfig = {
  warningsAsErrors: boolean;
  /** Explicit on/off switches keyed by diagnostic code. */
  diagnostics: Readonly<Record<string, boolean>>;
};

export const DEFAULT_LINT_CONFIG: LintConfig = {
  warningsAsErrors: false,
  diagnostics: {},
};

export class LintConfigError extends Error {
  constructor(message: string, readonly source: string) {
    super(message);
    this.name = "LintConfigError";
  }
}

const KNOWN_CODES: ReadonlySet<string> = new Set(DIAGNOSTICS_CONFIG_KEYS.map((k) => DIAGNOSTIC_CODES[k]));

export function isDiagnosticCode(code: string): boolean {
  return KNOWN_CODES.has(code);
}

// ---- Parsing ----

export function parseLintConfig(text: string, format: "yaml" | "json", source: string = "<inline>"): LintConfig {
  let raw: unknown;
  try {
    raw = format === "json" ? JSON.parse(text) : parseYaml(text);
  } catch (e) {
    const detail = e instanceof Error ? e.message : String(e);
    throw new LintConfigError(`Cannot parse config ${source}: ${detail}`, source);
  }

  // an empty YAML document parses to null
  const parsed = lintConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw new LintConfigError(`Invalid config ${source}${where}: ${issue ? issue.message : parsed.error.message}`, source);
  }

  return {
    warningsAsErrors: parsed.data.warnings_as_errors,
    diagnostics: parsed.data.diagnostics,
  };
}

export function loadLintConfig(filePath: string): LintConfig {
  let text: string;
  try {
    text = fs.readFileSync(filePath, "utf8");
  } catch (e) {
    const detail = e instanceof Error ? e.message : String(e);
    throw new LintConfigError(`Cannot read config ${filePath}: ${detail}`, filePath);
  }
  const format = path.extname(filePath).toLowerCase() === ".json" ? "json" : "yaml";
  return parseLintConfig(text, format, filePath);
}

/** First existing config file in `cwd`, then in `home`. */
export function findConfigFile(cwd: string, home: string | undefined): string | undefined {
  const dirs = home ? [cwd, home] : [cwd];
  for (const dir of dirs) {
    for (const name of CONFIG_FILE_NAMES) {
      const candidate = path.join(dir, name);
      if (fs.existsSync(candidate)) return candidate;
    }
  }
  return undefined;
}

// ---- Queries ----

export function isEnabled(config: LintConfig, code: string): boolean {
  return config.diagnostics[code] ?? true;
}

export function withDisabled(config: LintConfig, codes: readonly string[]): LintConfig {
  if (codes.length === 0) return config;
  const diagnostics: Record<string, boolean> = { ...config.diagnostics };
  for (const code of codes) diagnostics[code] = false;
  return { ...config, diagnostics };
}

export function toDiagnosticsConfig(config: LintConfig): DiagnosticsConfig {
  const out: DiagnosticsConfig = { ...DEFAULT_DIAGNOSTICS_CONFIG };
  for (const key of DIAGNOSTICS_CONFIG_KEYS) out[key] = isEnabled(config, DIAGNOSTIC_CODES[key]);
  return out;
}

// ---- Sample config (--init) ----

export function sampleConfig(format: string): { fileName: string; content: string } {
  switch (format.toLowerCase()) {
    case "yaml":
    case "yml":
      return { fileName: ".smpe_lint.yaml", content: sampleYaml() };
    case "json":
      return { fileName: ".smpe_lint.json", content: sampleJson() };
    default:
      throw new LintConfigError(`unknown format '${format}' (use 'yaml' or 'json')`, format);
  }
}

function sampleYaml(): string {
  const lines = [
    "# SMP/E Lint Configuration",
    "# Generated by smpe-lint --init yaml",
    "",
    "# Treat all warnings as errors (causes exit code 1)",
    "warnings_as_errors: false",
    "",
    "# Enable/disable individual diagnostics (true/false)",
    "# All diagnostics are enabled by default",
    "diagnostics:",
  ];
  DIAGNOSTIC_GROUPS.forEach((group, i) => {
    if (i > 0) lines.push("");
    lines.push(`  # ${group.title}`);
    for (const key of group.keys) lines.push(`  ${DIAGNOSTIC_CODES[key]}: true`);
  });
  return lines.join("\n") + "\n";
}

function sampleJson(): string {
  const diagnostics: Record<string, boolean> = {};
  for (const key of DIAGNOSTICS_CONFIG_KEYS) diagnostics[DIAGNOSTIC_CODES[key]] = true;
  return JSON.stringify({ warnings_as_errors: false, diagnostics }, null, 2) + "\n";
}

/** Creates the sample config in `dir`; refuses to overwrite. Returns the path written. */
export function writeSampleConfig(format: string, dir: string): string {
  const { fileName, content } = sampleConfig(format);
  const target = path.join(dir, fileName);
  if (fs.existsSync(target)) {
    throw new LintConfigError(`file '${fileName}' already exists`, target);
  }
  fs.writeFileSync(target, content, "utf8");
  return target;
}
