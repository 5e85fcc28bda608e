/**
 * Tests for lint-config.ts: config files, lookup and the sample config.
 */
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import {
  DEFAULT_LINT_CONFIG,
  LintConfigError,
  findConfigFile,
  isDiagnosticCode,
  isEnabled,
  loadLintConfig,
  parseLintConfig,
  sampleConfig,
  toDiagnosticsConfig,
  withDisabled,
  writeSampleConfig,
} from "./lint-config";

// ---- Helpers ----

let tmp: string;

beforeEach(() => {
  tmp = fs.mkdtempSync(path.join(os.tmpdir(), "smpe-lint-config-"));
});

afterEach(() => {
  fs.rmSync(tmp, { recursive: true, force: true });
});

function mkdir(name: string): string {
  const dir = path.join(tmp, name);
  fs.mkdirSync(dir);
  return dir;
}

// ---- parseLintConfig ----

describe("parseLintConfig", () => {
  it("reads YAML", () => {
    const config = parseLintConfig("warnings_as_errors: true\ndiagnostics:\n  unknown_operand: false\n", "yaml");
    expect(config).toEqual({ warningsAsErrors: true, diagnostics: { unknown_operand: false } });
  });

  it("reads JSON", () => {
    const config = parseLintConfig('{"diagnostics": {"standalone_comment": false}}', "json");
    expect(config).toEqual({ warningsAsErrors: false, diagnostics: { standalone_comment: false } });
  });

  it("treats an empty document as defaults", () => {
    expect(parseLintConfig("", "yaml")).toEqual(DEFAULT_LINT_CONFIG);
  });

  it("rejects malformed text", () => {
    expect(() => parseLintConfig("{", "json", "c.json")).toThrow(/^Cannot parse config c\.json: /);
  });

  it("rejects values of the wrong type with their path", () => {
    expect(() => parseLintConfig("warnings_as_errors: maybe\n", "yaml", "c.yaml")).toThrow(
      /^Invalid config c\.yaml at warnings_as_errors: /,
    );
    expect(() => parseLintConfig("diagnostics:\n  unknown_operand: 3\n", "yaml", "c.yaml")).toThrow(
      /at diagnostics\.unknown_operand/,
    );
  });
});

// ---- Files ----

describe("loadLintConfig / findConfigFile", () => {
  it("picks the format from the extension", () => {
    const file = path.join(tmp, ".smpe_lint.json");
    fs.writeFileSync(file, '{"warnings_as_errors": true}');
    expect(loadLintConfig(file).warningsAsErrors).toBe(true);
  });

  it("reports unreadable files", () => {
    const missing = path.join(tmp, "missing.yaml");
    expect(() => loadLintConfig(missing)).toThrow(LintConfigError);
    expect(() => loadLintConfig(missing)).toThrow(/^Cannot read config /);
  });

  it("prefers the working directory over home", () => {
    const cwd = mkdir("cwd");
    const home = mkdir("home");
    fs.writeFileSync(path.join(home, ".smpe_lint.yaml"), "");
    expect(findConfigFile(cwd, home)).toBe(path.join(home, ".smpe_lint.yaml"));

    fs.writeFileSync(path.join(cwd, ".smpe_lint.json"), "{}");
    expect(findConfigFile(cwd, home)).toBe(path.join(cwd, ".smpe_lint.json"));
  });

  it("checks the names in order", () => {
    fs.writeFileSync(path.join(tmp, ".smpe_lint.yml"), "");
    fs.writeFileSync(path.join(tmp, ".smpe_lint.json"), "{}");
    expect(findConfigFile(tmp, undefined)).toBe(path.join(tmp, ".smpe_lint.yml"));
  });

  it("finds nothing in empty directories", () => {
    expect(findConfigFile(mkdir("a"), mkdir("b"))).toBeUndefined();
  });
});

// ---- Queries ----

describe("enablement", () => {
  it("enables unlisted codes", () => {
    expect(isEnabled(DEFAULT_LINT_CONFIG, "unknown_operand")).toBe(true);
    expect(isEnabled({ warningsAsErrors: false, diagnostics: { unknown_operand: false } }, "unknown_operand")).toBe(false);
  });

  it("disables codes on top of the file", () => {
    const base = { warningsAsErrors: false, diagnostics: { duplicate_operand: true } };
    const config = withDisabled(base, ["duplicate_operand", "operand_length"]);
    expect(config.diagnostics).toEqual({ duplicate_operand: false, operand_length: false });
    expect(base.diagnostics).toEqual({ duplicate_operand: true });
    expect(withDisabled(base, [])).toBe(base);
  });

  it("maps codes onto the engine switches", () => {
    const switches = toDiagnosticsConfig(withDisabled(DEFAULT_LINT_CONFIG, ["content_beyond_column_72"]));
    expect(switches.contentBeyondColumn72).toBe(false);
    expect(switches.unknownStatement).toBe(true);
  });

  it("knows every diagnostic code", () => {
    expect(isDiagnosticCode("required_group")).toBe(true);
    expect(isDiagnosticCode("requiredGroup")).toBe(false);
  });
});

// ---- Sample config ----

describe("sampleConfig", () => {
  it("lists every code enabled in YAML", () => {
    const { fileName, content } = sampleConfig("yml");
    expect(fileName).toBe(".smpe_lint.yaml");
    const config = parseLintConfig(content, "yaml");
    expect(config.warningsAsErrors).toBe(false);
    expect(Object.keys(config.diagnostics)).toHaveLength(18);
    expect(Object.values(config.diagnostics).every((v) => v)).toBe(true);
    expect(content).toContain("  # Sub-Operand Validation\n  unknown_sub_operand: true\n");
  });

  it("writes JSON with the same switches", () => {
    const { fileName, content } = sampleConfig("JSON");
    expect(fileName).toBe(".smpe_lint.json");
    expect(Object.keys(parseLintConfig(content, "json").diagnostics)).toHaveLength(18);
  });

  it("rejects unknown formats", () => {
    expect(() => sampleConfig("toml")).toThrow("unknown format 'toml' (use 'yaml' or 'json')");
  });

  it("never overwrites an existing file", () => {
    const target = writeSampleConfig("yaml", tmp);
    expect(target).toBe(path.join(tmp, ".smpe_lint.yaml"));
    expect(fs.existsSync(target)).toBe(true);
    expect(() => writeSampleConfig("yaml", tmp)).toThrow("file '.smpe_lint.yaml' already exists");
  });
});
