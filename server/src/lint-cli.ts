/**
 * smpe-lint: batch linter over MCS files.
 *
 *   smpe-lint [options] <file-or-pattern...>
 *
 * Exit status: 0 clean, 1 errors found (or warnings under
 * --warnings-as-errors), 2 usage or catalog failure.
 */
import * as fs from "fs";
import * as path from "path";
import { glob } from "glob";

import { analyzeDocument } from "./diagnostics";
import {
  DEFAULT_LINT_CONFIG,
  LintConfig,
  LintConfigError,
  findConfigFile,
  isDiagnosticCode,
  loadLintConfig,
  toDiagnosticsConfig,
  withDisabled,
  writeSampleConfig,
} from "./lint-config";
import { FileResult, buildReport, formatJson, formatMarkdown } from "./lint-report";
import { parseDocument } from "./parser";
import { SchemaLoadError, SchemaStore, loadSchema } from "./schema";
import { DIAGNOSTIC_CODES, DIAGNOSTIC_GROUPS } from "./types";

export const VERSION = "0.1.0";

export const EXIT_OK = 0;
export const EXIT_FINDINGS = 1;
export const EXIT_USAGE = 2;

export type CliOptions = {
  help: boolean;
  version: boolean;
  json: boolean;
  warningsAsErrors: boolean;
  config?: string;
  schema?: string;
  init?: string;
  disable: string[];
  patterns: string[];
};

/** Where the CLI reads and writes; tests swap in their own. */
export type CliIo = {
  cwd: string;
  home: string | undefined;
  out: (text: string) => void;
  err: (text: string) => void;
};

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

// ---- Argument parsing ----

const VALUE_OPTIONS = new Set(["--config", "--disable", "--init", "--schema"]);

export function parseArgs(argv: readonly string[]): CliOptions {
  const opts: CliOptions = {
    help: false,
    version: false,
    json: false,
    warningsAsErrors: false,
    disable: [],
    patterns: [],
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === "--") {
      opts.patterns.push(...argv.slice(i + 1));
      break;
    }
    if (!arg.startsWith("-") || arg === "-") {
      opts.patterns.push(arg);
      continue;
    }

    // --name=value or --name value
    const eq = arg.indexOf("=");
    const name = eq > 0 ? arg.slice(0, eq) : arg;
    let value: string | undefined;
    if (VALUE_OPTIONS.has(name)) {
      if (eq > 0) {
        value = arg.slice(eq + 1);
      } else {
        value = argv[i + 1];
        i++;
      }
      if (value === undefined || value === "") throw new CliUsageError(`Option ${name} requires a value`);
    } else if (eq > 0) {
      throw new CliUsageError(`Option ${name} does not take a value`);
    }

    switch (name) {
      case "--help":
      case "-h":
        opts.help = true;
        break;
      case "--version":
      case "-v":
        opts.version = true;
        break;
      case "--json":
        opts.json = true;
        break;
      case "--warnings-as-errors":
        opts.warningsAsErrors = true;
        break;
      case "--config":
        opts.config = value;
        break;
      case "--schema":
        opts.schema = value;
        break;
      case "--init":
        opts.init = value;
        break;
      case "--disable":
        // repeatable, also comma-separated
        if (value) opts.disable.push(...value.split(",").map((s) => s.trim()).filter(Boolean));
        break;
      default:
        throw new CliUsageError(`Unknown option: ${arg}`);
    }
  }

  return opts;
}

export function usage(): string {
  const lines = [
    "Usage: smpe-lint [options] <file-or-pattern...>",
    "",
    "Lints SMP/E MCS files and reports diagnostics.",
    "",
    "Options:",
    "  --config <path>       Path to configuration file (.smpe_lint.yaml or .smpe_lint.json)",
    "  --disable <code>      Disable a diagnostic (repeatable or comma-separated)",
    "  --init <format>       Create a sample config file (yaml or json)",
    "  --json                Output results in JSON format",
    "  --schema <path>       Statement catalog to use instead of the bundled one",
    "  --warnings-as-errors  Treat warnings as errors (exit code 1)",
    "  --version, -v         Show version information",
    "  --help, -h            Show this help",
    "",
    "Diagnostic codes:",
  ];
  for (const group of DIAGNOSTIC_GROUPS) {
    lines.push(`  ${group.title}:`);
    lines.push(`    ${group.keys.map((k) => DIAGNOSTIC_CODES[k]).join(", ")}`);
  }
  lines.push(
    "",
    "Examples:",
    "  smpe-lint '**/*.mcs'",
    "  smpe-lint --warnings-as-errors sysmods/*.mcs",
    "  smpe-lint --disable unknown_operand --json usermod.mcs",
  );
  return lines.join("\n");
}

// ---- File expansion ----

/**
 * Expands each argument as a glob relative to `cwd`. An argument matching
 * nothing is kept as-is so that a missing file is reported as unreadable.
 */
export async function expandPatterns(patterns: readonly string[], cwd: string): Promise<string[]> {
  const files: string[] = [];
  for (const pattern of patterns) {
    const matched = await glob(pattern, { cwd, nodir: true });
    if (matched.length === 0) files.push(pattern);
    else files.push(...matched.sort());
  }
  return [...new Set(files)];
}

// ---- Run ----

function resolveConfig(opts: CliOptions, io: CliIo): LintConfig {
  const configPath = opts.config ? path.resolve(io.cwd, opts.config) : findConfigFile(io.cwd, io.home);
  let config = DEFAULT_LINT_CONFIG;
  if (configPath) {
    try {
      config = loadLintConfig(configPath);
    } catch (e) {
      if (!(e instanceof LintConfigError)) throw e;
      io.err(`Warning: ${e.message}`);
    }
  }

  if (opts.warningsAsErrors) config = { ...config, warningsAsErrors: true };
  for (const code of opts.disable) {
    if (!isDiagnosticCode(code)) io.err(`Warning: unknown diagnostic code '${code}'`);
  }
  return withDisabled(config, opts.disable);
}

function lintFile(file: string, schema: SchemaStore, config: LintConfig, io: CliIo): FileResult {
  let text: string;
  try {
    text = fs.readFileSync(path.resolve(io.cwd, file), "utf8");
  } catch (e) {
    const detail = e instanceof Error ? e.message : String(e);
    io.err(`Error reading file ${file}: ${detail}`);
    return { path: file, readError: detail };
  }

  const doc = parseDocument(text, schema);
  return { path: file, diagnostics: analyzeDocument(doc, schema, toDiagnosticsConfig(config)) };
}

export async function runLint(argv: readonly string[], io: CliIo): Promise<number> {
  let opts: CliOptions;
  try {
    opts = parseArgs(argv);
  } catch (e) {
    if (!(e instanceof CliUsageError)) throw e;
    io.err(`Error: ${e.message}`);
    io.err(usage());
    return EXIT_USAGE;
  }

  if (opts.help) {
    io.out(usage());
    return EXIT_OK;
  }
  if (opts.version) {
    io.out(`smpe-lint ${VERSION}`);
    return EXIT_OK;
  }

  if (opts.init !== undefined) {
    try {
      const written = writeSampleConfig(opts.init, io.cwd);
      io.out(`Created ${path.basename(written)}`);
      return EXIT_OK;
    } catch (e) {
      if (!(e instanceof LintConfigError)) throw e;
      io.err(`Error creating config: ${e.message}`);
      return EXIT_USAGE;
    }
  }

  if (opts.patterns.length === 0) {
    io.err(usage());
    return EXIT_USAGE;
  }

  const config = resolveConfig(opts, io);

  let schema: SchemaStore;
  try {
    schema = loadSchema(opts.schema ? path.resolve(io.cwd, opts.schema) : undefined);
  } catch (e) {
    if (!(e instanceof SchemaLoadError)) throw e;
    io.err(`Error: ${e.message}`);
    return EXIT_USAGE;
  }

  const files = await expandPatterns(opts.patterns, io.cwd);
  const results = files.map((file) => lintFile(file, schema, config, io));
  const report = buildReport(results, config.warningsAsErrors);

  io.out(opts.json ? formatJson(report) : formatMarkdown(report));
  return report.summary.success ? EXIT_OK : EXIT_FINDINGS;
}
