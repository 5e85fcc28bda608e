/**
 * Schema Store: loads the MCS statement catalog (smpe.json) and serves
 * read-only lookups by statement name.
 */
import * as fs from "fs";
import * as path from "path";
import { z } from "zod";

import {
  OperandDefinition,
  OperandType,
  SchemaLookup,
  StatementDefinition,
  SubOperandDefinition,
} from "./types";
import { splitAliases } from "./utils";

// ---- Raw catalog format ----

const rawValueSchema = z.object({
  name: z.string().min(1),
  description: z.string().default(""),
  parameter: z.string().default(""),
  type: z.string().default(""),
  length: z.number().int().nonnegative().default(0),
});

const rawOperandSchema = z.object({
  name: z.string().min(1),
  parameter: z.string().default(""),
  type: z.string().default(""),
  length: z.number().int().nonnegative().default(0),
  required: z.boolean().default(false),
  required_group: z.boolean().default(false),
  required_group_id: z.string().default(""),
  description: z.string().default(""),
  values: z.array(rawValueSchema).default([]),
  mutually_exclusive: z.string().default(""),
  allowed_if: z.string().default(""),
});

const rawStatementSchema = z.object({
  name: z.string().regex(/^\+\+[A-Z0-9@#$]+$/, "statement names start with ++"),
  description: z.string().default(""),
  parameter: z.string().default(""),
  type: z.string().default(""),
  length: z.number().int().nonnegative().default(0),
  language_variants: z.boolean().default(false),
  inline_data: z.boolean().default(false),
  operands: z.array(rawOperandSchema).default([]),
});

export const rawCatalogSchema = z.array(rawStatementSchema);

export type RawStatement = z.input<typeof rawStatementSchema>;

type ParsedOperand = z.output<typeof rawOperandSchema>;
type ParsedValue = z.output<typeof rawValueSchema>;

// ---- Errors ----

export class SchemaLoadError extends Error {
  constructor(message: string, readonly source: string) {
    super(message);
    this.name = "SchemaLoadError";
  }
}

// ---- Normalization ----

const OPERAND_TYPES: readonly OperandType[] = ["string", "integer", "boolean", "list", "enum"];

function toOperandType(raw: string): OperandType {
  const t = raw.trim().toLowerCase();
  return OPERAND_TYPES.find((k) => k === t) ?? (t === "" ? "boolean" : "other");
}

function toSubOperand(v: ParsedValue): SubOperandDefinition {
  const aliases = splitAliases(v.name);
  return {
    kind: "subOperand",
    name: aliases[0] ?? v.name,
    aliases,
    parameter: v.parameter,
    type: toOperandType(v.type || (v.length > 0 ? "string" : "")),
    maxLength: v.length,
    description: v.description,
  };
}

function toOperand(raw: ParsedOperand): OperandDefinition {
  const aliases = splitAliases(raw.name);
  // Nested value definitions describe sub-operands only when the parameter
  // syntax itself is parenthesised, e.g. "DSN(dsname) VOL(volser)".
  const hasSubOperands = raw.values.length > 0 && raw.parameter.includes("(");
  const groupId = raw.required && raw.required_group && raw.required_group_id !== ""
    ? raw.required_group_id
    : undefined;

  return {
    kind: "operand",
    name: aliases[0] ?? raw.name,
    aliases,
    parameter: raw.parameter,
    type: toOperandType(raw.type || (raw.parameter ? "string" : "")),
    maxLength: raw.length,
    required: raw.required,
    requiredGroupId: groupId,
    allowedIf: raw.allowed_if.trim() || undefined,
    mutuallyExclusiveWith: splitAliases(raw.mutually_exclusive),
    description: raw.description,
    subOperands: hasSubOperands ? raw.values.map(toSubOperand) : [],
    allowedValues: hasSubOperands ? [] : raw.values.map((v) => ({ name: v.name, description: v.description })),
  };
}

// ======================= SchemaStore =======================

export class SchemaStore implements SchemaLookup {
  private readonly byName = new Map<string, StatementDefinition>();
  private readonly ordered: StatementDefinition[] = [];

  private constructor(statements: StatementDefinition[]) {
    for (const s of statements) {
      // first definition wins on duplicate names
      if (this.byName.has(s.name)) continue;
      this.byName.set(s.name, s);
      this.ordered.push(s);
    }
  }

  static empty(): SchemaStore {
    return new SchemaStore([]);
  }

  /** Validates and normalizes raw catalog entries. */
  static fromDefinitions(raw: unknown, source: string = "<inline>"): SchemaStore {
    const parsed = rawCatalogSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue ? issue.path.join(".") : "";
      const detail = issue ? issue.message : parsed.error.message;
      throw new SchemaLoadError(`Invalid schema ${source}${where ? ` at ${where}` : ""}: ${detail}`, source);
    }

    return new SchemaStore(
      parsed.data.map((s) => ({
        name: s.name,
        description: s.description,
        parameter: s.parameter,
        maxParameterLength: s.length,
        acceptsLanguageVariant: s.language_variants,
        expectsInlineData: s.inline_data,
        operands: s.operands.map(toOperand),
      })),
    );
  }

  static fromJson(text: string, source: string = "<inline>"): SchemaStore {
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (e) {
      const detail = e instanceof Error ? e.message : String(e);
      throw new SchemaLoadError(`Schema ${source} is not valid JSON: ${detail}`, source);
    }
    return SchemaStore.fromDefinitions(raw, source);
  }

  static fromFile(filePath: string): SchemaStore {
    let text: string;
    try {
      text = fs.readFileSync(filePath, "utf8");
    } catch (e) {
      const detail = e instanceof Error ? e.message : String(e);
      throw new SchemaLoadError(`Cannot read schema ${filePath}: ${detail}`, filePath);
    }
    return SchemaStore.fromJson(text, filePath);
  }

  lookup(name: string): StatementDefinition | undefined {
    return this.byName.get(name);
  }

  list(): readonly StatementDefinition[] {
    return this.ordered;
  }

  get size(): number {
    return this.ordered.length;
  }
}

// ---- Operand resolution ----

export function findOperand(def: StatementDefinition, name: string): OperandDefinition | undefined {
  return def.operands.find((o) => o.aliases.includes(name));
}

export function findSubOperand(def: OperandDefinition, name: string): SubOperandDefinition | undefined {
  return def.subOperands.find((s) => s.aliases.includes(name));
}

// ---- Bundled catalog ----

/**
 * Location of the bundled catalog: `server/assets` next to the sources, or
 * beside the compiled output in `dist/`.
 */
export function defaultSchemaPath(): string {
  const candidates = [
    path.join(__dirname, "..", "assets", "smpe.json"),
    path.join(__dirname, "..", "server", "assets", "smpe.json"),
  ];
  return candidates.find((p) => fs.existsSync(p)) ?? candidates[0];
}

export function loadSchema(schemaPath?: string): SchemaStore {
  return SchemaStore.fromFile(schemaPath && schemaPath.trim() ? schemaPath : defaultSchemaPath());
}
