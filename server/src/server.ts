/**
 * SMP/E MCS Language Server: LSP orchestration.
 *
 * This module wires up the LSP connection and delegates to focused modules:
 *   schema.ts, parser.ts, diagnostics.ts, symbols.ts, hover.ts,
 *   completion.ts, semantic-tokens.ts
 */
import {
  createConnection,
  InitializeParams,
  InitializeResult,
  ProposedFeatures,
  TextDocumentSyncKind,
} from "vscode-languageserver/node";
import { TextDocuments } from "vscode-languageserver/node";
import { TextDocument } from "vscode-languageserver-textdocument";

import * as path from "path";
import { performance } from "perf_hooks";

// ---- Module imports ----
import {
  DEFAULT_SETTINGS,
  ForceValidateParams,
  McsDocument,
  SmpeSettings,
  ValidateProfile,
} from "./types";

import { fsPathFromUri } from "./utils";

import { SchemaLoadError, SchemaStore, loadSchema } from "./schema";

import { parseDocument } from "./parser";

import { analyzeDocument } from "./diagnostics";

import { SETTINGS_SECTION, coerceSettings } from "./settings";

import { buildDocumentSymbols } from "./symbols";

import { buildHover } from "./hover";

import { buildCompletionItems } from "./completion";

import {
  TOKEN_TYPES,
  TOKEN_MODIFIERS,
  buildSemanticTokens,
  encodeSemanticTokens,
} from "./semantic-tokens";

// ======================= Globals =======================

const connection = createConnection(ProposedFeatures.all);
const documents: TextDocuments<TextDocument> = new TextDocuments(TextDocument);

let hasConfigurationCapability = false;
let currentSettings: SmpeSettings = DEFAULT_SETTINGS;

// ======================= Catalog state =======================

let schema: SchemaStore = SchemaStore.empty();
let loadedSchemaPath: string | undefined;

/**
 * (Re)loads the statement catalog when the configured path changed.
 * A broken catalog leaves an empty store, so every statement reports as
 * unknown until the setting is fixed.
 */
function reloadSchemaIfNeeded(): void {
  const wanted = currentSettings.schemaPath;
  if (loadedSchemaPath === wanted) return;
  loadedSchemaPath = wanted;
  parsedByUri.clear();

  try {
    schema = loadSchema(wanted || undefined);
    connection.console.log(`[schema] loaded ${schema.size} statements${wanted ? ` from ${wanted}` : ""}`);
  } catch (e) {
    if (!(e instanceof SchemaLoadError)) throw e;
    schema = SchemaStore.empty();
    connection.console.error(`[schema] ${e.message}`);
  }
}

// ======================= Document cache =======================

type ParsedEntry = { version: number; doc: McsDocument };
const parsedByUri = new Map<string, ParsedEntry>();

function parsedDocument(doc: TextDocument): McsDocument {
  const cached = parsedByUri.get(doc.uri);
  if (cached && cached.version === doc.version) return cached.doc;
  const parsed = parseDocument(doc.getText(), schema);
  parsedByUri.set(doc.uri, { version: doc.version, doc: parsed });
  return parsed;
}

// ======================= Scheduling state =======================

const VALIDATE_DEBOUNCE_MS = 180;
const VALIDATE_RERUN_DELAY_MS = 30;
const VALIDATE_PROFILE_ALL = process.env.SMPE_PROFILE_VALIDATE === "1";
const VALIDATE_PROFILE_MIN_MS = Number(process.env.SMPE_PROFILE_MIN_MS ?? "300");

const validateTimers = new Map<string, ReturnType<typeof setTimeout>>();
const validateInFlight = new Set<string>();
const validateRerunPending = new Set<string>();
const validateEpoch = new Map<string, number>();

// ======================= Connection events =======================

connection.onInitialize((params: InitializeParams): InitializeResult => {
  hasConfigurationCapability = !!params.capabilities.workspace?.configuration;
  reloadSchemaIfNeeded();

  return {
    capabilities: {
      textDocumentSync: TextDocumentSyncKind.Incremental,
      documentSymbolProvider: true,
      hoverProvider: true,
      completionProvider: {
        triggerCharacters: ["+", " ", "("],
        resolveProvider: false,
      },
      semanticTokensProvider: {
        legend: {
          tokenTypes: [...TOKEN_TYPES],
          tokenModifiers: [...TOKEN_MODIFIERS],
        },
        full: true,
      },
    },
  };
});

connection.onInitialized(async () => {
  await refreshSettings();
  for (const d of documents.all()) scheduleValidate(d.uri, 0);
});

connection.onDidChangeConfiguration(async () => {
  await refreshSettings();
  for (const d of documents.all()) scheduleValidate(d.uri, 0);
});

documents.onDidChangeContent((change) => {
  scheduleValidate(change.document.uri, VALIDATE_DEBOUNCE_MS);
});

documents.onDidOpen((e) => {
  scheduleValidate(e.document.uri, 0);
});

connection.onNotification("smpe/forceValidate", (params?: ForceValidateParams) => {
  const uri = params?.uri;
  if (!uri) return;
  if (!documents.get(uri)) return;
  scheduleValidate(uri, 0);
});

documents.onDidClose((e) => {
  const uri = e.document.uri;
  const t = validateTimers.get(uri);
  if (t) clearTimeout(t);
  validateTimers.delete(uri);
  validateInFlight.delete(uri);
  validateRerunPending.delete(uri);
  validateEpoch.delete(uri);
  parsedByUri.delete(uri);

  void connection.sendDiagnostics({ uri, diagnostics: [] });
});

// ======================= Document symbols =======================

connection.onDocumentSymbol((params) => {
  const doc = documents.get(params.textDocument.uri);
  if (!doc) return [];
  return buildDocumentSymbols(parsedDocument(doc));
});

// ======================= Hover =======================

connection.onHover((params) => {
  const doc = documents.get(params.textDocument.uri);
  if (!doc) return undefined;
  return buildHover(parsedDocument(doc), params.position);
});

// ======================= Completion =======================

connection.onCompletion((params) => {
  const doc = documents.get(params.textDocument.uri);
  if (!doc) return [];
  return buildCompletionItems(parsedDocument(doc), schema, params.position);
});

// ======================= Semantic Tokens =======================

connection.languages.semanticTokens.on((params) => {
  const doc = documents.get(params.textDocument.uri);
  if (!doc) return { data: [] };

  const tokens = buildSemanticTokens(parsedDocument(doc));
  return { data: encodeSemanticTokens(tokens) };
});

// ======================= Scheduling =======================

function scheduleValidate(uri: string, delayMs: number) {
  bumpValidateEpoch(uri);

  const prev = validateTimers.get(uri);
  if (prev) clearTimeout(prev);

  const timer = setTimeout(() => {
    validateTimers.delete(uri);
    void runValidate(uri);
  }, Math.max(0, delayMs));

  validateTimers.set(uri, timer);
}

async function runValidate(uri: string): Promise<void> {
  const doc = documents.get(uri);
  if (!doc) return;

  if (validateInFlight.has(uri)) {
    validateRerunPending.add(uri);
    return;
  }

  validateInFlight.add(uri);
  const epoch = currentValidateEpoch(uri);

  try {
    await validateDocument(doc, epoch);
  } catch (e) {
    connection.console.error(`[validate] ${uri}: ${e instanceof Error ? (e.stack ?? e.message) : String(e)}`);
  } finally {
    validateInFlight.delete(uri);

    if (validateRerunPending.delete(uri)) {
      scheduleValidate(uri, VALIDATE_RERUN_DELAY_MS);
    }
  }
}

// ======================= Epoch tracking =======================

function bumpValidateEpoch(uri: string): number {
  const next = (validateEpoch.get(uri) ?? 0) + 1;
  validateEpoch.set(uri, next);
  return next;
}

function currentValidateEpoch(uri: string): number {
  return validateEpoch.get(uri) ?? 0;
}

function isValidateStale(uri: string, epoch: number): boolean {
  return currentValidateEpoch(uri) !== epoch;
}

// ======================= Profiling =======================

function fmtMs(v: number): string {
  return v.toFixed(1);
}

function maybeLogValidateProfile(uri: string, p: ValidateProfile, diagCount: number) {
  const slow = p.totalMs >= VALIDATE_PROFILE_MIN_MS;
  if (!VALIDATE_PROFILE_ALL && !slow) return;

  const fsPath = fsPathFromUri(uri);
  const file = fsPath ? path.basename(fsPath) : uri;
  const msg =
    `[validate] ${file}: total=${fmtMs(p.totalMs)}ms ` +
    `(parse=${fmtMs(p.parseMs)}, analyze=${fmtMs(p.analyzeMs)}, publish=${fmtMs(p.publishMs)}), ` +
    `statements=${p.statements}, diags=${diagCount}`;

  if (slow) connection.console.warn(msg);
  else connection.console.log(msg);
}

// ======================= validateDocument =======================

async function validateDocument(doc: TextDocument, epoch: number): Promise<void> {
  if (isValidateStale(doc.uri, epoch)) return;

  const profile: ValidateProfile = {
    parseMs: 0,
    analyzeMs: 0,
    publishMs: 0,
    totalMs: 0,
    statements: 0,
  };
  const totalStart = performance.now();

  const parseStart = performance.now();
  const parsed = parsedDocument(doc);
  profile.parseMs = performance.now() - parseStart;
  profile.statements = parsed.statements.length;

  const analyzeStart = performance.now();
  const diagnostics = analyzeDocument(parsed, schema, currentSettings.diagnostics);
  profile.analyzeMs = performance.now() - analyzeStart;

  // edits arrived while analysing: the rerun publishes instead
  if (isValidateStale(doc.uri, epoch)) return;

  const publishStart = performance.now();
  await connection.sendDiagnostics({ uri: doc.uri, version: doc.version, diagnostics });
  profile.publishMs = performance.now() - publishStart;

  profile.totalMs = performance.now() - totalStart;
  maybeLogValidateProfile(doc.uri, profile, diagnostics.length);
}

// ======================= Settings =======================

async function refreshSettings(): Promise<void> {
  if (!hasConfigurationCapability) {
    currentSettings = DEFAULT_SETTINGS;
  } else {
    try {
      const raw: unknown = await connection.workspace.getConfiguration(SETTINGS_SECTION);
      currentSettings = coerceSettings(raw);
    } catch (e) {
      connection.console.warn(`[settings] ${e instanceof Error ? e.message : String(e)}; using defaults`);
      currentSettings = DEFAULT_SETTINGS;
    }
  }

  reloadSchemaIfNeeded();
}

// ======================= Start =======================

documents.listen(connection);
connection.listen();
