/**
 * Shared type definitions for the SMP/E MCS Language Server.
 */

// ---- Settings ----

export type DiagnosticsConfig = {
  unknownStatement: boolean;
  invalidLanguageId: boolean;
  unbalancedParentheses: boolean;
  missingTerminator: boolean;
  missingParameter: boolean;
  unknownOperand: boolean;
  duplicateOperand: boolean;
  emptyOperandParameter: boolean;
  operandLength: boolean;
  missingRequiredOperand: boolean;
  dependencyViolation: boolean;
  mutuallyExclusive: boolean;
  requiredGroup: boolean;
  missingInlineData: boolean;
  unknownSubOperand: boolean;
  subOperandValidation: boolean;
  contentBeyondColumn72: boolean;
  standaloneComment: boolean;
};

export type DiagnosticsConfigKey = keyof DiagnosticsConfig;

export const DEFAULT_DIAGNOSTICS_CONFIG: DiagnosticsConfig = {
  unknownStatement: true,
  invalidLanguageId: true,
  unbalancedParentheses: true,
  missingTerminator: true,
  missingParameter: true,
  unknownOperand: true,
  duplicateOperand: true,
  emptyOperandParameter: true,
  operandLength: true,
  missingRequiredOperand: true,
  dependencyViolation: true,
  mutuallyExclusive: true,
  requiredGroup: true,
  missingInlineData: true,
  unknownSubOperand: true,
  subOperandValidation: true,
  contentBeyondColumn72: true,
  standaloneComment: true,
};

/** Diagnostic `code` values, one per rule category. */
export const DIAGNOSTIC_CODES = {
  unknownStatement: "unknown_statement",
  invalidLanguageId: "invalid_language_id",
  unbalancedParentheses: "unbalanced_parentheses",
  missingTerminator: "missing_terminator",
  missingParameter: "missing_parameter",
  unknownOperand: "unknown_operand",
  duplicateOperand: "duplicate_operand",
  emptyOperandParameter: "empty_operand_parameter",
  operandLength: "operand_length",
  missingRequiredOperand: "missing_required_operand",
  dependencyViolation: "dependency_violation",
  mutuallyExclusive: "mutually_exclusive",
  requiredGroup: "required_group",
  missingInlineData: "missing_inline_data",
  unknownSubOperand: "unknown_sub_operand",
  subOperandValidation: "sub_operand_validation",
  contentBeyondColumn72: "content_beyond_column_72",
  standaloneComment: "standalone_comment",
} as const satisfies Record<DiagnosticsConfigKey, string>;

/** Categories grouped for the sample lint config and `--help`. */
export const DIAGNOSTIC_GROUPS: ReadonlyArray<{ title: string; keys: readonly DiagnosticsConfigKey[] }> = [
  {
    title: "Syntax Errors",
    keys: [
      "unknownStatement",
      "invalidLanguageId",
      "unbalancedParentheses",
      "missingTerminator",
      "missingParameter",
      "contentBeyondColumn72",
    ],
  },
  {
    title: "Operand Validation",
    keys: [
      "unknownOperand",
      "duplicateOperand",
      "emptyOperandParameter",
      "operandLength",
      "missingRequiredOperand",
      "dependencyViolation",
      "mutuallyExclusive",
      "requiredGroup",
    ],
  },
  {
    title: "Sub-Operand Validation",
    keys: ["unknownSubOperand", "subOperandValidation"],
  },
  {
    title: "Structural Issues",
    keys: ["missingInlineData", "standaloneComment"],
  },
];

export const DIAGNOSTICS_CONFIG_KEYS: readonly DiagnosticsConfigKey[] = DIAGNOSTIC_GROUPS.flatMap((g) => g.keys);

export type SmpeSettings = {
  diagnostics: DiagnosticsConfig;
  schemaPath: string;
};

export const DEFAULT_SETTINGS: SmpeSettings = {
  diagnostics: DEFAULT_DIAGNOSTICS_CONFIG,
  schemaPath: "",
};

export type ForceValidateParams = { uri?: string };

// ---- Validation profiling ----

export type ValidateProfile = {
  parseMs: number;
  analyzeMs: number;
  publishMs: number;
  totalMs: number;
  statements: number;
};

// ---- Schema ----

export type OperandType = "string" | "integer" | "boolean" | "list" | "enum" | "other";

export type SubOperandDefinition = {
  kind: "subOperand";
  name: string;
  aliases: string[];
  parameter: string;
  type: OperandType;
  maxLength: number;
  description: string;
};

export type AllowedValue = {
  name: string;
  description: string;
};

export type OperandDefinition = {
  kind: "operand";
  /** First alias of the pipe-separated name list. */
  name: string;
  aliases: string[];
  /** Parameter syntax hint; empty when the operand takes no parameter. */
  parameter: string;
  type: OperandType;
  maxLength: number;
  required: boolean;
  /** Set only for members of a one-of-these-is-required group. */
  requiredGroupId?: string;
  allowedIf?: string;
  mutuallyExclusiveWith: string[];
  description: string;
  subOperands: SubOperandDefinition[];
  allowedValues: AllowedValue[];
};

export type StatementDefinition = {
  name: string;
  description: string;
  /** Parameter syntax hint; empty when the statement takes no parameter. */
  parameter: string;
  maxParameterLength: number;
  acceptsLanguageVariant: boolean;
  expectsInlineData: boolean;
  operands: OperandDefinition[];
};

export interface SchemaLookup {
  lookup(name: string): StatementDefinition | undefined;
  list(): readonly StatementDefinition[];
}

// ---- AST ----

export type NodePosition = {
  readonly line: number;
  readonly character: number;
  readonly length: number;
};

export type StatementStatus = "known" | "invalid-language-id" | "unknown";

export type ParameterNode = {
  readonly kind: "parameter";
  readonly position: NodePosition;
  readonly value: string;
  /** The closing parenthesis was never found. */
  readonly unterminated: boolean;
  readonly parent: StatementNode | OperandNode;
};

export type OperandNode = {
  readonly kind: "operand";
  readonly position: NodePosition;
  readonly name: string;
  readonly definition?: OperandDefinition | SubOperandDefinition;
  readonly children: readonly (ParameterNode | OperandNode)[];
  readonly parent: StatementNode | OperandNode;
};

export type StatementNode = {
  readonly kind: "statement";
  readonly position: NodePosition;
  readonly name: string;
  readonly languageId: string;
  readonly status: StatementStatus;
  readonly definition?: StatementDefinition;
  readonly hasTerminator: boolean;
  readonly terminator?: NodePosition;
  /** > 0: missing ")" count, < 0: missing "(" or extra ")". */
  readonly unbalancedParens: number;
  readonly hasInlineData: boolean;
  readonly endLine: number;
  readonly children: readonly (ParameterNode | OperandNode)[];
  /** First occurrence per operand name. */
  readonly operandsByName: ReadonlyMap<string, OperandNode>;
};

export type CommentNode = {
  readonly kind: "comment";
  readonly position: NodePosition;
  readonly endLine: number;
  readonly endCharacter: number;
  readonly standalone: boolean;
};

export type InlineDataRegion = {
  readonly statement: StatementNode;
  readonly startLine: number;
  readonly endLine: number;
};

export type McsDocument = {
  readonly statements: readonly StatementNode[];
  readonly comments: readonly CommentNode[];
  readonly expectingInlineData: readonly StatementNode[];
  readonly inlineRegions: readonly InlineDataRegion[];
  readonly lines: readonly string[];
};

// ---- Segmenter ----

export type SpanComment = {
  line: number;
  character: number;
  endLine: number;
  endCharacter: number;
};

export type StatementSpan = {
  startLine: number;
  /** Last physical line that belongs to the span. */
  endLine: number;
  /** Span lines from `startLine` with comments blanked, joined by "\n"; ends at the terminator. */
  text: string;
  hasTerminator: boolean;
  terminator?: { line: number; character: number };
  unbalancedParens: number;
  comments: SpanComment[];
};
