/**
 * smpe-lint report model and its Markdown / JSON renderings.
 *
 * Only errors and warnings are reported; information and hints stay
 * editor-only. Files without issues are counted but not listed.
 */
import { Diagnostic, DiagnosticSeverity } from "vscode-languageserver/node";

export type ReportSeverity = "ERROR" | "WARNING";
export type FileStatus = "success" | "warning" | "failure";

export type ReportDiagnostic = {
  /** 1-based */
  line: number;
  /** 1-based */
  column: number;
  severity: ReportSeverity;
  code?: string;
  message: string;
};

export type FileReport = {
  path: string;
  status: FileStatus;
  diagnostics: ReportDiagnostic[];
};

export type ReportSummary = {
  total_files: number;
  files_with_issues: number;
  total_errors: number;
  total_warnings: number;
  success: boolean;
};

export type LintReport = {
  summary: ReportSummary;
  files: FileReport[];
};

/** Outcome of linting one file: its diagnostics, or why it could not be read. */
export type FileResult =
  | { path: string; diagnostics: Diagnostic[] }
  | { path: string; readError: string };

export function buildReport(results: readonly FileResult[], warningsAsErrors: boolean): LintReport {
  const summary: ReportSummary = {
    total_files: results.length,
    files_with_issues: 0,
    total_errors: 0,
    total_warnings: 0,
    success: true,
  };
  const files: FileReport[] = [];
  let failed = false;

  for (const result of results) {
    if ("readError" in result) {
      // unreadable files count as one error but are not listed
      summary.total_errors++;
      failed = true;
      continue;
    }

    const file: FileReport = { path: result.path, status: "success", diagnostics: [] };
    for (const d of result.diagnostics) {
      const severity = reportSeverity(d.severity);
      if (!severity) continue;

      const item: ReportDiagnostic = {
        line: d.range.start.line + 1,
        column: d.range.start.character + 1,
        severity,
        message: d.message,
      };
      if (typeof d.code === "string" && d.code !== "") item.code = d.code;
      file.diagnostics.push(item);

      if (severity === "ERROR") {
        summary.total_errors++;
        file.status = "failure";
        failed = true;
      } else {
        summary.total_warnings++;
        if (file.status === "success") file.status = "warning";
        if (warningsAsErrors) failed = true;
      }
    }

    if (file.diagnostics.length > 0) {
      summary.files_with_issues++;
      files.push(file);
    }
  }

  summary.success = !failed;
  return { summary, files };
}

function reportSeverity(severity: DiagnosticSeverity | undefined): ReportSeverity | undefined {
  if (severity === DiagnosticSeverity.Error) return "ERROR";
  if (severity === DiagnosticSeverity.Warning) return "WARNING";
  return undefined;
}

// ======================= Output =======================

export function formatJson(report: LintReport): string {
  return JSON.stringify(report, null, 2);
}

export function formatMarkdown(report: LintReport): string {
  const out: string[] = [];

  if (report.files.length > 0) {
    out.push("# SMP/E Lint Report", "");
    for (const file of report.files) {
      out.push(`## File: \`${file.path}\``);
      for (const d of file.diagnostics) {
        const code = d.code ? ` \`${d.code}\`` : "";
        out.push(`- **${d.severity}**${code} (Line ${d.line}, Col ${d.column}): ${d.message}`);
      }
      out.push("");
    }
  }

  const s = report.summary;
  out.push("## Summary", `- **Files checked**: ${s.total_files}`);
  if (s.success) {
    out.push("- **Result**: SUCCESS");
  } else {
    out.push(
      `- **Files with issues**: ${s.files_with_issues}`,
      `- **Total Errors**: ${s.total_errors}`,
      `- **Total Warnings**: ${s.total_warnings}`,
      "- **Result**: FAILURE",
    );
  }

  return out.join("\n");
}
