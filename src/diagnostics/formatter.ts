/**
 * Diagnostic Formatter
 *
 * Formats diagnostics and solve reports as JSON or human-readable text.
 */

import type { Diagnostic, SolveReport } from "./diagnostic";
import type { SourceFile } from "../utils/source";

/**
 * JSON replacer that converts BigInt to string.
 */
function bigIntReplacer(_key: string, value: unknown): unknown {
  if (typeof value === "bigint") {
    return value.toString();
  }
  return value;
}

export function formatJson(report: SolveReport): string {
  return JSON.stringify(report, bigIntReplacer, 2);
}

/**
 * Format diagnostics as human-readable text with source snippets.
 */
export function formatPretty(diagnostics: Diagnostic[], source: SourceFile): string {
  const lines: string[] = [];

  for (const diag of diagnostics) {
    lines.push(formatDiagnostic(diag, source));
    lines.push("");
  }

  const errorCount = diagnostics.filter((d) => d.severity === "error").length;
  const warningCount = diagnostics.filter((d) => d.severity === "warning").length;

  if (errorCount > 0 || warningCount > 0) {
    const parts: string[] = [];
    if (errorCount > 0) {
      parts.push(`${errorCount} error${errorCount === 1 ? "" : "s"}`);
    }
    if (warningCount > 0) {
      parts.push(`${warningCount} warning${warningCount === 1 ? "" : "s"}`);
    }
    lines.push(parts.join(", "));
  }

  return lines.join("\n");
}

function formatDiagnostic(diag: Diagnostic, source: SourceFile): string {
  const lines: string[] = [];
  const loc = diag.location;

  lines.push(`${diag.severity}[${diag.code}]: ${diag.message}`);
  lines.push(`  --> ${loc.file}:${loc.start.line}:${loc.start.column}`);

  const lineNum = loc.start.line;
  const lineNumWidth = Math.max(3, String(lineNum).length);
  const gutter = " ".repeat(lineNumWidth);

  // Solver diagnostics on generated identities have no source text
  const sourceLine = loc.file === source.name ? source.getLine(lineNum) : "";
  if (sourceLine !== "") {
    lines.push(`${gutter} |`);
    lines.push(`${String(lineNum).padStart(lineNumWidth)} | ${sourceLine}`);

    const startCol = loc.start.column;
    const endCol = loc.start.line === loc.end.line ? loc.end.column : sourceLine.length + 1;
    const underlineLength = Math.max(1, endCol - startCol);
    lines.push(`${gutter} | ${" ".repeat(startCol - 1)}${"^".repeat(underlineLength)}`);
  }

  for (const hint of diag.hints) {
    lines.push(`${gutter} = help: ${hint.description}`);
    if (hint.template) {
      lines.push(`${gutter}         ${hint.template}`);
    }
  }

  for (const related of diag.related) {
    lines.push(
      `${gutter} = note: ${related.message} (${related.location.file}:${related.location.start.line})`
    );
  }

  return lines.join("\n");
}

/**
 * Format diagnostics as a simple list (no source context).
 */
export function formatSimple(diagnostics: Diagnostic[]): string {
  return diagnostics
    .map((d) => {
      const loc = d.location;
      return `${loc.file}:${loc.start.line}:${loc.start.column}: ${d.severity}[${d.code}]: ${d.message}`;
    })
    .join("\n");
}

/**
 * One-line summary of a solve run.
 */
export function formatSummary(report: SolveReport): string {
  const { stats, diagnostics } = report;
  const errorCount = diagnostics.filter((d) => d.severity === "error").length;
  const warningCount = diagnostics.filter((d) => d.severity === "warning").length;

  const parts: string[] = [];

  if (report.status === "complete") {
    parts.push("Solved");
  } else if (report.status === "error") {
    parts.push("Failed");
  } else {
    parts.push(`Incomplete (${report.incomplete.length} unresolved)`);
  }

  parts.push(`${report.code.length} effect${report.code.length === 1 ? "" : "s"}`);
  parts.push(`${stats.passes} pass${stats.passes === 1 ? "" : "es"}`);

  if (errorCount > 0) {
    parts.push(`${errorCount} error${errorCount === 1 ? "" : "s"}`);
  }
  if (warningCount > 0) {
    parts.push(`${warningCount} warning${warningCount === 1 ? "" : "s"}`);
  }

  parts.push(`in ${stats.solveTimeMs.toFixed(0)}ms`);

  return parts.join(" | ");
}
