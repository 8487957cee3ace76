/**
 * Diagnostic Collector
 *
 * Collects diagnostics from the front end and the solver driver.
 */

import type { SourceSpan } from "../utils/span";
import { getCodeSeverity } from "./codes";
import {
  createDiagnostic,
  type Diagnostic,
  type Severity,
  type StructuredData,
  type Hint,
  type RelatedInfo,
} from "./diagnostic";

export class DiagnosticCollector {
  private diagnostics: Diagnostic[] = [];

  add(diagnostic: Diagnostic): void {
    this.diagnostics.push(diagnostic);
  }

  /**
   * Add a diagnostic whose severity follows from its code.
   */
  report(
    code: string,
    message: string,
    location: SourceSpan,
    structured: StructuredData = { kind: "general" },
    hints: Hint[] = []
  ): void {
    this.add(createDiagnostic(getCodeSeverity(code), code, message, location, structured, hints));
  }

  error(
    code: string,
    message: string,
    location: SourceSpan,
    structured: StructuredData = { kind: "general" },
    hints: Hint[] = [],
    related: RelatedInfo[] = [],
    primary_node_id?: string
  ): void {
    this.add(
      createDiagnostic("error", code, message, location, structured, hints, related, primary_node_id)
    );
  }

  warning(
    code: string,
    message: string,
    location: SourceSpan,
    structured: StructuredData = { kind: "general" },
    hints: Hint[] = [],
    related: RelatedInfo[] = [],
    primary_node_id?: string
  ): void {
    this.add(
      createDiagnostic("warning", code, message, location, structured, hints, related, primary_node_id)
    );
  }

  getAll(): Diagnostic[] {
    return [...this.diagnostics];
  }

  getBySeverity(severity: Severity): Diagnostic[] {
    return this.diagnostics.filter((d) => d.severity === severity);
  }

  getErrors(): Diagnostic[] {
    return this.getBySeverity("error");
  }

  getWarnings(): Diagnostic[] {
    return this.getBySeverity("warning");
  }

  hasErrors(): boolean {
    return this.diagnostics.some((d) => d.severity === "error");
  }

  count(): number {
    return this.diagnostics.length;
  }

  /**
   * Sort diagnostics by location (file, then line, then column).
   */
  sorted(): Diagnostic[] {
    return [...this.diagnostics].sort((a, b) => {
      const fileCompare = a.location.file.localeCompare(b.location.file);
      if (fileCompare !== 0) return fileCompare;

      if (a.location.start.line !== b.location.start.line) {
        return a.location.start.line - b.location.start.line;
      }

      return a.location.start.column - b.location.start.column;
    });
  }

  merge(other: DiagnosticCollector): void {
    for (const d of other.getAll()) {
      this.add(d);
    }
  }
}
