/**
 * Diagnostics Tests
 */

import { describe, test, expect, beforeEach } from "vitest";
import {
  DiagnosticCollector,
  ErrorCode,
  createDiagnostic,
  formatJson,
  formatPretty,
  formatSimple,
  formatSummary,
  getCodeSeverity,
  getErrorDescription,
  isError,
  isWarning,
  resetDiagnosticIdCounter,
  type SolveReport,
} from "../../src/diagnostics";
import { sourceFromString } from "../../src/utils/source";
import { position, span, syntheticSpan } from "../../src/utils/span";

const source = sourceFromString("test.pil", "let a;\na = b + 1;\n");
const atB = span("test.pil", position(2, 5, 11), position(2, 6, 12));

function report(overrides: Partial<SolveReport> = {}): SolveReport {
  return {
    status: "complete",
    solverVersion: "0.1.0",
    code: ["a[0] = 1;"],
    completed: [{ identityId: 0, row: 0 }],
    incomplete: [],
    diagnostics: [],
    stats: { identities: 1, rows: 1, passes: 1, knownCells: 1, solveTimeMs: 0.4 },
    ...overrides,
  };
}

beforeEach(() => {
  resetDiagnosticIdCounter();
});

describe("DiagnosticCollector", () => {
  test("collects errors and warnings", () => {
    const collector = new DiagnosticCollector();
    collector.error(ErrorCode.UnresolvedName, "Column 'b' is not defined", atB);
    collector.warning(ErrorCode.UnresolvedIdentity, "unresolved", syntheticSpan());

    expect(collector.count()).toBe(2);
    expect(collector.hasErrors()).toBe(true);
    expect(collector.getErrors().map((d) => d.code)).toEqual(["E1001"]);
    expect(collector.getWarnings().map((d) => d.code)).toEqual(["W0001"]);
    expect(collector.getAll().map((d) => d.id)).toEqual(["d1", "d2"]);
  });

  test("report takes the severity from the code", () => {
    const collector = new DiagnosticCollector();
    collector.report(ErrorCode.PassLimitReached, "limit", syntheticSpan());
    collector.report(ErrorCode.EmptyRangeConstraint, "conflict", syntheticSpan());
    expect(collector.getAll().map((d) => d.severity)).toEqual(["warning", "error"]);
  });

  test("sorts by file, line and column", () => {
    const collector = new DiagnosticCollector();
    collector.error("E1001", "third", span("b.pil", position(1, 1, 0), position(1, 1, 0)));
    collector.error("E1001", "second", span("a.pil", position(2, 3, 0), position(2, 3, 0)));
    collector.error("E1001", "first", span("a.pil", position(2, 1, 0), position(2, 1, 0)));
    expect(collector.sorted().map((d) => d.message)).toEqual(["first", "second", "third"]);
  });

  test("merges another collector", () => {
    const first = new DiagnosticCollector();
    const second = new DiagnosticCollector();
    second.warning("W0003", "no degree", syntheticSpan());
    first.merge(second);
    expect(first.getAll().map((d) => d.code)).toEqual(["W0003"]);
    expect(first.hasErrors()).toBe(false);
  });
});

describe("Error codes", () => {
  test("describe every code", () => {
    for (const code of Object.values(ErrorCode)) {
      expect(getErrorDescription(code)).not.toBe("Unknown error");
    }
    expect(getErrorDescription("E3001")).toBe("No value satisfies the range constraints of a cell");
  });

  test("severity follows the prefix", () => {
    expect(getCodeSeverity("E0001")).toBe("error");
    expect(getCodeSeverity("W0002")).toBe("warning");
  });

  test("predicates", () => {
    const warning = createDiagnostic("warning", "W0001", "w", syntheticSpan());
    expect(isWarning(warning)).toBe(true);
    expect(isError(warning)).toBe(false);
  });
});

describe("Formatters", () => {
  test("pretty output shows the source line and underlines the span", () => {
    const diagnostic = createDiagnostic(
      "error",
      "E1001",
      "Column 'b' is not defined",
      atB,
      { kind: "unresolved_name" },
      [{ strategy: "declare_column", description: "Declare 'b' as a witness column", template: "let b;" }],
      [{ message: "similar column here", location: span("test.pil", position(1, 5, 4), position(1, 6, 5)) }]
    );
    expect(formatPretty([diagnostic], source)).toBe(
      [
        "error[E1001]: Column 'b' is not defined",
        "  --> test.pil:2:5",
        "    |",
        "  2 | a = b + 1;",
        "    |     ^",
        "    = help: Declare 'b' as a witness column",
        "            let b;",
        "    = note: similar column here (test.pil:1)",
        "",
        "1 error",
      ].join("\n")
    );
  });

  test("pretty output skips source for generated locations", () => {
    const diagnostic = createDiagnostic("warning", "W0002", "Stopped", syntheticSpan());
    expect(formatPretty([diagnostic], source)).toBe(
      ["warning[W0002]: Stopped", "  --> <generated>:1:1", "", "1 warning"].join("\n")
    );
  });

  test("pretty output of nothing is empty", () => {
    expect(formatPretty([], source)).toBe("");
  });

  test("simple output has one line per diagnostic", () => {
    const diagnostics = [
      createDiagnostic("error", "E1001", "Column 'b' is not defined", atB),
      createDiagnostic("warning", "W0002", "Stopped", syntheticSpan()),
    ];
    expect(formatSimple(diagnostics)).toBe(
      "test.pil:2:5: error[E1001]: Column 'b' is not defined\n<generated>:1:1: warning[W0002]: Stopped"
    );
  });

  test("summary of a solved run", () => {
    expect(formatSummary(report())).toBe("Solved | 1 effect | 1 pass | in 0ms");
  });

  test("summary of an incomplete run", () => {
    const warning = createDiagnostic("warning", "W0001", "unresolved", syntheticSpan());
    const incomplete = report({
      status: "incomplete",
      code: [],
      incomplete: [{ identityId: 1, row: 0 }],
      diagnostics: [warning],
      stats: { identities: 2, rows: 1, passes: 2, knownCells: 0, solveTimeMs: 12.6 },
    });
    expect(formatSummary(incomplete)).toBe(
      "Incomplete (1 unresolved) | 0 effects | 2 passes | 1 warning | in 13ms"
    );
  });

  test("JSON output", () => {
    const parsed: unknown = JSON.parse(formatJson(report()));
    expect(parsed).toEqual({
      status: "complete",
      solverVersion: "0.1.0",
      code: ["a[0] = 1;"],
      completed: [{ identityId: 0, row: 0 }],
      incomplete: [],
      diagnostics: [],
      stats: { identities: 1, rows: 1, passes: 1, knownCells: 1, solveTimeMs: 0.4 },
    });
  });

  test("JSON output writes big integers as strings", () => {
    const diagnostic = createDiagnostic("error", "E3001", "conflict", syntheticSpan(), {
      kind: "empty_range_constraint",
      value: 18446744069414584320n,
    });
    const json = formatJson(report({ status: "error", diagnostics: [diagnostic] }));
    expect(json).toContain('"value": "18446744069414584320"');
  });
});
