/**
 * Constraint Analyzer Tests
 */

import { describe, test, expect } from "vitest";
import {
  binary,
  loadConstraintSystem,
  num,
  ref,
  witnessReferences,
  type AnalyzeOptions,
  type ConstraintSystem,
} from "../../src/constraints";
import type { Diagnostic } from "../../src/diagnostics";
import { sourceFromString } from "../../src/utils/source";

function load(
  content: string,
  options: AnalyzeOptions = {}
): { system: ConstraintSystem | undefined; diagnostics: Diagnostic[] } {
  return loadConstraintSystem(sourceFromString("test.pil", content), options);
}

function loadOk(content: string, options: AnalyzeOptions = {}): ConstraintSystem {
  const { system, diagnostics } = load(content, options);
  expect(diagnostics.filter((d) => d.severity === "error")).toEqual([]);
  if (system === undefined) throw new Error("constraint system was rejected");
  return system;
}

function codes(content: string): string[] {
  return load(content).diagnostics.map((d) => d.code);
}

describe("Analyzer", () => {
  describe("Columns", () => {
    test("qualifies names with the current namespace", () => {
      const system = loadOk("namespace Main(4);\nlet x, y;");
      expect(system.degree).toBe(4);
      expect(system.witnessColumns).toEqual([
        { name: "Main::x", polyId: { id: 0, ptype: "committed" } },
        { name: "Main::y", polyId: { id: 1, ptype: "committed" } },
      ]);
    });

    test("numbers witness and fixed columns separately", () => {
      const system = loadOk("let a;\ncol fixed F = [7];\ncol witness b;");
      expect(system.witnessColumns.map((c) => [c.name, c.polyId.id])).toEqual([
        ["a", 0],
        ["b", 1],
      ]);
      expect(system.fixedColumns).toEqual([
        { name: "F", polyId: { id: 0, ptype: "constant" }, values: [7n] },
      ]);
    });

    test("resolves names local to the namespace before global ones", () => {
      const system = loadOk("let x;\nnamespace A(4);\nlet x;\nx = 1;");
      expect(system.identities[0]).toMatchObject({
        kind: "polynomial",
        expression: binary(
          "-",
          ref({ name: "A::x", polyId: { id: 1, ptype: "committed" }, next: false }),
          num(1)
        ),
      });
    });

    test("resolves qualified names from other namespaces", () => {
      const system = loadOk("namespace A(4);\nlet x;\nnamespace B(4);\nlet y;\ny = A::x';");
      expect(system.identities[0]).toMatchObject({
        expression: binary(
          "-",
          ref({ name: "B::y", polyId: { id: 1, ptype: "committed" }, next: false }),
          ref({ name: "A::x", polyId: { id: 0, ptype: "committed" }, next: true })
        ),
      });
    });

    test("the first namespace degree is the system degree", () => {
      expect(loadOk("namespace A(8);\nnamespace B(16);").degree).toBe(8);
      expect(loadOk("let a;").degree).toBeUndefined();
    });
  });

  describe("Fixed Columns", () => {
    test("fills a repeated block up to the degree", () => {
      const system = loadOk("namespace Fib(5);\ncol fixed FIRST = [1, 2] + [0]*;");
      expect(system.fixedColumns[0].values).toEqual([1n, 2n, 0n, 0n, 0n]);
    });

    test("cycles through a repeated block with several values", () => {
      const system = loadOk("namespace N(5);\ncol fixed P = [1, 2]*;");
      expect(system.fixedColumns[0].values).toEqual([1n, 2n, 1n, 2n, 1n]);
    });

    test("values after the repeated block come last", () => {
      const system = loadOk("namespace N(4);\ncol fixed LAST = [0]* + [1];");
      expect(system.fixedColumns[0].values).toEqual([0n, 0n, 0n, 1n]);
    });

    test("takes undefined columns from the supplied values", () => {
      const options = {
        fixedColumnValues: new Map([
          ["BYTE", [0n, 1n]],
          ["N::WORD", [5n]],
        ]),
      };
      const system = loadOk("namespace N(2);\ncol fixed BYTE;\ncol fixed WORD;\ncol fixed NONE;", options);
      expect(system.fixedColumns.map((c) => c.values)).toEqual([[0n, 1n], [5n], []]);
    });

    test("warns when a repeated block has no degree", () => {
      const { system, diagnostics } = load("col fixed F = [3]*;");
      expect(diagnostics.map((d) => d.code)).toEqual(["W0003"]);
      expect(system?.fixedColumns[0].values).toEqual([3n]);
    });

    test("rejects malformed definitions", () => {
      expect(codes("namespace N(4);\ncol fixed F = [1]* + [2]*;")).toEqual(["E1003"]);
      expect(codes("namespace N(4);\ncol fixed F = []*;")).toEqual(["E1003"]);
      expect(codes("namespace N(2);\ncol fixed F = [1, 2, 3];")).toEqual(["E1003"]);
    });

    test("rejects columns shorter than the degree without a repeated block", () => {
      const { system, diagnostics } = load("namespace N(4);\ncol fixed F = [1, 2];");
      expect(system).toBeUndefined();
      expect(diagnostics.map((d) => [d.code, d.message])).toEqual([
        ["E1003", "Fixed column 'N::F' has 2 values but the degree is 4"],
      ]);
    });
  });

  describe("Identities", () => {
    test("assigns ids in source order and distinguishes lookup kinds", () => {
      const system = loadOk(
        [
          "let a;",
          "col fixed F = [0, 1];",
          "a = 1;",
          "[a] in [F];",
          "phantom [a] in [F];",
          "[a] is [F];",
          "phantom [a] is [F];",
          "[a] connect [a];",
        ].join("\n")
      );
      expect(system.identities.map((i) => [i.id, i.kind])).toEqual([
        [0, "polynomial"],
        [1, "lookup"],
        [2, "phantom-lookup"],
        [3, "permutation"],
        [4, "phantom-permutation"],
        [5, "connect"],
      ]);
    });

    test("an identity with zero on the right keeps its left side", () => {
      const system = loadOk("let x;\nx * (x - 1) = 0;");
      const x = ref({ name: "x", polyId: { id: 0, ptype: "committed" }, next: false });
      expect(system.identities[0]).toMatchObject({
        kind: "polynomial",
        expression: binary("*", x, binary("-", x, num(1))),
      });
    });

    test("lookups without selectors are always active", () => {
      const system = loadOk("let a, s;\ncol fixed F = [0];\n[a] in [F];\ns $ [a] in [F];");
      const [plain, selected] = system.identities;
      expect(plain).toMatchObject({ left: { selector: num(1) }, right: { selector: num(1) } });
      expect(selected).toMatchObject({
        left: { selector: ref({ name: "s", polyId: { id: 1, ptype: "committed" }, next: false }) },
      });
    });

    test("records the source span of each identity", () => {
      const system = loadOk("let a;\n\na = 1;");
      expect(system.identities[0].span?.start.line).toBe(3);
    });
  });

  describe("witnessReferences", () => {
    test("lists each witness reference once, in source order", () => {
      const system = loadOk("let a, b;\ncol fixed F = [0];\na' * F + a' - b = 0;\n[b, a] in [F, F];");
      const names = system.identities.map((identity) =>
        witnessReferences(identity).map((r) => `${r.name}${r.next ? "'" : ""}`)
      );
      expect(names).toEqual([["a'", "b"], ["b", "a"]]);
    });
  });

  describe("Errors", () => {
    test("reports undefined columns and drops the identity", () => {
      const { system, diagnostics } = load("let a;\na = b;");
      expect(system).toBeUndefined();
      expect(diagnostics).toHaveLength(1);
      expect(diagnostics[0]).toMatchObject({
        code: "E1001",
        severity: "error",
        message: "Column 'b' is not defined",
        location: { file: "test.pil", start: { line: 2, column: 5 } },
      });
      expect(diagnostics[0].hints).toEqual([
        { strategy: "declare_column", description: "Declare 'b' as a witness column", template: "let b;" },
      ]);
    });

    test("reports duplicate definitions with the first one", () => {
      const { diagnostics } = load("let a;\nlet a;");
      expect(diagnostics[0]).toMatchObject({
        code: "E1002",
        message: "Column 'a' is already defined",
      });
      expect(diagnostics[0].related.map((r) => [r.message, r.location.start.line])).toEqual([
        ["first definition here", 1],
      ]);
    });

    test("reports lookups with sides of different length", () => {
      const { diagnostics } = load("let a, b;\ncol fixed F = [0];\n[a, b] in [F];");
      expect(diagnostics.map((d) => [d.code, d.message, d.location.start.line])).toEqual([
        ["E1005", "Identity sides have different lengths (2 and 1)", 3],
      ]);
      expect(codes("let a, b, c;\n[a, b] connect [c];")).toEqual(["E1005"]);
    });

    test("reports syntax errors before analysis", () => {
      expect(codes("x = ;")).toEqual(["E0005"]);
      expect(codes("let a\nlet b;")).toEqual(["E0001"]);
    });

    test("reports malformed numbers", () => {
      expect(codes("let a;\na = 12ab;")).toEqual(["E0003"]);
    });
  });
});
