/**
 * End-to-end Solve Tests
 */

import { describe, test, expect } from "vitest";
import { Cell } from "../src/cell";
import { loadConstraintSystem } from "../src/constraints";
import { BABY_BEAR } from "../src/field";
import { parseField, parseKnownCell, parseRowSpec, solveSource, SOLVER_VERSION } from "../src/solve";
import { sourceFromString } from "../src/utils/source";

const FIB = "let X; let Y;\nX' = Y;\nY' = X + Y;\n";

describe("parseRowSpec", () => {
  test("inclusive ranges", () => {
    expect(parseRowSpec("0..3")).toEqual([0, 1, 2, 3]);
    expect(parseRowSpec("-1..0")).toEqual([-1, 0]);
  });

  test("lists and single rows", () => {
    expect(parseRowSpec("3, 4,5")).toEqual([3, 4, 5]);
    expect(parseRowSpec("7")).toEqual([7]);
  });

  test("rejects malformed specs", () => {
    expect(parseRowSpec("3..1")).toBeUndefined();
    expect(parseRowSpec("a")).toBeUndefined();
    expect(parseRowSpec("1,,2")).toBeUndefined();
    expect(parseRowSpec("")).toBeUndefined();
  });
});

describe("parseField", () => {
  test("named fields and moduli", () => {
    expect(parseField("babybear")).toBe(BABY_BEAR);
    const field = parseField("101");
    expect(typeof field === "string" ? field : field.modulus).toBe(101n);
  });

  test("explains unusable fields", () => {
    expect(parseField("4")).toBe("Field modulus 4 is not prime");
    expect(parseField("1")).toBe("Field modulus 1 is not prime");
    expect(parseField("mersenne")).toBe(
      "unknown field 'mersenne' (known fields: goldilocks, babybear, bn254)"
    );
  });
});

describe("parseKnownCell", () => {
  const { system } = loadConstraintSystem(sourceFromString("xor.pil", "namespace Xor(4);\nlet A, B;"));
  if (system === undefined) throw new Error("constraint system was rejected");

  test("qualified and unqualified column names", () => {
    expect(parseKnownCell("Xor::A:7", system)).toEqual(new Cell("Xor::A", 0, 7));
    expect(parseKnownCell("B:-1", system)).toEqual(new Cell("Xor::B", 1, -1));
  });

  test("rejects unknown columns and malformed rows", () => {
    expect(parseKnownCell("C:0", system)).toBeUndefined();
    expect(parseKnownCell("A", system)).toBeUndefined();
    expect(parseKnownCell("Xor::A", system)).toBeUndefined();
    expect(parseKnownCell("A:x", system)).toBeUndefined();
  });
});

describe("solveSource", () => {
  test("reports the generated code of a complete run", () => {
    const { report, effects } = solveSource(sourceFromString("fib.pil", FIB), {
      rows: [0, 1],
      known: ["X:0", "Y:0"],
    });
    expect(report.status).toBe("complete");
    expect(report.solverVersion).toBe(SOLVER_VERSION);
    expect(report.code).toEqual([
      "X[1] = Y[0];",
      "Y[1] = (X[0] + Y[0]);",
      "X[2] = Y[1];",
      "Y[2] = (X[1] + Y[1]);",
    ]);
    expect(effects).toHaveLength(4);
    expect(report.completed).toHaveLength(4);
    expect(report.diagnostics).toEqual([]);
    expect(report.stats).toMatchObject({ identities: 2, rows: 2, passes: 1, knownCells: 6 });
  });

  test("marks runs with unresolved pairs as incomplete", () => {
    const { report } = solveSource(sourceFromString("sum.pil", "let X, Y;\nX + Y = 1;"), { rows: [0] });
    expect(report.status).toBe("incomplete");
    expect(report.code).toEqual([]);
    expect(report.incomplete).toEqual([{ identityId: 0, row: 0 }]);
    expect(report.diagnostics.map((d) => d.code)).toEqual(["W0001"]);
  });

  test("rejects known cells that name no witness column", () => {
    const { report, effects } = solveSource(sourceFromString("fib.pil", FIB), {
      rows: [0],
      known: ["Z:0"],
    });
    expect(report.status).toBe("error");
    expect(effects).toBeUndefined();
    expect(report.diagnostics.map((d) => [d.id, d.code, d.message])).toEqual([
      ["d1", "E1004", "'Z:0' does not name a witness column and row"],
    ]);
  });

  test("rejects malformed input", () => {
    const { report } = solveSource(sourceFromString("bad.pil", "let X;\nX = ;"), { rows: [0] });
    expect(report.status).toBe("error");
    expect(report.diagnostics.map((d) => d.code)).toEqual(["E0005"]);
    expect(report.stats).toMatchObject({ identities: 0, rows: 1, passes: 0 });
  });

  test("conflicts make the run fail but keep the code", () => {
    const source = "let x;\ncol fixed BIT = [0, 1];\n[x] in [BIT];\nx = 5;";
    const { report } = solveSource(sourceFromString("bit.pil", source), { rows: [0] });
    expect(report.status).toBe("error");
    expect(report.code).toEqual(["x[0] = 5;"]);
    expect(report.diagnostics.map((d) => d.code)).toEqual(["E3001"]);
  });

  test("uses supplied fixed column values", () => {
    const source = "namespace T(2);\nlet x;\ncol fixed F;\nx = F + 1;";
    const { report } = solveSource(sourceFromString("t.pil", source), {
      rows: [0, 1],
      fixedColumnValues: new Map([["F", [10n, 20n]]]),
    });
    expect(report.code).toEqual(["T::x[0] = 11;", "T::x[1] = 21;"]);
  });
});
