/**
 * Golden Integration Test Suite
 *
 * Solves complete constraint files and compares the generated code with the
 * expected code stored next to them.
 */

import { describe, test, expect } from "vitest";
import { expectedCode, solveFixture } from "./helpers";

describe("Golden: 01-simple", () => {
  test("solves in declaration order", async () => {
    const { report } = await solveFixture("01-simple", { rows: [0] });
    expect(report.status).toBe("complete");
    expect(report.code).toEqual(await expectedCode("01-simple"));
  });
});

describe("Golden: 02-fibonacci", () => {
  test("derives two rows from the first", async () => {
    const { report } = await solveFixture("02-fibonacci", { rows: [0, 1], known: ["X:0", "Y:0"] });
    expect(report.status).toBe("complete");
    expect(report.code).toEqual(await expectedCode("02-fibonacci"));
  });

  test("without known cells nothing can be derived", async () => {
    const { report } = await solveFixture("02-fibonacci", { rows: [0, 1] });
    expect(report.status).toBe("incomplete");
    expect(report.code).toEqual([]);
    expect(report.incomplete).toHaveLength(4);
  });
});

describe("Golden: 03-fibonacci-fixed", () => {
  test("starts from the first-row selector", async () => {
    const { report } = await solveFixture("03-fibonacci-fixed", { rows: [0, 1, 2, 3] });
    expect(report.status).toBe("complete");
    expect(report.code).toEqual(await expectedCode("03-fibonacci-fixed"));
  });
});

describe("Golden: 04-byte-split", () => {
  test("splits a known word into nibbles", async () => {
    const { report } = await solveFixture("04-byte-split", { rows: [0], known: ["w:0"] });
    expect(report.status).toBe("complete");
    expect(report.code).toEqual(await expectedCode("04-byte-split"));
  });
});

describe("Golden: 05-range-promotion", () => {
  test("assigns cells fixed by their ranges alone", async () => {
    const { report } = await solveFixture("05-range-promotion", { rows: [0] });
    expect(report.status).toBe("complete");
    expect(report.code).toEqual(await expectedCode("05-range-promotion"));
    expect(report.stats.passes).toBe(2);
  });
});

describe("Golden: 06-unresolved", () => {
  test("reports every unresolved pair", async () => {
    const { report } = await solveFixture("06-unresolved", { rows: [0] });
    expect(report.status).toBe("incomplete");
    expect(report.code).toEqual(await expectedCode("06-unresolved"));
    expect(report.incomplete).toEqual([
      { identityId: 0, row: 0 },
      { identityId: 1, row: 0 },
    ]);
    expect(report.diagnostics.map((d) => [d.code, d.location.start.line])).toEqual([
      ["W0001", 3],
      ["W0001", 4],
    ]);
  });
});
