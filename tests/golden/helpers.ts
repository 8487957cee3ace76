/**
 * Golden Test Helpers
 *
 * Loads constraint fixtures and their expected code from disk.
 */

import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { solveSource, type SolveSourceOptions, type SolveSourceResult } from "../../src/solve";
import { readSourceFile } from "../../src/utils/source";

const FIXTURES_DIR = join(__dirname, "fixtures");

export function systemPath(fixtureName: string): string {
  return join(FIXTURES_DIR, fixtureName, "system.pil");
}

/**
 * Expected code of a fixture, one effect per line.
 */
export async function expectedCode(fixtureName: string): Promise<string[]> {
  const content = await readFile(join(FIXTURES_DIR, fixtureName, "expected.txt"), "utf8");
  return content.split("\n").filter((line) => line !== "");
}

export async function solveFixture(
  fixtureName: string,
  options: SolveSourceOptions
): Promise<SolveSourceResult> {
  const source = await readSourceFile(systemPath(fixtureName));
  return solveSource(source, options);
}
