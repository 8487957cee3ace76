/**
 * Code Printer
 *
 * Renders a generated program (a sequence of effects) as text, one effect
 * per line, and as plain JSON-compatible records.
 */

import type { Effect, MachineCallArgument } from "../symbolic";

export function formatEffect(effect: Effect): string {
  switch (effect.kind) {
    case "assignment":
      return `${effect.cell} = ${effect.value};`;
    case "assertion": {
      const { lhs, rhs, expectedEqual } = effect.assertion;
      return `assert ${lhs} ${expectedEqual ? "==" : "!="} ${rhs};`;
    }
    case "machine-call":
      return `lookup(${effect.identityId}, [${effect.arguments.map(formatArgument).join(", ")}]);`;
    case "range-constraint":
      throw new Error(`Range constraint on ${effect.cell} cannot be part of generated code`);
  }
}

function formatArgument(arg: MachineCallArgument): string {
  return arg.kind === "known" ? `Known(${arg.value})` : `Unknown(${arg.expression})`;
}

export function formatCode(effects: Effect[]): string {
  return effects.map(formatEffect).join("\n");
}

// =============================================================================
// JSON form
// =============================================================================

export type SerializedEffect =
  | { kind: "assignment"; cell: string; value: string }
  | { kind: "assertion"; lhs: string; rhs: string; expectedEqual: boolean }
  | { kind: "machine-call"; identityId: number; arguments: SerializedArgument[] };

export interface SerializedArgument {
  kind: "known" | "unknown";
  expression: string;
  /** The cell the callee writes, for unknown arguments */
  cell?: string | undefined;
}

export function serializeEffect(effect: Effect): SerializedEffect {
  switch (effect.kind) {
    case "assignment":
      return { kind: "assignment", cell: effect.cell.toString(), value: effect.value.toString() };
    case "assertion":
      return {
        kind: "assertion",
        lhs: effect.assertion.lhs.toString(),
        rhs: effect.assertion.rhs.toString(),
        expectedEqual: effect.assertion.expectedEqual,
      };
    case "machine-call":
      return {
        kind: "machine-call",
        identityId: effect.identityId,
        arguments: effect.arguments.map((arg) =>
          arg.kind === "known"
            ? { kind: "known", expression: arg.value.toString() }
            : {
                kind: "unknown",
                expression: arg.expression.toString(),
                cell: arg.expression.singleUnknownVariable()?.toString(),
              }
        ),
      };
    case "range-constraint":
      throw new Error(`Range constraint on ${effect.cell} cannot be part of generated code`);
  }
}
