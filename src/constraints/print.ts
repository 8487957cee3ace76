/**
 * Rendering of analyzed expressions and identities, used in diagnostics and
 * debug output.
 */

import type { Expression, Identity, SelectedExpressions } from "./ast";

export function formatExpression(expr: Expression): string {
  switch (expr.kind) {
    case "reference":
      return `${expr.reference.name}${expr.reference.next ? "'" : ""}`;
    case "public-reference":
      return `:${expr.name}`;
    case "challenge":
      return `challenge(${expr.stage}, ${expr.id})`;
    case "number":
      return expr.value.toString();
    case "binary":
      return `(${formatExpression(expr.left)} ${expr.op} ${formatExpression(expr.right)})`;
    case "unary":
      return `-${formatExpression(expr.expr)}`;
  }
}

function formatSelected(selected: SelectedExpressions): string {
  const list = `[${selected.expressions.map(formatExpression).join(", ")}]`;
  const selector = selected.selector;
  if (selector.kind === "number" && selector.value === 1n) {
    return list;
  }
  return `${formatExpression(selector)} $ ${list}`;
}

export function formatIdentity(identity: Identity): string {
  switch (identity.kind) {
    case "polynomial":
      return `${formatExpression(identity.expression)} = 0`;
    case "lookup":
      return `${formatSelected(identity.left)} in ${formatSelected(identity.right)}`;
    case "permutation":
      return `${formatSelected(identity.left)} is ${formatSelected(identity.right)}`;
    case "phantom-lookup":
      return `phantom ${formatSelected(identity.left)} in ${formatSelected(identity.right)}`;
    case "phantom-permutation":
      return `phantom ${formatSelected(identity.left)} is ${formatSelected(identity.right)}`;
    case "phantom-bus-interaction":
      return `phantom bus(${formatExpression(identity.multiplicity)}, [${identity.tuple
        .map(formatExpression)
        .join(", ")}], ${formatExpression(identity.latch)})`;
    case "connect":
      return `[${identity.left.map(formatExpression).join(", ")}] connect [${identity.right
        .map(formatExpression)
        .join(", ")}]`;
  }
}
