/**
 * Fixed-point driver
 *
 * Runs the inference engine over rows × identities until every pair is
 * resolved or a whole pass learns nothing new.
 */

import { Cell } from "../cell";
import {
  formatIdentity,
  witnessReferences,
  type ConstraintSystem,
  type Identity,
} from "../constraints";
import {
  DiagnosticCollector,
  ErrorCode,
  type Diagnostic,
  type Hint,
  type IdentityRow,
} from "../diagnostics";
import { GOLDILOCKS, type PrimeField } from "../field";
import type { Effect } from "../symbolic";
import { syntheticSpan } from "../utils/span";
import { type Logger, silentLogger } from "../utils/logger";
import { FixedColumnEvaluator, type FixedEvaluator } from "./fixed-evaluator";
import { deriveGlobalConstraints } from "./global-constraints";
import { WitgenInference, type RangeConflict } from "./witgen-inference";

export const DEFAULT_MAX_PASSES = 10000;

export interface SolveOptions {
  /** Rows to process identities on, in processing order */
  rows: number[];
  knownCells?: Iterable<Cell> | undefined;
  field?: PrimeField | undefined;
  maxPasses?: number | undefined;
  /** Defaults to an evaluator over the system's fixed column values */
  fixedEvaluator?: FixedEvaluator | undefined;
  logger?: Logger | undefined;
}

export interface SolveResult {
  code: Effect[];
  completed: IdentityRow[];
  incomplete: IdentityRow[];
  passes: number;
  knownCells: Cell[];
  conflicts: RangeConflict[];
  diagnostics: Diagnostic[];
}

export function solveOnRows(system: ConstraintSystem, options: SolveOptions): SolveResult {
  const field = options.field ?? GOLDILOCKS;
  const maxPasses = options.maxPasses ?? DEFAULT_MAX_PASSES;
  const logger = (options.logger ?? silentLogger()).child("driver");
  const diagnostics = new DiagnosticCollector();

  const { constraints, retainedIdentities } = deriveGlobalConstraints(system, field);
  logger.debug("derived global constraints", {
    constrainedColumns: constraints.constrainedWitnessColumns().length,
    retainedIdentities: retainedIdentities.length,
  });

  const engine = new WitgenInference({
    field,
    fixedEvaluator: options.fixedEvaluator ?? new FixedColumnEvaluator(system.fixedColumns),
    globalConstraints: constraints,
    knownCells: options.knownCells,
    logger: logger.child("inference"),
  });

  const complete = new Set<string>();
  const pairKey = (identity: Identity, row: number): string => `${identity.id}@${row}`;
  const total = retainedIdentities.length * options.rows.length;

  let passes = 0;
  while (complete.size < total) {
    if (passes >= maxPasses) {
      diagnostics.warning(
        ErrorCode.PassLimitReached,
        `Stopped after ${maxPasses} passes without reaching a fixed point`,
        syntheticSpan(),
        { kind: "pass_limit", maxPasses }
      );
      break;
    }
    passes++;
    const before = engine.changeCount();
    const completeBefore = complete.size;

    for (const row of options.rows) {
      for (const identity of retainedIdentities) {
        const key = pairKey(identity, row);
        if (!complete.has(key) && engine.processIdentity(identity, row)) {
          complete.add(key);
        }
      }
    }

    logger.debug(`pass ${passes}`, { complete: complete.size, total });
    if (engine.changeCount() === before && complete.size === completeBefore) {
      break;
    }
  }

  const completed: IdentityRow[] = [];
  const incomplete: IdentityRow[] = [];
  for (const identity of retainedIdentities) {
    for (const row of options.rows) {
      const pair = { identityId: identity.id, row };
      if (complete.has(pairKey(identity, row))) {
        completed.push(pair);
      } else {
        incomplete.push(pair);
        diagnostics.warning(
          ErrorCode.UnresolvedIdentity,
          `Identity ${identity.id} (${formatIdentity(identity)}) is unresolved on row ${row}`,
          identity.span ?? syntheticSpan(),
          { kind: "unresolved_identity", identityId: identity.id, row },
          knownCellHint(
            witnessReferences(identity)
              .map((reference) => Cell.fromReference(reference, row))
              .filter((cell) => !engine.isKnown(cell))
          )
        );
      }
    }
  }

  const conflicts = engine.conflicts();
  for (const conflict of conflicts) {
    const identity = retainedIdentities.find((i) => i.id === conflict.identityId);
    diagnostics.error(
      ErrorCode.EmptyRangeConstraint,
      `No value of ${conflict.cell} satisfies its range constraints (identity ${conflict.identityId}, row ${conflict.rowOffset})`,
      identity?.span ?? syntheticSpan(),
      { kind: "empty_range_constraint", cell: conflict.cell.toString(), row: conflict.rowOffset }
    );
  }

  return {
    code: engine.code(),
    completed,
    incomplete,
    passes,
    knownCells: engine.knownCells(),
    conflicts,
    diagnostics: diagnostics.getAll(),
  };
}

function knownCellHint(unknown: Cell[]): Hint[] {
  if (unknown.length === 0) return [];
  const [first] = unknown;
  return [
    {
      strategy: "supply_known_cell",
      description: `Supply a value for ${unknown.map(String).join(" or ")}`,
      template: `--known ${first.columnName}:${first.rowOffset}`,
    },
  ];
}
