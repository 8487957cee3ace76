/**
 * Constraint Analyzer
 *
 * Resolves column names of a parsed program, builds fixed column values and
 * lowers statements into numbered identities.
 */

import type { SourceSpan } from "../utils/span";
import type { SourceFile } from "../utils/source";
import { tokenize } from "../lexer";
import { parse } from "../parser";
import type { Program, Expr, SelectedExpr, FixedDecl, FixedValueBlock, Stmt } from "../parser";
import { DiagnosticCollector, ErrorCode, type Diagnostic, type Hint } from "../diagnostics";
import {
  binary,
  num,
  unselected,
  type ColumnInfo,
  type ConstraintSystem,
  type Expression,
  type FixedColumn,
  type Identity,
  type LookupKind,
  type PolyId,
  type SelectedExpressions,
} from "./ast";

// =============================================================================
// Options and Results
// =============================================================================

export interface AnalyzeOptions {
  /**
   * Values of fixed columns declared without a definition, keyed by the
   * qualified or the unqualified column name.
   */
  fixedColumnValues?: Map<string, bigint[]> | undefined;
}

export interface AnalyzeResult {
  system: ConstraintSystem;
  diagnostics: Diagnostic[];
}

interface Declaration {
  info: ColumnInfo;
  span: SourceSpan;
}

// =============================================================================
// Analyzer
// =============================================================================

class Analyzer {
  private readonly diagnostics = new DiagnosticCollector();
  private readonly declarations = new Map<string, Declaration>();
  private readonly witnessColumns: ColumnInfo[] = [];
  private readonly fixedColumns: FixedColumn[] = [];
  private readonly identities: Identity[] = [];
  private namespace = "";
  private namespaceDegree: number | undefined;
  private degree: number | undefined;

  constructor(private readonly options: AnalyzeOptions) {}

  analyze(program: Program): AnalyzeResult {
    for (const stmt of program.statements) {
      this.analyzeStatement(stmt);
    }
    return {
      system: {
        degree: this.degree,
        witnessColumns: this.witnessColumns,
        fixedColumns: this.fixedColumns,
        identities: this.identities,
      },
      diagnostics: this.diagnostics.getAll(),
    };
  }

  private analyzeStatement(stmt: Stmt): void {
    switch (stmt.kind) {
      case "namespace":
        this.namespace = stmt.name;
        this.namespaceDegree = stmt.degree === undefined ? undefined : Number(stmt.degree);
        if (this.degree === undefined) {
          this.degree = this.namespaceDegree;
        }
        return;

      case "witness":
        for (const declared of stmt.names) {
          const name = this.qualify(declared.name);
          const polyId: PolyId = { id: this.witnessColumns.length, ptype: "committed" };
          if (this.declare(name, polyId, declared.span)) {
            this.witnessColumns.push({ name, polyId });
          }
        }
        return;

      case "fixed":
        this.analyzeFixed(stmt);
        return;

      case "polynomial-identity": {
        const left = this.resolveExpr(stmt.left);
        const right = this.resolveExpr(stmt.right);
        if (left === undefined || right === undefined) return;
        const expression =
          right.kind === "number" && right.value === 0n ? left : binary("-", left, right);
        this.pushIdentity({ kind: "polynomial", id: 0, span: stmt.span, expression });
        return;
      }

      case "lookup-identity": {
        const left = this.resolveSelected(stmt.left);
        const right = this.resolveSelected(stmt.right);
        if (left === undefined || right === undefined) return;
        if (!this.checkArity(left.expressions, right.expressions, stmt.span)) return;
        const kind: LookupKind =
          stmt.op === "in"
            ? stmt.phantom
              ? "phantom-lookup"
              : "lookup"
            : stmt.phantom
              ? "phantom-permutation"
              : "permutation";
        this.pushIdentity({ kind, id: 0, span: stmt.span, left, right });
        return;
      }

      case "connect-identity": {
        const left = this.resolveList(stmt.left);
        const right = this.resolveList(stmt.right);
        if (left === undefined || right === undefined) return;
        if (!this.checkArity(left, right, stmt.span)) return;
        this.pushIdentity({ kind: "connect", id: 0, span: stmt.span, left, right });
        return;
      }
    }
  }

  private checkArity(left: Expression[], right: Expression[], span: SourceSpan): boolean {
    if (left.length === right.length) return true;
    this.diagnostics.error(
      ErrorCode.LookupArityMismatch,
      `Identity sides have different lengths (${left.length} and ${right.length})`,
      span,
      { kind: "lookup_arity", expected: `${left.length}`, actual: `${right.length}` }
    );
    return false;
  }

  private pushIdentity(identity: Identity): void {
    identity.id = this.identities.length;
    this.identities.push(identity);
  }

  // ===========================================================================
  // Declarations
  // ===========================================================================

  private qualify(name: string): string {
    return this.namespace === "" ? name : `${this.namespace}::${name}`;
  }

  private declare(name: string, polyId: PolyId, span: SourceSpan): boolean {
    const existing = this.declarations.get(name);
    if (existing !== undefined) {
      this.diagnostics.error(
        ErrorCode.DuplicateDefinition,
        `Column '${name}' is already defined`,
        span,
        { kind: "duplicate_definition", name },
        [],
        [{ message: "first definition here", location: existing.span }]
      );
      return false;
    }
    this.declarations.set(name, { info: { name, polyId }, span });
    return true;
  }

  private analyzeFixed(stmt: FixedDecl): void {
    const name = this.qualify(stmt.name);
    let values: bigint[];
    if (stmt.blocks !== undefined) {
      const expanded = this.expandBlocks(name, stmt.blocks, stmt.span);
      if (expanded === undefined) return;
      values = expanded;
    } else {
      const supplied = this.options.fixedColumnValues;
      values = supplied?.get(name) ?? supplied?.get(stmt.name) ?? [];
    }
    const polyId: PolyId = { id: this.fixedColumns.length, ptype: "constant" };
    if (this.declare(name, polyId, stmt.span)) {
      this.fixedColumns.push({ name, polyId, values });
    }
  }

  /**
   * `[1, 2] + [0]*` with degree 5 gives 1, 2, 0, 0, 0.
   */
  private expandBlocks(
    name: string,
    blocks: FixedValueBlock[],
    span: SourceSpan
  ): bigint[] | undefined {
    const repeated = blocks.filter((b) => b.repeat);
    if (repeated.length > 1) {
      this.diagnostics.error(
        ErrorCode.InvalidFixedColumn,
        `Fixed column '${name}' has more than one repeated block`,
        span,
        { kind: "invalid_fixed_column", name }
      );
      return undefined;
    }
    if (repeated.some((b) => b.values.length === 0)) {
      this.diagnostics.error(
        ErrorCode.InvalidFixedColumn,
        `Fixed column '${name}' repeats an empty block`,
        span,
        { kind: "invalid_fixed_column", name }
      );
      return undefined;
    }

    const explicitLength = blocks
      .filter((b) => !b.repeat)
      .reduce((sum, b) => sum + b.values.length, 0);
    const degree = this.namespaceDegree;
    const filled = repeated.length === 1;

    if (filled && degree === undefined) {
      this.diagnostics.warning(
        ErrorCode.MissingDegree,
        `Fixed column '${name}' repeats a block but the namespace declares no degree`,
        span,
        { kind: "missing_degree", name }
      );
    }
    if (degree !== undefined && (explicitLength > degree || (!filled && explicitLength < degree))) {
      this.diagnostics.error(
        ErrorCode.InvalidFixedColumn,
        `Fixed column '${name}' has ${explicitLength} values but the degree is ${degree}`,
        span,
        { kind: "invalid_fixed_column", name, expected: `${degree}`, actual: `${explicitLength}` }
      );
      return undefined;
    }

    const fill = degree === undefined ? undefined : degree - explicitLength;
    const values: bigint[] = [];
    for (const block of blocks) {
      if (!block.repeat) {
        values.push(...block.values);
      } else if (fill === undefined) {
        values.push(...block.values);
      } else {
        for (let i = 0; i < fill; i++) {
          values.push(block.values[i % block.values.length]);
        }
      }
    }
    return values;
  }

  // ===========================================================================
  // Expressions
  // ===========================================================================

  private lookupColumn(name: string): ColumnInfo | undefined {
    if (!name.includes("::") && this.namespace !== "") {
      const local = this.declarations.get(`${this.namespace}::${name}`);
      if (local !== undefined) return local.info;
    }
    return this.declarations.get(name)?.info;
  }

  private resolveExpr(expr: Expr): Expression | undefined {
    switch (expr.kind) {
      case "number":
        return num(expr.value);

      case "public-ref":
        return { kind: "public-reference", name: expr.name };

      case "ref": {
        const column = this.lookupColumn(expr.name);
        if (column === undefined) {
          this.diagnostics.error(
            ErrorCode.UnresolvedName,
            `Column '${expr.name}' is not defined`,
            expr.span,
            { kind: "unresolved_name", name: expr.name },
            [declareColumnHint(expr.name)],
            [],
            expr.id
          );
          return undefined;
        }
        return {
          kind: "reference",
          reference: { name: column.name, polyId: column.polyId, next: expr.next },
        };
      }

      case "binary": {
        const left = this.resolveExpr(expr.left);
        const right = this.resolveExpr(expr.right);
        if (left === undefined || right === undefined) return undefined;
        return binary(expr.op, left, right);
      }

      case "unary": {
        const operand = this.resolveExpr(expr.operand);
        if (operand === undefined) return undefined;
        return { kind: "unary", op: expr.op, expr: operand };
      }
    }
  }

  private resolveList(exprs: Expr[]): Expression[] | undefined {
    const resolved: Expression[] = [];
    let ok = true;
    for (const expr of exprs) {
      const r = this.resolveExpr(expr);
      if (r === undefined) {
        ok = false;
      } else {
        resolved.push(r);
      }
    }
    return ok ? resolved : undefined;
  }

  private resolveSelected(selected: SelectedExpr): SelectedExpressions | undefined {
    const selector = selected.selector === undefined ? undefined : this.resolveExpr(selected.selector);
    const expressions = this.resolveList(selected.expressions);
    if (expressions === undefined) return undefined;
    if (selected.selector === undefined) return unselected(expressions);
    return selector === undefined ? undefined : { selector, expressions };
  }
}

function declareColumnHint(name: string): Hint {
  const separator = name.lastIndexOf("::");
  const local = separator === -1 ? name : name.slice(separator + 2);
  return {
    strategy: "declare_column",
    description: `Declare '${local}' as a witness column`,
    template: `let ${local};`,
  };
}

// =============================================================================
// Public API
// =============================================================================

export function analyze(program: Program, options: AnalyzeOptions = {}): AnalyzeResult {
  return new Analyzer(options).analyze(program);
}

/**
 * Lex, parse and analyze a source file. Stops after the first phase that
 * reports errors.
 */
export function loadConstraintSystem(
  source: SourceFile,
  options: AnalyzeOptions = {}
): { system: ConstraintSystem | undefined; diagnostics: Diagnostic[] } {
  const collector = new DiagnosticCollector();

  const { tokens, errors: lexErrors } = tokenize(source);
  if (lexErrors.length > 0) {
    for (const e of lexErrors) {
      const code = e.message.includes("literal") ? ErrorCode.InvalidNumeric : ErrorCode.UnexpectedToken;
      collector.error(code, e.message, e.span, { kind: "syntax_error" });
    }
    return { system: undefined, diagnostics: collector.getAll() };
  }

  const { program, errors: parseErrors } = parse(tokens);
  if (parseErrors.length > 0) {
    for (const e of parseErrors) {
      const code = e.message.startsWith("Expected expression")
        ? ErrorCode.ExpectedExpression
        : ErrorCode.UnexpectedToken;
      collector.error(code, e.message, e.span, { kind: "syntax_error", expected: e.expected?.join(", ") });
    }
    return { system: undefined, diagnostics: collector.getAll() };
  }

  const result = analyze(program, options);
  for (const d of result.diagnostics) {
    collector.add(d);
  }
  if (collector.hasErrors()) {
    return { system: undefined, diagnostics: collector.getAll() };
  }
  return { system: result.system, diagnostics: collector.getAll() };
}
