/**
 * Constraint Language Parser
 *
 * Recursive descent parser that transforms a token stream into a syntax tree.
 */

import type { SourceSpan } from "../utils/span";
import { mergeSpans } from "../utils/span";
import type { Token } from "../lexer/tokens";
import { TokenKind, describeToken } from "../lexer/tokens";
import {
  generateNodeId,
  resetNodeIdCounter,
  type Program,
  type Stmt,
  type Expr,
  type BinaryOp,
  type SelectedExpr,
  type DeclaredName,
  type FixedValueBlock,
} from "./ast";

// =============================================================================
// Parser Error
// =============================================================================

export interface ParseError {
  message: string;
  span: SourceSpan;
  expected?: string[] | undefined;
}

// =============================================================================
// Parser Class
// =============================================================================

export class Parser {
  private tokens: Token[];
  private pos: number = 0;
  private errors: ParseError[] = [];

  constructor(tokens: Token[]) {
    this.tokens = tokens;
  }

  getErrors(): ParseError[] {
    return this.errors;
  }

  /**
   * Parse a single expression, or nothing if it is malformed.
   */
  parseExpressionPublic(): Expr | undefined {
    try {
      const expr = this.parseExpr();
      if (!this.isAtEnd()) {
        throw this.error(`Unexpected ${describeToken(this.peek())} after expression`);
      }
      return expr;
    } catch {
      return undefined;
    }
  }

  // ===========================================================================
  // Token Navigation
  // ===========================================================================

  private isAtEnd(): boolean {
    return this.peek().kind === TokenKind.Eof;
  }

  private peek(): Token {
    return this.tokens[this.pos] ?? this.tokens[this.tokens.length - 1];
  }

  private previous(): Token {
    return this.tokens[this.pos - 1];
  }

  private advance(): Token {
    if (!this.isAtEnd()) {
      this.pos++;
    }
    return this.tokens[this.pos - 1];
  }

  private check(kind: TokenKind): boolean {
    return this.peek().kind === kind;
  }

  private match(...kinds: TokenKind[]): boolean {
    for (const kind of kinds) {
      if (this.check(kind)) {
        this.advance();
        return true;
      }
    }
    return false;
  }

  private expect(kind: TokenKind, message: string): Token {
    if (this.check(kind)) {
      return this.advance();
    }
    throw this.error(`${message}, got ${describeToken(this.peek())}`, [kind.toString()]);
  }

  private error(message: string, expected?: string[]): ParseError {
    const err: ParseError = {
      message,
      span: this.peek().span,
      expected,
    };
    this.errors.push(err);
    return err;
  }

  /**
   * Skip to just after the next semicolon.
   */
  private synchronize(): void {
    while (!this.isAtEnd()) {
      if (this.advance().kind === TokenKind.Semicolon) {
        return;
      }
    }
  }

  // ===========================================================================
  // Program Parsing
  // ===========================================================================

  parse(): Program {
    const statements: Stmt[] = [];
    const start = this.peek().span;

    while (!this.isAtEnd()) {
      try {
        statements.push(this.parseStatement());
      } catch {
        this.synchronize();
      }
    }

    const end = this.tokens[this.tokens.length - 1].span;
    return {
      kind: "program",
      id: generateNodeId(),
      span: mergeSpans(start, end),
      statements,
    };
  }

  // ===========================================================================
  // Statements
  // ===========================================================================

  private parseStatement(): Stmt {
    const start = this.peek().span;

    if (this.match(TokenKind.Namespace)) {
      return this.parseNamespace(start);
    }
    if (this.match(TokenKind.Let)) {
      return this.parseWitnessDecl(start);
    }
    if (this.match(TokenKind.Col)) {
      if (this.match(TokenKind.Witness)) {
        return this.parseWitnessDecl(start);
      }
      if (this.match(TokenKind.Fixed)) {
        return this.parseFixedDecl(start);
      }
      throw this.error("Expected 'witness' or 'fixed' after 'col'");
    }
    if (this.match(TokenKind.Phantom)) {
      const left = this.parseSelected(this.peek().span, undefined);
      return this.parseLookupRest(start, left, true);
    }

    if (this.check(TokenKind.LBracket)) {
      const listStart = this.peek().span;
      const expressions = this.parseExprList();
      if (this.match(TokenKind.Connect)) {
        const right = this.parseExprList();
        this.expect(TokenKind.Semicolon, "Expected ';'");
        return {
          kind: "connect-identity",
          id: generateNodeId(),
          span: mergeSpans(start, this.previous().span),
          left: expressions,
          right,
        };
      }
      const left: SelectedExpr = {
        id: generateNodeId(),
        span: mergeSpans(listStart, this.previous().span),
        expressions,
      };
      return this.parseLookupRest(start, left, false);
    }

    const expr = this.parseExpr();

    if (this.match(TokenKind.Dollar)) {
      const left = this.parseSelected(expr.span, expr);
      return this.parseLookupRest(start, left, false);
    }

    this.expect(TokenKind.Eq, "Expected '=' in identity");
    const right = this.parseExpr();
    this.expect(TokenKind.Semicolon, "Expected ';'");
    return {
      kind: "polynomial-identity",
      id: generateNodeId(),
      span: mergeSpans(start, this.previous().span),
      left: expr,
      right,
    };
  }

  private parseNamespace(start: SourceSpan): Stmt {
    const name = this.parseQualifiedName();
    let degree: bigint | undefined;
    if (this.match(TokenKind.LParen)) {
      degree = this.expect(TokenKind.IntLit, "Expected namespace degree").value?.int;
      this.expect(TokenKind.RParen, "Expected ')'");
    }
    this.expect(TokenKind.Semicolon, "Expected ';'");
    return {
      kind: "namespace",
      id: generateNodeId(),
      span: mergeSpans(start, this.previous().span),
      name,
      degree,
    };
  }

  private parseWitnessDecl(start: SourceSpan): Stmt {
    const names: DeclaredName[] = [];
    do {
      const tok = this.expect(TokenKind.Ident, "Expected column name");
      names.push({ name: tok.value?.ident ?? "", span: tok.span });
    } while (this.match(TokenKind.Comma));
    this.expect(TokenKind.Semicolon, "Expected ';'");
    return {
      kind: "witness",
      id: generateNodeId(),
      span: mergeSpans(start, this.previous().span),
      names,
    };
  }

  private parseFixedDecl(start: SourceSpan): Stmt {
    const nameToken = this.expect(TokenKind.Ident, "Expected column name");
    let blocks: FixedValueBlock[] | undefined;
    if (this.match(TokenKind.Eq)) {
      blocks = [];
      do {
        blocks.push(this.parseFixedValueBlock());
      } while (this.match(TokenKind.Plus));
    }
    this.expect(TokenKind.Semicolon, "Expected ';'");
    return {
      kind: "fixed",
      id: generateNodeId(),
      span: mergeSpans(start, this.previous().span),
      name: nameToken.value?.ident ?? "",
      blocks,
    };
  }

  private parseFixedValueBlock(): FixedValueBlock {
    this.expect(TokenKind.LBracket, "Expected '['");
    const values: bigint[] = [];
    if (!this.check(TokenKind.RBracket)) {
      do {
        const negative = this.match(TokenKind.Minus);
        const value = this.expect(TokenKind.IntLit, "Expected integer").value?.int ?? 0n;
        values.push(negative ? -value : value);
      } while (this.match(TokenKind.Comma));
    }
    this.expect(TokenKind.RBracket, "Expected ']'");
    const repeat = this.match(TokenKind.Star);
    return { values, repeat };
  }

  /**
   * Parse `[e1, ...]` optionally preceded by an already parsed `selector $`.
   */
  private parseSelected(start: SourceSpan, selector: Expr | undefined): SelectedExpr {
    let sel = selector;
    if (sel === undefined && !this.check(TokenKind.LBracket)) {
      sel = this.parseExpr();
      this.expect(TokenKind.Dollar, "Expected '$' after selector");
    }
    const expressions = this.parseExprList();
    return {
      id: generateNodeId(),
      span: mergeSpans(start, this.previous().span),
      selector: sel,
      expressions,
    };
  }

  private parseLookupRest(start: SourceSpan, left: SelectedExpr, phantom: boolean): Stmt {
    let op: "in" | "is";
    if (this.match(TokenKind.In)) {
      op = "in";
    } else if (this.match(TokenKind.Is)) {
      op = "is";
    } else {
      throw this.error(`Expected 'in' or 'is', got ${describeToken(this.peek())}`, ["In", "Is"]);
    }
    const right = this.parseSelected(this.peek().span, undefined);
    this.expect(TokenKind.Semicolon, "Expected ';'");
    return {
      kind: "lookup-identity",
      id: generateNodeId(),
      span: mergeSpans(start, this.previous().span),
      op,
      phantom,
      left,
      right,
    };
  }

  private parseExprList(): Expr[] {
    this.expect(TokenKind.LBracket, "Expected '['");
    const expressions: Expr[] = [];
    if (!this.check(TokenKind.RBracket)) {
      do {
        expressions.push(this.parseExpr());
      } while (this.match(TokenKind.Comma));
    }
    this.expect(TokenKind.RBracket, "Expected ']'");
    return expressions;
  }

  private parseQualifiedName(): string {
    const parts = [this.expect(TokenKind.Ident, "Expected identifier").value?.ident ?? ""];
    while (this.match(TokenKind.ColonColon)) {
      parts.push(this.expect(TokenKind.Ident, "Expected identifier after '::'").value?.ident ?? "");
    }
    return parts.join("::");
  }

  // ===========================================================================
  // Expressions
  // ===========================================================================

  private parseExpr(): Expr {
    return this.parseAddExpr();
  }

  private parseAddExpr(): Expr {
    let expr = this.parseMulExpr();

    while (this.check(TokenKind.Plus) || this.check(TokenKind.Minus)) {
      const op: BinaryOp = this.advance().kind === TokenKind.Plus ? "+" : "-";
      const right = this.parseMulExpr();
      expr = {
        kind: "binary",
        id: generateNodeId(),
        span: mergeSpans(expr.span, right.span),
        op,
        left: expr,
        right,
      };
    }

    return expr;
  }

  private parseMulExpr(): Expr {
    let expr = this.parsePowerExpr();

    while (this.match(TokenKind.Star)) {
      const right = this.parsePowerExpr();
      expr = {
        kind: "binary",
        id: generateNodeId(),
        span: mergeSpans(expr.span, right.span),
        op: "*",
        left: expr,
        right,
      };
    }

    return expr;
  }

  private parsePowerExpr(): Expr {
    const expr = this.parseUnaryExpr();

    // Power is right-associative
    if (this.match(TokenKind.StarStar)) {
      const right = this.parsePowerExpr();
      return {
        kind: "binary",
        id: generateNodeId(),
        span: mergeSpans(expr.span, right.span),
        op: "**",
        left: expr,
        right,
      };
    }

    return expr;
  }

  private parseUnaryExpr(): Expr {
    if (this.check(TokenKind.Minus)) {
      const start = this.advance().span;
      const operand = this.parseUnaryExpr();
      return {
        kind: "unary",
        id: generateNodeId(),
        span: mergeSpans(start, operand.span),
        op: "-",
        operand,
      };
    }

    return this.parsePrimaryExpr();
  }

  private parsePrimaryExpr(): Expr {
    const tok = this.peek();

    if (this.match(TokenKind.IntLit)) {
      return {
        kind: "number",
        id: generateNodeId(),
        span: tok.span,
        value: tok.value?.int ?? 0n,
      };
    }

    if (this.check(TokenKind.Ident)) {
      const name = this.parseQualifiedName();
      const next = this.match(TokenKind.Quote);
      return {
        kind: "ref",
        id: generateNodeId(),
        span: mergeSpans(tok.span, this.previous().span),
        name,
        next,
      };
    }

    if (this.match(TokenKind.Colon)) {
      const nameToken = this.expect(TokenKind.Ident, "Expected public name after ':'");
      return {
        kind: "public-ref",
        id: generateNodeId(),
        span: mergeSpans(tok.span, nameToken.span),
        name: nameToken.value?.ident ?? "",
      };
    }

    if (this.match(TokenKind.LParen)) {
      const expr = this.parseExpr();
      this.expect(TokenKind.RParen, "Expected ')'");
      return expr;
    }

    throw this.error(`Expected expression, got ${describeToken(tok)}`);
  }
}

// =============================================================================
// Public API
// =============================================================================

export function parse(tokens: Token[]): { program: Program; errors: ParseError[] } {
  resetNodeIdCounter();
  const parser = new Parser(tokens);
  const program = parser.parse();
  return { program, errors: parser.getErrors() };
}

/**
 * Parse a standalone expression from tokens.
 */
export function parseExpression(tokens: Token[]): { expr: Expr | undefined; errors: ParseError[] } {
  resetNodeIdCounter();
  const parser = new Parser(tokens);
  const expr = parser.parseExpressionPublic();
  return { expr, errors: parser.getErrors() };
}
