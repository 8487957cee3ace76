/**
 * Parser Module
 *
 * Exports the parser and syntax tree types of the constraint language.
 */

export { Parser, parse, parseExpression, type ParseError } from "./parser";
export type {
  AstNode,
  Expr,
  NumberExpr,
  RefExpr,
  PublicRefExpr,
  BinaryExpr,
  UnaryExpr,
  BinaryOp,
  UnaryOp,
  SelectedExpr,
  Stmt,
  NamespaceStmt,
  WitnessDecl,
  DeclaredName,
  FixedDecl,
  FixedValueBlock,
  PolynomialIdentityStmt,
  LookupIdentityStmt,
  ConnectIdentityStmt,
  Program,
} from "./ast";
