/**
 * Token type definitions for the constraint language lexer
 */

import type { SourceSpan } from "../utils/span";

export enum TokenKind {
  // Literals
  IntLit = "IntLit",

  // Keywords
  Namespace = "Namespace",
  Let = "Let",
  Col = "Col",
  Fixed = "Fixed",
  Witness = "Witness",
  In = "In",
  Is = "Is",
  Connect = "Connect",
  Phantom = "Phantom",

  // Operators
  Plus = "Plus", // +
  Minus = "Minus", // -
  Star = "Star", // *
  StarStar = "StarStar", // **
  Eq = "Eq", // =
  Quote = "Quote", // '
  Dollar = "Dollar", // $

  // Delimiters
  LParen = "LParen", // (
  RParen = "RParen", // )
  LBracket = "LBracket", // [
  RBracket = "RBracket", // ]
  Comma = "Comma", // ,
  Colon = "Colon", // :
  ColonColon = "ColonColon", // ::
  Semicolon = "Semicolon", // ;

  Ident = "Ident",

  // Special
  Eof = "Eof",
  Error = "Error",
}

export interface TokenValue {
  int?: bigint;
  ident?: string;
  error?: string;
}

export interface Token {
  kind: TokenKind;
  span: SourceSpan;
  value?: TokenValue;
}

export function token(kind: TokenKind, span: SourceSpan, value?: TokenValue): Token {
  if (value !== undefined) {
    return { kind, span, value };
  }
  return { kind, span };
}

/**
 * Map of reserved keywords to their token kinds
 */
export const KEYWORDS: Map<string, TokenKind> = new Map([
  ["namespace", TokenKind.Namespace],
  ["let", TokenKind.Let],
  ["col", TokenKind.Col],
  ["fixed", TokenKind.Fixed],
  ["witness", TokenKind.Witness],
  ["in", TokenKind.In],
  ["is", TokenKind.Is],
  ["connect", TokenKind.Connect],
  ["phantom", TokenKind.Phantom],
]);

/**
 * Get a human-readable description of a token for error messages
 */
export function describeToken(tok: Token): string {
  switch (tok.kind) {
    case TokenKind.IntLit:
      return `integer '${tok.value?.int}'`;
    case TokenKind.Ident:
      return `identifier '${tok.value?.ident}'`;
    case TokenKind.Eof:
      return "end of file";
    case TokenKind.Error:
      return `error: ${tok.value?.error}`;
    default:
      return `'${tok.kind}'`;
  }
}
