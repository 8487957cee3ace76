/**
 * Constraint Language Lexer
 *
 * Tokenizes constraint source code into a stream of tokens.
 */

import { SourceFile } from "../utils/source";
import type { SourceSpan } from "../utils/span";
import { type Token, TokenKind, type TokenValue, token, KEYWORDS } from "./tokens";
import {
  isDigit,
  isHexDigit,
  isBinaryDigit,
  isIdentifierStart,
  isIdentifierContinue,
  isWhitespace,
} from "./chars";

export interface LexerError {
  message: string;
  span: SourceSpan;
}

export class Lexer {
  private source: SourceFile;
  private pos: number = 0;
  private errors: LexerError[] = [];

  constructor(source: SourceFile) {
    this.source = source;
  }

  getErrors(): LexerError[] {
    return this.errors;
  }

  /**
   * Tokenize the entire source file
   */
  tokenize(): Token[] {
    const tokens: Token[] = [];

    while (true) {
      const tok = this.nextToken();
      tokens.push(tok);
      if (tok.kind === TokenKind.Eof) {
        break;
      }
    }

    return tokens;
  }

  /**
   * Get the next token from the source
   */
  nextToken(): Token {
    this.skipWhitespaceAndComments();

    if (this.isAtEnd()) {
      return this.makeToken(TokenKind.Eof, this.pos, this.pos);
    }

    const char = this.peek();

    if (isIdentifierStart(char)) {
      return this.scanIdentifier();
    }

    if (isDigit(char)) {
      return this.scanNumber();
    }

    return this.scanOperatorOrPunctuation();
  }

  // ===== Character Navigation =====

  private isAtEnd(): boolean {
    return this.pos >= this.source.content.length;
  }

  private peek(): string {
    if (this.isAtEnd()) return "\0";
    return this.source.content[this.pos];
  }

  private peekNext(): string {
    if (this.pos + 1 >= this.source.content.length) return "\0";
    return this.source.content[this.pos + 1];
  }

  private advance(): string {
    if (this.isAtEnd()) return "\0";
    return this.source.content[this.pos++];
  }

  private match(expected: string): boolean {
    if (this.peek() !== expected) return false;
    this.advance();
    return true;
  }

  // ===== Token Creation =====

  private makeToken(kind: TokenKind, start: number, end: number, value?: TokenValue): Token {
    return token(kind, this.source.spanAt(start, end), value);
  }

  private errorToken(message: string, start: number, end: number): Token {
    const span = this.source.spanAt(start, end);
    this.errors.push({ message, span });
    return token(TokenKind.Error, span, { error: message });
  }

  // ===== Whitespace and Comments =====

  private skipWhitespaceAndComments(): void {
    while (!this.isAtEnd()) {
      const char = this.peek();

      if (isWhitespace(char)) {
        this.advance();
        continue;
      }

      if (char === "/" && this.peekNext() === "/") {
        while (!this.isAtEnd() && this.peek() !== "\n") {
          this.advance();
        }
        continue;
      }

      if (char === "/" && this.peekNext() === "*") {
        this.skipBlockComment();
        continue;
      }

      break;
    }
  }

  private skipBlockComment(): void {
    const commentStart = this.pos;

    // Skip the /*
    this.advance();
    this.advance();

    while (!this.isAtEnd()) {
      if (this.peek() === "*" && this.peekNext() === "/") {
        this.advance();
        this.advance();
        return;
      }
      this.advance();
    }

    this.errors.push({
      message: "Unterminated block comment",
      span: this.source.spanAt(commentStart, this.pos),
    });
  }

  // ===== Identifiers and Keywords =====

  private scanIdentifier(): Token {
    const start = this.pos;

    while (!this.isAtEnd() && isIdentifierContinue(this.peek())) {
      this.advance();
    }

    const text = this.source.content.slice(start, this.pos);

    const keywordKind = KEYWORDS.get(text);
    if (keywordKind !== undefined) {
      return this.makeToken(keywordKind, start, this.pos);
    }

    return this.makeToken(TokenKind.Ident, start, this.pos, { ident: text });
  }

  // ===== Numbers =====

  private scanNumber(): Token {
    const start = this.pos;

    if (this.peek() === "0") {
      const next = this.peekNext();
      if (next === "x" || next === "X") {
        return this.scanPrefixedNumber(start, isHexDigit, "hex");
      }
      if (next === "b" || next === "B") {
        return this.scanPrefixedNumber(start, isBinaryDigit, "binary");
      }
    }

    while (!this.isAtEnd() && (isDigit(this.peek()) || this.peek() === "_")) {
      this.advance();
    }

    if (isIdentifierStart(this.peek())) {
      while (!this.isAtEnd() && isIdentifierContinue(this.peek())) {
        this.advance();
      }
      return this.errorToken(
        `Invalid integer literal '${this.source.content.slice(start, this.pos)}'`,
        start,
        this.pos
      );
    }

    const text = this.source.content.slice(start, this.pos);
    return this.makeToken(TokenKind.IntLit, start, this.pos, {
      int: BigInt(text.replace(/_/g, "")),
    });
  }

  private scanPrefixedNumber(
    start: number,
    isValidDigit: (char: string) => boolean,
    radixName: string
  ): Token {
    // Skip 0x / 0b
    this.advance();
    this.advance();

    if (!isValidDigit(this.peek())) {
      return this.errorToken(
        `Invalid ${radixName} literal: expected digit after prefix`,
        start,
        this.pos
      );
    }

    while (!this.isAtEnd() && (isValidDigit(this.peek()) || this.peek() === "_")) {
      this.advance();
    }

    const text = this.source.content.slice(start, this.pos);
    return this.makeToken(TokenKind.IntLit, start, this.pos, {
      int: BigInt(text.replace(/_/g, "")),
    });
  }

  // ===== Operators and Punctuation =====

  private scanOperatorOrPunctuation(): Token {
    const start = this.pos;
    const char = this.advance();

    switch (char) {
      case "(":
        return this.makeToken(TokenKind.LParen, start, this.pos);
      case ")":
        return this.makeToken(TokenKind.RParen, start, this.pos);
      case "[":
        return this.makeToken(TokenKind.LBracket, start, this.pos);
      case "]":
        return this.makeToken(TokenKind.RBracket, start, this.pos);
      case ",":
        return this.makeToken(TokenKind.Comma, start, this.pos);
      case ";":
        return this.makeToken(TokenKind.Semicolon, start, this.pos);
      case "+":
        return this.makeToken(TokenKind.Plus, start, this.pos);
      case "-":
        return this.makeToken(TokenKind.Minus, start, this.pos);
      case "=":
        return this.makeToken(TokenKind.Eq, start, this.pos);
      case "'":
        return this.makeToken(TokenKind.Quote, start, this.pos);
      case "$":
        return this.makeToken(TokenKind.Dollar, start, this.pos);

      case "*":
        if (this.match("*")) {
          return this.makeToken(TokenKind.StarStar, start, this.pos);
        }
        return this.makeToken(TokenKind.Star, start, this.pos);

      case ":":
        if (this.match(":")) {
          return this.makeToken(TokenKind.ColonColon, start, this.pos);
        }
        return this.makeToken(TokenKind.Colon, start, this.pos);

      default:
        return this.errorToken(`Unexpected character: '${char}'`, start, this.pos);
    }
  }
}

/**
 * Tokenize a source file
 */
export function tokenize(source: SourceFile): { tokens: Token[]; errors: LexerError[] } {
  const lexer = new Lexer(source);
  const tokens = lexer.tokenize();
  return { tokens, errors: lexer.getErrors() };
}

/**
 * Tokenize a string (convenience function for testing)
 */
export function tokenizeString(
  content: string,
  filename: string = "<input>"
): { tokens: Token[]; errors: LexerError[] } {
  const source = new SourceFile(filename, content);
  return tokenize(source);
}
