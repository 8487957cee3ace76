/**
 * Lexer Module
 *
 * Tokenizes constraint-language source text.
 */

export { Lexer, tokenize, tokenizeString, type LexerError } from "./lexer";
export { type Token, TokenKind, type TokenValue, token, describeToken, KEYWORDS } from "./tokens";
export {
  isDigit,
  isHexDigit,
  isBinaryDigit,
  isIdentifierStart,
  isIdentifierContinue,
  isWhitespace,
} from "./chars";
