/**
 * Character classes for the constraint language (ASCII only)
 */

export function isDigit(char: string): boolean {
  if (char.length === 0) return false;
  const code = char.charCodeAt(0);
  return code >= 0x30 && code <= 0x39; // 0-9
}

export function isHexDigit(char: string): boolean {
  if (char.length === 0) return false;
  const code = char.charCodeAt(0);
  return (
    (code >= 0x30 && code <= 0x39) || // 0-9
    (code >= 0x41 && code <= 0x46) || // A-F
    (code >= 0x61 && code <= 0x66) // a-f
  );
}

export function isBinaryDigit(char: string): boolean {
  return char === "0" || char === "1";
}

export function isIdentifierStart(char: string): boolean {
  if (char.length === 0) return false;
  const code = char.charCodeAt(0);
  return (
    (code >= 0x41 && code <= 0x5a) || // A-Z
    (code >= 0x61 && code <= 0x7a) || // a-z
    char === "_"
  );
}

export function isIdentifierContinue(char: string): boolean {
  return isIdentifierStart(char) || isDigit(char);
}

export function isWhitespace(char: string): boolean {
  return char === " " || char === "\t" || char === "\n" || char === "\r";
}
