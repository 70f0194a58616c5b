/**
 * Token kinds for WordLang.
 *
 * Single-character tokens use their own code point as the kind, so the named
 * kinds are numbered above the code point range to keep the two apart.
 */
export enum TokenKind {
  EOF = 0,

  // Discarded before parsing
  COMMENT = 0x110000,
  WHITESPACE = 0x110001,

  // Literals
  STRING = 0x110002,
  IDENTIFIER = 0x110003,

  // Keywords
  IN = 0x110004,
  PRINT = 0x110005,
  FOREACH = 0x110006,
  FILTER_OUT = 0x110007,
  FILTER = 0x110008,
  LOAD = 0x110009,
  LIST = 0x11000a,
}

export const KEYWORDS: Record<string, TokenKind> = {
  'in': TokenKind.IN,
  'print': TokenKind.PRINT,
  'foreach': TokenKind.FOREACH,
  'filter_out': TokenKind.FILTER_OUT,
  'filter': TokenKind.FILTER,
  'load': TokenKind.LOAD,
  'List': TokenKind.LIST,
};

export interface Token {
  kind: number;
  text: string;
  line: number;
}

/** Kind tag for a single-character token. */
export function charKind(ch: string): number {
  return ch.codePointAt(0) ?? TokenKind.EOF;
}

export function isIgnoredKind(kind: number): boolean {
  return kind === TokenKind.COMMENT || kind === TokenKind.WHITESPACE;
}

export function tokenName(kind: number): string {
  if (kind > TokenKind.EOF && kind < TokenKind.COMMENT) {
    return `'${String.fromCodePoint(kind)}'`;
  }
  return TokenKind[kind] ?? `UNKNOWN(${kind})`;
}
