/**
 * Token definitions
 *
 * This module defines the *canonical* token shape used across the scanner,
 * the cursor and the filter chain.
 *
 * It is the single source of truth for:
 *  - token shapes (TokenType, Token)
 *  - the character sets that drive dispatch in the tokenizer
 *  - the character classifier
 *
 * License: Apache-2.0
 */

/////////////////////
// Token categories //
/////////////////////

/**
 * High-level token categories produced by the tokenizer.
 *
 * The category is implied by the sub-scanner that produced the token; the
 * cursor API itself only ever hands out token text.
 */
export type TokenType =
  | 'number'
  | 'string'
  | 'quoted-identifier'
  | 'identifier'
  | 'operator'
  | 'punct';

/**
 * Token as seen by external consumers (cursor, filters, tooling).
 *
 * Notes:
 *  - `value` is the token text:
 *      - number:            raw numeric text ("3", "1.5E10", "2.")
 *      - string:            quotes kept, `\'` / `\"` collapsed to the quote
 *      - quoted-identifier: brackets kept ("[nt:base]")
 *      - identifier:        raw text ("SELECT", "title"); ':' splits names
 *      - operator:          "=", "<=", "!=", "<>", "||", ":" …
 *      - punct:             "(", ")", ",", "*", "." …
 *  - `start`/`end` are 0-based offsets into the statement (end is exclusive).
 *    For strings with escapes, `end - start` is longer than `value`.
 */
export interface Token {
  type: TokenType;
  value: string;
  start: number;
  end: number;
}

//////////////////////////////
// Character sets           //
//////////////////////////////

/**
 * Characters skipped between tokens and recorded as delimiters.
 */
export const WHITESPACE_CHARS = ' \t\n\r';

/**
 * Characters emitted as single-character tokens.
 */
export const SINGLE_CHAR_PUNCTUATION = '/-(){}*,.;+%?';

/**
 * Comparator-class characters. Each may combine with one of
 * `COMBINING_CHARS` into a two-character operator.
 */
export const COMPARATOR_CHARS = '!<>|=:';

/**
 * Second characters accepted after a comparator-class character.
 */
export const COMBINING_CHARS = '=|>';

/**
 * Two-character operators that mean something in JCR-SQL2.
 * The tokenizer emits any comparator + combining pair; validation uses this
 * list to flag the others.
 */
export const KNOWN_TWO_CHAR_OPERATORS: readonly string[] = [
  '!=',
  '<=',
  '>=',
  '<>',
  '||',
] as const;

/**
 * Characters that terminate a bare identifier.
 */
export const IDENTIFIER_TERMINATORS =
  WHITESPACE_CHARS + '[]' + SINGLE_CHAR_PUNCTUATION + COMPARATOR_CHARS;

//////////////////////////////
// Character classification //
//////////////////////////////

/**
 * Dispatch class of a single character.
 *
 *  - digit          → number sub-scanner
 *  - quote          → string sub-scanner
 *  - punct          → single-character token
 *  - comparator     → one- or two-character operator
 *  - bracket-open   → bracketed-identifier sub-scanner
 *  - bracket-close  → stray `]`, single-character token
 *  - whitespace     → delimiter
 *  - other          → bare-identifier sub-scanner
 */
export type CharClass =
  | 'digit'
  | 'quote'
  | 'punct'
  | 'comparator'
  | 'bracket-open'
  | 'bracket-close'
  | 'whitespace'
  | 'other';

export function classifyChar(ch: string): CharClass {
  if (ch >= '0' && ch <= '9') return 'digit';
  if (ch === '"' || ch === "'") return 'quote';
  if (ch === '[') return 'bracket-open';
  if (ch === ']') return 'bracket-close';
  if (isWhitespaceChar(ch)) return 'whitespace';
  if (SINGLE_CHAR_PUNCTUATION.includes(ch)) return 'punct';
  if (COMPARATOR_CHARS.includes(ch)) return 'comparator';
  return 'other';
}

export function isDigitChar(ch: string): boolean {
  return ch.length === 1 && ch >= '0' && ch <= '9';
}

export function isWhitespaceChar(ch: string): boolean {
  return ch.length === 1 && WHITESPACE_CHARS.includes(ch);
}

export function isCombiningChar(ch: string): boolean {
  return ch.length === 1 && COMBINING_CHARS.includes(ch);
}

export function isIdentifierChar(ch: string): boolean {
  return ch.length === 1 && !IDENTIFIER_TERMINATORS.includes(ch);
}

export function isKnownTwoCharOperator(op: string): boolean {
  return KNOWN_TWO_CHAR_OPERATORS.includes(op);
}

//////////////////////////////
// Type guards & utilities  //
//////////////////////////////

/**
 * A token whose `type` is known to be `T`.
 */
export type TokenOf<T extends TokenType> = Token & { type: T };

export function isIdentifierToken(token: Token): token is TokenOf<'identifier'> {
  return token.type === 'identifier';
}

export function isOperatorToken(token: Token): token is TokenOf<'operator'> {
  return token.type === 'operator';
}

export function isPunctToken(token: Token): token is TokenOf<'punct'> {
  return token.type === 'punct';
}

/**
 * Upper-case the ASCII letters a-z only; every other character is kept.
 */
export function upperCaseAscii(value: string): string {
  return value.replace(/[a-z]+/g, (run) => run.toUpperCase());
}

const TRIMMED_CHARS = ' \t\n\r\0\v';

/**
 * Strip blanks from both ends of a token value.
 *
 * Only the characters ' ', \t, \n, \r, \0 and \v are removed; other Unicode
 * spaces are part of the token.
 */
export function trimToken(value: string): string {
  let start = 0;
  let end = value.length;
  while (start < end && TRIMMED_CHARS.includes(value[start])) start++;
  while (end > start && TRIMMED_CHARS.includes(value[end - 1])) end--;
  return value.slice(start, end);
}

/**
 * Build a token. Filters use it to emit rewritten copies.
 */
export function createToken(
  type: TokenType,
  value: string,
  start: number,
  end: number,
): Token {
  return { type, value, start, end };
}
