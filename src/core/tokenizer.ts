/**
 * Tokenizer core
 *
 * This module turns a JCR-SQL2 statement into a flat list of tokens plus the
 * whitespace runs found between them.
 *
 * Dispatch on the first character of each token:
 *  - digit                 → number        (123, 1.5, 1.5E10, 2e3)
 *  - " or '                → string        ('it\'s', "a b")
 *  - / - ( ) { } * , . ; + % ?   → punct
 *  - ! < > | = :           → operator, two characters when followed by = | >
 *  - [                     → quoted-identifier ([nt:base], [a[b]c])
 *  - ]                     → punct (stray closing bracket)
 *  - anything else         → identifier
 *
 * The scan is eager: either every token is produced or an error is thrown.
 * There are no comments and no statement separators in the language.
 *
 * License: Apache-2.0
 */

import {
  classifyChar,
  isCombiningChar,
  isDigitChar,
  isIdentifierChar,
  isWhitespaceChar,
} from './tokens';
import type { Token, TokenType } from './tokens';
import {
  createLimitError,
  createUnterminatedIdentifierError,
  createUnterminatedStringError,
} from './errors';
import { normalizeScannerOptions } from './options';
import type { NormalizedScannerOptions, ScannerOptions } from './options';

/////////////////////
// Public types    //
/////////////////////

/**
 * Result of tokenization.
 */
export interface TokenStream {
  source: string;

  tokens: readonly Token[];

  /**
   * Whitespace runs in source order. A run is recorded only when it is
   * non-empty, so adjacent tokens leave no entry.
   */
  delimiters: readonly string[];

  /**
   * One entry per token: the whitespace immediately before it, or `''`.
   */
  gaps: readonly string[];
}

/////////////////////
// Public API      //
/////////////////////

/**
 * Tokenize a statement.
 *
 * Throws:
 *  - QueryError `E_UNTERMINATED_STRING` on an unclosed quoted string;
 *  - QueryError `E_UNTERMINATED_IDENTIFIER` on an unclosed `[` (unless
 *    `unterminatedBrackets` is 'ignore');
 *  - QueryError `E_LIMIT` when the statement or token count is too large.
 */
export function tokenize(
  source: string,
  options: ScannerOptions | NormalizedScannerOptions = {},
): TokenStream {
  const opts = normalizeScannerOptions(options);

  if (source.length > opts.maxStatementLength) {
    throw createLimitError({
      message: `Statement length ${source.length} exceeds maxStatementLength (${opts.maxStatementLength}).`,
    });
  }

  return new Tokenizer(source, opts).run();
}

/////////////////////
// Implementation  //
/////////////////////

class Tokenizer {
  private readonly src: string;
  private readonly len: number;
  private readonly opts: NormalizedScannerOptions;
  private pos = 0;

  private readonly tokens: Token[] = [];
  private readonly delimiters: string[] = [];
  private readonly gaps: string[] = [];
  private pendingGap = '';

  constructor(source: string, opts: NormalizedScannerOptions) {
    this.src = source;
    this.len = source.length;
    this.opts = opts;
  }

  run(): TokenStream {
    while (this.pos < this.len) {
      this.skipWhitespace();
      if (this.pos >= this.len) break;

      const ch = this.src[this.pos];

      switch (classifyChar(ch)) {
        case 'digit':
          this.readNumber();
          break;
        case 'quote':
          this.readString();
          break;
        case 'punct':
        case 'bracket-close':
          this.push('punct', ch, this.pos, this.pos + 1);
          this.pos++;
          break;
        case 'comparator':
          this.readOperator();
          break;
        case 'bracket-open':
          this.readQuotedIdentifier();
          break;
        default:
          this.readIdentifier();
          break;
      }
    }

    return {
      source: this.src,
      tokens: Object.freeze(this.tokens),
      delimiters: Object.freeze(this.delimiters),
      gaps: Object.freeze(this.gaps),
    };
  }

  ////////////////////////////
  // Whitespace             //
  ////////////////////////////

  private skipWhitespace(): void {
    const start = this.pos;
    while (this.pos < this.len && isWhitespaceChar(this.src[this.pos])) {
      this.pos++;
    }
    if (this.pos > start) {
      const run = this.src.slice(start, this.pos);
      this.delimiters.push(run);
      this.pendingGap = run;
    }
  }

  private push(type: TokenType, value: string, start: number, end: number): void {
    if (this.tokens.length >= this.opts.maxTokenCount) {
      throw createLimitError({
        message: `Statement produces more than maxTokenCount (${this.opts.maxTokenCount}) tokens.`,
        source: this.src,
        index: start,
      });
    }
    this.tokens.push({ type, value, start, end });
    this.gaps.push(this.pendingGap);
    this.pendingGap = '';
  }

  ///////////////////////
  // Token readers     //
  ///////////////////////

  private readOperator(): void {
    const start = this.pos;
    const next = this.pos + 1 < this.len ? this.src[this.pos + 1] : '';

    // No check that the pair means anything: "=>" and ":|" are emitted too.
    const width = isCombiningChar(next) ? 2 : 1;
    this.pos += width;
    this.push('operator', this.src.slice(start, this.pos), start, this.pos);
  }

  private readNumber(): void {
    const start = this.pos;
    this.skipDigits();

    // A dot is part of the number unless it is the very last character.
    if (this.pos + 1 < this.len && this.src[this.pos] === '.') {
      this.pos++;
      this.skipDigits();
    }

    // Exponent without sign: "1e10" is one token, "1e-10" is three.
    if (this.pos < this.len) {
      const c = this.src[this.pos];
      if (c === 'e' || c === 'E') {
        this.pos++;
        this.skipDigits();
      }
    }

    this.push('number', this.src.slice(start, this.pos), start, this.pos);
  }

  private skipDigits(): void {
    while (this.pos < this.len && isDigitChar(this.src[this.pos])) {
      this.pos++;
    }
  }

  private readString(): void {
    const start = this.pos;
    const quote = this.src[this.pos];
    this.pos++;

    let value = quote;

    while (this.pos < this.len) {
      const ch = this.src[this.pos++];

      if (ch === quote) {
        value += ch;
        this.push('string', value, start, this.pos);
        return;
      }

      if (ch === '\\' && this.pos < this.len && this.src[this.pos] === quote) {
        value += quote;
        this.pos++;
      } else {
        value += ch;
      }
    }

    throw createUnterminatedStringError({
      message: `Syntax error: unterminated quoted string '${value}' in '${this.src}'`,
      source: this.src,
      index: start,
      length: this.pos - start,
      fragment: value,
      note: `Close the string with ${quote}.`,
    });
  }

  private readQuotedIdentifier(): void {
    const start = this.pos;
    let level = 1;
    this.pos++;

    while (this.pos < this.len) {
      const ch = this.src[this.pos++];
      if (ch === '[') {
        level++;
      } else if (ch === ']' && --level === 0) {
        this.push(
          'quoted-identifier',
          this.src.slice(start, this.pos),
          start,
          this.pos,
        );
        return;
      }
    }

    if (this.opts.unterminatedBrackets === 'ignore') {
      return;
    }

    const partial = this.src.slice(start);
    throw createUnterminatedIdentifierError({
      message: `Syntax error: unterminated quoted identifier '${partial}' in '${this.src}'`,
      source: this.src,
      index: start,
      length: this.pos - start,
      fragment: partial,
      note: `Close the identifier with ${']'.repeat(level)}.`,
    });
  }

  private readIdentifier(): void {
    const start = this.pos;
    while (this.pos < this.len && isIdentifierChar(this.src[this.pos])) {
      this.pos++;
    }
    this.push('identifier', this.src.slice(start, this.pos), start, this.pos);
  }
}
