/**
 * Scanner session
 *
 * A `Scanner` tokenizes one statement eagerly and then hands the tokens out
 * to a parser through a forward-only cursor:
 *
 *   const scanner = createScanner("SELECT * FROM [nt:base] WHERE title = 'x'");
 *
 *   scanner.expect('SELECT');
 *   scanner.consume();                 // '*'
 *   scanner.expectSequence(['FROM']);
 *   scanner.lookahead();               // '[nt:base]' (not consumed)
 *
 * The cursor position is the only mutable state and only `consume()` (and the
 * expect helpers built on it) moves it.
 *
 * License: Apache-2.0
 */

import { tokenize } from './tokenizer';
import type { TokenStream } from './tokenizer';
import { trimToken, upperCaseAscii } from './tokens';
import type { Token } from './tokens';
import { createUnexpectedTokenError } from './errors';
import { normalizeScannerOptions } from './options';
import type { NormalizedScannerOptions, ScannerOptions } from './options';

/**
 * Returned by `previousDelimiter()` when no whitespace entry exists.
 */
export const DEFAULT_DELIMITER = ' ';

export class Scanner {
  private readonly stream: TokenStream;
  private readonly opts: NormalizedScannerOptions;
  private curpos = 0;

  constructor(statement: string, options: ScannerOptions = {}) {
    this.opts = normalizeScannerOptions(options);
    this.stream = tokenize(statement, this.opts);
  }

  /** The statement this session scans, verbatim. */
  get statement(): string {
    return this.stream.source;
  }

  /** Index of the next token to be consumed. */
  get position(): number {
    return this.curpos;
  }

  /** Total number of tokens in the statement. */
  get length(): number {
    return this.stream.tokens.length;
  }

  get tokens(): readonly Token[] {
    return this.stream.tokens;
  }

  get delimiters(): readonly string[] {
    return this.stream.delimiters;
  }

  get options(): NormalizedScannerOptions {
    return this.opts;
  }

  isAtEnd(): boolean {
    return this.curpos >= this.stream.tokens.length;
  }

  /**
   * Get a token without moving the cursor.
   * Returns an empty string past the last token.
   *
   * @param offset number of tokens to look ahead; 0 is the current token
   */
  lookahead(offset = 0): string {
    const token = this.lookaheadToken(offset);
    return token ? trimToken(token.value) : '';
  }

  /**
   * Like `lookahead`, but returns the full token (type and offsets).
   */
  lookaheadToken(offset = 0): Token | undefined {
    const index = this.curpos + offset;
    if (index < 0 || index >= this.stream.tokens.length) return undefined;
    return this.stream.tokens[index];
  }

  /**
   * Get the current token and advance past it.
   * Returns an empty string (and stays put) past the last token.
   */
  consume(): string {
    const token = this.lookahead();
    if (token !== '') {
      this.curpos++;
    }
    return token;
  }

  /**
   * Whitespace that preceded the most recently consumed token.
   *
   * In 'positional' mode this is `delimiters[position - 1]`, which only lines
   * up while every token boundary had whitespace. In 'aligned' mode it is the
   * exact gap, `''` for adjacent tokens. Falls back to a single space.
   */
  previousDelimiter(): string {
    const index = this.curpos - 1;
    const list =
      this.opts.delimiters === 'aligned'
        ? this.stream.gaps
        : this.stream.delimiters;
    return index >= 0 && index < list.length ? list[index] : DEFAULT_DELIMITER;
  }

  /**
   * Consume the next token and throw if it is not `token`.
   */
  expect(token: string, caseInsensitive = true): void {
    const index = this.lookaheadToken()?.start ?? this.stream.source.length;
    const found = this.consume();
    if (!this.tokensEqual(found, token, caseInsensitive)) {
      throw createUnexpectedTokenError({
        message: `Syntax error: Expected '${token}', found '${found}' in ${this.stream.source}`,
        source: this.stream.source,
        index,
        length: Math.max(found.length, 1),
        expected: token,
        found,
      });
    }
  }

  /**
   * `expect` each token in order; stops at the first mismatch.
   */
  expectSequence(tokens: readonly string[], caseInsensitive = true): void {
    for (const token of tokens) {
      this.expect(token, caseInsensitive);
    }
  }

  tokensEqual(a: string, b: string, caseInsensitive = true): boolean {
    return tokensEqual(a, b, caseInsensitive);
  }
}

/**
 * Compare two token texts, ignoring the case of ASCII letters by default.
 * Non-ASCII letters are compared as they are, so 'ß' never equals 'SS'.
 */
export function tokensEqual(a: string, b: string, caseInsensitive = true): boolean {
  return caseInsensitive ? upperCaseAscii(a) === upperCaseAscii(b) : a === b;
}

/**
 * Create a scanner session for one statement.
 */
export function createScanner(
  statement: string,
  options?: ScannerOptions,
): Scanner {
  return new Scanner(statement, options);
}
