/**
 * Error types & helpers
 *
 * This module defines the core error type (`QueryError`) used by the
 * tokenizer, the scanner cursor and option normalization, plus a small set
 * of utilities to build consistent messages.
 *
 * Goals:
 *  - One canonical error class for every failure of a scan session.
 *  - Rich diagnostics: statement verbatim, position, line/column, snippet.
 *  - Stable error codes for programmatic handling.
 *
 * Common usage:
 *
 *  - Tokenizer:
 *      throw createUnterminatedStringError({
 *        message: `Syntax error: unterminated quoted string '${partial}' in '${source}'`,
 *        source,
 *        index: start,
 *        fragment: partial,
 *      });
 *
 *  - Cursor:
 *      throw createUnexpectedTokenError({ ..., expected, found });
 *
 * License: Apache-2.0
 */

//////////////////////
// Error code enum  //
//////////////////////

/**
 * High-level error categories.
 *
 * Keep this list small and stable; detailed information goes into
 * `message`, `fragment`, `expected`/`found`, `snippet` and `note`.
 */
export type QueryErrorCode =
  /**
   * A quoted string reached end of input before its closing quote.
   */
  | 'E_UNTERMINATED_STRING'
  /**
   * A bracketed identifier reached end of input before its closing bracket
   * (only when unterminated brackets are configured as errors).
   */
  | 'E_UNTERMINATED_IDENTIFIER'
  /**
   * The parser expected one token and found another.
   */
  | 'E_UNEXPECTED_TOKEN'
  /**
   * Resource limits:
   *  - statement too long
   *  - too many tokens
   */
  | 'E_LIMIT'
  /**
   * Invalid scanner options.
   */
  | 'E_CONFIG';

/**
 * Options used when constructing a QueryError.
 */
export interface QueryErrorOptions {
  code: QueryErrorCode;

  /**
   * Human-readable error message.
   */
  message: string;

  /**
   * The full original statement.
   */
  source?: string;

  /**
   * 0-based character offset in the statement where the error originated.
   *
   * If omitted, `line`, `column` and `snippet` stay empty.
   */
  index?: number;

  /**
   * Length of the offending span, for a multi-character caret range.
   */
  length?: number;

  /**
   * Partially scanned text of an unterminated literal.
   */
  fragment?: string;

  /**
   * Token the parser asked for (unexpected-token errors).
   */
  expected?: string;

  /**
   * Token actually found (unexpected-token errors). `''` at end of input.
   */
  found?: string;

  /**
   * Optional hint, e.g. "close the identifier with ']'".
   */
  note?: string;

  /**
   * Optional underlying error (for wrapping).
   */
  cause?: unknown;
}

/**
 * Enriched error shape – this is what callers see when catching errors.
 *
 * It extends `Error` and adds:
 *  - `code`    – QueryErrorCode
 *  - `source`  – the statement verbatim (or null)
 *  - `index`   – 0-based index in the statement
 *  - `line`    – 1-based line number
 *  - `column`  – 1-based column number
 *  - `snippet` – the statement line with caret(s) under the offending span
 */
export class QueryError extends Error {
  public readonly name = 'QueryError';
  public readonly code: QueryErrorCode;

  public readonly source: string | null;

  /** 0-based offset in the statement (if known). */
  public readonly index: number | null;

  /** 1-based line number (if known). */
  public readonly line: number | null;

  /** 1-based column number (if known). */
  public readonly column: number | null;

  /**
   * Human-friendly snippet, e.g.:
   *
   *   SELECT * FROM [nt:base] WHERE title = 'open
   *                                         ^^^^^ --- Syntax error: …
   */
  public readonly snippet: string;

  public readonly fragment?: string;
  public readonly expected?: string;
  public readonly found?: string;
  public readonly note?: string;

  constructor(opts: QueryErrorOptions) {
    const { message, code, cause } = opts;
    super(message, cause === undefined ? undefined : { cause });

    // Keep `instanceof` working when compiled down to ES5-style classes.
    Object.setPrototypeOf(this, new.target.prototype);

    this.code = code;
    this.source = opts.source ?? null;

    const index =
      typeof opts.index === 'number' && opts.index >= 0 ? opts.index : null;

    let line: number | null = null;
    let column: number | null = null;
    let snippet = '';

    if (opts.source && index != null) {
      const snip = buildSnippet(opts.source, index, opts.length ?? 1, message);
      line = snip.line;
      column = snip.column;
      snippet = snip.snippet;
    }

    this.index = index;
    this.line = line;
    this.column = column;
    this.snippet = snippet;
    this.fragment = opts.fragment;
    this.expected = opts.expected;
    this.found = opts.found;
    this.note = opts.note;
  }
}

/**
 * Type guard for QueryError.
 */
export function isQueryError(err: unknown): err is QueryError {
  return err instanceof QueryError;
}

/////////////////////////////
// Public factory helpers  //
/////////////////////////////

export type QueryErrorInit = Omit<QueryErrorOptions, 'code'>;

export function createUnterminatedStringError(
  opts: QueryErrorInit,
): QueryError {
  return new QueryError({ ...opts, code: 'E_UNTERMINATED_STRING' });
}

export function createUnterminatedIdentifierError(
  opts: QueryErrorInit,
): QueryError {
  return new QueryError({ ...opts, code: 'E_UNTERMINATED_IDENTIFIER' });
}

export function createUnexpectedTokenError(opts: QueryErrorInit): QueryError {
  return new QueryError({ ...opts, code: 'E_UNEXPECTED_TOKEN' });
}

export function createLimitError(opts: QueryErrorInit): QueryError {
  return new QueryError({ ...opts, code: 'E_LIMIT' });
}

export function createConfigError(opts: QueryErrorInit): QueryError {
  return new QueryError({ ...opts, code: 'E_CONFIG' });
}

/////////////////////////////
// Snippet & position util //
/////////////////////////////

interface SnippetInfo {
  line: number;
  column: number;
  snippet: string;
}

/**
 * Compute line and column for a given index in the statement.
 *
 * - Lines are 1-based.
 * - Columns are 1-based.
 * - \n, \r\n and \r each count as one line break.
 */
export function computeLineAndColumn(
  source: string,
  index: number,
): { line: number; column: number } {
  index = clamp(index, 0, Math.max(0, source.length - 1));

  let line = 1;
  let lastLineStart = 0;

  for (let i = 0; i < source.length && i < index; i++) {
    const ch = source.charCodeAt(i);
    if (ch === 10 /* \n */) {
      line++;
      lastLineStart = i + 1;
    } else if (ch === 13 /* \r */) {
      line++;
      if (i + 1 < source.length && source.charCodeAt(i + 1) === 10) {
        i++;
      }
      lastLineStart = i + 1;
    }
  }

  const column = index - lastLineStart + 1;
  return { line, column };
}

/**
 * Build a snippet showing the line where the error occurred and one or more
 * carets under the offending span.
 *
 * Example output:
 *
 *   SELECT * FROM [nt:base WHERE
 *                 ^^^^^^^^^^^^^^ --- Syntax error: unterminated quoted identifier …
 */
export function buildSnippet(
  source: string,
  index: number,
  length: number,
  messageForArrow: string,
): SnippetInfo {
  const { line, column } = computeLineAndColumn(source, index);
  const lines = splitLines(source);

  const errorLine = lines[line - 1] ?? '';

  const startCol = clamp(column, 1, Math.max(errorLine.length, 1));
  const caretLength = Math.max(
    1,
    Math.min(length, errorLine.length - startCol + 1),
  );

  const spaces = ' '.repeat(startCol - 1);
  const carets = '^'.repeat(caretLength);

  const arrowMessage =
    messageForArrow.trim().length > 0 ? ` --- ${messageForArrow}` : '';

  return {
    line,
    column,
    snippet: `${errorLine}\n${spaces}${carets}${arrowMessage}`,
  };
}

function clamp(n: number, min: number, max: number): number {
  if (Number.isNaN(n)) return min;
  if (n < min) return min;
  if (n > max) return max;
  return n;
}

/**
 * Split a string into lines without the line break characters.
 * Supports \n, \r\n and \r.
 */
function splitLines(source: string): string[] {
  const lines: string[] = [];
  let start = 0;

  for (let i = 0; i < source.length; i++) {
    const ch = source.charCodeAt(i);
    if (ch === 10 /* \n */ || ch === 13 /* \r */) {
      lines.push(source.slice(start, i));
      if (ch === 13 && i + 1 < source.length && source.charCodeAt(i + 1) === 10) {
        i++;
      }
      start = i + 1;
    }
  }

  lines.push(source.slice(start));
  return lines;
}
