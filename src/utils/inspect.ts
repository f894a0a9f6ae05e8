/**
 * Utils / inspect
 *
 * Convenience helpers for:
 *  - Formatting scanner errors with context.
 *  - Dumping a token stream (for logs, debug output, or test failures).
 *  - Rebuilding a statement from its tokens and whitespace.
 *
 * The library itself never prints; these helpers return strings.
 *
 * License: Apache-2.0
 */

import { QueryError, isQueryError, computeLineAndColumn, buildSnippet } from '../core/errors';
import { Scanner } from '../core/scanner';
import type { TokenStream } from '../core/tokenizer';
import type { Token } from '../core/tokens';

/////////////////////////////
// Error formatting        //
/////////////////////////////

export interface FormattedQueryError {
  /**
   * Compact single-line summary.
   */
  summary: string;

  /**
   * Multi-line message with snippet and hint, if available.
   */
  detail: string;

  /**
   * Raw error (QueryError or unknown).
   */
  error: unknown;
}

/**
 * Format a scanner error (or any thrown value) for display.
 *
 * If `source` is given and the error has no snippet yet, one is computed
 * from the error's `index`.
 */
export function formatQueryError(
  err: unknown,
  source?: string,
): FormattedQueryError {
  if (!isQueryError(err)) {
    const message = err instanceof Error ? err.message : String(err);
    const summary = `Error: ${message}`;
    return { summary, detail: summary, error: err };
  }

  const e: QueryError = err;
  const message = e.message || 'Query error';

  let line = e.line;
  let column = e.column;
  let snippet = e.snippet;

  const text = source ?? e.source ?? undefined;

  if (snippet.trim() === '' && text && e.index != null) {
    const extra = buildSnippet(text, e.index, 1, message);
    line = extra.line;
    column = extra.column;
    snippet = extra.snippet;
  }

  if ((line == null || column == null) && text && e.index != null) {
    const lc = computeLineAndColumn(text, e.index);
    line = lc.line;
    column = lc.column;
  }

  const locationParts: string[] = [];
  if (line != null) locationParts.push(`line ${line}`);
  if (column != null) locationParts.push(`col ${column}`);
  const at = locationParts.length > 0 ? ` at ${locationParts.join(', ')}` : '';

  const summary = `[${e.code}] ${message}${at}`;

  let detail = summary;
  if (snippet.trim() !== '') {
    detail += `\n\n${snippet}`;
  }
  if (e.note && e.note.trim() !== '') {
    detail += `\n\nHint: ${e.note}`;
  }

  return { summary, detail, error: err };
}

/////////////////////////////
// Token stream dumps      //
/////////////////////////////

export interface InspectTokensOptions {
  /**
   * Mark the token at the scanner's cursor with "> ".
   * Only applies when a Scanner is inspected. Default: true
   */
  showCursor?: boolean;
}

const TYPE_COLUMN_WIDTH = 'quoted-identifier'.length;

/**
 * One line per token:
 *
 *   0  identifier         0-6   SELECT
 *   1  punct              7-8   *
 */
export function inspectTokens(
  input: TokenStream | Scanner,
  options: InspectTokensOptions = {},
): string {
  const { showCursor = true } = options;
  const tokens = input.tokens;
  const cursor =
    input instanceof Scanner && showCursor ? input.position : undefined;

  const indexWidth = String(Math.max(tokens.length - 1, 0)).length;
  const rangeWidth = Math.max(
    0,
    ...tokens.map((t) => `${t.start}-${t.end}`.length),
  );

  return tokens
    .map((token, i) => {
      const marker = cursor === undefined ? '' : i === cursor ? '> ' : '  ';
      return (
        marker +
        String(i).padStart(indexWidth) +
        '  ' +
        token.type.padEnd(TYPE_COLUMN_WIDTH) +
        '  ' +
        `${token.start}-${token.end}`.padEnd(rangeWidth) +
        '  ' +
        token.value
      );
    })
    .join('\n');
}

/**
 * Rebuild a statement from its tokens and the whitespace before each one.
 *
 * Leading and trailing whitespace of the statement are dropped. Strings come
 * back with their escaping backslashes removed; everything else matches the
 * source exactly.
 */
export function joinTokens(stream: Pick<TokenStream, 'tokens' | 'gaps'>): string {
  return stream.tokens
    .map((token: Token, i: number) => (i === 0 ? '' : stream.gaps[i] ?? '') + token.value)
    .join('');
}
