/**
 * Scanner options
 *
 * All options are optional. Size limits are off unless a caller sets them.
 *
 * License: Apache-2.0
 */

import { createConfigError } from './errors';

/**
 * How `previousDelimiter()` maps the cursor position to whitespace.
 *
 *  - 'positional' – `delimiters[position - 1]`. Delimiters are only recorded
 *    where whitespace exists, so adjacent tokens shift every later lookup.
 *    Matches the behavior existing parsers were written against.
 *  - 'aligned'    – one gap per token; returns the whitespace immediately
 *    before the most recently consumed token (`''` if it was adjacent).
 */
export type DelimiterMode = 'positional' | 'aligned';

/**
 * What to do when a `[` identifier is still open at end of input.
 *
 *  - 'error'  – throw `E_UNTERMINATED_IDENTIFIER`, like strings do.
 *  - 'ignore' – drop the open identifier and end the scan silently.
 */
export type UnterminatedBracketPolicy = 'error' | 'ignore';

export interface ScannerOptions {
  /**
   * Delimiter indexing used by `previousDelimiter()`.
   * Default: 'positional'
   */
  delimiters?: DelimiterMode;

  /**
   * Policy for an unclosed bracketed identifier.
   * Default: 'error'
   */
  unterminatedBrackets?: UnterminatedBracketPolicy;

  /**
   * Maximum statement length in characters. `Infinity` disables the check.
   * Default: Infinity
   */
  maxStatementLength?: number;

  /**
   * Maximum number of tokens a statement may produce. `Infinity` disables
   * the check.
   * Default: Infinity
   */
  maxTokenCount?: number;
}

export type NormalizedScannerOptions = Readonly<Required<ScannerOptions>>;

export const DEFAULT_SCANNER_OPTIONS: NormalizedScannerOptions = Object.freeze({
  delimiters: 'positional',
  unterminatedBrackets: 'error',
  maxStatementLength: Infinity,
  maxTokenCount: Infinity,
});

const DELIMITER_MODES: readonly DelimiterMode[] = ['positional', 'aligned'];
const BRACKET_POLICIES: readonly UnterminatedBracketPolicy[] = [
  'error',
  'ignore',
];

/**
 * Apply defaults and validate user-supplied options.
 *
 * Throws `E_CONFIG` for unknown modes and for limits that are not positive
 * integers (or `Infinity`).
 */
export function normalizeScannerOptions(
  options: ScannerOptions = {},
): NormalizedScannerOptions {
  const delimiters = options.delimiters ?? DEFAULT_SCANNER_OPTIONS.delimiters;
  if (!DELIMITER_MODES.includes(delimiters)) {
    throw createConfigError({
      message: `Invalid scanner option "delimiters": ${String(delimiters)}.`,
      note: `Use one of ${DELIMITER_MODES.join(', ')}.`,
    });
  }

  const unterminatedBrackets =
    options.unterminatedBrackets ?? DEFAULT_SCANNER_OPTIONS.unterminatedBrackets;
  if (!BRACKET_POLICIES.includes(unterminatedBrackets)) {
    throw createConfigError({
      message: `Invalid scanner option "unterminatedBrackets": ${String(unterminatedBrackets)}.`,
      note: `Use one of ${BRACKET_POLICIES.join(', ')}.`,
    });
  }

  return Object.freeze({
    delimiters,
    unterminatedBrackets,
    maxStatementLength: checkLimit(
      'maxStatementLength',
      options.maxStatementLength ?? DEFAULT_SCANNER_OPTIONS.maxStatementLength,
    ),
    maxTokenCount: checkLimit(
      'maxTokenCount',
      options.maxTokenCount ?? DEFAULT_SCANNER_OPTIONS.maxTokenCount,
    ),
  });
}

function checkLimit(name: string, value: number): number {
  if (value === Infinity) return value;
  if (!Number.isInteger(value) || value <= 0) {
    throw createConfigError({
      message: `Invalid scanner option "${name}": ${String(value)}.`,
      note: 'Limits must be positive integers or Infinity.',
    });
  }
  return value;
}
