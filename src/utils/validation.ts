/**
 * Utils / validation
 *
 * Non-throwing lexical checks for a statement, meant for query editors and
 * pre-flight checks that want every problem at once instead of the first
 * exception.
 *
 * This module only looks at tokens; it says nothing about whether the
 * statement is grammatical.
 *
 * License: Apache-2.0
 */

import { tokenize } from '../core/tokenizer';
import type { TokenStream } from '../core/tokenizer';
import { isKnownTwoCharOperator, isOperatorToken, isPunctToken } from '../core/tokens';
import type { TokenType } from '../core/tokens';
import { computeLineAndColumn, isQueryError } from '../core/errors';
import type { QueryErrorCode } from '../core/errors';
import type { ScannerOptions } from '../core/options';

/////////////////////////////
// Public types            //
/////////////////////////////

export type IssueSeverity = 'error' | 'warning' | 'info';

export type StatementIssueCode =
  | 'LEX_UNTERMINATED_STRING'
  | 'LEX_UNTERMINATED_IDENTIFIER'
  | 'LEX_STRAY_BRACKET'
  | 'LEX_UNKNOWN_OPERATOR'
  | 'LEX_LIMIT';

export interface IssueLocation {
  /** 0-based offset in the statement. */
  index: number;
  /** 1-based line. */
  line: number;
  /** 1-based column. */
  column: number;
}

/**
 * Single validation issue.
 */
export interface StatementIssue {
  code: StatementIssueCode;

  message: string;

  /**
   * - error   → the statement cannot be scanned
   * - warning → it scans, but almost certainly won't parse
   */
  severity: IssueSeverity;

  location?: IssueLocation;
}

export interface StatementValidationStats {
  tokenCount: number;

  /**
   * Number of tokens per type. Every type is present, possibly with 0.
   */
  counts: Record<TokenType, number>;

  delimiterCount: number;
}

export interface StatementValidationResult {
  /**
   * `issues.every(i => i.severity !== 'error')`.
   */
  ok: boolean;

  issues: StatementIssue[];

  stats: StatementValidationStats;
}

const ISSUE_FOR_ERROR: Partial<Record<QueryErrorCode, StatementIssueCode>> = {
  E_UNTERMINATED_STRING: 'LEX_UNTERMINATED_STRING',
  E_UNTERMINATED_IDENTIFIER: 'LEX_UNTERMINATED_IDENTIFIER',
  E_LIMIT: 'LEX_LIMIT',
};

/////////////////////////////
// Public API              //
/////////////////////////////

/**
 * Collect lexical issues of a statement.
 *
 * Unclosed `[` identifiers are reported as errors whatever the
 * `unterminatedBrackets` option says. Invalid options still throw
 * (`E_CONFIG`): they are a programming error, not a statement issue.
 */
export function validateStatement(
  statement: string,
  options: ScannerOptions = {},
): StatementValidationResult {
  const issues: StatementIssue[] = [];
  let stream: TokenStream | null = null;

  try {
    stream = tokenize(statement, { ...options, unterminatedBrackets: 'error' });
  } catch (err) {
    const code = isQueryError(err) ? ISSUE_FOR_ERROR[err.code] : undefined;
    if (!isQueryError(err) || code === undefined) throw err;

    issues.push({
      code,
      message: err.message,
      severity: 'error',
      location: err.index != null ? locate(statement, err.index) : undefined,
    });
  }

  if (stream) {
    for (const token of stream.tokens) {
      if (isPunctToken(token) && token.value === ']') {
        issues.push({
          code: 'LEX_STRAY_BRACKET',
          message: "Closing ']' without a matching '['.",
          severity: 'warning',
          location: locate(statement, token.start),
        });
      } else if (
        isOperatorToken(token) &&
        token.value.length === 2 &&
        !isKnownTwoCharOperator(token.value)
      ) {
        issues.push({
          code: 'LEX_UNKNOWN_OPERATOR',
          message: `Unknown operator '${token.value}'.`,
          severity: 'warning',
          location: locate(statement, token.start),
        });
      }
    }
  }

  return {
    ok: issues.every((i) => i.severity !== 'error'),
    issues,
    stats: computeStats(stream),
  };
}

function locate(statement: string, index: number): IssueLocation {
  return { index, ...computeLineAndColumn(statement, index) };
}

function computeStats(stream: TokenStream | null): StatementValidationStats {
  const counts: Record<TokenType, number> = {
    number: 0,
    string: 0,
    'quoted-identifier': 0,
    identifier: 0,
    operator: 0,
    punct: 0,
  };

  if (!stream) {
    return { tokenCount: 0, counts, delimiterCount: 0 };
  }

  for (const token of stream.tokens) {
    counts[token.type]++;
  }

  return {
    tokenCount: stream.tokens.length,
    counts,
    delimiterCount: stream.delimiters.length,
  };
}
