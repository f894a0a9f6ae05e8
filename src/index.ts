/**
 * Public entry point
 *
 * This file defines the **public API surface** of the JCR-SQL2 scanner.
 *
 * It provides:
 *  - `Scanner` / `createScanner`: the parser-facing token cursor.
 *  - `tokenize`: the raw token + delimiter stream.
 *  - Token types, the character classifier, and the error type.
 *  - Token filter chains.
 *  - Utilities for error formatting, token dumps, and lexical validation.
 *
 * Typical usage from a parser:
 *
 *   import { createScanner, isQueryError, formatQueryError } from 'jcr-sql2-scanner';
 *
 *   const scanner = createScanner(statement);
 *   scanner.expect('SELECT');
 *   const column = scanner.consume();
 *   scanner.expect('FROM');
 *   const selector = scanner.consume();
 *
 * License: Apache-2.0
 */

/////////////////////////////
// Core                    //
/////////////////////////////

export { Scanner, createScanner, tokensEqual, DEFAULT_DELIMITER } from './core/scanner';

export { tokenize } from './core/tokenizer';
export type { TokenStream } from './core/tokenizer';

export {
  classifyChar,
  createToken,
  trimToken,
  isIdentifierToken,
  isOperatorToken,
  isPunctToken,
  upperCaseAscii,
  isKnownTwoCharOperator,
  WHITESPACE_CHARS,
  SINGLE_CHAR_PUNCTUATION,
  COMPARATOR_CHARS,
  COMBINING_CHARS,
  KNOWN_TWO_CHAR_OPERATORS,
} from './core/tokens';
export type { Token, TokenType, TokenOf, CharClass } from './core/tokens';

export {
  DEFAULT_SCANNER_OPTIONS,
  normalizeScannerOptions,
} from './core/options';
export type {
  ScannerOptions,
  NormalizedScannerOptions,
  DelimiterMode,
  UnterminatedBracketPolicy,
} from './core/options';

export {
  QueryError,
  isQueryError,
  computeLineAndColumn,
  buildSnippet,
} from './core/errors';
export type { QueryErrorCode, QueryErrorOptions } from './core/errors';

/////////////////////////////
// Filters                 //
/////////////////////////////

export {
  createFilterChain,
  applyFilters,
  dropTypes,
  keepWhere,
  mapValue,
  upperCaseWords,
} from './filters';
export type { TokenFilter, TokenFilterChain } from './filters';

/////////////////////////////
// Utilities               //
/////////////////////////////

export { formatQueryError, inspectTokens, joinTokens } from './utils/inspect';
export type { FormattedQueryError, InspectTokensOptions } from './utils/inspect';

export { validateStatement } from './utils/validation';
export type {
  IssueSeverity,
  IssueLocation,
  StatementIssue,
  StatementIssueCode,
  StatementValidationResult,
  StatementValidationStats,
} from './utils/validation';
