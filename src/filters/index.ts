/**
 * Token filters
 *
 * A token filter is a small, composable step over already-classified tokens:
 *
 *   type TokenFilter = (token: Token) => Token | null;
 *
 * It either returns a (possibly rewritten) token or `null` to drop it.
 * Filters are chained left-to-right; the chain stops at the first `null`.
 *
 * Example:
 *
 *   const chain = createFilterChain(
 *     dropTypes('punct'),
 *     upperCaseWords(['select', 'from', 'where']),
 *   );
 *
 *   const kept = chain.apply(tokenize("select * from [nt:base]").tokens);
 *   // → SELECT, FROM, [nt:base]
 *
 * License: Apache-2.0
 */

import { createToken, isIdentifierToken, upperCaseAscii } from '../core/tokens';
import type { Token, TokenType } from '../core/tokens';

export type TokenFilter = (token: Token) => Token | null;

/////////////////////////////
// Filter chain            //
/////////////////////////////

export interface TokenFilterChain {
  /**
   * The filters of this chain, in application order.
   */
  readonly filters: readonly TokenFilter[];

  /**
   * Append a filter. Returns the chain for fluent use.
   */
  add(filter: TokenFilter): TokenFilterChain;

  /**
   * Run one token through every filter.
   * An empty chain returns the token unchanged.
   */
  filter(token: Token): Token | null;

  /**
   * Run a list of tokens through the chain, keeping the survivors.
   */
  apply(tokens: readonly Token[]): Token[];
}

export function createFilterChain(...initial: TokenFilter[]): TokenFilterChain {
  const filters: TokenFilter[] = [...initial];

  const chain: TokenFilterChain = {
    filters,
    add(filter) {
      filters.push(filter);
      return chain;
    },
    filter(token) {
      let current: Token | null = token;
      for (const step of filters) {
        current = step(current);
        if (current === null) return null;
      }
      return current;
    },
    apply(tokens) {
      const out: Token[] = [];
      for (const token of tokens) {
        const kept = chain.filter(token);
        if (kept !== null) out.push(kept);
      }
      return out;
    },
  };

  return chain;
}

/**
 * One-shot form of `createFilterChain(...filters).apply(tokens)`.
 */
export function applyFilters(
  tokens: readonly Token[],
  ...filters: TokenFilter[]
): Token[] {
  return createFilterChain(...filters).apply(tokens);
}

/////////////////////////////
// Built-in filters        //
/////////////////////////////

/**
 * Drop every token of the given types.
 */
export function dropTypes(...types: TokenType[]): TokenFilter {
  return (token) => (types.includes(token.type) ? null : token);
}

/**
 * Keep only tokens matching `predicate`.
 */
export function keepWhere(predicate: (token: Token) => boolean): TokenFilter {
  return (token) => (predicate(token) ? token : null);
}

/**
 * Rewrite token values. Type and offsets are kept.
 */
export function mapValue(fn: (value: string, token: Token) => string): TokenFilter {
  return (token) => createToken(token.type, fn(token.value, token), token.start, token.end);
}

/**
 * Upper-case identifier tokens found in `words`, ignoring ASCII case.
 * Other tokens pass through untouched.
 */
export function upperCaseWords(words: readonly string[]): TokenFilter {
  const known = new Set(words.map(upperCaseAscii));
  return (token) => {
    if (!isIdentifierToken(token)) return token;
    const upper = upperCaseAscii(token.value);
    return known.has(upper) ? createToken(token.type, upper, token.start, token.end) : token;
  };
}
