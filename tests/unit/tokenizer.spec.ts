// tests/unit/tokenizer.spec.ts
//
// Unit tests for the statement tokenizer.
//
// Focus areas:
//  - Each sub-scanner (numbers, strings, bracketed and bare identifiers).
//  - One- and two-character operators and punctuation.
//  - Delimiter and gap recording.
//  - Token offsets and immutability of the result.

import { describe, it, expect } from 'vitest';
import {
  tokenize,
  createToken,
  isIdentifierToken,
  isOperatorToken,
  isPunctToken,
  upperCaseAscii,
  QueryError,
} from '../../src';
import type { Token } from '../../src';

function lex(source: string): readonly Token[] {
  return tokenize(source).tokens;
}

function values(tokens: readonly Token[]): string[] {
  return tokens.map((t) => t.value);
}

function types(tokens: readonly Token[]): string[] {
  return tokens.map((t) => t.type);
}

function catchError(fn: () => unknown): QueryError {
  try {
    fn();
  } catch (err) {
    if (err instanceof QueryError) return err;
    throw err;
  }
  throw new Error('Expected a QueryError to be thrown');
}

// -----------------------------------------------------------------------------
// Numbers
// -----------------------------------------------------------------------------

describe('Tokenizer – numeric literals', () => {
  it('tokenizes integers, decimals and exponents', () => {
    const tokens = lex('0 42 3.14 1.5E10 2e3');

    expect(values(tokens)).toEqual(['0', '42', '3.14', '1.5E10', '2e3']);
    expect(types(tokens)).toEqual(['number', 'number', 'number', 'number', 'number']);
  });

  it('does not take a sign in the exponent', () => {
    expect(values(lex('1e-5'))).toEqual(['1e', '-', '5']);
    expect(values(lex('1E+5'))).toEqual(['1E', '+', '5']);
  });

  it('keeps a trailing dot only when more input follows', () => {
    expect(values(lex('10.'))).toEqual(['10', '.']);
    expect(values(lex('10.x'))).toEqual(['10.', 'x']);
    expect(values(lex('10. '))).toEqual(['10.']);
  });

  it('stops at a second dot', () => {
    expect(values(lex('3.14.15'))).toEqual(['3.14', '.', '15']);
  });

  it('splits a number from a following name', () => {
    expect(values(lex('12abc'))).toEqual(['12', 'abc']);
    expect(types(lex('12abc'))).toEqual(['number', 'identifier']);
    expect(values(lex('12e'))).toEqual(['12e']);
    expect(values(lex('1E5x'))).toEqual(['1E5', 'x']);
  });
});

// -----------------------------------------------------------------------------
// Strings
// -----------------------------------------------------------------------------

describe('Tokenizer – quoted strings', () => {
  it('keeps both quotes in the token', () => {
    const [single] = lex("'hello'");
    const [double] = lex('"a b"');

    expect(single).toEqual({ type: 'string', value: "'hello'", start: 0, end: 7 });
    expect(double.value).toBe('"a b"');
  });

  it('collapses a backslash-escaped opening quote', () => {
    const [token] = lex("'it\\'s'");

    expect(token.value).toBe("'it's'");
    expect(token.start).toBe(0);
    expect(token.end).toBe(7);

    expect(values(lex('"say \\"hi\\""'))).toEqual(['"say "hi""']);
  });

  it('keeps any other backslash literally', () => {
    expect(values(lex("'a\\nb'"))).toEqual(["'a\\nb'"]);
    expect(values(lex('"it\\\'s"'))).toEqual(['"it\\\'s"']);
  });

  it('treats the two quote kinds independently', () => {
    expect(values(lex(`"it's" 'say "x"'`))).toEqual([`"it's"`, `'say "x"'`]);
  });

  it('throws on an unterminated string', () => {
    const err = catchError(() => tokenize("'unterminated"));

    expect(err.code).toBe('E_UNTERMINATED_STRING');
    expect(err.message).toBe(
      "Syntax error: unterminated quoted string ''unterminated' in ''unterminated'",
    );
    expect(err.fragment).toBe("'unterminated");
    expect(err.source).toBe("'unterminated");
    expect(err.index).toBe(0);
  });

  it('treats an escaped closing quote at the end as unterminated', () => {
    const err = catchError(() => tokenize("'C:\\'"));

    expect(err.code).toBe('E_UNTERMINATED_STRING');
    expect(err.fragment).toBe("'C:'");
  });
});

// -----------------------------------------------------------------------------
// Bracketed identifiers
// -----------------------------------------------------------------------------

describe('Tokenizer – bracketed identifiers', () => {
  it('emits the whole bracketed name as one token', () => {
    const tokens = lex('[nt:base]');

    expect(tokens).toEqual([
      { type: 'quoted-identifier', value: '[nt:base]', start: 0, end: 9 },
    ]);
  });

  it('supports nested brackets', () => {
    expect(values(lex('[a[b]c] x'))).toEqual(['[a[b]c]', 'x']);
  });

  it('keeps characters that would otherwise split a name', () => {
    expect(values(lex('[my node-1 (copy)]'))).toEqual(['[my node-1 (copy)]']);
  });

  it('emits a stray closing bracket as punctuation', () => {
    const tokens = lex('[a]]');

    expect(values(tokens)).toEqual(['[a]', ']']);
    expect(types(tokens)).toEqual(['quoted-identifier', 'punct']);
  });

  it('throws on an unterminated bracketed identifier by default', () => {
    const err = catchError(() => tokenize('SELECT * FROM [nt:base'));

    expect(err.code).toBe('E_UNTERMINATED_IDENTIFIER');
    expect(err.message).toBe(
      "Syntax error: unterminated quoted identifier '[nt:base' in 'SELECT * FROM [nt:base'",
    );
    expect(err.fragment).toBe('[nt:base');
    expect(err.index).toBe(14);
    expect(err.note).toBe('Close the identifier with ].');
  });

  it('counts the missing closing brackets in the hint', () => {
    const err = catchError(() => tokenize('[a[b'));

    expect(err.note).toBe('Close the identifier with ]].');
  });

  it('drops an unterminated bracketed identifier when configured to ignore it', () => {
    const stream = tokenize('SELECT * FROM [nt:base', {
      unterminatedBrackets: 'ignore',
    });

    expect(values(stream.tokens)).toEqual(['SELECT', '*', 'FROM']);
    expect(stream.delimiters).toEqual([' ', ' ', ' ']);
  });
});

// -----------------------------------------------------------------------------
// Bare identifiers
// -----------------------------------------------------------------------------

describe('Tokenizer – identifiers', () => {
  it('reads names up to the next terminator', () => {
    const tokens = lex('SELECT foo_bar x1 über');

    expect(values(tokens)).toEqual(['SELECT', 'foo_bar', 'x1', 'über']);
    expect(types(tokens)).toEqual(['identifier', 'identifier', 'identifier', 'identifier']);
  });

  it('splits names at colons', () => {
    expect(values(lex('jcr:title'))).toEqual(['jcr', ':', 'title']);
  });

  it('does not stop at quotes or other symbols', () => {
    expect(values(lex("abc'def'"))).toEqual(["abc'def'"]);
    expect(values(lex('a$b#c@d'))).toEqual(['a$b#c@d']);
  });
});

// -----------------------------------------------------------------------------
// Operators & punctuation
// -----------------------------------------------------------------------------

describe('Tokenizer – operators & punctuation', () => {
  it('recognizes two-character operators without whitespace', () => {
    const tokens = lex('a<=b');

    expect(values(tokens)).toEqual(['a', '<=', 'b']);
    expect(types(tokens)).toEqual(['identifier', 'operator', 'identifier']);
  });

  it('recognizes every comparator pair', () => {
    expect(values(lex('a <> b != c >= d || e'))).toEqual([
      'a', '<>', 'b', '!=', 'c', '>=', 'd', '||', 'e',
    ]);
  });

  it('pairs any comparator with = | > without checking meaning', () => {
    expect(values(lex('a=>b'))).toEqual(['a', '=>', 'b']);
    expect(values(lex('a==b'))).toEqual(['a', '==', 'b']);
    expect(values(lex('x:=y'))).toEqual(['x', ':=', 'y']);
  });

  it('falls back to a single character', () => {
    expect(values(lex('a=<b'))).toEqual(['a', '=', '<', 'b']);
    expect(values(lex('a!'))).toEqual(['a', '!']);
    expect(types(lex('a!'))).toEqual(['identifier', 'operator']);
  });

  it('emits every punctuation character on its own', () => {
    const tokens = lex('(a,b);{c}+d%e?f/g-h*i.j');

    expect(values(tokens)).toEqual([
      '(', 'a', ',', 'b', ')', ';', '{', 'c', '}', '+', 'd', '%',
      'e', '?', 'f', '/', 'g', '-', 'h', '*', 'i', '.', 'j',
    ]);
    expect(tokens.filter((t) => t.type === 'punct')).toHaveLength(13);
  });
});

// -----------------------------------------------------------------------------
// Whitespace & delimiters
// -----------------------------------------------------------------------------

describe('Tokenizer – delimiters', () => {
  it('records each whitespace run verbatim', () => {
    const stream = tokenize(' SELECT  *\tFROM\n[nt:base] ');

    expect(values(stream.tokens)).toEqual(['SELECT', '*', 'FROM', '[nt:base]']);
    expect(stream.delimiters).toEqual([' ', '  ', '\t', '\n', ' ']);
    expect(stream.gaps).toEqual([' ', '  ', '\t', '\n']);
  });

  it('records nothing between adjacent tokens', () => {
    const stream = tokenize('a<=b');

    expect(stream.delimiters).toEqual([]);
    expect(stream.gaps).toEqual(['', '', '']);
  });

  it('keeps one gap per token', () => {
    const stream = tokenize('a=b  c');

    expect(stream.delimiters).toEqual(['  ']);
    expect(stream.gaps).toEqual(['', '', '', '  ']);
  });

  it('handles empty and blank statements', () => {
    expect(tokenize('')).toEqual({ source: '', tokens: [], delimiters: [], gaps: [] });
    expect(tokenize(' \r\n ').delimiters).toEqual([' \r\n ']);
    expect(tokenize(' \r\n ').tokens).toEqual([]);
  });
});

// -----------------------------------------------------------------------------
// Offsets & immutability
// -----------------------------------------------------------------------------

describe('Tokenizer – token offsets', () => {
  it('reports start and end offsets', () => {
    const tokens = lex('SELECT * FROM');

    expect(tokens.map((t) => [t.start, t.end])).toEqual([
      [0, 6],
      [7, 8],
      [9, 13],
    ]);
  });

  it('returns frozen lists', () => {
    const stream = tokenize('a = b');

    expect(Object.isFrozen(stream.tokens)).toBe(true);
    expect(Object.isFrozen(stream.delimiters)).toBe(true);
    expect(Object.isFrozen(stream.gaps)).toBe(true);
  });
});

describe('Tokenizer – token helpers', () => {
  it('builds tokens with createToken', () => {
    expect(createToken('identifier', 'a', 0, 1)).toEqual({
      type: 'identifier',
      value: 'a',
      start: 0,
      end: 1,
    });
  });

  it('tells token types apart', () => {
    const [name, op, star] = lex('a >= *');

    expect([isIdentifierToken(name), isOperatorToken(name), isPunctToken(name)]).toEqual([
      true,
      false,
      false,
    ]);
    expect(isOperatorToken(op)).toBe(true);
    expect(isPunctToken(star)).toBe(true);
    expect(isIdentifierToken(star)).toBe(false);
  });

  it('upper-cases ASCII letters only', () => {
    expect(upperCaseAscii('select [jcr:title] straße é')).toBe('SELECT [JCR:TITLE] STRAßE é');
  });
});
