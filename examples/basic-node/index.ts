/**
 * examples/basic-node/index.ts
 *
 * Minimal Node.js example showing how a parser drives the scanner:
 *  - `lookahead` to decide which rule applies,
 *  - `consume` to take tokens,
 *  - `expect` / `expectSequence` to assert fixed keywords,
 *  - `formatQueryError` to report failures.
 *
 * It reads a small subset of JCR-SQL2:
 *
 *   SELECT <column> [, <column>]* FROM <selector> [AS <name>]
 *     [WHERE <property> <op> <literal> [AND <property> <op> <literal>]*]
 *
 * How to run (from repo root):
 *   npx tsx examples/basic-node/index.ts
 */

import { createScanner, formatQueryError, isQueryError } from '../../src'; // 'jcr-sql2-scanner' in external projects
import type { Scanner } from '../../src';

type Comparison = {
  property: string;
  operator: string;
  literal: string;
};

type SimpleQuery = {
  columns: string[];
  selector: string;
  alias?: string;
  where: Comparison[];
};

const OPERATORS = ['=', '<>', '!=', '<', '<=', '>', '>=', 'LIKE'];

function parse(statement: string): SimpleQuery {
  const scanner = createScanner(statement);

  scanner.expect('SELECT');
  const columns = [scanner.consume()];
  while (scanner.lookahead() === ',') {
    scanner.consume();
    columns.push(scanner.consume());
  }

  scanner.expect('FROM');
  const query: SimpleQuery = { columns, selector: scanner.consume(), where: [] };

  if (scanner.tokensEqual(scanner.lookahead(), 'AS')) {
    scanner.consume();
    query.alias = scanner.consume();
  }

  if (scanner.tokensEqual(scanner.lookahead(), 'WHERE')) {
    scanner.consume();
    query.where.push(parseComparison(scanner));
    while (scanner.tokensEqual(scanner.lookahead(), 'AND')) {
      scanner.consume();
      query.where.push(parseComparison(scanner));
    }
  }

  if (!scanner.isAtEnd()) {
    // Reports "Expected '', found '<token>'".
    scanner.expect('');
  }

  return query;
}

function parseComparison(scanner: Scanner): Comparison {
  let property = scanner.consume();
  // selector.[prop] arrives as three tokens
  if (scanner.lookahead() === '.') {
    property += scanner.consume() + scanner.consume();
  }

  if (!OPERATORS.some((op) => scanner.tokensEqual(op, scanner.lookahead()))) {
    scanner.expect('=');
  }
  const operator = scanner.consume();

  return { property, operator, literal: scanner.consume() };
}

const statements = [
  'SELECT * FROM [nt:base]',
  "SELECT [jcr:title], [jcr:created] FROM [nt:unstructured] AS n WHERE n.[size] >= 10 AND n.[label] = 'it\\'s'",
  "SELECT * FROM [nt:base] WHERE title = 'unterminated",
  'SELECT * FORM [nt:base]',
];

for (const statement of statements) {
  console.log(`> ${statement}`);
  try {
    console.log(JSON.stringify(parse(statement), null, 2));
  } catch (err) {
    if (!isQueryError(err)) throw err;
    console.log(formatQueryError(err).detail);
  }
  console.log();
}
