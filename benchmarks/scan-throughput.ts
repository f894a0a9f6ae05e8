/**
 * benchmarks/scan-throughput.ts
 *
 * Micro-benchmark for the scanner: how many statements per second can be
 * tokenized, and how expensive the cursor walk on top of it is.
 *
 * This file is for local development only.
 *
 * How to run:
 *   npm run bench
 *   # or
 *   npx tsx benchmarks/scan-throughput.ts
 */

import { createScanner, tokenize } from '../src';

type BenchmarkCase = {
  name: string;
  statement: string;
  iterations: number;
};

const CASES: BenchmarkCase[] = [
  {
    name: 'Select all',
    statement: 'SELECT * FROM [nt:base]',
    iterations: 200_000,
  },
  {
    name: 'Constraint with literals',
    statement:
      "SELECT [jcr:title] FROM [nt:unstructured] AS n WHERE n.[size] >= 1.5E3 AND n.[label] <> 'it\\'s'",
    iterations: 100_000,
  },
  {
    name: 'Join with ordering',
    statement:
      'SELECT a.*, b.* FROM [nt:folder] AS a INNER JOIN [nt:file] AS b ON ISCHILDNODE(b, a) ' +
      "WHERE LOWER(b.[jcr:name]) LIKE '%.txt' ORDER BY b.[jcr:created] DESC",
    iterations: 50_000,
  },
];

// Keeps the loops from being optimized away.
let sink = 0;

function nowMs(): number {
  return performance.now();
}

function formatNumber(n: number): string {
  return n.toLocaleString(undefined, { maximumFractionDigits: 2 });
}

type ResultRow = {
  name: string;
  iterations: number;
  tokenizeMs: number;
  cursorMs: number;
};

function runBenchmark(): void {
  console.log('=== Scanner throughput ===');
  console.log();

  const results: ResultRow[] = [];

  for (const { name, statement, iterations } of CASES) {
    for (let i = 0; i < 5_000; i++) {
      sink ^= tokenize(statement).tokens.length;
    }

    const tokenizeStart = nowMs();
    for (let i = 0; i < iterations; i++) {
      sink ^= tokenize(statement).tokens.length;
    }
    const tokenizeMs = nowMs() - tokenizeStart;

    const cursorStart = nowMs();
    for (let i = 0; i < iterations; i++) {
      const scanner = createScanner(statement);
      while (scanner.consume() !== '') {
        sink ^= scanner.position;
      }
    }
    const cursorMs = nowMs() - cursorStart;

    results.push({ name, iterations, tokenizeMs, cursorMs });
  }

  console.log('Ignore (sink):', sink);
  console.log();

  printSummary(results);
}

function printSummary(rows: ResultRow[]): void {
  const header = [
    pad('Case', 28),
    pad('Iterations', 12),
    pad('tokenize ms', 14),
    pad('scan+walk ms', 14),
    pad('statements/s', 14),
  ].join(' | ');

  console.log(header);
  console.log('-'.repeat(header.length));

  for (const row of rows) {
    const perSecond =
      row.tokenizeMs > 0 ? (row.iterations / row.tokenizeMs) * 1000 : NaN;
    console.log(
      [
        pad(row.name, 28),
        pad(formatNumber(row.iterations), 12),
        pad(formatNumber(row.tokenizeMs), 14),
        pad(formatNumber(row.cursorMs), 14),
        pad(Number.isFinite(perSecond) ? formatNumber(perSecond) : 'N/A', 14),
      ].join(' | '),
    );
  }
}

function pad(value: string, width: number): string {
  if (value.length >= width) return value.slice(0, width);
  return value + ' '.repeat(width - value.length);
}

runBenchmark();
