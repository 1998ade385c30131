import 'dotenv/config';
import type { ResultRow } from '@student-sim/shared';
import { env } from '../src/config/env.js';
import { formatSummary, summarizeResults } from '../src/services/report.service.js';
import { loadResultRows } from '../src/services/results.service.js';
import { readFlag } from '../src/utils/args.utils.js';
import { AppError } from '../src/utils/errors.js';

// Prints the accuracy table for an existing results file.
// Usage: npm run summary -- --file=evaluation_results.csv

function readRows(filePath: string): ResultRow[] {
  try {
    return loadResultRows(filePath);
  } catch (err) {
    if (!(err instanceof AppError)) throw err;
    process.stderr.write(`Error: ${err.message}\n`);
    if (err.details !== undefined) {
      process.stderr.write(`${JSON.stringify(err.details, null, 2)}\n`);
    }
    process.exit(1);
  }
}

function main(): void {
  const filePath = readFlag(process.argv.slice(2), 'file') ?? env.OUTPUT_PATH;
  const rows = readRows(filePath);

  process.stdout.write(`\n${filePath}\n\n`);
  process.stdout.write(formatSummary(summarizeResults(rows)));
}

main();
