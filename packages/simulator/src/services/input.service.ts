import * as fs from 'fs';
import pino from 'pino';
import { INPUT_COLUMNS, problemRecordRowSchema, type ProblemRecord } from '@student-sim/shared';
import { missingColumns, parseCsv } from '../utils/csv.utils.js';
import { ValidationError } from '../utils/errors.js';

const logger = pino({ name: 'input.service' });

export interface RowIssue {
  /** 1-based data row, not counting the header */
  row: number;
  errors: string[];
}

/**
 * Parses and validates the input table. Every problem is reported at once,
 * and nothing is returned unless the whole table is valid.
 */
export const parseProblemTable = (csvText: string): ProblemRecord[] => {
  const { fields, rows } = parseCsv(csvText);

  const missing = missingColumns(fields, INPUT_COLUMNS);
  if (missing.length > 0) {
    throw new ValidationError(`Missing required column(s): ${missing.join(', ')}`, { missing });
  }
  if (rows.length === 0) {
    throw new ValidationError('Input table has no rows');
  }

  const records: ProblemRecord[] = [];
  const issues: RowIssue[] = [];

  rows.forEach((row, index) => {
    const result = problemRecordRowSchema.safeParse(row);
    if (result.success) {
      records.push(result.data);
    } else {
      issues.push({
        row: index + 1,
        errors: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
    }
  });

  if (issues.length > 0) {
    throw new ValidationError(`${issues.length} invalid row(s) in input table`, { issues });
  }

  return records;
};

export const loadProblemRecords = (filePath: string): ProblemRecord[] => {
  let text: string;
  try {
    text = fs.readFileSync(filePath, 'utf-8');
  } catch (err) {
    throw new ValidationError(`Cannot read input file ${filePath}`, {
      reason: err instanceof Error ? err.message : String(err),
    });
  }

  const records = parseProblemTable(text);
  logger.info({ filePath, records: records.length }, 'Input table loaded');
  return records;
};
