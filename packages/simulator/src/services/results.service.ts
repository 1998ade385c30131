import * as fs from 'fs';
import * as path from 'path';
import {
  RESULT_COLUMNS,
  resultCsvRowSchema,
  type ResultColumn,
  type ResultRow,
} from '@student-sim/shared';
import { missingColumns, parseCsv, toCsvLine } from '../utils/csv.utils.js';
import { ValidationError } from '../utils/errors.js';
import type { RowIssue } from './input.service.js';

/**
 * Destination for result rows. append() must have made the row durable by
 * the time it returns; the pipeline calls it once per row, in order.
 */
export interface ResultSink {
  append(row: ResultRow): void;
}

export const toResultRecord = (row: ResultRow): Record<ResultColumn, string> => ({
  student_id: row.studentId,
  problem_number: String(row.problemNumber),
  problem_text: row.problemText,
  cluster_number: row.clusterNumber,
  gemini_optimal_strategy: row.predictedOptimalStrategy,
  gemini_solved_unknown: row.predictedSolvedUnknown,
  gemini_correct_answer: row.predictedCorrectAnswer,
  correct_strategy: row.correctStrategy,
  correct_unknown: row.correctUnknown,
  correct_answer: row.correctAnswer,
  strategy_match: String(row.strategyMatch),
  unknown_match: String(row.unknownMatch),
  answer_match: String(row.answerMatch),
  gemini_raw_response: row.rawResponse,
});

/**
 * Writes results as CSV. The header is written when the writer is created
 * (replacing any earlier file); every append() adds one line synchronously,
 * so an interrupted run leaves all completed rows on disk.
 */
export class CsvResultWriter implements ResultSink {
  constructor(readonly filePath: string) {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, toCsvLine(RESULT_COLUMNS));
  }

  append(row: ResultRow): void {
    const record = toResultRecord(row);
    fs.appendFileSync(this.filePath, toCsvLine(RESULT_COLUMNS.map((column) => record[column])));
  }
}

export class MemoryResultSink implements ResultSink {
  readonly rows: ResultRow[] = [];

  append(row: ResultRow): void {
    this.rows.push(row);
  }
}

// --- Reading results back ---

export const parseResultTable = (csvText: string): ResultRow[] => {
  const { fields, rows } = parseCsv(csvText);

  const missing = missingColumns(fields, RESULT_COLUMNS);
  if (missing.length > 0) {
    throw new ValidationError(`Missing result column(s): ${missing.join(', ')}`, { missing });
  }

  const results: ResultRow[] = [];
  const issues: RowIssue[] = [];

  rows.forEach((row, index) => {
    const parsed = resultCsvRowSchema.safeParse(row);
    if (parsed.success) {
      results.push(parsed.data);
    } else {
      issues.push({
        row: index + 1,
        errors: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
    }
  });

  if (issues.length > 0) {
    throw new ValidationError(`${issues.length} invalid row(s) in results file`, { issues });
  }

  return results;
};

export const loadResultRows = (filePath: string): ResultRow[] => {
  let text: string;
  try {
    text = fs.readFileSync(filePath, 'utf-8');
  } catch (err) {
    throw new ValidationError(`Cannot read results file ${filePath}`, {
      reason: err instanceof Error ? err.message : String(err),
    });
  }
  return parseResultTable(text);
};
