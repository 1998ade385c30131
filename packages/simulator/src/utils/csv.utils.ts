import Papa from 'papaparse';
import { ValidationError } from './errors.js';
import { sanitizeCell } from './sanitize.utils.js';

export interface CsvTable {
  fields: string[];
  rows: Record<string, string>[];
}

/**
 * Parses comma-separated text with a header row into string records.
 * Blank lines are skipped. Structural problems (unbalanced quotes, rows with
 * the wrong number of cells) are reported together as one ValidationError.
 */
export const parseCsv = (text: string): CsvTable => {
  const result = Papa.parse<Record<string, string>>(text, {
    header: true,
    delimiter: ',',
    skipEmptyLines: true,
    transformHeader: (header) => sanitizeCell(header).trim(),
    transform: (value) => sanitizeCell(value),
  });

  if (result.errors.length > 0) {
    throw new ValidationError('Malformed CSV', {
      errors: result.errors.map((e) => ({ row: e.row, message: e.message })),
    });
  }

  return { fields: result.meta.fields ?? [], rows: result.data };
};

export const missingColumns = (fields: readonly string[], required: readonly string[]): string[] =>
  required.filter((column) => !fields.includes(column));

// One CSV line, newline-terminated, quoted where needed
export const toCsvLine = (values: readonly string[]): string => `${Papa.unparse([[...values]])}\n`;
