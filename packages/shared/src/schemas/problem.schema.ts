import { z } from 'zod';
import { Verdict } from '../enums/index.js';

// Ground-truth cells hold the literal tokens yes/no; spreadsheets often
// capitalise them or leave trailing spaces.
export const outcomeSchema = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(
    z.union([z.literal(Verdict.YES), z.literal(Verdict.NO)], {
      errorMap: () => ({ message: "Expected 'yes' or 'no'" }),
    }),
  );

// One row of the input table, as read from CSV (all cells are strings)
export const problemRecordRowSchema = z
  .object({
    student_id: z.string().trim().min(1, 'student_id is required'),
    cluster_number: z.string().trim(),
    problem_text: z.string(),
    correct_strategy: outcomeSchema,
    correct_unknown: outcomeSchema,
    correct_answer: outcomeSchema,
  })
  .transform((row) => ({
    studentId: row.student_id,
    clusterNumber: row.cluster_number,
    problemText: row.problem_text,
    correctStrategy: row.correct_strategy,
    correctUnknown: row.correct_unknown,
    correctAnswer: row.correct_answer,
  }));
