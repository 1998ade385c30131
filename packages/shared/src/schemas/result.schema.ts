import { z } from 'zod';
import { Verdict } from '../enums/index.js';
import { outcomeSchema } from './problem.schema.js';

export const verdictSchema = z.nativeEnum(Verdict);

export const predictionSchema = z.object({
  optimalStrategy: verdictSchema,
  solvedUnknown: verdictSchema,
  correctFinalAnswer: verdictSchema,
  rawResponse: z.string(),
});

export const resultRowSchema = z.object({
  studentId: z.string().min(1),
  problemNumber: z.number().int().positive(),
  problemText: z.string(),
  clusterNumber: z.string(),
  predictedOptimalStrategy: verdictSchema,
  predictedSolvedUnknown: verdictSchema,
  predictedCorrectAnswer: verdictSchema,
  correctStrategy: outcomeSchema,
  correctUnknown: outcomeSchema,
  correctAnswer: outcomeSchema,
  strategyMatch: z.boolean(),
  unknownMatch: z.boolean(),
  answerMatch: z.boolean(),
  rawResponse: z.string(),
});

// Results file cells

const csvVerdictSchema = z.string().trim().toLowerCase().pipe(verdictSchema);

const csvBooleanSchema = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(['true', 'false']))
  .transform((value) => value === 'true');

export const resultCsvRowSchema = z
  .object({
    student_id: z.string(),
    problem_number: z.coerce.number(),
    problem_text: z.string(),
    cluster_number: z.string(),
    gemini_optimal_strategy: csvVerdictSchema,
    gemini_solved_unknown: csvVerdictSchema,
    gemini_correct_answer: csvVerdictSchema,
    correct_strategy: z.string(),
    correct_unknown: z.string(),
    correct_answer: z.string(),
    strategy_match: csvBooleanSchema,
    unknown_match: csvBooleanSchema,
    answer_match: csvBooleanSchema,
    gemini_raw_response: z.string(),
  })
  .transform((row) => ({
    studentId: row.student_id,
    problemNumber: row.problem_number,
    problemText: row.problem_text,
    clusterNumber: row.cluster_number,
    predictedOptimalStrategy: row.gemini_optimal_strategy,
    predictedSolvedUnknown: row.gemini_solved_unknown,
    predictedCorrectAnswer: row.gemini_correct_answer,
    correctStrategy: row.correct_strategy,
    correctUnknown: row.correct_unknown,
    correctAnswer: row.correct_answer,
    strategyMatch: row.strategy_match,
    unknownMatch: row.unknown_match,
    answerMatch: row.answer_match,
    rawResponse: row.gemini_raw_response,
  }))
  .pipe(resultRowSchema);
