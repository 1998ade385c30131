import { PredictionField } from '../enums/index.js';

export const SUMMARY_START_MARKER = '---SUMMARY---';
export const SUMMARY_END_MARKER = '---END---';

// Label the model writes in the summary block for each prediction field
export const SUMMARY_LABELS: Readonly<Record<PredictionField, string>> = {
  [PredictionField.OPTIMAL_STRATEGY]: 'optimal_strategy',
  [PredictionField.SOLVED_UNKNOWN]: 'solved_unknown',
  [PredictionField.CORRECT_FINAL_ANSWER]: 'correct_final_answer',
};

export const INPUT_COLUMNS = [
  'student_id',
  'cluster_number',
  'problem_text',
  'correct_strategy',
  'correct_unknown',
  'correct_answer',
] as const;

// Column order of the results file. The gemini_* names are the established
// contract read by downstream analysis notebooks.
export const RESULT_COLUMNS = [
  'student_id',
  'problem_number',
  'problem_text',
  'cluster_number',
  'gemini_optimal_strategy',
  'gemini_solved_unknown',
  'gemini_correct_answer',
  'correct_strategy',
  'correct_unknown',
  'correct_answer',
  'strategy_match',
  'unknown_match',
  'answer_match',
  'gemini_raw_response',
] as const;

export type InputColumn = (typeof INPUT_COLUMNS)[number];
export type ResultColumn = (typeof RESULT_COLUMNS)[number];
