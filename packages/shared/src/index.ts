// Enums
export { Verdict, TurnRole, PredictionField, ErrorCode } from './enums/index.js';

// Constants
export {
  SUMMARY_START_MARKER,
  SUMMARY_END_MARKER,
  SUMMARY_LABELS,
  INPUT_COLUMNS,
  RESULT_COLUMNS,
} from './constants/simulation.constants.js';
export type { InputColumn, ResultColumn } from './constants/simulation.constants.js';

// Schemas
export { outcomeSchema, problemRecordRowSchema } from './schemas/problem.schema.js';

export {
  verdictSchema,
  predictionSchema,
  resultRowSchema,
  resultCsvRowSchema,
} from './schemas/result.schema.js';

// Types
export type {
  Outcome,
  ProblemRecord,
  GroundTruth,
  Prediction,
  ResultRow,
  Turn,
} from './types/index.js';
