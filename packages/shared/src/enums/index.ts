export enum Verdict {
  YES = 'yes',
  NO = 'no',
  UNKNOWN = 'unknown',
}

export enum TurnRole {
  SYSTEM = 'system',
  USER = 'user',
  MODEL = 'model',
}

export enum PredictionField {
  OPTIMAL_STRATEGY = 'optimalStrategy',
  SOLVED_UNKNOWN = 'solvedUnknown',
  CORRECT_FINAL_ANSWER = 'correctFinalAnswer',
}

export enum ErrorCode {
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  MODEL_ERROR = 'MODEL_ERROR',
  SESSION_STATE_ERROR = 'SESSION_STATE_ERROR',
}
