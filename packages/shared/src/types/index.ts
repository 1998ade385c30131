import type { z } from 'zod';
import type { TurnRole } from '../enums/index.js';

// Problems
import type { outcomeSchema, problemRecordRowSchema } from '../schemas/problem.schema.js';

export type Outcome = z.infer<typeof outcomeSchema>;
export type ProblemRecord = z.output<typeof problemRecordRowSchema>;

export interface GroundTruth {
  strategy: Outcome;
  unknown: Outcome;
  answer: Outcome;
}

// Results
import type { predictionSchema, resultRowSchema } from '../schemas/result.schema.js';

export type Prediction = z.infer<typeof predictionSchema>;
export type ResultRow = z.infer<typeof resultRowSchema>;

// Conversation
export interface Turn {
  readonly role: TurnRole;
  readonly text: string;
}
