import pino from 'pino';
import {
  Verdict,
  type GroundTruth,
  type Outcome,
  type Prediction,
  type ProblemRecord,
  type ResultRow,
} from '@student-sim/shared';
import type { ConversationSession } from './conversation.service.js';
import { parseSummary } from '../utils/summary.utils.js';
import { ModelError, SessionStateError } from '../utils/errors.js';

const logger = pino({ name: 'evaluation.service' });

export interface MatchFlags {
  strategyMatch: boolean;
  unknownMatch: boolean;
  answerMatch: boolean;
}

export type OnRowCallback = (row: ResultRow) => void;

export interface EvaluateStudentParams {
  /** One student's records, in input order. */
  records: readonly ProblemRecord[];
  session: ConversationSession;
  onRow: OnRowCallback;
}

// --- Pure helpers ---

// UNKNOWN never matches, so a parse failure always scores as a miss
const matches = (predicted: Verdict, truth: Outcome): boolean =>
  predicted !== Verdict.UNKNOWN && predicted === truth;

export const scorePrediction = (prediction: Prediction, record: ProblemRecord): MatchFlags => ({
  strategyMatch: matches(prediction.optimalStrategy, record.correctStrategy),
  unknownMatch: matches(prediction.solvedUnknown, record.correctUnknown),
  answerMatch: matches(prediction.correctFinalAnswer, record.correctAnswer),
});

export const toGroundTruth = (record: ProblemRecord): GroundTruth => ({
  strategy: record.correctStrategy,
  unknown: record.correctUnknown,
  answer: record.correctAnswer,
});

export const buildResultRow = (
  record: ProblemRecord,
  problemNumber: number,
  prediction: Prediction,
): ResultRow => ({
  studentId: record.studentId,
  problemNumber,
  problemText: record.problemText,
  clusterNumber: record.clusterNumber,
  predictedOptimalStrategy: prediction.optimalStrategy,
  predictedSolvedUnknown: prediction.solvedUnknown,
  predictedCorrectAnswer: prediction.correctFinalAnswer,
  correctStrategy: record.correctStrategy,
  correctUnknown: record.correctUnknown,
  correctAnswer: record.correctAnswer,
  ...scorePrediction(prediction, record),
  rawResponse: prediction.rawResponse,
});

// --- Public service functions ---

/**
 * Walks one student's problems through their conversation session.
 *
 * Each row is handed to onRow as soon as it is scored, before feedback for
 * that problem is recorded. A failing model call stops the student with a
 * ModelError that names the problem; rows already handed over stay handed over.
 */
export const evaluateStudent = async (params: EvaluateStudentParams): Promise<ResultRow[]> => {
  const { records, session, onRow } = params;
  const rows: ResultRow[] = [];

  for (const [index, record] of records.entries()) {
    const problemNumber = index + 1;
    logger.info(
      { studentId: record.studentId, problemNumber, total: records.length },
      'Posing problem',
    );

    let reply: string;
    try {
      reply = await session.pose(record.problemText);
    } catch (err) {
      if (err instanceof SessionStateError) throw err;
      throw new ModelError(`Model call failed on problem ${problemNumber}`, {
        studentId: record.studentId,
        problemNumber,
        reason: err instanceof Error ? err.message : String(err),
        ...(err instanceof ModelError ? { cause: err.details } : {}),
      });
    }

    const row = buildResultRow(record, problemNumber, parseSummary(reply));
    onRow(row);
    rows.push(row);

    if (problemNumber < records.length) {
      session.feedback(toGroundTruth(record));
    }
  }

  return rows;
};
