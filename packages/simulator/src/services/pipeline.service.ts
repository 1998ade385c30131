import pino from 'pino';
import type { ErrorCode, ProblemRecord, ResultRow } from '@student-sim/shared';
import { ConversationSession } from './conversation.service.js';
import { evaluateStudent } from './evaluation.service.js';
import type { ModelCapability } from './llm.service.js';
import type { ResultSink } from './results.service.js';
import { ModelError, ValidationError } from '../utils/errors.js';

const logger = pino({ name: 'pipeline.service' });

export interface StudentGroup {
  studentId: string;
  records: ProblemRecord[];
}

export interface StudentFailure {
  studentId: string;
  /** Problem whose model call failed; earlier rows for the student were kept. */
  problemNumber: number | null;
  code: ErrorCode;
  message: string;
  /** Student, problem and the model-side cause of the failure. */
  details: unknown;
}

export interface PipelineResult {
  rows: ResultRow[];
  failures: StudentFailure[];
  studentCount: number;
}

export interface RunPipelineParams {
  records: readonly ProblemRecord[];
  model: ModelCapability;
  sink: ResultSink;
  systemPrompt?: string;
}

/**
 * Groups records by student, in order of each student's first appearance.
 * Records keep their input order within a group, even when a student's rows
 * are not contiguous.
 */
export const groupByStudent = (records: readonly ProblemRecord[]): StudentGroup[] => {
  const groups = new Map<string, ProblemRecord[]>();
  for (const record of records) {
    const existing = groups.get(record.studentId);
    if (existing) {
      existing.push(record);
    } else {
      groups.set(record.studentId, [record]);
    }
  }
  return [...groups].map(([studentId, grouped]) => ({ studentId, records: grouped }));
};

const failedProblemNumber = (details: unknown): number | null => {
  if (typeof details === 'object' && details !== null && 'problemNumber' in details) {
    return typeof details.problemNumber === 'number' ? details.problemNumber : null;
  }
  return null;
};

/**
 * Runs every student through a fresh conversation, one student at a time.
 *
 * Rows reach the sink as soon as they are scored. A ModelError ends only the
 * student it happened on; it is logged, recorded in `failures`, and the run
 * moves on to the next student. Any other error ends the run.
 */
export const runPipeline = async (params: RunPipelineParams): Promise<PipelineResult> => {
  const { records, model, sink, systemPrompt } = params;

  if (records.length === 0) {
    throw new ValidationError('No problems to evaluate');
  }

  const students = groupByStudent(records);
  const rows: ResultRow[] = [];
  const failures: StudentFailure[] = [];

  logger.info({ students: students.length, problems: records.length }, 'Pipeline started');

  for (const [index, student] of students.entries()) {
    logger.info(
      { studentId: student.studentId, position: index + 1, of: students.length },
      'Evaluating student',
    );

    const session = new ConversationSession(model, systemPrompt);
    try {
      await evaluateStudent({
        records: student.records,
        session,
        onRow: (row) => {
          sink.append(row);
          rows.push(row);
        },
      });
    } catch (err) {
      if (!(err instanceof ModelError)) throw err;

      const problemNumber = failedProblemNumber(err.details);
      logger.error(
        { studentId: student.studentId, problemNumber, details: err.details },
        'Student aborted after model failure',
      );
      failures.push({
        studentId: student.studentId,
        problemNumber,
        code: err.code,
        message: err.message,
        details: err.details,
      });
    }
  }

  logger.info(
    { rows: rows.length, failedStudents: failures.length },
    'Pipeline finished',
  );

  return { rows, failures, studentCount: students.length };
};
