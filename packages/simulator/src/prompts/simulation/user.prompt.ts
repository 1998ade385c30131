import type { GroundTruth } from '@student-sim/shared';
import { sanitizeForPrompt } from '../../utils/sanitize.utils.js';

export const NO_PROBLEM_TEXT = '[No problem text provided]';

/**
 * Builds the user-role message that poses one problem.
 * An empty or whitespace-only statement is replaced with a sentinel so the
 * model is never sent an empty user turn.
 */
export const buildProblemMessage = (problemText: string): string => {
  const text = sanitizeForPrompt(problemText);
  return text ? text : NO_PROBLEM_TEXT;
};

/**
 * Builds the feedback turn recorded after a problem. The wording is fixed:
 * results are compared across runs, so it must not drift.
 */
export const buildFeedbackMessage = (truth: GroundTruth): string =>
  [
    'Here is the correct information for this problem:',
    `- The student used the optimal strategy: ${truth.strategy}`,
    `- The student solved for the unknown with no errors: ${truth.unknown}`,
    `- The student obtained the correct final answer with no errors: ${truth.answer}`,
    "Use this to adjust your reasoning for the next problem based on the student's learning trajectory.",
  ].join('\n');
