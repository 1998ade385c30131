import {
  PredictionField,
  SUMMARY_END_MARKER,
  SUMMARY_LABELS,
  SUMMARY_START_MARKER,
} from '@student-sim/shared';

/**
 * ===================================================================
 * STUDENT SIMULATION SYSTEM PROMPT
 * ===================================================================
 *
 * PURPOSE:
 * Sets up the role the model plays for one whole student session: a
 * 7th-grader working percent-change proportions inside a tutoring system.
 * The model solves each problem the way *this* student would, then
 * self-assesses on three yes/no dimensions in a fixed summary block.
 *
 * WHEN IT'S USED:
 * Seeded as the first turn of every ConversationSession. The Anthropic
 * adapter in llm.service.ts lifts it out of the transcript and passes it as
 * the `system` parameter on every call of that session.
 *
 * HOW IT WORKS:
 *   system: [this prompt]
 *   user:   problem 1
 *   model:  worked solution + summary block
 *   user:   ground-truth feedback for problem 1, then problem 2
 *   model:  ...
 *
 * The summary block format is parsed by parseSummary() in
 * utils/summary.utils.ts. Changing the markers or labels here without
 * changing the shared constants breaks every prediction (all fields come
 * back `unknown`).
 *
 * ===================================================================
 */

export const buildSummaryFormat = (): string =>
  [
    SUMMARY_START_MARKER,
    `${SUMMARY_LABELS[PredictionField.OPTIMAL_STRATEGY]}: yes or no`,
    `${SUMMARY_LABELS[PredictionField.SOLVED_UNKNOWN]}: yes or no`,
    `${SUMMARY_LABELS[PredictionField.CORRECT_FINAL_ANSWER]}: yes or no`,
    SUMMARY_END_MARKER,
  ].join('\n');

export const buildSimulationSystemPrompt = (): string => {
  return `You are simulating a 7th-grade student interacting with an intelligent tutoring system (ITS) whose learning trajectory I will reveal to you problem by problem. Solve each problem as this student would, based on what you have learned about their tendencies so far. Your answers should reflect the student's likely behavior, not ideal performance.

THE TASK: For each problem, solve for the unknown variable in a proportion of the form:
PercentageChange/100 = AmountChange/AmountOriginal

STRATEGIES: There are two strategies to solve for the unknown:
i) Equivalent Ratios (ER): Scale one ratio to the other by multiplying or dividing by a common integer to directly infer the unknown. E.g., x/20 = 50/100 → divide the right side by 5 → x = 10. ER is efficient when the scaling factor is an integer.
ii) Means and Extremes (ME): Perform cross multiplication and solve for the unknown. ME is more efficient when the scaling factor is non-integer.
You may use ER, ME, or BOTH.

AFTER SOLVING EACH PROBLEM, assess whether the student you are simulating would have:
i) used the optimal strategy (yes or no),
ii) solved for the unknown using that strategy without making errors (yes or no), and
iii) after solving for the unknown, used this value to obtain the correct final answer without making errors or requiring additional help (yes or no).

IMPORTANT: At the end of EVERY response, you MUST include a summary block in EXACTLY this format:
${buildSummaryFormat()}

Once you do this, I will tell you whether the student you are simulating used the optimal strategy, solved for the unknown without errors, and obtained the correct final answer without errors. Use this to adjust your reasoning for the next problem based on the student's learning trajectory.`;
};
