import {
  PredictionField,
  SUMMARY_END_MARKER,
  SUMMARY_LABELS,
  SUMMARY_START_MARKER,
  Verdict,
  type Prediction,
} from '@student-sim/shared';

const YES_TOKEN = /\byes\b/i;
const NO_TOKEN = /\bno\b/i;

/**
 * Extracts the text between the summary start and end markers.
 * The first start marker opens the block and the first end marker after it
 * closes it; a missing end marker means the block runs to the end of the reply.
 * Returns null if there is no start marker.
 */
export const extractSummaryBlock = (response: string): string | null => {
  const startIdx = response.indexOf(SUMMARY_START_MARKER);
  if (startIdx === -1) return null;
  const contentStart = startIdx + SUMMARY_START_MARKER.length;
  const endIdx = response.indexOf(SUMMARY_END_MARKER, contentStart);
  const block = endIdx === -1 ? response.slice(contentStart) : response.slice(contentStart, endIdx);
  return block.trim();
};

/**
 * Maps free text to a verdict by looking for whole-word yes/no tokens.
 * "yes" wins when both appear; neither gives UNKNOWN.
 */
export const parseVerdict = (value: string): Verdict => {
  if (YES_TOKEN.test(value)) return Verdict.YES;
  if (NO_TOKEN.test(value)) return Verdict.NO;
  return Verdict.UNKNOWN;
};

// Text following the label; a later line carrying the same label overrides an earlier one
const findLabelledValue = (block: string, label: string): string | null => {
  let value: string | null = null;
  for (const line of block.split(/\r?\n/)) {
    const idx = line.toLowerCase().indexOf(label);
    if (idx !== -1) value = line.slice(idx + label.length);
  }
  return value;
};

const parseField = (block: string | null, field: PredictionField): Verdict => {
  if (block === null) return Verdict.UNKNOWN;
  const value = findLabelledValue(block, SUMMARY_LABELS[field]);
  return value === null ? Verdict.UNKNOWN : parseVerdict(value);
};

/**
 * Best-effort parse of a model reply into a prediction.
 * Anything missing or unrecognised comes back as UNKNOWN; never throws.
 */
export const parseSummary = (response: string): Prediction => {
  const block = extractSummaryBlock(response);
  return {
    optimalStrategy: parseField(block, PredictionField.OPTIMAL_STRATEGY),
    solvedUnknown: parseField(block, PredictionField.SOLVED_UNKNOWN),
    correctFinalAnswer: parseField(block, PredictionField.CORRECT_FINAL_ANSWER),
    rawResponse: response,
  };
};
