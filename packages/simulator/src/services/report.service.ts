import { PredictionField, Verdict, type ResultRow } from '@student-sim/shared';

export interface DimensionStats {
  matched: number;
  /** Predicted yes/no but disagreed with the ground truth. */
  mismatched: number;
  unknown: number;
  total: number;
  accuracy: number;
}

export type DimensionSummary = Record<PredictionField, DimensionStats>;

export interface ClusterSummary {
  clusterNumber: string;
  rows: number;
  dimensions: DimensionSummary;
}

export interface RunSummary {
  rows: number;
  students: number;
  overall: DimensionSummary;
  byCluster: ClusterSummary[];
}

const DIMENSIONS: readonly PredictionField[] = [
  PredictionField.OPTIMAL_STRATEGY,
  PredictionField.SOLVED_UNKNOWN,
  PredictionField.CORRECT_FINAL_ANSWER,
];

const DIMENSION_LABELS: Record<PredictionField, string> = {
  [PredictionField.OPTIMAL_STRATEGY]: 'Strategy',
  [PredictionField.SOLVED_UNKNOWN]: 'Unknown',
  [PredictionField.CORRECT_FINAL_ANSWER]: 'Answer',
};

const projection = (row: ResultRow, field: PredictionField): { predicted: Verdict; matched: boolean } => {
  switch (field) {
    case PredictionField.OPTIMAL_STRATEGY:
      return { predicted: row.predictedOptimalStrategy, matched: row.strategyMatch };
    case PredictionField.SOLVED_UNKNOWN:
      return { predicted: row.predictedSolvedUnknown, matched: row.unknownMatch };
    case PredictionField.CORRECT_FINAL_ANSWER:
      return { predicted: row.predictedCorrectAnswer, matched: row.answerMatch };
  }
};

const summarizeDimension = (rows: readonly ResultRow[], field: PredictionField): DimensionStats => {
  let matched = 0;
  let unknown = 0;
  for (const row of rows) {
    const { predicted, matched: isMatch } = projection(row, field);
    if (isMatch) matched++;
    else if (predicted === Verdict.UNKNOWN) unknown++;
  }
  const total = rows.length;
  return {
    matched,
    mismatched: total - matched - unknown,
    unknown,
    total,
    accuracy: total === 0 ? 0 : matched / total,
  };
};

const summarizeDimensions = (rows: readonly ResultRow[]): DimensionSummary => ({
  [PredictionField.OPTIMAL_STRATEGY]: summarizeDimension(rows, PredictionField.OPTIMAL_STRATEGY),
  [PredictionField.SOLVED_UNKNOWN]: summarizeDimension(rows, PredictionField.SOLVED_UNKNOWN),
  [PredictionField.CORRECT_FINAL_ANSWER]: summarizeDimension(rows, PredictionField.CORRECT_FINAL_ANSWER),
});

export const summarizeResults = (rows: readonly ResultRow[]): RunSummary => {
  const clusters = new Map<string, ResultRow[]>();
  for (const row of rows) {
    const existing = clusters.get(row.clusterNumber);
    if (existing) existing.push(row);
    else clusters.set(row.clusterNumber, [row]);
  }

  return {
    rows: rows.length,
    students: new Set(rows.map((row) => row.studentId)).size,
    overall: summarizeDimensions(rows),
    byCluster: [...clusters].map(([clusterNumber, clusterRows]) => ({
      clusterNumber,
      rows: clusterRows.length,
      dimensions: summarizeDimensions(clusterRows),
    })),
  };
};

// --- Rendering ---

const pct = (value: number): string => `${(value * 100).toFixed(1)}%`;

const COL_LABEL = 16;
const COL_DIM = 20;

const cell = (stats: DimensionStats): string => `${pct(stats.accuracy)} (${stats.matched}/${stats.total})`;

const line = (label: string, dims: DimensionSummary): string =>
  label.padEnd(COL_LABEL) + DIMENSIONS.map((field) => cell(dims[field]).padEnd(COL_DIM)).join('').trimEnd();

/**
 * Plain-text accuracy table: one line for the whole run, one per cluster,
 * then unknown counts per dimension.
 */
export const formatSummary = (summary: RunSummary): string => {
  const header = ''.padEnd(COL_LABEL) + DIMENSIONS.map((field) => DIMENSION_LABELS[field].padEnd(COL_DIM)).join('').trimEnd();
  const rule = '-'.repeat(COL_LABEL + COL_DIM * DIMENSIONS.length);

  const lines = [
    `Rows: ${summary.rows}  Students: ${summary.students}`,
    '',
    header,
    rule,
    line('All', summary.overall),
    ...summary.byCluster.map((cluster) =>
      line(`Cluster ${cluster.clusterNumber || '-'}`, cluster.dimensions),
    ),
    rule,
    `Unknown: ${DIMENSIONS.map((field) => `${DIMENSION_LABELS[field]} ${summary.overall[field].unknown}`).join(', ')}`,
  ];

  return `${lines.join('\n')}\n`;
};
