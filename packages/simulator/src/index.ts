import 'dotenv/config';
import pino from 'pino';
import { env } from './config/env.js';
import { loadProblemRecords } from './services/input.service.js';
import { createAnthropicModel } from './services/llm.service.js';
import { runPipeline } from './services/pipeline.service.js';
import { formatSummary, summarizeResults } from './services/report.service.js';
import { CsvResultWriter } from './services/results.service.js';
import { parseArgs } from './utils/args.utils.js';
import { AppError } from './utils/errors.js';

const logger = pino({ name: 'simulator' });

async function main(): Promise<void> {
  const { inputPath, outputPath } = parseArgs(process.argv.slice(2), {
    inputPath: env.INPUT_PATH,
    outputPath: env.OUTPUT_PATH,
  });
  logger.info({ inputPath, outputPath, model: env.LLM_MODEL }, 'Simulation run starting');

  const records = loadProblemRecords(inputPath);
  const writer = new CsvResultWriter(outputPath);
  const result = await runPipeline({ records, model: createAnthropicModel(), sink: writer });

  process.stdout.write(formatSummary(summarizeResults(result.rows)));

  if (result.failures.length > 0) {
    logger.warn({ failures: result.failures }, 'Some students were aborted');
  }
  logger.info(
    {
      outputPath,
      rows: result.rows.length,
      students: result.studentCount,
      failedStudents: result.failures.length,
    },
    'Simulation run complete',
  );
}

main().catch((err: unknown) => {
  if (err instanceof AppError) {
    logger.error({ code: err.code, details: err.details }, err.message);
  } else {
    logger.error({ err }, 'Simulation run failed');
  }
  process.exit(1);
});
