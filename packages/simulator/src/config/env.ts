import { z } from 'zod';

const isTest = process.env.NODE_ENV === 'test';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  ANTHROPIC_API_KEY: isTest ? z.string().optional() : z.string().min(1),
  LLM_MODEL: z.string().min(1).default('claude-sonnet-4-6'),
  LLM_MAX_TOKENS: z.coerce.number().int().positive().default(4096),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(1).default(1),
  LLM_RETRY_LIMIT: z.coerce.number().int().min(1).default(3),
  LLM_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(5000),
  INPUT_PATH: z.string().min(1).default('student_problem_info.csv'),
  OUTPUT_PATH: z.string().min(1).default('evaluation_results.csv'),
});

const result = envSchema.safeParse(process.env);

if (!result.success) {
  console.error('Invalid environment variables:');
  console.error(result.error.flatten().fieldErrors);
  process.exit(1);
}

export const env = result.data;
