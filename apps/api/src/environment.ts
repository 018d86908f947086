import { registerAs } from '@nestjs/config';
import { z } from 'zod';
import { DEFAULT_MODEL, PipelineLimits } from '@risk-router/shared/types';

// Unset and empty variables are treated the same
const blankAsUndefined = (value: unknown) => (value === '' ? undefined : value);

export const EnvironmentSchema = z.object({
  ANTHROPIC_API_KEY: z.preprocess(blankAsUndefined, z.string().optional()),
  ANTHROPIC_MODEL: z.preprocess(blankAsUndefined, z.string().default(DEFAULT_MODEL)),
  SUPABASE_URL: z.preprocess(blankAsUndefined, z.string().url().optional()),
  SUPABASE_KEY: z.preprocess(blankAsUndefined, z.string().optional()),
  SEARXNG_URL: z.preprocess(blankAsUndefined, z.string().url().optional()),
  REPORTS_DIR: z.preprocess(blankAsUndefined, z.string().default('reports')),
  TURN_TIMEOUT_MS: z.preprocess(
    blankAsUndefined,
    z.coerce.number().int().positive().default(PipelineLimits.TURN_TIMEOUT_MS)
  ),
  STAGE_MAX_ITERATIONS: z.preprocess(
    blankAsUndefined,
    z.coerce.number().int().positive().default(PipelineLimits.STAGE_MAX_ITERATIONS)
  ),
  PORT: z.preprocess(blankAsUndefined, z.coerce.number().int().positive().default(3001)),
});

export type Environment = z.infer<typeof EnvironmentSchema>;

/**
 * Used as ConfigModule's `validate` hook and by every namespace factory
 */
export function validateEnvironment(config: Record<string, unknown>): Environment {
  const parsed = EnvironmentSchema.safeParse(config);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new Error(`Invalid environment: ${details}`);
  }
  return parsed.data;
}

const env = () => validateEnvironment(process.env);

export const serverConfig = registerAs('server', () => ({
  port: env().PORT,
}));

export const modelConfig = registerAs('model', () => ({
  apiKey: env().ANTHROPIC_API_KEY,
  name: env().ANTHROPIC_MODEL,
}));

export const logStoreConfig = registerAs('logStore', () => ({
  url: env().SUPABASE_URL,
  key: env().SUPABASE_KEY,
}));

export const searchConfig = registerAs('search', () => ({
  url: env().SEARXNG_URL,
}));

export const reportsConfig = registerAs('reports', () => ({
  dir: env().REPORTS_DIR,
}));

export const pipelineConfig = registerAs('pipeline', () => ({
  turnTimeoutMs: env().TURN_TIMEOUT_MS,
  stageMaxIterations: env().STAGE_MAX_ITERATIONS,
}));

export default [serverConfig, modelConfig, logStoreConfig, searchConfig, reportsConfig, pipelineConfig];
