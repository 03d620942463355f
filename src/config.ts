/**
 * Environment configuration, validated with Zod.
 */
import { z } from 'zod';
import { ConfigurationError } from './errors.js';

const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export const AGGREGATE_POLICIES = ['single-day', 'distribute-evenly'] as const;
export type AggregatePolicy = (typeof AGGREGATE_POLICIES)[number];

const optionalString = z
  .string()
  .trim()
  .transform((v) => (v === '' ? undefined : v))
  .optional();

export const EnvSchema = z.object({
  LLM_PROXY_API_BASE: optionalString,
  LLM_PROXY_API_KEY: optionalString,
  LLM_MODEL: z.string().trim().min(1).default('gemini-2.5-flash'),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  SCHEMA_SAMPLE_ROWS: z.coerce.number().int().min(1).max(10).default(5),
  AGGREGATE_POLICY: z.enum(AGGREGATE_POLICIES).default('single-day'),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

export interface AppConfig {
  llm: {
    baseURL: string | undefined;
    apiKey: string | undefined;
    model: string;
    timeoutMs: number;
  };
  ingestion: {
    sampleRows: number;
    aggregatePolicy: AggregatePolicy;
  };
  logLevel: (typeof LOG_LEVELS)[number];
}

export const DEFAULT_CONFIG: AppConfig = {
  llm: { baseURL: undefined, apiKey: undefined, model: 'gemini-2.5-flash', timeoutMs: 30_000 },
  ingestion: { sampleRows: 5, aggregatePolicy: 'single-day' },
  logLevel: 'info',
};

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, { issues });
  }

  const e = parsed.data;
  return {
    llm: {
      baseURL: e.LLM_PROXY_API_BASE,
      apiKey: e.LLM_PROXY_API_KEY,
      model: e.LLM_MODEL,
      timeoutMs: e.LLM_TIMEOUT_MS,
    },
    ingestion: {
      sampleRows: e.SCHEMA_SAMPLE_ROWS,
      aggregatePolicy: e.AGGREGATE_POLICY,
    },
    logLevel: e.LOG_LEVEL,
  };
}
