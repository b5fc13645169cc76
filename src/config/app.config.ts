/**
 * App configuration, read once from process.env (`dotenv/config` is the first import of index.ts).
 * Every value has a default so tests and local runs work without a .env file.
 */
import { z } from 'zod';

const LOG_LEVELS = ['silly', 'trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const;
export type LogLevelName = (typeof LOG_LEVELS)[number];

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(4000),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),

  LLM_BASE_URL: z.string().url().default('http://localhost:1234/v1'),
  LLM_API_KEY: z.string().default('lm-studio'),
  LLM_MODEL: z.string().min(1).default('local-model'),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.4),

  MCP_SERVER_URL: z.string().url().optional(),
  SYSTEM_PROMPT: z
    .string()
    .default('You are a concise, friendly assistant. Answer plainly and never invent facts.'),

  SEARCH_SESSION_TTL_MINUTES: z.coerce.number().positive().default(15),
  QUOTE_FRESHNESS_HOURS: z.coerce.number().positive().default(6),
  CLUSTER_SIMILARITY_THRESHOLD: z.coerce.number().min(0).max(1).default(0.3),
  CONVERSATION_TTL_MINUTES: z.coerce.number().positive().default(60),
});

export type AppEnv = z.infer<typeof envSchema>;

/** Knobs the search pipeline reads; kept separate so tests can pass their own. */
export interface SearchTuning {
  sessionTtlMs: number;
  quoteFreshnessMaxAgeMs: number;
  clusterSimilarityThreshold: number;
}

export const DEFAULT_SEARCH_TUNING: SearchTuning = {
  sessionTtlMs: 15 * 60 * 1000,
  quoteFreshnessMaxAgeMs: 6 * 60 * 60 * 1000,
  clusterSimilarityThreshold: 0.3,
};

export function loadAppConfig(env: NodeJS.ProcessEnv = process.env) {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.errors
      .map((e) => `${e.path.join('.')}: ${e.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }

  const e = parsed.data;
  return {
    port: e.PORT,
    nodeEnv: e.NODE_ENV,
    logLevel: e.LOG_LEVEL,
    llm: {
      baseUrl: e.LLM_BASE_URL,
      apiKey: e.LLM_API_KEY,
      model: e.LLM_MODEL,
      temperature: e.LLM_TEMPERATURE,
    },
    mcpServerUrl: e.MCP_SERVER_URL,
    systemPrompt: e.SYSTEM_PROMPT,
    conversationTtlMinutes: e.CONVERSATION_TTL_MINUTES,
    searchTuning: {
      sessionTtlMs: e.SEARCH_SESSION_TTL_MINUTES * 60 * 1000,
      quoteFreshnessMaxAgeMs: e.QUOTE_FRESHNESS_HOURS * 60 * 60 * 1000,
      clusterSimilarityThreshold: e.CLUSTER_SIMILARITY_THRESHOLD,
    } satisfies SearchTuning,
  };
}

export type AppConfig = ReturnType<typeof loadAppConfig>;
