/**
 * Runtime configuration, read from the environment (after dotenv has loaded .env)
 */

import { z } from 'zod';
import { DEFAULT_THRESHOLDS, DEFAULT_WEIGHTS, RuleEngineOptions } from './services/ruleEngine';

const score = (fallback: number) => z.coerce.number().min(0).default(fallback);
const threshold = (fallback: number) => z.coerce.number().min(0).max(1).default(fallback);

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  HOST: z.string().default('0.0.0.0'),
  FRONTEND_URL: z.string().default('http://localhost:3001'),
  KNOWLEDGE_BASE_PATH: z.string().min(1).default('backend/data/mapping.json'),
  UPLOAD_DIR: z.string().min(1).default('uploads'),
  MAX_UPLOAD_BYTES: z.coerce.number().int().positive().default(5 * 1024 * 1024),
  MAX_SESSIONS: z.coerce.number().int().positive().default(1000),
  SCORING_WEIGHT_BASE: score(DEFAULT_WEIGHTS.base),
  SCORING_WEIGHT_REQUIRED: score(DEFAULT_WEIGHTS.required),
  SCORING_WEIGHT_SUPPORTING: score(DEFAULT_WEIGHTS.supporting),
  SCORING_WEIGHT_RED_FLAG: score(DEFAULT_WEIGHTS.redFlag),
  URGENT_THRESHOLD: threshold(DEFAULT_THRESHOLDS.urgent),
  SEE_GP_THRESHOLD: threshold(DEFAULT_THRESHOLDS.seeGp),
});

export interface AppConfig {
  nodeEnv: 'development' | 'production' | 'test';
  port: number;
  host: string;
  frontendUrl: string;
  knowledgeBasePath: string;
  uploadDir: string;
  maxUploadBytes: number;
  maxSessions: number;
  engine: Required<RuleEngineOptions>;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Parse configuration from an env map. Throws ConfigError on invalid values.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // Empty strings count as unset
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );

  const result = envSchema.safeParse(present);
  if (!result.success) {
    const summary = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${summary}`);
  }

  const e = result.data;
  return {
    nodeEnv: e.NODE_ENV,
    port: e.PORT,
    host: e.HOST,
    frontendUrl: e.FRONTEND_URL,
    knowledgeBasePath: e.KNOWLEDGE_BASE_PATH,
    uploadDir: e.UPLOAD_DIR,
    maxUploadBytes: e.MAX_UPLOAD_BYTES,
    maxSessions: e.MAX_SESSIONS,
    engine: {
      weights: {
        base: e.SCORING_WEIGHT_BASE,
        required: e.SCORING_WEIGHT_REQUIRED,
        supporting: e.SCORING_WEIGHT_SUPPORTING,
        redFlag: e.SCORING_WEIGHT_RED_FLAG,
      },
      thresholds: {
        urgent: e.URGENT_THRESHOLD,
        seeGp: e.SEE_GP_THRESHOLD,
      },
    },
  };
}
