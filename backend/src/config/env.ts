import dotenv from 'dotenv';
import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().min(1).max(65535).default(8000),
  MONGO_URI: z.string().min(1, 'MONGO_URI is required'),
  JWT_SECRET: z.string().min(8, 'JWT_SECRET must be at least 8 characters'),
  CORS_ORIGINS: z.string().default('http://localhost:3000'),
  RATE_LIMIT_MAX: z.coerce.number().int().min(1).default(300),
  RATE_LIMIT_WINDOW_MINUTES: z.coerce.number().int().min(1).default(15),
  // A student may finish a course after expiry is flagged
  ALLOW_COMPLETION_AFTER_EXPIRY: booleanFlag.default('true'),
  LESSON_BATCH_MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(3),
});

export interface AppConfig {
  nodeEnv: 'development' | 'production' | 'test';
  port: number;
  mongoUri: string;
  jwtSecret: string;
  corsOrigins: string[];
  rateLimit: { max: number; windowMs: number };
  allowCompletionAfterExpiry: boolean;
  lessonBatchMaxRetries: number;
}

/**
 * Validates the environment and maps it to the typed config.
 * Throws on the first invalid setting so the server never starts half-configured.
 */
export const parseConfig = (env: NodeJS.ProcessEnv): AppConfig => {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const message = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join(', ');
    throw new Error(`Invalid environment configuration: ${message}`);
  }

  const vars = result.data;
  return {
    nodeEnv: vars.NODE_ENV,
    port: vars.PORT,
    mongoUri: vars.MONGO_URI,
    jwtSecret: vars.JWT_SECRET,
    corsOrigins: vars.CORS_ORIGINS.split(',')
      .map((origin) => origin.trim())
      .filter(Boolean),
    rateLimit: { max: vars.RATE_LIMIT_MAX, windowMs: vars.RATE_LIMIT_WINDOW_MINUTES * 60 * 1000 },
    allowCompletionAfterExpiry: vars.ALLOW_COMPLETION_AFTER_EXPIRY,
    lessonBatchMaxRetries: vars.LESSON_BATCH_MAX_RETRIES,
  };
};

export const loadConfig = (): AppConfig => {
  dotenv.config();
  return parseConfig(process.env);
};
