/**
 * Configuration schema using Zod
 */

import { z } from 'zod';

const positiveInt = z.coerce.number().int().positive();
const seconds = z.coerce.number().nonnegative();

/**
 * Application configuration schema
 */
export const configSchema = z
  .object({
    app: z
      .object({
        env: z.enum(['development', 'staging', 'production', 'test']).default('development'),
        name: z.string().default('seatflow'),
        version: z.string().default('0.1.0'),
      })
      .default({}),

    logging: z
      .object({
        level: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
        format: z.enum(['json', 'pretty']).default('pretty'),
        filePath: z.string().optional(),
      })
      .default({}),

    upstream: z
      .object({
        terminal: z.enum(['http', 'fixture']).default('http'),
        userId: z.string().optional(),
        password: z.string().optional(),
        baseUrl: z.string().url().optional(),
        fixturePath: z.string().optional(),
        timeoutMs: positiveInt.default(30_000),
      })
      .default({}),

    limits: z
      .object({
        maxRequestsPerWindow: positiveInt.default(30),
        windowSeconds: z.coerce.number().positive().default(60),
        loginMaxRetries: positiveInt.default(3),
        baseRetryDelaySeconds: seconds.default(1),
        interCallDelaySeconds: seconds.default(0.2),
        interBatchDelaySeconds: seconds.default(2),
        batchSize: positiveInt.default(20),
      })
      .default({}),
  })
  .superRefine((config, ctx) => {
    if (config.upstream.terminal === 'fixture' && !config.upstream.fixturePath) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['upstream', 'fixturePath'],
        message: 'Required when the fixture terminal is selected',
      });
    }
  });

/**
 * Inferred configuration type
 */
export type Config = z.infer<typeof configSchema>;

/**
 * Environment variable → `section.field` of the configuration
 */
export const envMapping: Record<string, string> = {
  NODE_ENV: 'app.env',
  LOG_LEVEL: 'logging.level',
  LOG_FORMAT: 'logging.format',
  LOG_FILE: 'logging.filePath',
  THS_TERMINAL: 'upstream.terminal',
  THS_USER_ID: 'upstream.userId',
  THS_PASSWORD: 'upstream.password',
  THS_BASE_URL: 'upstream.baseUrl',
  THS_FIXTURE_PATH: 'upstream.fixturePath',
  THS_TIMEOUT_MS: 'upstream.timeoutMs',
  MAX_REQUESTS_PER_WINDOW: 'limits.maxRequestsPerWindow',
  WINDOW_SECONDS: 'limits.windowSeconds',
  LOGIN_MAX_RETRIES: 'limits.loginMaxRetries',
  BASE_RETRY_DELAY_SECONDS: 'limits.baseRetryDelaySeconds',
  INTER_CALL_DELAY_SECONDS: 'limits.interCallDelaySeconds',
  INTER_BATCH_DELAY_SECONDS: 'limits.interBatchDelaySeconds',
  BATCH_SIZE: 'limits.batchSize',
};
