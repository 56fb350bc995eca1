/**
 * Configuration loading and management
 */

import { ConfigurationError } from '@seatflow/contracts';
import type { Logger } from '@seatflow/logger';
import { configSchema, envMapping, type Config } from './schema.js';

type RawConfig = Record<string, Record<string, string>>;

/**
 * Load configuration from environment and defaults
 *
 * Blank variables count as unset. Values stay strings here; the schema
 * coerces numeric fields.
 *
 * @throws {ConfigurationError} Listing every failing path
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, logger?: Logger): Config {
  const rawConfig: RawConfig = {};

  for (const [envKey, configPath] of Object.entries(envMapping)) {
    const value = env[envKey]?.trim();
    if (value) {
      setNestedProperty(rawConfig, configPath, value);
    }
  }

  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new ConfigurationError(`Configuration validation failed:\n${errors.join('\n')}`, {
      issues: errors,
    });
  }

  if (logger) {
    logger.info('Configuration loaded', getConfigSummary(result.data));
  }

  return result.data;
}

/**
 * Set a `section.field` property
 */
function setNestedProperty(obj: RawConfig, path: string, value: string): void {
  const [section, field] = path.split('.');
  if (!section || !field) {
    return;
  }
  obj[section] = { ...obj[section], [field]: value };
}

/**
 * Get configuration summary for logging. Credentials are reported by
 * presence only.
 */
export function getConfigSummary(config: Config): Record<string, unknown> {
  return {
    environment: config.app.env,
    terminal: config.upstream.terminal,
    base_url: config.upstream.baseUrl,
    fixture_path: config.upstream.fixturePath,
    credentials: config.upstream.userId && config.upstream.password ? 'configured' : 'missing',
    limits: config.limits,
    logging: {
      level: config.logging.level,
      format: config.logging.format,
      file: config.logging.filePath,
    },
  };
}

// Re-export types
export type { Config } from './schema.js';
