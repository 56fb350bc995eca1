/**
 * Runtime composition: terminal and adapter built from configuration
 */

import type { Logger } from '@seatflow/logger';
import {
  DataProviderAdapter,
  FixtureTerminal,
  HttpTerminal,
  type Clock,
  type SessionCredentials,
  type UpstreamTerminal,
} from '@seatflow/provider-ifind';
import type { Config } from './config/index.js';

/** Fixture terminals accept any login; the session manager still wants a pair. */
const FIXTURE_CREDENTIALS: SessionCredentials = { userId: 'fixture', password: 'fixture' };

export interface RuntimeOverrides {
  terminal?: UpstreamTerminal;
  clock?: Clock;
}

export interface Runtime {
  adapter: DataProviderAdapter;
  close(): Promise<void>;
}

const toMs = (seconds: number): number => Math.round(seconds * 1000);

/**
 * Build the upstream terminal selected by `upstream.terminal`
 */
export function createTerminal(config: Config, logger: Logger): UpstreamTerminal {
  const { upstream } = config;

  if (upstream.terminal === 'fixture' && upstream.fixturePath) {
    return new FixtureTerminal({ fixturePath: upstream.fixturePath, logger });
  }

  return new HttpTerminal({
    baseUrl: upstream.baseUrl,
    timeout: upstream.timeoutMs,
    logger,
  });
}

function credentialsFor(config: Config): SessionCredentials | undefined {
  const { userId, password, terminal } = config.upstream;
  if (userId && password) {
    return { userId, password };
  }
  return terminal === 'fixture' ? FIXTURE_CREDENTIALS : undefined;
}

/**
 * Wire one adapter for the lifetime of a CLI invocation
 */
export function createRuntime(config: Config, logger: Logger, overrides: RuntimeOverrides = {}): Runtime {
  const { limits } = config;
  const terminal = overrides.terminal ?? createTerminal(config, logger);

  const adapter = new DataProviderAdapter({
    terminal,
    credentials: credentialsFor(config),
    maxRequests: limits.maxRequestsPerWindow,
    windowMs: toMs(limits.windowSeconds),
    loginMaxRetries: limits.loginMaxRetries,
    baseRetryDelayMs: toMs(limits.baseRetryDelaySeconds),
    interCallDelayMs: toMs(limits.interCallDelaySeconds),
    interBatchDelayMs: toMs(limits.interBatchDelaySeconds),
    batchSize: limits.batchSize,
    clock: overrides.clock,
    logger,
  });

  let closed = false;

  return {
    adapter,
    async close(): Promise<void> {
      if (closed) {
        return;
      }
      closed = true;
      await adapter.close();
    },
  };
}
