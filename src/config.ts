import { ConfigurationError } from './errors.ts';
import { DEFAULT_TIMEOUT_MS } from './probe.ts';
import type { Env } from './envloader.ts';

export const DEFAULT_CONFIG_FILE = '.config';

export interface LoggingSettings {
  level?: string;
  file?: string;
}

export interface CheckSettings {
  timeoutMs: number;
  retryDelayMs: number;
}

export interface Settings {
  metricsPath?: string;
  checks: CheckSettings;
  logging: LoggingSettings;
  env: Readonly<Env>;
}

function readSeconds(env: Env, key: string, fallbackMs: number): number {
  const raw = env[key];
  if (raw === undefined || raw === '') return fallbackMs;

  const seconds = Number(raw);
  if (!Number.isFinite(seconds) || seconds < 0) {
    throw new ConfigurationError(`${key} must be a non-negative number of seconds, got '${raw}'`);
  }
  return seconds * 1000;
}

export function resolveSettings(env: Env): Settings {
  return {
    metricsPath: env.PROMETHEUS_EXPORT_FILENAME || undefined,
    checks: {
      timeoutMs: readSeconds(env, 'CHECK_TIMEOUT', DEFAULT_TIMEOUT_MS),
      retryDelayMs: readSeconds(env, 'CHECK_RETRY_DELAY', 1000),
    },
    logging: {
      level: env.NODE_LOG_LEVEL || undefined,
      file: env.NODE_LOG_FILE || undefined,
    },
    env: { ...env },
  };
}
