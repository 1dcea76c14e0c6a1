import dotenv from 'dotenv';
import { ValidationError } from '../utils/errors';

// Load environment variables
dotenv.config();

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export const CURATOR_VERSION = '1.0.0';

/** Both review filters (primary and tie-break) must reach this score */
export const REVIEW_LOW_THRESHOLD = 51;

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

export interface CuratorConfig {
  /** As read from the environment; `validateConfig` rejects unknown levels */
  logLevel: string;
  matching: {
    defaultThreshold: number;
  };
  http: {
    timeout: number;
    userAgent: string;
  };
  header: {
    label: string;
    author: string;
    homepage: string;
  };
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function parseLogLevel(value: string | undefined, defaultValue: LogLevel): string {
  const normalized = (value || '').trim().toLowerCase();
  return normalized || defaultValue;
}

/** Level to start the logger with before the configuration is validated */
export function resolveLogLevel(value: string): LogLevel {
  return isLogLevel(value) ? value : 'info';
}

function parseInt(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value.trim() === '') {
    return defaultValue;
  }
  const parsed = Number(value);
  return isNaN(parsed) ? defaultValue : parsed;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): CuratorConfig {
  return {
    logLevel: parseLogLevel(env.LOG_LEVEL, 'info'),
    matching: {
      defaultThreshold: parseInt(env.DAT_CURATOR_THRESHOLD, 90),
    },
    http: {
      timeout: parseInt(env.DAT_CURATOR_HTTP_TIMEOUT_MS, 30000),
      userAgent: env.DAT_CURATOR_USER_AGENT || DEFAULT_USER_AGENT,
    },
    header: {
      label: env.DAT_CURATOR_HEADER_LABEL || 'Curated',
      author: env.DAT_CURATOR_AUTHOR || 'dat-curator',
      homepage: env.DAT_CURATOR_HOMEPAGE || '',
    },
  };
}

export function validateConfig(config: CuratorConfig): void {
  if (!isLogLevel(config.logLevel)) {
    throw new ValidationError(
      `LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')} (got '${config.logLevel}')`
    );
  }

  const threshold = config.matching.defaultThreshold;
  if (!Number.isInteger(threshold) || threshold < 0 || threshold > 100) {
    throw new ValidationError(
      `DAT_CURATOR_THRESHOLD must be an integer between 0 and 100 (got ${threshold})`
    );
  }

  if (!Number.isFinite(config.http.timeout) || config.http.timeout <= 0) {
    throw new ValidationError(
      `DAT_CURATOR_HTTP_TIMEOUT_MS must be a positive number (got ${config.http.timeout})`
    );
  }

  if (!config.header.label.trim()) {
    throw new ValidationError('DAT_CURATOR_HEADER_LABEL must not be empty');
  }
}

export const config = loadConfig();
