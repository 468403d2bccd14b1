/**
 * Logging Configuration
 * Single source of truth for all logging behavior
 */

// The logger is created on first import, before config/env.ts runs
import 'dotenv/config';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface LoggingConfig {
  level: LogLevel;
  pretty: boolean;
  toFile: boolean;
  dir: string;
  rotateDays: number;
  console: boolean;
  redactFields: string[];
}

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

function parseLevel(raw: string | undefined): LogLevel {
  const match = LEVELS.find(level => level === raw);
  return match ?? 'info';
}

export function getLoggingConfig(): LoggingConfig {
  const isDev = process.env.NODE_ENV === 'development';

  return {
    level: parseLevel(process.env.LOG_LEVEL),
    pretty: process.env.LOG_PRETTY === 'true' || isDev,
    toFile: process.env.LOG_TO_FILE === 'true',
    dir: process.env.LOG_DIR || './logs',
    rotateDays: Number(process.env.LOG_ROTATE_DAYS || 14),
    console: process.env.LOG_CONSOLE !== 'false',
    // appid is the weather API key
    redactFields: (process.env.LOG_REDACT_FIELDS ||
      'authorization,cookie,appid,apiKey,api_key,token,secret')
      .split(',').map(f => f.trim()).filter(Boolean)
  };
}
