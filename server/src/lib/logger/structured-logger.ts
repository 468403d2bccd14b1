/**
 * Structured Logger with Pino
 *
 * - JSON logging with Pino
 * - Optional daily rotated log files (LOG_TO_FILE=true)
 * - Pretty console output in development
 * - Secret redaction
 * - Request tracking via child loggers
 */

import pino from 'pino';
import { createStream, type RotatingFileStream } from 'rotating-file-stream';
import { PinoPretty } from 'pino-pretty';
import path from 'node:path';
import fs from 'node:fs';
import { getLoggingConfig, type LogLevel } from '../../config/logging.config.js';

const config = getLoggingConfig();

// Per-stream floor; the logger's own level does the real filtering
const streamLevel: Exclude<LogLevel, 'silent'> = config.level === 'silent' ? 'error' : config.level;

let fileStream: RotatingFileStream | undefined;
if (config.toFile) {
  const logsDir = path.resolve(process.cwd(), config.dir);
  if (!fs.existsSync(logsDir)) {
    fs.mkdirSync(logsDir, { recursive: true });
  }

  fileStream = createStream('server.log', {
    interval: '1d',
    path: logsDir,
    maxFiles: config.rotateDays,
    compress: 'gzip'
  });
}

export const logger = pino(
  {
    level: config.level,
    redact: {
      paths: config.redactFields,
      censor: '[REDACTED]'
    },
    formatters: {
      level: (label) => ({ level: label })
    },
    timestamp: pino.stdTimeFunctions.isoTime
  },
  pino.multistream([
    // Console output
    ...(config.console ? [{
      level: streamLevel,
      stream: config.pretty
        ? PinoPretty({
            colorize: true,
            translateTime: 'SYS:HH:MM:ss',
            ignore: 'pid,hostname'
          })
        : process.stdout
    }] : []),

    ...(fileStream ? [{ level: streamLevel, stream: fileStream }] : [])
  ])
);

export type Logger = typeof logger;
