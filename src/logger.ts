import pino from 'pino';
import { createWriteStream } from 'node:fs';

export type Logger = pino.Logger;

export interface LoggerOptions {
  verbose?: boolean;
  level?: string;
  logFile?: string;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level || (options.verbose ? 'debug' : 'error');

  // stdout carries the report, so pretty output goes to stderr
  return pino(
    {
      level,
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    options.logFile
      ? createWriteStream(options.logFile, { flags: 'a' })
      : pino.transport({
          target: 'pino-pretty',
          options: {
            destination: 2,
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
        })
  );
}

export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
