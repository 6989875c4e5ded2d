import pino, { type Logger } from 'pino';
import type { LogLevel } from './config.js';

export type { Logger };

/**
 * Creates the process logger. Output goes to stderr; stdout carries listings
 * and results.
 */
export const createLogger = (level: LogLevel = 'info'): Logger =>
  pino(
    {
      level,
      base: { service: 'audio-relay' },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination(2),
  );

export const silentLogger = (): Logger => pino({ level: 'silent' });
