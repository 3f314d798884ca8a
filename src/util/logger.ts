import pino from 'pino';
import type { DestinationStream, Logger, LevelWithSilent } from 'pino';

export type { Logger };

export interface LoggerOptions {
  level?: LevelWithSilent;
  name?: string;
  /** Where lines go; stdout when omitted. */
  destination?: DestinationStream;
}

export function createLogger(options?: LoggerOptions): Logger {
  const settings = {
    level: options?.level ?? 'info',
    base: { name: options?.name ?? 'rowmetrics' },
    timestamp: pino.stdTimeFunctions.isoTime,
  };
  return options?.destination ? pino(settings, options.destination) : pino(settings);
}

/** A logger that drops everything; used when the caller supplies none. */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
