import pino, { type Logger } from 'pino';

export type { Logger };

export function createLogger(level: pino.LevelWithSilent = 'info'): Logger {
  return pino({
    name: 'obex',
    level,
    base: undefined,
    timestamp: pino.stdTimeFunctions.isoTime
  });
}

export const silentLogger: Logger = pino({ level: 'silent' });
