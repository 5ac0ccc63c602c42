import pino, { type Logger } from 'pino';

function defaultLevel(): string {
  if (process.env.LOG_LEVEL) {
    return process.env.LOG_LEVEL;
  }
  return process.env.NODE_ENV === 'test' ? 'silent' : 'info';
}

export const logger: Logger = pino({
  level: defaultLevel(),
  base: { service: 'beacon-api' },
  timestamp: pino.stdTimeFunctions.isoTime,
});
