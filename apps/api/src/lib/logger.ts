import { pino, type Logger, type LevelWithSilent } from 'pino';

/** The subset of the pino API the routing services log through. */
export type AppLogger = Pick<Logger, 'info' | 'warn' | 'error' | 'debug'>;

export function createLogger(opts: { level: LevelWithSilent; name?: string }): Logger {
  return pino({
    level: opts.level,
    name: opts.name ?? 'tidings',
  });
}
