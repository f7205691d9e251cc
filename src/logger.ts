/**
 * Structured logging with pino.
 * Logs go to stderr so stdout carries only crawl output.
 */
import { createRequire } from 'node:module';
import pino, { type Level, type LoggerOptions } from 'pino';

const require = createRequire(import.meta.url);

const LOG_LEVELS: readonly Level[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'];

function isLevel(value: string): value is Level {
  return LOG_LEVELS.some((level) => level === value);
}

/** LOG_LEVEL, case-insensitive; anything unknown falls back to info. */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): Level {
  const level = env.LOG_LEVEL?.trim().toLowerCase();
  return level && isLevel(level) ? level : 'info';
}

/**
 * pino-pretty is a dev dependency; only use it in development and only when it resolves.
 */
function usePrettyTransport(): boolean {
  if (process.env.NODE_ENV !== 'development') return false;
  try {
    require.resolve('pino-pretty');
    return true;
  } catch {
    return false;
  }
}

const options: LoggerOptions = {
  level: resolveLogLevel(),
  formatters: {
    level: (label: string) => ({ level: label }),
  },
  base: {
    service: 'linkprobe',
  },
};

export const logger = usePrettyTransport()
  ? pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname,service',
          destination: 2,
        },
      },
    })
  : pino(options, pino.destination(2));
