import pino, {type Logger, type LoggerOptions} from 'pino';
import type {LogLevel} from './config.js';

export type {Logger} from 'pino';

export interface LoggerConfig {
  level?: LogLevel;
  /** Pretty printing through pino-pretty; defaults to on outside production. */
  pretty?: boolean;
  base?: Record<string, unknown>;
}

const LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

const isLogLevel = (value: string | undefined): value is LogLevel =>
  value !== undefined && LEVELS.some(level => level === value);

const envLevel = (): LogLevel => {
  const level = process.env.LOG_LEVEL?.trim();
  return isLogLevel(level) ? level : 'info';
};

const STDERR = 2;

/**
 * Logs go to stderr: the Ink UI renders on stdout.
 */
export const createLogger = (config: LoggerConfig = {}): Logger => {
  const level = config.level ?? envLevel();
  const pretty = config.pretty ?? (process.env.NODE_ENV !== 'production' && level !== 'silent');

  const options: LoggerOptions = {
    level,
    base: config.base ?? {service: 'tasklooper'}
  };

  if (pretty) {
    options.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
        destination: STDERR
      }
    };
    return pino(options);
  }

  return pino(options, pino.destination(STDERR));
};

let defaultLogger: Logger | null = null;

export const getLogger = (): Logger => {
  if (!defaultLogger) {
    defaultLogger = createLogger();
  }
  return defaultLogger;
};
