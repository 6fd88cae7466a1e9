import { pino, stdSerializers, type Logger, type TransportSingleOptions } from 'pino';
import { BaseError } from '../errors.js';

export type { Logger };

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';
export type LogFormat = 'json' | 'pretty';

export interface LoggerOptions {
  level?: LogLevel;
  name?: string;
  /** `pretty` renders through pino-pretty, `json` writes one line per record to stdout. */
  format?: LogFormat;
}

const LOG_LEVELS: ReadonlySet<string> = new Set(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);

const PRETTY_TRANSPORT: TransportSingleOptions = {
  target: 'pino-pretty',
  options: {
    colorize: true,
    translateTime: 'HH:MM:ss.l',
    ignore: 'pid,hostname',
  },
};

let globalLogger: Logger | null = null;

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.has(value);
}

function serializeError(err: unknown): unknown {
  if (err instanceof BaseError) return err.toJSON();
  if (err instanceof Error) return stdSerializers.err(err);
  return err;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const { level = 'info', name, format = 'pretty' } = options;

  return pino({
    name,
    level,
    transport: format === 'pretty' ? PRETTY_TRANSPORT : undefined,
    serializers: {
      err: serializeError,
      error: serializeError,
    },
  });
}

/**
 * Reads LATENCY_HEATMAP_LOG_LEVEL and LATENCY_HEATMAP_LOG_FORMAT; unknown
 * values are ignored.
 */
export function getLoggerOptionsFromEnv(env: NodeJS.ProcessEnv = process.env): LoggerOptions {
  const options: LoggerOptions = {};

  const level = env.LATENCY_HEATMAP_LOG_LEVEL?.toLowerCase();
  if (level && isLogLevel(level)) {
    options.level = level;
  }

  const format = env.LATENCY_HEATMAP_LOG_FORMAT?.toLowerCase();
  if (format === 'json' || format === 'pretty') {
    options.format = format;
  }

  return options;
}

/** Process-wide logger for components that were not handed one. */
export function getGlobalLogger(): Logger {
  if (!globalLogger) {
    globalLogger = createLogger({ name: 'latency-heatmap', ...getLoggerOptionsFromEnv() });
  }
  return globalLogger;
}

export function resetGlobalLogger(): void {
  globalLogger = null;
}

export default createLogger;
