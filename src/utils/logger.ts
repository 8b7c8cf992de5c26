import pino from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

export function parseLogLevel(envValue: string | undefined): LogLevel {
  if (!envValue) return 'info';
  const normalized = envValue.toLowerCase().trim();
  return LOG_LEVELS.find(level => level === normalized) ?? 'info';
}

export interface LoggerOptions {
  level?: LogLevel;
  pretty?: boolean;
  name?: string;
}

export function createLogger(options: LoggerOptions = {}): pino.Logger {
  const isDev = process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test';
  const level = options.level ?? parseLogLevel(process.env.LOG_LEVEL);
  const pretty = options.pretty ?? isDev;

  const transport = pretty
    ? { target: 'pino-pretty', options: { colorize: true, translateTime: 'SYS:HH:MM:ss.l' } }
    : undefined;

  return pino({ name: options.name ?? 'status-poller', level, transport });
}

const logger = createLogger();

export default logger;
