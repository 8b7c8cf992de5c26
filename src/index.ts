export * from './services/polling';
export {
  PollerError,
  ValidationError,
  FetchError,
  AttemptsExceededError,
  PollAbortedError,
  describeError,
} from './utils/errors';
export { createLogger, parseLogLevel } from './utils/logger';
export type { LogLevel, LoggerOptions } from './utils/logger';
