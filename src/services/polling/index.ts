export { Poller } from './Poller';
export { pollUntilTerminal } from './pollUntilTerminal';
export type { PollUntilTerminalOptions } from './pollUntilTerminal';
export { computeBackoffDelay } from './backoff';
export type { BackoffConfig } from './backoff';
export {
  DEFAULT_POLLER_CONFIG,
  MAX_TIMER_DELAY_MS,
  POLLER_ENV_KEYS,
  resolvePollerConfig,
  loadPollerConfig,
} from './config';
export {
  SOURCE_STATUSES,
  parseSourceStatus,
  isTerminalSourceStatus,
  createSourcePoller,
} from './sourceStatus';
export type { Source, SourceStatus, SourcePollerOptions } from './sourceStatus';
export * from './types';
