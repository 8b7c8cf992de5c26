import type { Logger } from 'pino';
import type { PollerError } from '../../utils/errors';

/**
 * Anything with a status the poller can classify.
 */
export interface PollableResource {
  status: string;
}

/**
 * One asynchronous lookup of a remote resource. Each call settles exactly once.
 * The signal is aborted when the poller is stopped or paused while the lookup
 * is in flight; honouring it is optional.
 */
export interface Fetcher<R extends PollableResource> {
  fetchResource(id: string, secret: string, signal?: AbortSignal): Promise<R>;
}

/**
 * Decides whether a status is terminal (no further change expected).
 */
export type StatusClassifier<S extends string = string> = (status: S) => boolean;

export interface PollSuccess<R> {
  success: true;
  resource: R;
}

export interface PollFailure {
  success: false;
  error: PollerError;
}

export type PollResult<R> = PollSuccess<R> | PollFailure;

export type PollCompletion<R> = (result: PollResult<R>) => void;

export interface PollerConfig {
  /** Delay before each of the first `fixedAttempts` retries, and the base of the growth curve */
  initialDelayMs: number;
  /** Growth per attempt once the fixed phase is over */
  backoffFactor: number;
  /** Attempts that are followed by the flat `initialDelayMs` delay */
  fixedAttempts: number;
  /** Backoff ceiling */
  maxDelayMs: number;
  /** Hard cap on fetches before giving up */
  maxAttempts: number;
}

export interface PollerOptions<R extends PollableResource> {
  isTerminal: StatusClassifier<R['status']>;
  config?: Partial<PollerConfig>;
  logger?: Logger;
  /**
   * Fetch errors for which polling should continue under the normal backoff.
   * Defaults to none: every fetch error completes the poller.
   */
  isRetryableError?: (error: unknown) => boolean;
}

export type PollerState = 'polling' | 'paused' | 'completed' | 'cancelled';

export enum PollerEventType {
  POLL_COMPLETE = 'poll:complete',
  STATUS_CHANGE = 'status:change',
  POLLER_STOPPED = 'poller:stopped',
}

export interface PollCompleteEvent<S extends string = string> {
  resourceId: string;
  attempt: number;
  status: S;
  terminal: boolean;
}

export interface StatusChangeEvent<S extends string = string> {
  resourceId: string;
  previousStatus: S | null;
  currentStatus: S;
}

export interface PollerStoppedEvent {
  resourceId: string;
  pollCount: number;
}
