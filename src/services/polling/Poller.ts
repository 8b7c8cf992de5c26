import { EventEmitter } from 'events';
import type { Logger } from 'pino';
import logger from '../../utils/logger';
import {
  AttemptsExceededError,
  PollerError,
  ValidationError,
  describeError,
  toFetchError,
} from '../../utils/errors';
import { computeBackoffDelay } from './backoff';
import { resolvePollerConfig } from './config';
import {
  Fetcher,
  PollableResource,
  PollCompleteEvent,
  PollCompletion,
  PollerConfig,
  PollerEventType,
  PollerOptions,
  PollerState,
  PollerStoppedEvent,
  PollResult,
  StatusChangeEvent,
  StatusClassifier,
} from './types';

type Lifecycle<R> =
  | { kind: 'polling'; completion: PollCompletion<R> }
  | { kind: 'paused'; completion: PollCompletion<R> }
  | { kind: 'completed' }
  | { kind: 'cancelled' };

const neverRetry = (): boolean => false;

/**
 * Polls a remote resource until it reaches a terminal status, a fetch fails,
 * the attempt budget runs out, or the caller stops it.
 *
 * The first fetch is issued from the constructor. At most one fetch is in
 * flight or scheduled at any time, and `completion` is invoked at most once.
 * All state changes happen on the event loop: every fetch settlement checks
 * the lifecycle and its cycle token before touching anything, so results
 * that arrive after `stopPolling()` or `pausePolling()` are dropped.
 */
export class Poller<R extends PollableResource> extends EventEmitter {
  readonly resourceId: string;
  private readonly secret: string;
  private readonly fetcher: Fetcher<R>;
  private readonly isTerminal: StatusClassifier<R['status']>;
  private readonly isRetryableError: (error: unknown) => boolean;
  private readonly config: PollerConfig;
  private readonly log: Logger;

  private lifecycle: Lifecycle<R>;
  private attempts = 0;
  private cycle = 0;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private inflight: AbortController | null = null;
  private fetching = false;
  private resumeWhenSettled = false;
  private latest: R | null = null;

  constructor(
    fetcher: Fetcher<R>,
    id: string,
    secret: string,
    completion: PollCompletion<R>,
    options: PollerOptions<R>
  ) {
    super();

    if (typeof id !== 'string' || id.length === 0) {
      throw new ValidationError('id must be a non-empty string', 'id');
    }
    if (typeof secret !== 'string' || secret.length === 0) {
      throw new ValidationError('secret must be a non-empty string', 'secret');
    }
    if (typeof completion !== 'function') {
      throw new ValidationError('completion must be a function', 'completion');
    }
    if (typeof options?.isTerminal !== 'function') {
      throw new ValidationError('isTerminal must be a function', 'isTerminal');
    }

    this.fetcher = fetcher;
    this.resourceId = id;
    this.secret = secret;
    this.isTerminal = options.isTerminal;
    this.isRetryableError = options.isRetryableError ?? neverRetry;
    this.config = resolvePollerConfig(options.config);
    this.log = (options.logger ?? logger).child({ component: 'Poller', resourceId: id });
    this.lifecycle = { kind: 'polling', completion };

    this.poll();
  }

  get pollCount(): number {
    return this.attempts;
  }

  get state(): PollerState {
    return this.lifecycle.kind;
  }

  get isActive(): boolean {
    return this.lifecycle.kind === 'polling' || this.lifecycle.kind === 'paused';
  }

  /** Last successfully fetched resource, or null before the first one */
  get latestResource(): R | null {
    return this.latest;
  }

  /**
   * Stop for good. Never invokes the completion; a no-op once completed or
   * already stopped.
   */
  stopPolling(): void {
    if (!this.isActive) return;

    this.lifecycle = { kind: 'cancelled' };
    this.clearTimer();
    this.abortInflight();

    this.log.debug({ pollCount: this.attempts }, 'polling stopped');
    const event: PollerStoppedEvent = { resourceId: this.resourceId, pollCount: this.attempts };
    try {
      this.emit(PollerEventType.POLLER_STOPPED, event);
    } catch (error) {
      this.log.error({ err: error }, 'poller:stopped listener threw');
    }
  }

  /**
   * Suspend polling without giving up on the outcome. Any in-flight result
   * is discarded.
   */
  pausePolling(): void {
    const lifecycle = this.lifecycle;
    if (lifecycle.kind !== 'polling') return;

    this.lifecycle = { kind: 'paused', completion: lifecycle.completion };
    this.cycle++;
    this.resumeWhenSettled = false;
    this.clearTimer();
    this.abortInflight();
    this.log.debug({ pollCount: this.attempts }, 'polling paused');
  }

  /**
   * Resume a paused poller with an immediate fetch. A lookup abandoned by
   * the pause may still be running if the fetcher ignored its signal; the
   * next fetch then waits for it to settle.
   */
  resumePolling(): void {
    const lifecycle = this.lifecycle;
    if (lifecycle.kind !== 'paused') return;

    this.lifecycle = { kind: 'polling', completion: lifecycle.completion };
    this.log.debug({ pollCount: this.attempts }, 'polling resumed');

    if (this.fetching && this.attempts < this.config.maxAttempts) {
      this.log.debug({ pollCount: this.attempts }, 'waiting for abandoned fetch to settle');
      this.resumeWhenSettled = true;
      return;
    }
    this.poll();
  }

  private poll(): void {
    this.timer = null;
    if (this.lifecycle.kind !== 'polling') return;

    if (this.attempts >= this.config.maxAttempts) {
      this.giveUp();
      return;
    }

    this.attempts++;
    const cycle = ++this.cycle;
    const attempt = this.attempts;
    const controller = new AbortController();
    this.inflight = controller;
    this.fetching = true;

    this.log.debug({ attempt }, 'fetching resource');

    // The executor runs synchronously, so a fetcher that throws becomes a rejection.
    new Promise<R>(resolve => {
      resolve(this.fetcher.fetchResource(this.resourceId, this.secret, controller.signal));
    })
      .then(
        resource => this.handleResource(cycle, attempt, resource),
        (error: unknown) => this.handleError(cycle, attempt, error)
      )
      .catch((error: unknown) => this.handleFailure(cycle, error))
      .finally(() => this.onFetchSettled());
  }

  private onFetchSettled(): void {
    this.fetching = false;
    if (this.resumeWhenSettled) {
      this.resumeWhenSettled = false;
      this.poll();
    }
  }

  private isCurrent(cycle: number): boolean {
    return this.lifecycle.kind === 'polling' && cycle === this.cycle;
  }

  private handleResource(cycle: number, attempt: number, resource: R): void {
    if (!this.isCurrent(cycle)) {
      this.log.debug({ attempt }, 'discarding result of abandoned fetch');
      return;
    }
    this.inflight = null;

    const previousStatus: R['status'] | null = this.latest ? this.latest.status : null;
    this.latest = resource;
    const terminal = this.isTerminal(resource.status);

    const pollEvent: PollCompleteEvent<R['status']> = {
      resourceId: this.resourceId,
      attempt,
      status: resource.status,
      terminal,
    };
    this.emit(PollerEventType.POLL_COMPLETE, pollEvent);

    if (previousStatus !== resource.status) {
      const changeEvent: StatusChangeEvent<R['status']> = {
        resourceId: this.resourceId,
        previousStatus,
        currentStatus: resource.status,
      };
      this.emit(PollerEventType.STATUS_CHANGE, changeEvent);
    }

    // A listener may have stopped or paused us.
    if (!this.isCurrent(cycle)) return;

    if (terminal) {
      this.log.info({ attempt, status: resource.status }, 'resource reached terminal status');
      this.finish({ success: true, resource });
      return;
    }

    this.scheduleNext();
  }

  private handleError(cycle: number, attempt: number, error: unknown): void {
    if (!this.isCurrent(cycle)) {
      this.log.debug({ attempt, error: describeError(error) }, 'discarding error of abandoned fetch');
      return;
    }
    this.inflight = null;

    if (this.isRetryableError(error)) {
      this.log.warn({ attempt, error: describeError(error) }, 'retryable fetch error');
      this.scheduleNext();
      return;
    }

    const fetchError = toFetchError(error);
    this.log.error({ attempt, error: describeError(fetchError.cause) }, 'fetch failed');
    this.finish({ success: false, error: fetchError });
  }

  private handleFailure(cycle: number, error: unknown): void {
    this.log.error({ err: error }, 'poll handler failed');
    if (cycle !== this.cycle || this.lifecycle.kind !== 'polling') return;

    this.finish({
      success: false,
      error: new PollerError(`Poll handler failed: ${describeError(error)}`, 'HANDLER_FAILED', false),
    });
  }

  private scheduleNext(): void {
    if (this.attempts >= this.config.maxAttempts) {
      this.giveUp();
      return;
    }

    const delayMs = computeBackoffDelay(this.attempts, this.config);
    this.log.debug({ attempt: this.attempts, delayMs }, 'scheduling next fetch');
    this.timer = setTimeout(() => this.poll(), delayMs);
  }

  private giveUp(): void {
    this.log.warn(
      { attempts: this.attempts, status: this.latest?.status ?? null },
      'resource not terminal within attempt budget'
    );
    this.finish({ success: false, error: new AttemptsExceededError(this.attempts, this.latest) });
  }

  private finish(result: PollResult<R>): void {
    const lifecycle = this.lifecycle;
    if (lifecycle.kind === 'completed' || lifecycle.kind === 'cancelled') return;

    this.lifecycle = { kind: 'completed' };
    this.clearTimer();
    this.abortInflight();

    try {
      lifecycle.completion(result);
    } catch (error) {
      this.log.error({ err: error }, 'completion callback threw');
    }
  }

  private clearTimer(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  private abortInflight(): void {
    if (this.inflight) {
      this.inflight.abort();
      this.inflight = null;
    }
  }
}
