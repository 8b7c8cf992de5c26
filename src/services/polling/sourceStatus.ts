import { Poller } from './Poller';
import type { Fetcher, PollCompletion, PollerOptions } from './types';

export const SOURCE_STATUSES = [
  'pending',
  'chargeable',
  'consumed',
  'canceled',
  'failed',
  'unknown',
] as const;

export type SourceStatus = (typeof SOURCE_STATUSES)[number];

/**
 * A payment source that may need customer action (redirect, 3DS, bank
 * authorisation) before it becomes chargeable.
 */
export interface Source {
  id: string;
  status: SourceStatus;
  amount?: number | null;
  currency?: string | null;
  type?: string;
}

export function parseSourceStatus(raw: unknown): SourceStatus {
  if (typeof raw !== 'string') return 'unknown';
  const normalized = raw.trim().toLowerCase();
  return SOURCE_STATUSES.find(status => status === normalized) ?? 'unknown';
}

/**
 * Only `pending` sources can still change on their own; every other status,
 * `failed` and `unknown` included, ends polling.
 */
export function isTerminalSourceStatus(status: SourceStatus): boolean {
  return status !== 'pending';
}

export type SourcePollerOptions = Omit<PollerOptions<Source>, 'isTerminal'>;

export function createSourcePoller(
  fetcher: Fetcher<Source>,
  sourceId: string,
  clientSecret: string,
  completion: PollCompletion<Source>,
  options: SourcePollerOptions = {}
): Poller<Source> {
  return new Poller(fetcher, sourceId, clientSecret, completion, {
    ...options,
    isTerminal: isTerminalSourceStatus,
  });
}
