import { PollAbortedError } from '../../utils/errors';
import { Poller } from './Poller';
import type { Fetcher, PollableResource, PollerOptions } from './types';

export interface PollUntilTerminalOptions<R extends PollableResource> extends PollerOptions<R> {
  signal?: AbortSignal;
}

/**
 * Promise form of {@link Poller}: resolves with the terminal resource,
 * rejects with the FetchError or AttemptsExceededError the poller reports,
 * or with PollAbortedError once `signal` aborts.
 */
export function pollUntilTerminal<R extends PollableResource>(
  fetcher: Fetcher<R>,
  id: string,
  secret: string,
  options: PollUntilTerminalOptions<R>
): Promise<R> {
  const { signal, ...pollerOptions } = options;

  return new Promise<R>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new PollAbortedError());
      return;
    }

    const onAbort = (): void => {
      poller.stopPolling();
      reject(new PollAbortedError());
    };

    const poller: Poller<R> = new Poller(
      fetcher,
      id,
      secret,
      result => {
        signal?.removeEventListener('abort', onAbort);
        if (result.success) {
          resolve(result.resource);
        } else {
          reject(result.error);
        }
      },
      pollerOptions
    );

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
