import type { BaseLogger } from 'pino';

import { formatError } from '../utils/errorFormatting.js';
import { isWildcardIssuer } from '../utils/issuer.js';

import type { KeyCache } from './keyCache.service.js';

/**
 * When background key fetches happen:
 * - `skip`: never; keys are only fetched on demand
 * - `once`: a single prefetch after `delay` ms
 * - `periodic`: an optional prefetch after `delay` ms, then a refresh every `interval` ms
 */
export type RefreshPolicy =
  | { type: 'skip' }
  | { type: 'once'; delay: number }
  | { type: 'periodic'; delay?: number; interval: number };

/**
 * Chooses the refresh policy for the guard options.
 *
 * @param options - Prefetch and refresh settings (durations in ms)
 * @returns The matching policy
 */
export function selectRefreshPolicy(options: {
  skipPrefetch: boolean;
  delayPrefetch: number;
  refreshKeysInterval: number;
}): RefreshPolicy {
  const delay = options.skipPrefetch ? undefined : options.delayPrefetch;
  if (options.refreshKeysInterval > 0) {
    return { type: 'periodic', delay, interval: options.refreshKeysInterval };
  }
  if (delay !== undefined) {
    return { type: 'once', delay };
  }
  return { type: 'skip' };
}

/**
 * Fetches keys for every non-wildcard issuer in the background, independently of request
 * traffic, writing into the shared key cache. Issuers are refreshed one after another and
 * a failure is logged without affecting the others or later cycles.
 *
 * Timers are unref'd: a running refresher never keeps the process alive.
 */
export class KeyRefresher {
  private timer?: NodeJS.Timeout;
  private stopped = false;

  constructor(
    private keyCache: KeyCache,
    private issuers: readonly string[],
    private logger: BaseLogger,
  ) {}

  /**
   * Starts the background schedule for `policy`.
   */
  start(policy: RefreshPolicy): void {
    switch (policy.type) {
      case 'skip':
        return;
      case 'once':
        this.schedule(policy.delay, () => this.refreshAll());
        return;
      case 'periodic':
        if (policy.delay === undefined) {
          this.loop(policy.interval);
        } else {
          this.schedule(policy.delay, async () => {
            await this.refreshAll();
            this.loop(policy.interval);
          });
        }
    }
  }

  /** Cancels any pending fetch; a fetch already in flight completes but is not repeated. */
  stop(): void {
    this.stopped = true;
    clearTimeout(this.timer);
  }

  /**
   * Refreshes the keys of every non-wildcard issuer in sequence.
   */
  async refreshAll(): Promise<void> {
    for (const issuer of this.issuers) {
      if (isWildcardIssuer(issuer)) {
        continue;
      }
      try {
        await this.keyCache.refresh(issuer);
      } catch (error) {
        this.logger.error({ issuer, error: formatError(error) }, 'failed to fetch keys');
      }
    }
  }

  private loop(interval: number): void {
    this.schedule(interval, async () => {
      await this.refreshAll();
      this.loop(interval);
    });
  }

  private schedule(delay: number, task: () => Promise<void>): void {
    if (this.stopped) {
      return;
    }
    this.timer = setTimeout(() => {
      task().catch((error: unknown) => {
        this.logger.error({ error: formatError(error) }, 'key refresh failed');
      });
    }, delay);
    this.timer.unref();
  }
}
