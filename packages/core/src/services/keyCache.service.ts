import type { BaseLogger } from 'pino';

import type { KeyMaterial } from '../interfaces/keyMaterial.js';
import { formatError } from '../utils/errorFormatting.js';
import { canonicalizeIssuer, isAllowedIssuer } from '../utils/issuer.js';

import type { KeyFetcher } from './keyFetcher.service.js';

/** Source identifier of the keys configured statically under `secrets` */
export const INTERNAL_SOURCE = 'internal';

export interface KeyCacheOptions {
  /** Canonical issuer globs trusted to supply keys on demand */
  issuers: readonly string[];
  /** Fixed key returned when no cached key can be found */
  secret?: KeyMaterial;
  /** Fixed keys by identifier */
  secrets: ReadonlyMap<string, KeyMaterial>;
}

/**
 * Key identifier to verification key, plus the set of identifiers each source last
 * supplied. A source is a key set URL, or {@link INTERNAL_SOURCE} for fixed keys.
 * Every cached key belongs to at least one source; keys that no source supplies any
 * more are purged after each store.
 *
 * Network fetches run before the maps are touched, and each store-and-purge completes
 * synchronously, so lookups never wait on the network and never see a half-applied
 * key set. Concurrent misses on the same unseen key may each trigger a fetch.
 */
export class KeyCache {
  private keys = new Map<string, KeyMaterial>();
  private sourceKeys = new Map<string, Set<string>>();

  constructor(
    private fetcher: KeyFetcher,
    private options: KeyCacheOptions,
    private logger: BaseLogger,
  ) {
    for (const [kid, key] of options.secrets) {
      this.keys.set(kid, key);
    }
    this.sourceKeys.set(INTERNAL_SOURCE, new Set(options.secrets.keys()));
  }

  /** Number of cached keys */
  get size(): number {
    return this.keys.size;
  }

  /**
   * Returns the cached key for `kid` without any network activity.
   */
  lookup(kid: string): KeyMaterial | undefined {
    return this.keys.get(kid);
  }

  /**
   * Replaces the key identifiers attributed to `sourceId` with `keys`, caches the keys,
   * then purges any key no source supplies.
   *
   * @param sourceId - Key set URL, or {@link INTERNAL_SOURCE}
   * @param keys - Complete current key set of that source
   */
  store(sourceId: string, keys: ReadonlyMap<string, KeyMaterial>): void {
    for (const [kid, key] of keys) {
      this.logger.info({ kid, url: sourceId }, 'fetched key');
      this.keys.set(kid, key);
    }
    this.sourceKeys.set(sourceId, new Set(keys.keys()));
    this.purge();
  }

  /**
   * Fetches the issuer's current key set and stores it.
   *
   * @param issuer - Canonical issuer URL
   * @returns The key set URL the keys were stored under
   * @throws {Error} When the key set cannot be fetched
   */
  async refresh(issuer: string): Promise<string> {
    const { url, keys } = await this.fetcher.fetchKeys(issuer);
    this.store(url, keys);
    return url;
  }

  /**
   * Resolves the verification key for a token.
   *
   * A cached key is returned immediately. On a miss, if the token's issuer matches an
   * allowed issuer, that issuer's keys are refreshed and the lookup is retried once.
   * When no key is found the fixed `secret` is used if configured; otherwise the most
   * specific error met on the way is thrown.
   *
   * @param kid - Key identifier from the token header
   * @param issuer - Unverified `iss` claim of the token
   * @returns Key material to verify the signature with
   * @throws {Error} When no key can be resolved
   */
  async resolveKey(kid: string | undefined, issuer: string | undefined): Promise<KeyMaterial> {
    let failure = new Error('no secret configured');

    if ((this.options.issuers.length > 0 || this.keys.size > 0) && kid !== undefined) {
      const cached = this.lookup(kid);
      if (cached) {
        return cached;
      }

      if (issuer !== undefined) {
        const canonical = canonicalizeIssuer(issuer);
        if (isAllowedIssuer(canonical, this.options.issuers)) {
          try {
            const url = await this.refresh(canonical);
            const refreshed = this.lookup(kid);
            if (refreshed) {
              return refreshed;
            }
            this.logger.warn({ kid, url }, 'refreshed keys and still no match');
            failure = new Error(`key ${kid} not found at ${url}`);
          } catch (error) {
            this.logger.error(
              { issuer: canonical, error: formatError(error) },
              'failed to fetch keys',
            );
            failure = error instanceof Error ? error : new Error(formatError(error));
          }
        } else {
          failure = new Error(`issuer ${canonical} is not valid`);
        }
      }
    }

    if (this.options.secret) {
      return this.options.secret;
    }
    throw failure;
  }

  private isSuppliedKey(kid: string): boolean {
    for (const kids of this.sourceKeys.values()) {
      if (kids.has(kid)) {
        return true;
      }
    }
    return false;
  }

  private purge(): void {
    for (const kid of this.keys.keys()) {
      if (!this.isSuppliedKey(kid)) {
        this.logger.info({ kid }, 'key dropped');
        this.keys.delete(kid);
      }
    }
  }
}
