import { beforeEach, describe, expect, it, vi } from 'vitest';

import type { KeyMaterial } from '../src/interfaces/keyMaterial.js';
import {
  INTERNAL_SOURCE,
  KeyCache,
  type KeyCacheOptions,
} from '../src/services/keyCache.service.js';
import { KeyFetcher } from '../src/services/keyFetcher.service.js';

import {
  createMockFetch,
  createMockLogger,
  ISSUER,
  JWKS_URL,
  type MockLogger,
} from './helpers/fixtures.js';

const key = (text: string): KeyMaterial => new TextEncoder().encode(text);
const keySet = (...kids: string[]) =>
  new Map(kids.map((kid): [string, KeyMaterial] => [kid, key(kid)]));

describe('KeyCache', () => {
  let logger: MockLogger;
  let fetcher: KeyFetcher;

  const createCache = (options: Partial<KeyCacheOptions> = {}) =>
    new KeyCache(fetcher, { issuers: [], secrets: new Map(), ...options }, logger);

  beforeEach(() => {
    logger = createMockLogger();
    fetcher = new KeyFetcher(createMockFetch({}), logger);
  });

  describe('store', () => {
    it('makes fetched keys retrievable by identifier', () => {
      const cache = createCache();

      cache.store(JWKS_URL, keySet('k1', 'k2'));

      expect(cache.size).toBe(2);
      expect(cache.lookup('k1')).toEqual(key('k1'));
      expect(logger.info).toHaveBeenCalledWith({ kid: 'k1', url: JWKS_URL }, 'fetched key');
    });

    it('purges keys no source supplies any more', () => {
      const cache = createCache();
      cache.store('https://a.example.com/keys', keySet('k1', 'k2'));
      cache.store('https://b.example.com/keys', keySet('k2', 'k3'));

      cache.store('https://a.example.com/keys', keySet('k1'));
      expect(cache.lookup('k2')).toBeDefined();

      cache.store('https://b.example.com/keys', keySet());
      expect(cache.lookup('k1')).toBeDefined();
      expect(cache.lookup('k2')).toBeUndefined();
      expect(cache.lookup('k3')).toBeUndefined();
      expect(cache.size).toBe(1);
      expect(logger.info).toHaveBeenCalledWith({ kid: 'k2' }, 'key dropped');
    });

    it('keeps fixed secrets across fetches', () => {
      const cache = createCache({ secrets: keySet('static') });

      cache.store(JWKS_URL, keySet('k1'));
      cache.store(JWKS_URL, keySet());

      expect(cache.lookup('static')).toEqual(key('static'));
      expect(cache.size).toBe(1);
    });

    it('lets the internal source be replaced like any other', () => {
      const cache = createCache({ secrets: keySet('static') });

      cache.store(INTERNAL_SOURCE, keySet('rotated'));

      expect(cache.lookup('static')).toBeUndefined();
      expect(cache.lookup('rotated')).toBeDefined();
    });
  });

  describe('resolveKey', () => {
    it('returns a cached key without fetching', async () => {
      const fetchKeys = vi.spyOn(fetcher, 'fetchKeys');
      const cache = createCache({ issuers: [ISSUER], secrets: keySet('k1') });

      await expect(cache.resolveKey('k1', ISSUER)).resolves.toEqual(key('k1'));
      expect(fetchKeys).not.toHaveBeenCalled();
    });

    it('refreshes an allowed issuer on a miss', async () => {
      const fetchKeys = vi
        .spyOn(fetcher, 'fetchKeys')
        .mockResolvedValue({ url: JWKS_URL, keys: keySet('k2') });
      const cache = createCache({ issuers: [ISSUER] });

      await expect(cache.resolveKey('k2', 'https://auth.example.com')).resolves.toEqual(
        key('k2'),
      );
      expect(fetchKeys).toHaveBeenCalledWith(ISSUER);
    });

    it('accepts issuers matching a wildcard', async () => {
      vi.spyOn(fetcher, 'fetchKeys').mockResolvedValue({ url: JWKS_URL, keys: keySet('k2') });
      const cache = createCache({ issuers: ['https://*.example.com/'] });

      await expect(cache.resolveKey('k2', 'https://tenant.example.com/')).resolves.toEqual(
        key('k2'),
      );
    });

    it('fails when the refreshed set still lacks the key', async () => {
      vi.spyOn(fetcher, 'fetchKeys').mockResolvedValue({ url: JWKS_URL, keys: keySet('k2') });
      const cache = createCache({ issuers: [ISSUER] });

      await expect(cache.resolveKey('k9', ISSUER)).rejects.toThrow(
        `key k9 not found at ${JWKS_URL}`,
      );
      expect(logger.warn).toHaveBeenCalledWith(
        { kid: 'k9', url: JWKS_URL },
        'refreshed keys and still no match',
      );
    });

    it('rejects issuers that are not allowed', async () => {
      const fetchKeys = vi.spyOn(fetcher, 'fetchKeys');
      const cache = createCache({ issuers: [ISSUER] });

      await expect(cache.resolveKey('k1', 'https://evil.example.net')).rejects.toThrow(
        'issuer https://evil.example.net/ is not valid',
      );
      expect(fetchKeys).not.toHaveBeenCalled();
    });

    it('surfaces fetch failures', async () => {
      vi.spyOn(fetcher, 'fetchKeys').mockRejectedValue(new Error('connection refused'));
      const cache = createCache({ issuers: [ISSUER] });

      await expect(cache.resolveKey('k1', ISSUER)).rejects.toThrow('connection refused');
      expect(logger.error).toHaveBeenCalledWith(
        { issuer: ISSUER, error: 'connection refused' },
        'failed to fetch keys',
      );
    });

    it('falls back to the fixed secret', async () => {
      vi.spyOn(fetcher, 'fetchKeys').mockResolvedValue({ url: JWKS_URL, keys: keySet() });
      const cache = createCache({ issuers: [ISSUER], secret: key('test-secret') });

      await expect(cache.resolveKey('k9', ISSUER)).resolves.toEqual(key('test-secret'));
      await expect(cache.resolveKey(undefined, undefined)).resolves.toEqual(key('test-secret'));
    });

    it('fails without any key source', async () => {
      const cache = createCache();

      await expect(cache.resolveKey(undefined, ISSUER)).rejects.toThrow('no secret configured');
      await expect(cache.resolveKey('k1', undefined)).rejects.toThrow('no secret configured');
    });
  });

  describe('refresh', () => {
    it('stores the fetched set under its URL', async () => {
      vi.spyOn(fetcher, 'fetchKeys').mockResolvedValue({ url: JWKS_URL, keys: keySet('k1') });
      const cache = createCache({ issuers: [ISSUER] });

      await expect(cache.refresh(ISSUER)).resolves.toBe(JWKS_URL);
      expect(cache.lookup('k1')).toBeDefined();
    });
  });
});
