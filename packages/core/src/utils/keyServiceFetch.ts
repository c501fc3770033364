import { rootCertificates } from 'node:tls';

import { Agent, type Dispatcher, fetch } from 'undici';

import type { KeyServiceFetch } from '../interfaces/keyServiceFetch.js';

const USER_AGENT = 'claimgate (+https://www.npmjs.com/package/@claimgate/core)';

/** TLS settings for key discovery requests */
export interface KeyServiceTLSOptions {
  /** Hostnames for which certificate verification is skipped */
  insecureSkipVerify: readonly string[];
  /** PEM certificates trusted in addition to the system roots */
  rootCAs: readonly string[];
}

/**
 * Creates the HTTP client used to fetch discovery documents and key sets.
 *
 * Requests to hosts listed in `insecureSkipVerify` go through a dispatcher that does not
 * verify certificates. All other requests trust the system roots plus any `rootCAs`.
 * A `User-Agent` header is always sent.
 *
 * @param tls - Per-host verification bypass list and extra root certificates
 * @returns Fetch function resolving to the response of a GET request
 *
 * @example
 * ```typescript
 * const fetchKeys = createKeyServiceFetch({
 *   insecureSkipVerify: ['auth.internal'],
 *   rootCAs: [],
 * });
 * const response = await fetchKeys('https://auth.internal/.well-known/jwks.json');
 * ```
 */
export function createKeyServiceFetch(tls: KeyServiceTLSOptions): KeyServiceFetch {
  const insecureHosts = new Set(tls.insecureSkipVerify);
  const insecureDispatcher =
    insecureHosts.size > 0
      ? new Agent({ connect: { rejectUnauthorized: false } })
      : undefined;
  const defaultDispatcher =
    tls.rootCAs.length > 0
      ? new Agent({ connect: { ca: [...rootCertificates, ...tls.rootCAs] } })
      : undefined;

  return (url: string) => {
    const dispatcher: Dispatcher | undefined = insecureHosts.has(hostname(url))
      ? insecureDispatcher
      : defaultDispatcher;
    return fetch(url, {
      headers: { 'User-Agent': USER_AGENT, Accept: 'application/json' },
      dispatcher,
    });
  };
}

function hostname(address: string): string {
  try {
    return new URL(address).hostname;
  } catch {
    return '';
  }
}
