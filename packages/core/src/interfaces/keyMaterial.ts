import type { KeyObject } from 'node:crypto';

/**
 * Verification key held by the key cache: an RSA or EC public key, or the bytes of a
 * shared HMAC secret. Never mutated once stored.
 */
export type KeyMaterial = KeyObject | Uint8Array;

/** Result of fetching one issuer's key set */
export interface FetchedKeys {
  /** Key set URL the keys came from; also their source identifier in the cache */
  url: string;
  /** Key identifier to key material */
  keys: Map<string, KeyMaterial>;
}
