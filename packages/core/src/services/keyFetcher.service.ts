import { createHash, createPublicKey, type KeyObject } from 'node:crypto';

import type { BaseLogger } from 'pino';
import type { z } from 'zod';

import type { FetchedKeys, KeyMaterial } from '../interfaces/keyMaterial.js';
import type { KeyServiceFetch } from '../interfaces/keyServiceFetch.js';
import { type JSONWebKey, jsonWebKeySetSchema } from '../schemas/jwks.schema.js';
import {
  type OpenIDConfiguration,
  openIDConfigurationSchema,
} from '../schemas/openIDConfiguration.schema.js';
import { formatError } from '../utils/errorFormatting.js';

const BASE64URL = /^[A-Za-z0-9_-]*$/;

/**
 * Discovers and decodes an issuer's signing keys.
 *
 * The key set location comes from the issuer's OpenID Connect discovery document, falling
 * back to `<issuer>.well-known/jwks.json` when discovery fails for any reason. RSA and EC
 * keys are decoded to public key objects; other key types are ignored, and a key whose
 * parameters cannot be decoded is logged and skipped without failing the batch.
 *
 * @example
 * ```typescript
 * const fetcher = new KeyFetcher(createKeyServiceFetch(tls), logger);
 * const { url, keys } = await fetcher.fetchKeys('https://auth.example.com/');
 * ```
 */
export class KeyFetcher {
  constructor(
    private fetch: KeyServiceFetch,
    private logger: BaseLogger,
  ) {}

  /**
   * Fetches every key the issuer currently publishes.
   *
   * @param issuer - Canonical issuer URL (with trailing slash)
   * @returns The key set URL and its keys by identifier
   * @throws {Error} When the key set itself cannot be fetched or decoded
   */
  async fetchKeys(issuer: string): Promise<FetchedKeys> {
    const configurationUrl = `${issuer}.well-known/openid-configuration`;
    let url: string;
    try {
      const configuration = await this.fetchOpenIDConfiguration(configurationUrl);
      url = configuration.jwks_uri;
      this.logger.info({ url: configurationUrl }, 'fetched openid-configuration');
    } catch (error) {
      url = `${issuer}.well-known/jwks.json`;
      this.logger.warn(
        { url: configurationUrl, fallback: url, error: formatError(error) },
        'failed to fetch openid-configuration; falling back to direct JWKS URL',
      );
    }

    return { url, keys: await this.fetchJWKS(url) };
  }

  /**
   * Fetches and validates an OpenID Connect discovery document.
   *
   * @throws {Error} On network failure, a non-200 status, or an invalid body
   */
  async fetchOpenIDConfiguration(url: string): Promise<OpenIDConfiguration> {
    return parseBody(openIDConfigurationSchema, await this.getJSON(url), url);
  }

  /**
   * Fetches a JSON Web Key Set and decodes its keys.
   *
   * @throws {Error} On network failure, a non-200 status, or an invalid body
   */
  async fetchJWKS(url: string): Promise<Map<string, KeyMaterial>> {
    const jwks = parseBody(jsonWebKeySetSchema, await this.getJSON(url), url);

    const keys = new Map<string, KeyMaterial>();
    for (const jwk of jwks.keys) {
      const kid = jwk.kid || jwkThumbprint(jwk);
      try {
        const key = decodeJsonWebKey(jwk);
        if (key) {
          keys.set(kid, key);
        }
      } catch (error) {
        this.logger.error({ kid, url, error: formatError(error) }, 'failed to decode key');
      }
    }
    return keys;
  }

  private async getJSON(url: string): Promise<unknown> {
    const response = await this.fetch(url);
    if (response.status !== 200) {
      await response.body?.cancel();
      throw new Error(`got ${response.status} from ${url}`);
    }
    try {
      return await response.json();
    } catch (error) {
      throw new Error(`${url}: ${formatError(error)}`);
    }
  }
}

function parseBody<T>(schema: z.ZodType<T>, body: unknown, url: string): T {
  const result = schema.safeParse(body);
  if (!result.success) {
    throw new Error(`${url}: ${formatError(result.error)}`);
  }
  return result.data;
}

/**
 * Computes the RFC 7638 thumbprint used as the identifier of a key published without one.
 *
 * The canonical JSON of an EC key always names curve P-256, whatever its actual curve.
 *
 * @param jwk - Key record
 * @returns base64url SHA-256 of the canonical key JSON
 */
export function jwkThumbprint(jwk: JSONWebKey): string {
  let text = '';
  switch (jwk.kty) {
    case 'RSA':
      text = `{"e":"${jwk.e ?? ''}","kty":"RSA","n":"${jwk.n ?? ''}"}`;
      break;
    case 'EC':
      text = `{"crv":"P-256","kty":"EC","x":"${jwk.x ?? ''}","y":"${jwk.y ?? ''}"}`;
      break;
  }
  return createHash('sha256').update(text).digest('base64url');
}

/**
 * Decodes an RSA or EC key record into a public key object.
 *
 * The curve of an EC key comes from `crv`, else from `alg` (ES256, ES384, ES512), else
 * defaults to P-256.
 *
 * @param jwk - Key record
 * @returns Public key, or undefined for key types other than RSA and EC
 * @throws {Error} When a parameter is not valid base64url or the key cannot be built
 */
export function decodeJsonWebKey(jwk: JSONWebKey): KeyObject | undefined {
  switch (jwk.kty) {
    case 'RSA':
      return createPublicKey({
        key: { kty: 'RSA', n: base64url(jwk.n, 'n'), e: base64url(jwk.e, 'e') },
        format: 'jwk',
      });
    case 'EC':
      return createPublicKey({
        key: {
          kty: 'EC',
          crv: ellipticCurve(jwk),
          x: base64url(jwk.x, 'x'),
          y: base64url(jwk.y, 'y'),
        },
        format: 'jwk',
      });
    default:
      return undefined;
  }
}

function ellipticCurve(jwk: JSONWebKey): string {
  switch (jwk.crv) {
    case 'P-256':
    case 'P-384':
    case 'P-521':
      return jwk.crv;
  }
  switch (jwk.alg) {
    case 'ES384':
      return 'P-384';
    case 'ES512':
      return 'P-521';
    default:
      return 'P-256';
  }
}

function base64url(value: string | undefined, name: string): string {
  const trimmed = (value ?? '').replace(/=+$/, '');
  if (!BASE64URL.test(trimmed) || trimmed.length % 4 === 1) {
    throw new Error(`error decoding ${name}: illegal base64url data`);
  }
  return trimmed;
}
