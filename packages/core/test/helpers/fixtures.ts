import {
  CompactSign,
  exportJWK,
  generateKeyPair,
  type JWK,
  type JWTPayload,
  type KeyLike,
  SignJWT,
} from 'jose';
import type { BaseLogger } from 'pino';
import { vi } from 'vitest';

import type { KeyServiceFetch } from '../../src/interfaces/keyServiceFetch.js';

export const TEST_SECRET = 'test-secret';
export const ISSUER = 'https://auth.example.com/';
export const JWKS_URL = 'https://auth.example.com/keys';

export const createMockLogger = () =>
  ({
    level: 'debug',
    fatal: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
    trace: vi.fn(),
    silent: vi.fn(),
  }) satisfies BaseLogger;

export type MockLogger = ReturnType<typeof createMockLogger>;

/**
 * Fetch stub serving fixed JSON bodies by URL; anything else is a 404.
 */
export const createMockFetch = (routes: Record<string, unknown>) =>
  vi.fn<KeyServiceFetch>(async (url) => {
    if (!Object.hasOwn(routes, url)) {
      return { status: 404, json: async () => ({}) };
    }
    return { status: 200, json: async () => routes[url] };
  });

export const discoveryRoutes = (keys: JWK[], issuer = ISSUER): Record<string, unknown> => ({
  [`${issuer}.well-known/openid-configuration`]: { issuer, jwks_uri: JWKS_URL },
  [JWKS_URL]: { keys },
});

export interface SigningKey {
  kid: string;
  publicKey: KeyLike;
  privateKey: KeyLike;
  jwk: JWK;
}

export const createSigningKey = async (kid: string, alg = 'RS256'): Promise<SigningKey> => {
  const { publicKey, privateKey } = await generateKeyPair(alg);
  const jwk = { ...(await exportJWK(publicKey)), kid, alg };
  return { kid, publicKey, privateKey, jwk };
};

export const signWithKey = (key: SigningKey, claims: JWTPayload, alg = 'RS256') =>
  new SignJWT(claims).setProtectedHeader({ alg, kid: key.kid }).sign(key.privateKey);

export const signWithSecret = (claims: JWTPayload, secret = TEST_SECRET, kid?: string) =>
  new SignJWT(claims)
    .setProtectedHeader(kid === undefined ? { alg: 'HS256' } : { alg: 'HS256', kid })
    .sign(new TextEncoder().encode(secret));

/**
 * Signs an arbitrary JSON payload, including claims whose types a JWT payload forbids.
 */
export const signRawWithSecret = (payload: Record<string, unknown>, kid: string) =>
  new CompactSign(new TextEncoder().encode(JSON.stringify(payload)))
    .setProtectedHeader({ alg: 'HS256', kid })
    .sign(new TextEncoder().encode(TEST_SECRET));

export const nowSeconds = () => Math.floor(Date.now() / 1000);
