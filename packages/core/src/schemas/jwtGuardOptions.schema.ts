import { z } from 'zod';

import { parseDuration } from '../utils/duration.js';

/** Signing algorithms accepted when `validMethods` is not configured */
export const DEFAULT_VALID_METHODS = [
  'RS256',
  'RS384',
  'RS512',
  'ES256',
  'ES384',
  'ES512',
  'HS256',
  'HS384',
  'HS512',
];

/**
 * Go-style duration string (`300ms`, `1.5h`, `2h45m`) parsed to milliseconds.
 * Negative durations are rejected.
 */
export const durationSchema = z.string().transform((value, ctx) => {
  const milliseconds = parseDuration(value);
  if (milliseconds === undefined || milliseconds < 0) {
    ctx.addIssue({ code: 'custom', message: `invalid duration "${value}"` });
    return z.NEVER;
  }
  return milliseconds;
});

/**
 * Any JSON value: the shape of a claim requirement tree.
 */
export const jsonValueSchema = z.json();

export type JsonValue = z.infer<typeof jsonValueSchema>;

/**
 * Zod schema for the declarative guard options, as produced by decoding a configuration
 * file. Defaults match an "Authorization" cookie or header carrying a token signed with
 * any RSA, EC or HMAC algorithm, forwarded to the backend untouched.
 *
 * @property validMethods - Accepted `alg` header values
 * @property issuers - Issuer URL globs trusted to supply keys on demand
 * @property skipPrefetch - Do not fetch keys for non-wildcard issuers on startup
 * @property delayPrefetch - Delay before the startup prefetch
 * @property refreshKeysInterval - Period of background key refreshes (0 disables)
 * @property insecureSkipVerify - Hostnames whose TLS certificates are not verified
 * @property rootCAs - Extra trusted CA certificates, as PEM text or file paths
 * @property secret - Fixed fallback key: a PEM public key or an HMAC secret
 * @property secrets - Fixed keys by key identifier
 * @property require - Claim name to requirement tree
 * @property optional - Allow requests that carry no token at all
 * @property redirectUnauthorized - Redirect URL template for 401 outcomes
 * @property redirectForbidden - Redirect URL template for 403 outcomes
 * @property cookieName - Cookie holding the token
 * @property headerName - Header holding the token (optionally `Bearer `-prefixed)
 * @property parameterName - Query parameter holding the token
 * @property headerMap - Header name to claim name, projected onto forwarded requests
 * @property removeMissingHeaders - Delete mapped headers whose claim is absent
 * @property forwardToken - Keep the token on the forwarded request
 * @property freshness - Seconds after `iat` past which a claim failure is a 401
 */
export const JWTGuardOptionsSchema = z.object({
  validMethods: z.array(z.string()).default(DEFAULT_VALID_METHODS),
  issuers: z.array(z.string()).default([]),
  skipPrefetch: z.boolean().default(false),
  delayPrefetch: durationSchema.default(0),
  refreshKeysInterval: durationSchema.default(0),
  insecureSkipVerify: z.array(z.string()).default([]),
  rootCAs: z.array(z.string()).default([]),
  secret: z.string().optional(),
  secrets: z.record(z.string(), z.string()).default({}),
  require: z.record(z.string(), jsonValueSchema).default({}),
  optional: z.boolean().default(false),
  redirectUnauthorized: z.string().optional(),
  redirectForbidden: z.string().optional(),
  cookieName: z.string().default('Authorization'),
  headerName: z.string().default('Authorization'),
  parameterName: z.string().optional(),
  headerMap: z.record(z.string(), z.string()).default({}),
  removeMissingHeaders: z.boolean().default(false),
  forwardToken: z.boolean().default(true),
  freshness: z.number().int().nonnegative().default(3600),
});

export type JWTGuardOptions = z.output<typeof JWTGuardOptionsSchema>;
export type JWTGuardOptionsInput = z.input<typeof JWTGuardOptionsSchema>;
