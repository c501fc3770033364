import { JWTGuard, type JWTGuardConfig, type JWTPayload } from '@claimgate/core';
import type { Context, MiddlewareHandler, Next } from 'hono';
import { endTime, startTime } from 'hono/timing';

import { getJWTGuard } from '../jwtGuard.js';

/**
 * Context variables available when using JWT protection middleware.
 */
export interface JWTContextVariables {
  /** Verified claims; absent when the token is optional and none was sent */
  jwtClaims?: JWTPayload;
}

/**
 * Creates middleware that authorizes requests by their bearer JWT.
 *
 * Rejected requests get the guard's response (plain text, redirect or gRPC status).
 * Accepted requests continue with the rewritten request, so downstream handlers see mapped
 * claim headers and no token when `forwardToken` is off.
 *
 * @param config - Guard configuration, or an existing guard to share
 * @returns Hono middleware handler that enforces the claim requirements
 *
 * @example
 * ```typescript
 * app.use('/api/*', jwtProtection({
 *   issuers: ['https://auth.example.com'],
 *   require: { aud: 'api.example.com' },
 *   headerMap: { 'X-User': 'sub' },
 * }));
 * ```
 */
export function jwtProtection(config: JWTGuardConfig | JWTGuard): MiddlewareHandler {
  const guard = config instanceof JWTGuard ? config : getJWTGuard(config);

  return async (
    c: Context<{ Variables: JWTContextVariables }>,
    next: Next,
  ): Promise<Response | undefined> => {
    startTime(c, 'jwtProtectionMiddleware');
    const result = await guard.authorize(c.req.raw);
    endTime(c, 'jwtProtectionMiddleware');

    if (result.type === 'respond') {
      return result.response;
    }

    c.req.raw = result.request;
    c.set('jwtClaims', result.claims);
    await next();
  };
}
