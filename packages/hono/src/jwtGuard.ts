import { JWTGuard, type JWTGuardConfig } from '@claimgate/core';

const guards = new WeakMap<JWTGuardConfig, JWTGuard>();

/**
 * Gets or creates the guard for a configuration object, so middleware built twice from
 * the same configuration shares one key cache and one refresher.
 * @param config - The guard configuration object
 * @returns The guard instance
 */
export function getJWTGuard(config: JWTGuardConfig): JWTGuard {
  let guard = guards.get(config);
  if (!guard) {
    guard = new JWTGuard(config);
    guards.set(config, guard);
  }
  return guard;
}
