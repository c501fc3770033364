import { matchGlob } from './glob.js';

/** Issuers are compared with a trailing slash so `<issuer>.well-known/...` resolves. */
export function canonicalizeIssuer(issuer: string): string {
  return issuer.endsWith('/') ? issuer : `${issuer}/`;
}

/**
 * Returns true if the (canonical) issuer matches any allowed issuer glob.
 */
export function isAllowedIssuer(issuer: string, allowed: readonly string[]): boolean {
  return allowed.some((pattern) => matchGlob(pattern, issuer));
}

/** Wildcard issuers can authorize keys on demand but cannot be prefetched. */
export function isWildcardIssuer(issuer: string): boolean {
  return issuer.includes('*');
}
