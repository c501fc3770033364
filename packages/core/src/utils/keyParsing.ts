import { createPublicKey } from 'node:crypto';
import { readFileSync } from 'node:fs';

import type { KeyMaterial } from '../interfaces/keyMaterial.js';

/**
 * Parses a fixed key from configuration.
 *
 * PEM-encoded public keys (`PUBLIC KEY`, `RSA PUBLIC KEY` or `EC PUBLIC KEY`) become
 * public key objects; anything else is taken as a shared HMAC secret. There is no way to
 * tell a mistyped file path from a secret, so PEM content must be given inline.
 *
 * @param raw - PEM text or secret
 * @returns Key material, or undefined when `raw` is empty
 * @throws {Error} When `raw` looks like a PEM public key but cannot be parsed
 */
export function parseKeyMaterial(raw: string): KeyMaterial | undefined {
  if (raw === '') {
    return undefined;
  }
  if (
    raw.startsWith('-----BEGIN PUBLIC KEY') ||
    raw.startsWith('-----BEGIN RSA PUBLIC KEY') ||
    raw.startsWith('-----BEGIN EC PUBLIC KEY')
  ) {
    // EC keys are SPKI under a non-standard label
    const pem = raw.replace(/-----(BEGIN|END) EC PUBLIC KEY-----/g, '-----$1 PUBLIC KEY-----');
    return createPublicKey(pem);
  }
  return new TextEncoder().encode(raw);
}

/**
 * Returns `value` if it is already PEM content, otherwise reads it as a file path.
 *
 * @throws {Error} When the file cannot be read
 */
export function pemContent(value: string): string {
  if (value === '' || value.startsWith('-----BEGIN')) {
    return value;
  }
  return readFileSync(value, 'utf8');
}
