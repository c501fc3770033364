import { z } from 'zod';

/**
 * Zod schema for one JSON Web Key (RFC 7517) as returned by a key set endpoint.
 * Only the public parameters used for verification are typed; the rest pass through.
 *
 * @property kid - Key identifier; a thumbprint is computed when absent
 * @property kty - Key type: 'RSA' and 'EC' are decoded, anything else is ignored
 * @property alg - Intended algorithm, used to infer the curve of EC keys without 'crv'
 * @property n - RSA modulus (base64url)
 * @property e - RSA exponent (base64url)
 * @property crv - EC curve name
 * @property x - EC x coordinate (base64url)
 * @property y - EC y coordinate (base64url)
 */
export const jsonWebKeySchema = z
  .object({
    kid: z.string().optional(),
    kty: z.string().optional(),
    alg: z.string().optional(),
    use: z.string().optional(),
    n: z.string().optional(),
    e: z.string().optional(),
    crv: z.string().optional(),
    x: z.string().optional(),
    y: z.string().optional(),
  })
  .loose();

/**
 * Zod schema for a JSON Web Key Set: `{ "keys": [...] }`.
 */
export const jsonWebKeySetSchema = z.object({
  keys: z.array(jsonWebKeySchema),
});

export type JSONWebKey = z.infer<typeof jsonWebKeySchema>;
export type JSONWebKeySet = z.infer<typeof jsonWebKeySetSchema>;
