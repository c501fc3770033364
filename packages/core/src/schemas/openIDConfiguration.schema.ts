import { z } from 'zod';

/**
 * Zod schema for the OpenID Connect Discovery document an issuer serves at
 * `<issuer>.well-known/openid-configuration`. Only `jwks_uri` is needed to locate the
 * issuer's signing keys; every other field is passed through untouched.
 *
 * @property issuer - Issuer identifier the document describes
 * @property jwks_uri - JSON Web Key Set endpoint for signature verification
 */
export const openIDConfigurationSchema = z
  .object({
    issuer: z.string().optional(),
    jwks_uri: z.url(),
  })
  .loose();

export type OpenIDConfiguration = z.infer<typeof openIDConfigurationSchema>;
