export {
  type JSONWebKey,
  type JSONWebKeySet,
  jsonWebKeySchema,
  jsonWebKeySetSchema,
} from './jwks.schema.js';
export {
  DEFAULT_VALID_METHODS,
  durationSchema,
  type JsonValue,
  jsonValueSchema,
  type JWTGuardOptions,
  type JWTGuardOptionsInput,
  JWTGuardOptionsSchema,
} from './jwtGuardOptions.schema.js';
export {
  type OpenIDConfiguration,
  openIDConfigurationSchema,
} from './openIDConfiguration.schema.js';
