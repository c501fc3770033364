export type { JWTPayload } from 'jose';

export type {
  FetchedKeys,
  JWTGuardConfig,
  KeyMaterial,
  KeyServiceFetch,
  KeyServiceResponse,
} from './interfaces/index.js';
export {
  type AuthorizationResult,
  JWTGuard,
  type RejectionStatus,
} from './jwtGuard.js';
export * from './schemas/index.js';
export { INTERNAL_SOURCE, KeyCache, type KeyCacheOptions } from './services/keyCache.service.js';
export { decodeJsonWebKey, jwkThumbprint, KeyFetcher } from './services/keyFetcher.service.js';
export {
  KeyRefresher,
  type RefreshPolicy,
  selectRefreshPolicy,
} from './services/keyRefresher.service.js';
export {
  AllRequirement,
  AnyRequirement,
  buildRequirement,
  buildRequirements,
  type Requirement,
  type Requirements,
  TemplateRequirement,
  validateClaims,
  ValueRequirement,
} from './services/requirements.service.js';
export { formatError } from './utils/errorFormatting.js';
export { matchGlob } from './utils/glob.js';
export { parseDuration } from './utils/duration.js';
export { createKeyServiceFetch, type KeyServiceTLSOptions } from './utils/keyServiceFetch.js';
export { compileTemplate, type Template, type TemplateVariables } from './utils/template.js';
