export type { JWTGuardConfig } from './jwtGuardConfig.js';
export type { FetchedKeys, KeyMaterial } from './keyMaterial.js';
export type { KeyServiceFetch, KeyServiceResponse } from './keyServiceFetch.js';
