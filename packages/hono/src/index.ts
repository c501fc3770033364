export { getJWTGuard } from './jwtGuard.js';
export { type JWTContextVariables, jwtProtection } from './jwtProtection/index.js';
