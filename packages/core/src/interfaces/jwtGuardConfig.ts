import type { BaseLogger } from 'pino';

import type { JWTGuardOptionsInput } from '../schemas/jwtGuardOptions.schema.js';

import type { KeyServiceFetch } from './keyServiceFetch.js';

/**
 * Configuration object for initializing a JWTGuard instance.
 * Contains the declarative options (validated on construction) plus runtime collaborators.
 */
export interface JWTGuardConfig extends JWTGuardOptionsInput {
  /** Optional pino logger (defaults to a silent logger) */
  logger?: BaseLogger;

  /** HTTP client for discovery documents and key sets (defaults to undici with the TLS options) */
  fetch?: KeyServiceFetch;

  /** Template variable seed (defaults to a snapshot of `process.env` taken on construction) */
  environment?: Record<string, string>;
}
