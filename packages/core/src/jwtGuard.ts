import { decodeJwt, type JWTPayload, jwtVerify } from 'jose';
import { type BaseLogger, pino } from 'pino';

import type { JWTGuardConfig } from './interfaces/jwtGuardConfig.js';
import type { KeyMaterial } from './interfaces/keyMaterial.js';
import {
  type JWTGuardOptions,
  type JWTGuardOptionsInput,
  JWTGuardOptionsSchema,
} from './schemas/index.js';
import { KeyCache } from './services/keyCache.service.js';
import { KeyFetcher } from './services/keyFetcher.service.js';
import { KeyRefresher, selectRefreshPolicy } from './services/keyRefresher.service.js';
import {
  buildRequirements,
  type Requirements,
  validateClaims,
} from './services/requirements.service.js';
import { hasToken } from './utils/contentType.js';
import { parseCookieHeader, serializeCookieHeader } from './utils/cookies.js';
import { snapshotEnvironment } from './utils/environment.js';
import { formatError } from './utils/errorFormatting.js';
import { canonicalizeIssuer } from './utils/issuer.js';
import { parseKeyMaterial, pemContent } from './utils/keyParsing.js';
import { createKeyServiceFetch } from './utils/keyServiceFetch.js';
import { compileTemplate, type Template, type TemplateVariables } from './utils/template.js';

/** Status of a rejected request: 401 when re-authenticating may help, 403 otherwise. */
export type RejectionStatus = 401 | 403;

/**
 * Outcome of {@link JWTGuard.authorize}.
 *
 * - `forward`: pass `request` (token possibly stripped, mapped claim headers added) to
 *   the backend; `claims` is absent when an optional token was not supplied
 * - `respond`: return `response` to the client; `status` is the rejection status, which
 *   differs from the response status for redirects and gRPC callers
 */
export type AuthorizationResult =
  | { type: 'forward'; request: Request; claims?: JWTPayload }
  | { type: 'respond'; response: Response; status: RejectionStatus };

type Verdict =
  | { valid: true; claims?: JWTPayload }
  | { valid: false; status: RejectionStatus; error: Error };

/** Headers and URL of the request being forwarded, rewritten in place. */
interface ForwardedParts {
  headers: Headers;
  url: URL;
}

interface GuardSetup {
  options: JWTGuardOptions;
  keyCache: KeyCache;
  refresher: KeyRefresher;
  requirements: Requirements;
  redirectUnauthorized?: Template;
  redirectForbidden?: Template;
}

/**
 * Bearer-token guard: authenticates a request by its signed JWT, enforces the configured
 * claim requirements, and decides whether the request is forwarded or answered.
 *
 * Keys are resolved from fixed secrets or fetched on demand from trusted issuers, with
 * optional background prefetch and periodic refresh.
 *
 * @example
 * ```typescript
 * const guard = new JWTGuard({
 *   issuers: ['https://auth.example.com'],
 *   require: { aud: 'api.example.com', roles: ['admin', 'billing'] },
 *   headerMap: { 'X-User': 'sub' },
 *   logger,
 * });
 *
 * const result = await guard.authorize(request);
 * if (result.type === 'respond') {
 *   return result.response;
 * }
 * return backend(result.request);
 * ```
 */
export class JWTGuard {
  readonly options: JWTGuardOptions;
  private logger: BaseLogger;
  private environment: Readonly<Record<string, string>>;
  private keyCache: KeyCache;
  private refresher: KeyRefresher;
  private requirements: Requirements;
  private redirectUnauthorized?: Template;
  private redirectForbidden?: Template;

  /**
   * Validates the configuration, builds the key cache and requirements, and starts the
   * background key schedule.
   *
   * @param config - Declarative options plus optional logger, fetch and environment
   * @throws {Error} When the configuration is invalid
   */
  constructor(config: JWTGuardConfig) {
    const { logger, fetch, environment, ...input } = config;
    this.logger = logger ?? pino({ level: 'silent' });
    this.environment = environment ?? snapshotEnvironment();

    const setup = configure(input, fetch, this.logger);
    this.options = setup.options;
    this.keyCache = setup.keyCache;
    this.refresher = setup.refresher;
    this.requirements = setup.requirements;
    this.redirectUnauthorized = setup.redirectUnauthorized;
    this.redirectForbidden = setup.redirectForbidden;

    this.refresher.start(selectRefreshPolicy(this.options));
  }

  /**
   * Authorizes a request.
   *
   * @param request - Incoming request
   * @returns Request to forward, or response to send
   */
  async authorize(request: Request): Promise<AuthorizationResult> {
    const variables = this.createTemplateVariables(request);
    const parts: ForwardedParts = {
      headers: new Headers(request.headers),
      url: new URL(request.url),
    };

    const verdict = await this.validate(parts, variables);
    if (verdict.valid) {
      return {
        type: 'forward',
        request: new Request(parts.url.href, {
          method: request.method,
          headers: parts.headers,
          body: request.body,
          duplex: 'half',
          redirect: request.redirect,
          signal: request.signal,
        }),
        claims: verdict.claims,
      };
    }

    this.logger.debug(
      {
        method: request.method,
        url: request.url,
        status: verdict.status,
        error: verdict.error.message,
      },
      'request rejected',
    );
    return {
      type: 'respond',
      response: this.rejection(request, verdict.status, verdict.error, variables),
      status: verdict.status,
    };
  }

  /**
   * Builds the template variables of a request: the environment snapshot overlaid with
   * `Method`, `Host`, `Path` (path and query), `Scheme` and `URL`.
   */
  createTemplateVariables(request: Request): TemplateVariables {
    const url = new URL(request.url);
    return {
      ...this.environment,
      Method: request.method,
      Host: url.host,
      Path: `${url.pathname}${url.search}`,
      Scheme: url.protocol.replace(/:$/, ''),
      URL: url.href,
    };
  }

  /**
   * Stops background key fetches. Requests can still be authorized afterwards.
   */
  close(): void {
    this.refresher.stop();
  }

  private async validate(parts: ForwardedParts, variables: TemplateVariables): Promise<Verdict> {
    const token = this.extractToken(parts);
    if (token === '') {
      if (this.options.optional) {
        return { valid: true };
      }
      return { valid: false, status: 401, error: new Error('no token provided') };
    }

    let claims: JWTPayload;
    try {
      claims = await this.verify(token);
    } catch (error) {
      return { valid: false, status: 401, error: asError(error) };
    }

    try {
      validateClaims(this.requirements, claims, variables);
    } catch (error) {
      return {
        valid: false,
        status: this.allowRefresh(claims) ? 401 : 403,
        error: asError(error),
      };
    }

    this.mapClaimsToHeaders(claims, parts.headers);
    return { valid: true, claims };
  }

  private async verify(token: string): Promise<JWTPayload> {
    const { payload } = await jwtVerify(
      token,
      (header) => this.keyCache.resolveKey(header.kid, issuerHint(token)),
      { algorithms: this.options.validMethods },
    );
    return payload;
  }

  /** A token issued longer ago than `freshness` may be re-issued, so a claim failure is a 401. */
  private allowRefresh(claims: JWTPayload): boolean {
    const { iat } = claims;
    if (this.options.freshness === 0 || typeof iat !== 'number' || !Number.isInteger(iat)) {
      return false;
    }
    return Math.floor(Date.now() / 1000) - iat > this.options.freshness;
  }

  private extractToken(parts: ForwardedParts): string {
    let token = '';
    if (this.options.cookieName !== '') {
      token = this.extractTokenFromCookie(parts.headers, this.options.cookieName);
    }
    if (token === '' && this.options.headerName !== '') {
      token = this.extractTokenFromHeader(parts.headers, this.options.headerName);
    }
    if (token === '' && this.options.parameterName) {
      token = this.extractTokenFromQuery(parts.url, this.options.parameterName);
    }
    return token;
  }

  private extractTokenFromCookie(headers: Headers, name: string): string {
    const cookies = parseCookieHeader(headers.get('Cookie'));
    const cookie = cookies.find((candidate) => candidate.name === name);
    if (!cookie) {
      return '';
    }
    if (!this.options.forwardToken) {
      const remaining = cookies.filter((candidate) => candidate.name !== name);
      if (remaining.length > 0) {
        headers.set('Cookie', serializeCookieHeader(remaining));
      } else {
        headers.delete('Cookie');
      }
    }
    return cookie.value;
  }

  private extractTokenFromHeader(headers: Headers, name: string): string {
    const joined = headers.get(name);
    if (joined === null) {
      return '';
    }
    if (!this.options.forwardToken) {
      headers.delete(name);
    }
    // repeated headers arrive joined with ", "; only the first counts
    const [value = ''] = joined.split(',');
    return /^bearer /i.test(value) ? value.slice(7) : value;
  }

  private extractTokenFromQuery(url: URL, name: string): string {
    const token = url.searchParams.get(name);
    if (token === null) {
      return '';
    }
    if (!this.options.forwardToken) {
      url.searchParams.delete(name);
    }
    return token;
  }

  private mapClaimsToHeaders(claims: JWTPayload, headers: Headers): void {
    for (const [header, claim] of Object.entries(this.options.headerMap)) {
      if (Object.hasOwn(claims, claim)) {
        const value = claims[claim];
        // arrays, objects and null as JSON
        const text = typeof value === 'object' ? JSON.stringify(value) : String(value);
        try {
          headers.append(header, toByteString(text));
        } catch (error) {
          this.logger.warn(
            { header, claim, error: formatError(error) },
            'cannot map claim to header',
          );
        }
      } else if (this.options.removeMissingHeaders) {
        headers.delete(header);
      }
    }
  }

  private rejection(
    request: Request,
    status: RejectionStatus,
    error: Error,
    variables: TemplateVariables,
  ): Response {
    if (this.redirectUnauthorized) {
      const template =
        status === 403 && this.redirectForbidden
          ? this.redirectForbidden
          : this.redirectUnauthorized;
      let location: string;
      try {
        location = template.expand(variables);
      } catch (expandError) {
        this.logger.error({ error: formatError(expandError) }, 'failed to get redirect URL');
        return textResponse(formatError(expandError), 500);
      }
      return new Response(null, { status: 302, headers: { Location: location } });
    }

    if (hasToken(request.headers.get('Content-Type') ?? '', 'application/grpc')) {
      return new Response(null, {
        status: 200,
        headers: {
          'Content-Type': 'application/grpc',
          'grpc-status': status === 401 ? '16' : '7',
          'grpc-message': status === 401 ? 'UNAUTHENTICATED' : 'PERMISSION_DENIED',
        },
      });
    }

    return textResponse(error.message, status);
  }
}

function textResponse(message: string, status: number): Response {
  return new Response(`${message}\n`, {
    status,
    headers: {
      'Content-Type': 'text/plain; charset=utf-8',
      'X-Content-Type-Options': 'nosniff',
    },
  });
}

/**
 * Header values are byte strings: text beyond Latin-1 is sent as its UTF-8 bytes.
 */
function toByteString(text: string): string {
  if (!/[^\u0000-\u00ff]/.test(text)) {
    return text;
  }
  return Array.from(new TextEncoder().encode(text), (byte) => String.fromCharCode(byte)).join('');
}

/** Unverified `iss`, used only to pick a key source. */
function issuerHint(token: string): string | undefined {
  const { iss } = decodeJwt(token);
  return typeof iss === 'string' ? iss : undefined;
}

function asError(error: unknown): Error {
  return error instanceof Error ? error : new Error(formatError(error));
}

function configure(
  input: JWTGuardOptionsInput,
  fetch: JWTGuardConfig['fetch'],
  logger: BaseLogger,
): GuardSetup {
  try {
    const options = JWTGuardOptionsSchema.parse(input);

    const rootCAs = options.rootCAs.map((rootCA) => {
      try {
        return pemContent(rootCA);
      } catch (error) {
        throw new Error(`failed to load root CA: ${formatError(error)}`);
      }
    });
    const issuers = options.issuers.map(canonicalizeIssuer);

    const fetcher = new KeyFetcher(
      fetch ?? createKeyServiceFetch({ insecureSkipVerify: options.insecureSkipVerify, rootCAs }),
      logger,
    );
    const keyCache = new KeyCache(
      fetcher,
      {
        issuers,
        secret: parseSecret(options.secret),
        secrets: parseSecrets(options.secrets),
      },
      logger,
    );

    return {
      options,
      keyCache,
      refresher: new KeyRefresher(keyCache, issuers, logger),
      requirements: buildRequirements(options.require, logger),
      redirectUnauthorized:
        options.redirectUnauthorized === undefined
          ? undefined
          : compileTemplate(options.redirectUnauthorized),
      redirectForbidden:
        options.redirectForbidden === undefined
          ? undefined
          : compileTemplate(options.redirectForbidden),
    };
  } catch (error) {
    throw new Error(`[JWTGuard] Invalid configuration: ${formatError(error)}`);
  }
}

function parseSecret(secret: string | undefined): KeyMaterial | undefined {
  if (secret === undefined) {
    return undefined;
  }
  try {
    return parseKeyMaterial(secret);
  } catch (error) {
    throw new Error(`secret: ${formatError(error)}`);
  }
}

function parseSecrets(secrets: Record<string, string>): Map<string, KeyMaterial> {
  const keys = new Map<string, KeyMaterial>();
  for (const [kid, raw] of Object.entries(secrets)) {
    let key: KeyMaterial | undefined;
    try {
      key = parseKeyMaterial(raw);
    } catch (error) {
      throw new Error(`kid ${kid}: ${formatError(error)}`);
    }
    if (!key) {
      throw new Error(`kid ${kid}: invalid key: Key is empty`);
    }
    keys.set(kid, key);
  }
  return keys;
}
