import type {
  AuthorizationResult,
  AuthorizationSession,
  EngineResponse,
  IntrospectionResponse,
  RequestParams,
  TokenEndpointRequest,
  TokenResponse,
  TokenTypeHint,
} from './types/oauth.js';
import type { OAuthClient } from './types/client.js';
import type { IdTokenClaims } from './types/token.js';
import type { IOAuthStorage, PasswordVerifier } from './storage/interfaces/index.js';
import { createConfig, ConfigError, type EngineConfig, type EngineConfigInput } from './config/index.js';
import { createLogger, type Logger } from './logging/logger.js';
import { OAuthError, toOAuthError } from './errors/oauth-error.js';
import { ScopeService } from './services/scope-service.js';
import { ClientAuthenticator } from './services/client-authenticator.js';
import { createTokenCodec, type ActiveAccessToken, type TokenCodec } from './services/token-codec.js';
import { TokenService } from './services/token-service.js';
import {
  IntrospectionService,
  type AccessRequirement,
} from './services/introspection-service.js';
import { AuthorizationService } from './services/authorization-service.js';
import { IdTokenService } from './services/id-token-service.js';
import { GRANT_TYPE_PASSWORD } from './config/constants.js';

export interface OAuth2EngineOptions {
  storage: IOAuthStorage;
  /** Validated with `createConfig`; an already built configuration is accepted too */
  config?: EngineConfigInput;
  /** Required when the password grant is enabled */
  passwordVerifier?: PasswordVerifier;
  /** Milliseconds since the epoch; every expiry is judged against it */
  clock?: () => number;
  logger?: Logger;
}

/**
 * OAuth 2.0 authorization-server engine
 *
 * Every operation resolves to a response the web layer can serialize;
 * protocol errors and unexpected failures both come back as error bodies.
 */
export interface OAuth2Engine {
  readonly config: EngineConfig;

  /**
   * Token endpoint (RFC 6749 Section 3.2)
   */
  issue(request: TokenEndpointRequest): Promise<EngineResponse<TokenResponse>>;

  /**
   * Authorization endpoint, after the resource owner has logged in and consented
   *
   * `session.authTime` becomes the `auth_time` claim of any ID token issued
   * for this authorization.
   */
  authorize(
    params: RequestParams,
    subject: string,
    session?: AuthorizationSession
  ): Promise<AuthorizationResult>;

  /**
   * Authorization endpoint, after the resource owner has refused consent
   */
  deny(params: RequestParams): Promise<AuthorizationResult>;

  /**
   * Token introspection (RFC 7662)
   */
  introspect(token: string, hint?: TokenTypeHint): Promise<EngineResponse<IntrospectionResponse>>;

  /**
   * Token revocation (RFC 7009); `client` restricts revocation to its own tokens
   */
  revoke(token: string, hint?: TokenTypeHint, client?: OAuthClient): Promise<EngineResponse<Record<string, never>>>;

  /**
   * Resource-side check: a live token meeting the scope requirement, or null
   */
  verifyAccess(token: string, requirement: AccessRequirement): Promise<ActiveAccessToken | null>;

  /**
   * Authenticate a client from request credentials (revocation and introspection endpoints)
   */
  authenticateClient(params: RequestParams, authorization?: string): Promise<EngineResponse<OAuthClient>>;

  /**
   * Claims of a live ID token issued here, or null.
   * `audience` additionally requires the token to be meant for that client.
   */
  validateIdToken(token: string, audience?: string): Promise<IdTokenClaims | null>;
}

/**
 * Create an engine over the given storage
 */
export function createOAuth2Engine(options: OAuth2EngineOptions): OAuth2Engine {
  const config = createConfig(options.config ?? {});

  if (config.enabledGrants.includes(GRANT_TYPE_PASSWORD) && !options.passwordVerifier) {
    throw new ConfigError('The password grant is enabled but no passwordVerifier was provided');
  }

  const clock = options.clock ?? Date.now;
  const logger = options.logger ?? createLogger(config.logging.level, { component: 'oauth2-engine' });
  const { storage, passwordVerifier } = options;

  const scopes = new ScopeService(config.scopes);
  const clientAuthenticator = new ClientAuthenticator(storage.clients);
  const codec: TokenCodec = createTokenCodec(config, storage.tokens);
  const idTokens = config.openid
    ? new IdTokenService(config.openid, config.issuer, config.lifetimes.idToken)
    : null;

  const tokenService = new TokenService({
    config,
    storage,
    scopes,
    passwordVerifier,
    codec,
    clientAuthenticator,
    idTokens,
    logger,
  });
  const introspectionService = new IntrospectionService({ storage, codec, scopes, logger });
  const authorizationService = new AuthorizationService({
    config,
    storage,
    scopes,
    clientAuthenticator,
    tokenService,
    idTokens,
    logger,
  });

  const now = (): Date => new Date(clock());

  /**
   * Run an operation, turning any failure into an error response
   */
  async function respond<T>(operation: string, work: () => Promise<T>): Promise<EngineResponse<T>> {
    try {
      return { ok: true, status: 200, body: await work() };
    } catch (error) {
      const oauthError = toOAuthError(error);

      if (error instanceof OAuthError && oauthError.code !== 'server_error') {
        logger.debug(`${operation} rejected`, {
          error: oauthError.code,
          description: oauthError.description,
        });
      } else {
        logger.error(`${operation} failed`, {
          error: error instanceof OAuthError ? (error.cause ?? error) : error,
        });
      }

      return { ok: false, status: oauthError.statusCode, body: oauthError.toJSON() };
    }
  }

  return {
    config,

    issue(request) {
      return respond('Token request', () => tokenService.exchange(request, now()));
    },

    authorize(params, subject, session) {
      return authorizationService.authorize(params, subject, now(), session);
    },

    deny(params) {
      return authorizationService.deny(params);
    },

    introspect(token, hint) {
      return respond('Introspection', () => introspectionService.introspect(token, now(), hint));
    },

    revoke(token, hint, client) {
      return respond<Record<string, never>>('Revocation', async () => {
        await introspectionService.revoke(token, now(), hint, client);
        return {};
      });
    },

    async verifyAccess(token, requirement) {
      try {
        return await introspectionService.verifyAccess(token, requirement, now());
      } catch (error) {
        logger.error('Access check failed', { error });
        return null;
      }
    },

    async authenticateClient(params, authorization) {
      return respond('Client authentication', async () => {
        const { client } = await clientAuthenticator.authenticate(params, authorization);
        return client;
      });
    },

    async validateIdToken(token, audience) {
      if (!idTokens) {
        return null;
      }
      try {
        return await idTokens.validate(token, now(), audience);
      } catch (error) {
        logger.error('ID token validation failed', { error });
        return null;
      }
    },
  };
}
