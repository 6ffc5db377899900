import type { OAuthClient } from '../types/client.js';
import type { AuthorizationGrant } from '../types/token.js';
import type {
  AuthorizationRequest,
  AuthorizationResult,
  AuthorizationSession,
  CodeChallengeMethod,
  RequestParams,
  ResponseType,
} from '../types/oauth.js';
import type { EngineConfig } from '../config/index.js';
import type { IOAuthStorage } from '../storage/interfaces/index.js';
import type { Logger } from '../logging/logger.js';
import type { ScopeService } from './scope-service.js';
import type { ClientAuthenticator } from './client-authenticator.js';
import type { TokenService } from './token-service.js';
import type { IdTokenService } from './id-token-service.js';
import type { GrantIdentity } from '../grants/types.js';
import { OAuthError, toOAuthError } from '../errors/oauth-error.js';
import { createImplicitOutcome } from '../grants/implicit/handler.js';
import { generateAuthorizationCode } from '../crypto/random.js';
import { isValidCodeChallenge } from '../crypto/pkce.js';
import {
  CODE_CHALLENGE_METHOD_PLAIN,
  GRANT_TYPE_AUTHORIZATION_CODE,
  GRANT_TYPE_IMPLICIT,
  RESPONSE_TYPE_CODE,
  RESPONSE_TYPE_ID_TOKEN,
  RESPONSE_TYPE_ID_TOKEN_TOKEN,
  RESPONSE_TYPE_TOKEN,
  SCOPE_OPENID,
  SUPPORTED_CODE_CHALLENGE_METHODS,
} from '../config/constants.js';

export interface AuthorizationServiceOptions {
  config: EngineConfig;
  storage: IOAuthStorage;
  scopes: ScopeService;
  clientAuthenticator: ClientAuthenticator;
  tokenService: TokenService;
  /** Null when ID tokens are not configured */
  idTokens: IdTokenService | null;
  logger: Logger;
}

type ResponseMode = 'query' | 'fragment';

interface AuthorizationTarget {
  client: OAuthClient;
  redirectUri: string;
}

const SUPPORTED_RESPONSE_TYPES: readonly ResponseType[] = [
  RESPONSE_TYPE_CODE,
  RESPONSE_TYPE_TOKEN,
  RESPONSE_TYPE_ID_TOKEN,
  RESPONSE_TYPE_ID_TOKEN_TOKEN,
];

// Everything but `code` returns credentials in the fragment
const FRAGMENT_RESPONSE_TYPES: ReadonlySet<string> = new Set<string>([
  RESPONSE_TYPE_TOKEN,
  RESPONSE_TYPE_ID_TOKEN,
  RESPONSE_TYPE_ID_TOKEN_TOKEN,
]);

/**
 * Space-separated response types are unordered; sort them into one spelling
 */
function normalizeResponseType(value: string | undefined): string | undefined {
  return value?.split(' ').filter((part) => part.length > 0).sort().join(' ');
}

function isSupportedResponseType(value: string): value is ResponseType {
  return SUPPORTED_RESPONSE_TYPES.some((responseType) => responseType === value);
}

function responseModeFor(responseType: string | undefined): ResponseMode {
  return responseType !== undefined && FRAGMENT_RESPONSE_TYPES.has(responseType) ? 'fragment' : 'query';
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Compile a registered redirect URI pattern
 *
 * `*` matches a non-empty run of characters inside one host label
 * (before the path) or one path segment (after it).
 */
function compileRedirectPattern(pattern: string): RegExp {
  const schemeEnd = pattern.indexOf('://');
  const pathStart = schemeEnd === -1 ? -1 : pattern.indexOf('/', schemeEnd + 3);
  const authority = pathStart === -1 ? pattern : pattern.slice(0, pathStart);
  const path = pathStart === -1 ? '' : pattern.slice(pathStart);

  const compile = (part: string, wildcard: string): string =>
    part.split('*').map(escapeRegExp).join(wildcard);

  return new RegExp(`^${compile(authority, '[^./:@]+')}${compile(path, '[^/?#]+')}$`);
}

/**
 * Check a requested redirect URI against the client's registrations
 */
export function matchesRedirectUri(client: OAuthClient, redirectUri: string): boolean {
  // RFC 6749 Section 3.1.2: the endpoint URI must not include a fragment
  if (redirectUri.includes('#')) {
    return false;
  }

  if (client.redirectUriPolicy === 'exact') {
    return client.redirectUris.includes(redirectUri);
  }

  return client.redirectUris.some((registered) =>
    registered.includes('*')
      ? compileRedirectPattern(registered).test(redirectUri)
      : registered === redirectUri
  );
}

/**
 * Pick the redirect URI for a request, or null when none can be trusted
 * An omitted redirect_uri is allowed when exactly one concrete URI is registered.
 */
export function resolveRedirectUri(client: OAuthClient, requested: string | undefined): string | null {
  if (requested) {
    return matchesRedirectUri(client, requested) ? requested : null;
  }

  const [only, ...others] = client.redirectUris;
  if (only && others.length === 0 && !only.includes('*')) {
    return only;
  }
  return null;
}

/**
 * Render an authorization result as the URL to redirect the user agent to
 * Returns null for errors that must be shown to the resource owner instead.
 */
export function toRedirectUrl(result: AuthorizationResult): string | null {
  if (result.redirectUri === null) {
    return null;
  }

  const params = new URLSearchParams();
  const values: Record<string, string | number | undefined> = result.ok
    ? { ...result.params }
    : { ...result.body };

  for (const [key, value] of Object.entries(values)) {
    if (value !== undefined) {
      params.set(key, String(value));
    }
  }

  const url = new URL(result.redirectUri);
  if (result.responseMode === 'fragment') {
    url.hash = params.toString();
  } else {
    for (const [key, value] of params) {
      url.searchParams.set(key, value);
    }
  }

  return url.toString();
}

function isCodeChallengeMethod(value: string): value is CodeChallengeMethod {
  return SUPPORTED_CODE_CHALLENGE_METHODS.some((method) => method === value);
}

/**
 * The authorization step for an already-authenticated resource owner
 * RFC 6749 Sections 4.1.1-4.1.2 and 4.2.1-4.2.2, RFC 7636 Section 4.3,
 * OpenID Connect Core 1.0 Sections 3.1.2 and 3.2.2
 *
 * Login and consent belong to the host. `authorize` runs once the resource
 * owner has approved the request, `deny` once they have refused it.
 */
export class AuthorizationService {
  constructor(private readonly options: AuthorizationServiceOptions) {}

  async authorize(
    params: RequestParams,
    subject: string,
    now: Date,
    session: AuthorizationSession = {}
  ): Promise<AuthorizationResult> {
    const state = params['state'] || undefined;
    const responseMode = responseModeFor(normalizeResponseType(params['response_type']));

    const target = await this.resolveTarget(params, responseMode);
    if ('ok' in target) {
      return target;
    }

    try {
      const request = this.parseRequest(params, target.client.clientId, target.redirectUri, state);
      return await this.grant(request, target.client, subject, now, target.redirectUri, session);
    } catch (error) {
      return this.fail(error, target.redirectUri, responseMode, state);
    }
  }

  /**
   * The resource owner refused: send `access_denied` back to the client
   * RFC 6749 Section 4.1.2.1
   */
  async deny(params: RequestParams): Promise<AuthorizationResult> {
    const state = params['state'] || undefined;
    const responseMode = responseModeFor(normalizeResponseType(params['response_type']));

    const target = await this.resolveTarget(params, responseMode);
    if ('ok' in target) {
      return target;
    }

    return this.fail(
      OAuthError.accessDenied('The resource owner denied the request'),
      target.redirectUri,
      responseMode,
      state
    );
  }

  /**
   * Validate client and redirect_uri before anything can be redirected
   */
  private async resolveTarget(
    params: RequestParams,
    responseMode: ResponseMode
  ): Promise<AuthorizationTarget | AuthorizationResult> {
    const clientId = params['client_id'];
    if (!clientId) {
      return this.fail(OAuthError.invalidRequest('Missing client_id parameter'), null, responseMode);
    }

    let client: OAuthClient | null;
    try {
      client = await this.options.clientAuthenticator.findActiveClient(clientId);
    } catch (error) {
      return this.fail(error, null, responseMode);
    }

    if (!client) {
      return this.fail(OAuthError.invalidRequest('Unknown client_id'), null, responseMode);
    }

    const redirectUri = resolveRedirectUri(client, params['redirect_uri'] || undefined);
    if (!redirectUri) {
      // Don't redirect on invalid redirect_uri - security risk
      return this.fail(
        OAuthError.invalidRequest('Missing or unregistered redirect_uri'),
        null,
        responseMode
      );
    }

    return { client, redirectUri };
  }

  private parseRequest(
    params: RequestParams,
    clientId: string,
    redirectUri: string,
    state: string | undefined
  ): AuthorizationRequest {
    const responseType = normalizeResponseType(params['response_type']);

    if (!responseType) {
      throw OAuthError.invalidRequest('Missing response_type parameter');
    }
    if (!isSupportedResponseType(responseType)) {
      throw OAuthError.unsupportedResponseType(`Unsupported response_type: ${responseType}`);
    }

    const request: AuthorizationRequest = {
      response_type: responseType,
      client_id: clientId,
      redirect_uri: redirectUri,
      scope: params['scope'],
      state,
      nonce: params['nonce'] || undefined,
    };

    const codeChallenge = params['code_challenge'] || undefined;
    const method = params['code_challenge_method'] || undefined;

    if (method !== undefined && !isCodeChallengeMethod(method)) {
      throw OAuthError.invalidRequest(`Unsupported code_challenge_method: ${method}`);
    }
    if (codeChallenge !== undefined) {
      request.code_challenge = codeChallenge;
      request.code_challenge_method = method ?? CODE_CHALLENGE_METHOD_PLAIN;
    } else if (method !== undefined) {
      throw OAuthError.invalidRequest('code_challenge_method supplied without code_challenge');
    }

    return request;
  }

  private async grant(
    request: AuthorizationRequest,
    client: OAuthClient,
    subject: string,
    now: Date,
    redirectUri: string,
    session: AuthorizationSession
  ): Promise<AuthorizationResult> {
    const { config, scopes: scopeService } = this.options;
    const grantType =
      request.response_type === RESPONSE_TYPE_CODE ? GRANT_TYPE_AUTHORIZATION_CODE : GRANT_TYPE_IMPLICIT;

    if (!config.enabledGrants.includes(grantType)) {
      throw OAuthError.unsupportedResponseType(
        `Response type ${request.response_type} is not enabled`
      );
    }
    if (!client.allowedGrants.includes(grantType)) {
      throw OAuthError.unauthorizedClient(`Client is not authorized for the ${grantType} grant`);
    }

    const scopes = scopeService.resolve({
      requested: scopeService.parseScopes(request.scope),
      allowed: scopeService.allowedFor(client),
      fallback: scopeService.defaultFor(client),
    });

    const state = request.state ? { state: request.state } : {};

    if (request.response_type === RESPONSE_TYPE_ID_TOKEN) {
      const idToken = await this.requireIdTokens(request, scopes).mint({
        clientId: client.clientId,
        subject,
        issuedAt: now,
        authTime: session.authTime,
        nonce: request.nonce,
      });

      this.options.logger.info('ID token issued', { client_id: client.clientId });

      return {
        ok: true,
        redirectUri,
        responseMode: 'fragment',
        params: { id_token: idToken, ...state },
      };
    }

    if (request.response_type !== RESPONSE_TYPE_CODE) {
      let identity: GrantIdentity | undefined;
      if (request.response_type === RESPONSE_TYPE_ID_TOKEN_TOKEN) {
        this.requireIdTokens(request, scopes);
        identity = { nonce: request.nonce, authTime: session.authTime };
      }

      const token = await this.options.tokenService.issue(
        client,
        createImplicitOutcome(subject, scopes, identity),
        now
      );

      return {
        ok: true,
        redirectUri,
        responseMode: 'fragment',
        params: {
          access_token: token.access_token,
          token_type: token.token_type,
          expires_in: token.expires_in,
          ...(token.scope ? { scope: token.scope } : {}),
          ...(token.id_token ? { id_token: token.id_token } : {}),
          ...state,
        },
      };
    }

    this.checkPkce(request, client);

    const grant: AuthorizationGrant = {
      code: generateAuthorizationCode(),
      clientId: client.clientId,
      subject,
      scopes,
      redirectUri,
      codeChallenge: request.code_challenge,
      codeChallengeMethod: request.code_challenge_method,
      state: request.state,
      nonce: request.nonce,
      authTime: session.authTime,
      issuedAt: now,
      expiresAt: new Date(now.getTime() + config.lifetimes.authorizationCode * 1000),
    };

    await this.options.storage.grants.saveGrant(grant);

    this.options.logger.info('Authorization code issued', {
      client_id: client.clientId,
      scope: scopeService.formatScopes(scopes),
      pkce: grant.codeChallengeMethod ?? 'none',
    });

    return {
      ok: true,
      redirectUri,
      responseMode: 'query',
      params: { code: grant.code, ...state },
    };
  }

  /**
   * Preconditions of the response types carrying an ID token
   * OpenID Connect Core 1.0 Section 3.2.2.1: `openid` scope and `nonce` are required.
   */
  private requireIdTokens(request: AuthorizationRequest, scopes: string[]): IdTokenService {
    const { idTokens } = this.options;

    if (!idTokens) {
      throw OAuthError.unsupportedResponseType(
        `Response type ${request.response_type} is not enabled`
      );
    }
    if (!scopes.includes(SCOPE_OPENID)) {
      throw OAuthError.invalidScope(`response_type ${request.response_type} requires the openid scope`);
    }
    if (!request.nonce) {
      throw OAuthError.invalidRequest('Missing nonce parameter');
    }

    return idTokens;
  }

  /**
   * Enforce the PKCE policy for the client's type
   */
  private checkPkce(request: AuthorizationRequest, client: OAuthClient): void {
    const { pkce } = this.options.config;
    const requirement = client.clientType === 'public' ? pkce.public : pkce.confidential;

    if (!request.code_challenge || !request.code_challenge_method) {
      if (requirement === 'required') {
        throw OAuthError.invalidRequest('Missing code_challenge parameter (PKCE required)');
      }
      return;
    }

    if (request.code_challenge_method === CODE_CHALLENGE_METHOD_PLAIN && !pkce.allowPlain) {
      throw OAuthError.invalidRequest('Only S256 code_challenge_method is supported');
    }

    if (!isValidCodeChallenge(request.code_challenge, request.code_challenge_method)) {
      throw OAuthError.invalidRequest('Invalid code_challenge format');
    }
  }

  private fail(
    error: unknown,
    redirectUri: string | null,
    responseMode: ResponseMode,
    state?: string
  ): AuthorizationResult {
    const oauthError = toOAuthError(error).withState(redirectUri ? state : undefined);

    if (oauthError.code === 'server_error') {
      this.options.logger.error('Authorization failed', { error: oauthError.cause ?? oauthError });
    } else {
      this.options.logger.debug('Authorization rejected', {
        error: oauthError.code,
        description: oauthError.description,
      });
    }

    return {
      ok: false,
      redirectUri,
      responseMode,
      status: oauthError.statusCode,
      body: oauthError.toJSON(),
    };
  }
}
