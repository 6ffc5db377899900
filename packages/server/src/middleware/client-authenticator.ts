import type { Context, MiddlewareHandler } from 'hono';
import type { OAuthVariables } from '../types/hono.js';
import type { RequestParams } from '../types/oauth.js';
import type { OAuth2Engine } from '../engine.js';
import { OAuthError } from '../errors/oauth-error.js';
import { CONTENT_TYPE_FORM, HEADER_AUTHORIZATION } from '../config/constants.js';
import { sendEngineResponse } from './error-handler.js';

export interface ClientAuthenticatorOptions {
  engine: OAuth2Engine;
  allowPublicClients?: boolean; // Allow clients authenticating with client_id alone
}

/**
 * Read a form body into request parameters, keeping string fields only
 */
export async function readFormParams(c: Context): Promise<RequestParams> {
  const contentType = c.req.header('content-type');
  if (!contentType?.includes(CONTENT_TYPE_FORM)) {
    return {};
  }

  const body = await c.req.parseBody();
  const params: RequestParams = {};

  for (const [key, value] of Object.entries(body)) {
    if (typeof value === 'string') {
      params[key] = value;
    }
  }

  return params;
}

/**
 * Middleware to authenticate OAuth clients
 *
 * Sets `client` and the parsed form `params` in context variables on success
 */
export function clientAuthenticator(options: ClientAuthenticatorOptions): MiddlewareHandler<{
  Variables: OAuthVariables;
}> {
  const { engine, allowPublicClients = true } = options;

  return async (c, next) => {
    const params = await readFormParams(c);
    const result = await engine.authenticateClient(params, c.req.header(HEADER_AUTHORIZATION));

    if (!result.ok) {
      return sendEngineResponse(c, result);
    }

    if (!allowPublicClients && result.body.clientType === 'public') {
      return sendEngineResponse(c, {
        ok: false,
        status: 401,
        body: OAuthError.invalidClient('Confidential client authentication required').toJSON(),
      });
    }

    c.set('client', result.body);
    c.set('params', params);

    await next();
  };
}
