import type { Context, ErrorHandler, MiddlewareHandler } from 'hono';
import type { OAuthVariables } from '../types/hono.js';
import type { EngineResponse } from '../types/oauth.js';
import type { Logger } from '../logging/logger.js';
import { toOAuthError } from '../errors/oauth-error.js';
import {
  TOKEN_CACHE_CONTROL,
  TOKEN_PRAGMA,
  HEADER_CACHE_CONTROL,
  HEADER_PRAGMA,
  HEADER_WWW_AUTHENTICATE,
} from '../config/constants.js';

/**
 * Write an engine response with the headers RFC 6749 Section 5.1 requires
 * With `emptyBody`, a success is sent without a body (revocation).
 */
export function sendEngineResponse<T extends object>(
  c: Context,
  response: EngineResponse<T>,
  options: { emptyBody?: boolean } = {}
): Response {
  // Set no-cache headers
  c.header(HEADER_CACHE_CONTROL, TOKEN_CACHE_CONTROL);
  c.header(HEADER_PRAGMA, TOKEN_PRAGMA);

  if (!response.ok) {
    if (response.status === 401) {
      c.header(HEADER_WWW_AUTHENTICATE, 'Basic realm="oauth"');
    }
    return c.json(response.body, response.status);
  }

  if (options.emptyBody) {
    return c.body(null, 200);
  }

  return c.json(response.body, 200);
}

/**
 * Global error handler for OAuth errors
 *
 * Transforms errors thrown outside the engine (body parsing, middleware)
 * into RFC-compliant OAuth error responses
 */
export function oauthErrorHandler(logger: Logger): ErrorHandler<{ Variables: OAuthVariables }> {
  return (err, c) => {
    const oauthError = toOAuthError(err);

    if (oauthError.code === 'server_error') {
      logger.error('Unhandled request error', { error: err, path: c.req.path });
    }

    return sendEngineResponse(c, {
      ok: false,
      status: oauthError.statusCode,
      body: oauthError.toJSON(),
    });
  };
}

/**
 * Security headers middleware
 */
export function securityHeaders(): MiddlewareHandler<{ Variables: OAuthVariables }> {
  return async (c, next) => {
    await next();

    // Prevent MIME type sniffing
    c.header('X-Content-Type-Options', 'nosniff');

    // Prevent clickjacking
    c.header('X-Frame-Options', 'DENY');

    // Referrer policy
    c.header('Referrer-Policy', 'no-referrer');
  };
}

/**
 * Request logging middleware
 */
export function requestLogger(logger: Logger): MiddlewareHandler<{ Variables: OAuthVariables }> {
  return async (c, next) => {
    const start = Date.now();
    const method = c.req.method;
    const path = c.req.path;

    await next();

    // Don't log sensitive data
    logger.info('Request handled', {
      method,
      path,
      status: c.res.status,
      duration: Date.now() - start,
      client_id: c.get('client')?.clientId,
    });
  };
}
