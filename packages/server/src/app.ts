import { Hono } from 'hono';
import type { OAuthVariables } from './types/hono.js';
import type { OAuth2Engine } from './engine.js';
import { createLogger, type Logger } from './logging/logger.js';
import { oauthErrorHandler, securityHeaders, requestLogger } from './middleware/error-handler.js';
import { createTokenRoutes, createRevokeRoutes, createIntrospectRoutes } from './routes/oauth/index.js';

export interface OAuth2AppOptions {
  engine: OAuth2Engine;
  enableLogging?: boolean;
  logger?: Logger;
}

/**
 * Create the Hono application exposing the engine's endpoints
 *
 * Mount it in a host app (`host.route('/oauth', app)`) or call `app.request()`
 * directly; it does not listen on its own.
 */
export function createOAuth2App(options: OAuth2AppOptions): Hono<{ Variables: OAuthVariables }> {
  const { engine, enableLogging = true } = options;
  const logger =
    options.logger ?? createLogger(engine.config.logging.level, { component: 'oauth2-http' });

  const app = new Hono<{ Variables: OAuthVariables }>();

  // Global error handler
  app.onError(oauthErrorHandler(logger));

  // Security headers
  app.use('*', securityHeaders());

  // Logging
  if (enableLogging) {
    app.use('*', requestLogger(logger));
  }

  // OAuth endpoints
  app.route('/token', createTokenRoutes({ engine }));
  app.route('/revoke', createRevokeRoutes({ engine }));
  app.route('/introspect', createIntrospectRoutes({ engine }));

  return app;
}
