import { Hono } from 'hono';
import type { OAuthVariables } from '../../types/hono.js';
import type { OAuth2Engine } from '../../engine.js';
import { clientAuthenticator } from '../../middleware/client-authenticator.js';
import { sendEngineResponse } from '../../middleware/error-handler.js';
import { parseTokenLookup } from '../../validation/token-request.js';

export interface IntrospectRouteOptions {
  engine: OAuth2Engine;
}

/**
 * Create token introspection endpoint routes
 *
 * RFC 7662
 */
export function createIntrospectRoutes(options: IntrospectRouteOptions) {
  const { engine } = options;

  const router = new Hono<{ Variables: OAuthVariables }>();

  // POST /introspect
  router.post(
    '/',
    // Require confidential client authentication for introspection
    clientAuthenticator({ engine, allowPublicClients: false }),
    async (c) => {
      const { token, hint } = parseTokenLookup(c.get('params') ?? {});
      const response = await engine.introspect(token, hint);

      return sendEngineResponse(c, response);
    }
  );

  return router;
}
