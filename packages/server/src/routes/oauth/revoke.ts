import { Hono } from 'hono';
import type { OAuthVariables } from '../../types/hono.js';
import type { OAuth2Engine } from '../../engine.js';
import { clientAuthenticator } from '../../middleware/client-authenticator.js';
import { sendEngineResponse } from '../../middleware/error-handler.js';
import { parseTokenLookup } from '../../validation/token-request.js';

export interface RevokeRouteOptions {
  engine: OAuth2Engine;
}

/**
 * Create token revocation endpoint routes
 *
 * RFC 7009
 */
export function createRevokeRoutes(options: RevokeRouteOptions) {
  const { engine } = options;

  const router = new Hono<{ Variables: OAuthVariables }>();

  // POST /revoke
  router.post('/', clientAuthenticator({ engine }), async (c) => {
    const { token, hint } = parseTokenLookup(c.get('params') ?? {});

    // RFC 7009: 200 OK for unknown tokens too, which prevents token fishing
    const response = await engine.revoke(token, hint, c.get('client'));

    return sendEngineResponse(c, response, { emptyBody: true });
  });

  return router;
}
