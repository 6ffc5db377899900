import { Hono } from 'hono';
import type { OAuthVariables } from '../../types/hono.js';
import type { OAuth2Engine } from '../../engine.js';
import { readFormParams } from '../../middleware/client-authenticator.js';
import { sendEngineResponse } from '../../middleware/error-handler.js';
import { HEADER_AUTHORIZATION } from '../../config/constants.js';

export interface TokenRouteOptions {
  engine: OAuth2Engine;
}

/**
 * Create token endpoint routes
 *
 * Client authentication happens inside the engine, before grant selection
 */
export function createTokenRoutes(options: TokenRouteOptions) {
  const { engine } = options;

  const router = new Hono<{ Variables: OAuthVariables }>();

  // POST /token
  router.post('/', async (c) => {
    const params = await readFormParams(c);
    const response = await engine.issue({
      params,
      authorization: c.req.header(HEADER_AUTHORIZATION),
    });

    return sendEngineResponse(c, response);
  });

  return router;
}
