import type { OAuthClient } from './client.js';

/**
 * Extended Hono context variables for OAuth
 */
export interface OAuthVariables {
  client?: OAuthClient;
  params?: Record<string, string | undefined>;
}

