// OAuth types
export type * from './oauth.js';

// Client types
export type {
  OAuthClient,
  RegisterClientInput,
  ClientType,
  ClientAuthMethod,
  RedirectUriPolicy,
  AuthenticatedClient,
} from './client.js';

// Token types
export type {
  AccessTokenClaims,
  IdTokenClaims,
  AuthorizationGrant,
  AccessToken,
  RefreshToken,
} from './token.js';
export { isTokenLive } from './token.js';

// Hono context types
export type * from './hono.js';
