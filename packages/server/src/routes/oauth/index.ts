export { createTokenRoutes, type TokenRouteOptions } from './token.js';
export { createRevokeRoutes, type RevokeRouteOptions } from './revoke.js';
export { createIntrospectRoutes, type IntrospectRouteOptions } from './introspect.js';
