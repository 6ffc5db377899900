/**
 * OAuth 2.0 Client Types
 * RFC 6749 Section 2.1
 */
export type ClientType = 'confidential' | 'public';

/**
 * How registered redirect URIs are compared with the requested one
 */
export type RedirectUriPolicy = 'exact' | 'pattern';
