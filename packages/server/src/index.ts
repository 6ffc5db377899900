// Engine
export { createOAuth2Engine, type OAuth2Engine, type OAuth2EngineOptions } from './engine.js';

// Hono adapter
export { createOAuth2App, type OAuth2AppOptions } from './app.js';

// Storage
export { createMemoryStorage, type MemoryStorage } from './storage/memory/index.js';
export type * from './storage/interfaces/index.js';

// Services used directly by hosts
export { toRedirectUrl, matchesRedirectUri } from './services/authorization-service.js';
export type { AccessRequirement } from './services/introspection-service.js';
export type { ActiveAccessToken } from './services/token-codec.js';

// Configuration, logging, errors
export { createConfig, loadConfig, ConfigError, type EngineConfig, type EngineConfigInput } from './config/index.js';
export { createLogger, silentLogger, type Logger, type LogFields } from './logging/logger.js';
export * from './errors/index.js';

// Types
export * from './types/index.js';

// Crypto helpers (PKCE for clients, key generation for deployments)
export { generateCodeChallenge, isValidCodeVerifier } from './crypto/pkce.js';
export { generateEcKeyPair, generateRsaKeyPair } from './crypto/jwt.js';
