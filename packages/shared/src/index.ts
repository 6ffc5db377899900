// Re-export all shared types
export * from './types/oauth.js';
export * from './types/client.js';
