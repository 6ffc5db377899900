import { readFileSync, existsSync } from 'node:fs';
import { z } from 'zod';
import * as constants from './constants.js';

// RFC 6749 Section 3.3: scope-token = 1*( %x21 / %x23-5B / %x5D-7E )
const scopeTokenSchema = z.string().regex(/^[\x21\x23-\x5B\x5D-\x7E]+$/, 'Invalid scope token');

const lifetimeSchema = z.number().int().positive();
const pkceRequirementSchema = z.enum(['required', 'optional']);

// PEM key pair: PKCS#8 private, SPKI public
const signingKeySchema = z.object({
  algorithm: z.enum(constants.SUPPORTED_SIGNING_ALGORITHMS).default('RS256'),
  kid: z.string().min(1).default('default'),
  privateKey: z.string().min(1),
  publicKey: z.string().min(1),
});

const codecSchema = z.discriminatedUnion('strategy', [
  z.object({
    strategy: z.literal('opaque'),
  }),
  signingKeySchema.extend({
    strategy: z.literal('jwt'),
    checkRevocation: z.boolean().default(true),
  }),
]);

const configSchema = z.object({
  issuer: z.string().min(1).default('http://localhost:3000'),
  lifetimes: z
    .object({
      accessToken: lifetimeSchema.default(constants.DEFAULT_ACCESS_TOKEN_TTL),
      refreshToken: lifetimeSchema.default(constants.DEFAULT_REFRESH_TOKEN_TTL),
      authorizationCode: lifetimeSchema.default(constants.DEFAULT_AUTHORIZATION_CODE_TTL),
      idToken: lifetimeSchema.default(constants.DEFAULT_ID_TOKEN_TTL),
    })
    .default({}),
  enabledGrants: z
    .array(z.enum(constants.SUPPORTED_GRANT_TYPES))
    .default([...constants.DEFAULT_ENABLED_GRANT_TYPES]),
  rotateRefreshTokens: z.boolean().default(true),
  codec: codecSchema.default({ strategy: 'opaque' }),
  // ID token signing; without it `openid` is an ordinary scope
  openid: signingKeySchema.optional(),
  pkce: z
    .object({
      public: pkceRequirementSchema.default('required'),
      confidential: pkceRequirementSchema.default('optional'),
      allowPlain: z.boolean().default(true),
    })
    .default({}),
  scopes: z
    .object({
      // Empty means "whatever clients declare"
      available: z.array(scopeTokenSchema).default([]),
      defaults: z.array(scopeTokenSchema).default([]),
      // Protected resource -> scopes a token needs to reach it
      resources: z.record(z.array(scopeTokenSchema)).default({}),
    })
    .default({}),
  logging: z
    .object({
      level: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
    })
    .default({}),
});

/**
 * Engine configuration
 * Immutable once built; threaded into the engine at construction.
 */
export type EngineConfig = z.output<typeof configSchema>;

/**
 * Configuration as written by the deployment (every field optional)
 */
export type EngineConfigInput = z.input<typeof configSchema>;

export type CodecConfig = EngineConfig['codec'];
export type JwtCodecConfig = Extract<CodecConfig, { strategy: 'jwt' }>;
export type OpenIdConfig = NonNullable<EngineConfig['openid']>;
export type LogLevel = EngineConfig['logging']['level'];

/**
 * Raised when a configuration does not validate
 */
export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message);
    this.name = 'ConfigError';
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
}

function parseConfig(raw: unknown): EngineConfig {
  const result = configSchema.safeParse(raw);

  if (!result.success) {
    const messages = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid engine configuration: ${messages}`, { cause: result.error });
  }

  return deepFreeze(result.data);
}

/**
 * Validate a configuration, apply defaults, and freeze the result
 */
export function createConfig(input: EngineConfigInput = {}): EngineConfig {
  return parseConfig(input);
}

/**
 * Read a secret from file (Docker secrets) or environment variable
 * Supports both `VAR_FILE` (path to file) and `VAR` (direct value) patterns
 */
function readSecret(env: NodeJS.ProcessEnv, envVar: string): string | undefined {
  // Check for file-based secret first (Docker secrets pattern)
  const filePath = env[`${envVar}_FILE`];

  if (filePath && existsSync(filePath)) {
    try {
      return readFileSync(filePath, 'utf-8').trim();
    } catch (error) {
      console.warn(`Warning: Could not read secret from ${filePath}`, error);
    }
  }

  // Fall back to direct environment variable
  return env[envVar];
}

function readList(value: string | undefined): string[] | undefined {
  if (value === undefined) {
    return undefined;
  }
  return value
    .split(/[\s,]+/)
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function readInt(value: string | undefined): number | undefined {
  return value === undefined ? undefined : Number(value);
}

function readBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined) {
    return undefined;
  }
  return ['1', 'true', 'yes', 'on'].includes(value.toLowerCase());
}

function readJson(env: NodeJS.ProcessEnv, envVar: string): unknown {
  const value = env[envVar];
  if (!value) {
    return undefined;
  }
  try {
    return JSON.parse(value);
  } catch (error) {
    throw new ConfigError(`${envVar} is not valid JSON`, { cause: error });
  }
}

/**
 * Load configuration from environment variables
 * Raw strings are handed to the schema, which owns all validation.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const strategy = env['OAUTH_TOKEN_STRATEGY'] ?? 'opaque';

  const codec =
    strategy === 'jwt'
      ? {
          strategy,
          algorithm: env['OAUTH_JWT_ALGORITHM'],
          kid: env['OAUTH_JWT_KID'],
          privateKey: readSecret(env, 'OAUTH_JWT_PRIVATE_KEY'),
          publicKey: readSecret(env, 'OAUTH_JWT_PUBLIC_KEY'),
          checkRevocation: readBoolean(env['OAUTH_JWT_CHECK_REVOCATION']),
        }
      : { strategy };

  const openidPrivateKey = readSecret(env, 'OAUTH_OIDC_PRIVATE_KEY');
  const openid =
    openidPrivateKey === undefined
      ? undefined
      : {
          algorithm: env['OAUTH_OIDC_ALGORITHM'],
          kid: env['OAUTH_OIDC_KID'],
          privateKey: openidPrivateKey,
          publicKey: readSecret(env, 'OAUTH_OIDC_PUBLIC_KEY'),
        };

  return parseConfig({
    issuer: env['OAUTH_ISSUER'],
    lifetimes: {
      accessToken: readInt(env['OAUTH_ACCESS_TOKEN_TTL']),
      refreshToken: readInt(env['OAUTH_REFRESH_TOKEN_TTL']),
      authorizationCode: readInt(env['OAUTH_AUTHORIZATION_CODE_TTL']),
      idToken: readInt(env['OAUTH_ID_TOKEN_TTL']),
    },
    enabledGrants: readList(env['OAUTH_ENABLED_GRANTS']),
    rotateRefreshTokens: readBoolean(env['OAUTH_ROTATE_REFRESH_TOKENS']),
    codec,
    openid,
    pkce: {
      public: env['OAUTH_PKCE_PUBLIC'],
      confidential: env['OAUTH_PKCE_CONFIDENTIAL'],
      allowPlain: readBoolean(env['OAUTH_PKCE_ALLOW_PLAIN']),
    },
    scopes: {
      available: readList(env['OAUTH_SCOPES']),
      defaults: readList(env['OAUTH_DEFAULT_SCOPES']),
      resources: readJson(env, 'OAUTH_SCOPE_RESOURCES'),
    },
    logging: {
      level: env['LOG_LEVEL'],
    },
  });
}

// Re-export constants
export { constants };
