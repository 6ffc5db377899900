import type { EngineConfig, JwtCodecConfig } from '../config/index.js';
import type { ITokenStorage } from '../storage/interfaces/index.js';
import { isTokenLive } from '../types/token.js';
import {
  createSigningKeyLoader,
  generateAccessToken,
  generateTokenId,
  signAccessToken,
  verifyAccessToken,
  type SigningKeys,
} from '../crypto/index.js';

/**
 * What an access token asserts, in engine terms
 */
export interface AccessTokenContent {
  clientId: string;
  subject: string | null;
  scopes: string[];
  issuedAt: Date;
  expiresAt: Date;
}

export interface MintedAccessToken {
  token: string;
  tokenId: string;
}

/**
 * A validated, live access token
 * `jti` is present for self-contained tokens.
 */
export interface ActiveAccessToken extends AccessTokenContent {
  tokenId: string;
  jti?: string;
}

/**
 * Mints and validates access tokens
 */
export interface TokenCodec {
  readonly strategy: EngineConfig['codec']['strategy'];

  mint(content: AccessTokenContent): Promise<MintedAccessToken>;

  /**
   * Resolve a presented token, or null when it is not a live token of ours
   */
  validate(token: string, now: Date): Promise<ActiveAccessToken | null>;
}

const toSeconds = (date: Date): number => Math.floor(date.getTime() / 1000);

/**
 * Random bearer strings; the store is the source of truth
 */
export class OpaqueTokenCodec implements TokenCodec {
  readonly strategy = 'opaque';

  constructor(private readonly tokens: ITokenStorage) {}

  async mint(): Promise<MintedAccessToken> {
    return { token: generateAccessToken(), tokenId: generateTokenId() };
  }

  async validate(token: string, now: Date): Promise<ActiveAccessToken | null> {
    const record = await this.tokens.getAccessToken(token);
    if (!record || !isTokenLive(record, now)) {
      return null;
    }

    return {
      tokenId: record.tokenId,
      clientId: record.clientId,
      subject: record.subject,
      scopes: record.scopes,
      issuedAt: record.issuedAt,
      expiresAt: record.expiresAt,
    };
  }
}

/**
 * Signed JWT access tokens (RFC 9068)
 */
export class JwtTokenCodec implements TokenCodec {
  readonly strategy = 'jwt';
  private readonly signingKeys: () => Promise<SigningKeys>;

  constructor(
    private readonly config: JwtCodecConfig,
    private readonly issuer: string,
    private readonly tokens: ITokenStorage
  ) {
    this.signingKeys = createSigningKeyLoader(config);
  }

  async mint(content: AccessTokenContent): Promise<MintedAccessToken> {
    const tokenId = generateTokenId();
    const claims = {
      iss: this.issuer,
      client_id: content.clientId,
      scope: content.scopes.join(' '),
      iat: toSeconds(content.issuedAt),
      exp: toSeconds(content.expiresAt),
      jti: tokenId,
      ...(content.subject !== null ? { sub: content.subject } : {}),
    };

    const token = await signAccessToken(claims, await this.signingKeys());
    return { token, tokenId };
  }

  async validate(token: string, now: Date): Promise<ActiveAccessToken | null> {
    const claims = await verifyAccessToken(token, await this.signingKeys(), {
      issuer: this.issuer,
      now: now.getTime(),
    });
    if (!claims) {
      return null;
    }

    if (this.config.checkRevocation && (await this.tokens.isTokenIdRevoked(claims.jti))) {
      return null;
    }

    return {
      tokenId: claims.jti,
      jti: claims.jti,
      clientId: claims.client_id,
      subject: claims.sub ?? null,
      scopes: claims.scope.split(' ').filter((scope) => scope.length > 0),
      issuedAt: new Date(claims.iat * 1000),
      expiresAt: new Date(claims.exp * 1000),
    };
  }
}

/**
 * Build the codec selected by configuration
 */
export function createTokenCodec(config: EngineConfig, tokens: ITokenStorage): TokenCodec {
  const codec = config.codec;
  switch (codec.strategy) {
    case 'opaque':
      return new OpaqueTokenCodec(tokens);
    case 'jwt':
      return new JwtTokenCodec(codec, config.issuer, tokens);
    default: {
      const unreachable: never = codec;
      throw new Error(`Unknown token strategy: ${String(unreachable)}`);
    }
  }
}
