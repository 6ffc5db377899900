import type { OpenIdConfig } from '../config/index.js';
import type { IdTokenClaims } from '../types/token.js';
import {
  createSigningKeyLoader,
  idTokenHash,
  signIdToken,
  verifyIdToken,
  type SigningKeys,
} from '../crypto/index.js';

/**
 * What an ID token says about an authentication
 */
export interface IdTokenContent {
  clientId: string;
  subject: string;
  issuedAt: Date;
  authTime?: Date;
  nonce?: string;
  /** Access token issued in the same response; bound through `at_hash` */
  accessToken?: string;
}

const toSeconds = (date: Date): number => Math.floor(date.getTime() / 1000);

/**
 * OpenID Connect ID tokens (Core 1.0 Sections 2 and 3.1.3.6)
 *
 * ID tokens are not stored: a token is valid while its signature, issuer
 * and expiry check out.
 */
export class IdTokenService {
  private readonly signingKeys: () => Promise<SigningKeys>;

  constructor(
    private readonly config: OpenIdConfig,
    private readonly issuer: string,
    private readonly lifetime: number
  ) {
    this.signingKeys = createSigningKeyLoader(config);
  }

  async mint(content: IdTokenContent): Promise<string> {
    const iat = toSeconds(content.issuedAt);
    const claims: IdTokenClaims = {
      iss: this.issuer,
      sub: content.subject,
      aud: content.clientId,
      iat,
      exp: iat + this.lifetime,
    };

    if (content.authTime) {
      claims.auth_time = toSeconds(content.authTime);
    }
    if (content.nonce) {
      claims.nonce = content.nonce;
    }
    if (content.accessToken) {
      claims.at_hash = idTokenHash(content.accessToken, this.config.algorithm);
    }

    return signIdToken(claims, await this.signingKeys());
  }

  /**
   * Claims of a live ID token of ours, or null
   */
  async validate(token: string, now: Date, audience?: string): Promise<IdTokenClaims | null> {
    return verifyIdToken(token, await this.signingKeys(), {
      issuer: this.issuer,
      audience,
      now: now.getTime(),
    });
  }
}
