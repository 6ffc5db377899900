import { randomBytes } from 'node:crypto';
import {
  ACCESS_TOKEN_LENGTH,
  AUTHORIZATION_CODE_LENGTH,
  CLIENT_ID_LENGTH,
  CLIENT_SECRET_LENGTH,
  REFRESH_TOKEN_LENGTH,
  TOKEN_ID_LENGTH,
} from '../config/constants.js';

/**
 * Generate cryptographically secure random bytes as base64url string
 */
export function generateRandomBase64Url(length: number): string {
  return randomBytes(length).toString('base64url');
}

/**
 * Generate a secure random client ID
 */
export function generateClientId(length: number = CLIENT_ID_LENGTH): string {
  return generateRandomBase64Url(length);
}

/**
 * Generate a secure random client secret
 */
export function generateClientSecret(length: number = CLIENT_SECRET_LENGTH): string {
  return generateRandomBase64Url(length);
}

/**
 * Generate an opaque access token (256 bits by default)
 */
export function generateAccessToken(length: number = ACCESS_TOKEN_LENGTH): string {
  return generateRandomBase64Url(length);
}

/**
 * Generate a secure authorization code
 */
export function generateAuthorizationCode(length: number = AUTHORIZATION_CODE_LENGTH): string {
  return generateRandomBase64Url(length);
}

/**
 * Generate a secure refresh token
 */
export function generateRefreshToken(length: number = REFRESH_TOKEN_LENGTH): string {
  return generateRandomBase64Url(length);
}

/**
 * Generate a unique token ID (jti)
 */
export function generateTokenId(): string {
  return generateRandomBase64Url(TOKEN_ID_LENGTH);
}
