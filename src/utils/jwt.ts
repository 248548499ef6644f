import jwt, { type JwtPayload } from 'jsonwebtoken';

const STEAM_ID_PATTERN = /^\d{17}$/;

export type TokenStatus = {
  accessTokenValid: boolean;
  refreshTokenValid: boolean;
  accessTokenExpiresAt: number | null;
  refreshTokenExpiresAt: number | null;
};

/**
 * Reads the payload of a Steam-issued JWT without verifying its signature.
 * Only used for a local expiry check; Steam remains the authority.
 */
export function decodeSteamToken(token: string | undefined): JwtPayload | null {
  if (!token || token.split('.').length !== 3) {
    return null;
  }

  const decoded = jwt.decode(token, { json: true });
  if (!decoded || typeof decoded !== 'object') {
    return null;
  }

  return decoded;
}

export function tokenExpiresAt(token: string | undefined): number | null {
  const exp = decodeSteamToken(token)?.exp;
  return typeof exp === 'number' && Number.isFinite(exp) ? exp : null;
}

export function isTokenValid(token: string | undefined, nowSec: number): boolean {
  const exp = tokenExpiresAt(token);
  return exp !== null && exp > nowSec;
}

export function steamIdFromToken(token: string | undefined): string | undefined {
  const sub = decodeSteamToken(token)?.sub;
  return typeof sub === 'string' && STEAM_ID_PATTERN.test(sub) ? sub : undefined;
}

export function getTokenStatus(
  session: { accessToken?: string; refreshToken?: string } | undefined,
  nowSec: number
): TokenStatus {
  return {
    accessTokenValid: isTokenValid(session?.accessToken, nowSec),
    refreshTokenValid: isTokenValid(session?.refreshToken, nowSec),
    accessTokenExpiresAt: tokenExpiresAt(session?.accessToken),
    refreshTokenExpiresAt: tokenExpiresAt(session?.refreshToken)
  };
}
