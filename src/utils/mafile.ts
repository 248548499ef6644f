import { z } from 'zod';
import type { Account, AccountProfile } from '../types/steam';
import { steamIdFromToken } from './jwt';
import { generateDeviceId } from './steamGuard';

const optionalString = z.preprocess((value) => {
  if (value === null || value === undefined) {
    return undefined;
  }

  const normalized = String(value).trim();
  return normalized.length > 0 ? normalized : undefined;
}, z.string().optional());

const optionalNumber = z.preprocess((value) => {
  if (value === null || value === undefined || value === '') {
    return undefined;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}, z.number().optional());

const profileSchema = z
  .object({
    displayName: optionalString,
    avatarUrl: optionalString,
    profileUrl: optionalString,
    vacBanned: z.boolean().optional(),
    vacBanCount: optionalNumber,
    communityBanned: z.boolean().optional(),
    economyBan: optionalString,
    gameCount: optionalNumber,
    updatedAt: optionalNumber
  })
  .partial();

const maSchema = z
  .object({
    account_name: z.string().min(1),
    shared_secret: z.string().min(1),
    identity_secret: optionalString,
    device_id: optionalString,
    steamid: optionalString,
    revocation_code: optionalString,
    Revocation_code: optionalString,
    serial_number: optionalString,
    uri: optionalString,
    token_gid: optionalString,
    avatar_url: optionalString,
    session: z
      .object({
        access_token: optionalString,
        refresh_token: optionalString,
        token_timestamp: optionalNumber,
        steamid: optionalString,
        session_id: optionalString
      })
      .passthrough()
      .optional(),
    Session: z
      .object({
        SteamID: optionalString,
        AccessToken: optionalString,
        RefreshToken: optionalString,
        SessionID: optionalString,
        SteamLoginSecure: optionalString,
        OAuthToken: optionalString
      })
      .passthrough()
      .optional(),
    profile: profileSchema.optional()
  })
  .passthrough();

export type MaFile = z.infer<typeof maSchema>;

const LARGE_ID_KEYS = ['steamid', 'SteamID', 'serial_number'];
const largeIdPattern = new RegExp(`("(?:${LARGE_ID_KEYS.join('|')})"\\s*:\\s*)(\\d{16,})`, 'g');

/** 64-bit ids written as bare JSON numbers would lose precision in JSON.parse. */
export function quoteLargeIds(text: string): string {
  return text.replace(largeIdPattern, '$1"$2"');
}

/** Writes the given keys back as bare numbers, as the desktop authenticator does. */
export function stringifyWithNumericIds(value: unknown, keys: string[]): string {
  const json = JSON.stringify(value, null, 2);
  const pattern = new RegExp(`("(?:${keys.join('|')})"\\s*:\\s*)"(\\d+)"`, 'g');
  return json.replace(pattern, '$1$2');
}

function steamIdFromCookieToken(value: string | undefined): string | undefined {
  const match = value?.match(/^(\d{17})\|\|/);
  return match?.[1];
}

function accessTokenFromCookieToken(value: string | undefined): string | undefined {
  if (!value) {
    return undefined;
  }

  const separatorIndex = value.indexOf('||');
  if (separatorIndex <= 0 || separatorIndex >= value.length - 2) {
    return undefined;
  }

  const token = decodeURIComponent(value.slice(separatorIndex + 2));
  return token.split('.').length >= 2 ? token : undefined;
}

export function parseMaFile(raw: Buffer | string | Record<string, unknown>): MaFile {
  if (typeof raw === 'string') {
    return maSchema.parse(JSON.parse(quoteLargeIds(raw)));
  }
  if (Buffer.isBuffer(raw)) {
    return maSchema.parse(JSON.parse(quoteLargeIds(raw.toString('utf8'))));
  }
  return maSchema.parse(raw);
}

export function accountFromMaFile(ma: MaFile): Account {
  const legacy = ma.Session;
  const cookie = legacy?.SteamLoginSecure;
  const accessToken =
    ma.session?.access_token ?? legacy?.AccessToken ?? legacy?.OAuthToken ?? accessTokenFromCookieToken(cookie);
  const refreshToken = ma.session?.refresh_token ?? legacy?.RefreshToken;

  const steamid =
    steamIdFromToken(accessToken) ??
    steamIdFromToken(refreshToken) ??
    steamIdFromCookieToken(cookie) ??
    legacy?.SteamID ??
    ma.session?.steamid ??
    ma.steamid;

  const profile: AccountProfile | undefined =
    ma.profile ?? (ma.avatar_url ? { avatarUrl: ma.avatar_url } : undefined);

  return {
    accountName: ma.account_name,
    steamid,
    sharedSecret: ma.shared_secret,
    identitySecret: ma.identity_secret ?? '',
    deviceId: ma.device_id ?? generateDeviceId(),
    session:
      accessToken || refreshToken
        ? {
            accessToken: accessToken ?? '',
            refreshToken: refreshToken ?? '',
            tokenTimestamp: ma.session?.token_timestamp ?? 0,
            sessionId: ma.session?.session_id ?? legacy?.SessionID
          }
        : undefined,
    revocationCode: ma.revocation_code ?? ma.Revocation_code,
    serialNumber: ma.serial_number,
    uri: ma.uri,
    tokenGid: ma.token_gid,
    profile
  };
}

export function parseAccount(raw: Buffer | string | Record<string, unknown>): Account {
  return accountFromMaFile(parseMaFile(raw));
}

/** Record shape shared with the desktop authenticator (`Session`) plus this project's `session` block. */
export function toMaFile(account: Account): Record<string, unknown> {
  return {
    account_name: account.accountName,
    shared_secret: account.sharedSecret,
    identity_secret: account.identitySecret,
    device_id: account.deviceId,
    steamid: account.steamid,
    revocation_code: account.revocationCode,
    serial_number: account.serialNumber,
    uri: account.uri,
    token_gid: account.tokenGid,
    fully_enrolled: true,
    Session: account.session
      ? {
          SteamID: account.steamid,
          AccessToken: account.session.accessToken,
          RefreshToken: account.session.refreshToken,
          SessionID: account.session.sessionId
        }
      : undefined,
    session: account.session
      ? {
          access_token: account.session.accessToken,
          refresh_token: account.session.refreshToken,
          token_timestamp: account.session.tokenTimestamp,
          session_id: account.session.sessionId
        }
      : undefined,
    profile: account.profile
  };
}

export function stringifyMaFile(account: Account): string {
  return stringifyWithNumericIds(toMaFile(account), ['SteamID']);
}
