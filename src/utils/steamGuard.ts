import { randomUUID } from 'crypto';
import SteamTotp from 'steam-totp';

export const GUARD_CODE_ALPHABET = '23456789BCDFGHJKMNPQRTVWXY';
export const GUARD_CODE_PERIOD_SEC = 30;

export type ConfirmationTag = 'conf' | 'allow' | 'cancel' | 'details' | 'list';

/** Base64, 40-char hex or raw bytes; steam-totp accepts all three. */
export type SecretInput = string | Buffer;

export function unixNow(): number {
  return Math.floor(Date.now() / 1000);
}

export function generateCode(sharedSecret: SecretInput, unixTime: number): string {
  // steam-totp reads its own clock and takes an offset from it. Aiming at the middle
  // of the wanted period keeps a second ticking over between the two reads harmless.
  const periodMid = Math.floor(unixTime / GUARD_CODE_PERIOD_SEC) * GUARD_CODE_PERIOD_SEC + GUARD_CODE_PERIOD_SEC / 2;
  return SteamTotp.generateAuthCode(sharedSecret, periodMid - unixNow());
}

export function secondsUntilNextCode(unixTime: number): number {
  return GUARD_CODE_PERIOD_SEC - (Math.floor(unixTime) % GUARD_CODE_PERIOD_SEC);
}

export function currentCode(
  sharedSecret: SecretInput,
  unixTime: number = unixNow()
): { code: string; secondsRemaining: number } {
  return {
    code: generateCode(sharedSecret, unixTime),
    secondsRemaining: secondsUntilNextCode(unixTime)
  };
}

/** HMAC-SHA1(identity_secret, time_be64 || tag), base64. */
export function generateConfirmationHash(
  unixTime: number,
  tag: ConfirmationTag,
  identitySecret: SecretInput
): string {
  return SteamTotp.getConfirmationKey(identitySecret, Math.floor(unixTime), tag);
}

export function generateDeviceId(): string {
  return `android:${randomUUID()}`;
}
