import crypto from 'crypto';
import { CryptoError } from './errors';

// Fixed by the desktop authenticator's file format; do not change.
export const INTEROP_KDF_ITERATIONS = 50_000;
export const INTEROP_SALT_LENGTH = 8;
export const INTEROP_IV_LENGTH = 16;
const KEY_LENGTH = 32;

export function generateInteropSalt(): string {
  return crypto.randomBytes(INTEROP_SALT_LENGTH).toString('base64');
}

export function generateInteropIv(): string {
  return crypto.randomBytes(INTEROP_IV_LENGTH).toString('base64');
}

export function deriveInteropKey(passkey: string, salt: string): Buffer {
  return crypto.pbkdf2Sync(passkey, Buffer.from(salt, 'base64'), INTEROP_KDF_ITERATIONS, KEY_LENGTH, 'sha1');
}

/** AES-256-CBC, PKCS#7. Salt, IV and result are base64. */
export function encryptInterop(plaintext: string, passkey: string, salt: string, iv: string): string {
  const cipher = crypto.createCipheriv('aes-256-cbc', deriveInteropKey(passkey, salt), Buffer.from(iv, 'base64'));
  return Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()]).toString('base64');
}

/**
 * A wrong passkey usually fails the padding check. When it does not, the
 * result is garbage that will not parse as JSON.
 */
export function decryptInterop(ciphertext: string, passkey: string, salt: string, iv: string): string {
  const ivBytes = Buffer.from(iv, 'base64');
  if (ivBytes.length !== INTEROP_IV_LENGTH) {
    throw new CryptoError('Invalid IV in encrypted account file');
  }

  try {
    const decipher = crypto.createDecipheriv('aes-256-cbc', deriveInteropKey(passkey, salt), ivBytes);
    return Buffer.concat([decipher.update(Buffer.from(ciphertext, 'base64')), decipher.final()]).toString('utf8');
  } catch (error) {
    throw new CryptoError(undefined, { cause: error });
  }
}
