import crypto from 'crypto';
import { CryptoError } from './errors';

const VERSION = 0x80;
const HEADER_LENGTH = 1 + 8 + 16;
const HMAC_LENGTH = 32;
const BLOCK_SIZE = 16;

/**
 * Reads a Fernet token: version byte, 8-byte timestamp, 16-byte IV,
 * AES-128-CBC ciphertext and an HMAC-SHA256 over everything before it.
 * The 32-byte key splits into the signing half and the encryption half.
 */
export function decryptFernet(token: string, key: string): Buffer {
  const keyBytes = Buffer.from(key, 'base64url');
  if (keyBytes.length !== 32) {
    throw new CryptoError('Fernet key must be 32 bytes');
  }

  const raw = Buffer.from(token.trim(), 'base64url');
  const ciphertextLength = raw.length - HEADER_LENGTH - HMAC_LENGTH;
  if (raw[0] !== VERSION || ciphertextLength <= 0 || ciphertextLength % BLOCK_SIZE !== 0) {
    throw new CryptoError('Malformed legacy vault token');
  }

  const signed = raw.subarray(0, raw.length - HMAC_LENGTH);
  const expected = crypto.createHmac('sha256', keyBytes.subarray(0, 16)).update(signed).digest();
  if (!crypto.timingSafeEqual(expected, raw.subarray(raw.length - HMAC_LENGTH))) {
    throw new CryptoError();
  }

  const iv = raw.subarray(9, HEADER_LENGTH);
  try {
    const decipher = crypto.createDecipheriv('aes-128-cbc', keyBytes.subarray(16), iv);
    return Buffer.concat([decipher.update(raw.subarray(HEADER_LENGTH, raw.length - HMAC_LENGTH)), decipher.final()]);
  } catch (error) {
    throw new CryptoError(undefined, { cause: error });
  }
}
