import crypto from 'crypto';
import { CryptoError } from './errors';

export const VAULT_KDF_ITERATIONS = 100_000;
export const VAULT_SALT_LENGTH = 32;
const KEY_LENGTH = 32;
const NONCE_LENGTH = 12;
const TAG_LENGTH = 16;

/** Fixed salt of the pre-versioned vault format. Read-only, for migration. */
const LEGACY_VAULT_SALT = 'steam_auth_linux';

export function generateVaultSalt(): Buffer {
  return crypto.randomBytes(VAULT_SALT_LENGTH);
}

export function deriveVaultKey(passkey: string, salt: Buffer): Buffer {
  return crypto.pbkdf2Sync(passkey, salt, VAULT_KDF_ITERATIONS, KEY_LENGTH, 'sha256');
}

/** Fernet key (URL-safe base64 of 32 bytes) the legacy vault was written with. */
export function deriveLegacyVaultKey(passkey: string): string {
  return crypto
    .pbkdf2Sync(passkey, LEGACY_VAULT_SALT, VAULT_KDF_ITERATIONS, KEY_LENGTH, 'sha256')
    .toString('base64url');
}

/** AES-256-GCM with a fresh nonce; output is base64(nonce || ciphertext || tag). */
export function encryptVault(plaintext: string, key: Buffer): string {
  const nonce = crypto.randomBytes(NONCE_LENGTH);
  const cipher = crypto.createCipheriv('aes-256-gcm', key, nonce, { authTagLength: TAG_LENGTH });

  const encrypted = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()]);
  return Buffer.concat([nonce, encrypted, cipher.getAuthTag()]).toString('base64');
}

export function decryptVault(blob: string, key: Buffer): string {
  const raw = Buffer.from(blob, 'base64');
  if (raw.length < NONCE_LENGTH + TAG_LENGTH) {
    throw new CryptoError('Malformed encrypted vault payload');
  }

  const nonce = raw.subarray(0, NONCE_LENGTH);
  const tag = raw.subarray(raw.length - TAG_LENGTH);
  const ciphertext = raw.subarray(NONCE_LENGTH, raw.length - TAG_LENGTH);

  try {
    const decipher = crypto.createDecipheriv('aes-256-gcm', key, nonce, { authTagLength: TAG_LENGTH });
    decipher.setAuthTag(tag);
    return Buffer.concat([decipher.update(ciphertext), decipher.final()]).toString('utf8');
  } catch (error) {
    throw new CryptoError(undefined, { cause: error });
  }
}
