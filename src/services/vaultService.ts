import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { env } from '../config/env';
import type { Account } from '../types/steam';
import { decryptVault, deriveLegacyVaultKey, deriveVaultKey, encryptVault, generateVaultSalt } from '../utils/crypto';
import { CryptoError, PasskeyRequiredError, errorMessage, isMissingFile } from '../utils/errors';
import { decryptFernet } from '../utils/fernet';
import { moduleLogger } from '../utils/logger';
import { parseAccount, quoteLargeIds, toMaFile } from '../utils/mafile';

export const VAULT_VERSION = 2;
export const VAULT_FILENAME = 'vault.json';

const accountListSchema = z.array(z.record(z.unknown()));

const vaultFileSchema = z.union([
  z.object({ version: z.literal(VAULT_VERSION), encrypted: z.literal(false), accounts: accountListSchema }),
  z.object({
    version: z.literal(VAULT_VERSION),
    encrypted: z.literal(true),
    salt: z.string().min(1),
    data: z.string().min(1)
  }),
  // pre-versioned files, read once and rewritten
  z.object({ version: z.undefined(), encrypted: z.literal(false), accounts: accountListSchema }),
  z.object({ version: z.undefined(), encrypted: z.literal(true), data: z.string().min(1) })
]);

type VaultFile = z.infer<typeof vaultFileSchema>;

const log = moduleLogger('vault');

function parseAccountList(json: string): Account[] {
  let raw: unknown;
  try {
    raw = JSON.parse(quoteLargeIds(json));
  } catch (error) {
    throw new CryptoError('Decrypted vault is not valid JSON', { cause: error });
  }
  return accountListSchema.parse(raw).map((entry) => parseAccount(entry));
}

/**
 * Whole-collection store in `DATA_DIR/vault.json`. The salt is created with
 * the vault and reused on every save until the passkey changes.
 */
export class VaultStore {
  private salt: Buffer | null = null;

  constructor(readonly filePath: string = path.join(env.DATA_DIR, VAULT_FILENAME)) {}

  async exists(): Promise<boolean> {
    return (await this.readFile()) !== null;
  }

  async isEncrypted(): Promise<boolean> {
    return (await this.readFile())?.encrypted ?? false;
  }

  async load(passkey?: string): Promise<Account[]> {
    const file = await this.readFile();
    if (!file) {
      this.salt = null;
      return [];
    }

    if (!file.encrypted) {
      const accounts = file.accounts.map((entry) => parseAccount(entry));
      if (file.version === undefined) {
        log.info({ count: accounts.length }, 'Migrating unversioned plaintext vault');
        await this.save(accounts);
      }
      return accounts;
    }

    if (!passkey) {
      throw new PasskeyRequiredError();
    }

    if (file.version === undefined) {
      const accounts = parseAccountList(decryptFernet(file.data, deriveLegacyVaultKey(passkey)).toString('utf8'));
      log.info({ count: accounts.length }, 'Migrating legacy encrypted vault');
      this.salt = null;
      await this.save(accounts, passkey);
      return accounts;
    }

    const salt = Buffer.from(file.salt, 'base64');
    const accounts = parseAccountList(decryptVault(file.data, deriveVaultKey(passkey, salt)));
    this.salt = salt;
    return accounts;
  }

  async save(accounts: Account[], passkey?: string): Promise<void> {
    const records = accounts.map((account) => toMaFile(account));

    let file: VaultFile;
    if (passkey) {
      const salt = this.salt ?? generateVaultSalt();
      file = {
        version: VAULT_VERSION,
        encrypted: true,
        salt: salt.toString('base64'),
        data: encryptVault(JSON.stringify(records), deriveVaultKey(passkey, salt))
      };
      this.salt = salt;
    } else {
      file = { version: VAULT_VERSION, encrypted: false, accounts: records };
    }

    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    const tmpPath = `${this.filePath}.tmp`;
    await fs.writeFile(tmpPath, JSON.stringify(file, null, 2), { encoding: 'utf8', mode: 0o600 });
    await fs.rename(tmpPath, this.filePath);
    log.debug({ count: accounts.length, encrypted: file.encrypted }, 'Vault saved');
  }

  /** New passkey (or none) means a new salt. */
  async changePasskey(accounts: Account[], passkey?: string): Promise<void> {
    this.salt = null;
    await this.save(accounts, passkey);
    log.info({ encrypted: Boolean(passkey) }, 'Vault passkey changed');
  }

  private async readFile(): Promise<VaultFile | null> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw error;
    }

    let json: unknown;
    try {
      json = JSON.parse(quoteLargeIds(raw));
    } catch (error) {
      throw new Error(`Vault file is corrupt: ${errorMessage(error)}`, { cause: error });
    }
    return vaultFileSchema.parse(json);
  }
}
