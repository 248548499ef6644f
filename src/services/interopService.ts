import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import type { Account } from '../types/steam';
import { CryptoError, errorMessage, isMissingFile } from '../utils/errors';
import {
  decryptInterop,
  encryptInterop,
  generateInteropIv,
  generateInteropSalt
} from '../utils/interopCrypto';
import { moduleLogger } from '../utils/logger';
import { parseAccount, quoteLargeIds, stringifyMaFile, stringifyWithNumericIds } from '../utils/mafile';

export const MANIFEST_FILENAME = 'manifest.json';

const manifestEntrySchema = z
  .object({
    filename: z.string().min(1),
    steamid: z
      .union([z.string(), z.number()])
      .optional()
      .transform((value) => (value === undefined ? undefined : String(value))),
    encryption_iv: z.string().nullable().optional(),
    encryption_salt: z.string().nullable().optional()
  })
  .passthrough();

const manifestSchema = z
  .object({
    encrypted: z.boolean().default(false),
    entries: z.array(manifestEntrySchema)
  })
  .passthrough();

export type InteropManifest = z.infer<typeof manifestSchema>;
export type InteropManifestEntry = z.infer<typeof manifestEntrySchema>;

export type InteropExport = {
  manifest: InteropManifest;
  /** filename → file content */
  files: Record<string, string>;
};

export type InteropImport = {
  accounts: Account[];
  errors: string[];
};

const log = moduleLogger('interop');

async function readText(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, 'utf8');
  } catch (error) {
    if (isMissingFile(error)) {
      return null;
    }
    throw error;
  }
}

export async function readManifest(folder: string): Promise<InteropManifest | null> {
  const raw = await readText(path.join(folder, MANIFEST_FILENAME));
  if (raw === null) {
    return null;
  }

  let json: unknown;
  try {
    json = JSON.parse(quoteLargeIds(raw));
  } catch (error) {
    log.warn({ folder, err: errorMessage(error) }, 'manifest.json is not valid JSON');
    return null;
  }

  const parsed = manifestSchema.safeParse(json);
  if (!parsed.success) {
    log.warn({ folder, issues: parsed.error.issues.length }, 'manifest.json has no usable entries list');
    return null;
  }

  return parsed.data;
}

export async function isInteropFolder(folder: string): Promise<boolean> {
  return (await readManifest(folder)) !== null;
}

/** Decrypts the first manifest entry and checks that it parses as JSON. */
export async function verifyPasskey(folder: string, passkey: string): Promise<boolean> {
  const manifest = await readManifest(folder);
  if (!manifest || !manifest.encrypted || manifest.entries.length === 0) {
    return true;
  }

  const [entry] = manifest.entries;
  if (!entry.encryption_salt || !entry.encryption_iv) {
    return false;
  }

  const content = await readText(path.join(folder, entry.filename));
  if (content === null) {
    return false;
  }

  try {
    JSON.parse(decryptInterop(content.trim(), passkey, entry.encryption_salt, entry.encryption_iv));
    return true;
  } catch (error) {
    log.debug({ folder, err: errorMessage(error) }, 'Passkey check failed');
    return false;
  }
}

export function exportInterop(accounts: Account[], passkey?: string): InteropExport {
  const encrypted = Boolean(passkey);
  const entries: InteropManifestEntry[] = [];
  const files: Record<string, string> = {};

  for (const account of accounts) {
    const steamid = account.steamid && /^\d+$/.test(account.steamid) ? account.steamid : undefined;
    const filename = `${steamid ?? account.accountName}.maFile`;
    const plaintext = stringifyMaFile(account);

    if (passkey) {
      const salt = generateInteropSalt();
      const iv = generateInteropIv();
      files[filename] = encryptInterop(plaintext, passkey, salt, iv);
      entries.push({ encryption_iv: iv, encryption_salt: salt, filename, steamid: steamid ?? '0' });
    } else {
      files[filename] = plaintext;
      entries.push({ encryption_iv: null, encryption_salt: null, filename, steamid: steamid ?? '0' });
    }
  }

  return {
    manifest: {
      encrypted,
      first_run: true,
      entries,
      periodic_checking: false,
      periodic_checking_interval: 5,
      periodic_checking_checkall: false,
      auto_confirm_market_transactions: false,
      auto_confirm_trades: false
    },
    files
  };
}

export function stringifyManifest(manifest: InteropManifest): string {
  return stringifyWithNumericIds(manifest, ['steamid']);
}

export async function writeInteropExport(folder: string, exported: InteropExport): Promise<string[]> {
  await fs.mkdir(folder, { recursive: true });

  const written: string[] = [];
  for (const [filename, content] of Object.entries(exported.files)) {
    await fs.writeFile(path.join(folder, filename), content, 'utf8');
    written.push(filename);
  }
  await fs.writeFile(path.join(folder, MANIFEST_FILENAME), stringifyManifest(exported.manifest), 'utf8');

  log.info({ folder, count: written.length, encrypted: exported.manifest.encrypted }, 'Accounts exported');
  return written;
}

/** One bad entry never aborts the import; it lands in `errors` instead. */
export async function importInterop(folder: string, passkey?: string): Promise<InteropImport> {
  const accounts: Account[] = [];
  const errors: string[] = [];

  const manifest = await readManifest(folder);
  if (!manifest) {
    return { accounts, errors: ['No valid manifest.json found'] };
  }
  if (manifest.encrypted && !passkey) {
    return { accounts, errors: ['Manifest is encrypted but no passkey provided'] };
  }
  if (manifest.entries.length === 0) {
    return { accounts, errors: ['No account entries in manifest'] };
  }

  for (const entry of manifest.entries) {
    const { filename } = entry;
    const content = await readText(path.join(folder, filename));
    if (content === null) {
      errors.push(`File not found: ${filename}`);
      continue;
    }

    let plaintext = content.trim();
    if (manifest.encrypted && passkey) {
      if (!entry.encryption_salt || !entry.encryption_iv) {
        errors.push(`Missing salt/IV for ${filename}`);
        continue;
      }
      try {
        plaintext = decryptInterop(plaintext, passkey, entry.encryption_salt, entry.encryption_iv);
      } catch (error) {
        if (error instanceof CryptoError) {
          errors.push(`Failed to decrypt ${filename} (bad passkey?)`);
          continue;
        }
        throw error;
      }
    }

    let account: Account;
    try {
      account = parseAccount(plaintext);
    } catch (error) {
      errors.push(
        error instanceof SyntaxError
          ? `Invalid JSON in ${filename}: ${error.message}`
          : `Error reading ${filename}: ${errorMessage(error)}`
      );
      continue;
    }

    if (!account.steamid && entry.steamid && entry.steamid !== '0') {
      account.steamid = entry.steamid;
    }
    accounts.push(account);
  }

  log.info({ folder, imported: accounts.length, failed: errors.length }, 'Interop import finished');
  return { accounts, errors };
}
