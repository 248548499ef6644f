import type { Account } from '../types/steam';
import { AccountNotFoundError, PasskeyRequiredError } from '../utils/errors';
import { moduleLogger } from '../utils/logger';
import { VaultStore } from './vaultService';

const log = moduleLogger('accounts');

export type SaveManyResult = {
  saved: string[];
  added: number;
  updated: number;
  /** One message per account left untouched. */
  conflicts: string[];
};

/** Unlocked account collection; every change is written through to the vault. */
export class AccountStore {
  private readonly accounts = new Map<string, Account>();
  private readonly locks = new Map<string, Promise<void>>();
  private passkey: string | undefined;
  private unlocked = false;

  constructor(private readonly vault: VaultStore = new VaultStore()) {}

  get isUnlocked(): boolean {
    return this.unlocked;
  }

  get isEncrypted(): boolean {
    return Boolean(this.passkey);
  }

  /**
   * A passkey is only adopted when the vault on disk is encrypted; a plain vault
   * gets one through `changePasskey`.
   */
  async unlock(passkey?: string): Promise<Account[]> {
    const encrypted = await this.vault.isEncrypted();
    const loaded = await this.vault.load(encrypted ? passkey || undefined : undefined);

    this.accounts.clear();
    for (const account of loaded) {
      this.accounts.set(account.accountName, account);
    }
    if (passkey && !encrypted) {
      log.warn('Passkey ignored: the vault is not encrypted');
    }
    this.passkey = encrypted ? passkey || undefined : undefined;
    this.unlocked = true;

    log.info({ count: loaded.length, encrypted }, 'Vault unlocked');
    return this.list();
  }

  list(): Account[] {
    this.ensureUnlocked();
    return Array.from(this.accounts.values()).sort((left, right) =>
      left.accountName.localeCompare(right.accountName)
    );
  }

  get(accountName: string): Account | undefined {
    this.ensureUnlocked();
    return this.accounts.get(accountName);
  }

  require(accountName: string): Account {
    const account = this.get(accountName);
    if (!account) {
      throw new AccountNotFoundError(accountName);
    }
    return account;
  }

  /** Persistence callback handed to login, enrollment and confirmation code. */
  readonly save = async (account: Account): Promise<void> => {
    this.ensureUnlocked();
    this.accounts.set(account.accountName, account);
    await this.persist();
  };

  /**
   * Imports a batch. An account that already exists keeps its device id, and one
   * whose secrets differ from the stored ones is skipped and reported instead.
   */
  async saveMany(accounts: Account[]): Promise<SaveManyResult> {
    this.ensureUnlocked();

    const result: SaveManyResult = { saved: [], added: 0, updated: 0, conflicts: [] };
    for (const account of accounts) {
      const existing = this.accounts.get(account.accountName);
      if (!existing) {
        this.accounts.set(account.accountName, account);
        result.saved.push(account.accountName);
        result.added += 1;
        continue;
      }

      if (existing.sharedSecret !== account.sharedSecret || existing.identitySecret !== account.identitySecret) {
        result.conflicts.push(
          `${account.accountName}: secrets differ from the stored account; remove it first to replace it`
        );
        continue;
      }

      this.accounts.set(account.accountName, { ...account, deviceId: existing.deviceId });
      result.saved.push(account.accountName);
      result.updated += 1;
    }

    if (result.saved.length > 0) {
      await this.persist();
    }
    return result;
  }

  async remove(accountName: string): Promise<void> {
    this.require(accountName);
    this.accounts.delete(accountName);
    await this.persist();
    log.info({ accountName }, 'Account removed');
  }

  async changePasskey(passkey?: string): Promise<void> {
    this.ensureUnlocked();
    this.passkey = passkey || undefined;
    await this.vault.changePasskey(this.list(), this.passkey);
  }

  /**
   * Runs `task` after every earlier task for the same account has settled, so
   * token refreshes and confirmation calls never interleave per account.
   */
  async withAccountLock<T>(accountName: string, task: () => Promise<T>): Promise<T> {
    const previous = this.locks.get(accountName) ?? Promise.resolve();
    const run = previous.then(task);
    const settled = run.then(
      () => undefined,
      () => undefined
    );
    this.locks.set(accountName, settled);

    try {
      return await run;
    } finally {
      if (this.locks.get(accountName) === settled) {
        this.locks.delete(accountName);
      }
    }
  }

  private async persist(): Promise<void> {
    await this.vault.save(Array.from(this.accounts.values()), this.passkey);
  }

  private ensureUnlocked(): void {
    if (!this.unlocked) {
      throw new PasskeyRequiredError('Vault is locked. Unlock it with the passkey first.');
    }
  }
}
