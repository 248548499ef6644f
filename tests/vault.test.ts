import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { AccountStore } from '../src/services/accountStore';
import { VaultStore } from '../src/services/vaultService';
import type { Account } from '../src/types/steam';
import { deriveLegacyVaultKey } from '../src/utils/crypto';
import { AccountNotFoundError, CryptoError, PasskeyRequiredError } from '../src/utils/errors';
import { toMaFile } from '../src/utils/mafile';
import { TEST_STEAMID, fernetToken } from './helpers/fakeSteam';

const alice: Account = {
  accountName: 'alice',
  steamid: TEST_STEAMID,
  sharedSecret: 'c2hhcmVk',
  identitySecret: 'aWRlbnRpdHk=',
  deviceId: 'android:test-device',
  revocationCode: 'R12345'
};

const bob: Account = {
  accountName: 'bob',
  sharedSecret: 'Ym9i',
  identitySecret: 'Ym9iLWlk',
  deviceId: 'android:bob-device'
};

let dir: string;
let vaultPath: string;

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), 'vault-'));
  vaultPath = path.join(dir, 'vault.json');
});

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

async function readVaultFile(): Promise<Record<string, unknown>> {
  return JSON.parse(await fs.readFile(vaultPath, 'utf8'));
}

describe('VaultStore', () => {
  it('starts empty and stores plaintext accounts', async () => {
    const vault = new VaultStore(vaultPath);
    await expect(vault.exists()).resolves.toBe(false);
    await expect(vault.load()).resolves.toEqual([]);

    await vault.save([alice, bob]);

    const file = await readVaultFile();
    expect(file).toMatchObject({ version: 2, encrypted: false });
    expect((await fs.stat(vaultPath)).mode & 0o777).toBe(0o600);
    await expect(new VaultStore(vaultPath).load()).resolves.toEqual([alice, bob]);
  });

  it('encrypts with the passkey and refuses to open without it', async () => {
    await new VaultStore(vaultPath).save([alice], 'test-passkey');

    const file = await readVaultFile();
    expect(file).toMatchObject({ version: 2, encrypted: true });
    expect(Buffer.from(String(file.salt), 'base64')).toHaveLength(32);
    expect(JSON.stringify(file)).not.toContain('c2hhcmVk');

    const reopened = new VaultStore(vaultPath);
    await expect(reopened.isEncrypted()).resolves.toBe(true);
    await expect(reopened.load()).rejects.toBeInstanceOf(PasskeyRequiredError);
    await expect(reopened.load('wrong-passkey')).rejects.toBeInstanceOf(CryptoError);
    await expect(reopened.load('test-passkey')).resolves.toEqual([alice]);
  });

  it('reuses the salt until the passkey changes', async () => {
    const vault = new VaultStore(vaultPath);
    await vault.save([alice], 'test-passkey');
    const first = await readVaultFile();

    await vault.save([alice, bob], 'test-passkey');
    const second = await readVaultFile();
    expect(second.salt).toBe(first.salt);
    expect(second.data).not.toBe(first.data);

    await vault.changePasskey([alice, bob], 'other-passkey');
    const third = await readVaultFile();
    expect(third.salt).not.toBe(first.salt);
    await expect(new VaultStore(vaultPath).load('other-passkey')).resolves.toEqual([alice, bob]);
  });

  it('migrates an unversioned plaintext vault', async () => {
    await fs.writeFile(vaultPath, JSON.stringify({ encrypted: false, accounts: [toMaFile(alice)] }), 'utf8');

    await expect(new VaultStore(vaultPath).load()).resolves.toEqual([alice]);
    await expect(readVaultFile()).resolves.toMatchObject({ version: 2, encrypted: false });
  });

  it('migrates a legacy encrypted vault to the current format', async () => {
    const token = fernetToken(JSON.stringify([toMaFile(alice)]), deriveLegacyVaultKey('test-passkey'));
    await fs.writeFile(vaultPath, JSON.stringify({ encrypted: true, data: token }), 'utf8');

    await expect(new VaultStore(vaultPath).load('wrong-passkey')).rejects.toBeInstanceOf(CryptoError);
    await expect(new VaultStore(vaultPath).load('test-passkey')).resolves.toEqual([alice]);

    const file = await readVaultFile();
    expect(file).toMatchObject({ version: 2, encrypted: true });
    expect(typeof file.salt).toBe('string');
    await expect(new VaultStore(vaultPath).load('test-passkey')).resolves.toEqual([alice]);
  });
});

describe('AccountStore', () => {
  it('refuses access while locked', () => {
    const store = new AccountStore(new VaultStore(vaultPath));

    expect(store.isUnlocked).toBe(false);
    expect(() => store.list()).toThrow(PasskeyRequiredError);
  });

  it('persists every change to the vault', async () => {
    const store = new AccountStore(new VaultStore(vaultPath));
    await store.unlock();

    await store.save(bob);
    await expect(store.saveMany([alice, { ...bob, revocationCode: 'R99999' }])).resolves.toEqual({
      saved: ['alice', 'bob'],
      added: 1,
      updated: 1,
      conflicts: []
    });
    expect(store.list().map((account) => account.accountName)).toEqual(['alice', 'bob']);

    await store.remove('alice');
    await expect(store.remove('alice')).rejects.toBeInstanceOf(AccountNotFoundError);

    const reopened = new AccountStore(new VaultStore(vaultPath));
    await expect(reopened.unlock()).resolves.toEqual([{ ...bob, revocationCode: 'R99999' }]);
  });

  it('never replaces stored secrets or the device id on import', async () => {
    const store = new AccountStore(new VaultStore(vaultPath));
    await store.unlock();
    await store.save(bob);

    const result = await store.saveMany([
      { ...bob, sharedSecret: 'b3RoZXI=', deviceId: 'android:new' },
      { ...bob, deviceId: 'android:new' }
    ]);

    expect(result).toEqual({
      saved: ['bob'],
      added: 0,
      updated: 1,
      conflicts: ['bob: secrets differ from the stored account; remove it first to replace it']
    });
    expect(store.require('bob')).toEqual(bob);
    const reopened = new AccountStore(new VaultStore(vaultPath));
    await expect(reopened.unlock()).resolves.toEqual([bob]);
  });

  it('does not take a passkey for a plain vault', async () => {
    const store = new AccountStore(new VaultStore(vaultPath));
    await store.unlock();
    await store.save(alice);

    const relocked = new AccountStore(new VaultStore(vaultPath));
    await expect(relocked.unlock('typo-passkey')).resolves.toEqual([alice]);
    expect(relocked.isEncrypted).toBe(false);

    await relocked.save(bob);
    expect(await readVaultFile()).toMatchObject({ version: 2, encrypted: false });
    await expect(new AccountStore(new VaultStore(vaultPath)).unlock()).resolves.toEqual([alice, bob]);
  });

  it('keeps the passkey of an encrypted vault', async () => {
    await new VaultStore(vaultPath).save([alice], 'test-passkey');

    const store = new AccountStore(new VaultStore(vaultPath));
    await store.unlock('test-passkey');
    await store.save(bob);

    expect(store.isEncrypted).toBe(true);
    expect(await readVaultFile()).toMatchObject({ version: 2, encrypted: true });
    await expect(new AccountStore(new VaultStore(vaultPath)).unlock('test-passkey')).resolves.toEqual([alice, bob]);
  });

  it('switches the vault to a passkey', async () => {
    const store = new AccountStore(new VaultStore(vaultPath));
    await store.unlock();
    await store.save(alice);

    await store.changePasskey('test-passkey');

    expect(store.isEncrypted).toBe(true);
    const reopened = new AccountStore(new VaultStore(vaultPath));
    await expect(reopened.unlock()).rejects.toBeInstanceOf(PasskeyRequiredError);
    await expect(reopened.unlock('test-passkey')).resolves.toEqual([alice]);
    expect(reopened.require('alice')).toEqual(alice);
  });

  it('runs tasks for one account one at a time', async () => {
    const store = new AccountStore(new VaultStore(vaultPath));
    const order: string[] = [];
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const first = store.withAccountLock('alice', async () => {
      order.push('first:start');
      await gate;
      order.push('first:end');
    });
    const second = store.withAccountLock('alice', async () => {
      order.push('second');
    });

    await new Promise((resolve) => setImmediate(resolve));
    expect(order).toEqual(['first:start']);

    release();
    await Promise.all([first, second]);
    expect(order).toEqual(['first:start', 'first:end', 'second']);
  });

  it('keeps the lock usable after a failed task', async () => {
    const store = new AccountStore(new VaultStore(vaultPath));

    await expect(
      store.withAccountLock('alice', async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');
    await expect(store.withAccountLock('alice', async () => 'next')).resolves.toBe('next');
  });
});
