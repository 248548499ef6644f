import type { AccountStore } from '../services/accountStore';
import type { WsHub } from '../services/wsHub';
import type { Account } from '../types/steam';
import { moduleLogger } from '../utils/logger';
import { currentCode, unixNow } from '../utils/steamGuard';

export type CodeTick = {
  accountName: string;
  code: string;
  secondsRemaining: number;
};

const log = moduleLogger('code-ticker');

export function computeCodes(accounts: Account[], nowSec: number = unixNow()): CodeTick[] {
  return accounts.map((account) => ({
    accountName: account.accountName,
    ...currentCode(account.sharedSecret, nowSec)
  }));
}

/** Pushes every unlocked account's current code to WebSocket clients once a second. */
export class CodeTicker {
  private timer: NodeJS.Timeout | null = null;

  constructor(
    private readonly store: AccountStore,
    private readonly hub: WsHub,
    private readonly intervalMs = 1000,
    private readonly now: () => number = unixNow
  ) {}

  get running(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) {
      return;
    }

    this.timer = setInterval(() => {
      this.tick();
    }, this.intervalMs);
    this.timer.unref();
    log.debug({ intervalMs: this.intervalMs }, 'Code ticker started');
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  tick(): CodeTick[] {
    if (!this.store.isUnlocked || this.hub.size === 0) {
      return [];
    }

    const codes = computeCodes(this.store.list(), this.now());
    this.hub.broadcast('codes', codes);
    return codes;
  }
}
