import { randomUUID } from 'crypto';
import { setTimeout as delay } from 'timers/promises';
import { env } from '../config/env';
import type { Account, PromptForCode, SaveAccount } from '../types/steam';
import {
  AlreadyEnrolledError,
  BadVerificationCodeError,
  EnrollmentIncompleteError,
  NeedsEmailConfirmationError,
  NeedsPhoneError,
  ProtocolError,
  SteamGuardError,
  errorMessage,
  isSteamGuardError
} from '../utils/errors';
import { moduleLogger } from '../utils/logger';
import { generateCode, generateDeviceId, unixNow } from '../utils/steamGuard';
import {
  buildAddAuthenticatorRequest,
  buildFinalizeRequest,
  buildQueryStatusRequest,
  parseAddAuthenticatorResponse,
  parseFinalizeResponse,
  parseQueryStatusResponse
} from '../utils/steamMessages';
import { LoginSession, type LoginTokens, type PendingTwoFactor } from './steamLoginService';
import { SteamTransport } from './steamTransport';

export type EnrollmentState = 'idle' | 'logging_in' | 'added' | 'awaiting_code' | 'activated' | 'failed';

const EResult = {
  Fail: 2,
  DuplicateRequest: 29,
  RequireEmailConfirmation: 84,
  BadSmsCode: 89
} as const;

export type NeedsMoreReason = 'guard_code' | 'activation_code';

export type EnrollResult =
  | {
      status: 'success';
      account: Account;
      /** False when the persistence callback failed; `retrySave` tries again. */
      saved: boolean;
    }
  | {
      status: 'needs_more';
      reason: NeedsMoreReason;
      accountName: string;
      confirmType?: number;
      phoneNumberHint?: string;
    }
  | { status: 'error'; error: SteamGuardError };

export type EnrollmentSessionOptions = {
  transport?: SteamTransport;
  loginSession?: LoginSession;
  save?: SaveAccount;
  promptForCode?: PromptForCode;
  maxRounds?: number;
  roundDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
  deviceId?: string;
};

type AddedAuthenticator = {
  sharedSecret: Buffer;
  identitySecret: Buffer;
  serverTime: number;
  revocationCode?: string;
  serialNumber?: string;
  uri?: string;
  tokenGid?: string;
  confirmType: number;
  phoneNumberHint?: string;
};

const log = moduleLogger('enrollment');

function errorForStatus(status: number | undefined): SteamGuardError | null {
  switch (status) {
    case EResult.DuplicateRequest:
      return new AlreadyEnrolledError();
    case EResult.Fail:
      return new NeedsPhoneError();
    case EResult.RequireEmailConfirmation:
      return new NeedsEmailConfirmationError();
    case EResult.BadSmsCode:
      return new BadVerificationCodeError();
    default:
      return null;
  }
}

/** A protocol failure whose eresult has a dedicated error kind is rethrown as that kind. */
function mapEResult(error: unknown): unknown {
  if (error instanceof ProtocolError) {
    return errorForStatus(error.eresult) ?? error;
  }
  return error;
}

export class EnrollmentSession {
  private currentState: EnrollmentState = 'idle';
  private readonly transport: SteamTransport;
  private readonly loginSession: LoginSession;
  private readonly save?: SaveAccount;
  private readonly promptForCode?: PromptForCode;
  private readonly maxRounds: number;
  private readonly roundDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly deviceId: string;

  private accountName = '';
  private pendingLogin: PendingTwoFactor | null = null;
  private tokens: LoginTokens | null = null;
  private added: AddedAuthenticator | null = null;
  private unsaved: Account | null = null;

  constructor(options: EnrollmentSessionOptions = {}) {
    this.transport = options.transport ?? new SteamTransport();
    this.loginSession = options.loginSession ?? new LoginSession({ transport: this.transport });
    this.save = options.save;
    this.promptForCode = options.promptForCode;
    this.maxRounds = options.maxRounds ?? env.FINALIZE_MAX_ROUNDS;
    this.roundDelayMs = options.roundDelayMs ?? env.FINALIZE_ROUND_DELAY_MS;
    this.sleep = options.sleep ?? ((ms) => delay(ms));
    this.deviceId = options.deviceId ?? generateDeviceId();
  }

  get state(): EnrollmentState {
    return this.currentState;
  }

  /**
   * Logs in and adds an authenticator. An account whose login asks for a device
   * code already has one, so that case ends with `AlreadyEnrolledError`.
   */
  async begin(accountName: string, password: string, guardCode?: string): Promise<EnrollResult> {
    this.reset(accountName);
    this.currentState = 'logging_in';

    const login = await this.loginSession.login(accountName, password, async ({ guardType }) => {
      if (guardType === 'device') {
        throw new AlreadyEnrolledError();
      }
      if (guardCode) {
        return guardCode;
      }
      return this.promptForCode ? this.promptForCode({ kind: 'guard_code', accountName, guardType }) : null;
    });

    if (login.status === 'error') {
      return this.fail(login.error);
    }
    if (login.status === 'needs_2fa') {
      this.pendingLogin = login;
      return { status: 'needs_more', reason: 'guard_code', accountName };
    }

    this.tokens = login;
    return this.addAuthenticator();
  }

  /**
   * Feeds the code the user received: the e-mail Guard code while the login is
   * pending, otherwise the SMS/e-mail activation code for FinalizeAddAuthenticator.
   */
  async submitVerificationCode(code: string): Promise<EnrollResult> {
    const trimmed = code.trim();

    if (this.pendingLogin) {
      const pending = this.pendingLogin;
      this.pendingLogin = null;
      const login = await this.loginSession.complete2fa(pending, trimmed);
      if (login.status === 'error') {
        return this.fail(login.error);
      }
      if (login.status === 'needs_2fa') {
        this.pendingLogin = login;
        return { status: 'needs_more', reason: 'guard_code', accountName: this.accountName };
      }
      this.tokens = login;
      return this.addAuthenticator();
    }

    if (this.currentState === 'activated' && this.unsaved) {
      return this.retrySave();
    }

    const tokens = this.tokens;
    const added = this.added;
    if (this.currentState !== 'awaiting_code' || !tokens || !added) {
      return this.fail(new EnrollmentIncompleteError('No enrollment is waiting for a verification code.'));
    }

    try {
      await this.finalize(tokens, added, trimmed);
      await this.ensureActive(tokens);
    } catch (error) {
      if (error instanceof BadVerificationCodeError) {
        // the user may re-enter the code; the session stays usable
        log.info({ accountName: this.accountName }, 'Activation code rejected');
        return { status: 'error', error };
      }
      return this.fail(error);
    }

    const account: Account = {
      accountName: this.accountName,
      steamid: tokens.steamid,
      sharedSecret: added.sharedSecret.toString('base64'),
      identitySecret: added.identitySecret.toString('base64'),
      deviceId: this.deviceId,
      session: {
        accessToken: tokens.accessToken,
        refreshToken: tokens.refreshToken,
        tokenTimestamp: unixNow()
      },
      revocationCode: added.revocationCode,
      serialNumber: added.serialNumber,
      uri: added.uri,
      tokenGid: added.tokenGid
    };

    this.currentState = 'activated';
    this.unsaved = account;
    log.info({ accountName: this.accountName, steamid: tokens.steamid }, 'Mobile authenticator activated');

    return this.persistActivated(account);
  }

  /** Saves an activated authenticator whose earlier save failed. */
  async retrySave(): Promise<EnrollResult> {
    const account = this.unsaved;
    if (this.currentState !== 'activated' || !account) {
      return this.fail(new EnrollmentIncompleteError('No activated authenticator is waiting to be saved.'));
    }
    return this.persistActivated(account);
  }

  get hasUnsavedAccount(): boolean {
    return this.unsaved !== null;
  }

  /** Steam already runs this authenticator; a failed save keeps it for `retrySave`. */
  private async persistActivated(account: Account): Promise<EnrollResult> {
    if (!this.save) {
      this.unsaved = null;
      return { status: 'success', account, saved: false };
    }

    try {
      await this.save(account);
    } catch (error) {
      log.error(
        { accountName: account.accountName, err: errorMessage(error) },
        'Activated authenticator could not be saved'
      );
      return { status: 'success', account, saved: false };
    }

    this.unsaved = null;
    return { status: 'success', account, saved: true };
  }

  private reset(accountName: string): void {
    this.accountName = accountName;
    this.pendingLogin = null;
    this.tokens = null;
    this.added = null;
    this.unsaved = null;
  }

  private async addAuthenticator(): Promise<EnrollResult> {
    const tokens = this.tokens;
    if (!tokens) {
      return this.fail(new EnrollmentIncompleteError('Enrollment has no Steam session.'));
    }

    let added: AddedAuthenticator;
    try {
      const reader = await this.transport
        .call({
          service: 'ITwoFactorService',
          method: 'AddAuthenticator',
          accessToken: tokens.accessToken,
          payload: buildAddAuthenticatorRequest(tokens.steamid, this.deviceId)
        })
        .catch((error: unknown) => {
          throw mapEResult(error);
        });

      const response = parseAddAuthenticatorResponse(reader);
      if (response.status !== 1) {
        throw (
          errorForStatus(response.status) ??
          new ProtocolError(`Steam rejected AddAuthenticator with status ${response.status}`, response.status)
        );
      }
      if (!response.sharedSecret?.length || !response.identitySecret?.length) {
        throw new ProtocolError('AddAuthenticator response is missing shared_secret or identity_secret');
      }

      added = {
        sharedSecret: response.sharedSecret,
        identitySecret: response.identitySecret,
        serverTime: response.serverTime ?? unixNow(),
        revocationCode: response.revocationCode,
        serialNumber: response.serialNumber,
        uri: response.uri,
        tokenGid: response.tokenGid,
        confirmType: response.confirmType,
        phoneNumberHint: response.phoneNumberHint
      };
    } catch (error) {
      return this.fail(error);
    }

    this.added = added;
    this.currentState = 'added';
    log.info(
      { accountName: this.accountName, steamid: tokens.steamid, confirmType: added.confirmType },
      'Authenticator added, waiting for activation code'
    );

    if (this.promptForCode) {
      const code = await this.promptForCode({
        kind: 'activation_code',
        accountName: this.accountName,
        confirmType: added.confirmType,
        phoneNumberHint: added.phoneNumberHint
      });
      this.currentState = 'awaiting_code';
      if (code) {
        return this.submitVerificationCode(code);
      }
    }

    this.currentState = 'awaiting_code';
    return {
      status: 'needs_more',
      reason: 'activation_code',
      accountName: this.accountName,
      confirmType: added.confirmType,
      phoneNumberHint: added.phoneNumberHint
    };
  }

  private async finalize(tokens: LoginTokens, added: AddedAuthenticator, activationCode: string): Promise<void> {
    let serverTime = added.serverTime;

    for (let round = 1; round <= this.maxRounds; round += 1) {
      const reader = await this.transport
        .call({
          service: 'ITwoFactorService',
          method: 'FinalizeAddAuthenticator',
          accessToken: tokens.accessToken,
          payload: buildFinalizeRequest({
            steamid: tokens.steamid,
            authenticatorCode: generateCode(added.sharedSecret, serverTime),
            authenticatorTime: Math.floor(serverTime / 30),
            activationCode
          })
        })
        .catch((error: unknown) => {
          // only a rejected code has its own meaning at this step
          if (error instanceof ProtocolError && error.eresult === EResult.BadSmsCode) {
            throw new BadVerificationCodeError();
          }
          throw error;
        });

      const response = parseFinalizeResponse(reader);
      if (response.status === EResult.BadSmsCode) {
        throw new BadVerificationCodeError();
      }

      if (response.wantMore) {
        serverTime = response.serverTime ?? serverTime + 30;
        log.debug({ accountName: this.accountName, round, serverTime }, 'Steam wants another finalize round');
        await this.sleep(this.roundDelayMs);
        continue;
      }

      if (!response.success) {
        throw new ProtocolError(
          `Steam rejected FinalizeAddAuthenticator with status ${response.status}`,
          response.status
        );
      }

      return;
    }

    throw new EnrollmentIncompleteError(`Steam still wanted more codes after ${this.maxRounds} finalize rounds.`);
  }

  private async ensureActive(tokens: LoginTokens): Promise<void> {
    const reader = await this.transport.call({
      service: 'ITwoFactorService',
      method: 'QueryStatus',
      accessToken: tokens.accessToken,
      payload: buildQueryStatusRequest(tokens.steamid)
    });

    const status = parseQueryStatusResponse(reader);
    if (status.state <= 0) {
      throw new EnrollmentIncompleteError();
    }
  }

  private fail(error: unknown): EnrollResult {
    this.currentState = 'failed';
    if (!isSteamGuardError(error)) {
      throw error;
    }
    log.warn({ accountName: this.accountName, kind: error.kind, err: error.message }, 'Enrollment failed');
    return { status: 'error', error };
  }
}

type PendingEnrollment = {
  id: string;
  session: EnrollmentSession;
  accountName: string;
  expiresAtMs: number;
};

/** Enrollments waiting for a code between two API calls. */
export class PendingEnrollments {
  private readonly pendingById = new Map<string, PendingEnrollment>();

  constructor(private readonly ttlMs: number = env.ENROLLMENT_TTL_SEC * 1000) {}

  add(accountName: string, session: EnrollmentSession, nowMs = Date.now()): { pendingId: string; expiresInSec: number } {
    this.cleanup(nowMs);

    for (const [id, pending] of this.pendingById.entries()) {
      if (pending.accountName === accountName) {
        this.pendingById.delete(id);
      }
    }

    const pendingId = randomUUID();
    this.pendingById.set(pendingId, { id: pendingId, session, accountName, expiresAtMs: nowMs + this.ttlMs });
    return { pendingId, expiresInSec: Math.floor(this.ttlMs / 1000) };
  }

  get(pendingId: string, nowMs = Date.now()): EnrollmentSession | null {
    this.cleanup(nowMs);
    return this.pendingById.get(pendingId)?.session ?? null;
  }

  delete(pendingId: string): void {
    this.pendingById.delete(pendingId);
  }

  get size(): number {
    return this.pendingById.size;
  }

  cleanup(nowMs = Date.now()): void {
    for (const [id, pending] of this.pendingById.entries()) {
      if (pending.expiresAtMs <= nowMs) {
        this.pendingById.delete(id);
      }
    }
  }
}
