import { constants, createPublicKey, publicEncrypt, randomBytes } from 'crypto';
import { setTimeout as delay } from 'timers/promises';
import { env } from '../config/env';
import {
  LoginTimeoutError,
  ProtocolError,
  SteamGuardError,
  errorMessage,
  isSteamGuardError
} from '../utils/errors';
import { steamIdFromToken } from '../utils/jwt';
import { moduleLogger } from '../utils/logger';
import {
  EAuthSessionGuardType,
  buildBeginAuthRequest,
  buildGenerateAccessTokenRequest,
  buildGetRsaKeyRequest,
  buildPollRequest,
  buildUpdateGuardCodeRequest,
  parseBeginAuthResponse,
  parseGenerateAccessTokenResponse,
  parsePollResponse,
  parseRsaKeyResponse,
  type GenerateAccessTokenResponse,
  type GuardCodeType
} from '../utils/steamMessages';
import { SteamTransport } from './steamTransport';

export type LoginState =
  | 'idle'
  | 'rsa_fetched'
  | 'password_encrypted'
  | 'session_begun'
  | 'awaiting_guard_code'
  | 'polling'
  | 'success'
  | 'failed';

export type GuardType = 'device' | 'email';

/** Everything needed to resume a login after the user typed a Guard code. */
export type PendingTwoFactor = {
  accountName: string;
  clientId: string;
  /** base64 of the opaque request_id bytes */
  requestId: string;
  steamid: string;
  guardType: GuardType;
};

export type LoginTokens = {
  accountName: string;
  steamid: string;
  accessToken: string;
  refreshToken: string;
};

export type LoginResult =
  | ({ status: 'success' } & LoginTokens)
  | ({ status: 'needs_2fa' } & PendingTwoFactor)
  | { status: 'error'; error: SteamGuardError };

export type GuardCodeProvider = (context: {
  accountName: string;
  guardType: GuardType;
}) => Promise<string | null> | string | null;

export type LoginSessionOptions = {
  transport?: SteamTransport;
  pollAttempts?: number;
  pollIntervalMs?: number;
  deviceFriendlyName?: string;
  sleep?: (ms: number) => Promise<void>;
};

const log = moduleLogger('login');

function hexToBase64Url(hex: string): string {
  const normalized = hex.trim().replace(/^0x/i, '');
  return Buffer.from(normalized.length % 2 === 0 ? normalized : `0${normalized}`, 'hex').toString('base64url');
}

/** RSA PKCS#1 v1.5 with the key Steam handed out for this login attempt. */
export function encryptPassword(password: string, modulusHex: string, exponentHex: string): string {
  try {
    const key = createPublicKey({
      key: { kty: 'RSA', n: hexToBase64Url(modulusHex), e: hexToBase64Url(exponentHex) },
      format: 'jwk'
    });
    return publicEncrypt({ key, padding: constants.RSA_PKCS1_PADDING }, Buffer.from(password, 'utf8')).toString(
      'base64'
    );
  } catch (error) {
    throw new ProtocolError(`Steam returned an unusable RSA key: ${errorMessage(error)}`);
  }
}

/**
 * None(1) allowed means no code is needed. Otherwise a device code is preferred
 * over an e-mail code; an empty list is treated as a device-code account.
 */
export function resolveGuardRequirement(allowed: number[]): GuardType | null {
  if (allowed.includes(EAuthSessionGuardType.None)) {
    return null;
  }
  if (allowed.includes(EAuthSessionGuardType.DeviceCode)) {
    return 'device';
  }
  if (allowed.includes(EAuthSessionGuardType.EmailCode)) {
    return 'email';
  }
  return 'device';
}

function guardCodeType(guardType: GuardType): GuardCodeType {
  return guardType === 'email' ? EAuthSessionGuardType.EmailCode : EAuthSessionGuardType.DeviceCode;
}

export async function refreshAccessToken(
  transport: SteamTransport,
  refreshToken: string,
  steamid: string,
  allowRenewal = false
): Promise<GenerateAccessTokenResponse> {
  const reader = await transport.call({
    service: 'IAuthenticationService',
    method: 'GenerateAccessTokenForApp',
    payload: buildGenerateAccessTokenRequest(refreshToken, steamid, allowRenewal)
  });

  return parseGenerateAccessTokenResponse(reader);
}

export class LoginSession {
  private currentState: LoginState = 'idle';
  private readonly transport: SteamTransport;
  private readonly pollAttempts: number;
  private readonly pollIntervalMs: number;
  private readonly deviceFriendlyName: string;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: LoginSessionOptions = {}) {
    this.transport = options.transport ?? new SteamTransport();
    this.pollAttempts = options.pollAttempts ?? env.LOGIN_POLL_ATTEMPTS;
    this.pollIntervalMs = options.pollIntervalMs ?? env.LOGIN_POLL_INTERVAL_MS;
    this.deviceFriendlyName =
      options.deviceFriendlyName ?? `Steam Mobile Guard-${randomBytes(4).toString('hex')}`;
    this.sleep = options.sleep ?? ((ms) => delay(ms));
  }

  get state(): LoginState {
    return this.currentState;
  }

  async login(accountName: string, password: string, guardCodeProvider?: GuardCodeProvider): Promise<LoginResult> {
    this.currentState = 'idle';

    try {
      const rsa = parseRsaKeyResponse(
        await this.transport.call({
          service: 'IAuthenticationService',
          method: 'GetPasswordRSAPublicKey',
          httpMethod: 'GET',
          payload: buildGetRsaKeyRequest(accountName)
        })
      );
      this.currentState = 'rsa_fetched';

      const encryptedPassword = encryptPassword(password, rsa.publicKeyMod, rsa.publicKeyExp);
      this.currentState = 'password_encrypted';

      const begun = parseBeginAuthResponse(
        await this.transport.call({
          service: 'IAuthenticationService',
          method: 'BeginAuthSessionViaCredentials',
          payload: buildBeginAuthRequest({
            deviceFriendlyName: this.deviceFriendlyName,
            accountName,
            encryptedPassword,
            encryptionTimestamp: rsa.timestamp
          })
        })
      );
      this.currentState = 'session_begun';

      const steamid =
        begun.steamid && begun.steamid > 0n ? begun.steamid.toString() : steamIdFromToken(begun.weakToken);
      if (!steamid) {
        throw new ProtocolError('Auth session response is missing steamid');
      }

      log.info({ accountName, steamid, allowed: begun.allowedConfirmations }, 'Steam auth session started');

      const guardType = resolveGuardRequirement(begun.allowedConfirmations);
      if (guardType) {
        const pending: PendingTwoFactor = {
          accountName,
          clientId: begun.clientId.toString(),
          requestId: begun.requestId.toString('base64'),
          steamid,
          guardType
        };

        const code = guardCodeProvider ? await guardCodeProvider({ accountName, guardType }) : null;
        if (!code) {
          this.currentState = 'awaiting_guard_code';
          return { status: 'needs_2fa', ...pending };
        }

        await this.submitGuardCode(begun.clientId, steamid, code, guardType);
      }

      return await this.poll(begun.clientId, begun.requestId, steamid, accountName);
    } catch (error) {
      return this.fail(error, accountName);
    }
  }

  async complete2fa(pending: PendingTwoFactor, code: string): Promise<LoginResult> {
    this.currentState = 'session_begun';

    try {
      const clientId = BigInt(pending.clientId);
      await this.submitGuardCode(clientId, pending.steamid, code, pending.guardType);
      return await this.poll(clientId, Buffer.from(pending.requestId, 'base64'), pending.steamid, pending.accountName);
    } catch (error) {
      return this.fail(error, pending.accountName);
    }
  }

  private async submitGuardCode(clientId: bigint, steamid: string, code: string, guardType: GuardType): Promise<void> {
    await this.transport.call({
      service: 'IAuthenticationService',
      method: 'UpdateAuthSessionWithSteamGuardCode',
      payload: buildUpdateGuardCodeRequest(clientId, steamid, code.trim(), guardCodeType(guardType))
    });
  }

  private async poll(clientId: bigint, requestId: Buffer, steamid: string, accountName: string): Promise<LoginResult> {
    this.currentState = 'polling';
    let activeClientId = clientId;

    for (let attempt = 1; attempt <= this.pollAttempts; attempt += 1) {
      const response = parsePollResponse(
        await this.transport.call({
          service: 'IAuthenticationService',
          method: 'PollAuthSessionStatus',
          payload: buildPollRequest(activeClientId, requestId)
        })
      );

      if (response.newClientId && response.newClientId > 0n) {
        activeClientId = response.newClientId;
      }

      if (response.accessToken || response.refreshToken) {
        this.currentState = 'success';
        log.info({ accountName, steamid, attempt }, 'Steam login approved');
        return {
          status: 'success',
          accountName: response.accountName || accountName,
          steamid,
          accessToken: response.accessToken ?? '',
          refreshToken: response.refreshToken ?? ''
        };
      }

      if (attempt < this.pollAttempts) {
        await this.sleep(this.pollIntervalMs);
      }
    }

    throw new LoginTimeoutError(`Steam did not approve the login after ${this.pollAttempts} polls.`);
  }

  private fail(error: unknown, accountName: string): LoginResult {
    this.currentState = 'failed';
    if (!isSteamGuardError(error)) {
      throw error;
    }
    log.warn({ accountName, kind: error.kind, err: error.message }, 'Steam login failed');
    return { status: 'error', error };
  }
}
