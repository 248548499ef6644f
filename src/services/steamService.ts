import type { AxiosInstance, AxiosResponse } from 'axios';
import { z } from 'zod';
import type { Account, AccountSession, Confirmation, ConfirmationTypeName, SaveAccount } from '../types/steam';
import { ProtocolError, SessionExpiredError, TransportError, errorMessage, isSteamGuardError } from '../utils/errors';
import { getTokenStatus, isTokenValid, type TokenStatus } from '../utils/jwt';
import { moduleLogger } from '../utils/logger';
import { generateConfirmationHash, unixNow, type ConfirmationTag } from '../utils/steamGuard';
import type { GenerateAccessTokenResponse } from '../utils/steamMessages';
import { refreshAccessToken } from './steamLoginService';
import { STEAM_COMMUNITY_BASE, SteamTransport, createSteamHttpClient } from './steamTransport';

const MOBILE_WEB_USER_AGENT =
  'Mozilla/5.0 (Linux; Android 9; Valve Steam App Version/3) AppleWebKit/537.36 (KHTML, like Gecko) Mobile Safari/537.36';

const CONFIRMATION_TYPE_NAMES: Record<number, ConfirmationTypeName> = {
  1: 'Generic',
  2: 'Trade',
  3: 'Market Listing',
  5: 'Account Recovery'
};

export type ConfirmationRef = Pick<Confirmation, 'id' | 'key'>;

export type SessionStatus = 'valid' | 'refresh_needed' | 'expired' | 'error';

export type SessionStatusReport = {
  status: SessionStatus;
  message: string;
  tokens: TokenStatus;
};

export type ConfirmationEngineOptions = {
  transport?: SteamTransport;
  http?: AxiosInstance;
  save?: SaveAccount;
  now?: () => number;
};

type JsonRecord = Record<string, unknown>;

type MobileConfBody = { kind: 'json'; value: JsonRecord } | { kind: 'html'; text: string };

/** `needauth` means Steam no longer accepts the access token. */
type MobileConfOutcome<T> = { needAuth: true } | { needAuth: false; value: T };

const log = moduleLogger('confirmations');

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readBody(data: unknown): MobileConfBody {
  if (isRecord(data)) {
    return { kind: 'json', value: data };
  }

  const text = Buffer.isBuffer(data) ? data.toString('utf8') : typeof data === 'string' ? data : '';
  const trimmed = text.trim();
  if (trimmed.startsWith('{')) {
    try {
      const parsed: unknown = JSON.parse(trimmed);
      if (isRecord(parsed)) {
        return { kind: 'json', value: parsed };
      }
    } catch (error) {
      log.debug({ err: errorMessage(error) }, 'mobileconf body is not JSON, using HTML parser');
    }
  }

  return { kind: 'html', text };
}

export function confirmationTypeName(typeId: number): ConfirmationTypeName {
  return CONFIRMATION_TYPE_NAMES[typeId] ?? 'Unknown';
}

const scalarText = z.union([z.string(), z.number()]).transform(String);

const confirmationItemSchema = z.object({
  id: scalarText,
  nonce: scalarText,
  type: z.coerce.number().int().catch(0),
  type_name: z.string().optional(),
  headline: z.string().optional(),
  summary: z.union([z.array(z.unknown()), scalarText]).optional(),
  creator_id: scalarText.optional(),
  creation_time: z.number().positive().optional().catch(undefined),
  icon: z.string().optional()
});

type ConfirmationItem = z.infer<typeof confirmationItemSchema>;

const mobileConfResponseSchema = z
  .object({
    success: z.boolean().optional(),
    needauth: z.boolean().optional(),
    message: z.string().optional(),
    conf: z.array(z.unknown()).optional()
  })
  .passthrough();

type MobileConfResponse = z.infer<typeof mobileConfResponseSchema>;

function parseMobileConfResponse(value: JsonRecord, endpoint: string): MobileConfResponse {
  const parsed = mobileConfResponseSchema.safeParse(value);
  if (!parsed.success) {
    throw new ProtocolError(`Unexpected response shape from ${endpoint}`);
  }
  return parsed.data;
}

function joinSummary(summary: ConfirmationItem['summary']): string {
  if (Array.isArray(summary)) {
    return summary
      .filter((part): part is string | number => typeof part === 'string' || typeof part === 'number')
      .map((part) => String(part).trim())
      .filter(Boolean)
      .join(' | ');
  }

  return summary ?? '';
}

/** Entries without an id or nonce cannot be acted on and are dropped. */
export function parseConfirmationsJson(body: unknown): Confirmation[] {
  const parsed = mobileConfResponseSchema.safeParse(body);
  const items = parsed.success ? parsed.data.conf ?? [] : [];

  return items.flatMap((raw) => {
    const result = confirmationItemSchema.safeParse(raw);
    if (!result.success) {
      log.debug({ issues: result.error.issues.length }, 'Skipping malformed confirmation entry');
      return [];
    }

    const item = result.data;
    const typeName = confirmationTypeName(item.type);
    return [
      {
        id: item.id,
        key: item.nonce,
        typeId: item.type,
        typeName,
        title: item.headline || item.type_name || typeName,
        description: joinSummary(item.summary),
        creatorId: item.creator_id ?? '',
        creationTime: item.creation_time,
        icon: item.icon || undefined
      }
    ];
  });
}

const HTML_ENTRY_PATTERNS = [
  /data-confid="(\d+)"[^>]*data-key="(\d+)"[^>]*data-type="(\d+)"[^>]*data-creator="(\d+)"/g,
  /data-confid='(\d+)'[^>]*data-key='(\d+)'[^>]*data-type='(\d+)'[^>]*data-creator='(\d+)'/g
];

/** Older mobileconf pages. Unknown markup yields an empty list. */
export function parseConfirmationsHtml(html: string): Confirmation[] {
  if (html.includes('conf_empty') || html.includes('There are no confirmations waiting')) {
    return [];
  }

  try {
    let matches: RegExpMatchArray[] = [];
    for (const pattern of HTML_ENTRY_PATTERNS) {
      matches = Array.from(html.matchAll(pattern));
      if (matches.length > 0) {
        break;
      }
    }

    return matches.map((match, index) => {
      const [, id, key, type, creator] = match;
      const typeId = Number(type);
      const typeName = confirmationTypeName(typeId);
      const block = html.slice(match.index ?? 0, matches[index + 1]?.index ?? html.length);
      const title = /alt="([^"]+)"/.exec(block)?.[1]?.trim() || typeName;
      const texts = Array.from(block.matchAll(/<div[^>]*>([^<]+)<\/div>/g))
        .map((text) => text[1].trim())
        .filter((text) => text.length > 3);

      return {
        id,
        key,
        typeId,
        typeName,
        title,
        description: texts.length > 0 ? texts[texts.length - 1] : '',
        creatorId: creator
      };
    });
  } catch (error) {
    log.debug({ err: errorMessage(error) }, 'Failed to parse mobileconf HTML');
    return [];
  }
}

function buildCookieHeader(steamid: string, session: AccountSession): string {
  const parts: string[] = [
    `steamid=${steamid}`,
    'mobileClient=android',
    'mobileClientVersion=777777 3.10.3',
    'Steam_Language=english',
    `steamLoginSecure=${encodeURIComponent(`${steamid}||${session.accessToken}`)}`
  ];

  if (session.sessionId) {
    parts.push(`sessionid=${session.sessionId}`);
  }

  return parts.join('; ');
}

function requireSteamId(account: Account): string {
  if (!account.steamid) {
    throw new ProtocolError(`Account ${account.accountName} has no steamid`);
  }
  return account.steamid;
}

export class ConfirmationEngine {
  private readonly transport: SteamTransport;
  private readonly http: AxiosInstance;
  private readonly save?: SaveAccount;
  private readonly now: () => number;

  constructor(options: ConfirmationEngineOptions = {}) {
    this.transport = options.transport ?? new SteamTransport();
    this.http = options.http ?? createSteamHttpClient({ headers: { 'User-Agent': MOBILE_WEB_USER_AGENT } });
    this.save = options.save;
    this.now = options.now ?? unixNow;
  }

  async listConfirmations(account: Account): Promise<Confirmation[]> {
    return this.withSession(account, () => this.fetchList(account));
  }

  async respond(account: Account, confirmation: ConfirmationRef, accept: boolean): Promise<boolean> {
    const op = accept ? 'allow' : 'cancel';

    return this.withSession(account, async () => {
      const response = await this.send(account, '/mobileconf/ajaxop', op, {
        op,
        cid: confirmation.id,
        ck: confirmation.key
      });
      return this.readSuccess(response, '/mobileconf/ajaxop');
    });
  }

  /** One all-or-nothing POST for the whole batch. */
  async respondMany(account: Account, confirmations: ConfirmationRef[], accept: boolean): Promise<boolean> {
    if (confirmations.length === 0) {
      return true;
    }

    const op = accept ? 'allow' : 'cancel';
    const extra: Record<string, string> = { op };
    confirmations.forEach((confirmation, index) => {
      extra[`cid[${index}]`] = confirmation.id;
      extra[`ck[${index}]`] = confirmation.key;
    });

    return this.withSession(account, async () => {
      const response = await this.send(account, '/mobileconf/multiajaxop', op, extra, 'POST');
      return this.readSuccess(response, '/mobileconf/multiajaxop');
    });
  }

  /**
   * Exchanges the refresh token for a new access token, writes it into
   * `account.session` and persists the account.
   */
  async refreshSession(account: Account): Promise<AccountSession> {
    const steamid = requireSteamId(account);
    const session = account.session;
    if (!session?.refreshToken || !isTokenValid(session.refreshToken, this.now())) {
      throw new SessionExpiredError();
    }

    let refreshed: GenerateAccessTokenResponse;
    try {
      refreshed = await refreshAccessToken(this.transport, session.refreshToken, steamid);
    } catch (error) {
      if (error instanceof ProtocolError) {
        throw new SessionExpiredError(`Steam refused the refresh token: ${error.message}`);
      }
      throw error;
    }

    const next: AccountSession = {
      ...session,
      accessToken: refreshed.accessToken,
      refreshToken: refreshed.refreshToken ?? session.refreshToken,
      tokenTimestamp: this.now()
    };
    account.session = next;
    log.info({ accountName: account.accountName, steamid }, 'Steam access token refreshed');

    if (this.save) {
      await this.save(account);
    }

    return next;
  }

  async checkSessionStatus(account: Account): Promise<SessionStatusReport> {
    const tokens = getTokenStatus(account.session, this.now());

    if (!account.steamid) {
      return { status: 'error', message: 'Account has no steamid', tokens };
    }
    if (!tokens.accessTokenValid && !tokens.refreshTokenValid) {
      return { status: 'expired', message: 'Both tokens are expired or missing', tokens };
    }
    if (!tokens.accessTokenValid) {
      return { status: 'refresh_needed', message: 'Access token expired but refresh token is valid', tokens };
    }

    try {
      const outcome = await this.fetchList(account);
      return outcome.needAuth
        ? { status: 'expired', message: 'Steam rejected the tokens, log in again', tokens }
        : { status: 'valid', message: 'Session works for confirmations', tokens };
    } catch (error) {
      if (error instanceof ProtocolError) {
        return { status: 'expired', message: error.message, tokens };
      }
      if (isSteamGuardError(error)) {
        return { status: 'error', message: error.message, tokens };
      }
      throw error;
    }
  }

  /**
   * Proactive refresh when only the access token has expired, then one
   * refresh-and-retry when Steam still answers with `needauth`.
   */
  private async withSession<T>(account: Account, operation: () => Promise<MobileConfOutcome<T>>): Promise<T> {
    requireSteamId(account);
    if (!account.session) {
      throw new SessionExpiredError();
    }

    const tokens = getTokenStatus(account.session, this.now());
    if (!tokens.accessTokenValid && tokens.refreshTokenValid) {
      await this.refreshSession(account);
    }

    const first = await operation();
    if (!first.needAuth) {
      return first.value;
    }

    log.info({ accountName: account.accountName }, 'Steam asked for re-authentication, refreshing once');
    await this.refreshSession(account);

    const second = await operation();
    if (!second.needAuth) {
      return second.value;
    }

    throw new SessionExpiredError('Steam rejected the refreshed session. Log in again.');
  }

  private async fetchList(account: Account): Promise<MobileConfOutcome<Confirmation[]>> {
    const response = await this.send(account, '/mobileconf/getlist', 'conf');
    if (response.status === 401) {
      return { needAuth: true };
    }

    const body = readBody(response.data);
    if (body.kind === 'html') {
      return { needAuth: false, value: parseConfirmationsHtml(body.text) };
    }

    const list = parseMobileConfResponse(body.value, '/mobileconf/getlist');
    if (list.needauth === true) {
      return { needAuth: true };
    }
    if (list.success === false) {
      throw new ProtocolError(list.message || 'Steam confirmations request failed');
    }

    return { needAuth: false, value: parseConfirmationsJson(list) };
  }

  private readSuccess(response: AxiosResponse<unknown>, endpoint: string): MobileConfOutcome<boolean> {
    if (response.status === 401) {
      return { needAuth: true };
    }

    const body = readBody(response.data);
    if (body.kind === 'html') {
      throw new ProtocolError(`Unexpected non-JSON response from ${endpoint}`);
    }
    const result = parseMobileConfResponse(body.value, endpoint);
    if (result.needauth === true) {
      return { needAuth: true };
    }

    return { needAuth: false, value: result.success === true };
  }

  private async send(
    account: Account,
    endpoint: string,
    tag: ConfirmationTag,
    extra: Record<string, string> = {},
    method: 'GET' | 'POST' = 'GET'
  ): Promise<AxiosResponse<unknown>> {
    const steamid = requireSteamId(account);
    const session = account.session;
    if (!session) {
      throw new SessionExpiredError();
    }

    const timestamp = this.now();
    const params: Record<string, string> = {
      p: account.deviceId,
      a: steamid,
      k: generateConfirmationHash(timestamp, tag, account.identitySecret),
      t: String(timestamp),
      m: 'react',
      tag,
      ...extra
    };
    const url = `${STEAM_COMMUNITY_BASE}${endpoint}`;
    const headers = { Cookie: buildCookieHeader(steamid, session) };

    let response: AxiosResponse<unknown>;
    try {
      response =
        method === 'GET'
          ? await this.http.get(url, { params, headers, responseType: 'text' })
          : await this.http.post(url, new URLSearchParams(params), { headers, responseType: 'text' });
    } catch (error) {
      throw new TransportError(`Steam request ${endpoint} failed: ${errorMessage(error)}`, undefined, {
        cause: error
      });
    }

    if (response.status !== 200 && response.status !== 401) {
      log.warn({ endpoint, status: response.status }, 'mobileconf returned non-200 status');
      throw new TransportError(`Steam request ${endpoint} failed with HTTP ${response.status}`, response.status);
    }

    return response;
  }
}
