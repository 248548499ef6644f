import axios, { type AxiosInstance, type AxiosResponse, type CreateAxiosDefaults } from 'axios';
import { env } from '../config/env';
import { ProtocolError, TransportError, errorMessage } from '../utils/errors';
import { moduleLogger } from '../utils/logger';
import { ProtoReader } from '../utils/protobuf';

export const STEAM_API_BASE = 'https://api.steampowered.com';
export const STEAM_COMMUNITY_BASE = 'https://steamcommunity.com';

const MOBILE_USER_AGENT = 'okhttp/4.9.2';

export type SteamServiceName = 'IAuthenticationService' | 'ITwoFactorService';

export type SteamApiCall = {
  service: SteamServiceName;
  method: string;
  version?: number;
  payload: Buffer;
  accessToken?: string;
  httpMethod?: 'GET' | 'POST';
};

const log = moduleLogger('transport');

/** Status checks are done by the callers, so every response resolves. */
export function createSteamHttpClient(overrides: CreateAxiosDefaults = {}): AxiosInstance {
  return axios.create({
    timeout: env.STEAM_HTTP_TIMEOUT_MS,
    headers: {
      'User-Agent': MOBILE_USER_AGENT
    },
    validateStatus: () => true,
    ...overrides
  });
}

export function headerValue(headers: AxiosResponse['headers'], name: string): string | undefined {
  const raw: unknown = headers[name];
  if (Array.isArray(raw)) {
    return raw.length > 0 ? String(raw[0]) : undefined;
  }
  return raw === undefined || raw === null ? undefined : String(raw);
}

function toBuffer(data: unknown): Buffer {
  if (Buffer.isBuffer(data)) {
    return data;
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data);
  }
  if (ArrayBuffer.isView(data)) {
    return Buffer.from(data.buffer, data.byteOffset, data.byteLength);
  }
  if (typeof data === 'string') {
    return Buffer.from(data, 'binary');
  }
  return Buffer.alloc(0);
}

function urlSafeBase64(payload: Buffer): string {
  return payload.toString('base64').replace(/\+/g, '-').replace(/\//g, '_');
}

export class SteamTransport {
  constructor(private readonly http: AxiosInstance = createSteamHttpClient()) {}

  async call(request: SteamApiCall): Promise<ProtoReader> {
    const httpMethod = request.httpMethod ?? 'POST';
    const endpoint = `${request.service}/${request.method}/v${request.version ?? 1}`;
    const url = `${STEAM_API_BASE}/${endpoint}`;

    let response: AxiosResponse<unknown>;
    try {
      if (httpMethod === 'GET') {
        const params: Record<string, string> = {
          input_protobuf_encoded: urlSafeBase64(request.payload)
        };
        if (request.accessToken) {
          params.access_token = request.accessToken;
        }
        response = await this.http.get(url, { params, responseType: 'arraybuffer' });
      } else {
        const form = new URLSearchParams({
          input_protobuf_encoded: request.payload.toString('base64')
        });
        if (request.accessToken) {
          form.set('access_token', request.accessToken);
        }
        response = await this.http.post(url, form, { responseType: 'arraybuffer' });
      }
    } catch (error) {
      throw new TransportError(`Steam request ${endpoint} failed: ${errorMessage(error)}`, undefined, {
        cause: error
      });
    }

    if (response.status !== 200) {
      log.warn({ endpoint, status: response.status }, 'Steam API returned non-200 status');
      throw new TransportError(`Steam request ${endpoint} failed with HTTP ${response.status}`, response.status);
    }

    const eresult = headerValue(response.headers, 'x-eresult');
    if (eresult && eresult !== '1') {
      const steamMessage = headerValue(response.headers, 'x-error_message');
      log.warn({ endpoint, eresult }, 'Steam API reported failure eresult');
      throw new ProtocolError(
        `Steam ${endpoint} failed with eresult ${eresult}${steamMessage ? `: ${steamMessage}` : ''}`,
        Number(eresult)
      );
    }

    return new ProtoReader(toBuffer(response.data));
  }
}
