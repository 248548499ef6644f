import crypto from 'crypto';
import jwt from 'jsonwebtoken';
import { AxiosHeaders, type AxiosAdapter, type AxiosInstance, type InternalAxiosRequestConfig } from 'axios';
import { SteamTransport, createSteamHttpClient } from '../../src/services/steamTransport';
import { ProtoReader, ProtoWriter } from '../../src/utils/protobuf';

export type RecordedRequest = {
  method: string;
  url: string;
  params: Record<string, string>;
  body: string;
  headers: Record<string, string>;
};

export type FakeResponse = {
  status?: number;
  headers?: Record<string, string>;
  data?: unknown;
};

type Route = {
  path: string;
  responses: FakeResponse[];
};

function stringRecord(value: unknown): Record<string, string> {
  const record: Record<string, string> = {};
  if (typeof value === 'object' && value !== null) {
    for (const [key, entry] of Object.entries(value)) {
      if (entry !== undefined && entry !== null) {
        record[key] = String(entry);
      }
    }
  }
  return record;
}

function segments(value: string): string[] {
  return value.split('/').filter((segment) => segment.length > 0);
}

/** Whole trailing path segments, so `AddAuthenticator/v1` never answers `FinalizeAddAuthenticator/v1`. */
export function matchesPath(url: string, path: string): boolean {
  const wanted = segments(path);
  const tail = segments(new URL(url).pathname).slice(-wanted.length);
  return wanted.length > 0 && tail.join('/') === wanted.join('/');
}

function headerRecord(config: InternalAxiosRequestConfig): Record<string, string> {
  return stringRecord(AxiosHeaders.from(config.headers).toJSON());
}

/**
 * In-process stand-in for Steam behind an axios adapter. Responses are queued
 * per path; the last one repeats once the queue is down to it.
 */
export class FakeSteam {
  readonly requests: RecordedRequest[] = [];
  private readonly routes: Route[] = [];

  on(path: string, ...responses: FakeResponse[]): this {
    this.routes.push({ path, responses });
    return this;
  }

  readonly adapter: AxiosAdapter = async (config) => {
    const url = config.url ?? '';
    const method = (config.method ?? 'get').toUpperCase();
    const request: RecordedRequest = {
      method,
      url,
      params: stringRecord(config.params),
      body: typeof config.data === 'string' ? config.data : '',
      headers: headerRecord(config)
    };
    this.requests.push(request);

    const route = this.routes.find((candidate) => matchesPath(url, candidate.path));
    const scripted = route ? (route.responses.length > 1 ? route.responses.shift() : route.responses[0]) : undefined;
    const response = scripted ?? { status: 404, data: '' };

    return {
      data: response.data ?? Buffer.alloc(0),
      status: response.status ?? 200,
      statusText: 'OK',
      headers: new AxiosHeaders(response.headers ?? {}),
      config,
      request: {}
    };
  };

  client(): AxiosInstance {
    return createSteamHttpClient({ adapter: this.adapter });
  }

  transport(): SteamTransport {
    return new SteamTransport(this.client());
  }

  calls(path: string): RecordedRequest[] {
    return this.requests.filter((request) => matchesPath(request.url, path));
  }
}

/** Protobuf payload a POST transport call carried. */
export function postedPayload(request: RecordedRequest): ProtoReader {
  const encoded = new URLSearchParams(request.body).get('input_protobuf_encoded') ?? '';
  return new ProtoReader(Buffer.from(encoded, 'base64'));
}

export function proto(build: (writer: ProtoWriter) => ProtoWriter): FakeResponse {
  return { data: build(new ProtoWriter()).finish() };
}

export const TEST_STEAMID = '76561197960287930';

export function steamToken(expiresInSec: number, steamid = TEST_STEAMID): string {
  return jwt.sign({ sub: steamid, exp: Math.floor(Date.now() / 1000) + expiresInSec }, 'test-secret');
}

/** Builds a Fernet token the way the legacy vault wrote them. */
export function fernetToken(plaintext: string, key: string, iv: Buffer = crypto.randomBytes(16)): string {
  const keyBytes = Buffer.from(key, 'base64url');
  const timestamp = Buffer.alloc(8);
  timestamp.writeBigUInt64BE(BigInt(Math.floor(Date.now() / 1000)));

  const cipher = crypto.createCipheriv('aes-128-cbc', keyBytes.subarray(16), iv);
  const ciphertext = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()]);

  const signed = Buffer.concat([Buffer.from([0x80]), timestamp, iv, ciphertext]);
  const hmac = crypto.createHmac('sha256', keyBytes.subarray(0, 16)).update(signed).digest();
  return Buffer.concat([signed, hmac]).toString('base64url');
}

const { publicKey } = crypto.generateKeyPairSync('rsa', { modulusLength: 1024 });
const jwk = publicKey.export({ format: 'jwk' });

/** RSA key, auth session and an immediately approved poll for `allowedGuard`. */
export function steamLoginRoutes(steam: FakeSteam, allowedGuard: number): FakeSteam {
  return steam
    .on(
      'GetPasswordRSAPublicKey/v1',
      proto((w) =>
        w
          .string(1, Buffer.from(jwk.n ?? '', 'base64url').toString('hex'))
          .string(2, Buffer.from(jwk.e ?? '', 'base64url').toString('hex'))
          .uint64(3, 1)
      )
    )
    .on(
      'BeginAuthSessionViaCredentials/v1',
      proto((w) =>
        w
          .uint64(1, 111)
          .bytes(2, Buffer.from('test-request-id'))
          .bytes(4, new ProtoWriter().enum(1, allowedGuard).finish())
          .fixed64(5, TEST_STEAMID)
      )
    )
    .on('UpdateAuthSessionWithSteamGuardCode/v1', proto((w) => w))
    .on('PollAuthSessionStatus/v1', proto((w) => w.string(3, 'test-refresh').string(4, 'test-access')));
}

/** AddAuthenticator, one finalize round and an active QueryStatus. */
export function steamEnrollmentRoutes(steam: FakeSteam, sharedSecret: Buffer, identitySecret: Buffer): FakeSteam {
  return steam
    .on(
      'AddAuthenticator/v1',
      proto((w) =>
        w
          .bytes(1, sharedSecret)
          .uint64(2, 98765)
          .string(3, 'R12345')
          .uint64(5, 1700000000)
          .bytes(8, identitySecret)
          .varint(10, 1)
          .varint(12, 1)
      )
    )
    .on('FinalizeAddAuthenticator/v1', proto((w) => w.bool(1, true).varint(4, 1)))
    .on('QueryStatus/v1', proto((w) => w.varint(1, 1)));
}
