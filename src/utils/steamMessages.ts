import { ProtocolError } from './errors';
import { ProtoReader, ProtoWriter, type Uint64Input } from './protobuf';

// Field numbers follow Steam's steammessages_auth / steammessages_twofactor definitions.

export const EAuthTokenPlatformType = { SteamClient: 1, WebBrowser: 2, MobileApp: 3 } as const;
export const ESessionPersistence = { Ephemeral: 0, Persistent: 1 } as const;
export const EAuthSessionGuardType = {
  Unknown: 0,
  None: 1,
  EmailCode: 2,
  DeviceCode: 3,
  DeviceConfirmation: 4,
  EmailConfirmation: 5,
  MachineToken: 6
} as const;
export const ETokenRenewalType = { None: 0, Allow: 1 } as const;

export type GuardCodeType = typeof EAuthSessionGuardType.EmailCode | typeof EAuthSessionGuardType.DeviceCode;

function requireField<T>(value: T | undefined, message: string): T {
  if (value === undefined || value === '') {
    throw new ProtocolError(message);
  }
  return value;
}

/* IAuthenticationService */

export function buildGetRsaKeyRequest(accountName: string): Buffer {
  return new ProtoWriter().string(1, accountName).finish();
}

export type RsaKeyResponse = {
  publicKeyMod: string;
  publicKeyExp: string;
  timestamp: bigint;
};

export function parseRsaKeyResponse(reader: ProtoReader): RsaKeyResponse {
  return {
    publicKeyMod: requireField(reader.getString(1), 'RSA key response is missing the modulus'),
    publicKeyExp: requireField(reader.getString(2), 'RSA key response is missing the exponent'),
    timestamp: requireField(reader.getUint64(3), 'RSA key response is missing the timestamp')
  };
}

export type BeginAuthRequest = {
  deviceFriendlyName: string;
  accountName: string;
  encryptedPassword: string;
  encryptionTimestamp: Uint64Input;
};

export function buildBeginAuthRequest(request: BeginAuthRequest): Buffer {
  return new ProtoWriter()
    .string(1, request.deviceFriendlyName)
    .string(2, request.accountName)
    .string(3, request.encryptedPassword)
    .uint64(4, request.encryptionTimestamp)
    .bool(5, true)
    .enum(6, EAuthTokenPlatformType.MobileApp)
    .enum(7, ESessionPersistence.Persistent)
    .string(8, 'Mobile')
    .uint64(11, 0)
    .enum(12, 2)
    .finish();
}

export type BeginAuthResponse = {
  clientId: bigint;
  requestId: Buffer;
  interval?: number;
  allowedConfirmations: number[];
  steamid?: bigint;
  weakToken?: string;
  extendedErrorMessage?: string;
};

export function parseBeginAuthResponse(reader: ProtoReader): BeginAuthResponse {
  return {
    clientId: requireField(reader.getUint64(1), 'Auth session response is missing client_id'),
    requestId: requireField(reader.getBytes(2), 'Auth session response is missing request_id'),
    interval: reader.getFloat(3),
    allowedConfirmations: reader
      .getMessages(4)
      .map((entry) => entry.getNumber(1) ?? EAuthSessionGuardType.Unknown),
    steamid: reader.getUint64(5),
    weakToken: reader.getString(6),
    extendedErrorMessage: reader.getString(8)
  };
}

export function buildUpdateGuardCodeRequest(
  clientId: Uint64Input,
  steamid: Uint64Input,
  code: string,
  codeType: GuardCodeType
): Buffer {
  return new ProtoWriter()
    .uint64(1, clientId)
    .fixed64(2, steamid)
    .string(3, code)
    .enum(4, codeType)
    .finish();
}

export function buildPollRequest(clientId: Uint64Input, requestId: Buffer): Buffer {
  return new ProtoWriter().uint64(1, clientId).bytes(2, requestId).finish();
}

export type PollResponse = {
  newClientId?: bigint;
  refreshToken?: string;
  accessToken?: string;
  hadRemoteInteraction: boolean;
  accountName?: string;
  newGuardData?: string;
};

export function parsePollResponse(reader: ProtoReader): PollResponse {
  return {
    newClientId: reader.getUint64(1),
    refreshToken: reader.getString(3),
    accessToken: reader.getString(4),
    hadRemoteInteraction: reader.getBool(5),
    accountName: reader.getString(6),
    newGuardData: reader.getString(7)
  };
}

export function buildGenerateAccessTokenRequest(
  refreshToken: string,
  steamid: Uint64Input,
  allowRenewal = false
): Buffer {
  const writer = new ProtoWriter().string(1, refreshToken).fixed64(2, steamid);
  if (allowRenewal) {
    writer.enum(3, ETokenRenewalType.Allow);
  }
  return writer.finish();
}

export type GenerateAccessTokenResponse = {
  accessToken: string;
  refreshToken?: string;
};

export function parseGenerateAccessTokenResponse(reader: ProtoReader): GenerateAccessTokenResponse {
  return {
    accessToken: requireField(reader.getString(1), 'Token refresh response is missing access_token'),
    refreshToken: reader.getString(2) || undefined
  };
}

/* ITwoFactorService */

export function buildAddAuthenticatorRequest(steamid: Uint64Input, deviceIdentifier: string): Buffer {
  return new ProtoWriter()
    .fixed64(1, steamid)
    .varint(4, 1)
    .string(5, deviceIdentifier)
    .string(6, '1')
    .varint(8, 2)
    .finish();
}

export type AddAuthenticatorResponse = {
  status: number;
  sharedSecret?: Buffer;
  identitySecret?: Buffer;
  serialNumber?: string;
  revocationCode?: string;
  uri?: string;
  serverTime?: number;
  accountName?: string;
  tokenGid?: string;
  phoneNumberHint?: string;
  confirmType: number;
};

export function parseAddAuthenticatorResponse(reader: ProtoReader): AddAuthenticatorResponse {
  const serialNumber = reader.getUint64(2);
  return {
    status: reader.getInt32(10) ?? 1,
    sharedSecret: reader.getBytes(1),
    identitySecret: reader.getBytes(8),
    serialNumber: serialNumber === undefined ? undefined : serialNumber.toString(),
    revocationCode: reader.getString(3),
    uri: reader.getString(4),
    serverTime: reader.getNumber(5),
    accountName: reader.getString(6),
    tokenGid: reader.getString(7),
    phoneNumberHint: reader.getString(11),
    confirmType: reader.getInt32(12) ?? 1
  };
}

export type FinalizeRequest = {
  steamid: Uint64Input;
  authenticatorCode: string;
  authenticatorTime: number;
  activationCode: string;
};

export function buildFinalizeRequest(request: FinalizeRequest): Buffer {
  return new ProtoWriter()
    .fixed64(1, request.steamid)
    .string(2, request.authenticatorCode)
    .uint64(3, request.authenticatorTime)
    .string(4, request.activationCode)
    .bool(6, true)
    .finish();
}

export type FinalizeResponse = {
  success: boolean;
  serverTime?: number;
  wantMore: boolean;
  status: number;
};

export function parseFinalizeResponse(reader: ProtoReader): FinalizeResponse {
  return {
    success: reader.getBool(1),
    serverTime: reader.getNumber(2),
    wantMore: reader.getBool(3),
    status: reader.getInt32(4) ?? 1
  };
}

export function buildQueryStatusRequest(steamid: Uint64Input): Buffer {
  return new ProtoWriter().fixed64(1, steamid).finish();
}

export type QueryStatusResponse = {
  state: number;
  authenticatorType?: number;
};

export function parseQueryStatusResponse(reader: ProtoReader): QueryStatusResponse {
  return {
    state: reader.getInt32(1) ?? 0,
    authenticatorType: reader.getNumber(3)
  };
}
