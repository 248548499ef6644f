export type AccountSession = {
  accessToken: string;
  refreshToken: string;
  /** Unix time (seconds) the tokens were last set. */
  tokenTimestamp: number;
  sessionId?: string;
};

/** Informational only; never consulted by protocol code. */
export type AccountProfile = {
  displayName?: string;
  avatarUrl?: string;
  profileUrl?: string;
  vacBanned?: boolean;
  vacBanCount?: number;
  communityBanned?: boolean;
  economyBan?: string;
  gameCount?: number;
  updatedAt?: number;
};

export type Account = {
  accountName: string;
  /** 64-bit SteamID in decimal form. */
  steamid?: string;
  /** base64 */
  sharedSecret: string;
  /** base64 */
  identitySecret: string;
  deviceId: string;
  session?: AccountSession;
  revocationCode?: string;
  serialNumber?: string;
  uri?: string;
  tokenGid?: string;
  profile?: AccountProfile;
};

export type ConfirmationTypeName = 'Generic' | 'Trade' | 'Market Listing' | 'Account Recovery' | 'Unknown';

export type Confirmation = {
  id: string;
  /** Nonce Steam requires to act on the confirmation. */
  key: string;
  typeId: number;
  typeName: ConfirmationTypeName;
  title: string;
  description: string;
  creatorId: string;
  creationTime?: number;
  icon?: string;
};

export type SaveAccount = (account: Account) => Promise<void>;

export type PromptContext =
  | { kind: 'guard_code'; accountName: string; guardType: 'email' | 'device' }
  | { kind: 'activation_code'; accountName: string; confirmType: number; phoneNumberHint?: string };

/** Resolves to the code the user typed, or null when they cancelled. */
export type PromptForCode = (context: PromptContext) => Promise<string | null>;
