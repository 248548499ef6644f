export type SteamGuardErrorKind =
  | 'transport'
  | 'protocol'
  | 'already_enrolled'
  | 'needs_phone'
  | 'needs_email_confirmation'
  | 'bad_verification_code'
  | 'login_timeout'
  | 'session_expired'
  | 'enrollment_incomplete'
  | 'crypto'
  | 'passkey_required'
  | 'account_not_found';

export class SteamGuardError extends Error {
  readonly kind: SteamGuardErrorKind;

  constructor(kind: SteamGuardErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.kind = kind;
    this.name = new.target.name;
  }
}

/** Non-200 HTTP status or a request that never got a response. */
export class TransportError extends SteamGuardError {
  readonly status?: number;

  constructor(message: string, status?: number, options?: { cause?: unknown }) {
    super('transport', message, options);
    this.status = status;
  }
}

/** Steam answered, but with a non-OK eresult or a payload missing mandatory fields. */
export class ProtocolError extends SteamGuardError {
  readonly eresult?: number;

  constructor(message: string, eresult?: number) {
    super('protocol', message);
    this.eresult = eresult;
  }
}

export class AlreadyEnrolledError extends SteamGuardError {
  constructor(message = 'Account already has a mobile authenticator. Use import instead.') {
    super('already_enrolled', message);
  }
}

export class NeedsPhoneError extends SteamGuardError {
  constructor(message = 'Account needs a phone number before an authenticator can be added.') {
    super('needs_phone', message);
  }
}

export class NeedsEmailConfirmationError extends SteamGuardError {
  constructor(message = 'Confirm the e-mail Steam sent you, then try again.') {
    super('needs_email_confirmation', message);
  }
}

export class BadVerificationCodeError extends SteamGuardError {
  constructor(message = 'The SMS/e-mail verification code is invalid. Re-enter the code.') {
    super('bad_verification_code', message);
  }
}

export class LoginTimeoutError extends SteamGuardError {
  constructor(message = 'Steam did not approve the login in time.') {
    super('login_timeout', message);
  }
}

export class SessionExpiredError extends SteamGuardError {
  constructor(message = 'Steam session expired. Log in again.') {
    super('session_expired', message);
  }
}

export class EnrollmentIncompleteError extends SteamGuardError {
  constructor(message = 'Steam accepted the code but the authenticator is not active yet.') {
    super('enrollment_incomplete', message);
  }
}

/** Wrong passkey: failed PKCS#7 unpadding, AEAD tag mismatch or Fernet HMAC mismatch. */
export class CryptoError extends SteamGuardError {
  constructor(message = 'Decryption failed. The passkey is probably wrong.', options?: { cause?: unknown }) {
    super('crypto', message, options);
  }
}

export class PasskeyRequiredError extends SteamGuardError {
  constructor(message = 'Data is encrypted and no passkey was provided.') {
    super('passkey_required', message);
  }
}

export class AccountNotFoundError extends SteamGuardError {
  constructor(accountName: string) {
    super('account_not_found', `Account not found: ${accountName}`);
  }
}

export function isSteamGuardError(error: unknown): error is SteamGuardError {
  return error instanceof SteamGuardError;
}

export function isRetryable(error: unknown): boolean {
  return (
    error instanceof TransportError ||
    error instanceof LoginTimeoutError ||
    error instanceof BadVerificationCodeError
  );
}

// Errors thrown by Node's own modules may belong to another realm; check their shape.

export function errorMessage(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}

export function isMissingFile(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
