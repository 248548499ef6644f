import { RateLimiterMemory, RateLimiterRes } from 'rate-limiter-flexible';

const loginLimiter = new RateLimiterMemory({
  keyPrefix: 'steam_login_ip',
  points: 10,
  duration: 60,
  blockDuration: 300
});

const unlockLimiter = new RateLimiterMemory({
  keyPrefix: 'vault_unlock_ip',
  points: 5,
  duration: 60,
  blockDuration: 300
});

export class TooManyRequestsError extends Error {
  readonly statusCode = 429;

  constructor(readonly retryAfterSec: number) {
    super('Too many requests. Please try again later.');
    this.name = 'TooManyRequestsError';
  }
}

async function consumeOrThrow(limiter: RateLimiterMemory, key: string): Promise<void> {
  try {
    await limiter.consume(key);
  } catch (rejection) {
    if (rejection instanceof RateLimiterRes) {
      throw new TooManyRequestsError(Math.ceil(rejection.msBeforeNext / 1000));
    }
    throw rejection;
  }
}

export async function guardLoginByIp(ip: string): Promise<void> {
  await consumeOrThrow(loginLimiter, ip);
}

export async function guardUnlockByIp(ip: string): Promise<void> {
  await consumeOrThrow(unlockLimiter, ip);
}
