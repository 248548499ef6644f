import pino, { type Logger } from 'pino';
import { env, type Env } from '../config/env';

export type { Logger };

export const LOG_LEVEL = env.NODE_ENV === 'test' ? 'silent' : env.LOG_LEVEL;

// Secrets never reach the log output.
export const LOG_REDACT = {
  paths: [
    'password',
    '*.password',
    'passkey',
    '*.passkey',
    '*.accessToken',
    '*.refreshToken',
    '*.sharedSecret',
    '*.identitySecret',
    'req.headers.cookie'
  ],
  censor: '[redacted]'
};

/** pino-pretty is a dev dependency, so only an explicit development run asks for it. */
export function logTransport(nodeEnv: Env['NODE_ENV']) {
  return nodeEnv === 'development'
    ? {
        target: 'pino-pretty',
        options: { colorize: true }
      }
    : undefined;
}

export const LOG_TRANSPORT = logTransport(env.NODE_ENV);

export const logger: Logger = pino({
  level: LOG_LEVEL,
  redact: LOG_REDACT,
  transport: LOG_TRANSPORT
});

export function moduleLogger(name: string): Logger {
  return logger.child({ module: name });
}
