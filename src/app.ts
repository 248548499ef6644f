import Fastify from 'fastify';
import { ZodError } from 'zod';
import securityPlugin from './plugins/security';
import healthRoute from './routes/health';
import vaultRoutes from './routes/vault';
import accountRoutes from './routes/accounts';
import interopRoutes from './routes/interop';
import steamRoutes from './routes/steam';
import { TooManyRequestsError } from './middleware/rateLimiters';
import { AccountStore } from './services/accountStore';
import { ConfirmationEngine } from './services/steamService';
import { EnrollmentSession, PendingEnrollments } from './services/steamEnrollmentService';
import { LoginSession } from './services/steamLoginService';
import { SteamProfileService } from './services/steamProfileService';
import { SteamTransport } from './services/steamTransport';
import { WsHub } from './services/wsHub';
import type { AppServices } from './types/fastify';
import { isRetryable, isSteamGuardError, type SteamGuardErrorKind } from './utils/errors';
import { LOG_LEVEL, LOG_REDACT, LOG_TRANSPORT } from './utils/logger';

export type BuildAppOptions = Partial<AppServices> & {
  logger?: boolean;
};

const STATUS_BY_KIND: Record<SteamGuardErrorKind, number> = {
  transport: 502,
  protocol: 502,
  already_enrolled: 409,
  needs_phone: 422,
  needs_email_confirmation: 422,
  bad_verification_code: 422,
  enrollment_incomplete: 422,
  login_timeout: 504,
  session_expired: 401,
  crypto: 401,
  passkey_required: 401,
  account_not_found: 404
};

function statusCodeOf(error: unknown): number | undefined {
  if (error instanceof Error && 'statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode;
  }
  return undefined;
}

export type ErrorBody = {
  kind: string;
  message: string;
  retryable?: boolean;
};

export function errorResponse(error: unknown): { status: number; body: ErrorBody } {
  if (isSteamGuardError(error)) {
    return {
      status: STATUS_BY_KIND[error.kind],
      body: { kind: error.kind, message: error.message, retryable: isRetryable(error) }
    };
  }
  if (error instanceof ZodError) {
    const issue = error.issues[0];
    const message = issue ? `${issue.path.join('.') || 'body'}: ${issue.message}` : 'Invalid request';
    return { status: 400, body: { kind: 'validation', message } };
  }
  if (error instanceof TooManyRequestsError) {
    return { status: 429, body: { kind: 'rate_limited', message: error.message } };
  }
  const statusCode = statusCodeOf(error);
  if (statusCode !== undefined && statusCode < 500 && error instanceof Error) {
    return { status: statusCode, body: { kind: 'request', message: error.message } };
  }
  return { status: 500, body: { kind: 'internal', message: 'Internal server error' } };
}

export function createServices(overrides: Partial<AppServices> = {}): AppServices {
  const store = overrides.store ?? new AccountStore();
  const transport = overrides.transport ?? new SteamTransport();

  return {
    store,
    transport,
    confirmations: overrides.confirmations ?? new ConfirmationEngine({ transport, save: store.save }),
    profiles: overrides.profiles ?? new SteamProfileService(),
    enrollments: overrides.enrollments ?? new PendingEnrollments(),
    hub: overrides.hub ?? new WsHub(),
    createLoginSession: overrides.createLoginSession ?? (() => new LoginSession({ transport })),
    createEnrollmentSession:
      overrides.createEnrollmentSession ?? (() => new EnrollmentSession({ transport, save: store.save }))
  };
}

export async function buildApp(options: BuildAppOptions = {}) {
  const { logger = true, ...overrides } = options;

  const app = Fastify({
    logger: logger
      ? {
          level: LOG_LEVEL,
          redact: LOG_REDACT,
          transport: LOG_TRANSPORT
        }
      : false
  });

  app.decorate('services', createServices(overrides));

  app.setErrorHandler((error, request, reply) => {
    const { status, body } = errorResponse(error);
    if (status >= 500) {
      request.log.error({ err: error }, 'Request failed');
    } else {
      request.log.info({ kind: body.kind, status }, body.message);
    }

    if (reply.sent) {
      return;
    }

    reply.code(status).send(body);
  });

  await app.register(securityPlugin);

  app.get('/ws', { websocket: true }, (socket) => {
    app.services.hub.add(socket);
    socket.send(
      JSON.stringify({ event: 'connected', payload: { unlocked: app.services.store.isUnlocked }, ts: Date.now() })
    );

    socket.on('message', (raw) => {
      if (raw.toString() === 'ping') {
        socket.send(JSON.stringify({ event: 'pong', ts: Date.now() }));
      }
    });
  });

  await app.register(healthRoute);
  await app.register(vaultRoutes);
  await app.register(accountRoutes);
  await app.register(interopRoutes);
  await app.register(steamRoutes);

  return app;
}
