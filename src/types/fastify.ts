import 'fastify';
import type { AccountStore } from '../services/accountStore';
import type { ConfirmationEngine } from '../services/steamService';
import type { EnrollmentSession, PendingEnrollments } from '../services/steamEnrollmentService';
import type { LoginSession } from '../services/steamLoginService';
import type { SteamProfileService } from '../services/steamProfileService';
import type { SteamTransport } from '../services/steamTransport';
import type { WsHub } from '../services/wsHub';

export type AppServices = {
  store: AccountStore;
  transport: SteamTransport;
  confirmations: ConfirmationEngine;
  profiles: SteamProfileService;
  enrollments: PendingEnrollments;
  hub: WsHub;
  createLoginSession: () => LoginSession;
  createEnrollmentSession: () => EnrollmentSession;
};

declare module 'fastify' {
  interface FastifyInstance {
    services: AppServices;
  }
}
