/**
 * src/modules/pages/pages.module.ts
 *
 * WHY:
 * - Owns the public landing page and the role-gated pages.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 */

import type { FastifyInstance } from 'fastify';
import type { DbExecutor } from '../../shared/db/db';
import type { SessionStore } from '../../shared/session/session.store';

import { PagesController } from './pages.controller';
import { registerPagesRoutes } from './pages.routes';

export type PagesModule = ReturnType<typeof createPagesModule>;

export function createPagesModule(deps: {
  db: DbExecutor;
  sessionStore: SessionStore;
  isProduction: boolean;
}) {
  const controller = new PagesController(deps);

  return {
    registerRoutes(app: FastifyInstance) {
      registerPagesRoutes(app, controller);
    },
  };
}
