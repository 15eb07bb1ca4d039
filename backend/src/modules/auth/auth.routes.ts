/**
 * src/modules/auth/auth.routes.ts
 *
 * WHY:
 * - Declares Auth module endpoints.
 * - Keeps routing separate from controller logic.
 *
 * RULES:
 * - No business logic here.
 */

import type { FastifyInstance } from 'fastify';
import type { AuthController } from './auth.controller';

export function registerAuthRoutes(app: FastifyInstance, controller: AuthController) {
  app.get('/login', controller.showLogin.bind(controller));
  app.post('/login', controller.login.bind(controller));

  app.get('/register', controller.showRegister.bind(controller));
  app.post('/register', controller.register.bind(controller));

  app.get('/logout', controller.logout.bind(controller));
}
