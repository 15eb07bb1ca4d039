/**
 * backend/src/app/server.ts
 *
 * WHY:
 * - Builds the Fastify server and registers global plugins/hooks.
 * - Keeps "build app" separate from "start listening" (test-friendly).
 *
 * HOOK ORDER (onRequest):
 * 1) request context (requestId)
 * 2) anonymous auth context
 * 3) session middleware (may upgrade auth context)
 * 4) request log line (now includes userId when signed in)
 */

import Fastify from 'fastify';
import formbody from '@fastify/formbody';

import type { AppConfig } from './config';
import type { AppDeps } from './di';
import { registerRequestContext } from '../shared/http/request-context';
import { registerAuthContext } from '../shared/http/auth-context';
import { registerErrorHandler } from '../shared/http/error-handler';
import { registerSessionMiddleware } from '../shared/session/session.middleware';
import { withRequestContext } from '../shared/logger/with-context';

export async function buildServer(opts: { config: AppConfig; deps: AppDeps }) {
  const app = Fastify({
    logger: false, // we use our own Winston logger
    trustProxy: opts.config.trustProxy,
  });

  // HTML forms post application/x-www-form-urlencoded
  await app.register(formbody);

  registerRequestContext(app);
  registerAuthContext(app);
  registerSessionMiddleware(app, {
    sessionStore: opts.deps.sessionStore,
    signer: opts.deps.sessionSigner,
  });

  app.addHook('onRequest', (req, _reply, done) => {
    withRequestContext(req).info('request', { flow: 'http.request' });
    done();
  });

  registerErrorHandler(app, { isProduction: opts.config.nodeEnv === 'production' });

  return app;
}
