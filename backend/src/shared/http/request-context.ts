/**
 * backend/src/shared/http/request-context.ts
 *
 * WHY:
 * - We want a stable requestId for logs and debugging.
 * - An upstream proxy may already have assigned one (x-request-id); we keep it so
 *   log lines line up across hops.
 *
 * HOW TO USE:
 * - Registered once in app/server.ts via registerRequestContext(app).
 * - After registration, every request has `req.requestContext`.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import { randomUUID } from 'node:crypto';

export type RequestContext = {
  requestId: string;
  ip: string;
  userAgent: string | null;
};

declare module 'fastify' {
  interface FastifyRequest {
    requestContext: RequestContext;
  }
}

const REQUEST_ID_PATTERN = /^[A-Za-z0-9._-]{8,128}$/;

export function resolveRequestId(header: unknown): string {
  if (typeof header === 'string' && REQUEST_ID_PATTERN.test(header)) return header;
  return randomUUID();
}

export function registerRequestContext(app: FastifyInstance) {
  // Decorated with null; the real value is assigned per request in onRequest.
  app.decorateRequest('requestContext', null);

  // IMPORTANT: Fastify hooks must either be async OR accept `done`.
  app.addHook('onRequest', (req: FastifyRequest, _reply, done) => {
    req.requestContext = {
      requestId: resolveRequestId(req.headers['x-request-id']),
      ip: req.ip,
      userAgent: req.headers['user-agent'] ?? null,
    };

    done();
  });
}
