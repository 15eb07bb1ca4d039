/**
 * backend/src/shared/http/error-handler.ts
 *
 * WHY:
 * - Fastify's default error handler doesn't understand AppError and answers in JSON.
 * - Browsers get a rendered page for every failure; internal details never leak.
 *
 * RESPONSIBILITIES:
 * - UNAUTHORIZED AppError → flash + 302 /login (the gate's "no session" outcome).
 * - Other AppError → error page with its status (403 Forbidden page, ...).
 * - Fastify client errors (bad content type, malformed body) → error page with their 4xx.
 * - Unexpected errors → 500 page with a generic message.
 * - Unmatched routes → 404 page.
 * - Log all errors with request context.
 *
 * RULES:
 * - No business logic here.
 * - Never expose .meta or stack traces in responses.
 * - Log full error details (with sensitive meta REDACTED).
 */

import type { FastifyError, FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { AppError } from './errors';
import { setFlash } from './flash';
import { withRequestContext } from '../logger/with-context';
import { renderErrorPage } from '../views/error.view';

export const LOGIN_REQUIRED_MESSAGE = 'Please log in to access this page.';

const SENSITIVE_META_KEYS = new Set([
  'password',
  'confirmPassword',
  'passwordHash',
  'sessionId',
  'secret',
  'token',
]);

const STATUS_TITLES: Record<number, string> = {
  400: 'Bad request',
  403: 'Forbidden',
  404: 'Page not found',
  405: 'Method not allowed',
  409: 'Conflict',
  413: 'Payload too large',
  415: 'Unsupported media type',
  500: 'Server error',
};

export function redactMeta(meta: unknown): unknown {
  if (!meta || typeof meta !== 'object') return meta;

  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(meta)) {
    out[k] = SENSITIVE_META_KEYS.has(k) ? '[REDACTED]' : v;
  }
  return out;
}

function titleFor(status: number): string {
  return STATUS_TITLES[status] ?? (status >= 500 ? 'Server error' : 'Request error');
}

function sendErrorPage(reply: FastifyReply, status: number, message: string) {
  return reply
    .status(status)
    .type('text/html; charset=utf-8')
    .send(renderErrorPage({ status, title: titleFor(status), message }));
}

function isClientError(err: FastifyError): boolean {
  return typeof err.statusCode === 'number' && err.statusCode >= 400 && err.statusCode < 500;
}

export function registerErrorHandler(app: FastifyInstance, opts: { isProduction: boolean }): void {
  app.setErrorHandler((err: FastifyError, req: FastifyRequest, reply: FastifyReply) => {
    const log = withRequestContext(req);

    // 1) Known application errors
    if (err instanceof AppError) {
      log.warn('app_error', {
        flow: 'http.error',
        code: err.code,
        status: err.status,
        message: err.message,
        meta: redactMeta(err.meta),
      });

      if (err.code === 'UNAUTHORIZED') {
        setFlash(reply, { kind: 'warning', message: LOGIN_REQUIRED_MESSAGE }, opts.isProduction);
        return reply.redirect('/login');
      }

      return sendErrorPage(reply, err.status, err.message);
    }

    // 2) Framework-level client errors (e.g. unsupported content type, body too large)
    if (isClientError(err)) {
      log.warn('client_error', {
        flow: 'http.error',
        code: err.code,
        status: err.statusCode,
        message: err.message,
      });

      const status = err.statusCode ?? 400;
      return sendErrorPage(reply, status, 'The request could not be processed.');
    }

    // 3) Unexpected errors: never leak internals
    log.error('unhandled_error', {
      flow: 'http.error',
      message: err.message,
      stack: err.stack,
    });

    return sendErrorPage(reply, 500, 'Something went wrong on our side. Please try again later.');
  });

  app.setNotFoundHandler((req: FastifyRequest, reply: FastifyReply) => {
    withRequestContext(req).info('not_found', { flow: 'http.not_found' });
    return sendErrorPage(reply, 404, 'The page you are looking for does not exist.');
  });
}
