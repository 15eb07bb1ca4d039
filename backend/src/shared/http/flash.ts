/**
 * backend/src/shared/http/flash.ts
 *
 * WHY:
 * - Post/redirect/get needs a way to show "Account created" or "Logged out" on the next page.
 * - Anonymous visitors have no session, so the message rides in its own short-lived cookie.
 *
 * RULES:
 * - One message per redirect; a newer flash overwrites an older one.
 * - The cookie is cleared by whichever page renders it (one-shot).
 * - Content is validated on read; a tampered cookie is dropped, never rendered raw.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { appendCookie, parseCookies } from './cookies';

export const FLASH_COOKIE_NAME = 'flash';

const FLASH_MAX_AGE_SECONDS = 60;

const FlashSchema = z.object({
  kind: z.enum(['success', 'info', 'warning', 'danger']),
  message: z.string().min(1).max(500),
});

export type Flash = z.infer<typeof FlashSchema>;

export function encodeFlash(flash: Flash): string {
  return Buffer.from(JSON.stringify(flash), 'utf8').toString('base64url');
}

export function decodeFlash(raw: string | undefined): Flash | null {
  if (!raw) return null;

  let json: unknown;
  try {
    json = JSON.parse(Buffer.from(raw, 'base64url').toString('utf8'));
  } catch {
    return null;
  }

  const parsed = FlashSchema.safeParse(json);
  return parsed.success ? parsed.data : null;
}

export function setFlash(reply: FastifyReply, flash: Flash, secure: boolean): void {
  appendCookie(reply, FLASH_COOKIE_NAME, encodeFlash(flash), {
    secure,
    maxAgeSeconds: FLASH_MAX_AGE_SECONDS,
  });
}

/** Reads the pending flash (if any) and schedules its removal on this response. */
export function consumeFlash(
  req: FastifyRequest,
  reply: FastifyReply,
  secure: boolean,
): Flash | null {
  const raw = parseCookies(req.headers.cookie)[FLASH_COOKIE_NAME];
  if (raw === undefined) return null;

  appendCookie(reply, FLASH_COOKIE_NAME, '', { secure, maxAgeSeconds: 0 });
  return decodeFlash(raw);
}
