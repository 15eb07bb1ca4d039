/**
 * backend/src/shared/http/cookies.ts
 *
 * Minimal cookie helpers shared by the session and flash mechanisms.
 * Fastify's reply.header('Set-Cookie', ...) appends rather than replaces, so several
 * cookies can be written on one response.
 */

import type { FastifyReply } from 'fastify';

/**
 * Parses a raw Cookie header into key-value pairs.
 * Handles the standard format: "key1=value1; key2=value2"
 */
export function parseCookies(raw: string | undefined): Record<string, string> {
  if (!raw) return {};

  const cookies: Record<string, string> = {};
  for (const pair of raw.split(';')) {
    const eqIdx = pair.indexOf('=');
    if (eqIdx === -1) continue;

    const key = pair.substring(0, eqIdx).trim();
    const value = pair.substring(eqIdx + 1).trim();
    if (key) cookies[key] = value;
  }
  return cookies;
}

export type CookieOptions = Readonly<{
  httpOnly?: boolean;
  sameSite?: 'Strict' | 'Lax';
  secure?: boolean;
  maxAgeSeconds?: number;
}>;

export function serializeCookie(name: string, value: string, opts: CookieOptions = {}): string {
  const parts = [`${name}=${value}`, 'Path=/'];

  if (opts.httpOnly ?? true) parts.push('HttpOnly');
  parts.push(`SameSite=${opts.sameSite ?? 'Lax'}`);
  if (opts.maxAgeSeconds !== undefined) parts.push(`Max-Age=${opts.maxAgeSeconds}`);
  if (opts.secure) parts.push('Secure');

  return parts.join('; ');
}

export function appendCookie(
  reply: FastifyReply,
  name: string,
  value: string,
  opts: CookieOptions = {},
): void {
  reply.header('Set-Cookie', serializeCookie(name, value, opts));
}
