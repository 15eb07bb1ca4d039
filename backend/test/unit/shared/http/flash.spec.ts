import { describe, it, expect } from 'vitest';
import { decodeFlash, encodeFlash } from '../../../../src/shared/http/flash';

describe('flash cookie codec', () => {
  it('decodes what it encodes', () => {
    const flash = { kind: 'success' as const, message: 'Welcome back, Zoé!' };
    expect(decodeFlash(encodeFlash(flash))).toEqual(flash);
  });

  it('produces a cookie-safe value', () => {
    expect(encodeFlash({ kind: 'info', message: 'a; b=c, "d"' })).toMatch(/^[A-Za-z0-9_-]+$/);
  });

  it('returns null for a missing cookie', () => {
    expect(decodeFlash(undefined)).toBeNull();
    expect(decodeFlash('')).toBeNull();
  });

  it('drops a value that is not JSON', () => {
    expect(decodeFlash(Buffer.from('not json', 'utf8').toString('base64url'))).toBeNull();
  });

  it('drops a value with an unknown kind', () => {
    const forged = Buffer.from(JSON.stringify({ kind: 'script', message: 'x' }), 'utf8').toString(
      'base64url',
    );
    expect(decodeFlash(forged)).toBeNull();
  });
});
