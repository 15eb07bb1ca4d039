import { describe, it, expect } from 'vitest';
import { parseCookies, serializeCookie } from '../../../../src/shared/http/cookies';

describe('parseCookies', () => {
  it('returns an empty object for a missing header', () => {
    expect(parseCookies(undefined)).toEqual({});
  });

  it('splits pairs on the first "="', () => {
    expect(parseCookies('a=1; b=2=3;junk; c = x ')).toEqual({ a: '1', b: '2=3', c: 'x' });
  });
});

describe('serializeCookie', () => {
  it('writes HttpOnly and SameSite=Lax by default', () => {
    expect(serializeCookie('sid', 'v')).toBe('sid=v; Path=/; HttpOnly; SameSite=Lax');
  });

  it('adds Max-Age and Secure when asked', () => {
    expect(serializeCookie('sid', 'v', { maxAgeSeconds: 60, secure: true })).toBe(
      'sid=v; Path=/; HttpOnly; SameSite=Lax; Max-Age=60; Secure',
    );
  });

  it('writes Max-Age=0 for deletion', () => {
    expect(serializeCookie('sid', '', { maxAgeSeconds: 0 })).toBe(
      'sid=; Path=/; HttpOnly; SameSite=Lax; Max-Age=0',
    );
  });
});
