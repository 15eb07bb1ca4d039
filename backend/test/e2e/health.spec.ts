import { describe, it, expect } from 'vitest';
import { buildTestApp } from '../helpers/build-test-app';

type HealthBody = { ok: boolean; env: string; service: string; requestId: string };

describe('GET /health', () => {
  it('reports the service and a request id', async () => {
    const { app, close } = await buildTestApp();
    try {
      const res = await app.inject({ method: 'GET', url: '/health' });

      expect(res.statusCode).toBe(200);
      const body = res.json<HealthBody>();
      expect(body.ok).toBe(true);
      expect(body.env).toBe('test');
      expect(body.service).toBe('tutor-match-test');
      expect(body.requestId).toMatch(/^[0-9a-f-]{36}$/);
    } finally {
      await close();
    }
  });

  it('reuses a well-formed upstream x-request-id', async () => {
    const { app, close } = await buildTestApp();
    try {
      const res = await app.inject({
        method: 'GET',
        url: '/health',
        headers: { 'x-request-id': 'edge-req-0001' },
      });

      expect(res.json<HealthBody>().requestId).toBe('edge-req-0001');
    } finally {
      await close();
    }
  });

  it('replaces a malformed x-request-id', async () => {
    const { app, close } = await buildTestApp();
    try {
      const res = await app.inject({
        method: 'GET',
        url: '/health',
        headers: { 'x-request-id': 'bad id' },
      });

      expect(res.json<HealthBody>().requestId).not.toBe('bad id');
    } finally {
      await close();
    }
  });
});
