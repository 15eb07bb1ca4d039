import { describe, it, expect } from 'vitest';
import { buildTestApp } from '../helpers/build-test-app';
import { createClient, registerAndLogin } from '../helpers/http';

describe('session lifetime', () => {
  it('keeps an active default session alive and ends an idle one', async () => {
    const { app, clock, close } = await buildTestApp();
    try {
      const client = createClient(app);
      await registerAndLogin(client);

      // each request slides the 30 minute window
      clock.advanceSeconds(1500);
      expect((await client.get('/students')).statusCode).toBe(200);
      clock.advanceSeconds(1500);
      expect((await client.get('/students')).statusCode).toBe(200);

      clock.advanceSeconds(1800);
      const res = await client.get('/students');
      expect(res.statusCode).toBe(302);
      expect(res.headers.location).toBe('/login');
    } finally {
      await close();
    }
  });

  it('keeps a remembered session for fourteen days, then ends it', async () => {
    const { app, clock, close } = await buildTestApp();
    try {
      const client = createClient(app);
      await registerAndLogin(client, {}, { remember: true });

      clock.advanceSeconds(13 * 86400);
      expect((await client.get('/students')).statusCode).toBe(200);

      clock.advanceSeconds(86400);
      const res = await client.get('/students');
      expect(res.statusCode).toBe(302);
      expect(res.headers.location).toBe('/login');
    } finally {
      await close();
    }
  });

  it('ends an idle default session while a remembered one survives the same gap', async () => {
    const { app, clock, close } = await buildTestApp();
    try {
      const brief = createClient(app);
      const remembered = createClient(app);
      await registerAndLogin(brief, { email: 'brief@example.com' });
      await registerAndLogin(remembered, { email: 'kept@example.com' }, { remember: true });

      clock.advanceSeconds(1801);

      expect((await brief.get('/students')).statusCode).toBe(302);
      expect((await remembered.get('/students')).statusCode).toBe(200);
    } finally {
      await close();
    }
  });

  it('honours a shorter configured TTL', async () => {
    const { app, clock, close } = await buildTestApp({ session: { ttlSeconds: 60 } });
    try {
      const client = createClient(app);
      await registerAndLogin(client);

      clock.advanceSeconds(61);
      expect((await client.get('/students')).statusCode).toBe(302);
    } finally {
      await close();
    }
  });
});
