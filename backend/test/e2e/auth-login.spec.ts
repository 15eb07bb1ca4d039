import { describe, it, expect } from 'vitest';
import { buildTestApp } from '../helpers/build-test-app';
import {
  createClient,
  DEFAULT_PASSWORD,
  findSetCookie,
  registerAndLogin,
  registrationForm,
} from '../helpers/http';

const SID_COOKIE = /^sid=[0-9a-f-]{36}\.[A-Za-z0-9_-]{43}; Path=\/; HttpOnly; SameSite=Lax$/;
const REMEMBER_SID_COOKIE =
  /^sid=[0-9a-f-]{36}\.[A-Za-z0-9_-]{43}; Path=\/; HttpOnly; SameSite=Lax; Max-Age=1209600$/;

describe('POST /login', () => {
  it('logs a student in and lands on /students with a welcome flash', async () => {
    const { app, close } = await buildTestApp();
    try {
      const client = createClient(app);
      const res = await registerAndLogin(client);

      expect(res.statusCode).toBe(302);
      expect(res.headers.location).toBe('/students');
      expect(findSetCookie(res, 'sid')).toMatch(SID_COOKIE);

      const page = await client.get('/students');
      expect(page.statusCode).toBe(200);
      expect(page.body).toContain(
        '<div class="flash flash-success" role="status">Welcome back, Alice!</div>',
      );
      expect(page.body).toContain('<span class="who">Alice Liddell</span>');
    } finally {
      await close();
    }
  });

  it('lands a teacher on /teachers', async () => {
    const { app, close } = await buildTestApp();
    try {
      const res = await registerAndLogin(createClient(app), {
        email: 'prof@example.com',
        user_type: 'teacher',
      });

      expect(res.statusCode).toBe(302);
      expect(res.headers.location).toBe('/teachers');
    } finally {
      await close();
    }
  });

  it('accepts the email in any case and with surrounding spaces', async () => {
    const { app, close } = await buildTestApp();
    try {
      const client = createClient(app);
      await client.post('/register', registrationForm());

      const res = await client.post('/login', {
        email: '  ALICE@example.com ',
        password: DEFAULT_PASSWORD,
      });

      expect(res.statusCode).toBe(302);
      expect(res.headers.location).toBe('/students');
    } finally {
      await close();
    }
  });

  it('sets a persistent cookie when "remember me" is checked', async () => {
    const { app, close } = await buildTestApp();
    try {
      const res = await registerAndLogin(createClient(app), {}, { remember: true });

      expect(res.statusCode).toBe(302);
      expect(findSetCookie(res, 'sid')).toMatch(REMEMBER_SID_COOKIE);
    } finally {
      await close();
    }
  });

  it('answers a wrong password and an unknown email with the same page', async () => {
    const { app, close } = await buildTestApp();
    try {
      const client = createClient(app);
      await client.post('/register', registrationForm());

      const wrongPassword = await client.post('/login', {
        email: 'alice@example.com',
        password: 'not-the-password',
      });
      const unknownEmail = await client.post('/login', {
        email: 'ghost@example.com',
        password: 'not-the-password',
      });

      for (const res of [wrongPassword, unknownEmail]) {
        expect(res.statusCode).toBe(200);
        expect(findSetCookie(res, 'sid')).toBeUndefined();
        expect(res.body).toContain('<p class="form-error" role="alert">Invalid email or password.</p>');
      }

      expect(wrongPassword.body.replace('alice@example.com', 'EMAIL')).toBe(
        unknownEmail.body.replace('ghost@example.com', 'EMAIL'),
      );
    } finally {
      await close();
    }
  });

  it('does not accept a longer password that shares the first 72 bytes', async () => {
    const { app, close } = await buildTestApp();
    try {
      const client = createClient(app);
      const password = 'é'.repeat(36);
      await client.post('/register', registrationForm({ password, confirm_password: password }));

      const longer = await client.post('/login', {
        email: 'alice@example.com',
        password: `${password}WRONG`,
      });
      expect(longer.statusCode).toBe(200);
      expect(findSetCookie(longer, 'sid')).toBeUndefined();
      expect(longer.body).toContain(
        '<p class="form-error" role="alert">Invalid email or password.</p>',
      );

      const exact = await client.post('/login', { email: 'alice@example.com', password });
      expect(exact.statusCode).toBe(302);
      expect(exact.headers.location).toBe('/students');
    } finally {
      await close();
    }
  });

  it('re-renders with field errors for empty input and never echoes the password', async () => {
    const { app, close } = await buildTestApp();
    try {
      const res = await createClient(app).post('/login', { email: '', password: '' });

      expect(res.statusCode).toBe(200);
      expect(res.body).toContain('<p class="field-error" id="email-error">Email is required</p>');
      expect(res.body).toContain(
        '<p class="field-error" id="password-error">Password is required</p>',
      );
    } finally {
      await close();
    }
  });

  it('keeps the remember-me box checked after a failed attempt', async () => {
    const { app, close } = await buildTestApp();
    try {
      const res = await createClient(app).post('/login', {
        email: 'ghost@example.com',
        password: 'wrong-pass',
        remember_me: 'y',
      });

      expect(res.body).toContain('<input type="checkbox" name="remember_me" value="y" checked>');
      expect(res.body).toContain(
        '<input id="password" name="password" type="password" value="" autocomplete="current-password">',
      );
      expect(res.body).not.toContain('wrong-pass');
    } finally {
      await close();
    }
  });

  it('redirects a signed-in user away from /login and /register', async () => {
    const { app, close } = await buildTestApp();
    try {
      const client = createClient(app);
      await registerAndLogin(client);

      const login = await client.get('/login');
      expect(login.statusCode).toBe(302);
      expect(login.headers.location).toBe('/');

      const register = await client.get('/register');
      expect(register.statusCode).toBe(302);
      expect(register.headers.location).toBe('/');

      // a second login never runs while the session is valid, so the id is never reused
      const sid = client.jar.get('sid');
      const again = await client.post('/login', {
        email: 'alice@example.com',
        password: DEFAULT_PASSWORD,
      });
      expect(again.statusCode).toBe(302);
      expect(again.headers.location).toBe('/');
      expect(findSetCookie(again, 'sid')).toBeUndefined();
      expect(client.jar.get('sid')).toBe(sid);
    } finally {
      await close();
    }
  });
});

describe('GET /logout', () => {
  it('destroys the session, clears the cookie and says goodbye', async () => {
    const { app, cache, close } = await buildTestApp();
    try {
      const client = createClient(app);
      await registerAndLogin(client);
      const sid = client.jar.get('sid');
      expect(sid).toBeDefined();

      const res = await client.get('/logout');
      expect(res.statusCode).toBe(302);
      expect(res.headers.location).toBe('/');
      expect(findSetCookie(res, 'sid')).toBe('sid=; Path=/; HttpOnly; SameSite=Lax; Max-Age=0');
      expect(cache.size).toBe(0);

      const home = await client.get('/');
      expect(home.body).toContain(
        '<div class="flash flash-info" role="status">You have been logged out.</div>',
      );

      // replaying the old cookie does not bring the session back
      client.jar.set('sid', sid ?? '');
      const gated = await client.get('/students');
      expect(gated.statusCode).toBe(302);
      expect(gated.headers.location).toBe('/login');
    } finally {
      await close();
    }
  });

  it('is harmless without a session', async () => {
    const { app, close } = await buildTestApp();
    try {
      const res = await createClient(app).get('/logout');
      expect(res.statusCode).toBe(302);
      expect(res.headers.location).toBe('/');
    } finally {
      await close();
    }
  });
});
