/**
 * src/modules/auth/auth.controller.ts
 *
 * WHY:
 * - Maps HTTP ⇄ AuthService for the login, register and logout pages.
 * - Translates service errors into re-rendered forms (200 + inline errors) and
 *   successes into redirects with a flash message.
 *
 * RULES:
 * - No DB access here.
 * - No business rules here (validation lives in the service / schemas).
 * - Cookie logic lives in shared/session/set-session-cookie (DRY).
 * - Passwords are never written back into a rendered form.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';

import { AppError } from '../../shared/http/errors';
import { consumeFlash, setFlash } from '../../shared/http/flash';
import { readFormFields } from '../../shared/http/form-body';
import { getOptionalSession } from '../../shared/http/require-auth-context';
import type { KeyedHasher } from '../../shared/security/keyed-hasher';
import { clearSessionCookie, setSessionCookie } from '../../shared/session/set-session-cookie';

import type { AuthService } from './auth.service';
import { registerFormSchema, toFieldErrors } from './auth.schemas';
import { AUTH_MESSAGES } from './auth.constants';
import { renderLoginPage } from './views/login.view';
import { renderRegisterPage } from './views/register.view';

const HTML = 'text/html; charset=utf-8';

function isChecked(value: string | undefined): boolean {
  return value !== undefined && value !== '' && value !== 'false' && value !== '0';
}

export class AuthController {
  constructor(
    private readonly authService: AuthService,
    private readonly opts: { isProduction: boolean; sessionSigner: KeyedHasher },
  ) {}

  async showLogin(req: FastifyRequest, reply: FastifyReply) {
    if (getOptionalSession(req)) return reply.redirect('/');

    const flash = consumeFlash(req, reply, this.opts.isProduction);
    return reply.type(HTML).send(renderLoginPage({ flash }));
  }

  async login(req: FastifyRequest, reply: FastifyReply) {
    if (getOptionalSession(req)) return reply.redirect('/');

    const form = readFormFields(req.body);
    const remember = isChecked(form.remember_me);

    try {
      const result = await this.authService.login({
        email: form.email ?? '',
        password: form.password ?? '',
        remember,
        requestId: req.requestContext.requestId,
      });

      setSessionCookie(reply, result.sessionId, {
        signer: this.opts.sessionSigner,
        isProduction: this.opts.isProduction,
        maxAgeSeconds: result.cookieMaxAgeSeconds,
      });
      setFlash(
        reply,
        { kind: 'success', message: AUTH_MESSAGES.welcome(result.user.firstName) },
        this.opts.isProduction,
      );
      return reply.redirect(result.landingPath);
    } catch (err) {
      if (!(err instanceof AppError)) throw err;

      const values = { email: (form.email ?? '').trim(), remember };

      if (err.code === 'VALIDATION_ERROR') {
        return reply.type(HTML).send(renderLoginPage({ values, fieldErrors: err.fieldErrors }));
      }
      if (err.code === 'UNAUTHORIZED') {
        return reply.type(HTML).send(renderLoginPage({ values, formError: err.message }));
      }
      throw err;
    }
  }

  async showRegister(req: FastifyRequest, reply: FastifyReply) {
    if (getOptionalSession(req)) return reply.redirect('/');

    const flash = consumeFlash(req, reply, this.opts.isProduction);
    return reply.type(HTML).send(renderRegisterPage({ flash }));
  }

  async register(req: FastifyRequest, reply: FastifyReply) {
    if (getOptionalSession(req)) return reply.redirect('/');

    const form = readFormFields(req.body);
    const input = {
      email: form.email ?? '',
      lastName: form.last_name ?? '',
      firstName: form.first_name ?? '',
      password: form.password ?? '',
      confirmPassword: form.confirm_password ?? '',
      userType: form.user_type ?? '',
    };
    const values = {
      email: input.email.trim(),
      lastName: input.lastName.trim(),
      firstName: input.firstName.trim(),
      userType: input.userType,
    };

    const parsed = registerFormSchema.safeParse(input);
    if (!parsed.success) {
      return reply
        .type(HTML)
        .send(renderRegisterPage({ values, fieldErrors: toFieldErrors(parsed.error) }));
    }

    try {
      await this.authService.register({
        email: parsed.data.email,
        password: parsed.data.password,
        lastName: parsed.data.lastName,
        firstName: parsed.data.firstName,
        userType: parsed.data.userType,
        requestId: req.requestContext.requestId,
      });
    } catch (err) {
      if (err instanceof AppError && (err.code === 'VALIDATION_ERROR' || err.code === 'CONFLICT')) {
        return reply.type(HTML).send(renderRegisterPage({ values, fieldErrors: err.fieldErrors }));
      }
      throw err;
    }

    setFlash(reply, { kind: 'success', message: AUTH_MESSAGES.registered }, this.opts.isProduction);
    return reply.redirect('/login');
  }

  async logout(req: FastifyRequest, reply: FastifyReply) {
    const session = getOptionalSession(req);

    await this.authService.logout({
      sessionId: session?.sessionId ?? null,
      userId: session?.userId ?? null,
      requestId: req.requestContext.requestId,
    });

    clearSessionCookie(reply, this.opts.isProduction);
    setFlash(reply, { kind: 'info', message: AUTH_MESSAGES.loggedOut }, this.opts.isProduction);
    return reply.redirect('/');
  }
}
