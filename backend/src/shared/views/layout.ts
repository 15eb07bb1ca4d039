/**
 * backend/src/shared/views/layout.ts
 *
 * Page chrome shared by every rendered page: navigation, flash banner, body.
 */

import type { Flash } from '../http/flash';
import type { UserType } from '../../modules/users/user.types';
import { html, type SafeHtml } from './html';

export type ViewUser = Readonly<{
  firstName: string;
  lastName: string;
  userType: UserType;
  landingPath: string;
}>;

export type LayoutOptions = Readonly<{
  title: string;
  body: SafeHtml;
  currentUser?: ViewUser | null;
  flash?: Flash | null;
}>;

function nav(user: ViewUser | null): SafeHtml {
  if (!user) {
    return html`<nav>
      <a href="/">Home</a>
      <a href="/login">Log in</a>
      <a href="/register">Register</a>
    </nav>`;
  }

  return html`<nav>
      <a href="/">Home</a>
      <a href="${user.landingPath}">My space</a>
      <span class="who">${user.firstName} ${user.lastName}</span>
      <a href="/logout">Log out</a>
    </nav>`;
}

export function renderPage(opts: LayoutOptions): string {
  const flash = opts.flash ?? null;

  return html`<!doctype html>
<html lang="en">
  <head>
    <meta charset="utf-8">
    <meta name="viewport" content="width=device-width, initial-scale=1">
    <title>${opts.title} · Tutor Match</title>
  </head>
  <body>
    <header>${nav(opts.currentUser ?? null)}</header>
    ${flash ? html`<div class="flash flash-${flash.kind}" role="status">${flash.message}</div>` : null}
    <main>
      ${opts.body}
    </main>
  </body>
</html>
`.value;
}
