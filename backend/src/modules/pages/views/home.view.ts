import { html } from '../../../shared/views/html';
import { renderPage, type ViewUser } from '../../../shared/views/layout';
import type { Flash } from '../../../shared/http/flash';

export function renderHomePage(model: { currentUser: ViewUser | null; flash: Flash | null }): string {
  const user = model.currentUser;

  const body = user
    ? html`<h1>Hello ${user.firstName}!</h1>
      <p>You are signed in as a ${user.userType}.</p>
      <p><a href="${user.landingPath}">Go to your space</a></p>`
    : html`<h1>Tutor Match</h1>
      <p>Teachers and students meet here to organise tutoring sessions.</p>
      <p><a href="/register">Create an account</a> or <a href="/login">log in</a>.</p>`;

  return renderPage({ title: 'Home', currentUser: user, flash: model.flash, body });
}
