import { html } from '../../../shared/views/html';
import { renderPage, type ViewUser } from '../../../shared/views/layout';
import type { Flash } from '../../../shared/http/flash';

export function renderTeachersPage(model: { currentUser: ViewUser; flash: Flash | null }): string {
  const user = model.currentUser;

  return renderPage({
    title: 'Teacher space',
    currentUser: user,
    flash: model.flash,
    body: html`<h1>Teacher space</h1>
      <p>Welcome ${user.firstName} ${user.lastName}. This page is only visible to teachers.</p>`,
  });
}

export function renderStudentsPage(model: { currentUser: ViewUser; flash: Flash | null }): string {
  const user = model.currentUser;

  return renderPage({
    title: 'Student space',
    currentUser: user,
    flash: model.flash,
    body: html`<h1>Student space</h1>
      <p>Welcome ${user.firstName} ${user.lastName}. This page is only visible to students.</p>`,
  });
}
