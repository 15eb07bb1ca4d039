import { html } from './html';
import { renderPage, type ViewUser } from './layout';

export type ErrorPageOptions = Readonly<{
  status: number;
  title: string;
  message: string;
  currentUser?: ViewUser | null;
}>;

export function renderErrorPage(opts: ErrorPageOptions): string {
  return renderPage({
    title: opts.title,
    currentUser: opts.currentUser,
    body: html`<section class="error">
        <h1>${opts.status} · ${opts.title}</h1>
        <p>${opts.message}</p>
        <p><a href="/">Back to the home page</a></p>
      </section>`,
  });
}
