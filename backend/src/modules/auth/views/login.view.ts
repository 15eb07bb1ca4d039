import { html } from '../../../shared/views/html';
import { renderPage } from '../../../shared/views/layout';
import type { Flash } from '../../../shared/http/flash';
import type { FieldErrors } from '../../../shared/http/errors';
import { fieldError, textInput } from './form-fields';

export type LoginPageModel = Readonly<{
  values?: Readonly<{ email?: string; remember?: boolean }>;
  fieldErrors?: FieldErrors;
  formError?: string | null;
  flash?: Flash | null;
}>;

export function renderLoginPage(model: LoginPageModel = {}): string {
  const errors = model.fieldErrors ?? {};
  const values = model.values ?? {};

  return renderPage({
    title: 'Log in',
    flash: model.flash,
    body: html`<h1>Log in</h1>
      ${model.formError ? html`<p class="form-error" role="alert">${model.formError}</p>` : null}
      <form method="post" action="/login" novalidate>
        ${textInput({ name: 'email', label: 'Email', type: 'email', value: values.email, errors, autocomplete: 'email' })}
        ${textInput({ name: 'password', label: 'Password', type: 'password', errors, autocomplete: 'current-password' })}
        <div class="field">
          <label><input type="checkbox" name="remember_me" value="y"${values.remember ? html` checked` : null}> Remember me</label>
          ${fieldError(errors, 'remember')}
        </div>
        <button type="submit">Log in</button>
      </form>
      <p>No account yet? <a href="/register">Register</a></p>`,
  });
}
