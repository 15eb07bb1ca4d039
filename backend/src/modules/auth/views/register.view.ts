import { html } from '../../../shared/views/html';
import { renderPage } from '../../../shared/views/layout';
import type { Flash } from '../../../shared/http/flash';
import type { FieldErrors } from '../../../shared/http/errors';
import { USER_TYPES } from '../../users/user.types';
import { fieldError, textInput } from './form-fields';

export type RegisterPageModel = Readonly<{
  values?: Readonly<{
    email?: string;
    lastName?: string;
    firstName?: string;
    userType?: string;
  }>;
  fieldErrors?: FieldErrors;
  flash?: Flash | null;
}>;

const USER_TYPE_LABELS: Record<(typeof USER_TYPES)[number], string> = {
  teacher: 'Teacher',
  student: 'Student',
};

export function renderRegisterPage(model: RegisterPageModel = {}): string {
  const errors = model.fieldErrors ?? {};
  const values = model.values ?? {};

  const options = USER_TYPES.map(
    (type) =>
      html`<option value="${type}"${values.userType === type ? html` selected` : null}>${USER_TYPE_LABELS[type]}</option>`,
  );

  return renderPage({
    title: 'Register',
    flash: model.flash,
    body: html`<h1>Create an account</h1>
      <form method="post" action="/register" novalidate>
        ${textInput({ name: 'email', label: 'Email', type: 'email', value: values.email, errors, autocomplete: 'email' })}
        ${textInput({ name: 'last_name', label: 'Last name', value: values.lastName, errorKey: 'lastName', errors })}
        ${textInput({ name: 'first_name', label: 'First name', value: values.firstName, errorKey: 'firstName', errors })}
        ${textInput({ name: 'password', label: 'Password', type: 'password', errors, autocomplete: 'new-password' })}
        ${textInput({ name: 'confirm_password', label: 'Confirm password', type: 'password', errorKey: 'confirmPassword', errors, autocomplete: 'new-password' })}
        <div class="field">
          <label for="user_type">I am a</label>
          <select id="user_type" name="user_type">
            <option value="">Choose…</option>
            ${options}
          </select>
          ${fieldError(errors, 'userType')}
        </div>
        <button type="submit">Register</button>
      </form>
      <p>Already registered? <a href="/login">Log in</a></p>`,
  });
}
