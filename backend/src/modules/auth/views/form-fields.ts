/**
 * Small form building blocks shared by the login and register pages.
 */

import { html, type SafeHtml } from '../../../shared/views/html';
import type { FieldErrors } from '../../../shared/http/errors';

export function fieldError(errors: FieldErrors, field: string): SafeHtml | null {
  const message = errors[field];
  return message ? html`<p class="field-error" id="${field}-error">${message}</p>` : null;
}

export function textInput(opts: {
  name: string;
  label: string;
  type?: 'text' | 'email' | 'password';
  value?: string;
  errorKey?: string;
  errors: FieldErrors;
  autocomplete?: string;
}): SafeHtml {
  const type = opts.type ?? 'text';
  const key = opts.errorKey ?? opts.name;
  // Password inputs never carry a value back to the browser.
  const value = type === 'password' ? '' : (opts.value ?? '');

  return html`<div class="field">
        <label for="${opts.name}">${opts.label}</label>
        <input id="${opts.name}" name="${opts.name}" type="${type}" value="${value}" autocomplete="${opts.autocomplete ?? 'off'}">
        ${fieldError(opts.errors, key)}
      </div>`;
}
