/**
 * Domain part of an email, for PII-minimized logs ("auth.login.failed ... gmail.com").
 * Pure; returns '' when there is no '@'.
 */

export function emailDomain(email: string): string {
  const at = email.lastIndexOf('@');
  return at >= 0 ? email.slice(at + 1).toLowerCase() : '';
}
