/**
 * backend/src/shared/http/form-body.ts
 *
 * WHY:
 * - @fastify/formbody hands controllers an untyped object; repeated keys become arrays.
 * - Controllers want "string or absent" per field before Zod validation runs.
 *
 * RULES:
 * - Non-string values are dropped; for repeated keys the first string wins.
 */

import { z } from 'zod';

const BodySchema = z.record(z.string(), z.unknown());

export type FormFields = Readonly<Record<string, string | undefined>>;

export function readFormFields(body: unknown): FormFields {
  const parsed = BodySchema.safeParse(body);
  if (!parsed.success) return {};

  const fields: Record<string, string> = {};
  for (const [key, value] of Object.entries(parsed.data)) {
    if (typeof value === 'string') {
      fields[key] = value;
    } else if (Array.isArray(value)) {
      const first: unknown = value.find((v: unknown) => typeof v === 'string');
      if (typeof first === 'string') fields[key] = first;
    }
  }
  return fields;
}
