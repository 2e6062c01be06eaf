import { z } from "zod";

import type { CredentialField, ValidationError } from "./errors.js";

// Both values end up in an HTTP request (URL path and Cookie header), so
// only characters that cannot break out of either are accepted.
export const OrganizationIdSchema = z
  .string()
  .min(1, "Organization ID is required")
  .max(128, "Organization ID is too long")
  .regex(/^[A-Za-z0-9_-]+$/, "Invalid organization ID format");

export const SessionTokenSchema = z
  .string()
  .min(1, "Session token is required")
  .max(4096, "Session token is too long")
  .regex(/^[A-Za-z0-9\-_.+/=]+$/, "Invalid session token format");

export type ValidationResult = { ok: true } | { ok: false; error: ValidationError };

function validateWith(
  schema: z.ZodType<string>,
  field: CredentialField,
  value: string
): ValidationResult {
  const parsed = schema.safeParse(value);
  if (parsed.success) return { ok: true };
  const message = parsed.error.issues[0]?.message ?? `Invalid ${field}`;
  return { ok: false, error: { field, message } };
}

export function validateOrganizationId(value: string): ValidationResult {
  return validateWith(OrganizationIdSchema, "organization_id", value);
}

export function validateSessionToken(value: string): ValidationResult {
  return validateWith(SessionTokenSchema, "session_token", value);
}
