/**
 * Shared validation schemas (Zod)
 *
 * Used both when writing policy/connection rows and when reading their
 * JSON columns back.
 */

import { z } from 'zod';
import { WEEKDAYS } from '@toolgate/protocol';
import { ValidationError } from '../utils/errors.js';

export const PermissionKindSchema = z.enum(['allowed', 'blocked', 'approval_required']);

export const TimeRestrictionsSchema = z
  .object({
    allowed_hours: z.array(z.number().int().min(0).max(23)).optional(),
    allowed_days: z.array(z.enum(WEEKDAYS)).optional(),
  })
  .strict();

export const RateLimitSchema = z
  .object({
    max_calls_per_hour: z.number().int().min(1).optional(),
    max_calls_per_day: z.number().int().min(1).optional(),
  })
  .strict();

export const ParamConstraintsSchema = z.record(z.unknown());

/**
 * Decrypted credential blob: flat string map
 */
export const CredentialMapSchema = z.record(z.string());

export const ConnectionNameSchema = z.string().trim().min(1).max(255);

export const BackendKindSchema = z
  .string()
  .regex(/^[a-z][a-z0-9_-]{0,49}$/, 'kind must be lowercase alphanumeric (no "." allowed)');

/**
 * Parse with a schema, converting failures to ValidationError
 */
export function validateInput<S extends z.ZodTypeAny>(schema: S, input: unknown, label: string): z.infer<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map(issue =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw new ValidationError(`Invalid ${label}: ${issues.join('; ')}`, { issues });
  }
  const data: z.infer<S> = result.data;
  return data;
}
