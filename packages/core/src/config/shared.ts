import { z } from 'zod';

/**
 * Boolean that also accepts the string forms environment variables arrive in
 */
export const booleanish = z.preprocess((value) => {
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (normalized === 'true' || normalized === '1') return true;
    if (normalized === 'false' || normalized === '0') return false;
  }
  return value;
}, z.boolean());

export const portNumber = z.coerce
  .number()
  .int('port must be an integer')
  .min(1, 'port must be between 1 and 65535')
  .max(65535, 'port must be between 1 and 65535');

export const timeoutSeconds = z.coerce
  .number()
  .positive('connectionTimeout must be a positive number of seconds');

/**
 * Flatten zod issues into `path: message` lines
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.errors.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : 'config';
    return `${path}: ${issue.message}`;
  });
}

/**
 * Frozen shallow copy of a passthrough record. Values stay as the caller
 * passed them (buffers, clients and nested objects are neither copied nor frozen).
 */
export function freezeRecord(record: Record<string, unknown>): Readonly<Record<string, unknown>> {
  return Object.freeze({ ...record });
}
