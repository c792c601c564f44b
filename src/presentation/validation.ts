import { z } from 'zod';
import { IntentRequest } from '../core/entities/Intent.js';

const field = (name: string, invalid: string) => ({
  required_error: `Missing required field: ${name}`,
  invalid_type_error: invalid,
});

export const IntentRequestSchema = z.object({
  message: z.string(field('message', 'Message must be a string')),
  history: z.array(z.unknown(), field('history', 'History must be a list')),
  session_id: z.string(field('session_id', 'Session ID must be a string')).min(1, 'Session ID must not be empty'),
  metadata: z.record(z.unknown(), field('metadata', 'Metadata must be a dictionary')),
});

export type ValidationResult =
  | { success: true; data: IntentRequest }
  | { success: false; error: string };

/**
 * Validate a webhook body. Missing fields are reported before mistyped ones.
 */
export function validateIntentRequest(body: unknown): ValidationResult {
  if (body === null || typeof body !== 'object' || Array.isArray(body) || Object.keys(body).length === 0) {
    return { success: false, error: 'No JSON data provided' };
  }

  const parsed = IntentRequestSchema.safeParse(body);
  if (parsed.success) {
    return { success: true, data: parsed.data };
  }

  const issues = parsed.error.issues;
  const missing = issues.find((issue) => issue.code === 'invalid_type' && issue.received === 'undefined');
  return { success: false, error: (missing ?? issues[0]).message };
}
