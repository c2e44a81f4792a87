import { z } from 'zod';
import { AgentErrorCode, invalidInput } from '../errors/agent-error';

export const modeRequestSchema = z.object({
  mode: z.enum(['REAL', 'SIMULATED'])
});

export const devStateRequestSchema = z.object({
  // "true"/"false" strings are accepted from form-style clients
  running: z.union([z.boolean(), z.enum(['true', 'false']).transform(value => value === 'true')]),
  demo: z.string().nullable().optional()
});

export const devErrorRequestSchema = z.object({
  code: z.string().min(1).default('EMULATOR_CRASH'),
  message: z.string().min(1).default('Simulated emulator crash'),
  details: z.record(z.unknown()).optional()
});

export type ModeRequest = z.output<typeof modeRequestSchema>;
export type DevStateRequest = z.output<typeof devStateRequestSchema>;
export type DevErrorRequest = z.output<typeof devErrorRequestSchema>;

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Validate a request body, raising InvalidInput with the schema's complaints
 */
export function parseBody<S extends z.ZodTypeAny>(schema: S, body: unknown, code: AgentErrorCode): z.output<S> {
  const result = schema.safeParse(body);
  if (!result.success) {
    throw invalidInput(code, `Invalid request body: ${describeIssues(result.error)}`);
  }
  return result.data;
}
