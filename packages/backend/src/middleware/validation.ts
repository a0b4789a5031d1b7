import { timingSafeEqual } from 'crypto';
import { z } from 'zod';
import { TaskRequest } from '@pagelaunch/shared';
import { HttpError } from './errorHandler';

const attachmentSchema = z.object({
  name: z.string().min(1),
  url: z.string().min(1),
});

const httpUrlSchema = z.string().superRefine((value, ctx) => {
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    ctx.addIssue({ code: z.ZodIssueCode.invalid_string, validation: 'url', message: 'Invalid url' });
    return;
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Must be an http or https URL' });
  }
});

export const taskRequestSchema = z.object({
  email: z.string().min(1),
  secret: z.string(),
  task: z
    .string()
    .regex(/^[A-Za-z0-9._-]{1,100}$/, 'task must be a valid repository name')
    .refine((task) => task !== '.' && task !== '..', 'task must be a valid repository name'),
  round: z.number().int().min(1, 'Invalid round number.'),
  nonce: z.string(),
  brief: z.string().min(1),
  checks: z.array(z.string()),
  evaluation_url: httpUrlSchema,
  attachments: z
    .array(attachmentSchema)
    .nullish()
    .transform((attachments) => attachments ?? undefined),
});

/**
 * Validates a submit body, throwing a 400 `HttpError` that lists every problem.
 */
export function parseTaskRequest(body: unknown): TaskRequest {
  const parsed = taskRequestSchema.safeParse(body);
  if (!parsed.success) {
    throw new HttpError(
      400,
      'Invalid request body',
      parsed.error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`)
    );
  }
  return parsed.data;
}

/**
 * Constant-time comparison of the shared secret
 */
export function verifySecret(provided: string, expected: string): boolean {
  const a = Buffer.from(provided, 'utf8');
  const b = Buffer.from(expected, 'utf8');
  if (a.length !== b.length) {
    return false;
  }
  return timingSafeEqual(a, b);
}
