import { NotFoundError, ValidationError } from '@marketsync/domain-kernel';
import type { Context } from 'hono';
import { z } from 'zod';

/** Reads an optional JSON body; an empty body reads as `{}`. */
export async function readJson(c: Context): Promise<unknown> {
  const raw = await c.req.text();
  if (raw.trim() === '') return {};
  try {
    return JSON.parse(raw);
  } catch {
    throw new ValidationError('Request body is not valid JSON');
  }
}

export function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError('Invalid request', {
      issues: parsed.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    });
  }
  return parsed.data;
}

const UuidSchema = z.string().uuid();

/** Ids that cannot exist are reported as missing rather than sent to the database. */
export function parseId(entity: string, value: string): string {
  if (!UuidSchema.safeParse(value).success) throw new NotFoundError(entity, value);
  return value;
}
