import type { z } from 'zod';

export interface CredentialValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

const PLACEHOLDER_PATTERNS: RegExp[] = [
  /^YOUR_/i,
  /^changeme$/i,
  /^placeholder$/i,
  /^x{3,}$/i,
  /^<.*>$/,
  /^test$/i,
];

export function isPlaceholder(value: string): boolean {
  const trimmed = value.trim();
  return PLACEHOLDER_PATTERNS.some((pattern) => pattern.test(trimmed));
}

/**
 * Checks shape against the platform schema, then rejects values that are
 * obviously copied from a sample config.
 */
export function validateCredentials(
  schema: z.ZodTypeAny,
  input: unknown,
): CredentialValidationResult {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    return {
      valid: false,
      errors: parsed.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
      ),
      warnings: [],
    };
  }

  const errors: string[] = [];
  const warnings: string[] = [];
  if (typeof input === 'object' && input !== null) {
    for (const [field, value] of Object.entries(input)) {
      if (typeof value !== 'string') continue;
      if (isPlaceholder(value)) errors.push(`${field}: looks like a placeholder value`);
      else if (value !== value.trim()) warnings.push(`${field}: has surrounding whitespace`);
    }
  }
  return { valid: errors.length === 0, errors, warnings };
}
