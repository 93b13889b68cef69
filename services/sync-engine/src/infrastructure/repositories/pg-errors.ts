const UNIQUE_VIOLATION = '23505';

function codeOf(error: unknown): unknown {
  return typeof error === 'object' && error !== null && 'code' in error ? error.code : undefined;
}

/** True for a Postgres unique-constraint violation, also when wrapped in `cause`. */
export function isUniqueViolation(error: unknown): boolean {
  if (codeOf(error) === UNIQUE_VIOLATION) return true;
  return error instanceof Error && codeOf(error.cause) === UNIQUE_VIOLATION;
}
