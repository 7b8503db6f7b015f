// SQLSTATE codes the services branch on
export const PG_UNIQUE_VIOLATION = '23505';

type PgLikeError = { code?: unknown; constraint?: unknown };

const isPgLikeError = (error: unknown): error is PgLikeError =>
  typeof error === 'object' && error !== null && 'code' in error;

export function isUniqueViolation(error: unknown, constraint?: string): boolean {
  if (!isPgLikeError(error) || error.code !== PG_UNIQUE_VIOLATION) {
    return false;
  }
  return constraint === undefined || error.constraint === constraint;
}
