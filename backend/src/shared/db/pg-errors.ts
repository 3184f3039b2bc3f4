/**
 * backend/src/shared/db/pg-errors.ts
 *
 * pg rejects with a DatabaseError carrying the SQLSTATE in `code` and the
 * violated constraint name in `constraint`. Read-then-write checks race; these
 * let flows map what the database caught into domain errors.
 */

export const PG_UNIQUE_VIOLATION = '23505';
export const PG_CHECK_VIOLATION = '23514';

export type PgConstraintError = {
  code: string;
  constraint: string | null;
};

export function asPgConstraintError(err: unknown): PgConstraintError | null {
  if (typeof err !== 'object' || err === null) return null;
  if (!('code' in err) || typeof err.code !== 'string') return null;

  const constraint = 'constraint' in err && typeof err.constraint === 'string' ? err.constraint : null;
  return { code: err.code, constraint };
}

export function isUniqueViolation(err: unknown, constraint: string): boolean {
  const pg = asPgConstraintError(err);
  return pg?.code === PG_UNIQUE_VIOLATION && pg.constraint === constraint;
}

/** Name of the violated CHECK constraint, or null for any other error. */
export function checkViolationConstraint(err: unknown): string | null {
  const pg = asPgConstraintError(err);
  return pg?.code === PG_CHECK_VIOLATION ? pg.constraint : null;
}
