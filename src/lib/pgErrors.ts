type PgError = {
  code?: string;
  constraint?: string;
};

export const PG_UNIQUE_VIOLATION = '23505';

function asPgError(err: unknown): PgError | null {
  if (!err || typeof err !== 'object') return null;
  const code = 'code' in err && typeof err.code === 'string' ? err.code : undefined;
  const constraint = 'constraint' in err && typeof err.constraint === 'string' ? err.constraint : undefined;
  return { code, constraint };
}

export function isPgError(err: unknown, code: string, constraint?: string): boolean {
  const pgErr = asPgError(err);
  if (!pgErr || pgErr.code !== code) return false;
  return constraint === undefined || pgErr.constraint === constraint;
}
