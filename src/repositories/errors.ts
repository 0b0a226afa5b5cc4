/**
 * Raised by a repository when a write references a company that does not exist.
 */
export class ForeignKeyViolationError extends Error {
  constructor(
    readonly table: string,
    readonly column: string,
    readonly value: number
  ) {
    super(`FOREIGN KEY constraint failed: ${table}.${column} = ${value}`);
    this.name = 'ForeignKeyViolationError';
  }
}

const SQLITE_FOREIGN_KEY = /FOREIGN KEY constraint failed/i;

/**
 * True for foreign key failures of either storage driver. SQLite errors
 * arrive wrapped by Drizzle, so the `cause` chain is searched as well.
 */
export function isForeignKeyViolation(error: unknown): boolean {
  let current: unknown = error;
  for (let depth = 0; depth < 5 && current instanceof Error; depth++) {
    if (current instanceof ForeignKeyViolationError || SQLITE_FOREIGN_KEY.test(current.message)) {
      return true;
    }
    current = current.cause;
  }
  return false;
}
