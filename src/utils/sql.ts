/**
 * SQL helpers shared by repositories
 */

export interface SetClause {
  clause: string;
  values: unknown[];
}

/**
 * Build the SET list of a partial UPDATE.
 *
 * Only columns whose value is not undefined are included; null is written
 * as NULL. Placeholders are numbered from 1 so the caller appends the WHERE
 * parameter as `$${values.length + 1}`.
 */
export function buildSetClause<T extends object>(
  changes: T,
  columns: readonly (keyof T & string)[]
): SetClause {
  const assignments: string[] = [];
  const values: unknown[] = [];

  for (const column of columns) {
    const value = changes[column];
    if (value === undefined) {
      continue;
    }
    values.push(value);
    assignments.push(`${column} = $${values.length}`);
  }

  return { clause: assignments.join(', '), values };
}
