export type InsertStatement = {
  text: string;
  values: unknown[];
};

/**
 * Multi-row insert with positional parameters, one tuple per row in
 * `columns` order. Missing properties are sent as null.
 */
export function buildInsert(
  table: string,
  columns: string[],
  rows: Record<string, unknown>[],
  suffix = ''
): InsertStatement {
  const values: unknown[] = [];
  const tuples = rows.map((row) => {
    const placeholders = columns.map((column) => {
      values.push(row[column] ?? null);
      return `$${values.length}`;
    });
    return `(${placeholders.join(', ')})`;
  });
  const text = `insert into ${table} (${columns.join(', ')}) values ${tuples.join(', ')}${suffix ? ` ${suffix}` : ''}`;
  return { text, values };
}

export function chunk<T>(items: T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let index = 0; index < items.length; index += size) {
    chunks.push(items.slice(index, index + size));
  }
  return chunks;
}
