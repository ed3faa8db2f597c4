/**
 * Query Builder Utilities
 * =======================
 *
 * Parameterized SQL helpers. Values always travel as bind parameters,
 * never interpolated into the statement text.
 *
 * @module @expsync/storage/utils
 */

/** Largest bind parameter count the Postgres protocol accepts in one statement */
export const MAX_BIND_PARAMETERS = 65_535;

export interface ParameterizedQuery {
  text: string;
  params: unknown[];
}

/**
 * Build a single INSERT with one VALUES tuple per row.
 *
 * @param suffix - Appended verbatim, e.g. an ON CONFLICT or RETURNING clause
 */
export function buildMultiRowInsert(
  table: string,
  columns: readonly string[],
  rows: ReadonlyArray<readonly unknown[]>,
  suffix?: string
): ParameterizedQuery {
  if (rows.length === 0) {
    throw new Error(`Cannot build INSERT into ${table} without rows`);
  }

  const params: unknown[] = [];
  const tuples = rows.map((row) => {
    if (row.length !== columns.length) {
      throw new Error(
        `Row for ${table} has ${row.length} values but ${columns.length} columns were given`
      );
    }
    const placeholders = row.map((value) => {
      params.push(value);
      return `$${params.length}`;
    });
    return `(${placeholders.join(', ')})`;
  });

  const text = `INSERT INTO ${table} (${columns.join(', ')}) VALUES ${tuples.join(', ')}${
    suffix ? ` ${suffix}` : ''
  }`;
  return { text, params };
}

/**
 * Split a batch insert into as many statements as the bind parameter limit
 * requires. Run them in one transaction to keep the batch atomic.
 */
export function buildChunkedInserts(
  table: string,
  columns: readonly string[],
  rows: ReadonlyArray<readonly unknown[]>,
  suffix?: string,
  maxParameters: number = MAX_BIND_PARAMETERS
): ParameterizedQuery[] {
  const rowsPerStatement = Math.floor(maxParameters / columns.length);
  if (rowsPerStatement < 1) {
    throw new Error(`${table} has more columns than one statement can bind`);
  }

  const queries: ParameterizedQuery[] = [];
  for (let start = 0; start < rows.length; start += rowsPerStatement) {
    queries.push(buildMultiRowInsert(table, columns, rows.slice(start, start + rowsPerStatement), suffix));
  }
  return queries;
}

/**
 * `$start, $start+1, ...` placeholders for an IN list
 */
export function buildPlaceholderList(count: number, start: number = 1): string {
  return Array.from({ length: count }, (_, i) => `$${start + i}`).join(', ');
}
