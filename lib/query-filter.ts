/**
 * Query Filter Module
 *
 * Builds parameterized SQL fragments from conjunctive column filters:
 * exact match, case-insensitive partial match, and inclusive ranges.
 * Column names come from typed whitelists, never from user input.
 */

import type { InValue } from "@libsql/client";

export type FilterOp = "eq" | "ilike" | "gte" | "lte";

export type FilterValue = string | number | boolean;

export interface ColumnFilter<C extends string> {
  column: C;
  op: FilterOp;
  value: FilterValue;
}

export interface SqlFragment {
  sql: string;
  args: InValue[];
}

export interface WhereOptions<C extends string> {
  /** Columns holding ISO timestamps; ranges on these compare by julianday() */
  timestampColumns?: readonly C[];
}

/**
 * Escape LIKE wildcards so user text matches literally
 */
export function escapeLike(text: string): string {
  return text.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

/**
 * Lowercase form used for case-insensitive matching. SQLite LIKE folds
 * ASCII letters only, so text with accents is matched against a column
 * holding this form.
 */
export function foldCase(text: string): string {
  return text.normalize("NFC").toLowerCase();
}

function toSqlValue(value: FilterValue): InValue {
  if (typeof value === "boolean") return value ? 1 : 0;
  return value;
}

function filterToSql<C extends string>(
  filter: ColumnFilter<C>,
  allowed: ReadonlySet<string>,
  timestampColumns: ReadonlySet<string>
): SqlFragment {
  if (!allowed.has(filter.column)) {
    throw new Error(`Unknown filter column: ${filter.column}`);
  }
  const column = filter.column;

  switch (filter.op) {
    case "eq":
      return { sql: `${column} = ?`, args: [toSqlValue(filter.value)] };
    case "ilike":
      // SQLite LIKE is case-insensitive for ASCII letters
      return {
        sql: `${column} LIKE ? ESCAPE '\\'`,
        args: [`%${escapeLike(String(filter.value))}%`],
      };
    case "gte":
    case "lte": {
      const cmp = filter.op === "gte" ? ">=" : "<=";
      if (timestampColumns.has(column)) {
        return {
          sql: `julianday(${column}) ${cmp} julianday(?)`,
          args: [toSqlValue(filter.value)],
        };
      }
      return { sql: `${column} ${cmp} ?`, args: [toSqlValue(filter.value)] };
    }
  }
}

/**
 * Build a WHERE clause joining every filter with AND.
 * Returns an empty fragment when there are no filters.
 */
export function buildWhereClause<C extends string>(
  filters: ColumnFilter<C>[],
  allowedColumns: readonly C[],
  options: WhereOptions<C> = {}
): SqlFragment {
  if (filters.length === 0) {
    return { sql: "", args: [] };
  }

  const allowed = new Set<string>(allowedColumns);
  const timestamps = new Set<string>(options.timestampColumns ?? []);
  const parts = filters.map((f) => filterToSql(f, allowed, timestamps));

  return {
    sql: `WHERE ${parts.map((p) => p.sql).join(" AND ")}`,
    args: parts.flatMap((p) => p.args),
  };
}

/**
 * Build "col = ?, col = ?" for the defined keys of a change set.
 * Keys outside the whitelist are rejected; undefined values are skipped.
 */
export function buildSetClause<C extends string>(
  changes: Partial<Record<C, InValue>>,
  allowedColumns: readonly C[]
): SqlFragment {
  const assignments: string[] = [];
  const args: InValue[] = [];

  for (const column of allowedColumns) {
    const value = changes[column];
    if (value === undefined) continue;
    assignments.push(`${column} = ?`);
    args.push(value);
  }

  return { sql: assignments.join(", "), args };
}
