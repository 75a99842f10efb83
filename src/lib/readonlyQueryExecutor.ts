import type Database from "better-sqlite3";

import { QueryError } from "../../engine/ai/errors";
import type { QueryExecutor, QueryRow } from "../../engine/workflows/chatPipeline";
import { SCOPE_PARAMETER } from "../../engine/workflows/queryGuard";

const isRow = (value: unknown): value is QueryRow => typeof value === "object" && value !== null;

// Each table the chat may read, with the column that ties a row to an assessment.
const SCOPED_TABLES = [
  { table: "assessments", column: "id" },
  { table: "defects", column: "assessment_id" },
  { table: "chat_messages", column: "assessment_id" },
] as const;

const SCOPE_PREFIX = SCOPED_TABLES.map(
  ({ table, column }) => `${table} AS (SELECT * FROM main.${table} WHERE ${column} = ${SCOPE_PARAMETER})`,
).join(",\n  ");

const schemaQualifiedPattern = /["`[]?\b(main|temp|temporary)\b["`\]]?\s*\./i;
const internalTablePattern = /\b(sqlite_\w+|dbstat)\b/i;
const leadingWithPattern = /^\s*WITH(\s+RECURSIVE)?\s+/i;

/**
 * Rewrites a query so every table name it reads resolves to a view of the
 * scoped assessment's rows. Views come first in the WITH list; a query's own
 * WITH clause is merged after them.
 */
export function scopeQuery(query: string): string {
  const leadingWith = query.match(leadingWithPattern);
  if (!leadingWith) {
    return `WITH ${SCOPE_PREFIX}\n${query}`;
  }
  const recursive = leadingWith[1] ? " RECURSIVE" : "";
  return `WITH${recursive} ${SCOPE_PREFIX},\n${query.slice(leadingWith[0].length)}`;
}

/**
 * Runs chat queries against SQLite. The statement must be a single reader
 * that SQLite itself reports as read-only. It runs with each table shadowed
 * by the scoped assessment's rows, so no predicate in the query can widen it.
 */
export class SqliteReadonlyQueryExecutor implements QueryExecutor {
  constructor(
    private readonly sqlite: Database.Database,
    private readonly maxRows = 200,
  ) {}

  async executeReadOnly(query: string, scopeId: string): Promise<QueryRow[]> {
    if (!query.includes(SCOPE_PARAMETER)) {
      throw new QueryError(`Query must be scoped with ${SCOPE_PARAMETER}`);
    }
    if (schemaQualifiedPattern.test(query)) {
      throw new QueryError("Query must not use schema-qualified table names");
    }
    if (internalTablePattern.test(query)) {
      throw new QueryError("Query must not read SQLite internal tables");
    }

    const statement = this.prepare(query);
    if (!statement.readonly) {
      throw new QueryError("Query executor only runs read-only statements");
    }
    if (!statement.reader) {
      throw new QueryError("Query does not return rows");
    }

    const scoped = this.prepare(scopeQuery(query));
    try {
      const rows: unknown[] = scoped.all({ assessment_id: scopeId });
      return rows.filter(isRow).slice(0, this.maxRows);
    } catch (error) {
      throw new QueryError("Query execution failed", error);
    }
  }

  private prepare(query: string): Database.Statement {
    try {
      return this.sqlite.prepare(query);
    } catch (error) {
      throw new QueryError("Query could not be prepared", error);
    }
  }
}
