import { readBoolean, readNullableString, readString } from "../db/rows.js";
import type { DbSession, SqlExecutor, SqlParams, SqlValue } from "../db/types.js";
import { GatewayError, classifyDatabaseError } from "../errors/GatewayError.js";
import { createLogger } from "../logging/Logger.js";
import { quoteIdentifier, quoteTable, type TableRef } from "../policy/identifiers.js";
import { catalogQuery, loadKeyConstraints, resolveTable, type ResolvedTable } from "../schema/SchemaInspector.js";

const logger = createLogger("insert");

export type ConflictPolicy = "fail" | "ignore" | "update";

export type InsertRow = Record<string, SqlValue>;

export interface InsertRequest {
  table: TableRef;
  rows: InsertRow[];
  conflictPolicy: ConflictPolicy;
  conflictKey?: string[];
}

export interface InsertOutcome {
  table: string;
  conflictPolicy: ConflictPolicy;
  conflictKey: string[];
  received: number;
  inserted: number;
  skipped: number;
  updated: number;
  duplicatesCollapsed: number;
}

const MAX_ROWS_PER_STATEMENT = 1000;
const MAX_PARAMS_PER_STATEMENT = 2000;

const COLUMNS_SQL = `
SELECT c.name AS columnName, c.is_identity AS isIdentity, c.is_computed AS isComputed,
       TYPE_NAME(c.system_type_id) AS dataType, c.collation_name AS collationName
FROM sys.columns c
WHERE c.object_id = OBJECT_ID(@qualifiedName)
ORDER BY c.column_id`;

interface TargetColumn {
  name: string;
  writable: boolean;
  /** True for character columns under a case-insensitive collation. */
  foldsCase: boolean;
}

function schemaMismatch(message: string, detail?: Record<string, string | number>): GatewayError {
  return new GatewayError("SchemaMismatch", message, { detail });
}

/** Maps every row onto the table's own column spelling and checks all rows share one column set. */
export function alignRows(rows: InsertRow[], columns: Map<string, TargetColumn>, table: string): { columns: string[]; rows: InsertRow[] } {
  let shape: string[] | null = null;
  const aligned: InsertRow[] = [];

  for (const [index, row] of rows.entries()) {
    const canonical: InsertRow = {};
    for (const [key, value] of Object.entries(row)) {
      const column = columns.get(key.toLowerCase());
      if (!column) {
        throw schemaMismatch(`Column '${key}' does not exist on table ${table}.`, { column: key, row: index });
      }
      if (!column.writable) {
        throw schemaMismatch(`Column '${column.name}' is generated by the database and cannot be inserted.`, {
          column: column.name,
        });
      }
      if (column.name in canonical) {
        throw schemaMismatch(`Row ${index + 1} names column '${column.name}' more than once.`, { row: index });
      }
      canonical[column.name] = value;
    }

    const names = Object.keys(canonical);
    if (shape === null) {
      shape = names;
    } else if (names.length !== shape.length || !shape.every((name) => name in canonical)) {
      throw schemaMismatch(`Row ${index + 1} has a different set of columns than row 1.`, { row: index });
    }
    aligned.push(canonical);
  }

  return { columns: shape ?? [], rows: aligned };
}

function keyPart(value: SqlValue, foldCase: boolean): string | number | boolean | null {
  if (typeof value === "string") {
    return foldCase ? value.toLowerCase() : value;
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (Buffer.isBuffer(value)) {
    return `0x${value.toString("hex")}`;
  }
  return value;
}

/**
 * Collapses rows sharing a conflict key; the last occurrence wins and keeps its position.
 * String values of the columns `foldsCase` accepts are compared case-insensitively.
 */
export function collapseDuplicates(
  rows: InsertRow[],
  key: string[],
  foldsCase: (column: string) => boolean
): { rows: InsertRow[]; collapsed: number } {
  const byKey = new Map<string, InsertRow>();
  for (const row of rows) {
    const k = JSON.stringify(key.map((column) => keyPart(row[column] ?? null, foldsCase(column))));
    byKey.delete(k);
    byKey.set(k, row);
  }
  return { rows: [...byKey.values()], collapsed: rows.length - byKey.size };
}

export function chunkRows<T>(rows: T[], columnCount: number): T[][] {
  const size = Math.max(1, Math.min(MAX_ROWS_PER_STATEMENT, Math.floor(MAX_PARAMS_PER_STATEMENT / Math.max(1, columnCount))));
  const chunks: T[][] = [];
  for (let i = 0; i < rows.length; i += size) {
    chunks.push(rows.slice(i, i + size));
  }
  return chunks;
}

function valuesClause(rows: InsertRow[], columns: string[]): { sql: string; params: SqlParams } {
  const params: SqlParams = {};
  const tuples = rows.map((row, r) => {
    const names = columns.map((column, c) => {
      const name = `p${r}_${c}`;
      params[name] = row[column] ?? null;
      return `@${name}`;
    });
    return `(${names.join(", ")})`;
  });
  return { sql: tuples.join(",\n       "), params };
}

export function buildInsert(table: ResolvedTable, columns: string[], rows: InsertRow[]): { sql: string; params: SqlParams } {
  const values = valuesClause(rows, columns);
  return {
    sql:
      `INSERT INTO ${quoteTable(table.schema, table.name)} (${columns.map(quoteIdentifier).join(", ")})\n` +
      `VALUES ${values.sql}`,
    params: values.params,
  };
}

export function buildMerge(
  table: ResolvedTable,
  columns: string[],
  key: string[],
  rows: InsertRow[],
  policy: "ignore" | "update"
): { sql: string; params: SqlParams } {
  const values = valuesClause(rows, columns);
  const quoted = columns.map(quoteIdentifier);
  const on = key.map((column) => `target.${quoteIdentifier(column)} = source.${quoteIdentifier(column)}`).join(" AND ");
  const updatable = columns.filter((column) => !key.includes(column));

  const lines = [
    "DECLARE @actions TABLE (mergeAction nvarchar(10));",
    `MERGE INTO ${quoteTable(table.schema, table.name)} WITH (HOLDLOCK) AS target`,
    `USING (VALUES ${values.sql}) AS source (${quoted.join(", ")})`,
    `ON ${on}`,
  ];
  if (policy === "update" && updatable.length > 0) {
    const assignments = updatable.map((column) => `target.${quoteIdentifier(column)} = source.${quoteIdentifier(column)}`);
    lines.push(`WHEN MATCHED THEN UPDATE SET ${assignments.join(", ")}`);
  }
  lines.push(
    `WHEN NOT MATCHED BY TARGET THEN INSERT (${quoted.join(", ")}) VALUES (${quoted.map((c) => `source.${c}`).join(", ")})`,
    // Triggers on the target forbid OUTPUT without INTO
    "OUTPUT $action INTO @actions (mergeAction);",
    "SELECT mergeAction FROM @actions;"
  );
  return { sql: lines.join("\n"), params: values.params };
}

export class InsertHandler {
  async insertRows(session: DbSession, request: InsertRequest): Promise<InsertOutcome> {
    const table = await resolveTable(session, request.table);
    const label = `${table.schema}.${table.name}`;
    const targetColumns = await this.loadColumns(session, table);
    const aligned = alignRows(request.rows, targetColumns, label);

    const key = request.conflictPolicy === "fail" ? [] : await this.conflictKey(session, table, request, targetColumns);
    for (const column of key) {
      if (!aligned.columns.includes(column)) {
        throw schemaMismatch(`Rows must include conflict key column '${column}'.`, { column });
      }
    }

    const foldsCase = (column: string) => targetColumns.get(column.toLowerCase())?.foldsCase ?? false;
    const { rows, collapsed } =
      key.length > 0 ? collapseDuplicates(aligned.rows, key, foldsCase) : { rows: aligned.rows, collapsed: 0 };
    if (collapsed > 0) {
      logger.debug(`Collapsed ${collapsed} duplicate row(s) on ${key.join(", ")}`);
    }

    const outcome: InsertOutcome = {
      table: label,
      conflictPolicy: request.conflictPolicy,
      conflictKey: key,
      received: request.rows.length,
      inserted: 0,
      skipped: 0,
      updated: 0,
      duplicatesCollapsed: collapsed,
    };

    try {
      await session.transaction(async (tx) => {
        for (const chunk of chunkRows(rows, aligned.columns.length)) {
          await this.writeChunk(tx, table, aligned.columns, key, chunk, request.conflictPolicy, outcome);
        }
      });
    } catch (error) {
      throw classifyDatabaseError(error, "Insert rolled back; no rows were written");
    }

    logger.info(`Inserted into ${label}`, {
      inserted: outcome.inserted,
      updated: outcome.updated,
      skipped: outcome.skipped,
    });
    return outcome;
  }

  private async writeChunk(
    tx: SqlExecutor,
    table: ResolvedTable,
    columns: string[],
    key: string[],
    chunk: InsertRow[],
    policy: ConflictPolicy,
    outcome: InsertOutcome
  ): Promise<void> {
    if (policy === "fail" || key.length === 0) {
      const statement = buildInsert(table, columns, chunk);
      const { rowsAffected } = await tx.query(statement.sql, statement.params);
      outcome.inserted += rowsAffected[0] ?? chunk.length;
      return;
    }

    const statement = buildMerge(table, columns, key, chunk, policy);
    const output = await tx.query(statement.sql, statement.params);
    const rows = output.recordsets.at(-1) ?? output.rows;
    const inserted = rows.filter((row) => readString(row, "mergeAction") === "INSERT").length;
    const updated = rows.filter((row) => readString(row, "mergeAction") === "UPDATE").length;
    outcome.inserted += inserted;
    outcome.updated += updated;
    outcome.skipped += chunk.length - inserted - updated;
  }

  private async loadColumns(session: DbSession, table: ResolvedTable): Promise<Map<string, TargetColumn>> {
    const { rows } = await catalogQuery(session, COLUMNS_SQL, { qualifiedName: quoteTable(table.schema, table.name) });
    const columns = new Map<string, TargetColumn>();
    for (const row of rows) {
      const name = readString(row, "columnName");
      const writable =
        !readBoolean(row, "isIdentity") &&
        !readBoolean(row, "isComputed") &&
        !["timestamp", "rowversion"].includes(readString(row, "dataType").toLowerCase());
      const collation = readNullableString(row, "collationName");
      const foldsCase = collation !== null && /_CI(_|$)/i.test(collation);
      columns.set(name.toLowerCase(), { name, writable, foldsCase });
    }
    return columns;
  }

  /**
   * Explicit key, else the primary key, else the first unique constraint.
   * Constraints over generated columns are passed over: new rows cannot
   * collide on them. When only such constraints exist the key is empty and
   * the rows go in with a plain INSERT.
   */
  private async conflictKey(
    session: DbSession,
    table: ResolvedTable,
    request: InsertRequest,
    columns: Map<string, TargetColumn>
  ): Promise<string[]> {
    if (request.conflictKey && request.conflictKey.length > 0) {
      return request.conflictKey.map((name) => {
        const column = columns.get(name.toLowerCase());
        if (!column) {
          throw schemaMismatch(`Conflict key column '${name}' does not exist on table ${table.schema}.${table.name}.`, {
            column: name,
          });
        }
        return column.name;
      });
    }

    const constraints = await loadKeyConstraints(session, table);
    const [constraint] = constraints.filter((candidate) =>
      candidate.columns.every((name) => columns.get(name.toLowerCase())?.writable === true)
    );
    if (!constraint && constraints.length > 0) {
      logger.debug(`Every key on ${table.schema}.${table.name} covers a generated column; inserting without a conflict key`);
      return [];
    }
    if (!constraint) {
      throw new GatewayError(
        "ConflictKeyMissing",
        `Table ${table.schema}.${table.name} has no primary key or unique constraint; pass 'conflict_key' or use conflict_policy 'fail'.`,
        { detail: { table: `${table.schema}.${table.name}` } }
      );
    }
    return constraint.columns;
  }
}
