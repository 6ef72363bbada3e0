import { classifyDatabaseError, GatewayError } from "../errors/GatewayError.js";
import { formatTableRef, quoteTable, type TableRef } from "../policy/identifiers.js";
import { readBoolean, readNullableString, readNumber, readString } from "../db/rows.js";
import type { ColumnMeta, QueryOutput, Row, SqlExecutor, SqlParams } from "../db/types.js";

export type KeyRole = "primary" | "unique" | "foreign" | "none";

export interface ColumnDescriptor {
  name: string;
  type: string;
  maxLength: number | null;
  nullable: boolean;
  default: string | null;
  position: number;
  keyRole: KeyRole;
}

export interface ForeignKeyDescriptor {
  name: string;
  columns: string[];
  referencedSchema: string;
  referencedTable: string;
  referencedColumns: string[];
}

export interface IndexDescriptor {
  name: string;
  type: string;
  unique: boolean;
  primaryKey: boolean;
  columns: string[];
}

export interface TableDescriptor {
  schema: string;
  name: string;
  /** Absent from a schema listing requested without columns. */
  columns?: ColumnDescriptor[];
  primaryKey: string[];
  foreignKeys: ForeignKeyDescriptor[];
  indexes?: IndexDescriptor[];
}

export interface SchemaInfo {
  database: string;
  tableCount: number;
  tables: TableDescriptor[];
}

export interface TableInfo extends TableDescriptor {
  columns: ColumnDescriptor[];
  indexes: IndexDescriptor[];
  rowCount: number | null;
  sampleColumns: ColumnMeta[];
  sampleRows: Row[];
}

export interface KeyConstraint {
  name: string;
  type: "PRIMARY KEY" | "UNIQUE";
  columns: string[];
}

/** A table that is known to exist, with its schema resolved. */
export interface ResolvedTable {
  schema: string;
  name: string;
}

export interface SchemaOptions {
  includeColumns: boolean;
  includeIndexes: boolean;
  /** Limits the listing to one table. */
  table?: TableRef;
}

export interface SchemaInspector {
  getSchema(executor: SqlExecutor, options: SchemaOptions): Promise<SchemaInfo>;
  getTableInfo(executor: SqlExecutor, table: TableRef, sampleRows: number): Promise<TableInfo>;
}

const DEFAULT_SCHEMA = "dbo";

// Every catalog query takes @schemaName and @tableName; NULL means "all".
const TABLE_FILTER = "(@schemaName IS NULL OR {schema} = @schemaName) AND (@tableName IS NULL OR {table} = @tableName)";

function filter(schemaColumn: string, tableColumn: string): string {
  return TABLE_FILTER.replace("{schema}", schemaColumn).replace("{table}", tableColumn);
}

const TABLES_SQL = `
SELECT t.TABLE_SCHEMA AS schemaName, t.TABLE_NAME AS tableName
FROM INFORMATION_SCHEMA.TABLES t
WHERE t.TABLE_TYPE = 'BASE TABLE'
  AND ${filter("t.TABLE_SCHEMA", "t.TABLE_NAME")}
ORDER BY t.TABLE_SCHEMA, t.TABLE_NAME`;

const COLUMNS_SQL = `
SELECT c.TABLE_SCHEMA AS schemaName, c.TABLE_NAME AS tableName, c.COLUMN_NAME AS columnName,
       c.DATA_TYPE AS dataType, c.CHARACTER_MAXIMUM_LENGTH AS maxLength, c.IS_NULLABLE AS isNullable,
       c.COLUMN_DEFAULT AS defaultValue, c.ORDINAL_POSITION AS position
FROM INFORMATION_SCHEMA.COLUMNS c
JOIN INFORMATION_SCHEMA.TABLES t
  ON t.TABLE_SCHEMA = c.TABLE_SCHEMA AND t.TABLE_NAME = c.TABLE_NAME AND t.TABLE_TYPE = 'BASE TABLE'
WHERE ${filter("c.TABLE_SCHEMA", "c.TABLE_NAME")}
ORDER BY c.TABLE_SCHEMA, c.TABLE_NAME, c.ORDINAL_POSITION`;

const KEY_CONSTRAINTS_SQL = `
SELECT tc.TABLE_SCHEMA AS schemaName, tc.TABLE_NAME AS tableName, tc.CONSTRAINT_NAME AS constraintName,
       tc.CONSTRAINT_TYPE AS constraintType, kcu.COLUMN_NAME AS columnName, kcu.ORDINAL_POSITION AS position
FROM INFORMATION_SCHEMA.TABLE_CONSTRAINTS tc
JOIN INFORMATION_SCHEMA.KEY_COLUMN_USAGE kcu
  ON kcu.CONSTRAINT_SCHEMA = tc.CONSTRAINT_SCHEMA AND kcu.CONSTRAINT_NAME = tc.CONSTRAINT_NAME
WHERE tc.CONSTRAINT_TYPE IN ('PRIMARY KEY', 'UNIQUE')
  AND ${filter("tc.TABLE_SCHEMA", "tc.TABLE_NAME")}
ORDER BY tc.TABLE_SCHEMA, tc.TABLE_NAME, tc.CONSTRAINT_NAME, kcu.ORDINAL_POSITION`;

const FOREIGN_KEYS_SQL = `
SELECT OBJECT_SCHEMA_NAME(fk.parent_object_id) AS schemaName, OBJECT_NAME(fk.parent_object_id) AS tableName,
       fk.name AS constraintName, COL_NAME(fkc.parent_object_id, fkc.parent_column_id) AS columnName,
       OBJECT_SCHEMA_NAME(fk.referenced_object_id) AS referencedSchema,
       OBJECT_NAME(fk.referenced_object_id) AS referencedTable,
       COL_NAME(fkc.referenced_object_id, fkc.referenced_column_id) AS referencedColumn,
       fkc.constraint_column_id AS position
FROM sys.foreign_keys fk
JOIN sys.foreign_key_columns fkc ON fkc.constraint_object_id = fk.object_id
WHERE ${filter("OBJECT_SCHEMA_NAME(fk.parent_object_id)", "OBJECT_NAME(fk.parent_object_id)")}
ORDER BY schemaName, tableName, constraintName, position`;

const INDEXES_SQL = `
SELECT s.name AS schemaName, t.name AS tableName, i.name AS indexName, i.type_desc AS indexType,
       i.is_unique AS isUnique, i.is_primary_key AS isPrimaryKey, c.name AS columnName, ic.key_ordinal AS position
FROM sys.indexes i
JOIN sys.tables t ON t.object_id = i.object_id
JOIN sys.schemas s ON s.schema_id = t.schema_id
JOIN sys.index_columns ic ON ic.object_id = i.object_id AND ic.index_id = i.index_id AND ic.is_included_column = 0
JOIN sys.columns c ON c.object_id = ic.object_id AND c.column_id = ic.column_id
WHERE i.name IS NOT NULL
  AND ${filter("s.name", "t.name")}
ORDER BY s.name, t.name, i.name, ic.key_ordinal`;

const ROW_COUNT_SQL = `
SELECT SUM(p.rows) AS approximateRows
FROM sys.partitions p
WHERE p.object_id = OBJECT_ID(@qualifiedName) AND p.index_id IN (0, 1)`;

const DATABASE_SQL = "SELECT DB_NAME() AS databaseName";

function scopeParams(scope?: ResolvedTable): SqlParams {
  return { schemaName: scope?.schema ?? null, tableName: scope?.name ?? null };
}

/** Runs a catalog query, mapping driver failures onto the error taxonomy. */
export async function catalogQuery(executor: SqlExecutor, text: string, params?: SqlParams): Promise<QueryOutput> {
  try {
    return await executor.query(text, params);
  } catch (error) {
    throw classifyDatabaseError(error, "Catalog query failed");
  }
}

const tableKey = (schema: string, name: string) => `${schema}.${name}`;

function groupBy(rows: Row[], key: (row: Row) => string): Map<string, Row[]> {
  const groups = new Map<string, Row[]>();
  for (const row of rows) {
    const k = key(row);
    const group = groups.get(k);
    if (group) {
      group.push(row);
    } else {
      groups.set(k, [row]);
    }
  }
  return groups;
}

const rowTableKey = (row: Row) => tableKey(readString(row, "schemaName"), readString(row, "tableName"));

/**
 * Resolves a caller's table reference against the catalog. An unqualified
 * name found in several schemas resolves to dbo when dbo has it.
 */
export async function resolveTable(executor: SqlExecutor, ref: TableRef): Promise<ResolvedTable> {
  const { rows } = await catalogQuery(executor, TABLES_SQL, {
    schemaName: ref.schema ?? null,
    tableName: ref.name,
  });
  const matches = rows.map((row) => ({ schema: readString(row, "schemaName"), name: readString(row, "tableName") }));

  if (matches.length === 1) {
    return matches[0];
  }
  if (matches.length === 0) {
    throw new GatewayError("NotFound", `Table '${formatTableRef(ref)}' does not exist or is not visible.`, {
      detail: { table: formatTableRef(ref) },
    });
  }
  const preferred = matches.find((match) => match.schema.toLowerCase() === DEFAULT_SCHEMA);
  if (preferred) {
    return preferred;
  }
  throw new GatewayError(
    "NotFound",
    `Table name '${ref.name}' is ambiguous; qualify it with one of the schemas: ${matches.map((m) => m.schema).join(", ")}.`,
    { detail: { table: ref.name, schemas: matches.map((m) => m.schema) } }
  );
}

function toKeyConstraints(rows: Row[]): KeyConstraint[] {
  const constraints: KeyConstraint[] = [];
  for (const [name, group] of groupBy(rows, (row) => readString(row, "constraintName"))) {
    constraints.push({
      name,
      type: readString(group[0], "constraintType") === "PRIMARY KEY" ? "PRIMARY KEY" : "UNIQUE",
      columns: group.map((row) => readString(row, "columnName")),
    });
  }
  return constraints;
}

/** Primary key first, then unique constraints in name order. */
export async function loadKeyConstraints(executor: SqlExecutor, table: ResolvedTable): Promise<KeyConstraint[]> {
  const { rows } = await catalogQuery(executor, KEY_CONSTRAINTS_SQL, scopeParams(table));
  const constraints = toKeyConstraints(rows);
  return [
    ...constraints.filter((c) => c.type === "PRIMARY KEY"),
    ...constraints.filter((c) => c.type === "UNIQUE"),
  ];
}

function toForeignKeys(rows: Row[]): ForeignKeyDescriptor[] {
  return [...groupBy(rows, (row) => readString(row, "constraintName"))].map(([name, group]) => ({
    name,
    columns: group.map((row) => readString(row, "columnName")),
    referencedSchema: readString(group[0], "referencedSchema"),
    referencedTable: readString(group[0], "referencedTable"),
    referencedColumns: group.map((row) => readString(row, "referencedColumn")),
  }));
}

function toIndexes(rows: Row[]): IndexDescriptor[] {
  return [...groupBy(rows, (row) => readString(row, "indexName"))].map(([name, group]) => ({
    name,
    type: readString(group[0], "indexType"),
    unique: readBoolean(group[0], "isUnique"),
    primaryKey: readBoolean(group[0], "isPrimaryKey"),
    columns: group.map((row) => readString(row, "columnName")),
  }));
}

function keyRole(column: string, primaryKey: string[], foreign: Set<string>, unique: Set<string>): KeyRole {
  if (primaryKey.includes(column)) return "primary";
  if (foreign.has(column)) return "foreign";
  if (unique.has(column)) return "unique";
  return "none";
}

interface CatalogSnapshot {
  tables: Row[];
  columns: Map<string, Row[]> | null;
  keys: Map<string, Row[]>;
  foreignKeys: Map<string, Row[]>;
  indexes: Map<string, Row[]> | null;
}

function describe(schema: string, name: string, catalog: CatalogSnapshot): TableDescriptor {
  const key = tableKey(schema, name);
  const constraints = toKeyConstraints(catalog.keys.get(key) ?? []);
  const primaryKey = constraints.find((c) => c.type === "PRIMARY KEY")?.columns ?? [];
  const unique = new Set(constraints.filter((c) => c.type === "UNIQUE").flatMap((c) => c.columns));
  const foreignKeys = toForeignKeys(catalog.foreignKeys.get(key) ?? []);
  const foreign = new Set(foreignKeys.flatMap((fk) => fk.columns));

  const descriptor: TableDescriptor = { schema, name, primaryKey, foreignKeys };
  if (catalog.columns) {
    descriptor.columns = (catalog.columns.get(key) ?? []).map((row) => {
      const columnName = readString(row, "columnName");
      return {
        name: columnName,
        type: readString(row, "dataType"),
        maxLength: readNumber(row, "maxLength"),
        nullable: readBoolean(row, "isNullable"),
        default: readNullableString(row, "defaultValue"),
        position: readNumber(row, "position") ?? 0,
        keyRole: keyRole(columnName, primaryKey, foreign, unique),
      };
    });
  }
  if (catalog.indexes) {
    descriptor.indexes = toIndexes(catalog.indexes.get(key) ?? []);
  }
  return descriptor;
}

/**
 * Reads table structure from INFORMATION_SCHEMA and the sys catalog views.
 * Catalog queries are ordered, so repeated calls over an unchanged schema
 * produce identical output.
 */
export class CatalogSchemaInspector implements SchemaInspector {
  private async snapshot(
    executor: SqlExecutor,
    include: { columns: boolean; indexes: boolean },
    scope?: ResolvedTable
  ): Promise<CatalogSnapshot> {
    const params = scopeParams(scope);
    const tables = await catalogQuery(executor, TABLES_SQL, params);
    const columns = include.columns ? await catalogQuery(executor, COLUMNS_SQL, params) : null;
    const keys = await catalogQuery(executor, KEY_CONSTRAINTS_SQL, params);
    const foreignKeys = await catalogQuery(executor, FOREIGN_KEYS_SQL, params);
    const indexes = include.indexes ? await catalogQuery(executor, INDEXES_SQL, params) : null;
    return {
      tables: tables.rows,
      columns: columns ? groupBy(columns.rows, rowTableKey) : null,
      keys: groupBy(keys.rows, rowTableKey),
      foreignKeys: groupBy(foreignKeys.rows, rowTableKey),
      indexes: indexes ? groupBy(indexes.rows, rowTableKey) : null,
    };
  }

  async getSchema(executor: SqlExecutor, options: SchemaOptions): Promise<SchemaInfo> {
    const { rows } = await catalogQuery(executor, DATABASE_SQL);
    const scope = options.table ? await resolveTable(executor, options.table) : undefined;
    const catalog = await this.snapshot(
      executor,
      { columns: options.includeColumns, indexes: options.includeIndexes },
      scope
    );
    const tables = catalog.tables.map((row) =>
      describe(readString(row, "schemaName"), readString(row, "tableName"), catalog)
    );
    return {
      database: rows[0] ? readString(rows[0], "databaseName") : "",
      tableCount: tables.length,
      tables,
    };
  }

  async getTableInfo(executor: SqlExecutor, table: TableRef, sampleRows: number): Promise<TableInfo> {
    const resolved = await resolveTable(executor, table);
    const catalog = await this.snapshot(executor, { columns: true, indexes: true }, resolved);
    const descriptor = describe(resolved.schema, resolved.name, catalog);
    const qualifiedName = quoteTable(resolved.schema, resolved.name);

    const count = await catalogQuery(executor, ROW_COUNT_SQL, { qualifiedName });
    const rowCount = count.rows[0] ? readNumber(count.rows[0], "approximateRows") : null;

    let sample: QueryOutput | null = null;
    if (sampleRows > 0) {
      try {
        sample = await executor.query(`SELECT TOP (@sampleRows) * FROM ${qualifiedName}`, { sampleRows });
      } catch (error) {
        throw classifyDatabaseError(error, `Could not read sample rows from ${resolved.schema}.${resolved.name}`);
      }
    }

    return {
      ...descriptor,
      columns: descriptor.columns ?? [],
      indexes: descriptor.indexes ?? [],
      rowCount,
      sampleColumns: sample?.columns ?? [],
      sampleRows: sample?.rows ?? [],
    };
  }
}
