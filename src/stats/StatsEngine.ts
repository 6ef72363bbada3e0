import type { LimitsConfig } from "../config/ConfigLoader.js";
import { withTimeout } from "../db/ConnectionManager.js";
import { readDate, readNumber, readString } from "../db/rows.js";
import type { DbSession, QueryOutput } from "../db/types.js";
import { GatewayError, errorMessage } from "../errors/GatewayError.js";
import { createLogger } from "../logging/Logger.js";
import { quoteTable, type TableRef } from "../policy/identifiers.js";
import { catalogQuery, resolveTable, type ResolvedTable } from "../schema/SchemaInspector.js";

const logger = createLogger("stats");

export type RowCountSource = "catalog" | "count" | "unavailable";

export interface TableStats {
  schema: string;
  table: string;
  rowCount: number | null;
  totalSpaceMb: number;
  usedSpaceMb: number;
  unusedSpaceMb: number;
  indexCount: number;
  lastModified: string | null;
  rowCountSource: RowCountSource;
}

export type SearchScope = "table" | "column" | "both";

export interface SearchMatch {
  schema: string;
  table: string;
  column?: string;
  kind: "table-name" | "column-name";
  matched: string;
  dataType?: string;
}

const TABLE_STATS_SQL = `
SELECT s.name AS schemaName, t.name AS tableName,
       (SELECT SUM(p2.rows) FROM sys.partitions p2
         WHERE p2.object_id = t.object_id AND p2.index_id IN (0, 1)) AS catalogRows,
       (SELECT COUNT(*) FROM sys.indexes i
         WHERE i.object_id = t.object_id AND i.index_id > 0) AS indexCount,
       CAST(ROUND((SUM(a.total_pages) * 8) / 1024.00, 2) AS NUMERIC(36, 2)) AS totalSpaceMb,
       CAST(ROUND((SUM(a.used_pages) * 8) / 1024.00, 2) AS NUMERIC(36, 2)) AS usedSpaceMb,
       CAST(ROUND(((SUM(a.total_pages) - SUM(a.used_pages)) * 8) / 1024.00, 2) AS NUMERIC(36, 2)) AS unusedSpaceMb
FROM sys.tables t
JOIN sys.schemas s ON s.schema_id = t.schema_id
LEFT JOIN sys.partitions p ON p.object_id = t.object_id
LEFT JOIN sys.allocation_units a ON a.container_id = p.partition_id
WHERE t.is_ms_shipped = 0
  AND (@schemaName IS NULL OR s.name = @schemaName)
  AND (@tableName IS NULL OR t.name = @tableName)
GROUP BY s.name, t.name, t.object_id
ORDER BY totalSpaceMb DESC, s.name, t.name`;

const LAST_MODIFIED_SQL = `
SELECT OBJECT_SCHEMA_NAME(u.object_id) AS schemaName, OBJECT_NAME(u.object_id) AS tableName,
       MAX(u.last_user_update) AS lastUserUpdate
FROM sys.dm_db_index_usage_stats u
WHERE u.database_id = DB_ID()
GROUP BY u.object_id`;

const TABLE_SEARCH_SQL = `
SELECT t.TABLE_SCHEMA AS schemaName, t.TABLE_NAME AS tableName
FROM INFORMATION_SCHEMA.TABLES t
WHERE t.TABLE_TYPE = 'BASE TABLE' AND CHARINDEX(LOWER(@pattern), LOWER(t.TABLE_NAME)) > 0
ORDER BY t.TABLE_SCHEMA, t.TABLE_NAME`;

const COLUMN_SEARCH_SQL = `
SELECT c.TABLE_SCHEMA AS schemaName, c.TABLE_NAME AS tableName, c.COLUMN_NAME AS columnName, c.DATA_TYPE AS dataType
FROM INFORMATION_SCHEMA.COLUMNS c
JOIN INFORMATION_SCHEMA.TABLES t
  ON t.TABLE_SCHEMA = c.TABLE_SCHEMA AND t.TABLE_NAME = c.TABLE_NAME AND t.TABLE_TYPE = 'BASE TABLE'
WHERE CHARINDEX(LOWER(@pattern), LOWER(c.COLUMN_NAME)) > 0
ORDER BY c.TABLE_SCHEMA, c.TABLE_NAME, c.ORDINAL_POSITION`;

/**
 * Returns the part of `name` matching `pattern` case-insensitively, or null.
 * Plain substring comparison: `%`, `_` and brackets are ordinary characters.
 */
export function literalMatch(name: string, pattern: string): string | null {
  const index = name.toLowerCase().indexOf(pattern.toLowerCase());
  return index < 0 ? null : name.slice(index, index + pattern.length);
}

export class StatsEngine {
  constructor(private readonly limits: Pick<LimitsConfig, "countTimeoutMs">) {}

  async getTableStats(session: DbSession, table?: TableRef): Promise<TableStats[]> {
    const scope: ResolvedTable | undefined = table ? await resolveTable(session, table) : undefined;
    const { rows } = await catalogQuery(session, TABLE_STATS_SQL, {
      schemaName: scope?.schema ?? null,
      tableName: scope?.name ?? null,
    });
    const lastModified = await this.lastModified(session);

    const stats: TableStats[] = [];
    for (const row of rows) {
      const schema = readString(row, "schemaName");
      const name = readString(row, "tableName");
      const catalogRows = readNumber(row, "catalogRows");
      const counted = catalogRows === null ? await this.countRows(session, { schema, name }) : null;

      stats.push({
        schema,
        table: name,
        rowCount: catalogRows ?? counted,
        totalSpaceMb: readNumber(row, "totalSpaceMb") ?? 0,
        usedSpaceMb: readNumber(row, "usedSpaceMb") ?? 0,
        unusedSpaceMb: readNumber(row, "unusedSpaceMb") ?? 0,
        indexCount: readNumber(row, "indexCount") ?? 0,
        lastModified: lastModified.get(`${schema}.${name}`) ?? null,
        rowCountSource: catalogRows !== null ? "catalog" : counted !== null ? "count" : "unavailable",
      });
    }
    return stats;
  }

  /** Usage statistics need VIEW SERVER STATE; without it every table reports null. */
  private async lastModified(session: DbSession): Promise<Map<string, string>> {
    const byTable = new Map<string, string>();
    let output: QueryOutput;
    try {
      output = await catalogQuery(session, LAST_MODIFIED_SQL);
    } catch (error) {
      if (error instanceof GatewayError && error.kind === "PermissionDenied") {
        logger.debug("Index usage statistics are not readable; lastModified left empty");
        return byTable;
      }
      throw error;
    }
    for (const row of output.rows) {
      const updated = readDate(row, "lastUserUpdate");
      if (updated) {
        byTable.set(`${readString(row, "schemaName")}.${readString(row, "tableName")}`, updated);
      }
    }
    return byTable;
  }

  private async countRows(session: DbSession, table: ResolvedTable): Promise<number | null> {
    const counting = session.query(`SELECT COUNT_BIG(*) AS total FROM ${quoteTable(table.schema, table.name)}`);
    try {
      const { rows } = await withTimeout(
        counting,
        this.limits.countTimeoutMs,
        () => new GatewayError("Timeout", `Row count exceeded ${this.limits.countTimeoutMs}ms`),
        () => session.cancel()
      );
      return rows[0] ? readNumber(rows[0], "total") : null;
    } catch (error) {
      logger.warn(`Row count for ${table.schema}.${table.name} unavailable`, { error: errorMessage(error) });
      // The session must be idle again before the next statement goes out.
      await counting.then(
        () => undefined,
        (cancelled: unknown) => logger.debug("Cancelled row count settled", { error: errorMessage(cancelled) })
      );
      return null;
    }
  }

  async searchTables(session: DbSession, pattern: string, scope: SearchScope): Promise<SearchMatch[]> {
    const matches: SearchMatch[] = [];

    if (scope !== "column") {
      const { rows } = await catalogQuery(session, TABLE_SEARCH_SQL, { pattern });
      for (const row of rows) {
        const table = readString(row, "tableName");
        const matched = literalMatch(table, pattern);
        if (matched !== null) {
          matches.push({ schema: readString(row, "schemaName"), table, kind: "table-name", matched });
        }
      }
    }

    if (scope !== "table") {
      const { rows } = await catalogQuery(session, COLUMN_SEARCH_SQL, { pattern });
      for (const row of rows) {
        const column = readString(row, "columnName");
        const matched = literalMatch(column, pattern);
        if (matched !== null) {
          matches.push({
            schema: readString(row, "schemaName"),
            table: readString(row, "tableName"),
            column,
            kind: "column-name",
            matched,
            dataType: readString(row, "dataType"),
          });
        }
      }
    }

    return matches;
  }
}
