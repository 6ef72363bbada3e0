import type { BackupSpec } from "../backup/BackupManager.js";
import type { ConnectionManager } from "../db/ConnectionManager.js";
import type { DbSession } from "../db/types.js";
import type { ExplainResult } from "../explain/ExplainEngine.js";
import type { InsertOutcome } from "../insert/InsertHandler.js";
import type { ToolName, ToolRequestMap } from "../policy/SafetyPolicy.js";
import type { SchemaInfo, TableInfo } from "../schema/SchemaInspector.js";
import type { SearchMatch, SearchScope, TableStats } from "../stats/StatsEngine.js";
import type { ConnectionReport } from "./CheckConnectionTool.js";
import type { QueryResult } from "./ExecuteQueryTool.js";

export interface ToolResultMap {
  execute_query: QueryResult;
  get_schema: SchemaInfo;
  get_table_info: TableInfo;
  explain_query: ExplainResult;
  check_connection: ConnectionReport;
  get_table_stats: { statistics: TableStats[] };
  search_tables: { pattern: string; scope: SearchScope; matches: SearchMatch[] };
  backup_table: BackupSpec;
  insert_data: InsertOutcome;
}

export interface JsonSchemaProperty {
  type: "string" | "number" | "integer" | "boolean" | "object" | "array";
  description?: string;
  enum?: string[];
  items?: JsonSchemaProperty;
  additionalProperties?: boolean | { type: string[] };
  minItems?: number;
  maxItems?: number;
  minLength?: number;
  maxLength?: number;
  minimum?: number;
}

export type ToolInputSchema = {
  type: "object";
  properties: Record<string, JsonSchemaProperty>;
  required?: string[];
  additionalProperties: false;
};

export interface ToolContext {
  readonly connections: ConnectionManager;
  /** Runs work on a pooled session under the query timeout. */
  withSession<T>(work: (session: DbSession) => Promise<T>): Promise<T>;
}

export interface ToolHandler<K extends ToolName> {
  readonly name: K;
  readonly description: string;
  readonly inputSchema: ToolInputSchema;
  run(request: ToolRequestMap[K], context: ToolContext): Promise<ToolResultMap[K]>;
  /** Row count recorded in the audit trail. */
  countRows?(result: ToolResultMap[K]): number;
}

export type ToolRegistry = { [K in ToolName]: ToolHandler<K> };
