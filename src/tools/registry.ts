import { BackupManager } from "../backup/BackupManager.js";
import type { LimitsConfig } from "../config/ConfigLoader.js";
import { ExplainEngine } from "../explain/ExplainEngine.js";
import { InsertHandler } from "../insert/InsertHandler.js";
import { CatalogSchemaInspector } from "../schema/SchemaInspector.js";
import { StatsEngine } from "../stats/StatsEngine.js";
import { BackupTableTool } from "./BackupTableTool.js";
import { CheckConnectionTool } from "./CheckConnectionTool.js";
import { ExecuteQueryTool } from "./ExecuteQueryTool.js";
import { ExplainQueryTool } from "./ExplainQueryTool.js";
import { GetSchemaTool } from "./GetSchemaTool.js";
import { GetTableInfoTool } from "./GetTableInfoTool.js";
import { GetTableStatsTool } from "./GetTableStatsTool.js";
import { InsertDataTool } from "./InsertDataTool.js";
import { SearchTablesTool } from "./SearchTablesTool.js";
import type { ToolRegistry } from "./ToolHandler.js";

export function createToolRegistry(limits: LimitsConfig, clock?: () => Date): ToolRegistry {
  const inspector = new CatalogSchemaInspector();
  const stats = new StatsEngine(limits);

  return {
    execute_query: new ExecuteQueryTool(),
    get_schema: new GetSchemaTool(inspector),
    get_table_info: new GetTableInfoTool(inspector),
    explain_query: new ExplainQueryTool(new ExplainEngine()),
    check_connection: new CheckConnectionTool(),
    get_table_stats: new GetTableStatsTool(stats),
    search_tables: new SearchTablesTool(stats),
    backup_table: new BackupTableTool(new BackupManager(limits, clock)),
    insert_data: new InsertDataTool(new InsertHandler()),
  };
}
