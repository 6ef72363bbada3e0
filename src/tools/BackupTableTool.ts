import type { BackupManager, BackupSpec } from "../backup/BackupManager.js";
import type { TableRef } from "../policy/identifiers.js";
import type { ToolContext, ToolHandler, ToolInputSchema } from "./ToolHandler.js";

export class BackupTableTool implements ToolHandler<"backup_table"> {
  readonly name = "backup_table";
  readonly description =
    "Copies a table's structure and rows into a new table named <table>_backup_<YYYYMMDD_HHMMSS> (or 'backup_name') " +
    "in the same schema. The copy is all-or-nothing.";
  readonly inputSchema: ToolInputSchema = {
    type: "object",
    properties: {
      table: { type: "string", description: "Table to copy, optionally schema-qualified." },
      backup_name: { type: "string", description: "Name for the copy; a numeric suffix is added if it is taken." },
    },
    required: ["table"],
    additionalProperties: false,
  };

  constructor(private readonly backups: BackupManager) {}

  run(request: { table: TableRef; backupName?: string }, context: ToolContext): Promise<BackupSpec> {
    return context.withSession((session) => this.backups.backupTable(session, request.table, request.backupName));
  }

  countRows(result: BackupSpec): number {
    return result.rowsCopied;
  }
}
