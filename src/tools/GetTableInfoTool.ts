import type { TableRef } from "../policy/identifiers.js";
import type { SchemaInspector, TableInfo } from "../schema/SchemaInspector.js";
import type { ToolContext, ToolHandler, ToolInputSchema } from "./ToolHandler.js";

export class GetTableInfoTool implements ToolHandler<"get_table_info"> {
  readonly name = "get_table_info";
  readonly description =
    "Describes one table: columns with types and key roles, keys, indexes, approximate row count and a few sample rows.";
  readonly inputSchema: ToolInputSchema = {
    type: "object",
    properties: {
      table: { type: "string", description: "Table name, optionally schema-qualified (e.g. 'dbo.Orders')." },
      sample_rows: { type: "integer", description: "Number of sample rows to include (default 5).", minimum: 0 },
    },
    required: ["table"],
    additionalProperties: false,
  };

  constructor(private readonly inspector: SchemaInspector) {}

  run(request: { table: TableRef; sampleRows: number }, context: ToolContext): Promise<TableInfo> {
    return context.withSession((session) => this.inspector.getTableInfo(session, request.table, request.sampleRows));
  }

  countRows(result: TableInfo): number {
    return result.sampleRows.length;
  }
}
