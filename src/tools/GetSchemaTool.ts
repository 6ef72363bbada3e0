import type { SchemaInfo, SchemaInspector, SchemaOptions } from "../schema/SchemaInspector.js";
import type { ToolContext, ToolHandler, ToolInputSchema } from "./ToolHandler.js";

export class GetSchemaTool implements ToolHandler<"get_schema"> {
  readonly name = "get_schema";
  readonly description =
    "Lists every base table visible to the gateway's credential with its columns, primary key and foreign keys. " +
    "Pass 'table' to describe a single table, or include_columns false for a lighter listing.";
  readonly inputSchema: ToolInputSchema = {
    type: "object",
    properties: {
      table: { type: "string", description: "Only describe this table ('table' or 'schema.table')." },
      include_columns: { type: "boolean", description: "List each table's columns (default true)." },
      include_indexes: { type: "boolean", description: "Also list each table's indexes (default false)." },
    },
    additionalProperties: false,
  };

  constructor(private readonly inspector: SchemaInspector) {}

  run(request: SchemaOptions, context: ToolContext): Promise<SchemaInfo> {
    return context.withSession((session) => this.inspector.getSchema(session, request));
  }

  countRows(result: SchemaInfo): number {
    return result.tableCount;
  }
}
