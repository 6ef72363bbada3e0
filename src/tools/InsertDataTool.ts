import type { InsertHandler, InsertOutcome, InsertRequest } from "../insert/InsertHandler.js";
import type { ToolContext, ToolHandler, ToolInputSchema } from "./ToolHandler.js";

export class InsertDataTool implements ToolHandler<"insert_data"> {
  readonly name = "insert_data";
  readonly description =
    "Inserts rows into a table in one transaction. All rows must name the same columns. conflict_policy decides what " +
    "happens to rows whose key already exists: 'ignore' (default) skips them, 'update' (alias 'replace') overwrites " +
    "them, 'fail' aborts the whole batch.";
  readonly inputSchema: ToolInputSchema = {
    type: "object",
    properties: {
      table: { type: "string", description: "Target table, optionally schema-qualified." },
      rows: {
        type: "array",
        description: "Rows as objects mapping column names to values. Example: [{ \"Id\": 1, \"Name\": \"Ada\" }]",
        items: { type: "object" },
        minItems: 1,
      },
      conflict_policy: {
        type: "string",
        enum: ["fail", "ignore", "update", "replace"],
        description: "Handling of rows that collide with existing keys (default 'ignore').",
      },
      conflict_key: {
        type: "array",
        items: { type: "string" },
        description:
          "Columns that identify a row. Defaults to the primary key, then the first unique constraint; keys on " +
          "identity or computed columns are skipped. Duplicates within the batch follow the column's collation.",
      },
    },
    required: ["table", "rows"],
    additionalProperties: false,
  };

  constructor(private readonly inserts: InsertHandler) {}

  run(request: InsertRequest, context: ToolContext): Promise<InsertOutcome> {
    return context.withSession((session) => this.inserts.insertRows(session, request));
  }

  countRows(result: InsertOutcome): number {
    return result.inserted + result.updated;
  }
}
