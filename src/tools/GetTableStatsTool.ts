import type { TableRef } from "../policy/identifiers.js";
import type { StatsEngine, TableStats } from "../stats/StatsEngine.js";
import type { ToolContext, ToolHandler, ToolInputSchema } from "./ToolHandler.js";

export class GetTableStatsTool implements ToolHandler<"get_table_stats"> {
  readonly name = "get_table_stats";
  readonly description =
    "Reports row count, allocated and used space, index count and last data modification for every table, or for one.";
  readonly inputSchema: ToolInputSchema = {
    type: "object",
    properties: {
      table: { type: "string", description: "Restrict the report to this table (optionally schema-qualified)." },
    },
    additionalProperties: false,
  };

  constructor(private readonly stats: StatsEngine) {}

  async run(request: { table?: TableRef }, context: ToolContext): Promise<{ statistics: TableStats[] }> {
    const statistics = await context.withSession((session) => this.stats.getTableStats(session, request.table));
    return { statistics };
  }

  countRows(result: { statistics: TableStats[] }): number {
    return result.statistics.length;
  }
}
