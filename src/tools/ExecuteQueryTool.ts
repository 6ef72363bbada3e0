import type { ColumnMeta, Row } from "../db/types.js";
import { classifyDatabaseError } from "../errors/GatewayError.js";
import type { ReadStatementRequest } from "../policy/SafetyPolicy.js";
import type { ToolContext, ToolHandler, ToolInputSchema } from "./ToolHandler.js";

export interface QueryResult {
  statement: string;
  columns: ColumnMeta[];
  rows: Row[];
  rowCount: number;
  truncated: boolean;
  limit: number;
}

export class ExecuteQueryTool implements ToolHandler<"execute_query"> {
  readonly name = "execute_query";
  readonly description =
    "Executes a single read-only SELECT (or WITH ... SELECT) statement. Pass caller values in 'params' and reference " +
    "them as @name; inline string literals are rejected. Results are capped at 'limit' rows (default 1000) and " +
    "'truncated' reports whether more rows existed.";
  readonly inputSchema: ToolInputSchema = {
    type: "object",
    properties: {
      query: {
        type: "string",
        description: "SELECT statement to run. Example: SELECT Id, Name FROM dbo.Customers WHERE Country = @country",
      },
      params: {
        type: "object",
        description: "Values for the @name parameters referenced by the query. Example: { \"country\": \"Norway\" }",
        additionalProperties: { type: ["string", "number", "boolean", "null"] },
      },
      limit: {
        type: "integer",
        description: "Maximum number of rows to return (capped by server configuration).",
        minimum: 1,
      },
    },
    required: ["query"],
    additionalProperties: false,
  };

  async run(request: ReadStatementRequest, context: ToolContext): Promise<QueryResult> {
    const output = await context.withSession(async (session) => {
      try {
        return await session.query(request.statement, request.params);
      } catch (error) {
        throw classifyDatabaseError(error, "Query failed");
      }
    });

    // The statement asks for one row beyond the limit to detect truncation.
    const truncated = output.rows.length > request.limit;
    const rows = truncated ? output.rows.slice(0, request.limit) : output.rows;
    return {
      statement: request.statement,
      columns: output.columns,
      rows,
      rowCount: rows.length,
      truncated,
      limit: request.limit,
    };
  }

  countRows(result: QueryResult): number {
    return result.rowCount;
  }
}
