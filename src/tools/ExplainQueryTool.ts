import type { ExplainEngine, ExplainResult } from "../explain/ExplainEngine.js";
import type { ReadStatementRequest } from "../policy/SafetyPolicy.js";
import type { ToolContext, ToolHandler, ToolInputSchema } from "./ToolHandler.js";

export class ExplainQueryTool implements ToolHandler<"explain_query"> {
  readonly name = "explain_query";
  readonly description =
    "Returns the estimated execution plan of a SELECT statement without running it. The statement passes the same " +
    "checks as execute_query.";
  readonly inputSchema: ToolInputSchema = {
    type: "object",
    properties: {
      query: { type: "string", description: "SELECT statement to plan." },
      params: {
        type: "object",
        description: "Values for the @name parameters referenced by the query.",
        additionalProperties: { type: ["string", "number", "boolean", "null"] },
      },
    },
    required: ["query"],
    additionalProperties: false,
  };

  constructor(private readonly engine: ExplainEngine) {}

  run(request: ReadStatementRequest, context: ToolContext): Promise<ExplainResult> {
    return context.withSession((session) => this.engine.explain(session, request.statement, request.params));
  }
}
