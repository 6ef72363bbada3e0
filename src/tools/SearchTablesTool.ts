import type { SearchMatch, SearchScope, StatsEngine } from "../stats/StatsEngine.js";
import type { ToolContext, ToolHandler, ToolInputSchema } from "./ToolHandler.js";

type SearchResult = { pattern: string; scope: SearchScope; matches: SearchMatch[] };

export class SearchTablesTool implements ToolHandler<"search_tables"> {
  readonly name = "search_tables";
  readonly description =
    "Finds tables and columns whose names contain the given text (case-insensitive). The pattern is literal: " +
    "'%' and '_' have no wildcard meaning.";
  readonly inputSchema: ToolInputSchema = {
    type: "object",
    properties: {
      pattern: { type: "string", description: "Text to look for in table and column names.", minLength: 1, maxLength: 128 },
      search_type: {
        type: "string",
        enum: ["table", "column", "both"],
        description: "Which names to search (default 'both').",
      },
    },
    required: ["pattern"],
    additionalProperties: false,
  };

  constructor(private readonly stats: StatsEngine) {}

  async run(request: { pattern: string; scope: SearchScope }, context: ToolContext): Promise<SearchResult> {
    const matches = await context.withSession((session) =>
      this.stats.searchTables(session, request.pattern, request.scope)
    );
    return { pattern: request.pattern, scope: request.scope, matches };
  }

  countRows(result: SearchResult): number {
    return result.matches.length;
  }
}
