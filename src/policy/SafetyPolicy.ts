import { z } from "zod";
import type { LimitsConfig } from "../config/ConfigLoader.js";
import type { SqlParams } from "../db/types.js";
import type { ErrorKind } from "../errors/GatewayError.js";
import type { InsertRequest } from "../insert/InsertHandler.js";
import type { SchemaOptions } from "../schema/SchemaInspector.js";
import type { SearchScope } from "../stats/StatsEngine.js";
import { isIdentifier, MAX_IDENTIFIER_LENGTH, parseTableRef, type TableRef } from "./identifiers.js";
import { analyzeReadStatement, type LimitStrategy } from "./sqlText.js";

export const TOOL_NAMES = [
  "execute_query",
  "get_schema",
  "get_table_info",
  "explain_query",
  "check_connection",
  "get_table_stats",
  "search_tables",
  "backup_table",
  "insert_data",
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

export function isToolName(value: string): value is ToolName {
  return TOOL_NAMES.some((name) => name === value);
}

/** A read statement that passed analysis, rewritten to carry its row limit. */
export interface ReadStatementRequest {
  query: string;
  statement: string;
  params: SqlParams;
  limit: number;
  strategy: LimitStrategy;
}

export interface ToolRequestMap {
  execute_query: ReadStatementRequest;
  get_schema: SchemaOptions;
  get_table_info: { table: TableRef; sampleRows: number };
  explain_query: ReadStatementRequest;
  check_connection: Record<string, never>;
  get_table_stats: { table?: TableRef };
  search_tables: { pattern: string; scope: SearchScope };
  backup_table: { table: TableRef; backupName?: string };
  insert_data: InsertRequest;
}

export type RejectionKind = Extract<ErrorKind, "ValidationRejected" | "BatchTooLarge">;

export type SafetyDecision<R> =
  | { allow: true; request: R; effectiveLimit?: number }
  | { allow: false; kind: RejectionKind; reason: string };

interface ToolPolicy<R> {
  evaluate(rawArgs: unknown, limits: LimitsConfig): SafetyDecision<R>;
}

const reject = (reason: string, kind: RejectionKind = "ValidationRejected") =>
  ({ allow: false, kind, reason }) as const;

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `'${issue.path.join(".")}': ${issue.message}` : issue.message))
    .join("; ");
}

/** Pairs an argument schema with the rule that turns parsed arguments into a decision. */
function definePolicy<S extends z.ZodTypeAny, R>(
  schema: S,
  rule: (args: z.output<S>, limits: LimitsConfig) => SafetyDecision<R>
): ToolPolicy<R> {
  return {
    evaluate(rawArgs, limits) {
      const parsed = schema.safeParse(rawArgs ?? {});
      if (!parsed.success) {
        return reject(`Invalid arguments: ${describeIssues(parsed.error)}`);
      }
      return rule(parsed.data, limits);
    },
  };
}

const identifier = z.string().refine(isIdentifier, {
  message: `Must be an identifier of letters, digits and underscores (at most ${MAX_IDENTIFIER_LENGTH} characters) not starting with a digit.`,
});

const tableName = z.string().transform((value, ctx) => {
  const ref = parseTableRef(value.trim());
  if (!ref) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: "Table must be 'table' or 'schema.table' using only letters, digits and underscores.",
    });
    return z.NEVER;
  }
  return ref;
});

const scalar = z.union([z.string(), z.number().finite(), z.boolean(), z.null()]);

const paramName = z
  .string()
  .regex(/^@?[A-Za-z_][A-Za-z0-9_]*$/, "Parameter names must be identifiers, optionally prefixed with '@'.")
  .transform((name) => name.replace(/^@/, ""))
  .refine((name) => !name.startsWith("__"), "Parameter names starting with '__' are reserved.");

const readArgs = z
  .object({
    query: z.string().min(1, "Query must not be empty."),
    params: z.record(paramName, scalar).optional(),
    limit: z.number().int().min(1).optional(),
  })
  .strict();

function readStatementRule(
  args: z.output<typeof readArgs>,
  limits: LimitsConfig
): SafetyDecision<ReadStatementRequest> {
  const limit = Math.min(args.limit ?? limits.defaultRowLimit, limits.maxRowLimit);
  const analysis = analyzeReadStatement(args.query, args.params ?? {}, {
    limit,
    maxQueryLength: limits.maxQueryLength,
    rejectInlineLiterals: limits.rejectInlineLiterals,
  });
  if (!analysis.ok) {
    return reject(analysis.reason);
  }
  return {
    allow: true,
    request: {
      query: args.query,
      statement: analysis.statement,
      params: analysis.params,
      limit: analysis.limit,
      strategy: analysis.strategy,
    },
    effectiveLimit: analysis.limit,
  };
}

type PolicyTable = { [K in ToolName]: ToolPolicy<ToolRequestMap[K]> };

const POLICIES: PolicyTable = {
  execute_query: definePolicy(readArgs, readStatementRule),

  explain_query: definePolicy(readArgs.omit({ limit: true }), (args, limits) => readStatementRule(args, limits)),

  get_schema: definePolicy(
    z
      .object({
        table: tableName.optional(),
        include_columns: z.boolean().default(true),
        include_indexes: z.boolean().default(false),
      })
      .strict(),
    (args) => {
      const flags = { includeColumns: args.include_columns, includeIndexes: args.include_indexes };
      return { allow: true, request: args.table ? { ...flags, table: args.table } : flags };
    }
  ),

  get_table_info: definePolicy(
    z.object({ table: tableName, sample_rows: z.number().int().min(0).optional() }).strict(),
    (args, limits) => ({
      allow: true,
      request: {
        table: args.table,
        sampleRows: Math.min(args.sample_rows ?? limits.defaultSampleRows, limits.maxSampleRows),
      },
    })
  ),

  check_connection: definePolicy(z.object({}).strict(), () => ({ allow: true, request: {} })),

  get_table_stats: definePolicy(z.object({ table: tableName.optional() }).strict(), (args) => ({
    allow: true,
    request: args.table ? { table: args.table } : {},
  })),

  search_tables: definePolicy(
    z
      .object({
        pattern: z.string().min(1, "Pattern must not be empty.").max(128, "Pattern must be at most 128 characters."),
        search_type: z.enum(["table", "column", "both"]).default("both"),
      })
      .strict(),
    (args) => ({ allow: true, request: { pattern: args.pattern, scope: args.search_type } })
  ),

  backup_table: definePolicy(z.object({ table: tableName, backup_name: identifier.optional() }).strict(), (args) => ({
    allow: true,
    request: args.backup_name ? { table: args.table, backupName: args.backup_name } : { table: args.table },
  })),

  insert_data: definePolicy(
    z
      .object({
        table: tableName,
        rows: z
          .array(
            z
              .record(identifier, scalar)
              .refine((row) => Object.keys(row).length > 0, "Each row must name at least one column.")
          )
          .min(1, "At least one row is required."),
        conflict_policy: z.enum(["fail", "ignore", "update", "replace"]).default("ignore"),
        conflict_key: z.array(identifier).min(1).optional(),
      })
      .strict(),
    (args, limits) => {
      if (args.rows.length > limits.maxInsertBatch) {
        return reject(
          `Batch of ${args.rows.length} rows exceeds the limit of ${limits.maxInsertBatch}. Split it into smaller calls.`,
          "BatchTooLarge"
        );
      }
      const request: InsertRequest = {
        table: args.table,
        rows: args.rows,
        conflictPolicy: args.conflict_policy === "replace" ? "update" : args.conflict_policy,
      };
      if (args.conflict_key) {
        request.conflictKey = args.conflict_key;
      }
      return { allow: true, request };
    }
  ),
};

/**
 * The single gate in front of the database. Every tool call is parsed and
 * judged here; a rejection is final.
 */
export class SafetyPolicy {
  constructor(private readonly limits: LimitsConfig) {}

  evaluate<K extends ToolName>(tool: K, rawArgs: unknown): SafetyDecision<ToolRequestMap[K]> {
    const policy: ToolPolicy<ToolRequestMap[K]> = POLICIES[tool];
    return policy.evaluate(rawArgs, this.limits);
  }
}
