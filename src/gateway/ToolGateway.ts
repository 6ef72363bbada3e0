import { randomUUID } from "crypto";
import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import type { AuditLogger } from "../audit/AuditLogger.js";
import type { ConnectionManager } from "../db/ConnectionManager.js";
import { GatewayError, classifyDatabaseError, type SerializedGatewayError } from "../errors/GatewayError.js";
import { createLogger } from "../logging/Logger.js";
import { isToolName, TOOL_NAMES, type SafetyPolicy, type ToolName } from "../policy/SafetyPolicy.js";
import type { ToolContext, ToolHandler, ToolRegistry, ToolResultMap } from "../tools/ToolHandler.js";

const logger = createLogger("gateway");

export type RequestState = "received" | "validated" | "rejected" | "executing" | "completed" | "failed";

const TRANSITIONS: Record<RequestState, readonly RequestState[]> = {
  received: ["validated", "rejected"],
  validated: ["executing"],
  executing: ["completed", "failed"],
  rejected: [],
  completed: [],
  failed: [],
};

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export type ToolResponse =
  | { ok: true; tool: string; state: "completed"; durationMs: number; result: JsonValue }
  | { ok: false; tool: string; state: "rejected" | "failed"; durationMs: number; error: SerializedGatewayError };

export class IllegalTransitionError extends Error {
  constructor(from: RequestState, to: RequestState) {
    super(`Illegal request state transition ${from} -> ${to}`);
    this.name = "IllegalTransitionError";
  }
}

export class RequestLifecycle {
  private current: RequestState = "received";
  readonly startedAt = Date.now();

  constructor(
    readonly id: string,
    readonly tool: string
  ) {}

  get state(): RequestState {
    return this.current;
  }

  moveTo(next: RequestState): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new IllegalTransitionError(this.current, next);
    }
    logger.debug(`${this.tool} ${this.id}: ${this.current} -> ${next}`);
    this.current = next;
  }

  elapsed(): number {
    return Date.now() - this.startedAt;
  }
}

/** Converts driver values into plain JSON: dates to ISO strings, binary to 0x hex, bigint to string. */
export function toJsonSafe(value: unknown): JsonValue {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === "string" || typeof value === "boolean") {
    return value;
  }
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === "bigint") {
    return value.toString();
  }
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value.toISOString();
  }
  if (value instanceof Uint8Array) {
    return `0x${Buffer.from(value).toString("hex")}`;
  }
  if (Array.isArray(value)) {
    return value.map(toJsonSafe);
  }
  if (typeof value === "object") {
    const json: { [key: string]: JsonValue } = {};
    for (const [key, entry] of Object.entries(value)) {
      if (entry !== undefined) {
        json[key] = toJsonSafe(entry);
      }
    }
    return json;
  }
  return String(value);
}

export interface ToolGatewayOptions {
  connections: ConnectionManager;
  policy: SafetyPolicy;
  tools: ToolRegistry;
  queryTimeoutMs: number;
  audit?: AuditLogger;
}

export class ToolGateway {
  private readonly context: ToolContext;

  constructor(private readonly options: ToolGatewayOptions) {
    this.context = {
      connections: options.connections,
      withSession: (work) => options.connections.withConnection(work, options.queryTimeoutMs),
    };
  }

  listTools(): Tool[] {
    return TOOL_NAMES.map((name) => {
      const tool = this.options.tools[name];
      return { name: tool.name, description: tool.description, inputSchema: tool.inputSchema };
    });
  }

  async handle(toolName: string, rawArgs: unknown): Promise<ToolResponse> {
    const lifecycle = new RequestLifecycle(randomUUID(), toolName);
    if (!isToolName(toolName)) {
      lifecycle.moveTo("rejected");
      const error = new GatewayError(
        "ValidationRejected",
        `Unknown tool '${toolName}'. Available tools: ${TOOL_NAMES.join(", ")}.`
      );
      return this.failure(lifecycle, rawArgs, error);
    }
    return this.dispatch(toolName, rawArgs, lifecycle);
  }

  private async dispatch<K extends ToolName>(tool: K, rawArgs: unknown, lifecycle: RequestLifecycle): Promise<ToolResponse> {
    const decision = this.options.policy.evaluate(tool, rawArgs);
    if (!decision.allow) {
      lifecycle.moveTo("rejected");
      return this.failure(lifecycle, rawArgs, new GatewayError(decision.kind, decision.reason));
    }
    lifecycle.moveTo("validated");

    const handler: ToolHandler<K> = this.options.tools[tool];
    lifecycle.moveTo("executing");
    let result: ToolResultMap[K];
    try {
      result = await handler.run(decision.request, this.context);
    } catch (error) {
      lifecycle.moveTo("failed");
      const failure = classifyDatabaseError(error);
      if (!(error instanceof GatewayError)) {
        logger.error(`${tool} failed`, error);
      }
      return this.failure(lifecycle, rawArgs, failure);
    }
    lifecycle.moveTo("completed");

    const durationMs = lifecycle.elapsed();
    this.options.audit?.logToolInvocation({
      requestId: lifecycle.id,
      toolName: tool,
      state: lifecycle.state,
      durationMs,
      arguments: rawArgs,
      recordCount: handler.countRows?.(result),
    });
    return { ok: true, tool, state: "completed", durationMs, result: toJsonSafe(result) };
  }

  private failure(lifecycle: RequestLifecycle, rawArgs: unknown, error: GatewayError): ToolResponse {
    const state = lifecycle.state;
    if (state !== "rejected" && state !== "failed") {
      throw new IllegalTransitionError(state, "failed");
    }
    const durationMs = lifecycle.elapsed();
    logger.info(`${lifecycle.tool} ${state}: ${error.kind}`, { requestId: lifecycle.id, message: error.message });
    this.options.audit?.logToolInvocation({
      requestId: lifecycle.id,
      toolName: lifecycle.tool,
      state,
      durationMs,
      arguments: rawArgs,
      error: { kind: error.kind, message: error.message },
    });
    return { ok: false, tool: lifecycle.tool, state, durationMs, error: error.toJSON() };
  }
}
