import * as fs from "fs";
import * as path from "path";
import type { AuditConfig } from "../config/ConfigLoader.js";
import type { ErrorKind } from "../errors/GatewayError.js";
import { createLogger } from "../logging/Logger.js";

const logger = createLogger("audit");

export type AuditLevel = AuditConfig["level"];

export interface AuditLogEntry {
  timestamp: string;
  requestId: string;
  sessionId?: string;
  toolName: string;
  state: string;
  durationMs: number;
  result: {
    success: boolean;
    recordCount?: number;
    errorKind?: ErrorKind;
    error?: string;
  };
  /** Only written at verbose level. */
  arguments?: unknown;
}

export interface ToolInvocation {
  requestId: string;
  toolName: string;
  state: string;
  durationMs: number;
  arguments: unknown;
  recordCount?: number;
  error?: { kind: ErrorKind; message: string };
}

const SENSITIVE_KEYS = ["password", "secret", "token", "key", "authorization", "auth", "credential"];
// conflict_key names columns, not a secret.
const NOT_SENSITIVE = new Set(["conflict_key"]);

const MAX_STRING = 500;
const MAX_ITEMS = 10;

export class AuditLogger {
  private readonly logFilePath: string;

  constructor(
    private readonly config: AuditConfig,
    private readonly sessionId?: string
  ) {
    if (config.enabled && config.level !== "none") {
      this.logFilePath = path.resolve(config.path ?? path.join(process.cwd(), "logs", "audit.jsonl"));
      this.ensureLogDirectory();
    } else {
      this.logFilePath = "";
    }
  }

  get filePath(): string {
    return this.logFilePath;
  }

  private ensureLogDirectory(): void {
    const dir = path.dirname(this.logFilePath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  /** Redacts sensitive keys and shortens long strings and arrays, at any depth. */
  redact(value: unknown, key?: string): unknown {
    if (
      this.config.redactSensitive &&
      key !== undefined &&
      !NOT_SENSITIVE.has(key.toLowerCase()) &&
      SENSITIVE_KEYS.some((sensitive) => key.toLowerCase().includes(sensitive))
    ) {
      return "[REDACTED]";
    }
    if (typeof value === "string" && value.length > MAX_STRING) {
      return value.substring(0, MAX_STRING) + "... [TRUNCATED]";
    }
    if (Array.isArray(value)) {
      const items = value.slice(0, MAX_ITEMS).map((item) => this.redact(item));
      return value.length > MAX_ITEMS ? { _truncated: true, _totalCount: value.length, items } : items;
    }
    if (typeof value === "object" && value !== null) {
      return Object.fromEntries(Object.entries(value).map(([k, v]) => [k, this.redact(v, k)]));
    }
    return value;
  }

  logToolInvocation(invocation: ToolInvocation): void {
    if (!this.logFilePath) {
      return;
    }

    const entry: AuditLogEntry = {
      timestamp: new Date().toISOString(),
      requestId: invocation.requestId,
      sessionId: this.sessionId,
      toolName: invocation.toolName,
      state: invocation.state,
      durationMs: Math.round(invocation.durationMs),
      result: {
        success: invocation.error === undefined,
        recordCount: invocation.recordCount,
        errorKind: invocation.error?.kind,
        error: invocation.error?.message,
      },
    };
    if (this.config.level === "verbose") {
      entry.arguments = this.redact(invocation.arguments ?? {});
    }

    try {
      fs.appendFileSync(this.logFilePath, JSON.stringify(entry) + "\n", { encoding: "utf-8" });
    } catch (error) {
      logger.error("Failed to write audit log", error);
    }
  }
}
