import type { PoolHealth } from "../db/ConnectionManager.js";
import { readString } from "../db/rows.js";
import { classifyDatabaseError } from "../errors/GatewayError.js";
import { createLogger } from "../logging/Logger.js";
import type { ToolContext, ToolHandler, ToolInputSchema } from "./ToolHandler.js";

const logger = createLogger("check_connection");

export interface ServerInfo {
  version: string;
  serverName: string;
  database: string;
}

export interface ConnectionReport {
  connected: boolean;
  server: string;
  database: string;
  pool: PoolHealth;
  serverInfo: ServerInfo | null;
  error: string | null;
}

const SERVER_INFO_SQL = "SELECT @@VERSION AS version, @@SERVERNAME AS serverName, DB_NAME() AS databaseName";

export class CheckConnectionTool implements ToolHandler<"check_connection"> {
  readonly name = "check_connection";
  readonly description =
    "Checks database connectivity and reports the health of every pooled connection, plus server version and " +
    "database name when the server is reachable.";
  readonly inputSchema: ToolInputSchema = {
    type: "object",
    properties: {},
    additionalProperties: false,
  };

  async run(_request: Record<string, never>, context: ToolContext): Promise<ConnectionReport> {
    const pool = await context.connections.checkHealth();
    const target = context.connections.target;
    const report: ConnectionReport = {
      connected: false,
      server: target.server,
      database: target.database,
      pool,
      serverInfo: null,
      error: null,
    };

    if (pool.status === "dead") {
      report.error = "No pooled connection could reach the database.";
      return report;
    }

    try {
      const { rows } = await context.withSession((session) => session.query(SERVER_INFO_SQL));
      const row = rows[0] ?? {};
      report.serverInfo = {
        version: readString(row, "version"),
        serverName: readString(row, "serverName"),
        database: readString(row, "databaseName"),
      };
      report.connected = true;
    } catch (error) {
      const failure = classifyDatabaseError(error);
      logger.warn("Server information unavailable", { kind: failure.kind, error: failure.message });
      report.error = failure.message;
    }
    return report;
  }
}
