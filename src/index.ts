#!/usr/bin/env node

// External imports
import * as dotenv from "dotenv";
import { randomUUID } from "crypto";
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { CallToolRequestSchema, ListToolsRequestSchema } from "@modelcontextprotocol/sdk/types.js";

dotenv.config();

// Internal imports
import { AuditLogger } from "./audit/AuditLogger.js";
import { loadConfig } from "./config/ConfigLoader.js";
import { ConnectionManager } from "./db/ConnectionManager.js";
import { MssqlSessionFactory } from "./db/MssqlSession.js";
import { ToolGateway } from "./gateway/ToolGateway.js";
import { createLogger, setLogLevel } from "./logging/Logger.js";
import { SafetyPolicy } from "./policy/SafetyPolicy.js";
import { createToolRegistry } from "./tools/registry.js";

// Correlates every audit entry written by this server instance.
const SESSION_ID = randomUUID();

const logger = createLogger("server");

async function runServer(): Promise<void> {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const connections = new ConnectionManager(
    new MssqlSessionFactory(config.connection, config.limits.queryTimeoutMs),
    config.pool,
    config.limits.queryTimeoutMs
  );
  await connections.initialize();

  const gateway = new ToolGateway({
    connections,
    policy: new SafetyPolicy(config.limits),
    tools: createToolRegistry(config.limits),
    queryTimeoutMs: config.limits.queryTimeoutMs,
    audit: new AuditLogger(config.audit, SESSION_ID),
  });

  const server = new Server(
    {
      name: "sql-tool-gateway",
      version: "0.1.0",
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: gateway.listTools(),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    const response = await gateway.handle(name, args ?? {});
    return {
      content: [{ type: "text", text: JSON.stringify(response, null, 2) }],
      isError: !response.ok,
    };
  });

  const shutdown = async (signal: string) => {
    logger.info(`Received ${signal}, shutting down`);
    await server.close();
    await connections.close();
    process.exit(0);
  };
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((error) => {
        logger.error("Shutdown failed", error);
        process.exit(1);
      });
    });
  }

  await server.connect(new StdioServerTransport());
  logger.info(`Serving ${gateway.listTools().length} tools over stdio`, {
    server: config.connection.server,
    database: config.connection.database,
  });
}

runServer().catch((error) => {
  logger.error("Fatal error running server", error);
  process.exit(1);
});
