import sql from "mssql";
import { DefaultAzureCredential, type TokenCredential } from "@azure/identity";
import type { ConnectionConfig } from "../config/ConfigLoader.js";
import { createLogger } from "../logging/Logger.js";
import type { ColumnMeta, DbSession, QueryOutput, Row, SessionFactory, SqlExecutor, SqlParams } from "./types.js";

const logger = createLogger("mssql");

const AZURE_SQL_SCOPE = "https://database.windows.net/.default";

type ColumnMetadata = sql.IColumnMetadata[string];

function declaredType(meta: ColumnMetadata): string {
  const type: unknown = meta.type;
  if ((typeof type === "function" || (typeof type === "object" && type !== null)) && "declaration" in type) {
    const declaration = type.declaration;
    if (typeof declaration === "string") {
      return declaration;
    }
  }
  return "unknown";
}

function toColumns(recordset: sql.IRecordSet<Row> | undefined): ColumnMeta[] {
  if (!recordset?.columns) {
    return [];
  }
  return Object.values(recordset.columns)
    .sort((a, b) => a.index - b.index)
    .map((meta) => ({ name: meta.name, type: declaredType(meta) }));
}

function toOutput(result: sql.IResult<Row>): QueryOutput {
  const recordsets: Row[][] = Array.isArray(result.recordsets)
    ? result.recordsets.map((set) => Array.from(set))
    : [];
  return {
    rows: result.recordset ? Array.from(result.recordset) : [],
    columns: toColumns(result.recordset),
    recordsets,
    rowsAffected: result.rowsAffected ?? [],
  };
}

function bind(request: sql.Request, params?: SqlParams): sql.Request {
  for (const [name, value] of Object.entries(params ?? {})) {
    request.input(name, value);
  }
  return request;
}

/**
 * One physical SQL Server session. Each wraps its own single-connection
 * mssql pool so SET options and transactions stay on the same connection.
 */
export class MssqlSession implements DbSession {
  private active: sql.Request | null = null;

  constructor(private readonly pool: sql.ConnectionPool) {
    pool.on("error", (error: unknown) => {
      logger.warn("Session reported an error", { error: error instanceof Error ? error.message : String(error) });
    });
  }

  private async run(request: sql.Request, text: string): Promise<QueryOutput> {
    this.active = request;
    try {
      return toOutput(await request.query<Row>(text));
    } finally {
      this.active = null;
    }
  }

  query(text: string, params?: SqlParams): Promise<QueryOutput> {
    return this.run(bind(new sql.Request(this.pool), params), text);
  }

  async batch(text: string): Promise<void> {
    const request = new sql.Request(this.pool);
    this.active = request;
    try {
      await request.batch(text);
    } finally {
      this.active = null;
    }
  }

  async transaction<T>(work: (tx: SqlExecutor) => Promise<T>): Promise<T> {
    const transaction = new sql.Transaction(this.pool);
    let rolledBack = false;
    transaction.on("rollback", () => {
      rolledBack = true;
    });

    await transaction.begin();
    const executor: SqlExecutor = {
      query: (text, params) => this.run(bind(new sql.Request(transaction), params), text),
    };

    try {
      const result = await work(executor);
      await transaction.commit();
      return result;
    } catch (error) {
      if (!rolledBack) {
        try {
          await transaction.rollback();
        } catch (rollbackError) {
          logger.error("Rollback failed", rollbackError);
        }
      }
      throw error;
    }
  }

  cancel(): void {
    this.active?.cancel();
  }

  async close(): Promise<void> {
    if (this.pool.connected || this.pool.connecting) {
      await this.pool.close();
    }
  }
}

export class MssqlSessionFactory implements SessionFactory {
  private readonly credential: TokenCredential | null;

  constructor(
    private readonly connection: ConnectionConfig,
    private readonly requestTimeoutMs: number
  ) {
    this.credential = connection.authMode === "aad" ? new DefaultAzureCredential() : null;
  }

  get target(): { server: string; database: string } {
    return { server: this.connection.server, database: this.connection.database };
  }

  private async createSqlConfig(): Promise<sql.config> {
    const env = this.connection;
    const baseConfig: sql.config = {
      server: env.server,
      database: env.database,
      port: env.port,
      connectionTimeout: env.connectionTimeoutMs,
      requestTimeout: this.requestTimeoutMs,
      pool: { min: 0, max: 1 },
      options: {
        encrypt: env.encrypt,
        trustServerCertificate: env.trustServerCertificate,
      },
    };

    if (env.authMode === "sql") {
      return { ...baseConfig, user: env.username, password: env.password };
    }

    if (env.authMode === "windows") {
      return {
        ...baseConfig,
        authentication: {
          type: "ntlm",
          options: {
            userName: env.username ?? "",
            password: env.password ?? "",
            domain: env.domain ?? "",
          },
        },
      };
    }

    if (!this.credential) {
      throw new Error("Azure AD credential is not configured");
    }
    const accessToken = await this.credential.getToken(AZURE_SQL_SCOPE);
    if (!accessToken?.token) {
      throw new Error(`Failed to acquire Azure AD token for ${env.server}`);
    }
    return {
      ...baseConfig,
      options: { ...baseConfig.options, encrypt: true },
      authentication: {
        type: "azure-active-directory-access-token",
        options: { token: accessToken.token },
      },
    };
  }

  async open(): Promise<DbSession> {
    const pool = new sql.ConnectionPool(await this.createSqlConfig());
    await pool.connect();
    return new MssqlSession(pool);
  }
}
