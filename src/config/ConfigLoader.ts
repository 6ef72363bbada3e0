import * as fs from "fs";
import * as path from "path";
import { z } from "zod";
import { createLogger, LOG_LEVELS } from "../logging/Logger.js";

const logger = createLogger("config");

const connectionSchema = z.object({
  server: z.string().min(1),
  database: z.string().min(1),
  port: z.number().int().positive().optional(),
  authMode: z.enum(["sql", "windows", "aad"]).default("sql"),
  username: z.string().optional(),
  password: z.string().optional(),
  domain: z.string().optional(),
  encrypt: z.boolean().default(false),
  trustServerCertificate: z.boolean().default(false),
  connectionTimeoutMs: z.number().int().positive().default(30_000),
});

const poolSchema = z.object({
  size: z.number().int().min(1).max(64).default(5),
  acquireTimeoutMs: z.number().int().positive().default(10_000),
  maxReconnectAttempts: z.number().int().min(1).max(10).default(3),
  reconnectDelayMs: z.number().int().min(0).default(250),
  healthCheckTimeoutMs: z.number().int().positive().default(2_000),
});

const limitsSchema = z.object({
  defaultRowLimit: z.number().int().min(1).default(1000),
  maxRowLimit: z.number().int().min(1).max(100_000).default(1000),
  maxQueryLength: z.number().int().min(1).default(10_000),
  rejectInlineLiterals: z.boolean().default(true),
  maxInsertBatch: z.number().int().min(1).default(500),
  defaultSampleRows: z.number().int().min(0).default(5),
  maxSampleRows: z.number().int().min(0).max(1000).default(50),
  queryTimeoutMs: z.number().int().positive().default(30_000),
  countTimeoutMs: z.number().int().positive().default(5_000),
  backupNameAttempts: z.number().int().min(1).max(100).default(10),
});

const auditSchema = z.object({
  enabled: z.boolean().default(true),
  path: z.string().optional(),
  level: z.enum(["none", "basic", "verbose"]).default("basic"),
  redactSensitive: z.boolean().default(true),
});

export const gatewayConfigSchema = z.object({
  connection: connectionSchema,
  pool: poolSchema.default({}),
  limits: limitsSchema.default({}),
  audit: auditSchema.default({}),
  logLevel: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
});

export type GatewayConfig = z.infer<typeof gatewayConfigSchema>;
export type ConnectionConfig = GatewayConfig["connection"];
export type PoolConfig = GatewayConfig["pool"];
export type LimitsConfig = GatewayConfig["limits"];
export type AuditConfig = GatewayConfig["audit"];

export class ConfigError extends Error {
  constructor(message: string, readonly issues: string[] = []) {
    super(issues.length ? `${message}\n  - ${issues.join("\n  - ")}` : message);
    this.name = "ConfigError";
  }
}

type Env = Record<string, string | undefined>;

/**
 * Resolves secret placeholders in the format ${secret:NAME} from the environment.
 */
export function resolveSecrets(value: string, env: Env): string {
  return value.replace(/\$\{secret:([^}]+)\}/g, (match, secretName: string) => {
    const envValue = env[secretName];
    if (envValue === undefined) {
      logger.warn(`Secret '${secretName}' not found in environment variables`);
      return match;
    }
    return envValue;
  });
}

function resolveSecretsDeep(value: unknown, env: Env): unknown {
  if (typeof value === "string") {
    return resolveSecrets(value, env);
  }
  if (Array.isArray(value)) {
    return value.map((item) => resolveSecretsDeep(item, env));
  }
  if (value && typeof value === "object") {
    return Object.fromEntries(
      Object.entries(value).map(([key, nested]) => [key, resolveSecretsDeep(nested, env)])
    );
  }
  return value;
}

function parseInteger(name: string, raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === "") {
    return undefined;
  }
  const parsed = Number(raw);
  if (!Number.isInteger(parsed)) {
    throw new ConfigError(`${name} must be an integer, got '${raw}'`);
  }
  return parsed;
}

function parseBoolean(raw: string | undefined): boolean | undefined {
  if (raw === undefined || raw.trim() === "") {
    return undefined;
  }
  return raw.trim().toLowerCase() === "true";
}

function dropUndefined(record: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(record).filter(([, value]) => value !== undefined));
}

/**
 * Builds the raw configuration object from environment variables. Values are
 * left undefined when unset so schema defaults apply.
 */
export function configFromEnv(env: Env): Record<string, unknown> {
  const connectionTimeoutSeconds = parseInteger("CONNECTION_TIMEOUT", env.CONNECTION_TIMEOUT);
  const level = env.LOG_LEVEL?.toLowerCase();

  return {
    connection: dropUndefined({
      server: env.SERVER_NAME,
      database: env.DATABASE_NAME,
      port: parseInteger("SQL_PORT", env.SQL_PORT),
      authMode: env.SQL_AUTH_MODE?.toLowerCase(),
      username: env.SQL_USERNAME,
      password: env.SQL_PASSWORD,
      domain: env.SQL_DOMAIN,
      encrypt: parseBoolean(env.SQL_ENCRYPT),
      trustServerCertificate: parseBoolean(env.TRUST_SERVER_CERTIFICATE),
      connectionTimeoutMs: connectionTimeoutSeconds === undefined ? undefined : connectionTimeoutSeconds * 1000,
    }),
    pool: dropUndefined({
      size: parseInteger("POOL_SIZE", env.POOL_SIZE),
      acquireTimeoutMs: parseInteger("ACQUIRE_TIMEOUT_MS", env.ACQUIRE_TIMEOUT_MS),
    }),
    limits: dropUndefined({
      defaultRowLimit: parseInteger("MAX_ROWS_DEFAULT", env.MAX_ROWS_DEFAULT),
      maxRowLimit: parseInteger("MAX_ROWS_LIMIT", env.MAX_ROWS_LIMIT),
      maxInsertBatch: parseInteger("MAX_INSERT_BATCH", env.MAX_INSERT_BATCH),
      queryTimeoutMs: parseInteger("QUERY_TIMEOUT_MS", env.QUERY_TIMEOUT_MS),
      rejectInlineLiterals: parseBoolean(env.REJECT_INLINE_LITERALS),
    }),
    audit: dropUndefined({
      enabled: env.AUDIT_LOGGING === undefined ? undefined : env.AUDIT_LOGGING !== "false",
      path: env.AUDIT_LOG_PATH,
      level: env.AUDIT_LEVEL?.toLowerCase(),
    }),
    logLevel: level && LOG_LEVELS.some((candidate) => candidate === level) ? level : undefined,
  };
}

function readConfigFile(configPath: string, env: Env): unknown {
  const resolvedPath = path.resolve(configPath);
  if (!fs.existsSync(resolvedPath)) {
    throw new ConfigError(`Gateway config file not found at ${resolvedPath}`);
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(resolvedPath, "utf-8"));
  } catch (error) {
    throw new ConfigError(`Failed to parse ${resolvedPath}: ${error instanceof Error ? error.message : String(error)}`);
  }
  logger.info(`Loaded gateway config from ${resolvedPath}`);
  return resolveSecretsDeep(parsed, env);
}

export function parseConfig(raw: unknown): GatewayConfig {
  const result = gatewayConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(
      "Invalid gateway configuration",
      result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    );
  }

  const config = result.data;
  if (config.limits.defaultRowLimit > config.limits.maxRowLimit) {
    config.limits.defaultRowLimit = config.limits.maxRowLimit;
  }
  if (config.connection.authMode !== "aad" && (!config.connection.username || !config.connection.password)) {
    throw new ConfigError(`Auth mode '${config.connection.authMode}' requires username and password`);
  }
  return config;
}

/**
 * Resolves the gateway configuration once at startup: a JSON file named by
 * GATEWAY_CONFIG_PATH when present, environment variables otherwise.
 */
export function loadConfig(env: Env = process.env): GatewayConfig {
  const configPath = env.GATEWAY_CONFIG_PATH;
  const raw = configPath ? readConfigFile(configPath, env) : configFromEnv(env);
  return parseConfig(raw);
}
