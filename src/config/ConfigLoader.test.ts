import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { describe, it, expect } from "vitest";
import { ConfigError, configFromEnv, loadConfig, parseConfig, resolveSecrets } from "./ConfigLoader.js";

const BASE_ENV = {
  SERVER_NAME: "db.local",
  DATABASE_NAME: "sales",
  SQL_USERNAME: "reader",
  SQL_PASSWORD: "test-secret",
};

function configError(action: () => unknown): ConfigError {
  try {
    action();
  } catch (error) {
    if (error instanceof ConfigError) {
      return error;
    }
    throw error;
  }
  throw new Error("expected a ConfigError");
}

describe("configFromEnv", () => {
  it("reads connection, pool and limits from the environment", () => {
    const config = parseConfig(
      configFromEnv({
        ...BASE_ENV,
        CONNECTION_TIMEOUT: "15",
        POOL_SIZE: "3",
        MAX_ROWS_DEFAULT: "200",
        TRUST_SERVER_CERTIFICATE: "TRUE",
        AUDIT_LOGGING: "false",
        LOG_LEVEL: "DEBUG",
      })
    );

    expect(config.connection).toEqual({
      server: "db.local",
      database: "sales",
      authMode: "sql",
      username: "reader",
      password: "test-secret",
      encrypt: false,
      trustServerCertificate: true,
      connectionTimeoutMs: 15_000,
    });
    expect(config.pool.size).toBe(3);
    expect(config.pool.acquireTimeoutMs).toBe(10_000);
    expect(config.limits.defaultRowLimit).toBe(200);
    expect(config.limits.maxRowLimit).toBe(1000);
    expect(config.audit.enabled).toBe(false);
    expect(config.logLevel).toBe("debug");
  });

  it("ignores an unknown log level", () => {
    expect(parseConfig(configFromEnv({ ...BASE_ENV, LOG_LEVEL: "loud" })).logLevel).toBe("info");
  });

  it("rejects non-integer numbers", () => {
    expect(() => configFromEnv({ ...BASE_ENV, POOL_SIZE: "three" })).toThrow("POOL_SIZE must be an integer, got 'three'");
  });
});

describe("parseConfig", () => {
  it("clamps the default row limit to the maximum", () => {
    const config = parseConfig(configFromEnv({ ...BASE_ENV, MAX_ROWS_DEFAULT: "5000", MAX_ROWS_LIMIT: "2000" }));
    expect(config.limits.defaultRowLimit).toBe(2000);
  });

  it("requires credentials outside AAD mode", () => {
    expect(() => parseConfig(configFromEnv({ SERVER_NAME: "db.local", DATABASE_NAME: "sales" }))).toThrow(
      "Auth mode 'sql' requires username and password"
    );
    const aad = parseConfig(configFromEnv({ SERVER_NAME: "db.local", DATABASE_NAME: "sales", SQL_AUTH_MODE: "AAD" }));
    expect(aad.connection.authMode).toBe("aad");
  });

  it("lists every schema issue", () => {
    const error = configError(() => parseConfig({ connection: { database: "sales" }, pool: { size: 0 } }));
    expect(error.message.startsWith("Invalid gateway configuration")).toBe(true);
    expect(error.issues.map((issue) => issue.split(":")[0])).toEqual(["connection.server", "pool.size"]);
  });
});

describe("resolveSecrets", () => {
  it("substitutes secret placeholders and leaves unknown ones", () => {
    expect(resolveSecrets("${secret:DB_PASS}", { DB_PASS: "test-secret" })).toBe("test-secret");
    expect(resolveSecrets("${secret:MISSING}", {})).toBe("${secret:MISSING}");
  });
});

describe("loadConfig", () => {
  it("reads a JSON file and resolves its secrets", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "gateway-config-"));
    const file = path.join(dir, "gateway.json");
    fs.writeFileSync(
      file,
      JSON.stringify({
        connection: { server: "db.local", database: "sales", username: "reader", password: "${secret:DB_PASS}" },
        limits: { maxInsertBatch: 100 },
      })
    );
    try {
      const config = loadConfig({ GATEWAY_CONFIG_PATH: file, DB_PASS: "test-secret" });
      expect(config.connection.password).toBe("test-secret");
      expect(config.limits.maxInsertBatch).toBe(100);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it("reports a missing file", () => {
    const missing = path.join(os.tmpdir(), "gateway-config-missing.json");
    expect(() => loadConfig({ GATEWAY_CONFIG_PATH: missing })).toThrow(`Gateway config file not found at ${missing}`);
  });
});
