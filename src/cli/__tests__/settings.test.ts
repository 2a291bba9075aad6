/**
 * mssql-mcp - Settings Resolution Tests
 */

import { describe, it, expect } from "vitest";
import { resolveSettings } from "../settings.js";
import { ValidationError } from "../../types/index.js";

const PASSWORD = { password: "test-secret" };

describe("resolveSettings", () => {
  it("applies defaults", () => {
    expect(resolveSettings(PASSWORD, {})).toEqual({
      connection: {
        host: "localhost",
        port: 1433,
        database: "master",
        user: "sa",
        password: "test-secret",
        encrypt: true,
        trustServerCertificate: false,
        connectTimeoutMs: 30_000,
      },
      pool: {
        minSize: 2,
        maxSize: 10,
        acquireTimeoutMs: 15_000,
        idleTimeoutMs: 300_000,
        maxLifetimeMs: 1_800_000,
        validationIntervalMs: 30_000,
        shutdownGraceMs: 10_000,
        reapIntervalMs: 30_000,
      },
      writeEnabled: false,
      procedureAllowlist: [],
      blockedKeywords: [],
      defaultTimeoutSeconds: 30,
      logLevel: "info",
    });
  });

  it("reads the environment", () => {
    const settings = resolveSettings(
      {},
      {
        MSSQL_HOST: "db.internal",
        MSSQL_PORT: "14330",
        MSSQL_DATABASE: "AppDb",
        MSSQL_USER: "app",
        MSSQL_PASSWORD: "test-secret",
        MSSQL_CONNECTION_TIMEOUT: "5",
        MIN_POOL_SIZE: "0",
        MAX_POOL_SIZE: "4",
        IDLE_TIMEOUT: "60",
        CONNECTION_LIFETIME: "600",
        POOL_ACQUIRE_TIMEOUT: "3",
        POOL_VALIDATION_INTERVAL: "0",
      },
    );

    expect(settings.connection).toMatchObject({
      host: "db.internal",
      port: 14330,
      database: "AppDb",
      user: "app",
      connectTimeoutMs: 5000,
    });
    expect(settings.pool).toMatchObject({
      minSize: 0,
      maxSize: 4,
      idleTimeoutMs: 60_000,
      maxLifetimeMs: 600_000,
      acquireTimeoutMs: 3000,
      validationIntervalMs: 0,
    });
  });

  it("prefers command-line flags over the environment", () => {
    const settings = resolveSettings(
      { host: "cli-host", poolMax: "3", encrypt: false, ...PASSWORD },
      { MSSQL_HOST: "env-host", MAX_POOL_SIZE: "8", MSSQL_ENCRYPT: "true", MIN_POOL_SIZE: "1" },
    );

    expect(settings.connection.host).toBe("cli-host");
    expect(settings.connection.encrypt).toBe(false);
    expect(settings.pool.maxSize).toBe(3);
    expect(settings.pool.minSize).toBe(1);
  });

  it("parses boolean words from the environment", () => {
    const settings = resolveSettings(PASSWORD, {
      MSSQL_ENCRYPT: "No",
      MSSQL_TRUST_SERVER_CERTIFICATE: "1",
      MSSQL_ALLOW_WRITE_OPERATIONS: " YES ",
    });

    expect(settings.connection.encrypt).toBe(false);
    expect(settings.connection.trustServerCertificate).toBe(true);
    expect(settings.writeEnabled).toBe(true);
  });

  it("clamps the request timeout into 1-300 seconds", () => {
    expect(resolveSettings(PASSWORD, { MSSQL_REQUEST_TIMEOUT: "900" }).defaultTimeoutSeconds).toBe(300);
    expect(resolveSettings(PASSWORD, { MSSQL_REQUEST_TIMEOUT: "0" }).defaultTimeoutSeconds).toBe(1);
    expect(resolveSettings(PASSWORD, { MSSQL_REQUEST_TIMEOUT: "45" }).defaultTimeoutSeconds).toBe(45);
  });

  it("normalizes the procedure allowlist to schema.name", () => {
    const settings = resolveSettings(
      { procedureAllowlist: "Reports.usp_Daily, [sales].[usp_Totals] ,usp_Ping,", ...PASSWORD },
      {},
    );
    expect(settings.procedureAllowlist).toEqual([
      "Reports.usp_Daily",
      "sales.usp_Totals",
      "dbo.usp_Ping",
    ]);
  });

  it("rejects malformed allowlist entries", () => {
    expect(() => resolveSettings({ procedureAllowlist: "a.b.c", ...PASSWORD }, {})).toThrow(
      'Invalid identifier "a.b.c": Name may have at most two parts (schema.name)',
    );
  });

  it("uppercases extra blocked keywords", () => {
    const settings = resolveSettings(PASSWORD, { MSSQL_BLOCKED_KEYWORDS: "waitfor, backup" });
    expect(settings.blockedKeywords).toEqual(["WAITFOR", "BACKUP"]);
  });

  it("accepts log level aliases", () => {
    expect(resolveSettings({ logLevel: "WARN", ...PASSWORD }, {}).logLevel).toBe("warning");
    expect(resolveSettings(PASSWORD, { LOG_LEVEL: "debug" }).logLevel).toBe("debug");
  });

  it("returns frozen settings", () => {
    const settings = resolveSettings(PASSWORD, {});
    expect(Object.isFrozen(settings)).toBe(true);
    expect(Object.isFrozen(settings.connection)).toBe(true);
    expect(Object.isFrozen(settings.pool)).toBe(true);
    expect(Object.isFrozen(settings.procedureAllowlist)).toBe(true);
  });

  describe("errors", () => {
    it("requires a password", () => {
      expect(() => resolveSettings({}, {})).toThrow(
        "Invalid setting password (--password / MSSQL_PASSWORD): is required",
      );
    });

    it("raises a ValidationError naming the setting", () => {
      try {
        resolveSettings({ port: "abc", ...PASSWORD }, {});
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ValidationError);
        expect(error).toMatchObject({ code: "VALIDATION_ERROR", details: { setting: "port" } });
      }
    });

    it("rejects out-of-range ports", () => {
      expect(() => resolveSettings({ port: "70000", ...PASSWORD }, {})).toThrow(
        "Invalid setting port (--port / MSSQL_PORT): Number must be less than or equal to 65535",
      );
    });

    it("rejects unknown boolean words", () => {
      expect(() => resolveSettings(PASSWORD, { MSSQL_ENCRYPT: "maybe" })).toThrow(
        "Invalid setting encrypt (--encrypt / MSSQL_ENCRYPT)",
      );
    });

    it("rejects a pool minimum above the maximum", () => {
      expect(() => resolveSettings({ poolMin: "5", poolMax: "3", ...PASSWORD }, {})).toThrow(
        "Invalid setting pool min (--pool-min / MIN_POOL_SIZE): must not exceed the pool maximum",
      );
    });

    it("rejects unknown log levels", () => {
      expect(() => resolveSettings({ logLevel: "verbose", ...PASSWORD }, {})).toThrow(
        "Invalid setting log level (--log-level / LOG_LEVEL): unknown log level 'verbose'",
      );
    });

    it("never echoes the password", () => {
      try {
        resolveSettings({ port: "abc", password: "test-secret" }, {});
        expect.unreachable();
      } catch (error) {
        expect(error instanceof Error ? error.message : "").not.toContain("test-secret");
      }
    });
  });
});
