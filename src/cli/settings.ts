/**
 * mssql-mcp - Settings Resolution
 *
 * Merges CLI flags, environment variables and defaults (in that order of
 * precedence) into validated, immutable ServerSettings.
 */

import { z } from "zod";
import {
  ValidationError,
  type PoolConfig,
  type ServerSettings,
} from "../types/index.js";
import { MAX_TIMEOUT_SECONDS } from "../adapters/mssql/schemas/index.js";
import { parseQualifiedName } from "../utils/identifiers.js";
import { parseLogLevel } from "../utils/logger.js";

/**
 * Options as commander hands them over; numbers stay strings until validated
 */
export interface CliOptions {
  host?: string;
  port?: string;
  database?: string;
  user?: string;
  password?: string;
  encrypt?: boolean;
  trustServerCertificate?: boolean;
  poolMin?: string;
  poolMax?: string;
  allowWrite?: boolean;
  procedureAllowlist?: string;
  logLevel?: string;
}

const SHUTDOWN_GRACE_MS = 10_000;
const REAP_INTERVAL_MS = 30_000;

const TRUE_WORDS = ["true", "1", "yes"];
const BOOLEAN_WORDS = ["true", "false", "1", "0", "yes", "no"] as const;

const flag = z.union([
  z.boolean(),
  z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(BOOLEAN_WORDS))
    .transform((word) => TRUE_WORDS.includes(word)),
]);

const integer = (min: number, max: number) =>
  z.coerce.number().int().min(min).max(max);

const SettingsSchema = z
  .object({
    host: z.string().trim().min(1),
    port: integer(1, 65535),
    database: z.string().trim().min(1).max(128),
    user: z.string().trim().min(1),
    password: z.string().min(1, "is required"),
    encrypt: flag,
    trustServerCertificate: flag,
    connectionTimeout: integer(1, 3600),
    requestTimeout: z.coerce
      .number()
      .int()
      .transform((seconds) =>
        Math.min(Math.max(seconds, 1), MAX_TIMEOUT_SECONDS),
      ),
    poolMin: integer(0, 1000),
    poolMax: integer(1, 1000),
    idleTimeout: integer(0, 86_400),
    connectionLifetime: integer(0, 604_800),
    acquireTimeout: integer(1, 3600),
    validationInterval: integer(0, 86_400),
    allowWrite: flag,
    procedureAllowlist: z.string(),
    blockedKeywords: z.string(),
    logLevel: z.string().transform((value, ctx) => {
      const level = parseLogLevel(value);
      if (level === undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `unknown log level '${value}'`,
        });
        return z.NEVER;
      }
      return level;
    }),
  })
  .refine((settings) => settings.poolMin <= settings.poolMax, {
    message: "must not exceed the pool maximum",
    path: ["poolMin"],
  });

/**
 * Setting names as an operator knows them, used in error messages
 */
const SETTING_NAMES: Record<string, string> = {
  host: "host (--host / MSSQL_HOST)",
  port: "port (--port / MSSQL_PORT)",
  database: "database (--database / MSSQL_DATABASE)",
  user: "user (--user / MSSQL_USER)",
  password: "password (--password / MSSQL_PASSWORD)",
  encrypt: "encrypt (--encrypt / MSSQL_ENCRYPT)",
  trustServerCertificate:
    "trust server certificate (--trust-server-certificate / MSSQL_TRUST_SERVER_CERTIFICATE)",
  connectionTimeout: "connection timeout (MSSQL_CONNECTION_TIMEOUT)",
  requestTimeout: "request timeout (MSSQL_REQUEST_TIMEOUT)",
  poolMin: "pool min (--pool-min / MIN_POOL_SIZE)",
  poolMax: "pool max (--pool-max / MAX_POOL_SIZE)",
  idleTimeout: "idle timeout (IDLE_TIMEOUT)",
  connectionLifetime: "connection lifetime (CONNECTION_LIFETIME)",
  acquireTimeout: "acquire timeout (POOL_ACQUIRE_TIMEOUT)",
  validationInterval: "validation interval (POOL_VALIDATION_INTERVAL)",
  allowWrite: "write mode (--allow-write / MSSQL_ALLOW_WRITE_OPERATIONS)",
  logLevel: "log level (--log-level / LOG_LEVEL)",
};

function splitList(value: string): string[] {
  return value
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

/**
 * Resolve and validate the server settings
 */
export function resolveSettings(
  options: CliOptions,
  env: NodeJS.ProcessEnv,
): ServerSettings {
  const raw = {
    host: options.host ?? env["MSSQL_HOST"] ?? "localhost",
    port: options.port ?? env["MSSQL_PORT"] ?? "1433",
    database: options.database ?? env["MSSQL_DATABASE"] ?? "master",
    user: options.user ?? env["MSSQL_USER"] ?? "sa",
    password: options.password ?? env["MSSQL_PASSWORD"] ?? "",
    encrypt: options.encrypt ?? env["MSSQL_ENCRYPT"] ?? true,
    trustServerCertificate:
      options.trustServerCertificate ??
      env["MSSQL_TRUST_SERVER_CERTIFICATE"] ??
      false,
    connectionTimeout: env["MSSQL_CONNECTION_TIMEOUT"] ?? "30",
    requestTimeout: env["MSSQL_REQUEST_TIMEOUT"] ?? "30",
    poolMin: options.poolMin ?? env["MIN_POOL_SIZE"] ?? "2",
    poolMax: options.poolMax ?? env["MAX_POOL_SIZE"] ?? "10",
    idleTimeout: env["IDLE_TIMEOUT"] ?? "300",
    connectionLifetime: env["CONNECTION_LIFETIME"] ?? "1800",
    acquireTimeout: env["POOL_ACQUIRE_TIMEOUT"] ?? "15",
    validationInterval: env["POOL_VALIDATION_INTERVAL"] ?? "30",
    allowWrite:
      options.allowWrite ?? env["MSSQL_ALLOW_WRITE_OPERATIONS"] ?? false,
    procedureAllowlist:
      options.procedureAllowlist ?? env["MSSQL_PROCEDURE_ALLOWLIST"] ?? "",
    blockedKeywords: env["MSSQL_BLOCKED_KEYWORDS"] ?? "",
    logLevel: options.logLevel ?? env["LOG_LEVEL"] ?? "info",
  };

  const parsed = SettingsSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const key = issue === undefined ? "" : String(issue.path[0] ?? "");
    const name = SETTING_NAMES[key] ?? (key || "settings");
    // The password value itself never reaches the message
    const detail = key === "password" ? "is required" : (issue?.message ?? "");
    throw new ValidationError(`Invalid setting ${name}: ${detail}`, {
      setting: key,
    });
  }
  const settings = parsed.data;

  const procedureAllowlist = splitList(settings.procedureAllowlist).map(
    (entry) => {
      const qualified = parseQualifiedName(entry);
      return `${qualified.schema}.${qualified.name}`;
    },
  );

  const blockedKeywords = splitList(settings.blockedKeywords).map((token) =>
    token.toUpperCase(),
  );

  const pool: PoolConfig = {
    minSize: settings.poolMin,
    maxSize: settings.poolMax,
    acquireTimeoutMs: settings.acquireTimeout * 1000,
    idleTimeoutMs: settings.idleTimeout * 1000,
    maxLifetimeMs: settings.connectionLifetime * 1000,
    validationIntervalMs: settings.validationInterval * 1000,
    shutdownGraceMs: SHUTDOWN_GRACE_MS,
    reapIntervalMs: REAP_INTERVAL_MS,
  };

  return Object.freeze({
    connection: Object.freeze({
      host: settings.host,
      port: settings.port,
      database: settings.database,
      user: settings.user,
      password: settings.password,
      encrypt: settings.encrypt,
      trustServerCertificate: settings.trustServerCertificate,
      connectTimeoutMs: settings.connectionTimeout * 1000,
    }),
    pool: Object.freeze(pool),
    writeEnabled: settings.allowWrite,
    procedureAllowlist: Object.freeze(procedureAllowlist),
    blockedKeywords: Object.freeze(blockedKeywords),
    defaultTimeoutSeconds: settings.requestTimeout,
    logLevel: settings.logLevel,
  });
}
