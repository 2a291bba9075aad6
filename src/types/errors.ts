/**
 * mssql-mcp - Error Types
 *
 * Custom error classes for mssql-mcp operations. Each class carries a
 * stable `code` that the tool dispatcher surfaces as the error kind.
 */

import { sanitizeMessage } from "../utils/sanitize.js";

/**
 * Base error class for mssql-mcp
 */
export class MssqlMcpError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "MssqlMcpError";
  }
}

/**
 * Statement refused by the safety gate
 */
export class StatementRejectedError extends MssqlMcpError {
  constructor(reason: string, details?: Record<string, unknown>) {
    super(`Statement rejected: ${reason}`, "VALIDATION_REJECTED", {
      reason,
      ...details,
    });
    this.name = "StatementRejectedError";
  }
}

/**
 * No connection became available within the acquire timeout
 */
export class PoolExhaustedError extends MssqlMcpError {
  constructor(timeoutMs: number, details?: Record<string, unknown>) {
    super(
      `No connection available within ${String(timeoutMs)}ms (pool exhausted)`,
      "POOL_EXHAUSTED",
      { timeoutMs, ...details },
    );
    this.name = "PoolExhaustedError";
  }
}

/**
 * A new session could not be opened, even after one retry
 */
export class ConnectionUnavailableError extends MssqlMcpError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "CONNECTION_UNAVAILABLE", details);
    this.name = "ConnectionUnavailableError";
  }
}

/**
 * Pool has been shut down
 */
export class PoolClosedError extends MssqlMcpError {
  constructor(details?: Record<string, unknown>) {
    super("Connection pool is closed", "POOL_CLOSED", details);
    this.name = "PoolClosedError";
  }
}

/**
 * Statement did not complete before its deadline
 */
export class QueryTimeoutError extends MssqlMcpError {
  constructor(timeoutSeconds: number, details?: Record<string, unknown>) {
    super(
      `Statement exceeded its ${String(timeoutSeconds)}s timeout and was cancelled`,
      "TIMEOUT",
      { timeoutSeconds, ...details },
    );
    this.name = "QueryTimeoutError";
  }
}

/**
 * Requested database is absent from sys.databases
 */
export class DatabaseNotFoundError extends MssqlMcpError {
  constructor(database: string, details?: Record<string, unknown>) {
    super(`Database '${database}' does not exist`, "DATABASE_NOT_FOUND", {
      database,
      ...details,
    });
    this.name = "DatabaseNotFoundError";
  }
}

/**
 * Error raised by SQL Server or the driver. The message is always sanitized.
 */
export class DriverError extends MssqlMcpError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "DRIVER_ERROR", details);
    this.name = "DriverError";
  }

  /**
   * Wrap a raw driver error. SQL Server error number, state and class are
   * kept in `details`; the message is reduced to one sanitized line.
   */
  static fromDriver(error: unknown, secrets: readonly string[] = []): DriverError {
    if (error instanceof DriverError) {
      return error;
    }
    const raw = error instanceof Error ? error.message : String(error);
    const details: Record<string, unknown> = {};
    if (typeof error === "object" && error !== null) {
      for (const key of ["number", "state", "class", "code"] as const) {
        if (key in error) {
          const value: unknown = Reflect.get(error, key);
          if (typeof value === "number" || typeof value === "string") {
            details[key] = value;
          }
        }
      }
    }
    const prefix =
      typeof details["number"] === "number"
        ? `Database error ${String(details["number"])}`
        : "Database error";
    return new DriverError(`${prefix}: ${sanitizeMessage(raw, secrets)}`, details);
  }
}

/**
 * Write tools called while write mode is off
 */
export class WriteDisabledError extends MssqlMcpError {
  constructor(operation: string) {
    super(
      `${operation} requires write mode (set MSSQL_ALLOW_WRITE_OPERATIONS=true)`,
      "WRITE_DISABLED",
      { operation },
    );
    this.name = "WriteDisabledError";
  }
}

/**
 * Procedure is not on the configured allowlist
 */
export class ProcedureNotAllowlistedError extends MssqlMcpError {
  constructor(procedure: string) {
    super(
      `Procedure '${procedure}' is not in the procedure allowlist`,
      "PROCEDURE_NOT_ALLOWLISTED",
      { procedure },
    );
    this.name = "ProcedureNotAllowlistedError";
  }
}

/**
 * Validation error for input parameters and settings
 */
export class ValidationError extends MssqlMcpError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "VALIDATION_ERROR", details);
    this.name = "ValidationError";
  }
}

/**
 * Table or view not present in the catalog
 */
export class TableNotFoundError extends MssqlMcpError {
  constructor(schema: string, table: string) {
    super(`Table '${schema}.${table}' not found`, "TABLE_NOT_FOUND", {
      schema,
      table,
    });
    this.name = "TableNotFoundError";
  }
}

/**
 * Pool could not open any connection at startup
 */
export class ConnectionError extends MssqlMcpError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "CONNECTION_ERROR", details);
    this.name = "ConnectionError";
  }
}

/**
 * Dispatch of a tool name that was never registered
 */
export class UnknownToolError extends MssqlMcpError {
  constructor(toolName: string) {
    super(`Unknown tool: ${toolName}`, "UNKNOWN_TOOL", { tool: toolName });
    this.name = "UnknownToolError";
  }
}
