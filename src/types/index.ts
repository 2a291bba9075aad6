/**
 * mssql-mcp - Type Definitions
 *
 * Re-exports every type module.
 */

export * from "./database.js";
export * from "./adapters.js";
export * from "./mcp.js";
export * from "./errors.js";
