/**
 * mssql-mcp - SQL Server MCP Server
 *
 * SQL Server tools for AI assistants behind a statement gate and a
 * bounded connection pool.
 *
 * @module mssql-mcp
 */

// Export types
export * from "./types/index.js";

// Export adapters
export { DatabaseAdapter } from "./adapters/DatabaseAdapter.js";
export { SqlServerAdapter } from "./adapters/mssql/SqlServerAdapter.js";
export { TediousSessionFactory } from "./adapters/mssql/TediousSession.js";

// Export server
export { SqlServerMcpServer } from "./server/McpServer.js";

// Export core components
export { StatementValidator } from "./validation/StatementValidator.js";
export { ConnectionPool } from "./pool/ConnectionPool.js";
export { QueryExecutor } from "./executor/QueryExecutor.js";
export { resolveSettings } from "./cli/settings.js";
export { logger } from "./utils/logger.js";
