/**
 * mssql-mcp - MCP Server Types
 *
 * Server identity and the resolved runtime settings.
 */

import type { LogLevel } from "../utils/logger.js";
import type { ConnectionSettings, PoolConfig } from "./database.js";

/**
 * MCP Server configuration
 */
export interface McpServerConfig {
  name: string;
  version: string;
}

/**
 * Fully resolved settings (CLI flags > environment > defaults).
 * Never mutated after startup.
 */
export interface ServerSettings {
  connection: ConnectionSettings;
  pool: PoolConfig;
  /** Permits INSERT/UPDATE/DELETE and procedure execution */
  writeEnabled: boolean;
  /** `schema.name` entries, compared case-insensitively */
  procedureAllowlist: readonly string[];
  /** Tokens added to the built-in denylist */
  blockedKeywords: readonly string[];
  /** Default statement deadline for catalog tools and resources */
  defaultTimeoutSeconds: number;
  logLevel: LogLevel;
}
