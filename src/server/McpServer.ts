/**
 * mssql-mcp - MCP Server Wrapper
 *
 * Wraps the MCP SDK server with database adapter integration,
 * protocol logging and graceful shutdown support.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import type { DatabaseAdapter } from "../adapters/DatabaseAdapter.js";
import type { McpServerConfig } from "../types/index.js";
import { logger } from "../utils/logger.js";
import { SERVER_INSTRUCTIONS } from "../constants/ServerInstructions.js";

export interface ServerConfig extends McpServerConfig {
  adapter: DatabaseAdapter;
}

/**
 * SQL Server MCP Server
 */
export class SqlServerMcpServer {
  private mcpServer: McpServer;
  private adapter: DatabaseAdapter;
  private registered = false;

  constructor(config: ServerConfig) {
    this.adapter = config.adapter;

    this.mcpServer = new McpServer(
      {
        name: config.name,
        version: config.version,
      },
      {
        capabilities: {
          logging: {},
        },
        instructions: SERVER_INSTRUCTIONS,
      },
    );

    // Mirror log entries to the client as notifications/message
    logger.setMcpServer(this.mcpServer.server);
    logger.setLoggerName(config.name);

    logger.info("MCP Server initialized", {
      module: "SERVER",
      name: config.name,
      version: config.version,
      capabilities: ["logging"],
    });
  }

  /**
   * Register all tools and resources
   */
  private registerComponents(): void {
    if (this.registered) {
      return;
    }
    this.registered = true;

    this.adapter.registerTools(this.mcpServer);
    this.adapter.registerResources(this.mcpServer);

    logger.info("Components registered", {
      module: "SERVER",
      tools: this.adapter.getToolDefinitions().length,
      resources: this.adapter.getResourceDefinitions().length,
    });
  }

  /**
   * Start the server on the given transport (stdio when omitted)
   */
  async start(transport: Transport = new StdioServerTransport()): Promise<void> {
    this.registerComponents();
    await this.mcpServer.connect(transport);
    logger.info("MCP Server started", { module: "SERVER" });
  }

  /**
   * Gracefully stop the server
   */
  async stop(): Promise<void> {
    logger.info("Stopping MCP Server...", { module: "SERVER" });

    try {
      await this.mcpServer.close();
      logger.info("MCP Server stopped", { module: "SERVER" });
    } catch (error) {
      logger.error("Error stopping server", {
        module: "SERVER",
        error: error instanceof Error ? error.message : "Unknown error",
      });
    } finally {
      logger.setMcpServer(null);
    }
  }

  getMcpServer(): McpServer {
    return this.mcpServer;
  }

  getAdapter(): DatabaseAdapter {
    return this.adapter;
  }
}
