#!/usr/bin/env node
/**
 * mssql-mcp - CLI Entry Point
 *
 * Command-line interface for the SQL Server MCP server (stdio transport).
 */

import { Command } from "commander";
import { SqlServerAdapter } from "./adapters/mssql/SqlServerAdapter.js";
import { SqlServerMcpServer } from "./server/McpServer.js";
import { resolveSettings, type CliOptions } from "./cli/settings.js";
import { logger } from "./utils/logger.js";
import type { ServerSettings } from "./types/index.js";

const VERSION = "0.1.0";
const SERVER_NAME = "mssql-mcp";

interface ListToolsOptions {
  group?: string;
}

const log = logger.forModule("CLI");

const program = new Command();

program
  .name(SERVER_NAME)
  .description(
    "SQL Server MCP Server - read-only by default, with guarded write mode",
  )
  .version(VERSION);

program
  // Connection options
  .option("--host <host>", "SQL Server host (default: localhost)")
  .option("--port <port>", "SQL Server port (default: 1433)")
  .option("--database <database>", "Home database (default: master)")
  .option("--user <user>", "SQL Server login (default: sa)")
  .option("--password <password>", "SQL Server password (or MSSQL_PASSWORD)")
  .option("--encrypt", "Encrypt the connection (default)")
  .option("--no-encrypt", "Do not encrypt the connection")
  .option(
    "--trust-server-certificate",
    "Accept the server certificate without validation",
  )
  // Pool options
  .option("--pool-min <size>", "Connections opened at startup (default: 2)")
  .option("--pool-max <size>", "Maximum pool connections (default: 10)")
  // Policy options
  .option("--allow-write", "Permit INSERT/UPDATE/DELETE and procedures")
  .option(
    "--procedure-allowlist <list>",
    'Comma-separated procedures callable in write mode (e.g. "dbo.usp_a,sales.usp_b")',
  )
  .option(
    "--log-level <level>",
    "Log level: debug, info, notice, warning, error, critical, alert, emergency (default: info)",
  )
  .action(async (options: CliOptions) => {
    await startServer(options);
  });

/**
 * Resolve settings or exit with a configuration error
 */
function loadSettings(options: CliOptions): ServerSettings {
  try {
    return resolveSettings(options, process.env);
  } catch (error) {
    log.error("Invalid configuration", {
      code: "CONFIG_INVALID",
      error: error instanceof Error ? error.message : String(error),
    });
    process.exit(1);
  }
}

/**
 * Connect the pool and serve MCP over stdio until a signal arrives
 */
async function startServer(options: CliOptions): Promise<void> {
  const settings = loadSettings(options);
  logger.setLevel(settings.logLevel);

  const adapter = new SqlServerAdapter(settings);
  const server = new SqlServerMcpServer({
    name: SERVER_NAME,
    version: VERSION,
    adapter,
  });

  try {
    await adapter.connect();
  } catch (error) {
    log.error("Failed to start server", {
      error: error instanceof Error ? error.message : String(error),
    });
    await adapter.disconnect();
    process.exit(1);
  }

  let stopping = false;
  const shutdown = (signal: string): void => {
    if (stopping) {
      return;
    }
    stopping = true;
    log.info(`Received ${signal}, shutting down...`);
    void server
      .stop()
      .then(() => adapter.disconnect())
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        log.error("Shutdown failed", {
          error: error instanceof Error ? error.message : String(error),
        });
        process.exit(1);
      });
  };

  process.on("SIGINT", () => {
    shutdown("SIGINT");
  });
  process.on("SIGTERM", () => {
    shutdown("SIGTERM");
  });

  await server.start();
  log.info("SQL Server MCP Server listening on stdio", {
    writeEnabled: settings.writeEnabled,
  });
}

/**
 * Adapter used only to describe the tool surface; it never connects
 */
function describeAdapter(): SqlServerAdapter {
  return new SqlServerAdapter(
    loadSettings({ password: "unused", logLevel: "error" }),
  );
}

// List tools command
program
  .command("list-tools")
  .description("List all available tools")
  .option("--group <group>", "Filter by tool group")
  .action((options: ListToolsOptions) => {
    const adapter = describeAdapter();
    const tools = adapter.getToolDefinitions();
    const filteredTools = options.group
      ? tools.filter((t) => t.group === options.group)
      : tools;

    // Use stderr for all output - stdout is reserved for MCP protocol
    console.error(
      `\nSQL Server MCP Tools (${String(filteredTools.length)}/${String(tools.length)}):\n`,
    );

    for (const [group, names] of Object.entries(adapter.getToolGroups())) {
      const groupTools = filteredTools.filter((t) => names.includes(t.name));
      if (groupTools.length === 0) {
        continue;
      }
      console.error(`[${group}] (${String(groupTools.length)})`);
      for (const tool of groupTools) {
        const desc = tool.description.split(".")[0] ?? "";
        console.error(`  - ${tool.name}: ${desc}`);
      }
      console.error("");
    }
  });

// Print server info
program
  .command("info")
  .description("Show server information")
  .action(() => {
    const adapter = describeAdapter();

    // Use stderr for all output - stdout is reserved for MCP protocol
    console.error("\nSQL Server MCP Server");
    console.error("=====================");
    console.error(`Version: ${VERSION}`);
    console.error(`Tools: ${String(adapter.getToolDefinitions().length)}`);
    console.error(
      `Resources: ${String(adapter.getResourceDefinitions().length)}`,
    );
    console.error(
      `Tool Groups: ${Object.keys(adapter.getToolGroups()).join(", ")}`,
    );
    console.error("\nTransport: stdio");
    console.error(
      "Write mode: off unless --allow-write or MSSQL_ALLOW_WRITE_OPERATIONS is set",
    );
  });

await program.parseAsync();
