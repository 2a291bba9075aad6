/**
 * mssql-mcp - Database Adapter Base
 *
 * Abstract base class for database adapters: lifecycle, MCP registration
 * of tools and resources, and the tool dispatcher that turns every failure
 * into a structured, sanitized error result.
 */

import {
  ResourceTemplate,
  type McpServer,
} from "@modelcontextprotocol/sdk/server/mcp.js";
import { ZodError } from "zod";
import { logger } from "../utils/logger.js";
import { sanitizeMessage } from "../utils/sanitize.js";
import { stringifyResult } from "../utils/serialize.js";
import {
  MssqlMcpError,
  UnknownToolError,
  ValidationError,
  type HealthStatus,
  type RequestContext,
  type ResourceDefinition,
  type ToolDefinition,
  type ToolGroup,
} from "../types/index.js";

/**
 * Result handed back to the MCP SDK for a tool call
 */
export type ToolResult = {
  content: { type: "text"; text: string }[];
  isError?: boolean;
};

/**
 * Error payload returned to the caller
 */
export interface ToolErrorPayload {
  error: {
    kind: string;
    message: string;
  };
}

/**
 * Abstract base class for database adapters
 */
export abstract class DatabaseAdapter {
  /** Human-readable adapter name */
  abstract readonly name: string;

  /** Adapter version */
  abstract readonly version: string;

  /** Connection state */
  protected connected = false;

  private toolIndex: Map<string, ToolDefinition> | null = null;

  // =========================================================================
  // Connection Lifecycle
  // =========================================================================

  abstract connect(): Promise<void>;

  abstract disconnect(): Promise<void>;

  isConnected(): boolean {
    return this.connected;
  }

  abstract getHealth(): Promise<HealthStatus>;

  // =========================================================================
  // Definitions
  // =========================================================================

  abstract getToolDefinitions(): ToolDefinition[];

  abstract getResourceDefinitions(): ResourceDefinition[];

  /**
   * Literal values (passwords) that must never appear in a returned message
   */
  protected abstract getSecrets(): readonly string[];

  getToolGroups(): Record<ToolGroup, string[]> {
    const groups: Record<ToolGroup, string[]> = {
      query: [],
      catalog: [],
      write: [],
      monitoring: [],
    };
    for (const tool of this.getToolDefinitions()) {
      groups[tool.group].push(tool.name);
    }
    return groups;
  }

  // =========================================================================
  // Dispatch
  // =========================================================================

  /**
   * Run a tool by name. Never throws: failures come back as
   * `{ error: { kind, message } }` with `isError` set.
   */
  async dispatch(toolName: string, args: unknown): Promise<ToolResult> {
    const context = this.createContext();
    try {
      const tool = this.findTool(toolName);
      const result = await tool.handler(args ?? {}, context);
      return {
        content: [
          {
            type: "text",
            text: typeof result === "string" ? result : stringifyResult(result),
          },
        ],
      };
    } catch (error) {
      const payload = this.toErrorPayload(error);
      logger.warn(`Tool ${toolName} failed: ${payload.error.message}`, {
        module: "TOOLS",
        code: payload.error.kind,
        requestId: context.requestId,
      });
      return {
        content: [{ type: "text", text: stringifyResult(payload) }],
        isError: true,
      };
    }
  }

  /**
   * Map any thrown value to the external error contract
   */
  toErrorPayload(error: unknown): ToolErrorPayload {
    const secrets = this.getSecrets();

    if (error instanceof ZodError) {
      const issues = error.issues
        .map((issue) => {
          const path = issue.path.join(".");
          return path.length > 0 ? `${path}: ${issue.message}` : issue.message;
        })
        .join("; ");
      const wrapped = new ValidationError(`Invalid arguments: ${issues}`);
      return {
        error: {
          kind: wrapped.code,
          message: sanitizeMessage(wrapped.message, secrets),
        },
      };
    }

    if (error instanceof MssqlMcpError) {
      return {
        error: {
          kind: error.code,
          message: sanitizeMessage(error.message, secrets),
        },
      };
    }

    logger.error("Unexpected tool error", {
      module: "TOOLS",
      code: "INTERNAL_ERROR",
      error: sanitizeMessage(
        error instanceof Error ? error.message : String(error),
        secrets,
      ),
    });
    return {
      error: {
        kind: "INTERNAL_ERROR",
        message: "Internal error while running the tool",
      },
    };
  }

  private findTool(toolName: string): ToolDefinition {
    this.toolIndex ??= new Map(
      this.getToolDefinitions().map((tool) => [tool.name, tool]),
    );
    const tool = this.toolIndex.get(toolName);
    if (tool === undefined) {
      throw new UnknownToolError(toolName);
    }
    return tool;
  }

  // =========================================================================
  // MCP Registration
  // =========================================================================

  registerTools(server: McpServer): void {
    const tools = this.getToolDefinitions();
    for (const tool of tools) {
      this.registerTool(server, tool);
    }

    logger.info(
      `Registered ${String(tools.length)} tools from ${this.name}`,
      { module: "SERVER" },
    );
  }

  protected registerTool(server: McpServer, tool: ToolDefinition): void {
    // eslint-disable-next-line @typescript-eslint/no-deprecated
    server.tool(
      tool.name,
      tool.description,
      tool.inputSchema.shape,
      tool.annotations ?? {},
      async (params: unknown) => this.dispatch(tool.name, params),
    );
  }

  registerResources(server: McpServer): void {
    const resources = this.getResourceDefinitions();
    for (const resource of resources) {
      this.registerResource(server, resource);
    }
    logger.info(
      `Registered ${String(resources.length)} resources from ${this.name}`,
      { module: "SERVER" },
    );
  }

  protected registerResource(
    server: McpServer,
    resource: ResourceDefinition,
  ): void {
    const mimeType = resource.mimeType ?? "application/json";
    const metadata = { description: resource.description, mimeType };

    const read = async (
      uri: URL,
      variables: Record<string, string>,
    ): Promise<{ contents: { uri: string; mimeType: string; text: string }[] }> => {
      const context = this.createContext();
      let result: unknown;
      try {
        result = await resource.handler(uri.toString(), variables, context);
      } catch (error) {
        result = this.toErrorPayload(error);
      }
      return {
        contents: [
          {
            uri: uri.toString(),
            mimeType,
            text: typeof result === "string" ? result : stringifyResult(result),
          },
        ],
      };
    };

    if (resource.uri.includes("{")) {
      server.registerResource(
        resource.name,
        new ResourceTemplate(resource.uri, { list: undefined }),
        metadata,
        async (uri, variables) => read(uri, flattenVariables(variables)),
      );
      return;
    }

    server.registerResource(resource.name, resource.uri, metadata, async (uri) =>
      read(uri, {}),
    );
  }

  /**
   * Create a request context for tool execution
   */
  createContext(requestId?: string): RequestContext {
    return {
      timestamp: new Date(),
      requestId: requestId ?? crypto.randomUUID(),
    };
  }

  /**
   * Get adapter info for logging/debugging
   */
  getInfo(): Record<string, unknown> {
    return {
      name: this.name,
      version: this.version,
      connected: this.connected,
      toolGroups: this.getToolGroups(),
    };
  }
}

/**
 * URI template variables may be lists; resources only use single values
 */
function flattenVariables(
  variables: Record<string, string | string[]>,
): Record<string, string> {
  const flat: Record<string, string> = {};
  for (const [key, value] of Object.entries(variables)) {
    const single = Array.isArray(value) ? value[0] : value;
    if (single !== undefined) {
      flat[key] = decodeURIComponent(single);
    }
  }
  return flat;
}
