/**
 * mssql-mcp - Adapter Types
 *
 * Tool and resource definitions registered with the MCP server.
 */

import type { z } from "zod";

/**
 * Tool groups, used for listing and server instructions
 */
export type ToolGroup = "query" | "catalog" | "write" | "monitoring";

/**
 * MCP Tool Annotations
 * Metadata hints about tool behavior for clients.
 */
export interface ToolAnnotations {
  /** Human-readable title for display */
  title?: string;
  /** Tool does not modify its environment (default: false) */
  readOnlyHint?: boolean;
  /** Tool may perform destructive updates (default: true) */
  destructiveHint?: boolean;
  /** Repeated calls with same args have no additional effect */
  idempotentHint?: boolean;
  /** Tool may interact with external systems (default: false) */
  openWorldHint?: boolean;
}

/**
 * Per-call context handed to tool and resource handlers
 */
export interface RequestContext {
  timestamp: Date;
  requestId: string;
}

/**
 * Tool definition for registration
 */
export interface ToolDefinition {
  /** Unique tool name */
  name: string;

  description: string;

  group: ToolGroup;

  /** Zod object schema; its shape is what the MCP SDK advertises */
  inputSchema: z.AnyZodObject;

  annotations?: ToolAnnotations;

  handler: (params: unknown, context: RequestContext) => Promise<unknown>;
}

/**
 * Resource definition for MCP
 */
export interface ResourceDefinition {
  /** Fixed URI, or an RFC 6570 template such as mssql://schema/{database}/{schema} */
  uri: string;

  name: string;

  description: string;

  mimeType?: string;

  /** Template variables are passed when `uri` is a template */
  handler: (
    uri: string,
    variables: Record<string, string>,
    context: RequestContext,
  ) => Promise<unknown>;
}
