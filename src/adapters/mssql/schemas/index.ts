/**
 * mssql-mcp - Tool Input Schemas
 *
 * Zod schemas for every tool. Out-of-range limits are rejected, not clamped.
 */

import { z } from 'zod';
import { MAX_IDENTIFIER_LENGTH } from '../../../utils/identifiers.js';

export const MAX_ROWS_LIMIT = 10000;
export const DEFAULT_MAX_ROWS = 1000;
export const MAX_TIMEOUT_SECONDS = 300;
export const DEFAULT_TIMEOUT_SECONDS = 30;

const databaseName = z.string()
    .min(1)
    .max(MAX_IDENTIFIER_LENGTH)
    .describe('Database to run in (defaults to the configured database)');

const timeoutSeconds = z.number()
    .int()
    .min(1)
    .max(MAX_TIMEOUT_SECONDS)
    .describe('Statement timeout in seconds (1-300)');

// =============================================================================
// Query Schemas
// =============================================================================

export const QuerySchema = z.object({
    query: z.string().describe('SQL statement. SELECT only unless write mode is enabled'),
    database: databaseName.optional(),
    max_rows: z.number()
        .int()
        .min(1)
        .max(MAX_ROWS_LIMIT)
        .default(DEFAULT_MAX_ROWS)
        .describe('Maximum rows to return (1-10000)'),
    timeout: timeoutSeconds.default(DEFAULT_TIMEOUT_SECONDS)
});

// =============================================================================
// Catalog Schemas
// =============================================================================

export const ListTablesSchema = z.object({
    database: databaseName.optional(),
    schema: z.string().min(1).max(MAX_IDENTIFIER_LENGTH).default('dbo').describe('Schema name'),
    include_views: z.boolean().default(false).describe('Include views in the listing')
});

export const DescribeTableSchema = z.object({
    table_name: z.string().min(1).max(MAX_IDENTIFIER_LENGTH).describe('Table or view name'),
    schema: z.string().min(1).max(MAX_IDENTIFIER_LENGTH).default('dbo').describe('Schema name'),
    database: databaseName.optional()
});

export const ListDatabasesSchema = z.object({});

// =============================================================================
// Write Schemas
// =============================================================================

const parameterValue = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const ExecuteProcedureSchema = z.object({
    procedure_name: z.string().min(1).describe('Procedure name, optionally schema-qualified (dbo.MyProc)'),
    parameters: z.record(parameterValue).optional().describe('Named parameters, without the @ prefix'),
    database: databaseName.optional(),
    timeout: timeoutSeconds.default(DEFAULT_TIMEOUT_SECONDS)
});

export const ExecuteWriteSchema = z.object({
    statement: z.string().describe('INSERT, UPDATE or DELETE statement'),
    database: databaseName.optional(),
    dry_run: z.boolean().default(false).describe('Validate only; nothing is executed')
});

// =============================================================================
// Monitoring Schemas
// =============================================================================

export const PoolStatsSchema = z.object({});
