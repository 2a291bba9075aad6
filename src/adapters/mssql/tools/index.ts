/**
 * SQL Server Tools
 */

import type { SqlServerAdapter } from '../SqlServerAdapter.js';
import type { ToolDefinition } from '../../../types/index.js';
import { createQueryTool } from './query.js';
import { createDescribeTableTool, createListDatabasesTool, createListTablesTool } from './catalog.js';
import { createExecuteProcedureTool, createExecuteWriteTool } from './write.js';
import { createPoolStatsTool } from './monitoring.js';

/**
 * Every tool, in advertised order. Write tools are always listed and
 * answer WRITE_DISABLED while write mode is off.
 */
export function getSqlServerTools(adapter: SqlServerAdapter): ToolDefinition[] {
    return [
        createQueryTool(adapter),
        createListTablesTool(adapter),
        createDescribeTableTool(adapter),
        createListDatabasesTool(adapter),
        createExecuteProcedureTool(adapter),
        createExecuteWriteTool(adapter),
        createPoolStatsTool(adapter)
    ];
}
