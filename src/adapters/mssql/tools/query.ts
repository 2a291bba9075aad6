/**
 * SQL Server Tools - Query
 *
 * The general statement tool. Every statement passes the validator before
 * a connection is leased.
 */

import type { SqlServerAdapter } from '../SqlServerAdapter.js';
import type { RequestContext, ToolDefinition } from '../../../types/index.js';
import { StatementRejectedError } from '../../../types/index.js';
import { readOnly } from '../../../utils/annotations.js';
import { logger } from '../../../utils/logger.js';
import { previewStatement } from '../../../utils/sanitize.js';
import { toJsonRows } from '../../../utils/serialize.js';
import { QuerySchema } from '../schemas/index.js';

/**
 * Milliseconds to seconds, three decimals
 */
export function toSeconds(elapsedMs: number): number {
    return Math.round(elapsedMs) / 1000;
}

export function createQueryTool(adapter: SqlServerAdapter): ToolDefinition {
    return {
        name: 'mssql_query',
        description: 'Execute a SQL statement against SQL Server. Only single SELECT statements are accepted unless write mode is enabled, in which case INSERT, UPDATE and DELETE are also accepted. Results are capped at max_rows.',
        group: 'query',
        inputSchema: QuerySchema,
        annotations: readOnly('SQL Query'),
        handler: async (params: unknown, context: RequestContext) => {
            const { query, database, max_rows, timeout } = QuerySchema.parse(params);

            const verdict = adapter.validateStatement(query);
            if (!verdict.approved) {
                throw new StatementRejectedError(verdict.reason ?? 'statement rejected');
            }

            const request = {
                statement: verdict.normalizedStatement,
                database,
                maxRows: max_rows,
                timeoutSeconds: timeout
            };

            if (verdict.statementKind === 'write') {
                logger.warning('Write statement executed through mssql_query', {
                    module: 'TOOLS',
                    code: 'AUDIT_WRITE',
                    requestId: context.requestId,
                    database,
                    statement: previewStatement(verdict.normalizedStatement)
                });
                const result = await adapter.executeWrite(request);
                return {
                    rows_affected: result.rowsAffected,
                    execution_time: toSeconds(result.elapsedMs)
                };
            }

            const result = await adapter.executeRead(request);
            return {
                columns: result.columns,
                rows: toJsonRows(result.rows),
                row_count: result.rowCount,
                truncated: result.truncated,
                execution_time: toSeconds(result.elapsedMs)
            };
        }
    };
}
