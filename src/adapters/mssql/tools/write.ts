/**
 * SQL Server Tools - Write Operations
 *
 * Procedure execution and DML. Both require write mode; every execution is
 * audit-logged.
 */

import type { SqlServerAdapter } from '../SqlServerAdapter.js';
import type { RequestContext, SqlParameter, ToolDefinition } from '../../../types/index.js';
import { ProcedureNotAllowlistedError, StatementRejectedError } from '../../../types/index.js';
import { destructive } from '../../../utils/annotations.js';
import { parseQualifiedName, validateIdentifier } from '../../../utils/identifiers.js';
import { logger } from '../../../utils/logger.js';
import { previewStatement } from '../../../utils/sanitize.js';
import { toJsonRows } from '../../../utils/serialize.js';
import { ExecuteProcedureSchema, ExecuteWriteSchema } from '../schemas/index.js';
import { toSeconds } from './query.js';

/**
 * Named procedure parameters; a leading @ is accepted and dropped
 */
export function toProcedureParameters(
    parameters: Record<string, string | number | boolean | null> | undefined
): SqlParameter[] {
    return Object.entries(parameters ?? {}).map(([key, value]) => {
        const name = key.startsWith('@') ? key.slice(1) : key;
        validateIdentifier(name);
        return { name, value };
    });
}

export function createExecuteProcedureTool(adapter: SqlServerAdapter): ToolDefinition {
    return {
        name: 'mssql_execute_procedure',
        description: 'Execute an allowlisted stored procedure with named parameters inside a transaction. Returns every result set and the return value. Requires write mode.',
        group: 'write',
        inputSchema: ExecuteProcedureSchema,
        annotations: destructive('Execute Procedure'),
        handler: async (params: unknown, context: RequestContext) => {
            const { procedure_name, parameters, database, timeout } = ExecuteProcedureSchema.parse(params);

            adapter.requireWriteMode('mssql_execute_procedure');

            const procedure = parseQualifiedName(procedure_name);
            const qualified = `${procedure.schema}.${procedure.name}`;
            if (!adapter.isProcedureAllowed(procedure)) {
                logger.warning('Blocked procedure outside the allowlist', {
                    module: 'TOOLS',
                    code: 'AUDIT_PROCEDURE_BLOCKED',
                    requestId: context.requestId,
                    procedure: qualified
                });
                throw new ProcedureNotAllowlistedError(qualified);
            }

            const bound = toProcedureParameters(parameters);

            logger.notice('Executing stored procedure', {
                module: 'TOOLS',
                code: 'AUDIT_PROCEDURE',
                requestId: context.requestId,
                procedure: qualified,
                parameterNames: bound.map(p => p.name),
                database
            });

            const result = await adapter.executeProcedure({
                schema: procedure.schema,
                name: procedure.name,
                parameters: bound,
                database,
                timeoutSeconds: timeout
            });

            return {
                procedure: qualified,
                result_sets: result.resultSets.map(set => ({
                    columns: set.columns,
                    rows: toJsonRows(set.rows),
                    row_count: set.rows.length,
                    truncated: set.truncated
                })),
                result_set_count: result.resultSets.length,
                return_value: result.returnValue,
                execution_time: toSeconds(result.elapsedMs)
            };
        }
    };
}

export function createExecuteWriteTool(adapter: SqlServerAdapter): ToolDefinition {
    return {
        name: 'mssql_execute_write',
        description: 'Execute a single INSERT, UPDATE or DELETE inside a transaction (rolled back on error). dry_run=true validates lexically without executing. Requires write mode.',
        group: 'write',
        inputSchema: ExecuteWriteSchema,
        annotations: destructive('Execute Write'),
        handler: async (params: unknown, context: RequestContext) => {
            const { statement, database, dry_run } = ExecuteWriteSchema.parse(params);

            if (!adapter.isWriteEnabled()) {
                logger.warning('Blocked write attempt while write mode is disabled', {
                    module: 'TOOLS',
                    code: 'AUDIT_WRITE_BLOCKED',
                    requestId: context.requestId,
                    statement: previewStatement(statement, 100)
                });
            }
            adapter.requireWriteMode('mssql_execute_write');

            const verdict = adapter.validateStatement(statement);
            if (!verdict.approved) {
                throw new StatementRejectedError(verdict.reason ?? 'statement rejected');
            }
            if (verdict.statementKind !== 'write') {
                throw new StatementRejectedError(
                    'only INSERT, UPDATE or DELETE is accepted here; use mssql_query for SELECT'
                );
            }

            if (dry_run) {
                return {
                    validation_result: {
                        approved: true,
                        statement: verdict.normalizedStatement,
                        mode: 'lexical',
                        dry_run: true
                    }
                };
            }

            logger.warning('Executing write operation', {
                module: 'TOOLS',
                code: 'AUDIT_WRITE',
                requestId: context.requestId,
                database,
                statement: previewStatement(verdict.normalizedStatement)
            });

            const result = await adapter.executeWrite({
                statement: verdict.normalizedStatement,
                database,
                maxRows: 1,
                timeoutSeconds: adapter.getDefaultTimeoutSeconds()
            });

            return {
                rows_affected: result.rowsAffected,
                execution_time: toSeconds(result.elapsedMs)
            };
        }
    };
}
