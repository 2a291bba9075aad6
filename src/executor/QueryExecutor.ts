/**
 * mssql-mcp - Query Executor
 *
 * Runs one statement on a borrowed connection under a row cap and a
 * deadline. The executor never acquires or releases connections; it only
 * marks them broken when their state can no longer be trusted.
 */

import type { PooledConnection } from '../pool/PooledConnection.js';
import type {
    ColumnMetadata,
    ExecutionRequest,
    ExecutionResult,
    ProcedureRequest,
    ProcedureResult,
    SqlValue,
    WriteResult
} from '../types/index.js';
import {
    DatabaseNotFoundError,
    DriverError,
    MssqlMcpError,
    QueryTimeoutError
} from '../types/index.js';
import { withDeadline } from '../utils/deadline.js';
import { quoteIdentifier, quoteQualifiedName } from '../utils/identifiers.js';
import { logger } from '../utils/logger.js';
import { previewStatement } from '../utils/sanitize.js';

/** Row cap applied to each procedure result set */
export const PROCEDURE_MAX_ROWS = 10000;

export interface QueryExecutorOptions {
    /** Database a connection returns to when a request names none */
    homeDatabase: string;
    /** Literal values scrubbed from surfaced driver messages */
    secrets?: readonly string[];
}

export class QueryExecutor {
    private readonly homeDatabase: string;
    private readonly secrets: readonly string[];

    constructor(options: QueryExecutorOptions) {
        this.homeDatabase = options.homeDatabase;
        this.secrets = options.secrets ?? [];
    }

    /**
     * Run a row-returning statement, keeping at most `maxRows` rows
     */
    async execute(request: ExecutionRequest, connection: PooledConnection): Promise<ExecutionResult> {
        return this.runWithDeadline(connection, request.timeoutSeconds, async () => {
            await this.useDatabase(connection, request.database);

            let columns: ColumnMetadata[] = [];
            const rows: SqlValue[][] = [];
            let truncated = false;

            const startTime = Date.now();
            await connection.session.run(request.statement, request.parameters ?? [], {
                onColumns: (meta) => {
                    if (columns.length === 0) {
                        columns = meta;
                    }
                },
                onRow: (values) => {
                    if (rows.length >= request.maxRows) {
                        truncated = true;
                        return false;
                    }
                    rows.push(values);
                    return true;
                }
            });
            const elapsedMs = Date.now() - startTime;

            logger.debug('Query executed', {
                module: 'QUERY',
                sql: previewStatement(request.statement, 100),
                rowCount: rows.length,
                truncated,
                durationMs: elapsedMs
            });

            return { columns, rows, rowCount: rows.length, truncated, elapsedMs };
        });
    }

    /**
     * Run an INSERT/UPDATE/DELETE inside a transaction
     */
    async executeWrite(request: ExecutionRequest, connection: PooledConnection): Promise<WriteResult> {
        return this.runWithDeadline(connection, request.timeoutSeconds, async () => {
            await this.useDatabase(connection, request.database);

            const startTime = Date.now();
            const rowsAffected = await this.inTransaction(connection, async () => {
                const outcome = await connection.session.run(
                    request.statement,
                    request.parameters ?? [],
                    { onRow: () => true }
                );
                return outcome.rowsAffected;
            });
            const elapsedMs = Date.now() - startTime;

            logger.debug('Write executed', {
                module: 'QUERY',
                sql: previewStatement(request.statement, 100),
                rowsAffected,
                durationMs: elapsedMs
            });

            return { rowsAffected, elapsedMs };
        });
    }

    /**
     * Call a stored procedure inside a transaction, collecting every result set
     */
    async executeProcedure(request: ProcedureRequest, connection: PooledConnection): Promise<ProcedureResult> {
        return this.runWithDeadline(connection, request.timeoutSeconds, async () => {
            await this.useDatabase(connection, request.database);

            const startTime = Date.now();
            const outcome = await this.inTransaction(connection, () =>
                connection.session.callProcedure(
                    quoteQualifiedName(request.schema, request.name),
                    request.parameters,
                    PROCEDURE_MAX_ROWS
                )
            );
            return { ...outcome, elapsedMs: Date.now() - startTime };
        });
    }

    // =========================================================================
    // Internals
    // =========================================================================

    /**
     * Switch the session to `database` (or back to the home database).
     * A caller-supplied name is looked up in sys.databases with a bound
     * parameter first; only the catalog's own spelling reaches the USE text.
     */
    private async useDatabase(connection: PooledConnection, database: string | undefined): Promise<void> {
        const target = database ?? this.homeDatabase;
        if (target === connection.currentDatabase) {
            return;
        }

        let canonical = target;
        if (target !== this.homeDatabase) {
            let found: string | undefined;
            await connection.session.run(
                'SELECT name FROM sys.databases WHERE name = @name',
                [{ name: 'name', value: target }],
                {
                    onRow: (values) => {
                        const name = values[0];
                        if (typeof name === 'string') {
                            found = name;
                        }
                        return true;
                    }
                }
            );
            if (found === undefined) {
                throw new DatabaseNotFoundError(target);
            }
            canonical = found;
        }

        await connection.session.runBatch(`USE ${quoteIdentifier(canonical)}`);
        connection.currentDatabase = canonical;
    }

    private async inTransaction<T>(connection: PooledConnection, work: () => Promise<T>): Promise<T> {
        const session = connection.session;
        await session.beginTransaction();
        try {
            const result = await work();
            await session.commitTransaction();
            return result;
        } catch (error) {
            await this.rollback(connection);
            throw error;
        }
    }

    private async rollback(connection: PooledConnection): Promise<void> {
        if (connection.isBroken) {
            return;
        }
        try {
            await connection.session.rollbackTransaction();
        } catch (error) {
            connection.markBroken('rollback failed');
            logger.warn('Rollback failed; connection will be discarded', {
                module: 'QUERY',
                code: 'QUERY_ROLLBACK_FAILED',
                connectionId: connection.id,
                error: DriverError.fromDriver(error, this.secrets).message
            });
        }
    }

    /**
     * Enforce the deadline. On expiry the connection is marked broken before
     * the in-flight request is cancelled, so it is never reused as idle.
     */
    private async runWithDeadline<T>(
        connection: PooledConnection,
        timeoutSeconds: number,
        work: () => Promise<T>
    ): Promise<T> {
        try {
            return await withDeadline(work(), timeoutSeconds * 1000, () => {
                connection.markBroken('statement timed out');
                connection.session.cancel();
                logger.warn('Statement timed out and was cancelled', {
                    module: 'QUERY',
                    code: 'QUERY_TIMEOUT',
                    connectionId: connection.id,
                    timeoutSeconds
                });
                return new QueryTimeoutError(timeoutSeconds);
            });
        } catch (error) {
            if (error instanceof MssqlMcpError) {
                throw error;
            }
            throw DriverError.fromDriver(error, this.secrets);
        }
    }
}
