/**
 * Unit tests for the query executor
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
    DatabaseNotFoundError,
    DriverError,
    QueryTimeoutError,
    type ExecutionRequest
} from '../../types/index.js';
import { FakeSession, type Script } from '../../__tests__/mocks/index.js';

vi.mock('../../utils/logger.js', () => ({
    logger: {
        debug: vi.fn(),
        info: vi.fn(),
        notice: vi.fn(),
        warn: vi.fn(),
        warning: vi.fn(),
        error: vi.fn()
    }
}));

import { QueryExecutor, PROCEDURE_MAX_ROWS } from '../QueryExecutor.js';
import { PooledConnection } from '../../pool/PooledConnection.js';

const LOOKUP_SQL = 'SELECT name FROM sys.databases WHERE name = @name';

const TEN_ROWS = Array.from({ length: 10 }, (_, i) => [i + 1, `name-${String(i + 1)}`]);

const baseScript: Script = (sql, parameters) => {
    if (sql === 'SELECT id, name FROM dbo.Items') {
        return {
            columns: [{ name: 'id', type: 'Int' }, { name: 'name', type: 'NVarChar' }],
            rows: TEN_ROWS
        };
    }
    if (sql === LOOKUP_SQL) {
        const requested = parameters[0]?.value;
        return requested === 'sales' || requested === 'Sales' ? { rows: [['Sales']] } : { rows: [] };
    }
    return undefined;
};

function request(overrides: Partial<ExecutionRequest> = {}): ExecutionRequest {
    return {
        statement: 'SELECT id, name FROM dbo.Items',
        maxRows: 1000,
        timeoutSeconds: 30,
        ...overrides
    };
}

describe('QueryExecutor', () => {
    let session: FakeSession;
    let connection: PooledConnection;
    let executor: QueryExecutor;
    let script: Script;

    beforeEach(() => {
        script = baseScript;
        session = new FakeSession(1, (sql, parameters) => script(sql, parameters));
        connection = new PooledConnection(1, session, 'AppDb');
        executor = new QueryExecutor({ homeDatabase: 'AppDb', secrets: ['test-secret'] });
    });

    afterEach(() => {
        vi.useRealTimers();
    });

    describe('execute', () => {
        it('returns columns and rows', async () => {
            const result = await executor.execute(request(), connection);

            expect(result.columns).toEqual([
                { name: 'id', type: 'Int' },
                { name: 'name', type: 'NVarChar' }
            ]);
            expect(result.rowCount).toBe(10);
            expect(result.rows[0]).toEqual([1, 'name-1']);
            expect(result.truncated).toBe(false);
            expect(result.elapsedMs).toBeGreaterThanOrEqual(0);
        });

        it('stops reading at max_rows and flags truncation', async () => {
            const result = await executor.execute(request({ maxRows: 3 }), connection);

            expect(result.rows).toEqual([[1, 'name-1'], [2, 'name-2'], [3, 'name-3']]);
            expect(result.rowCount).toBe(3);
            expect(result.truncated).toBe(true);
        });

        it('does not flag truncation when the result fits exactly', async () => {
            const result = await executor.execute(request({ maxRows: 10 }), connection);

            expect(result.rowCount).toBe(10);
            expect(result.truncated).toBe(false);
        });

        it('binds parameters', async () => {
            await executor.execute(
                request({ parameters: [{ name: 'id', value: 7 }] }),
                connection
            );
            expect(session.calls[0]?.parameters).toEqual([{ name: 'id', value: 7 }]);
        });
    });

    describe('database context', () => {
        it('stays in the home database without extra round trips', async () => {
            await executor.execute(request(), connection);
            expect(session.statements).toEqual(['SELECT id, name FROM dbo.Items']);
        });

        it('checks the catalog before switching database', async () => {
            await executor.execute(request({ database: 'sales' }), connection);

            expect(session.statements).toEqual([
                LOOKUP_SQL,
                'USE [Sales]',
                'SELECT id, name FROM dbo.Items'
            ]);
            expect(session.calls[0]?.parameters).toEqual([{ name: 'name', value: 'sales' }]);
            expect(session.calls.map(call => call.kind)).toEqual(['run', 'batch', 'run']);
            expect(connection.currentDatabase).toBe('Sales');
        });

        it('switches back to the home database for the next borrower', async () => {
            await executor.execute(request({ database: 'Sales' }), connection);
            await executor.execute(request(), connection);

            expect(session.statements.slice(3)).toEqual(['USE [AppDb]', 'SELECT id, name FROM dbo.Items']);
            expect(connection.currentDatabase).toBe('AppDb');
        });

        it('rejects a database missing from the catalog', async () => {
            const attempt = executor.execute(request({ database: 'Nope]; DROP DATABASE x --' }), connection);

            await expect(attempt).rejects.toThrow(DatabaseNotFoundError);
            await expect(attempt).rejects.toThrow("Database 'Nope]; DROP DATABASE x --' does not exist");
            expect(session.statements).toEqual([LOOKUP_SQL]);
        });
    });

    describe('errors', () => {
        it('wraps driver errors with their number', async () => {
            script = () => ({
                error: Object.assign(new Error("Invalid object name 'dbo.Items'."), {
                    number: 208,
                    state: 1,
                    class: 16
                })
            });

            const attempt = executor.execute(request(), connection);
            await expect(attempt).rejects.toThrow(DriverError);
            await expect(attempt).rejects.toMatchObject({
                message: "Database error 208: Invalid object name 'dbo.Items'.",
                code: 'DRIVER_ERROR',
                details: { number: 208, state: 1, class: 16 }
            });
        });

        it('cancels and marks the connection broken on timeout', async () => {
            vi.useFakeTimers();
            script = () => ({ hang: true });

            const attempt = expect(executor.execute(request({ timeoutSeconds: 2 }), connection))
                .rejects.toThrow('Statement exceeded its 2s timeout and was cancelled');
            await vi.advanceTimersByTimeAsync(2000);
            await attempt;

            expect(session.cancelCount).toBe(1);
            expect(connection.isBroken).toBe(true);
            expect(connection.reason).toBe('statement timed out');
        });

        it('raises QueryTimeoutError with the TIMEOUT code', async () => {
            vi.useFakeTimers();
            script = () => ({ hang: true });

            const attempt = expect(executor.execute(request({ timeoutSeconds: 1 }), connection))
                .rejects.toBeInstanceOf(QueryTimeoutError);
            await vi.advanceTimersByTimeAsync(1000);
            await attempt;
        });
    });

    describe('executeWrite', () => {
        it('commits and reports rows affected', async () => {
            script = () => ({ rowsAffected: 4 });

            const result = await executor.executeWrite(
                request({ statement: "UPDATE dbo.Items SET name = 'x'" }),
                connection
            );

            expect(result.rowsAffected).toBe(4);
            expect(session.transactions).toEqual(['begin', 'commit']);
        });

        it('rolls back when the statement fails', async () => {
            script = () => ({ error: new Error('Violation of PRIMARY KEY constraint') });

            await expect(
                executor.executeWrite(request({ statement: 'INSERT INTO dbo.Items VALUES (1)' }), connection)
            ).rejects.toThrow('Database error: Violation of PRIMARY KEY constraint');
            expect(session.transactions).toEqual(['begin', 'rollback']);
            expect(connection.isBroken).toBe(false);
        });

        it('skips the rollback on a connection broken by a timeout', async () => {
            vi.useFakeTimers();
            script = () => ({ hang: true });

            const attempt = expect(
                executor.executeWrite(request({ statement: 'DELETE FROM dbo.Items', timeoutSeconds: 1 }), connection)
            ).rejects.toThrow(QueryTimeoutError);
            await vi.advanceTimersByTimeAsync(1000);
            await attempt;

            expect(session.transactions).toEqual(['begin']);
        });
    });

    describe('executeProcedure', () => {
        it('calls the bracket-quoted procedure inside a transaction', async () => {
            script = (sql) => sql === '[reports].[usp_daily]'
                ? {
                    resultSets: [
                        { columns: [{ name: 'day', type: 'Date' }], rows: [['2024-01-01'], ['2024-01-02']], truncated: false },
                        { columns: [{ name: 'total', type: 'Int' }], rows: [[3]], truncated: false }
                    ],
                    returnValue: 5,
                    rowsAffected: 0
                }
                : undefined;

            const result = await executor.executeProcedure(
                {
                    schema: 'reports',
                    name: 'usp_daily',
                    parameters: [{ name: 'from', value: '2024-01-01' }],
                    timeoutSeconds: 30
                },
                connection
            );

            expect(session.calls[0]).toEqual({
                kind: 'procedure',
                sql: '[reports].[usp_daily]',
                parameters: [{ name: 'from', value: '2024-01-01' }]
            });
            expect(result.resultSets).toHaveLength(2);
            expect(result.resultSets[1]?.rows).toEqual([[3]]);
            expect(result.returnValue).toBe(5);
            expect(session.transactions).toEqual(['begin', 'commit']);
        });

        it('caps each result set', async () => {
            const rows = Array.from({ length: PROCEDURE_MAX_ROWS + 5 }, (_, i) => [i]);
            script = () => ({ resultSets: [{ columns: [{ name: 'n', type: 'Int' }], rows, truncated: false }] });

            const result = await executor.executeProcedure(
                { schema: 'dbo', name: 'usp_big', parameters: [], timeoutSeconds: 30 },
                connection
            );

            expect(result.resultSets[0]?.rows).toHaveLength(PROCEDURE_MAX_ROWS);
            expect(result.resultSets[0]?.truncated).toBe(true);
        });
    });
});
