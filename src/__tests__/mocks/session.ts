/**
 * mssql-mcp - Session Mocks
 *
 * In-process stand-in for a database session. Responses are scripted per
 * statement text; every call is recorded for assertions.
 */

import type {
    ColumnMetadata,
    DatabaseSession,
    ProcedureOutcome,
    ResultSet,
    RowHandlers,
    RunOutcome,
    SessionFactory,
    SqlParameter,
    SqlValue
} from '../../types/index.js';

export interface ScriptedResult {
    columns?: ColumnMetadata[];
    rows?: SqlValue[][];
    rowsAffected?: number;
    /** Procedure calls only */
    resultSets?: ResultSet[];
    returnValue?: number;
    error?: Error;
    /** Never completes until cancel() */
    hang?: boolean;
}

export type Script = (sql: string, parameters: readonly SqlParameter[]) => ScriptedResult | undefined;

export interface RecordedCall {
    kind: 'run' | 'batch' | 'procedure';
    sql: string;
    parameters: readonly SqlParameter[];
}

/** Answers the statements the pool issues on its own */
export const defaultScript: Script = (sql) => {
    if (sql === 'SELECT 1') {
        return { columns: [{ name: '', type: 'Int' }], rows: [[1]] };
    }
    if (sql === 'SELECT @@VERSION') {
        return {
            columns: [{ name: '', type: 'NVarChar' }],
            rows: [['Microsoft SQL Server 2022 (RTM)\n\tCopyright (C) 2022']]
        };
    }
    return undefined;
};

export function createCancelError(): Error {
    return Object.assign(new Error('Canceled.'), { code: 'ECANCEL' });
}

export class FakeSession implements DatabaseSession {
    readonly calls: RecordedCall[] = [];
    readonly transactions: string[] = [];
    cancelCount = 0;
    closeCount = 0;
    private open = true;
    private cancelPending: (() => void) | null = null;

    constructor(
        readonly id: number,
        private readonly script: Script
    ) { }

    async run(sql: string, parameters: readonly SqlParameter[], handlers: RowHandlers): Promise<RunOutcome> {
        this.calls.push({ kind: 'run', sql, parameters });
        const result = this.respond(sql, parameters);
        await this.settle(result);

        if (result.columns !== undefined) {
            handlers.onColumns?.(result.columns);
        }
        let stopped = false;
        for (const row of result.rows ?? []) {
            if (!handlers.onRow(row)) {
                stopped = true;
                break;
            }
        }
        return { rowsAffected: result.rowsAffected ?? result.rows?.length ?? 0, stopped };
    }

    async runBatch(sql: string): Promise<void> {
        this.calls.push({ kind: 'batch', sql, parameters: [] });
        await this.settle(this.respond(sql, []));
    }

    async callProcedure(
        name: string,
        parameters: readonly SqlParameter[],
        maxRowsPerSet: number
    ): Promise<ProcedureOutcome> {
        this.calls.push({ kind: 'procedure', sql: name, parameters });
        const result = this.respond(name, parameters);
        await this.settle(result);

        const resultSets = (result.resultSets ?? []).map(set => ({
            columns: set.columns,
            rows: set.rows.slice(0, maxRowsPerSet),
            truncated: set.truncated || set.rows.length > maxRowsPerSet
        }));
        return {
            resultSets,
            returnValue: result.returnValue ?? 0,
            rowsAffected: result.rowsAffected ?? 0
        };
    }

    beginTransaction(): Promise<void> {
        this.transactions.push('begin');
        return Promise.resolve();
    }

    commitTransaction(): Promise<void> {
        this.transactions.push('commit');
        return Promise.resolve();
    }

    rollbackTransaction(): Promise<void> {
        this.transactions.push('rollback');
        return Promise.resolve();
    }

    cancel(): void {
        this.cancelCount++;
        const pending = this.cancelPending;
        this.cancelPending = null;
        pending?.();
    }

    close(): Promise<void> {
        this.closeCount++;
        this.open = false;
        return Promise.resolve();
    }

    isOpen(): boolean {
        return this.open;
    }

    /** Simulate the server dropping the session */
    drop(): void {
        this.open = false;
    }

    /** Statement texts in call order */
    get statements(): string[] {
        return this.calls.map(call => call.sql);
    }

    private respond(sql: string, parameters: readonly SqlParameter[]): ScriptedResult {
        return this.script(sql, parameters) ?? defaultScript(sql, parameters) ?? {};
    }

    private async settle(result: ScriptedResult): Promise<void> {
        if (result.error !== undefined) {
            throw result.error;
        }
        if (result.hang === true) {
            await new Promise<never>((_resolve, reject) => {
                this.cancelPending = () => {
                    reject(createCancelError());
                };
            });
        }
    }
}

export class FakeSessionFactory implements SessionFactory {
    readonly sessions: FakeSession[] = [];
    /** Number of upcoming create() calls that fail */
    failures = 0;
    failureMessage = 'Login failed for user \'sa\'';
    /** Number of upcoming create() calls that never complete until resumeStalled() */
    stalls = 0;
    private readonly stalled: (() => void)[] = [];
    private script: Script;

    constructor(script: Script = () => undefined) {
        this.script = script;
    }

    setScript(script: Script): void {
        this.script = script;
    }

    create(): Promise<DatabaseSession> {
        if (this.failures > 0) {
            this.failures--;
            return Promise.reject(new Error(this.failureMessage));
        }
        if (this.stalls > 0) {
            this.stalls--;
            return new Promise<DatabaseSession>((resolve) => {
                this.stalled.push(() => {
                    resolve(this.openSession());
                });
            });
        }
        return Promise.resolve(this.openSession());
    }

    /** Complete every stalled create() */
    resumeStalled(): void {
        for (const resume of this.stalled.splice(0)) {
            resume();
        }
    }

    get stalledCount(): number {
        return this.stalled.length;
    }

    private openSession(): FakeSession {
        const session = new FakeSession(this.sessions.length + 1, (sql, parameters) => this.script(sql, parameters));
        this.sessions.push(session);
        return session;
    }

    get createdCount(): number {
        return this.sessions.length;
    }
}
