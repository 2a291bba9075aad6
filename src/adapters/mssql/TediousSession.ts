/**
 * mssql-mcp - Tedious Session
 *
 * DatabaseSession backed by one tedious Connection. Statement deadlines are
 * enforced by the executor, so the driver-side request timeout is disabled.
 */

import { Connection, Request, TYPES } from 'tedious';
import type {
    ColumnMetadata,
    ConnectionSettings,
    DatabaseSession,
    ProcedureOutcome,
    ResultSet,
    RowHandlers,
    RunOutcome,
    SessionFactory,
    SqlParameter,
    SqlValue
} from '../../types/index.js';
import { logger } from '../../utils/logger.js';

type TediousConfig = ConstructorParameters<typeof Connection>[0];
type TediousType = (typeof TYPES)[keyof typeof TYPES];

const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;

/**
 * Pick the tedious type used to bind a parameter value
 */
export function inferType(value: SqlValue): TediousType {
    if (value === null) return TYPES.NVarChar;
    if (typeof value === 'number') {
        if (!Number.isInteger(value)) return TYPES.Float;
        return value >= INT32_MIN && value <= INT32_MAX ? TYPES.Int : TYPES.BigInt;
    }
    if (typeof value === 'bigint') return TYPES.BigInt;
    if (typeof value === 'boolean') return TYPES.Bit;
    if (value instanceof Date) return TYPES.DateTime2;
    if (Buffer.isBuffer(value)) return TYPES.VarBinary;
    return TYPES.NVarChar;
}

/**
 * Normalize a driver value into a SqlValue
 */
export function toSqlValue(value: unknown): SqlValue {
    if (value === null || value === undefined) return null;
    if (
        typeof value === 'string' ||
        typeof value === 'number' ||
        typeof value === 'boolean' ||
        typeof value === 'bigint'
    ) {
        return value;
    }
    if (value instanceof Date || Buffer.isBuffer(value)) return value;
    return JSON.stringify(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null;
}

/**
 * Extract name/type pairs from a columnMetadata event payload
 */
export function toColumnMetadata(columns: unknown): ColumnMetadata[] {
    const list: unknown[] = Array.isArray(columns)
        ? columns
        : isRecord(columns) ? Object.values(columns) : [];
    return list.map((column) => {
        if (!isRecord(column)) {
            return { name: '', type: 'unknown' };
        }
        const name = typeof column['colName'] === 'string' ? column['colName'] : '';
        const type = column['type'];
        const typeName = isRecord(type) && typeof type['name'] === 'string' ? type['name'] : 'unknown';
        return { name, type: typeName };
    });
}

/**
 * Extract values from a row event payload (array of {metadata, value})
 */
export function toRowValues(columns: unknown): SqlValue[] {
    if (!Array.isArray(columns)) {
        return [];
    }
    return columns.map((column: unknown) => toSqlValue(isRecord(column) ? column['value'] : undefined));
}

function isCancelError(error: unknown): boolean {
    return isRecord(error) && error['code'] === 'ECANCEL';
}

function bindParameters(request: Request, parameters: readonly SqlParameter[]): void {
    for (const parameter of parameters) {
        const value = typeof parameter.value === 'bigint' ? parameter.value.toString() : parameter.value;
        request.addParameter(parameter.name, inferType(parameter.value), value);
    }
}

export function buildConnectionConfig(settings: ConnectionSettings): TediousConfig {
    return {
        server: settings.host,
        authentication: {
            type: 'default',
            options: {
                userName: settings.user,
                password: settings.password
            }
        },
        options: {
            port: settings.port,
            database: settings.database,
            encrypt: settings.encrypt,
            trustServerCertificate: settings.trustServerCertificate,
            connectTimeout: settings.connectTimeoutMs,
            requestTimeout: 0,
            appName: 'mssql-mcp',
            rowCollectionOnRequestCompletion: false,
            useColumnNames: false
        }
    };
}

export class TediousSession implements DatabaseSession {
    private open = true;

    constructor(private readonly connection: Connection) {
        connection.on('end', () => {
            this.open = false;
        });
        connection.on('error', (error: Error) => {
            this.open = false;
            logger.warn('Database connection error', {
                module: 'POOL',
                code: 'SESSION_ERROR',
                error: error.message
            });
        });
    }

    run(sql: string, parameters: readonly SqlParameter[], handlers: RowHandlers): Promise<RunOutcome> {
        return new Promise<RunOutcome>((resolve, reject) => {
            let stopping = false;

            const request = new Request(sql, (error, rowCount) => {
                if (error) {
                    if (stopping && isCancelError(error)) {
                        resolve({ rowsAffected: rowCount ?? 0, stopped: true });
                        return;
                    }
                    reject(error);
                    return;
                }
                resolve({ rowsAffected: rowCount ?? 0, stopped: stopping });
            });

            bindParameters(request, parameters);

            request.on('columnMetadata', (columns: unknown) => {
                handlers.onColumns?.(toColumnMetadata(columns));
            });

            request.on('row', (columns: unknown) => {
                if (stopping) {
                    return;
                }
                if (!handlers.onRow(toRowValues(columns))) {
                    stopping = true;
                    this.connection.cancel();
                }
            });

            this.connection.execSql(request);
        });
    }

    runBatch(sql: string): Promise<void> {
        return new Promise<void>((resolve, reject) => {
            const request = new Request(sql, (error) => {
                if (error) {
                    reject(error);
                    return;
                }
                resolve();
            });
            this.connection.execSqlBatch(request);
        });
    }

    callProcedure(
        name: string,
        parameters: readonly SqlParameter[],
        maxRowsPerSet: number
    ): Promise<ProcedureOutcome> {
        return new Promise<ProcedureOutcome>((resolve, reject) => {
            const resultSets: ResultSet[] = [];
            let current: ResultSet | undefined;
            let returnValue: number | null = null;

            const request = new Request(name, (error, rowCount) => {
                if (error) {
                    reject(error);
                    return;
                }
                resolve({ resultSets, returnValue, rowsAffected: rowCount ?? 0 });
            });

            bindParameters(request, parameters);

            request.on('columnMetadata', (columns: unknown) => {
                current = { columns: toColumnMetadata(columns), rows: [], truncated: false };
                resultSets.push(current);
            });

            request.on('row', (columns: unknown) => {
                if (current === undefined) {
                    return;
                }
                if (current.rows.length >= maxRowsPerSet) {
                    current.truncated = true;
                    return;
                }
                current.rows.push(toRowValues(columns));
            });

            request.on('doneProc', (_rowCount: number | undefined, _more: boolean, returnStatus: number) => {
                returnValue = returnStatus;
            });

            this.connection.callProcedure(request);
        });
    }

    beginTransaction(): Promise<void> {
        return new Promise<void>((resolve, reject) => {
            this.connection.beginTransaction((error) => {
                if (error) {
                    reject(error);
                    return;
                }
                resolve();
            });
        });
    }

    commitTransaction(): Promise<void> {
        return new Promise<void>((resolve, reject) => {
            this.connection.commitTransaction((error) => {
                if (error) {
                    reject(error);
                    return;
                }
                resolve();
            });
        });
    }

    rollbackTransaction(): Promise<void> {
        return new Promise<void>((resolve, reject) => {
            this.connection.rollbackTransaction((error) => {
                if (error) {
                    reject(error);
                    return;
                }
                resolve();
            });
        });
    }

    cancel(): void {
        this.connection.cancel();
    }

    close(): Promise<void> {
        if (!this.open) {
            return Promise.resolve();
        }
        return new Promise<void>((resolve) => {
            this.connection.once('end', () => {
                resolve();
            });
            this.connection.close();
        });
    }

    isOpen(): boolean {
        return this.open;
    }
}

/**
 * Opens tedious connections for the pool
 */
export class TediousSessionFactory implements SessionFactory {
    constructor(private readonly settings: ConnectionSettings) { }

    create(): Promise<DatabaseSession> {
        return new Promise<DatabaseSession>((resolve, reject) => {
            const connection = new Connection(buildConnectionConfig(this.settings));
            connection.connect((error) => {
                if (error) {
                    reject(error);
                    return;
                }
                resolve(new TediousSession(connection));
            });
        });
    }
}
