/**
 * mssql-mcp - SQL Server Adapter
 *
 * Composes the statement validator, connection pool and query executor and
 * exposes them to the tool and resource definitions.
 */

import { DatabaseAdapter } from '../DatabaseAdapter.js';
import { ConnectionPool } from '../../pool/ConnectionPool.js';
import { QueryExecutor } from '../../executor/QueryExecutor.js';
import { StatementValidator, type ValidationVerdict } from '../../validation/StatementValidator.js';
import type {
    ExecutionRequest,
    ExecutionResult,
    HealthStatus,
    PoolStats,
    ProcedureRequest,
    ProcedureResult,
    ResourceDefinition,
    ServerSettings,
    SessionFactory,
    SqlParameter,
    ToolDefinition,
    WriteResult
} from '../../types/index.js';
import { WriteDisabledError } from '../../types/index.js';
import { parseQualifiedName, qualifiedKey, type QualifiedName } from '../../utils/identifiers.js';
import { logger } from '../../utils/logger.js';
import { rowsToObjects, type CatalogRow } from './catalog.js';
import { TediousSessionFactory } from './TediousSession.js';
import { getSqlServerTools } from './tools/index.js';
import { getSqlServerResources } from './resources/index.js';

/** Row cap for internal catalog statements */
export const CATALOG_MAX_ROWS = 10000;

/**
 * Runs one catalog statement on the borrowed connection
 */
export type CatalogRunner = (sql: string, parameters?: SqlParameter[]) => Promise<CatalogRow[]>;

export interface SqlServerAdapterOptions {
    /** Overrides the tedious-backed session factory (tests) */
    sessionFactory?: SessionFactory;
}

export class SqlServerAdapter extends DatabaseAdapter {
    readonly name = 'SQL Server Adapter';
    readonly version = '0.1.0';

    readonly validator: StatementValidator;
    private readonly pool: ConnectionPool;
    private readonly executor: QueryExecutor;
    private readonly allowlist: ReadonlySet<string>;
    private cachedToolDefinitions: ToolDefinition[] | null = null;

    constructor(
        private readonly settings: ServerSettings,
        options: SqlServerAdapterOptions = {}
    ) {
        super();
        const homeDatabase = settings.connection.database;
        const secrets = this.getSecrets();

        this.validator = StatementValidator.withExtraDenylist(settings.blockedKeywords);
        this.pool = new ConnectionPool(
            settings.pool,
            options.sessionFactory ?? new TediousSessionFactory(settings.connection),
            { homeDatabase, secrets }
        );
        this.executor = new QueryExecutor({ homeDatabase, secrets });
        this.allowlist = new Set(
            settings.procedureAllowlist.map(entry => qualifiedKey(parseQualifiedName(entry)))
        );
    }

    // =========================================================================
    // Connection Lifecycle
    // =========================================================================

    async connect(): Promise<void> {
        if (this.connected) {
            logger.warn('Already connected', { module: 'ADAPTER' });
            return;
        }
        await this.pool.initialize();
        this.connected = true;
        logger.info('SQL Server adapter connected', {
            module: 'ADAPTER',
            host: this.settings.connection.host,
            port: this.settings.connection.port,
            database: this.settings.connection.database,
            writeEnabled: this.settings.writeEnabled
        });
    }

    async disconnect(): Promise<void> {
        await this.pool.shutdown();
        this.connected = false;
        logger.info('SQL Server adapter disconnected', { module: 'ADAPTER' });
    }

    async getHealth(): Promise<HealthStatus> {
        return this.pool.checkHealth();
    }

    getPoolStats(): PoolStats {
        return this.pool.getStats();
    }

    // =========================================================================
    // Policy
    // =========================================================================

    isWriteEnabled(): boolean {
        return this.settings.writeEnabled;
    }

    getHomeDatabase(): string {
        return this.settings.connection.database;
    }

    getDefaultTimeoutSeconds(): number {
        return this.settings.defaultTimeoutSeconds;
    }

    /**
     * Throws WriteDisabledError when write mode is off
     */
    requireWriteMode(operation: string): void {
        if (!this.settings.writeEnabled) {
            throw new WriteDisabledError(operation);
        }
    }

    isProcedureAllowed(name: QualifiedName): boolean {
        return this.allowlist.has(qualifiedKey(name));
    }

    /**
     * Validate caller-supplied text under the current write policy
     */
    validateStatement(statement: string): ValidationVerdict {
        return this.validator.validate(statement, this.settings.writeEnabled);
    }

    // =========================================================================
    // Execution
    // =========================================================================

    async executeRead(request: ExecutionRequest): Promise<ExecutionResult> {
        return this.pool.withConnection(conn => this.executor.execute(request, conn));
    }

    async executeWrite(request: ExecutionRequest): Promise<WriteResult> {
        return this.pool.withConnection(conn => this.executor.executeWrite(request, conn));
    }

    async executeProcedure(request: ProcedureRequest): Promise<ProcedureResult> {
        return this.pool.withConnection(conn => this.executor.executeProcedure(request, conn));
    }

    /**
     * Run several catalog statements on one leased connection
     */
    async withCatalog<T>(database: string | undefined, fn: (run: CatalogRunner) => Promise<T>): Promise<T> {
        const timeoutSeconds = this.settings.defaultTimeoutSeconds;
        return this.pool.withConnection(conn => fn(async (sql, parameters) => {
            const result = await this.executor.execute(
                { statement: sql, database, maxRows: CATALOG_MAX_ROWS, timeoutSeconds, parameters },
                conn
            );
            return rowsToObjects(result);
        }));
    }

    // =========================================================================
    // MCP Registration
    // =========================================================================

    getToolDefinitions(): ToolDefinition[] {
        this.cachedToolDefinitions ??= getSqlServerTools(this);
        return this.cachedToolDefinitions;
    }

    getResourceDefinitions(): ResourceDefinition[] {
        return getSqlServerResources(this);
    }

    protected getSecrets(): readonly string[] {
        return [this.settings.connection.password];
    }

    override getInfo(): Record<string, unknown> {
        return {
            ...super.getInfo(),
            host: this.settings.connection.host,
            database: this.settings.connection.database,
            writeEnabled: this.settings.writeEnabled,
            procedureAllowlist: [...this.allowlist]
        };
    }
}
