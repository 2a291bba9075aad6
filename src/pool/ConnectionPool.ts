/**
 * mssql-mcp - Connection Pool
 *
 * Bounded set of live SQL Server sessions with lease bookkeeping, staleness
 * re-validation, lifetime/idle recycling and graceful shutdown.
 *
 * All membership changes (idle list, leased set, pending counter) happen in
 * synchronous sections between awaits, so they never interleave. Callers
 * waiting for capacity park in the waiter queue; release() hands a healthy
 * connection straight to the oldest waiter.
 */

import type {
    DatabaseSession,
    HealthStatus,
    PoolConfig,
    PoolStats,
    SessionFactory
} from '../types/index.js';
import {
    ConnectionError,
    ConnectionUnavailableError,
    PoolClosedError,
    PoolExhaustedError
} from '../types/index.js';
import { withDeadline } from '../utils/deadline.js';
import { logger } from '../utils/logger.js';
import { sanitizeMessage } from '../utils/sanitize.js';
import { PooledConnection } from './PooledConnection.js';

export interface ConnectionPoolOptions {
    /** Database every new session starts in */
    homeDatabase: string;
    /** Literal values scrubbed from surfaced error messages */
    secrets?: readonly string[];
}

interface Waiter {
    /** null means "capacity freed, try again" */
    resolve: (connection: PooledConnection | null) => void;
    reject: (error: Error) => void;
    timer: NodeJS.Timeout;
}

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

export class ConnectionPool {
    private readonly idle: PooledConnection[] = [];
    private readonly leased = new Set<PooledConnection>();
    private readonly waiters: Waiter[] = [];
    private readonly background = new Set<Promise<void>>();
    private readonly secrets: readonly string[];
    private readonly homeDatabase: string;
    private pending = 0;
    private nextId = 1;
    private initialized = false;
    private closed = false;
    private reaper: NodeJS.Timeout | null = null;
    private shutdownPromise: Promise<void> | null = null;
    private drainResolve: (() => void) | null = null;

    constructor(
        private readonly config: PoolConfig,
        private readonly factory: SessionFactory,
        options: ConnectionPoolOptions
    ) {
        if (config.maxSize < 1 || config.minSize < 0 || config.minSize > config.maxSize) {
            throw new ConnectionError(
                `Invalid pool bounds: min=${String(config.minSize)} max=${String(config.maxSize)}`
            );
        }
        this.secrets = options.secrets ?? [];
        this.homeDatabase = options.homeDatabase;
    }

    // =========================================================================
    // Lifecycle
    // =========================================================================

    /**
     * Open `minSize` connections and start the idle reaper. Fails only when
     * a non-zero minimum was requested and no connection could be opened.
     */
    async initialize(): Promise<void> {
        if (this.closed) {
            throw new PoolClosedError();
        }
        if (this.initialized) {
            logger.warn('Connection pool already initialized', { module: 'POOL' });
            return;
        }
        this.initialized = true;

        logger.info('Initializing connection pool', {
            module: 'POOL',
            min: this.config.minSize,
            max: this.config.maxSize
        });

        const attempts = Array.from({ length: this.config.minSize }, () => this.createIdle());
        const results = await Promise.allSettled(attempts);
        const failures = results.filter(
            (r): r is PromiseRejectedResult => r.status === 'rejected'
        );

        if (failures.length > 0 && failures.length === attempts.length) {
            const first = failures[0];
            const reason = first === undefined ? 'unknown error' : errorMessage(first.reason);
            logger.error('Failed to initialize connection pool', {
                module: 'POOL',
                code: 'POOL_INIT_FAILED',
                error: sanitizeMessage(reason, this.secrets)
            });
            throw new ConnectionError(
                `Failed to connect to SQL Server: ${sanitizeMessage(reason, this.secrets)}`
            );
        }
        if (failures.length > 0) {
            logger.warn('Connection pool started below its minimum size', {
                module: 'POOL',
                opened: attempts.length - failures.length,
                min: this.config.minSize
            });
        }

        this.startReaper();
        logger.info('Connection pool initialized', { module: 'POOL', ...this.getStats() });
    }

    /**
     * Close every connection. Idle ones close immediately, leased ones are
     * given `graceMs` to come back before being force-closed. Waiters and
     * later acquire() calls fail with PoolClosedError.
     */
    shutdown(graceMs: number = this.config.shutdownGraceMs): Promise<void> {
        this.shutdownPromise ??= this.runShutdown(graceMs);
        return this.shutdownPromise;
    }

    private async runShutdown(graceMs: number): Promise<void> {
        logger.info('Shutting down connection pool...', { module: 'POOL' });
        this.closed = true;
        this.stopReaper();

        for (const waiter of this.waiters.splice(0)) {
            clearTimeout(waiter.timer);
            waiter.reject(new PoolClosedError());
        }

        const idle = this.idle.splice(0);
        await Promise.all(idle.map(conn => this.closeConnection(conn, 'expired')));

        if (this.leased.size > 0) {
            logger.info('Waiting for leased connections', {
                module: 'POOL',
                leased: this.leased.size,
                graceMs
            });
            let graceTimer: NodeJS.Timeout | undefined;
            await new Promise<void>(resolve => {
                this.drainResolve = resolve;
                graceTimer = setTimeout(resolve, graceMs);
            });
            clearTimeout(graceTimer);
            this.drainResolve = null;
        }

        const stragglers = [...this.leased];
        this.leased.clear();
        if (stragglers.length > 0) {
            logger.warn('Force-closing leased connections after grace period', {
                module: 'POOL',
                count: stragglers.length
            });
        }
        await Promise.all(stragglers.map(conn => {
            conn.session.cancel();
            return this.closeConnection(conn, 'broken');
        }));

        await Promise.allSettled([...this.background]);
        logger.info('Connection pool shut down successfully', { module: 'POOL' });
    }

    isInitialized(): boolean {
        return this.initialized && !this.closed;
    }

    isClosing(): boolean {
        return this.closed;
    }

    // =========================================================================
    // Leasing
    // =========================================================================

    /**
     * Lease a connection, waiting up to `timeoutMs` for one to become free.
     */
    async acquire(timeoutMs: number = this.config.acquireTimeoutMs): Promise<PooledConnection> {
        const deadline = Date.now() + timeoutMs;

        for (;;) {
            if (this.closed) {
                throw new PoolClosedError();
            }

            const candidate = this.idle.pop();
            if (candidate !== undefined) {
                this.lease(candidate);
                const ready = await this.prepareLease(candidate, deadline);
                if (ready) {
                    return candidate;
                }
                continue;
            }

            const remaining = deadline - Date.now();
            if (remaining <= 0) {
                throw new PoolExhaustedError(timeoutMs, { max: this.config.maxSize });
            }

            if (this.totalCount() < this.config.maxSize) {
                return this.createLeased(deadline, timeoutMs);
            }

            const handedOff = await this.waitForConnection(remaining, timeoutMs);
            if (handedOff !== null) {
                const ready = await this.prepareLease(handedOff, deadline);
                if (ready) {
                    return handedOff;
                }
            }
        }
    }

    /**
     * Return a leased connection. Broken or expired connections are closed
     * and the pool is topped back up to its minimum.
     */
    release(connection: PooledConnection): void {
        if (!this.leased.has(connection)) {
            logger.warn('Ignoring release of a connection not leased from this pool', {
                module: 'POOL',
                code: 'POOL_FOREIGN_RELEASE',
                connectionId: connection.id
            });
            return;
        }
        this.unlease(connection);

        if (this.closed) {
            this.track(this.closeConnection(connection, 'expired'));
            return;
        }

        if (connection.isBroken || connection.isExpired(this.config.maxLifetimeMs)) {
            const state = connection.isBroken ? 'broken' : 'expired';
            logger.debug(`Discarding ${state} connection on release`, {
                module: 'POOL',
                connectionId: connection.id,
                reason: connection.reason
            });
            this.track(this.closeConnection(connection, state));
            this.onCapacityFreed();
            return;
        }

        connection.lastUsedAt = Date.now();
        this.handOff(connection);
    }

    /**
     * Scoped acquisition: the connection is released on every exit path
     */
    async withConnection<T>(
        fn: (connection: PooledConnection) => Promise<T>,
        timeoutMs?: number
    ): Promise<T> {
        const connection = await this.acquire(timeoutMs);
        try {
            return await fn(connection);
        } finally {
            this.release(connection);
        }
    }

    // =========================================================================
    // Monitoring
    // =========================================================================

    getStats(): PoolStats {
        const available = this.idle.length;
        const leased = this.leased.size;
        return {
            total: available + leased,
            available,
            max: this.config.maxSize,
            min: this.config.minSize,
            leased,
            waiting: this.waiters.length
        };
    }

    async checkHealth(): Promise<HealthStatus> {
        if (!this.isInitialized()) {
            return {
                connected: false,
                error: this.closed ? 'Pool is closed' : 'Pool not initialized'
            };
        }

        const startTime = Date.now();
        try {
            const version = await this.withConnection(async (conn) => {
                let value: string | undefined;
                await conn.session.run('SELECT @@VERSION', [], {
                    onRow: (values) => {
                        const first = values[0];
                        value = typeof first === 'string' ? first.split('\n')[0]?.trim() : undefined;
                        return true;
                    }
                });
                conn.lastValidatedAt = Date.now();
                return value;
            });
            return {
                connected: true,
                latencyMs: Date.now() - startTime,
                version,
                poolStats: this.getStats()
            };
        } catch (error) {
            return {
                connected: false,
                error: sanitizeMessage(errorMessage(error), this.secrets),
                latencyMs: Date.now() - startTime
            };
        }
    }

    /**
     * Close idle connections past their lifetime, and idle connections unused
     * for longer than the idle timeout while the pool is above its minimum.
     * Runs on the reaper timer; exposed for tests.
     */
    reapIdle(now: number = Date.now()): number {
        if (this.closed) {
            return 0;
        }
        let reaped = 0;
        for (const conn of [...this.idle]) {
            const expired = conn.isExpired(this.config.maxLifetimeMs, now);
            const idleTooLong = this.config.idleTimeoutMs > 0
                && now - conn.lastUsedAt > this.config.idleTimeoutMs
                && this.totalCount() > this.config.minSize;
            if (expired || idleTooLong) {
                this.idle.splice(this.idle.indexOf(conn), 1);
                this.track(this.closeConnection(conn, 'expired'));
                reaped++;
            }
        }
        if (reaped > 0) {
            logger.debug('Reaped idle connections', { module: 'POOL', reaped });
            this.replenish();
        }
        return reaped;
    }

    // =========================================================================
    // Internals
    // =========================================================================

    private totalCount(): number {
        return this.idle.length + this.leased.size + this.pending;
    }

    private lease(connection: PooledConnection): void {
        connection.state = 'leased';
        this.leased.add(connection);
    }

    private unlease(connection: PooledConnection): void {
        this.leased.delete(connection);
        if (this.closed && this.leased.size === 0 && this.drainResolve !== null) {
            this.drainResolve();
        }
    }

    /**
     * Checks a just-leased connection. Returns false (after discarding it)
     * when it is expired, broken, or fails re-validation.
     */
    private async prepareLease(connection: PooledConnection, deadline: number): Promise<boolean> {
        let discard: 'expired' | 'broken' | null = null;
        if (connection.isExpired(this.config.maxLifetimeMs)) {
            discard = 'expired';
        } else if (connection.isBroken) {
            discard = 'broken';
        } else if (connection.isStale(this.config.validationIntervalMs)) {
            const valid = await this.validate(connection, Math.max(deadline - Date.now(), 1));
            if (!valid) {
                discard = 'broken';
            }
        }

        if (discard === null && this.closed) {
            discard = 'expired';
        }

        if (discard !== null) {
            this.unlease(connection);
            await this.closeConnection(connection, discard);
            if (this.closed) {
                throw new PoolClosedError();
            }
            return false;
        }

        connection.lastUsedAt = Date.now();
        return true;
    }

    private async validate(connection: PooledConnection, budgetMs: number): Promise<boolean> {
        try {
            await withDeadline(
                connection.session.run('SELECT 1', [], { onRow: () => true }),
                budgetMs,
                () => {
                    connection.session.cancel();
                    return new Error('validation timed out');
                }
            );
            connection.lastValidatedAt = Date.now();
            return true;
        } catch (error) {
            connection.markBroken('validation failed');
            logger.warn('Discarding connection that failed validation', {
                module: 'POOL',
                code: 'POOL_VALIDATION_FAILED',
                connectionId: connection.id,
                error: sanitizeMessage(errorMessage(error), this.secrets)
            });
            return false;
        }
    }

    /**
     * Open a session, retrying once immediately
     */
    private async openSession(): Promise<DatabaseSession> {
        try {
            return await this.factory.create();
        } catch (first) {
            logger.warn('Connection attempt failed, retrying once', {
                module: 'POOL',
                code: 'POOL_CONNECT_RETRY',
                error: sanitizeMessage(errorMessage(first), this.secrets)
            });
        }
        try {
            return await this.factory.create();
        } catch (second) {
            const message = sanitizeMessage(errorMessage(second), this.secrets);
            logger.error('Unable to open a database connection', {
                module: 'POOL',
                code: 'POOL_CONNECT_FAILED',
                error: message
            });
            throw new ConnectionUnavailableError(`Unable to open a database connection: ${message}`);
        }
    }

    /**
     * Callers count the attempt in `pending` before calling and settle it
     * in the same synchronous section that places the connection.
     */
    private async openConnection(): Promise<PooledConnection> {
        const session = await this.openSession();
        const connection = new PooledConnection(this.nextId++, session, this.homeDatabase);
        logger.debug('New connection established', { module: 'POOL', connectionId: connection.id });
        return connection;
    }

    /**
     * Open a connection for the caller within the acquire budget. An attempt
     * that outlives the budget keeps its pending slot until it settles, then
     * joins the idle list (or is closed if the pool shut down meanwhile).
     */
    private async createLeased(deadline: number, timeoutMs: number): Promise<PooledConnection> {
        this.pending++;
        const opening = this.openConnection();
        let timedOut = false;
        let connection: PooledConnection;
        try {
            connection = await withDeadline(opening, deadline - Date.now(), () => {
                timedOut = true;
                logger.warn('Timed out opening a pooled connection', {
                    module: 'POOL',
                    code: 'POOL_EXHAUSTED',
                    timeoutMs
                });
                return new PoolExhaustedError(timeoutMs, { max: this.config.maxSize });
            });
        } catch (error) {
            if (timedOut) {
                void this.adoptLateConnection(opening);
            } else {
                this.pending--;
                this.onCapacityFreed();
            }
            throw error;
        }
        this.pending--;
        if (this.closed) {
            await this.closeConnection(connection, 'expired');
            throw new PoolClosedError();
        }
        this.lease(connection);
        return connection;
    }

    private async adoptLateConnection(opening: Promise<PooledConnection>): Promise<void> {
        let connection: PooledConnection;
        try {
            connection = await opening;
        } catch (error) {
            this.pending--;
            logger.debug('Late connection attempt failed', {
                module: 'POOL',
                error: sanitizeMessage(errorMessage(error), this.secrets)
            });
            this.onCapacityFreed();
            return;
        }
        this.pending--;
        if (this.closed) {
            await this.closeConnection(connection, 'expired');
            return;
        }
        this.handOff(connection);
    }

    private async createIdle(): Promise<void> {
        this.pending++;
        let connection: PooledConnection;
        try {
            connection = await this.openConnection();
        } finally {
            this.pending--;
        }
        if (this.closed) {
            await this.closeConnection(connection, 'expired');
            return;
        }
        this.handOff(connection);
    }

    /**
     * Give a healthy connection to the oldest waiter, or park it as idle
     */
    private handOff(connection: PooledConnection): void {
        const waiter = this.waiters.shift();
        if (waiter !== undefined) {
            clearTimeout(waiter.timer);
            this.lease(connection);
            waiter.resolve(connection);
            return;
        }
        connection.state = 'idle';
        this.idle.push(connection);
    }

    private waitForConnection(remainingMs: number, budgetMs: number): Promise<PooledConnection | null> {
        return new Promise<PooledConnection | null>((resolve, reject) => {
            const waiter: Waiter = {
                resolve,
                reject,
                timer: setTimeout(() => {
                    const index = this.waiters.indexOf(waiter);
                    if (index !== -1) {
                        this.waiters.splice(index, 1);
                    }
                    logger.warn('Timed out waiting for a pooled connection', {
                        module: 'POOL',
                        code: 'POOL_EXHAUSTED',
                        timeoutMs: budgetMs
                    });
                    reject(new PoolExhaustedError(budgetMs, { max: this.config.maxSize }));
                }, remainingMs)
            };
            this.waiters.push(waiter);
        });
    }

    /**
     * A slot opened up: let one waiter retry, then top up to the minimum
     */
    private onCapacityFreed(): void {
        const waiter = this.waiters.shift();
        if (waiter !== undefined) {
            clearTimeout(waiter.timer);
            waiter.resolve(null);
        }
        this.replenish();
    }

    private replenish(): void {
        if (this.closed) {
            return;
        }
        const deficit = this.config.minSize - this.totalCount();
        for (let i = 0; i < deficit; i++) {
            this.track(this.createIdle().catch((error: unknown) => {
                logger.warn('Failed to replenish connection pool', {
                    module: 'POOL',
                    code: 'POOL_REPLENISH_FAILED',
                    error: sanitizeMessage(errorMessage(error), this.secrets)
                });
            }));
        }
    }

    private async closeConnection(
        connection: PooledConnection,
        state: 'expired' | 'broken'
    ): Promise<void> {
        connection.state = state;
        try {
            await connection.session.close();
        } catch (error) {
            logger.debug('Error closing connection', {
                module: 'POOL',
                connectionId: connection.id,
                error: sanitizeMessage(errorMessage(error), this.secrets)
            });
        }
    }

    private track(task: Promise<void>): void {
        this.background.add(task);
        void task.finally(() => this.background.delete(task));
    }

    private startReaper(): void {
        const period = this.config.reapIntervalMs;
        if (period <= 0 || this.reaper !== null) {
            return;
        }
        this.reaper = setInterval(() => {
            this.reapIdle();
        }, period);
        this.reaper.unref();
    }

    private stopReaper(): void {
        if (this.reaper !== null) {
            clearInterval(this.reaper);
            this.reaper = null;
        }
    }
}
