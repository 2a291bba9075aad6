/**
 * mssql-mcp - Pooled Connection
 *
 * One live session plus the bookkeeping the pool needs to decide whether it
 * can be handed out again.
 *
 * State machine: creating -> idle -> leased -> (idle | expired | broken)
 */

import type { DatabaseSession } from '../types/index.js';

export type ConnectionState = 'creating' | 'idle' | 'leased' | 'expired' | 'broken';

export class PooledConnection {
    state: ConnectionState = 'creating';
    lastValidatedAt: number;
    lastUsedAt: number;
    /** Database the session is currently switched to */
    currentDatabase: string;
    private brokenReason: string | undefined;

    constructor(
        readonly id: number,
        readonly session: DatabaseSession,
        homeDatabase: string,
        readonly createdAt: number = Date.now()
    ) {
        this.lastValidatedAt = createdAt;
        this.lastUsedAt = createdAt;
        this.currentDatabase = homeDatabase;
    }

    /**
     * True when the session must not be reused: marked broken by a borrower,
     * or closed underneath us by the driver.
     */
    get isBroken(): boolean {
        return this.state === 'broken' || this.brokenReason !== undefined || !this.session.isOpen();
    }

    get reason(): string | undefined {
        return this.brokenReason;
    }

    ageMs(now: number = Date.now()): number {
        return now - this.createdAt;
    }

    /**
     * A non-positive lifetime means unlimited
     */
    isExpired(maxLifetimeMs: number, now: number = Date.now()): boolean {
        return maxLifetimeMs > 0 && this.ageMs(now) > maxLifetimeMs;
    }

    isStale(validationIntervalMs: number, now: number = Date.now()): boolean {
        return now - this.lastValidatedAt > validationIntervalMs;
    }

    /**
     * Flag the session as untrusted (timeout, cancelled request, failed
     * rollback). The pool closes it on release.
     */
    markBroken(reason: string): void {
        this.brokenReason ??= reason;
    }
}
