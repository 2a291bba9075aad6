/**
 * mssql-mcp - Deadline helper
 *
 * Races a unit of work against a timer. The work itself is not stopped;
 * `onTimeout` is where the caller cancels it.
 */

import { logger } from './logger.js';

export async function withDeadline<T>(
    work: Promise<T>,
    timeoutMs: number,
    onTimeout: () => Error
): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    let expired = false;

    // Settles after the race is lost; only logged
    void work.catch((error: unknown) => {
        if (expired) {
            logger.debug('Work settled after its deadline', {
                module: 'QUERY',
                error: error instanceof Error ? error.message : String(error)
            });
        }
    });

    const deadline = new Promise<never>((_resolve, reject) => {
        timer = setTimeout(() => {
            expired = true;
            reject(onTimeout());
        }, timeoutMs);
    });

    try {
        return await Promise.race([work, deadline]);
    } finally {
        clearTimeout(timer);
    }
}
