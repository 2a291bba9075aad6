/**
 * Pool Resource
 *
 * Connection pool statistics with a live health probe.
 */

import type { SqlServerAdapter } from '../SqlServerAdapter.js';
import type { RequestContext, ResourceDefinition } from '../../../types/index.js';

export function createPoolResource(adapter: SqlServerAdapter): ResourceDefinition {
    return {
        uri: 'mssql://pool',
        name: 'Connection Pool',
        description: 'Connection pool statistics and server health',
        mimeType: 'application/json',
        handler: async (_uri: string, _variables: Record<string, string>, _context: RequestContext) => {
            const stats = adapter.getPoolStats();
            const health = await adapter.getHealth();

            let status: 'idle' | 'active' | 'busy' | 'empty';
            if (stats.total === 0) {
                status = 'empty';
            } else if (stats.available === 0) {
                status = 'busy';
            } else if (stats.leased > 0) {
                status = 'active';
            } else {
                status = 'idle';
            }

            return {
                status,
                stats: {
                    total_connections: stats.total,
                    available_connections: stats.available,
                    leased_connections: stats.leased,
                    waiting_requests: stats.waiting,
                    max_connections: stats.max,
                    min_connections: stats.min
                },
                health: {
                    connected: health.connected,
                    latency_ms: health.latencyMs ?? null,
                    version: health.version ?? null,
                    error: health.error ?? null
                }
            };
        }
    };
}
