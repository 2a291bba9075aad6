/**
 * SQL Server Tools - Monitoring
 */

import type { SqlServerAdapter } from '../SqlServerAdapter.js';
import type { RequestContext, ToolDefinition } from '../../../types/index.js';
import { readOnly } from '../../../utils/annotations.js';
import { PoolStatsSchema } from '../schemas/index.js';

export function createPoolStatsTool(adapter: SqlServerAdapter): ToolDefinition {
    return {
        name: 'mssql_pool_stats',
        description: 'Report connection pool utilization: total, available, leased and configured bounds.',
        group: 'monitoring',
        inputSchema: PoolStatsSchema,
        annotations: readOnly('Pool Statistics'),
        // eslint-disable-next-line @typescript-eslint/require-await
        handler: async (params: unknown, _context: RequestContext) => {
            PoolStatsSchema.parse(params);
            const stats = adapter.getPoolStats();
            return {
                total_connections: stats.total,
                available_connections: stats.available,
                max_connections: stats.max,
                min_connections: stats.min,
                leased_connections: stats.leased,
                waiting_requests: stats.waiting
            };
        }
    };
}
