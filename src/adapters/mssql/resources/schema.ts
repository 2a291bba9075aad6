/**
 * Schema Resource
 *
 * Table listing for one schema of one database.
 */

import type { SqlServerAdapter } from '../SqlServerAdapter.js';
import type { RequestContext, ResourceDefinition } from '../../../types/index.js';
import { listTables } from '../tools/catalog.js';

export function createSchemaResource(adapter: SqlServerAdapter): ResourceDefinition {
    return {
        uri: 'mssql://schema/{database}/{schema}',
        name: 'Schema Tables',
        description: 'Tables in a schema with estimated row counts',
        mimeType: 'application/json',
        handler: async (_uri: string, variables: Record<string, string>, _context: RequestContext) => {
            const database = variables['database'] ?? adapter.getHomeDatabase();
            const schema = variables['schema'] ?? 'dbo';
            const tables = await listTables(adapter, database, schema, false);
            return { database, schema, tables, count: tables.length };
        }
    };
}
