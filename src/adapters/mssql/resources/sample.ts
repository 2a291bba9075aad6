/**
 * Sample Resource
 *
 * First rows of a table, for a quick look at its data.
 */

import type { SqlServerAdapter } from '../SqlServerAdapter.js';
import type { RequestContext, ResourceDefinition } from '../../../types/index.js';
import { ValidationError } from '../../../types/index.js';
import { quoteQualifiedName } from '../../../utils/identifiers.js';
import { toJsonRows } from '../../../utils/serialize.js';
import { findTable } from '../tools/catalog.js';

export const SAMPLE_ROWS = 10;

export function createSampleResource(adapter: SqlServerAdapter): ResourceDefinition {
    return {
        uri: 'mssql://sample/{database}/{schema}/{table}',
        name: 'Table Sample',
        description: `First ${String(SAMPLE_ROWS)} rows of a table or view`,
        mimeType: 'application/json',
        handler: async (_uri: string, variables: Record<string, string>, _context: RequestContext) => {
            const database = variables['database'];
            const schema = variables['schema'];
            const table = variables['table'];
            if (database === undefined || schema === undefined || table === undefined) {
                throw new ValidationError('Sample URI must name database, schema and table');
            }

            // Only names the catalog knows reach the statement text
            const object = await findTable(adapter, database, schema, table);
            const result = await adapter.executeRead({
                statement: `SELECT TOP (${String(SAMPLE_ROWS)}) * FROM ${quoteQualifiedName(object.schema, object.name)}`,
                database,
                maxRows: SAMPLE_ROWS,
                timeoutSeconds: adapter.getDefaultTimeoutSeconds()
            });

            return {
                database,
                schema: object.schema,
                table: object.name,
                columns: result.columns,
                rows: toJsonRows(result.rows),
                row_count: result.rowCount
            };
        }
    };
}
