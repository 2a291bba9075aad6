/**
 * SQL Server Tools - Catalog
 *
 * Table, column and database introspection over fixed catalog statements.
 */

import type { SqlServerAdapter } from '../SqlServerAdapter.js';
import type { RequestContext, ToolDefinition } from '../../../types/index.js';
import { TableNotFoundError } from '../../../types/index.js';
import { readOnly } from '../../../utils/annotations.js';
import {
    COLUMNS_SQL,
    CONSTRAINTS_SQL,
    FIND_OBJECT_SQL,
    FOREIGN_KEYS_SQL,
    INDEXES_SQL,
    LIST_DATABASES_SQL,
    LIST_TABLES_SQL,
    PRIMARY_KEY_SQL,
    TABLE_SIZE_SQL,
    asBoolean,
    asNumber,
    asString,
    toCatalogObject,
    toDatabaseListing,
    toTableListing,
    type CatalogObject,
    type TableListing
} from '../catalog.js';
import { DescribeTableSchema, ListDatabasesSchema, ListTablesSchema } from '../schemas/index.js';

/**
 * Shared by mssql_list_tables and the schema resource
 */
export async function listTables(
    adapter: SqlServerAdapter,
    database: string | undefined,
    schema: string,
    includeViews: boolean
): Promise<TableListing[]> {
    return adapter.withCatalog(database, async (run) => {
        const rows = await run(LIST_TABLES_SQL, [
            { name: 'schema', value: schema },
            { name: 'include_views', value: includeViews }
        ]);
        return rows.map(toTableListing);
    });
}

/**
 * Look a table or view up by schema and name
 */
export async function findTable(
    adapter: SqlServerAdapter,
    database: string | undefined,
    schema: string,
    table: string
): Promise<CatalogObject> {
    return adapter.withCatalog(database, async (run) => {
        const [row] = await run(FIND_OBJECT_SQL, [
            { name: 'schema', value: schema },
            { name: 'table', value: table }
        ]);
        const object = row === undefined ? null : toCatalogObject(row);
        if (object === null) {
            throw new TableNotFoundError(schema, table);
        }
        return object;
    });
}

export function createListTablesTool(adapter: SqlServerAdapter): ToolDefinition {
    return {
        name: 'mssql_list_tables',
        description: 'List tables (and optionally views) in a schema with estimated row counts and create/modify dates.',
        group: 'catalog',
        inputSchema: ListTablesSchema,
        annotations: readOnly('List Tables'),
        handler: async (params: unknown, _context: RequestContext) => {
            const { database, schema, include_views } = ListTablesSchema.parse(params);
            const tables = await listTables(adapter, database, schema, include_views);
            return {
                database: database ?? adapter.getHomeDatabase(),
                schema,
                tables,
                count: tables.length
            };
        }
    };
}

export function createDescribeTableTool(adapter: SqlServerAdapter): ToolDefinition {
    return {
        name: 'mssql_describe_table',
        description: 'Describe a table: columns, primary key, foreign keys, indexes, constraints, row count and size.',
        group: 'catalog',
        inputSchema: DescribeTableSchema,
        annotations: readOnly('Describe Table'),
        handler: async (params: unknown, _context: RequestContext) => {
            const { table_name, schema, database } = DescribeTableSchema.parse(params);

            return adapter.withCatalog(database, async (run) => {
                const [found] = await run(FIND_OBJECT_SQL, [
                    { name: 'schema', value: schema },
                    { name: 'table', value: table_name }
                ]);
                const object = found === undefined ? null : toCatalogObject(found);
                if (object === null) {
                    throw new TableNotFoundError(schema, table_name);
                }
                const byId = [{ name: 'object_id', value: object.objectId }];

                const columns = (await run(COLUMNS_SQL, byId)).map(row => ({
                    name: asString(row['name']),
                    type: asString(row['type']),
                    max_length: asNumber(row['max_length']),
                    precision: asNumber(row['precision']),
                    scale: asNumber(row['scale']),
                    nullable: asBoolean(row['is_nullable']),
                    default_value: asString(row['default_value']),
                    is_identity: asBoolean(row['is_identity'])
                }));

                const primaryKey = (await run(PRIMARY_KEY_SQL, byId)).map(row => asString(row['name']));

                const foreignKeys = (await run(FOREIGN_KEYS_SQL, byId)).map(row => ({
                    name: asString(row['name']),
                    column: asString(row['column_name']),
                    referenced_schema: asString(row['referenced_schema']),
                    referenced_table: asString(row['referenced_table']),
                    referenced_column: asString(row['referenced_column'])
                }));

                const indexes = (await run(INDEXES_SQL, byId)).map(row => ({
                    name: asString(row['name']),
                    type: asString(row['type']),
                    is_unique: asBoolean(row['is_unique']),
                    is_primary_key: asBoolean(row['is_primary_key']),
                    columns: (asString(row['columns']) ?? '')
                        .split(',')
                        .map(column => column.trim())
                        .filter(column => column.length > 0)
                }));

                const constraints = (await run(CONSTRAINTS_SQL, byId)).map(row => ({
                    name: asString(row['name']),
                    type: asString(row['type']),
                    definition: asString(row['definition'])
                }));

                const [size] = await run(TABLE_SIZE_SQL, byId);

                return {
                    table: object.name,
                    schema: object.schema,
                    type: object.kind,
                    columns,
                    primary_key: primaryKey,
                    foreign_keys: foreignKeys,
                    indexes,
                    constraints,
                    row_count: asNumber(size?.['row_count']),
                    size: {
                        reserved_kb: asNumber(size?.['reserved_kb']),
                        used_kb: asNumber(size?.['used_kb'])
                    }
                };
            });
        }
    };
}

export function createListDatabasesTool(adapter: SqlServerAdapter): ToolDefinition {
    return {
        name: 'mssql_list_databases',
        description: 'List online databases with state, recovery model, compatibility level and size in MB.',
        group: 'catalog',
        inputSchema: ListDatabasesSchema,
        annotations: readOnly('List Databases'),
        handler: async (params: unknown, _context: RequestContext) => {
            ListDatabasesSchema.parse(params);
            const databases = await adapter.withCatalog(undefined, async (run) =>
                (await run(LIST_DATABASES_SQL)).map(toDatabaseListing)
            );
            return { databases, count: databases.length };
        }
    };
}
