/**
 * mssql-mcp - Catalog Queries
 *
 * Fixed introspection statements over the sys.* catalog views. Their text is
 * internal, so they bypass the statement validator; every caller-supplied
 * value is bound as a parameter.
 */

import type { ExecutionResult, SqlValue } from '../../types/index.js';

export type CatalogRow = Record<string, SqlValue>;

/**
 * Zip column names onto row tuples
 */
export function rowsToObjects(result: ExecutionResult): CatalogRow[] {
    return result.rows.map((row) => {
        const record: CatalogRow = {};
        result.columns.forEach((column, index) => {
            record[column.name] = row[index] ?? null;
        });
        return record;
    });
}

/**
 * BIGINT and DECIMAL may arrive as strings from the driver
 */
export function asNumber(value: SqlValue | undefined): number | null {
    if (typeof value === 'number') return value;
    if (typeof value === 'bigint') return Number(value);
    if (typeof value === 'string' && value.trim() !== '' && !Number.isNaN(Number(value))) {
        return Number(value);
    }
    return null;
}

export function asString(value: SqlValue | undefined): string | null {
    if (value === null || value === undefined) return null;
    if (value instanceof Date) return value.toISOString();
    if (Buffer.isBuffer(value)) return `0x${value.toString('hex')}`;
    return String(value);
}

export function asBoolean(value: SqlValue | undefined): boolean {
    return value === true || value === 1 || value === '1';
}

// =============================================================================
// Statements
// =============================================================================

export const LIST_TABLES_SQL = `
SELECT t.name AS name, s.name AS [schema], 'table' AS type,
       ISNULL(ps.row_count, 0) AS row_count_estimate,
       t.create_date AS create_date, t.modify_date AS modify_date
FROM sys.tables t
JOIN sys.schemas s ON s.schema_id = t.schema_id
OUTER APPLY (
    SELECT SUM(p.row_count) AS row_count
    FROM sys.dm_db_partition_stats p
    WHERE p.object_id = t.object_id AND p.index_id < 2
) ps
WHERE s.name = @schema
UNION ALL
SELECT v.name, s.name, 'view', NULL, v.create_date, v.modify_date
FROM sys.views v
JOIN sys.schemas s ON s.schema_id = v.schema_id
WHERE s.name = @schema AND @include_views = 1
ORDER BY name`;

export const LIST_DATABASES_SQL = `
SELECT d.name AS name, d.state_desc AS state, d.recovery_model_desc AS recovery_model,
       d.compatibility_level AS compatibility_level,
       CAST(SUM(CAST(mf.size AS bigint)) * 8 / 1024.0 AS decimal(18, 2)) AS size_mb
FROM sys.databases d
LEFT JOIN sys.master_files mf ON mf.database_id = d.database_id
WHERE d.state = 0
GROUP BY d.name, d.state_desc, d.recovery_model_desc, d.compatibility_level
ORDER BY d.name`;

export const FIND_OBJECT_SQL = `
SELECT o.object_id AS object_id, o.type AS type, s.name AS [schema], o.name AS name
FROM sys.objects o
JOIN sys.schemas s ON s.schema_id = o.schema_id
WHERE s.name = @schema AND o.name = @table AND o.type IN ('U', 'V')`;

export const COLUMNS_SQL = `
SELECT c.name AS name, ty.name AS type, c.max_length AS max_length,
       c.precision AS precision, c.scale AS scale, c.is_nullable AS is_nullable,
       dc.definition AS default_value, c.is_identity AS is_identity
FROM sys.columns c
JOIN sys.types ty ON ty.user_type_id = c.user_type_id
LEFT JOIN sys.default_constraints dc ON dc.object_id = c.default_object_id
WHERE c.object_id = @object_id
ORDER BY c.column_id`;

export const PRIMARY_KEY_SQL = `
SELECT c.name AS name
FROM sys.indexes i
JOIN sys.index_columns ic ON ic.object_id = i.object_id AND ic.index_id = i.index_id
JOIN sys.columns c ON c.object_id = ic.object_id AND c.column_id = ic.column_id
WHERE i.object_id = @object_id AND i.is_primary_key = 1
ORDER BY ic.key_ordinal`;

export const FOREIGN_KEYS_SQL = `
SELECT fk.name AS name, pc.name AS column_name, rs.name AS referenced_schema,
       rt.name AS referenced_table, rc.name AS referenced_column
FROM sys.foreign_keys fk
JOIN sys.foreign_key_columns fkc ON fkc.constraint_object_id = fk.object_id
JOIN sys.columns pc ON pc.object_id = fkc.parent_object_id AND pc.column_id = fkc.parent_column_id
JOIN sys.tables rt ON rt.object_id = fkc.referenced_object_id
JOIN sys.schemas rs ON rs.schema_id = rt.schema_id
JOIN sys.columns rc ON rc.object_id = fkc.referenced_object_id AND rc.column_id = fkc.referenced_column_id
WHERE fk.parent_object_id = @object_id
ORDER BY fk.name, fkc.constraint_column_id`;

export const INDEXES_SQL = `
SELECT i.name AS name, i.type_desc AS type, i.is_unique AS is_unique, i.is_primary_key AS is_primary_key,
       STUFF((
           SELECT ', ' + c.name
           FROM sys.index_columns ic
           JOIN sys.columns c ON c.object_id = ic.object_id AND c.column_id = ic.column_id
           WHERE ic.object_id = i.object_id AND ic.index_id = i.index_id AND ic.is_included_column = 0
           ORDER BY ic.key_ordinal
           FOR XML PATH('')
       ), 1, 2, '') AS columns
FROM sys.indexes i
WHERE i.object_id = @object_id AND i.type > 0
ORDER BY i.name`;

export const CONSTRAINTS_SQL = `
SELECT cc.name AS name, 'CHECK' AS type, cc.definition AS definition
FROM sys.check_constraints cc WHERE cc.parent_object_id = @object_id
UNION ALL
SELECT dc.name, 'DEFAULT', dc.definition
FROM sys.default_constraints dc WHERE dc.parent_object_id = @object_id
UNION ALL
SELECT kc.name, kc.type_desc, NULL
FROM sys.key_constraints kc WHERE kc.parent_object_id = @object_id
ORDER BY name`;

export const TABLE_SIZE_SQL = `
SELECT SUM(CASE WHEN ps.index_id < 2 THEN ps.row_count ELSE 0 END) AS row_count,
       SUM(ps.reserved_page_count) * 8 AS reserved_kb,
       SUM(ps.used_page_count) * 8 AS used_kb
FROM sys.dm_db_partition_stats ps
WHERE ps.object_id = @object_id`;

// =============================================================================
// Shapes returned by the catalog tools
// =============================================================================

export interface TableListing {
    name: string;
    schema: string;
    type: 'table' | 'view';
    row_count_estimate: number | null;
    create_date: string | null;
    modify_date: string | null;
}

export interface DatabaseListing {
    name: string;
    state: string | null;
    recovery_model: string | null;
    compatibility_level: number | null;
    size: number | null;
}

export interface CatalogObject {
    objectId: number;
    schema: string;
    name: string;
    kind: 'table' | 'view';
}

export function toTableListing(row: CatalogRow): TableListing {
    return {
        name: asString(row['name']) ?? '',
        schema: asString(row['schema']) ?? '',
        type: row['type'] === 'view' ? 'view' : 'table',
        row_count_estimate: asNumber(row['row_count_estimate']),
        create_date: asString(row['create_date']),
        modify_date: asString(row['modify_date'])
    };
}

export function toDatabaseListing(row: CatalogRow): DatabaseListing {
    return {
        name: asString(row['name']) ?? '',
        state: asString(row['state']),
        recovery_model: asString(row['recovery_model']),
        compatibility_level: asNumber(row['compatibility_level']),
        size: asNumber(row['size_mb'])
    };
}

export function toCatalogObject(row: CatalogRow): CatalogObject | null {
    const objectId = asNumber(row['object_id']);
    if (objectId === null) {
        return null;
    }
    return {
        objectId,
        schema: asString(row['schema']) ?? '',
        name: asString(row['name']) ?? '',
        kind: asString(row['type'])?.trim() === 'V' ? 'view' : 'table'
    };
}
