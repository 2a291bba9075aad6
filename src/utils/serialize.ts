/**
 * mssql-mcp - Result serialization
 *
 * Converts driver values into JSON-safe values for tool responses.
 */

import type { SqlValue } from '../types/index.js';

export type JsonScalar = string | number | boolean | null;

/**
 * Date -> ISO-8601, Buffer -> 0x-prefixed hex, bigint -> decimal string
 */
export function toJsonValue(value: SqlValue): JsonScalar {
    if (value instanceof Date) {
        return value.toISOString();
    }
    if (Buffer.isBuffer(value)) {
        return `0x${value.toString('hex')}`;
    }
    if (typeof value === 'bigint') {
        return value.toString();
    }
    return value;
}

export function toJsonRows(rows: readonly SqlValue[][]): JsonScalar[][] {
    return rows.map(row => row.map(toJsonValue));
}

/**
 * JSON.stringify that tolerates bigint anywhere in the payload
 */
export function stringifyResult(payload: unknown): string {
    return JSON.stringify(
        payload,
        (_key, value: unknown) => (typeof value === 'bigint' ? value.toString() : value),
        2
    );
}
