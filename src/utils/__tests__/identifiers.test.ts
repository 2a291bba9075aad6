/**
 * Unit tests for identifier validation and quoting
 */

import { describe, it, expect } from 'vitest';
import {
    validateIdentifier,
    unbracket,
    quoteIdentifier,
    quoteQualifiedName,
    parseQualifiedName,
    qualifiedKey,
    InvalidIdentifierError,
    MAX_IDENTIFIER_LENGTH
} from '../identifiers.js';
import { ValidationError } from '../../types/index.js';

describe('Identifier Utilities', () => {
    describe('validateIdentifier', () => {
        it('should accept regular identifiers', () => {
            expect(() => validateIdentifier('Orders')).not.toThrow();
            expect(() => validateIdentifier('_staging')).not.toThrow();
            expect(() => validateIdentifier('usp_Report2')).not.toThrow();
        });

        it('should reject identifiers starting with a digit', () => {
            expect(() => validateIdentifier('1table')).toThrow(InvalidIdentifierError);
        });

        it('should reject special characters and injection attempts', () => {
            expect(() => validateIdentifier('table-name')).toThrow(InvalidIdentifierError);
            expect(() => validateIdentifier('table name')).toThrow(InvalidIdentifierError);
            expect(() => validateIdentifier("x]; DROP TABLE t; --")).toThrow(InvalidIdentifierError);
        });

        it('should reject empty and oversized identifiers', () => {
            expect(() => validateIdentifier('')).toThrow('Invalid identifier "": Identifier must be a non-empty string');
            expect(() => validateIdentifier('a'.repeat(MAX_IDENTIFIER_LENGTH))).not.toThrow();
            expect(() => validateIdentifier('a'.repeat(MAX_IDENTIFIER_LENGTH + 1)))
                .toThrow('exceeds maximum length of 128 characters');
        });

        it('should raise a VALIDATION_ERROR', () => {
            try {
                validateIdentifier('bad name');
                expect.unreachable();
            } catch (error) {
                expect(error).toBeInstanceOf(ValidationError);
                expect(error).toMatchObject({ code: 'VALIDATION_ERROR', identifier: 'bad name' });
            }
        });
    });

    describe('unbracket', () => {
        it('should remove one pair of brackets', () => {
            expect(unbracket('[Orders]')).toBe('Orders');
            expect(unbracket('Orders')).toBe('Orders');
            expect(unbracket('[')).toBe('[');
        });
    });

    describe('quoteIdentifier', () => {
        it('should bracket names and double embedded closing brackets', () => {
            expect(quoteIdentifier('Orders')).toBe('[Orders]');
            expect(quoteIdentifier('odd]name')).toBe('[odd]]name]');
            expect(quoteIdentifier('Order Details')).toBe('[Order Details]');
        });

        it('should reject empty names', () => {
            expect(() => quoteIdentifier('')).toThrow(InvalidIdentifierError);
        });
    });

    describe('quoteQualifiedName', () => {
        it('should quote both parts', () => {
            expect(quoteQualifiedName('test', 'Orders')).toBe('[test].[Orders]');
        });
    });

    describe('parseQualifiedName', () => {
        it('should default the schema to dbo', () => {
            expect(parseQualifiedName('usp_Report')).toEqual({ schema: 'dbo', name: 'usp_Report' });
        });

        it('should honour a custom default schema', () => {
            expect(parseQualifiedName('Orders', 'sales')).toEqual({ schema: 'sales', name: 'Orders' });
        });

        it('should split schema-qualified and bracketed names', () => {
            expect(parseQualifiedName('sales.usp_Report')).toEqual({ schema: 'sales', name: 'usp_Report' });
            expect(parseQualifiedName(' [sales].[usp_Report] ')).toEqual({ schema: 'sales', name: 'usp_Report' });
        });

        it('should reject three-part names', () => {
            expect(() => parseQualifiedName('db.dbo.usp_Report'))
                .toThrow('Invalid identifier "db.dbo.usp_Report": Name may have at most two parts (schema.name)');
        });

        it('should reject empty and invalid parts', () => {
            expect(() => parseQualifiedName('  ')).toThrow('Name must not be empty');
            expect(() => parseQualifiedName('dbo.')).toThrow(InvalidIdentifierError);
            expect(() => parseQualifiedName('dbo.usp;DROP')).toThrow(InvalidIdentifierError);
        });
    });

    describe('qualifiedKey', () => {
        it('should compare case-insensitively', () => {
            expect(qualifiedKey({ schema: 'Sales', name: 'USP_Report' })).toBe('sales.usp_report');
            expect(qualifiedKey(parseQualifiedName('[SALES].[usp_report]')))
                .toBe(qualifiedKey(parseQualifiedName('sales.USP_REPORT')));
        });
    });
});
