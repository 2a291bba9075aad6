/**
 * mssql-mcp - Statement Validator
 *
 * Lexical safety gate applied to every caller-supplied statement before it
 * reaches the pool. Works on tokens, never on raw text, and never tries to
 * understand query semantics.
 *
 * Rules, first match wins:
 *   1. empty statement
 *   2. more than one statement (a terminator followed by further tokens,
 *      after dropping one trailing terminator)
 *   3. leading keyword outside the allowed set for the current mode
 *   4. any word token on the denylist
 *   5. INTO in a read statement (SELECT ... INTO creates a table)
 */

import { StatementRejectedError } from '../types/errors.js';
import { tokenize, type Token } from './tokenizer.js';

export type StatementKind = 'read' | 'write';

export interface ValidationVerdict {
    approved: boolean;
    reason?: string;
    /** Statement with surrounding whitespace removed */
    normalizedStatement: string;
    /** Set on approval */
    statementKind?: StatementKind;
}

export interface ValidatorConfig {
    /** Leading keywords accepted in read-only mode */
    readKeywords: readonly string[];
    /** Leading keywords additionally accepted in write mode */
    writeKeywords: readonly string[];
    /** Whole-word tokens rejected anywhere in the statement */
    denylist: readonly string[];
}

export const DEFAULT_READ_KEYWORDS: readonly string[] = ['SELECT'];

export const DEFAULT_WRITE_KEYWORDS: readonly string[] = ['INSERT', 'UPDATE', 'DELETE'];

export const DEFAULT_DENYLIST: readonly string[] = [
    'EXEC',
    'EXECUTE',
    'XP_CMDSHELL',
    'SP_CONFIGURE',
    'SP_EXECUTESQL',
    'OPENROWSET',
    'OPENDATASOURCE',
    'OPENQUERY',
    'SHUTDOWN',
    'DROP',
    'TRUNCATE',
    'ALTER',
    'CREATE',
    'GRANT',
    'REVOKE',
    'DENY'
];

function toUpperSet(values: readonly string[]): ReadonlySet<string> {
    return new Set(values.map(v => v.trim().toUpperCase()).filter(v => v.length > 0));
}

export class StatementValidator {
    private readonly readKeywords: ReadonlySet<string>;
    private readonly writeKeywords: ReadonlySet<string>;
    private readonly denylist: ReadonlySet<string>;
    private readonly readLabel: string;
    private readonly writeLabel: string;

    constructor(config: Partial<ValidatorConfig> = {}) {
        const read = config.readKeywords ?? DEFAULT_READ_KEYWORDS;
        const write = config.writeKeywords ?? DEFAULT_WRITE_KEYWORDS;
        this.readKeywords = toUpperSet(read);
        this.writeKeywords = toUpperSet(write);
        this.denylist = toUpperSet(config.denylist ?? DEFAULT_DENYLIST);
        this.readLabel = [...this.readKeywords].join(', ');
        this.writeLabel = [...this.readKeywords, ...this.writeKeywords].join(', ');
    }

    /**
     * Build a validator whose denylist is the default plus `extraTokens`
     */
    static withExtraDenylist(extraTokens: readonly string[]): StatementValidator {
        return new StatementValidator({ denylist: [...DEFAULT_DENYLIST, ...extraTokens] });
    }

    validate(statement: string, writeEnabled: boolean): ValidationVerdict {
        const normalizedStatement = statement.trim();
        const reject = (reason: string): ValidationVerdict => ({
            approved: false,
            reason,
            normalizedStatement
        });

        const tokens = tokenize(normalizedStatement);
        if (tokens.length === 0) {
            return reject('empty statement');
        }

        if (this.hasStackedStatements(tokens)) {
            return reject('multiple statements are not allowed');
        }

        const first = tokens[0];
        const leading = first?.kind === 'word' ? first.text.toUpperCase() : undefined;
        let statementKind: StatementKind;
        if (leading !== undefined && this.readKeywords.has(leading)) {
            statementKind = 'read';
        } else if (leading !== undefined && this.writeKeywords.has(leading)) {
            if (!writeEnabled) {
                return reject(`${leading} statements require write mode; only ${this.readLabel} is allowed`);
            }
            statementKind = 'write';
        } else {
            const allowed = writeEnabled ? this.writeLabel : this.readLabel;
            return reject(`statement must begin with ${allowed}`);
        }

        for (const token of tokens) {
            if (token.kind === 'word' && this.denylist.has(token.text.toUpperCase())) {
                return reject(`blocked keyword: ${token.text.toUpperCase()}`);
            }
        }

        const selectsInto = tokens.some(token => token.kind === 'word' && token.text.toUpperCase() === 'INTO');
        if (statementKind === 'read' && selectsInto) {
            return reject('SELECT ... INTO creates a table and is not allowed');
        }

        return { approved: true, normalizedStatement, statementKind };
    }

    /**
     * Validate and throw StatementRejectedError on rejection
     */
    assertApproved(statement: string, writeEnabled: boolean): ValidationVerdict & { statementKind: StatementKind } {
        const verdict = this.validate(statement, writeEnabled);
        if (!verdict.approved || verdict.statementKind === undefined) {
            throw new StatementRejectedError(verdict.reason ?? 'statement rejected');
        }
        return { ...verdict, statementKind: verdict.statementKind };
    }

    private hasStackedStatements(tokens: readonly Token[]): boolean {
        const last = tokens[tokens.length - 1];
        const body = last?.kind === 'terminator' ? tokens.slice(0, -1) : tokens;
        return body.some((token, index) => token.kind === 'terminator' && index < body.length - 1);
    }
}
