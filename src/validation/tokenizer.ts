/**
 * mssql-mcp - T-SQL Lexer
 *
 * Splits statement text into coarse tokens. String literals, comments and
 * delimited identifiers are recognized so that their contents are never
 * mistaken for keywords or statement terminators.
 */

export type TokenKind =
    | 'word'        // keywords, regular identifiers, @variables
    | 'number'
    | 'string'      // '...' and N'...'
    | 'quoted'      // [...] and "..."
    | 'terminator'  // ;
    | 'symbol';     // operators and punctuation

export interface Token {
    kind: TokenKind;
    text: string;
    /** Offset of the first character in the source text */
    position: number;
}

const WORD_START = /[A-Za-z_@#]/;
const WORD_PART = /[A-Za-z0-9_@#$]/;
const DIGIT = /[0-9]/;
const WHITESPACE = /\s/;

/**
 * Index just past a quoted run starting at `start`, where the closing
 * delimiter is escaped by doubling it ('' inside strings, ]] inside brackets).
 * Unterminated runs extend to the end of the text.
 */
function scanDelimited(text: string, start: number, close: string): number {
    let i = start + 1;
    while (i < text.length) {
        if (text[i] === close) {
            if (text[i + 1] === close) {
                i += 2;
                continue;
            }
            return i + 1;
        }
        i++;
    }
    return text.length;
}

/**
 * Block comments nest in T-SQL
 */
function scanBlockComment(text: string, start: number): number {
    let depth = 0;
    let i = start;
    while (i < text.length) {
        if (text.startsWith('/*', i)) {
            depth++;
            i += 2;
        } else if (text.startsWith('*/', i)) {
            depth--;
            i += 2;
            if (depth === 0) {
                return i;
            }
        } else {
            i++;
        }
    }
    return text.length;
}

function scanLineComment(text: string, start: number): number {
    const end = text.indexOf('\n', start);
    return end === -1 ? text.length : end + 1;
}

function scanWhile(text: string, start: number, pattern: RegExp): number {
    let i = start;
    while (i < text.length && pattern.test(text.charAt(i))) {
        i++;
    }
    return i;
}

/**
 * Tokenize T-SQL text. Whitespace and comments produce no tokens.
 */
export function tokenize(text: string): Token[] {
    const tokens: Token[] = [];
    let i = 0;

    while (i < text.length) {
        const ch = text.charAt(i);
        const next = text.charAt(i + 1);

        if (WHITESPACE.test(ch)) {
            i++;
            continue;
        }

        if (ch === '-' && next === '-') {
            i = scanLineComment(text, i);
            continue;
        }

        if (ch === '/' && next === '*') {
            i = scanBlockComment(text, i);
            continue;
        }

        let end: number;
        let kind: TokenKind;

        if (ch === "'") {
            end = scanDelimited(text, i, "'");
            kind = 'string';
        } else if ((ch === 'N' || ch === 'n') && next === "'") {
            end = scanDelimited(text, i + 1, "'");
            kind = 'string';
        } else if (ch === '[') {
            end = scanDelimited(text, i, ']');
            kind = 'quoted';
        } else if (ch === '"') {
            end = scanDelimited(text, i, '"');
            kind = 'quoted';
        } else if (ch === ';') {
            end = i + 1;
            kind = 'terminator';
        } else if (WORD_START.test(ch)) {
            end = scanWhile(text, i + 1, WORD_PART);
            kind = 'word';
        } else if (DIGIT.test(ch)) {
            // covers 0x hex literals and decimals loosely
            end = scanWhile(text, i + 1, /[0-9A-Za-z.]/);
            kind = 'number';
        } else {
            end = i + 1;
            kind = 'symbol';
        }

        tokens.push({ kind, text: text.slice(i, end), position: i });
        i = end;
    }

    return tokens;
}
