/**
 * mssql-mcp - Identifier Utilities
 *
 * Validation and bracket quoting of SQL Server identifiers (schema, table,
 * procedure and parameter names).
 *
 * SQL Server identifier rules applied here:
 * - Regular identifiers: letter or underscore, then letters, digits, underscores
 * - Maximum length: 128 characters (sysname)
 * - Delimited form: [name], with an embedded ] doubled to ]]
 */

import { ValidationError } from "../types/errors.js";

const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Maximum identifier length in SQL Server (sysname)
 */
export const MAX_IDENTIFIER_LENGTH = 128;

/**
 * Upper bound for a `schema.name` reference
 */
const MAX_QUALIFIED_LENGTH = 256;

/**
 * Error thrown when an identifier is invalid
 */
export class InvalidIdentifierError extends ValidationError {
  constructor(
    public readonly identifier: string,
    public readonly reason: string,
  ) {
    super(`Invalid identifier "${identifier}": ${reason}`, { identifier });
    this.name = "InvalidIdentifierError";
  }
}

export interface QualifiedName {
  schema: string;
  name: string;
}

/**
 * Validate a regular (undelimited) SQL Server identifier
 *
 * @throws InvalidIdentifierError if the identifier is invalid
 */
export function validateIdentifier(name: string): void {
  if (name.length === 0) {
    throw new InvalidIdentifierError(
      name,
      "Identifier must be a non-empty string",
    );
  }

  if (name.length > MAX_IDENTIFIER_LENGTH) {
    throw new InvalidIdentifierError(
      name,
      `Identifier exceeds maximum length of ${String(MAX_IDENTIFIER_LENGTH)} characters`,
    );
  }

  if (!IDENTIFIER_PATTERN.test(name)) {
    throw new InvalidIdentifierError(
      name,
      "Identifier must start with a letter or underscore and contain only letters, digits, or underscores",
    );
  }
}

/**
 * Remove one pair of surrounding brackets, if present
 */
export function unbracket(part: string): string {
  if (part.length >= 2 && part.startsWith("[") && part.endsWith("]")) {
    return part.slice(1, -1);
  }
  return part;
}

/**
 * Quote an identifier for interpolation into T-SQL text
 *
 * @example
 * quoteIdentifier('Orders')      // [Orders]
 * quoteIdentifier('odd]name')    // [odd]]name]
 */
export function quoteIdentifier(name: string): string {
  if (name.length === 0 || name.length > MAX_IDENTIFIER_LENGTH) {
    throw new InvalidIdentifierError(
      name,
      `Identifier must be 1 to ${String(MAX_IDENTIFIER_LENGTH)} characters`,
    );
  }
  return `[${name.replace(/]/g, "]]")}]`;
}

/**
 * Quote a schema-qualified object name
 *
 * @example
 * quoteQualifiedName('test', 'Orders') // [test].[Orders]
 */
export function quoteQualifiedName(schema: string, name: string): string {
  return `${quoteIdentifier(schema)}.${quoteIdentifier(name)}`;
}

/**
 * Parse `name`, `schema.name`, `[schema].[name]` into its parts.
 * The schema falls back to `defaultSchema` when omitted.
 *
 * @throws InvalidIdentifierError for more than two parts or invalid parts
 */
export function parseQualifiedName(
  input: string,
  defaultSchema = "dbo",
): QualifiedName {
  const trimmed = input.trim();
  if (trimmed.length === 0) {
    throw new InvalidIdentifierError(input, "Name must not be empty");
  }
  if (trimmed.length > MAX_QUALIFIED_LENGTH) {
    throw new InvalidIdentifierError(
      input,
      `Name exceeds maximum length of ${String(MAX_QUALIFIED_LENGTH)} characters`,
    );
  }

  const parts = trimmed.split(".");
  if (parts.length > 2) {
    throw new InvalidIdentifierError(
      input,
      "Name may have at most two parts (schema.name)",
    );
  }

  const unwrapped = parts.map(unbracket);
  for (const part of unwrapped) {
    validateIdentifier(part);
  }

  const [first, second] = unwrapped;
  if (first === undefined) {
    throw new InvalidIdentifierError(input, "Name must not be empty");
  }
  return second === undefined
    ? { schema: defaultSchema, name: first }
    : { schema: first, name: second };
}

/**
 * Case-insensitive comparison key for a qualified name
 */
export function qualifiedKey(name: QualifiedName): string {
  return `${name.schema}.${name.name}`.toLowerCase();
}
