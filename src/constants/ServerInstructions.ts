/**
 * Server instructions sent to MCP clients during initialization.
 */
export const SERVER_INSTRUCTIONS = `# mssql-mcp

SQL Server access through a statement gate, a bounded connection pool and per-statement deadlines.

## Read-only by default
\`mssql_query\` accepts a single SELECT statement. INSERT, UPDATE and DELETE are accepted only when the server runs with write mode enabled; everything else (DDL, EXEC, dynamic SQL, linked-server access) is rejected before reaching the database.

- One statement per call; a single trailing \`;\` is fine.
- Results are capped by \`max_rows\` (default 1000, at most 10000); \`truncated: true\` means more rows existed.
- \`timeout\` is in seconds (default 30, at most 300). A timed-out statement is cancelled.
- Pass \`database\` to run against another online database; calls without it run in the configured database.

## Catalog
\`mssql_list_databases\`, \`mssql_list_tables\` (schema defaults to \`dbo\`, \`include_views\` adds views) and \`mssql_describe_table\` (columns, keys, indexes, constraints, size). Prefer these over hand-written catalog queries.

## Writes
\`mssql_execute_write\` runs one INSERT/UPDATE/DELETE in a transaction; \`dry_run: true\` only checks the statement. \`mssql_execute_procedure\` calls an allowlisted procedure (\`schema.name\` or \`name\` for \`dbo\`) with named parameters. Both answer \`WRITE_DISABLED\` while write mode is off.

## Errors
Failures come back as \`{ "error": { "kind", "message" } }\`. \`VALIDATION_REJECTED\` carries the reason; \`POOL_EXHAUSTED\` means retry later.

## Resources
- \`mssql://schema/{database}/{schema}\`: tables in a schema
- \`mssql://sample/{database}/{schema}/{table}\`: first 10 rows
- \`mssql://pool\`: pool statistics and server health
`;
