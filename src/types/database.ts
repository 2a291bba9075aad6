/**
 * mssql-mcp - Database Types
 *
 * Connection settings, pool configuration, execution requests/results and
 * the session seam between the pool/executor and the driver.
 */

/**
 * Scalar value bound as a parameter or read from a result row
 */
export type SqlValue = string | number | boolean | bigint | Date | Buffer | null;

/**
 * Named statement parameter (`@name` in the statement text)
 */
export interface SqlParameter {
  name: string;
  value: SqlValue;
}

/**
 * SQL Server connection settings. Credentials are opaque to this project.
 */
export interface ConnectionSettings {
  host: string;
  port: number;
  /** Home database: every session starts here and returns here between calls */
  database: string;
  user: string;
  password: string;
  encrypt: boolean;
  trustServerCertificate: boolean;
  /** Login timeout in milliseconds */
  connectTimeoutMs: number;
}

/**
 * Connection pool configuration. Immutable once the pool is constructed.
 */
export interface PoolConfig {
  minSize: number;
  maxSize: number;
  /** Default budget for acquire() */
  acquireTimeoutMs: number;
  /** Idle connections above minSize are closed after this long unused */
  idleTimeoutMs: number;
  /** Connections older than this are closed on release or by the reaper */
  maxLifetimeMs: number;
  /** Idle connections last validated longer ago are re-validated on acquire */
  validationIntervalMs: number;
  /** How long shutdown() waits for leased connections */
  shutdownGraceMs: number;
  /** Reaper period; 0 disables background reaping */
  reapIntervalMs: number;
}

/**
 * Connection pool snapshot
 */
export interface PoolStats {
  /** idle + leased */
  total: number;
  /** Idle connections */
  available: number;
  max: number;
  min: number;
  leased: number;
  /** Callers parked in acquire() */
  waiting: number;
}

/**
 * Database connection health status
 */
export interface HealthStatus {
  connected: boolean;
  latencyMs?: number | undefined;
  version?: string | undefined;
  poolStats?: PoolStats | undefined;
  error?: string | undefined;
}

export interface ColumnMetadata {
  name: string;
  type: string;
}

/**
 * One statement to execute with its limits
 */
export interface ExecutionRequest {
  statement: string;
  /** Database to run in; the home database when omitted */
  database?: string | undefined;
  /** Row cap in [1, 10000] */
  maxRows: number;
  /** Deadline in seconds, [1, 300] */
  timeoutSeconds: number;
  parameters?: SqlParameter[] | undefined;
}

export interface ExecutionResult {
  columns: ColumnMetadata[];
  rows: SqlValue[][];
  rowCount: number;
  truncated: boolean;
  /** Statement-run wall-clock time only */
  elapsedMs: number;
}

export interface WriteResult {
  rowsAffected: number;
  elapsedMs: number;
}

export interface ResultSet {
  columns: ColumnMetadata[];
  rows: SqlValue[][];
  truncated: boolean;
}

export interface ProcedureRequest {
  schema: string;
  name: string;
  parameters: SqlParameter[];
  database?: string | undefined;
  timeoutSeconds: number;
}

export interface ProcedureResult {
  resultSets: ResultSet[];
  returnValue: number | null;
  rowsAffected: number;
  elapsedMs: number;
}

// =============================================================================
// Session seam
// =============================================================================

export interface RowHandlers {
  onColumns?: (columns: ColumnMetadata[]) => void;
  /** Return false to stop consuming rows; the request is then cancelled */
  onRow: (values: SqlValue[]) => boolean;
}

export interface RunOutcome {
  rowsAffected: number;
  /** true when onRow asked to stop before the stream ended */
  stopped: boolean;
}

export interface ProcedureOutcome {
  resultSets: ResultSet[];
  returnValue: number | null;
  rowsAffected: number;
}

/**
 * One live database session. Not safe for concurrent requests; the pool
 * guarantees a session is leased to a single caller at a time.
 */
export interface DatabaseSession {
  run(
    sql: string,
    parameters: readonly SqlParameter[],
    handlers: RowHandlers,
  ): Promise<RunOutcome>;
  /**
   * Send a parameterless batch. Session-level state it sets (USE, SET)
   * outlives the call, unlike statements sent with parameters.
   */
  runBatch(sql: string): Promise<void>;
  callProcedure(
    name: string,
    parameters: readonly SqlParameter[],
    maxRowsPerSet: number,
  ): Promise<ProcedureOutcome>;
  beginTransaction(): Promise<void>;
  commitTransaction(): Promise<void>;
  rollbackTransaction(): Promise<void>;
  /** Cancel the in-flight request, if any */
  cancel(): void;
  close(): Promise<void>;
  isOpen(): boolean;
}

export interface SessionFactory {
  create(): Promise<DatabaseSession>;
}
