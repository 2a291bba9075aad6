/**
 * mssql-mcp - Structured Logger
 *
 * RFC 5424 severity levels, structured single-line output on stderr, and
 * optional mirroring of every entry to the connected MCP client.
 *
 * Format: [timestamp] [LEVEL] [MODULE] [CODE] message {context}
 * Example: [2026-03-02T09:14:00Z] [WARNING] [POOL] [POOL_VALIDATION_FAILED] Discarding stale connection {"connectionId":3}
 */

// Server class is marked deprecated but McpServer.server exposes it for sendLoggingMessage()
import type { Server } from '@modelcontextprotocol/sdk/server/index.js';

/**
 * RFC 5424 syslog severity levels
 * @see https://datatracker.ietf.org/doc/html/rfc5424#section-6.2.1
 */
export type LogLevel =
    | 'debug'       // 7
    | 'info'        // 6
    | 'notice'      // 5
    | 'warning'     // 4
    | 'error'       // 3
    | 'critical'    // 2
    | 'alert'       // 1
    | 'emergency';  // 0

export const LOG_LEVELS: readonly LogLevel[] = [
    'debug', 'info', 'notice', 'warning', 'error', 'critical', 'alert', 'emergency'
];

/**
 * Module identifiers for log categorization
 */
export type LogModule =
    | 'SERVER'      // MCP server lifecycle
    | 'ADAPTER'     // Adapter wiring and tool dispatch
    | 'TOOLS'       // Tool execution
    | 'RESOURCES'   // Resource handlers
    | 'QUERY'       // Statement execution
    | 'POOL'        // Connection pool
    | 'VALIDATOR'   // Statement safety gate
    | 'CLI';        // Command line interface

/**
 * Structured log context
 */
export interface LogContext {
    /** Module identifier */
    module?: LogModule;
    /** Module-prefixed event code (e.g., POOL_EXHAUSTED) */
    code?: string;
    /** Operation being performed (e.g., acquire, executeWrite) */
    operation?: string;
    /** Entity identifier (e.g., table name, connection id) */
    entityId?: string;
    /** Error stack trace */
    stack?: string;
    [key: string]: unknown;
}

interface LogEntry {
    level: LogLevel;
    module?: LogModule | undefined;
    code?: string | undefined;
    message: string;
    timestamp: string;
    context?: LogContext | undefined;
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value)
        && !(value instanceof Date) && !Buffer.isBuffer(value);
}

/**
 * Parse a level name from configuration. Accepts the common short forms
 * (`warn`, `err`, `crit`) and any casing.
 */
export function parseLogLevel(value: string): LogLevel | undefined {
    const normalized = value.trim().toLowerCase();
    const aliases: Record<string, LogLevel> = {
        warn: 'warning',
        err: 'error',
        crit: 'critical',
        fatal: 'critical'
    };
    const alias = aliases[normalized];
    if (alias) {
        return alias;
    }
    return LOG_LEVELS.find(level => level === normalized);
}

/**
 * MCP-aware structured logger with dual-mode output
 */
class Logger {
    private minLevel: LogLevel = 'info';
    // eslint-disable-next-line @typescript-eslint/no-deprecated
    private mcpServer: Server | null = null;
    private loggerName = 'mssql-mcp';
    private readonly defaultModule: LogModule = 'SERVER';

    /**
     * RFC 5424 severity priority (lower number = higher severity)
     */
    private readonly levelPriority: Record<LogLevel, number> = {
        emergency: 0,
        alert: 1,
        critical: 2,
        error: 3,
        warning: 4,
        notice: 5,
        info: 6,
        debug: 7
    };

    setLevel(level: LogLevel): void {
        this.minLevel = level;
    }

    getLevel(): LogLevel {
        return this.minLevel;
    }

    /**
     * Set the MCP server for protocol logging
     * When set, logs will be sent to connected MCP clients
     */
    // eslint-disable-next-line @typescript-eslint/no-deprecated
    setMcpServer(server: Server | null): void {
        this.mcpServer = server;
    }

    setLoggerName(name: string): void {
        this.loggerName = name;
    }

    private shouldLog(level: LogLevel): boolean {
        return this.levelPriority[level] <= this.levelPriority[this.minLevel];
    }

    /**
     * Keys (or key fragments) whose values are never written out
     */
    private readonly sensitiveKeys: ReadonlySet<string> = new Set([
        'password',
        'pwd',
        'secret',
        'token',
        'key',
        'apikey',
        'api_key',
        'authorization',
        'credential',
        'credentials',
        'connectionstring',
        'connection_string'
    ]);

    private sanitizeContext(context: Record<string, unknown>): LogContext {
        const sanitized: LogContext = {};

        for (const [key, value] of Object.entries(context)) {
            const lowerKey = key.toLowerCase();

            const isSensitive = this.sensitiveKeys.has(lowerKey) ||
                [...this.sensitiveKeys].some(sk => lowerKey.includes(sk));

            if (isSensitive && value !== undefined && value !== null) {
                sanitized[key] = '[REDACTED]';
            } else if (isPlainRecord(value)) {
                sanitized[key] = this.sanitizeContext(value);
            } else {
                sanitized[key] = value;
            }
        }

        return sanitized;
    }

    /**
     * Strip control characters so a message cannot forge extra log lines
     */
    private sanitizeMessage(message: string): string {
        // eslint-disable-next-line no-control-regex
        return message.replace(/[\x00-\x08\x0A-\x1F\x7F]/g, ' ');
    }

    private formatEntry(entry: LogEntry): string {
        const parts: string[] = [
            `[${entry.timestamp}]`,
            `[${entry.level.toUpperCase()}]`
        ];

        if (entry.module) {
            parts.push(`[${entry.module}]`);
        }

        if (entry.code) {
            parts.push(`[${entry.code}]`);
        }

        parts.push(entry.message);

        if (entry.context) {
            // module and code are already part of the line
            const { module, code, ...restContext } = entry.context;
            void module; void code;
            if (Object.keys(restContext).length > 0) {
                parts.push(JSON.stringify(this.sanitizeContext(restContext)));
            }
        }

        return parts.join(' ');
    }

    private async sendToMcp(entry: LogEntry): Promise<void> {
        if (!this.mcpServer) {
            return;
        }

        const data: Record<string, unknown> = {
            message: entry.message
        };
        if (entry.module) data['module'] = entry.module;
        if (entry.code) data['code'] = entry.code;
        if (entry.context) {
            Object.assign(data, this.sanitizeContext(entry.context));
        }

        try {
            await this.mcpServer.sendLoggingMessage({
                level: entry.level,
                logger: this.loggerName,
                data
            });
        } catch (error) {
            // Reported on stderr only; logging it through log() would recurse
            const reason = error instanceof Error ? error.message : String(error);
            console.error(`[${new Date().toISOString()}] [WARNING] [SERVER] MCP log notification failed: ${this.sanitizeMessage(reason)}`);
        }
    }

    private log(level: LogLevel, message: string, context?: LogContext): void {
        if (!this.shouldLog(level)) {
            return;
        }

        const entry: LogEntry = {
            level,
            module: context?.module ?? this.defaultModule,
            code: context?.code,
            message: this.sanitizeMessage(message),
            timestamp: new Date().toISOString(),
            context
        };

        // stdout carries the MCP protocol; every level goes to stderr
        console.error(this.formatEntry(entry));

        void this.sendToMcp(entry);
    }

    // =========================================================================
    // Convenience methods for each log level
    // =========================================================================

    debug(message: string, context?: LogContext): void {
        this.log('debug', message, context);
    }

    info(message: string, context?: LogContext): void {
        this.log('info', message, context);
    }

    notice(message: string, context?: LogContext): void {
        this.log('notice', message, context);
    }

    warn(message: string, context?: LogContext): void {
        this.log('warning', message, context);
    }

    warning(message: string, context?: LogContext): void {
        this.log('warning', message, context);
    }

    error(message: string, context?: LogContext): void {
        this.log('error', message, context);
    }

    critical(message: string, context?: LogContext): void {
        this.log('critical', message, context);
    }

    alert(message: string, context?: LogContext): void {
        this.log('alert', message, context);
    }

    emergency(message: string, context?: LogContext): void {
        this.log('emergency', message, context);
    }

    /**
     * Create a child logger scoped to a specific module
     */
    forModule(module: LogModule): ModuleLogger {
        return new ModuleLogger(this, module);
    }
}

/**
 * Module-scoped logger; the module always overrides one given in context
 */
export class ModuleLogger {
    constructor(
        private readonly parent: Logger,
        private readonly module: LogModule
    ) { }

    private withModule(context?: LogContext): LogContext {
        return { ...context, module: this.module };
    }

    debug(message: string, context?: LogContext): void {
        this.parent.debug(message, this.withModule(context));
    }

    info(message: string, context?: LogContext): void {
        this.parent.info(message, this.withModule(context));
    }

    warning(message: string, context?: LogContext): void {
        this.parent.warning(message, this.withModule(context));
    }

    error(message: string, context?: LogContext): void {
        this.parent.error(message, this.withModule(context));
    }
}

export const logger = new Logger();
