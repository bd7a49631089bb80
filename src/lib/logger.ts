/**
 * Standalone Logger Utility
 *
 * Provides consistent logging with environment-aware formatting.
 */

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

export type LogMeta = Record<string, unknown>;

export class Logger {
    constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

    debug(message: string, meta?: LogMeta) {
        console.debug(this.formatLog('DEBUG', message, meta));
    }

    info(message: string, meta?: LogMeta) {
        console.info(this.formatLog('INFO', message, meta));
    }

    warn(message: string, meta?: LogMeta) {
        console.warn(this.formatLog('WARN', message, meta));
    }

    error(message: string, meta?: LogMeta) {
        console.error(this.formatLog('ERROR', message, meta));
    }

    /**
     * Format log message with environment-aware output
     */
    formatLog(level: LogLevel, message: string, meta?: LogMeta): string {
        if (this.env.NODE_ENV === 'production') {
            // Structured JSON for production log aggregation
            return JSON.stringify({
                timestamp: new Date().toISOString(),
                level,
                message,
                ...(meta && { meta }),
            });
        }

        // Pretty format for development
        const metaStr = meta ? ` ${JSON.stringify(meta)}` : '';
        return `${level} ${message}${metaStr}`;
    }
}

/**
 * Global logger instance for infrastructure components
 * (server startup, middleware, shutdown)
 */
export const logger = new Logger();
