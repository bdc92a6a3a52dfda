export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
    timestamp: number;
    level: LogLevel;
    event: string;
    data?: Record<string, unknown>;
}

/**
 * Receives structured log entries from writers and transformers.
 */
export type Logger = (entry: LogEntry) => void;

export const noopLogger: Logger = () => {};

export const consoleLogger: Logger = (entry) => {
    const prefix = `[${new Date(entry.timestamp).toISOString()}] [${entry.level}]`;
    // eslint-disable-next-line no-console
    console.log(`${prefix} ${entry.event}`, entry.data ?? '');
};

export function log(logger: Logger, level: LogLevel, event: string, data?: Record<string, unknown>): void {
    logger({ timestamp: Date.now(), level, event, data });
}
