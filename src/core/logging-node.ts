/**
 * @module core/logging-node
 * @description File-backed CSV logger (Node.js only)
 *
 * The file is opened and truncated when the logger is constructed and stays
 * open until `close()`. Rows are buffered and written synchronously on flush.
 *
 * Only construction throws. A write or close failure after that is kept on
 * `lastError`, reported once with `console.warn`, and the logger stops writing;
 * the run carries on without a CSV trace.
 */

import * as fs from 'fs';
import * as path from 'path';
import {
    ConsoleLogger,
    CSV_HEADER,
    MultiLogger,
    deliverToEntry,
    formatCsvRow,
    transitToEntry,
    type CommsLogEntry,
    type CommsLogger,
    type DeliverLogInput,
    type DeliveryFailureEntry,
    type LogLevel,
    type TransitLogInput,
} from './logging';
import { LogResourceError } from './errors';

export interface CsvLoggerOptions {
    /** Output file path */
    filePath: string;
    /** Rows buffered before a write (default 64) */
    bufferSize?: number;
}

/**
 * CSV Logger: one row per send, drop_scheduled and deliver event
 */
export class CsvLogger implements CommsLogger {
    readonly filePath: string;
    private fd: number | null;
    private buffer: string[] = [];
    private readonly bufferSize: number;
    private failure: LogResourceError | null = null;

    constructor(options: CsvLoggerOptions) {
        this.filePath = options.filePath;
        this.bufferSize = Math.max(1, options.bufferSize ?? 64);

        try {
            const dir = path.dirname(this.filePath);
            fs.mkdirSync(dir, { recursive: true });
            this.fd = fs.openSync(this.filePath, 'w');
            fs.writeSync(this.fd, CSV_HEADER + '\n');
        } catch (error) {
            throw new LogResourceError(this.filePath, error);
        }
    }

    /** Whether the underlying file is still open */
    get isOpen(): boolean {
        return this.fd !== null;
    }

    /** First write or close failure, if any */
    get lastError(): LogResourceError | null {
        return this.failure;
    }

    private fail(error: unknown): void {
        if (this.failure !== null) return;
        this.failure = new LogResourceError(this.filePath, error);
        this.buffer = [];
        console.warn(`[WARN] ${this.failure.message}; CSV logging disabled`);
    }

    private write(entry: CommsLogEntry): void {
        if (this.fd === null || this.failure !== null) return;
        this.buffer.push(formatCsvRow(entry));
        if (this.buffer.length >= this.bufferSize) {
            this.flush();
        }
    }

    logSend(entry: TransitLogInput): void {
        this.write(transitToEntry('send', entry));
    }

    logDropScheduled(entry: TransitLogInput): void {
        this.write(transitToEntry('drop_scheduled', entry));
    }

    logDeliver(entry: DeliverLogInput): void {
        this.write(deliverToEntry(entry));
    }

    // No CSV event type for failed deliveries; they are console-only.
    logDeliveryFailure(_entry: DeliveryFailureEntry): void { /* no-op */ }

    flush(): void {
        if (this.fd === null || this.failure !== null || this.buffer.length === 0) return;
        const chunk = this.buffer.join('\n') + '\n';
        this.buffer = [];
        try {
            fs.writeSync(this.fd, chunk);
        } catch (error) {
            this.fail(error);
        }
    }

    close(): void {
        if (this.fd === null) return;
        this.flush();
        const fd = this.fd;
        this.fd = null;
        try {
            fs.closeSync(fd);
        } catch (error) {
            this.fail(error);
        }
    }
}

// ==================== Factory Functions ====================

export interface CommsLoggerOptions {
    /** CSV output path */
    logPath: string;
    /** Console level (default 'info') */
    level?: LogLevel;
    /** Suppress the console trace entirely */
    quiet?: boolean;
}

export interface CommsLoggerHandle {
    /** Logger to hand to the network */
    logger: CommsLogger;
    /** The CSV sink inside `logger`, for checking `lastError` after the run */
    csv: CsvLogger;
}

/**
 * Create the console + CSV logger pair used by Node.js runs
 */
export function createCommsLogger(options: CommsLoggerOptions): CommsLoggerHandle {
    const csv = new CsvLogger({ filePath: options.logPath });
    if (options.quiet) {
        return { logger: csv, csv };
    }
    return { logger: new MultiLogger([new ConsoleLogger(options.level ?? 'info'), csv]), csv };
}
