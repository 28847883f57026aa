/**
 * @module core/logging
 * @description Comms event logging for the delivery network
 *
 * Every message lifecycle transition is reported to a `CommsLogger`. The CSV row
 * schema is fixed (`event,time,id,from,to,latency,dropped,payload`) and the
 * console trace uses tagged lines with 3-decimal simulation times.
 *
 * Browser-compatible: ConsoleLogger, MemoryLogger and MultiLogger work in all environments.
 * Node.js only: use `src/core/logging-node` for the file-backed CSV logger.
 */

// ==================== Types ====================

/**
 * Log level for console output
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Events that produce a CSV row
 */
export type CommsEventType = 'send' | 'drop_scheduled' | 'deliver';

/**
 * One CSV row
 */
export interface CommsLogEntry {
    event: CommsEventType;
    /** Simulation time at which the event was observed */
    time: number;
    /** Message id */
    id: number;
    from: string;
    to: string;
    /** Realized latency for `deliver`, 0 otherwise */
    latency: number;
    /** True only on `drop_scheduled` rows */
    dropped: boolean;
    /** Plaintext payload */
    payload: string;
}

/**
 * Message handed to the wire (sent or scheduled for drop)
 */
export interface TransitLogInput {
    time: number;
    id: number;
    from: string;
    to: string;
    payload: string;
    /** Byte length of the obfuscated wire payload */
    wireLength: number;
}

/**
 * Message placed into its recipient's mailbox
 */
export interface DeliverLogInput {
    time: number;
    id: number;
    from: string;
    to: string;
    latency: number;
    payload: string;
}

/**
 * Message discarded because its recipient is not registered
 */
export interface DeliveryFailureEntry {
    time: number;
    id: number;
    to: string;
}

/**
 * Logger interface
 */
export interface CommsLogger {
    /** Log a message that entered the in-transit queue */
    logSend(entry: TransitLogInput): void;
    /** Log a message that was scheduled for drop */
    logDropScheduled(entry: TransitLogInput): void;
    /** Log a delivery */
    logDeliver(entry: DeliverLogInput): void;
    /** Log a delivery to an unknown node */
    logDeliveryFailure(entry: DeliveryFailureEntry): void;
    /** Flush pending writes */
    flush(): void;
    /** Close the logger */
    close(): void;
}

// ==================== CSV Format ====================

export const CSV_HEADER = 'event,time,id,from,to,latency,dropped,payload';

/**
 * Format a number for the CSV log: at most 6 decimals, at least one.
 */
export function formatCsvNumber(value: number): string {
    const text = String(Number(value.toFixed(6)));
    return /[.e]/.test(text) ? text : `${text}.0`;
}

/**
 * Double-quote a CSV field, doubling embedded quotes
 */
export function quoteCsvField(value: string): string {
    return `"${value.replace(/"/g, '""')}"`;
}

export function formatCsvRow(entry: CommsLogEntry): string {
    return [
        entry.event,
        formatCsvNumber(entry.time),
        String(entry.id),
        entry.from,
        entry.to,
        formatCsvNumber(entry.latency),
        entry.dropped ? '1' : '0',
        quoteCsvField(entry.payload),
    ].join(',');
}

export function transitToEntry(event: 'send' | 'drop_scheduled', input: TransitLogInput): CommsLogEntry {
    return {
        event,
        time: input.time,
        id: input.id,
        from: input.from,
        to: input.to,
        // unknown until delivery
        latency: 0,
        dropped: event === 'drop_scheduled',
        payload: input.payload,
    };
}

export function deliverToEntry(input: DeliverLogInput): CommsLogEntry {
    return {
        event: 'deliver',
        time: input.time,
        id: input.id,
        from: input.from,
        to: input.to,
        latency: input.latency,
        dropped: false,
        payload: input.payload,
    };
}

// ==================== Console Format ====================

export function formatTraceTime(time: number): string {
    return `[t=${time.toFixed(3)}]`;
}

export function formatSendLine(tag: 'SEND' | 'DROP SCHEDULED', entry: TransitLogInput): string {
    return `${formatTraceTime(entry.time)} [${tag}] ${entry.from} -> ${entry.to}` +
        `  msgId=${entry.id}  payload=<OBFUSCATED len=${entry.wireLength}>`;
}

export function formatDeliverLine(entry: DeliverLogInput): string {
    return `${formatTraceTime(entry.time)} [DELIVER] ${entry.from} -> ${entry.to}` +
        `  msgId=${entry.id}  latency=${entry.latency.toFixed(3)}  payload="${entry.payload}"`;
}

export function formatDeliveryFailureLine(entry: DeliveryFailureEntry): string {
    return `${formatTraceTime(entry.time)} [DELIVERY FAILED] unknown node ${entry.to} for msgId=${entry.id}`;
}

// ==================== Console Logger (Browser-compatible) ====================

const LEVEL_RANK: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
};

/**
 * Console Logger: print the tagged comms trace
 * Works in both browser and Node.js environments.
 */
export class ConsoleLogger implements CommsLogger {
    private level: LogLevel;

    constructor(level: LogLevel = 'info') {
        this.level = level;
    }

    private enabled(level: LogLevel): boolean {
        return LEVEL_RANK[level] >= LEVEL_RANK[this.level];
    }

    logSend(entry: TransitLogInput): void {
        if (this.enabled('info')) {
            console.log(formatSendLine('SEND', entry));
        }
    }

    logDropScheduled(entry: TransitLogInput): void {
        if (this.enabled('info')) {
            console.log(formatSendLine('DROP SCHEDULED', entry));
        }
    }

    logDeliver(entry: DeliverLogInput): void {
        if (this.enabled('info')) {
            console.log(formatDeliverLine(entry));
        }
    }

    logDeliveryFailure(entry: DeliveryFailureEntry): void {
        if (this.enabled('warn')) {
            console.log(formatDeliveryFailureLine(entry));
        }
    }

    flush(): void { /* no-op */ }
    close(): void { /* no-op */ }
}

// ==================== Memory Logger (Browser-compatible) ====================

/**
 * Memory Logger: Store logs in memory
 * Works in both browser and Node.js environments.
 * Useful for testing and browser-based applications.
 */
export class MemoryLogger implements CommsLogger {
    public entries: CommsLogEntry[] = [];
    public failures: DeliveryFailureEntry[] = [];
    public closed = false;

    logSend(entry: TransitLogInput): void {
        this.entries.push(transitToEntry('send', entry));
    }

    logDropScheduled(entry: TransitLogInput): void {
        this.entries.push(transitToEntry('drop_scheduled', entry));
    }

    logDeliver(entry: DeliverLogInput): void {
        this.entries.push(deliverToEntry(entry));
    }

    logDeliveryFailure(entry: DeliveryFailureEntry): void {
        this.failures.push({ ...entry });
    }

    /** Entries of one event type, in log order */
    byEvent(event: CommsEventType): CommsLogEntry[] {
        return this.entries.filter(e => e.event === event);
    }

    /** Export to CSV text, header included */
    toCSV(): string {
        return [CSV_HEADER, ...this.entries.map(formatCsvRow)].join('\n') + '\n';
    }

    clear(): void {
        this.entries = [];
        this.failures = [];
    }

    flush(): void { /* no-op for memory logger */ }

    close(): void {
        this.closed = true;
    }
}

// ==================== Multi-Logger (Browser-compatible) ====================

/**
 * Multi-Logger: Write to multiple loggers simultaneously
 */
export class MultiLogger implements CommsLogger {
    private loggers: CommsLogger[];

    constructor(loggers: CommsLogger[]) {
        this.loggers = loggers;
    }

    logSend(entry: TransitLogInput): void {
        for (const logger of this.loggers) {
            logger.logSend(entry);
        }
    }

    logDropScheduled(entry: TransitLogInput): void {
        for (const logger of this.loggers) {
            logger.logDropScheduled(entry);
        }
    }

    logDeliver(entry: DeliverLogInput): void {
        for (const logger of this.loggers) {
            logger.logDeliver(entry);
        }
    }

    logDeliveryFailure(entry: DeliveryFailureEntry): void {
        for (const logger of this.loggers) {
            logger.logDeliveryFailure(entry);
        }
    }

    flush(): void {
        for (const logger of this.loggers) {
            logger.flush();
        }
    }

    close(): void {
        for (const logger of this.loggers) {
            logger.close();
        }
    }
}

// ==================== Factory Functions ====================

/**
 * Create a logger based on format (browser-compatible)
 */
export function createLogger(format: 'console' | 'memory', level: LogLevel = 'info'): CommsLogger {
    switch (format) {
        case 'console':
            return new ConsoleLogger(level);
        case 'memory':
            return new MemoryLogger();
    }
}
