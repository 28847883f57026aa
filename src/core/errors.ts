/**
 * @module core/errors
 * @description Unified error types and error codes
 *
 * The simulation core never throws across `step`/`send`/`advance`; these types
 * cover configuration loading and log file access. The command line wraps
 * anything else with `wrapError`.
 */

// ==================== Error Codes ====================

/**
 * Standard error codes for SkyRelay
 */
export const ErrorCodes = {
    /** Configuration validation or parsing failed */
    INVALID_CONFIG: 'INVALID_CONFIG',
    /** Log file could not be opened, written or closed */
    LOG_IO_ERROR: 'LOG_IO_ERROR',
    /** Anything else that escapes to the command line */
    INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

// ==================== Error Classes ====================

/**
 * Base error class for SkyRelay
 */
export class SkyRelayError extends Error {
    readonly code: ErrorCode;
    readonly details?: unknown;
    readonly timestamp: number;

    constructor(code: ErrorCode, message: string, details?: unknown) {
        super(message);
        this.name = 'SkyRelayError';
        this.code = code;
        this.details = details;
        this.timestamp = Date.now();

        // Maintain proper stack trace in V8
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, SkyRelayError);
        }
    }

    /**
     * Convert to JSON-serializable object
     */
    toJSON(): {
        name: string;
        code: ErrorCode;
        message: string;
        details: unknown;
        timestamp: number;
    } {
        return {
            name: this.name,
            code: this.code,
            message: this.message,
            details: this.details,
            timestamp: this.timestamp,
        };
    }
}

/**
 * Configuration error (scenario file unreadable, malformed or invalid)
 */
export class ConfigError extends SkyRelayError {
    readonly errors: string[];

    constructor(message: string, errors: string[] = []) {
        super(ErrorCodes.INVALID_CONFIG, message, { errors });
        this.name = 'ConfigError';
        this.errors = errors;
    }
}

/**
 * Log resource error (the CSV log could not be opened or written)
 */
export class LogResourceError extends SkyRelayError {
    readonly path: string;

    constructor(path: string, cause: unknown) {
        super(
            ErrorCodes.LOG_IO_ERROR,
            `Cannot use log file ${path}: ${cause instanceof Error ? cause.message : String(cause)}`,
            { path }
        );
        this.name = 'LogResourceError';
        this.path = path;
    }
}

// ==================== Error Utilities ====================

/**
 * Check if an error is a SkyRelayError
 */
export function isSkyRelayError(error: unknown): error is SkyRelayError {
    return error instanceof SkyRelayError;
}

/**
 * Wrap any error into a SkyRelayError; SkyRelay errors pass through unchanged
 */
export function wrapError(error: unknown, defaultCode: ErrorCode = ErrorCodes.INTERNAL_ERROR): SkyRelayError {
    if (isSkyRelayError(error)) {
        return error;
    }

    if (error instanceof Error) {
        return new SkyRelayError(defaultCode, error.message, { originalName: error.name });
    }

    return new SkyRelayError(defaultCode, String(error));
}
