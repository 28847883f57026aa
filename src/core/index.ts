/**
 * @module core
 * @description Core infrastructure shared by the simulation modules
 *
 * ## Modules
 * - `logging`: comms event loggers (console trace, memory, fan-out)
 * - `repro`: seeded RNG
 * - `errors`: unified error types and codes
 *
 * The file-backed CSV logger lives in `logging-node` and is exported from the
 * Node.js entry only.
 */

// ==================== Logging ====================

export type {
    LogLevel,
    CommsEventType,
    CommsLogEntry,
    TransitLogInput,
    DeliverLogInput,
    DeliveryFailureEntry,
    CommsLogger,
} from './logging';

export {
    CSV_HEADER,
    formatCsvNumber,
    quoteCsvField,
    formatCsvRow,
    formatTraceTime,
    formatSendLine,
    formatDeliverLine,
    formatDeliveryFailureLine,
    ConsoleLogger,
    MemoryLogger,
    MultiLogger,
    createLogger,
} from './logging';

// ==================== Repro ====================

export { SeededRandom, createRng } from './repro';

// ==================== Errors ====================

export type { ErrorCode } from './errors';

export {
    ErrorCodes,
    SkyRelayError,
    ConfigError,
    LogResourceError,
    isSkyRelayError,
    wrapError,
} from './errors';
