/**
 * @packageDocumentation
 * @module skyrelay/node
 *
 * Node.js entry point for SkyRelay.
 *
 * Includes everything from the main entry, plus direct exports of the
 * file-backed CSV logger.
 *
 * ## Usage Example
 * ```typescript
 * import { simulation, createCommsLogger } from 'skyrelay/node';
 *
 * const { logger } = createCommsLogger({ logPath: 'comms_log.csv' });
 * const { config } = simulation.parseScenarioConfig(json);
 * simulation.runScenario(config, { logger });
 * ```
 *
 * @license MIT
 */

// Re-export everything from the main index
export * from './index';
export { CsvLogger, createCommsLogger, type CsvLoggerOptions, type CommsLoggerOptions, type CommsLoggerHandle } from './src/core/logging-node';
