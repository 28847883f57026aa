/**
 * @packageDocumentation
 * @module skyrelay/browser
 *
 * Browser-compatible entry point for SkyRelay.
 *
 * Excludes the file-backed CSV logger (requires Node.js `fs`). Use
 * `core.ConsoleLogger` or `core.MemoryLogger` for comms logs in the browser.
 *
 * @license MIT
 */

export * from './src';

// ==================== Version ====================
export const VERSION = '1.0.0';
