/**
 * @module src/network
 * @description Simulated unreliable network
 *
 * Contains:
 * - DeliveryNetwork: node registry, latency/jitter/drop model, timed delivery
 * - EndpointNode: append-only mailbox
 * - Obfuscation: reversible XOR transform of wire payloads (not a security boundary)
 * - Report: text rendering of network summaries
 */

export * from './types';
export * from './obfuscation';
export * from './endpoint';
export * from './delivery';
export * from './report';
