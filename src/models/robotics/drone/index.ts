/**
 * @module drone
 * @description Drone agents
 *
 * Includes:
 * - PhysicalAgent: thrust commands and per-step integration
 */

export * from './agent';
