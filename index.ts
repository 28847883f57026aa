/**
 * @packageDocumentation
 * @module skyrelay
 *
 * SkyRelay: drone telemetry over a simulated unreliable network
 *
 * A discrete-time, single-process simulation of point-mass drones in a bounded
 * 2D world that periodically report their state to a collector across a link
 * with latency, jitter and packet drop.
 *
 * ## Modules
 * - `core` - Logging, seeded RNG, error types
 * - `numeric` - 2D vector arithmetic
 * - `robotics` - Point-mass dynamics and drone agents
 * - `network` - Delivery network, endpoints, payload obfuscation
 * - `simulation` - Orchestrator, telemetry, scenarios
 *
 * ## Usage Example
 * ```typescript
 * import { simulation, core } from 'skyrelay';
 *
 * const sim = new simulation.SimulationOrchestrator(simulation.DEFAULT_WORLD_CONFIG, {
 *     logger: new core.MemoryLogger(),
 * });
 * sim.addAgent({ mass: 1, maxThrust: 20, maxSpeed: 0 }, { x: 50, y: 50 });
 * sim.step(0.5);
 * ```
 *
 * @license MIT
 */

export * from './src';

// ==================== Node.js-only ====================
export * as nodeLogging from './src/core/logging-node';

// ==================== Version ====================
export const VERSION = '1.0.0';
