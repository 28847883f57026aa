/**
 * @module src
 * @description Source module entry point
 *
 * Structure:
 * - core/: logging, seeded RNG, errors
 * - models/: numeric primitives and robotics (dynamics, drone agents)
 * - network/: unreliable delivery network
 * - simulation/: orchestrator, telemetry, scenarios
 */

// ==================== Core Framework ====================
export * as core from './core';

// ==================== Physical Models ====================
export * from './models';

// ==================== Network ====================
export * as network from './network';

// ==================== Simulation ====================
export * as simulation from './simulation';
