/**
 * @module simulation
 * @description Drone telemetry simulation
 *
 * Ties the drones, the clock and the delivery network together:
 * - SimulationOrchestrator: `step(dt)` drives physics, telemetry and delivery
 * - Telemetry: status payload format and collector-side parsing
 * - Scenario: JSON scenario files and the scenario runner
 *
 * ## Usage
 * ```typescript
 * import { simulation } from 'skyrelay';
 *
 * const sim = new simulation.SimulationOrchestrator(simulation.DEFAULT_WORLD_CONFIG);
 * const id = sim.addAgent({ mass: 1, maxThrust: 20, maxSpeed: 15 }, { x: 10, y: 10 });
 * sim.setThrustDirection(id, { x: 0, y: 1 });
 * for (let i = 0; i < 50; i++) sim.step(0.1);
 * sim.printCommsSummary();
 * sim.close();
 * ```
 */

export * from './config';
export * from './telemetry';
export * from './orchestrator';
export * from './scenario';
