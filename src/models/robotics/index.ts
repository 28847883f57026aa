/**
 * @module src/models/robotics
 * @description Robotics: point-mass dynamics and drone agents
 *
 * Contains:
 * - Dynamics: semi-implicit Euler integration, speed cap, boundary clamping
 * - Drone: the PhysicalAgent owned by the simulation
 */

import * as dynamics from './dynamics';
import * as drone from './drone';

// Re-export as namespaces
export { dynamics, drone };

// Direct exports for common types
export * from './dynamics';
export * from './drone';
