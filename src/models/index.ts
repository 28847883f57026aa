/**
 * @module src/models
 * @description Physical models for the drone simulation
 *
 * Organized into:
 * - numeric/: 2D vector arithmetic
 * - robotics/: dynamics + drone agents
 */

export * as numeric from './numeric';
export * as robotics from './robotics';
