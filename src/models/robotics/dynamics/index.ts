/**
 * @module dynamics
 * @description Point-mass dynamics for 2D agents
 *
 * Provides:
 * - Semi-implicit Euler integration under thrust and gravity
 * - Speed capping and per-axis world-boundary clamping
 * - Thrust shaping helpers (direction commands, force limiting)
 */

export * from './physics';
export * from './types';
