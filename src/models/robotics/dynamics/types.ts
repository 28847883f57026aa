/**
 * Dynamics module type definitions
 */

import type { Vector2 } from '../../numeric/vector2';

/**
 * Bounded 2D world: constant gravity over `[0,width]×[0,height]`
 */
export interface WorldConfig {
    /** Gravitational acceleration (m/s²) */
    gravity: Vector2;
    /** World extent along x (m) */
    width: number;
    /** World extent along y (m) */
    height: number;
}

/**
 * Physical and performance parameters of an agent
 */
export interface AgentParams {
    /** Mass (kg), must be > 0 */
    mass: number;
    /** Maximum thrust magnitude (N) */
    maxThrust: number;
    /** Speed cap (m/s), 0 = unlimited */
    maxSpeed: number;
}

/**
 * Translational state of a point-mass agent
 */
export interface PointMassState {
    position: Vector2;
    velocity: Vector2;
}

/**
 * Axes on which a boundary clamp fired during an integration step
 */
export interface ClampReport {
    x: boolean;
    y: boolean;
}
