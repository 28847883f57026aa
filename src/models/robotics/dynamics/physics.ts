/**
 * @module dynamics/physics
 * @description Point-mass Newtonian dynamics in a bounded 2D world
 *
 * Linear dynamics only: m * a = F_thrust + m * g.
 * No drag, no rotation, no restitution at the walls.
 */

import {
    addVec2,
    clampLengthVec2,
    normalizeVec2,
    scaleVec2,
    type Vector2,
} from '../../numeric/vector2';
import type { AgentParams, ClampReport, PointMassState, WorldConfig } from './types';

/**
 * Result of one integration step
 */
export interface IntegrationResult {
    state: PointMassState;
    /** Axes whose position was clamped (and velocity zeroed) */
    clamped: ClampReport;
}

/**
 * Net acceleration from thrust and gravity
 *
 * @param thrust - Applied thrust force (N)
 * @param mass - Agent mass (kg), caller guarantees > 0
 */
export function computeAcceleration(thrust: Vector2, mass: number, world: WorldConfig): Vector2 {
    const gravityForce = scaleVec2(world.gravity, mass);
    const totalForce = addVec2(thrust, gravityForce);
    return scaleVec2(totalForce, 1 / mass);
}

/**
 * Clamp one coordinate into [0, extent].
 * Returns the clamped coordinate, the (possibly zeroed) velocity and whether a clamp fired.
 */
function clampAxis(position: number, velocity: number, extent: number): [number, number, boolean] {
    if (position < 0) {
        return [0, 0, true];
    }
    if (position > extent) {
        return [extent, 0, true];
    }
    return [position, velocity, false];
}

/**
 * Main physics update function
 * Integrates point-mass dynamics over one timestep (semi-implicit Euler)
 *
 * @param state - Current state
 * @param thrust - Applied thrust force
 * @param params - Agent parameters
 * @param world - World gravity and bounds
 * @param dt - Time step (seconds)
 */
export function integratePointMass(
    state: PointMassState,
    thrust: Vector2,
    params: AgentParams,
    world: WorldConfig,
    dt: number
): IntegrationResult {
    const acceleration = computeAcceleration(thrust, params.mass, world);

    // Velocity first, then position from the new velocity
    let velocity = addVec2(state.velocity, scaleVec2(acceleration, dt));
    if (params.maxSpeed > 0) {
        velocity = clampLengthVec2(velocity, params.maxSpeed);
    }

    const moved = addVec2(state.position, scaleVec2(velocity, dt));

    // Axes are clamped independently; a corner hit zeroes both
    const [x, vx, clampedX] = clampAxis(moved.x, velocity.x, world.width);
    const [y, vy, clampedY] = clampAxis(moved.y, velocity.y, world.height);

    return {
        state: {
            position: { x, y },
            velocity: { x: vx, y: vy },
        },
        clamped: { x: clampedX, y: clampedY },
    };
}

/**
 * Thrust pointing along `direction` at full `maxThrust`; zero for a zero direction
 */
export function thrustFromDirection(direction: Vector2, maxThrust: number): Vector2 {
    return scaleVec2(normalizeVec2(direction), maxThrust);
}

/**
 * Force limited to `maxThrust`, direction preserved
 */
export function limitThrust(force: Vector2, maxThrust: number): Vector2 {
    return clampLengthVec2(force, maxThrust);
}

/**
 * Force needed to hover (cancel gravity exactly)
 */
export function computeHoverThrust(mass: number, world: WorldConfig): Vector2 {
    return scaleVec2(world.gravity, -mass);
}
