/**
 * @module robotics/drone/agent
 * @description A single drone: point mass with bounded thrust
 *
 * The agent owns its position, velocity and thrust. Thrust commands shape the
 * force it applies; `advance` integrates one timestep against a world.
 */

import { ZERO_VECTOR, type Vector2 } from '../../numeric/vector2';
import {
    integratePointMass,
    limitThrust,
    thrustFromDirection,
    type IntegrationResult,
} from '../dynamics/physics';
import type { AgentParams, ClampReport, WorldConfig } from '../dynamics/types';

/**
 * Plain snapshot of an agent's state
 */
export interface AgentSnapshot {
    id: number;
    position: Vector2;
    velocity: Vector2;
    thrust: Vector2;
}

export class PhysicalAgent {
    readonly id: number;
    readonly params: Readonly<AgentParams>;
    private _position: Vector2;
    private _velocity: Vector2 = ZERO_VECTOR;
    private _thrust: Vector2 = ZERO_VECTOR;
    private _lastClamp: ClampReport = { x: false, y: false };

    constructor(id: number, params: AgentParams, startPos: Vector2) {
        this.id = id;
        this.params = { ...params };
        this._position = { x: startPos.x, y: startPos.y };
    }

    get position(): Vector2 {
        return this._position;
    }

    get velocity(): Vector2 {
        return this._velocity;
    }

    get thrust(): Vector2 {
        return this._thrust;
    }

    /** Axes clamped by the most recent `advance` */
    get lastClamp(): ClampReport {
        return this._lastClamp;
    }

    /**
     * Full thrust along `direction`. Replaces the current thrust; a zero
     * direction yields zero thrust.
     */
    setThrustByDirection(direction: Vector2): void {
        this._thrust = thrustFromDirection(direction, this.params.maxThrust);
    }

    /**
     * Apply `force` as thrust, rescaled to `maxThrust` when it exceeds it.
     */
    setThrustByForce(force: Vector2): void {
        this._thrust = limitThrust(force, this.params.maxThrust);
    }

    clearThrust(): void {
        this._thrust = ZERO_VECTOR;
    }

    /**
     * Integrate one timestep
     */
    advance(dt: number, world: WorldConfig): IntegrationResult {
        const result = integratePointMass(
            { position: this._position, velocity: this._velocity },
            this._thrust,
            this.params,
            world,
            dt
        );
        this._position = result.state.position;
        this._velocity = result.state.velocity;
        this._lastClamp = result.clamped;
        return result;
    }

    snapshot(): AgentSnapshot {
        return {
            id: this.id,
            position: { ...this._position },
            velocity: { ...this._velocity },
            thrust: { ...this._thrust },
        };
    }
}
