/**
 * Drone Agent Tests
 * Tests for thrust commands, stepping and snapshots
 */

import { describe, it, expect } from 'vitest';
import { PhysicalAgent } from '../src/models/robotics/drone/agent';
import type { AgentParams, WorldConfig } from '../src/models/robotics/dynamics/types';
import { isClose, lcg, norm, randomVector, vecClose } from './test-utils';

const ZERO_G: WorldConfig = { gravity: { x: 0, y: 0 }, width: 100, height: 100 };
const EARTH: WorldConfig = { gravity: { x: 0, y: -9.8 }, width: 100, height: 100 };
const PARAMS: AgentParams = { mass: 2, maxThrust: 10, maxSpeed: 0 };

describe('PhysicalAgent', () => {
    it('should start at rest with no thrust', () => {
        const agent = new PhysicalAgent(3, PARAMS, { x: 10, y: 20 });
        expect(agent.id).toBe(3);
        expect(agent.position).toEqual({ x: 10, y: 20 });
        expect(agent.velocity).toEqual({ x: 0, y: 0 });
        expect(agent.thrust).toEqual({ x: 0, y: 0 });
        expect(agent.lastClamp).toEqual({ x: false, y: false });
    });

    it('should copy its start position and params', () => {
        const start = { x: 1, y: 2 };
        const params = { ...PARAMS };
        const agent = new PhysicalAgent(0, params, start);
        start.x = 99;
        params.maxThrust = 99;
        expect(agent.position.x).toBe(1);
        expect(agent.params.maxThrust).toBe(10);
    });

    describe('thrust commands', () => {
        it('should apply full thrust along a direction', () => {
            const agent = new PhysicalAgent(0, PARAMS, { x: 50, y: 50 });
            agent.setThrustByDirection({ x: 3, y: 4 });
            expect(vecClose(agent.thrust, { x: 6, y: 8 })).toBe(true);
        });

        it('should give zero thrust for a zero direction', () => {
            const agent = new PhysicalAgent(0, PARAMS, { x: 50, y: 50 });
            agent.setThrustByDirection({ x: 1, y: 0 });
            agent.setThrustByDirection({ x: 0, y: 0 });
            expect(agent.thrust).toEqual({ x: 0, y: 0 });
        });

        it('should keep a force within the limit as given', () => {
            const agent = new PhysicalAgent(0, PARAMS, { x: 50, y: 50 });
            agent.setThrustByForce({ x: 3, y: 4 });
            expect(agent.thrust).toEqual({ x: 3, y: 4 });
        });

        it('should rescale a force above the limit', () => {
            const agent = new PhysicalAgent(0, PARAMS, { x: 50, y: 50 });
            agent.setThrustByForce({ x: 30, y: 40 });
            expect(vecClose(agent.thrust, { x: 6, y: 8 })).toBe(true);
        });

        it('should never exceed maxThrust', () => {
            const next = lcg(99);
            const agent = new PhysicalAgent(0, PARAMS, { x: 50, y: 50 });
            for (let i = 0; i < 100; i++) {
                agent.setThrustByForce(randomVector(next, 50));
                expect(norm(agent.thrust)).toBeLessThanOrEqual(PARAMS.maxThrust + 1e-9);
                agent.setThrustByDirection(randomVector(next, 50));
                expect(isClose(norm(agent.thrust), PARAMS.maxThrust, 1e-12)).toBe(true);
            }
        });

        it('should clear thrust', () => {
            const agent = new PhysicalAgent(0, PARAMS, { x: 50, y: 50 });
            agent.setThrustByForce({ x: 3, y: 4 });
            agent.clearThrust();
            expect(agent.thrust).toEqual({ x: 0, y: 0 });
        });
    });

    describe('advance', () => {
        it('should integrate thrust over one step', () => {
            const agent = new PhysicalAgent(0, PARAMS, { x: 10, y: 10 });
            agent.setThrustByForce({ x: 2, y: 0 });
            const result = agent.advance(1, ZERO_G);
            expect(agent.velocity).toEqual({ x: 1, y: 0 });
            expect(agent.position).toEqual({ x: 11, y: 10 });
            expect(result.state.position).toEqual(agent.position);
        });

        it('should keep its thrust across steps', () => {
            const agent = new PhysicalAgent(0, PARAMS, { x: 10, y: 10 });
            agent.setThrustByForce({ x: 2, y: 0 });
            agent.advance(1, ZERO_G);
            agent.advance(1, ZERO_G);
            expect(agent.velocity).toEqual({ x: 2, y: 0 });
            expect(agent.position).toEqual({ x: 13, y: 10 });
        });

        it('should report the axes clamped by the last step', () => {
            const agent = new PhysicalAgent(0, PARAMS, { x: 50, y: 0.01 });
            agent.advance(1, EARTH);
            expect(agent.lastClamp).toEqual({ x: false, y: true });
            expect(agent.position.y).toBe(0);
            expect(agent.velocity.y).toBe(0);
        });
    });

    it('should return a detached snapshot', () => {
        const agent = new PhysicalAgent(1, PARAMS, { x: 5, y: 6 });
        agent.setThrustByForce({ x: 1, y: 1 });
        const snap = agent.snapshot();
        expect(snap).toEqual({
            id: 1,
            position: { x: 5, y: 6 },
            velocity: { x: 0, y: 0 },
            thrust: { x: 1, y: 1 },
        });
        agent.advance(1, ZERO_G);
        expect(snap.position).toEqual({ x: 5, y: 6 });
    });
});
