/**
 * Simulation Module Tests
 * Tests for the orchestrator step loop and the telemetry payload format
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { MemoryLogger } from '../src/core/logging';
import type { AgentParams, WorldConfig } from '../src/models/robotics/dynamics/types';
import type { NetworkConfig } from '../src/network/types';
import { formatNetworkSummary } from '../src/network/report';
import { SimulationOrchestrator, type OrchestratorOptions } from '../src/simulation/orchestrator';
import { formatTelemetry, latestFixBySender, parseTelemetry } from '../src/simulation/telemetry';

const EARTH: WorldConfig = { gravity: { x: 0, y: -9.8 }, width: 100, height: 100 };
const ZERO_G: WorldConfig = { gravity: { x: 0, y: 0 }, width: 100, height: 100 };
const INSTANT: NetworkConfig = { baseLatency: 0, jitterAmplitude: 0, dropProbability: 0 };
const HOVERER: AgentParams = { mass: 1, maxThrust: 20, maxSpeed: 0 };

function createSim(world: WorldConfig = ZERO_G, options: OrchestratorOptions = {}) {
    const logger = new MemoryLogger();
    const sim = new SimulationOrchestrator(world, { network: INSTANT, logger, ...options });
    return { sim, logger };
}

afterEach(() => {
    vi.restoreAllMocks();
});

// ==================== Telemetry ====================

describe('Telemetry', () => {
    it('should format position and velocity with 2 decimals', () => {
        expect(formatTelemetry({ x: 12.3456, y: -0.5 }, { x: 1, y: 2 }))
            .toBe('STATUS pos=(12.35,-0.50) vel=(1.00,2.00)');
    });

    it('should parse a status payload', () => {
        expect(parseTelemetry('STATUS pos=(12.35,-0.50) vel=(1.00,2.00)')).toEqual({
            position: { x: 12.35, y: -0.5 },
            velocity: { x: 1, y: 2 },
        });
    });

    it('should reject other payloads', () => {
        expect(parseTelemetry('hi')).toBeNull();
        expect(parseTelemetry('STATUS pos=(1,2)')).toBeNull();
    });

    it('should keep the latest fix per sender in receipt order', () => {
        const view = latestFixBySender([
            { messageId: 1, sender: 'Drone0', payload: 'STATUS pos=(1.00,1.00) vel=(0.00,0.00)', receivedTime: 0.5, latency: 0.5 },
            { messageId: 2, sender: 'Drone1', payload: 'STATUS pos=(2.00,2.00) vel=(0.00,0.00)', receivedTime: 0.5, latency: 0.5 },
            { messageId: 3, sender: 'Drone0', payload: 'STATUS pos=(3.00,3.00) vel=(1.00,0.00)', receivedTime: 1, latency: 0.5 },
            { messageId: 4, sender: 'Drone1', payload: 'garbled', receivedTime: 1, latency: 0.5 },
        ]);
        expect(view.get('Drone0')).toEqual({ position: { x: 3, y: 3 }, velocity: { x: 1, y: 0 } });
        expect(view.get('Drone1')).toEqual({ position: { x: 2, y: 2 }, velocity: { x: 0, y: 0 } });
    });
});

// ==================== Orchestrator ====================

describe('SimulationOrchestrator', () => {
    it('should register the collector on construction', () => {
        const { sim } = createSim();
        expect(sim.collectorName).toBe('HQ');
        expect(sim.network.nodes().map(n => n.name)).toEqual(['HQ']);
        expect(sim.time).toBe(0);
        expect(sim.nextReportAt).toBe(0.5);
    });

    it('should hand out sequential ids and node names', () => {
        const { sim } = createSim();
        expect(sim.addAgent(HOVERER, { x: 1, y: 1 })).toBe(0);
        expect(sim.addAgent(HOVERER, { x: 2, y: 2 })).toBe(1);
        expect(sim.addAgent(HOVERER, { x: 3, y: 3 })).toBe(2);
        expect(sim.nodeNameFor(1)).toBe('Drone1');
        expect(sim.network.nodes().map(n => n.name)).toEqual(['HQ', 'Drone0', 'Drone1', 'Drone2']);
        expect(sim.agents.map(a => a.id)).toEqual([0, 1, 2]);
    });

    it('should ignore thrust commands for unknown ids', () => {
        const { sim } = createSim();
        sim.addAgent(HOVERER, { x: 50, y: 50 });
        expect(() => {
            sim.setThrustDirection(5, { x: 1, y: 0 });
            sim.setThrustForce(-1, { x: 1, y: 0 });
            sim.clearThrust(0.5);
        }).not.toThrow();
        expect(sim.agents[0].thrust).toEqual({ x: 0, y: 0 });
    });

    it('should route thrust commands to the right drone', () => {
        const { sim } = createSim();
        sim.addAgent(HOVERER, { x: 50, y: 50 });
        sim.addAgent(HOVERER, { x: 50, y: 50 });
        sim.setThrustForce(1, { x: 3, y: 4 });
        expect(sim.agents[0].thrust).toEqual({ x: 0, y: 0 });
        expect(sim.agents[1].thrust).toEqual({ x: 3, y: 4 });
        sim.clearThrust(1);
        expect(sim.agents[1].thrust).toEqual({ x: 0, y: 0 });
    });

    it('should integrate free fall through step', () => {
        const { sim } = createSim(EARTH);
        sim.addAgent({ mass: 1, maxThrust: 0, maxSpeed: 0 }, { x: 50, y: 50 });
        sim.step(1);
        expect(sim.time).toBe(1);
        expect(sim.agents[0].velocity.y).toBe(-9.8);
        expect(sim.agents[0].position.y).toBeCloseTo(40.2, 10);
    });

    it('should copy the world it was given', () => {
        const world: WorldConfig = { gravity: { x: 0, y: 0 }, width: 100, height: 100 };
        const { sim } = createSim(world);
        world.gravity = { x: 0, y: -100 };
        world.width = 1;
        expect(sim.worldConfig).toEqual({ gravity: { x: 0, y: 0 }, width: 100, height: 100 });
    });

    it('should report once per interval', () => {
        const { sim } = createSim();
        sim.addAgent(HOVERER, { x: 10, y: 10 });
        sim.addAgent(HOVERER, { x: 20, y: 20 });

        const reported: boolean[] = [];
        for (let i = 0; i < 6; i++) {
            reported.push(sim.step(0.25).reported);
        }
        expect(reported).toEqual([false, true, false, true, false, true]);
        expect(sim.network.totalSent).toBe(6);
        expect(sim.nextReportAt).toBe(2);
    });

    it('should send one batch per step even when dt spans several intervals', () => {
        const { sim } = createSim();
        sim.addAgent(HOVERER, { x: 10, y: 10 });

        expect(sim.step(2).sent).toHaveLength(1);
        expect(sim.nextReportAt).toBe(1);
        expect(sim.step(2).sent).toHaveLength(1);
        expect(sim.nextReportAt).toBe(1.5);
    });

    it('should honour a custom first report time', () => {
        const { sim } = createSim(ZERO_G, { firstReportTime: 0 });
        sim.addAgent(HOVERER, { x: 10, y: 10 });
        expect(sim.step(0.1).reported).toBe(true);
        expect(sim.nextReportAt).toBe(0.5);
    });

    it('should send telemetry in id order and deliver it in the same step', () => {
        const { sim } = createSim();
        sim.addAgent(HOVERER, { x: 10, y: 10 });
        sim.addAgent(HOVERER, { x: 20, y: 30 });

        sim.step(0.25);
        const report = sim.step(0.25);

        expect(report.time).toBe(0.5);
        expect(report.sent.map(m => [m.id, m.sender, m.recipient])).toEqual([
            [1, 'Drone0', 'HQ'],
            [2, 'Drone1', 'HQ'],
        ]);
        expect(report.deliveries.map(d => d.record.payload)).toEqual([
            'STATUS pos=(10.00,10.00) vel=(0.00,0.00)',
            'STATUS pos=(20.00,30.00) vel=(0.00,0.00)',
        ]);
        expect(sim.network.getNode('HQ')?.mailbox).toHaveLength(2);
    });

    it('should report positions after the step that triggered the report', () => {
        const { sim } = createSim();
        sim.addAgent(HOVERER, { x: 10, y: 10 });
        sim.setThrustForce(0, { x: 2, y: 0 });

        sim.step(0.25);
        const report = sim.step(0.25);
        // v = 0.5, 1.0; x = 10.125, 10.375
        expect(report.sent[0].plaintext).toBe('STATUS pos=(10.38,10.00) vel=(1.00,0.00)');
    });

    it('should print and return the comms summary', () => {
        const lines: string[] = [];
        vi.spyOn(console, 'log').mockImplementation((message?: unknown) => {
            lines.push(String(message));
        });

        const { sim } = createSim();
        sim.addAgent(HOVERER, { x: 10, y: 10 });
        sim.step(0.5);

        const summary = sim.printCommsSummary();
        expect(summary.deliveredCount).toBe(1);
        expect(summary.finalTime).toBe(0.5);
        expect(lines).toEqual([formatNetworkSummary(summary)]);
    });

    it('should close the network logger', () => {
        const { sim, logger } = createSim();
        sim.close();
        expect(sim.network.isClosed).toBe(true);
        expect(logger.closed).toBe(true);
    });
});
