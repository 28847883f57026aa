/**
 * @module simulation/orchestrator
 * @description Clock, drones and network driven together by `step`
 *
 * Per step, in this order:
 * 1. advance the clock by dt
 * 2. integrate every drone against the world
 * 3. when the clock has reached the next report time, send one status message
 *    per drone to the collector and move the report time forward by exactly one
 *    interval (a large dt that crosses several boundaries still yields one batch)
 * 4. let the network deliver everything due at the new clock value
 *
 * Telemetry sent in step N is therefore eligible for delivery in step N's own
 * network advance.
 */

import type { CommsLogger } from '../core/logging';
import type { SeededRandom } from '../core/repro';
import type { Vector2 } from '../models/numeric/vector2';
import { PhysicalAgent } from '../models/robotics/drone/agent';
import type { AgentParams, WorldConfig } from '../models/robotics/dynamics/types';
import { DeliveryNetwork } from '../network/delivery';
import { formatNetworkSummary } from '../network/report';
import type { Delivery, MessageRecord, NetworkSummary } from '../network/types';
import { DEFAULT_SIMULATOR_CONFIG, type SimulatorConfig } from './config';
import { formatTelemetry } from './telemetry';

// ==================== Types ====================

export interface OrchestratorOptions extends Partial<SimulatorConfig> {
    /** Logger handed to the network, which takes ownership */
    logger?: CommsLogger;
    /** Generator handed to the network, which takes ownership */
    rng?: SeededRandom;
}

/**
 * What happened during one `step`
 */
export interface StepReport {
    /** Clock value after the step */
    time: number;
    /** Whether a telemetry batch was sent */
    reported: boolean;
    /** Messages sent during this step */
    sent: Readonly<MessageRecord>[];
    /** Deliveries made by this step's network advance */
    deliveries: Delivery[];
}

// ==================== Orchestrator ====================

export class SimulationOrchestrator {
    readonly network: DeliveryNetwork;
    readonly reportInterval: number;
    readonly collectorName: string;
    readonly nodePrefix: string;

    private readonly world: WorldConfig;
    private readonly _agents: PhysicalAgent[] = [];
    private currentTime = 0;
    private nextReportTime: number;

    constructor(world: WorldConfig, options: OrchestratorOptions = {}) {
        const { logger, rng, ...overrides } = options;
        const config: SimulatorConfig = { ...DEFAULT_SIMULATOR_CONFIG, ...overrides };

        this.world = {
            gravity: { ...world.gravity },
            width: world.width,
            height: world.height,
        };
        this.reportInterval = config.reportInterval;
        this.nextReportTime = config.firstReportTime ?? config.reportInterval;
        this.collectorName = config.collectorName;
        this.nodePrefix = config.nodePrefix;

        this.network = new DeliveryNetwork(config.network, {
            seed: config.seed,
            rng,
            logger,
        });
        this.network.registerNode(this.collectorName);
    }

    // ==================== Accessors ====================

    /** Simulation clock (s) */
    get time(): number {
        return this.currentTime;
    }

    /** Clock value at which the next telemetry batch is due */
    get nextReportAt(): number {
        return this.nextReportTime;
    }

    get worldConfig(): Readonly<WorldConfig> {
        return this.world;
    }

    /** Drones in id order */
    get agents(): readonly PhysicalAgent[] {
        return this._agents;
    }

    nodeNameFor(agentId: number): string {
        return `${this.nodePrefix}${agentId}`;
    }

    // ==================== Drones ====================

    /**
     * Add a drone at `startPos` and register its network node.
     *
     * @returns The new drone's id (sequential from 0)
     */
    addAgent(params: AgentParams, startPos: Vector2): number {
        const id = this._agents.length;
        this._agents.push(new PhysicalAgent(id, params, startPos));
        this.network.registerNode(this.nodeNameFor(id));
        return id;
    }

    private agentAt(id: number): PhysicalAgent | undefined {
        if (!Number.isInteger(id) || id < 0 || id >= this._agents.length) {
            return undefined;
        }
        return this._agents[id];
    }

    /** No-op for an unknown id */
    setThrustDirection(id: number, direction: Vector2): void {
        this.agentAt(id)?.setThrustByDirection(direction);
    }

    /** No-op for an unknown id */
    setThrustForce(id: number, force: Vector2): void {
        this.agentAt(id)?.setThrustByForce(force);
    }

    /** No-op for an unknown id */
    clearThrust(id: number): void {
        this.agentAt(id)?.clearThrust();
    }

    // ==================== Stepping ====================

    step(dt: number): StepReport {
        this.currentTime += dt;

        for (const agent of this._agents) {
            agent.advance(dt, this.world);
        }

        const sent: Readonly<MessageRecord>[] = [];
        const reported = this.currentTime >= this.nextReportTime;
        if (reported) {
            for (const agent of this._agents) {
                sent.push(this.sendStatus(agent));
            }
            this.nextReportTime += this.reportInterval;
        }

        const deliveries = this.network.advance(this.currentTime);

        return { time: this.currentTime, reported, sent, deliveries };
    }

    private sendStatus(agent: PhysicalAgent): Readonly<MessageRecord> {
        const payload = formatTelemetry(agent.position, agent.velocity);
        return this.network.send(
            this.nodeNameFor(agent.id),
            this.collectorName,
            payload,
            this.currentTime
        );
    }

    // ==================== Reporting ====================

    commsSummary(): NetworkSummary {
        return this.network.summary(this.currentTime);
    }

    /**
     * Print the network summary at the current clock
     */
    printCommsSummary(): NetworkSummary {
        const summary = this.commsSummary();
        console.log(formatNetworkSummary(summary));
        return summary;
    }

    /**
     * Release the network's logger
     */
    close(): void {
        this.network.close();
    }
}
