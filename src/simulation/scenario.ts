/**
 * @module simulation/scenario
 * @description Scenario files and the scenario runner
 *
 * A scenario fixes a world, a link model, a fleet of drones with one thrust
 * command each, and how many steps of what size to run.
 */

import { ConfigError } from '../core/errors';
import type { CommsLogger } from '../core/logging';
import type { Vector2 } from '../models/numeric/vector2';
import type { AgentSnapshot } from '../models/robotics/drone/agent';
import type { AgentParams, WorldConfig } from '../models/robotics/dynamics/types';
import type { NetworkConfig, NetworkSummary } from '../network/types';
import {
    DEFAULT_LOG_PATH,
    DEFAULT_NETWORK_CONFIG,
    DEFAULT_SIMULATOR_CONFIG,
    DEFAULT_WORLD_CONFIG,
    mergeValidation,
    validateAgentParams,
    validateSimulatorConfig,
    validateWorldConfig,
    type ValidationResult,
} from './config';
import { SimulationOrchestrator } from './orchestrator';
import { latestFixBySender, type TelemetryFix } from './telemetry';

// ==================== Types ====================

/**
 * Thrust command applied once, before the first step
 */
export type DroneCommand =
    | { type: 'direction'; vector: Vector2 }
    | { type: 'force'; vector: Vector2 }
    | { type: 'clear' };

export interface DroneSpec {
    params: AgentParams;
    start: Vector2;
    command?: DroneCommand;
}

export interface ScenarioConfig {
    seed: number;
    /** Step size (s) */
    dt: number;
    /** Number of steps */
    steps: number;
    world: WorldConfig;
    network: NetworkConfig;
    reportInterval: number;
    /** CSV log path (used by the Node.js runner) */
    logPath: string;
    drones: DroneSpec[];
}

export interface ScenarioResult {
    finalTime: number;
    summary: NetworkSummary;
    agents: AgentSnapshot[];
    /** Latest telemetry fix per drone node, as received by the collector */
    collectorView: Map<string, TelemetryFix>;
}

// ==================== Parsing ====================

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

class FieldReader {
    readonly errors: string[] = [];

    number(obj: Record<string, unknown>, key: string, fallback: number, at: string): number {
        const value = obj[key];
        if (value === undefined) return fallback;
        if (typeof value !== 'number' || !Number.isFinite(value)) {
            this.errors.push(`${at}.${key} must be a finite number`);
            return fallback;
        }
        return value;
    }

    string(obj: Record<string, unknown>, key: string, fallback: string, at: string): string {
        const value = obj[key];
        if (value === undefined) return fallback;
        if (typeof value !== 'string') {
            this.errors.push(`${at}.${key} must be a string`);
            return fallback;
        }
        return value;
    }

    vector(value: unknown, fallback: Vector2, at: string): Vector2 {
        if (value === undefined) return fallback;
        if (!isRecord(value)) {
            this.errors.push(`${at} must be an object with x and y`);
            return fallback;
        }
        return {
            x: this.number(value, 'x', fallback.x, at),
            y: this.number(value, 'y', fallback.y, at),
        };
    }

    record(obj: Record<string, unknown>, key: string, at: string): Record<string, unknown> {
        const value = obj[key];
        if (value === undefined) return {};
        if (!isRecord(value)) {
            this.errors.push(`${at}.${key} must be an object`);
            return {};
        }
        return value;
    }
}

function readCommand(reader: FieldReader, value: unknown, at: string): DroneCommand | undefined {
    if (value === undefined) return undefined;
    if (!isRecord(value)) {
        reader.errors.push(`${at} must be an object`);
        return undefined;
    }
    if (value.type === 'clear') {
        return { type: 'clear' };
    }
    if (value.type !== 'direction' && value.type !== 'force') {
        reader.errors.push(`${at}.type must be one of direction, force, clear`);
        return undefined;
    }
    if (value.vector === undefined) {
        reader.errors.push(`${at}.vector is required for ${value.type}`);
        return undefined;
    }
    const vector = reader.vector(value.vector, { x: 0, y: 0 }, `${at}.vector`);
    return value.type === 'direction'
        ? { type: 'direction', vector }
        : { type: 'force', vector };
}

function readDrone(reader: FieldReader, value: unknown, index: number): DroneSpec | undefined {
    const at = `drones[${index}]`;
    if (!isRecord(value)) {
        reader.errors.push(`${at} must be an object`);
        return undefined;
    }
    const params = reader.record(value, 'params', at);
    const spec: DroneSpec = {
        params: {
            mass: reader.number(params, 'mass', 1, `${at}.params`),
            maxThrust: reader.number(params, 'maxThrust', 0, `${at}.params`),
            maxSpeed: reader.number(params, 'maxSpeed', 0, `${at}.params`),
        },
        start: reader.vector(value.start, { x: 0, y: 0 }, `${at}.start`),
    };
    const command = readCommand(reader, value.command, `${at}.command`);
    if (command) {
        spec.command = command;
    }
    return spec;
}

/**
 * Normalize an already-decoded scenario object, filling defaults.
 *
 * @throws ConfigError when a field has the wrong type or the result is invalid
 */
export function normalizeScenarioConfig(raw: unknown): { config: ScenarioConfig; warnings: string[] } {
    if (!isRecord(raw)) {
        throw new ConfigError('Scenario must be a JSON object');
    }

    const reader = new FieldReader();
    const world = reader.record(raw, 'world', 'scenario');
    const network = reader.record(raw, 'network', 'scenario');

    const drones: DroneSpec[] = [];
    if (raw.drones !== undefined) {
        if (Array.isArray(raw.drones)) {
            raw.drones.forEach((d: unknown, i: number) => {
                const spec = readDrone(reader, d, i);
                if (spec) drones.push(spec);
            });
        } else {
            reader.errors.push('scenario.drones must be an array');
        }
    }

    const config: ScenarioConfig = {
        seed: reader.number(raw, 'seed', DEFAULT_SIMULATOR_CONFIG.seed, 'scenario'),
        dt: reader.number(raw, 'dt', 0.1, 'scenario'),
        steps: reader.number(raw, 'steps', 100, 'scenario'),
        world: {
            gravity: reader.vector(world.gravity, DEFAULT_WORLD_CONFIG.gravity, 'world.gravity'),
            width: reader.number(world, 'width', DEFAULT_WORLD_CONFIG.width, 'world'),
            height: reader.number(world, 'height', DEFAULT_WORLD_CONFIG.height, 'world'),
        },
        network: {
            baseLatency: reader.number(network, 'baseLatency', DEFAULT_NETWORK_CONFIG.baseLatency, 'network'),
            jitterAmplitude: reader.number(network, 'jitterAmplitude', DEFAULT_NETWORK_CONFIG.jitterAmplitude, 'network'),
            dropProbability: reader.number(network, 'dropProbability', DEFAULT_NETWORK_CONFIG.dropProbability, 'network'),
        },
        reportInterval: reader.number(raw, 'reportInterval', DEFAULT_SIMULATOR_CONFIG.reportInterval, 'scenario'),
        logPath: reader.string(raw, 'logPath', DEFAULT_LOG_PATH, 'scenario'),
        drones,
    };

    if (reader.errors.length > 0) {
        throw new ConfigError('Malformed scenario', reader.errors);
    }

    const validation = validateScenarioConfig(config);
    if (!validation.valid) {
        throw new ConfigError('Invalid scenario', validation.errors);
    }
    return { config, warnings: validation.warnings };
}

/**
 * Parse scenario JSON text
 *
 * @throws ConfigError on malformed JSON or an invalid scenario
 */
export function parseScenarioConfig(json: string): { config: ScenarioConfig; warnings: string[] } {
    let raw: unknown;
    try {
        raw = JSON.parse(json);
    } catch (error) {
        throw new ConfigError(`Scenario is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
    }
    return normalizeScenarioConfig(raw);
}

export function validateScenarioConfig(config: ScenarioConfig): ValidationResult {
    const run: string[] = [];
    if (!(config.dt > 0)) {
        run.push('dt must be a positive number');
    }
    if (!Number.isInteger(config.steps) || config.steps < 0) {
        run.push('steps must be a non-negative integer');
    }

    const parts: Array<[string, ValidationResult]> = [
        ['run', { valid: run.length === 0, errors: run, warnings: [] }],
        ['world', validateWorldConfig(config.world)],
    ];
    const simulator = validateSimulatorConfig({
        ...DEFAULT_SIMULATOR_CONFIG,
        network: config.network,
        reportInterval: config.reportInterval,
        seed: config.seed,
    });
    parts.push(['config', simulator]);
    config.drones.forEach((drone, i) => {
        parts.push([`drones[${i}]`, validateAgentParams(drone.params, config.world)]);
    });

    return mergeValidation(parts);
}

// ==================== Runner ====================

function applyCommand(sim: SimulationOrchestrator, id: number, command: DroneCommand | undefined): void {
    if (!command) return;
    switch (command.type) {
        case 'direction':
            sim.setThrustDirection(id, command.vector);
            break;
        case 'force':
            sim.setThrustForce(id, command.vector);
            break;
        case 'clear':
            sim.clearThrust(id);
            break;
    }
}

export interface RunScenarioOptions {
    /** Logger owned by the run; closed when it ends */
    logger?: CommsLogger;
    /** Print the comms summary at the end (default true) */
    printSummary?: boolean;
}

/**
 * Build a simulation from `config`, run it to completion and release its
 * logger whether or not the run completes.
 */
export function runScenario(config: ScenarioConfig, options: RunScenarioOptions = {}): ScenarioResult {
    const sim = new SimulationOrchestrator(config.world, {
        network: config.network,
        reportInterval: config.reportInterval,
        seed: config.seed,
        logger: options.logger,
    });

    try {
        config.drones.forEach(drone => {
            const id = sim.addAgent(drone.params, drone.start);
            applyCommand(sim, id, drone.command);
        });

        for (let i = 0; i < config.steps; i++) {
            sim.step(config.dt);
        }

        const summary = options.printSummary === false ? sim.commsSummary() : sim.printCommsSummary();
        const collector = sim.network.getNode(sim.collectorName);

        return {
            finalTime: sim.time,
            summary,
            agents: sim.agents.map(a => a.snapshot()),
            collectorView: latestFixBySender(collector ? collector.mailbox : []),
        };
    } finally {
        sim.close();
    }
}
