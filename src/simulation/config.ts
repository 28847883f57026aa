/**
 * @module simulation/config
 * @description Simulation configuration, defaults and validators
 *
 * The simulation core treats every value here as a caller contract and never
 * validates it. The validators exist for outer surfaces (scenario files, CLI).
 */

import type { AgentParams, WorldConfig } from '../models/robotics/dynamics/types';
import type { NetworkConfig } from '../network/types';

// ==================== Configuration ====================

/**
 * Orchestrator configuration
 */
export interface SimulatorConfig {
    /** Link model */
    network: NetworkConfig;
    /** Seconds between telemetry batches */
    reportInterval: number;
    /** Clock value of the first telemetry batch (defaults to reportInterval) */
    firstReportTime?: number;
    /** Node every drone reports to */
    collectorName: string;
    /** Drone node names are `${nodePrefix}${id}` */
    nodePrefix: string;
    /** Seed for the network's generator */
    seed: number;
}

/**
 * Default world: standard gravity in a 100 m × 100 m box
 */
export const DEFAULT_WORLD_CONFIG: WorldConfig = {
    gravity: { x: 0, y: -9.8 },
    width: 100,
    height: 100,
};

/**
 * Default link model
 */
export const DEFAULT_NETWORK_CONFIG: NetworkConfig = {
    baseLatency: 0.5,
    jitterAmplitude: 0.2,
    dropProbability: 0.15,
};

/**
 * Default orchestrator configuration
 */
export const DEFAULT_SIMULATOR_CONFIG: SimulatorConfig = {
    network: DEFAULT_NETWORK_CONFIG,
    reportInterval: 0.5,
    collectorName: 'HQ',
    nodePrefix: 'Drone',
    seed: 42,
};

export const DEFAULT_LOG_PATH = 'comms_log.csv';

// ==================== Validation ====================

/**
 * Validation result
 */
export interface ValidationResult {
    valid: boolean;
    errors: string[];
    warnings: string[];
}

function isFiniteNumber(value: number): boolean {
    return typeof value === 'number' && Number.isFinite(value);
}

function result(errors: string[], warnings: string[]): ValidationResult {
    return { valid: errors.length === 0, errors, warnings };
}

/**
 * Merge several validation results, prefixing messages with their source
 */
export function mergeValidation(parts: Array<[string, ValidationResult]>): ValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];
    for (const [prefix, part] of parts) {
        errors.push(...part.errors.map(e => `${prefix}: ${e}`));
        warnings.push(...part.warnings.map(w => `${prefix}: ${w}`));
    }
    return result(errors, warnings);
}

export function validateWorldConfig(world: WorldConfig): ValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];

    if (!isFiniteNumber(world.gravity.x) || !isFiniteNumber(world.gravity.y)) {
        errors.push('gravity must be a finite vector');
    }
    if (!isFiniteNumber(world.width) || world.width <= 0) {
        errors.push('width must be a positive number');
    }
    if (!isFiniteNumber(world.height) || world.height <= 0) {
        errors.push('height must be a positive number');
    }

    return result(errors, warnings);
}

export function validateNetworkConfig(network: NetworkConfig): ValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];

    if (!isFiniteNumber(network.baseLatency) || network.baseLatency < 0) {
        errors.push('baseLatency must be a non-negative number');
    }
    if (!isFiniteNumber(network.jitterAmplitude) || network.jitterAmplitude < 0) {
        errors.push('jitterAmplitude must be a non-negative number');
    }
    if (!isFiniteNumber(network.dropProbability) ||
        network.dropProbability < 0 || network.dropProbability > 1) {
        errors.push('dropProbability must be in [0, 1]');
    }
    if (errors.length === 0 && network.jitterAmplitude > network.baseLatency) {
        warnings.push('jitterAmplitude exceeds baseLatency; sampled latencies can be negative');
    }

    return result(errors, warnings);
}

/**
 * @param world - When given, also warns about agents that cannot hover
 */
export function validateAgentParams(params: AgentParams, world?: WorldConfig): ValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];

    if (!isFiniteNumber(params.mass) || params.mass <= 0) {
        errors.push('mass must be a positive number');
    }
    if (!isFiniteNumber(params.maxThrust) || params.maxThrust < 0) {
        errors.push('maxThrust must be a non-negative number');
    }
    if (!isFiniteNumber(params.maxSpeed) || params.maxSpeed < 0) {
        errors.push('maxSpeed must be a non-negative number (0 = unlimited)');
    }

    if (errors.length === 0 && world) {
        const weight = params.mass * Math.hypot(world.gravity.x, world.gravity.y);
        if (params.maxThrust < weight) {
            warnings.push(`maxThrust ${params.maxThrust} N cannot offset weight ${weight.toFixed(2)} N`);
        }
    }

    return result(errors, warnings);
}

export function validateSimulatorConfig(config: SimulatorConfig): ValidationResult {
    const errors: string[] = [];

    if (!isFiniteNumber(config.reportInterval) || config.reportInterval <= 0) {
        errors.push('reportInterval must be a positive number');
    }
    if (config.firstReportTime !== undefined && !isFiniteNumber(config.firstReportTime)) {
        errors.push('firstReportTime must be a finite number');
    }
    if (config.collectorName.length === 0) {
        errors.push('collectorName must not be empty');
    }
    if (config.collectorName.startsWith(config.nodePrefix) &&
        /^\d+$/.test(config.collectorName.slice(config.nodePrefix.length))) {
        errors.push(`collectorName ${config.collectorName} collides with a drone node name`);
    }
    if (!Number.isInteger(config.seed)) {
        errors.push('seed must be an integer');
    }

    const network = validateNetworkConfig(config.network);
    return mergeValidation([
        ['simulator', result(errors, [])],
        ['network', network],
    ]);
}
