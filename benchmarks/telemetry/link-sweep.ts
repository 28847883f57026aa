#!/usr/bin/env npx tsx
/**
 * @module benchmarks/telemetry/link-sweep
 * @description Delivery statistics of the default fleet across link qualities
 *
 * Runs the bundled scenario once per drop probability and seed, with the
 * comms trace kept in memory, and prints the mean delivery ratio and latency.
 *
 * Usage:
 *   npx tsx benchmarks/telemetry/link-sweep.ts
 */

import * as fs from 'fs';
import * as path from 'path';
import { MemoryLogger } from '../../src/core/logging';
import { parseScenarioConfig, runScenario, type ScenarioConfig } from '../../src/simulation/scenario';

// ==========================================
// Configuration
// ==========================================

const DROP_PROBABILITIES = [0, 0.05, 0.15, 0.3, 0.5];
const SEEDS = [1, 2, 3, 4, 5];
const STEPS = 200;

// ==========================================
// Sweep
// ==========================================

interface SweepRow {
    dropProbability: number;
    sent: number;
    deliveryRatio: number;
    avgLatency: number;
}

function runPoint(base: ScenarioConfig, dropProbability: number): SweepRow {
    let sent = 0;
    let delivered = 0;
    let latencySum = 0;

    for (const seed of SEEDS) {
        const config: ScenarioConfig = {
            ...base,
            seed,
            steps: STEPS,
            network: { ...base.network, dropProbability },
        };
        const { summary } = runScenario(config, { logger: new MemoryLogger(), printSummary: false });
        sent += summary.totalSent;
        delivered += summary.deliveredCount;
        latencySum += (summary.averageLatency ?? 0) * summary.deliveredCount;
    }

    return {
        dropProbability,
        sent,
        deliveryRatio: sent > 0 ? delivered / sent : 0,
        avgLatency: delivered > 0 ? latencySum / delivered : 0,
    };
}

function main(): void {
    const file = path.resolve(__dirname, '../../scenarios/default.json');
    const { config } = parseScenarioConfig(fs.readFileSync(file, 'utf8'));

    console.log(`Fleet: ${config.drones.length} drones, ${STEPS} steps of ${config.dt}s, ${SEEDS.length} seeds`);
    console.log('');
    console.log('drop p   sent   delivered   avg latency (s)');
    console.log('------   ----   ---------   ---------------');

    for (const p of DROP_PROBABILITIES) {
        const row = runPoint(config, p);
        console.log(
            `${row.dropProbability.toFixed(2).padStart(6)}` +
            `   ${String(row.sent).padStart(4)}` +
            `   ${(row.deliveryRatio * 100).toFixed(1).padStart(8)}%` +
            `   ${row.avgLatency.toFixed(3).padStart(15)}`
        );
    }
}

main();
