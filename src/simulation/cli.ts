#!/usr/bin/env node
/**
 * @module simulation/cli
 * @description Command-line interface for running a scenario
 *
 * Usage:
 *   npx tsx src/simulation/cli.ts
 *   npx tsx src/simulation/cli.ts --config scenarios/default.json --steps 200 --seed 7
 *   npm run sim
 */

import * as fs from 'fs';
import * as path from 'path';
import { ConfigError, wrapError } from '../core/errors';
import { createCommsLogger } from '../core/logging-node';
import { parseScenarioConfig, runScenario, validateScenarioConfig } from './scenario';

// ==================== Argument Parsing ====================

interface CliArgs {
    config: string;
    steps?: number;
    seed?: number;
    log?: string;
    quiet: boolean;
    help: boolean;
}

/**
 * Locate the bundled scenarios/default.json from either the source tree or
 * the compiled output, falling back to the working directory.
 */
function findDefaultScenario(): string {
    let dir = __dirname;
    for (;;) {
        const candidate = path.join(dir, 'scenarios', 'default.json');
        if (fs.existsSync(candidate)) return candidate;
        const parent = path.dirname(dir);
        if (parent === dir) return path.resolve('scenarios', 'default.json');
        dir = parent;
    }
}

function parseArgs(argv: string[]): CliArgs {
    const args: CliArgs = {
        config: findDefaultScenario(),
        quiet: false,
        help: false,
    };

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];

        if (arg === '--help' || arg === '-h') {
            args.help = true;
        } else if (arg === '--config' || arg === '-c') {
            args.config = argv[++i] ?? args.config;
        } else if (arg === '--steps' || arg === '-n') {
            const steps = parseInt(argv[++i], 10);
            if (!Number.isNaN(steps)) args.steps = steps;
        } else if (arg === '--seed' || arg === '-s') {
            const seed = parseInt(argv[++i], 10);
            if (!Number.isNaN(seed)) args.seed = seed;
        } else if (arg === '--log' || arg === '-l') {
            args.log = argv[++i];
        } else if (arg === '--quiet' || arg === '-q') {
            args.quiet = true;
        }
    }

    return args;
}

function printHelp(): void {
    console.log(`
SkyRelay - drone telemetry over an unreliable link

Usage:
  npx tsx src/simulation/cli.ts [options]

Options:
  -h, --help         Show this help message
  -c, --config FILE  Scenario JSON (default: scenarios/default.json)
  -n, --steps N      Override the number of steps
  -s, --seed N       Override the network seed
  -l, --log FILE     Override the CSV log path
  -q, --quiet        Suppress the per-message console trace
`);
}

// ==================== Main ====================

function main(): number {
    const args = parseArgs(process.argv.slice(2));

    if (args.help) {
        printHelp();
        return 0;
    }

    try {
        const { config, warnings } = parseScenarioConfig(fs.readFileSync(args.config, 'utf8'));
        if (args.steps !== undefined) config.steps = args.steps;
        if (args.seed !== undefined) config.seed = args.seed;
        if (args.log !== undefined) config.logPath = args.log;

        const check = validateScenarioConfig(config);
        if (!check.valid) {
            throw new ConfigError('Invalid command-line overrides', check.errors);
        }

        for (const warning of warnings) {
            console.warn(`[WARN] ${warning}`);
        }

        console.log(`Scenario: ${args.config}`);
        console.log(`Drones: ${config.drones.length}  Steps: ${config.steps}  dt: ${config.dt}  Seed: ${config.seed}`);
        console.log('');

        const { logger, csv } = createCommsLogger({ logPath: config.logPath, quiet: args.quiet });
        runScenario(config, { logger });

        console.log('');
        if (csv.lastError) {
            console.log(`[WARN] Comms log incomplete: ${csv.lastError.message}`);
        } else {
            console.log(`[OK] Comms log written to ${config.logPath}`);
        }
        return 0;
    } catch (error) {
        const failure = wrapError(error);
        console.error('');
        console.error(`[FAILED] Simulation failed (${failure.code}):`);
        console.error(`  ${failure.message}`);
        if (failure.details !== undefined) {
            console.error(`  ${JSON.stringify(failure.details)}`);
        }
        return 1;
    }
}

process.exitCode = main();
