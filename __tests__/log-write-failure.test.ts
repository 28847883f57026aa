/**
 * Log Write Failure Tests
 * A CSV write that fails after the file is open must not interrupt sends or steps
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { LogResourceError } from '../src/core/errors';
import { CSV_HEADER, type TransitLogInput } from '../src/core/logging';
import { CsvLogger } from '../src/core/logging-node';
import type { AgentParams, WorldConfig } from '../src/models/robotics/dynamics/types';
import { DeliveryNetwork } from '../src/network/delivery';
import type { NetworkConfig } from '../src/network/types';
import { SimulationOrchestrator } from '../src/simulation/orchestrator';

vi.mock('fs', async (importOriginal) => {
    const actual = await importOriginal<typeof import('fs')>();
    return {
        ...actual,
        writeSync: vi.fn(actual.writeSync),
        closeSync: vi.fn(actual.closeSync),
    };
});

const NO_SPACE = 'ENOSPC: no space left on device, write';
const ZERO_G: WorldConfig = { gravity: { x: 0, y: 0 }, width: 100, height: 100 };
const INSTANT: NetworkConfig = { baseLatency: 0, jitterAmplitude: 0, dropProbability: 0 };
const HOVERER: AgentParams = { mass: 1, maxThrust: 20, maxSpeed: 0 };
const SENT: TransitLogInput = { time: 0.5, id: 1, from: 'Drone0', to: 'HQ', payload: 'a', wireLength: 1 };

function failNextWrite(): void {
    vi.mocked(fs.writeSync).mockImplementationOnce(() => {
        throw new Error(NO_SPACE);
    });
}

describe('CSV write failures', () => {
    let dir: string;
    let filePath: string;
    let warnings: string[];

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'skyrelay-fail-'));
        filePath = path.join(dir, 'comms.csv');
        warnings = [];
        vi.mocked(fs.writeSync).mockClear();
        vi.mocked(fs.closeSync).mockClear();
        vi.spyOn(console, 'log').mockImplementation(() => {});
        vi.spyOn(console, 'warn').mockImplementation((message?: unknown) => {
            warnings.push(String(message));
        });
    });

    afterEach(() => {
        vi.restoreAllMocks();
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it('should keep the first failure, warn once and stop writing', () => {
        const logger = new CsvLogger({ filePath, bufferSize: 1 });
        failNextWrite();

        expect(() => {
            logger.logSend(SENT);
            logger.logSend({ ...SENT, id: 2 });
            logger.flush();
        }).not.toThrow();

        expect(logger.lastError).toBeInstanceOf(LogResourceError);
        expect(logger.lastError?.message).toBe(`Cannot use log file ${filePath}: ${NO_SPACE}`);
        expect(warnings).toEqual([`[WARN] Cannot use log file ${filePath}: ${NO_SPACE}; CSV logging disabled`]);
        // header, then the one failed row
        expect(fs.writeSync).toHaveBeenCalledTimes(2);

        expect(() => logger.close()).not.toThrow();
        expect(logger.isOpen).toBe(false);
        expect(fs.readFileSync(filePath, 'utf8')).toBe(CSV_HEADER + '\n');
    });

    it('should record a close failure instead of throwing', async () => {
        const actual = await vi.importActual<typeof import('fs')>('fs');
        const logger = new CsvLogger({ filePath });
        logger.logSend(SENT);
        vi.mocked(fs.closeSync).mockImplementationOnce((fd: number) => {
            actual.closeSync(fd);
            throw new Error('EIO: i/o error, close');
        });

        expect(() => logger.close()).not.toThrow();
        expect(logger.isOpen).toBe(false);
        expect(logger.lastError?.message).toBe(`Cannot use log file ${filePath}: EIO: i/o error, close`);
        expect(fs.readFileSync(filePath, 'utf8')).toBe(CSV_HEADER + '\n' + 'send,0.5,1,Drone0,HQ,0.0,0,"a"\n');
    });

    it('should complete a send whose log write fails', () => {
        const logger = new CsvLogger({ filePath, bufferSize: 1 });
        const network = new DeliveryNetwork(INSTANT, { logger });
        network.registerNode('B');
        failNextWrite();

        const sent = network.send('A', 'B', 'hi', 0);
        expect(sent.id).toBe(1);
        expect(network.inTransitCount).toBe(1);

        expect(network.advance(0).map(d => d.record.payload)).toEqual(['hi']);
        expect(network.deliveredCount).toBe(1);
        expect(logger.lastError).toBeInstanceOf(LogResourceError);
        expect(() => network.close()).not.toThrow();
    });

    it('should send the whole telemetry batch and advance the schedule', () => {
        const logger = new CsvLogger({ filePath, bufferSize: 1 });
        const sim = new SimulationOrchestrator(ZERO_G, { network: INSTANT, logger });
        sim.addAgent(HOVERER, { x: 10, y: 10 });
        sim.addAgent(HOVERER, { x: 20, y: 20 });
        failNextWrite();

        const report = sim.step(0.5);
        expect(report.reported).toBe(true);
        expect(report.sent.map(m => m.sender)).toEqual(['Drone0', 'Drone1']);
        expect(report.deliveries).toHaveLength(2);
        expect(sim.network.totalSent).toBe(2);
        expect(sim.nextReportAt).toBe(1);
        expect(logger.lastError).toBeInstanceOf(LogResourceError);
        expect(warnings).toHaveLength(1);

        expect(sim.step(0.5).sent).toHaveLength(2);
        expect(() => sim.close()).not.toThrow();
    });
});
