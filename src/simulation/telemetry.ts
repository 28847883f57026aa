/**
 * @module simulation/telemetry
 * @description Drone status payloads
 *
 * Wire format: `STATUS pos=(x,y) vel=(vx,vy)` with 2 fixed decimals.
 */

import type { Vector2 } from '../models/numeric/vector2';
import type { ReceivedRecord } from '../network/types';

export interface TelemetryFix {
    position: Vector2;
    velocity: Vector2;
}

/**
 * Build the status payload for one drone
 */
export function formatTelemetry(position: Vector2, velocity: Vector2): string {
    return `STATUS pos=(${position.x.toFixed(2)},${position.y.toFixed(2)})` +
        ` vel=(${velocity.x.toFixed(2)},${velocity.y.toFixed(2)})`;
}

const NUM = '(-?\\d+(?:\\.\\d+)?)';
const TELEMETRY_PATTERN = new RegExp(`^STATUS pos=\\(${NUM},${NUM}\\) vel=\\(${NUM},${NUM}\\)$`);

/**
 * Parse a status payload; null when it is not one
 */
export function parseTelemetry(payload: string): TelemetryFix | null {
    const match = TELEMETRY_PATTERN.exec(payload);
    if (!match) {
        return null;
    }
    const [, px, py, vx, vy] = match;
    return {
        position: { x: Number(px), y: Number(py) },
        velocity: { x: Number(vx), y: Number(vy) },
    };
}

/**
 * Most recent fix per sender, as seen by a collector's mailbox.
 * "Most recent" is by receipt order, not send time.
 */
export function latestFixBySender(mailbox: readonly ReceivedRecord[]): Map<string, TelemetryFix> {
    const latest = new Map<string, TelemetryFix>();
    for (const record of mailbox) {
        const fix = parseTelemetry(record.payload);
        if (fix) {
            latest.set(record.sender, fix);
        }
    }
    return latest;
}
