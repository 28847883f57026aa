/**
 * @module network/report
 * @description Plain-text rendering of a network summary
 */

import type { NetworkSummary, ReceivedRecord } from './types';

function formatMailboxLine(record: ReceivedRecord): string {
    return `  at t=${record.receivedTime.toFixed(3)}` +
        `  from=${record.sender}` +
        `  id=${record.messageId}` +
        `  latency=${record.latency.toFixed(3)}` +
        `  payload="${record.payload}"`;
}

/**
 * Render delivery statistics followed by every mailbox.
 * Times and latencies use 3 decimals.
 */
export function formatNetworkSummary(summary: NetworkSummary): string {
    const lines: string[] = [
        `=== Simulation Summary (t=${summary.finalTime.toFixed(3)}) ===`,
        `Delivered messages: ${summary.deliveredCount}`,
        `Dropped messages:   ${summary.droppedCount}`,
    ];

    if (summary.averageLatency !== undefined) {
        lines.push(`Average latency:    ${summary.averageLatency.toFixed(3)} s`);
    }

    lines.push('', 'Per-node inbox contents:');
    for (const mailbox of summary.mailboxes) {
        lines.push(`Node ${mailbox.node}:`);
        for (const record of mailbox.records) {
            lines.push(formatMailboxLine(record));
        }
    }

    return lines.join('\n');
}
