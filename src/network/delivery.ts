/**
 * @module network/delivery
 * @description Single-hop unreliable delivery network
 *
 * Messages are classified once, at send time, as in-transit or dropped. Each
 * in-transit message carries a sampled deliverTime and becomes visible in the
 * recipient's mailbox on the first `advance(now)` with `now >= deliverTime`.
 *
 * The network owns its pseudorandom source and its logger. Call `close()` on
 * teardown to flush and release the logger.
 */

import { ConsoleLogger, type CommsLogger } from '../core/logging';
import { createRng, type SeededRandom } from '../core/repro';
import { EndpointNode } from './endpoint';
import {
    DEFAULT_OBFUSCATION_KEY,
    deobfuscatePayload,
    obfuscatePayload,
    toWellFormedPayload,
} from './obfuscation';
import type { Delivery, MessageRecord, NetworkConfig, NetworkSummary } from './types';

export const DEFAULT_NETWORK_SEED = 42;

function copyRecord(record: MessageRecord): MessageRecord {
    return { ...record, wirePayload: record.wirePayload.slice() };
}

/**
 * Construction options
 */
export interface DeliveryNetworkOptions {
    /** Seed for the owned generator (ignored when `rng` is given) */
    seed?: number;
    /** Pre-built generator; the network takes exclusive ownership */
    rng?: SeededRandom;
    /** Event logger; the network takes ownership and closes it in `close()` */
    logger?: CommsLogger;
    /** Shared obfuscation key */
    obfuscationKey?: string;
}

export class DeliveryNetwork {
    readonly config: Readonly<NetworkConfig>;

    private readonly registry = new Map<string, EndpointNode>();
    private inTransit: MessageRecord[] = [];
    private readonly droppedMessages: MessageRecord[] = [];

    private nextMessageId = 1;
    private delivered = 0;
    private cumulativeLatency = 0;

    private readonly rng: SeededRandom;
    private readonly logger: CommsLogger;
    private readonly key: string;
    private closed = false;

    constructor(config: NetworkConfig, options: DeliveryNetworkOptions = {}) {
        this.config = { ...config };
        this.rng = options.rng ?? createRng(options.seed ?? DEFAULT_NETWORK_SEED);
        this.logger = options.logger ?? new ConsoleLogger('info');
        this.key = options.obfuscationKey ?? DEFAULT_OBFUSCATION_KEY;
    }

    // ==================== Node Registry ====================

    /**
     * Register an endpoint. A name that is already registered is not rebound:
     * the existing node is returned and the registry is unchanged.
     */
    registerNode(name: string): EndpointNode {
        const existing = this.registry.get(name);
        if (existing) {
            return existing;
        }
        const node = new EndpointNode(name);
        this.registry.set(name, node);
        return node;
    }

    getNode(name: string): EndpointNode | undefined {
        return this.registry.get(name);
    }

    hasNode(name: string): boolean {
        return this.registry.has(name);
    }

    /** Registered nodes in registration order */
    nodes(): EndpointNode[] {
        return [...this.registry.values()];
    }

    // ==================== Counters ====================

    get totalSent(): number {
        return this.nextMessageId - 1;
    }

    get deliveredCount(): number {
        return this.delivered;
    }

    get droppedCount(): number {
        return this.droppedMessages.length;
    }

    get inTransitCount(): number {
        return this.inTransit.length;
    }

    /** Copies of the messages waiting for delivery, in send order */
    pending(): MessageRecord[] {
        return this.inTransit.map(copyRecord);
    }

    /** Copies of the messages scheduled for drop, in send order */
    dropped(): MessageRecord[] {
        return this.droppedMessages.map(copyRecord);
    }

    // ==================== Send / Advance ====================

    private sampleLatency(): number {
        const { baseLatency, jitterAmplitude } = this.config;
        return baseLatency + this.rng.uniform(-jitterAmplitude, jitterAmplitude);
    }

    /**
     * Put a message on the wire at simulation time `now`.
     *
     * Draws the drop decision first, then the latency sample, so every send
     * consumes exactly two values from the generator. Unpaired surrogates in
     * `text` are replaced with U+FFFD before it goes on the wire.
     *
     * @returns A copy of the stored record
     */
    send(from: string, to: string, text: string, now: number): MessageRecord {
        const id = this.nextMessageId++;
        const payload = toWellFormedPayload(text);
        const wirePayload = obfuscatePayload(payload, this.key);
        const drop = this.rng.bernoulli(this.config.dropProbability);
        const deliverTime = now + this.sampleLatency();

        const record: MessageRecord = {
            id,
            sender: from,
            recipient: to,
            plaintext: payload,
            wirePayload,
            sendTime: now,
            deliverTime,
            dropped: drop,
        };

        const logEntry = { time: now, id, from, to, payload, wireLength: wirePayload.length };
        if (drop) {
            this.droppedMessages.push(record);
            this.logger.logDropScheduled(logEntry);
        } else {
            this.inTransit.push(record);
            this.logger.logSend(logEntry);
        }
        return copyRecord(record);
    }

    /**
     * Deliver every in-transit message whose deliverTime is <= `now`, in send order.
     *
     * @returns Deliveries made by this call
     */
    advance(now: number): Delivery[] {
        const deliveries: Delivery[] = [];
        const remaining: MessageRecord[] = [];

        for (const msg of this.inTransit) {
            if (msg.deliverTime <= now) {
                const delivery = this.deliver(msg, now);
                if (delivery) {
                    deliveries.push(delivery);
                }
            } else {
                remaining.push(msg);
            }
        }

        this.inTransit = remaining;
        return deliveries;
    }

    private deliver(msg: MessageRecord, now: number): Delivery | null {
        const dest = this.registry.get(msg.recipient);
        if (!dest) {
            this.logger.logDeliveryFailure({ time: now, id: msg.id, to: msg.recipient });
            return null;
        }

        const latency = msg.deliverTime - msg.sendTime;
        this.delivered++;
        this.cumulativeLatency += latency;

        const plaintext = deobfuscatePayload(msg.wirePayload, this.key);
        const record = {
            messageId: msg.id,
            sender: msg.sender,
            payload: plaintext,
            receivedTime: msg.deliverTime,
            latency,
        };
        dest.receive(record);

        this.logger.logDeliver({
            time: now,
            id: msg.id,
            from: msg.sender,
            to: msg.recipient,
            latency,
            payload: plaintext,
        });

        return { recipient: dest.name, record };
    }

    // ==================== Reporting ====================

    summary(finalTime: number): NetworkSummary {
        return {
            finalTime,
            totalSent: this.totalSent,
            deliveredCount: this.delivered,
            droppedCount: this.droppedMessages.length,
            inTransitCount: this.inTransit.length,
            averageLatency: this.delivered > 0 ? this.cumulativeLatency / this.delivered : undefined,
            mailboxes: this.nodes().map(node => ({
                node: node.name,
                records: node.mailbox.map(r => ({ ...r })),
            })),
        };
    }

    // ==================== Lifecycle ====================

    get isClosed(): boolean {
        return this.closed;
    }

    /**
     * Flush and close the owned logger. Safe to call more than once.
     */
    close(): void {
        if (this.closed) return;
        this.closed = true;
        this.logger.close();
    }
}
