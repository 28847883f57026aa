/**
 * @module network/types
 * @description Type definitions for the delivery network
 */

/**
 * Link model parameters. Caller-supplied and not validated by the network.
 */
export interface NetworkConfig {
    /** Mean one-way latency (s) */
    baseLatency: number;
    /** Latency is sampled uniformly in baseLatency ± jitterAmplitude (s) */
    jitterAmplitude: number;
    /** Probability in [0, 1] that a message is dropped */
    dropProbability: number;
}

/**
 * A message as tracked by the network
 */
export interface MessageRecord {
    /** Strictly increasing from 1 */
    id: number;
    sender: string;
    recipient: string;
    plaintext: string;
    /** Obfuscated bytes as they travel */
    wirePayload: Uint8Array;
    sendTime: number;
    /** Scheduled even for dropped messages */
    deliverTime: number;
    dropped: boolean;
}

/**
 * A mailbox entry
 */
export interface ReceivedRecord {
    messageId: number;
    sender: string;
    /** Deobfuscated payload */
    payload: string;
    /** The message's scheduled delivery time */
    receivedTime: number;
    /** deliverTime - sendTime */
    latency: number;
}

/**
 * A delivery performed by one `advance` call
 */
export interface Delivery {
    recipient: string;
    record: ReceivedRecord;
}

/**
 * One node's mailbox in a summary
 */
export interface MailboxDump {
    node: string;
    records: ReceivedRecord[];
}

/**
 * Network statistics and mailbox contents at a point in simulation time
 */
export interface NetworkSummary {
    finalTime: number;
    totalSent: number;
    deliveredCount: number;
    droppedCount: number;
    /** Messages still waiting for their deliverTime */
    inTransitCount: number;
    /** Undefined when nothing has been delivered */
    averageLatency?: number;
    /** In node registration order */
    mailboxes: MailboxDump[];
}
