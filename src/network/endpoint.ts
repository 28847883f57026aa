/**
 * @module network/endpoint
 * @description Network endpoint with an append-only mailbox
 */

import type { ReceivedRecord } from './types';

export class EndpointNode {
    readonly name: string;
    private readonly _mailbox: ReceivedRecord[] = [];

    constructor(name: string) {
        this.name = name;
    }

    /** Received records in receipt order */
    get mailbox(): readonly ReceivedRecord[] {
        return this._mailbox;
    }

    receive(record: ReceivedRecord): void {
        this._mailbox.push({ ...record });
    }
}
