/**
 * @module network/obfuscation
 * @description Reversible XOR obfuscation of wire payloads
 *
 * NOT encryption. The key is fixed and shared by every node; the transform only
 * keeps plaintext out of the in-transit queue. Applying it twice with the same
 * key restores the input.
 *
 * Payloads travel as UTF-8, so only well-formed strings survive the round trip.
 * A lone surrogate has no UTF-8 encoding and comes back as U+FFFD; the network
 * applies `toWellFormedPayload` before sending so that the record, the log and
 * the delivered text all agree.
 */

export const DEFAULT_OBFUSCATION_KEY = 'USMC-COMMS-KEY';

const encoder = new TextEncoder();
const decoder = new TextDecoder();

const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/g;

/**
 * Replace each unpaired surrogate with U+FFFD, the character UTF-8 decoding yields for it
 */
export function toWellFormedPayload(text: string): string {
    return text.replace(LONE_SURROGATE, '\uFFFD');
}

/**
 * XOR every byte of `data` with the key, reused cyclically
 */
export function xorBytes(data: Uint8Array, key: Uint8Array): Uint8Array {
    if (key.length === 0) {
        return data.slice();
    }
    const out = new Uint8Array(data.length);
    for (let i = 0; i < data.length; i++) {
        out[i] = data[i] ^ key[i % key.length];
    }
    return out;
}

/**
 * Obfuscate a text payload (UTF-8) into its wire form
 */
export function obfuscatePayload(plaintext: string, key: string = DEFAULT_OBFUSCATION_KEY): Uint8Array {
    return xorBytes(encoder.encode(plaintext), encoder.encode(key));
}

/**
 * Recover the text payload from its wire form
 */
export function deobfuscatePayload(wire: Uint8Array, key: string = DEFAULT_OBFUSCATION_KEY): string {
    return decoder.decode(xorBytes(wire, encoder.encode(key)));
}
