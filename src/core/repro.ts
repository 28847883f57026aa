/**
 * @module core/repro
 * @description Reproducible randomness for the delivery network
 *
 * The network owns exactly one generator, seeded once at construction, so that
 * a run's drop decisions and latency samples are fully determined by its seed.
 */

// ==================== Seeded Random ====================

/**
 * Seeded random number generator (Mulberry32)
 *
 * Use this instead of Math.random() for reproducibility.
 */
export class SeededRandom {
    private state: number;

    constructor(seed: number) {
        this.state = seed >>> 0;
    }

    /**
     * Generate a random float in [0, 1)
     */
    random(): number {
        this.state = (this.state + 0x6D2B79F5) >>> 0;
        let t = this.state;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    }

    /**
     * Generate a random float in [min, max)
     */
    uniform(min: number, max: number): number {
        return this.random() * (max - min) + min;
    }

    /**
     * Draw one Bernoulli(p) outcome. Consumes exactly one sample.
     */
    bernoulli(p: number): boolean {
        return this.random() < p;
    }
}

/**
 * Create a seeded random number generator
 */
export function createRng(seed: number): SeededRandom {
    return new SeededRandom(seed);
}
