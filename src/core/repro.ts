/**
 * @module core/repro
 * @description Reproducibility helpers
 *
 * Provides a seeded RNG for generated scenarios and a stable configuration
 * hash so reports can be matched to the settings that produced them.
 */

// ==================== Browser-compatible Hash ====================

/**
 * Simple hash function that works in both browser and Node.js
 * Uses djb2 algorithm for fast, consistent hashing
 */
function simpleHash(str: string): string {
    let hash = 5381;
    for (let i = 0; i < str.length; i++) {
        hash = ((hash << 5) + hash) ^ str.charCodeAt(i);
    }
    // Convert to hex string
    return (hash >>> 0).toString(16).padStart(8, '0');
}

/**
 * Create a hash from a string (browser-compatible)
 */
export function createHash(data: string): string {
    // Use multiple rounds for better distribution
    const h1 = simpleHash(data);
    const h2 = simpleHash(data + h1);
    return h1 + h2;
}

/**
 * Sort object keys recursively for deterministic serialization
 */
export function sortObjectKeys(value: unknown): unknown {
    if (value === null || typeof value !== 'object') {
        return value;
    }

    if (Array.isArray(value)) {
        return value.map(sortObjectKeys);
    }

    const sorted: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
        sorted[key] = sortObjectKeys(entry);
    }
    return sorted;
}

/**
 * Canonical JSON: keys sorted at every depth
 */
export function canonicalJson(value: unknown): string {
    return JSON.stringify(sortObjectKeys(value));
}

/**
 * Compute a 16-hex-digit hash of a configuration object.
 *
 * Key order does not affect the result.
 */
export function computeConfigHash(config: object): string {
    return createHash(canonicalJson(config));
}

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
}

/**
 * Create a seeded random number generator
 */
export function createRng(seed: number): SeededRandom {
    return new SeededRandom(seed);
}
