/**
 * @module core/repro
 * @description Reproducibility guarantees for simulation runs
 *
 * All randomness in the simulator (node choice, cluster choice, seed
 * generation, interval sampling) is drawn from a `RandomSource` so tests can
 * pin outcomes, and identical seeds give identical runs.
 */

import { ValidationError } from './errors';

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
function createHash(data: string): string {
    const h1 = simpleHash(data);
    const h2 = simpleHash(data + h1);
    return h1 + h2;
}

// ==================== Config Hash ====================

/**
 * Serialize a value to canonical JSON (object keys sorted recursively)
 */
export function canonicalJson(value: unknown): string {
    return JSON.stringify(sortObjectKeys(value));
}

/**
 * Compute a short hash identifying a configuration
 *
 * Key order does not matter: `{a: 1, b: 2}` and `{b: 2, a: 1}` hash equal.
 */
export function computeConfigHash(config: unknown): string {
    return createHash(canonicalJson(config));
}

// ==================== Random Source ====================

/**
 * Minimal source of uniform floats in [0, 1)
 */
export interface RandomSource {
    random(): number;
}

/**
 * Seeded random number generator (Mulberry32)
 *
 * Use this instead of Math.random() for reproducibility.
 */
export class SeededRandom implements RandomSource {
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
     * Generate a random integer in [min, max)
     */
    randint(min: number, max: number): number {
        return randint(this, min, max);
    }

    /**
     * Generate a random float in [min, max)
     */
    uniform(min: number, max: number): number {
        return uniform(this, min, max);
    }

    /**
     * Pick one element uniformly
     */
    choice<T>(items: readonly T[]): T {
        return choice(this, items);
    }

    /**
     * Get the current state (for saving/restoring)
     */
    getState(): number {
        return this.state;
    }

    /**
     * Set the state (for restoring)
     */
    setState(state: number): void {
        this.state = state >>> 0;
    }
}

/**
 * Create a seeded random number generator
 */
export function createRng(seed: number): SeededRandom {
    return new SeededRandom(seed);
}

// ==================== Sampling Helpers ====================
// Free functions so callers can hand in any RandomSource, not only SeededRandom.

/**
 * Random integer in [min, max)
 */
export function randint(rng: RandomSource, min: number, max: number): number {
    return Math.floor(rng.random() * (max - min)) + min;
}

/**
 * Random float in [min, max)
 */
export function uniform(rng: RandomSource, min: number, max: number): number {
    return rng.random() * (max - min) + min;
}

/**
 * Pick one element uniformly at random
 */
export function choice<T>(rng: RandomSource, items: readonly T[]): T {
    if (items.length === 0) {
        throw new ValidationError('Cannot choose from an empty sequence');
    }
    // Clamp guards against sources that return exactly 1
    const index = Math.min(randint(rng, 0, items.length), items.length - 1);
    return items[index];
}

/**
 * Draw `length` characters uniformly from `alphabet`
 */
export function randomString(rng: RandomSource, alphabet: string, length: number): string {
    const chars = [...alphabet];
    let out = '';
    for (let i = 0; i < length; i++) {
        out += choice(rng, chars);
    }
    return out;
}

// ==================== Utility Functions ====================

/**
 * Sort object keys recursively for deterministic serialization
 */
function sortObjectKeys(obj: unknown): unknown {
    if (obj === null || typeof obj !== 'object') {
        return obj;
    }

    if (Array.isArray(obj)) {
        return obj.map(sortObjectKeys);
    }

    const sorted: Record<string, unknown> = {};
    const entries: [string, unknown][] = Object.entries(obj);
    entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    for (const [key, value] of entries) {
        sorted[key] = sortObjectKeys(value);
    }
    return sorted;
}
