/**
 * @module fog/rekeying
 * @description Periodic rekeying signal
 *
 * The derived key is a placeholder security signal: it is logged but never
 * used to encrypt a payload.
 */

import { sha256 } from '@noble/hashes/sha2';
import { bytesToHex, utf8ToBytes } from '@noble/hashes/utils';
import { randomString, type RandomSource } from '../core/repro';
import type { RekeyRecord } from './event-log';
import type { Monitor, SimulationHandle } from './monitor';

// ==================== Key Material ====================

/** ASCII letters followed by digits */
export const SEED_ALPHABET = 'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';

export const DEFAULT_SEED_LENGTH = 8;

/** Hex characters kept from the digest */
export const KEY_LENGTH = 8;

/**
 * Random alphanumeric seed
 */
export function generateSeed(rng: RandomSource, length: number = DEFAULT_SEED_LENGTH): string {
    return randomString(rng, SEED_ALPHABET, length);
}

/**
 * First 8 hex characters of SHA-256(seed)
 */
export function deriveKey(seed: string): string {
    return bytesToHex(sha256(utf8ToBytes(seed))).slice(0, KEY_LENGTH);
}

// ==================== Monitor ====================

export type SeedGenerator = () => string;

export interface RekeyingMonitorOptions {
    rng: RandomSource;
    seedLength?: number;
    /** Overrides random seed generation (scripted runs, tests) */
    seedGenerator?: SeedGenerator;
}

export class RekeyingMonitor implements Monitor {
    readonly name = 'RekeyingManager';

    private readonly nextSeed: SeedGenerator;
    private rounds: number = 0;

    constructor(options: RekeyingMonitorOptions) {
        const seedLength = options.seedLength ?? DEFAULT_SEED_LENGTH;
        this.nextSeed = options.seedGenerator ?? (() => generateSeed(options.rng, seedLength));
    }

    /** Completed rekeying rounds */
    get completedRounds(): number {
        return this.rounds;
    }

    invoke(sim: SimulationHandle): void {
        const seed = this.nextSeed();
        const key = deriveKey(seed);

        const record: RekeyRecord = { time: sim.now, type: 'REKEY', seed, key };
        sim.eventLog.append(record);
        this.rounds++;

        sim.logger.info(`RekeyingManager: New seed: ${seed} -> key: ${key}`, { time: sim.now, round: this.rounds });
    }
}
