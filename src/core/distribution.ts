/**
 * @module core/distribution
 * @description Inter-arrival time distributions for periodic processes
 */

import { uniform, type RandomSource } from './repro';
import { ValidationError } from './errors';

/**
 * Source of successive waiting times between two firings of a process
 */
export interface Distribution {
    readonly name: string;
    /** Next waiting time (non-negative, finite) */
    next(): number;
}

/**
 * Fixed period
 */
export function deterministicDistribution(name: string, time: number): Distribution {
    if (!Number.isFinite(time) || time <= 0) {
        throw new ValidationError(`Distribution ${name}: period must be a positive number`, { time });
    }
    return {
        name,
        next: () => time,
    };
}

/**
 * Period drawn uniformly from [min, max)
 */
export function uniformDistribution(
    name: string,
    min: number,
    max: number,
    rng: RandomSource
): Distribution {
    if (!Number.isFinite(min) || !Number.isFinite(max) || min <= 0 || max < min) {
        throw new ValidationError(`Distribution ${name}: expected 0 < min <= max`, { min, max });
    }
    return {
        name,
        next: () => uniform(rng, min, max),
    };
}
