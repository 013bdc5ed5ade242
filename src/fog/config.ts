/**
 * @module fog/config
 * @description Secure fog scenario configuration
 */

import { InvalidConfigError } from '../core/errors';
import type { LogLevel } from '../core/logging';
import type { LinkAttributes, NodeResources } from './types';

// ==================== Configuration ====================

/**
 * Rekeying broadcast from the area leader to every cluster leader
 */
export interface RekeyMessageConfig {
    name: string;
    instructions: number;
    bytes: number;
}

/**
 * Secure fog simulation configuration
 */
export interface FogSimulationConfig {
    /** Random seed for reproducibility */
    seed: number;
    /** Simulation horizon in time units */
    duration: number;
    /** Number of cluster leaders (cluster_1..N) */
    clusterCount: number;
    /** Number of mobile edge nodes (iot_0..M-1) */
    mobileCount: number;
    /** Per-kind node resources */
    resources: {
        leader: NodeResources;
        cluster: NodeResources;
        mobile: NodeResources;
    };
    /** Leader to cluster links */
    backboneLink: LinkAttributes;
    /** Mobile to cluster attachment links */
    attachmentLink: LinkAttributes;
    /** Mobility monitor interval, uniform in [min, max] */
    mobility: {
        minInterval: number;
        maxInterval: number;
    };
    rekeying: {
        /** Fixed rekeying period */
        period: number;
        seedLength: number;
    };
    classifier: {
        /** Trailing window in time units */
        windowSize: number;
        /** Moves tolerated inside the window */
        threshold: number;
    };
    rekeyMessage: RekeyMessageConfig;
    /** Console verbosity */
    logLevel: LogLevel;
}

/**
 * Default configuration
 */
export const DEFAULT_FOG_CONFIG: FogSimulationConfig = {
    seed: 42,
    duration: 1000,
    clusterCount: 3,
    mobileCount: 5,
    resources: {
        leader: { ipt: 5000, ram: 4000 },
        cluster: { ipt: 2000, ram: 10000 },
        mobile: { ipt: 1000, ram: 1000 },
    },
    backboneLink: { bandwidth: 10, delay: 1 },
    attachmentLink: { bandwidth: 5, delay: 2 },
    mobility: {
        minInterval: 30,
        maxInterval: 60,
    },
    rekeying: {
        period: 120,
        seedLength: 8,
    },
    classifier: {
        windowSize: 300,
        threshold: 3,
    },
    rekeyMessage: {
        name: 'RekeyingMessage',
        instructions: 50,
        bytes: 64,
    },
    logLevel: 'info',
};

/**
 * Partial overrides, one level deep for nested sections
 */
export type FogConfigOverrides = {
    [K in keyof FogSimulationConfig]?: FogSimulationConfig[K] extends object
        ? Partial<FogSimulationConfig[K]>
        : FogSimulationConfig[K];
};

// ==================== Validation ====================

/**
 * Validation result
 */
export interface ValidationResult {
    valid: boolean;
    errors: string[];
    warnings: string[];
}

function isPositive(value: number): boolean {
    return Number.isFinite(value) && value > 0;
}

function isCount(value: number, min: number): boolean {
    return Number.isInteger(value) && value >= min;
}

/**
 * Validate a configuration
 */
export function validateFogConfig(config: FogSimulationConfig): ValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];

    if (!Number.isInteger(config.seed)) {
        errors.push('seed must be an integer');
    }
    if (!isPositive(config.duration)) {
        errors.push('duration must be a positive number');
    }
    if (!isCount(config.clusterCount, 1)) {
        errors.push('clusterCount must be an integer >= 1');
    }
    if (!isCount(config.mobileCount, 0)) {
        errors.push('mobileCount must be an integer >= 0');
    }

    for (const [kind, resources] of Object.entries(config.resources)) {
        if (!isPositive(resources.ipt) || !isPositive(resources.ram)) {
            errors.push(`resources.${kind} must have positive ipt and ram`);
        }
    }
    for (const [name, link] of [['backboneLink', config.backboneLink], ['attachmentLink', config.attachmentLink]] as const) {
        if (!isPositive(link.bandwidth)) {
            errors.push(`${name}.bandwidth must be positive`);
        }
        if (!Number.isFinite(link.delay) || link.delay < 0) {
            errors.push(`${name}.delay must be non-negative`);
        }
    }

    const { minInterval, maxInterval } = config.mobility;
    if (!isPositive(minInterval) || !isPositive(maxInterval) || maxInterval < minInterval) {
        errors.push('mobility interval must satisfy 0 < minInterval <= maxInterval');
    }
    if (!isPositive(config.rekeying.period)) {
        errors.push('rekeying.period must be positive');
    }
    if (!isCount(config.rekeying.seedLength, 1)) {
        errors.push('rekeying.seedLength must be an integer >= 1');
    }
    if (!isPositive(config.classifier.windowSize)) {
        errors.push('classifier.windowSize must be positive');
    }
    if (!isCount(config.classifier.threshold, 0)) {
        errors.push('classifier.threshold must be an integer >= 0');
    }
    if (!isPositive(config.rekeyMessage.bytes) || !isPositive(config.rekeyMessage.instructions)) {
        errors.push('rekeyMessage bytes and instructions must be positive');
    }

    // Warnings
    if (config.clusterCount < 2 && config.mobileCount > 0) {
        warnings.push('fewer than two clusters: mobile nodes will never move');
    }
    if (config.mobility.minInterval >= config.duration) {
        warnings.push('mobility interval exceeds the duration: no moves will happen');
    }

    return {
        valid: errors.length === 0,
        errors,
        warnings,
    };
}

/**
 * Merge overrides into the defaults and validate
 */
export function resolveFogConfig(overrides: FogConfigOverrides = {}): FogSimulationConfig {
    const base = DEFAULT_FOG_CONFIG;
    const config: FogSimulationConfig = {
        ...base,
        ...overrides,
        resources: {
            leader: { ...base.resources.leader, ...overrides.resources?.leader },
            cluster: { ...base.resources.cluster, ...overrides.resources?.cluster },
            mobile: { ...base.resources.mobile, ...overrides.resources?.mobile },
        },
        backboneLink: { ...base.backboneLink, ...overrides.backboneLink },
        attachmentLink: { ...base.attachmentLink, ...overrides.attachmentLink },
        mobility: { ...base.mobility, ...overrides.mobility },
        rekeying: { ...base.rekeying, ...overrides.rekeying },
        classifier: { ...base.classifier, ...overrides.classifier },
        rekeyMessage: { ...base.rekeyMessage, ...overrides.rekeyMessage },
    };

    const result = validateFogConfig(config);
    if (!result.valid) {
        throw new InvalidConfigError(result.errors);
    }
    return config;
}
