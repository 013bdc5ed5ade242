/**
 * Core Tests
 * Errors, logging, reproducibility helpers and configuration
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import {
    ErrorCodes,
    FogSimError,
    InvalidConfigError,
    UnknownNodeError,
    ValidationError,
    hasErrorCode,
    isFogSimError,
    wrapError,
} from '../src/core/errors';
import {
    ConsoleLogger,
    MemoryLogger,
    MultiLogger,
    SilentLogger,
    createLogger,
    isLevelEnabled,
} from '../src/core/logging';
import {
    canonicalJson,
    choice,
    computeConfigHash,
    createRng,
    randint,
    uniform,
} from '../src/core/repro';
import { DEFAULT_FOG_CONFIG, resolveFogConfig, validateFogConfig } from '../src/fog/config';
import { sequenceRandom } from './test-utils';

describe('errors', () => {
    it('should carry a code and serialize to JSON', () => {
        const error = new UnknownNodeError('ghost');
        expect(error).toBeInstanceOf(FogSimError);
        expect(error.code).toBe(ErrorCodes.UNKNOWN_NODE);
        expect(error.message).toBe('Unknown node: ghost');
        expect(error.toJSON()).toMatchObject({
            name: 'UnknownNodeError',
            code: 'UNKNOWN_NODE',
            details: { nodeId: 'ghost' },
        });
    });

    it('should join config errors into one message', () => {
        const error = new InvalidConfigError(['a is bad', 'b is bad']);
        expect(error.message).toBe('Invalid configuration: a is bad; b is bad');
        expect(error.errors).toEqual(['a is bad', 'b is bad']);
    });

    it('should wrap foreign errors', () => {
        const own = new ValidationError('nope');
        expect(wrapError(own)).toBe(own);

        const wrapped = wrapError(new TypeError('boom'));
        expect(wrapped.code).toBe(ErrorCodes.INTERNAL_ERROR);
        expect(wrapped.message).toBe('boom');
        expect(wrapError('plain', ErrorCodes.VALIDATION_ERROR).message).toBe('plain');
    });

    it('should test error codes', () => {
        expect(isFogSimError(new Error('x'))).toBe(false);
        expect(hasErrorCode(new ValidationError('x'), ErrorCodes.VALIDATION_ERROR)).toBe(true);
        expect(hasErrorCode(new ValidationError('x'), ErrorCodes.UNKNOWN_NODE)).toBe(false);
    });
});

describe('logging', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('should lift the simulated time out of the fields', () => {
        const logger = new MemoryLogger({ task: 'test-task', seed: 42 });
        logger.info('moved', { time: 5, node: 'iot_0' });
        logger.debug('plain');

        expect(logger.entries).toEqual([
            {
                schemaVersion: '1.0.0',
                task: 'test-task',
                seed: 42,
                level: 'info',
                message: 'moved',
                time: 5,
                fields: { node: 'iot_0' },
            },
            { schemaVersion: '1.0.0', task: 'test-task', seed: 42, level: 'debug', message: 'plain' },
        ]);
    });

    it('should drop entries below the configured level', () => {
        const logger = new MemoryLogger({ task: 'test-task', seed: 1, level: 'warn' });
        logger.info('hidden');
        logger.error('shown');
        expect(logger.entries.map(e => e.message)).toEqual(['shown']);
        expect(isLevelEnabled('debug', 'info')).toBe(false);
    });

    it('should export JSONL and clear', () => {
        const logger = new MemoryLogger({ task: 't', seed: 0 });
        logger.warn('a');
        logger.warn('b');
        expect(logger.toJSONL().split('\n')).toHaveLength(2);
        logger.clear();
        expect(logger.entries).toEqual([]);
    });

    it('should prefix console lines with the simulated time', () => {
        const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        const logger = new ConsoleLogger('info');

        logger.info('Node iot_0 moved', { time: 3 });
        logger.warn('No path');
        logger.debug('hidden');

        expect(log).toHaveBeenCalledTimes(1);
        expect(log).toHaveBeenCalledWith('TIME: 3.00 - Node iot_0 moved');
        expect(warn).toHaveBeenCalledWith('No path');
    });

    it('should fan out through MultiLogger', () => {
        const a = new MemoryLogger({ task: 't', seed: 0 });
        const b = new MemoryLogger({ task: 't', seed: 0 });
        const multi = new MultiLogger([a, b, new SilentLogger()]);
        multi.error('fail');
        multi.flush();
        multi.close();
        expect(a.entries).toHaveLength(1);
        expect(b.entries).toHaveLength(1);
    });

    it('should build loggers by format', () => {
        expect(createLogger('memory', { task: 't', seed: 0 })).toBeInstanceOf(MemoryLogger);
        expect(createLogger('console', { task: 't', seed: 0 })).toBeInstanceOf(ConsoleLogger);
        expect(createLogger('silent', { task: 't', seed: 0 })).toBeInstanceOf(SilentLogger);
    });
});

describe('repro', () => {
    it('should hash configurations independently of key order', () => {
        expect(canonicalJson({ b: 2, a: { d: 1, c: [3] } })).toBe('{"a":{"c":[3],"d":1},"b":2}');
        expect(computeConfigHash({ a: 1, b: 2 })).toBe(computeConfigHash({ b: 2, a: 1 }));
        expect(computeConfigHash({ a: 1 })).not.toBe(computeConfigHash({ a: 2 }));
        expect(computeConfigHash({ a: 1 })).toMatch(/^[0-9a-f]{16}$/);
    });

    it('should replay the same sequence for the same seed', () => {
        const a = createRng(42);
        const b = createRng(42);
        const first = [a.random(), a.random(), a.random()];
        expect([b.random(), b.random(), b.random()]).toEqual(first);
        expect(first.every(v => v >= 0 && v < 1)).toBe(true);
    });

    it('should restore a saved state', () => {
        const rng = createRng(9);
        rng.random();
        const state = rng.getState();
        const next = rng.random();
        rng.setState(state);
        expect(rng.random()).toBe(next);
    });

    it('should map unit values onto ranges', () => {
        expect(randint(sequenceRandom([0.5]), 0, 10)).toBe(5);
        expect(uniform(sequenceRandom([0.25]), 30, 60)).toBe(37.5);
        expect(choice(sequenceRandom([0.7]), ['a', 'b', 'c'])).toBe('c');
        expect(choice(sequenceRandom([1]), ['a', 'b'])).toBe('b');
    });

    it('should refuse to choose from nothing', () => {
        expect(() => choice(createRng(1), [])).toThrow(ValidationError);
    });
});

describe('config', () => {
    it('should merge nested overrides into the defaults', () => {
        const config = resolveFogConfig({ seed: 7, mobility: { minInterval: 10 } });
        expect(config.seed).toBe(7);
        expect(config.mobility).toEqual({ minInterval: 10, maxInterval: 60 });
        expect(config.rekeying).toEqual(DEFAULT_FOG_CONFIG.rekeying);
        expect(DEFAULT_FOG_CONFIG.mobility.minInterval).toBe(30);
    });

    it('should accept the defaults without warnings', () => {
        expect(validateFogConfig(DEFAULT_FOG_CONFIG)).toEqual({ valid: true, errors: [], warnings: [] });
    });

    it('should warn about configurations where nothing moves', () => {
        const result = validateFogConfig({ ...DEFAULT_FOG_CONFIG, clusterCount: 1, duration: 20 });
        expect(result.valid).toBe(true);
        expect(result.warnings).toEqual([
            'fewer than two clusters: mobile nodes will never move',
            'mobility interval exceeds the duration: no moves will happen',
        ]);
    });

    it('should collect every error', () => {
        const result = validateFogConfig({
            ...DEFAULT_FOG_CONFIG,
            seed: 1.5,
            clusterCount: 0,
            backboneLink: { bandwidth: 0, delay: -1 },
        });
        expect(result.errors).toEqual([
            'seed must be an integer',
            'clusterCount must be an integer >= 1',
            'backboneLink.bandwidth must be positive',
            'backboneLink.delay must be non-negative',
        ]);
    });

    it('should throw InvalidConfigError from resolve', () => {
        expect(() => resolveFogConfig({ duration: 0 })).toThrow(
            'Invalid configuration: duration must be a positive number'
        );
    });
});
