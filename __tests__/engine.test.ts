/**
 * Simulation Engine Tests
 * Event ordering, horizons and periodic processes
 */

import { describe, it, expect } from 'vitest';
import { deterministicDistribution, uniformDistribution } from '../src/core/distribution';
import { SimulationEngine } from '../src/core/engine';
import { ValidationError } from '../src/core/errors';
import { sequenceRandom } from './test-utils';

describe('SimulationEngine', () => {
    it('should fire events in time order, ties by submission order', () => {
        const engine = new SimulationEngine();
        const fired: string[] = [];
        engine.schedule(20, () => fired.push('c'));
        engine.schedule(10, () => fired.push('a'));
        engine.schedule(10, () => fired.push('b'));
        engine.schedule(0, () => fired.push('first'));

        const summary = engine.run(100);

        expect(fired).toEqual(['first', 'a', 'b', 'c']);
        expect(summary).toEqual({ until: 100, processedEvents: 4, pendingEvents: 0 });
        expect(engine.now).toBe(100);
    });

    it('should pass the firing time to the action', () => {
        const engine = new SimulationEngine();
        const times: number[] = [];
        engine.schedule(7.5, now => {
            times.push(now);
            engine.schedule(2.5, later => times.push(later));
        });
        engine.run(50);
        expect(times).toEqual([7.5, 10]);
    });

    it('should leave events at or past the horizon queued', () => {
        const engine = new SimulationEngine();
        const fired: number[] = [];
        engine.schedule(10, now => fired.push(now));
        engine.schedule(30, now => fired.push(now));

        expect(engine.run(30)).toEqual({ until: 30, processedEvents: 1, pendingEvents: 1 });
        expect(fired).toEqual([10]);
        expect(engine.pending).toBe(1);

        engine.run(31);
        expect(fired).toEqual([10, 30]);
    });

    it('should reject invalid delays and horizons', () => {
        const engine = new SimulationEngine();
        expect(() => engine.schedule(-1, () => undefined)).toThrow(ValidationError);
        expect(() => engine.schedule(Number.POSITIVE_INFINITY, () => undefined)).toThrow(ValidationError);
        engine.run(10);
        expect(() => engine.run(5)).toThrow(ValidationError);
    });

    describe('every', () => {
        it('should first fire one period after start', () => {
            const engine = new SimulationEngine();
            const times: number[] = [];
            const proc = engine.every('tick', deterministicDistribution('Tick', 10), now => times.push(now));

            engine.run(35);

            expect(times).toEqual([10, 20, 30]);
            expect(proc.firings).toBe(3);
            expect(proc.name).toBe('tick');
        });

        it('should stop firing once cancelled', () => {
            const engine = new SimulationEngine();
            const times: number[] = [];
            const proc = engine.every('tick', deterministicDistribution('Tick', 10), now => times.push(now));

            engine.run(25);
            proc.cancel();
            engine.run(100);

            expect(times).toEqual([10, 20]);
            expect(proc.firings).toBe(2);
            expect(engine.pending).toBe(0);
        });

        it('should sample a fresh wait before every firing', () => {
            const engine = new SimulationEngine();
            const times: number[] = [];
            // 30 + 0 * 30, then 30 + 0.5 * 30, repeating
            const dist = uniformDistribution('MoveDist', 30, 60, sequenceRandom([0, 0.5]));
            engine.every('move', dist, now => times.push(now));

            engine.run(200);

            expect(times).toEqual([30, 75, 105, 150, 180]);
        });
    });
});

describe('distributions', () => {
    it('should return a fixed period', () => {
        const dist = deterministicDistribution('RekeyDist', 120);
        expect(dist.name).toBe('RekeyDist');
        expect([dist.next(), dist.next()]).toEqual([120, 120]);
    });

    it('should reject non-positive periods', () => {
        expect(() => deterministicDistribution('d', 0)).toThrow(ValidationError);
        expect(() => uniformDistribution('u', 0, 10, sequenceRandom([0]))).toThrow(ValidationError);
        expect(() => uniformDistribution('u', 10, 5, sequenceRandom([0]))).toThrow(ValidationError);
    });

    it('should stay within [min, max)', () => {
        const dist = uniformDistribution('u', 30, 60, sequenceRandom([0, 0.25, 0.999]));
        expect([dist.next(), dist.next()]).toEqual([30, 37.5]);
        const last = dist.next();
        expect(last).toBeGreaterThanOrEqual(30);
        expect(last).toBeLessThan(60);
    });
});
