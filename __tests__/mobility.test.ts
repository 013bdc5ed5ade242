/**
 * Mobility Monitor Tests
 * Initialization, atomic moves, attachment invariant and cache invalidation
 */

import { describe, it, expect, vi } from 'vitest';
import { DuplicateEdgeError, ValidationError } from '../src/core/errors';
import { createRng } from '../src/core/repro';
import { AnomalyClassifier } from '../src/fog/classifier';
import { MobilityMonitor } from '../src/fog/mobility';
import { BroadcastRouter } from '../src/fog/router';
import type { TopologyGraph } from '../src/fog/topology';
import type { RandomSource } from '../src/core/repro';
import {
    clusterNeighbors,
    createTestHandle,
    createTestTopology,
    instance,
    sequenceRandom,
} from './test-utils';

function setup(topology: TopologyGraph, rng: RandomSource = sequenceRandom([0])) {
    const sim = createTestHandle(topology);
    const router = new BroadcastRouter(topology);
    const classifier = new AnomalyClassifier();
    const monitor = new MobilityMonitor({ classifier, router, rng });
    return { sim, router, classifier, monitor };
}

describe('MobilityMonitor', () => {
    describe('initialization', () => {
        it('should move from UNINITIALIZED to READY on first invocation', () => {
            const { sim, monitor } = setup(createTestTopology(3, { iot_0: 'cluster_1', iot_1: 'cluster_3' }));
            expect(monitor.state).toBe('UNINITIALIZED');
            expect(monitor.locationOf('iot_0')).toBeUndefined();

            sim.now = 30;
            monitor.invoke(sim);

            expect(monitor.state).toBe('READY');
            expect(sim.logger.entries[0].message).toBe('MovementManager initialized with mobile nodes: iot_0, iot_1');
        });

        it('should seed the location map from attachment edges', () => {
            const topology = createTestTopology(3, { iot_0: 'cluster_2', iot_1: 'cluster_3' });
            const { sim, monitor } = setup(topology, sequenceRandom([0.99, 0]));
            // Picks iot_1 (index 1), leaving iot_0 untouched
            monitor.invoke(sim);
            expect(monitor.locationOf('iot_0')).toBe('cluster_2');
        });
    });

    describe('invoke', () => {
        it('should relocate a node and record the move', () => {
            const topology = createTestTopology(3, { iot_0: 'cluster_1' });
            const { sim, monitor } = setup(topology, sequenceRandom([0, 0]));
            sim.now = 42;

            monitor.invoke(sim);

            expect(sim.eventLog.toJSON()).toEqual([
                { time: 42, type: 'MOVE', node: 'iot_0', from: 'cluster_1', to: 'cluster_2', status: 'NORMAL' },
            ]);
            expect(clusterNeighbors(topology, 'iot_0')).toEqual(['cluster_2']);
            expect(topology.getEdge('iot_0', 'cluster_2')?.attributes).toEqual({ bandwidth: 5, delay: 2 });
            expect(monitor.locationOf('iot_0')).toBe('cluster_2');
        });

        it('should choose the target uniformly among the other clusters', () => {
            const topology = createTestTopology(3, { iot_0: 'cluster_1' });
            const { sim, monitor } = setup(topology, sequenceRandom([0, 0.99]));
            monitor.invoke(sim);
            expect(monitor.locationOf('iot_0')).toBe('cluster_3');
        });

        it('should use the configured attachment link', () => {
            const topology = createTestTopology(2, { iot_0: 'cluster_1' });
            const sim = createTestHandle(topology);
            const monitor = new MobilityMonitor({
                classifier: new AnomalyClassifier(),
                router: new BroadcastRouter(topology),
                rng: sequenceRandom([0]),
                attachmentLink: { bandwidth: 7, delay: 3 },
            });
            monitor.invoke(sim);
            expect(topology.getEdge('iot_0', 'cluster_2')?.attributes).toEqual({ bandwidth: 7, delay: 3 });
        });

        it('should invalidate the router cache after a move', () => {
            const topology = createTestTopology(3, { iot_0: 'cluster_1' });
            const { sim, router, monitor } = setup(topology, sequenceRandom([0, 0]));
            const invalidate = vi.spyOn(router, 'invalidate');

            router.route('area_leader', [instance('Sink#1', 'iot_0', 'Sink')]);
            expect(router.isCacheValid).toBe(true);

            monitor.invoke(sim);

            expect(invalidate).toHaveBeenCalledTimes(1);
            expect(router.isCacheValid).toBe(false);
            const { paths } = router.route('area_leader', [instance('Sink#1', 'iot_0', 'Sink')]);
            expect(paths).toEqual([['area_leader', 'cluster_2', 'iot_0']]);
        });

        it('should do nothing without mobile nodes', () => {
            const topology = createTestTopology(3, {});
            const { sim, router, monitor } = setup(topology);
            const revision = topology.revision;
            const invalidate = vi.spyOn(router, 'invalidate');

            monitor.invoke(sim);

            expect(sim.eventLog.length).toBe(0);
            expect(topology.revision).toBe(revision);
            expect(invalidate).not.toHaveBeenCalled();
        });

        it('should do nothing with fewer than two clusters', () => {
            const topology = createTestTopology(1, { iot_0: 'cluster_1' });
            const { sim, monitor } = setup(topology);
            const revision = topology.revision;

            monitor.invoke(sim);

            expect(sim.eventLog.length).toBe(0);
            expect(topology.revision).toBe(revision);
            expect(monitor.locationOf('iot_0')).toBe('cluster_1');
        });

        it('should attach a detached node to any cluster', () => {
            const topology = createTestTopology(2, { iot_0: null });
            const { sim, monitor } = setup(topology, sequenceRandom([0, 0.99]));
            monitor.invoke(sim);
            expect(sim.eventLog.toJSON()).toEqual([
                { time: 0, type: 'MOVE', node: 'iot_0', from: null, to: 'cluster_2', status: 'NORMAL' },
            ]);
            expect(clusterNeighbors(topology, 'iot_0')).toEqual(['cluster_2']);
        });

        it('should keep exactly one attachment edge across many moves', () => {
            const topology = createTestTopology(4, {
                iot_0: 'cluster_1',
                iot_1: 'cluster_2',
                iot_2: 'cluster_3',
                iot_3: 'cluster_4',
                iot_4: 'cluster_1',
            });
            const { sim, monitor } = setup(topology, createRng(7));

            for (let step = 1; step <= 60; step++) {
                sim.now = step * 10;
                monitor.invoke(sim);
                const locations = monitor.locations();
                expect(locations.size).toBe(5);
                for (const [node, cluster] of locations) {
                    expect(clusterNeighbors(topology, node)).toEqual([cluster]);
                }
            }
            expect(sim.eventLog.length).toBe(60);
        });
    });

    describe('relocate', () => {
        it('should flag the fourth move within the window', () => {
            const topology = createTestTopology(3, { iot_0: 'cluster_1' });
            const { sim, monitor } = setup(topology);

            const statuses = [10, 20, 30, 40].map((t) => {
                sim.now = t;
                return monitor.relocate(sim, 'iot_0', 'cluster_2').status;
            });

            expect(statuses).toEqual(['NORMAL', 'NORMAL', 'NORMAL', 'ATTACKER']);
            const moves = sim.eventLog.ofType('MOVE');
            expect(moves).toHaveLength(4);
            expect(moves[3]).toEqual({
                time: 40, type: 'MOVE', node: 'iot_0', from: 'cluster_2', to: 'cluster_2', status: 'ATTACKER',
            });
            expect(clusterNeighbors(topology, 'iot_0')).toEqual(['cluster_2']);
        });

        it('should reject moving a non-mobile node or to a non-cluster', () => {
            const { sim, monitor } = setup(createTestTopology(2, { iot_0: 'cluster_1' }));
            expect(() => monitor.relocate(sim, 'cluster_1', 'cluster_2')).toThrow(ValidationError);
            expect(() => monitor.relocate(sim, 'iot_0', 'area_leader')).toThrow(ValidationError);
            expect(sim.eventLog.length).toBe(0);
        });

        it('should detach a node added after initialization from its current cluster', () => {
            const topology = createTestTopology(3, { iot_0: 'cluster_1' });
            const { sim, monitor } = setup(topology, sequenceRandom([0, 0]));
            monitor.invoke(sim);

            topology.addNode('iot_9', 'MOBILE', { ipt: 1000, ram: 1000 });
            topology.addEdge('iot_9', 'cluster_1', { bandwidth: 5, delay: 2 });
            sim.now = 10;
            const record = monitor.relocate(sim, 'iot_9', 'cluster_2');

            expect(record).toEqual({
                time: 10, type: 'MOVE', node: 'iot_9', from: 'cluster_1', to: 'cluster_2', status: 'NORMAL',
            });
            expect(clusterNeighbors(topology, 'iot_9')).toEqual(['cluster_2']);
            expect(monitor.locations()).toEqual(new Map([['iot_0', 'cluster_2'], ['iot_9', 'cluster_2']]));
        });

        it('should leave the classifier untouched when the move cannot be logged', () => {
            const topology = createTestTopology(3, { iot_0: 'cluster_1' });
            const { sim, classifier, monitor } = setup(topology);
            sim.now = 50;
            monitor.relocate(sim, 'iot_0', 'cluster_2');

            sim.now = 40;
            expect(() => monitor.relocate(sim, 'iot_0', 'cluster_3')).toThrow(ValidationError);

            expect(classifier.history('iot_0')).toEqual([50]);
            expect(sim.eventLog.length).toBe(1);
            expect(clusterNeighbors(topology, 'iot_0')).toEqual(['cluster_2']);
            expect(monitor.locationOf('iot_0')).toBe('cluster_2');
        });

        it('should fail fast on a topology that breaks the attachment invariant', () => {
            const topology = createTestTopology(3, { iot_0: 'cluster_1' });
            topology.addEdge('iot_0', 'cluster_2', { bandwidth: 5, delay: 2 });
            const { sim, monitor } = setup(topology);

            expect(() => monitor.relocate(sim, 'iot_0', 'cluster_2')).toThrow(DuplicateEdgeError);
            expect(sim.eventLog.length).toBe(0);
        });
    });
});
