/**
 * @module fog/mobility
 * @description Periodic relocation of mobile nodes between clusters
 *
 * State machine: UNINITIALIZED -> READY on the first invocation, which
 * discovers mobile and cluster nodes and rebuilds the location map from the
 * existing attachment edges. Every later invocation performs at most one move
 * and leaves the moved node with exactly one attachment edge.
 */

import { DuplicateEdgeError, ValidationError } from '../core/errors';
import { choice, type RandomSource } from '../core/repro';
import type { AnomalyClassifier } from './classifier';
import type { MoveRecord } from './event-log';
import type { Monitor, SimulationHandle } from './monitor';
import type { BroadcastRouter } from './router';
import type { TopologyGraph } from './topology';
import type { LinkAttributes } from './types';

// ==================== Types ====================

export type MobilityState = 'UNINITIALIZED' | 'READY';

export interface MobilityMonitorOptions {
    classifier: AnomalyClassifier;
    /** Router whose cache is invalidated after every move */
    router: BroadcastRouter;
    rng: RandomSource;
    /** Attributes of newly created attachment edges */
    attachmentLink?: LinkAttributes;
}

export const DEFAULT_ATTACHMENT_LINK: LinkAttributes = { bandwidth: 5, delay: 2 };

// ==================== Monitor ====================

export class MobilityMonitor implements Monitor {
    readonly name = 'MovementManager';

    private readonly classifier: AnomalyClassifier;
    private readonly router: BroadcastRouter;
    private readonly rng: RandomSource;
    private readonly attachmentLink: LinkAttributes;

    private currentState: MobilityState = 'UNINITIALIZED';
    private mobileNodes: string[] = [];
    private clusterNodes: string[] = [];
    private readonly nodeLocations = new Map<string, string>();

    constructor(options: MobilityMonitorOptions) {
        this.classifier = options.classifier;
        this.router = options.router;
        this.rng = options.rng;
        this.attachmentLink = { ...(options.attachmentLink ?? DEFAULT_ATTACHMENT_LINK) };
    }

    get state(): MobilityState {
        return this.currentState;
    }

    /**
     * Current cluster of a mobile node (undefined before READY or when detached)
     */
    locationOf(nodeId: string): string | undefined {
        return this.nodeLocations.get(nodeId);
    }

    /**
     * Snapshot of the location map
     */
    locations(): Map<string, string> {
        return new Map(this.nodeLocations);
    }

    /**
     * Move one randomly chosen mobile node to a random other cluster
     */
    invoke(sim: SimulationHandle): void {
        this.ensureReady(sim);

        if (this.mobileNodes.length === 0) {
            return;
        }

        const node = choice(this.rng, this.mobileNodes);
        const current = this.nodeLocations.get(node);
        const candidates = this.clusterNodes.filter(cluster => cluster !== current);
        if (candidates.length === 0) {
            return;
        }
        const target = choice(this.rng, candidates);

        this.applyMove(sim, node, target);
    }

    /**
     * Move `nodeId` to `cluster` now. Used for scripted moves; the classifier,
     * event log and router see it exactly like a random one.
     */
    relocate(sim: SimulationHandle, nodeId: string, cluster: string): MoveRecord {
        this.ensureReady(sim);

        if (sim.topology.getNode(nodeId).kind !== 'MOBILE') {
            throw new ValidationError(`${nodeId} is not a MOBILE node`, { node: nodeId });
        }
        if (sim.topology.getNode(cluster).kind !== 'CLUSTER') {
            throw new ValidationError(`${cluster} is not a CLUSTER node`, { node: cluster });
        }
        return this.applyMove(sim, nodeId, cluster);
    }

    // -------------------- Internals --------------------

    private ensureReady(sim: SimulationHandle): void {
        if (this.currentState === 'READY') {
            return;
        }
        this.initialize(sim.topology);
        sim.logger.info(`MovementManager initialized with mobile nodes: ${this.mobileNodes.join(', ')}`, {
            time: sim.now,
            mobileNodes: this.mobileNodes.length,
            clusters: this.clusterNodes.length,
        });
    }

    private initialize(topology: TopologyGraph): void {
        this.mobileNodes = [];
        this.clusterNodes = [];
        this.nodeLocations.clear();

        for (const node of topology.nodes()) {
            if (node.kind === 'MOBILE') {
                this.track(topology, node.id);
            } else if (node.kind === 'CLUSTER') {
                this.clusterNodes.push(node.id);
            }
        }
        this.currentState = 'READY';
    }

    /**
     * Add a mobile node to the tracked set, locating it by its first cluster
     * neighbour in insertion order
     */
    private track(topology: TopologyGraph, nodeId: string): void {
        if (!this.mobileNodes.includes(nodeId)) {
            this.mobileNodes.push(nodeId);
        }
        const attachment = topology.nodes('CLUSTER')
            .find(cluster => topology.hasEdge(nodeId, cluster.id));
        if (attachment !== undefined) {
            this.nodeLocations.set(nodeId, attachment.id);
        }
    }

    private applyMove(sim: SimulationHandle, node: string, target: string): MoveRecord {
        const { topology } = sim;
        if (!this.nodeLocations.has(node)) {
            // Added to the graph after initialization, or still detached
            this.track(topology, node);
        }
        const from = this.nodeLocations.get(node) ?? null;

        // Checked up front so a failing move leaves no record and no classifier entry behind
        if (target !== from && topology.hasEdge(node, target)) {
            throw new DuplicateEdgeError(node, target);
        }
        sim.eventLog.assertAppendable(sim.now);

        const status = this.classifier.classify(node, sim.now);

        const record: MoveRecord = {
            time: sim.now,
            type: 'MOVE',
            node,
            from,
            to: target,
            status,
        };
        sim.eventLog.append(record);

        if (from !== null && topology.hasEdge(node, from)) {
            topology.removeEdge(node, from);
        }
        topology.addEdge(node, target, this.attachmentLink);
        this.nodeLocations.set(node, target);

        this.router.invalidate();

        sim.logger.info(`Node ${node} moved from ${from ?? 'nowhere'} to ${target}`, {
            time: sim.now,
            node,
            from,
            to: target,
            status,
        });
        return record;
    }
}
