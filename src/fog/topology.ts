/**
 * @module fog/topology
 * @description Mutable labeled graph of fog nodes and weighted links
 *
 * Shortest paths use hop count. Ties are broken deterministically: the search
 * expands one BFS level at a time in ascending id order, so each node's
 * predecessor is the lowest-id node on the previous level adjacent to it.
 * Identical graphs therefore always yield identical paths.
 */

import { DuplicateEdgeError, DuplicateNodeError, UnknownNodeError, ValidationError } from '../core/errors';
import type { FogEdge, FogNode, LinkAttributes, NodeKind, NodeResources } from './types';

// ==================== Helpers ====================

function edgeKey(a: string, b: string): string {
    return a < b ? `${a}\u0000${b}` : `${b}\u0000${a}`;
}

function compareIds(a: string, b: string): number {
    return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Plain-object snapshot of a topology
 */
export interface TopologySnapshot {
    nodes: FogNode[];
    edges: FogEdge[];
}

// ==================== Topology Graph ====================

export class TopologyGraph {
    private readonly nodeMap = new Map<string, FogNode>();
    private readonly adjacency = new Map<string, Set<string>>();
    private readonly edgeMap = new Map<string, FogEdge>();
    private edgeRevision: number = 0;

    /**
     * Incremented on every change of the edge set. Consumers holding derived
     * state (routing caches) compare it to detect staleness.
     */
    get revision(): number {
        return this.edgeRevision;
    }

    get nodeCount(): number {
        return this.nodeMap.size;
    }

    get edgeCount(): number {
        return this.edgeMap.size;
    }

    // -------------------- Nodes --------------------

    addNode(id: string, kind: NodeKind, resources: NodeResources): FogNode {
        if (id.length === 0) {
            throw new ValidationError('Node id must be a non-empty string');
        }
        if (this.nodeMap.has(id)) {
            throw new DuplicateNodeError(id);
        }
        const node: FogNode = Object.freeze({ id, kind, resources: Object.freeze({ ...resources }) });
        this.nodeMap.set(id, node);
        this.adjacency.set(id, new Set());
        return node;
    }

    hasNode(id: string): boolean {
        return this.nodeMap.has(id);
    }

    /**
     * Look up a node; unknown ids are an invariant breach
     */
    getNode(id: string): FogNode {
        const node = this.nodeMap.get(id);
        if (node === undefined) {
            throw new UnknownNodeError(id);
        }
        return node;
    }

    /**
     * Nodes in insertion order, optionally filtered by kind
     */
    nodes(kind?: NodeKind): FogNode[] {
        const all = [...this.nodeMap.values()];
        return kind === undefined ? all : all.filter(node => node.kind === kind);
    }

    // -------------------- Edges --------------------

    addEdge(a: string, b: string, attributes: LinkAttributes): FogEdge {
        this.getNode(a);
        this.getNode(b);
        if (a === b) {
            throw new ValidationError(`Self-loop on ${a} is not allowed`, { node: a });
        }
        const key = edgeKey(a, b);
        if (this.edgeMap.has(key)) {
            throw new DuplicateEdgeError(a, b);
        }
        const [lo, hi] = a < b ? [a, b] : [b, a];
        const edge: FogEdge = Object.freeze({ a: lo, b: hi, attributes: Object.freeze({ ...attributes }) });
        this.edgeMap.set(key, edge);
        this.neighborSet(a).add(b);
        this.neighborSet(b).add(a);
        this.edgeRevision++;
        return edge;
    }

    /**
     * Remove the edge between `a` and `b`; returns false when there was none
     */
    removeEdge(a: string, b: string): boolean {
        const key = edgeKey(a, b);
        if (!this.edgeMap.delete(key)) {
            return false;
        }
        this.neighborSet(a).delete(b);
        this.neighborSet(b).delete(a);
        this.edgeRevision++;
        return true;
    }

    hasEdge(a: string, b: string): boolean {
        return this.edgeMap.has(edgeKey(a, b));
    }

    getEdge(a: string, b: string): FogEdge | undefined {
        return this.edgeMap.get(edgeKey(a, b));
    }

    edges(): FogEdge[] {
        return [...this.edgeMap.values()];
    }

    /**
     * Copy of the neighbour set of `id`
     */
    neighbors(id: string): Set<string> {
        return new Set(this.neighborSet(id));
    }

    // -------------------- Paths --------------------

    /**
     * Minimum-hop path from `src` to `dst` (both inclusive), or null when
     * `dst` is unreachable
     */
    shortestPath(src: string, dst: string): string[] | null {
        this.getNode(src);
        this.getNode(dst);
        if (src === dst) {
            return [src];
        }

        const parent = new Map<string, string>();
        const visited = new Set<string>([src]);
        let frontier: string[] = [src];

        while (frontier.length > 0) {
            const nextFrontier: string[] = [];
            for (const current of frontier) {
                const sortedNeighbors = [...this.neighborSet(current)].sort(compareIds);
                for (const neighbor of sortedNeighbors) {
                    if (visited.has(neighbor)) {
                        continue;
                    }
                    visited.add(neighbor);
                    parent.set(neighbor, current);
                    nextFrontier.push(neighbor);
                }
            }
            if (visited.has(dst)) {
                return this.unwind(parent, src, dst);
            }
            frontier = nextFrontier.sort(compareIds);
        }

        return null;
    }

    /**
     * Check that consecutive ids in `path` are linked
     */
    isValidPath(path: readonly string[]): boolean {
        if (path.length === 0) {
            return false;
        }
        for (let i = 0; i + 1 < path.length; i++) {
            if (!this.hasEdge(path[i], path[i + 1])) {
                return false;
            }
        }
        return path.every(id => this.nodeMap.has(id));
    }

    toJSON(): TopologySnapshot {
        return {
            nodes: this.nodes(),
            edges: this.edges(),
        };
    }

    // -------------------- Internals --------------------

    private neighborSet(id: string): Set<string> {
        const set = this.adjacency.get(id);
        if (set === undefined) {
            throw new UnknownNodeError(id);
        }
        return set;
    }

    private unwind(parent: Map<string, string>, src: string, dst: string): string[] {
        const path = [dst];
        let cursor = dst;
        while (cursor !== src) {
            const previous = parent.get(cursor);
            if (previous === undefined) {
                throw new ValidationError(`Broken predecessor chain at ${cursor}`);
            }
            path.push(previous);
            cursor = previous;
        }
        return path.reverse();
    }
}
