/**
 * @module fog/router
 * @description Shortest-path broadcast from one node to every instance of a module
 *
 * Paths are memoised per (source, destination node). The cache is dropped on
 * `invalidate()`, which the mobility monitor calls after every relocation, and
 * also whenever the graph's edge revision differs from the one the cache was
 * built against. A removed edge can therefore never show up in a result.
 */

import { SilentLogger, type Logger } from '../core/logging';
import type { TopologyGraph } from './topology';
import type { ModuleInstance } from './types';

// ==================== Types ====================

/**
 * Result of one broadcast; `paths[i]` ends at the node hosting
 * `resolvedInstanceIds[i]`
 */
export interface BroadcastRoute {
    paths: string[][];
    resolvedInstanceIds: string[];
}

/**
 * Counters for cache behaviour
 */
export interface RouterStats {
    hits: number;
    misses: number;
    invalidations: number;
    unreachable: number;
}

// ==================== Router ====================

export class BroadcastRouter {
    private readonly topology: TopologyGraph;
    private readonly logger: Logger;
    private readonly cache = new Map<string, string[] | null>();
    private cacheValid: boolean = false;
    private cacheRevision: number = -1;
    private readonly stats: RouterStats = { hits: 0, misses: 0, invalidations: 0, unreachable: 0 };

    constructor(topology: TopologyGraph, logger: Logger = new SilentLogger()) {
        this.topology = topology;
        this.logger = logger;
    }

    /**
     * Whether cached paths may be served without recomputation
     */
    get isCacheValid(): boolean {
        return this.cacheValid && this.cacheRevision === this.topology.revision;
    }

    /**
     * Mark every cached path stale
     */
    invalidate(): void {
        this.cacheValid = false;
        this.stats.invalidations++;
    }

    /**
     * Route from `source` to each instance, in input order. Unreachable
     * instances are skipped with a warning.
     */
    route(source: string, instances: readonly ModuleInstance[]): BroadcastRoute {
        this.ensureFresh();

        const paths: string[][] = [];
        const resolvedInstanceIds: string[] = [];

        for (const instance of instances) {
            const path = this.lookup(source, instance.node);
            if (path === null) {
                this.stats.unreachable++;
                this.logger.warn(`No path from ${source} to ${instance.node}`, {
                    source,
                    target: instance.node,
                    instance: instance.id,
                });
                continue;
            }
            paths.push([...path]);
            resolvedInstanceIds.push(instance.id);
        }

        return { paths, resolvedInstanceIds };
    }

    getStats(): RouterStats {
        return { ...this.stats };
    }

    // -------------------- Internals --------------------

    private ensureFresh(): void {
        if (this.isCacheValid) {
            return;
        }
        this.cache.clear();
        this.cacheValid = true;
        this.cacheRevision = this.topology.revision;
    }

    private lookup(source: string, target: string): string[] | null {
        const key = `${source}\u0000${target}`;
        const cached = this.cache.get(key);
        if (cached !== undefined) {
            this.stats.hits++;
            return cached;
        }
        this.stats.misses++;
        const path = this.topology.shortestPath(source, target);
        this.cache.set(key, path);
        return path;
    }
}
