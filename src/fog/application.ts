/**
 * @module fog/application
 * @description Application modules, messages and their placement on nodes
 */

import type { Distribution } from '../core/distribution';
import { ValidationError } from '../core/errors';
import type { TopologyGraph } from './topology';
import type { ModuleInstance } from './types';

// ==================== Types ====================

/**
 * Message exchanged between two modules
 */
export interface MessageSpec {
    name: string;
    /** Emitting module */
    src: string;
    /** Receiving module; every instance of it gets a copy */
    dst: string;
    /** Instructions needed to process the message */
    instructions: number;
    /** Payload size in bytes */
    bytes: number;
}

/**
 * Periodic emission of a message by a module
 */
export interface SourceSpec {
    module: string;
    message: string;
    distribution: Distribution;
}

export interface ApplicationSpec {
    name: string;
    modules: string[];
    messages: MessageSpec[];
    sources: SourceSpec[];
}

/**
 * Deploy one instance of `module` of `app` on `node`
 */
export interface PlacementEntry {
    app: string;
    module: string;
    node: string;
}

// ==================== Validation ====================

/**
 * Reject specs that reference undeclared modules or messages
 */
export function validateApplication(app: ApplicationSpec): void {
    const modules = new Set(app.modules);
    const messages = new Map(app.messages.map(message => [message.name, message]));

    for (const message of app.messages) {
        for (const module of [message.src, message.dst]) {
            if (!modules.has(module)) {
                throw new ValidationError(`Message ${message.name} references unknown module ${module}`, {
                    app: app.name,
                });
            }
        }
    }
    for (const source of app.sources) {
        const message = messages.get(source.message);
        if (message === undefined) {
            throw new ValidationError(`Source on ${source.module} emits unknown message ${source.message}`, {
                app: app.name,
            });
        }
        if (message.src !== source.module) {
            throw new ValidationError(
                `Message ${message.name} is emitted by ${message.src}, not ${source.module}`,
                { app: app.name }
            );
        }
    }
}

// ==================== Placement ====================

/**
 * Turn placement entries for `app` into module instances. Instance ids are
 * `<module>#<n>`, numbered from 1 per module in placement order.
 */
export function placeModules(
    app: ApplicationSpec,
    placement: readonly PlacementEntry[],
    topology: TopologyGraph
): ModuleInstance[] {
    const counters = new Map<string, number>();
    const instances: ModuleInstance[] = [];

    for (const entry of placement) {
        if (entry.app !== app.name) {
            continue;
        }
        if (!app.modules.includes(entry.module)) {
            throw new ValidationError(`Placement references unknown module ${entry.module}`, { app: app.name });
        }
        topology.getNode(entry.node);

        const n = (counters.get(entry.module) ?? 0) + 1;
        counters.set(entry.module, n);
        instances.push({ id: `${entry.module}#${n}`, module: entry.module, node: entry.node });
    }

    return instances;
}

/**
 * End-to-end latency of a message along `path`: per hop,
 * `bytes / (bandwidth * 1e6) + delay`
 */
export function pathLatency(topology: TopologyGraph, path: readonly string[], bytes: number): number {
    let latency = 0;
    for (let i = 0; i + 1 < path.length; i++) {
        const edge = topology.getEdge(path[i], path[i + 1]);
        if (edge === undefined) {
            throw new ValidationError(`Path hop ${path[i]} -> ${path[i + 1]} has no link`, { path });
        }
        latency += bytes / (edge.attributes.bandwidth * 1e6) + edge.attributes.delay;
    }
    return latency;
}
