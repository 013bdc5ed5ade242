/**
 * @module fog/scenario
 * @description Secure fog scenario: topology, application and placement
 *
 * One area leader linked to every cluster leader, mobile nodes each attached
 * to a random cluster, and a rekeying message broadcast from the area leader
 * to all cluster leaders.
 */

import { deterministicDistribution } from '../core/distribution';
import { choice, type RandomSource } from '../core/repro';
import type { ApplicationSpec, PlacementEntry } from './application';
import type { FogSimulationConfig } from './config';
import type { EventLog } from './event-log';
import { TopologyGraph } from './topology';

// ==================== Naming ====================

export const AREA_LEADER_ID = 'area_leader';
export const APP_NAME = 'SecureApp';
export const AREA_LEADER_MODULE = 'AreaLeader';
export const CLUSTER_LEADER_MODULE = 'ClusterLeader';

export function clusterId(index: number): string {
    return `cluster_${index}`;
}

export function mobileId(index: number): string {
    return `iot_${index}`;
}

// ==================== Topology ====================

/**
 * Build the fog topology and log the starting placement of each mobile node
 * as INITIAL records at time 0
 */
export function buildFogTopology(
    config: FogSimulationConfig,
    rng: RandomSource,
    eventLog: EventLog
): TopologyGraph {
    const topology = new TopologyGraph();

    topology.addNode(AREA_LEADER_ID, 'LEADER', config.resources.leader);

    const clusters: string[] = [];
    for (let i = 1; i <= config.clusterCount; i++) {
        const id = clusterId(i);
        topology.addNode(id, 'CLUSTER', config.resources.cluster);
        topology.addEdge(AREA_LEADER_ID, id, config.backboneLink);
        clusters.push(id);
    }

    for (let i = 0; i < config.mobileCount; i++) {
        const id = mobileId(i);
        const startCluster = choice(rng, clusters);
        topology.addNode(id, 'MOBILE', config.resources.mobile);
        topology.addEdge(id, startCluster, config.attachmentLink);
        eventLog.append({ time: 0, type: 'INITIAL', node: id, location: startCluster });
    }

    return topology;
}

// ==================== Application ====================

/**
 * AreaLeader periodically broadcasts the rekeying message to ClusterLeader
 */
export function createSecureFogApplication(config: FogSimulationConfig): ApplicationSpec {
    const { rekeyMessage } = config;
    return {
        name: APP_NAME,
        modules: [AREA_LEADER_MODULE, CLUSTER_LEADER_MODULE],
        messages: [
            {
                name: rekeyMessage.name,
                src: AREA_LEADER_MODULE,
                dst: CLUSTER_LEADER_MODULE,
                instructions: rekeyMessage.instructions,
                bytes: rekeyMessage.bytes,
            },
        ],
        sources: [
            {
                module: AREA_LEADER_MODULE,
                message: rekeyMessage.name,
                distribution: deterministicDistribution('RekeyingDistribution', config.rekeying.period),
            },
        ],
    };
}

/**
 * AreaLeader on the area leader, one ClusterLeader per cluster
 */
export function createSecureFogPlacement(config: FogSimulationConfig): PlacementEntry[] {
    const placement: PlacementEntry[] = [
        { app: APP_NAME, module: AREA_LEADER_MODULE, node: AREA_LEADER_ID },
    ];
    for (let i = 1; i <= config.clusterCount; i++) {
        placement.push({ app: APP_NAME, module: CLUSTER_LEADER_MODULE, node: clusterId(i) });
    }
    return placement;
}
