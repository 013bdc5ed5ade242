/**
 * @module fog/types
 * @description Shared types for the fog network model
 */

// ==================== Nodes & Edges ====================

/**
 * Role of a fog node
 */
export type NodeKind = 'LEADER' | 'CLUSTER' | 'MOBILE';

/**
 * Static resources of a node
 */
export interface NodeResources {
    /** Instructions per time unit */
    ipt: number;
    /** Memory capacity */
    ram: number;
}

/**
 * Network participant; immutable once added to the graph
 */
export interface FogNode {
    readonly id: string;
    readonly kind: NodeKind;
    readonly resources: Readonly<NodeResources>;
}

/**
 * Link attributes
 */
export interface LinkAttributes {
    /** Bandwidth in Mbit per time unit */
    bandwidth: number;
    /** Propagation delay in time units */
    delay: number;
}

/**
 * Undirected edge; `a` sorts before `b`
 */
export interface FogEdge {
    readonly a: string;
    readonly b: string;
    readonly attributes: Readonly<LinkAttributes>;
}

// ==================== Classification ====================

/**
 * Label produced by the anomaly classifier for one movement
 */
export type MovementStatus = 'NORMAL' | 'ATTACKER';

// ==================== Module Instances ====================

/**
 * Deployed copy of an application module, hosted on a topology node
 */
export interface ModuleInstance {
    /** Unique instance id, e.g. `ClusterLeader#2` */
    readonly id: string;
    readonly module: string;
    /** Hosting node id */
    readonly node: string;
}
