/**
 * @module fog
 * @description Secure fog network simulation
 *
 * Dynamic topology and event-driven monitors for a fog network of one area
 * leader, several cluster leaders and several mobile edge nodes.
 *
 * ## Key Features
 * - Mutable topology graph with deterministic shortest paths
 * - Mobility monitor relocating nodes and invalidating routes
 * - Windowed anomaly classifier labelling each movement
 * - Periodic rekeying signal
 * - Broadcast routing to every instance of a module
 * - Append-only event log with JSON persistence and replay
 *
 * File persistence and the CLI are Node.js only and are exported from the
 * `node` entry point instead.
 */

export * from './types';
export * from './topology';
export * from './classifier';
export * from './event-log';
export * from './monitor';
export * from './mobility';
export * from './rekeying';
export * from './router';
export * from './application';
export * from './driver';
export * from './config';
export * from './scenario';
export * from './replay';
export { runFogSimulation, type FogSimulationResult, type FogRunStats, type RunOptions } from './simulation';
