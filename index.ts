/**
 * @packageDocumentation
 * @module fogsim
 *
 * fogsim: Secure Fog Network Simulation
 *
 * Discrete-event simulation of a fog network with node mobility, periodic
 * rekeying and a movement anomaly classifier, recorded as a replayable event
 * log.
 *
 * ## Modules
 * - `core` - Simulation framework (engine, distributions, logging, repro, errors)
 * - `fog` - Fog network model, monitors, routing, event log and replay
 *
 * ## Usage Example
 * ```typescript
 * import { fog } from 'fogsim';
 *
 * const result = fog.runFogSimulation({ seed: 42 });
 * const frames = fog.replayEventLog(result.records);
 * ```
 *
 * @license MIT
 */

export * as core from './src/core';
export * as fog from './src/fog';

// Flat re-exports of the most used entry points
export { runFogSimulation, replayEventLog, summarizeReplay } from './src/fog';

// ==================== Version ====================
export const VERSION = '1.0.0';
