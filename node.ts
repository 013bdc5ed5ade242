/**
 * @packageDocumentation
 * @module fogsim/node
 *
 * Node.js entry point for fogsim.
 *
 * Adds file persistence of event logs on top of the default entry point.
 *
 * ## Usage Example
 * ```typescript
 * import { runFogSimulation, saveEventLog } from 'fogsim/node';
 *
 * const result = runFogSimulation({ seed: 42 });
 * saveEventLog('simulation_log.json', result.records);
 * ```
 *
 * @license MIT
 */

// Re-export everything from the main index
export * from './index';
export { saveEventLog, loadEventLog, DEFAULT_LOG_FILE } from './src/fog/persistence';
