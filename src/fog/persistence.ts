/**
 * @module fog/persistence
 * @description File persistence for event logs (Node.js only)
 */

import * as fs from 'fs';
import * as path from 'path';
import { parseEventLog, serializeEventLog, type EventLog, type EventRecord } from './event-log';

export const DEFAULT_LOG_FILE = 'simulation_log.json';

/**
 * Write the log as a JSON array, creating the parent directory if needed.
 * Returns the absolute path written.
 */
export function saveEventLog(file: string, log: EventLog | readonly EventRecord[]): string {
    const target = path.resolve(file);
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.writeFileSync(target, serializeEventLog(log), 'utf-8');
    return target;
}

/**
 * Read and validate a persisted log
 */
export function loadEventLog(file: string): EventRecord[] {
    return parseEventLog(fs.readFileSync(path.resolve(file), 'utf-8'));
}
