/**
 * @module fog/event-log
 * @description Append-only record of simulation events
 *
 * The log is the only output artifact of a run. Records are frozen on append
 * and must arrive in non-decreasing time order. The persisted form is a JSON
 * array; `parseEventLog(serializeEventLog(log))` yields the same records in
 * the same order.
 */

import { InvalidEventLogError, ValidationError } from '../core/errors';
import type { MovementStatus } from './types';

// ==================== Record Types ====================

export type EventType = 'INITIAL' | 'MOVE' | 'REKEY';

/**
 * Starting placement of a mobile node
 */
export interface InitialRecord {
    time: number;
    type: 'INITIAL';
    node: string;
    location: string;
}

/**
 * Relocation of a mobile node, labelled by the classifier
 */
export interface MoveRecord {
    time: number;
    type: 'MOVE';
    node: string;
    /** Previous cluster; null when the node had no attachment */
    from: string | null;
    to: string;
    status: MovementStatus;
}

/**
 * Rekeying round
 */
export interface RekeyRecord {
    time: number;
    type: 'REKEY';
    seed: string;
    /** Derived key, 8 hex characters */
    key: string;
}

export type EventRecord = InitialRecord | MoveRecord | RekeyRecord;

/**
 * Record of a given type
 */
export type RecordOf<T extends EventType> = Extract<EventRecord, { type: T }>;

export type EventLogListener = (record: Readonly<EventRecord>) => void;

// ==================== Event Log ====================

export class EventLog {
    private readonly entries: Readonly<EventRecord>[] = [];
    private readonly listeners = new Set<EventLogListener>();

    get length(): number {
        return this.entries.length;
    }

    /**
     * Append a record; its time may not precede the last record's
     */
    append(record: EventRecord): Readonly<EventRecord> {
        this.assertAppendable(record.time);
        const frozen = Object.freeze(normalizeRecord(record));
        this.entries.push(frozen);
        for (const listener of this.listeners) {
            listener(frozen);
        }
        return frozen;
    }

    /**
     * Throw unless a record at `time` could be appended now
     */
    assertAppendable(time: number): void {
        if (!Number.isFinite(time) || time < 0) {
            throw new ValidationError(`Event time must be a non-negative number, got ${time}`, { time });
        }
        const last = this.entries[this.entries.length - 1];
        if (last !== undefined && time < last.time) {
            throw new ValidationError(`Event at ${time} would precede the last record at ${last.time}`, { time });
        }
    }

    /**
     * Snapshot of all records in append order
     */
    records(): readonly Readonly<EventRecord>[] {
        return [...this.entries];
    }

    ofType<T extends EventType>(type: T): Readonly<RecordOf<T>>[] {
        return this.entries.filter((record): record is Readonly<RecordOf<T>> => record.type === type);
    }

    /**
     * Notify `listener` of every future append. Returns the unsubscribe function.
     */
    subscribe(listener: EventLogListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    toJSON(): EventRecord[] {
        return this.entries.map(record => ({ ...record }));
    }
}

// ==================== Serialization ====================

/**
 * Persisted JSON array form (4-space indent)
 */
export function serializeEventLog(log: EventLog | readonly EventRecord[]): string {
    const records = log instanceof EventLog ? log.toJSON() : log.map(normalizeRecord);
    return JSON.stringify(records, null, 4);
}

/**
 * Parse and validate a persisted log
 */
export function parseEventLog(json: string): EventRecord[] {
    let parsed: unknown;
    try {
        parsed = JSON.parse(json);
    } catch (error) {
        throw new InvalidEventLogError('Event log is not valid JSON', {
            cause: error instanceof Error ? error.message : String(error),
        });
    }
    if (!Array.isArray(parsed)) {
        throw new InvalidEventLogError('Event log must be a JSON array');
    }
    return parsed.map((item: unknown, index: number) => toEventRecord(item, index));
}

/**
 * Rebuild an in-memory log from records (e.g. after `parseEventLog`)
 */
export function eventLogFrom(records: readonly EventRecord[]): EventLog {
    const log = new EventLog();
    for (const record of records) {
        log.append(record);
    }
    return log;
}

// ==================== Validation ====================

function isObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireString(item: Record<string, unknown>, field: string, index: number): string {
    const value = item[field];
    if (typeof value !== 'string') {
        throw new InvalidEventLogError(`Record ${index}: field "${field}" must be a string`, { index, field });
    }
    return value;
}

function toEventRecord(item: unknown, index: number): EventRecord {
    if (!isObject(item)) {
        throw new InvalidEventLogError(`Record ${index} is not an object`, { index });
    }
    const time = item.time;
    if (typeof time !== 'number' || !Number.isFinite(time)) {
        throw new InvalidEventLogError(`Record ${index}: field "time" must be a number`, { index });
    }

    switch (item.type) {
        case 'INITIAL':
            return {
                time,
                type: 'INITIAL',
                node: requireString(item, 'node', index),
                location: requireString(item, 'location', index),
            };
        case 'MOVE': {
            const from = item.from;
            if (from !== null && typeof from !== 'string') {
                throw new InvalidEventLogError(`Record ${index}: field "from" must be a string or null`, { index });
            }
            const status = item.status;
            if (status !== 'NORMAL' && status !== 'ATTACKER') {
                throw new InvalidEventLogError(`Record ${index}: unknown status ${String(status)}`, { index });
            }
            return {
                time,
                type: 'MOVE',
                node: requireString(item, 'node', index),
                from,
                to: requireString(item, 'to', index),
                status,
            };
        }
        case 'REKEY': {
            const key = requireString(item, 'key', index);
            if (!/^[0-9a-f]{8}$/.test(key)) {
                throw new InvalidEventLogError(`Record ${index}: key must be 8 hex characters`, { index, key });
            }
            return {
                time,
                type: 'REKEY',
                seed: requireString(item, 'seed', index),
                key,
            };
        }
        default:
            throw new InvalidEventLogError(`Record ${index}: unknown type ${String(item.type)}`, { index });
    }
}

/**
 * Copy a record with exactly its persisted fields, in persisted order
 */
function normalizeRecord(record: EventRecord): EventRecord {
    switch (record.type) {
        case 'INITIAL':
            return { time: record.time, type: record.type, node: record.node, location: record.location };
        case 'MOVE':
            return {
                time: record.time,
                type: record.type,
                node: record.node,
                from: record.from,
                to: record.to,
                status: record.status,
            };
        case 'REKEY':
            return { time: record.time, type: record.type, seed: record.seed, key: record.key };
    }
}
