/**
 * @module fog/replay
 * @description Fold an event log into per-event frames for playback
 *
 * A renderer never looks at the topology: every frame is rebuilt from the
 * cumulative history, so the log alone determines placement and status.
 * Inter-event spacing is arbitrary; frames carry their own time.
 */

import type { EventRecord } from './event-log';
import type { MovementStatus } from './types';

// ==================== Types ====================

/**
 * State after applying one record
 */
export interface ReplayFrame {
    time: number;
    event: EventRecord;
    /** Mobile node -> cluster */
    placements: Record<string, string>;
    /** Status of each node's latest move (INITIAL counts as NORMAL) */
    statuses: Record<string, MovementStatus>;
    /** Latest rekeying seed/key, null before the first REKEY */
    seed: string | null;
    key: string | null;
}

export interface ReplaySummary {
    frames: number;
    /** Time of the last frame; 0 for an empty log */
    endTime: number;
    finalPlacements: Record<string, string>;
    /** Nodes flagged ATTACKER at least once, sorted */
    flaggedNodes: string[];
    moves: number;
    rekeys: number;
}

// ==================== Replay ====================

/**
 * Sort by time (stable for equal times) and fold into frames
 */
export function replayEventLog(records: readonly EventRecord[]): ReplayFrame[] {
    const ordered = records
        .map((record, index) => ({ record, index }))
        .sort((x, y) => x.record.time - y.record.time || x.index - y.index)
        .map(({ record }) => record);

    const placements: Record<string, string> = {};
    const statuses: Record<string, MovementStatus> = {};
    let seed: string | null = null;
    let key: string | null = null;

    return ordered.map((event) => {
        switch (event.type) {
            case 'INITIAL':
                placements[event.node] = event.location;
                statuses[event.node] = 'NORMAL';
                break;
            case 'MOVE':
                placements[event.node] = event.to;
                statuses[event.node] = event.status;
                break;
            case 'REKEY':
                seed = event.seed;
                key = event.key;
                break;
        }
        return {
            time: event.time,
            event,
            placements: { ...placements },
            statuses: { ...statuses },
            seed,
            key,
        };
    });
}

/**
 * Final state of a replay plus counters
 */
export function summarizeReplay(records: readonly EventRecord[]): ReplaySummary {
    const frames = replayEventLog(records);
    const last = frames[frames.length - 1];
    const flagged = new Set<string>();
    let moves = 0;
    let rekeys = 0;

    for (const { event } of frames) {
        if (event.type === 'MOVE') {
            moves++;
            if (event.status === 'ATTACKER') {
                flagged.add(event.node);
            }
        } else if (event.type === 'REKEY') {
            rekeys++;
        }
    }

    return {
        frames: frames.length,
        endTime: last?.time ?? 0,
        finalPlacements: last?.placements ?? {},
        flaggedNodes: [...flagged].sort(),
        moves,
        rekeys,
    };
}
