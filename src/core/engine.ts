/**
 * @module core/engine
 * @description Discrete-event simulation engine
 *
 * Single-threaded and cooperative: events fire strictly in order of simulated
 * time, ties broken by submission order, and each callback runs to completion
 * before the clock advances. State touched only from callbacks therefore needs
 * no locking.
 */

import type { Distribution } from './distribution';
import { ValidationError } from './errors';

// ==================== Types ====================

/**
 * Callback fired when a scheduled event comes due
 */
export type EventAction = (now: number) => void;

interface ScheduledEvent {
    time: number;
    /** Submission order, used to break ties */
    seq: number;
    action: EventAction;
}

/**
 * Handle to a periodic process; `cancel` stops future firings
 */
export interface ProcessHandle {
    readonly name: string;
    /** Number of completed firings */
    readonly firings: number;
    cancel(): void;
}

/**
 * Summary of one `run` call
 */
export interface RunSummary {
    /** Clock value when the run stopped */
    until: number;
    /** Events executed during this run */
    processedEvents: number;
    /** Events still queued past the horizon */
    pendingEvents: number;
}

// ==================== Event Queue ====================

function before(a: ScheduledEvent, b: ScheduledEvent): boolean {
    return a.time < b.time || (a.time === b.time && a.seq < b.seq);
}

/**
 * Binary min-heap ordered by (time, seq)
 */
class EventQueue {
    private readonly data: ScheduledEvent[] = [];

    get size(): number {
        return this.data.length;
    }

    push(event: ScheduledEvent): void {
        this.data.push(event);
        this.bubbleUp(this.data.length - 1);
    }

    peek(): ScheduledEvent | undefined {
        return this.data[0];
    }

    pop(): ScheduledEvent | undefined {
        const top = this.data[0];
        const last = this.data.pop();
        if (last !== undefined && this.data.length > 0) {
            this.data[0] = last;
            this.bubbleDown(0);
        }
        return top;
    }

    private bubbleUp(index: number): void {
        while (index > 0) {
            const parent = Math.floor((index - 1) / 2);
            if (!before(this.data[index], this.data[parent])) {
                break;
            }
            [this.data[parent], this.data[index]] = [this.data[index], this.data[parent]];
            index = parent;
        }
    }

    private bubbleDown(index: number): void {
        const length = this.data.length;
        while (true) {
            let smallest = index;
            const left = 2 * index + 1;
            const right = 2 * index + 2;
            if (left < length && before(this.data[left], this.data[smallest])) {
                smallest = left;
            }
            if (right < length && before(this.data[right], this.data[smallest])) {
                smallest = right;
            }
            if (smallest === index) {
                break;
            }
            [this.data[smallest], this.data[index]] = [this.data[index], this.data[smallest]];
            index = smallest;
        }
    }
}

// ==================== Engine ====================

/**
 * Simulated clock plus event queue
 */
export class SimulationEngine {
    private readonly queue = new EventQueue();
    private clock: number = 0;
    private seq: number = 0;

    /** Current simulated time */
    get now(): number {
        return this.clock;
    }

    /** Number of queued events */
    get pending(): number {
        return this.queue.size;
    }

    /**
     * Schedule `action` to run `delay` time units from now
     */
    schedule(delay: number, action: EventAction): void {
        if (!Number.isFinite(delay) || delay < 0) {
            throw new ValidationError(`Cannot schedule an event with delay ${delay}`, { delay });
        }
        this.queue.push({ time: this.clock + delay, seq: this.seq++, action });
    }

    /**
     * Fire `action` repeatedly, waiting `distribution.next()` before every firing
     * (including the first).
     */
    every(name: string, distribution: Distribution, action: EventAction): ProcessHandle {
        let cancelled = false;
        let firings = 0;

        const arm = (): void => {
            this.schedule(distribution.next(), (now) => {
                if (cancelled) {
                    return;
                }
                action(now);
                firings++;
                arm();
            });
        };
        arm();

        return {
            name,
            get firings() {
                return firings;
            },
            cancel: () => {
                cancelled = true;
            },
        };
    }

    /**
     * Process events with time strictly below `until`, then park the clock at
     * `until`. Events past the horizon stay queued.
     */
    run(until: number): RunSummary {
        if (!Number.isFinite(until) || until < this.clock) {
            throw new ValidationError(`Cannot run until ${until}: clock is already at ${this.clock}`, { until });
        }

        let processedEvents = 0;
        let next = this.queue.peek();
        while (next !== undefined && next.time < until) {
            this.queue.pop();
            this.clock = next.time;
            next.action(this.clock);
            processedEvents++;
            next = this.queue.peek();
        }
        this.clock = until;

        return { until, processedEvents, pendingEvents: this.queue.size };
    }
}
