/**
 * @module fog/monitor
 * @description Contract between the simulation driver and periodic monitors
 */

import type { Logger } from '../core/logging';
import type { EventLog } from './event-log';
import type { TopologyGraph } from './topology';

/**
 * What a monitor sees when the driver invokes it
 */
export interface SimulationHandle {
    /** Current simulated time */
    readonly now: number;
    readonly topology: TopologyGraph;
    readonly eventLog: EventLog;
    readonly logger: Logger;
}

/**
 * Periodic process fired by the driver. Each invocation runs to completion
 * before the clock advances.
 */
export interface Monitor {
    readonly name: string;
    invoke(sim: SimulationHandle): void;
}
