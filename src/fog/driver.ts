/**
 * @module fog/driver
 * @description Simulation driver: clock, monitors, application traffic
 *
 * Owns the topology, event log and router for one run. Several instances can
 * coexist (nothing here is process-wide), which keeps tests isolated.
 */

import type { Distribution } from '../core/distribution';
import { SimulationEngine, type ProcessHandle, type RunSummary } from '../core/engine';
import { ValidationError } from '../core/errors';
import { SilentLogger, type Logger } from '../core/logging';
import {
    pathLatency,
    placeModules,
    validateApplication,
    type ApplicationSpec,
    type MessageSpec,
    type PlacementEntry,
} from './application';
import { EventLog } from './event-log';
import type { Monitor, SimulationHandle } from './monitor';
import { BroadcastRouter } from './router';
import type { TopologyGraph } from './topology';
import type { ModuleInstance } from './types';

// ==================== Types ====================

export interface FogSimulationOptions {
    topology: TopologyGraph;
    eventLog?: EventLog;
    logger?: Logger;
}

/**
 * One message copy that reached its destination instance
 */
export interface MessageDelivery {
    app: string;
    message: string;
    sourceInstance: string;
    targetInstance: string;
    path: string[];
    sentAt: number;
    deliveredAt: number;
}

export interface TrafficStats {
    /** Broadcasts issued */
    messagesSent: number;
    /** Copies delivered */
    delivered: number;
    /** Destination instances skipped for lack of a path */
    unreachable: number;
    /** Mean delivery latency; 0 when nothing was delivered */
    meanLatency: number;
}

// ==================== Driver ====================

export class FogSimulation {
    readonly engine = new SimulationEngine();
    readonly topology: TopologyGraph;
    readonly eventLog: EventLog;
    readonly router: BroadcastRouter;
    readonly logger: Logger;
    readonly handle: SimulationHandle;

    private readonly instances: ModuleInstance[] = [];
    private readonly processes: ProcessHandle[] = [];
    private readonly deliveries: MessageDelivery[] = [];
    private messagesSent: number = 0;
    private unreachable: number = 0;

    constructor(options: FogSimulationOptions) {
        this.topology = options.topology;
        this.eventLog = options.eventLog ?? new EventLog();
        this.logger = options.logger ?? new SilentLogger();
        this.router = new BroadcastRouter(this.topology, this.logger);

        const engine = this.engine;
        this.handle = {
            get now() {
                return engine.now;
            },
            topology: this.topology,
            eventLog: this.eventLog,
            logger: this.logger,
        };
    }

    get now(): number {
        return this.engine.now;
    }

    /**
     * Invoke `monitor` every `distribution.next()` time units
     */
    deployMonitor(monitor: Monitor, distribution: Distribution): ProcessHandle {
        const proc = this.engine.every(monitor.name, distribution, () => monitor.invoke(this.handle));
        this.processes.push(proc);
        return proc;
    }

    /**
     * Place the application's modules and start its message sources
     */
    deployApplication(app: ApplicationSpec, placement: readonly PlacementEntry[]): ModuleInstance[] {
        validateApplication(app);
        const placed = placeModules(app, placement, this.topology);
        this.instances.push(...placed);

        for (const source of app.sources) {
            const message = app.messages.find(candidate => candidate.name === source.message);
            if (message === undefined) {
                throw new ValidationError(`Unknown message ${source.message}`, { app: app.name });
            }
            const proc = this.engine.every(`${app.name}:${message.name}`, source.distribution, () => {
                for (const emitter of this.instancesOf(source.module)) {
                    this.broadcast(app.name, message, emitter);
                }
            });
            this.processes.push(proc);
        }

        this.logger.info(`Deployed ${app.name} with ${placed.length} module instances`, {
            app: app.name,
            instances: placed.map(instance => instance.id),
        });
        return placed;
    }

    instancesOf(module: string): ModuleInstance[] {
        return this.instances.filter(instance => instance.module === module);
    }

    /**
     * Send `message` from `emitter` to every instance of its destination module
     */
    broadcast(app: string, message: MessageSpec, emitter: ModuleInstance): void {
        const targets = this.instancesOf(message.dst);
        const { paths, resolvedInstanceIds } = this.router.route(emitter.node, targets);
        const sentAt = this.engine.now;

        this.messagesSent++;
        this.unreachable += targets.length - resolvedInstanceIds.length;

        paths.forEach((path, i) => {
            const latency = pathLatency(this.topology, path, message.bytes);
            const targetInstance = resolvedInstanceIds[i];
            this.engine.schedule(latency, (now) => {
                this.deliveries.push({
                    app,
                    message: message.name,
                    sourceInstance: emitter.id,
                    targetInstance,
                    path,
                    sentAt,
                    deliveredAt: now,
                });
                this.logger.debug(`${message.name} delivered to ${targetInstance}`, {
                    time: now,
                    hops: path.length - 1,
                });
            });
        });
    }

    run(until: number): RunSummary {
        this.logger.info(`Running simulation for ${until} time units...`, { time: this.now });
        return this.engine.run(until);
    }

    /**
     * Stop every deployed monitor and message source
     */
    stop(): void {
        for (const proc of this.processes) {
            proc.cancel();
        }
    }

    getDeliveries(): MessageDelivery[] {
        return this.deliveries.map(delivery => ({ ...delivery, path: [...delivery.path] }));
    }

    getTrafficStats(): TrafficStats {
        const totalLatency = this.deliveries.reduce((sum, d) => sum + (d.deliveredAt - d.sentAt), 0);
        return {
            messagesSent: this.messagesSent,
            delivered: this.deliveries.length,
            unreachable: this.unreachable,
            meanLatency: this.deliveries.length > 0 ? totalLatency / this.deliveries.length : 0,
        };
    }
}
