/**
 * @module fog/classifier
 * @description Windowed movement-frequency classifier
 *
 * Fixed rule standing in for a trained model: a node that moves more than
 * `threshold` times within the trailing `windowSize` time units is flagged.
 */

import { SilentLogger, type Logger } from '../core/logging';
import type { MovementStatus } from './types';

// ==================== Configuration ====================

export interface ClassifierConfig {
    /** Trailing window length in time units */
    windowSize: number;
    /** Moves allowed inside the window; one more flags the node */
    threshold: number;
}

export const DEFAULT_CLASSIFIER_CONFIG: ClassifierConfig = {
    windowSize: 300,
    threshold: 3,
};

// ==================== Classifier ====================

export class AnomalyClassifier {
    private readonly config: ClassifierConfig;
    private readonly logger: Logger;
    private readonly moveHistory = new Map<string, number[]>();

    constructor(config: Partial<ClassifierConfig> = {}, logger: Logger = new SilentLogger()) {
        this.config = { ...DEFAULT_CLASSIFIER_CONFIG, ...config };
        this.logger = logger;
    }

    /**
     * Record a move of `nodeId` at `now` and label it
     */
    classify(nodeId: string, now: number): MovementStatus {
        const history = this.moveHistory.get(nodeId) ?? [];
        history.push(now);

        // Keep entries strictly inside the trailing window
        const recent = history.filter(t => now - t < this.config.windowSize);
        this.moveHistory.set(nodeId, recent);

        if (recent.length > this.config.threshold) {
            this.logger.warn(`AnomalyClassifier: Node ${nodeId} movement is SUSPICIOUS.`, {
                time: now,
                node: nodeId,
                recentMoves: recent.length,
            });
            return 'ATTACKER';
        }
        this.logger.info(`AnomalyClassifier: Node ${nodeId} movement is NORMAL.`, {
            time: now,
            node: nodeId,
            recentMoves: recent.length,
        });
        return 'NORMAL';
    }

    /**
     * Move timestamps still inside the window as of the last check
     */
    history(nodeId: string): readonly number[] {
        return [...(this.moveHistory.get(nodeId) ?? [])];
    }

    reset(): void {
        this.moveHistory.clear();
    }
}
