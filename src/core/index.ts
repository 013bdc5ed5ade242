/**
 * @module core
 * @description Simulation framework shared by every scenario
 *
 * ## Modules
 * - `engine`: Discrete-event clock and queue
 * - `distribution`: Inter-arrival time distributions
 * - `logging`: Structured diagnostic logging
 * - `repro`: Seeded RNG, random source helpers, config hash
 * - `errors`: Unified error types and codes
 */

// ==================== Engine ====================

export type {
    EventAction,
    ProcessHandle,
    RunSummary,
} from './engine';

export {
    SimulationEngine,
} from './engine';

// ==================== Distribution ====================

export type {
    Distribution,
} from './distribution';

export {
    deterministicDistribution,
    uniformDistribution,
} from './distribution';

// ==================== Logging ====================

export type {
    LogLevel,
    LogFields,
    LogEntry,
    Logger,
    LoggerConfig,
} from './logging';

export {
    isLevelEnabled,
    ConsoleLogger,
    MemoryLogger,
    MultiLogger,
    SilentLogger,
    createLogger,
} from './logging';

// ==================== Repro ====================

export type {
    RandomSource,
} from './repro';

export {
    SeededRandom,
    createRng,
    randint,
    uniform,
    choice,
    randomString,
    canonicalJson,
    computeConfigHash,
} from './repro';

// ==================== Errors ====================

export {
    ErrorCodes,
    FogSimError,
    DuplicateNodeError,
    DuplicateEdgeError,
    UnknownNodeError,
    ValidationError,
    InvalidConfigError,
    InvalidEventLogError,
    isFogSimError,
    hasErrorCode,
    wrapError,
} from './errors';

export type {
    ErrorCode,
} from './errors';
