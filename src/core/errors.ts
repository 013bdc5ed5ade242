/**
 * @module core/errors
 * @description Unified error types and error codes for the fog simulator
 *
 * Topology invariant breaches (duplicate nodes or edges, references to unknown
 * nodes) are programming errors and abort the run. Recoverable conditions such
 * as a missing route are reported through the logger instead.
 */

// ==================== Error Codes ====================

/**
 * Standard error codes for the fogsim framework
 */
export const ErrorCodes = {
    // Topology Errors
    /** Node id already present in the graph */
    DUPLICATE_NODE: 'DUPLICATE_NODE',
    /** Edge between the two nodes already exists */
    DUPLICATE_EDGE: 'DUPLICATE_EDGE',
    /** Referenced node is not part of the graph */
    UNKNOWN_NODE: 'UNKNOWN_NODE',

    // Validation Errors
    /** Generic validation failure */
    VALIDATION_ERROR: 'VALIDATION_ERROR',
    /** Configuration validation failed */
    INVALID_CONFIG: 'INVALID_CONFIG',
    /** Persisted event log could not be parsed */
    INVALID_EVENT_LOG: 'INVALID_EVENT_LOG',

    /** Internal framework error */
    INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

// ==================== Error Classes ====================

/**
 * Base error class for the fogsim framework
 */
export class FogSimError extends Error {
    readonly code: ErrorCode;
    readonly details?: unknown;
    readonly timestamp: number;

    constructor(code: ErrorCode, message: string, details?: unknown) {
        super(message);
        this.name = 'FogSimError';
        this.code = code;
        this.details = details;
        this.timestamp = Date.now();

        // Maintain proper stack trace in V8
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, FogSimError);
        }
    }

    /**
     * Convert to JSON-serializable object
     */
    toJSON(): {
        name: string;
        code: ErrorCode;
        message: string;
        details: unknown;
        timestamp: number;
    } {
        return {
            name: this.name,
            code: this.code,
            message: this.message,
            details: this.details,
            timestamp: this.timestamp,
        };
    }
}

/**
 * A node with the same id was already added
 */
export class DuplicateNodeError extends FogSimError {
    readonly nodeId: string;

    constructor(nodeId: string) {
        super(ErrorCodes.DUPLICATE_NODE, `Node ${nodeId} already exists`, { nodeId });
        this.name = 'DuplicateNodeError';
        this.nodeId = nodeId;
    }
}

/**
 * An edge between the two endpoints already exists
 */
export class DuplicateEdgeError extends FogSimError {
    readonly endpoints: [string, string];

    constructor(a: string, b: string) {
        super(ErrorCodes.DUPLICATE_EDGE, `Edge ${a} <-> ${b} already exists`, { a, b });
        this.name = 'DuplicateEdgeError';
        this.endpoints = [a, b];
    }
}

/**
 * Operation referenced a node missing from the topology
 */
export class UnknownNodeError extends FogSimError {
    readonly nodeId: string;

    constructor(nodeId: string) {
        super(ErrorCodes.UNKNOWN_NODE, `Unknown node: ${nodeId}`, { nodeId });
        this.name = 'UnknownNodeError';
        this.nodeId = nodeId;
    }
}

/**
 * Validation error (invalid argument, out-of-order event, wrong node kind)
 */
export class ValidationError extends FogSimError {
    constructor(message: string, details?: unknown) {
        super(ErrorCodes.VALIDATION_ERROR, message, details);
        this.name = 'ValidationError';
    }
}

/**
 * Configuration rejected by validation
 */
export class InvalidConfigError extends FogSimError {
    readonly errors: string[];

    constructor(errors: string[]) {
        super(ErrorCodes.INVALID_CONFIG, `Invalid configuration: ${errors.join('; ')}`, { errors });
        this.name = 'InvalidConfigError';
        this.errors = errors;
    }
}

/**
 * Persisted event log is malformed
 */
export class InvalidEventLogError extends FogSimError {
    constructor(message: string, details?: unknown) {
        super(ErrorCodes.INVALID_EVENT_LOG, message, details);
        this.name = 'InvalidEventLogError';
    }
}

// ==================== Error Utilities ====================

/**
 * Check if an error is a FogSimError
 */
export function isFogSimError(error: unknown): error is FogSimError {
    return error instanceof FogSimError;
}

/**
 * Check if an error has a specific error code
 */
export function hasErrorCode(error: unknown, code: ErrorCode): boolean {
    return isFogSimError(error) && error.code === code;
}

/**
 * Wrap any error into a FogSimError
 */
export function wrapError(error: unknown, defaultCode: ErrorCode = ErrorCodes.INTERNAL_ERROR): FogSimError {
    if (isFogSimError(error)) {
        return error;
    }

    if (error instanceof Error) {
        return new FogSimError(defaultCode, error.message, {
            originalName: error.name,
            originalStack: error.stack,
        });
    }

    return new FogSimError(defaultCode, String(error));
}
