/**
 * @module core/errors
 * @description Unified error types and error codes for path planning and tour optimization
 *
 * Every failure raised by the library carries a stable code so callers can
 * branch on the kind of failure without matching messages.
 */

// ==================== Error Codes ====================

/**
 * Standard error codes for the turnpath library
 */
export const ErrorCodes = {
    // Input Errors
    /** Generic validation failure (non-finite pose, malformed value) */
    VALIDATION_ERROR: 'VALIDATION_ERROR',
    /** Turning radius is not a positive finite number */
    INVALID_RADIUS: 'INVALID_RADIUS',
    /** Zero waypoints or poses were supplied */
    EMPTY_INPUT: 'EMPTY_INPUT',
    /** Configuration validation failed */
    INVALID_CONFIG: 'INVALID_CONFIG',
    /** Waypoint text could not be parsed */
    PARSE_ERROR: 'PARSE_ERROR',

    // Planning & Optimization Errors
    /** Every path word of the catalog was infeasible */
    NO_FEASIBLE_PATH: 'NO_FEASIBLE_PATH',
    /** Exact search exceeded its permutation budget */
    SEARCH_LIMIT_EXCEEDED: 'SEARCH_LIMIT_EXCEEDED',

    // Runtime Errors
    /** Internal framework error */
    INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

// ==================== Error Classes ====================

/**
 * Base error class for the turnpath library
 */
export class TurnpathError extends Error {
    readonly code: ErrorCode;
    readonly details?: unknown;
    readonly timestamp: number;

    constructor(code: ErrorCode, message: string, details?: unknown) {
        super(message);
        this.name = 'TurnpathError';
        this.code = code;
        this.details = details;
        this.timestamp = Date.now();

        // Maintain proper stack trace in V8
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, TurnpathError);
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
 * Validation error (non-finite coordinates, malformed values)
 */
export class ValidationError extends TurnpathError {
    constructor(message: string, details?: unknown) {
        super(ErrorCodes.VALIDATION_ERROR, message, details);
        this.name = 'ValidationError';
    }
}

/**
 * Turning radius is zero, negative or not finite
 */
export class InvalidRadiusError extends TurnpathError {
    readonly radius: number;

    constructor(radius: number) {
        super(
            ErrorCodes.INVALID_RADIUS,
            `Turning radius must be a positive finite number, got ${radius}`,
            { radius }
        );
        this.name = 'InvalidRadiusError';
        this.radius = radius;
    }
}

/**
 * No waypoints (or poses) were supplied
 */
export class EmptyInputError extends TurnpathError {
    constructor(message = 'At least one waypoint is required') {
        super(ErrorCodes.EMPTY_INPUT, message);
        this.name = 'EmptyInputError';
    }
}

/**
 * Configuration error
 */
export class InvalidConfigError extends TurnpathError {
    readonly errors: string[];

    constructor(errors: string[]) {
        super(ErrorCodes.INVALID_CONFIG, `Invalid configuration: ${errors.join('; ')}`, errors);
        this.name = 'InvalidConfigError';
        this.errors = errors;
    }
}

/**
 * Waypoint text parse error (raised in strict parsing mode)
 */
export class WaypointParseError extends TurnpathError {
    readonly line: number;

    constructor(line: number, content: string, reason: string) {
        super(
            ErrorCodes.PARSE_ERROR,
            `Line ${line}: ${reason}: '${content}'`,
            { line, content, reason }
        );
        this.name = 'WaypointParseError';
        this.line = line;
    }
}

/**
 * Every catalog word was rejected for a relative goal.
 *
 * The catalog always contains a feasible word, so this signals a defect in
 * the word formulas rather than a property of the input.
 */
export class NoFeasiblePathError extends TurnpathError {
    constructor(details?: unknown) {
        super(ErrorCodes.NO_FEASIBLE_PATH, 'No feasible Reeds-Shepp word for the requested poses', details);
        this.name = 'NoFeasiblePathError';
    }
}

/**
 * Exact search stopped after exhausting its permutation budget
 */
export class SearchLimitError extends TurnpathError {
    readonly limit: number;

    constructor(limit: number) {
        super(
            ErrorCodes.SEARCH_LIMIT_EXCEEDED,
            `Exact search exceeded ${limit} evaluated permutations`,
            { limit }
        );
        this.name = 'SearchLimitError';
        this.limit = limit;
    }
}

// ==================== Error Utilities ====================

/**
 * Check if an error is a TurnpathError
 */
export function isTurnpathError(error: unknown): error is TurnpathError {
    return error instanceof TurnpathError;
}

/**
 * Check if an error has a specific error code
 */
export function hasErrorCode(error: unknown, code: ErrorCode): boolean {
    return isTurnpathError(error) && error.code === code;
}

/**
 * Wrap any error into a TurnpathError
 */
export function wrapError(error: unknown, defaultCode: ErrorCode = ErrorCodes.INTERNAL_ERROR): TurnpathError {
    if (isTurnpathError(error)) {
        return error;
    }

    if (error instanceof Error) {
        return new TurnpathError(defaultCode, error.message, {
            originalName: error.name,
            originalStack: error.stack,
        });
    }

    return new TurnpathError(defaultCode, String(error));
}
