/**
 * @module core
 * @description Core framework shared by the planning models and tasks
 *
 * ## Modules
 * - `errors`: Unified error types and codes
 * - `logging`: Structured tour/trajectory/report logging
 * - `repro`: Seeded RNG and configuration hashing
 *
 * The JSONL file logger lives in `core/logging-node` (Node.js only).
 */

// ==================== Logging ====================

export type {
    LogLevel,
    BaseLogEntry,
    TourLogEntry,
    TrajectoryLogEntry,
    WarningLogEntry,
    ReportLogEntry,
    LogEntry,
    LogInput,
    Logger,
    LoggerConfig,
} from './logging';

export {
    DEFAULT_SCHEMA_VERSION,
    MultiLogger,
    ConsoleLogger,
    MemoryLogger,
    createLogger,
} from './logging';

// ==================== Repro ====================

export {
    createHash,
    sortObjectKeys,
    canonicalJson,
    computeConfigHash,
    SeededRandom,
    createRng,
} from './repro';

// ==================== Errors ====================

export {
    ErrorCodes,
    TurnpathError,
    ValidationError,
    InvalidRadiusError,
    EmptyInputError,
    InvalidConfigError,
    WaypointParseError,
    NoFeasiblePathError,
    SearchLimitError,
    isTurnpathError,
    hasErrorCode,
    wrapError,
} from './errors';

export type { ErrorCode } from './errors';
