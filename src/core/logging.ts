/**
 * @module core/logging
 * @description Structured logging for tour planning runs
 *
 * Log entries follow fixed field schemas (versioned, append-only): one entry
 * for the optimized tour, one per assembled trajectory, warnings, and a
 * final report.
 *
 * Browser-compatible: ConsoleLogger, MemoryLogger and MultiLogger work in all environments.
 * Node.js only: use `src/core/logging-node` for the file-based JSONL logger.
 */

// ==================== Types ====================

/**
 * Log level for console output
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Base log entry structure (all logs must include these fields)
 */
export interface BaseLogEntry {
    /** Schema version for compatibility */
    schemaVersion: string;
    /** Task identifier */
    task: string;
    /** Timestamp in milliseconds */
    timestamp: number;
}

/**
 * Visiting order chosen by the optimizer
 */
export interface TourLogEntry extends BaseLogEntry {
    logType: 'tour';
    strategy: 'exact' | 'greedy';
    /** Waypoint indices in visiting order */
    order: number[];
    totalLength: number;
    waypointCount: number;
    /** Radius the distance oracle ran at */
    orderingRadius: number;
    closed: boolean;
    fellBack: boolean;
}

/**
 * Trajectory assembled for one turning radius
 */
export interface TrajectoryLogEntry extends BaseLogEntry {
    logType: 'trajectory';
    turningRadius: number;
    legCount: number;
    segmentCount: number;
    totalLength: number;
    /** Path word of each leg, e.g. `L+S+L+` */
    words: string[];
}

/**
 * Non-fatal condition worth surfacing (skipped input line, strategy fallback)
 */
export interface WarningLogEntry extends BaseLogEntry {
    logType: 'warning';
    message: string;
    details?: Record<string, unknown>;
}

/**
 * Report-level log entry (final summary)
 */
export interface ReportLogEntry extends BaseLogEntry {
    logType: 'report';
    waypointCount: number;
    order: number[];
    /** Total length keyed by turning radius */
    lengths: Record<string, number>;
    configHash: string;
    config: Record<string, unknown>;
}

/**
 * Union of all log entry types
 */
export type LogEntry = TourLogEntry | TrajectoryLogEntry | WarningLogEntry | ReportLogEntry;

/**
 * Entry as passed by callers: the logger stamps the remaining fields
 */
export type LogInput<E extends LogEntry> = Omit<E, 'logType' | 'schemaVersion' | 'timestamp' | 'task'>;

/**
 * Logger interface
 */
export interface Logger {
    /** Log the optimized tour */
    logTour(entry: LogInput<TourLogEntry>): void;
    /** Log one assembled trajectory */
    logTrajectory(entry: LogInput<TrajectoryLogEntry>): void;
    /** Log a warning */
    logWarning(entry: LogInput<WarningLogEntry>): void;
    /** Log final report */
    logReport(entry: LogInput<ReportLogEntry>): void;
    /** Flush pending writes */
    flush(): void;
    /** Close the logger */
    close(): void;
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
    /** Output directory (Node.js only) */
    outputDir?: string;
    /** Task name (used for file naming) */
    task: string;
    /** Schema version */
    schemaVersion?: string;
    /** Buffer size before flushing */
    bufferSize?: number;
    /** Minimum level printed by the console logger */
    level?: LogLevel;
}

// ==================== Constants ====================

export const DEFAULT_SCHEMA_VERSION = '1.0.0';

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
};

// ==================== Console Logger (Browser-compatible) ====================

/**
 * Console Logger: Print to console
 * Works in both browser and Node.js environments.
 */
export class ConsoleLogger implements Logger {
    private level: LogLevel;

    constructor(level: LogLevel = 'info') {
        this.level = level;
    }

    private enabled(level: LogLevel): boolean {
        return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
    }

    logTour(entry: LogInput<TourLogEntry>): void {
        if (this.enabled('info')) {
            console.log(
                `[TOUR] ${entry.strategy}: order=${entry.order.join(',')}, ` +
                `length=${entry.totalLength.toFixed(3)} (radius ${entry.orderingRadius})`
            );
        }
    }

    logTrajectory(entry: LogInput<TrajectoryLogEntry>): void {
        if (this.enabled('info')) {
            console.log(
                `[TRAJECTORY] radius=${entry.turningRadius}: legs=${entry.legCount}, ` +
                `segments=${entry.segmentCount}, length=${entry.totalLength.toFixed(3)}`
            );
        }
        if (this.enabled('debug')) {
            console.log(`[TRAJECTORY] words: ${entry.words.join(' ')}`);
        }
    }

    logWarning(entry: LogInput<WarningLogEntry>): void {
        if (this.enabled('warn')) {
            console.warn(`[WARN] ${entry.message}`);
        }
    }

    logReport(entry: LogInput<ReportLogEntry>): void {
        if (this.enabled('info')) {
            const lengths = Object.entries(entry.lengths)
                .map(([radius, length]) => `r=${radius}: ${length.toFixed(2)}`)
                .join(', ');
            console.log(`[REPORT] Waypoints=${entry.waypointCount}, ${lengths}`);
        }
    }

    flush(): void { /* no-op */ }
    close(): void { /* no-op */ }
}

// ==================== Memory Logger (Browser-compatible) ====================

/**
 * Memory Logger: Store logs in memory
 * Works in both browser and Node.js environments.
 * Useful for testing and browser-based applications.
 */
export class MemoryLogger implements Logger {
    private config: { task: string; schemaVersion: string };
    public tours: TourLogEntry[] = [];
    public trajectories: TrajectoryLogEntry[] = [];
    public warnings: WarningLogEntry[] = [];
    public reports: ReportLogEntry[] = [];

    constructor(config: LoggerConfig) {
        this.config = {
            task: config.task,
            schemaVersion: config.schemaVersion ?? DEFAULT_SCHEMA_VERSION,
        };
    }

    private createBaseEntry(): BaseLogEntry {
        return {
            schemaVersion: this.config.schemaVersion,
            task: this.config.task,
            timestamp: Date.now(),
        };
    }

    logTour(entry: LogInput<TourLogEntry>): void {
        this.tours.push({ ...this.createBaseEntry(), logType: 'tour', ...entry });
    }

    logTrajectory(entry: LogInput<TrajectoryLogEntry>): void {
        this.trajectories.push({ ...this.createBaseEntry(), logType: 'trajectory', ...entry });
    }

    logWarning(entry: LogInput<WarningLogEntry>): void {
        this.warnings.push({ ...this.createBaseEntry(), logType: 'warning', ...entry });
    }

    logReport(entry: LogInput<ReportLogEntry>): void {
        this.reports.push({ ...this.createBaseEntry(), logType: 'report', ...entry });
    }

    /** Get all logs */
    getAllLogs(): LogEntry[] {
        return [...this.tours, ...this.trajectories, ...this.warnings, ...this.reports];
    }

    /** Export to JSONL string */
    toJSONL(): string {
        return this.getAllLogs().map(entry => JSON.stringify(entry)).join('\n');
    }

    clear(): void {
        this.tours = [];
        this.trajectories = [];
        this.warnings = [];
        this.reports = [];
    }

    flush(): void { /* no-op for memory logger */ }
    close(): void { /* no-op for memory logger */ }
}

// ==================== Multi-Logger (Browser-compatible) ====================

/**
 * Multi-Logger: Write to multiple loggers simultaneously
 */
export class MultiLogger implements Logger {
    private loggers: Logger[];

    constructor(loggers: Logger[]) {
        this.loggers = loggers;
    }

    logTour(entry: LogInput<TourLogEntry>): void {
        for (const logger of this.loggers) {
            logger.logTour(entry);
        }
    }

    logTrajectory(entry: LogInput<TrajectoryLogEntry>): void {
        for (const logger of this.loggers) {
            logger.logTrajectory(entry);
        }
    }

    logWarning(entry: LogInput<WarningLogEntry>): void {
        for (const logger of this.loggers) {
            logger.logWarning(entry);
        }
    }

    logReport(entry: LogInput<ReportLogEntry>): void {
        for (const logger of this.loggers) {
            logger.logReport(entry);
        }
    }

    flush(): void {
        for (const logger of this.loggers) {
            logger.flush();
        }
    }

    close(): void {
        for (const logger of this.loggers) {
            logger.close();
        }
    }
}

// ==================== Factory Functions ====================

/**
 * Create a logger based on format (browser-compatible)
 */
export function createLogger(
    format: 'console' | 'memory',
    config: LoggerConfig
): Logger {
    switch (format) {
        case 'console':
            return new ConsoleLogger(config.level ?? 'info');
        case 'memory':
            return new MemoryLogger(config);
    }
}
