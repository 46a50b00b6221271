/**
 * @module core/logging-node
 * @description File-based loggers (Node.js only)
 *
 * Kept apart from `core/logging` so browser bundles never pull in `fs`.
 */

import * as fs from 'fs';
import * as path from 'path';
import {
    DEFAULT_SCHEMA_VERSION,
    type BaseLogEntry,
    type LogEntry,
    type LogInput,
    type Logger,
    type LoggerConfig,
    type ReportLogEntry,
    type TourLogEntry,
    type TrajectoryLogEntry,
    type WarningLogEntry,
} from './logging';

const DEFAULT_BUFFER_SIZE = 32;

/**
 * JSONL Logger: one JSON object per line, appended to
 * `<outputDir>/<task>_<timestamp>.jsonl`
 */
export class JsonlLogger implements Logger {
    readonly filepath: string;
    private config: { task: string; schemaVersion: string };
    private bufferSize: number;
    private buffer: string[] = [];
    private closed = false;

    constructor(config: LoggerConfig) {
        const outputDir = path.resolve(config.outputDir ?? 'logs');
        if (!fs.existsSync(outputDir)) {
            fs.mkdirSync(outputDir, { recursive: true });
        }

        const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
        this.filepath = path.join(outputDir, `${config.task}_${timestamp}.jsonl`);
        this.config = {
            task: config.task,
            schemaVersion: config.schemaVersion ?? DEFAULT_SCHEMA_VERSION,
        };
        this.bufferSize = config.bufferSize ?? DEFAULT_BUFFER_SIZE;
    }

    private createBaseEntry(): BaseLogEntry {
        return {
            schemaVersion: this.config.schemaVersion,
            task: this.config.task,
            timestamp: Date.now(),
        };
    }

    private write(entry: LogEntry): void {
        if (this.closed) {
            throw new Error(`JsonlLogger for ${this.filepath} is closed`);
        }
        this.buffer.push(JSON.stringify(entry));
        if (this.buffer.length >= this.bufferSize) {
            this.flush();
        }
    }

    logTour(entry: LogInput<TourLogEntry>): void {
        this.write({ ...this.createBaseEntry(), logType: 'tour', ...entry });
    }

    logTrajectory(entry: LogInput<TrajectoryLogEntry>): void {
        this.write({ ...this.createBaseEntry(), logType: 'trajectory', ...entry });
    }

    logWarning(entry: LogInput<WarningLogEntry>): void {
        this.write({ ...this.createBaseEntry(), logType: 'warning', ...entry });
    }

    logReport(entry: LogInput<ReportLogEntry>): void {
        this.write({ ...this.createBaseEntry(), logType: 'report', ...entry });
    }

    flush(): void {
        if (this.buffer.length === 0) return;
        fs.appendFileSync(this.filepath, this.buffer.join('\n') + '\n');
        this.buffer = [];
    }

    close(): void {
        if (this.closed) return;
        this.flush();
        this.closed = true;
    }
}
