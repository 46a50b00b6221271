/**
 * @module tasks/waypoint-tour/io
 * @description Waypoint and log files (Node.js only)
 */

import * as fs from 'fs';
import * as path from 'path';
import type { LogEntry } from '../../core/logging';
import { EXAMPLE_WAYPOINTS_TEXT, parseWaypoints, type ParseOptions, type ParseResult } from './waypoints';

/**
 * Read and parse a waypoint file
 */
export function loadWaypointsFile(filepath: string, options: ParseOptions = {}): ParseResult {
    return parseWaypoints(fs.readFileSync(filepath, 'utf-8'), options);
}

/**
 * Write the sample waypoint file, creating parent directories
 */
export function writeExampleWaypointsFile(filepath: string): void {
    fs.mkdirSync(path.dirname(path.resolve(filepath)), { recursive: true });
    fs.writeFileSync(filepath, EXAMPLE_WAYPOINTS_TEXT);
}

/**
 * Write log entries as JSONL, replacing the file
 */
export function writeJsonlLog(filepath: string, entries: readonly LogEntry[]): void {
    fs.mkdirSync(path.dirname(path.resolve(filepath)), { recursive: true });
    fs.writeFileSync(filepath, entries.map(e => JSON.stringify(e) + '\n').join(''));
}
