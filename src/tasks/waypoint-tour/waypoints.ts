/**
 * @module tasks/waypoint-tour/waypoints
 * @description Waypoint text format: one `x,y,theta_degrees` record per line
 *
 * Blank lines and lines starting with `#` are ignored. Malformed lines are
 * skipped and reported, or rejected in strict mode.
 */

import { EmptyInputError, ValidationError, WaypointParseError } from '../../core/errors';
import { createRng } from '../../core/repro';
import type { WaypointRecord } from '../../models/geometry/types';

// ==================== Types ====================

/**
 * Line left out of the parse result
 */
export interface SkippedLine {
    /** 1-based line number */
    line: number;
    content: string;
    reason: string;
}

export interface ParseResult {
    waypoints: WaypointRecord[];
    skipped: SkippedLine[];
}

export interface ParseOptions {
    /** Throw WaypointParseError on the first malformed line */
    strict?: boolean;
}

/**
 * Area random waypoints are drawn from
 */
export interface WaypointBounds {
    xMin: number;
    xMax: number;
    yMin: number;
    yMax: number;
}

// ==================== Constants ====================

/**
 * Six-waypoint scenario set, written as the sample file when none exists
 */
export const EXAMPLE_WAYPOINTS_TEXT = [
    '# x,y,theta_degrees',
    '-6,-7,0',
    '-6,0,90',
    '-4,6,45',
    '0,5,30',
    '0,-2,-45',
    '-2,-6,-90',
    '',
].join('\n');

export const DEFAULT_WAYPOINT_BOUNDS: WaypointBounds = {
    xMin: -10,
    xMax: 10,
    yMin: -10,
    yMax: 10,
};

// ==================== Parsing ====================

function parseNumber(text: string): number | null {
    const trimmed = text.trim();
    if (trimmed === '') return null;
    const value = Number(trimmed);
    return Number.isFinite(value) ? value : null;
}

/**
 * Parse waypoint records from text
 *
 * @example
 * ```typescript
 * const { waypoints, skipped } = parseWaypoints('0,0,0\n5,oops,90\n');
 * waypoints; // [{ x: 0, y: 0, thetaDegrees: 0 }]
 * skipped;   // [{ line: 2, content: '5,oops,90', reason: 'non-numeric value' }]
 * ```
 */
export function parseWaypoints(text: string, options: ParseOptions = {}): ParseResult {
    const waypoints: WaypointRecord[] = [];
    const skipped: SkippedLine[] = [];

    const reject = (line: number, content: string, reason: string): void => {
        if (options.strict) {
            throw new WaypointParseError(line, content, reason);
        }
        skipped.push({ line, content, reason });
    };

    text.split(/\r?\n/).forEach((raw, i) => {
        const content = raw.trim();
        if (content === '' || content.startsWith('#')) return;

        const parts = content.split(',');
        if (parts.length !== 3) {
            reject(i + 1, content, 'expected 3 comma-separated values');
            return;
        }

        const [x, y, thetaDegrees] = parts.map(parseNumber);
        if (x === null || y === null || thetaDegrees === null) {
            reject(i + 1, content, 'non-numeric value');
            return;
        }

        waypoints.push({ x, y, thetaDegrees });
    });

    return { waypoints, skipped };
}

/**
 * Write records back in the text format, one per line
 */
export function formatWaypoints(records: readonly WaypointRecord[]): string {
    return records.map(r => `${r.x},${r.y},${r.thetaDegrees}\n`).join('');
}

// ==================== Random Scenarios ====================

function round2(value: number): number {
    return Math.round(value * 100) / 100;
}

/**
 * Reproducible random waypoints inside `bounds`, headings in [-180, 180)
 */
export function generateRandomWaypoints(
    count: number,
    bounds: WaypointBounds = DEFAULT_WAYPOINT_BOUNDS,
    seed = 42
): WaypointRecord[] {
    if (!Number.isInteger(count) || count < 1) {
        throw new EmptyInputError(`Waypoint count must be a positive integer, got ${count}`);
    }
    if (!(bounds.xMin < bounds.xMax) || !(bounds.yMin < bounds.yMax)) {
        throw new ValidationError('Waypoint bounds must have min < max on both axes', { bounds });
    }

    const rng = createRng(seed);
    return Array.from({ length: count }, () => ({
        x: round2(rng.uniform(bounds.xMin, bounds.xMax)),
        y: round2(rng.uniform(bounds.yMin, bounds.yMax)),
        thetaDegrees: round2(rng.uniform(-180, 180)),
    }));
}
