/**
 * @module tasks/waypoint-tour/report
 * @description Report generation for the waypoint-tour task
 */

import { computeConfigHash } from '../../core/repro';
import type { OrderingStrategy, Tour, Trajectory } from '../../models/planning/tour/types';
import type { OrderingRadius, WaypointTourConfig } from './config';

// ==================== Types ====================

/**
 * Outcome for one turning radius
 */
export interface RadiusResult {
    turningRadius: number;
    /** Waypoint indices in driving order */
    order: number[];
    strategy: OrderingStrategy;
    /** Path length of the assembled trajectory */
    totalLength: number;
    legCount: number;
    segmentCount: number;
    /** Path word of each leg */
    words: string[];
}

/**
 * Full run report
 */
export interface TourReport {
    taskName: string;
    config: WaypointTourConfig;
    configHash: string;
    timestamp: number;
    waypointCount: number;
    orderingRadius: OrderingRadius;
    closed: boolean;
    fellBack: boolean;
    results: RadiusResult[];
}

// ==================== Report Generation ====================

/**
 * Generate full report.
 *
 * `tours[i]` is the order `trajectories[i]` was assembled for.
 */
export function generateReport(
    config: WaypointTourConfig,
    waypointCount: number,
    tours: readonly Tour[],
    trajectories: readonly Trajectory[]
): TourReport {
    const results = trajectories.map((trajectory, i) => ({
        turningRadius: trajectory.turningRadius,
        order: [...tours[i].order],
        strategy: tours[i].strategy,
        totalLength: trajectory.totalLength,
        legCount: trajectory.legs.length,
        segmentCount: trajectory.segments.length,
        words: trajectory.legs.map(leg => leg.word),
    }));

    return {
        taskName: config.taskName,
        config,
        configHash: computeConfigHash(config),
        timestamp: Date.now(),
        waypointCount,
        orderingRadius: config.orderingRadius,
        closed: config.closeLoop,
        fellBack: tours.some(t => t.fellBack),
        results,
    };
}

/**
 * Total length keyed by turning radius
 */
export function lengthsByRadius(report: TourReport): Record<string, number> {
    const lengths: Record<string, number> = {};
    for (const result of report.results) {
        lengths[String(result.turningRadius)] = result.totalLength;
    }
    return lengths;
}

// ==================== Export Formats ====================

/**
 * Export report to JSON string
 */
export function reportToJson(report: TourReport): string {
    return JSON.stringify(report, null, 2);
}

/**
 * Export trajectory segments to CSV, one row per segment
 */
export function trajectoriesToCSV(trajectories: readonly Trajectory[]): string {
    const headers = ['radius', 'leg', 'segment', 'kind', 'direction', 'length'];

    const rows = trajectories.flatMap(trajectory =>
        trajectory.legs.flatMap((leg, legIndex) =>
            leg.segments.map((segment, segmentIndex) => [
                trajectory.turningRadius,
                legIndex,
                segmentIndex,
                segment.kind,
                segment.direction,
                segment.length.toFixed(4),
            ].join(','))
        )
    );

    return [headers.join(','), ...rows].join('\n');
}

/**
 * Human-readable summary, one line per radius
 */
export function formatSummary(report: TourReport): string {
    const perRadius = report.orderingRadius === 'per-radius';
    const lines: string[] = [];

    if (!perRadius && report.results.length > 0) {
        const first = report.results[0];
        lines.push(`Waypoint order (${first.strategy}): ${first.order.join(' -> ')}`);
    }

    for (const result of report.results) {
        const line = `Path length for radius ${result.turningRadius.toFixed(1)}: ${result.totalLength.toFixed(2)}`;
        lines.push(perRadius ? `${line} (order ${result.order.join(' -> ')})` : line);
    }

    return lines.join('\n');
}
