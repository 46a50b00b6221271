/**
 * @module tasks/waypoint-tour/task
 * @description Order waypoints and assemble a trajectory per turning radius
 */

import { EmptyInputError } from '../../core/errors';
import type { Logger } from '../../core/logging';
import type { Pose, Waypoint, WaypointRecord } from '../../models/geometry/types';
import { toWaypoints } from '../../models/geometry/pose';
import { assemble, sampleTrajectory } from '../../models/planning/tour/assembler';
import { createDistanceOracle } from '../../models/planning/tour/distance';
import { optimalOrder } from '../../models/planning/tour/optimizer';
import type { OptimizerOptions, Tour, Trajectory } from '../../models/planning/tour/types';
import { assertValidConfig, createConfig, validateConfig, type WaypointTourConfig } from './config';
import { generateReport, lengthsByRadius, type TourReport } from './report';

// ==================== Types ====================

export interface WaypointTourResult {
    config: WaypointTourConfig;
    /** Order at the first radius (the only order unless optimizing per radius) */
    tour: Tour;
    /** Order used for each entry of `config.radii` */
    tours: Tour[];
    /** Waypoints of `tour` in visiting order */
    orderedWaypoints: Waypoint[];
    /** One trajectory per entry of `config.radii` */
    trajectories: Trajectory[];
    /** Poses along each trajectory, `config.sampleStep` apart, for drawing */
    polylines: Pose[][];
    report: TourReport;
}

// ==================== Helpers ====================

function orderedPoses(waypoints: readonly Waypoint[], tour: Tour): Pose[] {
    const poses = tour.order.map(i => waypoints[i].pose);
    if (tour.closed && poses.length > 1) {
        poses.push(poses[0]);
    }
    return poses;
}

function logTour(logger: Logger | undefined, tour: Tour, waypointCount: number, orderingRadius: number): void {
    logger?.logTour({
        strategy: tour.strategy,
        order: tour.order,
        totalLength: tour.totalLength,
        waypointCount,
        orderingRadius,
        closed: tour.closed,
        fellBack: tour.fellBack,
    });
    if (tour.fellBack) {
        logger?.logWarning({
            message: `Too many waypoints (${waypointCount}) for exact search, used greedy ordering`,
            details: { waypointCount, orderingRadius },
        });
    }
}

// ==================== Runner ====================

/**
 * Run the waypoint-tour task
 *
 * @param records - waypoints with headings in degrees; the first is the start
 * @param overrides - config values replacing {@link DEFAULT_TOUR_CONFIG}
 * @param logger - receives tour, trajectory, warning and report entries
 *
 * @throws EmptyInputError when `records` is empty
 * @throws InvalidConfigError when the merged config is invalid
 *
 * @example
 * ```typescript
 * const result = runWaypointTour(parseWaypoints(text).waypoints, { radii: [1, 2] });
 * console.log(formatSummary(result.report));
 * ```
 */
export function runWaypointTour(
    records: readonly WaypointRecord[],
    overrides: Partial<WaypointTourConfig> = {},
    logger?: Logger
): WaypointTourResult {
    const config = createConfig(overrides);
    assertValidConfig(config);
    for (const message of validateConfig(config).warnings) {
        logger?.logWarning({ message });
    }

    if (records.length === 0) {
        throw new EmptyInputError();
    }
    const waypoints = toWaypoints(records);

    const options: OptimizerOptions = {
        threshold: config.threshold,
        method: config.method,
        closed: config.closeLoop,
        maxPermutations: config.maxPermutations,
    };

    const tours: Tour[] = [];
    const trajectories: Trajectory[] = [];
    const starts: Pose[] = [];

    if (config.orderingRadius === 'per-radius') {
        for (const radius of config.radii) {
            const tour = optimalOrder(waypoints, createDistanceOracle(radius), options);
            logTour(logger, tour, waypoints.length, radius);
            const poses = orderedPoses(waypoints, tour);
            tours.push(tour);
            starts.push(poses[0]);
            trajectories.push(assemble(poses, radius));
        }
    } else {
        const tour = optimalOrder(waypoints, createDistanceOracle(config.orderingRadius), options);
        logTour(logger, tour, waypoints.length, config.orderingRadius);
        const poses = orderedPoses(waypoints, tour);
        for (const radius of config.radii) {
            tours.push(tour);
            starts.push(poses[0]);
            trajectories.push(assemble(poses, radius));
        }
    }

    for (const trajectory of trajectories) {
        logger?.logTrajectory({
            turningRadius: trajectory.turningRadius,
            legCount: trajectory.legs.length,
            segmentCount: trajectory.segments.length,
            totalLength: trajectory.totalLength,
            words: trajectory.legs.map(leg => leg.word),
        });
    }

    const report = generateReport(config, waypoints.length, tours, trajectories);
    logger?.logReport({
        waypointCount: report.waypointCount,
        order: tours[0].order,
        lengths: lengthsByRadius(report),
        configHash: report.configHash,
        config: { ...config },
    });
    logger?.flush();

    return {
        config,
        tour: tours[0],
        tours,
        orderedWaypoints: tours[0].order.map(i => waypoints[i]),
        trajectories,
        polylines: trajectories.map((trajectory, i) => sampleTrajectory(starts[i], trajectory, config.sampleStep)),
        report,
    };
}
