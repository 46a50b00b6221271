/**
 * @module planning/tour/optimizer
 * @description Visiting order of oriented waypoints minimizing total path length
 */

import { EmptyInputError, ValidationError } from '../../../core/errors';
import type { Waypoint } from '../../geometry/types';
import { buildDistanceMatrix } from './distance';
import { exactOrder } from './exact';
import { greedyOrder } from './greedy';
import { DEFAULT_EXACT_THRESHOLD, resolveStrategy } from './strategy';
import type { DistanceFn, OptimizerOptions, Tour } from './types';

function validateOptions(options: OptimizerOptions): void {
    const { threshold, maxPermutations } = options;
    if (threshold !== undefined && (!Number.isInteger(threshold) || threshold < 1)) {
        throw new ValidationError(`threshold must be a positive integer, got ${threshold}`, { threshold });
    }
    if (maxPermutations !== undefined && (!Number.isInteger(maxPermutations) || maxPermutations < 1)) {
        throw new ValidationError(`maxPermutations must be a positive integer, got ${maxPermutations}`, { maxPermutations });
    }
}

/**
 * Order `waypoints` to minimize the summed `distanceFn` cost.
 *
 * The first waypoint is always visited first. Below the threshold every
 * order is searched; from it on, nearest-neighbor is used. Equal costs go
 * to the lowest waypoint index.
 *
 * @throws EmptyInputError when `waypoints` is empty
 * @throws SearchLimitError when `maxPermutations` is exceeded
 *
 * @example
 * ```typescript
 * const tour = optimalOrder(toWaypoints(records), createDistanceOracle(1));
 * tour.order;    // e.g. [0, 2, 1, 3]
 * tour.strategy; // 'exact'
 * ```
 */
export function optimalOrder(
    waypoints: readonly Waypoint[],
    distanceFn: DistanceFn,
    options: OptimizerOptions = {}
): Tour {
    if (waypoints.length === 0) {
        throw new EmptyInputError('At least one waypoint is required to build a tour');
    }
    validateOptions(options);

    const {
        threshold = DEFAULT_EXACT_THRESHOLD,
        method = 'auto',
        closed = false,
        maxPermutations,
    } = options;
    const { strategy, fellBack } = resolveStrategy(method, waypoints.length, threshold);

    const [start, ...rest] = waypoints;
    if (rest.length === 0) {
        return { order: [start.index], totalLength: 0, closed, strategy, fellBack };
    }

    // Matrix rows follow waypoint index so both searches break ties on it
    const stops = [start, ...[...rest].sort((a, b) => a.index - b.index)];
    const matrix = buildDistanceMatrix(stops, distanceFn);
    const result = strategy === 'exact'
        ? exactOrder(matrix, closed, maxPermutations)
        : greedyOrder(matrix, closed);

    return {
        order: result.order.map(i => stops[i].index),
        totalLength: result.totalLength,
        closed,
        strategy,
        fellBack,
    };
}

/**
 * Cost of visiting `waypoints` in the given index order
 */
export function tourLength(
    waypoints: readonly Waypoint[],
    order: readonly number[],
    distanceFn: DistanceFn,
    closed = false
): number {
    const byIndex = new Map(waypoints.map(w => [w.index, w]));
    const stops = order.map(index => {
        const waypoint = byIndex.get(index);
        if (waypoint === undefined) {
            throw new ValidationError(`Unknown waypoint index ${index}`, { index });
        }
        return waypoint;
    });

    let total = 0;
    for (let i = 1; i < stops.length; i++) {
        total += distanceFn(stops[i - 1], stops[i]);
    }
    if (closed && stops.length > 1) {
        total += distanceFn(stops[stops.length - 1], stops[0]);
    }
    return total;
}
