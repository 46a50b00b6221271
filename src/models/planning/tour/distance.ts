/**
 * @module planning/tour/distance
 * @description Path-length oracles between waypoints
 */

import type { Pose, Waypoint } from '../../geometry/types';
import { euclidean } from '../../geometry/pose';
import { assertValidRadius, shortestPath } from '../reeds-shepp/engine';
import type { DistanceFn } from './types';

/**
 * Length of the shortest Reeds-Shepp path from `a` to `b`
 */
export function distance(a: Pose, b: Pose, turningRadius: number): number {
    return shortestPath(a, b, turningRadius).totalLength;
}

/**
 * Distance function over waypoints for a fixed turning radius
 *
 * @throws InvalidRadiusError when the radius is not positive and finite
 */
export function createDistanceOracle(turningRadius: number): DistanceFn {
    assertValidRadius(turningRadius);
    return (a, b) => distance(a.pose, b.pose, turningRadius);
}

/**
 * Straight-line distance, ignoring headings
 */
export const euclideanDistance: DistanceFn = (a, b) => euclidean(a.pose, b.pose);

/**
 * n×n cost matrix; `matrix[i][j]` is the cost from waypoint i to waypoint j.
 * The diagonal is 0.
 */
export function buildDistanceMatrix(waypoints: readonly Waypoint[], distanceFn: DistanceFn): number[][] {
    return waypoints.map((from, i) =>
        waypoints.map((to, j) => (i === j ? 0 : distanceFn(from, to)))
    );
}
