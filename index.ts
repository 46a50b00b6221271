/**
 * @packageDocumentation
 * @module turnpath
 *
 * turnpath: shortest paths and waypoint tours for a car that drives
 * forward and in reverse with a bounded turning radius.
 *
 * ## Modules
 * - `core` - Errors, structured logging, seeded RNG, config hashing
 * - `geometry` - Poses, angles, frame transforms
 * - `planning` - Reeds-Shepp paths, waypoint ordering, trajectory assembly
 * - `tasks` - Waypoint-tour runner, report and waypoint format
 *
 * ## Usage Example
 * ```typescript
 * import { geometry, planning } from 'turnpath';
 *
 * const start = geometry.poseFromDegrees(0, 0, 0);
 * const goal = geometry.poseFromDegrees(4, 3, 90);
 * const path = planning.shortestPath(start, goal, 1.0);
 * console.log(path.word, path.totalLength);
 *
 * const waypoints = geometry.toWaypoints([
 *   { x: 0, y: 0, thetaDegrees: 0 },
 *   { x: 5, y: 5, thetaDegrees: 90 },
 *   { x: 5, y: 0, thetaDegrees: -90 },
 * ]);
 * const tour = planning.optimalOrder(waypoints, planning.createDistanceOracle(1.0));
 * ```
 *
 * @license MIT
 */

export * as core from './src/core';
export * as geometry from './src/models/geometry';
export * as planning from './src/models/planning';
export * as tasks from './src/tasks';

export const VERSION = '1.0.0';
