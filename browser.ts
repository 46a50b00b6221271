/**
 * @packageDocumentation
 * @module turnpath/browser
 *
 * Browser-compatible entry point. Same modules as the main entry; file
 * I/O and the JSONL logger live in `turnpath/node` only.
 *
 * ## Usage Example
 * ```typescript
 * import { planning, tasks } from 'turnpath/browser';
 *
 * const { waypoints } = tasks.waypointTour.parseWaypoints(textFromUpload);
 * const result = tasks.waypointTour.runWaypointTour(waypoints);
 * const poses = planning.sampleTrajectory(
 *   result.orderedWaypoints[0].pose, result.trajectories[0], 0.05);
 * ```
 *
 * @license MIT
 */

export * as core from './src/core';
export * as geometry from './src/models/geometry';
export * as planning from './src/models/planning';
export * as tasks from './src/tasks';

export const VERSION = '1.0.0';
