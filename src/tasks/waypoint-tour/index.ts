/**
 * @module tasks/waypoint-tour
 * @description Shortest tour through oriented waypoints for several turning radii
 *
 * ## Usage
 * ```typescript
 * import { tasks } from 'turnpath';
 *
 * const { waypoints } = tasks.waypointTour.parseWaypoints(text);
 * const result = tasks.waypointTour.runWaypointTour(waypoints, { radii: [1, 2] });
 * console.log(tasks.waypointTour.formatSummary(result.report));
 * ```
 *
 * File I/O and the CLI are Node.js only and not re-exported here.
 */

export * from './config';
export * from './waypoints';
export * from './report';
export { runWaypointTour, type WaypointTourResult } from './task';
