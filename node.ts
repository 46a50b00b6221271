/**
 * @packageDocumentation
 * @module turnpath/node
 *
 * Node.js entry point: everything in the main entry plus file I/O.
 *
 * - `JsonlLogger` - append log entries to a JSONL file
 * - `io` - waypoint files and JSONL log dumps
 *
 * ## Usage Example
 * ```typescript
 * import { tasks, io, JsonlLogger } from 'turnpath/node';
 *
 * const { waypoints } = io.loadWaypointsFile('waypoints.txt');
 * const logger = new JsonlLogger({ task: 'waypoint-tour', outputDir: 'logs' });
 * tasks.waypointTour.runWaypointTour(waypoints, {}, logger);
 * logger.close();
 * ```
 *
 * @license MIT
 */

// Re-export everything from the main index
export * from './index';

export { JsonlLogger } from './src/core/logging-node';
export * as io from './src/tasks/waypoint-tour/io';
