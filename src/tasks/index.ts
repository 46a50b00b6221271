/**
 * @module tasks
 * @description Runnable planning tasks
 *
 * - waypoint-tour: order oriented waypoints and assemble a trajectory per turning radius
 */

export * as waypointTour from './waypoint-tour';
