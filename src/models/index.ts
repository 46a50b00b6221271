/**
 * @module src/models
 * @description Geometry and planning models
 *
 * - geometry/: Poses, angles and frame transforms
 * - planning/: Reeds-Shepp paths, waypoint ordering, trajectory assembly
 */

export * as geometry from './geometry';
export * as planning from './planning';
