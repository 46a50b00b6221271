/**
 * @module geometry/types
 * @description Planar pose types
 */

/**
 * Position and heading in the plane.
 *
 * `theta` is in radians, normalized to (-π, π].
 */
export interface Pose {
    x: number;
    y: number;
    theta: number;
}

/**
 * Waypoint record as supplied at the input boundary (heading in degrees)
 */
export interface WaypointRecord {
    x: number;
    y: number;
    thetaDegrees: number;
}

/**
 * Pose tagged with its position in the original input list
 */
export interface Waypoint {
    index: number;
    pose: Pose;
}

/**
 * Polar coordinates
 */
export interface Polar {
    r: number;
    theta: number;
}
