/**
 * @module geometry/pose
 * @description Angle normalization, frame transforms and distances for planar poses
 */

import { ValidationError } from '../../core/errors';
import type { Polar, Pose, Waypoint, WaypointRecord } from './types';

const TWO_PI = 2 * Math.PI;

// ==================== Angles ====================

/**
 * Normalize angle to (-π, π]
 */
export function normalizeAngle(angle: number): number {
    let a = angle % TWO_PI;
    if (a <= -Math.PI) {
        a += TWO_PI;
    } else if (a > Math.PI) {
        a -= TWO_PI;
    }
    return a;
}

/**
 * Convert degrees to radians
 */
export function degToRad(degrees: number): number {
    return (degrees * Math.PI) / 180;
}

/**
 * Convert radians to degrees
 */
export function radToDeg(radians: number): number {
    return (radians * 180) / Math.PI;
}

/**
 * Signed smallest difference `a - b`, normalized to (-π, π]
 */
export function angleDiff(a: number, b: number): number {
    return normalizeAngle(a - b);
}

/**
 * Cartesian to polar coordinates
 */
export function toPolar(x: number, y: number): Polar {
    return { r: Math.hypot(x, y), theta: Math.atan2(y, x) };
}

// ==================== Poses ====================

/**
 * Build a pose, normalizing its heading
 */
export function createPose(x: number, y: number, theta: number): Pose {
    return { x, y, theta: normalizeAngle(theta) };
}

/**
 * Build a pose from a heading in degrees
 */
export function poseFromDegrees(x: number, y: number, thetaDegrees: number): Pose {
    return createPose(x, y, degToRad(thetaDegrees));
}

/**
 * Convert boundary records (degrees) into indexed waypoints (radians)
 */
export function toWaypoints(records: readonly WaypointRecord[]): Waypoint[] {
    return records.map((record, index) => ({
        index,
        pose: poseFromDegrees(record.x, record.y, record.thetaDegrees),
    }));
}

/**
 * Throw a ValidationError unless every pose component is finite
 */
export function assertFinitePose(pose: Pose, label = 'pose'): void {
    if (!Number.isFinite(pose.x) || !Number.isFinite(pose.y) || !Number.isFinite(pose.theta)) {
        throw new ValidationError(`${label} must have finite x, y and theta`, { pose });
    }
}

/**
 * Express `pose` in the frame of `origin` (origin at 0, heading 0)
 */
export function toLocalFrame(origin: Pose, pose: Pose): Pose {
    const dx = pose.x - origin.x;
    const dy = pose.y - origin.y;
    const c = Math.cos(origin.theta);
    const s = Math.sin(origin.theta);
    return {
        x: dx * c + dy * s,
        y: -dx * s + dy * c,
        theta: normalizeAngle(pose.theta - origin.theta),
    };
}

/**
 * Inverse of {@link toLocalFrame}: map a pose local to `origin` back to world coordinates
 */
export function toGlobalFrame(origin: Pose, local: Pose): Pose {
    const c = Math.cos(origin.theta);
    const s = Math.sin(origin.theta);
    return {
        x: origin.x + local.x * c - local.y * s,
        y: origin.y + local.x * s + local.y * c,
        theta: normalizeAngle(origin.theta + local.theta),
    };
}

/**
 * Scale a pose's position by `factor`; heading is unchanged
 */
export function scalePose(pose: Pose, factor: number): Pose {
    return { x: pose.x * factor, y: pose.y * factor, theta: pose.theta };
}

/**
 * Euclidean distance between the positions of two poses
 */
export function euclidean(a: Pose, b: Pose): number {
    return Math.hypot(b.x - a.x, b.y - a.y);
}

/**
 * Whether two poses agree in position and heading within `tol`
 */
export function posesClose(a: Pose, b: Pose, tol = 1e-6): boolean {
    return (
        Math.abs(a.x - b.x) <= tol &&
        Math.abs(a.y - b.y) <= tol &&
        Math.abs(angleDiff(a.theta, b.theta)) <= tol
    );
}
