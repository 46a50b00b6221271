/**
 * @module planning/reeds-shepp/motion
 * @description Ideal motion along straight and arc segments
 */

import { normalizeAngle } from '../../geometry/pose';
import type { Pose } from '../../geometry/types';
import type { MotionSegment, Path, SegmentKind, UnitSegment } from './types';

/**
 * Move `pose` by a signed distance `s` (negative = backward) along a
 * primitive of the given kind on a circle of `radius`.
 */
export function advance(pose: Pose, kind: SegmentKind, s: number, radius: number): Pose {
    const { x, y, theta } = pose;

    if (kind === 'straight') {
        return {
            x: x + s * Math.cos(theta),
            y: y + s * Math.sin(theta),
            theta,
        };
    }

    const dTheta = s / radius;
    if (kind === 'left') {
        const end = theta + dTheta;
        return {
            x: x + radius * (Math.sin(end) - Math.sin(theta)),
            y: y + radius * (Math.cos(theta) - Math.cos(end)),
            theta: normalizeAngle(end),
        };
    }

    const end = theta - dTheta;
    return {
        x: x + radius * (Math.sin(theta) - Math.sin(end)),
        y: y + radius * (Math.cos(end) - Math.cos(theta)),
        theta: normalizeAngle(end),
    };
}

/**
 * Signed distance of a segment: negative when driven backward
 */
export function signedLength(segment: MotionSegment): number {
    return segment.direction === 'forward' ? segment.length : -segment.length;
}

/**
 * Pose after driving `distance` (default: the whole segment) along `segment`
 */
export function applySegment(
    pose: Pose,
    segment: MotionSegment,
    turningRadius: number,
    distance: number = segment.length
): Pose {
    const travelled = Math.max(0, Math.min(distance, segment.length));
    return advance(pose, segment.kind, signedLength({ ...segment, length: travelled }), turningRadius);
}

/**
 * Compose unit-radius signed segments starting from `start`
 */
export function composeUnitSegments(start: Pose, segments: readonly UnitSegment[]): Pose {
    let pose = start;
    for (const segment of segments) {
        pose = advance(pose, segment.kind, segment.param, 1);
    }
    return pose;
}

/**
 * Pose reached after each segment of `path`, starting from `start`.
 * The last element is the path's end pose; `[]` for an empty path.
 */
export function composePath(start: Pose, path: Path): Pose[] {
    const poses: Pose[] = [];
    let pose = start;
    for (const segment of path.segments) {
        pose = applySegment(pose, segment, path.turningRadius);
        poses.push(pose);
    }
    return poses;
}

/**
 * End pose of `path` driven from `start`
 */
export function endPose(start: Pose, path: Path): Pose {
    const poses = composePath(start, path);
    return poses.length > 0 ? poses[poses.length - 1] : start;
}
