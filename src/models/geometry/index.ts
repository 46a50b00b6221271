/**
 * @module geometry
 * @description Planar pose primitives
 */

export type { Pose, Polar, Waypoint, WaypointRecord } from './types';

export {
    normalizeAngle,
    degToRad,
    radToDeg,
    angleDiff,
    toPolar,
    createPose,
    poseFromDegrees,
    toWaypoints,
    assertFinitePose,
    toLocalFrame,
    toGlobalFrame,
    scalePose,
    euclidean,
    posesClose,
} from './pose';
