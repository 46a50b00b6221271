/**
 * @module planning/tour/assembler
 * @description Concatenate shortest paths through an ordered pose list
 */

import { EmptyInputError } from '../../../core/errors';
import type { Pose } from '../../geometry/types';
import type { Path } from '../reeds-shepp/types';
import { assertValidRadius, shortestPath } from '../reeds-shepp/engine';
import { endPose } from '../reeds-shepp/motion';
import { samplePath } from '../reeds-shepp/sampling';
import type { Trajectory } from './types';

/**
 * Drive through `poses` in the given order with one turning radius.
 *
 * @throws EmptyInputError when `poses` is empty
 * @throws InvalidRadiusError when the radius is not positive and finite
 */
export function assemble(poses: readonly Pose[], turningRadius: number): Trajectory {
    if (poses.length === 0) {
        throw new EmptyInputError('At least one pose is required to assemble a trajectory');
    }
    assertValidRadius(turningRadius);

    const legs: Path[] = [];
    for (let i = 1; i < poses.length; i++) {
        legs.push(shortestPath(poses[i - 1], poses[i], turningRadius));
    }

    return {
        turningRadius,
        legs,
        segments: legs.flatMap(leg => leg.segments),
        totalLength: legs.reduce((sum, leg) => sum + leg.totalLength, 0),
    };
}

/**
 * One trajectory per radius, all over the same pose order
 */
export function assembleForRadii(poses: readonly Pose[], radii: readonly number[]): Trajectory[] {
    return radii.map(radius => assemble(poses, radius));
}

/**
 * Dense poses along a whole trajectory, starting at `start` and ending
 * at the last leg's end pose. Shared leg boundaries appear once.
 */
export function sampleTrajectory(start: Pose, trajectory: Trajectory, step: number): Pose[] {
    const samples: Pose[] = [start];
    let legStart = start;

    for (const leg of trajectory.legs) {
        samples.push(...samplePath(legStart, leg, step).slice(1));
        legStart = endPose(legStart, leg);
    }

    return samples;
}
