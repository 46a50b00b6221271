/**
 * @module planning/reeds-shepp/sampling
 * @description Dense pose sampling of paths, for drawing arcs and lines
 */

import { ValidationError } from '../../../core/errors';
import type { Pose } from '../../geometry/types';
import { applySegment } from './motion';
import type { Path } from './types';

/**
 * Poses along `path` driven from `start`, spaced at most `step` apart
 * (world units) within each segment.
 *
 * The first element is `start`; every segment boundary and the end pose
 * are included.
 */
export function samplePath(start: Pose, path: Path, step: number): Pose[] {
    if (!Number.isFinite(step) || step <= 0) {
        throw new ValidationError(`Sample step must be a positive finite number, got ${step}`, { step });
    }

    const samples: Pose[] = [start];
    let segmentStart = start;

    for (const segment of path.segments) {
        const count = Math.max(1, Math.ceil(segment.length / step));
        for (let i = 1; i <= count; i++) {
            samples.push(applySegment(segmentStart, segment, path.turningRadius, (segment.length * i) / count));
        }
        segmentStart = samples[samples.length - 1];
    }

    return samples;
}
