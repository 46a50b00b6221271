/**
 * @module planning/reeds-shepp/engine
 * @description Shortest Reeds-Shepp path between two poses
 *
 * The goal is moved into the start frame and scaled to a unit turning
 * radius, every catalog word is solved in closed form, and the shortest
 * feasible word is rescaled back to the requested radius.
 */

import { InvalidRadiusError, NoFeasiblePathError } from '../../../core/errors';
import { angleDiff, assertFinitePose, toLocalFrame } from '../../geometry/pose';
import type { Pose } from '../../geometry/types';
import { composeUnitSegments } from './motion';
import type { MotionSegment, Path, RelativeGoal, UnitSegment, WordTransform } from './types';
import { CATALOG } from './words';

// ==================== Constants ====================

/** Unit-radius segments shorter than this are dropped */
export const ZERO_LENGTH_EPS = 1e-10;

/** Composed end pose must match the goal within this (positions scale with the goal distance) */
export const GOAL_TOLERANCE = 1e-6;

/** Relative poses closer than this to the origin are treated as start == goal */
const DEGENERATE_EPS = 1e-12;

const ORIGIN: Pose = { x: 0, y: 0, theta: 0 };

// ==================== Types ====================

/**
 * Feasible word for a unit-radius relative goal
 */
export interface WordCandidate {
    base: string;
    transform: WordTransform;
    segments: UnitSegment[];
    /** Sum of |param| on the unit circle */
    length: number;
}

// ==================== Helpers ====================

/**
 * Throw InvalidRadiusError unless `radius` is positive and finite
 */
export function assertValidRadius(radius: number): void {
    if (!Number.isFinite(radius) || radius <= 0) {
        throw new InvalidRadiusError(radius);
    }
}

/**
 * Goal expressed in the start frame, with distances in turning-radius units
 */
export function relativeGoal(start: Pose, goal: Pose, turningRadius: number): RelativeGoal {
    const local = toLocalFrame(start, goal);
    return {
        x: local.x / turningRadius,
        y: local.y / turningRadius,
        phi: local.theta,
    };
}

/**
 * Whether the relative goal coincides with the start
 */
export function isDegenerate(goal: RelativeGoal): boolean {
    return Math.abs(goal.x) < DEGENERATE_EPS &&
        Math.abs(goal.y) < DEGENERATE_EPS &&
        Math.abs(goal.phi) < DEGENERATE_EPS;
}

/**
 * Segment signature such as `L+S+R-`
 */
export function wordSignature(segments: readonly Pick<MotionSegment, 'kind' | 'direction'>[]): string {
    return segments
        .map(s => (s.kind === 'straight' ? 'S' : s.kind === 'left' ? 'L' : 'R') + (s.direction === 'forward' ? '+' : '-'))
        .join('');
}

function reachesGoal(segments: readonly UnitSegment[], goal: RelativeGoal): boolean {
    const end = composeUnitSegments(ORIGIN, segments);
    const positionTol = GOAL_TOLERANCE * Math.max(1, Math.hypot(goal.x, goal.y));
    return Math.abs(end.x - goal.x) <= positionTol &&
        Math.abs(end.y - goal.y) <= positionTol &&
        Math.abs(angleDiff(end.theta, goal.phi)) <= GOAL_TOLERANCE;
}

// ==================== Catalog Evaluation ====================

/**
 * Solve every catalog word for `goal`.
 *
 * Returns the feasible candidates in catalog order, zero-length segments
 * removed. A word whose composed motion misses the goal is excluded.
 */
export function evaluateCatalog(goal: RelativeGoal): WordCandidate[] {
    const candidates: WordCandidate[] = [];

    for (const entry of CATALOG) {
        const solved = entry.solve(goal);
        if (solved === null) continue;
        if (solved.some(s => !Number.isFinite(s.param))) continue;

        const segments = solved.filter(s => Math.abs(s.param) >= ZERO_LENGTH_EPS);
        if (!reachesGoal(segments, goal)) continue;

        candidates.push({
            base: entry.base,
            transform: entry.transform,
            segments,
            length: segments.reduce((sum, s) => sum + Math.abs(s.param), 0),
        });
    }

    return candidates;
}

/**
 * Shortest feasible word for a unit-radius relative goal.
 * Equal lengths keep the earliest catalog entry.
 */
export function solveUnit(goal: RelativeGoal): WordCandidate {
    if (isDegenerate(goal)) {
        return { base: '', transform: 'identity', segments: [], length: 0 };
    }

    let best: WordCandidate | null = null;
    for (const candidate of evaluateCatalog(goal)) {
        if (best === null || candidate.length < best.length) {
            best = candidate;
        }
    }

    if (best === null) {
        throw new NoFeasiblePathError({ goal });
    }
    return best;
}

/**
 * Scale a unit-radius candidate to a Path at `turningRadius`
 */
export function toPath(candidate: WordCandidate, turningRadius: number): Path {
    const segments = candidate.segments.map((s): MotionSegment => ({
        kind: s.kind,
        direction: s.param >= 0 ? 'forward' : 'backward',
        length: Math.abs(s.param) * turningRadius,
    }));

    return {
        segments,
        totalLength: segments.reduce((sum, s) => sum + s.length, 0),
        turningRadius,
        word: wordSignature(segments),
    };
}

// ==================== Public API ====================

/**
 * Shortest path from `start` to `goal` for a car with minimum turning radius
 * `turningRadius`, moving forward or backward.
 *
 * @throws InvalidRadiusError when the radius is not positive and finite
 * @throws ValidationError when a pose has non-finite components
 * @throws NoFeasiblePathError when no catalog word reaches the goal
 *
 * @example
 * ```typescript
 * const path = shortestPath({ x: 0, y: 0, theta: 0 }, { x: 10, y: 0, theta: 0 }, 1);
 * path.word;        // 'S+'
 * path.totalLength; // 10
 * ```
 */
export function shortestPath(start: Pose, goal: Pose, turningRadius: number): Path {
    assertValidRadius(turningRadius);
    assertFinitePose(start, 'start');
    assertFinitePose(goal, 'goal');

    const best = solveUnit(relativeGoal(start, goal, turningRadius));
    return toPath(best, turningRadius);
}

/**
 * Every feasible catalog path from `start` to `goal`, in catalog order
 */
export function allPaths(start: Pose, goal: Pose, turningRadius: number): Path[] {
    assertValidRadius(turningRadius);
    assertFinitePose(start, 'start');
    assertFinitePose(goal, 'goal');

    return evaluateCatalog(relativeGoal(start, goal, turningRadius))
        .map(candidate => toPath(candidate, turningRadius));
}
