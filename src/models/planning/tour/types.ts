/**
 * @module planning/tour/types
 * @description Waypoint tours and assembled trajectories
 */

import type { Waypoint } from '../../geometry/types';
import type { MotionSegment, Path } from '../reeds-shepp/types';

/**
 * Cost of driving from `a` to `b`; need not be symmetric
 */
export type DistanceFn = (a: Waypoint, b: Waypoint) => number;

/**
 * Search used to order waypoints
 */
export type OrderingStrategy = 'exact' | 'greedy';

/**
 * Requested search: `'auto'` picks by waypoint count
 */
export type OrderingMethod = 'auto' | OrderingStrategy;

/**
 * Visiting order of a waypoint set
 */
export interface Tour {
    /** Waypoint indices in visiting order; the start is not repeated when closed */
    order: number[];
    /** Sum of leg costs, including the return leg when closed */
    totalLength: number;
    closed: boolean;
    strategy: OrderingStrategy;
    /** True when exact search was requested but greedy ran instead */
    fellBack: boolean;
}

/**
 * Optimizer options
 */
export interface OptimizerOptions {
    /** Waypoint count from which greedy is used (default 10) */
    threshold?: number;
    method?: OrderingMethod;
    /** Add the return leg to the first waypoint */
    closed?: boolean;
    /** Cap on complete permutations the exact search evaluates */
    maxPermutations?: number;
}

/**
 * Concatenated shortest paths through an ordered pose list, for one radius
 */
export interface Trajectory {
    turningRadius: number;
    /** One path per consecutive pose pair */
    legs: Path[];
    /** All leg segments in driving order */
    segments: MotionSegment[];
    totalLength: number;
}
