/**
 * @module planning/tour
 * @description Waypoint ordering and trajectory assembly
 */

export type {
    DistanceFn,
    OrderingStrategy,
    OrderingMethod,
    Tour,
    OptimizerOptions,
    Trajectory,
} from './types';

export {
    distance,
    createDistanceOracle,
    euclideanDistance,
    buildDistanceMatrix,
} from './distance';

export { DEFAULT_EXACT_THRESHOLD, selectStrategy, resolveStrategy } from './strategy';
export type { OrderResult } from './exact';
export { exactOrder } from './exact';
export { greedyOrder } from './greedy';
export { optimalOrder, tourLength } from './optimizer';
export { assemble, assembleForRadii, sampleTrajectory } from './assembler';
