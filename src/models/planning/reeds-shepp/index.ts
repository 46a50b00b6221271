/**
 * @module planning/reeds-shepp
 * @description Reeds-Shepp optimal paths for a car driving forward and backward
 *
 * - `shortestPath`: minimum-length path between two poses for a turning radius
 * - `CATALOG`: the 48 closed-form path words the engine evaluates
 * - Motion composition (`applySegment`, `composePath`) and sampling
 */

export type {
    SegmentKind,
    Direction,
    MotionSegment,
    Path,
    UnitSegment,
    RelativeGoal,
    WordFormula,
    WordTransform,
    CatalogEntry,
} from './types';

export {
    DOMAIN_TOLERANCE,
    BASE_WORDS,
    CATALOG,
    applyTransform,
} from './words';

export type { WordCandidate } from './engine';

export {
    ZERO_LENGTH_EPS,
    GOAL_TOLERANCE,
    assertValidRadius,
    relativeGoal,
    isDegenerate,
    wordSignature,
    evaluateCatalog,
    solveUnit,
    toPath,
    shortestPath,
    allPaths,
} from './engine';

export {
    advance,
    signedLength,
    applySegment,
    composeUnitSegments,
    composePath,
    endPose,
} from './motion';

export { samplePath } from './sampling';
