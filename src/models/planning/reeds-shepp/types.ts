/**
 * @module planning/reeds-shepp/types
 * @description Motion segments and paths of a Reeds-Shepp car
 */

/**
 * Steering of a motion primitive
 */
export type SegmentKind = 'straight' | 'left' | 'right';

/**
 * Gear of a motion primitive
 */
export type Direction = 'forward' | 'backward';

/**
 * One motion primitive.
 *
 * `length` is the distance travelled (>= 0). Inside a {@link Path} it is in
 * world units; an arc sweeps `length / turningRadius` radians.
 */
export interface MotionSegment {
    kind: SegmentKind;
    direction: Direction;
    length: number;
}

/**
 * Shortest path between two poses for one turning radius
 */
export interface Path {
    segments: MotionSegment[];
    /** Sum of segment lengths (world units) */
    totalLength: number;
    turningRadius: number;
    /** Segment signature such as `L+S+L+`; empty for the zero-length path */
    word: string;
}

/**
 * Segment with a signed length on the unit circle: negative means backward
 */
export interface UnitSegment {
    kind: SegmentKind;
    param: number;
}

/**
 * Relative goal in the start frame, unit turning radius
 */
export interface RelativeGoal {
    x: number;
    y: number;
    phi: number;
}

/**
 * Closed-form solver of one path word: the segments reaching `goal`, or
 * `null` when the word is infeasible for it
 */
export type WordFormula = (goal: RelativeGoal) => UnitSegment[] | null;

/**
 * Catalog entry: a base word plus the symmetry applied to it
 */
export interface CatalogEntry {
    /** Base word name, e.g. `LpSpLp` */
    base: string;
    transform: WordTransform;
    solve: WordFormula;
}

/**
 * Symmetries of the Reeds-Shepp problem used to derive the full catalog
 */
export type WordTransform = 'identity' | 'timeflip' | 'reflect' | 'timeflip+reflect';
