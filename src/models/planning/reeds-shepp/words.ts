/**
 * @module planning/reeds-shepp/words
 * @description Closed-form path words of the Reeds-Shepp car
 *
 * Every formula works on the unit-radius problem with the start at the
 * origin heading along +x. It returns signed segment lengths (negative means
 * the segment is driven backward) or `null` when the word cannot reach the
 * goal. Notation: `p` forward, `m` backward, `S` straight, `L`/`R` arcs.
 *
 * Twelve base words are expanded by the problem's symmetries (time flip,
 * left/right reflection, both) into the 48-entry {@link CATALOG}.
 *
 * Reference: J. A. Reeds and L. A. Shepp, "Optimal paths for a car that goes
 * both forwards and backwards", Pacific J. Math. 145(2), 1990.
 */

import { normalizeAngle, toPolar } from '../../geometry/pose';
import type {
    CatalogEntry,
    RelativeGoal,
    SegmentKind,
    UnitSegment,
    WordFormula,
    WordTransform,
} from './types';

/** Slack allowed on the domain of acos/asin/sqrt before a word is declared infeasible */
export const DOMAIN_TOLERANCE = 1e-10;

const HALF_PI = Math.PI / 2;

// ==================== Numeric Guards ====================

function clampUnit(v: number): number | null {
    if (v > 1 + DOMAIN_TOLERANCE || v < -1 - DOMAIN_TOLERANCE) return null;
    return Math.max(-1, Math.min(1, v));
}

function safeAcos(v: number): number | null {
    const c = clampUnit(v);
    return c === null ? null : Math.acos(c);
}

function safeAsin(v: number): number | null {
    const c = clampUnit(v);
    return c === null ? null : Math.asin(c);
}

function safeSqrt(v: number): number | null {
    if (v < -DOMAIN_TOLERANCE) return null;
    return Math.sqrt(Math.max(0, v));
}

function fwd(kind: SegmentKind, param: number): UnitSegment {
    return { kind, param };
}

function bwd(kind: SegmentKind, param: number): UnitSegment {
    return { kind, param: -param };
}

/** Center of the goal's left circle relative to the start's left circle */
function leftCircleOffset({ x, y, phi }: RelativeGoal): { xi: number; eta: number } {
    return { xi: x - Math.sin(phi), eta: y - 1 + Math.cos(phi) };
}

/** Center of the goal's right circle relative to the start's left circle */
function rightCircleOffset({ x, y, phi }: RelativeGoal): { xi: number; eta: number } {
    return { xi: x + Math.sin(phi), eta: y - 1 - Math.cos(phi) };
}

// ==================== Base Words ====================

/** CSC, same turning direction: L+ S+ L+ */
const LpSpLp: WordFormula = (goal) => {
    const { xi, eta } = leftCircleOffset(goal);
    const { r: u, theta: t } = toPolar(xi, eta);
    const v = normalizeAngle(goal.phi - t);
    return [fwd('left', t), fwd('straight', u), fwd('left', v)];
};

/** CSC, opposite turning direction: L+ S+ R+ */
const LpSpRp: WordFormula = (goal) => {
    const { xi, eta } = rightCircleOffset(goal);
    const { r: rho, theta: t1 } = toPolar(xi, eta);
    const u = safeSqrt(rho * rho - 4);
    if (u === null) return null;
    const t = normalizeAngle(t1 + Math.atan2(2, u));
    const v = normalizeAngle(t - goal.phi);
    return [fwd('left', t), fwd('straight', u), fwd('right', v)];
};

/** C|C|C: L+ R- L+ */
const LpRmLp: WordFormula = (goal) => {
    const { xi, eta } = leftCircleOffset(goal);
    const { r: rho, theta } = toPolar(xi, eta);
    const a = safeAcos(rho / 4);
    if (a === null) return null;
    const t = normalizeAngle(theta + HALF_PI + a);
    const u = normalizeAngle(Math.PI - 2 * a);
    const v = normalizeAngle(goal.phi - t - u);
    return [fwd('left', t), bwd('right', u), fwd('left', v)];
};

/** C|CC: L+ R- L- */
const LpRmLm: WordFormula = (goal) => {
    const { xi, eta } = leftCircleOffset(goal);
    const { r: rho, theta } = toPolar(xi, eta);
    const a = safeAcos(rho / 4);
    if (a === null) return null;
    const t = normalizeAngle(theta + HALF_PI + a);
    const u = normalizeAngle(Math.PI - 2 * a);
    const v = normalizeAngle(t + u - goal.phi);
    return [fwd('left', t), bwd('right', u), bwd('left', v)];
};

/** CC|C: L+ R+ L- */
const LpRpLm: WordFormula = (goal) => {
    const { xi, eta } = leftCircleOffset(goal);
    const { r: rho, theta } = toPolar(xi, eta);
    const u = safeAcos(1 - (rho * rho) / 8);
    if (u === null) return null;
    // As rho -> 0, 2 sin(u) / rho -> 1
    const a = rho < DOMAIN_TOLERANCE ? HALF_PI : safeAsin((2 * Math.sin(u)) / rho);
    if (a === null) return null;
    const t = normalizeAngle(theta + HALF_PI - a);
    const v = normalizeAngle(t - u - goal.phi);
    return [fwd('left', t), fwd('right', u), bwd('left', v)];
};

/** CCu|CuC: L+ R+ L- R- */
const LpRpLmRm: WordFormula = (goal) => {
    const { xi, eta } = rightCircleOffset(goal);
    const { r: rho, theta } = toPolar(xi, eta);
    if (rho > 4 + DOMAIN_TOLERANCE) return null;

    let t: number;
    let u: number;
    if (rho <= 2) {
        const a = safeAcos((rho + 2) / 4);
        if (a === null) return null;
        t = normalizeAngle(theta + HALF_PI + a);
        u = normalizeAngle(a);
    } else {
        const a = safeAcos((rho - 2) / 4);
        if (a === null) return null;
        t = normalizeAngle(theta + HALF_PI - a);
        u = normalizeAngle(Math.PI - a);
    }
    const v = normalizeAngle(goal.phi - t + 2 * u);
    return [fwd('left', t), fwd('right', u), bwd('left', u), bwd('right', v)];
};

/** C|CuCu|C: L+ R- L- R+ */
const LpRmLmRp: WordFormula = (goal) => {
    const { xi, eta } = rightCircleOffset(goal);
    const { r: rho, theta } = toPolar(xi, eta);
    const u1 = (20 - rho * rho) / 16;
    if (rho > 6 || u1 < -DOMAIN_TOLERANCE || u1 > 1 + DOMAIN_TOLERANCE) return null;

    const u = Math.acos(Math.max(0, Math.min(1, u1)));
    const a = safeAsin((2 * Math.sin(u)) / rho);
    if (a === null) return null;
    const t = normalizeAngle(theta + HALF_PI + a);
    const v = normalizeAngle(t - goal.phi);
    return [fwd('left', t), bwd('right', u), bwd('left', u), fwd('right', v)];
};

/** C|C(π/2)SC: L+ R- S- L- */
const LpRmSmLm: WordFormula = (goal) => {
    const { xi, eta } = leftCircleOffset(goal);
    const { r: rho, theta } = toPolar(xi, eta);
    const root = safeSqrt(rho * rho - 4);
    if (root === null) return null;
    const u = root - 2;
    const a = Math.atan2(2, u + 2);
    const t = normalizeAngle(theta + HALF_PI + a);
    const v = normalizeAngle(t - goal.phi + HALF_PI);
    return [fwd('left', t), bwd('right', HALF_PI), bwd('straight', u), bwd('left', v)];
};

/** CSC(π/2)|C: L+ S+ R+ L- */
const LpSpRpLm: WordFormula = (goal) => {
    const { xi, eta } = leftCircleOffset(goal);
    const { r: rho, theta } = toPolar(xi, eta);
    const root = safeSqrt(rho * rho - 4);
    if (root === null) return null;
    const u = root - 2;
    const a = Math.atan2(u + 2, 2);
    const t = normalizeAngle(theta + HALF_PI - a);
    const v = normalizeAngle(t - goal.phi - HALF_PI);
    return [fwd('left', t), fwd('straight', u), fwd('right', HALF_PI), bwd('left', v)];
};

/** C|C(π/2)SC: L+ R- S- R- */
const LpRmSmRm: WordFormula = (goal) => {
    const { xi, eta } = rightCircleOffset(goal);
    const { r: rho, theta } = toPolar(xi, eta);
    if (rho < 2 - DOMAIN_TOLERANCE) return null;
    const t = normalizeAngle(theta + HALF_PI);
    const u = rho - 2;
    const v = normalizeAngle(goal.phi - t - HALF_PI);
    return [fwd('left', t), bwd('right', HALF_PI), bwd('straight', u), bwd('right', v)];
};

/** CSC(π/2)|C: L+ S+ L+ R- */
const LpSpLpRm: WordFormula = (goal) => {
    const { xi, eta } = rightCircleOffset(goal);
    const { r: rho, theta } = toPolar(xi, eta);
    if (rho < 2 - DOMAIN_TOLERANCE) return null;
    const t = normalizeAngle(theta);
    const u = rho - 2;
    const v = normalizeAngle(goal.phi - t - HALF_PI);
    return [fwd('left', t), fwd('straight', u), fwd('left', HALF_PI), bwd('right', v)];
};

/** C|C(π/2)SC(π/2)|C: L+ R- S- L- R+ */
const LpRmSmLmRp: WordFormula = (goal) => {
    const { xi, eta } = rightCircleOffset(goal);
    const { r: rho, theta } = toPolar(xi, eta);
    const root = safeSqrt(rho * rho - 4);
    if (root === null) return null;
    const u = root - 4;
    const a = Math.atan2(2, u + 4);
    const t = normalizeAngle(theta + HALF_PI + a);
    const v = normalizeAngle(t - goal.phi);
    return [
        fwd('left', t),
        bwd('right', HALF_PI),
        bwd('straight', u),
        bwd('left', HALF_PI),
        fwd('right', v),
    ];
};

/**
 * Base words in catalog order
 */
export const BASE_WORDS: ReadonlyArray<readonly [string, WordFormula]> = [
    ['LpSpLp', LpSpLp],
    ['LpSpRp', LpSpRp],
    ['LpRmLp', LpRmLp],
    ['LpRmLm', LpRmLm],
    ['LpRpLm', LpRpLm],
    ['LpRpLmRm', LpRpLmRm],
    ['LpRmLmRp', LpRmLmRp],
    ['LpRmSmLm', LpRmSmLm],
    ['LpSpRpLm', LpSpRpLm],
    ['LpRmSmRm', LpRmSmRm],
    ['LpSpLpRm', LpSpLpRm],
    ['LpRmSmLmRp', LpRmSmLmRp],
];

// ==================== Symmetries ====================

function swapSide(kind: SegmentKind): SegmentKind {
    if (kind === 'left') return 'right';
    if (kind === 'right') return 'left';
    return kind;
}

/**
 * Derive a catalog entry from a base word.
 *
 * - timeflip: solve for (-x, y, -φ) and drive every segment in the other gear
 * - reflect: solve for (x, -y, -φ) and swap left/right
 * - timeflip+reflect: solve for (-x, -y, φ) and apply both
 */
export function applyTransform(formula: WordFormula, transform: WordTransform): WordFormula {
    switch (transform) {
        case 'identity':
            return formula;
        case 'timeflip':
            return ({ x, y, phi }) => {
                const segments = formula({ x: -x, y, phi: -phi });
                return segments && segments.map(s => ({ kind: s.kind, param: -s.param }));
            };
        case 'reflect':
            return ({ x, y, phi }) => {
                const segments = formula({ x, y: -y, phi: -phi });
                return segments && segments.map(s => ({ kind: swapSide(s.kind), param: s.param }));
            };
        case 'timeflip+reflect':
            return ({ x, y, phi }) => {
                const segments = formula({ x: -x, y: -y, phi });
                return segments && segments.map(s => ({ kind: swapSide(s.kind), param: -s.param }));
            };
    }
}

const TRANSFORMS: readonly WordTransform[] = ['identity', 'timeflip', 'reflect', 'timeflip+reflect'];

/**
 * Full word catalog: each base word followed by its three symmetric variants.
 * Enumeration order is the tie-break order.
 */
export const CATALOG: readonly CatalogEntry[] = BASE_WORDS.flatMap(([base, formula]) =>
    TRANSFORMS.map(transform => ({
        base,
        transform,
        solve: applyTransform(formula, transform),
    }))
);
