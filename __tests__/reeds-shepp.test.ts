/**
 * Reeds-Shepp Engine Tests
 * Tests for the word catalog, shortest paths, motion composition and sampling
 */

import { describe, it, expect } from 'vitest';
import {
    CATALOG,
    BASE_WORDS,
    shortestPath,
    allPaths,
    solveUnit,
    relativeGoal,
    wordSignature,
    composePath,
    endPose,
    applySegment,
    signedLength,
    samplePath,
    type Path,
} from '../src/models/planning/reeds-shepp';
import { scalePose, euclidean } from '../src/models/geometry';
import { InvalidRadiusError, ValidationError } from '../src/core/errors';
import { SeededRNG, isClose, poseError } from './test-utils';

const ORIGIN = { x: 0, y: 0, theta: 0 };

function segmentSum(path: Path): number {
    return path.segments.reduce((sum, s) => sum + s.length, 0);
}

// ==================== Catalog ====================

describe('Word catalog', () => {
    it('should hold 12 base words in 4 variants each', () => {
        expect(BASE_WORDS).toHaveLength(12);
        expect(CATALOG).toHaveLength(48);
        expect(CATALOG.slice(0, 4).map(e => e.transform))
            .toEqual(['identity', 'timeflip', 'reflect', 'timeflip+reflect']);
        expect(CATALOG[0].base).toBe('LpSpLp');
        expect(CATALOG[47].base).toBe('LpRmSmLmRp');
    });

    it('should only return segments that reach the goal', () => {
        const rng = new SeededRNG(3);
        for (let i = 0; i < 10; i++) {
            const start = rng.pose();
            const goal = rng.pose();
            const paths = allPaths(start, goal, 1.5);
            expect(paths.length).toBeGreaterThan(0);
            for (const path of paths) {
                expect(poseError(endPose(start, path), goal)).toBeLessThan(1e-6);
            }
        }
    });

    it('should pick the minimum over all feasible words', () => {
        const rng = new SeededRNG(5);
        for (let i = 0; i < 10; i++) {
            const start = rng.pose();
            const goal = rng.pose();
            const best = shortestPath(start, goal, 1);
            const lengths = allPaths(start, goal, 1).map(p => p.totalLength);
            expect(best.totalLength).toBe(Math.min(...lengths));
        }
    });
});

// ==================== Shortest Path ====================

describe('shortestPath', () => {
    it('should drive straight ahead to a goal on the heading line', () => {
        const path = shortestPath(ORIGIN, { x: 10, y: 0, theta: 0 }, 1);
        expect(path.word).toBe('S+');
        expect(path.segments).toHaveLength(1);
        expect(path.segments[0].kind).toBe('straight');
        expect(path.segments[0].direction).toBe('forward');
        expect(path.totalLength).toBeCloseTo(10, 9);
    });

    it('should reverse straight back to a goal behind the start', () => {
        const path = shortestPath(ORIGIN, { x: -5, y: 0, theta: 0 }, 1);
        expect(path.word).toBe('S-');
        expect(path.segments[0].direction).toBe('backward');
        expect(path.totalLength).toBeCloseTo(5, 9);
    });

    it('should turn around in place using arcs only', () => {
        const goal = { x: 0, y: 0, theta: Math.PI };
        const path = shortestPath(ORIGIN, goal, 1);
        // Heading changes by π, so the arcs sweep at least π in total
        expect(path.totalLength).toBeCloseTo(Math.PI, 9);
        expect(path.segments.every(s => s.kind !== 'straight')).toBe(true);
        expect(poseError(endPose(ORIGIN, path), goal)).toBeLessThan(1e-9);
    });

    it('should return the empty path when start equals goal', () => {
        const pose = { x: 3, y: -2, theta: 0.7 };
        const path = shortestPath(pose, pose, 2);
        expect(path.segments).toEqual([]);
        expect(path.totalLength).toBe(0);
        expect(path.word).toBe('');
        expect(path.turningRadius).toBe(2);
    });

    it('should report totalLength as the sum of segment lengths', () => {
        const rng = new SeededRNG(17);
        for (let i = 0; i < 20; i++) {
            const path = shortestPath(rng.pose(), rng.pose(), rng.uniform(0.5, 3));
            expect(path.totalLength).toBeCloseTo(segmentSum(path), 12);
            expect(path.segments.every(s => s.length > 0)).toBe(true);
            expect(path.word).toMatch(/^([LSR][+-])+$/);
            expect(path.word).toBe(wordSignature(path.segments));
        }
    });

    it('should reconstruct the goal by composing segments', () => {
        const rng = new SeededRNG(2024);
        for (let i = 0; i < 30; i++) {
            const start = rng.pose();
            const goal = rng.pose();
            const path = shortestPath(start, goal, rng.uniform(0.25, 4));
            expect(poseError(endPose(start, path), goal)).toBeLessThan(1e-6);
        }
    });

    it('should never be shorter than the straight-line distance', () => {
        const rng = new SeededRNG(99);
        for (let i = 0; i < 20; i++) {
            const start = rng.pose();
            const goal = rng.pose();
            const path = shortestPath(start, goal, rng.uniform(0.5, 3));
            expect(path.totalLength).toBeGreaterThanOrEqual(euclidean(start, goal) - 1e-9);
        }
    });

    it('should scale linearly with positions and radius together', () => {
        const rng = new SeededRNG(8);
        for (let i = 0; i < 20; i++) {
            const a = rng.pose();
            const b = rng.pose();
            const r = rng.uniform(0.5, 2);
            const k = rng.uniform(0.2, 5);
            const base = shortestPath(a, b, r).totalLength;
            const scaled = shortestPath(scalePose(a, k), scalePose(b, k), k * r).totalLength;
            expect(isClose(scaled, k * base, 1e-9, 1e-9)).toBe(true);
        }
    });

    it('should reject invalid radii', () => {
        for (const r of [0, -1, NaN, Infinity]) {
            expect(() => shortestPath(ORIGIN, { x: 1, y: 1, theta: 0 }, r)).toThrow(InvalidRadiusError);
        }
    });

    it('should reject non-finite poses', () => {
        expect(() => shortestPath({ x: NaN, y: 0, theta: 0 }, ORIGIN, 1)).toThrow(ValidationError);
        expect(() => shortestPath(ORIGIN, { x: 0, y: 0, theta: Infinity }, 1)).toThrow(ValidationError);
    });
});

// ==================== Unit Problem ====================

describe('Unit-radius solver', () => {
    it('should express the goal in the start frame in radius units', () => {
        const goal = relativeGoal({ x: 1, y: 1, theta: Math.PI / 2 }, { x: 1, y: 5, theta: Math.PI }, 2);
        expect(goal.x).toBeCloseTo(2, 12);
        expect(goal.y).toBeCloseTo(0, 12);
        expect(goal.phi).toBeCloseTo(Math.PI / 2, 12);
    });

    it('should solve the degenerate goal with no segments', () => {
        const candidate = solveUnit({ x: 0, y: 0, phi: 0 });
        expect(candidate.segments).toEqual([]);
        expect(candidate.length).toBe(0);
    });

    it('should prefer the first catalog word on equal lengths', () => {
        const candidate = solveUnit({ x: 4, y: 0, phi: 0 });
        expect(candidate.base).toBe('LpSpLp');
        expect(candidate.transform).toBe('identity');
    });
});

// ==================== Motion ====================

describe('Motion composition', () => {
    it('should move along a left quarter circle', () => {
        const end = applySegment(ORIGIN, { kind: 'left', direction: 'forward', length: Math.PI / 2 }, 1);
        expect(end.x).toBeCloseTo(1, 12);
        expect(end.y).toBeCloseTo(1, 12);
        expect(end.theta).toBeCloseTo(Math.PI / 2, 12);
    });

    it('should move backward along a right arc', () => {
        const end = applySegment(ORIGIN, { kind: 'right', direction: 'backward', length: 2 * Math.PI }, 2);
        // Half of the right circle of radius 2 centered at (0, -2)
        expect(end.x).toBeCloseTo(0, 12);
        expect(end.y).toBeCloseTo(-4, 12);
        expect(Math.abs(end.theta)).toBeCloseTo(Math.PI, 12);
    });

    it('should clamp partial distances to the segment', () => {
        const segment = { kind: 'straight' as const, direction: 'forward' as const, length: 2 };
        expect(applySegment(ORIGIN, segment, 1, 5).x).toBe(2);
        expect(applySegment(ORIGIN, segment, 1, -1).x).toBe(0);
        expect(applySegment(ORIGIN, segment, 1, 0.5).x).toBe(0.5);
    });

    it('should drive backward segments with a negative signed length', () => {
        const segment = { kind: 'straight' as const, direction: 'backward' as const, length: 2 };
        expect(signedLength(segment)).toBe(-2);
        expect(signedLength({ ...segment, direction: 'forward' })).toBe(2);
        expect(applySegment(ORIGIN, segment, 1, 0.5).x).toBe(-0.5);
    });

    it('should list the pose after each segment', () => {
        const path = shortestPath(ORIGIN, { x: 3, y: 4, theta: 1 }, 1);
        const poses = composePath(ORIGIN, path);
        expect(poses).toHaveLength(path.segments.length);
        expect(poses[poses.length - 1]).toEqual(endPose(ORIGIN, path));
    });
});

// ==================== Sampling ====================

describe('samplePath', () => {
    it('should include both endpoints and respect the step', () => {
        const start = { x: 1, y: 2, theta: 0.3 };
        const goal = { x: -4, y: 6, theta: -2 };
        const path = shortestPath(start, goal, 1.2);
        const samples = samplePath(start, path, 0.05);

        expect(samples[0]).toEqual(start);
        expect(poseError(samples[samples.length - 1], goal)).toBeLessThan(1e-6);
        for (let i = 1; i < samples.length; i++) {
            expect(euclidean(samples[i - 1], samples[i])).toBeLessThanOrEqual(0.05 + 1e-9);
        }
    });

    it('should split a straight path into evenly spaced poses', () => {
        const path: Path = {
            segments: [{ kind: 'straight', direction: 'forward', length: 10 }],
            totalLength: 10,
            turningRadius: 1,
            word: 'S+',
        };
        const samples = samplePath(ORIGIN, path, 0.3);
        // ceil(10 / 0.3) = 34 steps
        expect(samples).toHaveLength(35);
        expect(samples[34].x).toBeCloseTo(10, 12);
    });

    it('should return only the start for the empty path', () => {
        const path = shortestPath(ORIGIN, ORIGIN, 1);
        expect(samplePath(ORIGIN, path, 0.1)).toEqual([ORIGIN]);
    });

    it('should reject a non-positive step', () => {
        const path = shortestPath(ORIGIN, { x: 1, y: 0, theta: 0 }, 1);
        expect(() => samplePath(ORIGIN, path, 0)).toThrow(ValidationError);
    });
});
