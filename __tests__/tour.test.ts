/**
 * Tour Module Tests
 * Tests for strategy selection, exact/greedy ordering, the optimizer and the assembler
 */

import { describe, it, expect } from 'vitest';
import {
    selectStrategy,
    resolveStrategy,
    exactOrder,
    greedyOrder,
    optimalOrder,
    tourLength,
    distance,
    createDistanceOracle,
    euclideanDistance,
    buildDistanceMatrix,
    assemble,
    assembleForRadii,
    sampleTrajectory,
} from '../src/models/planning/tour';
import { shortestPath } from '../src/models/planning/reeds-shepp';
import { scalePose, toWaypoints } from '../src/models/geometry';
import {
    EmptyInputError,
    InvalidRadiusError,
    SearchLimitError,
    ValidationError,
} from '../src/core/errors';
import { SeededRNG, permutations, poseError, waypointsOf } from './test-utils';

function randomWaypoints(n: number, seed: number) {
    const rng = new SeededRNG(seed);
    return waypointsOf(Array.from({ length: n }, (): [number, number, number] => {
        const p = rng.pose(8);
        return [p.x, p.y, p.theta];
    }));
}

// ==================== Strategy ====================

describe('Strategy selection', () => {
    it('should use exact search strictly below the threshold', () => {
        expect(selectStrategy(9, 10)).toBe('exact');
        expect(selectStrategy(10, 10)).toBe('greedy');
        expect(selectStrategy(11, 10)).toBe('greedy');
        expect(selectStrategy(3, 3)).toBe('greedy');
        expect(selectStrategy(4)).toBe('exact');
    });

    it('should fall back from exact to greedy at the threshold', () => {
        expect(resolveStrategy('exact', 10, 10)).toEqual({ strategy: 'greedy', fellBack: true });
        expect(resolveStrategy('exact', 9, 10)).toEqual({ strategy: 'exact', fellBack: false });
        expect(resolveStrategy('greedy', 3, 10)).toEqual({ strategy: 'greedy', fellBack: false });
        expect(resolveStrategy('auto', 12, 10)).toEqual({ strategy: 'greedy', fellBack: false });
    });
});

// ==================== Exact Search ====================

describe('exactOrder', () => {
    it('should follow the cheap cycle of an asymmetric matrix', () => {
        const m = [
            [0, 1, 10, 10],
            [10, 0, 1, 10],
            [10, 10, 0, 1],
            [1, 10, 10, 0],
        ];
        expect(exactOrder(m).order).toEqual([0, 1, 2, 3]);
        expect(exactOrder(m).totalLength).toBe(3);
        expect(exactOrder(m, true).totalLength).toBe(4);
    });

    it('should account for the return leg when closed', () => {
        const m = [
            [0, 1, 2],
            [9, 0, 1],
            [20, 1, 0],
        ];
        expect(exactOrder(m)).toMatchObject({ order: [0, 1, 2], totalLength: 2 });
        expect(exactOrder(m, true)).toMatchObject({ order: [0, 2, 1], totalLength: 12 });
    });

    it('should keep the lexicographically first order on ties', () => {
        const m = [
            [0, 1, 1],
            [1, 0, 1],
            [1, 1, 0],
        ];
        expect(exactOrder(m)).toEqual({ order: [0, 1, 2], totalLength: 2, evaluated: 1 });
    });

    it('should enforce the permutation cap', () => {
        const m = [
            [0, 5, 1],
            [1, 0, 1],
            [1, 1, 0],
        ];
        expect(() => exactOrder(m, false, 1)).toThrow(SearchLimitError);
        expect(exactOrder(m, false, 2)).toEqual({ order: [0, 2, 1], totalLength: 2, evaluated: 2 });
    });

    it('should handle trivial sizes', () => {
        expect(exactOrder([])).toEqual({ order: [], totalLength: 0, evaluated: 0 });
        expect(exactOrder([[0]])).toEqual({ order: [0], totalLength: 0, evaluated: 1 });
    });
});

// ==================== Greedy ====================

describe('greedyOrder', () => {
    it('should break ties toward the lowest index', () => {
        const m = [
            [0, 1, 1],
            [5, 0, 2],
            [5, 2, 0],
        ];
        expect(greedyOrder(m)).toMatchObject({ order: [0, 1, 2], totalLength: 3 });
        expect(greedyOrder(m, true)).toMatchObject({ order: [0, 1, 2], totalLength: 8 });
    });

    it('should visit every waypoint exactly once', () => {
        const waypoints = randomWaypoints(14, 21);
        const tour = optimalOrder(waypoints, createDistanceOracle(1));
        expect(tour.strategy).toBe('greedy');
        expect([...tour.order].sort((a, b) => a - b)).toEqual(waypoints.map(w => w.index));
        expect(tour.order[0]).toBe(0);
        expect(Number.isFinite(tour.totalLength)).toBe(true);
    });
});

// ==================== Distance Oracle ====================

describe('Distance oracle', () => {
    it('should match the engine path length', () => {
        const a = { x: 0, y: 0, theta: 0 };
        const b = { x: 2, y: 3, theta: 1 };
        expect(distance(a, b, 1.5)).toBe(shortestPath(a, b, 1.5).totalLength);
        const [wa, wb] = waypointsOf([[0, 0, 0], [2, 3, 1]]);
        expect(createDistanceOracle(1.5)(wa, wb)).toBe(distance(a, b, 1.5));
    });

    it('should reject invalid radii up front', () => {
        expect(() => createDistanceOracle(0)).toThrow(InvalidRadiusError);
        expect(() => createDistanceOracle(-2)).toThrow(InvalidRadiusError);
    });

    it('should build a matrix with a zero diagonal', () => {
        const waypoints = waypointsOf([[0, 0, 0], [3, 4, 0], [6, 8, 0]]);
        expect(buildDistanceMatrix(waypoints, euclideanDistance)).toEqual([
            [0, 5, 10],
            [5, 0, 5],
            [10, 5, 0],
        ]);
    });
});

// ==================== Optimizer ====================

describe('optimalOrder', () => {
    it('should beat or match every ordering for small sets', () => {
        for (const seed of [1, 2, 3]) {
            const waypoints = randomWaypoints(5, seed);
            const oracle = createDistanceOracle(1);
            const tour = optimalOrder(waypoints, oracle);

            const costs = permutations([1, 2, 3, 4]).map(rest => tourLength(waypoints, [0, ...rest], oracle));
            expect(tour.strategy).toBe('exact');
            expect(tour.totalLength).toBe(Math.min(...costs));
            expect(tourLength(waypoints, tour.order, oracle)).toBe(tour.totalLength);
        }
    });

    it('should optimize the closed loop including the return leg', () => {
        const waypoints = randomWaypoints(5, 42);
        const oracle = createDistanceOracle(2);
        const tour = optimalOrder(waypoints, oracle, { closed: true });

        const costs = permutations([1, 2, 3, 4]).map(rest => tourLength(waypoints, [0, ...rest], oracle, true));
        expect(tour.closed).toBe(true);
        expect(tour.totalLength).toBe(Math.min(...costs));
        expect(tour.order).toHaveLength(5);
    });

    it('should never do worse exactly than greedily', () => {
        const waypoints = randomWaypoints(7, 8);
        const oracle = createDistanceOracle(1);
        const exact = optimalOrder(waypoints, oracle, { method: 'exact' });
        const greedy = optimalOrder(waypoints, oracle, { method: 'greedy' });
        expect(greedy.strategy).toBe('greedy');
        expect(exact.totalLength).toBeLessThanOrEqual(greedy.totalLength);
    });

    it('should report the fallback when exact search is too large', () => {
        const tour = optimalOrder(randomWaypoints(6, 4), euclideanDistance, { method: 'exact', threshold: 5 });
        expect(tour.strategy).toBe('greedy');
        expect(tour.fellBack).toBe(true);
    });

    it('should return waypoint indices, not positions', () => {
        const waypoints = waypointsOf([[0, 0, 0], [10, 0, 0], [5, 0, 0]])
            .map((w, i) => ({ ...w, index: [7, 3, 5][i] }));
        const tour = optimalOrder(waypoints, euclideanDistance);
        expect(tour.order).toEqual([7, 5, 3]);
        expect(tour.totalLength).toBe(10);
    });

    it('should break ties on waypoint index rather than position', () => {
        const waypoints = waypointsOf([[0, 0, 0], [1, 0, 0], [-1, 0, 0]])
            .map((w, i) => ({ ...w, index: [0, 9, 2][i] }));
        const greedy = optimalOrder(waypoints, euclideanDistance, { method: 'greedy' });
        const exact = optimalOrder(waypoints, euclideanDistance, { method: 'exact' });
        expect(greedy.order).toEqual([0, 2, 9]);
        expect(exact.order).toEqual([0, 2, 9]);
        expect(greedy.totalLength).toBe(3);
        expect(exact.totalLength).toBe(3);
    });

    it('should give a trivial tour for one waypoint', () => {
        const tour = optimalOrder(waypointsOf([[1, 2, 0]]), euclideanDistance, { closed: true });
        expect(tour).toEqual({ order: [0], totalLength: 0, closed: true, strategy: 'exact', fellBack: false });
    });

    it('should reject empty input and bad options', () => {
        expect(() => optimalOrder([], euclideanDistance)).toThrow(EmptyInputError);
        const waypoints = waypointsOf([[0, 0, 0], [1, 0, 0]]);
        expect(() => optimalOrder(waypoints, euclideanDistance, { threshold: 0 })).toThrow(ValidationError);
        expect(() => optimalOrder(waypoints, euclideanDistance, { maxPermutations: 1.5 })).toThrow(ValidationError);
    });

    it('should reject unknown indices in tourLength', () => {
        expect(() => tourLength(waypointsOf([[0, 0, 0]]), [0, 4], euclideanDistance)).toThrow(ValidationError);
    });

    it('should improve on the file order for the sample scenario', () => {
        const waypoints = toWaypoints([
            { x: -6, y: -7, thetaDegrees: 0 },
            { x: -6, y: 0, thetaDegrees: 90 },
            { x: -4, y: 6, thetaDegrees: 45 },
            { x: 0, y: 5, thetaDegrees: 30 },
            { x: 0, y: -2, thetaDegrees: -45 },
            { x: -2, y: -6, thetaDegrees: -90 },
        ]);
        const oracle = createDistanceOracle(1);
        const tour = optimalOrder(waypoints, oracle);

        const costs = permutations([1, 2, 3, 4, 5]).map(rest => tourLength(waypoints, [0, ...rest], oracle));
        expect(tour.strategy).toBe('exact');
        expect(tour.totalLength).toBeLessThanOrEqual(tourLength(waypoints, [0, 1, 2, 3, 4, 5], oracle));
        expect(tour.totalLength).toBe(Math.min(...costs));
        expect(tour.totalLength).toBeLessThan(Math.max(...costs));
    });
});

// ==================== Assembler ====================

describe('Trajectory assembler', () => {
    const poses = [
        { x: 0, y: 0, theta: 0 },
        { x: 4, y: 2, theta: Math.PI / 2 },
        { x: -1, y: 5, theta: Math.PI },
    ];

    it('should concatenate one shortest path per consecutive pair', () => {
        const trajectory = assemble(poses, 1.5);
        const legA = shortestPath(poses[0], poses[1], 1.5);
        const legB = shortestPath(poses[1], poses[2], 1.5);

        expect(trajectory.turningRadius).toBe(1.5);
        expect(trajectory.legs).toEqual([legA, legB]);
        expect(trajectory.segments).toEqual([...legA.segments, ...legB.segments]);
        expect(trajectory.totalLength).toBe(legA.totalLength + legB.totalLength);
    });

    it('should give an empty trajectory for a single pose', () => {
        expect(assemble([poses[0]], 1)).toEqual({ turningRadius: 1, legs: [], segments: [], totalLength: 0 });
    });

    it('should reject empty input and invalid radii', () => {
        expect(() => assemble([], 1)).toThrow(EmptyInputError);
        expect(() => assemble(poses, 0)).toThrow(InvalidRadiusError);
    });

    it('should assemble the same order for each radius', () => {
        const trajectories = assembleForRadii(poses, [0.5, 1, 2]);
        expect(trajectories.map(t => t.turningRadius)).toEqual([0.5, 1, 2]);
        expect(trajectories.every(t => t.legs.length === 2)).toBe(true);
    });

    it('should scale with positions and radius together', () => {
        const base = assemble(poses, 1).totalLength;
        const scaled = assemble(poses.map(p => scalePose(p, 3)), 3).totalLength;
        expect(scaled).toBeCloseTo(3 * base, 9);
    });

    it('should sample the whole trajectory from start to end', () => {
        const trajectory = assemble(poses, 1);
        const samples = sampleTrajectory(poses[0], trajectory, 0.1);
        expect(samples[0]).toEqual(poses[0]);
        expect(poseError(samples[samples.length - 1], poses[2])).toBeLessThan(1e-6);
    });
});
