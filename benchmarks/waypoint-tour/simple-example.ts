#!/usr/bin/env npx tsx
/**
 * @module benchmarks/waypoint-tour/simple-example
 * @description Exact versus greedy ordering on random waypoint sets
 *
 * Usage:
 *   npx tsx benchmarks/waypoint-tour/simple-example.ts
 */

import { planning, tasks, geometry } from '../../index';

const { generateRandomWaypoints } = tasks.waypointTour;
const { createDistanceOracle, optimalOrder } = planning;

const SEEDS = [1, 2, 3, 4, 5];
const SIZES = [5, 7, 9];
const RADIUS = 1.0;

console.log('');
console.log('============================================================');
console.log('     Waypoint Tour: exact vs greedy ordering                ');
console.log('============================================================');
console.log('');

for (const size of SIZES) {
    let gapSum = 0;
    let exactMs = 0;
    let greedyMs = 0;

    for (const seed of SEEDS) {
        const waypoints = geometry.toWaypoints(generateRandomWaypoints(size, undefined, seed));
        const oracle = createDistanceOracle(RADIUS);

        let t0 = Date.now();
        const exact = optimalOrder(waypoints, oracle, { method: 'exact' });
        exactMs += Date.now() - t0;

        t0 = Date.now();
        const greedy = optimalOrder(waypoints, oracle, { method: 'greedy' });
        greedyMs += Date.now() - t0;

        gapSum += (greedy.totalLength - exact.totalLength) / exact.totalLength;
    }

    console.log(
        `n=${size}: greedy gap ${(100 * gapSum / SEEDS.length).toFixed(1)}%, ` +
        `exact ${(exactMs / SEEDS.length).toFixed(1)} ms, greedy ${(greedyMs / SEEDS.length).toFixed(1)} ms`
    );
}

console.log('');
