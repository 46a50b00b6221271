/**
 * @module planning/tour/greedy
 * @description Nearest-neighbor ordering
 */

import type { OrderResult } from './exact';

/**
 * Start at index 0 and repeatedly visit the cheapest unvisited index.
 * Equal costs go to the lowest index.
 */
export function greedyOrder(matrix: readonly (readonly number[])[], closed = false): OrderResult {
    const n = matrix.length;
    if (n === 0) {
        return { order: [], totalLength: 0, evaluated: 0 };
    }

    const visited = new Array<boolean>(n).fill(false);
    const order = [0];
    visited[0] = true;
    let total = 0;
    let current = 0;

    for (let step = 1; step < n; step++) {
        let nearest = -1;
        let nearestCost = Infinity;
        for (let j = 0; j < n; j++) {
            if (visited[j]) continue;
            if (nearest === -1 || matrix[current][j] < nearestCost) {
                nearest = j;
                nearestCost = matrix[current][j];
            }
        }
        visited[nearest] = true;
        order.push(nearest);
        total += nearestCost;
        current = nearest;
    }

    if (closed && n > 1) {
        total += matrix[current][0];
    }

    return { order, totalLength: total, evaluated: 1 };
}
