/**
 * @module planning/tour/strategy
 * @description Choice between exact and greedy ordering
 */

import type { OrderingMethod, OrderingStrategy } from './types';

/** Waypoint count from which the greedy heuristic is used */
export const DEFAULT_EXACT_THRESHOLD = 10;

/**
 * `'exact'` when `n < threshold`, otherwise `'greedy'`
 */
export function selectStrategy(n: number, threshold: number = DEFAULT_EXACT_THRESHOLD): OrderingStrategy {
    return n < threshold ? 'exact' : 'greedy';
}

/**
 * Strategy that actually runs for a requested method.
 * An exact request at or above the threshold falls back to greedy.
 */
export function resolveStrategy(
    method: OrderingMethod,
    n: number,
    threshold: number = DEFAULT_EXACT_THRESHOLD
): { strategy: OrderingStrategy; fellBack: boolean } {
    const allowed = selectStrategy(n, threshold);
    switch (method) {
        case 'greedy':
            return { strategy: 'greedy', fellBack: false };
        case 'exact':
            return { strategy: allowed, fellBack: allowed !== 'exact' };
        case 'auto':
            return { strategy: allowed, fellBack: false };
    }
}
