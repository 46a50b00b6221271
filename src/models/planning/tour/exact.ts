/**
 * @module planning/tour/exact
 * @description Exhaustive ordering by depth-first search with branch-and-bound
 */

import { SearchLimitError } from '../../../core/errors';

/**
 * Result of an ordering search over a cost matrix
 */
export interface OrderResult {
    /** Row/column indices of the matrix in visiting order */
    order: number[];
    totalLength: number;
    /** Complete permutations whose cost was evaluated */
    evaluated: number;
}

/**
 * Minimum-cost order starting at index 0.
 *
 * Permutations of the remaining indices are explored in lexicographic
 * order; a partial cost already >= the best total is pruned, so ties keep
 * the lexicographically smallest order.
 *
 * @param matrix - n×n cost matrix, n >= 1
 * @param closed - include the return leg to index 0
 * @param maxPermutations - cap on evaluated complete permutations
 * @throws SearchLimitError when the cap is exceeded
 */
export function exactOrder(
    matrix: readonly (readonly number[])[],
    closed = false,
    maxPermutations?: number
): OrderResult {
    const n = matrix.length;
    if (n <= 1) {
        return { order: n === 1 ? [0] : [], totalLength: 0, evaluated: n };
    }

    const visited = new Array<boolean>(n).fill(false);
    const path: number[] = [0];
    visited[0] = true;

    let bestOrder: number[] = [];
    let bestLength = Infinity;
    let evaluated = 0;

    const search = (last: number, partial: number): void => {
        if (partial >= bestLength) return;

        if (path.length === n) {
            evaluated++;
            if (maxPermutations !== undefined && evaluated > maxPermutations) {
                throw new SearchLimitError(maxPermutations);
            }
            const total = closed ? partial + matrix[last][0] : partial;
            if (total < bestLength) {
                bestLength = total;
                bestOrder = [...path];
            }
            return;
        }

        for (let next = 1; next < n; next++) {
            if (visited[next]) continue;
            visited[next] = true;
            path.push(next);
            search(next, partial + matrix[last][next]);
            path.pop();
            visited[next] = false;
        }
    };

    search(0, 0);

    return { order: bestOrder, totalLength: bestLength, evaluated };
}
