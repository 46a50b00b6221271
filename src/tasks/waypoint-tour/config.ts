/**
 * @module tasks/waypoint-tour/config
 * @description Waypoint-tour task configuration
 */

import { InvalidConfigError } from '../../core/errors';
import type { OrderingMethod } from '../../models/planning/tour/types';

// ==================== Configuration ====================

/**
 * Radius the waypoint order is optimized at: a fixed radius, or
 * `'per-radius'` to optimize separately for each trajectory radius
 */
export type OrderingRadius = number | 'per-radius';

/**
 * Waypoint-tour task configuration
 */
export interface WaypointTourConfig {
    /** Task name, used in logs and report */
    taskName: string;
    /** Turning radii to assemble trajectories for */
    radii: number[];
    /** Waypoint count from which greedy ordering is used */
    threshold: number;
    orderingRadius: OrderingRadius;
    method: OrderingMethod;
    /** Return to the first waypoint at the end */
    closeLoop: boolean;
    /** Cap on permutations evaluated by the exact search */
    maxPermutations?: number;
    /** Pose spacing (world units) when sampling trajectories for drawing */
    sampleStep: number;
}

/**
 * Default configuration
 */
export const DEFAULT_TOUR_CONFIG: WaypointTourConfig = {
    taskName: 'waypoint-tour',
    radii: [0.5, 1.0, 2.0, 3.0],
    threshold: 10,
    orderingRadius: 1.0,
    method: 'auto',
    closeLoop: false,
    sampleStep: 0.1,
};

/**
 * Create config with overrides
 */
export function createConfig(overrides: Partial<WaypointTourConfig> = {}): WaypointTourConfig {
    return {
        ...DEFAULT_TOUR_CONFIG,
        ...overrides,
        radii: [...(overrides.radii ?? DEFAULT_TOUR_CONFIG.radii)],
    };
}

// ==================== Validation ====================

/**
 * Outcome of {@link validateConfig}
 */
export interface ConfigValidation {
    valid: boolean;
    errors: string[];
    warnings: string[];
}

const METHODS: readonly OrderingMethod[] = ['auto', 'exact', 'greedy'];

function isPositiveFinite(value: number): boolean {
    return Number.isFinite(value) && value > 0;
}

/**
 * Check a configuration without throwing
 */
export function validateConfig(config: WaypointTourConfig): ConfigValidation {
    const errors: string[] = [];
    const warnings: string[] = [];

    if (config.taskName.trim() === '') {
        errors.push('taskName must not be empty');
    }

    if (config.radii.length === 0) {
        errors.push('radii must contain at least one turning radius');
    }
    config.radii.forEach((radius, i) => {
        if (!isPositiveFinite(radius)) {
            errors.push(`radii[${i}] must be a positive finite number, got ${radius}`);
        }
    });
    if (new Set(config.radii).size !== config.radii.length) {
        warnings.push('radii contains duplicates');
    }

    if (!Number.isInteger(config.threshold) || config.threshold < 1) {
        errors.push(`threshold must be a positive integer, got ${config.threshold}`);
    } else if (config.threshold > 12) {
        warnings.push(`threshold ${config.threshold} permits exact search over more than 10! orders`);
    }

    if (config.orderingRadius !== 'per-radius' && !isPositiveFinite(config.orderingRadius)) {
        errors.push(`orderingRadius must be a positive finite number or 'per-radius', got ${config.orderingRadius}`);
    }

    if (!METHODS.includes(config.method)) {
        errors.push(`method must be one of ${METHODS.join(', ')}, got ${config.method}`);
    }

    if (config.maxPermutations !== undefined &&
        (!Number.isInteger(config.maxPermutations) || config.maxPermutations < 1)) {
        errors.push(`maxPermutations must be a positive integer, got ${config.maxPermutations}`);
    }

    if (!isPositiveFinite(config.sampleStep)) {
        errors.push(`sampleStep must be a positive finite number, got ${config.sampleStep}`);
    }

    return { valid: errors.length === 0, errors, warnings };
}

/**
 * Throw InvalidConfigError listing every problem found
 */
export function assertValidConfig(config: WaypointTourConfig): void {
    const { valid, errors } = validateConfig(config);
    if (!valid) {
        throw new InvalidConfigError(errors);
    }
}
