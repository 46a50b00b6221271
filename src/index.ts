/**
 * @module src
 * @description turnpath source entry point
 *
 * Structure:
 * - core/: errors, logging, repro
 * - models/: geometry, planning (reeds-shepp, tour)
 * - tasks/: waypoint-tour
 */

export * as core from './core';
export * as models from './models';
export * as tasks from './tasks';
