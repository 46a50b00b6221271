/**
 * @module src/models/planning
 * @description Path planning for a car-like vehicle
 *
 * Contains:
 * - Reeds-Shepp shortest paths between oriented poses
 * - Tour: waypoint ordering, trajectory assembly
 */

import * as reedsShepp from './reeds-shepp';
import * as tour from './tour';

// Re-export with namespaces
export { reedsShepp, tour };

// Direct exports
export * from './reeds-shepp';
export * from './tour';
