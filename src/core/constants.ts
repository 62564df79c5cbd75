/**
 * ECS Constants
 *
 * Core constants for the Entity-Component-System architecture.
 */

/**
 * Maximum number of concurrent entities per world.
 * Indices are reused, so this bounds live entities, not total spawns.
 */
export const MAX_ENTITIES = 1 << 16;

/**
 * Entity ID format: [12 bits generation][20 bits index]
 * - Generation: Prevents ABA problem when IDs are recycled
 * - Index: Direct array index for O(1) component access
 */
export const GENERATION_BITS = 12;
export const INDEX_BITS = 20;
export const INDEX_MASK = (1 << INDEX_BITS) - 1;
export const MAX_GENERATION = (1 << GENERATION_BITS) - 1;
