/**
 * Physics 2D Module
 *
 * Grid broad phase, AABB narrow phase, push-apart resolution and trigger
 * events for axis-aligned hitboxes.
 */

// Shapes and AABB
export type { AABB2D } from './shapes';
export {
    aabb2D,
    aabbFromCenter,
    aabbOfHitbox,
    aabb2DOverlap,
    aabb2DPenetration
} from './shapes';

// Collision Layers
export { LAYER_COUNT, Layers, LayerMatrix, createLayerMatrix } from './layers';

// Collision Detection and Response
export type { Contact2D, CollisionStepResult, CollisionHandler, CollisionEngineOptions } from './collision';
export { CollisionEngine, computeSeparation } from './collision';
export type { CollisionSystem } from './system';
export { createCollisionSystem, COLLISION_PRIORITY } from './system';

// Spatial Partitioning
export type { SpatialStats } from './spatial-hash';
export { SpatialHash2D } from './spatial-hash';

// Triggers
export type { CollisionEvent, CollisionEventKind, EntityPair } from './trigger';
export { TriggerTracker, comparePairs } from './trigger';
