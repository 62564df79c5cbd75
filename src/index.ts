/**
 * netplay2d - Authoritative 2D Multiplayer Simulation Core
 *
 * - Archetype ECS with generational entity ids and deferred mutation
 * - Fixed-tick system scheduler
 * - Grid broad phase, AABB collision with push-apart and triggers
 * - Table-driven character state machine with input buffering
 * - Binary delta snapshots, client prediction, reconciliation and
 *   interpolation
 */

// ============================================
// Ambient
// ============================================
export * from './errors';
export * from './logger';
export * from './config';

// ============================================
// Math
// ============================================
export * from './math';

// ============================================
// Core ECS
// ============================================
export * from './core';

// ============================================
// Components
// ============================================
export * from './components';

// ============================================
// Systems
// ============================================
export * from './character';
export { createMovementSystem, MOVEMENT_PRIORITY } from './plugins/movement';
export * from './plugins/physics2d';

// ============================================
// Simulation
// ============================================
export { Simulation, spawnPlayer, defaultSpawnPosition } from './simulation';
export type { SimulationOptions, PlayerSpawn } from './simulation';

// ============================================
// Networking
// ============================================
export * from './codec';
export * from './net';
export * from './sync';
export * from './prediction';
export * from './loop';
