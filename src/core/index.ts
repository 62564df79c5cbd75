/**
 * Core ECS - primitives for the Entity Component System
 */

export * from './constants';
export * from './component';
export * from './entity-id';
export * from './archetype';
export * from './command-buffer';
export * from './input';
export * from './query';
export * from './system';
export * from './world';
