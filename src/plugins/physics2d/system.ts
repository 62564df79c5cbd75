/**
 * Collision System
 *
 * Wraps a CollisionEngine as a scheduler system. Runs after movement so it
 * sees this tick's integrated positions.
 */

import { ComponentType } from '../../core/component';
import type { System } from '../../core/system';
import { CollisionEngine, CollisionStepResult } from './collision';

export const COLLISION_PRIORITY = 300;

export interface CollisionSystem extends System {
    readonly engine: CollisionEngine;
    /** Result of the most recent step */
    readonly lastStep: CollisionStepResult | undefined;
}

export function createCollisionSystem(engine: CollisionEngine, priority: number = COLLISION_PRIORITY): CollisionSystem {
    let lastStep: CollisionStepResult | undefined;
    return {
        name: 'collision',
        priority,
        requiredComponents: [ComponentType.Transform, ComponentType.Hitbox],
        enabled: true,
        engine,
        get lastStep() {
            return lastStep;
        },
        update(_entities, ctx) {
            lastStep = engine.step(ctx.world, id => ctx.isSimulated(id));
        }
    };
}
