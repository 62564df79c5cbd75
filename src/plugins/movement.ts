/**
 * Movement System
 *
 * Integrates velocity into position for every simulated entity with a
 * Transform and clamps the result into the world bounds.
 */

import { ComponentType } from '../core/component';
import type { System } from '../core/system';

export const MOVEMENT_PRIORITY = 200;

export function createMovementSystem(priority: number = MOVEMENT_PRIORITY): System {
    return {
        name: 'movement',
        priority,
        requiredComponents: [ComponentType.Transform],
        enabled: true,
        update(entities, ctx) {
            const { minX, minY, maxX, maxY } = ctx.config.worldBounds;

            for (const id of entities) {
                if (!ctx.isSimulated(id)) continue;
                const transform = ctx.world.getComponent(id, ComponentType.Transform);
                if (!transform) continue;

                const { position, velocity } = transform;
                if (velocity.x === 0 && velocity.y === 0) continue;

                position.x = Math.min(maxX, Math.max(minX, position.x + velocity.x * ctx.dt));
                position.y = Math.min(maxY, Math.max(minY, position.y + velocity.y * ctx.dt));
            }
        }
    };
}
