/**
 * 2D Collision Shapes
 *
 * Every hitbox is an axis-aligned box centred on the entity position plus
 * the hitbox offset.
 */

import type { Hitbox, Transform } from '../../components';
import type { Vec2 } from '../../math/vec';

// ============================================
// AABB (Axis-Aligned Bounding Box)
// ============================================

export interface AABB2D {
    minX: number;
    minY: number;
    maxX: number;
    maxY: number;
}

export function aabb2D(minX: number, minY: number, maxX: number, maxY: number): AABB2D {
    return { minX, minY, maxX, maxY };
}

/**
 * Box of the given full size centred on `center`.
 */
export function aabbFromCenter(center: Vec2, size: Vec2): AABB2D {
    const hw = size.x / 2;
    const hh = size.y / 2;
    return {
        minX: center.x - hw,
        minY: center.y - hh,
        maxX: center.x + hw,
        maxY: center.y + hh
    };
}

export function aabbOfHitbox(transform: Transform, hitbox: Hitbox): AABB2D {
    return aabbFromCenter(
        { x: transform.position.x + hitbox.offset.x, y: transform.position.y + hitbox.offset.y },
        hitbox.size
    );
}

/**
 * Per-axis penetration depth of two boxes; both positive means the boxes
 * overlap with non-zero area. Touching edges give zero.
 */
export function aabb2DPenetration(a: AABB2D, b: AABB2D): Vec2 {
    return {
        x: Math.min(a.maxX, b.maxX) - Math.max(a.minX, b.minX),
        y: Math.min(a.maxY, b.maxY) - Math.max(a.minY, b.minY)
    };
}

/**
 * Strict overlap: positive penetration on both axes.
 */
export function aabb2DOverlap(a: AABB2D, b: AABB2D): boolean {
    const p = aabb2DPenetration(a, b);
    return p.x > 0 && p.y > 0;
}
