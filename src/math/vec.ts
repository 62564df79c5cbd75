/**
 * 2D Vector Helpers
 *
 * Plain-float vectors. Server and client run the same operations in the same
 * order, which is what keeps their results identical.
 */

export interface Vec2 {
    x: number;
    y: number;
}

export function vec2Zero(): Vec2 {
    return { x: 0, y: 0 };
}

export function vec2Clone(v: Vec2): Vec2 {
    return { x: v.x, y: v.y };
}

export function vec2Scale(v: Vec2, s: number): Vec2 {
    return { x: v.x * s, y: v.y * s };
}

export function vec2LengthSq(v: Vec2): number {
    return v.x * v.x + v.y * v.y;
}

export function vec2Length(v: Vec2): number {
    return Math.sqrt(vec2LengthSq(v));
}

export function vec2Normalize(v: Vec2): Vec2 {
    const len = vec2Length(v);
    if (len === 0) return vec2Zero();
    return { x: v.x / len, y: v.y / len };
}

export function vec2Lerp(a: Vec2, b: Vec2, t: number): Vec2 {
    return {
        x: a.x + (b.x - a.x) * t,
        y: a.y + (b.y - a.y) * t
    };
}

export function vec2Equals(a: Vec2, b: Vec2): boolean {
    return a.x === b.x && a.y === b.y;
}

/** Largest per-axis absolute difference. */
export function vec2MaxAxisError(a: Vec2, b: Vec2): number {
    return Math.max(Math.abs(a.x - b.x), Math.abs(a.y - b.y));
}
