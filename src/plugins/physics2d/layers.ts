/**
 * Collision Layers
 *
 * Every hitbox sits on one of 16 layers (0..15). A symmetric layer matrix
 * says which layer pairs are tested at all; by default every layer collides
 * with every other. The matrix is configured at startup and then only read.
 */

export const LAYER_COUNT = 16;

// ============================================
// Default Layers
// ============================================

export const Layers = {
    DEFAULT: 0,
    PLAYER: 1,
    ENEMY: 2,
    PROJECTILE: 3,
    ITEM: 4,
    TRIGGER: 5,
    WORLD: 6,
    PROP: 7
    // Layers 8-15 reserved for game-specific use
} as const;

const ALL_LAYERS = 0xFFFF;

function assertLayer(layer: number): void {
    if (!Number.isInteger(layer) || layer < 0 || layer >= LAYER_COUNT) {
        throw new RangeError(`Collision layer must be an integer in [0, ${LAYER_COUNT}), got ${layer}`);
    }
}

export class LayerMatrix {
    /** rows[i] bit j set means layers i and j are tested */
    private readonly rows = new Uint16Array(LAYER_COUNT).fill(ALL_LAYERS);

    /**
     * Enable or disable collision between two layers (both directions).
     */
    set(a: number, b: number, collide: boolean): this {
        assertLayer(a);
        assertLayer(b);
        if (collide) {
            this.rows[a] |= 1 << b;
            this.rows[b] |= 1 << a;
        } else {
            this.rows[a] &= ~(1 << b);
            this.rows[b] &= ~(1 << a);
        }
        return this;
    }

    /**
     * Disable every pairing of `layer`, including with itself.
     */
    isolate(layer: number): this {
        for (let other = 0; other < LAYER_COUNT; other++) {
            this.set(layer, other, false);
        }
        return this;
    }

    shouldCollide(a: number, b: number): boolean {
        if (a < 0 || a >= LAYER_COUNT || b < 0 || b >= LAYER_COUNT) return false;
        return (this.rows[a] & (1 << b)) !== 0;
    }

    /** Bitmask of layers `layer` collides with. */
    maskOf(layer: number): number {
        assertLayer(layer);
        return this.rows[layer];
    }
}

/**
 * Build a matrix from explicit exclusions, e.g. `[[Layers.ITEM, Layers.ITEM]]`.
 */
export function createLayerMatrix(excluded: ReadonlyArray<readonly [number, number]> = []): LayerMatrix {
    const matrix = new LayerMatrix();
    for (const [a, b] of excluded) {
        matrix.set(a, b, false);
    }
    return matrix;
}
