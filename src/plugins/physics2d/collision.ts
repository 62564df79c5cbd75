/**
 * 2D Collision Detection and Response
 *
 * One step per tick:
 * - Rebuild the spatial hash from every entity with Transform + Hitbox
 * - Broad phase: each entity queries its own AABB, pairs kept as (low, high)
 *   and filtered through the layer matrix
 * - Narrow phase: strict AABB overlap
 * - Solid pairs are pushed apart along the axis of least penetration,
 *   split by inverse mass; trigger pairs only produce events, and are
 *   tested once every solid pair has been resolved
 * - Events go out after every pair has been resolved
 */

import { ComponentType } from '../../core/component';
import type { EntityId } from '../../core/entity-id';
import type { World } from '../../core/world';
import type { Hitbox, Transform } from '../../components';
import type { WorldBounds } from '../../config';
import type { Vec2 } from '../../math/vec';
import { createLogger } from '../../logger';
import { AABB2D, aabbOfHitbox, aabb2DOverlap, aabb2DPenetration } from './shapes';
import { SpatialHash2D } from './spatial-hash';
import { LayerMatrix } from './layers';
import {
    CollisionEvent,
    CollisionEventKind,
    EntityPair,
    TriggerTracker,
    comparePairs
} from './trigger';

const log = createLogger('collision');

// ============================================
// Contact
// ============================================

export interface Contact2D {
    a: EntityId;
    b: EntityId;
    /** Unit axis from a towards b */
    normal: Vec2;
    depth: number;
    /** Displacement applied to each side */
    moveA: Vec2;
    moveB: Vec2;
}

export interface CollisionStepResult {
    /** Narrow-phase overlapping pairs, ascending */
    pairs: EntityPair[];
    /** Solid pairs that were pushed apart, in resolution order */
    contacts: Contact2D[];
    events: CollisionEvent[];
}

export type CollisionHandler = (event: CollisionEvent) => void;

export interface CollisionEngineOptions {
    cellSize: number;
    worldBounds: WorldBounds;
    layers?: LayerMatrix;
}

interface Body {
    id: EntityId;
    transform: Transform;
    hitbox: Hitbox;
    invMass: number;
}

// ============================================
// Helpers
// ============================================

function inverseMass(hitbox: Hitbox, simulated: boolean): number {
    if (!simulated || hitbox.isStatic || !(hitbox.mass > 0)) return 0;
    return 1 / hitbox.mass;
}

/** normal * amount, with -0 folded to 0 */
function along(normal: Vec2, amount: number): Vec2 {
    return { x: normal.x * amount + 0, y: normal.y * amount + 0 };
}

function clamp(value: number, min: number, max: number): number {
    return value < min ? min : value > max ? max : value;
}

/**
 * Minimum translation for a solid pair given their current boxes.
 * Returns null when the boxes no longer overlap.
 */
export function computeSeparation(
    boxA: AABB2D,
    boxB: AABB2D
): { normal: Vec2; depth: number } | null {
    const pen = aabb2DPenetration(boxA, boxB);
    if (pen.x <= 0 || pen.y <= 0) return null;

    // Least penetration; ties resolve along X
    if (pen.x <= pen.y) {
        const centerA = boxA.minX + boxA.maxX;
        const centerB = boxB.minX + boxB.maxX;
        // Coincident centers push a towards negative X
        const sign = centerB >= centerA ? 1 : -1;
        return { normal: { x: sign, y: 0 }, depth: pen.x };
    }

    const centerA = boxA.minY + boxA.maxY;
    const centerB = boxB.minY + boxB.maxY;
    const sign = centerB >= centerA ? 1 : -1;
    return { normal: { x: 0, y: sign }, depth: pen.y };
}

// ============================================
// Engine
// ============================================

export class CollisionEngine {
    readonly spatial: SpatialHash2D;
    readonly layers: LayerMatrix;
    readonly triggers = new TriggerTracker();
    private readonly bounds: WorldBounds;
    private handlers: Record<CollisionEventKind, CollisionHandler[]> = { enter: [], stay: [], exit: [] };

    constructor(options: CollisionEngineOptions) {
        this.spatial = new SpatialHash2D(options.cellSize);
        this.layers = options.layers ?? new LayerMatrix();
        this.bounds = options.worldBounds;
    }

    /**
     * Subscribe to collision events. Returns an unsubscribe function.
     */
    onEvent(kind: CollisionEventKind, handler: CollisionHandler): () => void {
        this.handlers[kind].push(handler);
        return () => {
            const list = this.handlers[kind];
            const index = list.indexOf(handler);
            if (index !== -1) list.splice(index, 1);
        };
    }

    /**
     * Candidate pairs from the spatial hash, (low, high), layer-filtered, ascending.
     */
    private broadPhase(bodies: readonly Body[], boxes: ReadonlyMap<EntityId, AABB2D>): EntityPair[] {
        const byId = new Map<EntityId, Body>();
        for (const body of bodies) byId.set(body.id, body);
        const pairs: EntityPair[] = [];
        for (const body of bodies) {
            const box = boxes.get(body.id);
            if (!box) continue;

            const candidates = [...this.spatial.queryRegion(box)]
                .filter(other => other > body.id)
                .sort((x, y) => x - y);

            for (const otherId of candidates) {
                const other = byId.get(otherId);
                if (!other) continue;
                if (!this.layers.shouldCollide(body.hitbox.layer, other.hitbox.layer)) continue;
                pairs.push({ a: body.id, b: otherId });
            }
        }
        return pairs.sort(comparePairs);
    }

    /**
     * Run detection, resolution and event dispatch for one tick.
     *
     * @param isSimulated Entities for which this returns false are treated as
     *   static: they push others but never move.
     */
    step(world: World, isSimulated: (id: EntityId) => boolean = () => true): CollisionStepResult {
        const { bodies, boxes, byId } = this.collect(world, isSimulated);

        const pairs: EntityPair[] = [];
        const triggerCandidates: EntityPair[] = [];
        const contacts: Contact2D[] = [];

        for (const pair of this.broadPhase(bodies, boxes)) {
            const a = byId.get(pair.a);
            const b = byId.get(pair.b);
            if (!a || !b) continue;

            if (a.hitbox.mode === 'solid' && b.hitbox.mode === 'solid') {
                // Earlier pairs may have moved either side; test current boxes
                const contact = this.resolve(a, b);
                if (contact) {
                    pairs.push(pair);
                    contacts.push(contact);
                }
            } else {
                triggerCandidates.push(pair);
            }
        }

        // Trigger overlap is judged on the fully resolved positions
        const triggerPairs = triggerCandidates.filter(pair => {
            const a = byId.get(pair.a);
            const b = byId.get(pair.b);
            return a !== undefined && b !== undefined
                && aabb2DOverlap(aabbOfHitbox(a.transform, a.hitbox), aabbOfHitbox(b.transform, b.hitbox));
        });
        pairs.push(...triggerPairs);
        pairs.sort(comparePairs);

        const events = this.triggers.update(triggerPairs);
        this.dispatch(events);

        return { pairs, contacts, events };
    }

    clear(): void {
        this.spatial.clear();
        this.triggers.clear();
    }

    private collect(world: World, isSimulated: (id: EntityId) => boolean): {
        bodies: Body[];
        boxes: Map<EntityId, AABB2D>;
        byId: Map<EntityId, Body>;
    } {
        const bodies: Body[] = [];
        for (const id of world.query([ComponentType.Transform, ComponentType.Hitbox])) {
            const transform = world.getComponent(id, ComponentType.Transform);
            const hitbox = world.getComponent(id, ComponentType.Hitbox);
            if (!transform || !hitbox) continue;
            bodies.push({ id, transform, hitbox, invMass: inverseMass(hitbox, isSimulated(id)) });
        }
        bodies.sort((x, y) => x.id - y.id);

        const boxes = new Map<EntityId, AABB2D>();
        const byId = new Map<EntityId, Body>();
        for (const body of bodies) {
            boxes.set(body.id, aabbOfHitbox(body.transform, body.hitbox));
            byId.set(body.id, body);
        }
        this.spatial.rebuild(boxes);

        return { bodies, boxes, byId };
    }

    private resolve(a: Body, b: Body): Contact2D | null {
        const separation = computeSeparation(
            aabbOfHitbox(a.transform, a.hitbox),
            aabbOfHitbox(b.transform, b.hitbox)
        );
        if (!separation) return null;

        const { normal, depth } = separation;
        const totalInvMass = a.invMass + b.invMass;
        let shareA = 0;
        let shareB = 0;
        if (totalInvMass > 0) {
            shareA = (depth * a.invMass) / totalInvMass;
            shareB = (depth * b.invMass) / totalInvMass;
        }

        const moveA = along(normal, -shareA);
        const moveB = along(normal, shareB);
        this.displace(a.transform, moveA);
        this.displace(b.transform, moveB);

        return { a: a.id, b: b.id, normal, depth, moveA, moveB };
    }

    private displace(transform: Transform, delta: Vec2): void {
        if (delta.x === 0 && delta.y === 0) return;
        const b = this.bounds;
        transform.position.x = clamp(transform.position.x + delta.x, b.minX, b.maxX);
        transform.position.y = clamp(transform.position.y + delta.y, b.minY, b.maxY);
    }

    private dispatch(events: readonly CollisionEvent[]): void {
        for (const event of events) {
            for (const handler of [...this.handlers[event.kind]]) {
                try {
                    handler(event);
                } catch (error) {
                    log.error(`Collision ${event.kind} handler failed for ${event.a}/${event.b}:`, error);
                    throw error;
                }
            }
        }
    }
}
