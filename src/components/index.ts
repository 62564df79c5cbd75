/**
 * Standard Components
 *
 * Plain data records stored per entity by the World. Each has a factory
 * taking overrides, a deep clone and a structural equality used by delta
 * compression and reconciliation.
 */

import { Vec2, vec2Clone, vec2Equals } from '../math/vec';
import { ActionFlags } from '../core/input';

// ============================================
// Transform
// ============================================

export interface Transform {
    position: Vec2;
    velocity: Vec2;
    rotation: number;
    scale: Vec2;
}

export function createTransform(init: Partial<Transform> = {}): Transform {
    return {
        position: vec2Clone(init.position ?? { x: 0, y: 0 }),
        velocity: vec2Clone(init.velocity ?? { x: 0, y: 0 }),
        rotation: init.rotation ?? 0,
        scale: vec2Clone(init.scale ?? { x: 1, y: 1 })
    };
}

export function cloneTransform(t: Transform): Transform {
    return {
        position: vec2Clone(t.position),
        velocity: vec2Clone(t.velocity),
        rotation: t.rotation,
        scale: vec2Clone(t.scale)
    };
}

export function transformEquals(a: Transform, b: Transform): boolean {
    return vec2Equals(a.position, b.position)
        && vec2Equals(a.velocity, b.velocity)
        && a.rotation === b.rotation
        && vec2Equals(a.scale, b.scale);
}

// ============================================
// Hitbox
// ============================================

export type HitboxMode = 'solid' | 'trigger';

/**
 * Axis-aligned box centred on `position + offset`.
 */
export interface Hitbox {
    size: Vec2;
    offset: Vec2;
    /** Collision layer, 0..15 */
    layer: number;
    mode: HitboxMode;
    /** Static boxes never move during resolution */
    isStatic: boolean;
    mass: number;
}

export function createHitbox(init: Partial<Hitbox> = {}): Hitbox {
    return {
        size: vec2Clone(init.size ?? { x: 32, y: 32 }),
        offset: vec2Clone(init.offset ?? { x: 0, y: 0 }),
        layer: init.layer ?? 0,
        mode: init.mode ?? 'solid',
        isStatic: init.isStatic ?? false,
        mass: init.mass ?? 1
    };
}

export function cloneHitbox(h: Hitbox): Hitbox {
    return {
        size: vec2Clone(h.size),
        offset: vec2Clone(h.offset),
        layer: h.layer,
        mode: h.mode,
        isStatic: h.isStatic,
        mass: h.mass
    };
}

export function hitboxEquals(a: Hitbox, b: Hitbox): boolean {
    return vec2Equals(a.size, b.size)
        && vec2Equals(a.offset, b.offset)
        && a.layer === b.layer
        && a.mode === b.mode
        && a.isStatic === b.isStatic
        && a.mass === b.mass;
}

// ============================================
// Character
// ============================================

export enum ActionState {
    Idle = 0,
    Move = 1,
    Jump = 2,
    Fall = 3,
    Dash = 4,
    Attack = 5,
    Hurt = 6,
    Dead = 7
}

export const ACTION_STATE_COUNT = 8;

/** An action press waiting to be consumed; `age` counts ticks since the press. */
export interface BufferedAction {
    action: ActionFlags;
    age: number;
}

export interface Character {
    health: number;
    maxHealth: number;
    actionState: ActionState;
    /** Ticks spent in the current state */
    stateTicks: number;
    /** Last non-zero movement direction, unit length */
    facing: Vec2;
    altitude: number;
    verticalSpeed: number;
    invulnerableTicks: number;
    /** Set by applyDamage, consumed by the state machine */
    pendingHit: boolean;
    buffer: BufferedAction[];
}

export function createCharacter(init: Partial<Character> = {}): Character {
    const maxHealth = init.maxHealth ?? 100;
    return {
        health: init.health ?? maxHealth,
        maxHealth,
        actionState: init.actionState ?? ActionState.Idle,
        stateTicks: init.stateTicks ?? 0,
        facing: vec2Clone(init.facing ?? { x: 1, y: 0 }),
        altitude: init.altitude ?? 0,
        verticalSpeed: init.verticalSpeed ?? 0,
        invulnerableTicks: init.invulnerableTicks ?? 0,
        pendingHit: init.pendingHit ?? false,
        buffer: (init.buffer ?? []).map(b => ({ action: b.action, age: b.age }))
    };
}

export function cloneCharacter(c: Character): Character {
    return {
        health: c.health,
        maxHealth: c.maxHealth,
        actionState: c.actionState,
        stateTicks: c.stateTicks,
        facing: vec2Clone(c.facing),
        altitude: c.altitude,
        verticalSpeed: c.verticalSpeed,
        invulnerableTicks: c.invulnerableTicks,
        pendingHit: c.pendingHit,
        buffer: c.buffer.map(b => ({ action: b.action, age: b.age }))
    };
}

export function characterEquals(a: Character, b: Character): boolean {
    if (a.buffer.length !== b.buffer.length) return false;
    for (let i = 0; i < a.buffer.length; i++) {
        if (a.buffer[i].action !== b.buffer[i].action || a.buffer[i].age !== b.buffer[i].age) {
            return false;
        }
    }
    return a.health === b.health
        && a.maxHealth === b.maxHealth
        && a.actionState === b.actionState
        && a.stateTicks === b.stateTicks
        && vec2Equals(a.facing, b.facing)
        && a.altitude === b.altitude
        && a.verticalSpeed === b.verticalSpeed
        && a.invulnerableTicks === b.invulnerableTicks
        && a.pendingHit === b.pendingHit;
}

// ============================================
// Controller
// ============================================

/**
 * Marks an entity as driven by a client's input stream.
 */
export interface Controller {
    clientId: number;
    /** Last input sequence applied to this entity */
    lastSequence: number;
}

export function createController(init: Partial<Controller> = {}): Controller {
    return {
        clientId: init.clientId ?? 0,
        lastSequence: init.lastSequence ?? 0
    };
}

export function cloneController(c: Controller): Controller {
    return { clientId: c.clientId, lastSequence: c.lastSequence };
}

export function controllerEquals(a: Controller, b: Controller): boolean {
    return a.clientId === b.clientId && a.lastSequence === b.lastSequence;
}
