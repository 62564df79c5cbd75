/**
 * Health Mutation
 *
 * The only way health changes. Damage marks a pending hit that the state
 * machine turns into Hurt (and then Dead) on its next update.
 */

import { ActionState } from '../components';
import { ComponentType } from '../core/component';
import type { EntityId } from '../core/entity-id';
import type { World } from '../core/world';

function clampHealth(value: number, maxHealth: number): number {
    return Math.min(maxHealth, Math.max(0, value));
}

/**
 * Apply damage. Ignored (returns false) while invulnerable, once dead, for
 * a non-finite amount, or when the entity has no Character.
 */
export function applyDamage(world: World, id: EntityId, amount: number): boolean {
    if (!Number.isFinite(amount)) return false;
    const character = world.getComponent(id, ComponentType.Character);
    if (!character) return false;
    if (character.actionState === ActionState.Dead || character.invulnerableTicks > 0) return false;

    character.health = clampHealth(character.health - Math.max(0, amount), character.maxHealth);
    character.pendingHit = true;
    return true;
}

/**
 * Restore health up to maxHealth. The dead stay dead.
 */
export function applyHealing(world: World, id: EntityId, amount: number): boolean {
    if (!Number.isFinite(amount)) return false;
    const character = world.getComponent(id, ComponentType.Character);
    if (!character || character.actionState === ActionState.Dead) return false;

    character.health = clampHealth(character.health + Math.max(0, amount), character.maxHealth);
    return true;
}
