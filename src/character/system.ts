/**
 * Character State Machine System
 *
 * Per simulated character, every tick:
 * 1. age the input buffer and advance stateTicks
 * 2. record this tick's presses (an attack takes them only in its recovery
 *    frames) and evaluate the state's transition rules
 * 3. write velocity (and altitude) for the resulting state
 *
 * Runs before movement so the velocity it writes is integrated the same tick.
 */

import { ActionState, Character } from '../components';
import { SimulationConfig, inputBufferTicks } from '../config';
import { ComponentType } from '../core/component';
import { neutralInput, sanitizeMove } from '../core/input';
import type { System, TickContext } from '../core/system';
import { Vec2, vec2Length, vec2Normalize, vec2Scale } from '../math/vec';
import { ageBuffer, consumeAction, hasAction, pushPresses } from './input-buffer';
import { TRANSITIONS, TransitionContext, inAttackRecovery } from './transitions';

export const CHARACTER_PRIORITY = 100;

export interface StateChange {
    from: ActionState;
    to: ActionState;
}

function enterState(character: Character, to: ActionState, ctx: TickContext): void {
    character.actionState = to;
    character.stateTicks = 0;

    switch (to) {
        case ActionState.Jump:
            character.verticalSpeed = ctx.config.jumpSpeed;
            break;
        case ActionState.Hurt:
            character.pendingHit = false;
            character.invulnerableTicks = ctx.config.invulnerabilityTicks;
            break;
        case ActionState.Dead:
            character.pendingHit = false;
            break;
        default:
            break;
    }
}

function acceptsPresses(character: Character, config: Readonly<SimulationConfig>): boolean {
    if (character.actionState === ActionState.Dead) return false;
    return character.actionState !== ActionState.Attack || inAttackRecovery(character, config);
}

/**
 * Evaluate the transition table once. Returns the change taken, if any.
 */
export function stepCharacter(character: Character, move: Vec2, actionFlags: number, ctx: TickContext): StateChange | undefined {
    const config = ctx.config;

    ageBuffer(character.buffer, inputBufferTicks(config));
    if (character.invulnerableTicks > 0) character.invulnerableTicks--;
    character.stateTicks++;

    if (acceptsPresses(character, config)) {
        pushPresses(character.buffer, actionFlags);
    }

    const moving = move.x !== 0 || move.y !== 0;
    if (moving && character.actionState !== ActionState.Dash) {
        character.facing = vec2Normalize(move);
    }

    const from = character.actionState;
    const tctx: TransitionContext = { character, config, moving };
    let change: StateChange | undefined;

    for (const rule of TRANSITIONS[from]) {
        if (rule.action !== undefined && !hasAction(character.buffer, rule.action)) continue;
        if (!rule.when(tctx)) continue;

        if (rule.action !== undefined) consumeAction(character.buffer, rule.action);
        enterState(character, rule.to, ctx);
        change = { from, to: rule.to };
        break;
    }

    return change;
}

/**
 * Velocity and altitude for the state the character is in after stepCharacter.
 */
export function applyLocomotion(character: Character, velocity: Vec2, move: Vec2, ctx: TickContext): void {
    const config = ctx.config;
    let next: Vec2;

    switch (character.actionState) {
        case ActionState.Move:
        case ActionState.Jump:
        case ActionState.Fall:
            next = vec2Scale(vec2Length(move) > 1 ? vec2Normalize(move) : move, config.moveSpeed);
            break;
        case ActionState.Dash:
            next = vec2Scale(character.facing, config.dashSpeed);
            break;
        default:
            next = { x: 0, y: 0 };
            break;
    }
    velocity.x = next.x;
    velocity.y = next.y;

    if (character.actionState === ActionState.Jump || character.actionState === ActionState.Fall) {
        character.altitude += character.verticalSpeed * ctx.dt;
        character.verticalSpeed -= config.gravity * ctx.dt;
        if (character.altitude <= 0) {
            character.altitude = 0;
            character.verticalSpeed = 0;
        }
    }
}

export interface CharacterSystemOptions {
    priority?: number;
    onStateChange?: (id: number, change: StateChange) => void;
}

export function createCharacterSystem(options: CharacterSystemOptions = {}): System {
    return {
        name: 'character',
        priority: options.priority ?? CHARACTER_PRIORITY,
        requiredComponents: [ComponentType.Transform, ComponentType.Character],
        enabled: true,
        update(entities, ctx) {
            for (const id of entities) {
                if (!ctx.isSimulated(id)) continue;
                const transform = ctx.world.getComponent(id, ComponentType.Transform);
                const character = ctx.world.getComponent(id, ComponentType.Character);
                if (!transform || !character) continue;

                const input = ctx.inputs.get(id) ?? neutralInput(ctx.tick);
                const move = sanitizeMove(input.move);

                const change = stepCharacter(character, move, input.actionFlags, ctx);
                applyLocomotion(character, transform.velocity, move, ctx);

                if (change) options.onStateChange?.(id, change);
            }
        }
    };
}
