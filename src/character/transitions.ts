/**
 * Character Transition Table
 *
 * Each state lists its outgoing rules in priority order; the first rule
 * whose condition holds wins and at most one transition happens per tick.
 * A rule naming an `action` additionally needs that action waiting in the
 * input buffer, and consumes it when taken.
 */

import { ActionState, Character } from '../components';
import type { SimulationConfig } from '../config';
import { ActionFlags } from '../core/input';

export interface TransitionContext {
    readonly character: Character;
    readonly config: Readonly<SimulationConfig>;
    /** Movement input is non-zero this tick */
    readonly moving: boolean;
}

export interface TransitionRule {
    readonly to: ActionState;
    readonly action?: ActionFlags;
    readonly when: (ctx: TransitionContext) => boolean;
}

const always = (): boolean => true;

function grounded(ctx: TransitionContext): boolean {
    return ctx.character.altitude <= 0 && ctx.character.verticalSpeed <= 0;
}

function attackFinished(ctx: TransitionContext): boolean {
    return ctx.character.stateTicks >= ctx.config.attackTicks;
}

function dashFinished(ctx: TransitionContext): boolean {
    return ctx.character.stateTicks >= ctx.config.dashTicks;
}

function hurtFinished(ctx: TransitionContext): boolean {
    return ctx.character.stateTicks >= ctx.config.hurtTicks;
}

const HIT: TransitionRule = { to: ActionState.Hurt, when: ctx => ctx.character.pendingHit };

/** Actions available from the ground. */
const GROUND_ACTIONS: readonly TransitionRule[] = [
    { to: ActionState.Attack, action: ActionFlags.Attack, when: grounded },
    { to: ActionState.Dash, action: ActionFlags.Dash, when: always },
    { to: ActionState.Jump, action: ActionFlags.Jump, when: grounded }
];

/**
 * Ground actions that wait for `ready`, so a press buffered during a
 * committed state fires on the tick that state ends.
 */
function groundActionsOnceReady(ready: (ctx: TransitionContext) => boolean): TransitionRule[] {
    return GROUND_ACTIONS.map(rule => ({ ...rule, when: ctx => ready(ctx) && rule.when(ctx) }));
}

export const TRANSITIONS: Readonly<Record<ActionState, readonly TransitionRule[]>> = {
    [ActionState.Idle]: [
        HIT,
        ...GROUND_ACTIONS,
        { to: ActionState.Move, when: ctx => ctx.moving }
    ],
    [ActionState.Move]: [
        HIT,
        ...GROUND_ACTIONS,
        { to: ActionState.Idle, when: ctx => !ctx.moving }
    ],
    [ActionState.Jump]: [
        HIT,
        { to: ActionState.Fall, when: ctx => ctx.character.verticalSpeed <= 0 }
    ],
    [ActionState.Fall]: [
        HIT,
        ...groundActionsOnceReady(grounded),
        { to: ActionState.Move, when: ctx => grounded(ctx) && ctx.moving },
        { to: ActionState.Idle, when: grounded }
    ],
    [ActionState.Dash]: [
        HIT,
        ...groundActionsOnceReady(dashFinished),
        { to: ActionState.Move, when: ctx => dashFinished(ctx) && ctx.moving },
        { to: ActionState.Idle, when: dashFinished }
    ],
    [ActionState.Attack]: [
        HIT,
        { to: ActionState.Dash, action: ActionFlags.Dash, when: attackFinished },
        { to: ActionState.Attack, action: ActionFlags.Attack, when: attackFinished },
        { to: ActionState.Jump, action: ActionFlags.Jump, when: attackFinished },
        { to: ActionState.Move, when: ctx => attackFinished(ctx) && ctx.moving },
        { to: ActionState.Idle, when: attackFinished }
    ],
    [ActionState.Hurt]: [
        { to: ActionState.Dead, when: ctx => ctx.character.health <= 0 },
        HIT,
        ...groundActionsOnceReady(hurtFinished),
        { to: ActionState.Idle, when: hurtFinished }
    ],
    [ActionState.Dead]: []
};

/**
 * True during the trailing recovery frames of an attack. Presses are only
 * buffered outside an attack or inside its recovery frames.
 */
export function inAttackRecovery(character: Character, config: Readonly<SimulationConfig>): boolean {
    return character.actionState === ActionState.Attack
        && character.stateTicks >= config.attackTicks - config.attackRecoveryTicks;
}
