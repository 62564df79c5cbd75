/**
 * Input Commands
 *
 * One InputCommand per client per tick. The sequence is assigned by the
 * client and is strictly increasing; the server echoes the last one it
 * processed back as `ackSequence`.
 */

import type { Vec2 } from '../math/vec';

/** Bit flags for discrete actions pressed during a tick. */
export enum ActionFlags {
    None = 0,
    Jump = 1,
    Attack = 2,
    Dash = 4
}

export const ALL_ACTION_FLAGS = ActionFlags.Jump | ActionFlags.Attack | ActionFlags.Dash;

/** Flags in the order they are buffered when pressed together. */
export const ACTION_ORDER: readonly ActionFlags[] = [ActionFlags.Attack, ActionFlags.Dash, ActionFlags.Jump];

export interface InputCommand {
    sequence: number;
    tick: number;
    /** Movement direction; components in [-1, 1]. */
    move: Vec2;
    actionFlags: number;
}

export function neutralInput(tick: number = 0): InputCommand {
    return { sequence: 0, tick, move: { x: 0, y: 0 }, actionFlags: ActionFlags.None };
}

export function cloneInput(input: InputCommand): InputCommand {
    return {
        sequence: input.sequence,
        tick: input.tick,
        move: { x: input.move.x, y: input.move.y },
        actionFlags: input.actionFlags
    };
}

function clampAxis(value: number): number {
    if (!Number.isFinite(value)) return 0;
    return value < -1 ? -1 : value > 1 ? 1 : value;
}

/**
 * Clamp a movement vector into [-1, 1] per axis. Applied on both sides before
 * an input is simulated.
 */
export function sanitizeMove(move: Vec2): Vec2 {
    return { x: clampAxis(move.x), y: clampAxis(move.y) };
}
