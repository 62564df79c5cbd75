/**
 * Character Input Buffer
 *
 * Action presses wait here until a state can act on them, so a dash pressed
 * during the last frames of an attack fires the moment the attack ends.
 * Entries carry their age in ticks rather than an absolute tick so a buffer
 * compares equal on server and client regardless of tick numbering.
 */

import type { BufferedAction } from '../components';
import { ACTION_ORDER, ActionFlags } from '../core/input';

/**
 * Age every entry by one tick and evict those older than `windowTicks`.
 */
export function ageBuffer(buffer: BufferedAction[], windowTicks: number): void {
    let write = 0;
    for (let read = 0; read < buffer.length; read++) {
        const entry = buffer[read];
        entry.age++;
        if (entry.age <= windowTicks) {
            buffer[write++] = entry;
        }
    }
    buffer.length = write;
}

/**
 * Record the actions pressed this tick. A press of an action that is already
 * waiting refreshes it instead of queueing a duplicate.
 */
export function pushPresses(buffer: BufferedAction[], actionFlags: number): void {
    for (const action of ACTION_ORDER) {
        if ((actionFlags & action) === 0) continue;

        const existing = buffer.findIndex(entry => entry.action === action);
        if (existing !== -1) {
            buffer.splice(existing, 1);
        }
        buffer.push({ action, age: 0 });
    }
}

export function hasAction(buffer: readonly BufferedAction[], action: ActionFlags): boolean {
    return buffer.some(entry => entry.action === action);
}

/**
 * Remove the oldest entry for `action`. Returns false if none was waiting.
 */
export function consumeAction(buffer: BufferedAction[], action: ActionFlags): boolean {
    const index = buffer.findIndex(entry => entry.action === action);
    if (index === -1) return false;
    buffer.splice(index, 1);
    return true;
}
