/**
 * Command Buffer
 *
 * Structural mutations requested while systems iterate are recorded here and
 * applied by `World.flush()` at the end of the tick, in the order they were
 * issued.
 */

import type { ComponentData, ComponentType } from './component';
import type { EntityId } from './entity-id';

export type WorldCommand =
    | { kind: 'spawn'; id: EntityId }
    | { kind: 'destroy'; id: EntityId }
    | { kind: 'add'; id: EntityId; apply: (world: CommandTarget) => void }
    | { kind: 'remove'; id: EntityId; type: ComponentType };

/** The subset of the World a flushed command needs. */
export interface CommandTarget {
    addComponent<K extends ComponentType>(id: EntityId, type: K, data: ComponentData[K]): unknown;
}

export class CommandBuffer {
    private commands: WorldCommand[] = [];

    spawn(id: EntityId): void {
        this.commands.push({ kind: 'spawn', id });
    }

    destroy(id: EntityId): void {
        this.commands.push({ kind: 'destroy', id });
    }

    add<K extends ComponentType>(id: EntityId, type: K, data: ComponentData[K]): void {
        // The closure keeps the type/data correlation that a plain union field would lose
        this.commands.push({ kind: 'add', id, apply: target => target.addComponent(id, type, data) });
    }

    remove(id: EntityId, type: ComponentType): void {
        this.commands.push({ kind: 'remove', id, type });
    }

    get length(): number {
        return this.commands.length;
    }

    /**
     * Take every recorded command, leaving the buffer empty.
     */
    drain(): WorldCommand[] {
        const drained = this.commands;
        this.commands = [];
        return drained;
    }

    clear(): void {
        this.commands.length = 0;
    }
}
