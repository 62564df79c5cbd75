/**
 * System Scheduler
 *
 * Runs registered systems once per tick in ascending priority; equal
 * priorities keep registration order. Each system receives the entities
 * matching its required components and the tick context. Structural
 * mutations made by systems are deferred and flushed after the last one.
 */

import type { SimulationConfig } from '../config';
import { tickIntervalMs } from '../config';
import { createLogger } from '../logger';
import type { ComponentType } from './component';
import type { EntityId } from './entity-id';
import type { InputCommand } from './input';
import type { Query } from './query';
import type { World } from './world';

const log = createLogger('scheduler');

/**
 * Everything a system may touch during one tick. Passed explicitly; there is
 * no ambient world.
 */
export interface TickContext {
    readonly world: World;
    readonly tick: number;
    /** Seconds */
    readonly dt: number;
    readonly config: Readonly<SimulationConfig>;
    /** Input applied this tick, keyed by the entity it drives */
    readonly inputs: ReadonlyMap<EntityId, InputCommand>;
    /**
     * Whether this side advances the entity's state. A predicting client
     * simulates only its own entity; everything else is treated as fixed.
     */
    isSimulated(id: EntityId): boolean;
}

export interface System {
    readonly name: string;
    /** Lower runs earlier */
    readonly priority: number;
    readonly requiredComponents: readonly ComponentType[];
    enabled: boolean;
    update(entities: Query, ctx: TickContext): void;
}

export interface TickOverrunReport {
    tick: number;
    durationMs: number;
    budgetMs: number;
}

export interface SchedulerOptions {
    /** Monotonic clock in milliseconds */
    now?: () => number;
    onTickOverrun?: (report: TickOverrunReport) => void;
}

interface SystemEntry {
    system: System;
    registration: number;
}

export class SystemScheduler {
    private entries: SystemEntry[] = [];
    private nextRegistration = 0;
    private readonly now: () => number;
    private readonly onTickOverrun?: (report: TickOverrunReport) => void;

    constructor(options: SchedulerOptions = {}) {
        this.now = options.now ?? (() => performance.now());
        this.onTickOverrun = options.onTickOverrun;
    }

    /**
     * Register a system. Returns a function that unregisters it.
     */
    add(system: System): () => void {
        if (this.entries.some(e => e.system.name === system.name)) {
            throw new Error(`System '${system.name}' is already registered`);
        }

        this.entries.push({ system, registration: this.nextRegistration++ });
        this.entries.sort((a, b) => a.system.priority - b.system.priority || a.registration - b.registration);

        return () => this.remove(system.name);
    }

    remove(name: string): boolean {
        const index = this.entries.findIndex(e => e.system.name === name);
        if (index === -1) return false;
        this.entries.splice(index, 1);
        return true;
    }

    get(name: string): System | undefined {
        return this.entries.find(e => e.system.name === name)?.system;
    }

    setEnabled(name: string, enabled: boolean): boolean {
        const system = this.get(name);
        if (!system) return false;
        system.enabled = enabled;
        return true;
    }

    /** Names in execution order. */
    getOrder(): string[] {
        return this.entries.map(e => e.system.name);
    }

    /**
     * Run every enabled system once, then flush deferred mutations.
     * A system that throws is logged and the error re-thrown after the
     * world has been flushed.
     */
    runTick(ctx: TickContext): void {
        const start = this.now();
        const world = ctx.world;

        try {
            for (const { system } of this.entries) {
                if (!system.enabled) continue;

                const entities = world.query(system.requiredComponents);
                try {
                    const result: unknown = world.deferred(() => system.update(entities, ctx));

                    // Check for accidental async systems
                    if (result instanceof Promise) {
                        throw new Error(
                            `System '${system.name}' returned a Promise. ` +
                            `Systems must finish within the tick.`
                        );
                    }
                } catch (error) {
                    log.error(`Error in system '${system.name}' at tick ${ctx.tick}:`, error);
                    throw error;
                }
            }
        } finally {
            world.flush();
        }

        const durationMs = this.now() - start;
        const budgetMs = tickIntervalMs(ctx.config);
        if (durationMs > budgetMs) {
            const report: TickOverrunReport = { tick: ctx.tick, durationMs, budgetMs };
            log.warn(`Tick ${ctx.tick} took ${durationMs.toFixed(2)}ms (budget ${budgetMs.toFixed(2)}ms)`);
            this.onTickOverrun?.(report);
        }
    }

    clear(): void {
        this.entries = [];
        this.nextRegistration = 0;
    }
}
