/**
 * Simulation
 *
 * One side's world plus the systems that advance it: character, movement
 * and collision, in that order. The server and every client each own one.
 */

import { createCharacter, createController, createHitbox, createTransform } from './components';
import type { SimulationConfig, SimulationConfigInput } from './config';
import { resolveConfig, tickDt } from './config';
import { ComponentType } from './core/component';
import type { EntityId } from './core/entity-id';
import type { InputCommand } from './core/input';
import { SchedulerOptions, SystemScheduler, TickContext } from './core/system';
import { World } from './core/world';
import { createCharacterSystem, CharacterSystemOptions } from './character';
import { createMovementSystem } from './plugins/movement';
import { CollisionEngine, CollisionSystem, LayerMatrix, createCollisionSystem } from './plugins/physics2d';
import type { Vec2 } from './math/vec';

export interface SimulationOptions {
    capacity?: number;
    layers?: LayerMatrix;
    scheduler?: SchedulerOptions;
    onStateChange?: CharacterSystemOptions['onStateChange'];
}

const NO_INPUTS: ReadonlyMap<EntityId, InputCommand> = new Map();
const SIMULATE_ALL = (): boolean => true;

export class Simulation {
    readonly config: Readonly<SimulationConfig>;
    readonly world: World;
    readonly scheduler: SystemScheduler;
    readonly collision: CollisionSystem;

    private _tick = 0;

    constructor(config: SimulationConfigInput = {}, options: SimulationOptions = {}) {
        this.config = resolveConfig(config);
        this.world = new World(options.capacity);
        this.scheduler = new SystemScheduler(options.scheduler);

        const engine = new CollisionEngine({
            cellSize: this.config.cellSize,
            worldBounds: this.config.worldBounds,
            layers: options.layers
        });
        this.collision = createCollisionSystem(engine);

        this.scheduler.add(createCharacterSystem({ onStateChange: options.onStateChange }));
        this.scheduler.add(createMovementSystem());
        this.scheduler.add(this.collision);
    }

    /** Last tick run by step(). */
    get tick(): number {
        return this._tick;
    }

    /**
     * Advance one tick.
     * @param inputs Input per controlled entity; entities without one get a neutral input
     */
    step(
        inputs: ReadonlyMap<EntityId, InputCommand> = NO_INPUTS,
        isSimulated: (id: EntityId) => boolean = SIMULATE_ALL
    ): number {
        this._tick++;
        this.runTick(this._tick, inputs, isSimulated);
        return this._tick;
    }

    /**
     * Run the systems once labelled as `tick` without moving the tick
     * counter. Clients use this for prediction and replay.
     */
    runTick(
        tick: number,
        inputs: ReadonlyMap<EntityId, InputCommand> = NO_INPUTS,
        isSimulated: (id: EntityId) => boolean = SIMULATE_ALL
    ): void {
        const ctx: TickContext = {
            world: this.world,
            tick,
            dt: tickDt(this.config),
            config: this.config,
            inputs,
            isSimulated
        };
        this.scheduler.runTick(ctx);
    }

    /** Jump the tick counter, e.g. to the server tick a client joined at. */
    setTick(tick: number): void {
        this._tick = tick;
    }
}

export interface PlayerSpawn {
    clientId: number;
    position: Vec2;
}

/**
 * Default spawn position: world centre, spread along X by client id.
 */
export function defaultSpawnPosition(config: Readonly<SimulationConfig>, clientId: number): Vec2 {
    const { minX, minY, maxX, maxY } = config.worldBounds;
    const x = (minX + maxX) / 2 + 64 * (clientId - 1);
    return {
        x: Math.min(maxX, Math.max(minX, x)),
        y: (minY + maxY) / 2
    };
}

/**
 * Spawn a playable character: Transform, Hitbox, Character and a Controller
 * bound to the client.
 */
export function spawnPlayer(world: World, spawn: PlayerSpawn): EntityId {
    const id = world.createEntity();
    world.addComponent(id, ComponentType.Transform, createTransform({ position: { ...spawn.position } }));
    world.addComponent(id, ComponentType.Hitbox, createHitbox());
    world.addComponent(id, ComponentType.Character, createCharacter());
    world.addComponent(id, ComponentType.Controller, createController({ clientId: spawn.clientId }));
    return id;
}
