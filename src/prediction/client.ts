/**
 * Predicting Game Client
 *
 * Mirrors the server world locally. The entity this client owns is
 * simulated immediately for every local input and reconciled against each
 * authoritative snapshot; every other entity is rendered from an
 * interpolation buffer a fixed delay behind real time.
 *
 * The flow:
 * 1. applyLocalInput() numbers the input, predicts it, records the result
 *    and sends it
 * 2. receive() drains the transport, rebuilds server state from deltas,
 *    acknowledges it and reconciles the owned entity
 * 3. getRenderState() serves the renderer
 */

import { decodePacket, encodeAck, encodeInput, Packet, PacketType, WelcomeMessage } from '../codec';
import type { SimulationConfigInput } from '../config';
import { ComponentType, getRecord } from '../core/component';
import type { EntityId } from '../core/entity-id';
import { ALL_ACTION_FLAGS, InputCommand, cloneInput, sanitizeMove } from '../core/input';
import type { TickOverrunReport } from '../core/system';
import type { EntityRecord, World } from '../core/world';
import { MalformedPacketError, formatEntityId } from '../errors';
import { createLogger } from '../logger';
import { Vec2, vec2Clone, vec2MaxAxisError } from '../math/vec';
import type { ClientTransport } from '../net/transport';
import { Simulation } from '../simulation';
import { SnapshotHistory } from '../sync/snapshot-history';
import {
    FULL_SNAPSHOT_BASE,
    SnapshotDelta,
    WorldSnapshot,
    applyDelta,
    cloneEntityRecord
} from '../sync/state-delta';
import { InterpolationBuffer } from './interpolation';
import { PredictionHistory } from './prediction-history';
import type { PredictionStats, ReconcileResult, RenderState } from './types';

const log = createLogger('client');

export interface GameClientOptions {
    transport: ClientTransport;
    config?: SimulationConfigInput;
    /** Milliseconds; stamps received samples and drives interpolation */
    now?: () => number;
    onTickOverrun?: (report: TickOverrunReport) => void;
}

/**
 * Largest per-axis error between predicted and authoritative position and
 * velocity. Differing action states count as infinite error.
 */
export function predictionError(predicted: EntityRecord, authoritative: EntityRecord): number {
    const p = getRecord(predicted.components, ComponentType.Transform);
    const a = getRecord(authoritative.components, ComponentType.Transform);
    if (!p || !a) return p === a ? 0 : Infinity;

    const pc = getRecord(predicted.components, ComponentType.Character);
    const ac = getRecord(authoritative.components, ComponentType.Character);
    if (pc?.actionState !== ac?.actionState) return Infinity;

    return Math.max(
        vec2MaxAxisError(p.position, a.position),
        vec2MaxAxisError(p.velocity, a.velocity)
    );
}

export class GameClient {
    readonly simulation: Simulation;
    private readonly transport: ClientTransport;
    private readonly now: () => number;
    private readonly history: PredictionHistory;
    private readonly snapshots: SnapshotHistory;
    private interpolation = new Map<EntityId, InterpolationBuffer>();

    private _clientId: number | undefined;
    private _entityId: EntityId | undefined;
    private sequence = 0;
    private lastServerTick = 0;
    private lastAckSequence = 0;

    private stats: Omit<PredictionStats, 'pendingInputs'> = {
        snapshotsApplied: 0,
        snapshotsDropped: 0,
        malformedPackets: 0,
        corrections: 0,
        replayedInputs: 0,
        lastError: 0
    };

    constructor(options: GameClientOptions) {
        this.transport = options.transport;
        this.now = options.now ?? (() => performance.now());
        this.simulation = new Simulation(options.config, {
            scheduler: { now: this.now, onTickOverrun: options.onTickOverrun }
        });
        this.history = new PredictionHistory(this.simulation.config.predictionHistorySize);
        this.snapshots = new SnapshotHistory(this.simulation.config.snapshotHistorySize);
    }

    get world(): World {
        return this.simulation.world;
    }

    get clientId(): number | undefined {
        return this._clientId;
    }

    /** The entity this client controls, once the server has said which. */
    get entityId(): EntityId | undefined {
        return this._entityId;
    }

    /** Newest server tick applied. */
    get serverTick(): number {
        return this.lastServerTick;
    }

    getStats(): PredictionStats {
        return { ...this.stats, pendingInputs: this.history.after(this.lastAckSequence).length };
    }

    // ==========================================
    // Input
    // ==========================================

    /**
     * Number, predict and send one input. Prediction starts once the owned
     * entity is known; earlier inputs are only sent.
     */
    applyLocalInput(move: Vec2, actionFlags: number): InputCommand {
        const input: InputCommand = {
            sequence: ++this.sequence,
            tick: this.lastServerTick,
            move: sanitizeMove(move),
            actionFlags: actionFlags & ALL_ACTION_FLAGS
        };

        const owned = this.ownedEntity();
        if (owned !== undefined) {
            this.simulate(owned, input);
            const state = this.world.snapshotEntity(owned);
            if (state) {
                this.history.push({ sequence: input.sequence, input: cloneInput(input), state });
            }
        }

        this.transport.send(encodeInput(input));
        return input;
    }

    // ==========================================
    // Inbound
    // ==========================================

    /**
     * Drain the transport. Returns one result per snapshot that reconciled
     * the owned entity.
     */
    receive(): ReconcileResult[] {
        const now = this.now();
        const results: ReconcileResult[] = [];

        for (const bytes of this.transport.receive()) {
            let packet: Packet;
            try {
                packet = decodePacket(bytes);
            } catch (error) {
                if (!(error instanceof MalformedPacketError)) throw error;
                this.stats.malformedPackets++;
                log.warn(`Dropped packet: ${error.message}`);
                continue;
            }

            switch (packet.type) {
                case PacketType.Welcome:
                    this.handleWelcome(packet.welcome);
                    break;
                case PacketType.Snapshot: {
                    const result = this.handleSnapshot(packet.snapshot, now);
                    if (result) results.push(result);
                    break;
                }
                default:
                    this.stats.malformedPackets++;
                    log.warn(`Dropped unexpected packet type ${packet.type}`);
                    break;
            }
        }
        return results;
    }

    /**
     * Compare the owned entity's prediction for `ackSequence` with the
     * server's state. Within reconciliationEpsilon nothing changes; beyond
     * it the server state is adopted and every later input is replayed.
     */
    reconcile(authoritative: EntityRecord, ackSequence: number): ReconcileResult {
        const owned = this.ownedEntity();
        if (owned === undefined) {
            return { corrected: false, replayed: 0, error: 0 };
        }

        this.lastAckSequence = Math.max(this.lastAckSequence, ackSequence);
        this.history.discardBefore(ackSequence);

        const entry = this.history.get(ackSequence);
        const pending = this.history.after(ackSequence);
        const predicted = entry?.state ?? (pending.length === 0 ? this.world.snapshotEntity(owned) : undefined);
        const error = predicted ? predictionError(predicted, authoritative) : Infinity;
        this.stats.lastError = error;

        if (error <= this.simulation.config.reconciliationEpsilon) {
            return { corrected: false, replayed: 0, error };
        }

        this.world.restoreEntity(owned, authoritative);
        if (entry) entry.state = cloneEntityRecord(authoritative);

        for (const next of pending) {
            this.simulate(owned, next.input);
            const state = this.world.snapshotEntity(owned);
            if (state) next.state = state;
        }

        this.stats.corrections++;
        this.stats.replayedInputs += pending.length;
        log.debug(`corrected entity ${formatEntityId(owned)} at sequence ${ackSequence}: error ${error}, replayed ${pending.length}`);
        return { corrected: true, replayed: pending.length, error };
    }

    private handleWelcome(welcome: WelcomeMessage): void {
        if (this._entityId !== welcome.entityId) {
            this.history.clear();
        }
        this._clientId = welcome.clientId;
        this._entityId = welcome.entityId;
        this.simulation.setTick(welcome.tick);

        if (welcome.tickRate !== this.simulation.config.tickRate) {
            log.warn(`Server ticks at ${welcome.tickRate}Hz, client configured for ${this.simulation.config.tickRate}Hz`);
        }
        log.info(`Joined as client ${welcome.clientId}, entity ${formatEntityId(welcome.entityId)}`);
    }

    private handleSnapshot(delta: SnapshotDelta, now: number): ReconcileResult | undefined {
        if (delta.tick <= this.lastServerTick) {
            this.stats.snapshotsDropped++;
            log.debug(`ignored stale snapshot ${delta.tick}`);
            return undefined;
        }

        const base = delta.baseTick === FULL_SNAPSHOT_BASE ? undefined : this.snapshots.get(delta.baseTick);
        if (delta.baseTick !== FULL_SNAPSHOT_BASE && !base) {
            this.stats.snapshotsDropped++;
            log.debug(`snapshot ${delta.tick} needs missing base ${delta.baseTick}`);
            return undefined;
        }

        const state = applyDelta(base, delta);
        this.snapshots.save(state);
        this.lastServerTick = delta.tick;
        this.stats.snapshotsApplied++;
        this.transport.send(encodeAck(delta.tick));

        return this.mirror(state, delta.ackSequence, now);
    }

    /**
     * Bring the local world in line with a server state.
     */
    private mirror(state: WorldSnapshot, ackSequence: number, now: number): ReconcileResult | undefined {
        const world = this.world;
        for (const id of world.entities()) {
            if (!state.entities.has(id)) {
                world.destroyEntity(id);
                this.interpolation.delete(id);
            }
        }

        let result: ReconcileResult | undefined;
        for (const [id, record] of state.entities) {
            const isNew = !world.isAlive(id);
            if (isNew && !world.createEntityWithId(id)) {
                log.warn(`Could not mirror entity ${formatEntityId(id)}`);
                continue;
            }

            if (id === this._entityId) {
                if (isNew) {
                    world.restoreEntity(id, record);
                    this.lastAckSequence = Math.max(this.lastAckSequence, ackSequence);
                } else {
                    result = this.reconcile(record, ackSequence);
                }
                continue;
            }

            world.restoreEntity(id, record);
            this.pushSample(id, record, now);
        }
        return result;
    }

    private pushSample(id: EntityId, record: EntityRecord, now: number): void {
        const transform = getRecord(record.components, ComponentType.Transform);
        if (!transform) return;

        let buffer = this.interpolation.get(id);
        if (!buffer) {
            buffer = new InterpolationBuffer();
            this.interpolation.set(id, buffer);
        }
        buffer.push({
            time: now,
            position: transform.position,
            rotation: transform.rotation,
            scale: transform.scale,
            actionState: getRecord(record.components, ComponentType.Character)?.actionState
        });
    }

    // ==========================================
    // Rendering
    // ==========================================

    /**
     * Render state for one entity: the owned entity from the predicted
     * world, everything else interpolated `interpolationDelayMs` behind.
     */
    getRenderState(id: EntityId, now: number = this.now()): RenderState | undefined {
        if (id !== this._entityId) {
            const buffer = this.interpolation.get(id);
            if (buffer) {
                const renderTime = now - this.simulation.config.interpolationDelayMs;
                const state = buffer.sample(renderTime);
                buffer.prune(renderTime);
                return state;
            }
        }

        const transform = this.world.getComponent(id, ComponentType.Transform);
        if (!transform) return undefined;
        return {
            position: vec2Clone(transform.position),
            rotation: transform.rotation,
            scale: vec2Clone(transform.scale),
            actionState: this.world.getComponent(id, ComponentType.Character)?.actionState
        };
    }

    /** Render state of every mirrored entity. */
    getRenderStates(now: number = this.now()): Map<EntityId, RenderState> {
        const states = new Map<EntityId, RenderState>();
        for (const id of this.world.entities()) {
            const state = this.getRenderState(id, now);
            if (state) states.set(id, state);
        }
        return states;
    }

    close(): void {
        this.transport.close?.();
    }

    // ==========================================
    // Internals
    // ==========================================

    private ownedEntity(): EntityId | undefined {
        const id = this._entityId;
        return id !== undefined && this.world.isAlive(id) ? id : undefined;
    }

    private simulate(owned: EntityId, input: InputCommand): void {
        this.simulation.step(new Map([[owned, input]]), id => id === owned);
    }
}
