/**
 * Authoritative Game Server
 *
 * Per tick:
 * 1. Apply connection changes reported by the transport
 * 2. Drain and decode inbound packets, queueing inputs per client
 * 3. Pick each client's next input, run one simulation tick
 * 4. Record the world snapshot and send every client a delta against the
 *    last tick it acknowledged
 * 5. Destroy the entities of clients gone longer than the grace period
 */

import { encodeSnapshot, encodeWelcome, decodePacket, Packet, PacketType } from '../codec';
import type { SimulationConfigInput } from '../config';
import { ComponentType } from '../core/component';
import type { EntityId } from '../core/entity-id';
import { InputCommand, cloneInput, sanitizeMove } from '../core/input';
import type { TickOverrunReport } from '../core/system';
import type { World } from '../core/world';
import { MalformedPacketError } from '../errors';
import { createLogger } from '../logger';
import type { ServerTransport } from '../net/transport';
import { Simulation, defaultSpawnPosition, spawnPlayer } from '../simulation';
import { SnapshotHistory } from './snapshot-history';
import { captureWorld, computeDelta, SnapshotDelta, WorldSnapshot } from './state-delta';

const log = createLogger('server');

/**
 * Create the entity a newly admitted client controls.
 */
export type SpawnPlayerHook = (world: World, clientId: number) => EntityId;

export interface GameServerOptions {
  transport: ServerTransport;
  config?: SimulationConfigInput;
  spawnPlayer?: SpawnPlayerHook;
  /** Milliseconds; drives the disconnect grace period */
  now?: () => number;
  onTickOverrun?: (report: TickOverrunReport) => void;
}

export interface ClientSession {
  readonly clientId: number;
  entityId: EntityId | undefined;
  connected: boolean;
  /** Last input sequence applied */
  lastSequence: number;
  /** Pending inputs, ascending sequence */
  queue: InputCommand[];
  /** Newest tick the client has acknowledged */
  ackedTick: number | undefined;
  lastFullTick: number | undefined;
  consecutiveMalformed: number;
  /** Last time a valid packet arrived, or when the connection dropped */
  lastHeardMs: number;
}

export interface ServerStats {
  ticks: number;
  clients: number;
  inputsApplied: number;
  inputsDropped: number;
  malformedPackets: number;
  fullSnapshots: number;
  deltaSnapshots: number;
}

export class GameServer {
  readonly simulation: Simulation;
  private readonly transport: ServerTransport;
  private readonly spawnHook: SpawnPlayerHook;
  private readonly now: () => number;
  private readonly history: SnapshotHistory;
  private clients = new Map<number, ClientSession>();

  private stats: ServerStats = {
    ticks: 0,
    clients: 0,
    inputsApplied: 0,
    inputsDropped: 0,
    malformedPackets: 0,
    fullSnapshots: 0,
    deltaSnapshots: 0
  };

  constructor(options: GameServerOptions) {
    this.transport = options.transport;
    this.now = options.now ?? (() => performance.now());
    this.simulation = new Simulation(options.config, {
      scheduler: { now: this.now, onTickOverrun: options.onTickOverrun }
    });
    this.history = new SnapshotHistory(this.simulation.config.snapshotHistorySize);
    this.spawnHook = options.spawnPlayer
      ?? ((world, clientId) => spawnPlayer(world, {
        clientId,
        position: defaultSpawnPosition(this.simulation.config, clientId)
      }));
  }

  get world(): World {
    return this.simulation.world;
  }

  get tick(): number {
    return this.simulation.tick;
  }

  getClient(clientId: number): Readonly<ClientSession> | undefined {
    return this.clients.get(clientId);
  }

  getStats(): ServerStats {
    return { ...this.stats, clients: this.clients.size };
  }

  /**
   * Admit a client, spawning its entity, and send it a Welcome. A client
   * reconnecting within the grace period gets its old entity back.
   */
  connect(clientId: number): ClientSession {
    const existing = this.clients.get(clientId);
    if (existing && existing.connected) return existing;

    const session: ClientSession = existing ?? {
      clientId,
      entityId: undefined,
      connected: true,
      lastSequence: 0,
      queue: [],
      ackedTick: undefined,
      lastFullTick: undefined,
      consecutiveMalformed: 0,
      lastHeardMs: this.now()
    };
    session.connected = true;
    session.ackedTick = undefined;
    session.consecutiveMalformed = 0;
    session.lastHeardMs = this.now();
    // A rejoining client numbers its inputs from 1 again
    session.lastSequence = 0;
    session.queue = [];

    if (session.entityId === undefined || !this.world.isAlive(session.entityId)) {
      session.entityId = this.spawnHook(this.world, clientId);
    } else {
      const controller = this.world.getComponent(session.entityId, ComponentType.Controller);
      if (controller) controller.lastSequence = 0;
    }
    this.clients.set(clientId, session);

    this.transport.sendToClient(clientId, encodeWelcome({
      clientId,
      entityId: session.entityId,
      tick: this.tick,
      tickRate: this.simulation.config.tickRate
    }));
    log.info(`Client ${clientId} ${existing ? 'rejoined' : 'joined'} as entity ${session.entityId}`);
    return session;
  }

  /**
   * Stop a client's input stream. Its entity stays until the grace period
   * runs out.
   */
  disconnect(clientId: number): void {
    const session = this.clients.get(clientId);
    if (!session || !session.connected) return;
    this.markDisconnected(session);
    this.transport.disconnect?.(clientId);
  }

  /**
   * Run one server tick. Returns the tick number.
   */
  step(): number {
    this.applyConnectionEvents();
    this.drainPackets();

    const inputs = new Map<EntityId, InputCommand>();
    for (const session of this.clients.values()) {
      const input = this.nextInput(session);
      if (input && session.entityId !== undefined) {
        inputs.set(session.entityId, input);
      }
    }

    const tick = this.simulation.step(inputs);
    this.stats.ticks++;

    const snapshot = captureWorld(this.world, tick);
    this.history.save(snapshot);
    for (const session of this.clients.values()) {
      if (session.connected) this.sendSnapshot(session, snapshot);
    }

    this.expireSessions();
    return tick;
  }

  // ==========================================
  // Inbound
  // ==========================================

  private applyConnectionEvents(): void {
    const events = this.transport.pollConnectionEvents?.() ?? [];
    for (const event of events) {
      if (event.kind === 'connect') {
        this.connect(event.clientId);
      } else {
        const session = this.clients.get(event.clientId);
        if (session?.connected) this.markDisconnected(session);
      }
    }
  }

  private drainPackets(): void {
    for (const { clientId, bytes } of this.transport.receive()) {
      let session = this.clients.get(clientId);
      if (session && !session.connected) continue;

      let packet: Packet;
      try {
        packet = decodePacket(bytes);
      } catch (error) {
        if (!(error instanceof MalformedPacketError)) throw error;
        this.rejectPacket(clientId, error.message);
        continue;
      }

      session ??= this.connect(clientId);
      switch (packet.type) {
        case PacketType.Input:
          this.enqueueInput(session, packet.input);
          break;
        case PacketType.Ack:
          if (packet.tick <= this.tick) {
            session.ackedTick = Math.max(session.ackedTick ?? 0, packet.tick);
          }
          break;
        default:
          this.rejectPacket(clientId, `unexpected packet type ${packet.type}`);
          continue;
      }
      session.consecutiveMalformed = 0;
      session.lastHeardMs = this.now();
    }
  }

  private rejectPacket(clientId: number, reason: string): void {
    this.stats.malformedPackets++;
    const session = this.clients.get(clientId);
    log.warn(`Dropped packet from client ${clientId}: ${reason}`);
    if (!session) return;

    session.consecutiveMalformed++;
    if (session.consecutiveMalformed > this.simulation.config.maxMalformedPackets) {
      log.warn(`Client ${clientId} sent ${session.consecutiveMalformed} malformed packets in a row, disconnecting`);
      this.disconnect(clientId);
    }
  }

  private enqueueInput(session: ClientSession, input: InputCommand): void {
    const queue = session.queue;
    if (input.sequence <= session.lastSequence || queue.some(q => q.sequence === input.sequence)) {
      this.stats.inputsDropped++;
      return;
    }

    const command = cloneInput(input);
    command.move = sanitizeMove(command.move);

    let at = queue.length;
    while (at > 0 && queue[at - 1].sequence > command.sequence) at--;
    queue.splice(at, 0, command);

    while (queue.length > this.simulation.config.maxQueuedInputs) {
      queue.shift();
      this.stats.inputsDropped++;
    }
  }

  private nextInput(session: ClientSession): InputCommand | undefined {
    if (!session.connected) return undefined;
    const input = session.queue.shift();
    if (!input) return undefined;

    session.lastSequence = input.sequence;
    this.stats.inputsApplied++;
    if (session.entityId !== undefined) {
      const controller = this.world.getComponent(session.entityId, ComponentType.Controller);
      if (controller) controller.lastSequence = input.sequence;
    }
    return input;
  }

  // ==========================================
  // Outbound
  // ==========================================

  private sendSnapshot(session: ClientSession, snapshot: WorldSnapshot): void {
    const config = this.simulation.config;
    const base = session.ackedTick !== undefined ? this.history.get(session.ackedTick) : undefined;
    const fullDue = session.lastFullTick === undefined
      || snapshot.tick - session.lastFullTick >= config.fullSnapshotInterval;

    let delta: SnapshotDelta;
    if (base && !fullDue) {
      delta = computeDelta(base, snapshot, session.lastSequence);
      this.stats.deltaSnapshots++;
    } else {
      delta = computeDelta(undefined, snapshot, session.lastSequence);
      session.lastFullTick = snapshot.tick;
      this.stats.fullSnapshots++;
    }

    this.transport.sendToClient(session.clientId, encodeSnapshot(delta));
  }

  // ==========================================
  // Sessions
  // ==========================================

  private markDisconnected(session: ClientSession): void {
    session.connected = false;
    session.queue = [];
    session.lastHeardMs = this.now();
    log.info(`Client ${session.clientId} disconnected`);
  }

  private expireSessions(): void {
    const now = this.now();
    const grace = this.simulation.config.disconnectGraceMs;

    for (const session of [...this.clients.values()]) {
      if (now - session.lastHeardMs <= grace) continue;

      if (session.connected) {
        log.info(`Client ${session.clientId} silent for ${grace}ms`);
        this.transport.disconnect?.(session.clientId);
      }
      if (session.entityId !== undefined) {
        this.destroyControlledBy(session.clientId);
      }
      this.clients.delete(session.clientId);
      log.info(`Removed client ${session.clientId}`);
    }
  }

  private destroyControlledBy(clientId: number): void {
    const world = this.world;
    for (const id of world.query([ComponentType.Controller]).toArray()) {
      if (world.getComponent(id, ComponentType.Controller)?.clientId === clientId) {
        world.destroyEntity(id);
      }
    }
  }
}
