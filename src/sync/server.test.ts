import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import { GameServer } from './server';
import { LoopbackNetwork } from '../net/loopback';
import type { ClientTransport } from '../net/transport';
import { Packet, PacketType, decodePacket, encodeAck, encodeInput, encodeWelcome } from '../codec';
import { ComponentType, componentBit, maskOf, COMPONENT_TYPES } from '../core/component';
import { ActionFlags } from '../core/input';
import { ActionState } from '../components';
import type { SimulationConfigInput } from '../config';
import { captureLogs, LogCapture } from '../testing/log-capture';

const PLAYER_ARCHETYPE = maskOf(COMPONENT_TYPES);

function drain(client: ClientTransport): Packet[] {
  return client.receive().map(bytes => decodePacket(bytes));
}

function snapshots(packets: Packet[]) {
  return packets.flatMap(p => (p.type === PacketType.Snapshot ? [p.snapshot] : []));
}

function input(sequence: number, x: number = 0, actionFlags: number = ActionFlags.None): Uint8Array {
  return encodeInput({ sequence, tick: 0, move: { x, y: 0 }, actionFlags });
}

describe('GameServer', () => {
  let network: LoopbackNetwork;
  let clock: number;
  let logs: LogCapture;

  function createServer(config: SimulationConfigInput = {}): GameServer {
    return new GameServer({ transport: network.server, config, now: () => clock });
  }

  beforeEach(() => {
    network = new LoopbackNetwork();
    clock = 0;
    logs = captureLogs('info');
  });

  afterEach(() => {
    logs.restore();
  });

  test('a new client is welcomed and sent a full snapshot', () => {
    const server = createServer();
    const client = network.connect();

    expect(server.step()).toBe(1);

    const packets = drain(client);
    expect(packets[0]).toEqual({
      type: PacketType.Welcome,
      welcome: { clientId: 1, entityId: 0, tick: 0, tickRate: 60 }
    });

    const [snapshot] = snapshots(packets);
    expect(snapshot.tick).toBe(1);
    expect(snapshot.baseTick).toBe(0);
    expect(snapshot.ackSequence).toBe(0);
    expect(snapshot.entries).toHaveLength(1);
    expect(snapshot.entries[0].archetype).toBe(PLAYER_ARCHETYPE);
    expect(snapshot.entries[0].components[ComponentType.Transform]?.position).toEqual({ x: 1024, y: 1024 });
    expect(snapshot.entries[0].components[ComponentType.Controller]).toEqual({ clientId: 1, lastSequence: 0 });
    expect(logs.messages('info')).toContain('[server] Client 1 joined as entity 0');
  });

  test('clients spawn apart', () => {
    const server = createServer();
    network.connect();
    network.connect();
    server.step();

    const first = server.getClient(1)?.entityId;
    const second = server.getClient(2)?.entityId;
    if (first === undefined || second === undefined) throw new Error('clients were not admitted');
    expect(server.world.getComponent(first, ComponentType.Transform)?.position).toEqual({ x: 1024, y: 1024 });
    expect(server.world.getComponent(second, ComponentType.Transform)?.position).toEqual({ x: 1088, y: 1024 });
  });

  test('one queued input is applied per tick and acknowledged', () => {
    const server = createServer();
    const client = network.connect();
    server.step();
    drain(client);

    client.send(input(1, 1));
    server.step();

    const entityId = server.getClient(1)?.entityId ?? -1;
    const transform = server.world.getComponent(entityId, ComponentType.Transform);
    expect(transform?.velocity).toEqual({ x: 200, y: 0 });
    expect(transform?.position.x).toBeCloseTo(1024 + 200 / 60, 10);
    expect(server.world.getComponent(entityId, ComponentType.Character)?.actionState).toBe(ActionState.Move);
    expect(server.world.getComponent(entityId, ComponentType.Controller)?.lastSequence).toBe(1);

    const [snapshot] = snapshots(drain(client));
    expect(snapshot.ackSequence).toBe(1);
  });

  test('inputs run in sequence order, one per tick', () => {
    const server = createServer();
    const client = network.connect();
    server.step();

    client.send(input(3));
    client.send(input(2));
    client.send(input(3));
    server.step();
    expect(server.getClient(1)?.lastSequence).toBe(2);

    server.step();
    expect(server.getClient(1)?.lastSequence).toBe(3);

    client.send(input(2));
    server.step();
    expect(server.getClient(1)?.lastSequence).toBe(3);
    expect(server.getStats()).toMatchObject({ inputsApplied: 2, inputsDropped: 2 });
  });

  test('the input queue keeps the newest entries', () => {
    const server = createServer({ maxQueuedInputs: 2 });
    const client = network.connect();
    server.step();

    client.send(input(1));
    client.send(input(2));
    client.send(input(3));
    server.step();

    expect(server.getClient(1)?.lastSequence).toBe(2);
    expect(server.getClient(1)?.queue.map(q => q.sequence)).toEqual([3]);
    expect(server.getStats().inputsDropped).toBe(1);
  });

  test('acknowledged ticks become delta baselines', () => {
    const server = createServer();
    const client = network.connect();
    server.step();
    drain(client);

    client.send(encodeAck(1));
    server.step();

    const [snapshot] = snapshots(drain(client));
    expect(snapshot.baseTick).toBe(1);
    // stateTicks advanced; nothing else did
    expect(snapshot.entries.map(e => e.mask)).toEqual([componentBit(ComponentType.Character)]);
    expect(server.getStats()).toMatchObject({ fullSnapshots: 1, deltaSnapshots: 1 });
  });

  test('acks for ticks not yet run are ignored', () => {
    const server = createServer();
    const client = network.connect();
    server.step();
    drain(client);

    client.send(encodeAck(99));
    server.step();

    expect(snapshots(drain(client))[0].baseTick).toBe(0);
    expect(server.getClient(1)?.ackedTick).toBeUndefined();
  });

  test('a full snapshot is forced every fullSnapshotInterval ticks', () => {
    const server = createServer({ fullSnapshotInterval: 3 });
    const client = network.connect();
    const bases: number[] = [];

    for (let i = 0; i < 4; i++) {
      const tick = server.step();
      bases.push(...snapshots(drain(client)).map(s => s.baseTick));
      client.send(encodeAck(tick));
    }

    expect(bases).toEqual([0, 1, 2, 0]);
  });

  test('consecutive malformed packets disconnect the client', () => {
    const server = createServer({ maxMalformedPackets: 2 });
    const client = network.connect();
    server.step();

    const garbage = Uint8Array.of(0, 1, 2);
    client.send(garbage);
    client.send(garbage);
    client.send(encodeAck(1));
    client.send(garbage);
    client.send(garbage);
    server.step();
    expect(server.getClient(1)?.connected).toBe(true);

    client.send(garbage);
    server.step();

    expect(server.getClient(1)?.connected).toBe(false);
    expect(network.clientIds()).toEqual([]);
    expect(server.getStats().malformedPackets).toBe(5);
    expect(logs.messages('warn')).toContain('[server] Dropped packet from client 1: Bad magic 0x0 (at byte 0)');
    expect(logs.messages('warn')).toContain('[server] Client 1 sent 3 malformed packets in a row, disconnecting');
  });

  test('a client packet of a server-only type counts as malformed', () => {
    const server = createServer();
    const client = network.connect();
    server.step();

    client.send(encodeWelcome({ clientId: 1, entityId: 0, tick: 0, tickRate: 60 }));
    server.step();

    expect(server.getStats().malformedPackets).toBe(1);
    expect(logs.messages('warn')).toContain('[server] Dropped packet from client 1: unexpected packet type 4');
  });

  test('a disconnected client keeps its entity through the grace period', () => {
    const server = createServer({ disconnectGraceMs: 1000 });
    const client = network.connect();
    server.step();
    const entityId = server.getClient(1)?.entityId ?? -1;

    client.close?.();
    clock = 500;
    server.step();
    expect(server.getClient(1)?.connected).toBe(false);
    expect(server.world.isAlive(entityId)).toBe(true);

    clock = 1501;
    server.step();
    expect(server.getClient(1)).toBeUndefined();
    expect(server.world.isAlive(entityId)).toBe(false);
  });

  test('reconnecting within the grace period restores the same entity', () => {
    const server = createServer({ disconnectGraceMs: 1000 });
    const first = network.connect(1);
    server.step();
    const entityId = server.getClient(1)?.entityId;

    first.close?.();
    server.step();

    clock = 800;
    const second = network.connect(1);
    server.step();

    const [welcome] = drain(second);
    expect(welcome).toEqual({
      type: PacketType.Welcome,
      welcome: { clientId: 1, entityId, tick: 2, tickRate: 60 }
    });
    expect(server.world.entityCount).toBe(1);
    expect(logs.messages('info')).toContain(`[server] Client 1 rejoined as entity ${entityId}`);
  });

  test('a rejoined client restarts its input sequence at 1', () => {
    const server = createServer({ disconnectGraceMs: 1000 });
    const first = network.connect(1);
    server.step();
    for (let sequence = 1; sequence <= 5; sequence++) {
      first.send(input(sequence));
      server.step();
    }
    expect(server.getClient(1)?.lastSequence).toBe(5);

    first.close?.();
    server.step();
    const second = network.connect(1);
    server.step();
    const entityId = server.getClient(1)?.entityId ?? -1;
    expect(server.getClient(1)?.lastSequence).toBe(0);
    expect(server.world.getComponent(entityId, ComponentType.Controller)?.lastSequence).toBe(0);

    for (let sequence = 1; sequence <= 3; sequence++) second.send(input(sequence, 1));
    server.step();
    server.step();
    server.step();

    expect(server.getStats().inputsDropped).toBe(0);
    expect(server.getClient(1)?.lastSequence).toBe(3);
    expect(server.world.getComponent(entityId, ComponentType.Transform)?.position.x).toBeCloseTo(1024 + 3 * 200 / 60, 10);
  });

  test('a silent client is dropped after the grace period', () => {
    const server = createServer({ disconnectGraceMs: 1000 });
    network.connect();
    server.step();

    clock = 1001;
    server.step();

    expect(server.getClient(1)).toBeUndefined();
    expect(server.world.entityCount).toBe(0);
    expect(network.clientIds()).toEqual([]);
  });

  test('explicit disconnect closes the transport', () => {
    const server = createServer();
    network.connect();
    server.step();

    server.disconnect(1);

    expect(network.clientIds()).toEqual([]);
    expect(server.getClient(1)?.connected).toBe(false);
  });
});
