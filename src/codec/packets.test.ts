import { describe, test, expect } from 'vitest';
import {
  PacketType,
  decodePacket,
  encodeAck,
  encodeInput,
  encodePacket,
  encodeSnapshot,
  encodeWelcome
} from './packets';
import { ActionState, createCharacter, createHitbox, createTransform } from '../components';
import { ComponentType, componentBit } from '../core/component';
import { ActionFlags } from '../core/input';
import { MalformedPacketError } from '../errors';
import type { SnapshotDelta } from '../sync/state-delta';

const T = componentBit(ComponentType.Transform);
const H = componentBit(ComponentType.Hitbox);
const C = componentBit(ComponentType.Character);

function snapshotWith(snapshot: Partial<SnapshotDelta>): SnapshotDelta {
  return { tick: 10, baseTick: 0, ackSequence: 0, entries: [], removed: [], ...snapshot };
}

function expectMalformed(bytes: Uint8Array, message: string): void {
  expect(() => decodePacket(bytes)).toThrow(MalformedPacketError);
  expect(() => decodePacket(bytes)).toThrow(message);
}

describe('wire packets', () => {
  test('ack layout is header plus little-endian tick', () => {
    expect([...encodeAck(258)]).toEqual([0x4E, 1, PacketType.Ack, 0x02, 0x01, 0x00, 0x00]);
  });

  test('input decodes to the command that was sent', () => {
    const input = { sequence: 1, tick: 40, move: { x: 1, y: -0.5 }, actionFlags: ActionFlags.Attack | ActionFlags.Jump };
    const bytes = encodeInput(input);

    expect(bytes.byteLength).toBe(21);
    expect(decodePacket(bytes)).toEqual({ type: PacketType.Input, input });
  });

  test('unknown action flags are masked on encode', () => {
    const bytes = encodeInput({ sequence: 2, tick: 0, move: { x: 0, y: 0 }, actionFlags: 0xFF });
    const packet = decodePacket(bytes);
    expect(packet.type === PacketType.Input && packet.input.actionFlags).toBe(7);
  });

  test('welcome carries the owned entity', () => {
    const welcome = { clientId: 3, entityId: 0x00100002, tick: 77, tickRate: 60 };
    expect(decodePacket(encodeWelcome(welcome))).toEqual({ type: PacketType.Welcome, welcome });
    expect(decodePacket(encodePacket({ type: PacketType.Welcome, welcome }))).toEqual({ type: PacketType.Welcome, welcome });
  });

  test('snapshot entries carry only the masked components', () => {
    const transform = createTransform({ position: { x: 100.5, y: 20.25 }, velocity: { x: -200, y: 0 } });
    const character = createCharacter({
      health: 75,
      actionState: ActionState.Attack,
      stateTicks: 13,
      facing: { x: -1, y: 0 },
      buffer: [{ action: ActionFlags.Dash, age: 3 }]
    });
    const snapshot = snapshotWith({
      tick: 12,
      baseTick: 11,
      ackSequence: 5,
      entries: [
        { entityId: 4, archetype: T | C, mask: T | C, components: { [ComponentType.Transform]: transform, [ComponentType.Character]: character } },
        { entityId: 9, archetype: T | H, mask: T, components: { [ComponentType.Transform]: transform } }
      ],
      removed: [2, 0x00300001]
    });

    expect(decodePacket(encodeSnapshot(snapshot))).toEqual({ type: PacketType.Snapshot, snapshot });
  });

  test('hitbox flags survive the trip', () => {
    const hitbox = createHitbox({ size: { x: 16, y: 8 }, layer: 5, mode: 'trigger', isStatic: true, mass: 2 });
    const snapshot = snapshotWith({
      entries: [{ entityId: 1, archetype: H, mask: H, components: { [ComponentType.Hitbox]: hitbox } }]
    });
    const packet = decodePacket(encodeSnapshot(snapshot));
    expect(packet.type === PacketType.Snapshot && packet.snapshot.entries[0].components[ComponentType.Hitbox]).toEqual(hitbox);
  });

  test('encoding refuses a mask without data', () => {
    const snapshot = snapshotWith({ entries: [{ entityId: 1, archetype: T, mask: T, components: {} }] });
    expect(() => encodeSnapshot(snapshot)).toThrow('Entry mask includes Transform but no data was supplied');
  });
});

describe('malformed packets', () => {
  test('empty payload', () => {
    expectMalformed(new Uint8Array(0), 'Truncated packet: need 1 more bytes (at byte 0)');
  });

  test('bad magic', () => {
    expectMalformed(Uint8Array.of(0x00, 1, 3, 0, 0, 0, 0), 'Bad magic 0x0 (at byte 0)');
  });

  test('unsupported version', () => {
    expectMalformed(Uint8Array.of(0x4E, 2, 3, 0, 0, 0, 0), 'Unsupported protocol version 2 (at byte 1)');
  });

  test('unknown packet type', () => {
    expectMalformed(Uint8Array.of(0x4E, 1, 9), 'Unknown packet type 9 (at byte 2)');
  });

  test('truncated body', () => {
    expectMalformed(Uint8Array.of(0x4E, 1, 3, 1, 0), 'Truncated packet: need 4 more bytes (at byte 3)');
  });

  test('trailing bytes', () => {
    expectMalformed(Uint8Array.of(0x4E, 1, 3, 1, 0, 0, 0, 0xAA), '1 trailing bytes (at byte 7)');
  });

  test('undefined action flags', () => {
    const bytes = encodeInput({ sequence: 1, tick: 1, move: { x: 0, y: 0 }, actionFlags: 0 });
    bytes[19] = 8;
    expectMalformed(bytes, 'Invalid action flags 8 (at byte 19)');
  });

  test('non-finite movement', () => {
    const bytes = encodeInput({ sequence: 1, tick: 1, move: { x: Number.NaN, y: 0 }, actionFlags: 0 });
    expectMalformed(bytes, 'Non-finite float (at byte 11)');
  });

  test('changed mask outside the archetype', () => {
    const bytes = Uint8Array.of(
      0x4E, 1, PacketType.Snapshot,
      1, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0,
      1, 0,
      7, 0, 0, 0, T, H
    );
    expectMalformed(bytes, 'Invalid component masks 1/2 (at byte 21)');
  });

  test('out of range action state', () => {
    const snapshot = snapshotWith({
      entries: [{ entityId: 1, archetype: C, mask: C, components: { [ComponentType.Character]: createCharacter() } }]
    });
    const bytes = encodeSnapshot(snapshot);
    bytes[31] = 9;
    expectMalformed(bytes, 'Invalid action state 9 (of 8) (at byte 31)');
  });
});
