/**
 * Wire Packets
 *
 * Every packet starts with [u8 magic 0x4E][u8 version][u8 type], then:
 *   Input:    u32 seq, u32 tick, f32 moveX, f32 moveY, u16 actionFlags
 *   Snapshot: u32 tick, u32 baseTick, u32 ackSequence, u16 entryCount,
 *             entries, u16 removedCount, u32 removed ids
 *             entry = u32 id, u8 archetype, u8 mask, payloads in type order
 *   Ack:      u32 tick
 *   Welcome:  u32 clientId, u32 entityId, u32 tick, u16 tickRate
 * All multi-byte values are little-endian; floats are 32-bit.
 */

import {
    ActionState,
    ACTION_STATE_COUNT,
    BufferedAction,
    Character,
    Controller,
    Hitbox,
    Transform
} from '../components';
import {
    ALL_COMPONENTS_MASK,
    COMPONENT_TYPES,
    ComponentRecordSet,
    ComponentType,
    componentBit,
    componentName
} from '../core/component';
import { ALL_ACTION_FLAGS, ActionFlags, InputCommand } from '../core/input';
import { MalformedPacketError } from '../errors';
import { LAYER_COUNT } from '../plugins/physics2d/layers';
import type { EntityDeltaEntry, SnapshotDelta } from '../sync/state-delta';
import { ByteReader, ByteWriter } from './binary';

export const PROTOCOL_MAGIC = 0x4E;
export const PROTOCOL_VERSION = 1;

export enum PacketType {
    Input = 1,
    Snapshot = 2,
    Ack = 3,
    Welcome = 4
}

/**
 * Sent once by the server when a client is admitted.
 */
export interface WelcomeMessage {
    clientId: number;
    /** Entity the client controls */
    entityId: number;
    /** Server tick at admission */
    tick: number;
    tickRate: number;
}

export type Packet =
    | { type: PacketType.Input; input: InputCommand }
    | { type: PacketType.Snapshot; snapshot: SnapshotDelta }
    | { type: PacketType.Ack; tick: number }
    | { type: PacketType.Welcome; welcome: WelcomeMessage };

const MAX_U16 = 0xFFFF;

const HITBOX_TRIGGER = 1;
const HITBOX_STATIC = 2;

// ============================================
// Component payloads
// ============================================

function writeTransform(w: ByteWriter, t: Transform): void {
    w.f32(t.position.x).f32(t.position.y)
        .f32(t.velocity.x).f32(t.velocity.y)
        .f32(t.rotation)
        .f32(t.scale.x).f32(t.scale.y);
}

function readTransform(r: ByteReader): Transform {
    return {
        position: { x: r.f32(), y: r.f32() },
        velocity: { x: r.f32(), y: r.f32() },
        rotation: r.f32(),
        scale: { x: r.f32(), y: r.f32() }
    };
}

function writeHitbox(w: ByteWriter, h: Hitbox): void {
    const flags = (h.mode === 'trigger' ? HITBOX_TRIGGER : 0) | (h.isStatic ? HITBOX_STATIC : 0);
    w.f32(h.size.x).f32(h.size.y)
        .f32(h.offset.x).f32(h.offset.y)
        .u8(h.layer)
        .u8(flags)
        .f32(h.mass);
}

function readHitbox(r: ByteReader): Hitbox {
    const size = { x: r.f32(), y: r.f32() };
    const offset = { x: r.f32(), y: r.f32() };
    const layerAt = r.position;
    const layer = r.u8();
    if (layer >= LAYER_COUNT) {
        throw new MalformedPacketError(`Invalid collision layer ${layer}`, layerAt);
    }
    const flagsAt = r.position;
    const flags = r.u8();
    if ((flags & ~(HITBOX_TRIGGER | HITBOX_STATIC)) !== 0) {
        throw new MalformedPacketError(`Invalid hitbox flags ${flags}`, flagsAt);
    }
    return {
        size,
        offset,
        layer,
        mode: (flags & HITBOX_TRIGGER) !== 0 ? 'trigger' : 'solid',
        isStatic: (flags & HITBOX_STATIC) !== 0,
        mass: r.f32()
    };
}

function toActionState(value: number, at: number): ActionState {
    switch (value) {
        case ActionState.Idle: return ActionState.Idle;
        case ActionState.Move: return ActionState.Move;
        case ActionState.Jump: return ActionState.Jump;
        case ActionState.Fall: return ActionState.Fall;
        case ActionState.Dash: return ActionState.Dash;
        case ActionState.Attack: return ActionState.Attack;
        case ActionState.Hurt: return ActionState.Hurt;
        case ActionState.Dead: return ActionState.Dead;
        default:
            throw new MalformedPacketError(`Invalid action state ${value} (of ${ACTION_STATE_COUNT})`, at);
    }
}

function toBufferedAction(value: number, at: number): ActionFlags {
    switch (value) {
        case ActionFlags.Jump: return ActionFlags.Jump;
        case ActionFlags.Attack: return ActionFlags.Attack;
        case ActionFlags.Dash: return ActionFlags.Dash;
        default:
            throw new MalformedPacketError(`Invalid buffered action ${value}`, at);
    }
}

function writeCharacter(w: ByteWriter, c: Character): void {
    w.f32(c.health).f32(c.maxHealth)
        .u8(c.actionState)
        .u16(Math.min(c.stateTicks, MAX_U16))
        .f32(c.facing.x).f32(c.facing.y)
        .f32(c.altitude).f32(c.verticalSpeed)
        .u16(Math.min(c.invulnerableTicks, MAX_U16))
        .u8(c.pendingHit ? 1 : 0);

    w.u8(Math.min(c.buffer.length, 0xFF));
    for (const entry of c.buffer.slice(0, 0xFF)) {
        w.u8(entry.action).u16(Math.min(entry.age, MAX_U16));
    }
}

function readCharacter(r: ByteReader): Character {
    const health = r.f32();
    const maxHealth = r.f32();
    const stateAt = r.position;
    const actionState = toActionState(r.u8(), stateAt);
    const stateTicks = r.u16();
    const facing = { x: r.f32(), y: r.f32() };
    const altitude = r.f32();
    const verticalSpeed = r.f32();
    const invulnerableTicks = r.u16();
    const hitAt = r.position;
    const pendingHitByte = r.u8();
    if (pendingHitByte > 1) {
        throw new MalformedPacketError(`Invalid boolean ${pendingHitByte}`, hitAt);
    }

    const count = r.u8();
    const buffer: BufferedAction[] = [];
    for (let i = 0; i < count; i++) {
        const at = r.position;
        const action = toBufferedAction(r.u8(), at);
        buffer.push({ action, age: r.u16() });
    }

    return {
        health,
        maxHealth,
        actionState,
        stateTicks,
        facing,
        altitude,
        verticalSpeed,
        invulnerableTicks,
        pendingHit: pendingHitByte === 1,
        buffer
    };
}

function writeController(w: ByteWriter, c: Controller): void {
    w.u32(c.clientId).u32(c.lastSequence);
}

function readController(r: ByteReader): Controller {
    return { clientId: r.u32(), lastSequence: r.u32() };
}

function writeComponent(w: ByteWriter, type: ComponentType, components: ComponentRecordSet): void {
    switch (type) {
        case ComponentType.Transform: {
            const data = components[ComponentType.Transform];
            if (!data) break;
            writeTransform(w, data);
            return;
        }
        case ComponentType.Hitbox: {
            const data = components[ComponentType.Hitbox];
            if (!data) break;
            writeHitbox(w, data);
            return;
        }
        case ComponentType.Character: {
            const data = components[ComponentType.Character];
            if (!data) break;
            writeCharacter(w, data);
            return;
        }
        case ComponentType.Controller: {
            const data = components[ComponentType.Controller];
            if (!data) break;
            writeController(w, data);
            return;
        }
    }
    throw new Error(`Entry mask includes ${componentName(type)} but no data was supplied`);
}

function readComponent(r: ByteReader, type: ComponentType, into: ComponentRecordSet): void {
    switch (type) {
        case ComponentType.Transform:
            into[ComponentType.Transform] = readTransform(r);
            return;
        case ComponentType.Hitbox:
            into[ComponentType.Hitbox] = readHitbox(r);
            return;
        case ComponentType.Character:
            into[ComponentType.Character] = readCharacter(r);
            return;
        case ComponentType.Controller:
            into[ComponentType.Controller] = readController(r);
            return;
    }
}

// ============================================
// Header
// ============================================

function writeHeader(w: ByteWriter, type: PacketType): void {
    w.u8(PROTOCOL_MAGIC).u8(PROTOCOL_VERSION).u8(type);
}

function readHeader(r: ByteReader): PacketType {
    const magic = r.u8();
    if (magic !== PROTOCOL_MAGIC) {
        throw new MalformedPacketError(`Bad magic 0x${magic.toString(16)}`, 0);
    }
    const version = r.u8();
    if (version !== PROTOCOL_VERSION) {
        throw new MalformedPacketError(`Unsupported protocol version ${version}`, 1);
    }
    const type = r.u8();
    switch (type) {
        case PacketType.Input: return PacketType.Input;
        case PacketType.Snapshot: return PacketType.Snapshot;
        case PacketType.Ack: return PacketType.Ack;
        case PacketType.Welcome: return PacketType.Welcome;
        default:
            throw new MalformedPacketError(`Unknown packet type ${type}`, 2);
    }
}

// ============================================
// Encoders
// ============================================

export function encodeInput(input: InputCommand): Uint8Array {
    const w = new ByteWriter(32);
    writeHeader(w, PacketType.Input);
    w.u32(input.sequence)
        .u32(input.tick)
        .f32(input.move.x)
        .f32(input.move.y)
        .u16(input.actionFlags & ALL_ACTION_FLAGS);
    return w.finish();
}

export function encodeSnapshot(snapshot: SnapshotDelta): Uint8Array {
    if (snapshot.entries.length > MAX_U16 || snapshot.removed.length > MAX_U16) {
        throw new RangeError(`Snapshot for tick ${snapshot.tick} exceeds ${MAX_U16} entries`);
    }

    const w = new ByteWriter();
    writeHeader(w, PacketType.Snapshot);
    w.u32(snapshot.tick).u32(snapshot.baseTick).u32(snapshot.ackSequence);

    w.u16(snapshot.entries.length);
    for (const entry of snapshot.entries) {
        w.u32(entry.entityId).u8(entry.archetype).u8(entry.mask);
        for (const type of COMPONENT_TYPES) {
            if ((entry.mask & componentBit(type)) !== 0) {
                writeComponent(w, type, entry.components);
            }
        }
    }

    w.u16(snapshot.removed.length);
    for (const id of snapshot.removed) {
        w.u32(id);
    }
    return w.finish();
}

export function encodeAck(tick: number): Uint8Array {
    const w = new ByteWriter(8);
    writeHeader(w, PacketType.Ack);
    w.u32(tick);
    return w.finish();
}

export function encodeWelcome(welcome: WelcomeMessage): Uint8Array {
    const w = new ByteWriter(16);
    writeHeader(w, PacketType.Welcome);
    w.u32(welcome.clientId).u32(welcome.entityId).u32(welcome.tick).u16(welcome.tickRate);
    return w.finish();
}

export function encodePacket(packet: Packet): Uint8Array {
    switch (packet.type) {
        case PacketType.Input: return encodeInput(packet.input);
        case PacketType.Snapshot: return encodeSnapshot(packet.snapshot);
        case PacketType.Ack: return encodeAck(packet.tick);
        case PacketType.Welcome: return encodeWelcome(packet.welcome);
    }
}

// ============================================
// Decoders
// ============================================

function readInput(r: ByteReader): InputCommand {
    const sequence = r.u32();
    const tick = r.u32();
    const move = { x: r.f32(), y: r.f32() };
    const flagsAt = r.position;
    const actionFlags = r.u16();
    if ((actionFlags & ~ALL_ACTION_FLAGS) !== 0) {
        throw new MalformedPacketError(`Invalid action flags ${actionFlags}`, flagsAt);
    }
    return { sequence, tick, move, actionFlags };
}

function readEntry(r: ByteReader): EntityDeltaEntry {
    const entityId = r.u32();
    const maskAt = r.position;
    const archetype = r.u8();
    const mask = r.u8();
    if ((archetype & ~ALL_COMPONENTS_MASK) !== 0 || (mask & ~archetype) !== 0) {
        throw new MalformedPacketError(`Invalid component masks ${archetype}/${mask}`, maskAt);
    }

    const components: ComponentRecordSet = {};
    for (const type of COMPONENT_TYPES) {
        if ((mask & componentBit(type)) !== 0) {
            readComponent(r, type, components);
        }
    }
    return { entityId, archetype, mask, components };
}

function readSnapshot(r: ByteReader): SnapshotDelta {
    const tick = r.u32();
    const baseTick = r.u32();
    const ackSequence = r.u32();

    const entryCount = r.u16();
    const entries: EntityDeltaEntry[] = [];
    for (let i = 0; i < entryCount; i++) {
        entries.push(readEntry(r));
    }

    const removedCount = r.u16();
    const removed: number[] = [];
    for (let i = 0; i < removedCount; i++) {
        removed.push(r.u32());
    }
    return { tick, baseTick, ackSequence, entries, removed };
}

function readBody(r: ByteReader, type: PacketType): Packet {
    switch (type) {
        case PacketType.Input:
            return { type, input: readInput(r) };
        case PacketType.Snapshot:
            return { type, snapshot: readSnapshot(r) };
        case PacketType.Ack:
            return { type, tick: r.u32() };
        case PacketType.Welcome:
            return {
                type,
                welcome: { clientId: r.u32(), entityId: r.u32(), tick: r.u32(), tickRate: r.u16() }
            };
    }
}

/**
 * Decode any packet.
 * @throws MalformedPacketError on a bad header, truncation, trailing bytes
 *   or out-of-range values
 */
export function decodePacket(bytes: Uint8Array): Packet {
    const r = new ByteReader(bytes);
    const packet = readBody(r, readHeader(r));
    r.end();
    return packet;
}
