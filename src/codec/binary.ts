/**
 * Binary Reader / Writer
 *
 * Little-endian DataView helpers. The reader bounds-checks every access and
 * reports truncation as a MalformedPacketError carrying the byte offset.
 */

import { MalformedPacketError } from '../errors';

const INITIAL_CAPACITY = 256;

export class ByteWriter {
    private buffer: ArrayBuffer;
    private view: DataView;
    private offset = 0;

    constructor(initialCapacity: number = INITIAL_CAPACITY) {
        this.buffer = new ArrayBuffer(initialCapacity);
        this.view = new DataView(this.buffer);
    }

    get length(): number {
        return this.offset;
    }

    u8(value: number): this {
        this.ensure(1);
        this.view.setUint8(this.offset, value);
        this.offset += 1;
        return this;
    }

    u16(value: number): this {
        this.ensure(2);
        this.view.setUint16(this.offset, value, true);
        this.offset += 2;
        return this;
    }

    u32(value: number): this {
        this.ensure(4);
        this.view.setUint32(this.offset, value >>> 0, true);
        this.offset += 4;
        return this;
    }

    f32(value: number): this {
        this.ensure(4);
        this.view.setFloat32(this.offset, value, true);
        this.offset += 4;
        return this;
    }

    /**
     * Copy of the bytes written so far.
     */
    finish(): Uint8Array {
        return new Uint8Array(this.buffer.slice(0, this.offset));
    }

    private ensure(bytes: number): void {
        const needed = this.offset + bytes;
        if (needed <= this.buffer.byteLength) return;

        let capacity = this.buffer.byteLength * 2;
        while (capacity < needed) capacity *= 2;

        const next = new ArrayBuffer(capacity);
        new Uint8Array(next).set(new Uint8Array(this.buffer, 0, this.offset));
        this.buffer = next;
        this.view = new DataView(next);
    }
}

export class ByteReader {
    private readonly view: DataView;
    private offset = 0;

    constructor(bytes: Uint8Array) {
        this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    }

    get position(): number {
        return this.offset;
    }

    get remaining(): number {
        return this.view.byteLength - this.offset;
    }

    u8(): number {
        this.require(1);
        const value = this.view.getUint8(this.offset);
        this.offset += 1;
        return value;
    }

    u16(): number {
        this.require(2);
        const value = this.view.getUint16(this.offset, true);
        this.offset += 2;
        return value;
    }

    u32(): number {
        this.require(4);
        const value = this.view.getUint32(this.offset, true);
        this.offset += 4;
        return value;
    }

    /**
     * Read a float and reject NaN or infinity.
     */
    f32(): number {
        this.require(4);
        const at = this.offset;
        const value = this.view.getFloat32(at, true);
        this.offset += 4;
        if (!Number.isFinite(value)) {
            throw new MalformedPacketError('Non-finite float', at);
        }
        return value;
    }

    /**
     * Fail unless every byte has been consumed.
     */
    end(): void {
        if (this.remaining !== 0) {
            throw new MalformedPacketError(`${this.remaining} trailing bytes`, this.offset);
        }
    }

    private require(bytes: number): void {
        if (this.offset + bytes > this.view.byteLength) {
            throw new MalformedPacketError(`Truncated packet: need ${bytes} more bytes`, this.offset);
        }
    }
}
