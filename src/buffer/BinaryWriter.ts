import { HDPathConfig } from '../config/HDPathConfig.js';
import { PathValue } from '../path/PathValue.js';
import { U32_BYTE_LENGTH, U8_BYTE_LENGTH } from '../utils/lengths.js';
import { u32, u8 } from '../utils/types.js';
import { BinaryReader } from './BinaryReader.js';

export class BinaryWriter {
    private currentOffset: u32 = 0;
    private buffer: DataView;

    constructor(length: number = 0) {
        this.buffer = this.getDefaultBuffer(length);
    }

    public writeU8(value: u8): void {
        if (value > 255) throw new Error('Value is too large.');

        this.allocSafe(U8_BYTE_LENGTH);
        this.buffer.setUint8(this.currentOffset++, value);
    }

    /**
     * Writes an unsigned 32-bit integer. By default, big-endian.
     * @param be - Endianness; true means big-endian (the default).
     */
    public writeU32(value: u32, be: boolean = true): void {
        if (value > HDPathConfig.MAX_RAW_VALUE) throw new Error('Value is too large.');

        this.allocSafe(U32_BYTE_LENGTH);
        this.buffer.setUint32(this.currentOffset, value, !be);
        this.currentOffset += U32_BYTE_LENGTH;
    }

    /**
     * Writes the raw form of a path value, hardened bit included.
     */
    public writePathValue(value: PathValue): void {
        this.writeU32(value.toRaw());
    }

    /**
     * Writes [u8 count][u32 BE raw value]* for the given segments.
     */
    public writePathValues(values: readonly PathValue[]): void {
        if (values.length > HDPathConfig.MAX_PATH_LENGTH) {
            throw new Error(`Too many path values: ${values.length}`);
        }

        this.allocSafe(U8_BYTE_LENGTH + values.length * U32_BYTE_LENGTH);
        this.writeU8(values.length);

        for (let i = 0; i < values.length; i++) {
            this.writePathValue(values[i]);
        }
    }

    public getBuffer(clear: boolean = true): Uint8Array {
        const buf = new Uint8Array(this.currentOffset);
        for (let i: u32 = 0; i < this.currentOffset; i++) {
            buf[i] = this.buffer.getUint8(i);
        }

        if (clear) this.clear();

        return buf;
    }

    public toBytesReader(): BinaryReader {
        return new BinaryReader(this.getBuffer());
    }

    public getOffset(): u32 {
        return this.currentOffset;
    }

    public clear(): void {
        this.currentOffset = 0;
        this.buffer = this.getDefaultBuffer();
    }

    public allocSafe(size: u32): void {
        if (this.currentOffset + size > this.buffer.byteLength) {
            this.resize(this.currentOffset + size - this.buffer.byteLength);
        }
    }

    private resize(size: u32): void {
        const buf: Uint8Array = new Uint8Array(this.buffer.byteLength + size);

        for (let i = 0; i < this.buffer.byteLength; i++) {
            buf[i] = this.buffer.getUint8(i);
        }

        this.buffer = new DataView(buf.buffer);
    }

    private getDefaultBuffer(length: number = 0): DataView {
        return new DataView(new ArrayBuffer(length));
    }
}
