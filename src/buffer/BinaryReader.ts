import { HDPathError } from '../errors/HDPathError.js';
import { PathValue } from '../path/PathValue.js';
import { U32_BYTE_LENGTH, U8_BYTE_LENGTH } from '../utils/lengths.js';
import { BufferLike, u32, u8 } from '../utils/types.js';

export class BinaryReader {
    private readonly buffer: DataView;
    private currentOffset: number = 0;

    constructor(bytes: BufferLike) {
        this.buffer = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    }

    public length(): number {
        return this.buffer.byteLength;
    }

    public bytesLeft(): number {
        return this.buffer.byteLength - this.currentOffset;
    }

    /**
     * Reads a single unsigned byte (u8).
     */
    public readU8(): u8 {
        this.verifyEnd(this.currentOffset + U8_BYTE_LENGTH);
        const value = this.buffer.getUint8(this.currentOffset);
        this.currentOffset += U8_BYTE_LENGTH;
        return value;
    }

    /**
     * Reads an unsigned 32-bit integer. By default, big-endian.
     * @param be - Endianness; true means big-endian (the default).
     */
    public readU32(be: boolean = true): u32 {
        this.verifyEnd(this.currentOffset + U32_BYTE_LENGTH);
        const value = this.buffer.getUint32(this.currentOffset, !be);
        this.currentOffset += U32_BYTE_LENGTH;
        return value;
    }

    /**
     * Reads one raw big-endian word as a path value. Never fails on the value itself.
     */
    public readPathValue(): PathValue {
        return PathValue.fromRaw(this.readU32());
    }

    /**
     * Reads [u8 count][u32 BE raw value]*.
     */
    public readPathValues(): PathValue[] {
        const count = this.readU8();
        const result: PathValue[] = new Array<PathValue>(count);
        for (let i = 0; i < count; i++) {
            result[i] = this.readPathValue();
        }

        return result;
    }

    public getOffset(): u32 {
        return this.currentOffset;
    }

    /**
     * @throws {HDPathError} When reading would go past the end of the buffer
     */
    public verifyEnd(size: number): void {
        if (size > this.buffer.byteLength) {
            throw HDPathError.invalidFormat(
                `Attempt to read beyond buffer length: requested up to byte offset ${size}, but buffer is only ${this.buffer.byteLength} bytes.`,
            );
        }
    }
}
