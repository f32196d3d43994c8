import { BinaryReader } from '../buffer/BinaryReader.js';
import { BinaryWriter } from '../buffer/BinaryWriter.js';
import { HDPathError } from '../errors/HDPathError.js';
import { PATH_PREFIX_BYTE_LENGTH, U32_BYTE_LENGTH } from '../utils/lengths.js';
import { BufferLike, err, ok, Result } from '../utils/types.js';
import { HDPath, pathValues } from './HDPath.js';
import { PathValue } from './PathValue.js';

/**
 * Binary form shared by every path shape:
 * `[count: u8][value_0: u32 BE]...[value_{count-1}: u32 BE]`, where the top bit of each word marks a hardened value.
 *
 * @example
 * ```typescript
 * PathCodec.encode(StandardHDPath.parse("m/44'/0'/0'/0/0"));
 * // [5, 0x80,0,0,44, 0x80,0,0,0, 0x80,0,0,0, 0,0,0,0, 0,0,0,0]
 * ```
 */
export class PathCodec {
    public static encode(path: HDPath): Uint8Array {
        return PathCodec.encodeValues(pathValues(path));
    }

    public static encodeValues(values: readonly PathValue[]): Uint8Array {
        const writer = new BinaryWriter(PathCodec.encodedLength(values.length));
        writer.writePathValues(values);

        return writer.getBuffer();
    }

    /**
     * Byte size of a path with the given number of segments.
     */
    public static encodedLength(count: number): number {
        return PATH_PREFIX_BYTE_LENGTH + count * U32_BYTE_LENGTH;
    }

    /**
     * Decodes the segments of an encoded path.
     *
     * @param bytes - The encoded path
     * @param expectedLength - Segment count required by the target shape, if it has a fixed one
     */
    public static decode(
        bytes: BufferLike,
        expectedLength?: number,
    ): Result<PathValue[], HDPathError> {
        if (bytes.byteLength < PATH_PREFIX_BYTE_LENGTH) {
            return err(HDPathError.invalidFormat('Encoded path is empty'));
        }

        const count = bytes[0];
        if (bytes.byteLength !== PathCodec.encodedLength(count)) {
            return err(
                HDPathError.invalidFormat(
                    `Encoded path of ${count} values must be ${PathCodec.encodedLength(count)} bytes, got ${bytes.byteLength}`,
                ),
            );
        }

        if (expectedLength !== undefined && count !== expectedLength) {
            return err(
                HDPathError.invalidFormat(`Expected ${expectedLength} path values, got ${count}`),
            );
        }

        return ok(new BinaryReader(bytes).readPathValues());
    }
}
