import { HDPathError } from '../errors/HDPathError.js';
import { Result, u8 } from '../utils/types.js';
import type { CustomHDPath } from './CustomHDPath.js';
import { PathValue } from './PathValue.js';

/**
 * Common contract of every HD path shape.
 * Implemented by {@link CustomHDPath} and the fixed-arity `AccountHDPath`, `ShortHDPath` and `StandardHDPath`.
 */
export interface HDPath {
    /** Number of segments */
    readonly length: u8;

    /**
     * Segment at the given position, or `undefined` when the position is out of bounds.
     */
    get(position: number): PathValue | undefined;

    /**
     * One byte with the number of segments, followed by each raw value as a big-endian u32.
     */
    toBytes(): Uint8Array;

    /** Canonical text form, e.g. `m/44'/0'/0'/0/0` */
    toString(): string;

    /** The same path without its last segment */
    parent(): Result<CustomHDPath, HDPathError>;

    toCustom(): CustomHDPath;
}

/**
 * Collects the segments of any path, in order.
 */
export function pathValues(path: HDPath): PathValue[] {
    const values: PathValue[] = [];
    for (let i = 0; i < path.length; i++) {
        const value = path.get(i);
        if (!value) throw new Error(`No value at ${i}`);

        values.push(value);
    }

    return values;
}
