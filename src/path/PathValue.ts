import { HDPathConfig } from '../config/HDPathConfig.js';
import { HDPathError } from '../errors/HDPathError.js';
import { numberCompare } from '../utils/Comparison.js';
import { err, ok, Result, u31, u32 } from '../utils/types.js';

export enum PathValueKind {
    Normal = 'Normal',
    Hardened = 'Hardened',
}

/**
 * A single segment of an HD path: a 31-bit magnitude, either normal or hardened.
 *
 * Hardened values are encoded with the high bit of their raw 32-bit word set,
 * so `Hardened(44)` is stored on the wire as `0x8000002c`.
 *
 * @example
 * ```typescript
 * const purpose = PathValue.hardened(44);
 * purpose.toRaw(); // 0x8000002c
 * purpose.toString(); // "44'"
 *
 * PathValue.fromRaw(0x80000001).equals(PathValue.hardened(1)); // true
 * ```
 *
 * @category Path
 */
export class PathValue {
    private constructor(
        public readonly kind: PathValueKind,
        public readonly value: u31,
    ) {}

    /**
     * Checks if the number can be used as a segment magnitude, i.e. it is an integer below 2^31.
     */
    public static isOk(value: number): boolean {
        return Number.isInteger(value) && value >= 0 && value < HDPathConfig.HARDENED_BIT;
    }

    public static tryNormal(value: number): Result<PathValue, HDPathError> {
        const error = PathValue.checkMagnitude(value);
        if (error) return err(error);

        return ok(new PathValue(PathValueKind.Normal, value));
    }

    public static tryHardened(value: number): Result<PathValue, HDPathError> {
        const error = PathValue.checkMagnitude(value);
        if (error) return err(error);

        return ok(new PathValue(PathValueKind.Hardened, value));
    }

    /**
     * @throws {HDPathError} If the value is outside of the 31-bit range
     */
    public static normal(value: number): PathValue {
        const result = PathValue.tryNormal(value);
        if (!result.ok) throw result.error;

        return result.value;
    }

    /**
     * @throws {HDPathError} If the value is outside of the 31-bit range
     */
    public static hardened(value: number): PathValue {
        const result = PathValue.tryHardened(value);
        if (!result.ok) throw result.error;

        return result.value;
    }

    /**
     * Decodes a raw 32-bit word. Every u32 maps to exactly one value.
     * @throws {RangeError} If the argument is not a 32-bit unsigned integer
     */
    public static fromRaw(word: u32): PathValue {
        if (!Number.isInteger(word) || word < 0 || word > HDPathConfig.MAX_RAW_VALUE) {
            throw new RangeError(`Raw value ${word} is not a 32-bit unsigned integer`);
        }

        if (word >= HDPathConfig.HARDENED_BIT) {
            return new PathValue(PathValueKind.Hardened, word - HDPathConfig.HARDENED_BIT);
        }

        return new PathValue(PathValueKind.Normal, word);
    }

    public static compare(a: PathValue, b: PathValue): number {
        return numberCompare(a.toRaw(), b.toRaw());
    }

    private static checkMagnitude(value: number): HDPathError | undefined {
        if (PathValue.isOk(value)) return;

        if (Number.isInteger(value) && value >= HDPathConfig.HARDENED_BIT) {
            return HDPathError.highBitIsSet(value);
        }

        return HDPathError.invalidFormat(`Value ${value} is not an unsigned integer`);
    }

    public isHardened(): boolean {
        return this.kind === PathValueKind.Hardened;
    }

    public isNormal(): boolean {
        return this.kind === PathValueKind.Normal;
    }

    /** The magnitude without the hardened flag */
    public asNumber(): u31 {
        return this.value;
    }

    public toRaw(): u32 {
        return this.isHardened() ? this.value + HDPathConfig.HARDENED_BIT : this.value;
    }

    public equals(other: PathValue): boolean {
        return this.kind === other.kind && this.value === other.value;
    }

    /**
     * Orders by raw value, so every normal value sorts before every hardened one.
     */
    public compare(other: PathValue): number {
        return PathValue.compare(this, other);
    }

    public toString(): string {
        return this.isHardened()
            ? `${this.value}${HDPathConfig.OUTPUT_HARDENED_MARKER}`
            : `${this.value}`;
    }
}
