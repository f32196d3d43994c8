import { HDPathConfig } from '../config/HDPathConfig.js';
import { HDPathError } from '../errors/HDPathError.js';
import { tupleCompare } from '../utils/Comparison.js';
import { BufferLike, err, ok, Result, u8 } from '../utils/types.js';
import { HDPath, pathValues } from './HDPath.js';
import { PathCodec } from './PathCodec.js';
import { PathParser } from './PathParser.js';
import { PathValue } from './PathValue.js';

/**
 * An HD path of any length (up to 255) with hardened and normal values in any order,
 * as described by BIP-32.
 *
 * For the usual `m/purpose'/coin_type'/account'/change/address_index` layout use `StandardHDPath`.
 *
 * @example
 * ```typescript
 * const path = CustomHDPath.parse("m/1'/2'/3/4/5'/6'/7");
 * const upper = CustomHDPath.parse("M/44H/0H/1H/0/0"); // m/44'/0'/1'/0/0
 *
 * const built = CustomHDPath.tryNew([
 *     PathValue.hardened(44),
 *     PathValue.hardened(0),
 *     PathValue.normal(0),
 * ]);
 * ```
 *
 * @category Path
 */
export class CustomHDPath implements HDPath {
    readonly #values: readonly PathValue[];

    private constructor(values: readonly PathValue[]) {
        this.#values = Object.freeze([...values]);
    }

    public get length(): u8 {
        return this.#values.length;
    }

    public get values(): readonly PathValue[] {
        return this.#values;
    }

    /**
     * Fails only when there are more than 255 values, since BIP-32 stores depth in a single byte.
     */
    public static tryNew(values: readonly PathValue[]): Result<CustomHDPath, HDPathError> {
        if (values.length > HDPathConfig.MAX_PATH_LENGTH) {
            return err(HDPathError.invalidLength(values.length));
        }

        return ok(new CustomHDPath(values));
    }

    /**
     * @throws {HDPathError} If there are more than 255 values
     */
    public static of(values: readonly PathValue[]): CustomHDPath {
        const result = CustomHDPath.tryNew(values);
        if (!result.ok) throw result.error;

        return result.value;
    }

    public static tryParse(text: string): Result<CustomHDPath, HDPathError> {
        const values = PathParser.parse(text);
        if (!values.ok) return values;

        return CustomHDPath.tryNew(values.value);
    }

    /**
     * @throws {HDPathError} If the text is not a valid path
     */
    public static parse(text: string): CustomHDPath {
        const result = CustomHDPath.tryParse(text);
        if (!result.ok) throw result.error;

        return result.value;
    }

    public static fromBytes(bytes: BufferLike): Result<CustomHDPath, HDPathError> {
        const values = PathCodec.decode(bytes);
        if (!values.ok) return values;

        return CustomHDPath.tryNew(values.value);
    }

    /**
     * Copies the values of any other path shape.
     */
    public static from(path: HDPath): CustomHDPath {
        return new CustomHDPath(pathValues(path));
    }

    /**
     * Orders by raw values, segment by segment; a prefix sorts before the longer path.
     */
    public static compare(a: CustomHDPath, b: CustomHDPath): number {
        return tupleCompare(
            a.#values.map((value) => value.toRaw()),
            b.#values.map((value) => value.toRaw()),
        );
    }

    public get(position: number): PathValue | undefined {
        return this.#values[position];
    }

    public isEmpty(): boolean {
        return this.#values.length === 0;
    }

    public toBytes(): Uint8Array {
        return PathCodec.encodeValues(this.#values);
    }

    public parent(): Result<CustomHDPath, HDPathError> {
        if (this.isEmpty()) return err(HDPathError.invalidLength(0));

        return ok(new CustomHDPath(this.#values.slice(0, -1)));
    }

    /**
     * Appends a value, returning a new path.
     */
    public child(value: PathValue): Result<CustomHDPath, HDPathError> {
        return CustomHDPath.tryNew([...this.#values, value]);
    }

    public toCustom(): CustomHDPath {
        return this;
    }

    public equals(other: HDPath): boolean {
        if (other.length !== this.length) return false;

        for (let i = 0; i < this.length; i++) {
            const value = other.get(i);
            if (!value || !this.#values[i].equals(value)) return false;
        }

        return true;
    }

    public compare(other: CustomHDPath): number {
        return CustomHDPath.compare(this, other);
    }

    public toString(): string {
        return PathParser.format(this.#values);
    }
}
