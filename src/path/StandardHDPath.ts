import { FieldError, fieldErrorMessage, HDPathError } from '../errors/HDPathError.js';
import { tupleCompare } from '../utils/Comparison.js';
import { BufferLike, ok, Result, u31, u8 } from '../utils/types.js';
import { AccountHDPath } from './AccountHDPath.js';
import { CustomHDPath } from './CustomHDPath.js';
import { HDPath } from './HDPath.js';
import { PathCodec } from './PathCodec.js';
import { checkFields, matchShape, STANDARD_PATTERN } from './PathShape.js';
import { PathValue } from './PathValue.js';
import { Purpose } from './Purpose.js';

/**
 * Standard HD path for BIP-44, BIP-49, BIP-84 and similar:
 * `m/purpose'/coin_type'/account'/change/address_index`, like `m/44'/0'/0'/0/0`.
 *
 * @example
 * ```typescript
 * // m/84'/0'/0'/0/0
 * const path = StandardHDPath.of(Purpose.Witness, 0, 0, 0, 0);
 * const parsed = StandardHDPath.parse("m/84'/0'/0'/0/0");
 *
 * // Values from an unreliable source
 * const result = StandardHDPath.tryNew(Purpose.Witness, 0, 2, 0, index);
 * if (!result.ok) console.log(`Invalid value ${result.error.field} = ${result.error.value}`);
 * ```
 *
 * @category Path
 */
export class StandardHDPath implements HDPath {
    public static readonly LENGTH: u8 = 5;

    private constructor(
        public readonly purpose: Purpose,
        public readonly coinType: u31,
        public readonly account: u31,
        public readonly change: u31,
        public readonly index: u31,
    ) {}

    public get length(): u8 {
        return StandardHDPath.LENGTH;
    }

    /**
     * Validates the fields in order: purpose, coinType, account, change, index.
     * Returns the first invalid field with its value.
     */
    public static tryNew(
        purpose: Purpose | number,
        coinType: number,
        account: number,
        change: number,
        index: number,
    ): Result<StandardHDPath, FieldError> {
        const checked = checkFields(purpose, [
            ['coinType', coinType],
            ['account', account],
            ['change', change],
            ['index', index],
        ]);
        if (!checked.ok) return checked;

        return ok(new StandardHDPath(checked.value, coinType, account, change, index));
    }

    /**
     * Creates a path from values known to be valid.
     * @throws {Error} If any of the values is incorrect
     */
    public static of(
        purpose: Purpose | number,
        coinType: number,
        account: number,
        change: number,
        index: number,
    ): StandardHDPath {
        const result = StandardHDPath.tryNew(purpose, coinType, account, change, index);
        if (!result.ok) throw new Error(fieldErrorMessage(result.error));

        return result.value;
    }

    /** `m/44'/0'/0'/0/0` */
    public static default(): StandardHDPath {
        return new StandardHDPath(Purpose.Pubkey, 0, 0, 0, 0);
    }

    public static fromCustom(path: HDPath): Result<StandardHDPath, HDPathError> {
        const shape = matchShape(path, STANDARD_PATTERN);
        if (!shape.ok) return shape;

        const [coinType, account, change, index] = shape.value.fields;
        return ok(new StandardHDPath(shape.value.purpose, coinType, account, change, index));
    }

    public static tryParse(text: string): Result<StandardHDPath, HDPathError> {
        const custom = CustomHDPath.tryParse(text);
        if (!custom.ok) return custom;

        return StandardHDPath.fromCustom(custom.value);
    }

    /**
     * @throws {HDPathError} If the text is not a standard path
     */
    public static parse(text: string): StandardHDPath {
        const result = StandardHDPath.tryParse(text);
        if (!result.ok) throw result.error;

        return result.value;
    }

    public static fromBytes(bytes: BufferLike): Result<StandardHDPath, HDPathError> {
        const values = PathCodec.decode(bytes, StandardHDPath.LENGTH);
        if (!values.ok) return values;

        const custom = CustomHDPath.tryNew(values.value);
        if (!custom.ok) return custom;

        return StandardHDPath.fromCustom(custom.value);
    }

    /**
     * Orders by purpose code, coin type, account, change and index.
     */
    public static compare(a: StandardHDPath, b: StandardHDPath): number {
        return tupleCompare(a.toTuple(), b.toTuple());
    }

    public get(position: number): PathValue | undefined {
        switch (position) {
            case 0:
                return this.purpose.asValue();
            case 1:
                return PathValue.hardened(this.coinType);
            case 2:
                return PathValue.hardened(this.account);
            case 3:
                return PathValue.normal(this.change);
            case 4:
                return PathValue.normal(this.index);
            default:
                return undefined;
        }
    }

    public toBytes(): Uint8Array {
        return PathCodec.encode(this);
    }

    public parent(): Result<CustomHDPath, HDPathError> {
        return this.toCustom().parent();
    }

    public toCustom(): CustomHDPath {
        return CustomHDPath.from(this);
    }

    public toAccount(): AccountHDPath {
        return AccountHDPath.of(this.purpose, this.coinType, this.account);
    }

    public equals(other: StandardHDPath): boolean {
        return StandardHDPath.compare(this, other) === 0;
    }

    public compare(other: StandardHDPath): number {
        return StandardHDPath.compare(this, other);
    }

    public toString(): string {
        return this.toCustom().toString();
    }

    private toTuple(): number[] {
        return [this.purpose.code, this.coinType, this.account, this.change, this.index];
    }
}
