import { FieldError, fieldErrorMessage, HDPathError } from '../errors/HDPathError.js';
import { tupleCompare } from '../utils/Comparison.js';
import { BufferLike, ok, Result, u31, u8 } from '../utils/types.js';
import { AccountHDPath } from './AccountHDPath.js';
import { CustomHDPath } from './CustomHDPath.js';
import { HDPath } from './HDPath.js';
import { PathCodec } from './PathCodec.js';
import { checkFields, matchShape, SHORT_PATTERN } from './PathShape.js';
import { PathValue } from './PathValue.js';
import { Purpose } from './Purpose.js';

/**
 * Short HD path without the change level, `m/purpose'/coin_type'/account'/index`, like `m/44'/60'/0'/0`.
 *
 * @category Path
 */
export class ShortHDPath implements HDPath {
    public static readonly LENGTH: u8 = 4;

    private constructor(
        public readonly purpose: Purpose,
        public readonly coinType: u31,
        public readonly account: u31,
        public readonly index: u31,
    ) {}

    public get length(): u8 {
        return ShortHDPath.LENGTH;
    }

    public static tryNew(
        purpose: Purpose | number,
        coinType: number,
        account: number,
        index: number,
    ): Result<ShortHDPath, FieldError> {
        const checked = checkFields(purpose, [
            ['coinType', coinType],
            ['account', account],
            ['index', index],
        ]);
        if (!checked.ok) return checked;

        return ok(new ShortHDPath(checked.value, coinType, account, index));
    }

    /**
     * @throws {Error} If any of the values is incorrect
     */
    public static of(
        purpose: Purpose | number,
        coinType: number,
        account: number,
        index: number,
    ): ShortHDPath {
        const result = ShortHDPath.tryNew(purpose, coinType, account, index);
        if (!result.ok) throw new Error(fieldErrorMessage(result.error));

        return result.value;
    }

    public static fromCustom(path: HDPath): Result<ShortHDPath, HDPathError> {
        const shape = matchShape(path, SHORT_PATTERN);
        if (!shape.ok) return shape;

        const [coinType, account, index] = shape.value.fields;
        return ok(new ShortHDPath(shape.value.purpose, coinType, account, index));
    }

    public static tryParse(text: string): Result<ShortHDPath, HDPathError> {
        const custom = CustomHDPath.tryParse(text);
        if (!custom.ok) return custom;

        return ShortHDPath.fromCustom(custom.value);
    }

    /**
     * @throws {HDPathError} If the text is not a short path
     */
    public static parse(text: string): ShortHDPath {
        const result = ShortHDPath.tryParse(text);
        if (!result.ok) throw result.error;

        return result.value;
    }

    public static fromBytes(bytes: BufferLike): Result<ShortHDPath, HDPathError> {
        const values = PathCodec.decode(bytes, ShortHDPath.LENGTH);
        if (!values.ok) return values;

        const custom = CustomHDPath.tryNew(values.value);
        if (!custom.ok) return custom;

        return ShortHDPath.fromCustom(custom.value);
    }

    public static compare(a: ShortHDPath, b: ShortHDPath): number {
        return tupleCompare(
            [a.purpose.code, a.coinType, a.account, a.index],
            [b.purpose.code, b.coinType, b.account, b.index],
        );
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

    public equals(other: ShortHDPath): boolean {
        return ShortHDPath.compare(this, other) === 0;
    }

    public compare(other: ShortHDPath): number {
        return ShortHDPath.compare(this, other);
    }

    public toString(): string {
        return this.toCustom().toString();
    }
}
