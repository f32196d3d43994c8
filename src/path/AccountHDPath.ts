import { HDPathConfig } from '../config/HDPathConfig.js';
import { FieldError, fieldErrorMessage, HDPathError } from '../errors/HDPathError.js';
import { tupleCompare } from '../utils/Comparison.js';
import { BufferLike, err, ok, Result, u31, u8 } from '../utils/types.js';
import { CustomHDPath } from './CustomHDPath.js';
import { HDPath, pathValues } from './HDPath.js';
import { PathCodec } from './PathCodec.js';
import { ACCOUNT_PATTERN, checkFields, matchShape } from './PathShape.js';
import { PathValue } from './PathValue.js';
import { Purpose } from './Purpose.js';
import { ShortHDPath } from './ShortHDPath.js';
import { StandardHDPath } from './StandardHDPath.js';

/**
 * Account-only HD path, `m/purpose'/coin_type'/account'`.
 *
 * Not meant to derive addresses itself, but to build the address paths under it.
 * The placeholder form `m/84'/0'/0'/x/x` is accepted when parsing, and so is a full
 * address path, of which only the account part is kept.
 *
 * @example
 * ```typescript
 * const account = AccountHDPath.of(Purpose.Witness, 0, 1);
 * const address = account.addressAt(0, 7); // m/84'/0'/1'/0/7
 * ```
 *
 * @category Path
 */
export class AccountHDPath implements HDPath {
    public static readonly LENGTH: u8 = 3;

    private constructor(
        public readonly purpose: Purpose,
        public readonly coinType: u31,
        public readonly account: u31,
    ) {}

    public get length(): u8 {
        return AccountHDPath.LENGTH;
    }

    /**
     * Validates the fields in order: purpose, coinType, account.
     */
    public static tryNew(
        purpose: Purpose | number,
        coinType: number,
        account: number,
    ): Result<AccountHDPath, FieldError> {
        const checked = checkFields(purpose, [
            ['coinType', coinType],
            ['account', account],
        ]);
        if (!checked.ok) return checked;

        return ok(new AccountHDPath(checked.value, coinType, account));
    }

    /**
     * @throws {Error} If any of the values is incorrect
     */
    public static of(purpose: Purpose | number, coinType: number, account: number): AccountHDPath {
        const result = AccountHDPath.tryNew(purpose, coinType, account);
        if (!result.ok) throw new Error(fieldErrorMessage(result.error));

        return result.value;
    }

    /**
     * Requires exactly three hardened values.
     */
    public static fromCustom(path: HDPath): Result<AccountHDPath, HDPathError> {
        const shape = matchShape(path, ACCOUNT_PATTERN);
        if (!shape.ok) return shape;

        const [coinType, account] = shape.value.fields;
        return ok(new AccountHDPath(shape.value.purpose, coinType, account));
    }

    /**
     * Takes the account part of a longer path, e.g. `m/84'/0'/3'` out of `m/84'/0'/3'/0/0`.
     */
    public static fromPrefix(path: HDPath): Result<AccountHDPath, HDPathError> {
        if (path.length < AccountHDPath.LENGTH) {
            return err(HDPathError.invalidLength(path.length));
        }

        const prefix = CustomHDPath.tryNew(pathValues(path).slice(0, AccountHDPath.LENGTH));
        if (!prefix.ok) return prefix;

        return AccountHDPath.fromCustom(prefix.value);
    }

    public static tryParse(text: string): Result<AccountHDPath, HDPathError> {
        const clean = text.endsWith(HDPathConfig.ACCOUNT_PLACEHOLDER_SUFFIX)
            ? text.slice(0, -HDPathConfig.ACCOUNT_PLACEHOLDER_SUFFIX.length)
            : text;

        const custom = CustomHDPath.tryParse(clean);
        if (!custom.ok) return custom;

        if (custom.value.length > AccountHDPath.LENGTH) {
            return AccountHDPath.fromPrefix(custom.value);
        }

        return AccountHDPath.fromCustom(custom.value);
    }

    /**
     * @throws {HDPathError} If the text is not an account path
     */
    public static parse(text: string): AccountHDPath {
        const result = AccountHDPath.tryParse(text);
        if (!result.ok) throw result.error;

        return result.value;
    }

    public static fromBytes(bytes: BufferLike): Result<AccountHDPath, HDPathError> {
        const values = PathCodec.decode(bytes, AccountHDPath.LENGTH);
        if (!values.ok) return values;

        const custom = CustomHDPath.tryNew(values.value);
        if (!custom.ok) return custom;

        return AccountHDPath.fromCustom(custom.value);
    }

    public static compare(a: AccountHDPath, b: AccountHDPath): number {
        return tupleCompare(
            [a.purpose.code, a.coinType, a.account],
            [b.purpose.code, b.coinType, b.account],
        );
    }

    /**
     * Path to an address within this account.
     * Fails with the offending field when change or index is in the hardened range.
     */
    public addressAt(change: number, index: number): Result<StandardHDPath, FieldError> {
        return StandardHDPath.tryNew(this.purpose, this.coinType, this.account, change, index);
    }

    public shortAt(index: number): Result<ShortHDPath, FieldError> {
        return ShortHDPath.tryNew(this.purpose, this.coinType, this.account, index);
    }

    public get(position: number): PathValue | undefined {
        switch (position) {
            case 0:
                return this.purpose.asValue();
            case 1:
                return PathValue.hardened(this.coinType);
            case 2:
                return PathValue.hardened(this.account);
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

    public equals(other: AccountHDPath): boolean {
        return AccountHDPath.compare(this, other) === 0;
    }

    public compare(other: AccountHDPath): number {
        return AccountHDPath.compare(this, other);
    }

    public toString(): string {
        return this.toCustom().toString();
    }

    /** Placeholder form, `m/84'/0'/0'/x/x` */
    public toAccountString(): string {
        return this.toString() + HDPathConfig.ACCOUNT_PLACEHOLDER_SUFFIX;
    }
}
