import { HDPathConfig } from '../config/HDPathConfig.js';
import { HDPathError } from '../errors/HDPathError.js';
import { numberCompare } from '../utils/Comparison.js';
import { err, ok, Result, u31 } from '../utils/types.js';
import { PathValue } from './PathValue.js';

/**
 * Purpose codes with a dedicated name, as defined by BIP-43 and the BIPs built on it.
 *
 * @see https://github.com/bitcoin/bips/blob/master/bip-0043.mediawiki
 */
export enum PurposeCode {
    /** No purpose, `m/0'` */
    None = 0,

    /**
     * BIP44: Multi-Account Hierarchy for Deterministic Wallets
     *
     * Path: m/44'/coin_type'/account'/change/address_index
     *
     * @see https://github.com/bitcoin/bips/blob/master/bip-0044.mediawiki
     */
    Pubkey = 44,

    /**
     * BIP49: Derivation scheme for P2WPKH-nested-in-P2SH based accounts
     *
     * @see https://github.com/bitcoin/bips/blob/master/bip-0049.mediawiki
     */
    ScriptHash = 49,

    /**
     * BIP84: Derivation scheme for P2WPKH based accounts
     *
     * @see https://github.com/bitcoin/bips/blob/master/bip-0084.mediawiki
     */
    Witness = 84,
}

export enum PurposeKind {
    None = 'None',
    Pubkey = 'Pubkey',
    ScriptHash = 'ScriptHash',
    Witness = 'Witness',
    Custom = 'Custom',
}

/**
 * Get a human-readable description of a purpose code
 */
export function getPurposeDescription(code: number): string {
    switch (code) {
        case PurposeCode.None:
            return 'None: no purpose';
        case PurposeCode.Pubkey:
            return 'BIP44: Legacy addresses (P2PKH)';
        case PurposeCode.ScriptHash:
            return 'BIP49: Wrapped SegWit addresses (P2SH-P2WPKH)';
        case PurposeCode.Witness:
            return 'BIP84: Native SegWit addresses (P2WPKH)';
        default:
            return `Custom purpose ${code}`;
    }
}

/**
 * The first segment of a structured HD path. Always hardened.
 *
 * Two purposes are equal when their codes are equal, whatever their kind:
 * `Purpose.custom(44)` equals `Purpose.Pubkey`. Sorting follows the code as well.
 *
 * @category Path
 */
export class Purpose {
    public static readonly None: Purpose = new Purpose(PurposeKind.None, PurposeCode.None);
    public static readonly Pubkey: Purpose = new Purpose(PurposeKind.Pubkey, PurposeCode.Pubkey);
    public static readonly ScriptHash: Purpose = new Purpose(
        PurposeKind.ScriptHash,
        PurposeCode.ScriptHash,
    );
    public static readonly Witness: Purpose = new Purpose(
        PurposeKind.Witness,
        PurposeCode.Witness,
    );

    private constructor(
        public readonly kind: PurposeKind,
        public readonly code: u31,
    ) {}

    /**
     * Maps 44, 49 and 84 to their named purpose; any other code below 2^31 becomes a custom one.
     */
    public static tryFrom(code: number): Result<Purpose, HDPathError> {
        switch (code) {
            case PurposeCode.Pubkey:
                return ok(Purpose.Pubkey);
            case PurposeCode.ScriptHash:
                return ok(Purpose.ScriptHash);
            case PurposeCode.Witness:
                return ok(Purpose.Witness);
        }

        if (!Number.isInteger(code) || code < 0) {
            return err(HDPathError.invalidPurpose(code));
        }

        if (code >= HDPathConfig.HARDENED_BIT) {
            return err(HDPathError.highBitIsSet(code));
        }

        return ok(new Purpose(PurposeKind.Custom, code));
    }

    /**
     * @throws {HDPathError} If the code cannot be a purpose
     */
    public static from(code: number): Purpose {
        const result = Purpose.tryFrom(code);
        if (!result.ok) throw result.error;

        return result.value;
    }

    /**
     * Builds a custom purpose. Named codes still resolve to their named purpose.
     * @throws {HDPathError} If the code cannot be a purpose
     */
    public static custom(code: number): Purpose {
        return Purpose.from(code);
    }

    /** Reads the magnitude of a path value, whether it is hardened or not */
    public static fromPathValue(value: PathValue): Result<Purpose, HDPathError> {
        return Purpose.tryFrom(value.asNumber());
    }

    public static compare(a: Purpose, b: Purpose): number {
        return numberCompare(a.code, b.code);
    }

    public isCustom(): boolean {
        return this.kind === PurposeKind.Custom;
    }

    public asValue(): PathValue {
        return PathValue.hardened(this.code);
    }

    public equals(other: Purpose): boolean {
        return this.code === other.code;
    }

    public compare(other: Purpose): number {
        return Purpose.compare(this, other);
    }

    public describe(): string {
        return getPurposeDescription(this.code);
    }

    public toString(): string {
        return this.kind === PurposeKind.Custom ? `Custom(${this.code})` : this.kind;
    }
}
