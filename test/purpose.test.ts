import { describe, expect, it } from 'vitest';
import {
    getPurposeDescription,
    HDPathErrorCode,
    PathValue,
    Purpose,
    PurposeCode,
    PurposeKind,
} from '../src/hdpath.js';

describe('Purpose', () => {
    describe('tryFrom', () => {
        it('should map standard codes to their named purpose', () => {
            expect(Purpose.from(44)).toBe(Purpose.Pubkey);
            expect(Purpose.from(49)).toBe(Purpose.ScriptHash);
            expect(Purpose.from(84)).toBe(Purpose.Witness);
        });

        it('should wrap any other code as custom', () => {
            const purpose = Purpose.from(101);

            expect(purpose.kind).toBe(PurposeKind.Custom);
            expect(purpose.code).toBe(101);
            expect(purpose.isCustom()).toBe(true);
        });

        it('should wrap code zero as custom, still equal to None', () => {
            const purpose = Purpose.from(0);

            expect(purpose.kind).toBe(PurposeKind.Custom);
            expect(purpose.equals(Purpose.None)).toBe(true);
        });

        it('should fail with HighBitIsSet for codes in the hardened range', () => {
            const result = Purpose.tryFrom(0x80000000);

            expect(result.ok).toBe(false);
            if (!result.ok) expect(result.error.code).toBe(HDPathErrorCode.HighBitIsSet);
        });

        it('should fail with InvalidPurpose for negative codes', () => {
            const result = Purpose.tryFrom(-1);

            expect(result.ok).toBe(false);
            if (!result.ok) {
                expect(result.error.code).toBe(HDPathErrorCode.InvalidPurpose);
                expect(result.error.purpose).toBe(-1);
            }
        });

        it('should read the magnitude of a path value', () => {
            const result = Purpose.fromPathValue(PathValue.hardened(84));

            expect(result.ok).toBe(true);
            if (result.ok) expect(result.value).toBe(Purpose.Witness);
        });
    });

    describe('asValue', () => {
        it('should always be hardened', () => {
            expect(Purpose.Pubkey.asValue().toRaw()).toBe(0x8000002c);
            expect(Purpose.None.asValue().toString()).toBe("0'");
            expect(Purpose.custom(1000).asValue().toString()).toBe("1000'");
        });
    });

    describe('Comparison', () => {
        it('should compare by code', () => {
            expect(Purpose.None.compare(Purpose.Witness)).toBe(-1);
            expect(Purpose.None.compare(Purpose.Pubkey)).toBe(-1);
            expect(Purpose.Pubkey.compare(Purpose.Witness)).toBe(-1);
            expect(Purpose.ScriptHash.compare(Purpose.Witness)).toBe(-1);
            expect(Purpose.custom(0).compare(Purpose.Witness)).toBe(-1);
            expect(Purpose.custom(100).compare(Purpose.Witness)).toBe(1);
            expect(Purpose.custom(50).compare(Purpose.Pubkey)).toBe(1);
        });

        it('should sort named and custom purposes by code only', () => {
            const values = [
                Purpose.Witness,
                Purpose.None,
                Purpose.Pubkey,
                Purpose.ScriptHash,
                Purpose.custom(50),
                Purpose.custom(1000),
            ];

            values.sort(Purpose.compare);

            expect(values.map((purpose) => purpose.code)).toEqual([0, 44, 49, 50, 84, 1000]);
        });

        it('should resolve a custom named code to the named purpose', () => {
            expect(Purpose.custom(44)).toBe(Purpose.Pubkey);
            expect(Purpose.custom(84).equals(Purpose.Witness)).toBe(true);
        });
    });

    describe('Descriptions', () => {
        it('should describe each named purpose', () => {
            expect(getPurposeDescription(PurposeCode.Pubkey)).toBe('BIP44: Legacy addresses (P2PKH)');
            expect(Purpose.Witness.describe()).toBe('BIP84: Native SegWit addresses (P2WPKH)');
            expect(Purpose.custom(86).describe()).toBe('Custom purpose 86');
        });

        it('should name the purpose kind', () => {
            expect(Purpose.ScriptHash.toString()).toBe('ScriptHash');
            expect(Purpose.custom(7).toString()).toBe('Custom(7)');
        });
    });
});
