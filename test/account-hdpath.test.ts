import { describe, expect, it } from 'vitest';
import {
    AccountHDPath,
    CustomHDPath,
    HDPathErrorCode,
    Purpose,
    ShortHDPath,
    StandardHDPath,
} from '../src/hdpath.js';

describe('AccountHDPath', () => {
    describe('Parsing', () => {
        it('should parse each purpose', () => {
            expect(AccountHDPath.parse("m/84'/0'/5'").purpose).toBe(Purpose.Witness);
            expect(AccountHDPath.parse("m/49'/0'/5'").purpose).toBe(Purpose.ScriptHash);
            expect(AccountHDPath.parse("m/44'/0'/5'").purpose).toBe(Purpose.Pubkey);

            const custom = AccountHDPath.parse("m/218'/0'/5'");
            expect(custom.purpose.isCustom()).toBe(true);
            expect(custom.purpose.code).toBe(218);
            expect(custom.coinType).toBe(0);
            expect(custom.account).toBe(5);
        });

        it('should accept the placeholder suffix', () => {
            const account = AccountHDPath.parse("m/84'/0'/5'/x/x");

            expect(account.equals(AccountHDPath.of(Purpose.Witness, 0, 5))).toBe(true);
        });

        it('should render canonical and placeholder forms', () => {
            const account = AccountHDPath.of(Purpose.Witness, 0, 1);

            expect(account.toString()).toBe("m/84'/0'/1'");
            expect(account.toAccountString()).toBe("m/84'/0'/1'/x/x");
        });

        it('should keep the account part of a full address path', () => {
            const result = AccountHDPath.tryParse("m/84'/0'/5'/0/101");

            expect(result.ok).toBe(true);
            if (result.ok) {
                expect(result.value.equals(AccountHDPath.of(Purpose.Witness, 0, 5))).toBe(true);
                expect(result.value.toString()).toBe("m/84'/0'/5'");
            }
        });

        it('should still check the hardness of a full address path', () => {
            const result = AccountHDPath.tryParse("m/84'/0'/5/0/101");

            expect(result.ok).toBe(false);
            if (!result.ok) expect(result.error.code).toBe(HDPathErrorCode.InvalidStructure);
        });

        it('should reject a path shorter than an account', () => {
            const result = AccountHDPath.tryParse("m/84'/0'");

            expect(result.ok).toBe(false);
            if (!result.ok) {
                expect(result.error.code).toBe(HDPathErrorCode.InvalidLength);
                expect(result.error.length).toBe(2);
            }
        });

        it('should reject a normal account value', () => {
            const result = AccountHDPath.tryParse("m/84'/0'/0");

            expect(result.ok).toBe(false);
            if (!result.ok) expect(result.error.code).toBe(HDPathErrorCode.InvalidStructure);
        });
    });

    describe('fromCustom', () => {
        it('should fail with InvalidLength(5) for a 5-long path', () => {
            const result = AccountHDPath.fromCustom(CustomHDPath.parse("m/84'/0'/0'/0/0"));

            expect(result.ok).toBe(false);
            if (!result.ok) {
                expect(result.error.code).toBe(HDPathErrorCode.InvalidLength);
                expect(result.error.length).toBe(5);
            }
        });

        it('should take the account part of a longer path through fromPrefix', () => {
            const result = AccountHDPath.fromPrefix(CustomHDPath.parse("m/84'/0'/3'/0/101"));

            expect(result.ok).toBe(true);
            if (result.ok) expect(result.value.toString()).toBe("m/84'/0'/3'");
        });

        it('should fail fromPrefix for a shorter path', () => {
            const result = AccountHDPath.fromPrefix(CustomHDPath.parse("m/84'/0'"));

            expect(result.ok).toBe(false);
            if (!result.ok) expect(result.error.length).toBe(2);
        });
    });

    describe('Field validation', () => {
        it('should report the first invalid field', () => {
            expect(AccountHDPath.tryNew(Purpose.Witness, 0x80000000, 0x80000001)).toEqual({
                ok: false,
                error: { field: 'coinType', value: 0x80000000 },
            });
            expect(AccountHDPath.tryNew(Purpose.Witness, 0, 0x80000001)).toEqual({
                ok: false,
                error: { field: 'account', value: 0x80000001 },
            });
        });

        it('should throw from the convenience constructor', () => {
            expect(() => AccountHDPath.of(Purpose.Witness, 0, 0x80000000)).toThrow(
                'Invalid account: 2147483648',
            );
        });
    });

    describe('Derivation', () => {
        it('should build a change address path', () => {
            const result = AccountHDPath.of(Purpose.Witness, 0, 0).addressAt(1, 3);

            expect(result.ok).toBe(true);
            if (result.ok) {
                expect(result.value.equals(StandardHDPath.parse("m/84'/0'/0'/1/3"))).toBe(true);
            }
        });

        it('should build a receive address path', () => {
            const result = AccountHDPath.parse("m/84'/0'/0'").addressAt(0, 15);

            expect(result.ok).toBe(true);
            if (result.ok) expect(result.value.toString()).toBe("m/84'/0'/0'/0/15");
        });

        it('should reject a hardened-range index', () => {
            const result = AccountHDPath.parse("m/84'/0'/0'").addressAt(0, 0x80000000);

            expect(result).toEqual({ ok: false, error: { field: 'index', value: 0x80000000 } });
        });

        it('should build a short path', () => {
            const result = AccountHDPath.parse("m/44'/60'/0'").shortAt(4);

            expect(result.ok).toBe(true);
            if (result.ok) expect(result.value.equals(ShortHDPath.parse("m/44'/60'/0'/4"))).toBe(true);
        });

        it('should be recovered from a standard path', () => {
            const pairs: Array<[string, string]> = [
                ["m/84'/0'/0'/0/15", "m/84'/0'/0'"],
                ["m/84'/0'/3'/0/0", "m/84'/0'/3'"],
                ["m/44'/1'/1'/0/0", "m/44'/1'/1'"],
            ];

            for (const [full, account] of pairs) {
                expect(StandardHDPath.parse(full).toAccount().equals(AccountHDPath.parse(account))).toBe(
                    true,
                );
            }
        });
    });

    describe('HDPath contract', () => {
        it('should expose three hardened values', () => {
            const account = AccountHDPath.parse("m/44'/60'/2'");

            expect(account.length).toBe(3);
            expect(account.get(0)?.toString()).toBe("44'");
            expect(account.get(1)?.toString()).toBe("60'");
            expect(account.get(2)?.toString()).toBe("2'");
            expect(account.get(3)).toBeUndefined();
        });

        it('should drop the account for the parent', () => {
            const result = AccountHDPath.parse("m/44'/60'/2'").parent();

            expect(result.ok).toBe(true);
            if (result.ok) expect(result.value.toString()).toBe("m/44'/60'");
        });

        it('should sort by purpose, coin type and account', () => {
            const accounts = [
                AccountHDPath.parse("m/84'/0'/0'"),
                AccountHDPath.parse("m/44'/1'/0'"),
                AccountHDPath.parse("m/44'/0'/7'"),
            ];
            accounts.sort(AccountHDPath.compare);

            expect(accounts.map((a) => a.toString())).toEqual([
                "m/44'/0'/7'",
                "m/44'/1'/0'",
                "m/84'/0'/0'",
            ]);
        });
    });
});
