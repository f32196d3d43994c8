import { describe, expect, it } from 'vitest';
import { CustomHDPath, HDPathErrorCode, Purpose, ShortHDPath } from '../src/hdpath.js';

describe('ShortHDPath', () => {
    it('should render its fields', () => {
        expect(ShortHDPath.of(Purpose.Pubkey, 60, 0, 0).toString()).toBe("m/44'/60'/0'/0");
        expect(ShortHDPath.of(Purpose.Pubkey, 61, 0, 0).toString()).toBe("m/44'/61'/0'/0");
        expect(ShortHDPath.of(Purpose.custom(101), 61, 0, 0).toString()).toBe("m/101'/61'/0'/0");
    });

    it('should return canonical text unchanged', () => {
        const paths = ["m/44'/0'/0'/0", "m/44'/60'/0'/1", "m/44'/60'/160720'/0", "m/44'/60'/160720'/101"];

        for (const path of paths) {
            expect(ShortHDPath.parse(path).toString()).toBe(path);
        }
    });

    it('should expose its fields', () => {
        const path = ShortHDPath.parse("m/44'/60'/160720'/101");

        expect(path.purpose).toBe(Purpose.Pubkey);
        expect(path.coinType).toBe(60);
        expect(path.account).toBe(160720);
        expect(path.index).toBe(101);
        expect(path.get(3)?.isNormal()).toBe(true);
    });

    it('should require four values', () => {
        const result = ShortHDPath.fromCustom(CustomHDPath.parse("m/44'/60'/0'/0/0"));

        expect(result.ok).toBe(false);
        if (!result.ok) {
            expect(result.error.code).toBe(HDPathErrorCode.InvalidLength);
            expect(result.error.length).toBe(5);
        }
    });

    it('should require a normal index', () => {
        const result = ShortHDPath.tryParse("m/44'/60'/0'/0'");

        expect(result.ok).toBe(false);
        if (!result.ok) expect(result.error.code).toBe(HDPathErrorCode.InvalidStructure);
    });

    it('should report an invalid index', () => {
        expect(ShortHDPath.tryNew(Purpose.Pubkey, 60, 0, 0x80000000)).toEqual({
            ok: false,
            error: { field: 'index', value: 0x80000000 },
        });
    });

    it('should project to its account', () => {
        expect(ShortHDPath.parse("m/44'/60'/3'/9").toAccount().toString()).toBe("m/44'/60'/3'");
    });

    it('should order by index within an account', () => {
        const first = ShortHDPath.parse("m/44'/60'/0'/1");
        const second = ShortHDPath.parse("m/44'/60'/0'/2");

        expect(first.compare(second)).toBe(-1);
        expect(second.compare(first)).toBe(1);
        expect(first.equals(ShortHDPath.parse("m/44H/60H/0H/1"))).toBe(true);
    });
});
