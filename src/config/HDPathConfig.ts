export interface IHDPathConfig {
    /** Bit marking a hardened value in its raw 32-bit form */
    readonly HARDENED_BIT: number;
    /** The largest raw 32-bit word */
    readonly MAX_RAW_VALUE: number;
    /** BIP-32 encodes depth in one byte */
    readonly MAX_PATH_LENGTH: number;
    readonly HARDENED_MARKERS: readonly string[];
    readonly OUTPUT_HARDENED_MARKER: string;
    readonly ROOT_MARKERS: readonly string[];
    readonly SEPARATOR: string;
    /** Placeholder for the unused change/index positions of an account path */
    readonly ACCOUNT_PLACEHOLDER_SUFFIX: string;
}

export const HDPathConfig: IHDPathConfig = Object.freeze({
    HARDENED_BIT: 0x80000000,
    MAX_RAW_VALUE: 0xffffffff,
    MAX_PATH_LENGTH: 0xff,
    HARDENED_MARKERS: Object.freeze(["'", 'H', 'h']),
    OUTPUT_HARDENED_MARKER: "'",
    ROOT_MARKERS: Object.freeze(['m', 'M']),
    SEPARATOR: '/',
    ACCOUNT_PLACEHOLDER_SUFFIX: '/x/x',
});
