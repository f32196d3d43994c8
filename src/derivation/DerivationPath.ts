import { StandardHDPath } from '../path/StandardHDPath.js';

/**
 * First receive address path of the common HD wallet layouts
 */
export enum DerivationPath {
    BIP44 = "m/44'/0'/0'/0/0", // Legacy (P2PKH)
    BIP49 = "m/49'/0'/0'/0/0", // SegWit (P2SH-P2WPKH)
    BIP84 = "m/84'/0'/0'/0/0", // Native SegWit (P2WPKH)
    BIP86 = "m/86'/0'/0'/0/0", // Taproot (P2TR)
}

export function toStandardPath(path: DerivationPath): StandardHDPath {
    return StandardHDPath.parse(path);
}
