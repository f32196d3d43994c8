import { Logger } from '@btc-vision/logger';
import { BIP32Interface } from 'bip32';
import { HDPath, pathValues } from '../path/HDPath.js';
import { u31, u32 } from '../utils/types.js';

export interface PathSegment {
    readonly hardened: boolean;
    readonly index: u31;
}

/**
 * The (hardened, magnitude) pairs of a path, in derivation order.
 */
export function toPathSegments(path: HDPath): PathSegment[] {
    return pathValues(path).map((value) => ({
        hardened: value.isHardened(),
        index: value.asNumber(),
    }));
}

/**
 * Raw BIP-32 child numbers, hardened ones offset by 2^31.
 */
export function toChildIndexes(path: HDPath): u32[] {
    return pathValues(path).map((value) => value.toRaw());
}

/**
 * Walks a BIP-32 node down an HD path. The key derivation itself is done by `bip32`.
 *
 * @example
 * ```typescript
 * const deriver = new HDPathDeriver();
 * const node = deriver.derive(root, StandardHDPath.parse("m/84'/0'/0'/0/0"));
 * ```
 */
export class HDPathDeriver extends Logger {
    public override readonly logColor: string = '#f7931a';

    /**
     * @param root - Node the path starts from
     * @param path - Any path shape
     * @throws {Error} If the path has a hardened segment and the node only holds a public key
     */
    public derive(root: BIP32Interface, path: HDPath): BIP32Interface {
        const segments = toPathSegments(path);

        if (root.isNeutered() && segments.some((segment) => segment.hardened)) {
            this.error(`Cannot derive ${path.toString()} from a public-only node.`);

            throw new Error(`Path ${path.toString()} has hardened segments, missing private key`);
        }

        let node = root;
        for (const segment of segments) {
            node = segment.hardened ? node.deriveHardened(segment.index) : node.derive(segment.index);
        }

        this.log(`Derived ${path.toString()} at depth ${node.depth}.`);

        return node;
    }

    /**
     * Derives every path from the same root.
     */
    public deriveAll(root: BIP32Interface, paths: readonly HDPath[]): BIP32Interface[] {
        return paths.map((path) => this.derive(root, path));
    }
}
