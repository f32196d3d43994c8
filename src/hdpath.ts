export { version } from './_version.js';

/** Config */
export * from './config/HDPathConfig.js';

/** Errors */
export * from './errors/HDPathError.js';

/** Path */
export * from './path/PathValue.js';
export * from './path/Purpose.js';
export * from './path/HDPath.js';
export * from './path/PathParser.js';
export * from './path/PathCodec.js';
export * from './path/PathShape.js';
export * from './path/CustomHDPath.js';
export * from './path/AccountHDPath.js';
export * from './path/ShortHDPath.js';
export * from './path/StandardHDPath.js';

/** Derivation */
export * from './derivation/DerivationPath.js';
export * from './derivation/HDPathDeriver.js';

/** Buffer */
export * from './buffer/BinaryReader.js';
export * from './buffer/BinaryWriter.js';

/** Utils */
export * from './utils/Comparison.js';
export * from './utils/lengths.js';
export * from './utils/types.js';
