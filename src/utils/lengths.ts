export const U32_BYTE_LENGTH: number = 4;
export const U8_BYTE_LENGTH: number = 1;

/** Size of the length prefix in front of the encoded path values */
export const PATH_PREFIX_BYTE_LENGTH: number = U8_BYTE_LENGTH;
