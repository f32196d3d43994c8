export enum HDPathErrorCode {
    /** A plain magnitude was expected but the value already carries the hardened bit */
    HighBitIsSet = 'HighBitIsSet',
    InvalidLength = 'InvalidLength',
    InvalidPurpose = 'InvalidPurpose',
    /** Length matched, hardness did not (or a parsed path had no segments) */
    InvalidStructure = 'InvalidStructure',
    InvalidFormat = 'InvalidFormat',
}

export type HDPathField = 'purpose' | 'coinType' | 'account' | 'change' | 'index';

/**
 * First field of a fixed-shape path that failed its range check.
 */
export interface FieldError {
    readonly field: HDPathField;
    readonly value: number;
}

/**
 * @category Errors
 */
export class HDPathError extends Error {
    public readonly code: HDPathErrorCode;

    /** Element or byte count that was found, for {@link HDPathErrorCode.InvalidLength} */
    public readonly length?: number;

    /** Rejected purpose code, for {@link HDPathErrorCode.InvalidPurpose} */
    public readonly purpose?: number;

    private constructor(
        code: HDPathErrorCode,
        message: string,
        details: { length?: number; purpose?: number } = {},
    ) {
        super(message);

        this.name = 'HDPathError';
        this.code = code;
        this.length = details.length;
        this.purpose = details.purpose;
    }

    public static highBitIsSet(value: number): HDPathError {
        return new HDPathError(
            HDPathErrorCode.HighBitIsSet,
            `Value ${value} is in the hardened range`,
        );
    }

    public static invalidLength(length: number): HDPathError {
        return new HDPathError(HDPathErrorCode.InvalidLength, `Invalid path length ${length}`, {
            length,
        });
    }

    public static invalidPurpose(purpose: number): HDPathError {
        return new HDPathError(HDPathErrorCode.InvalidPurpose, `Invalid purpose ${purpose}`, {
            purpose,
        });
    }

    public static invalidStructure(): HDPathError {
        return new HDPathError(HDPathErrorCode.InvalidStructure, 'Invalid path structure');
    }

    public static invalidFormat(reason: string = 'Invalid path format'): HDPathError {
        return new HDPathError(HDPathErrorCode.InvalidFormat, reason);
    }
}

export function fieldErrorMessage(error: FieldError): string {
    return `Invalid ${error.field}: ${error.value}`;
}
