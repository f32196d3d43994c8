import { FieldError, HDPathError, HDPathField } from '../errors/HDPathError.js';
import { err, ok, Result } from '../utils/types.js';
import { HDPath } from './HDPath.js';
import { PathValue, PathValueKind } from './PathValue.js';
import { Purpose } from './Purpose.js';

const H = PathValueKind.Hardened;
const N = PathValueKind.Normal;

/** Hardness of each position of the fixed-arity paths */
export const ACCOUNT_PATTERN: readonly PathValueKind[] = [H, H, H];
export const SHORT_PATTERN: readonly PathValueKind[] = [H, H, H, N];
export const STANDARD_PATTERN: readonly PathValueKind[] = [H, H, H, N, N];

export interface MatchedShape {
    readonly purpose: Purpose;
    /** Magnitudes of every position after the purpose */
    readonly fields: readonly number[];
}

/**
 * Narrows a path to a fixed shape: exact length first, then hardness per position, then the purpose.
 */
export function matchShape(
    path: HDPath,
    pattern: readonly PathValueKind[],
): Result<MatchedShape, HDPathError> {
    if (path.length !== pattern.length) {
        return err(HDPathError.invalidLength(path.length));
    }

    const magnitudes: number[] = [];
    for (let i = 0; i < pattern.length; i++) {
        const value = path.get(i);
        if (!value || value.kind !== pattern[i]) {
            return err(HDPathError.invalidStructure());
        }

        magnitudes.push(value.asNumber());
    }

    const purpose = Purpose.tryFrom(magnitudes[0]);
    if (!purpose.ok) return purpose;

    return ok({ purpose: purpose.value, fields: magnitudes.slice(1) });
}

/**
 * Checks each field against the 31-bit range in the given order and reports the first one that fails.
 */
export function checkFields(
    purpose: Purpose | number,
    fields: ReadonlyArray<readonly [HDPathField, number]>,
): Result<Purpose, FieldError> {
    let resolved: Purpose;
    if (purpose instanceof Purpose) {
        resolved = purpose;
    } else {
        const result = PathValue.isOk(purpose) ? Purpose.tryFrom(purpose) : undefined;
        if (!result || !result.ok) return err({ field: 'purpose', value: purpose });

        resolved = result.value;
    }

    for (const [field, value] of fields) {
        if (!PathValue.isOk(value)) return err({ field, value });
    }

    return ok(resolved);
}
