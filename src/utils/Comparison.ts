export function numberCompare(a: number, b: number): number {
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
}

/**
 * Compares two tuples element by element; a shorter tuple that is a prefix of the other sorts first.
 */
export function tupleCompare(a: readonly number[], b: readonly number[]): number {
    const shared = Math.min(a.length, b.length);
    for (let i = 0; i < shared; i++) {
        const result = numberCompare(a[i], b[i]);
        if (result !== 0) return result;
    }

    return numberCompare(a.length, b.length);
}
