import { HDPathConfig } from '../config/HDPathConfig.js';
import { HDPathError } from '../errors/HDPathError.js';
import { err, ok, Result } from '../utils/types.js';
import { PathValue } from './PathValue.js';

enum ScannerState {
    AwaitingDigit,
    InNumber,
    JustMarked,
}

const CHAR_0 = 0x30;
const CHAR_9 = 0x39;
const SEPARATOR = HDPathConfig.SEPARATOR.charCodeAt(0);
const HARDENED_MARKERS: ReadonlySet<number> = new Set(
    HDPathConfig.HARDENED_MARKERS.map((marker) => marker.charCodeAt(0)),
);
const ROOT_MARKERS: ReadonlySet<number> = new Set(
    HDPathConfig.ROOT_MARKERS.map((marker) => marker.charCodeAt(0)),
);

/**
 * Converts between the text notation of an HD path and its segments.
 *
 * Accepted input is `m/` (or `M/`) followed by `/`-separated decimal numbers,
 * each optionally followed by one hardened marker: `'`, `H` or `h`.
 * Output always uses `'`.
 *
 * @example
 * ```typescript
 * const values = PathParser.parse("M/44H/0H/0H/1/5");
 * if (values.ok) {
 *     PathParser.format(values.value); // "m/44'/0'/0'/1/5"
 * }
 * ```
 */
export class PathParser {
    /**
     * Scans the text left to right, one character at a time, without backtracking.
     */
    public static parse(text: string): Result<PathValue[], HDPathError> {
        if (text.length < 2) {
            return err(HDPathError.invalidFormat(`Path "${text}" is too short`));
        }

        if (!ROOT_MARKERS.has(text.charCodeAt(0)) || text.charCodeAt(1) !== SEPARATOR) {
            return err(HDPathError.invalidFormat(`Path "${text}" does not start at the root`));
        }

        const values: PathValue[] = [];
        let state: ScannerState = ScannerState.AwaitingDigit;
        let num = 0;

        for (let pos = 2; pos < text.length; pos++) {
            const char = text.charCodeAt(pos);

            switch (state) {
                case ScannerState.AwaitingDigit: {
                    if (!PathParser.isDigit(char)) {
                        return err(PathParser.unexpected(text, pos));
                    }

                    num = char - CHAR_0;
                    state = ScannerState.InNumber;
                    break;
                }
                case ScannerState.InNumber: {
                    if (PathParser.isDigit(char)) {
                        num = num * 10 + (char - CHAR_0);
                    } else if (HARDENED_MARKERS.has(char)) {
                        const closed = PathParser.close(num, true);
                        if (!closed) return err(PathParser.outOfRange(num));

                        values.push(closed);
                        state = ScannerState.JustMarked;
                    } else if (char === SEPARATOR) {
                        const closed = PathParser.close(num, false);
                        if (!closed) return err(PathParser.outOfRange(num));

                        values.push(closed);
                        state = ScannerState.AwaitingDigit;
                    } else {
                        return err(PathParser.unexpected(text, pos));
                    }
                    break;
                }
                case ScannerState.JustMarked: {
                    if (char !== SEPARATOR) {
                        return err(PathParser.unexpected(text, pos));
                    }

                    state = ScannerState.AwaitingDigit;
                    break;
                }
            }
        }

        switch (state) {
            case ScannerState.AwaitingDigit:
                return err(HDPathError.invalidFormat(`Path "${text}" ends with a separator`));
            case ScannerState.InNumber: {
                const closed = PathParser.close(num, false);
                if (!closed) return err(PathParser.outOfRange(num));

                values.push(closed);
                break;
            }
            case ScannerState.JustMarked:
                break;
        }

        if (values.length === 0) {
            return err(HDPathError.invalidStructure());
        }

        return ok(values);
    }

    /**
     * Renders segments as `m/<segment>/<segment>...`.
     */
    public static format(values: readonly PathValue[]): string {
        let result = HDPathConfig.ROOT_MARKERS[0];
        for (const value of values) {
            result += HDPathConfig.SEPARATOR + value.toString();
        }

        return result;
    }

    private static isDigit(char: number): boolean {
        return char >= CHAR_0 && char <= CHAR_9;
    }

    private static close(num: number, hardened: boolean): PathValue | undefined {
        if (!PathValue.isOk(num)) return;

        return hardened ? PathValue.hardened(num) : PathValue.normal(num);
    }

    private static unexpected(text: string, pos: number): HDPathError {
        return HDPathError.invalidFormat(`Unexpected character "${text[pos]}" at ${pos} in "${text}"`);
    }

    private static outOfRange(num: number): HDPathError {
        return HDPathError.invalidFormat(`Path value ${num} is out of range`);
    }
}
