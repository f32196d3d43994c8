export type BufferLike = Uint8Array | Buffer;

export type u8 = number;
export type u31 = number;
export type u32 = number;

export type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
    return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
    return { ok: false, error };
}
