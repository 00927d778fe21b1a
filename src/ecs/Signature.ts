import type { Signature, TypeId } from "./Types";

/** Width of a signature; one bit per component type. */
export const MAX_COMPONENTS = 32;

export const EMPTY_SIGNATURE: Signature = 0;

function bit(tid: TypeId): number
{
    if (!Number.isInteger(tid) || tid < 0 || tid >= MAX_COMPONENTS) {
        throw new RangeError(`Component type id ${tid} is outside [0, ${MAX_COMPONENTS})`);
    }
    return (1 << tid) >>> 0;
}

export function signatureWith(sig: Signature, tid: TypeId): Signature
{
    return (sig | bit(tid)) >>> 0;
}

export function signatureWithout(sig: Signature, tid: TypeId): Signature
{
    return (sig & ~bit(tid)) >>> 0;
}

export function signatureHas(sig: Signature, tid: TypeId): boolean
{
    return (sig & bit(tid)) !== 0;
}

/**
 * True if `need` is a subset of `have`.
 */
export function signatureHasAll(have: Signature, need: Signature): boolean
{
    return ((have & need) >>> 0) === (need >>> 0);
}

export function signatureCount(sig: Signature): number
{
    let n = sig >>> 0;
    let count = 0;
    while (n !== 0) {
        n &= n - 1;
        count++;
    }
    return count;
}

/** Type ids set in `sig`, ascending. */
export function signatureTypeIds(sig: Signature): TypeId[]
{
    const out: TypeId[] = [];
    for (let tid = 0; tid < MAX_COMPONENTS; tid++) {
        if (signatureHas(sig, tid)) out.push(tid);
    }
    return out;
}

export function signatureKey(sig: Signature): string
{
    // canonical: fixed width, bit 0 rightmost
    return (sig >>> 0).toString(2).padStart(MAX_COMPONENTS, "0");
}
