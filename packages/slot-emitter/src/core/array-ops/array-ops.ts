import { isNil } from "es-toolkit";

/** Returned by {@link find} when no element matches. */
export const NOT_FOUND = -1;

export type Equality<T> = (existing: T, element: T) => boolean;

/**
 * Locates `element` within `source`, starting at `offset`.
 *
 * Absent values never match: a `null`/`undefined` target yields {@link NOT_FOUND},
 * and `null`/`undefined` positions are skipped without consulting `equals`.
 *
 * Resume a search just past the previous hit (`offset = index + 1`) to walk every occurrence.
 */
export function find<T>(
    source: readonly (T | null | undefined)[],
    element: T | null | undefined,
    offset = 0,
    equals: Equality<T> = Object.is,
): number {
    if (isNil(element)) return NOT_FOUND;

    for (let i = Math.max(0, offset); i < source.length; i++) {
        const existing = source[i];
        if (isNil(existing)) continue;
        if (equals(existing, element)) return i;
    }
    return NOT_FOUND;
}

/** Copy of `source` with `element` appended. */
export function append<T>(source: readonly T[], element: T): T[] {
    const next = source.slice();
    next.push(element);
    return next;
}

/**
 * Copy of `source` without the element at `index`.
 * Callers pass an index they just located; an out-of-range index yields a plain copy.
 */
export function removeAt<T>(source: readonly T[], index: number): T[] {
    return source.filter((_, i) => i !== index);
}
