/**
 * Items that know how to compare themselves by value.
 * Plain objects fall back to reference equality, so give them an `equals`
 * method or pass a matcher when the same entity can arrive as a new object.
 */
export interface Equatable<T> {
    equals(other: T): boolean;
}

export type ItemEquals<T> = (a: T, b: T) => boolean;

function isEquatable<T>(value: T): value is T & Equatable<T> {
    return typeof value === 'object'
        && value !== null
        && 'equals' in value
        && typeof value.equals === 'function';
}

export function defaultEquals<T>(a: T, b: T): boolean {
    if (Object.is(a, b)) return true;
    return isEquatable(a) ? a.equals(b) : false;
}

export function itemsEqual<T>(
    a: readonly T[] | null,
    b: readonly T[] | null,
    equals: ItemEquals<T> = defaultEquals
): boolean {
    if (a === b) return true;
    if (a === null || b === null || a.length !== b.length) return false;
    return a.every((item, i) => equals(item, b[i]));
}
