/**
 * @module compare
 * @description
 * Total ordering over the key domain of `SortedMap`.
 *
 * * Order within each class:
 * - Numbers and BigInts: numeric (`1` and `1n` are the same key).
 * - Strings: UTF-16 code unit order.
 * - Booleans: `false < true`.
 * - Dates: by timestamp.
 * - Arrays: lexicographic, a strict prefix sorts first.
 * - `Comparable` objects: `compareTo`, same constructor only.
 * - `null` / `undefined`: equal only to themselves.
 *
 * Keys from different classes are not ordered against each other.
 */

import { TypeMismatchError, describeKey } from './errors';

export type Primitive = number | bigint | string | boolean;

/** Objects that define their own order. `compareTo` must be a total order. */
export interface Comparable {
    compareTo(other: this): number;
}

/**
 * Recursive definition of the supported keys.
 * Arrays of keys act as composite keys.
 */
export type Key =
    | Primitive
    | Date
    | Comparable
    | null
    | undefined
    | ReadonlyArray<Key>;

// ============================================================================
// 1. CLASSIFICATION
// ============================================================================

function isNumeric(k: Key): k is number | bigint {
    return typeof k === 'number' || typeof k === 'bigint';
}

function isSequence(k: Key): k is ReadonlyArray<Key> {
    return Array.isArray(k);
}

function isComparable(k: unknown): k is Comparable {
    return typeof k === 'object' && k !== null && 'compareTo' in k && typeof k.compareTo === 'function';
}

function kindOf(k: Key): string {
    if (k === null) return 'null';
    if (k instanceof Date) return 'Date';
    if (isSequence(k)) return 'Array';
    if (isComparable(k)) return k.constructor?.name || 'Comparable';
    return typeof k;
}

function checkNumber(n: number | bigint): number | bigint {
    if (typeof n === 'number' && Number.isNaN(n)) {
        throw new TypeMismatchError('NaN is not supported as a key');
    }
    return n;
}

function timeOf(d: Date): number {
    const t = d.getTime();
    if (Number.isNaN(t)) throw new TypeMismatchError('Invalid Date is not supported as a key');
    return t;
}

/**
 * Validates a key before it enters a tree.
 * Comparisons only see keys that meet another key, so a lone first key
 * (or a bad element nested in an array key) is checked here.
 */
export function assertKey(key: Key): void {
    if (key === null || key === undefined) return;
    if (isNumeric(key)) { checkNumber(key); return; }
    if (typeof key === 'string' || typeof key === 'boolean') return;
    if (key instanceof Date) { timeOf(key); return; }
    if (isSequence(key)) {
        for (const k of key) assertKey(k);
        return;
    }
    if (isComparable(key)) return;
    throw new TypeMismatchError(`Unsupported key type: ${describeKey(key)}`);
}

// ============================================================================
// 2. COMPARATOR
// ============================================================================

function compareNumeric(a: number | bigint, b: number | bigint): number {
    return a < b ? -1 : a > b ? 1 : 0;
}

function compareSequences(a: ReadonlyArray<Key>, b: ReadonlyArray<Key>): number {
    const len = a.length < b.length ? a.length : b.length;
    for (let i = 0; i < len; i++) {
        const diff = compareKeys(a[i], b[i]);
        if (diff !== 0) return diff;
    }
    return a.length - b.length;
}

/**
 * Compares two keys.
 *
 * @returns Negative if a < b, positive if a > b, 0 if they are the same key.
 * @throws TypeMismatchError if the keys belong to different classes,
 * or one of them is `NaN` / an invalid `Date`.
 */
export function compareKeys(a: Key, b: Key): number {
    if (a === b) return 0;

    // Hot paths
    if (typeof a === 'number' && typeof b === 'number') {
        return compareNumeric(checkNumber(a), checkNumber(b));
    }
    if (typeof a === 'string' && typeof b === 'string') return a < b ? -1 : 1;

    if (isNumeric(a) && isNumeric(b)) return compareNumeric(checkNumber(a), checkNumber(b));
    if (typeof a === 'boolean' && typeof b === 'boolean') return a ? 1 : -1;
    if (a instanceof Date && b instanceof Date) return compareNumeric(timeOf(a), timeOf(b));
    if (isSequence(a) && isSequence(b)) return compareSequences(a, b);

    if (isComparable(a) && isComparable(b) && a.constructor === b.constructor) {
        const result = a.compareTo(b);
        if (Number.isNaN(result)) {
            throw new TypeMismatchError(`${kindOf(a)}.compareTo returned NaN`);
        }
        return result;
    }

    throw new TypeMismatchError(
        `Cannot compare ${describeKey(a)} (${kindOf(a)}) with ${describeKey(b)} (${kindOf(b)})`
    );
}
