/**
 * @module sorted-map
 * @description
 * Dictionary with entries kept sorted by key, backed by a mutable AVL tree.
 *
 * * Performance Characteristics:
 * - Lookup / Insert / Update / Delete: **O(log N)**
 * - Size: **O(1)** (root bookkeeping)
 * - Full iteration: **O(N)**, lazy
 *
 * * Contracts:
 * - Keys must come from one ordered class (see `compareKeys`).
 * - Keys must not be mutated after insertion.
 * - Mutating the map while an iterator is suspended is undefined.
 */

import {
    AVLNode,
    copyNode,
    heightOf,
    inOrder,
    maxEntry,
    minEntry,
    nodeFind,
    nodePut,
    nodeRemove,
    sizeOf,
    verifyNode,
} from './avl-tree';
import { assertKey, compareKeys, type Key } from './compare';
import { KeyNotFoundError, TypeMismatchError, describeKey } from './errors';

/** Anything that yields `[key, value]` pairs: arrays of pairs, `Map`, `SortedMap`, generators. */
export type EntrySource<K, V> = Iterable<readonly [K, V]>;

function isIterable(value: unknown): value is Iterable<unknown> {
    return typeof value === 'object' && value !== null && Symbol.iterator in value
        && typeof value[Symbol.iterator] === 'function';
}

function isPair(value: unknown): value is readonly [unknown, unknown] {
    return Array.isArray(value) && value.length === 2;
}

function describeValue(value: unknown): string {
    return typeof value === 'object' && value !== null ? describeKey(value) : String(value);
}

function describeSource(value: unknown): string {
    if (value === null) return 'null';
    if (typeof value === 'object') return value.constructor?.name ?? 'object';
    return typeof value;
}

/**
 * Ordered key-value store.
 *
 * @template K - Key type. Every key must be comparable with every other key.
 * @template V - Value type. Opaque to the map.
 */
export class SortedMap<K extends Key, V> {
    #root: AVLNode<K, V> = new AVLNode<K, V>();

    /**
     * Creates a map, optionally seeded from `[key, value]` pairs.
     * Pairs are inserted in source order, so later duplicates win.
     *
     * @throws TypeMismatchError if `source` is not an iterable of pairs.
     */
    constructor(source?: EntrySource<K, V>) {
        if (source !== undefined) this.update(source);
    }

    static from<K extends Key, V>(source: EntrySource<K, V>): SortedMap<K, V> {
        return new SortedMap(source);
    }

    /** Builds a string-keyed map from an object's own enumerable properties. */
    static fromObject<V>(record: Readonly<Record<string, V>>): SortedMap<string, V> {
        if (typeof record !== 'object' || record === null) {
            throw new TypeMismatchError(`Expected a plain object, got ${describeSource(record)}`);
        }
        return new SortedMap(Object.entries(record));
    }

    /** Number of entries. O(1). */
    get size(): number { return sizeOf(this.#root); }

    /** Height of the underlying tree (0 when empty). */
    get height(): number { return heightOf(this.#root); }

    isEmpty(): boolean { return this.#root.state.kind === 'empty'; }

    // --- Point Operations ---

    /**
     * Returns the value stored under `key`.
     * @throws KeyNotFoundError if the key is absent.
     */
    get(key: K): V {
        const found = nodeFind(this.#root, key);
        if (found === undefined) throw new KeyNotFoundError(key);
        return found.value;
    }

    getOrDefault<D>(key: K, fallback: D): V | D {
        const found = nodeFind(this.#root, key);
        return found === undefined ? fallback : found.value;
    }

    /**
     * Membership test. Never throws: a key that cannot be ordered against
     * the stored keys cannot be one of them.
     */
    has(key: K): boolean {
        try {
            return nodeFind(this.#root, key) !== undefined;
        } catch (err) {
            if (err instanceof TypeMismatchError) return false;
            throw err;
        }
    }

    /** Inserts or overwrites. O(log N). */
    set(key: K, value: V): this {
        assertKey(key);
        nodePut(this.#root, key, value);
        return this;
    }

    /**
     * Removes the entry stored under `key`. O(log N).
     * @throws KeyNotFoundError if the key is absent.
     */
    delete(key: K): void {
        nodeRemove(this.#root, key);
    }

    /**
     * Removes `key` and returns its value.
     * Without a fallback, an absent key throws `KeyNotFoundError`.
     */
    pop(key: K): V;
    pop<D>(key: K, fallback: D): V | D;
    pop<D>(key: K, ...fallback: [D] | []): V | D {
        if (nodeFind(this.#root, key) === undefined) {
            if (fallback.length === 1) return fallback[0];
            throw new KeyNotFoundError(key);
        }
        return nodeRemove(this.#root, key)[1];
    }

    /** Returns the stored value, inserting `value` first if `key` is absent. */
    setDefault(key: K, value: V): V {
        const found = nodeFind(this.#root, key);
        if (found !== undefined) return found.value;
        this.set(key, value);
        return value;
    }

    /**
     * Removes and returns the entry with the smallest key.
     * @throws KeyNotFoundError if the map is empty.
     */
    popItem(): [K, V] {
        const min = minEntry(this.#root);
        if (min === undefined) throw new KeyNotFoundError(undefined, 'popItem(): map is empty');
        return nodeRemove(this.#root, min.key);
    }

    /** Entry with the smallest key. */
    first(): [K, V] {
        const min = minEntry(this.#root);
        if (min === undefined) throw new KeyNotFoundError(undefined, 'first(): map is empty');
        return [min.key, min.value];
    }

    /** Entry with the largest key. */
    last(): [K, V] {
        const max = maxEntry(this.#root);
        if (max === undefined) throw new KeyNotFoundError(undefined, 'last(): map is empty');
        return [max.key, max.value];
    }

    // --- Bulk Operations ---

    /**
     * Inserts every pair of `source`, one at a time, in source order.
     * Pairs inserted before a bad element stay in place.
     *
     * @throws TypeMismatchError if `source` is not iterable or yields a non-pair.
     */
    update(source: EntrySource<K, V>): this {
        if (!isIterable(source)) {
            throw new TypeMismatchError(`Expected an iterable of [key, value] pairs, got ${describeSource(source)}`);
        }
        for (const pair of source) {
            if (!isPair(pair)) {
                throw new TypeMismatchError(`Expected a [key, value] pair, got ${describeSource(pair)}`);
            }
            this.set(pair[0], pair[1]);
        }
        return this;
    }

    clear(): this {
        this.#root = new AVLNode<K, V>();
        return this;
    }

    /** Independent deep copy of the tree structure. O(N). */
    clone(): SortedMap<K, V> {
        const map = new SortedMap<K, V>();
        map.#root = copyNode(this.#root);
        return map;
    }

    /**
     * True if `other` holds the same keys with `Object.is`-equal values.
     * Sources are compared after their duplicates collapse, as a `SortedMap` would store them.
     */
    equals(other: EntrySource<K, V>): boolean {
        if (other === this) return true;
        try {
            const theirs: SortedMap<K, V> = other instanceof SortedMap ? other : new SortedMap<K, V>(other);
            if (theirs.size !== this.size) return false;

            const itB = theirs.entries();
            for (const [kA, vA] of this.entries()) {
                const b = itB.next();
                if (b.done) return false;
                const [kB, vB] = b.value;
                if (compareKeys(kA, kB) !== 0 || !Object.is(vA, vB)) return false;
            }
            return true;
        } catch (err) {
            // Keys that cannot share one order with ours cannot be ours
            if (err instanceof TypeMismatchError) return false;
            throw err;
        }
    }

    /**
     * Verifies ordering, balance and height/size bookkeeping of every node. O(N).
     * @throws InvariantViolationError on a broken structure.
     */
    checkValid(): void {
        verifyNode(this.#root);
    }

    // --- Iterators (In-Order Traversal) ---

    /** Keys in ascending order. */
    *keys(): Generator<K, void, undefined> {
        for (const s of inOrder(this.#root)) yield s.key;
    }

    /** Values in ascending key order. */
    *values(): Generator<V, void, undefined> {
        for (const s of inOrder(this.#root)) yield s.value;
    }

    /** `[key, value]` pairs in ascending key order. */
    *entries(): Generator<[K, V], void, undefined> {
        for (const s of inOrder(this.#root)) yield [s.key, s.value];
    }

    [Symbol.iterator](): Generator<[K, V], void, undefined> {
        return this.entries();
    }

    forEach(callback: (value: V, key: K, map: this) => void): void {
        for (const s of inOrder(this.#root)) callback(s.value, s.key, this);
    }

    toString(): string {
        const parts: string[] = [];
        for (const [k, v] of this.entries()) parts.push(`${describeKey(k)} => ${describeValue(v)}`);
        return `SortedMap{${parts.join(', ')}}`;
    }
    [Symbol.for('nodejs.util.inspect.custom')]() { return this.toString(); }
}
