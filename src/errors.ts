/**
 * Error types raised by `SortedMap` and the AVL engine.
 */

export class SortedMapError extends Error {
    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

/** Lookup, removal or extraction targeted a key that is not stored. */
export class KeyNotFoundError<K> extends SortedMapError {
    constructor(public readonly key: K, message = `Key not found: ${describeKey(key)}`) {
        super(message);
    }
}

/**
 * A construction source has an unsupported shape, or two keys
 * do not belong to the same ordered domain.
 */
export class TypeMismatchError extends SortedMapError {}

/** Raised by `checkValid()` when the stored tree breaks an AVL or BST invariant. */
export class InvariantViolationError extends SortedMapError {}

export function describeKey(key: unknown): string {
    if (typeof key === 'string') return JSON.stringify(key);
    if (typeof key === 'bigint') return `${key}n`;
    if (Array.isArray(key)) return `[${key.map(describeKey).join(', ')}]`;
    if (key instanceof Date) return Number.isNaN(key.getTime()) ? 'Invalid Date' : key.toISOString();
    if (typeof key === 'object' && key !== null) return describeObject(key);
    return String(key);
}

/**
 * Class name, followed by the object's own `toString()` when it has one.
 * Objects without a prototype have neither.
 */
function describeObject(obj: object): string {
    if (Object.getPrototypeOf(obj) === null) return '[Object: null prototype]';
    const name = obj.constructor?.name || 'Object';
    if (typeof obj.toString !== 'function' || obj.toString === Object.prototype.toString) return name;
    return `${name}(${String(obj.toString())})`;
}
