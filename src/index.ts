/**
 * @module sorted-avl-map
 * Dictionary with entries sorted by key, backed by a self-balancing AVL tree.
 */

export { SortedMap } from './sorted-map';
export type { EntrySource } from './sorted-map';
export { compareKeys } from './compare';
export type { Comparable, Key, Primitive } from './compare';
export {
    SortedMapError,
    KeyNotFoundError,
    TypeMismatchError,
    InvariantViolationError,
} from './errors';
