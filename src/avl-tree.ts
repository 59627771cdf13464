/**
 * @module avl-tree
 * @description
 * Mutable AVL engine behind `SortedMap`.
 *
 * Every subtree is an `AVLNode`, and an empty subtree is an `AVLNode` in the
 * empty state, so children are never null and no operation special-cases a
 * missing child. Mutations replace a node's `state` in place; a node object
 * keeps its position in its parent while its contents change.
 *
 * * Invariants (restored before any exported mutator returns):
 * - Keys in `left` < key < keys in `right`, no duplicates.
 * - $|height(left) - height(right)| \le 1$ at every occupied node.
 * - `height` and `size` match the children.
 * - Exclusive ownership: each node has exactly one parent.
 */

import { compareKeys, type Key } from './compare';
import { InvariantViolationError, KeyNotFoundError, describeKey } from './errors';

// ============================================================================
// 1. REPRESENTATION
// ============================================================================

export interface EmptyState {
    readonly kind: 'empty';
}

export interface OccupiedState<K extends Key, V> {
    readonly kind: 'occupied';
    key: K;
    value: V;
    left: AVLNode<K, V>;
    right: AVLNode<K, V>;
    /** Leaf = 1. Empty = 0. */
    height: number;
    /** Entries in this subtree, including this one. */
    size: number;
}

export type NodeState<K extends Key, V> = EmptyState | OccupiedState<K, V>;

const EMPTY: EmptyState = { kind: 'empty' };

/**
 * A subtree. Holds either nothing or one entry plus two owned children.
 *
 * @template K - Key type, ordered by `compareKeys`.
 * @template V - Payload type.
 */
export class AVLNode<K extends Key, V> {
    constructor(public state: NodeState<K, V> = EMPTY) {}
}

export function heightOf<K extends Key, V>(n: AVLNode<K, V>): number {
    return n.state.kind === 'empty' ? 0 : n.state.height;
}

export function sizeOf<K extends Key, V>(n: AVLNode<K, V>): number {
    return n.state.kind === 'empty' ? 0 : n.state.size;
}

/**
 * Balance Factor: $BF = Height(Left) - Height(Right)$.
 * Empty nodes are balanced.
 */
export function balanceFactor<K extends Key, V>(n: AVLNode<K, V>): number {
    const s = n.state;
    return s.kind === 'empty' ? 0 : heightOf(s.left) - heightOf(s.right);
}

function occupied<K extends Key, V>(key: K, value: V, left: AVLNode<K, V>, right: AVLNode<K, V>): OccupiedState<K, V> {
    const lh = heightOf(left);
    const rh = heightOf(right);
    return {
        kind: 'occupied',
        key,
        value,
        left,
        right,
        height: (lh > rh ? lh : rh) + 1,
        size: 1 + sizeOf(left) + sizeOf(right),
    };
}

/**
 * Recalculates height and size from the children.
 * Must be called whenever a child of `s` changes.
 */
function updateStats<K extends Key, V>(s: OccupiedState<K, V>): void {
    const lh = heightOf(s.left);
    const rh = heightOf(s.right);
    s.height = (lh > rh ? lh : rh) + 1;
    s.size = 1 + sizeOf(s.left) + sizeOf(s.right);
}

function expectOccupied<K extends Key, V>(n: AVLNode<K, V>, op: string): OccupiedState<K, V> {
    const s = n.state;
    if (s.kind === 'empty') throw new InvariantViolationError(`${op}: expected an occupied node`);
    return s;
}

// ============================================================================
// 2. ROTATIONS (In-Place)
// ============================================================================

/**
 * Right Rotation (Left-Left imbalance). Promotes the left child.
 *
 * Transformation:
 * ```
 *       y             x
 *      / \           / \
 *     x   T3  -->  T1   y
 *    / \               / \
 *   T1  T2            T2  T3
 * ```
 *
 * `node` stays where it is in its parent and takes over x's entry.
 * The old left child node object is reused to hold y.
 */
export function rotateRight<K extends Key, V>(node: AVLNode<K, V>): void {
    const y = expectOccupied(node, 'rotateRight');
    const x = expectOccupied(y.left, 'rotateRight');
    const demoted = y.left;

    // Child first, then parent
    demoted.state = occupied(y.key, y.value, x.right, y.right);
    node.state = occupied(x.key, x.value, x.left, demoted);
}

/**
 * Left Rotation (Right-Right imbalance). Promotes the right child.
 *
 * Transformation:
 * ```
 *     x                 y
 *    / \               / \
 *   T1  y     -->     x   T3
 *      / \           / \
 *     T2  T3        T1  T2
 * ```
 */
export function rotateLeft<K extends Key, V>(node: AVLNode<K, V>): void {
    const x = expectOccupied(node, 'rotateLeft');
    const y = expectOccupied(x.right, 'rotateLeft');
    const demoted = x.right;

    demoted.state = occupied(x.key, x.value, x.left, y.left);
    node.state = occupied(y.key, y.value, demoted, y.right);
}

/**
 * Restores the AVL property at `node`, whose children are already balanced
 * and up to date. Applies at most one double rotation.
 */
export function rebalance<K extends Key, V>(node: AVLNode<K, V>): void {
    const s = node.state;
    if (s.kind === 'empty') return;
    updateStats(s);

    const balance = heightOf(s.left) - heightOf(s.right);

    if (balance > 1) {
        // Left Right: straighten the left child first
        if (balanceFactor(s.left) < 0) rotateLeft(s.left);
        rotateRight(node);
    } else if (balance < -1) {
        // Right Left
        if (balanceFactor(s.right) > 0) rotateRight(s.right);
        rotateLeft(node);
    }
}

// ============================================================================
// 3. LOOKUP & MUTATION
// ============================================================================

/** Finds the entry stored under `key`. Complexity: O(log N). */
export function nodeFind<K extends Key, V>(node: AVLNode<K, V>, key: K): OccupiedState<K, V> | undefined {
    let curr = node.state;
    while (curr.kind === 'occupied') {
        const cmp = compareKeys(key, curr.key);
        if (cmp === 0) return curr;
        curr = cmp < 0 ? curr.left.state : curr.right.state;
    }
    return undefined;
}

function leftmost<K extends Key, V>(s: OccupiedState<K, V>): OccupiedState<K, V> {
    let curr = s;
    for (;;) {
        const next = curr.left.state;
        if (next.kind === 'empty') return curr;
        curr = next;
    }
}

function rightmost<K extends Key, V>(s: OccupiedState<K, V>): OccupiedState<K, V> {
    let curr = s;
    for (;;) {
        const next = curr.right.state;
        if (next.kind === 'empty') return curr;
        curr = next;
    }
}

/** Smallest entry of the subtree. */
export function minEntry<K extends Key, V>(node: AVLNode<K, V>): OccupiedState<K, V> | undefined {
    const s = node.state;
    return s.kind === 'empty' ? undefined : leftmost(s);
}

/** Largest entry of the subtree. */
export function maxEntry<K extends Key, V>(node: AVLNode<K, V>): OccupiedState<K, V> | undefined {
    const s = node.state;
    return s.kind === 'empty' ? undefined : rightmost(s);
}

/**
 * Recursive insert or update. Rebalances on the way back up.
 * Complexity: O(log N).
 *
 * @returns True if a new entry was created, false if an existing value was overwritten.
 */
export function nodePut<K extends Key, V>(node: AVLNode<K, V>, key: K, value: V): boolean {
    const s = node.state;
    if (s.kind === 'empty') {
        node.state = occupied(key, value, new AVLNode<K, V>(), new AVLNode<K, V>());
        return true;
    }

    const cmp = compareKeys(key, s.key);
    if (cmp === 0) {
        s.value = value;
        return false;
    }

    const created = nodePut(cmp < 0 ? s.left : s.right, key, value);
    if (created) rebalance(node);
    return created;
}

/**
 * Recursive delete. Rebalances on the way back up.
 * Complexity: O(log N).
 *
 * @returns The removed `[key, value]` entry.
 * @throws KeyNotFoundError if `key` is not stored. The tree is left untouched.
 */
export function nodeRemove<K extends Key, V>(node: AVLNode<K, V>, key: K): [K, V] {
    const s = node.state;
    if (s.kind === 'empty') throw new KeyNotFoundError(key);

    let removed: [K, V];
    const cmp = compareKeys(key, s.key);
    if (cmp < 0) {
        removed = nodeRemove(s.left, key);
    } else if (cmp > 0) {
        removed = nodeRemove(s.right, key);
    } else {
        removed = [s.key, s.value];
        const l = s.left.state;
        const r = s.right.state;
        if (l.kind === 'empty') {
            // No child or right child only
            node.state = r;
        } else if (r.kind === 'empty') {
            node.state = l;
        } else {
            // Two children: take over the in-order successor, then remove it from the right
            const { key: nextKey, value: nextValue } = leftmost(r);
            s.key = nextKey;
            s.value = nextValue;
            nodeRemove(s.right, nextKey);
        }
    }

    rebalance(node);
    return removed;
}

// ============================================================================
// 4. TRAVERSAL & COPY
// ============================================================================

/**
 * Lazy in-order traversal (stack based).
 * Each call starts a fresh pass over the current structure.
 */
export function* inOrder<K extends Key, V>(node: AVLNode<K, V>): Generator<OccupiedState<K, V>, void, undefined> {
    const stack: OccupiedState<K, V>[] = [];
    let curr: NodeState<K, V> = node.state;
    while (curr.kind === 'occupied' || stack.length > 0) {
        while (curr.kind === 'occupied') {
            stack.push(curr);
            curr = curr.left.state;
        }
        const top = stack.pop();
        if (top === undefined) return;
        yield top;
        curr = top.right.state;
    }
}

/** Structural deep copy. Complexity: O(N). */
export function copyNode<K extends Key, V>(node: AVLNode<K, V>): AVLNode<K, V> {
    const s = node.state;
    if (s.kind === 'empty') return new AVLNode<K, V>();
    return new AVLNode<K, V>({ ...s, left: copyNode(s.left), right: copyNode(s.right) });
}

// ============================================================================
// 5. VALIDATION
// ============================================================================

interface Bound<K> {
    readonly key: K;
}

/**
 * Recomputes height and size from scratch and checks ordering and balance
 * for every node. Complexity: O(N).
 *
 * @throws InvariantViolationError on the first broken invariant.
 */
export function verifyNode<K extends Key, V>(
    node: AVLNode<K, V>,
    lower?: Bound<K>,
    upper?: Bound<K>
): { height: number; size: number } {
    const s = node.state;
    if (s.kind === 'empty') return { height: 0, size: 0 };

    if (lower && compareKeys(lower.key, s.key) >= 0) {
        throw new InvariantViolationError(`Key ${describeKey(s.key)} is not greater than ${describeKey(lower.key)}`);
    }
    if (upper && compareKeys(s.key, upper.key) >= 0) {
        throw new InvariantViolationError(`Key ${describeKey(s.key)} is not less than ${describeKey(upper.key)}`);
    }

    const left = verifyNode(s.left, lower, s);
    const right = verifyNode(s.right, s, upper);
    const height = (left.height > right.height ? left.height : right.height) + 1;
    const size = 1 + left.size + right.size;

    if (s.height !== height) {
        throw new InvariantViolationError(`Stale height at ${describeKey(s.key)}: stored ${s.height}, actual ${height}`);
    }
    if (s.size !== size) {
        throw new InvariantViolationError(`Stale size at ${describeKey(s.key)}: stored ${s.size}, actual ${size}`);
    }
    if (Math.abs(left.height - right.height) > 1) {
        throw new InvariantViolationError(
            `Unbalanced at ${describeKey(s.key)}: left height ${left.height}, right height ${right.height}`
        );
    }
    return { height, size };
}
