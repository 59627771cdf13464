import { describe, it, expect } from 'vitest';
import {
    AVLNode,
    balanceFactor,
    copyNode,
    heightOf,
    inOrder,
    maxEntry,
    minEntry,
    nodeFind,
    nodePut,
    nodeRemove,
    rotateLeft,
    rotateRight,
    sizeOf,
    verifyNode,
} from '../src/avl-tree';
import { InvariantViolationError, KeyNotFoundError } from '../src/errors';

type Tree = AVLNode<number, string>;

function build(keys: number[]): Tree {
    const root: Tree = new AVLNode<number, string>();
    for (const k of keys) nodePut(root, k, `v${k}`);
    return root;
}

/** Compact pre-order rendering: `key(left,right)`, leaves as `key`, empty as `.`. */
function shape(node: Tree): string {
    const s = node.state;
    if (s.kind === 'empty') return '.';
    const l = shape(s.left);
    const r = shape(s.right);
    return l === '.' && r === '.' ? String(s.key) : `${s.key}(${l},${r})`;
}

function keysOf(node: Tree): number[] {
    return [...inOrder(node)].map((s) => s.key);
}

function leaf(key: number): Tree {
    return new AVLNode<number, string>({
        kind: 'occupied',
        key,
        value: `v${key}`,
        left: new AVLNode<number, string>(),
        right: new AVLNode<number, string>(),
        height: 1,
        size: 1,
    });
}

describe('representation', () => {
    it('starts empty with zero height and size', () => {
        const root: Tree = new AVLNode<number, string>();
        expect(root.state.kind).toBe('empty');
        expect(heightOf(root)).toBe(0);
        expect(sizeOf(root)).toBe(0);
        expect(balanceFactor(root)).toBe(0);
        expect(minEntry(root)).toBeUndefined();
        expect(maxEntry(root)).toBeUndefined();
    });

    it('turns an empty node into a leaf with two distinct empty children', () => {
        const root: Tree = new AVLNode<number, string>();
        expect(nodePut(root, 1, 'a')).toBe(true);

        const s = root.state;
        if (s.kind !== 'occupied') throw new Error('expected a leaf');
        expect(s.key).toBe(1);
        expect(s.value).toBe('a');
        expect(s.height).toBe(1);
        expect(s.size).toBe(1);
        expect(s.left.state.kind).toBe('empty');
        expect(s.right.state.kind).toBe('empty');
        expect(s.left).not.toBe(s.right);
    });

    it('overwrites the value of an existing key without growing', () => {
        const root = build([1]);
        expect(nodePut(root, 1, 'b')).toBe(false);
        expect(nodeFind(root, 1)?.value).toBe('b');
        expect(sizeOf(root)).toBe(1);
    });
});

describe('rotations', () => {
    it('rotates left and right in place', () => {
        const root = build([1, 2]);
        expect(shape(root)).toBe('1(.,2)');

        rotateLeft(root);
        expect(shape(root)).toBe('2(1,.)');
        expect(heightOf(root)).toBe(2);
        expect(sizeOf(root)).toBe(2);
        expect(nodeFind(root, 1)?.value).toBe('v1');

        rotateRight(root);
        expect(shape(root)).toBe('1(.,2)');
        expect(verifyNode(root)).toEqual({ height: 2, size: 2 });
    });

    it('refuses to rotate without a child to promote', () => {
        const root = build([1]);
        expect(() => rotateLeft(root)).toThrow(InvariantViolationError);
        expect(() => rotateRight(root)).toThrow('rotateRight: expected an occupied node');
    });

    it.each([
        ['right-right', [1, 2, 3]],
        ['left-left', [3, 2, 1]],
        ['left-right', [3, 1, 2]],
        ['right-left', [1, 3, 2]],
    ])('rebalances the %s case', (_name, keys) => {
        const root = build(keys);
        expect(shape(root)).toBe('2(1,3)');
        expect(verifyNode(root)).toEqual({ height: 2, size: 3 });
    });
});

describe('insertion', () => {
    it('builds a perfect tree from [5, 3, 8, 1, 4, 7, 9]', () => {
        const root = build([5, 3, 8, 1, 4, 7, 9]);
        expect(shape(root)).toBe('5(3(1,4),8(7,9))');
        expect(keysOf(root)).toEqual([1, 3, 4, 5, 7, 8, 9]);
        expect(heightOf(root)).toBe(3);
        expect(heightOf(root)).toBeLessThanOrEqual(Math.ceil(1.44 * Math.log2(8)));
    });

    it('keeps ascending inserts at height 3 for five keys', () => {
        const root = build([1, 2, 3, 4, 5]);
        expect(shape(root)).toBe('2(1,4(3,5))');
        expect(heightOf(root)).toBe(3);
        expect(verifyNode(root)).toEqual({ height: 3, size: 5 });
    });
});

describe('deletion', () => {
    it('promotes the successor when the root has two children', () => {
        const root = build([2, 1, 3]);
        expect(nodeRemove(root, 2)).toEqual([2, 'v2']);
        expect(shape(root)).toBe('3(1,.)');
        expect(nodeFind(root, 3)?.value).toBe('v3');
        expect(verifyNode(root)).toEqual({ height: 2, size: 2 });
    });

    it('promotes the leftmost node of the right subtree', () => {
        const root = build([5, 3, 8, 1, 4, 7, 9]);
        nodeRemove(root, 5);
        expect(shape(root)).toBe('7(3(1,4),8(.,9))');
        expect(verifyNode(root)).toEqual({ height: 3, size: 6 });
    });

    it('lets a node adopt its only child', () => {
        const root = build([2, 1, 3, 4]);
        expect(shape(root)).toBe('2(1,3(.,4))');
        nodeRemove(root, 3);
        expect(shape(root)).toBe('2(1,4)');
    });

    it('empties a leaf', () => {
        const root = build([1]);
        nodeRemove(root, 1);
        expect(root.state.kind).toBe('empty');
        expect(sizeOf(root)).toBe(0);
    });

    it('rotates once when a removal unbalances the root', () => {
        const root = build([2, 1, 3, 4]);
        nodeRemove(root, 1);
        expect(shape(root)).toBe('3(2,4)');
    });

    it('rotates twice for the right-left case after a removal', () => {
        const root = build([2, 1, 4, 3]);
        expect(shape(root)).toBe('2(1,4(3,.))');
        nodeRemove(root, 1);
        expect(shape(root)).toBe('3(2,4)');
        expect(verifyNode(root)).toEqual({ height: 2, size: 3 });
    });

    it('fails on a missing key and leaves the tree untouched', () => {
        const root = build([1, 2, 3]);
        expect(() => nodeRemove(root, 4)).toThrow(KeyNotFoundError);
        expect(() => nodeRemove(root, 4)).toThrow('Key not found: 4');
        expect(shape(root)).toBe('2(1,3)');
    });
});

describe('lookup and traversal', () => {
    it('finds stored entries only', () => {
        const root = build([5, 3, 8]);
        expect(nodeFind(root, 8)?.value).toBe('v8');
        expect(nodeFind(root, 6)).toBeUndefined();
    });

    it('reports the extreme entries', () => {
        const root = build([5, 3, 8, 1, 4, 7, 9]);
        expect(minEntry(root)?.key).toBe(1);
        expect(maxEntry(root)?.key).toBe(9);
    });

    it('restarts traversal on every call', () => {
        const root = build([4, 2, 6]);
        expect(keysOf(root)).toEqual([2, 4, 6]);
        nodePut(root, 5, 'v5');
        expect(keysOf(root)).toEqual([2, 4, 5, 6]);
    });

    it('copies the structure without sharing nodes', () => {
        const root = build([5, 3, 8, 1, 4, 7, 9]);
        const copy = copyNode(root);
        nodePut(root, 10, 'v10');
        nodeRemove(root, 1);

        expect(keysOf(copy)).toEqual([1, 3, 4, 5, 7, 8, 9]);
        expect(verifyNode(copy)).toEqual({ height: 3, size: 7 });
        expect(keysOf(root)).toEqual([3, 4, 5, 7, 8, 9, 10]);
    });
});

describe('verifyNode', () => {
    it('detects stale heights', () => {
        const root = build([1, 2, 3]);
        const s = root.state;
        if (s.kind === 'occupied') s.height = 7;
        expect(() => verifyNode(root)).toThrow('Stale height at 2: stored 7, actual 2');
    });

    it('detects stale sizes', () => {
        const root = build([1, 2, 3]);
        const s = root.state;
        if (s.kind === 'occupied') s.size = 4;
        expect(() => verifyNode(root)).toThrow('Stale size at 2: stored 4, actual 3');
    });

    it('detects keys on the wrong side', () => {
        const root = new AVLNode<number, string>({
            kind: 'occupied',
            key: 1,
            value: 'v1',
            left: leaf(2),
            right: new AVLNode<number, string>(),
            height: 2,
            size: 2,
        });
        expect(() => verifyNode(root)).toThrow('Key 2 is not less than 1');
    });

    it('detects an unbalanced node', () => {
        const left = new AVLNode<number, string>({
            kind: 'occupied',
            key: 2,
            value: 'v2',
            left: leaf(1),
            right: new AVLNode<number, string>(),
            height: 2,
            size: 2,
        });
        const root = new AVLNode<number, string>({
            kind: 'occupied',
            key: 3,
            value: 'v3',
            left,
            right: new AVLNode<number, string>(),
            height: 3,
            size: 3,
        });
        expect(() => verifyNode(root)).toThrow(InvariantViolationError);
        expect(() => verifyNode(root)).toThrow('Unbalanced at 3: left height 2, right height 0');
    });
});
